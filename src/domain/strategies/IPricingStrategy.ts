import { CartItem, CartLine, CartSnapshot, Order, PricedOrder } from '../models.js';

export interface IPricingStrategy {
  priceCart(customerId: string, items: CartItem[]): CartSnapshot;
  priceOrder(order: Order): PricedOrder;
}

export function roundMoney(amount: number): number {
  // rounding to 2 decimals to avoid floating point weirdness
  return Math.round(amount * 100) / 100;
}

export function lineTotal(unitPrice: number, quantity: number): number {
  return roundMoney(unitPrice * quantity);
}

// snapshot pricing - totals always come from the stored unit prices, never the live catalog
export class SnapshotPricingStrategy implements IPricingStrategy {
  constructor(private readonly currency: string = 'USD') {}

  priceCart(customerId: string, items: CartItem[]): CartSnapshot {
    const lines: CartLine[] = [...items]
      .sort(
        (a, b) =>
          a.addedAt.getTime() - b.addedAt.getTime() ||
          a.productId.localeCompare(b.productId)
      )
      .map(item => ({
        productId: item.productId,
        name: item.name,
        quantity: item.quantity,
        unitPrice: item.unitPrice,
        totalPrice: lineTotal(item.unitPrice, item.quantity),
        addedAt: item.addedAt,
      }));

    const subtotal = lines.reduce((sum, line) => sum + line.totalPrice, 0);

    return {
      customerId,
      items: lines,
      subtotal: roundMoney(subtotal),
      currency: this.currency,
    };
  }

  priceOrder(order: Order): PricedOrder {
    const total = order.items.reduce(
      (sum, item) => sum + lineTotal(item.unitPrice, item.quantity),
      0
    );

    return {
      ...order,
      items: order.items.map(item => ({ ...item })),
      total: roundMoney(total),
      currency: this.currency,
    };
  }
}
