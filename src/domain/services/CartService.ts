import { v4 as uuidv4 } from 'uuid';
import type { BaseLogger } from 'pino';
import {
  CartItem,
  CartModification,
  CartSnapshot,
  ClampedRemoval,
  Customer,
  LineRequest,
  Order,
  OrderStatus,
  PricedOrder,
  Product,
} from '../models.js';
import { IPricingStrategy } from '../strategies/IPricingStrategy.js';
import { FailoverStrategy, Served } from '../strategies/FailoverStrategy.js';
import { KeyedMutex } from '../concurrency/KeyedMutex.js';
import {
  EmptyCartError,
  ResourceNotFoundError,
  UnknownEntityError,
  ValidationError,
} from '../errors/index.js';

interface RemovalRequest {
  productId: string;
  quantity: number | null; // null = the whole line
}

interface AdditionRequest {
  productId: string;
  quantity: number;
}

/**
 * Cart and order engine. Every call goes through the failover strategy, so the
 * persistent store is tried first and the in-memory fallback serves the call
 * when it cannot. Mutations for one customer never interleave.
 */
export class CartService {
  private maxQty: number;
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly backends: FailoverStrategy,
    private readonly pricing: IPricingStrategy,
    private readonly logger: BaseLogger,
    config?: {
      maxQuantity?: number;
    }
  ) {
    this.maxQty = config?.maxQuantity ?? 99;
  }

  async getCart(customerId: string): Promise<CartSnapshot> {
    this.validateCustomerId(customerId);
    const served = await this.backends.execute('getCart', store =>
      store.getCartItems(customerId)
    );
    return this.pricing.priceCart(customerId, served.value);
  }

  /**
   * Removals run before additions. A removal larger than what the cart holds
   * takes the whole line and is listed in `clampedRemovals` instead of failing.
   * Either every line change lands or none does.
   */
  async modifyCart(
    customerId: string,
    itemsToAdd: LineRequest[],
    itemsToRemove: LineRequest[]
  ): Promise<CartModification> {
    this.validateCustomerId(customerId);
    const additions = itemsToAdd.map(line => this.validateAddition(line));
    const removals = itemsToRemove.map(line => this.validateRemoval(line));

    const served = await this.locks.runExclusive(customerId, () =>
      this.backends.execute('modifyCart', async store => {
        // price snapshot is taken now, from whichever backend serves the call
        const products = new Map<string, Product>();
        for (const { productId } of additions) {
          if (products.has(productId)) continue;
          const product = await store.getProduct(productId);
          if (!product) throw new ResourceNotFoundError('Product', productId);
          products.set(productId, product);
        }

        let clamped: ClampedRemoval[] = [];
        const items = await store.updateCart(customerId, current => {
          const next = this.applyRemovals(current, removals);
          clamped = next.clamped;
          return this.applyAdditions(customerId, next.items, additions, products);
        });

        return { items, clamped };
      })
    );

    this.logChange('modifyCart', customerId, served);
    return {
      ...this.pricing.priceCart(customerId, served.value.items),
      clampedRemovals: served.value.clamped,
    };
  }

  // explicit resync: the only path that moves snapshots to live catalog prices
  async resyncCartPrices(customerId: string): Promise<CartSnapshot> {
    this.validateCustomerId(customerId);

    const served = await this.locks.runExclusive(customerId, () =>
      this.backends.execute('resyncCartPrices', async store => {
        const current = await store.getCartItems(customerId);
        const prices = new Map<string, number>();
        for (const item of current) {
          const product = await store.getProduct(item.productId);
          if (product) prices.set(item.productId, product.price);
        }

        return store.updateCart(customerId, items =>
          items.map(item => ({
            ...item,
            unitPrice: prices.get(item.productId) ?? item.unitPrice,
          }))
        );
      })
    );

    this.logChange('resyncCartPrices', customerId, served);
    return this.pricing.priceCart(customerId, served.value);
  }

  async placeOrder(customerId: string): Promise<PricedOrder> {
    this.validateCustomerId(customerId);

    const served = await this.locks.runExclusive(customerId, () =>
      this.backends.execute('placeOrder', store =>
        store.placeOrder(customerId, cart => this.buildOrder(customerId, cart))
      )
    );

    this.logChange('placeOrder', customerId, served);
    return this.pricing.priceOrder(served.value);
  }

  async getOrder(orderId: string): Promise<PricedOrder> {
    this.validateId(orderId, 'Order ID');
    const served = await this.backends.execute('getOrder', async store => {
      const order = await store.getOrder(orderId);
      if (!order) throw new UnknownEntityError('Order', orderId);
      return order;
    });
    return this.pricing.priceOrder(served.value);
  }

  async listOrders(customerId: string): Promise<PricedOrder[]> {
    this.validateCustomerId(customerId);
    const served = await this.backends.execute('listOrders', store =>
      store.listOrders(customerId)
    );
    return served.value.map(order => this.pricing.priceOrder(order));
  }

  async confirmOrder(orderId: string): Promise<PricedOrder> {
    return this.transitionOrder(orderId, 'confirmed');
  }

  async cancelOrder(orderId: string): Promise<PricedOrder> {
    return this.transitionOrder(orderId, 'cancelled');
  }

  async getCustomer(customerId: string): Promise<Customer> {
    this.validateCustomerId(customerId);
    const served = await this.backends.execute('getCustomer', async store => {
      const customer = await store.getCustomer(customerId);
      if (!customer) throw new UnknownEntityError('Customer', customerId);
      return customer;
    });
    return served.value;
  }

  private async transitionOrder(orderId: string, next: OrderStatus): Promise<PricedOrder> {
    this.validateId(orderId, 'Order ID');

    const served = await this.locks.runExclusive(`order:${orderId}`, () =>
      this.backends.execute(`order:${next}`, store => store.transitionOrder(orderId, next))
    );

    this.logger.info({ orderId, status: next, backend: served.backend }, 'Order status changed');
    return this.pricing.priceOrder(served.value);
  }

  private buildOrder(customerId: string, cart: CartItem[]): Order {
    if (cart.length === 0) throw new EmptyCartError(customerId);

    const orderId = `ORD-${uuidv4().replace(/-/g, '').slice(0, 8).toUpperCase()}`;
    return {
      orderId,
      customerId,
      createdAt: new Date(),
      status: 'pending',
      items: cart.map(item => ({
        orderId,
        productId: item.productId,
        name: item.name,
        quantity: item.quantity,
        unitPrice: item.unitPrice,
      })),
    };
  }

  private applyRemovals(
    current: CartItem[],
    removals: RemovalRequest[]
  ): { items: CartItem[]; clamped: ClampedRemoval[] } {
    const items = current.map(item => ({ ...item }));
    const clamped: ClampedRemoval[] = [];

    for (const removal of removals) {
      const idx = items.findIndex(item => item.productId === removal.productId);
      const held = idx >= 0 ? items[idx].quantity : 0;
      const removed = removal.quantity === null ? held : Math.min(removal.quantity, held);

      // asked for more than the cart holds, or for a line that isn't there
      if ((removal.quantity !== null && removal.quantity > held) || held === 0) {
        clamped.push({ productId: removal.productId, requested: removal.quantity, removed });
      }

      if (idx === -1) continue;
      if (removed === held) {
        items.splice(idx, 1); // no zero-quantity rows
      } else {
        items[idx].quantity = held - removed;
      }
    }

    return { items, clamped };
  }

  private applyAdditions(
    customerId: string,
    current: CartItem[],
    additions: AdditionRequest[],
    products: Map<string, Product>
  ): CartItem[] {
    const items = current.map(item => ({ ...item }));

    for (const addition of additions) {
      const product = products.get(addition.productId);
      if (!product) throw new ResourceNotFoundError('Product', addition.productId);

      const existing = items.find(item => item.productId === addition.productId);
      if (existing) {
        const newQty = existing.quantity + addition.quantity;
        if (newQty > this.maxQty) {
          throw new ValidationError(
            `Total quantity for product '${product.name}' would exceed maximum of ${this.maxQty}`
          );
        }
        existing.quantity = newQty;
        existing.unitPrice = product.price;
      } else {
        items.push({
          customerId,
          productId: product.productId,
          name: product.name,
          quantity: addition.quantity,
          unitPrice: product.price,
          addedAt: new Date(),
        });
      }
    }

    return items;
  }

  private logChange<T>(operation: string, customerId: string, served: Served<T>): void {
    this.logger.info(
      { operation, customerId, backend: served.backend, degraded: served.degraded },
      'Cart state changed'
    );
  }

  private validateCustomerId(customerId: string): void {
    this.validateId(customerId, 'Customer ID');
  }

  private validateId(value: string, label: string): void {
    if (typeof value !== 'string' || value.trim().length === 0) {
      throw new ValidationError(`${label} is required.`);
    }
  }

  private validateAddition(line: LineRequest): AdditionRequest {
    this.validateId(line.productId, 'Product ID');
    const quantity = line.quantity ?? 1;
    this.validateQuantity(quantity);
    return { productId: line.productId, quantity };
  }

  private validateRemoval(line: LineRequest): RemovalRequest {
    this.validateId(line.productId, 'Product ID');
    if (line.quantity === undefined) {
      return { productId: line.productId, quantity: null };
    }
    // no upper bound: oversized removals clamp
    if (!Number.isInteger(line.quantity) || line.quantity < 1) {
      throw new ValidationError('Removal quantity must be a positive integer.');
    }
    return { productId: line.productId, quantity: line.quantity };
  }

  private validateQuantity(quantity: number): void {
    if (!Number.isInteger(quantity)) {
      throw new ValidationError('Quantity must be an integer.');
    }
    if (quantity < 1 || quantity > this.maxQty) {
      throw new ValidationError(`Quantity must be between 1 and ${this.maxQty}.`);
    }
  }
}
