import { describe, it, expect } from 'vitest';
import {
  SnapshotPricingStrategy,
  lineTotal,
  roundMoney,
} from '../src/domain/strategies/IPricingStrategy.js';
import { CartItem, Order } from '../src/domain/models.js';

describe('SnapshotPricingStrategy', () => {
  const strategy = new SnapshotPricingStrategy();

  const item = (productId: string, quantity: number, unitPrice: number, addedAt: string): CartItem => ({
    customerId: 'cust-1',
    productId,
    name: `Product ${productId}`,
    quantity,
    unitPrice,
    addedAt: new Date(addedAt),
  });

  describe('priceCart', () => {
    it('returns empty cart with zero subtotal', () => {
      const cart = strategy.priceCart('cust-1', []);

      expect(cart.items).toEqual([]);
      expect(cart.subtotal).toBe(0);
      expect(cart.currency).toBe('USD');
    });

    it('prices lines from the stored unit price', () => {
      const cart = strategy.priceCart('cust-1', [
        item('TEN-BALL-01', 4, 5.99, '2024-07-01T10:00:00Z'),
      ]);

      expect(cart.items[0].totalPrice).toBe(23.96);
      expect(cart.subtotal).toBe(23.96);
    });

    it('orders lines by when they were added', () => {
      const cart = strategy.priceCart('cust-1', [
        item('B', 1, 1, '2024-07-01T10:05:00Z'),
        item('C', 1, 1, '2024-07-01T10:00:00Z'),
        item('A', 1, 1, '2024-07-01T10:05:00Z'),
      ]);

      expect(cart.items.map(l => l.productId)).toEqual(['C', 'A', 'B']);
    });

    it('rounds away floating point noise', () => {
      const cart = strategy.priceCart('cust-1', [
        item('A', 3, 0.1, '2024-07-01T10:00:00Z'),
        item('B', 1, 0.2, '2024-07-01T10:01:00Z'),
      ]);

      expect(cart.items[0].totalPrice).toBe(0.3);
      expect(cart.subtotal).toBe(0.5);
    });

    it('does not reorder the caller array', () => {
      const items = [
        item('B', 1, 1, '2024-07-01T10:05:00Z'),
        item('A', 1, 1, '2024-07-01T10:00:00Z'),
      ];
      strategy.priceCart('cust-1', items);

      expect(items[0].productId).toBe('B');
    });

    it('uses configured currency', () => {
      const eur = new SnapshotPricingStrategy('EUR');
      expect(eur.priceCart('cust-1', []).currency).toBe('EUR');
    });
  });

  describe('priceOrder', () => {
    it('totals the order items', () => {
      const order: Order = {
        orderId: 'ORD-1',
        customerId: 'cust-1',
        createdAt: new Date('2024-05-11T09:12:00Z'),
        status: 'pending',
        items: [
          { orderId: 'ORD-1', productId: 'CYC-HELM-01', name: 'Helmet', quantity: 1, unitPrice: 79.99 },
          { orderId: 'ORD-1', productId: 'CYC-LIGHT-01', name: 'Lights', quantity: 2, unitPrice: 34.5 },
        ],
      };

      const priced = strategy.priceOrder(order);

      expect(priced.total).toBe(148.99);
      expect(priced.currency).toBe('USD');
      expect(priced.items).toEqual(order.items);
      expect(priced.items).not.toBe(order.items);
    });
  });

  describe('helpers', () => {
    it('rounds to cents', () => {
      expect(roundMoney(10.126)).toBe(10.13);
      expect(roundMoney(0.1 + 0.2)).toBe(0.3);
    });

    it('computes line totals', () => {
      expect(lineTotal(15.76, 3)).toBe(47.28);
    });
  });
});
