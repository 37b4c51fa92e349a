import { describe, it, expect, beforeEach } from 'vitest';
import { CartService } from '../src/domain/services/CartService.js';
import { FailoverStrategy } from '../src/domain/strategies/FailoverStrategy.js';
import { SnapshotPricingStrategy } from '../src/domain/strategies/IPricingStrategy.js';
import { InMemoryRetailStore } from '../src/infrastructure/stores/InMemoryRetailStore.js';
import { loadSampleData } from '../src/infrastructure/stores/sampleData.js';
import { createLogger } from '../src/infrastructure/logger.js';
import {
  BackendUnavailableError,
  EmptyCartError,
  InvalidStateTransitionError,
  ResourceNotFoundError,
  UnknownEntityError,
  ValidationError,
} from '../src/domain/errors/index.js';
import { SwitchableStore, seedWithout } from './helpers/SwitchableStore.js';

// the persistent store drops while emptying the cart, after the order row went in
class DroppedConnectionStore extends InMemoryRetailStore {
  protected override clearCart(_customerId: string): void {
    throw new BackendUnavailableError('persistent', new Error('connection reset'));
  }
}

describe('CartService', () => {
  const logger = createLogger('silent');
  let primary: SwitchableStore;
  let fallback: InMemoryRetailStore;
  let cartService: CartService;

  const build = (maxQuantity?: number) =>
    new CartService(
      new FailoverStrategy(primary, fallback, logger),
      new SnapshotPricingStrategy(),
      logger,
      { maxQuantity }
    );

  beforeEach(() => {
    primary = new SwitchableStore();
    fallback = new InMemoryRetailStore();
    cartService = build();
  });

  describe('getCart', () => {
    it('returns snapshotted lines and subtotal', async () => {
      const cart = await cartService.getCart('CUST-1001');

      expect(cart.items.map(l => [l.productId, l.quantity, l.unitPrice])).toEqual([
        ['RUN-S05', 1, 139.99],
        ['RUN-A01', 1, 15.76],
      ]);
      expect(cart.subtotal).toBe(155.75);
      expect(cart.currency).toBe('USD');
    });

    it('returns an empty cart for a customer without one', async () => {
      const cart = await cartService.getCart('CUST-1003');

      expect(cart.items).toEqual([]);
      expect(cart.subtotal).toBe(0);
    });

    it('gives the same answer when read twice', async () => {
      const first = await cartService.getCart('CUST-1001');
      const second = await cartService.getCart('CUST-1001');

      expect(second).toEqual(first);
    });

    it('throws for unknown customer', async () => {
      await expect(cartService.getCart('CUST-9999')).rejects.toThrow(UnknownEntityError);
    });

    it('throws for blank customer ID', async () => {
      await expect(cartService.getCart('  ')).rejects.toThrow(ValidationError);
    });

    it('finds a customer only the fallback knows', async () => {
      primary = new SwitchableStore(seedWithout('CUST-1001'));
      cartService = build();

      const cart = await cartService.getCart('CUST-1001');

      expect(cart.items).toHaveLength(2);
    });
  });

  describe('modifyCart', () => {
    it('adds a new line at the catalog price', async () => {
      const result = await cartService.modifyCart(
        'CUST-1003',
        [{ productId: 'TEN-BALL-01', quantity: 4 }],
        []
      );

      expect(result.items).toHaveLength(1);
      expect(result.items[0]).toMatchObject({
        productId: 'TEN-BALL-01',
        name: 'Tennis Balls (3-pack)',
        quantity: 4,
        unitPrice: 5.99,
        totalPrice: 23.96,
      });
      expect(result.subtotal).toBe(23.96);
      expect(result.clampedRemovals).toEqual([]);
    });

    it('defaults the added quantity to 1', async () => {
      const result = await cartService.modifyCart('CUST-1003', [{ productId: 'GEN-WB-01' }], []);

      expect(result.items[0].quantity).toBe(1);
    });

    it('merges additions into an existing line', async () => {
      const result = await cartService.modifyCart(
        'CUST-1001',
        [{ productId: 'RUN-A01', quantity: 2 }],
        []
      );

      const socks = result.items.find(l => l.productId === 'RUN-A01');
      expect(socks?.quantity).toBe(3);
      expect(result.subtotal).toBe(187.27);
    });

    it('clamps a removal larger than the line and reports it', async () => {
      const result = await cartService.modifyCart(
        'CUST-1001',
        [],
        [{ productId: 'RUN-A01', quantity: 5 }]
      );

      expect(result.items.map(l => l.productId)).toEqual(['RUN-S05']);
      expect(result.subtotal).toBe(139.99);
      expect(result.clampedRemovals).toEqual([{ productId: 'RUN-A01', requested: 5, removed: 1 }]);
    });

    it('reports removal of a product that is not in the cart', async () => {
      const result = await cartService.modifyCart(
        'CUST-1001',
        [],
        [{ productId: 'TEN-BALL-01', quantity: 1 }]
      );

      expect(result.items).toHaveLength(2);
      expect(result.clampedRemovals).toEqual([
        { productId: 'TEN-BALL-01', requested: 1, removed: 0 },
      ]);
    });

    it('removes the whole line when no quantity is given', async () => {
      const result = await cartService.modifyCart('CUST-1001', [], [{ productId: 'RUN-S05' }]);

      expect(result.items.map(l => l.productId)).toEqual(['RUN-A01']);
      expect(result.clampedRemovals).toEqual([]);
    });

    it('decrements a line on partial removal', async () => {
      await cartService.modifyCart('CUST-1003', [{ productId: 'TEN-BALL-01', quantity: 4 }], []);

      const result = await cartService.modifyCart(
        'CUST-1003',
        [],
        [{ productId: 'TEN-BALL-01', quantity: 3 }]
      );

      expect(result.items[0].quantity).toBe(1);
      expect(result.subtotal).toBe(5.99);
    });

    it('applies removals before additions', async () => {
      const result = await cartService.modifyCart(
        'CUST-1001',
        [{ productId: 'RUN-A01', quantity: 2 }],
        [{ productId: 'RUN-A01' }]
      );

      expect(result.items.map(l => [l.productId, l.quantity])).toEqual([
        ['RUN-S05', 1],
        ['RUN-A01', 2],
      ]);
      expect(result.clampedRemovals).toEqual([]);
    });

    it('rejects invalid quantities before touching the cart', async () => {
      await expect(
        cartService.modifyCart('CUST-1001', [{ productId: 'RUN-A01', quantity: 0 }], [])
      ).rejects.toThrow(ValidationError);
      await expect(
        cartService.modifyCart('CUST-1001', [{ productId: 'RUN-A01', quantity: 100 }], [])
      ).rejects.toThrow(ValidationError);
      await expect(
        cartService.modifyCart('CUST-1001', [{ productId: 'RUN-A01', quantity: 1.5 }], [])
      ).rejects.toThrow(ValidationError);
      await expect(
        cartService.modifyCart('CUST-1001', [], [{ productId: 'RUN-A01', quantity: -1 }])
      ).rejects.toThrow(ValidationError);

      expect(primary.calls).toBe(0);
    });

    it('accepts oversized removals', async () => {
      const result = await cartService.modifyCart(
        'CUST-1001',
        [],
        [{ productId: 'RUN-S05', quantity: 500 }]
      );

      expect(result.clampedRemovals).toEqual([{ productId: 'RUN-S05', requested: 500, removed: 1 }]);
    });

    it('rejects a merge past the line maximum and leaves the cart alone', async () => {
      cartService = build(5);

      await expect(
        cartService.modifyCart('CUST-1001', [{ productId: 'RUN-A01', quantity: 5 }], [])
      ).rejects.toThrow(ValidationError);

      const cart = await cartService.getCart('CUST-1001');
      expect(cart.items.find(l => l.productId === 'RUN-A01')?.quantity).toBe(1);
    });

    it('applies nothing when one line refers to an unknown product', async () => {
      await expect(
        cartService.modifyCart(
          'CUST-1001',
          [
            { productId: 'TEN-BALL-01', quantity: 2 },
            { productId: 'NO-SUCH-ITEM', quantity: 1 },
          ],
          [{ productId: 'RUN-S05' }]
        )
      ).rejects.toThrow(ResourceNotFoundError);

      const cart = await cartService.getCart('CUST-1001');
      expect(cart.items.map(l => l.productId)).toEqual(['RUN-S05', 'RUN-A01']);
    });

    it('serializes concurrent changes for one customer', async () => {
      await Promise.all(
        Array.from({ length: 5 }, () =>
          cartService.modifyCart('CUST-1003', [{ productId: 'TEN-BALL-01' }], [])
        )
      );

      const cart = await cartService.getCart('CUST-1003');
      expect(cart.items[0].quantity).toBe(5);
    });

    it('writes to the fallback only when the persistent store is down', async () => {
      primary.available = false;

      const result = await cartService.modifyCart(
        'CUST-1001',
        [{ productId: 'TEN-BALL-01', quantity: 4 }],
        []
      );

      expect(result.subtotal).toBe(179.71);
      expect(await fallback.getCartItems('CUST-1001')).toHaveLength(3);
      expect(await primary.data.getCartItems('CUST-1001')).toHaveLength(2);
    });

    it('redoes the change in the fallback when the store drops after the product lookup', async () => {
      primary.failFromCall = 2;

      const result = await cartService.modifyCart(
        'CUST-1001',
        [{ productId: 'TEN-BALL-01', quantity: 4 }],
        []
      );

      expect(primary.calls).toBe(2);
      expect(result.items.map(l => l.productId)).toEqual(['RUN-S05', 'RUN-A01', 'TEN-BALL-01']);
      expect(result.subtotal).toBe(179.71);
      expect(await fallback.getCartItems('CUST-1001')).toHaveLength(3);
      expect(await primary.data.getCartItems('CUST-1001')).toHaveLength(2);
    });
  });

  describe('price snapshots', () => {
    beforeEach(() => {
      // catalog moved on since the seeded lines were added
      const seed = loadSampleData();
      seed.products = seed.products.map(p =>
        p.productId === 'RUN-S05' ? { ...p, price: 149.99 } : p
      );
      primary = new SwitchableStore(seed);
      cartService = build();
    });

    it('keeps the stored unit price on read', async () => {
      const cart = await cartService.getCart('CUST-1001');

      expect(cart.items[0].unitPrice).toBe(139.99);
    });

    it('re-snapshots a line when more of it is added', async () => {
      const result = await cartService.modifyCart('CUST-1001', [{ productId: 'RUN-S05' }], []);

      expect(result.items[0]).toMatchObject({ quantity: 2, unitPrice: 149.99, totalPrice: 299.98 });
    });

    it('moves every line to live prices on resync', async () => {
      const cart = await cartService.resyncCartPrices('CUST-1001');

      expect(cart.items.map(l => l.unitPrice)).toEqual([149.99, 15.76]);
      expect(cart.subtotal).toBe(165.75);
    });
  });

  describe('placeOrder', () => {
    it('turns the cart into a pending order and empties it', async () => {
      const order = await cartService.placeOrder('CUST-1001');

      expect(order.orderId).toMatch(/^ORD-[0-9A-F]{8}$/);
      expect(order.status).toBe('pending');
      expect(order.total).toBe(155.75);
      expect(order.items.map(i => i.productId)).toEqual(['RUN-S05', 'RUN-A01']);

      const cart = await cartService.getCart('CUST-1001');
      expect(cart.items).toEqual([]);
    });

    it('lists the new order first', async () => {
      const order = await cartService.placeOrder('CUST-1001');

      const orders = await cartService.listOrders('CUST-1001');
      expect(orders.map(o => o.orderId)).toEqual([order.orderId, 'ORD-5A1B2C3D']);
    });

    it('refuses an empty cart without creating an order', async () => {
      await expect(cartService.placeOrder('CUST-1003')).rejects.toThrow(EmptyCartError);

      expect(primary.data.getOrderCount()).toBe(2);
    });

    it('places once when two requests race', async () => {
      const results = await Promise.allSettled([
        cartService.placeOrder('CUST-1001'),
        cartService.placeOrder('CUST-1001'),
      ]);

      expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected']);
      expect(primary.data.getOrderCount()).toBe(3);
    });

    it('is served by the fallback during an outage', async () => {
      primary.available = false;

      const order = await cartService.placeOrder('CUST-1001');

      expect(await fallback.getOrder(order.orderId)).not.toBeNull();
      expect(await primary.data.getOrder(order.orderId)).toBeNull();
      expect(await primary.data.getCartItems('CUST-1001')).toHaveLength(2);
    });

    it('leaves the persistent store untouched when it drops halfway through placement', async () => {
      primary = new SwitchableStore(loadSampleData(), new DroppedConnectionStore());
      cartService = build();

      const order = await cartService.placeOrder('CUST-1001');

      expect(order.total).toBe(155.75);
      expect(primary.data.getOrderCount()).toBe(2);
      expect(await primary.data.getOrder(order.orderId)).toBeNull();
      expect(await primary.data.getCartItems('CUST-1001')).toHaveLength(2);
      expect(await fallback.getOrder(order.orderId)).not.toBeNull();
      expect(await fallback.getCartItems('CUST-1001')).toEqual([]);
    });
  });

  describe('order status', () => {
    it('confirms a pending order', async () => {
      const order = await cartService.confirmOrder('ORD-9E8F7A6B');

      expect(order.status).toBe('confirmed');
      expect(order.total).toBe(148.99);
    });

    it('cannot cancel after confirming', async () => {
      await cartService.confirmOrder('ORD-9E8F7A6B');

      await expect(cartService.cancelOrder('ORD-9E8F7A6B')).rejects.toThrow(
        InvalidStateTransitionError
      );
    });

    it('throws for unknown order', async () => {
      await expect(cartService.getOrder('ORD-00000000')).rejects.toThrow(UnknownEntityError);
    });

    it('reads a single order with its total', async () => {
      const order = await cartService.getOrder('ORD-5A1B2C3D');

      expect(order.total).toBe(29.99);
      expect(order.status).toBe('confirmed');
    });
  });

  describe('getCustomer', () => {
    it('returns the profile with loyalty tier', async () => {
      const customer = await cartService.getCustomer('CUST-1002');

      expect(customer.loyaltyTier).toBe('Gold');
      expect(customer.loyaltyPoints).toBe(1250);
    });

    it('throws for unknown customer', async () => {
      await expect(cartService.getCustomer('CUST-9999')).rejects.toThrow(UnknownEntityError);
    });
  });
});
