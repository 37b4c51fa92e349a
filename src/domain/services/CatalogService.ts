import { Product } from '../models.js';
import { FailoverStrategy } from '../strategies/FailoverStrategy.js';
import { ValidationError } from '../errors/index.js';

export interface Availability {
  available: boolean;
  quantity: number;
  store: string;
}

// read-only product lookups; same backend policy as the cart
export class CatalogService {
  constructor(private readonly backends: FailoverStrategy) {}

  // products for the sport that the customer doesn't already have in the cart
  async recommend(sportOrActivity: string, customerId: string): Promise<Product[]> {
    if (typeof sportOrActivity !== 'string' || sportOrActivity.trim().length === 0) {
      throw new ValidationError('Sport or activity is required.');
    }
    if (typeof customerId !== 'string' || customerId.trim().length === 0) {
      throw new ValidationError('Customer ID is required.');
    }

    const served = await this.backends.execute('recommend', async store => {
      const cart = await store.getCartItems(customerId);
      const inCart = new Set(cart.map(item => item.productId));
      const products = await store.findProductsBySport(sportOrActivity);
      return products.filter(product => !inCart.has(product.productId));
    });
    return served.value;
  }

  // stock is tracked per product, not per store; the store id is echoed back
  async checkAvailability(productId: string, storeId: string): Promise<Availability> {
    if (typeof productId !== 'string' || productId.trim().length === 0) {
      throw new ValidationError('Product ID is required.');
    }

    const served = await this.backends.execute('checkAvailability', store =>
      store.getProduct(productId)
    );
    const product = served.value;
    if (!product) {
      return { available: false, quantity: 0, store: storeId };
    }
    return { available: product.stock > 0, quantity: product.stock, store: storeId };
  }
}
