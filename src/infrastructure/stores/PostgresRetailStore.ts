import { readFile } from 'node:fs/promises';
import type { BaseLogger } from 'pino';
import {
  Appointment,
  AppointmentStatus,
  CartItem,
  Customer,
  Order,
  OrderItem,
  OrderStatus,
  Product,
} from '../../domain/models.js';
import { IRetailStore } from './IRetailStore.js';
import type { SampleData } from './sampleData.js';
import { SqlClient, SqlPool, SqlRow } from './SqlPool.js';
import {
  BackendUnavailableError,
  DomainError,
  UnknownEntityError,
} from '../../domain/errors/index.js';
import { assertTransition } from '../../domain/orderLifecycle.js';
import { loyaltyTierFor } from '../../domain/loyalty.js';

const SCHEMA_FILE = new URL('../../../sql/schema.sql', import.meta.url);

export interface PostgresStoreOptions {
  // upper bound for acquiring a connection and for each statement
  timeoutMs: number;
}

// ============================================================================
// Row mapping
// ============================================================================

function text(row: SqlRow, column: string): string {
  const value = row[column];
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) {
    throw new Error(`Column '${column}' is null`);
  }
  return String(value);
}

function optionalText(row: SqlRow, column: string): string | undefined {
  const value = row[column];
  return value === null || value === undefined ? undefined : String(value);
}

// NUMERIC comes back from pg as a string
function numeric(row: SqlRow, column: string): number {
  const value = row[column];
  const parsed = typeof value === 'number' ? value : Number.parseFloat(String(value));
  if (!Number.isFinite(parsed)) {
    throw new Error(`Column '${column}' is not numeric: ${String(value)}`);
  }
  return parsed;
}

function timestamp(row: SqlRow, column: string): Date {
  const value = row[column];
  const parsed = value instanceof Date ? value : new Date(String(value));
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Column '${column}' is not a timestamp: ${String(value)}`);
  }
  return parsed;
}

function flag(row: SqlRow, column: string): boolean {
  const value = row[column];
  return value === true || value === 't' || value === 'true';
}

function orderStatus(row: SqlRow): OrderStatus {
  const value = text(row, 'status');
  if (value === 'pending' || value === 'confirmed' || value === 'cancelled') return value;
  throw new Error(`Unexpected order status '${value}'`);
}

function appointmentStatus(row: SqlRow): AppointmentStatus {
  const value = text(row, 'status');
  if (value === 'scheduled' || value === 'cancelled') return value;
  throw new Error(`Unexpected appointment status '${value}'`);
}

const toProduct = (row: SqlRow): Product => ({
  productId: text(row, 'id'),
  name: text(row, 'name'),
  description: optionalText(row, 'description'),
  price: numeric(row, 'price'),
  category: text(row, 'category'),
  sport: text(row, 'sport'),
  stock: numeric(row, 'stock'),
});

const toCustomer = (row: SqlRow): Customer => {
  const loyaltyPoints = numeric(row, 'loyalty_points');
  return {
    customerId: text(row, 'id'),
    firstName: text(row, 'first_name'),
    lastName: text(row, 'last_name'),
    email: text(row, 'email'),
    phoneNumber: optionalText(row, 'phone_number'),
    contactPreferences: {
      email: flag(row, 'email_opt_in'),
      sms: flag(row, 'sms_opt_in'),
      pushNotifications: flag(row, 'push_opt_in'),
    },
    loyaltyPoints,
    loyaltyTier: loyaltyTierFor(loyaltyPoints),
    preferredStore: optionalText(row, 'preferred_store'),
    customerSince: optionalText(row, 'customer_since'),
  };
};

const toCartItem = (row: SqlRow): CartItem => ({
  customerId: text(row, 'customer_id'),
  productId: text(row, 'product_id'),
  name: text(row, 'name'),
  quantity: numeric(row, 'quantity'),
  unitPrice: numeric(row, 'unit_price'),
  addedAt: timestamp(row, 'added_at'),
});

const toOrderItem = (row: SqlRow): OrderItem => ({
  orderId: text(row, 'order_id'),
  productId: text(row, 'product_id'),
  name: text(row, 'name'),
  quantity: numeric(row, 'quantity'),
  unitPrice: numeric(row, 'unit_price'),
});

const toAppointment = (row: SqlRow): Appointment => ({
  appointmentId: text(row, 'id'),
  customerId: text(row, 'customer_id'),
  serviceType: text(row, 'service_type'),
  date: text(row, 'date'),
  timeRange: { start: numeric(row, 'start_minute'), end: numeric(row, 'end_minute') },
  details: optionalText(row, 'details') ?? '',
  status: appointmentStatus(row),
  createdAt: timestamp(row, 'created_at'),
});

const PRODUCT_COLUMNS = 'id, name, description, price, category, sport, stock';
const CART_COLUMNS = 'customer_id, product_id, name, quantity, unit_price, added_at';
const ORDER_ITEM_COLUMNS = 'order_id, product_id, name, quantity, unit_price';
const APPOINTMENT_COLUMNS =
  "id, customer_id, service_type, to_char(date, 'YYYY-MM-DD') AS date, start_minute, end_minute, details, status, created_at";

// ============================================================================
// PostgreSQL store
// ============================================================================

export class PostgresRetailStore implements IRetailStore {
  readonly kind = 'persistent' as const;

  constructor(
    private readonly pool: SqlPool,
    private readonly options: PostgresStoreOptions,
    private readonly logger: BaseLogger
  ) {}

  async migrate(): Promise<void> {
    const schema = await readFile(SCHEMA_FILE, 'utf8');
    await this.withClient(client => this.query(client, schema));
  }

  /**
   * Loads a data set in one transaction. Rows whose key already exists are
   * left as they are, so seeding twice changes nothing.
   */
  async seed(data: SampleData): Promise<void> {
    await this.transaction(async client => {
      for (const p of data.products) {
        await this.query(
          client,
          `INSERT INTO products (${PRODUCT_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7)
           ON CONFLICT (id) DO NOTHING`,
          [p.productId, p.name, p.description ?? null, p.price, p.category, p.sport, p.stock]
        );
      }
      for (const c of data.customers) {
        await this.query(
          client,
          `INSERT INTO customers
             (id, first_name, last_name, email, phone_number, email_opt_in, sms_opt_in,
              push_opt_in, loyalty_points, preferred_store, customer_since)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
           ON CONFLICT (id) DO NOTHING`,
          [
            c.customerId,
            c.firstName,
            c.lastName,
            c.email,
            c.phoneNumber ?? null,
            c.contactPreferences.email,
            c.contactPreferences.sms,
            c.contactPreferences.pushNotifications,
            c.loyaltyPoints,
            c.preferredStore ?? null,
            c.customerSince ?? null,
          ]
        );
      }
      for (const item of data.cartItems) {
        await this.query(
          client,
          `INSERT INTO cart_items (${CART_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6)
           ON CONFLICT (customer_id, product_id) DO NOTHING`,
          [item.customerId, item.productId, item.name, item.quantity, item.unitPrice, item.addedAt]
        );
      }
      for (const order of data.orders) {
        await this.query(
          client,
          `INSERT INTO orders (id, customer_id, created_at, status) VALUES ($1, $2, $3, $4)
           ON CONFLICT (id) DO NOTHING`,
          [order.orderId, order.customerId, order.createdAt, order.status]
        );
        for (const item of order.items) {
          await this.query(
            client,
            `INSERT INTO order_items (${ORDER_ITEM_COLUMNS}) VALUES ($1, $2, $3, $4, $5)
             ON CONFLICT (order_id, product_id) DO NOTHING`,
            [order.orderId, item.productId, item.name, item.quantity, item.unitPrice]
          );
        }
      }
      for (const a of data.appointments) {
        await this.query(
          client,
          `INSERT INTO appointments
             (id, customer_id, service_type, date, start_minute, end_minute, details, status, created_at)
           VALUES ($1, $2, $3, $4::date, $5, $6, $7, $8, $9)
           ON CONFLICT (id) DO NOTHING`,
          [
            a.appointmentId,
            a.customerId,
            a.serviceType,
            a.date,
            a.timeRange.start,
            a.timeRange.end,
            a.details,
            a.status,
            a.createdAt,
          ]
        );
      }
    });
  }

  async getProduct(productId: string): Promise<Product | null> {
    return this.withClient(async client => {
      const result = await this.query(
        client,
        `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = $1`,
        [productId]
      );
      return result.rows.length === 0 ? null : toProduct(result.rows[0]);
    });
  }

  async findProductsBySport(sport: string): Promise<Product[]> {
    return this.withClient(async client => {
      const result = await this.query(
        client,
        `SELECT ${PRODUCT_COLUMNS} FROM products WHERE sport ILIKE '%' || $1 || '%' ORDER BY id`,
        [sport.trim()]
      );
      return result.rows.map(toProduct);
    });
  }

  async getCustomer(customerId: string): Promise<Customer | null> {
    return this.withClient(async client => {
      const result = await this.query(
        client,
        `SELECT id, first_name, last_name, email, phone_number, email_opt_in, sms_opt_in,
                push_opt_in, loyalty_points, preferred_store, customer_since
           FROM customers WHERE id = $1`,
        [customerId]
      );
      return result.rows.length === 0 ? null : toCustomer(result.rows[0]);
    });
  }

  async getCartItems(customerId: string): Promise<CartItem[]> {
    return this.withClient(async client => {
      await this.requireCustomer(client, customerId, false);
      return this.selectCart(client, customerId);
    });
  }

  async updateCart(
    customerId: string,
    mutate: (current: CartItem[]) => CartItem[]
  ): Promise<CartItem[]> {
    return this.transaction(async client => {
      await this.requireCustomer(client, customerId, true);
      const next = mutate(await this.selectCart(client, customerId));
      await this.replaceCart(client, customerId, next);
      return next;
    });
  }

  async placeOrder(customerId: string, build: (cart: CartItem[]) => Order): Promise<Order> {
    return this.transaction(async client => {
      await this.requireCustomer(client, customerId, true);
      const order = build(await this.selectCart(client, customerId));

      await this.query(
        client,
        'INSERT INTO orders (id, customer_id, created_at, status) VALUES ($1, $2, $3, $4)',
        [order.orderId, order.customerId, order.createdAt, order.status]
      );
      for (const item of order.items) {
        await this.query(
          client,
          `INSERT INTO order_items (${ORDER_ITEM_COLUMNS}) VALUES ($1, $2, $3, $4, $5)`,
          [order.orderId, item.productId, item.name, item.quantity, item.unitPrice]
        );
      }
      await this.query(client, 'DELETE FROM cart_items WHERE customer_id = $1', [customerId]);

      return order;
    });
  }

  async getOrder(orderId: string): Promise<Order | null> {
    return this.withClient(async client => {
      const result = await this.query(
        client,
        'SELECT id, customer_id, created_at, status FROM orders WHERE id = $1',
        [orderId]
      );
      if (result.rows.length === 0) return null;
      const [order] = await this.attachItems(client, result.rows);
      return order;
    });
  }

  async listOrders(customerId: string): Promise<Order[]> {
    return this.withClient(async client => {
      await this.requireCustomer(client, customerId, false);
      const result = await this.query(
        client,
        'SELECT id, customer_id, created_at, status FROM orders WHERE customer_id = $1 ORDER BY created_at DESC',
        [customerId]
      );
      return this.attachItems(client, result.rows);
    });
  }

  async transitionOrder(orderId: string, next: OrderStatus): Promise<Order> {
    return this.transaction(async client => {
      const result = await this.query(
        client,
        'SELECT id, customer_id, created_at, status FROM orders WHERE id = $1 FOR UPDATE',
        [orderId]
      );
      if (result.rows.length === 0) throw new UnknownEntityError('Order', orderId);

      const [order] = await this.attachItems(client, result.rows);
      assertTransition(order, next);
      await this.query(client, 'UPDATE orders SET status = $2 WHERE id = $1', [orderId, next]);

      return { ...order, status: next };
    });
  }

  async listAppointments(serviceType: string, date: string): Promise<Appointment[]> {
    return this.withClient(async client => {
      const result = await this.query(
        client,
        `SELECT ${APPOINTMENT_COLUMNS} FROM appointments
          WHERE service_type = $1 AND date = $2::date ORDER BY start_minute`,
        [serviceType, date]
      );
      return result.rows.map(toAppointment);
    });
  }

  async listCustomerAppointments(customerId: string): Promise<Appointment[]> {
    return this.withClient(async client => {
      await this.requireCustomer(client, customerId, false);
      const result = await this.query(
        client,
        `SELECT ${APPOINTMENT_COLUMNS} FROM appointments
          WHERE customer_id = $1 ORDER BY date, start_minute`,
        [customerId]
      );
      return result.rows.map(toAppointment);
    });
  }

  async bookAppointment(
    appointment: Appointment,
    check: (existing: Appointment[]) => void
  ): Promise<Appointment> {
    return this.transaction(async client => {
      // holds off concurrent bookings for the same service/date until commit
      await this.query(client, 'SELECT pg_advisory_xact_lock(hashtext($1))', [
        `${appointment.serviceType}|${appointment.date}`,
      ]);
      await this.requireCustomer(client, appointment.customerId, false);

      const existing = await this.query(
        client,
        `SELECT ${APPOINTMENT_COLUMNS} FROM appointments
          WHERE service_type = $1 AND date = $2::date AND status <> 'cancelled'`,
        [appointment.serviceType, appointment.date]
      );
      check(existing.rows.map(toAppointment));

      await this.query(
        client,
        `INSERT INTO appointments
           (id, customer_id, service_type, date, start_minute, end_minute, details, status, created_at)
         VALUES ($1, $2, $3, $4::date, $5, $6, $7, $8, $9)`,
        [
          appointment.appointmentId,
          appointment.customerId,
          appointment.serviceType,
          appointment.date,
          appointment.timeRange.start,
          appointment.timeRange.end,
          appointment.details,
          appointment.status,
          appointment.createdAt,
        ]
      );

      return appointment;
    });
  }

  async cancelAppointment(appointmentId: string): Promise<Appointment> {
    return this.withClient(async client => {
      const result = await this.query(
        client,
        `UPDATE appointments SET status = 'cancelled' WHERE id = $1
         RETURNING ${APPOINTMENT_COLUMNS}`,
        [appointmentId]
      );
      if (result.rows.length === 0) throw new UnknownEntityError('Appointment', appointmentId);
      return toAppointment(result.rows[0]);
    });
  }

  async ping(): Promise<boolean> {
    try {
      await this.withClient(client => this.query(client, 'SELECT 1'));
      return true;
    } catch (error) {
      this.logger.debug({ err: error }, 'Persistent store ping failed');
      return false;
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async requireCustomer(
    client: SqlClient,
    customerId: string,
    lock: boolean
  ): Promise<void> {
    const result = await this.query(
      client,
      `SELECT id FROM customers WHERE id = $1${lock ? ' FOR UPDATE' : ''}`,
      [customerId]
    );
    if (result.rows.length === 0) throw new UnknownEntityError('Customer', customerId);
  }

  private async selectCart(client: SqlClient, customerId: string): Promise<CartItem[]> {
    const result = await this.query(
      client,
      `SELECT ${CART_COLUMNS} FROM cart_items WHERE customer_id = $1 ORDER BY added_at, product_id`,
      [customerId]
    );
    return result.rows.map(toCartItem);
  }

  private async replaceCart(
    client: SqlClient,
    customerId: string,
    items: CartItem[]
  ): Promise<void> {
    await this.query(client, 'DELETE FROM cart_items WHERE customer_id = $1', [customerId]);
    for (const item of items) {
      await this.query(
        client,
        `INSERT INTO cart_items (${CART_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6)`,
        [customerId, item.productId, item.name, item.quantity, item.unitPrice, item.addedAt]
      );
    }
  }

  private async attachItems(client: SqlClient, orderRows: SqlRow[]): Promise<Order[]> {
    const ids = orderRows.map(row => text(row, 'id'));
    const itemResult = await this.query(
      client,
      `SELECT ${ORDER_ITEM_COLUMNS} FROM order_items WHERE order_id = ANY($1) ORDER BY product_id`,
      [ids]
    );
    const items = itemResult.rows.map(toOrderItem);

    return orderRows.map(row => {
      const orderId = text(row, 'id');
      return {
        orderId,
        customerId: text(row, 'customer_id'),
        createdAt: timestamp(row, 'created_at'),
        status: orderStatus(row),
        items: items.filter(item => item.orderId === orderId),
      };
    });
  }

  private async query(client: SqlClient, sql: string, values?: unknown[]) {
    return this.withTimeout(client.query(sql, values), 'query');
  }

  private async withClient<T>(work: (client: SqlClient) => Promise<T>): Promise<T> {
    const client = await this.acquire();
    try {
      const result = await work(client);
      client.release();
      return result;
    } catch (error) {
      client.release(isBusinessError(error) ? undefined : toError(error));
      throw this.translate(error);
    }
  }

  private async transaction<T>(work: (client: SqlClient) => Promise<T>): Promise<T> {
    const client = await this.acquire();
    try {
      await this.query(client, 'BEGIN');
      const result = await work(client);
      // a COMMIT that lands after the timeout still persists; the caller then
      // redoes the write in the fallback and both stores hold it, unreconciled
      await this.query(client, 'COMMIT');
      client.release();
      return result;
    } catch (error) {
      // a broken connection is destroyed on release, which also aborts the transaction server-side
      let broken = isBusinessError(error) ? undefined : toError(error);
      try {
        await this.query(client, 'ROLLBACK');
      } catch (rollbackError) {
        this.logger.warn({ err: rollbackError }, 'Rollback failed; discarding connection');
        broken = toError(rollbackError);
      }
      client.release(broken);
      throw this.translate(error);
    }
  }

  private async acquire(): Promise<SqlClient> {
    const connecting = this.pool.connect();
    try {
      return await this.withTimeout(connecting, 'connect');
    } catch (error) {
      // if the connection shows up after we gave up, hand it straight back
      void connecting.then(
        client => client.release(),
        (lateError: unknown) =>
          this.logger.debug({ err: lateError }, 'Late connection attempt failed')
      );
      throw this.translate(error);
    }
  }

  private withTimeout<T>(promise: Promise<T>, label: string): Promise<T> {
    const { timeoutMs } = this.options;
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(
          new BackendUnavailableError(
            'persistent',
            new Error(`${label} timed out after ${timeoutMs}ms`)
          )
        );
      }, timeoutMs);

      promise.then(
        value => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  // business errors pass through; anything else from the driver means the store is unusable
  private translate(error: unknown): Error {
    if (error instanceof DomainError) return error;
    this.logger.debug({ err: error }, 'Persistent store call failed');
    return new BackendUnavailableError('persistent', error);
  }
}

function isBusinessError(error: unknown): boolean {
  return error instanceof DomainError && !(error instanceof BackendUnavailableError);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
