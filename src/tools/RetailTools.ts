import {
  Appointment,
  CartLine,
  CartSnapshot,
  Customer,
  OrderStatus,
  PricedOrder,
  Product,
} from '../domain/models.js';
import { CartService } from '../domain/services/CartService.js';
import { AppointmentService } from '../domain/services/AppointmentService.js';
import { Availability, CatalogService } from '../domain/services/CatalogService.js';
import { formatTimeRange } from '../domain/timeRange.js';
import { lineTotal } from '../domain/strategies/IPricingStrategy.js';
import { ResourceNotFoundError } from '../domain/errors/index.js';

// ============================================================================
// Wire records (snake_case, what the agent sees)
// ============================================================================

export interface LineArg {
  product_id: string;
  quantity?: number;
}

export interface CartLineRecord {
  product_id: string;
  name: string;
  quantity: number;
  unit_price: number;
  line_total: number;
}

export interface CartRecord {
  items: CartLineRecord[];
  subtotal: number;
  currency: string;
}

export interface ClampedRemovalRecord {
  product_id: string;
  requested: number | null;
  removed: number;
}

export interface ModifyCartRecord extends CartRecord {
  clamped_removals: ClampedRemovalRecord[];
}

export interface OrderRecord {
  order_id: string;
  customer_id: string;
  status: OrderStatus;
  created_at: string;
  items: CartLineRecord[];
  total: number;
  currency: string;
}

export interface CustomerRecord {
  customer_id: string;
  name: string;
  email: string;
  phone: string | null;
  membership_level: string;
  loyalty_points: number;
  preferred_store: string | null;
  customer_since: string | null;
  contact_preferences: { email: boolean; sms: boolean; push_notifications: boolean };
}

export interface ProductRecord {
  product_id: string;
  name: string;
  description: string;
  price: number;
  category: string;
}

export interface AppointmentRecord {
  appointment_id: string;
  status: string;
  service_type: string;
  date: string;
  time_range: string;
  details: string;
}

const toLine = (line: CartLine): CartLineRecord => ({
  product_id: line.productId,
  name: line.name,
  quantity: line.quantity,
  unit_price: line.unitPrice,
  line_total: line.totalPrice,
});

const toCart = (cart: CartSnapshot): CartRecord => ({
  items: cart.items.map(toLine),
  subtotal: cart.subtotal,
  currency: cart.currency,
});

const toOrder = (order: PricedOrder): OrderRecord => ({
  order_id: order.orderId,
  customer_id: order.customerId,
  status: order.status,
  created_at: order.createdAt.toISOString(),
  items: order.items.map(item => ({
    product_id: item.productId,
    name: item.name,
    quantity: item.quantity,
    unit_price: item.unitPrice,
    line_total: lineTotal(item.unitPrice, item.quantity),
  })),
  total: order.total,
  currency: order.currency,
});

const toCustomer = (customer: Customer): CustomerRecord => ({
  customer_id: customer.customerId,
  name: `${customer.firstName} ${customer.lastName}`,
  email: customer.email,
  phone: customer.phoneNumber ?? null,
  membership_level: customer.loyaltyTier,
  loyalty_points: customer.loyaltyPoints,
  preferred_store: customer.preferredStore ?? null,
  customer_since: customer.customerSince ?? null,
  contact_preferences: {
    email: customer.contactPreferences.email,
    sms: customer.contactPreferences.sms,
    push_notifications: customer.contactPreferences.pushNotifications,
  },
});

const toProduct = (product: Product): ProductRecord => ({
  product_id: product.productId,
  name: product.name,
  description: product.description ?? '',
  price: product.price,
  category: product.category,
});

const toAppointment = (appointment: Appointment): AppointmentRecord => ({
  appointment_id: appointment.appointmentId,
  status: appointment.status,
  service_type: appointment.serviceType,
  date: appointment.date,
  time_range: formatTimeRange(appointment.timeRange),
  details: appointment.details,
});

const toLineRequest = (arg: LineArg) => ({ productId: arg.product_id, quantity: arg.quantity });

// ============================================================================
// Tool surface
// ============================================================================

/**
 * The operations the assistant can call. Arguments and results are plain
 * records; business failures surface as the domain's typed errors.
 */
export class RetailTools {
  constructor(
    private readonly cart: CartService,
    private readonly appointments: AppointmentService,
    private readonly catalog: CatalogService
  ) {}

  async accessCartInformation(args: { customer_id: string }): Promise<CartRecord> {
    return toCart(await this.cart.getCart(args.customer_id));
  }

  async modifyCart(args: {
    customer_id: string;
    items_to_add?: LineArg[];
    items_to_remove?: LineArg[];
  }): Promise<ModifyCartRecord> {
    const result = await this.cart.modifyCart(
      args.customer_id,
      (args.items_to_add ?? []).map(toLineRequest),
      (args.items_to_remove ?? []).map(toLineRequest)
    );

    return {
      ...toCart(result),
      clamped_removals: result.clampedRemovals.map(c => ({
        product_id: c.productId,
        requested: c.requested,
        removed: c.removed,
      })),
    };
  }

  async resyncCartPrices(args: { customer_id: string }): Promise<CartRecord> {
    return toCart(await this.cart.resyncCartPrices(args.customer_id));
  }

  async placeOrder(args: { customer_id: string }): Promise<OrderRecord> {
    return toOrder(await this.cart.placeOrder(args.customer_id));
  }

  // with order_id: just that order, and only if it is the customer's own
  async getOrderHistory(args: {
    customer_id: string;
    order_id?: string;
  }): Promise<{ orders: OrderRecord[] }> {
    if (args.order_id !== undefined) {
      const order = await this.cart.getOrder(args.order_id);
      if (order.customerId !== args.customer_id) {
        throw new ResourceNotFoundError('Order', args.order_id);
      }
      return { orders: [toOrder(order)] };
    }
    const orders = await this.cart.listOrders(args.customer_id);
    return { orders: orders.map(toOrder) };
  }

  async updateOrderStatus(args: {
    order_id: string;
    status: 'confirmed' | 'cancelled';
  }): Promise<OrderRecord> {
    const order =
      args.status === 'confirmed'
        ? await this.cart.confirmOrder(args.order_id)
        : await this.cart.cancelOrder(args.order_id);
    return toOrder(order);
  }

  async getCustomerInformation(args: { customer_id: string }): Promise<CustomerRecord> {
    return toCustomer(await this.cart.getCustomer(args.customer_id));
  }

  async getProductRecommendations(args: {
    sport_or_activity: string;
    customer_id: string;
  }): Promise<{ products: ProductRecord[] }> {
    const products = await this.catalog.recommend(args.sport_or_activity, args.customer_id);
    return { products: products.map(toProduct) };
  }

  async checkProductAvailability(args: {
    product_id: string;
    store_id: string;
  }): Promise<Availability> {
    return this.catalog.checkAvailability(args.product_id, args.store_id);
  }

  async scheduleService(args: {
    customer_id: string;
    service_type: string;
    date: string;
    time_range: string;
    details?: string;
  }): Promise<AppointmentRecord> {
    const appointment = await this.appointments.scheduleService(
      args.customer_id,
      args.service_type,
      args.date,
      args.time_range,
      args.details ?? ''
    );
    return toAppointment(appointment);
  }

  async getAvailableServiceTimes(args: { service_type: string; date: string }): Promise<string[]> {
    const slots = await this.appointments.getAvailableTimes(args.service_type, args.date);
    return slots.map(formatTimeRange);
  }

  async cancelServiceAppointment(args: { appointment_id: string }): Promise<AppointmentRecord> {
    return toAppointment(await this.appointments.cancelAppointment(args.appointment_id));
  }

  async listServiceAppointments(args: {
    customer_id: string;
  }): Promise<{ appointments: AppointmentRecord[] }> {
    const appointments = await this.appointments.listAppointments(args.customer_id);
    return { appointments: appointments.map(toAppointment) };
  }
}
