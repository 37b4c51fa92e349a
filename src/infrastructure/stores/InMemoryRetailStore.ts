import {
  Appointment,
  CartItem,
  Customer,
  Order,
  OrderStatus,
  Product,
} from '../../domain/models.js';
import { IRetailStore } from './IRetailStore.js';
import { SampleData, loadSampleData } from './sampleData.js';
import { UnknownEntityError } from '../../domain/errors/index.js';
import { assertTransition } from '../../domain/orderLifecycle.js';

const copyItem = (item: CartItem): CartItem => ({ ...item, addedAt: new Date(item.addedAt) });

const copyOrder = (order: Order): Order => ({
  ...order,
  createdAt: new Date(order.createdAt),
  items: order.items.map(item => ({ ...item })),
});

const copyAppointment = (appointment: Appointment): Appointment => ({
  ...appointment,
  timeRange: { ...appointment.timeRange },
  createdAt: new Date(appointment.createdAt),
});

// fallback store: process memory only, seeded from sample data, gone on restart
export class InMemoryRetailStore implements IRetailStore {
  readonly kind = 'fallback' as const;

  private products: Map<string, Product> = new Map();
  private customers: Map<string, Customer> = new Map();
  private carts: Map<string, CartItem[]> = new Map();
  private orders: Map<string, Order> = new Map();
  private appointments: Map<string, Appointment> = new Map();

  constructor(private readonly seed: SampleData = loadSampleData()) {
    this.reset();
  }

  // back to the seeded state
  reset(): void {
    this.products = new Map(this.seed.products.map(p => [p.productId, { ...p }]));
    this.customers = new Map(
      this.seed.customers.map(c => [
        c.customerId,
        { ...c, contactPreferences: { ...c.contactPreferences } },
      ])
    );

    this.carts = new Map();
    for (const item of this.seed.cartItems) {
      const lines = this.carts.get(item.customerId) ?? [];
      lines.push(copyItem(item));
      this.carts.set(item.customerId, lines);
    }

    this.orders = new Map(this.seed.orders.map(o => [o.orderId, copyOrder(o)]));
    this.appointments = new Map(
      this.seed.appointments.map(a => [a.appointmentId, copyAppointment(a)])
    );
  }

  async getProduct(productId: string): Promise<Product | null> {
    const product = this.products.get(productId);
    return product ? { ...product } : null;
  }

  async findProductsBySport(sport: string): Promise<Product[]> {
    const needle = sport.trim().toLowerCase();
    return [...this.products.values()]
      .filter(p => p.sport.toLowerCase().includes(needle))
      .sort((a, b) => a.productId.localeCompare(b.productId))
      .map(p => ({ ...p }));
  }

  async getCustomer(customerId: string): Promise<Customer | null> {
    const customer = this.customers.get(customerId);
    if (!customer) return null;
    return { ...customer, contactPreferences: { ...customer.contactPreferences } };
  }

  async getCartItems(customerId: string): Promise<CartItem[]> {
    this.requireCustomer(customerId);
    return this.cartOf(customerId);
  }

  async updateCart(
    customerId: string,
    mutate: (current: CartItem[]) => CartItem[]
  ): Promise<CartItem[]> {
    this.requireCustomer(customerId);
    // mutate works on a copy; nothing is written until it returns
    const next = mutate(this.cartOf(customerId)).map(copyItem);
    this.carts.set(customerId, next);
    return next.map(copyItem);
  }

  /**
   * No transactions here, so placement is an ordered sequence:
   * insert the order, then clear the cart. If clearing fails the order is
   * removed again and the cart restored to its pre-call contents.
   */
  async placeOrder(customerId: string, build: (cart: CartItem[]) => Order): Promise<Order> {
    this.requireCustomer(customerId);
    const before = this.cartOf(customerId);
    const order = copyOrder(build(this.cartOf(customerId)));

    this.insertOrder(order);
    try {
      this.clearCart(customerId);
    } catch (error) {
      this.orders.delete(order.orderId);
      this.carts.set(customerId, before);
      throw error;
    }

    return copyOrder(order);
  }

  async getOrder(orderId: string): Promise<Order | null> {
    const order = this.orders.get(orderId);
    return order ? copyOrder(order) : null;
  }

  async listOrders(customerId: string): Promise<Order[]> {
    this.requireCustomer(customerId);
    return [...this.orders.values()]
      .filter(o => o.customerId === customerId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(copyOrder);
  }

  async transitionOrder(orderId: string, next: OrderStatus): Promise<Order> {
    const order = this.orders.get(orderId);
    if (!order) throw new UnknownEntityError('Order', orderId);

    assertTransition(order, next);
    order.status = next;
    return copyOrder(order);
  }

  async listAppointments(serviceType: string, date: string): Promise<Appointment[]> {
    return [...this.appointments.values()]
      .filter(a => a.serviceType === serviceType && a.date === date)
      .sort((a, b) => a.timeRange.start - b.timeRange.start)
      .map(copyAppointment);
  }

  async listCustomerAppointments(customerId: string): Promise<Appointment[]> {
    this.requireCustomer(customerId);
    return [...this.appointments.values()]
      .filter(a => a.customerId === customerId)
      .sort(
        (a, b) => a.date.localeCompare(b.date) || a.timeRange.start - b.timeRange.start
      )
      .map(copyAppointment);
  }

  async bookAppointment(
    appointment: Appointment,
    check: (existing: Appointment[]) => void
  ): Promise<Appointment> {
    this.requireCustomer(appointment.customerId);

    const active = [...this.appointments.values()]
      .filter(
        a =>
          a.serviceType === appointment.serviceType &&
          a.date === appointment.date &&
          a.status !== 'cancelled'
      )
      .map(copyAppointment);
    check(active);

    this.appointments.set(appointment.appointmentId, copyAppointment(appointment));
    return copyAppointment(appointment);
  }

  async cancelAppointment(appointmentId: string): Promise<Appointment> {
    const appointment = this.appointments.get(appointmentId);
    if (!appointment) throw new UnknownEntityError('Appointment', appointmentId);

    appointment.status = 'cancelled';
    return copyAppointment(appointment);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  protected insertOrder(order: Order): void {
    this.orders.set(order.orderId, copyOrder(order));
  }

  protected clearCart(customerId: string): void {
    this.carts.delete(customerId);
  }

  private requireCustomer(customerId: string): void {
    if (!this.customers.has(customerId)) {
      throw new UnknownEntityError('Customer', customerId);
    }
  }

  private cartOf(customerId: string): CartItem[] {
    return (this.carts.get(customerId) ?? []).map(copyItem);
  }

  // Utility methods for testing
  getOrderCount(): number {
    return this.orders.size;
  }

  getAppointmentCount(): number {
    return this.appointments.size;
  }
}
