import {
  Appointment,
  BackendKind,
  CartItem,
  Customer,
  Order,
  OrderStatus,
  Product,
} from '../../domain/models.js';

/**
 * Contract shared by the persistent store and the in-memory fallback.
 *
 * Failures of the backend itself surface as `BackendUnavailableError`.
 * A missing customer, order or appointment surfaces as `UnknownEntityError`,
 * so the caller can ask the other backend before reporting NotFound.
 */
export interface IRetailStore {
  readonly kind: BackendKind;

  getProduct(productId: string): Promise<Product | null>;
  findProductsBySport(sport: string): Promise<Product[]>;

  getCustomer(customerId: string): Promise<Customer | null>;

  getCartItems(customerId: string): Promise<CartItem[]>;

  /**
   * Replaces the customer's cart with whatever `mutate` returns, atomically.
   * If `mutate` throws, the cart is left untouched and the error propagates.
   */
  updateCart(
    customerId: string,
    mutate: (current: CartItem[]) => CartItem[]
  ): Promise<CartItem[]>;

  /**
   * Builds an order from the current cart, stores it and empties the cart as
   * one unit. `build` may throw (e.g. empty cart) to abort without changes.
   */
  placeOrder(customerId: string, build: (cart: CartItem[]) => Order): Promise<Order>;

  getOrder(orderId: string): Promise<Order | null>;
  listOrders(customerId: string): Promise<Order[]>;
  transitionOrder(orderId: string, next: OrderStatus): Promise<Order>;

  listAppointments(serviceType: string, date: string): Promise<Appointment[]>;
  listCustomerAppointments(customerId: string): Promise<Appointment[]>;

  /**
   * Inserts the appointment while bookings for the same service type and date
   * are held off. `check` sees the current non-cancelled bookings and throws to
   * refuse the slot.
   */
  bookAppointment(
    appointment: Appointment,
    check: (existing: Appointment[]) => void
  ): Promise<Appointment>;
  cancelAppointment(appointmentId: string): Promise<Appointment>;

  ping(): Promise<boolean>;
}
