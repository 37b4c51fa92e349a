export interface Product {
  productId: string;
  name: string;
  description?: string;
  price: number;
  category: string;
  sport: string;
  stock: number;
}

export type LoyaltyTier = 'Standard' | 'Silver' | 'Gold' | 'Platinum';

export interface ContactPreferences {
  email: boolean;
  sms: boolean;
  pushNotifications: boolean;
}

export interface Customer {
  customerId: string;
  firstName: string;
  lastName: string;
  email: string;
  phoneNumber?: string;
  contactPreferences: ContactPreferences;
  loyaltyPoints: number;
  loyaltyTier: LoyaltyTier;
  preferredStore?: string;
  customerSince?: string;
}

export interface CartItem {
  customerId: string;
  productId: string;
  name: string;
  quantity: number;
  unitPrice: number; // price snapshot when added
  addedAt: Date;
}

export interface CartLine extends Omit<CartItem, 'customerId'> {
  totalPrice: number;
}

export interface CartSnapshot {
  customerId: string;
  items: CartLine[];
  subtotal: number;
  currency: string;
}

export interface LineRequest {
  productId: string;
  quantity?: number;
}

export interface ClampedRemoval {
  productId: string;
  requested: number | null; // null = "remove all"
  removed: number;
}

export interface CartModification extends CartSnapshot {
  clampedRemovals: ClampedRemoval[];
}

export type OrderStatus = 'pending' | 'confirmed' | 'cancelled';

export interface OrderItem {
  orderId: string;
  productId: string;
  name: string;
  quantity: number;
  unitPrice: number;
}

export interface Order {
  orderId: string;
  customerId: string;
  createdAt: Date;
  status: OrderStatus;
  items: OrderItem[];
}

// order plus its derived total; what callers get back
export interface PricedOrder extends Order {
  total: number;
  currency: string;
}

export type AppointmentStatus = 'scheduled' | 'cancelled';

// half-open [start, end), minutes since midnight
export interface TimeRange {
  start: number;
  end: number;
}

export interface Appointment {
  appointmentId: string;
  customerId: string;
  serviceType: string;
  date: string; // YYYY-MM-DD
  timeRange: TimeRange;
  details: string;
  status: AppointmentStatus;
  createdAt: Date;
}

export type BackendKind = 'persistent' | 'fallback';
