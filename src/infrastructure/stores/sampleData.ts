import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { Appointment, CartItem, Customer, Order, Product } from '../../domain/models.js';
import { loyaltyTierFor } from '../../domain/loyalty.js';
import { parseTimeRange } from '../../domain/timeRange.js';

const DEFAULT_SAMPLE_DATA = new URL('../../../data/sample-data.json', import.meta.url);

const productSchema = z.object({
  productId: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  price: z.number().nonnegative(),
  category: z.string(),
  sport: z.string(),
  stock: z.number().int().nonnegative(),
});

const customerSchema = z.object({
  customerId: z.string().min(1),
  firstName: z.string(),
  lastName: z.string(),
  email: z.string(),
  phoneNumber: z.string().optional(),
  contactPreferences: z.object({
    email: z.boolean(),
    sms: z.boolean(),
    pushNotifications: z.boolean(),
  }),
  loyaltyPoints: z.number().int().nonnegative(),
  preferredStore: z.string().optional(),
  customerSince: z.string().optional(),
});

const cartItemSchema = z.object({
  customerId: z.string().min(1),
  productId: z.string().min(1),
  name: z.string(),
  quantity: z.number().int().positive(),
  unitPrice: z.number().nonnegative(),
  addedAt: z.coerce.date(),
});

const orderSchema = z.object({
  orderId: z.string().min(1),
  customerId: z.string().min(1),
  createdAt: z.coerce.date(),
  status: z.enum(['pending', 'confirmed', 'cancelled']),
  items: z.array(
    z.object({
      productId: z.string().min(1),
      name: z.string(),
      quantity: z.number().int().positive(),
      unitPrice: z.number().nonnegative(),
    })
  ),
});

const appointmentSchema = z.object({
  appointmentId: z.string().min(1),
  customerId: z.string().min(1),
  serviceType: z.string().min(1),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  timeRange: z.string(),
  details: z.string().default(''),
  status: z.enum(['scheduled', 'cancelled']),
  createdAt: z.coerce.date(),
});

const sampleDataSchema = z.object({
  products: z.array(productSchema),
  customers: z.array(customerSchema),
  cartItems: z.array(cartItemSchema).default([]),
  orders: z.array(orderSchema).default([]),
  appointments: z.array(appointmentSchema).default([]),
});

export interface SampleData {
  products: Product[];
  customers: Customer[];
  cartItems: CartItem[];
  orders: Order[];
  appointments: Appointment[];
}

export function parseSampleData(raw: unknown): SampleData {
  const data = sampleDataSchema.parse(raw);

  return {
    products: data.products,
    customers: data.customers.map(customer => ({
      ...customer,
      loyaltyTier: loyaltyTierFor(customer.loyaltyPoints),
    })),
    cartItems: data.cartItems,
    orders: data.orders.map(order => ({
      ...order,
      items: order.items.map(item => ({ ...item, orderId: order.orderId })),
    })),
    appointments: data.appointments.map(appointment => ({
      ...appointment,
      timeRange: parseTimeRange(appointment.timeRange),
    })),
  };
}

// deterministic demo/test state; read fresh on every call so callers can mutate the result
export function loadSampleData(path: URL | string = DEFAULT_SAMPLE_DATA): SampleData {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parseSampleData(raw);
}
