import { Order, OrderStatus } from './models.js';
import { InvalidStateTransitionError } from './errors/index.js';

// pending is the only non-terminal state
const TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  pending: ['confirmed', 'cancelled'],
  confirmed: [],
  cancelled: [],
};

export function assertTransition(order: Order, next: OrderStatus): void {
  if (!TRANSITIONS[order.status].includes(next)) {
    throw new InvalidStateTransitionError('Order', order.orderId, order.status, next);
  }
}
