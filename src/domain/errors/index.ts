// Base class for domain errors - includes HTTP status for easy mapping
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ResourceNotFoundError extends DomainError {
  constructor(
    public readonly resource: string,
    public readonly identifier: string
  ) {
    super(
      `${resource} with identifier '${identifier}' not found.`,
      'RESOURCE_NOT_FOUND',
      404
    );
  }
}

// the addressed customer/order/appointment is missing from one store; the other backend may have it
export class UnknownEntityError extends ResourceNotFoundError {
  constructor(resource: 'Customer' | 'Order' | 'Appointment', identifier: string) {
    super(resource, identifier);
  }
}

export class ValidationError extends DomainError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

export class EmptyCartError extends DomainError {
  constructor(customerId: string) {
    super(
      `Cart for customer '${customerId}' is empty. Add items before placing an order.`,
      'EMPTY_CART',
      409
    );
  }
}

export class SlotConflictError extends DomainError {
  constructor(serviceType: string, date: string, timeRange: string) {
    super(
      `${serviceType} on ${date} at ${timeRange} overlaps an existing appointment.`,
      'SLOT_CONFLICT',
      409
    );
  }
}

export class InvalidStateTransitionError extends DomainError {
  constructor(resource: string, identifier: string, from: string, to: string) {
    super(
      `${resource} '${identifier}' cannot move from '${from}' to '${to}'.`,
      'INVALID_STATE_TRANSITION',
      409
    );
  }
}

// 503 - store unreachable, timed out or refused the write
export class BackendUnavailableError extends DomainError {
  constructor(
    public readonly backend: string,
    cause?: unknown
  ) {
    super(
      `The ${backend} backend is unavailable. Please try again later.`,
      'BACKEND_UNAVAILABLE',
      503
    );
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}
