import { FastifyPluginAsync, FastifySchema } from 'fastify';
import { RetailTools, LineArg } from '../tools/RetailTools.js';

const customerId = { type: 'string', minLength: 1 };

const lineItems = {
  type: 'array',
  items: {
    type: 'object',
    required: ['product_id'],
    properties: {
      product_id: { type: 'string', minLength: 1 },
      quantity: { type: 'integer', minimum: 1 },
    },
  },
};

function toolSchema(
  description: string,
  required: string[],
  properties: Record<string, unknown>
): FastifySchema {
  return {
    tags: ['tools'],
    description,
    body: {
      type: 'object',
      required,
      properties,
    },
  };
}

export const toolRoutes: FastifyPluginAsync<{ tools: RetailTools }> = async (app, opts) => {
  const { tools } = opts;

  // wraps every tool result the same way the rest of the API does
  const send = <T>(data: T) => ({ data, timestamp: new Date().toISOString() });

  app.post<{ Body: { customer_id: string } }>(
    '/access_cart_information',
    {
      schema: toolSchema('Current cart contents with snapshotted prices', ['customer_id'], {
        customer_id: customerId,
      }),
    },
    async request => send(await tools.accessCartInformation(request.body))
  );

  app.post<{
    Body: { customer_id: string; items_to_add?: LineArg[]; items_to_remove?: LineArg[] };
  }>(
    '/modify_cart',
    {
      schema: toolSchema(
        'Remove then add cart lines atomically; oversized removals are clamped and reported',
        ['customer_id'],
        { customer_id: customerId, items_to_add: lineItems, items_to_remove: lineItems }
      ),
    },
    async request => send(await tools.modifyCart(request.body))
  );

  app.post<{ Body: { customer_id: string } }>(
    '/resync_cart_prices',
    {
      schema: toolSchema('Re-snapshot every cart line at the live catalog price', ['customer_id'], {
        customer_id: customerId,
      }),
    },
    async request => send(await tools.resyncCartPrices(request.body))
  );

  app.post<{ Body: { customer_id: string } }>(
    '/place_order',
    {
      schema: toolSchema('Turn the cart into a pending order and empty the cart', ['customer_id'], {
        customer_id: customerId,
      }),
    },
    async (request, reply) => reply.code(201).send(send(await tools.placeOrder(request.body)))
  );

  app.post<{ Body: { customer_id: string; order_id?: string } }>(
    '/get_order_history',
    {
      schema: toolSchema(
        "Orders for a customer, newest first; or one of the customer's orders by ID",
        ['customer_id'],
        {
          customer_id: customerId,
          order_id: { type: 'string', minLength: 1 },
        }
      ),
    },
    async request => send(await tools.getOrderHistory(request.body))
  );

  app.post<{ Body: { order_id: string; status: 'confirmed' | 'cancelled' } }>(
    '/update_order_status',
    {
      schema: toolSchema('Confirm or cancel a pending order', ['order_id', 'status'], {
        order_id: { type: 'string', minLength: 1 },
        status: { type: 'string', enum: ['confirmed', 'cancelled'] },
      }),
    },
    async request => send(await tools.updateOrderStatus(request.body))
  );

  app.post<{ Body: { customer_id: string } }>(
    '/get_customer_information',
    {
      schema: toolSchema('Customer profile and loyalty tier', ['customer_id'], {
        customer_id: customerId,
      }),
    },
    async request => send(await tools.getCustomerInformation(request.body))
  );

  app.post<{ Body: { sport_or_activity: string; customer_id: string } }>(
    '/get_product_recommendations',
    {
      schema: toolSchema(
        'Products for a sport or activity, excluding what is already in the cart',
        ['sport_or_activity', 'customer_id'],
        { sport_or_activity: { type: 'string', minLength: 1 }, customer_id: customerId }
      ),
    },
    async request => send(await tools.getProductRecommendations(request.body))
  );

  app.post<{ Body: { product_id: string; store_id: string } }>(
    '/check_product_availability',
    {
      schema: toolSchema('Stock level for a product', ['product_id', 'store_id'], {
        product_id: { type: 'string', minLength: 1 },
        store_id: { type: 'string' },
      }),
    },
    async request => send(await tools.checkProductAvailability(request.body))
  );

  app.post<{
    Body: {
      customer_id: string;
      service_type: string;
      date: string;
      time_range: string;
      details?: string;
    };
  }>(
    '/schedule_service',
    {
      schema: toolSchema(
        'Book a service appointment; overlapping bookings are refused',
        ['customer_id', 'service_type', 'date', 'time_range'],
        {
          customer_id: customerId,
          service_type: { type: 'string', minLength: 1 },
          date: { type: 'string' },
          time_range: { type: 'string' },
          details: { type: 'string' },
        }
      ),
    },
    async (request, reply) =>
      reply.code(201).send(send(await tools.scheduleService(request.body)))
  );

  app.post<{ Body: { service_type: string; date: string } }>(
    '/get_available_service_times',
    {
      schema: toolSchema('Free slots for a service on a date', ['service_type', 'date'], {
        service_type: { type: 'string', minLength: 1 },
        date: { type: 'string' },
      }),
    },
    async request => send(await tools.getAvailableServiceTimes(request.body))
  );

  app.post<{ Body: { appointment_id: string } }>(
    '/cancel_service_appointment',
    {
      schema: toolSchema('Cancel an appointment (kept in history)', ['appointment_id'], {
        appointment_id: { type: 'string', minLength: 1 },
      }),
    },
    async request => send(await tools.cancelServiceAppointment(request.body))
  );

  app.post<{ Body: { customer_id: string } }>(
    '/list_service_appointments',
    {
      schema: toolSchema('Appointments booked by a customer', ['customer_id'], {
        customer_id: customerId,
      }),
    },
    async request => send(await tools.listServiceAppointments(request.body))
  );
};
