import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { AppConfig, loadConfig } from './config.js';
import { loggerOptions } from './infrastructure/logger.js';
import { CartService } from './domain/services/CartService.js';
import {
  AppointmentService,
  DEFAULT_SCHEDULER_CONFIG,
} from './domain/services/AppointmentService.js';
import { CatalogService } from './domain/services/CatalogService.js';
import { SnapshotPricingStrategy } from './domain/strategies/IPricingStrategy.js';
import { FailoverStrategy } from './domain/strategies/FailoverStrategy.js';
import { IRetailStore } from './infrastructure/stores/IRetailStore.js';
import { InMemoryRetailStore } from './infrastructure/stores/InMemoryRetailStore.js';
import { PostgresRetailStore } from './infrastructure/stores/PostgresRetailStore.js';
import { createPgPool } from './infrastructure/stores/SqlPool.js';
import { loadSampleData } from './infrastructure/stores/sampleData.js';
import { RetailTools } from './tools/RetailTools.js';
import { toolRoutes } from './api/toolRoutes.js';
import { DomainError } from './domain/errors/index.js';

export interface AppDependencies {
  // null: run without a persistent store
  primary?: IRetailStore | null;
  fallback?: IRetailStore;
}

export async function buildApp(
  config: AppConfig = loadConfig(),
  deps: AppDependencies = {}
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: loggerOptions(config.logLevel),
  });

  await app.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: config.apiTitle,
        description: 'Cart, order and appointment tools for the retail assistant',
        version: config.apiVersion,
      },
      servers: [
        {
          url: config.apiBaseUrl ?? `http://${config.host}:${config.port}`,
          description: config.nodeEnv === 'production' ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'tools', description: 'Operations the assistant can invoke' },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
  });

  await app.register(cors, {
    origin: config.corsOrigin,
  });

  // dependency injection
  let primary: IRetailStore | null = null;
  if (deps.primary !== undefined) {
    primary = deps.primary;
  } else if (config.databaseUrl) {
    const pool = createPgPool({
      connectionString: config.databaseUrl,
      maxConnections: config.dbPoolSize,
      timeoutMs: config.storeTimeoutMs,
    });
    const store = new PostgresRetailStore(pool, { timeoutMs: config.storeTimeoutMs }, app.log);
    app.addHook('onClose', async () => {
      await pool.end();
    });

    if (config.runMigrations) {
      try {
        await store.migrate();
        app.log.info('Database schema is up to date');
      } catch (err) {
        // the fallback still serves; the store is retried on every call
        app.log.warn({ err }, 'Schema migration failed; continuing in degraded mode');
      }
    }
    if (config.seedDatabase) {
      try {
        await store.seed(loadSampleData());
        app.log.info('Sample data loaded into the database');
      } catch (err) {
        app.log.warn({ err }, 'Seeding failed; unknown customers will be served by the fallback');
      }
    }
    primary = store;
  } else {
    app.log.warn('DATABASE_URL not set; all calls will be served by the in-memory fallback');
  }

  const backends = new FailoverStrategy(primary, deps.fallback ?? new InMemoryRetailStore(), app.log);
  const pricing = new SnapshotPricingStrategy(config.currency);
  const tools = new RetailTools(
    new CartService(backends, pricing, app.log, { maxQuantity: config.maxLineQuantity }),
    new AppointmentService(backends, app.log, {
      ...DEFAULT_SCHEDULER_CONFIG,
      openingHours: config.openingHours,
    }),
    new CatalogService(backends)
  );

  // ============================================================================
  // Error Handler
  // ============================================================================

  app.setErrorHandler((error, _request, reply) => {
    // Domain errors already have status codes
    if (error instanceof DomainError) {
      return reply.code(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          statusCode: error.statusCode,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Fastify validation errors
    if (error.validation) {
      return reply.code(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: error.message,
          details: error.validation,
          statusCode: 400,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Log unexpected stuff
    app.log.error(error);

    // Catch-all for other errors
    return reply.code(500).send({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred',
        statusCode: 500,
      },
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/health', {
    schema: {
      tags: ['health'],
      description: 'Health check endpoint for load balancers and monitoring',
    },
  }, async () => {
    const persistentReachable = primary ? await primary.ping() : false;
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      backends: { ...backends.stats(), persistentReachable },
    };
  });

  await app.register(toolRoutes, { prefix: '/v1/tools', tools });

  return app;
}

async function start() {
  const config = loadConfig();
  const app = await buildApp(config);

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`API docs: http://${config.host}:${config.port}/docs`);

    // Handle shutdown gracefully
    const signals = ['SIGINT', 'SIGTERM'];
    signals.forEach((signal) => {
      process.on(signal, async () => {
        app.log.info(`${signal} received, shutting down...`);
        try {
          await app.close();
          process.exit(0);
        } catch (err) {
          app.log.error({ err }, 'Error during shutdown');
          process.exit(1);
        }
      });
    });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

// Start if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  start().catch((err: unknown) => {
    console.error('Failed to start server:', err);
    process.exit(1);
  });
}
