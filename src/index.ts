import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { AppConfig, loadConfig } from './config/index.js';
import { CartService } from './domain/services/CartService.js';
import { CatalogService } from './domain/services/CatalogService.js';
import { OrderService } from './domain/services/OrderService.js';
import { RecommendationService } from './domain/services/RecommendationService.js';
import { CatalogPricingStrategy } from './domain/strategies/IPricingStrategy.js';
import { defaultRecommendationTiers } from './domain/strategies/IRecommendationStrategy.js';
import { InMemoryCatalogStore } from './infrastructure/stores/InMemoryCatalogStore.js';
import { InMemoryCartStore } from './infrastructure/stores/InMemoryCartStore.js';
import { InMemoryOrderStore } from './infrastructure/stores/InMemoryOrderStore.js';
import { InMemorySearchLogStore } from './infrastructure/stores/InMemorySearchLogStore.js';
import { sampleProducts } from './infrastructure/seed/sampleProducts.js';
import { DomainError } from './domain/errors/index.js';
import { CartItemRequest, Product } from './domain/models.js';

export interface BuildAppOptions {
  config?: Partial<AppConfig>;
  products?: readonly Product[];
}

const cartItemBody = {
  type: 'object',
  required: ['productId', 'quantity'],
  properties: {
    productId: { type: 'string', minLength: 1 },
    quantity: { type: 'integer', minimum: 1 },
  },
} as const;

const userIdQuery = {
  type: 'object',
  properties: {
    userId: { type: 'string' },
  },
} as const;

const userIdParams = {
  type: 'object',
  required: ['userId'],
  properties: {
    userId: { type: 'string' },
  },
} as const;

// kept as a string so a malformed limit falls back to the default instead of a 400
const limitQuery = {
  type: 'object',
  properties: {
    limit: { type: 'string' },
  },
} as const;

const parseLimitParam = (raw: string | undefined): number | undefined => {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return undefined;
  return parseInt(raw, 10);
};

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config: AppConfig = { ...loadConfig(), ...options.config };

  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  await app.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: config.apiTitle,
        description: config.apiDescription,
        version: config.apiVersion,
      },
      servers: [
        {
          url: config.apiBaseUrl,
          description: config.nodeEnv === 'production' ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'products', description: 'Product catalog and search' },
        { name: 'cart', description: 'Cart management operations' },
        { name: 'orders', description: 'Checkout and order history' },
        { name: 'recommendations', description: 'Personalized product recommendations' },
      ],
      components: {
        schemas: {
          Product: {
            type: 'object',
            required: ['productId', 'name', 'price', 'category', 'stock', 'rating'],
            properties: {
              productId: { type: 'string', example: '1' },
              name: { type: 'string', example: 'Pixel Phone Pro' },
              description: { type: 'string', example: 'Flagship phone with a triple camera array' },
              price: { type: 'number', example: 999.99 },
              category: { type: 'string', example: 'Electronics' },
              stock: { type: 'integer', example: 50 },
              rating: { type: 'number', example: 4.5 },
              imageUrl: { type: 'string', example: 'https://example.com/images/phone.jpg' },
            },
          },
          CartLineItem: {
            type: 'object',
            properties: {
              productId: { type: 'string', example: '1' },
              quantity: { type: 'integer', minimum: 1, example: 2 },
            },
          },
          Cart: {
            type: 'object',
            properties: {
              cartId: { type: 'string', format: 'uuid' },
              userId: { type: 'string', example: 'user123' },
              items: {
                type: 'array',
                items: { $ref: '#/components/schemas/CartLineItem' },
              },
              total: { type: 'number', example: 1999.98 },
              createdAt: { type: 'string', format: 'date-time' },
              updatedAt: { type: 'string', format: 'date-time' },
            },
          },
          Order: {
            type: 'object',
            properties: {
              orderId: { type: 'string', format: 'uuid' },
              userId: { type: 'string', example: 'user123' },
              items: {
                type: 'array',
                items: { $ref: '#/components/schemas/CartLineItem' },
              },
              total: { type: 'number', example: 1999.98 },
              status: { type: 'string', enum: ['completed'] },
              createdAt: { type: 'string', format: 'date-time' },
              completedAt: { type: 'string', format: 'date-time' },
            },
          },
          Error: {
            type: 'object',
            properties: {
              error: {
                type: 'object',
                properties: {
                  code: { type: 'string' },
                  message: { type: 'string' },
                  statusCode: { type: 'integer' },
                },
              },
              timestamp: { type: 'string', format: 'date-time' },
            },
          },
        },
      },
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
  const catalogStore = new InMemoryCatalogStore(options.products ?? sampleProducts);
  const cartStore = new InMemoryCartStore();
  const orderStore = new InMemoryOrderStore();
  const searchLogStore = new InMemorySearchLogStore();

  const catalogService = new CatalogService(catalogStore, searchLogStore, config.defaultResultLimit);
  const cartService = new CartService(cartStore, catalogStore, orderStore, new CatalogPricingStrategy());
  const orderService = new OrderService(orderStore);
  const recommendationService = new RecommendationService(
    catalogStore,
    orderStore,
    searchLogStore,
    defaultRecommendationTiers(),
    config.defaultResultLimit
  );

  app.get('/health', {
    schema: {
      tags: ['health'],
      description: 'Health check endpoint for load balancers and monitoring',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string', example: 'ok' },
            service: { type: 'string' },
            version: { type: 'string' },
            timestamp: { type: 'string', format: 'date-time' },
          },
        },
      },
    },
  }, async () => {
    return {
      status: 'ok',
      service: config.apiTitle,
      version: config.apiVersion,
      timestamp: new Date().toISOString(),
    };
  });

  app.get('/openapi.json', { schema: { hide: true } }, async () => app.swagger());

  // === Product Routes ===

  app.get('/api/v1/products', {
    schema: {
      tags: ['products'],
      description: 'List every product in the catalog',
    },
  }, async (_request, reply) => {
    const products = await catalogService.listProducts();

    return reply.code(200).send({
      data: products,
      timestamp: new Date().toISOString(),
    });
  });

  app.get<{
    Querystring: { limit?: string };
  }>('/api/v1/products/top', {
    schema: {
      tags: ['products'],
      description: 'Top-rated products, highest rating first',
      querystring: limitQuery,
    },
  }, async (request, reply) => {
    const products = await catalogService.getTopProducts(parseLimitParam(request.query.limit));

    return reply.code(200).send({
      data: products,
      timestamp: new Date().toISOString(),
    });
  });

  app.get<{
    Params: { productId: string };
  }>('/api/v1/products/:productId', {
    schema: {
      tags: ['products'],
      description: 'Retrieve a product by ID',
      params: {
        type: 'object',
        required: ['productId'],
        properties: {
          productId: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const product = await catalogService.getProduct(request.params.productId);

    return reply.code(200).send({
      data: product,
      timestamp: new Date().toISOString(),
    });
  });

  app.get<{
    Querystring: { q?: string; userId?: string };
  }>('/api/v1/search', {
    schema: {
      tags: ['products'],
      description: 'Search products by name, description or category; records the query when a user ID is given',
      querystring: {
        type: 'object',
        properties: {
          q: { type: 'string' },
          userId: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const { q, userId } = request.query;
    const products = await catalogService.searchProducts(q ?? '', userId);

    return reply.code(200).send({
      data: products,
      timestamp: new Date().toISOString(),
    });
  });

  // === Cart Routes ===

  // Add item
  app.post<{
    Querystring: { userId?: string };
    Body: CartItemRequest;
  }>('/api/v1/cart/add', {
    schema: {
      tags: ['cart'],
      description: "Add a product to the user's cart (or merge quantity if already present)",
      querystring: userIdQuery,
      body: cartItemBody,
    },
  }, async (request, reply) => {
    const cart = await cartService.addItem(request.query.userId ?? '', request.body);

    return reply.code(200).send({
      data: cart,
      timestamp: new Date().toISOString(),
    });
  });

  // Remove item
  app.delete<{
    Querystring: { userId?: string };
    Body: CartItemRequest;
  }>('/api/v1/cart/remove', {
    schema: {
      tags: ['cart'],
      description: "Remove a quantity of a product from the user's cart",
      querystring: userIdQuery,
      body: cartItemBody,
    },
  }, async (request, reply) => {
    const cart = await cartService.removeItem(request.query.userId ?? '', request.body);

    return reply.code(200).send({
      data: cart,
      timestamp: new Date().toISOString(),
    });
  });

  // Get cart
  app.get<{
    Params: { userId: string };
  }>('/api/v1/cart/:userId', {
    schema: {
      tags: ['cart'],
      description: "Retrieve the user's cart",
      params: userIdParams,
    },
  }, async (request, reply) => {
    const cart = await cartService.getCart(request.params.userId);

    return reply.code(200).send({
      data: cart,
      timestamp: new Date().toISOString(),
    });
  });

  // === Order Routes ===

  app.post<{
    Querystring: { userId?: string };
  }>('/api/v1/checkout', {
    schema: {
      tags: ['orders'],
      description: "Turn the user's cart into a completed order and empty the cart",
      querystring: userIdQuery,
    },
  }, async (request, reply) => {
    const order = await cartService.checkout(request.query.userId ?? '');

    return reply.code(201).send({
      data: order,
      timestamp: new Date().toISOString(),
    });
  });

  app.get<{
    Params: { userId: string };
  }>('/api/v1/orders/:userId', {
    schema: {
      tags: ['orders'],
      description: "Retrieve the user's order history, oldest first",
      params: userIdParams,
    },
  }, async (request, reply) => {
    const orders = await orderService.getOrderHistory(request.params.userId);

    return reply.code(200).send({
      data: orders,
      timestamp: new Date().toISOString(),
    });
  });

  app.get<{
    Params: { userId: string; orderId: string };
  }>('/api/v1/orders/:userId/:orderId', {
    schema: {
      tags: ['orders'],
      description: 'Retrieve a single order belonging to the user',
      params: {
        type: 'object',
        required: ['userId', 'orderId'],
        properties: {
          userId: { type: 'string' },
          orderId: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const { userId, orderId } = request.params;
    const order = await orderService.getOrder(userId, orderId);

    return reply.code(200).send({
      data: order,
      timestamp: new Date().toISOString(),
    });
  });

  // === Recommendation Routes ===

  app.get<{
    Params: { userId: string };
    Querystring: { limit?: string };
  }>('/api/v1/recommendations/:userId', {
    schema: {
      tags: ['recommendations'],
      description: 'Recommendations from order history, then search history, then popularity',
      params: userIdParams,
      querystring: limitQuery,
    },
  }, async (request, reply) => {
    const result = await recommendationService.getRecommendations(
      request.params.userId,
      parseLimitParam(request.query.limit)
    );

    return reply.code(200).send({
      data: result.products,
      tier: result.tier,
      timestamp: new Date().toISOString(),
    });
  });

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
          message: 'Request validation failed',
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

  return app;
}

async function start(): Promise<void> {
  const config = loadConfig();
  const app = await buildApp({ config });

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Health check: http://${config.host}:${config.port}/health`);
    app.log.info(`API docs: http://${config.host}:${config.port}/docs`);

    // Handle shutdown gracefully
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
    signals.forEach((signal) => {
      process.once(signal, () => {
        app.log.info(`${signal} received, shutting down...`);
        app.close().then(
          () => {
            app.log.info('Server closed successfully');
            process.exit(0);
          },
          (err: unknown) => {
            app.log.error(err, 'Error during shutdown');
            process.exit(1);
          }
        );
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
