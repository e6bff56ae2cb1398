import express from 'express';
import compression from 'compression';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { pinoHttp } from 'pino-http';
import { ZodError } from 'zod';
import type { AppConfig } from './lib/config.js';
import { AppError, ValidationError } from './lib/errors.js';
import { logger } from './lib/logger.js';
import { requireActor, type ActorMiddleware } from './middleware/actor.js';
import { createBookingsRouter } from './routes/bookings.js';
import { createPaymentsRouter } from './routes/payments.js';
import { createSpacesRouter } from './routes/spaces.js';
import { createWebhooksRouter } from './routes/webhooks.js';
import type { Services } from './services/index.js';

export interface AppOptions {
  config: Pick<AppConfig, 'corsOrigins' | 'API_SERVICE_TOKEN'>;
  /** Resolves when the database answers; used by /api/health. */
  healthCheck?: () => Promise<void>;
  /** Requests per minute per IP for booking and payment routes. */
  bookingRateLimit?: number;
}

export function createApp(services: Services, options: AppOptions): ReturnType<typeof express> {
  const { config, healthCheck = async () => {}, bookingRateLimit = 10 } = options;
  const app: ReturnType<typeof express> = express();

  // 1. Security headers (CSP allows Stripe.js for card entry)
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          scriptSrc: ["'self'", 'https://js.stripe.com'],
          frameSrc: ["'self'", 'https://js.stripe.com', 'https://hooks.stripe.com'],
          connectSrc: ["'self'", 'https://api.stripe.com', ...config.corsOrigins],
          imgSrc: ["'self'", 'data:', 'blob:'],
          styleSrc: ["'self'", "'unsafe-inline'"],
        },
      },
      crossOriginEmbedderPolicy: false,
    }),
  );

  // 2. Compress responses (gzip/deflate)
  app.use(compression({ threshold: 1024 }));

  // 3. CORS - only allow our frontend origins
  app.use(
    cors({
      origin: config.corsOrigins,
      methods: ['GET', 'POST', 'PATCH', 'DELETE'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-User-Id', 'X-User-Role'],
      maxAge: 86400,
    }),
  );

  // 4. Structured request logging
  app.use(
    pinoHttp({
      logger,
      autoLogging: {
        ignore: (req) => req.url === '/api/health' || req.url === '/api/v1/health',
      },
    }),
  );

  // 5. Disable X-Powered-By to reduce fingerprinting
  app.disable('x-powered-by');

  // 6. Global rate limiter: 100 requests per minute per IP
  const globalLimiter = rateLimit({
    windowMs: 60_000,
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later' },
  });
  app.use(globalLimiter);

  // 7. Provider webhooks need the raw body, so they mount before JSON parsing
  const webhooks = createWebhooksRouter(services);
  const rawBody = express.raw({ type: 'application/json', limit: '1mb' });
  app.use('/api/v1/webhooks', rawBody, webhooks);
  app.use('/api/webhooks', rawBody, webhooks);

  // 8. Body parsing with strict limits
  app.use(express.json({ limit: '1mb' }));

  // Stricter rate limit for booking/payment endpoints
  const bookingLimiter = rateLimit({
    windowMs: 60_000,
    max: bookingRateLimit,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many booking attempts, please try again later' },
  });

  const auth: ActorMiddleware = {
    required: requireActor(config.API_SERVICE_TOKEN),
    optional: requireActor(config.API_SERVICE_TOKEN, { optional: true }),
  };

  // Health check (outside versioned routes)
  app.get('/api/health', async (_req, res) => {
    try {
      await healthCheck();
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    } catch {
      res.status(503).json({ status: 'error', message: 'Database connection failed' });
    }
  });

  // --- Versioned API routes (v1) ---
  const v1 = express.Router();
  v1.use('/spaces', createSpacesRouter(services, auth));
  v1.use('/bookings', bookingLimiter, auth.required, createBookingsRouter(services));
  v1.use('/payments', bookingLimiter, auth.required, createPaymentsRouter(services));

  app.use('/api/v1', v1);
  app.use('/api', v1); // unversioned alias

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
  });

  // Global error handler — distinguishes operational vs unexpected errors
  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // Zod validation errors
    if (err instanceof ZodError) {
      res.status(400).json({
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        details: err.errors,
      });
      return;
    }

    // Known operational errors (AppError, NotFoundError, ConflictError, etc.)
    if (err instanceof AppError) {
      const body: Record<string, unknown> = { error: err.message, code: err.code };
      if (err instanceof ValidationError && err.details) {
        body.details = err.details;
      }
      res.status(err.statusCode).json(body);
      return;
    }

    // Malformed JSON bodies from the body parser
    if ('type' in err && err.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'Malformed JSON body', code: 'VALIDATION_ERROR' });
      return;
    }

    // Unexpected errors — log full details, return generic message
    req.log.error({ err }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
  });

  return app;
}
