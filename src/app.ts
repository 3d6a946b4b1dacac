import express, { Application } from 'express';
import cors, { CorsOptions } from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import hpp from 'hpp';
import { env } from './config';
import { assignRequestId, errorHandler, notFound, requestLogger } from './middlewares';
import routes from './routes';
import { sendError } from './utils';

const VERSION = process.env.npm_package_version || '1.0.0';

const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Server-to-server callers (the agent layer) send no Origin
    if (!origin) return callback(null, true);

    const allowedOrigins = env.CORS_ORIGIN;
    callback(null, allowedOrigins.includes('*') || allowedOrigins.includes(origin));
  },
  credentials: true,
  methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'Accept', 'X-Request-Id'],
  exposedHeaders: ['X-Request-Id', 'RateLimit-Remaining', 'RateLimit-Reset'],
};

/**
 * Inbound limiter for the whole API. Outbound calls are limited separately,
 * per provider, by the resilience gateway.
 */
const createInboundLimiter = () =>
  rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX_REQUESTS,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => {
      sendError(res, 'Too many requests, please try again later', 429, { kind: 'RateLimited' });
    },
  });

/**
 * Create and configure Express application
 */
export const createApp = (): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(hpp());
  app.use(cors(corsOptions));
  app.use(createInboundLimiter());

  // Every request gets an id before anything logs
  app.use(assignRequestId);

  // Agents send JSON only
  app.use(express.json({ limit: '100kb' }));
  app.use(compression());

  app.use(requestLogger);

  // API routes
  app.use(env.API_PREFIX, routes);

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      success: true,
      message: 'Dispute Resolution API',
      version: VERSION,
      endpoints: {
        health: `${env.API_PREFIX}/health`,
        providers: `${env.API_PREFIX}/providers`,
        merchants: `${env.API_PREFIX}/merchants/search?name=`,
        sessions: `${env.API_PREFIX}/users/:userId/sessions/:sessionId/resolve`,
        disputes: `${env.API_PREFIX}/users/:userId/disputes`,
      },
      timestamp: new Date().toISOString(),
    });
  });

  app.use(notFound);
  app.use(errorHandler);

  return app;
};

export default createApp;
