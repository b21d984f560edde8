import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { env } from './config';
import { errorHandler, notFound, requestLogger } from './middlewares';
import routes from './routes';

/**
 * Create and configure Express application
 *
 * The API only speaks JSON: bodies go through express.json() alone, and
 * rate limiting covers the name endpoints, not the health probes.
 */
export const createApp = (): Application => {
  const app = express();

  app.use(helmet());

  // No cookies or auth headers are involved, so CORS only checks the origin
  app.use(
    cors({
      origin: (origin, callback) => {
        // Server-to-server callers send no Origin header
        if (!origin) return callback(null, true);

        const allowedOrigins = env.CORS_ORIGIN;
        callback(null, allowedOrigins.includes('*') || allowedOrigins.includes(origin));
      },
      methods: ['GET', 'POST', 'PUT', 'DELETE'],
      allowedHeaders: ['Content-Type', 'Accept'],
    })
  );

  // Candidate lists are bounded by MAX_CANDIDATES; the byte limit answers 413 first
  app.use(express.json({ limit: env.JSON_BODY_LIMIT }));

  app.use(requestLogger);

  app.use(
    `${env.API_PREFIX}/names`,
    rateLimit({
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      max: env.RATE_LIMIT_MAX_REQUESTS,
      message: {
        success: false,
        error: 'Too many requests, please try again later',
      },
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  app.use(env.API_PREFIX, routes);

  // Endpoint index
  app.get('/', (_req, res) => {
    res.json({
      success: true,
      message: 'Name Resolver API',
      version: '1.0.0',
      search: `${env.API_PREFIX}/names/search`,
      tables: `${env.API_PREFIX}/names/tables`,
      health: `${env.API_PREFIX}/health`,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(notFound);
  app.use(errorHandler);

  return app;
};

export default createApp;
