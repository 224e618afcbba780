import compression from 'compression';
import cookieParser from 'cookie-parser';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { StatusCodes } from 'http-status-codes';
import type { Express } from 'express';
import { requestContext } from '../api/middleware/request-context.js';
import { errorHandler } from '../api/middleware/error-handler.js';
import { EventSuiteError } from '../lib/errors.js';
import { env } from '../config/env.js';

/**
 * Create the Express application with the shared middleware stack and the
 * liveness route. Modules mount their routers during their run() phase;
 * call `attachErrorHandling()` once they have.
 */
export function createExpressApp(): Express {
  const app = express();

  app.set('trust proxy', true);
  app.use(requestContext);
  app.use(helmet());

  const allowedOrigins = env.CORS_ORIGINS;

  app.use(cors({
    origin: (origin, callback) => {
      // Requests without an Origin header (curl, server-to-server) are allowed
      if (!origin) return callback(null, true);

      if (allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new EventSuiteError('CORS policy: Origin not allowed', 'CORS_REJECTED', StatusCodes.FORBIDDEN));
      }
    },
    credentials: true
  }));

  app.use(compression());
  app.use(cookieParser());
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));
  if (env.NODE_ENV !== 'test') {
    app.use(morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev'));
  }

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'healthy', message: 'Application is running' });
  });

  return app;
}

/**
 * Register the JSON 404 fallback and the error handler. Must run after every
 * router has been mounted.
 */
export function attachErrorHandling(app: Express): void {
  app.use((req, res) => {
    res.status(StatusCodes.NOT_FOUND).json({ success: false, error: `Route not found: ${req.method} ${req.path}` });
  });
  app.use(errorHandler);
}
