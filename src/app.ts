/**
 * Express application: CORS, rate limiting, request logging, routes, error handling
 */

import express from 'express';
import rateLimit from 'express-rate-limit';
import cors from './middleware/cors';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import coursesRouter from './routes/courses';
import healthRouter from './routes/health';
import selectionRouter from './routes/selection';
import { requestLogger } from './utils/requestId';

export function createApp(): express.Express {
  const app = express();

  app.use(cors);

  // Rate limiting
  const limiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    limit: 300,
    message: { ok: false, error: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' } },
    standardHeaders: true,
    legacyHeaders: false
  });

  app.use(limiter);

  app.use(express.json({ limit: '20mb' }));

  app.use(requestLogger);

  // Routes
  app.use('/health', healthRouter);
  app.use('/api/courses', coursesRouter);
  app.use('/api/selection', selectionRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
