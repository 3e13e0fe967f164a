import express, { type Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import type { Container } from './container';
import { requestLogger } from './middleware/logger';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { createRoutes } from './routes';

export function createApp(container: Container): Express {
  const app: Express = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());

  // Request logging
  app.use(requestLogger);

  // Routes
  app.use('/', createRoutes(container));

  // 404 handler
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
