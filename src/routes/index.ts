import { Router } from 'express';
import type { Container } from '../container';
import { emailRoutes } from './email.routes';
import { healthRoutes } from './health.routes';

export function createRoutes(container: Container): Router {
  const router = Router();

  // Mount routes
  router.use('/health', healthRoutes(container.healthController));
  router.use('/emails', emailRoutes(container.emailController, container.userContext));

  return router;
}
