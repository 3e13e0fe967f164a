import { Router } from 'express';
import type { HealthController } from '../controllers/health.controller';

export function healthRoutes(healthController: HealthController): Router {
  const router = Router();

  router.get('/', (req, res) => healthController.check(req, res));
  router.get('/integrations', (req, res) => healthController.checkIntegrations(req, res));

  return router;
}
