import { Router, type RequestHandler } from 'express';
import type { EmailController } from '../controllers/email.controller';

export function emailRoutes(emailController: EmailController, userContext: RequestHandler): Router {
  const router = Router();

  router.use(userContext);

  router.get('/', (req, res, next) => emailController.list(req, res, next));
  router.get('/search', (req, res, next) => emailController.search(req, res, next));
  router.get('/:id', (req, res, next) => emailController.read(req, res, next));

  return router;
}
