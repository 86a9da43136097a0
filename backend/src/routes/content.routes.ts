import express, { type RequestHandler } from 'express';
import type { ContentController } from '../controllers/content.controller.js';

export function createContentRouter(controller: ContentController, generationLimiter: RequestHandler) {
  const router = express.Router();

  // POST /generate - Generate pages for topics x categories
  router.post('/generate', generationLimiter, controller.generate);
  router.all('/generate', controller.methodNotAllowed);

  // GET /categories - Supported categories
  router.get('/categories', controller.listCategories);

  return router;
}
