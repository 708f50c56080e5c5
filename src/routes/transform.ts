import { Router } from 'express';

import { createTransformController } from '../controllers/transform';

import type { TransformControllerOptions } from '../controllers/transform';

export function createTransformRouter(options: TransformControllerOptions): Router {
  const router = Router();

  router.post('/transform', createTransformController(options));

  return router;
}
