/**
 * Local images API routes
 */

import { Router, Request, Response } from 'express';
import { ApiDependencies } from './types';
import { integerParam, sendError } from './params';

export function createLocalImagesRouter({ runtime }: ApiDependencies): Router {
  const router = Router();

  // GET /api/local-images - Images known to the local container runtime
  router.get('/', async (req: Request, res: Response) => {
    try {
      const limit = integerParam(req.query.limit, 'limit', { min: 1, max: 1000, fallback: 300 });
      const [images, detectedArch] = await Promise.all([runtime.listLocalImages(limit), runtime.hostArchitecture()]);
      res.json({ images, detectedArch });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  return router;
}
