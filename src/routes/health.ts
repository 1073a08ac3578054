/**
 * Health API routes
 */

import { Router, Request, Response } from 'express';
import { ApiDependencies } from './types';
import { sendError } from './params';

export function createHealthRouter({ config, registry, runtime }: ApiDependencies): Router {
  const router = Router();

  // GET /api/health - Registry reachability and host architecture
  router.get('/', async (req: Request, res: Response) => {
    try {
      const [health, detectedArch] = await Promise.all([registry.healthCheck(), runtime.hostArchitecture()]);
      res.json({
        registryApiUrl: config.registryApiUrl,
        registryPushHost: config.registryPushHost,
        registryHealthy: health.healthy,
        detectedArch,
      });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  return router;
}
