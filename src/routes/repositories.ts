/**
 * Repositories API routes
 *
 * Repository names may contain `/`, so the tag routes match with regular
 * expressions instead of named parameters.
 */

import { Router, Request, Response } from 'express';
import { ApiDependencies } from './types';
import { booleanParam, integerParam, optionalString, sendError } from './params';

const DEFAULT_PAGE_SIZE = 100;

export function createRepositoriesRouter({ config, registry }: ApiDependencies): Router {
  const router = Router();

  // GET /api/repositories - One catalog page
  router.get('/', async (req: Request, res: Response) => {
    try {
      const pageSize = integerParam(req.query.n, 'n', {
        min: 1,
        max: config.maxCatalogResults,
        fallback: Math.min(DEFAULT_PAGE_SIZE, config.maxCatalogResults),
      });
      const cursor = optionalString(req.query.last, 'last') || undefined;
      const nonEmptyOnly = booleanParam(req.query.nonEmptyOnly, 'nonEmptyOnly', false);

      res.json(await registry.listRepositories(pageSize, cursor, { nonEmptyOnly }));
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  // GET /api/repositories/<repo>/tags - Tags, with manifest details unless details=false
  router.get(/^\/(.+)\/tags\/?$/, async (req: Request, res: Response) => {
    try {
      const repository = req.params[0];
      const details = booleanParam(req.query.details, 'details', true);

      const tags = details
        ? await registry.listTags(repository)
        : (await registry.listTagNames(repository)).map((tag) => ({ tag }));
      res.json({ repository, tags });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  // DELETE /api/repositories/<repo>/tags/<tag> - Delete the manifest a tag points to
  router.delete(/^\/(.+)\/tags\/([^/]+)$/, async (req: Request, res: Response) => {
    try {
      const repository = req.params[0];
      const tag = req.params[1];

      const digest = await registry.deleteTag(repository, tag);
      res.json({ deleted: true, repository, tag, digest });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  return router;
}
