/**
 * Jobs API routes - submit background jobs and poll their state
 */

import { Router, Request, Response } from 'express';
import { parseArchMode, parsePrefixMode } from '../services/job-plans';
import { JobRequest } from '../types';
import { ApiDependencies } from './types';
import { booleanParam, integerParam, jsonBody, optionalString, sendError, stringList } from './params';

type BodyParser = (body: Record<string, unknown>) => JobRequest;

const SUBMISSIONS: Record<string, BodyParser> = {
  '/sync-jobs': (body) => ({
    type: 'mirror-sync',
    params: {
      sourceImage: optionalString(body.sourceImage, 'sourceImage') || '',
      targetRepository: optionalString(body.targetRepository, 'targetRepository'),
      targetTag: optionalString(body.targetTag, 'targetTag'),
      cleanupLocalTag: booleanParam(body.cleanupLocalTag, 'cleanupLocalTag', false),
    },
  }),

  '/local-push-jobs': (body) => ({
    type: 'local-push',
    params: {
      imageRefs: stringList(body.imageRefs, 'imageRefs'),
      archMode: parseArchMode(body.archMode),
      archValue: optionalString(body.archValue, 'archValue'),
      prefixMode: parsePrefixMode(body.prefixMode),
      prefixValue: optionalString(body.prefixValue, 'prefixValue'),
      targetRegistryHost: optionalString(body.targetRegistryHost, 'targetRegistryHost'),
      cleanupLocalTag: booleanParam(body.cleanupLocalTag, 'cleanupLocalTag', false),
      cleanupRegistrySourceTag: booleanParam(body.cleanupRegistrySourceTag, 'cleanupRegistrySourceTag', false),
    },
  }),

  '/remote-prefix-jobs': (body) => ({
    type: 'remote-prefix-rename',
    params: {
      repositories: stringList(body.repositories, 'repositories'),
      prefixMode: parsePrefixMode(body.prefixMode) || 'add',
      prefixValue: optionalString(body.prefixValue, 'prefixValue') || '',
      cleanupSourceTag: booleanParam(body.cleanupSourceTag, 'cleanupSourceTag', false),
      targetRegistryHost: optionalString(body.targetRegistryHost, 'targetRegistryHost'),
    },
  }),

  '/repository-delete-jobs': (body) => ({
    type: 'repo-delete',
    params: { repositories: stringList(body.repositories, 'repositories') },
  }),

  '/local-delete-jobs': (body) => ({
    type: 'local-delete',
    params: { imageRefs: stringList(body.imageRefs, 'imageRefs') },
  }),
};

export function createJobsRouter({ jobs }: ApiDependencies): Router {
  const router = Router();

  // POST /api/<kind>-jobs - Validate and enqueue; the job runs in the background
  for (const [path, parse] of Object.entries(SUBMISSIONS)) {
    router.post(path, (req: Request, res: Response) => {
      try {
        const job = jobs.submit(parse(jsonBody(req.body)));
        res.status(202).json(job);
      } catch (error: unknown) {
        sendError(res, error);
      }
    });
  }

  // GET /api/sync-jobs - Most recent jobs first
  router.get('/sync-jobs', (req: Request, res: Response) => {
    try {
      const limit = integerParam(req.query.limit, 'limit', { min: 1, max: 100, fallback: 20 });
      res.json({ jobs: jobs.list(limit) });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  // GET /api/sync-jobs/:id - One job snapshot
  router.get('/sync-jobs/:id', (req: Request, res: Response) => {
    try {
      res.json(jobs.get(req.params.id));
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  return router;
}
