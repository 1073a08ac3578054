/**
 * HTTP server - express app exposing the registry, local image and job APIs
 */

import express, { NextFunction, Request, Response } from 'express';
import { Server } from 'http';
import { createLogger } from './logger';
import {
  ApiDependencies,
  createHealthRouter,
  createJobsRouter,
  createLocalImagesRouter,
  createRepositoriesRouter,
} from './routes';
import { sendError } from './routes/params';

const log = createLogger('http');

export interface ListenOptions {
  port: number;
  host: string;
}

export function createApp(deps: ApiDependencies): express.Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.on('finish', () => {
      log.debug(
        { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - started },
        'Request completed'
      );
    });
    next();
  });

  app.use('/api/health', createHealthRouter(deps));
  app.use('/api/repositories', createRepositoriesRouter(deps));
  app.use('/api/local-images', createLocalImagesRouter(deps));
  app.use('/api', createJobsRouter(deps));

  // Liveness
  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: `Route ${req.method} ${req.path} not found.` });
  });

  // express.json() reports unparsable bodies as SyntaxError
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Request body is not valid JSON.' });
      return;
    }
    sendError(res, error);
  });

  return app;
}

export function createServer(
  deps: ApiDependencies,
  options: ListenOptions
): { app: express.Express; start: () => Promise<Server>; stop: () => Promise<void> } {
  const app = createApp(deps);
  let server: Server | undefined;

  const start = (): Promise<Server> =>
    new Promise((resolve, reject) => {
      const listening = app.listen(options.port, options.host, () => {
        log.info(`Registry manager listening on ${options.host}:${options.port}`);
        resolve(listening);
      });
      listening.once('error', reject);
      server = listening;
    });

  const stop = (): Promise<void> =>
    new Promise((resolve, reject) => {
      if (!server) {
        resolve();
        return;
      }
      server.close((error) => (error ? reject(error) : resolve()));
      server = undefined;
    });

  return { app, start, stop };
}
