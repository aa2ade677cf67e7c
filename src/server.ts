import express from 'express';
import { createRunRouter } from './routes/runs.js';
import type { RunService } from './services/run-service.js';
import type { RunStore } from './services/run-store.js';
import type { TvConfig } from './types.js';

export interface ServerDeps {
  runService: RunService;
  runStore: RunStore;
  config: TvConfig;
}

export function createServer(deps: ServerDeps): express.Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // API routes
  app.use('/api', createRunRouter(deps));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Malformed JSON bodies land here
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    res.status(400).json({ error: err.message });
  });

  return app;
}
