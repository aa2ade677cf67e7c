import { Router } from 'express';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import type { RunService } from '../services/run-service.js';
import type { RunStore } from '../services/run-store.js';
import type { RunRecord, TvConfig } from '../types.js';

export interface RouterDeps {
  runService: RunService;
  runStore: RunStore;
  config: TvConfig;
}

const startRunSchema = z.object({
  theoremName: z.string().trim().min(1, 'theoremName is required').max(200),
  theoremDescription: z.string().trim().max(10_000).default(''),
});

/** Run record without the event log, for listings */
function summarize(run: RunRecord): Omit<RunRecord, 'events'> {
  const { events: _events, ...rest } = run;
  return rest;
}

export function createRunRouter(deps: RouterDeps): Router {
  const { runService, runStore, config } = deps;
  const router = Router();

  // GET /runs — newest first
  router.get('/runs', (_req, res) => {
    res.json({ runs: runStore.listRuns().map(summarize) });
  });

  // POST /runs — plan and render a theorem in the background
  router.post('/runs', (req, res) => {
    const parsed = startRunSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues.map((issue) => issue.message).join('; ') });
      return;
    }
    try {
      const run = runService.start(parsed.data);
      res.status(202).json({ run: summarize(run) });
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  // GET /runs/:id
  router.get('/runs/:id', (req, res) => {
    const run = runStore.getRun(req.params.id);
    if (!run) {
      res.status(404).json({ error: `Run "${req.params.id}" not found` });
      return;
    }
    res.json({ run: summarize(run) });
  });

  // GET /runs/:id/events — progress log
  router.get('/runs/:id/events', (req, res) => {
    const run = runStore.getRun(req.params.id);
    if (!run) {
      res.status(404).json({ error: `Run "${req.params.id}" not found` });
      return;
    }
    res.json({ events: run.events });
  });

  // POST /runs/:id/cancel — stop scheduling scenes; in-flight renders end at their timeout
  router.post('/runs/:id/cancel', (req, res) => {
    const { id } = req.params;
    if (!runStore.getRun(id)) {
      res.status(404).json({ error: `Run "${id}" not found` });
      return;
    }
    if (!runService.cancel(id)) {
      res.status(409).json({ error: `Run "${id}" is not running` });
      return;
    }
    res.status(202).json({ success: true });
  });

  // GET /config — effective configuration
  router.get('/config', (_req, res) => {
    res.json(config);
  });

  return router;
}
