import fs from 'node:fs/promises';
import path from 'node:path';
import { createOrchestrator, createPlanner, runLayout, type PipelineDeps } from '../bootstrap.js';
import { PipelineError, errorMessage } from '../errors.js';
import type { PipelineEvent, RunRecord, TheoremContext } from '../types.js';
import { formatEvent } from './orchestrator.js';
import { RunLog } from './run-log.js';
import { RunStore } from './run-store.js';

/** Plans and runs pipelines in the background, recording progress in the store */
export class RunService {
  private readonly controllers = new Map<string, AbortController>();
  private readonly jobs = new Map<string, Promise<void>>();

  constructor(
    private readonly store: RunStore,
    private readonly deps: PipelineDeps,
  ) {}

  start(input: TheoremContext): RunRecord {
    let id = RunStore.makeId(input.theoremName);
    for (let n = 2; this.store.getRun(id); n++) {
      id = `${RunStore.makeId(input.theoremName)}-${n}`;
    }

    const record: RunRecord = {
      id,
      theoremName: input.theoremName,
      theoremDescription: input.theoremDescription,
      status: 'planning',
      runDir: path.join(this.deps.config.outputRoot, id),
      createdAt: new Date().toISOString(),
      events: [],
    };
    this.store.addRun(record);
    this.store.save();

    const controller = new AbortController();
    this.controllers.set(id, controller);
    const job = this.execute(record, controller.signal)
      .catch((err: unknown) => {
        console.error(`  [run ${id}] ${errorMessage(err)}`);
      })
      .finally(() => {
        this.controllers.delete(id);
        this.jobs.delete(id);
      });
    this.jobs.set(id, job);
    return record;
  }

  /** Returns false when the run is unknown or already finished */
  cancel(id: string): boolean {
    const controller = this.controllers.get(id);
    if (!controller || !this.store.isActive(id)) return false;
    controller.abort();
    console.log(`  [run ${id}] cancellation requested`);
    return true;
  }

  /** Resolves once the run's background job has settled */
  async waitFor(id: string): Promise<RunRecord | undefined> {
    await this.jobs.get(id);
    return this.store.getRun(id);
  }

  private async execute(record: RunRecord, signal: AbortSignal): Promise<void> {
    const { id } = record;
    const layout = runLayout(record.runDir);
    const log = new RunLog(layout.logFile);

    try {
      const plan = await createPlanner(this.deps).plan(record.theoremName, record.theoremDescription);
      await fs.mkdir(layout.runDir, { recursive: true });
      await fs.writeFile(layout.planFile, JSON.stringify(plan, null, 2));

      this.store.update(id, { status: 'running' });
      this.store.appendEvent(id, { type: 'plan-ready', sceneCount: plan.scenes.length });
      this.store.save();
      log.write(`plan ready: ${plan.scenes.length} scene(s)`);

      const report = await createOrchestrator(this.deps, layout).run(plan, {
        signal,
        onEvent: (event: PipelineEvent) => {
          const line = formatEvent(event);
          console.log(line.replace(/^ {2}/, `  [run ${id}] `));
          log.write(line);
          this.store.appendEvent(id, event);
          this.store.save();
        },
      });
      this.store.update(id, { status: report.status, report, finishedAt: report.finishedAt });
    } catch (err) {
      log.write(`run failed: ${errorMessage(err)}`);
      this.store.appendEvent(id, { type: 'run-error', message: errorMessage(err) });
      this.store.update(id, {
        status: 'failed',
        errorMessage: errorMessage(err),
        finishedAt: new Date().toISOString(),
        ...(err instanceof PipelineError && err.report ? { report: err.report } : {}),
      });
    } finally {
      this.store.save();
    }
  }
}
