import fs from 'node:fs';
import path from 'node:path';
import type { RunEventEntry, RunRecord, TvState } from '../types.js';

const MAX_EVENTS_PER_RUN = 200;
const ACTIVE_STATUSES: ReadonlySet<RunRecord['status']> = new Set(['planning', 'running']);

function emptyState(): TvState {
  return { runs: {} };
}

export class RunStore {
  private state: TvState = emptyState();
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /** `pythagorean-theorem-lx2k9a` */
  static makeId(theoremName: string, now: number = Date.now()): string {
    const slug = theoremName
      .replace(/[^a-zA-Z0-9-]/g, '-')
      .replace(/-+/g, '-')
      .replace(/^-|-$/g, '')
      .toLowerCase()
      .slice(0, 40);
    return `${slug || 'run'}-${now.toString(36)}`;
  }

  load(): void {
    if (fs.existsSync(this.filePath)) {
      const raw = fs.readFileSync(this.filePath, 'utf-8');
      this.state = JSON.parse(raw) as TvState;
      if (!this.state.runs) this.state.runs = {};
      // A run that was active when the process stopped will never finish
      for (const run of Object.values(this.state.runs)) {
        if (ACTIVE_STATUSES.has(run.status)) {
          run.status = 'failed';
          run.errorMessage = 'interrupted by restart';
          run.finishedAt = run.finishedAt ?? new Date().toISOString();
        }
      }
    } else {
      this.state = emptyState();
    }
  }

  save(): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.filePath, JSON.stringify(this.state, null, 2));
  }

  getRun(id: string): RunRecord | undefined {
    return this.state.runs[id];
  }

  /** Newest first */
  listRuns(): RunRecord[] {
    return Object.values(this.state.runs).sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  addRun(run: RunRecord): void {
    if (this.state.runs[run.id]) {
      throw new Error(`Run "${run.id}" already exists`);
    }
    this.state.runs[run.id] = run;
  }

  update(id: string, patch: Partial<Omit<RunRecord, 'id' | 'events'>>): RunRecord {
    const run = this.state.runs[id];
    if (!run) {
      throw new Error(`Run "${id}" not found`);
    }
    Object.assign(run, patch);
    return run;
  }

  /** Append an event (keeps the last MAX_EVENTS_PER_RUN) */
  appendEvent(id: string, event: RunEventEntry['event']): void {
    const run = this.state.runs[id];
    if (!run) {
      throw new Error(`Run "${id}" not found`);
    }
    run.events.push({ event, timestamp: new Date().toISOString() });
    if (run.events.length > MAX_EVENTS_PER_RUN) {
      run.events = run.events.slice(-MAX_EVENTS_PER_RUN);
    }
  }

  isActive(id: string): boolean {
    const run = this.state.runs[id];
    return run !== undefined && ACTIVE_STATUSES.has(run.status);
  }
}
