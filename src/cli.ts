#!/usr/bin/env node
import fs from 'node:fs/promises';
import path from 'node:path';
import { createDefaultDeps, createOrchestrator, createPlanner, runLayout } from './bootstrap.js';
import { loadConfig } from './config.js';
import { PipelineError, errorMessage } from './errors.js';
import { formatEvent } from './services/orchestrator.js';
import { RunLog } from './services/run-log.js';
import { RunStore } from './services/run-store.js';
import { parseArgs, printReport } from './cli-args.js';

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig(args.configPath);
  const deps = createDefaultDeps(config);
  const layout = runLayout(path.join(config.outputRoot, RunStore.makeId(args.theoremName)));

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\n  Cancelling: no new scenes will start');
    controller.abort();
  });

  const plan = await createPlanner(deps).plan(args.theoremName, args.theoremDescription);
  await fs.mkdir(layout.runDir, { recursive: true });
  await fs.writeFile(layout.planFile, JSON.stringify(plan, null, 2));
  console.log(`  Scene plan saved to ${layout.planFile}`);
  const log = new RunLog(layout.logFile);
  log.write(`plan ready: ${plan.scenes.length} scene(s)`);

  try {
    const report = await createOrchestrator(deps, layout).run(plan, {
      signal: controller.signal,
      onEvent: (event) => {
        const line = formatEvent(event);
        console.log(line);
        log.write(line);
      },
    });
    printReport(report);
    return report.status === 'completed' || report.status === 'partial' ? 0 : 1;
  } catch (err) {
    log.write(`run failed: ${errorMessage(err)}`);
    if (err instanceof PipelineError && err.report) {
      printReport(err.report);
    }
    throw err;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`  ${errorMessage(err)}`);
    process.exitCode = 1;
  },
);
