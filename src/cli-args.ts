import type { PipelineReport } from './types.js';

const USAGE = 'Usage: theorem-video "<theorem name>" "<theorem description>" [--config <path>]';

export interface CliArgs {
  theoremName: string;
  theoremDescription: string;
  configPath?: string;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const positional: string[] = [];
  let configPath: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--config') {
      configPath = argv[++i];
      if (!configPath) throw new Error('--config needs a path');
    } else if (arg.startsWith('--config=')) {
      configPath = arg.slice('--config='.length);
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [theoremName, theoremDescription = ''] = positional;
  if (!theoremName || positional.length > 2) {
    throw new Error(USAGE);
  }
  return { theoremName, theoremDescription, ...(configPath ? { configPath } : {}) };
}

export function printReport(report: PipelineReport): void {
  console.log(`\n  ${report.theoremName}: ${report.status}`);
  for (const scene of report.scenes) {
    console.log(`  ${String(scene.sceneIndex).padStart(3)}  ${scene.status.padEnd(9)}  ${scene.title}: ${scene.reason}`);
  }
  if (report.outputPath) {
    console.log(`\n  Video: ${report.outputPath} (${report.outputDuration?.toFixed(1)}s)`);
  }
  if (report.failureSummary) {
    console.log(`\n  ${report.failureSummary}`);
  }
}
