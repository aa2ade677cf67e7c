import path from 'node:path';
import { AssemblerService } from './services/assembler.js';
import { CodeGenerationService } from './services/code-generator.js';
import { AnthropicLlmClient, type ILlmClient } from './services/llm-client.js';
import { GoogleCloudTtsBackend, NarrationService } from './services/narration.js';
import { PipelineOrchestrator } from './services/orchestrator.js';
import { PlannerService } from './services/planner.js';
import { RepairLoop } from './services/repair-loop.js';
import { ExecutionSandbox } from './services/sandbox.js';
import { ShellExecutor } from './services/shell-executor.js';
import type { IShellExecutor, ITtsBackend, TvConfig } from './types.js';

/** External collaborators; everything else is built per run from these */
export interface PipelineDeps {
  config: TvConfig;
  shell: IShellExecutor;
  llm: ILlmClient;
  tts: ITtsBackend;
}

export interface RunLayout {
  runDir: string;
  planFile: string;
  codeDir: string;
  mediaDir: string;
  audioDir: string;
  finalDir: string;
  logFile: string;
}

export function runLayout(runDir: string): RunLayout {
  return {
    runDir,
    planFile: path.join(runDir, 'scene_plan.json'),
    codeDir: path.join(runDir, 'code'),
    mediaDir: path.join(runDir, 'media'),
    audioDir: path.join(runDir, 'audio'),
    finalDir: path.join(runDir, 'final'),
    logFile: path.join(runDir, 'run.log'),
  };
}

export function createDefaultDeps(config: TvConfig): PipelineDeps {
  const apiKey = process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY environment variable is required');
  }
  return {
    config,
    shell: new ShellExecutor(),
    llm: new AnthropicLlmClient(apiKey, config.llm),
    tts: new GoogleCloudTtsBackend(config.tts),
  };
}

export function createPlanner(deps: PipelineDeps): PlannerService {
  return new PlannerService(deps.llm);
}

/** Services for one run; output paths are scoped to the run directory */
export function createOrchestrator(deps: PipelineDeps, layout: RunLayout): PipelineOrchestrator {
  const { config, shell, llm, tts } = deps;
  const { pipeline } = config;

  const repairLoop = new RepairLoop(
    new CodeGenerationService(llm),
    new ExecutionSandbox(shell, {
      render: config.render,
      timeoutSeconds: pipeline.executionTimeoutSeconds,
      mediaDir: layout.mediaDir,
      codeDir: layout.codeDir,
    }),
    { maxRetries: pipeline.maxRetries, stopOnNoProgress: pipeline.stopOnNoProgress },
  );

  return new PipelineOrchestrator(
    {
      repairLoop,
      narration: new NarrationService(tts, shell, layout.audioDir),
      assembler: new AssemblerService(shell, config.assembly),
    },
    {
      maxConcurrentScenes: pipeline.maxConcurrentScenes,
      strictMode: pipeline.strictMode,
      finalDir: layout.finalDir,
    },
  );
}
