import path from 'node:path';
import { PipelineError, errorMessage } from '../errors.js';
import type {
  IAssembler,
  INarrationService,
  NarrationArtifact,
  PipelineEvent,
  PipelineReport,
  PipelineStatus,
  RepairOutcome,
  RepairState,
  RunOptions,
  Scene,
  ScenePlan,
  SceneReport,
  SceneResult,
  TheoremContext,
} from '../types.js';
import type { RepairLoop } from './repair-loop.js';
import { createScenePlan } from './scene-plan.js';
import { runBounded } from './worker-pool.js';

export interface OrchestratorDeps {
  repairLoop: RepairLoop;
  narration: INarrationService;
  assembler: IAssembler;
}

export interface OrchestratorSettings {
  maxConcurrentScenes: number;
  strictMode: boolean;
  /** Directory that receives the assembled video */
  finalDir: string;
}

interface SceneOutcome {
  report: SceneReport;
  result?: SceneResult;
}

export function finalVideoName(theoremName: string): string {
  const slug = theoremName.trim().replace(/\s+/g, '_').replace(/[^\w.-]/g, '') || 'theorem';
  return `${slug}_explanation.mp4`;
}

function transitionEvent(state: RepairState): PipelineEvent {
  const base = { type: 'repair-transition' as const, sceneIndex: state.sceneIndex, phase: state.phase };
  switch (state.phase) {
    case 'generating':
      return { ...base, attemptNumber: state.attemptNumber };
    case 'executing':
    case 'done':
      return { ...base, attemptNumber: state.artifact.attemptNumber };
    case 'retrying':
      return { ...base, attemptNumber: state.attempt.artifact.attemptNumber, detail: state.attempt.failure.errorKind };
    case 'failed':
      return { ...base, attemptNumber: state.attemptNumber, detail: state.reason };
  }
}

/** One log line per event, in the service's console style */
export function formatEvent(event: PipelineEvent): string {
  switch (event.type) {
    case 'scene-started':
      return `  [scene ${event.sceneIndex}] started`;
    case 'repair-transition':
      return `  [scene ${event.sceneIndex}] ${event.phase} (attempt ${event.attemptNumber})${event.detail ? `: ${event.detail}` : ''}`;
    case 'scene-finished':
      return `  [scene ${event.sceneIndex}] ${event.status}: ${event.reason}`;
    case 'assembly-started':
      return `  [assembly] scenes ${event.sceneIndices.join(', ')}`;
    case 'run-finished':
      return `  [run] ${event.status}`;
  }
}

/**
 * Drives every scene of a plan through its repair loop and narration, then
 * assembles the successful scenes in plan order.
 */
export class PipelineOrchestrator {
  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly settings: OrchestratorSettings,
  ) {}

  async run(input: ScenePlan, options: RunOptions = {}): Promise<PipelineReport> {
    if (input.scenes.length === 0) {
      throw new PipelineError('Scene plan is empty');
    }
    // plans built by hand skip the planner, so indices are checked again here
    const plan = createScenePlan(input);

    const startedAt = new Date().toISOString();
    const emit = options.onEvent ?? (() => undefined);
    const theorem: TheoremContext = {
      theoremName: plan.theoremName,
      theoremDescription: plan.theoremDescription,
    };

    const slots = await runBounded(
      plan.scenes,
      this.settings.maxConcurrentScenes,
      (scene) => this.processScene(theorem, scene, options),
      options.signal,
    );

    const outcomes = plan.scenes.map((scene, i): SceneOutcome => {
      const slot = slots[i];
      switch (slot.status) {
        case 'fulfilled':
          return slot.value;
        case 'rejected':
          return { report: failedReport(scene, 0, `unexpected error: ${errorMessage(slot.reason)}`) };
        case 'skipped':
          return { report: { sceneIndex: scene.index, title: scene.title, status: 'cancelled', attempts: 0, reason: 'cancelled before start' } };
      }
    });

    const scenes = outcomes.map((outcome) => outcome.report);
    const results = outcomes.flatMap((outcome) => (outcome.result ? [outcome.result] : []));
    const unsuccessful = scenes.filter((scene) => scene.status !== 'succeeded');
    const sceneSummary = unsuccessful.length > 0
      ? unsuccessful.map((scene) => `scene ${scene.sceneIndex} (${scene.title}): ${scene.reason}`).join('; ')
      : null;

    const finish = (
      status: PipelineStatus,
      extra: Partial<Pick<PipelineReport, 'outputPath' | 'outputDuration' | 'failureSummary'>> = {},
    ): PipelineReport => {
      emit({ type: 'run-finished', status });
      return {
        theoremName: plan.theoremName,
        status,
        allSuccess: status === 'completed',
        scenes,
        outputPath: extra.outputPath ?? null,
        outputDuration: extra.outputDuration ?? null,
        failureSummary: extra.failureSummary ?? sceneSummary,
        startedAt,
        finishedAt: new Date().toISOString(),
      };
    };

    if (options.signal?.aborted) {
      return finish('cancelled');
    }

    if (this.settings.strictMode && unsuccessful.length > 0) {
      const report = finish('failed');
      throw new PipelineError(
        `Strict mode: ${unsuccessful.length} of ${scenes.length} scene(s) did not succeed: ${sceneSummary}`,
        { report },
      );
    }

    if (results.length === 0) {
      return finish('failed', { failureSummary: `No scene succeeded: ${sceneSummary}` });
    }

    const sceneIndices = results.map((result) => result.sceneIndex);
    emit({ type: 'assembly-started', sceneIndices });
    const outputPath = path.join(this.settings.finalDir, finalVideoName(plan.theoremName));

    try {
      const video = await this.deps.assembler.assemble(results, outputPath, sceneIndices);
      return finish(unsuccessful.length > 0 ? 'partial' : 'completed', {
        outputPath: video.outputPath,
        outputDuration: video.duration,
      });
    } catch (err) {
      const report = finish('failed', { failureSummary: `Assembly failed: ${errorMessage(err)}` });
      throw new PipelineError(`Assembly failed: ${errorMessage(err)}`, { cause: err, report });
    }
  }

  private async processScene(theorem: TheoremContext, scene: Scene, options: RunOptions): Promise<SceneOutcome> {
    const emit = options.onEvent ?? (() => undefined);
    emit({ type: 'scene-started', sceneIndex: scene.index });

    // Narration depends only on the text, so it runs alongside code generation
    const [repair, narration] = await Promise.allSettled([
      this.deps.repairLoop.run(theorem, scene, {
        signal: options.signal,
        onTransition: (state) => emit(transitionEvent(state)),
      }),
      this.deps.narration.synthesize(scene),
    ]);

    const outcome = settle(scene, repair, narration);
    emit({
      type: 'scene-finished',
      sceneIndex: scene.index,
      status: outcome.report.status,
      reason: outcome.report.reason,
    });
    return outcome;
  }
}

function failedReport(scene: Scene, attempts: number, reason: string): SceneReport {
  return { sceneIndex: scene.index, title: scene.title, status: 'failed', attempts, reason };
}

function settle(
  scene: Scene,
  repair: PromiseSettledResult<RepairOutcome>,
  narration: PromiseSettledResult<NarrationArtifact>,
): SceneOutcome {
  if (repair.status === 'rejected') {
    return { report: failedReport(scene, 0, `execution error: ${errorMessage(repair.reason)}`) };
  }

  const outcome = repair.value;
  if (outcome.phase === 'failed') {
    return {
      report: {
        ...failedReport(scene, outcome.attemptNumber, outcome.reason),
        ...(outcome.reason === 'cancelled' ? { status: 'cancelled' as const } : {}),
        ...(outcome.lastFailure ? { errorKind: outcome.lastFailure.errorKind } : {}),
      },
    };
  }

  const attempts = outcome.artifact.attemptNumber;
  const { videoPath, duration } = outcome.result;
  if (narration.status === 'rejected') {
    return {
      report: {
        ...failedReport(scene, attempts, `narration failed: ${errorMessage(narration.reason)}`),
        videoPath,
        duration,
      },
    };
  }

  const { audioPath, duration: audioDuration } = narration.value;
  return {
    report: {
      sceneIndex: scene.index,
      title: scene.title,
      status: 'succeeded',
      attempts,
      reason: `rendered on attempt ${attempts}`,
      videoPath,
      audioPath,
      duration,
    },
    result: {
      sceneIndex: scene.index,
      videoPath,
      audioPath,
      videoDuration: duration,
      audioDuration,
    },
  };
}
