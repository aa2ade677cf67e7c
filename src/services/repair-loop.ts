import { errorMessage } from '../errors.js';
import type {
  ExecutionFailure,
  ICodeGenerator,
  IExecutionSandbox,
  RepairAttempt,
  RepairOutcome,
  RepairState,
  Scene,
  TheoremContext,
} from '../types.js';

export interface RepairLoopOptions {
  maxRetries: number;
  /** Give up after two identical consecutive failures instead of spending the whole budget */
  stopOnNoProgress: boolean;
}

export interface RepairRunHooks {
  signal?: AbortSignal;
  onTransition?: (state: RepairState) => void;
}

function sameFailure(a: ExecutionFailure, b: ExecutionFailure): boolean {
  return a.errorKind === b.errorKind && a.errorDetail === b.errorDetail;
}

/**
 * Generate → execute → (retry | done | failed) for one scene.
 *
 * Attempts are sequential; each repair request carries the failing artifact and
 * its error. The attempt number never exceeds `maxRetries`.
 */
export class RepairLoop {
  constructor(
    private readonly generator: ICodeGenerator,
    private readonly sandbox: IExecutionSandbox,
    private readonly options: RepairLoopOptions,
  ) {
    if (!Number.isInteger(options.maxRetries) || options.maxRetries < 1) {
      throw new Error(`maxRetries must be a positive integer, got ${options.maxRetries}`);
    }
  }

  async run(theorem: TheoremContext, scene: Scene, hooks: RepairRunHooks = {}): Promise<RepairOutcome> {
    const history: RepairAttempt[] = [];
    let state: RepairState = { phase: 'generating', sceneIndex: scene.index, attemptNumber: 1 };
    hooks.onTransition?.(state);

    for (;;) {
      state = await this.step(state, theorem, scene, history, hooks.signal);
      hooks.onTransition?.(state);
      if (state.phase === 'done' || state.phase === 'failed') {
        return state;
      }
    }
  }

  private async step(
    state: RepairState,
    theorem: TheoremContext,
    scene: Scene,
    history: RepairAttempt[],
    signal?: AbortSignal,
  ): Promise<RepairState> {
    const sceneIndex = scene.index;

    switch (state.phase) {
      case 'generating': {
        if (signal?.aborted) {
          return {
            phase: 'failed',
            sceneIndex,
            attemptNumber: state.attemptNumber - 1,
            reason: 'cancelled',
            lastFailure: history.at(-1)?.failure,
            history,
          };
        }
        try {
          const artifact = await this.generator.generate({
            theorem,
            scene,
            attemptNumber: state.attemptNumber,
            priorAttempt: state.priorAttempt,
            priorError: state.priorError,
          });
          return { phase: 'executing', sceneIndex, artifact };
        } catch (err) {
          const stage = state.attemptNumber === 1 ? 'generation' : `repair attempt ${state.attemptNumber}`;
          return {
            phase: 'failed',
            sceneIndex,
            attemptNumber: state.attemptNumber,
            reason: `${stage} failed: ${errorMessage(err)}`,
            lastFailure: history.at(-1)?.failure,
            history,
          };
        }
      }

      case 'executing': {
        const { artifact } = state;
        const result = await this.sandbox.execute(artifact);
        if (result.kind === 'success') {
          return { phase: 'done', sceneIndex, artifact, result, history };
        }

        const previous = history.at(-1);
        history.push({ artifact, failure: result });

        if (artifact.attemptNumber >= this.options.maxRetries) {
          return {
            phase: 'failed',
            sceneIndex,
            attemptNumber: artifact.attemptNumber,
            reason: `${result.errorKind} after ${artifact.attemptNumber} attempt(s): ${summaryLine(result.errorDetail)}`,
            lastFailure: result,
            history,
          };
        }
        if (this.options.stopOnNoProgress && previous && sameFailure(previous.failure, result)) {
          return {
            phase: 'failed',
            sceneIndex,
            attemptNumber: artifact.attemptNumber,
            reason: `no progress: attempts ${artifact.attemptNumber - 1} and ${artifact.attemptNumber} failed identically (${result.errorKind})`,
            lastFailure: result,
            history,
          };
        }
        return { phase: 'retrying', sceneIndex, attempt: { artifact, failure: result } };
      }

      case 'retrying':
        return {
          phase: 'generating',
          sceneIndex,
          attemptNumber: state.attempt.artifact.attemptNumber + 1,
          priorAttempt: state.attempt.artifact,
          priorError: state.attempt.failure,
        };

      case 'done':
      case 'failed':
        return state;
    }
  }
}

/** Last non-empty line of an error detail; tracebacks put the exception there */
function summaryLine(detail: string): string {
  const lines = detail.split('\n').map((line) => line.trim()).filter(Boolean);
  return lines.at(-1) ?? detail;
}
