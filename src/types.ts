// ── Scene plan ──

export interface Scene {
  /** Position in the plan, 0-based; also the position in the final video */
  index: number;
  title: string;
  narrationText: string;
  /** What must be animated */
  intent: string;
  objective: string;
  layout?: string;
}

export interface TheoremContext {
  theoremName: string;
  theoremDescription: string;
}

export interface ScenePlan extends TheoremContext {
  scenes: readonly Scene[];
}

// ── Generation / execution ──

export interface CodeArtifact {
  sceneIndex: number;
  sourceCode: string;
  /** Name of the Scene subclass to render */
  sceneClass: string;
  attemptNumber: number;
}

export type ExecutionFailureKind = 'SyntaxError' | 'RuntimeError' | 'RenderTimeout' | 'ResourceError';

export interface ExecutionSuccess {
  kind: 'success';
  videoPath: string;
  /** Seconds */
  duration: number;
}

export interface ExecutionFailure {
  kind: 'failure';
  errorKind: ExecutionFailureKind;
  errorDetail: string;
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

export interface GenerationRequest {
  theorem: TheoremContext;
  scene: Scene;
  attemptNumber: number;
  /** Present on repair calls: the artifact that failed */
  priorAttempt?: CodeArtifact;
  /** Present on repair calls: how it failed */
  priorError?: ExecutionFailure;
}

export interface ICodeGenerator {
  generate(request: GenerationRequest): Promise<CodeArtifact>;
}

export interface IExecutionSandbox {
  execute(artifact: CodeArtifact): Promise<ExecutionResult>;
}

// ── Repair loop ──

export interface RepairAttempt {
  artifact: CodeArtifact;
  failure: ExecutionFailure;
}

export type RepairState =
  | {
      phase: 'generating';
      sceneIndex: number;
      attemptNumber: number;
      priorAttempt?: CodeArtifact;
      priorError?: ExecutionFailure;
    }
  | { phase: 'executing'; sceneIndex: number; artifact: CodeArtifact }
  | { phase: 'retrying'; sceneIndex: number; attempt: RepairAttempt }
  | RepairOutcome;

export type RepairOutcome =
  | {
      phase: 'done';
      sceneIndex: number;
      artifact: CodeArtifact;
      result: ExecutionSuccess;
      history: RepairAttempt[];
    }
  | {
      phase: 'failed';
      sceneIndex: number;
      /** Attempts made, including one whose generation failed */
      attemptNumber: number;
      reason: string;
      lastFailure?: ExecutionFailure;
      history: RepairAttempt[];
    };

// ── Narration / assembly ──

export interface NarrationArtifact {
  sceneIndex: number;
  audioPath: string;
  duration: number;
}

export interface SceneResult {
  sceneIndex: number;
  videoPath: string;
  audioPath: string;
  videoDuration: number;
  audioDuration: number;
}

export interface AssembledVideo {
  outputPath: string;
  duration: number;
  /** Scene indices in the order they appear in the output */
  sceneOrder: number[];
}

export interface ITtsBackend {
  /** Write spoken `text` to `outputPath` */
  synthesize(text: string, outputPath: string): Promise<void>;
}

export interface INarrationService {
  synthesize(scene: Scene): Promise<NarrationArtifact>;
}

export interface IAssembler {
  assemble(results: readonly SceneResult[], outputPath: string, expectedIndices: readonly number[]): Promise<AssembledVideo>;
}

// ── Report ──

export type SceneStatus = 'succeeded' | 'failed' | 'cancelled';

export interface SceneReport {
  sceneIndex: number;
  title: string;
  status: SceneStatus;
  attempts: number;
  /** Human-readable final state */
  reason: string;
  errorKind?: ExecutionFailureKind;
  videoPath?: string;
  audioPath?: string;
  duration?: number;
}

export type PipelineStatus = 'completed' | 'partial' | 'failed' | 'cancelled';

export interface PipelineReport {
  theoremName: string;
  status: PipelineStatus;
  allSuccess: boolean;
  /** One entry per plan scene, ascending by index */
  scenes: SceneReport[];
  outputPath: string | null;
  outputDuration: number | null;
  failureSummary: string | null;
  startedAt: string;
  finishedAt: string;
}

export type PipelineEvent =
  | { type: 'scene-started'; sceneIndex: number }
  | { type: 'repair-transition'; sceneIndex: number; phase: RepairState['phase']; attemptNumber: number; detail?: string }
  | { type: 'scene-finished'; sceneIndex: number; status: SceneStatus; reason: string }
  | { type: 'assembly-started'; sceneIndices: number[] }
  | { type: 'run-finished'; status: PipelineStatus };

export interface RunOptions {
  signal?: AbortSignal;
  onEvent?: (event: PipelineEvent) => void;
}

// ── Runs (dashboard) ──

export type RunStatus = 'planning' | 'running' | PipelineStatus;

/** A single event recorded during a run */
export interface RunEventEntry {
  event: PipelineEvent | { type: 'plan-ready'; sceneCount: number } | { type: 'run-error'; message: string };
  timestamp: string;
}

export interface RunRecord {
  id: string;
  theoremName: string;
  theoremDescription: string;
  status: RunStatus;
  runDir: string;
  createdAt: string;
  finishedAt?: string;
  report?: PipelineReport;
  /** Human-readable error message when status === 'failed' */
  errorMessage?: string;
  events: RunEventEntry[];
}

export interface TvState {
  runs: Record<string, RunRecord>;
}

// ── Configuration ──

export type RenderQuality = 'low_quality' | 'medium_quality' | 'high_quality';

export interface PipelineSettings {
  maxRetries: number;
  maxConcurrentScenes: number;
  executionTimeoutSeconds: number;
  /** Fail the whole run unless every scene succeeds */
  strictMode: boolean;
  /** Stop repairing a scene after two identical consecutive failures */
  stopOnNoProgress: boolean;
}

export interface TvConfig {
  /** Root directory for run outputs and the state file */
  outputRoot: string;
  pipeline: PipelineSettings;
  llm: {
    model: string;
    maxTokens: number;
    temperature: number;
    requestTimeoutMs: number;
    /** Total attempts per LLM request */
    retries: number;
    retryDelayMs: number;
  };
  render: {
    manimCommand: string;
    pythonCommand: string;
    quality: RenderQuality;
  };
  tts: {
    languageCode: string;
    voiceName?: string;
    speakingRate: number;
  };
  assembly: {
    durationToleranceSeconds: number;
    /** Added after the narration when a video is extended to fit it */
    audioPaddingSeconds: number;
  };
  dashboard: {
    port: number;
  };
}

// ── Process execution ──

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  /** Set when the process was killed at its timeout */
  timedOut?: boolean;
}

/** Merge stdout + stderr — many CLI tools write to either stream unpredictably */
export function combinedOutput(result: { stdout: string; stderr: string }): string {
  return [result.stdout, result.stderr].filter(Boolean).join('\n');
}

export interface ExecOptions {
  cwd?: string;
  /** Milliseconds; the process is killed when exceeded */
  timeout?: number;
}

export interface IShellExecutor {
  exec(command: string, options?: ExecOptions): Promise<ExecResult>;
}
