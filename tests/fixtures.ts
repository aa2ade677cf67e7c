import fs from 'node:fs';
import path from 'node:path';
import { GenerationError } from '../src/errors.js';
import type { MockLlmClient } from '../src/services/llm-client.js';
import type { MockShellExecutor } from '../src/services/shell-executor.js';
import { createScenePlan } from '../src/services/scene-plan.js';
import type {
  AssembledVideo,
  CodeArtifact,
  ExecutionResult,
  GenerationRequest,
  IAssembler,
  ICodeGenerator,
  IExecutionSandbox,
  INarrationService,
  NarrationArtifact,
  Scene,
  ScenePlan,
  SceneResult,
  TvConfig,
} from '../src/types.js';

export const makeConfig = (outputRoot = '/out'): TvConfig => ({
  outputRoot,
  pipeline: {
    maxRetries: 3,
    maxConcurrentScenes: 2,
    executionTimeoutSeconds: 60,
    strictMode: false,
    stopOnNoProgress: false,
  },
  llm: {
    model: 'test-model',
    maxTokens: 1000,
    temperature: 0,
    requestTimeoutMs: 1000,
    retries: 1,
    retryDelayMs: 0,
  },
  render: { manimCommand: 'manim', pythonCommand: 'python3', quality: 'medium_quality' },
  tts: { languageCode: 'en-US', speakingRate: 1 },
  assembly: { durationToleranceSeconds: 0.5, audioPaddingSeconds: 0.5 },
  dashboard: { port: 9910 },
});

export const makeScene = (index: number, overrides?: Partial<Scene>): Scene => ({
  index,
  title: `Step ${index + 1}`,
  narrationText: `Narration for step ${index + 1}.`,
  intent: `Animate step ${index + 1}`,
  objective: `Understand step ${index + 1}`,
  ...overrides,
});

export const makePlan = (count: number): ScenePlan =>
  createScenePlan({
    theoremName: 'Pythagorean Theorem',
    theoremDescription: 'a^2 + b^2 = c^2 for right triangles',
    scenes: Array.from({ length: count }, (_, i) => makeScene(i)),
  });

export const PLAN_REPLY = `Here is the plan.

SCENE PLAN BEGIN:
[Scene 1]
Title: Right Triangles
Purpose: Recall what a right triangle is
Description: Draw a triangle
with a right angle marker
Layout: centered
Narration: "A right triangle has one ninety degree angle."

[Scene 2]
Scene Title: The Squares
Purpose: See the squares on each side
Description: Grow a square on every side
Narration Script: Each side gets a square of its own.
SCENE PLAN END:
`;

export const manimReply = (sceneClass: string, body = 'self.wait(1)'): string =>
  `Here is the scene:\n\n\`\`\`python\nfrom manim import *\n\nclass ${sceneClass}(Scene):\n    def construct(self):\n        ${body}\n\`\`\`\n`;

/** Returns artifacts without calling a model; fails where `failOn` says so */
export class FakeGenerator implements ICodeGenerator {
  readonly requests: GenerationRequest[] = [];

  constructor(private readonly failOn: (sceneIndex: number, attemptNumber: number) => boolean = () => false) {}

  async generate(request: GenerationRequest): Promise<CodeArtifact> {
    this.requests.push(request);
    const { scene, attemptNumber } = request;
    if (this.failOn(scene.index, attemptNumber)) {
      throw new GenerationError(`model unavailable (scene ${scene.index}, attempt ${attemptNumber})`);
    }
    return {
      sceneIndex: scene.index,
      sourceCode: `# scene ${scene.index} attempt ${attemptNumber}`,
      sceneClass: `Scene${scene.index + 1}_Test`,
      attemptNumber,
    };
  }
}

export const success = (sceneIndex: number, duration = 4): ExecutionResult => ({
  kind: 'success',
  videoPath: `/media/scene_${sceneIndex}.mp4`,
  duration,
});

export const failure = (detail = 'NameError: name "Circel" is not defined'): ExecutionResult => ({
  kind: 'failure',
  errorKind: 'RuntimeError',
  errorDetail: detail,
});

/** Result decided per (scene, attempt); tracks how many runs overlap */
export class ScriptedSandbox implements IExecutionSandbox {
  readonly executed: CodeArtifact[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly script: (sceneIndex: number, attemptNumber: number) => ExecutionResult,
    private readonly delayMs = 0,
  ) {}

  async execute(artifact: CodeArtifact): Promise<ExecutionResult> {
    this.executed.push(artifact);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      }
      return this.script(artifact.sceneIndex, artifact.attemptNumber);
    } finally {
      this.inFlight--;
    }
  }
}

export class FakeNarration implements INarrationService {
  readonly synthesized: number[] = [];

  constructor(
    private readonly duration = 3,
    private readonly failFor: ReadonlySet<number> = new Set<number>(),
  ) {}

  async synthesize(scene: Scene): Promise<NarrationArtifact> {
    this.synthesized.push(scene.index);
    if (this.failFor.has(scene.index)) {
      throw new Error('TTS quota exceeded');
    }
    return { sceneIndex: scene.index, audioPath: `/audio/scene_${scene.index}.mp3`, duration: this.duration };
  }
}

export class FakeAssembler implements IAssembler {
  readonly calls: Array<{ results: SceneResult[]; outputPath: string; expectedIndices: number[] }> = [];

  constructor(private readonly error?: Error) {}

  async assemble(
    results: readonly SceneResult[],
    outputPath: string,
    expectedIndices: readonly number[],
  ): Promise<AssembledVideo> {
    this.calls.push({ results: [...results], outputPath, expectedIndices: [...expectedIndices] });
    if (this.error) throw this.error;
    const ordered = [...results].sort((a, b) => a.sceneIndex - b.sceneIndex);
    return {
      outputPath,
      duration: ordered.reduce((sum, r) => sum + Math.max(r.videoDuration, r.audioDuration), 0),
      sceneOrder: ordered.map((r) => r.sceneIndex),
    };
  }
}

/**
 * Stand-in for a working manim install: py_compile passes, and rendering writes a
 * placeholder file where manim would.
 */
export function mockManim(mock: MockShellExecutor, options: { announce?: boolean } = {}): void {
  mock.addResponsePattern(/-m py_compile/, () => ({ stdout: '', stderr: '', exitCode: 0 }));
  mock.addResponsePattern(/^manim -q[lmh] "scene\.py" (\w+) --media_dir "([^"]+)"$/, (match) => {
    const dir = path.join(match[2], 'videos', 'scene', '720p30');
    fs.mkdirSync(dir, { recursive: true });
    const file = path.join(dir, `${match[1]}.mp4`);
    fs.writeFileSync(file, 'video');
    return {
      stdout: options.announce === false ? 'Rendered.\n' : `File written to: ${file}\n`,
      stderr: '',
      exitCode: 0,
    };
  });
}

/** ffprobe answers from `durationFor(path)`; undefined means the probe fails */
export function mockProbe(mock: MockShellExecutor, durationFor: (filePath: string) => number | undefined): void {
  mock.addResponsePattern(/^ffprobe .* "([^"]+)"$/, (match) => {
    const duration = durationFor(match[1]);
    return duration === undefined
      ? { stdout: '', stderr: `${match[1]}: Invalid data found when processing input`, exitCode: 1 }
      : { stdout: `${duration}\n`, stderr: '', exitCode: 0 };
  });
}

/**
 * Every external tool a full run touches: the planner and coder replies, manim,
 * ffprobe (video 4s, narration 3s, final 4s per scene) and ffmpeg.
 */
export function mockPipeline(
  mock: MockShellExecutor,
  llm: MockLlmClient,
  options: { sceneCount?: number; beforePlan?: () => Promise<void> } = {},
): void {
  const { sceneCount = 2, beforePlan } = options;
  llm.addReply(async () => {
    await beforePlan?.();
    return PLAN_REPLY;
  });
  llm.setFallback(() => manimReply('GeneratedScene'));
  mockManim(mock);
  mockProbe(mock, (file) => {
    if (file.endsWith('.mp3')) return 3;
    if (file.endsWith('_explanation.mp4')) return 4 * sceneCount;
    return 4;
  });
  mock.addResponsePattern(/^ffmpeg /, () => ({ stdout: '', stderr: '', exitCode: 0 }));
}
