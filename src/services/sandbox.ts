import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { errorMessage } from '../errors.js';
import type {
  CodeArtifact,
  ExecResult,
  ExecutionFailure,
  ExecutionFailureKind,
  ExecutionResult,
  IExecutionSandbox,
  IShellExecutor,
  RenderQuality,
  TvConfig,
} from '../types.js';
import { combinedOutput } from '../types.js';
import { probeDuration, sceneStem } from './media-probe.js';

const QUALITY: Record<RenderQuality, { flag: string; folder: string }> = {
  low_quality: { flag: '-ql', folder: '480p15' },
  medium_quality: { flag: '-qm', folder: '720p30' },
  high_quality: { flag: '-qh', folder: '1080p60' },
};

const SCRIPT_NAME = 'scene.py';
const MAX_DETAIL_CHARS = 8000;
const SYNTAX_CHECK_TIMEOUT_MS = 30_000;

const RESOURCE_PATTERN = /MemoryError|Cannot allocate memory|No space left on device|ENOSPC|ENOMEM|Too many open files|command not found|^Killed\b/m;
const SYNTAX_PATTERN = /\b(?:SyntaxError|IndentationError|TabError)\b/;

export interface SandboxOptions {
  render: TvConfig['render'];
  timeoutSeconds: number;
  /** Successful renders land here as `scene_NN.mp4` */
  mediaDir: string;
  /** When set, every attempt's source and failure output are kept here */
  codeDir?: string;
}

function tail(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > MAX_DETAIL_CHARS ? `...${trimmed.slice(-MAX_DETAIL_CHARS)}` : trimmed;
}

/**
 * Classify a failed process run. Depends only on the result, so the same
 * failure always gets the same kind.
 */
export function classifyFailure(result: ExecResult, timeoutSeconds?: number): ExecutionFailure {
  const output = combinedOutput(result);
  let errorKind: ExecutionFailureKind;

  if (result.timedOut) {
    errorKind = 'RenderTimeout';
  } else if (result.exitCode === 127 || result.exitCode === 137 || RESOURCE_PATTERN.test(output)) {
    errorKind = 'ResourceError';
  } else if (SYNTAX_PATTERN.test(output)) {
    errorKind = 'SyntaxError';
  } else {
    errorKind = 'RuntimeError';
  }

  const header = errorKind === 'RenderTimeout'
    ? `Render exceeded ${timeoutSeconds ?? '?'}s and was killed`
    : `Exited with code ${result.exitCode}`;
  const detail = tail(output);
  return { kind: 'failure', errorKind, errorDetail: detail ? `${header}\n${detail}` : header };
}

export class ExecutionSandbox implements IExecutionSandbox {
  constructor(
    private readonly shell: IShellExecutor,
    private readonly options: SandboxOptions,
  ) {}

  async execute(artifact: CodeArtifact): Promise<ExecutionResult> {
    const stem = sceneStem(artifact.sceneIndex);
    let workspace: string | null = null;
    let result: ExecutionResult;
    try {
      workspace = await fs.mkdtemp(path.join(os.tmpdir(), `tv-${stem}-`));
      result = await this.runIn(workspace, artifact);
    } catch (err) {
      // a broken workspace or media dir is an attempt failure, never a rejection
      result = {
        kind: 'failure',
        errorKind: 'ResourceError',
        errorDetail: `Sandbox filesystem error: ${errorMessage(err)}`,
      };
    } finally {
      if (workspace) await fs.rm(workspace, { recursive: true, force: true });
    }

    try {
      await this.keepForDebugging(artifact, result);
    } catch (err) {
      console.log(
        `  [scene ${artifact.sceneIndex}] could not keep attempt ${artifact.attemptNumber} for debugging: ${errorMessage(err)}`,
      );
    }
    return result;
  }

  private async runIn(workspace: string, artifact: CodeArtifact): Promise<ExecutionResult> {
    const { render, timeoutSeconds } = this.options;
    await fs.writeFile(path.join(workspace, SCRIPT_NAME), artifact.sourceCode, 'utf-8');

    const compile = await this.shell.exec(`${render.pythonCommand} -m py_compile "${SCRIPT_NAME}"`, {
      cwd: workspace,
      timeout: SYNTAX_CHECK_TIMEOUT_MS,
    });
    if (compile.exitCode !== 0) {
      const failure = classifyFailure(compile, SYNTAX_CHECK_TIMEOUT_MS / 1000);
      return failure.errorKind === 'RuntimeError' ? { ...failure, errorKind: 'SyntaxError' } : failure;
    }

    const quality = QUALITY[render.quality];
    const workMedia = path.join(workspace, 'media');
    const renderResult = await this.shell.exec(
      `${render.manimCommand} ${quality.flag} "${SCRIPT_NAME}" ${artifact.sceneClass} --media_dir "${workMedia}"`,
      { cwd: workspace, timeout: timeoutSeconds * 1000 },
    );
    if (renderResult.exitCode !== 0 || renderResult.timedOut) {
      return classifyFailure(renderResult, timeoutSeconds);
    }

    const rendered = await this.locateOutput(renderResult.stdout, workMedia, quality.folder, artifact.sceneClass);
    if (!rendered) {
      return {
        kind: 'failure',
        errorKind: 'ResourceError',
        errorDetail: `Render exited cleanly but produced no video for ${artifact.sceneClass}\n${tail(combinedOutput(renderResult))}`,
      };
    }

    await fs.mkdir(this.options.mediaDir, { recursive: true });
    const videoPath = path.join(this.options.mediaDir, `${sceneStem(artifact.sceneIndex)}.mp4`);
    await fs.copyFile(rendered, videoPath);

    try {
      const duration = await probeDuration(this.shell, videoPath);
      return { kind: 'success', videoPath, duration };
    } catch (err) {
      return {
        kind: 'failure',
        errorKind: 'ResourceError',
        errorDetail: errorMessage(err),
      };
    }
  }

  private async locateOutput(stdout: string, workMedia: string, folder: string, sceneClass: string): Promise<string | null> {
    const candidates: string[] = [];
    const written = /File\s+written\s+to:?\s*'?([^'\n]+\.mp4)/.exec(stdout);
    if (written) candidates.push(written[1].trim());
    candidates.push(path.join(workMedia, 'videos', 'scene', folder, `${sceneClass}.mp4`));

    for (const candidate of candidates) {
      if (await exists(candidate)) return candidate;
    }
    return null;
  }

  private async keepForDebugging(artifact: CodeArtifact, result: ExecutionResult): Promise<void> {
    const { codeDir } = this.options;
    if (!codeDir) return;

    const base = path.join(codeDir, `${sceneStem(artifact.sceneIndex)}_attempt_${artifact.attemptNumber}`);
    await fs.mkdir(codeDir, { recursive: true });
    await fs.writeFile(`${base}.py`, artifact.sourceCode, 'utf-8');
    if (result.kind === 'failure') {
      await fs.writeFile(`${base}.error.txt`, `${result.errorKind}\n${result.errorDetail}\n`, 'utf-8');
    }
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
