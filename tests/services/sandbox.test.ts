import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { RepairLoop } from '../../src/services/repair-loop.js';
import { ExecutionSandbox, classifyFailure } from '../../src/services/sandbox.js';
import { MockShellExecutor, ShellExecutor } from '../../src/services/shell-executor.js';
import type { CodeArtifact, TvConfig } from '../../src/types.js';
import { FakeGenerator, makeScene, mockManim, mockProbe } from '../fixtures.js';

const render: TvConfig['render'] = { manimCommand: 'manim', pythonCommand: 'python3', quality: 'medium_quality' };
const COMPILE = 'python3 -m py_compile "scene.py"';

const artifact: CodeArtifact = {
  sceneIndex: 0,
  sourceCode: 'from manim import *\n\nclass Scene1_Step1(Scene):\n    def construct(self):\n        self.wait(1)\n',
  sceneClass: 'Scene1_Step1',
  attemptNumber: 1,
};

describe('classifyFailure', () => {
  it('should classify a timeout before anything in the output', () => {
    const failure = classifyFailure({ stdout: '', stderr: 'SyntaxError: x', exitCode: 1, timedOut: true }, 30);
    expect(failure.errorKind).toBe('RenderTimeout');
    expect(failure.errorDetail).toBe('Render exceeded 30s and was killed\nSyntaxError: x');
  });

  it('should classify missing commands and memory exhaustion as resource errors', () => {
    expect(classifyFailure({ stdout: '', stderr: 'sh: 1: manim: not found', exitCode: 127 }).errorKind).toBe('ResourceError');
    expect(classifyFailure({ stdout: '', stderr: 'MemoryError', exitCode: 1 }).errorKind).toBe('ResourceError');
    expect(classifyFailure({ stdout: '', stderr: 'OSError: [Errno 28] No space left on device', exitCode: 1 }).errorKind)
      .toBe('ResourceError');
  });

  it('should classify a render killed from outside as a resource error', async () => {
    const killed = await new ShellExecutor().exec('kill -9 $$');
    const failure = classifyFailure(killed);
    expect(failure.errorKind).toBe('ResourceError');
    expect(failure.errorDetail.startsWith('Exited with code 137')).toBe(true);
  });

  it('should classify syntax and indentation errors', () => {
    expect(classifyFailure({ stdout: '', stderr: 'IndentationError: unexpected indent', exitCode: 1 }).errorKind)
      .toBe('SyntaxError');
  });

  it('should classify everything else as a runtime error', () => {
    const failure = classifyFailure({ stdout: 'Rendering...', stderr: "NameError: name 'Circel' is not defined", exitCode: 1 });
    expect(failure).toEqual({
      kind: 'failure',
      errorKind: 'RuntimeError',
      errorDetail: "Exited with code 1\nRendering...\nNameError: name 'Circel' is not defined",
    });
  });

  it('should give the same classification for the same result', () => {
    const result = { stdout: 'log', stderr: 'TypeError: bad operand', exitCode: 1 };
    expect(classifyFailure(result)).toEqual(classifyFailure({ ...result }));
  });

  it('should keep only the tail of very long output', () => {
    const failure = classifyFailure({ stdout: '', stderr: `${'a'.repeat(9000)}LAST`, exitCode: 1 });
    expect(failure.errorDetail).toBe(`Exited with code 1\n...${'a'.repeat(7996)}LAST`);
  });
});

describe('ExecutionSandbox', () => {
  let tmpDir: string;
  let mediaDir: string;
  let mock: MockShellExecutor;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tv-sandbox-'));
    mediaDir = path.join(tmpDir, 'media');
    mock = new MockShellExecutor();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const makeSandbox = (codeDir?: string) =>
    new ExecutionSandbox(mock, { render, timeoutSeconds: 60, mediaDir, codeDir });

  it('should render, copy the video out and measure it', async () => {
    mockManim(mock);
    mockProbe(mock, () => 4.2);

    const result = await makeSandbox().execute(artifact);

    expect(result).toEqual({ kind: 'success', videoPath: path.join(mediaDir, 'scene_01.mp4'), duration: 4.2 });
    expect(fs.readFileSync(path.join(mediaDir, 'scene_01.mp4'), 'utf-8')).toBe('video');
    expect(mock.commands[0]).toBe(COMPILE);
    expect(mock.calls[1].command).toMatch(/^manim -qm "scene\.py" Scene1_Step1 --media_dir ".+\/media"$/);
    expect(mock.calls[1].options?.timeout).toBe(60_000);
  });

  it('should find the video in the default location when manim does not announce it', async () => {
    mockManim(mock, { announce: false });
    mockProbe(mock, () => 2);

    const result = await makeSandbox().execute(artifact);
    expect(result.kind).toBe('success');
  });

  it('should run in a fresh workspace and remove it afterwards', async () => {
    mockManim(mock);
    mockProbe(mock, () => 2);

    await makeSandbox().execute(artifact);

    const workspace = mock.calls[0].options?.cwd;
    expect(workspace).toBeDefined();
    expect(path.basename(workspace ?? '')).toMatch(/^tv-scene_01-/);
    expect(fs.existsSync(workspace ?? '')).toBe(false);
  });

  it('should stop at the syntax check without rendering', async () => {
    mock.addResponse(COMPILE, {
      stdout: '',
      stderr: '  File "scene.py", line 5\n    self.play(\nSyntaxError: unexpected EOF while parsing\n',
      exitCode: 1,
    });
    mockManim(mock);

    const result = await makeSandbox().execute(artifact);

    expect(result).toEqual({
      kind: 'failure',
      errorKind: 'SyntaxError',
      errorDetail: 'Exited with code 1\nFile "scene.py", line 5\n    self.play(\nSyntaxError: unexpected EOF while parsing',
    });
    expect(mock.commands).toEqual([COMPILE]);
  });

  it('should report a runtime error from the render', async () => {
    mock.addResponse(COMPILE, { stdout: '', stderr: '', exitCode: 0 });
    mock.addResponsePattern(/^manim /, () => ({
      stdout: '',
      stderr: "Traceback (most recent call last):\nNameError: name 'Circel' is not defined",
      exitCode: 1,
    }));

    const result = await makeSandbox().execute(artifact);

    expect(result.kind).toBe('failure');
    if (result.kind !== 'failure') return;
    expect(result.errorKind).toBe('RuntimeError');
    expect(result.errorDetail.endsWith("NameError: name 'Circel' is not defined")).toBe(true);
  });

  it('should report a killed render as RenderTimeout', async () => {
    mock.addResponse(COMPILE, { stdout: '', stderr: '', exitCode: 0 });
    mock.addResponsePattern(/^manim /, () => ({ stdout: '', stderr: '', exitCode: 1, timedOut: true }));

    const result = await makeSandbox().execute(artifact);

    expect(result).toEqual({ kind: 'failure', errorKind: 'RenderTimeout', errorDetail: 'Render exceeded 60s and was killed' });
  });

  it('should kill a real render that outlives its timeout', async () => {
    const sandbox = new ExecutionSandbox(new ShellExecutor(), {
      render: { manimCommand: 'sleep 5 #', pythonCommand: 'true', quality: 'low_quality' },
      timeoutSeconds: 0.3,
      mediaDir,
    });

    const result = await sandbox.execute(artifact);

    expect(result).toEqual({ kind: 'failure', errorKind: 'RenderTimeout', errorDetail: 'Render exceeded 0.3s and was killed' });
  });

  it('should report a clean exit without a video as a resource error', async () => {
    mock.addResponse(COMPILE, { stdout: '', stderr: '', exitCode: 0 });
    mock.addResponsePattern(/^manim /, () => ({ stdout: 'done', stderr: '', exitCode: 0 }));

    const result = await makeSandbox().execute(artifact);

    expect(result).toEqual({
      kind: 'failure',
      errorKind: 'ResourceError',
      errorDetail: 'Render exited cleanly but produced no video for Scene1_Step1\ndone',
    });
  });

  it('should report an unreadable video as a resource error', async () => {
    mockManim(mock);
    mockProbe(mock, () => undefined);

    const result = await makeSandbox().execute(artifact);

    expect(result.kind).toBe('failure');
    if (result.kind !== 'failure') return;
    expect(result.errorKind).toBe('ResourceError');
    expect(result.errorDetail.startsWith('ffprobe failed for ')).toBe(true);
  });

  it('should keep each attempt and its error output when a code dir is set', async () => {
    const codeDir = path.join(tmpDir, 'code');
    mock.addResponse(COMPILE, { stdout: '', stderr: '', exitCode: 0 });
    mock.addResponsePattern(/^manim /, () => ({ stdout: '', stderr: 'ValueError: negative radius', exitCode: 1 }));

    await makeSandbox(codeDir).execute({ ...artifact, sceneIndex: 2, attemptNumber: 2 });

    expect(fs.readFileSync(path.join(codeDir, 'scene_03_attempt_2.py'), 'utf-8')).toBe(artifact.sourceCode);
    expect(fs.readFileSync(path.join(codeDir, 'scene_03_attempt_2.error.txt'), 'utf-8')).toBe(
      'RuntimeError\nExited with code 1\nValueError: negative radius\n',
    );
  });

  it('should report an unusable media dir as a resource error instead of rejecting', async () => {
    fs.writeFileSync(mediaDir, 'not a directory');
    mockManim(mock);
    mockProbe(mock, () => 4);

    const result = await makeSandbox().execute(artifact);

    expect(result.kind).toBe('failure');
    if (result.kind !== 'failure') return;
    expect(result.errorKind).toBe('ResourceError');
    expect(result.errorDetail.startsWith('Sandbox filesystem error: ')).toBe(true);
    const workspace = mock.calls[0].options?.cwd ?? '';
    expect(fs.existsSync(workspace)).toBe(false);
  });

  it('should keep a successful render when the attempt cannot be saved for debugging', async () => {
    const codeDir = path.join(tmpDir, 'code');
    fs.writeFileSync(codeDir, 'not a directory');
    mockManim(mock);
    mockProbe(mock, () => 3);

    const result = await makeSandbox(codeDir).execute(artifact);

    expect(result).toEqual({ kind: 'success', videoPath: path.join(mediaDir, 'scene_01.mp4'), duration: 3 });
  });

  it('should let the repair loop retry after a filesystem failure', async () => {
    fs.writeFileSync(mediaDir, 'not a directory');
    mockManim(mock);
    mockProbe(mock, () => 4);
    const generator = new FakeGenerator();
    const loop = new RepairLoop(generator, makeSandbox(), { maxRetries: 3, stopOnNoProgress: false });

    const outcome = await loop.run({ theoremName: 'Pythagorean Theorem', theoremDescription: '' }, makeScene(0));

    expect(outcome.phase).toBe('failed');
    if (outcome.phase !== 'failed') return;
    expect(outcome.attemptNumber).toBe(3);
    expect(outcome.reason).toMatch(/^ResourceError after 3 attempt\(s\): Sandbox filesystem error: /);
    expect(generator.requests).toHaveLength(3);
  });
});
