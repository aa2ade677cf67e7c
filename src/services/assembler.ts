import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { AssemblyError, errorMessage } from '../errors.js';
import type { AssembledVideo, IAssembler, IShellExecutor, SceneResult, TvConfig } from '../types.js';
import { combinedOutput } from '../types.js';
import { probeDuration, sceneStem } from './media-probe.js';

const ENCODE_FLAGS = '-c:v libx264 -crf 18 -preset medium -pix_fmt yuv420p -c:a aac -b:a 192k';
const FFMPEG_TIMEOUT_MS = 600_000;

interface SegmentPlan {
  result: SceneResult;
  /** Seconds of last-frame hold appended to the video */
  extension: number;
  target: number;
}

function seconds(value: number): string {
  return value.toFixed(3);
}

/** Line for the ffmpeg concat demuxer */
function concatEntry(filePath: string): string {
  return `file '${path.resolve(filePath).replace(/'/g, `'\\''`)}'`;
}

export class AssemblerService implements IAssembler {
  constructor(
    private readonly shell: IShellExecutor,
    private readonly settings: TvConfig['assembly'],
  ) {}

  /**
   * Mux every scene's narration onto its video and concatenate the segments in
   * ascending scene order. `expectedIndices` is the exact set of scenes the
   * output must contain.
   */
  async assemble(
    results: readonly SceneResult[],
    outputPath: string,
    expectedIndices: readonly number[],
  ): Promise<AssembledVideo> {
    const ordered = this.validate(results, expectedIndices);
    const segments = ordered.map((result) => this.planSegment(result));

    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tv-assembly-'));
    try {
      const segmentPaths: string[] = [];
      for (const segment of segments) {
        segmentPaths.push(await this.renderSegment(segment, tmpDir));
      }

      const listPath = path.join(tmpDir, 'segments.txt');
      await fs.writeFile(listPath, segmentPaths.map(concatEntry).join('\n') + '\n', 'utf-8');

      const concat = await this.shell.exec(
        `ffmpeg -y -f concat -safe 0 -i "${listPath}" -c copy "${outputPath}"`,
        { timeout: FFMPEG_TIMEOUT_MS },
      );
      if (concat.exitCode !== 0) {
        throw new AssemblyError(`Concatenation failed:\n${combinedOutput(concat)}`);
      }

      const expected = segments.reduce((sum, segment) => sum + segment.target, 0);
      const duration = await this.measure(outputPath, 'final video');
      const tolerance = this.settings.durationToleranceSeconds * segments.length;
      if (Math.abs(duration - expected) > tolerance) {
        throw new AssemblyError(
          `Final video is ${seconds(duration)}s, expected ${seconds(expected)}s (tolerance ${seconds(tolerance)}s)`,
        );
      }

      return {
        outputPath,
        duration,
        sceneOrder: ordered.map((result) => result.sceneIndex),
      };
    } finally {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  }

  private validate(results: readonly SceneResult[], expectedIndices: readonly number[]): SceneResult[] {
    if (results.length === 0) {
      throw new AssemblyError('Nothing to assemble: no scene results');
    }

    const seen = new Set<number>();
    for (const result of results) {
      if (seen.has(result.sceneIndex)) {
        throw new AssemblyError(`Scene ${result.sceneIndex} appears more than once`);
      }
      seen.add(result.sceneIndex);
    }

    const expected = new Set(expectedIndices);
    const missing = [...expected].filter((index) => !seen.has(index)).sort((a, b) => a - b);
    const unexpected = [...seen].filter((index) => !expected.has(index)).sort((a, b) => a - b);
    if (missing.length > 0 || unexpected.length > 0) {
      const parts = [
        missing.length > 0 ? `missing scene(s) ${missing.join(', ')}` : '',
        unexpected.length > 0 ? `unexpected scene(s) ${unexpected.join(', ')}` : '',
      ].filter(Boolean);
      throw new AssemblyError(`Scene set mismatch: ${parts.join('; ')}`);
    }

    return [...results].sort((a, b) => a.sceneIndex - b.sceneIndex);
  }

  /** A video shorter than its narration holds its last frame until the narration ends, plus padding */
  private planSegment(result: SceneResult): SegmentPlan {
    if (result.videoDuration < result.audioDuration) {
      const target = result.audioDuration + this.settings.audioPaddingSeconds;
      return { result, extension: target - result.videoDuration, target };
    }
    return { result, extension: 0, target: result.videoDuration };
  }

  private async renderSegment(segment: SegmentPlan, tmpDir: string): Promise<string> {
    const { result, extension, target } = segment;
    const segmentPath = path.join(tmpDir, `${sceneStem(result.sceneIndex)}.mp4`);

    const args = [
      'ffmpeg -y',
      `-i "${result.videoPath}"`,
      `-i "${result.audioPath}"`,
      '-map 0:v:0 -map 1:a:0',
      ...(extension > 0 ? [`-vf "tpad=stop_mode=clone:stop_duration=${seconds(extension)}"`] : []),
      '-af apad',
      `-t ${seconds(target)}`,
      ENCODE_FLAGS,
      `"${segmentPath}"`,
    ];
    const mux = await this.shell.exec(args.join(' '), { timeout: FFMPEG_TIMEOUT_MS });
    if (mux.exitCode !== 0) {
      throw new AssemblyError(`Muxing scene ${result.sceneIndex} failed:\n${combinedOutput(mux)}`);
    }

    const duration = await this.measure(segmentPath, `scene ${result.sceneIndex} segment`);
    if (Math.abs(duration - target) > this.settings.durationToleranceSeconds) {
      throw new AssemblyError(
        `Scene ${result.sceneIndex} segment is ${seconds(duration)}s, expected ${seconds(target)}s`,
      );
    }
    return segmentPath;
  }

  private async measure(filePath: string, label: string): Promise<number> {
    try {
      return await probeDuration(this.shell, filePath);
    } catch (err) {
      throw new AssemblyError(`Cannot measure ${label}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
