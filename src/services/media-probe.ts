import type { IShellExecutor } from '../types.js';
import { combinedOutput } from '../types.js';

/** Duration of a media file in seconds, read with ffprobe */
export async function probeDuration(shell: IShellExecutor, filePath: string): Promise<number> {
  const result = await shell.exec(
    `ffprobe -v error -show_entries format=duration -of default=noprint_wrappers=1:nokey=1 "${filePath}"`,
    { timeout: 30_000 },
  );
  if (result.exitCode !== 0) {
    throw new Error(`ffprobe failed for "${filePath}":\n${combinedOutput(result)}`);
  }

  const duration = Number.parseFloat(result.stdout.trim());
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new Error(`ffprobe returned no usable duration for "${filePath}": "${result.stdout.trim()}"`);
  }
  return duration;
}

/** `scene_01` for index 0 — file stem shared by every per-scene artifact */
export function sceneStem(sceneIndex: number): string {
  return `scene_${String(sceneIndex + 1).padStart(2, '0')}`;
}
