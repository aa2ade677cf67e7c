import fs from 'node:fs/promises';
import path from 'node:path';
import { TextToSpeechClient } from '@google-cloud/text-to-speech';
import { SynthesisError, errorMessage } from '../errors.js';
import type { INarrationService, IShellExecutor, ITtsBackend, NarrationArtifact, Scene, TvConfig } from '../types.js';
import { probeDuration, sceneStem } from './media-probe.js';

/** Planner narration often arrives wrapped in quotes */
export function cleanNarration(text: string): string {
  return text.trim().replace(/^["'“”‘’]+|["'“”‘’]+$/g, '').trim();
}

/**
 * Cloud Text-to-Speech backend. Credentials come from the standard
 * GOOGLE_APPLICATION_CREDENTIALS lookup; the client is created on first use.
 */
export class GoogleCloudTtsBackend implements ITtsBackend {
  private client: TextToSpeechClient | null = null;

  constructor(private readonly settings: TvConfig['tts']) {}

  async synthesize(text: string, outputPath: string): Promise<void> {
    const client = this.getClient();
    const [response] = await client.synthesizeSpeech({
      input: { text },
      voice: {
        languageCode: this.settings.languageCode,
        ...(this.settings.voiceName ? { name: this.settings.voiceName } : {}),
      },
      audioConfig: { audioEncoding: 'MP3', speakingRate: this.settings.speakingRate },
    });

    const audio = response.audioContent;
    if (!audio || audio.length === 0) {
      throw new Error('Cloud TTS returned no audio content');
    }
    const bytes = typeof audio === 'string' ? Buffer.from(audio, 'base64') : Buffer.from(audio);
    await fs.writeFile(outputPath, bytes);
  }

  private getClient(): TextToSpeechClient {
    if (!this.client) {
      this.client = new TextToSpeechClient();
    }
    return this.client;
  }
}

export class NarrationService implements INarrationService {
  constructor(
    private readonly backend: ITtsBackend,
    private readonly shell: IShellExecutor,
    private readonly audioDir: string,
  ) {}

  async synthesize(scene: Scene): Promise<NarrationArtifact> {
    const text = cleanNarration(scene.narrationText);
    if (!text) {
      throw new SynthesisError(`Scene ${scene.index} has no narration text`);
    }

    const audioPath = path.join(this.audioDir, `${sceneStem(scene.index)}.mp3`);
    try {
      await fs.mkdir(this.audioDir, { recursive: true });
      await this.backend.synthesize(text, audioPath);
    } catch (err) {
      throw new SynthesisError(`TTS failed for scene ${scene.index}: ${errorMessage(err)}`, { cause: err });
    }

    let duration: number;
    try {
      duration = await probeDuration(this.shell, audioPath);
    } catch (err) {
      throw new SynthesisError(`Narration for scene ${scene.index} is unreadable: ${errorMessage(err)}`, { cause: err });
    }

    return Object.freeze({ sceneIndex: scene.index, audioPath, duration });
  }
}

/** Writes the text itself as the "audio"; records every call */
export class MockTtsBackend implements ITtsBackend {
  readonly calls: Array<{ text: string; outputPath: string }> = [];
  private failures = new Set<string>();

  failOn(text: string): void {
    this.failures.add(text);
  }

  async synthesize(text: string, outputPath: string): Promise<void> {
    this.calls.push({ text, outputPath });
    if (this.failures.has(text)) {
      throw new Error('TTS quota exceeded');
    }
    await fs.writeFile(outputPath, text, 'utf-8');
  }
}
