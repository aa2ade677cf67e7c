import Anthropic from '@anthropic-ai/sdk';
import { setTimeout as sleep } from 'node:timers/promises';
import { errorMessage } from '../errors.js';
import type { TvConfig } from '../types.js';

export interface LlmRequest {
  system?: string;
  prompt: string;
  maxTokens?: number;
  temperature?: number;
}

export interface ILlmClient {
  /** Text of the model's reply */
  complete(request: LlmRequest): Promise<string>;
}

/**
 * Run `task` up to `attempts` times, waiting `delayMs` between failures.
 * The last error is rethrown.
 */
export async function withRetries<T>(
  label: string,
  attempts: number,
  delayMs: number,
  task: () => Promise<T>,
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await task();
    } catch (err) {
      lastError = err;
      console.log(`  [${label}] attempt ${attempt}/${attempts} failed: ${errorMessage(err)}`);
      if (attempt < attempts && delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
  throw lastError;
}

export class AnthropicLlmClient implements ILlmClient {
  private readonly client: Anthropic;

  constructor(
    apiKey: string,
    private readonly settings: TvConfig['llm'],
  ) {
    // Retries are ours (fixed delay), not the SDK's backoff
    this.client = new Anthropic({ apiKey, timeout: settings.requestTimeoutMs, maxRetries: 0 });
  }

  async complete(request: LlmRequest): Promise<string> {
    const { model, maxTokens, temperature, retries, retryDelayMs } = this.settings;

    return withRetries('llm', retries, retryDelayMs, async () => {
      const response = await this.client.messages.create({
        model,
        max_tokens: request.maxTokens ?? maxTokens,
        temperature: request.temperature ?? temperature,
        ...(request.system ? { system: request.system } : {}),
        messages: [{ role: 'user', content: request.prompt }],
      });

      const text = response.content
        .flatMap((block) => (block.type === 'text' ? [block.text] : []))
        .join('');
      if (!text.trim()) {
        throw new Error(`Empty response from ${model} (stop_reason: ${response.stop_reason ?? 'unknown'})`);
      }
      return text;
    });
  }
}

type ReplyHandler = (request: LlmRequest) => string | Promise<string>;

/** Scripted replies, consumed in order; the fallback answers once the queue is empty */
export class MockLlmClient implements ILlmClient {
  readonly requests: LlmRequest[] = [];
  private queue: ReplyHandler[] = [];
  private fallback: ReplyHandler | null = null;

  addReply(reply: string | ReplyHandler): void {
    this.queue.push(typeof reply === 'string' ? () => reply : reply);
  }

  addFailure(message: string): void {
    this.queue.push(() => {
      throw new Error(message);
    });
  }

  setFallback(reply: ReplyHandler): void {
    this.fallback = reply;
  }

  async complete(request: LlmRequest): Promise<string> {
    this.requests.push(request);
    const next = this.queue.shift() ?? this.fallback;
    if (!next) {
      throw new Error('No scripted LLM reply left');
    }
    return next(request);
  }
}
