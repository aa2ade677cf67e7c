import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { TvConfig } from './types.js';

const DEFAULT_CONFIG: TvConfig = {
  outputRoot: path.resolve(process.cwd(), 'outputs'),
  pipeline: {
    maxRetries: 3,
    maxConcurrentScenes: 2,
    executionTimeoutSeconds: 180,
    strictMode: false,
    stopOnNoProgress: false,
  },
  llm: {
    model: 'claude-3-7-sonnet-20250219',
    maxTokens: 8000,
    temperature: 0,
    requestTimeoutMs: 600_000,
    retries: 3,
    retryDelayMs: 5_000,
  },
  render: {
    manimCommand: 'manim',
    pythonCommand: 'python3',
    quality: 'medium_quality',
  },
  tts: {
    languageCode: 'en-US',
    speakingRate: 1,
  },
  assembly: {
    durationToleranceSeconds: 0.5,
    audioPaddingSeconds: 0.5,
  },
  dashboard: {
    port: 9910,
  },
};

const positiveInt = z.number().int().positive();

const configSchema: z.ZodType<TvConfig> = z.object({
  outputRoot: z.string().min(1),
  pipeline: z.object({
    maxRetries: positiveInt,
    maxConcurrentScenes: positiveInt,
    executionTimeoutSeconds: z.number().positive(),
    strictMode: z.boolean(),
    stopOnNoProgress: z.boolean(),
  }),
  llm: z.object({
    model: z.string().min(1),
    maxTokens: positiveInt,
    temperature: z.number().min(0).max(1),
    requestTimeoutMs: positiveInt,
    retries: positiveInt,
    retryDelayMs: z.number().int().nonnegative(),
  }),
  render: z.object({
    manimCommand: z.string().min(1),
    pythonCommand: z.string().min(1),
    quality: z.enum(['low_quality', 'medium_quality', 'high_quality']),
  }),
  tts: z.object({
    languageCode: z.string().min(1),
    voiceName: z.string().min(1).optional(),
    speakingRate: z.number().min(0.25).max(4),
  }),
  assembly: z.object({
    durationToleranceSeconds: z.number().nonnegative(),
    audioPaddingSeconds: z.number().nonnegative(),
  }),
  dashboard: z.object({
    port: z.number().int().min(1).max(65535),
  }),
});

export function loadConfig(configPath?: string): TvConfig {
  // Priority: explicit arg → tv.config.json in cwd → defaults
  const candidates = [
    configPath,
    path.resolve(process.cwd(), 'tv.config.json'),
  ];

  for (const candidate of candidates) {
    if (candidate && fs.existsSync(candidate)) {
      const raw: unknown = JSON.parse(fs.readFileSync(candidate, 'utf-8'));
      const config = parseConfig(raw);
      console.log(`  Config loaded from: ${candidate}`);
      return config;
    }
  }

  console.log('  Config: using defaults (no tv.config.json found)');
  return structuredClone(DEFAULT_CONFIG);
}

/** Merge a partial override onto the defaults and validate the result */
export function parseConfig(override: unknown): TvConfig {
  if (!isPlainObject(override)) {
    throw new Error('Invalid config: expected a JSON object');
  }
  const merged = deepMerge(structuredClone(DEFAULT_CONFIG), override);
  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid config:\n${issues}`);
  }
  return parsed.data;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: object, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(override)) {
    const val = override[key];
    const current = result[key];
    if (isPlainObject(val)) {
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}
