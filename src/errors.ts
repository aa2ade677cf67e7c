import type { PipelineReport } from './types.js';

/** The LLM was unavailable or returned something that is not usable code */
export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

/** The TTS backend failed, or its output could not be measured */
export class SynthesisError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SynthesisError';
  }
}

/** Segments are missing, duplicated, or their durations drifted beyond tolerance */
export class AssemblyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AssemblyError';
  }
}

/** Fatal for the whole run. Carries the report when one was produced. */
export class PipelineError extends Error {
  readonly report?: PipelineReport;

  constructor(message: string, options?: { cause?: unknown; report?: PipelineReport }) {
    super(message, { cause: options?.cause });
    this.name = 'PipelineError';
    this.report = options?.report;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
