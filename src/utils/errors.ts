/**
 * Error taxonomy for the voiceover build.
 *
 * Backend adapters throw TransientSynthesisError / FatalSynthesisError; the
 * synthesizer turns either into a SynthesisFailure once it gives up. Cache
 * problems surface as CacheIOError and are only ever logged.
 */

export class AppError extends Error {
  readonly details: Record<string, unknown>;

  constructor(message: string, options: { cause?: unknown; details?: Record<string, unknown> } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.details = options.details ?? {};
  }
}

/** Rejected configuration. Raised before any synthesis starts. */
export class ConfigurationError extends AppError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, { details: { issues } });
    this.issues = issues;
  }
}

/** Network, timeout or rate-limit failure. Worth another attempt. */
export class TransientSynthesisError extends AppError {
  readonly status?: number;

  constructor(message: string, options: { cause?: unknown; status?: number } = {}) {
    super(message, { cause: options.cause, details: { status: options.status } });
    this.status = options.status;
  }
}

/** Auth or malformed-request failure. Retrying cannot help. */
export class FatalSynthesisError extends AppError {
  readonly status?: number;

  constructor(message: string, options: { cause?: unknown; status?: number } = {}) {
    super(message, { cause: options.cause, details: { status: options.status } });
    this.status = options.status;
  }
}

export interface SynthesisFailureContext {
  provider: string;
  attempts: number;
  textPreview: string;
  cueIndex?: number;
  chunkIndex?: number;
}

/** The backend could not produce audio for a request. Aborts the build. */
export class SynthesisFailure extends AppError {
  readonly provider: string;
  readonly attempts: number;
  readonly textPreview: string;
  readonly cueIndex?: number;
  readonly chunkIndex?: number;

  constructor(context: SynthesisFailureContext, cause: unknown) {
    const where = context.cueIndex !== undefined
      ? ` for cue ${context.cueIndex}${context.chunkIndex !== undefined ? ` (chunk ${context.chunkIndex + 1})` : ''}`
      : '';
    super(
      `Speech synthesis via ${context.provider} failed${where} after ${context.attempts} attempt(s): ${describeError(cause)}`,
      { cause, details: { ...context } }
    );
    this.provider = context.provider;
    this.attempts = context.attempts;
    this.textPreview = context.textPreview;
    this.cueIndex = context.cueIndex;
    this.chunkIndex = context.chunkIndex;
  }

  /** Same failure, annotated with the cue and chunk it belongs to. */
  forCue(cueIndex: number, chunkIndex: number): SynthesisFailure {
    return new SynthesisFailure(
      {
        provider: this.provider,
        attempts: this.attempts,
        textPreview: this.textPreview,
        cueIndex,
        chunkIndex,
      },
      this.cause
    );
  }
}

/** Cache storage could not be read or written. Never fatal. */
export class CacheIOError extends AppError {
  readonly key: string;

  constructor(key: string, operation: 'read' | 'write', cause: unknown) {
    super(`Cache ${operation} failed for ${key}: ${describeError(cause)}`, { cause, details: { key, operation } });
    this.key = key;
  }
}

export class SubtitleParseError extends AppError {
  readonly block: number;

  constructor(block: number, message: string) {
    super(`Subtitle block ${block}: ${message}`, { details: { block } });
    this.block = block;
  }
}

export class AudioCodecError extends AppError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
