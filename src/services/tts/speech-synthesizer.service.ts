import { logger } from '../../config/logger';
import {
  FatalSynthesisError,
  SynthesisFailure,
  TransientSynthesisError,
  describeError,
} from '../../utils/errors';
import type { AudioCodec } from '../audio/audio-codec.service';
import { changePlaybackSpeed } from '../audio/audio-segment';
import type { AudioSegment } from '../audio/audio-segment';
import type { SynthesisCache, SynthesisFingerprint } from './synthesis-cache.service';
import type { SynthesisBackend } from './tts-provider.interface';

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
};

export interface SpeechSynthesizerOptions {
  backend: SynthesisBackend;
  cache: SynthesisCache;
  codec: AudioCodec;
  retry?: Partial<RetryPolicy>;
  /** Injected for tests; defaults to setTimeout */
  sleep?: (ms: number) => Promise<void>;
}

export interface SynthesizerStats {
  backendCalls: number;
  cacheHits: number;
  cacheMisses: number;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function preview(text: string): string {
  return text.length > 60 ? `${text.slice(0, 57)}...` : text;
}

/** Exponential backoff for the wait after failed attempt number `attempt` (1-based). */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

// ===========================================================================
// Speech Synthesizer
//
// cache lookup → backend call with bounded retry → decode → cache write →
// optional speed change. Speed is applied to decoded audio, so one cached
// entry serves every speed.
// ===========================================================================

export class SpeechSynthesizer {
  private readonly backend: SynthesisBackend;
  private readonly cache: SynthesisCache;
  private readonly codec: AudioCodec;
  private readonly retry: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly counters: SynthesizerStats = { backendCalls: 0, cacheHits: 0, cacheMisses: 0 };

  constructor(options: SpeechSynthesizerOptions) {
    this.backend = options.backend;
    this.cache = options.cache;
    this.codec = options.codec;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.sleep = options.sleep ?? defaultSleep;

    if (!Number.isInteger(this.retry.maxAttempts) || this.retry.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.retry.maxAttempts}`);
    }
  }

  get provider(): string {
    return this.backend.provider;
  }

  get outputFormat(): string {
    return this.backend.outputFormat;
  }

  get stats(): SynthesizerStats {
    return { ...this.counters };
  }

  fingerprintFor(text: string): SynthesisFingerprint {
    return {
      provider: this.backend.provider,
      providerConfig: this.backend.cacheFingerprint,
      text,
      fileExtension: this.backend.outputFormat,
    };
  }

  /**
   * Synthesize `text` and return it decoded, played back at `speed`.
   * Throws SynthesisFailure when the backend cannot deliver.
   */
  async synthesize(text: string, speed: number = 1.0): Promise<AudioSegment> {
    if (!(speed > 0) || !Number.isFinite(speed)) {
      throw new RangeError(`Playback speed must be greater than zero, got ${speed}`);
    }

    const segment = await this.loadSegment(text);
    return changePlaybackSpeed(segment, speed);
  }

  private async loadSegment(text: string): Promise<AudioSegment> {
    const fingerprint = this.fingerprintFor(text);

    const cached = await this.cache.get(fingerprint);
    if (cached) {
      try {
        const segment = await this.decode(cached);
        this.counters.cacheHits++;
        return segment;
      } catch (error: unknown) {
        logger.warn(`Cached audio for "${preview(text)}" failed to decode, re-synthesizing: ${describeError(error)}`);
        await this.cache.invalidate(fingerprint);
      }
    }

    this.counters.cacheMisses++;
    const { bytes, attempts } = await this.requestSpeech(text);

    let segment: AudioSegment;
    try {
      segment = await this.decode(bytes);
    } catch (error: unknown) {
      // Undecodable payloads never reach the cache
      await this.cache.invalidate(fingerprint);
      logger.error(`${this.backend.provider} returned audio that failed to decode: ${describeError(error)}`);
      throw new SynthesisFailure(
        { provider: this.backend.provider, attempts, textPreview: preview(text) },
        error
      );
    }

    await this.cache.put(fingerprint, bytes);
    return segment;
  }

  private decode(bytes: Buffer): Promise<AudioSegment> {
    return this.codec.decode(bytes, this.backend.outputFormat, this.backend.pcmFormat);
  }

  /** Backend call with bounded retry. Only transient failures are retried. */
  private async requestSpeech(text: string): Promise<{ bytes: Buffer; attempts: number }> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      try {
        this.counters.backendCalls++;
        const result = await this.backend.synthesize(text);
        if (attempt > 1) {
          logger.info(`${this.backend.provider} synthesis succeeded on attempt ${attempt}/${this.retry.maxAttempts}`);
        }
        return { bytes: result.audioBuffer, attempts: attempt };
      } catch (error: unknown) {
        lastError = error;

        if (error instanceof FatalSynthesisError) {
          logger.error(`${this.backend.provider} synthesis failed permanently: ${error.message}`);
          throw new SynthesisFailure(
            { provider: this.backend.provider, attempts: attempt, textPreview: preview(text) },
            error
          );
        }

        const transient = error instanceof TransientSynthesisError;
        logger.warn(
          `${this.backend.provider} synthesis attempt ${attempt}/${this.retry.maxAttempts} failed` +
          `${transient ? '' : ' (unclassified)'}: ${describeError(error)}`
        );

        if (attempt < this.retry.maxAttempts) {
          const delay = backoffDelay(attempt, this.retry);
          logger.info(`Retrying ${this.backend.provider} synthesis in ${delay}ms...`);
          await this.sleep(delay);
        }
      }
    }

    throw new SynthesisFailure(
      { provider: this.backend.provider, attempts: this.retry.maxAttempts, textPreview: preview(text) },
      lastError
    );
  }
}
