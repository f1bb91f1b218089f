// ===========================================================================
// Synthesis Backend contract
//
// Every TTS provider (OpenAI, ElevenLabs, Google) sits behind this one
// interface. The synthesizer and the timing pipeline never branch on which
// provider they hold; `provider` is only used for the cache namespace and the
// cache fingerprint.
// ===========================================================================

import type { PcmFormat } from '../audio/audio-segment';

export const TTS_PROVIDERS = ['openai', 'elevenlabs', 'google'] as const;
export type TTSProvider = (typeof TTS_PROVIDERS)[number];

/** Audio produced by one backend call. */
export interface SynthesisResult {
  /** Encoded audio exactly as the provider returned it */
  audioBuffer: Buffer;
  /** File extension / codec of `audioBuffer` (e.g. "mp3", "wav", "pcm") */
  fileExtension: string;
  mimeType?: string;
}

/**
 * Interface that every TTS provider must implement.
 *
 * `synthesize` rejects with TransientSynthesisError for failures worth
 * retrying (network, timeout, 429, 5xx) and FatalSynthesisError otherwise.
 */
export interface SynthesisBackend {
  /** Provider identifier, also the cache namespace */
  readonly provider: TTSProvider | string;

  /** Format of the bytes `synthesize` returns */
  readonly outputFormat: string;

  /** Sample layout for headerless PCM output; undefined for containers */
  readonly pcmFormat?: PcmFormat;

  /**
   * Every configuration value that changes the produced audio, in a fixed
   * order. Adding a field here invalidates previously cached entries.
   */
  readonly cacheFingerprint: readonly string[];

  /** Generate speech for `text` */
  synthesize(text: string): Promise<SynthesisResult>;
}
