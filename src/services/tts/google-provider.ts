import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../../config/logger';
import { TransientSynthesisError } from '../../utils/errors';
import { classifyProviderError } from './provider-errors';
import type { SynthesisBackend, SynthesisResult } from './tts-provider.interface';

export const GOOGLE_AUDIO_ENCODINGS = ['LINEAR16', 'MP3', 'OGG_OPUS', 'MULAW', 'ALAW'] as const;
export type GoogleAudioEncoding = (typeof GOOGLE_AUDIO_ENCODINGS)[number];

export interface GoogleProviderConfig {
  apiKey: string;
  voiceName: string;
  audioEncoding: GoogleAudioEncoding;
  speakingRate?: number;
  pitch?: number;
  sampleRateHertz?: number;
  volumeGainDb?: number;
  effectsProfileIds: string[];
  languageCode?: string;
  apiUrl?: string;
  timeoutMs?: number;
}

const SynthesizeResponseSchema = z.object({
  audioContent: z.string().min(1),
});

/** "sr-RS-Standard-A" → "sr-RS" */
export function deriveLanguageCode(voiceName: string): string {
  const parts = voiceName.split('-');
  if (parts.length >= 2) {
    return parts.slice(0, 2).join('-');
  }
  return 'en-US';
}

/** LINEAR16, MULAW and ALAW all come back wrapped in a WAV header. */
export function googleFileExtension(encoding: GoogleAudioEncoding): string {
  switch (encoding) {
    case 'MP3': return 'mp3';
    case 'OGG_OPUS': return 'ogg';
    case 'LINEAR16':
    case 'MULAW':
    case 'ALAW':
      return 'wav';
  }
}

function optional(value: number | undefined): string {
  return value !== undefined ? String(value) : '';
}

// ===========================================================================
// Google Cloud Text-to-Speech Provider Adapter
//
// POST /v1/text:synthesize with an API key. The audio comes back base64
// encoded inside a JSON body.
// ===========================================================================

export class GoogleTTSProvider implements SynthesisBackend {
  readonly provider = 'google' as const;
  private readonly http: AxiosInstance;

  constructor(private readonly config: GoogleProviderConfig, http?: AxiosInstance) {
    this.http = http ?? axios.create({
      baseURL: config.apiUrl ?? 'https://texttospeech.googleapis.com/v1',
      timeout: config.timeoutMs ?? 120000,
    });
  }

  get outputFormat(): string {
    return googleFileExtension(this.config.audioEncoding);
  }

  get cacheFingerprint(): readonly string[] {
    return [
      this.provider,
      this.config.voiceName,
      this.config.audioEncoding,
      optional(this.config.speakingRate),
      optional(this.config.pitch),
      optional(this.config.sampleRateHertz),
      optional(this.config.volumeGainDb),
      this.config.effectsProfileIds.join('|'),
      this.config.languageCode ?? '',
    ];
  }

  async synthesize(text: string): Promise<SynthesisResult> {
    const audioConfig: Record<string, unknown> = {
      audioEncoding: this.config.audioEncoding,
    };
    if (this.config.speakingRate !== undefined) audioConfig.speakingRate = this.config.speakingRate;
    if (this.config.pitch !== undefined) audioConfig.pitch = this.config.pitch;
    if (this.config.sampleRateHertz !== undefined) audioConfig.sampleRateHertz = this.config.sampleRateHertz;
    if (this.config.volumeGainDb !== undefined) audioConfig.volumeGainDb = this.config.volumeGainDb;
    if (this.config.effectsProfileIds.length > 0) audioConfig.effectsProfileId = this.config.effectsProfileIds;

    const body = {
      input: { text },
      voice: {
        languageCode: this.config.languageCode || deriveLanguageCode(this.config.voiceName),
        name: this.config.voiceName,
      },
      audioConfig,
    };

    logger.info('Generating speech with Google TTS', {
      voice: this.config.voiceName,
      textLength: text.length,
      encoding: this.config.audioEncoding,
    });

    try {
      const response = await this.http.post<unknown>('/text:synthesize', body, {
        params: { key: this.config.apiKey },
        headers: { 'Content-Type': 'application/json' },
      });

      const parsed = SynthesizeResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new TransientSynthesisError('Google TTS response contained no audioContent');
      }

      const audioBuffer = Buffer.from(parsed.data.audioContent, 'base64');
      logger.debug('Google speech generated', { audioSize: audioBuffer.length, characters: text.length });

      return {
        audioBuffer,
        fileExtension: this.outputFormat,
      };
    } catch (error: unknown) {
      throw classifyProviderError(this.provider, error);
    }
  }
}
