import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { logger } from '../../config/logger';
import { TransientSynthesisError } from '../../utils/errors';
import type { PcmFormat } from '../audio/audio-segment';
import { classifyProviderError } from './provider-errors';
import type { SynthesisBackend, SynthesisResult } from './tts-provider.interface';

export const OPENAI_RESPONSE_FORMATS = ['mp3', 'opus', 'aac', 'flac', 'wav', 'pcm'] as const;
export type OpenAIResponseFormat = (typeof OPENAI_RESPONSE_FORMATS)[number];

export interface OpenAIProviderConfig {
  apiKey: string;
  model: string;
  voice: string;
  responseFormat: OpenAIResponseFormat;
  /** Optional style instructions (gpt-4o-mini-tts and later) */
  instructions: string;
  /** Prefix the input with a language hint, e.g. "sr" */
  forceLanguage?: string;
  apiUrl?: string;
  timeoutMs?: number;
}

/** OpenAI's `pcm` output: 24 kHz, 16-bit signed little-endian, mono. */
const OPENAI_PCM_FORMAT: PcmFormat = { frameRate: 24000, channels: 1 };

// ===========================================================================
// OpenAI Provider Adapter
//
// POST /v1/audio/speech returns the encoded audio body directly.
// ===========================================================================

export class OpenAIProvider implements SynthesisBackend {
  readonly provider = 'openai' as const;
  private readonly http: AxiosInstance;

  constructor(private readonly config: OpenAIProviderConfig, http?: AxiosInstance) {
    this.http = http ?? axios.create({
      baseURL: config.apiUrl ?? 'https://api.openai.com/v1',
      timeout: config.timeoutMs ?? 120000,
    });
  }

  get outputFormat(): string {
    return this.config.responseFormat;
  }

  get pcmFormat(): PcmFormat | undefined {
    return this.config.responseFormat === 'pcm' ? OPENAI_PCM_FORMAT : undefined;
  }

  get cacheFingerprint(): readonly string[] {
    return [
      this.provider,
      this.config.model,
      this.config.voice,
      this.config.responseFormat,
      this.config.instructions,
      this.config.forceLanguage ?? '',
    ];
  }

  async synthesize(text: string): Promise<SynthesisResult> {
    const input = this.config.forceLanguage
      ? `[lang:${this.config.forceLanguage}]  ${text}`
      : text;

    const body: Record<string, unknown> = {
      model: this.config.model,
      voice: this.config.voice,
      input,
      response_format: this.config.responseFormat,
    };
    if (this.config.instructions) {
      body.instructions = this.config.instructions;
    }

    logger.info('Generating speech with OpenAI', {
      model: this.config.model,
      voice: this.config.voice,
      textLength: text.length,
    });

    try {
      const response = await this.http.post<ArrayBuffer>('/audio/speech', body, {
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json',
        },
        responseType: 'arraybuffer',
      });

      const audioBuffer = Buffer.from(response.data);
      if (audioBuffer.length === 0) {
        throw new TransientSynthesisError('OpenAI returned an empty audio body');
      }

      logger.debug('OpenAI speech generated', { audioSize: audioBuffer.length, characters: text.length });

      return {
        audioBuffer,
        fileExtension: this.outputFormat,
      };
    } catch (error: unknown) {
      throw classifyProviderError(this.provider, error);
    }
  }
}
