import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { logger } from '../../config/logger';
import { TransientSynthesisError } from '../../utils/errors';
import type { PcmFormat } from '../audio/audio-segment';
import { classifyProviderError } from './provider-errors';
import type { SynthesisBackend, SynthesisResult } from './tts-provider.interface';

export interface ElevenLabsVoiceSettings {
  stability?: number; // 0-1
  similarity_boost?: number; // 0-1
  style?: number; // 0-1
  use_speaker_boost?: boolean;
}

export interface ElevenLabsProviderConfig {
  apiKey: string;
  voiceId: string;
  modelId: string;
  /** ElevenLabs output_format, e.g. mp3_44100_128 or pcm_22050 */
  outputFormat: string;
  voiceSettings: ElevenLabsVoiceSettings;
  apiUrl?: string;
  timeoutMs?: number;
}

/** File extension for an ElevenLabs output_format value. */
export function elevenLabsFileExtension(outputFormat: string): string {
  if (outputFormat.startsWith('mp3')) return 'mp3';
  if (outputFormat.startsWith('pcm')) return 'pcm';
  if (outputFormat.startsWith('opus') || outputFormat.startsWith('ogg')) return 'ogg';
  if (outputFormat.startsWith('wav')) return 'wav';
  return 'mp3';
}

// ===========================================================================
// ElevenLabs Provider Adapter
//
// POST /v1/text-to-speech/:voice_id with output_format as a query param.
// ===========================================================================

export class ElevenLabsProvider implements SynthesisBackend {
  readonly provider = 'elevenlabs' as const;
  private readonly http: AxiosInstance;

  constructor(private readonly config: ElevenLabsProviderConfig, http?: AxiosInstance) {
    this.http = http ?? axios.create({
      baseURL: config.apiUrl ?? 'https://api.elevenlabs.io/v1',
      timeout: config.timeoutMs ?? 120000,
    });
  }

  get outputFormat(): string {
    return elevenLabsFileExtension(this.config.outputFormat);
  }

  get pcmFormat(): PcmFormat | undefined {
    const match = /^pcm_(\d+)$/.exec(this.config.outputFormat);
    return match ? { frameRate: Number(match[1]), channels: 1 } : undefined;
  }

  get cacheFingerprint(): readonly string[] {
    const settings = this.config.voiceSettings;
    return [
      this.provider,
      this.config.voiceId,
      this.config.modelId,
      this.config.outputFormat,
      settings.stability !== undefined ? String(settings.stability) : '',
      settings.similarity_boost !== undefined ? String(settings.similarity_boost) : '',
      settings.style !== undefined ? String(settings.style) : '',
      settings.use_speaker_boost !== undefined ? String(settings.use_speaker_boost) : '',
    ];
  }

  async synthesize(text: string): Promise<SynthesisResult> {
    const body: Record<string, unknown> = {
      text,
      model_id: this.config.modelId,
    };
    if (Object.keys(this.config.voiceSettings).length > 0) {
      body.voice_settings = this.config.voiceSettings;
    }

    logger.info('Generating speech with ElevenLabs', {
      voiceId: this.config.voiceId,
      textLength: text.length,
      modelId: this.config.modelId,
    });

    try {
      const response = await this.http.post<ArrayBuffer>(
        `/text-to-speech/${encodeURIComponent(this.config.voiceId)}`,
        body,
        {
          headers: {
            'xi-api-key': this.config.apiKey,
            'Content-Type': 'application/json',
            Accept: 'audio/mpeg',
          },
          params: {
            output_format: this.config.outputFormat,
          },
          responseType: 'arraybuffer',
        }
      );

      const audioBuffer = Buffer.from(response.data);
      if (audioBuffer.length === 0) {
        throw new TransientSynthesisError('ElevenLabs returned an empty audio body');
      }

      logger.debug('ElevenLabs speech generated', { audioSize: audioBuffer.length, characters: text.length });

      return {
        audioBuffer,
        fileExtension: this.outputFormat,
      };
    } catch (error: unknown) {
      throw classifyProviderError(this.provider, error);
    }
  }
}
