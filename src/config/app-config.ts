import path from 'path';
import { z } from 'zod';
import { validatePipelineConfig } from '../types/pipeline.types';
import type { PipelineConfig } from '../types/pipeline.types';
import { ConfigurationError } from '../utils/errors';
import { TTS_PROVIDERS } from '../services/tts/tts-provider.interface';
import type { TTSProvider } from '../services/tts/tts-provider.interface';
import { OPENAI_RESPONSE_FORMATS } from '../services/tts/openai-provider';
import type { OpenAIProviderConfig } from '../services/tts/openai-provider';
import type { ElevenLabsProviderConfig } from '../services/tts/elevenlabs-provider';
import { GOOGLE_AUDIO_ENCODINGS } from '../services/tts/google-provider';
import type { GoogleProviderConfig } from '../services/tts/google-provider';
import { EnvReader } from './env';

export const DEFAULT_CACHE_DIR = '.cache';
export const DEFAULT_JOB_NAME = 'default';
export const DEFAULT_SRT_PATH = 'example/input.srt';
export const DEFAULT_OUTPUT_NAME = 'voiceover.mp3';
export const DEFAULT_OUTPUT_DIR = 'output';

/** Values taken from the command line. They override the environment. */
export interface CliOverrides {
  provider?: string;
  jobName?: string;
  srtPath?: string;
  out?: string;
  model?: string;
  voice?: string;
  format?: string;
  noFill?: boolean;
  hardCut?: boolean;
  padStart?: number;
  padEnd?: number;
  maxChars?: number;
  cacheDir?: string;
  maxSpeedup?: number;
  concurrency?: number;
  instructions?: string;
  forceLanguage?: string;
  noTransliterate?: boolean;
}

export type ProviderSettings =
  | { provider: 'openai'; settings: OpenAIProviderConfig }
  | { provider: 'elevenlabs'; settings: ElevenLabsProviderConfig }
  | { provider: 'google'; settings: GoogleProviderConfig };

export interface AppConfig {
  provider: TTSProvider;
  jobName: string;
  srtPath: string;
  /** Explicit output path; when absent the path is derived from job and provider */
  outputPath?: string;
  outputBaseName: string;
  cacheDir: string;
  transliterate: boolean;
  pipeline: PipelineConfig;
  providerSettings: ProviderSettings;
}

// ---------------------------------------------------------------------------
// Provider schemas
// ---------------------------------------------------------------------------

const unit = z.number().min(0).max(1);

const OpenAISettingsSchema = z.object({
  apiKey: z.string({ required_error: 'OPENAI_API_KEY is required' }).min(1, 'OPENAI_API_KEY is required'),
  model: z.string().min(1),
  voice: z.string().min(1),
  responseFormat: z.enum(OPENAI_RESPONSE_FORMATS),
  instructions: z.string(),
  forceLanguage: z.string().min(1).optional(),
});

const ElevenLabsSettingsSchema = z.object({
  apiKey: z.string({ required_error: 'ELEVENLABS_API_KEY is required' }).min(1, 'ELEVENLABS_API_KEY is required'),
  voiceId: z.string({ required_error: 'ELEVENLABS_VOICE_ID is required' }).min(1, 'ELEVENLABS_VOICE_ID is required'),
  modelId: z.string().min(1),
  outputFormat: z.string().regex(/^(mp3|pcm|opus|wav)_[\w]+$/, 'unsupported ElevenLabs output format'),
  voiceSettings: z.object({
    stability: unit.optional(),
    similarity_boost: unit.optional(),
    style: unit.optional(),
    use_speaker_boost: z.boolean().optional(),
  }),
});

const GoogleSettingsSchema = z.object({
  apiKey: z.string({ required_error: 'GOOGLE_TTS_API_KEY is required' }).min(1, 'GOOGLE_TTS_API_KEY is required'),
  voiceName: z.string().min(1),
  audioEncoding: z.enum(GOOGLE_AUDIO_ENCODINGS),
  speakingRate: z.number().min(0.25).max(4.0).optional(),
  pitch: z.number().min(-20).max(20).optional(),
  sampleRateHertz: z.number().int().positive().optional(),
  volumeGainDb: z.number().min(-96).max(16).optional(),
  effectsProfileIds: z.array(z.string()),
  languageCode: z.string().optional(),
});

function formatIssues(prefix: string, error: z.ZodError): string[] {
  return error.issues.map((i) => {
    const field = i.path.join('.');
    return field ? `${prefix}.${field}: ${i.message}` : `${prefix}: ${i.message}`;
  });
}

function readProviderSettings(
  provider: TTSProvider,
  cli: CliOverrides,
  env: EnvReader,
  issues: string[]
): ProviderSettings | undefined {
  switch (provider) {
    case 'openai': {
      const parsed = OpenAISettingsSchema.safeParse({
        apiKey: env.string('OPENAI_API_KEY'),
        model: cli.model ?? env.string('OPENAI_TTS_MODEL') ?? 'gpt-4o-mini-tts',
        voice: cli.voice ?? env.string('OPENAI_TTS_VOICE') ?? 'alloy',
        responseFormat: (cli.format ?? env.string('OPENAI_TTS_FORMAT') ?? 'mp3').toLowerCase(),
        instructions: cli.instructions ?? env.string('OPENAI_TTS_INSTRUCTIONS') ?? '',
        forceLanguage: cli.forceLanguage ?? env.string('OPENAI_TTS_FORCE_LANGUAGE'),
      });
      if (!parsed.success) {
        issues.push(...formatIssues('openai', parsed.error));
        return undefined;
      }
      return { provider, settings: parsed.data };
    }

    case 'elevenlabs': {
      const parsed = ElevenLabsSettingsSchema.safeParse({
        apiKey: env.string('ELEVENLABS_API_KEY'),
        voiceId: cli.voice ?? env.string('ELEVENLABS_VOICE_ID'),
        modelId: cli.model ?? env.string('ELEVENLABS_MODEL_ID') ?? 'eleven_multilingual_v2',
        outputFormat: env.string('ELEVENLABS_OUTPUT_FORMAT') ?? 'mp3_44100_128',
        voiceSettings: {
          stability: env.float('ELEVENLABS_STABILITY'),
          similarity_boost: env.float('ELEVENLABS_SIMILARITY_BOOST'),
          style: env.float('ELEVENLABS_STYLE'),
          use_speaker_boost: env.bool('ELEVENLABS_USE_SPEAKER_BOOST'),
        },
      });
      if (!parsed.success) {
        issues.push(...formatIssues('elevenlabs', parsed.error));
        return undefined;
      }
      return { provider, settings: parsed.data };
    }

    case 'google': {
      const parsed = GoogleSettingsSchema.safeParse({
        apiKey: env.string('GOOGLE_TTS_API_KEY'),
        voiceName: cli.voice ?? env.string('GOOGLE_TTS_VOICE') ?? 'sr-RS-Standard-A',
        audioEncoding: (env.string('GOOGLE_TTS_AUDIO_ENCODING') ?? 'LINEAR16').toUpperCase(),
        speakingRate: env.float('GOOGLE_TTS_SPEAKING_RATE'),
        pitch: env.float('GOOGLE_TTS_PITCH'),
        sampleRateHertz: env.int('GOOGLE_TTS_SAMPLE_RATE_HERTZ'),
        volumeGainDb: env.float('GOOGLE_TTS_VOLUME_GAIN_DB'),
        effectsProfileIds: env.list('GOOGLE_TTS_EFFECTS_PROFILE_IDS'),
        languageCode: env.string('GOOGLE_TTS_LANGUAGE_CODE'),
      });
      if (!parsed.success) {
        issues.push(...formatIssues('google', parsed.error));
        return undefined;
      }
      return { provider, settings: parsed.data };
    }
  }
}

/**
 * Build the runtime configuration from CLI overrides and environment
 * variables. Everything is validated here, before any synthesis starts;
 * all problems are reported together in one ConfigurationError.
 */
export function loadAppConfig(cli: CliOverrides = {}, envVars: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = new EnvReader(envVars);
  const issues: string[] = [];

  const requested = (cli.provider ?? env.string('TTS_PROVIDER') ?? 'openai').toLowerCase();
  const providerName = TTS_PROVIDERS.find((name) => name === requested);
  if (!providerName) {
    throw new ConfigurationError('Invalid configuration', [
      `provider: "${requested}" is not one of ${TTS_PROVIDERS.join(', ')}`,
    ]);
  }

  const fillToEnd = cli.noFill ? false : env.bool('TTS_FILL_TO_END') ?? true;
  const hardCut = cli.hardCut ? true : env.bool('TTS_HARD_CUT') ?? false;

  const pipelineInput = {
    fillToEnd,
    hardCut,
    padLeadingMs: cli.padStart ?? env.int('TTS_PAD_START_MS'),
    padTrailingMs: cli.padEnd ?? env.int('TTS_PAD_END_MS'),
    maxCharsPerCall: cli.maxChars ?? env.int('TTS_MAX_CHARS'),
    maxSpeedup: cli.maxSpeedup ?? env.float('TTS_MAX_SPEEDUP'),
    concurrency: cli.concurrency ?? env.int('TTS_CONCURRENCY'),
  };

  let pipeline: PipelineConfig | undefined;
  try {
    pipeline = validatePipelineConfig(pipelineInput);
  } catch (error: unknown) {
    if (!(error instanceof ConfigurationError)) throw error;
    issues.push(...error.issues);
  }

  const providerSettings = readProviderSettings(providerName, cli, env, issues);
  issues.unshift(...env.issues);

  if (issues.length > 0 || !pipeline || !providerSettings) {
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const outputName = env.string('TTS_OUTPUT_PATH') ?? DEFAULT_OUTPUT_NAME;

  return {
    provider: providerName,
    jobName: cli.jobName ?? env.string('TTS_JOB_NAME') ?? DEFAULT_JOB_NAME,
    srtPath: cli.srtPath ?? env.string('TTS_SRT_PATH') ?? DEFAULT_SRT_PATH,
    outputPath: cli.out,
    outputBaseName: path.basename(outputName),
    cacheDir: cli.cacheDir ?? env.string('TTS_CACHE_DIR') ?? DEFAULT_CACHE_DIR,
    transliterate: cli.noTransliterate ? false : env.bool('TTS_TRANSLITERATE') ?? true,
    pipeline,
    providerSettings,
  };
}

/** `output/<job>-<provider>-<name>` unless an explicit path was given. */
export function resolveOutputPath(config: AppConfig): string {
  if (config.outputPath) {
    return config.outputPath;
  }
  return path.join(DEFAULT_OUTPUT_DIR, `${config.jobName}-${config.provider}-${config.outputBaseName}`);
}
