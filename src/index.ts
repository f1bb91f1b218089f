export { AudioPipeline } from './services/audio/audio-pipeline.service';
export type { AudioPipelineOptions, BuildResult, CueSynthesizer } from './services/audio/audio-pipeline.service';
export { AudioSegment, DEFAULT_PCM_FORMAT, changePlaybackSpeed } from './services/audio/audio-segment';
export type { PcmFormat } from './services/audio/audio-segment';
export { FfmpegAudioCodec } from './services/audio/audio-codec.service';
export type { AudioCodec } from './services/audio/audio-codec.service';

export { SpeechSynthesizer, DEFAULT_RETRY_POLICY, backoffDelay } from './services/tts/speech-synthesizer.service';
export type { RetryPolicy, SpeechSynthesizerOptions, SynthesizerStats } from './services/tts/speech-synthesizer.service';
export { SynthesisCache, fingerprintKey } from './services/tts/synthesis-cache.service';
export type { SynthesisFingerprint } from './services/tts/synthesis-cache.service';
export type { SynthesisBackend, SynthesisResult, TTSProvider } from './services/tts/tts-provider.interface';
export { OpenAIProvider } from './services/tts/openai-provider';
export { ElevenLabsProvider } from './services/tts/elevenlabs-provider';
export { GoogleTTSProvider } from './services/tts/google-provider';
export { createSynthesisBackend } from './services/tts/tts-factory';

export { SubtitleService, parseSrt } from './services/subtitle/subtitle.service';
export { latinToSerbianCyrillic, containsCyrillic } from './services/subtitle/transliteration';

export { loadAppConfig, resolveOutputPath } from './config/app-config';
export type { AppConfig, CliOverrides, ProviderSettings } from './config/app-config';
export { loadEnv } from './config/env';

export { DEFAULT_PIPELINE_CONFIG, validatePipelineConfig } from './types/pipeline.types';
export type { BuildReport, Cue, CueAction, CuePlacement, PipelineConfig } from './types/pipeline.types';
export { chunkText, iterateChunks, joinChunks } from './utils/text-chunker';
export * from './utils/errors';
