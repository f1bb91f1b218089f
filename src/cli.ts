#!/usr/bin/env node
/**
 * Build a timed voiceover track from an SRT file.
 *
 * Usage:
 *   subtitle-voiceover --srt subs/episode1.srt --job episode1
 *   subtitle-voiceover --provider elevenlabs --voice <voice-id> --out out/ep1.mp3
 *   subtitle-voiceover --no-fill --hard-cut --pad-start 500 --pad-end 1000
 *   subtitle-voiceover --max-speedup 1.3 --concurrency 8 --no-transliterate
 *
 * Environment:
 *   TTS_* settings plus OPENAI_API_KEY, ELEVENLABS_API_KEY or GOOGLE_TTS_API_KEY
 *   for the selected provider. See .env.example.
 */

import path from 'path';
import { loadEnv } from './config/env';
import { loadAppConfig, resolveOutputPath } from './config/app-config';
import { parseCliArgs } from './config/cli-args';
import { logger } from './config/logger';
import { FfmpegAudioCodec } from './services/audio/audio-codec.service';
import { AudioPipeline } from './services/audio/audio-pipeline.service';
import { DEFAULT_PCM_FORMAT } from './services/audio/audio-segment';
import { SubtitleService } from './services/subtitle/subtitle.service';
import { SpeechSynthesizer } from './services/tts/speech-synthesizer.service';
import { SynthesisCache } from './services/tts/synthesis-cache.service';
import { createSynthesisBackend } from './services/tts/tts-factory';
import { describeError } from './utils/errors';

const USAGE = `Usage: subtitle-voiceover [options]

  --provider <openai|elevenlabs|google>
  --job <name>               cache namespace and output prefix
  --srt <path>               subtitle file
  --out <path>               output audio file
  --model <id>               provider model
  --voice <id>               provider voice
  --format <ext>             provider response format (OpenAI)
  --instructions <text>      delivery instructions (OpenAI)
  --force-language <code>    language hint (OpenAI)
  --no-fill                  do not pad short cues to their slot end
  --hard-cut                 truncate overrunning cues instead of speeding up
  --pad-start <ms>           leading silence
  --pad-end <ms>             trailing silence
  --max-chars <n>            max characters per synthesis request
  --max-speedup <x>          speed cap for overrunning cues
  --concurrency <n>          cues synthesized in parallel
  --cache-dir <path>         synthesis cache root
  --no-transliterate         keep Latin script as-is
  --help
`;

async function main(): Promise<void> {
  const { overrides, help } = parseCliArgs(process.argv.slice(2));
  if (help) {
    console.log(USAGE);
    return;
  }

  const envPath = loadEnv();
  if (envPath) {
    logger.debug(`Loaded environment from ${envPath}`);
  }

  const config = loadAppConfig(overrides);
  const outputPath = resolveOutputPath(config);
  const startTime = Date.now();

  logger.info('Voiceover job', {
    job: config.jobName,
    provider: config.provider,
    srt: config.srtPath,
    output: outputPath,
  });

  const cues = await new SubtitleService({ transliterate: config.transliterate }).load(config.srtPath);

  const backend = createSynthesisBackend(config.providerSettings);
  const codec = new FfmpegAudioCodec(DEFAULT_PCM_FORMAT);
  const synthesizer = new SpeechSynthesizer({
    backend,
    cache: new SynthesisCache({ rootDir: config.cacheDir, jobName: config.jobName }),
    codec,
  });

  const pipeline = new AudioPipeline(synthesizer, config.pipeline, { trackFormat: DEFAULT_PCM_FORMAT });
  const { audio, report } = await pipeline.buildWithReport(cues);

  const format = path.extname(outputPath).slice(1) || 'mp3';
  await codec.encodeToFile(audio, outputPath, format);

  const { backendCalls, cacheHits } = synthesizer.stats;
  logger.info('Voiceover written', {
    output: outputPath,
    durationMs: Math.round(report.durationMs),
    overflowingCues: report.overflowingCues,
    backendCalls,
    cacheHits,
    elapsedMs: Date.now() - startTime,
  });

  console.log(`Done: ${outputPath}`);
}

main().catch((err: unknown) => {
  console.error(`\nError: ${describeError(err)}`);
  process.exit(1);
});
