import { logger } from '../../config/logger';
import {
  validatePipelineConfig,
} from '../../types/pipeline.types';
import type {
  BuildReport,
  Cue,
  CueAction,
  CuePlacement,
  PipelineConfig,
} from '../../types/pipeline.types';
import { SynthesisFailure } from '../../utils/errors';
import { iterateChunks } from '../../utils/text-chunker';
import { clamp, msToFrames } from '../../utils/timing';
import type { SpeechSynthesizer } from '../tts/speech-synthesizer.service';
import { AudioSegment, DEFAULT_PCM_FORMAT, resampleToFrames } from './audio-segment';
import type { PcmFormat } from './audio-segment';

export type CueSynthesizer = Pick<SpeechSynthesizer, 'synthesize'>;

export interface AudioPipelineOptions {
  /** Sample layout of the assembled track; every part is converted to it */
  trackFormat?: PcmFormat;
}

export interface BuildResult {
  audio: AudioSegment;
  report: BuildReport;
}

interface RawCueAudio {
  segment: AudioSegment;
  chunks: number;
}

interface FittedCueAudio {
  segment: AudioSegment;
  speed: number;
  action: CueAction;
}

// ===========================================================================
// Audio Pipeline — timing assembler
//
// Walks cues in order keeping a cursor at the end of the audio emitted so
// far. Each cue's speech is reconciled against its slot (end - start):
//
//   fits      → padded to the slot end (fillToEnd) or emitted as-is
//   overruns  → truncated (hardCut) or played faster, capped at maxSpeedup
//
// Silence fills any gap between the cursor and the next cue's start.
// Synthesis for a window of upcoming cues runs in parallel; the timing fold
// itself is strictly sequential.
// ===========================================================================

export class AudioPipeline {
  readonly config: PipelineConfig;
  private readonly trackFormat: PcmFormat;

  constructor(
    private readonly synthesizer: CueSynthesizer,
    config: Partial<PipelineConfig> = {},
    options: AudioPipelineOptions = {}
  ) {
    this.config = validatePipelineConfig(config);
    this.trackFormat = options.trackFormat ?? DEFAULT_PCM_FORMAT;
  }

  /** Assemble cues into a single timed track. */
  async build(cues: readonly Cue[]): Promise<AudioSegment> {
    const { audio } = await this.buildWithReport(cues);
    return audio;
  }

  async buildWithReport(cues: readonly Cue[]): Promise<BuildResult> {
    const startTime = Date.now();
    const { padLeadingMs, padTrailingMs, concurrency } = this.config;

    logger.info('Starting voiceover assembly', {
      cues: cues.length,
      fillToEnd: this.config.fillToEnd,
      hardCut: this.config.hardCut,
      maxSpeedup: this.config.maxSpeedup,
      concurrency,
    });

    const parts: AudioSegment[] = [];
    const placements: CuePlacement[] = [];
    let cursorMs = 0;

    if (padLeadingMs > 0) {
      parts.push(this.silence(padLeadingMs));
      cursorMs = padLeadingMs;
    }

    for (let i = 0; i < cues.length; i += concurrency) {
      const window = cues.slice(i, i + concurrency);
      const rawAudio = await Promise.all(window.map((cue) => this.synthesizeCue(cue)));

      for (let j = 0; j < window.length; j++) {
        const cue = window[j];
        const raw = rawAudio[j];

        if (cursorMs < cue.startMs) {
          parts.push(this.silence(cue.startMs - cursorMs));
          cursorMs = cue.startMs;
        }

        const fitted = this.fitToSlot(cue, raw);
        parts.push(fitted.segment);

        placements.push({
          index: cue.index,
          slotStartMs: cue.startMs,
          slotMs: slotLength(cue),
          placedAtMs: cursorMs,
          rawMs: raw.segment.durationMs,
          emittedMs: fitted.segment.durationMs,
          speed: fitted.speed,
          action: fitted.action,
          chunks: raw.chunks,
        });

        logger.debug(`Cue ${cue.index}: ${fitted.action}`, {
          slotMs: slotLength(cue),
          rawMs: Math.round(raw.segment.durationMs),
          emittedMs: Math.round(fitted.segment.durationMs),
          speed: Number(fitted.speed.toFixed(3)),
        });

        cursorMs += fitted.segment.durationMs;
      }
    }

    if (padTrailingMs > 0) {
      parts.push(this.silence(padTrailingMs));
    }

    const audio = AudioSegment.concat(parts, this.trackFormat);
    const overflowingCues = placements
      .filter((p) => p.placedAtMs + p.emittedMs > p.slotStartMs + p.slotMs + this.frameMs())
      .map((p) => p.index);

    logger.info('Voiceover assembly complete', {
      cues: cues.length,
      durationMs: Math.round(audio.durationMs),
      overflowingCues: overflowingCues.length,
      totalTimeMs: Date.now() - startTime,
    });

    return {
      audio,
      report: {
        durationMs: audio.durationMs,
        cues: placements,
        overflowingCues,
      },
    };
  }

  /**
   * Synthesize every chunk of a cue at normal speed and join them. Chunks
   * are requested in order so a failure names the first chunk that broke.
   */
  private async synthesizeCue(cue: Cue): Promise<RawCueAudio> {
    const pieces: AudioSegment[] = [];
    let chunkIndex = 0;

    for (const chunk of iterateChunks(cue.text, this.config.maxCharsPerCall)) {
      try {
        pieces.push(await this.synthesizer.synthesize(chunk.text, 1.0));
      } catch (error: unknown) {
        if (error instanceof SynthesisFailure) {
          throw error.forCue(cue.index, chunkIndex);
        }
        throw error;
      }
      chunkIndex++;
    }

    return {
      segment: AudioSegment.concat(pieces, this.trackFormat),
      chunks: pieces.length,
    };
  }

  private fitToSlot(cue: Cue, raw: RawCueAudio): FittedCueAudio {
    const slotMs = slotLength(cue);
    const { fillToEnd, hardCut, maxSpeedup } = this.config;

    if (raw.chunks === 0) {
      const segment = fillToEnd ? this.silence(slotMs) : this.silence(0);
      return { segment, speed: 1, action: 'empty' };
    }

    // No usable slot: nothing to fit against
    if (slotMs === 0) {
      return { segment: raw.segment, speed: 1, action: 'as-is' };
    }

    const slotFrames = msToFrames(slotMs, this.trackFormat.frameRate);

    if (raw.segment.frameCount <= slotFrames) {
      if (fillToEnd && raw.segment.frameCount < slotFrames) {
        return { segment: raw.segment.padTo(slotMs), speed: 1, action: 'padded' };
      }
      return { segment: raw.segment, speed: 1, action: 'as-is' };
    }

    if (hardCut) {
      return { segment: raw.segment.slice(0, slotMs), speed: 1, action: 'hard-cut' };
    }

    const rawFrames = raw.segment.frameCount;
    const neededSpeed = rawFrames / slotFrames;
    const speed = clamp(neededSpeed, 1.0, maxSpeedup);
    if (speed === neededSpeed) {
      // Resampled straight to the slot, however small the overrun
      return { segment: resampleToFrames(raw.segment, slotFrames), speed, action: 'sped-up' };
    }

    // Residual overrun when the cap binds is accepted; no extra cut
    const segment = resampleToFrames(raw.segment, Math.round(rawFrames / speed));
    return { segment, speed, action: 'capped' };
  }

  private silence(durationMs: number): AudioSegment {
    return AudioSegment.silent(durationMs, this.trackFormat);
  }

  private frameMs(): number {
    return 1000 / this.trackFormat.frameRate;
  }
}

function slotLength(cue: Cue): number {
  return Math.max(0, cue.endMs - cue.startMs);
}
