import { describe, it, expect, vi } from 'vitest';
import { AudioPipeline } from './audio-pipeline.service';
import { AudioSegment, DEFAULT_PCM_FORMAT } from './audio-segment';
import type { Cue, PipelineConfig } from '../../types/pipeline.types';
import { ConfigurationError, SynthesisFailure } from '../../utils/errors';

vi.mock('../../config/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    error: vi.fn(),
  },
}));

// 1 frame per millisecond: frame counts and milliseconds are interchangeable
const MS_MONO = { frameRate: 1000, channels: 1 };

interface Clip {
  ms: number;
  level?: number;
  delayMs?: number;
}

function fakeSynthesizer(clips: Record<string, Clip>) {
  return {
    synthesize: vi.fn(async (text: string, _speed?: number): Promise<AudioSegment> => {
      const clip = clips[text];
      if (!clip) {
        throw new SynthesisFailure({ provider: 'fake', attempts: 4, textPreview: text }, new Error('service unavailable'));
      }
      if (clip.delayMs) {
        await new Promise((resolve) => setTimeout(resolve, clip.delayMs));
      }
      return AudioSegment.fromSamples(new Int16Array(clip.ms).fill(clip.level ?? 1000), MS_MONO);
    }),
  };
}

function cue(index: number, startMs: number, endMs: number, text: string): Cue {
  return { index, startMs, endMs, text };
}

function pipeline(clips: Record<string, Clip>, config: Partial<PipelineConfig> = {}) {
  const synthesizer = fakeSynthesizer(clips);
  return { synthesizer, pipeline: new AudioPipeline(synthesizer, config, { trackFormat: MS_MONO }) };
}

describe('AudioPipeline', () => {
  it('fills gaps between cues with silence', async () => {
    const { pipeline: p } = pipeline({ a: { ms: 1000, level: 1000 }, b: { ms: 1000, level: 2000 } });

    const audio = await p.build([cue(1, 0, 1000, 'a'), cue(2, 2000, 3000, 'b')]);
    const samples = audio.getSamples();

    expect(audio.durationMs).toBe(3000);
    expect(samples[999]).toBe(1000);
    expect(samples.slice(1000, 2000).every((s) => s === 0)).toBe(true);
    expect(samples[2000]).toBe(2000);
  });

  it('pads short audio to the end of its slot', async () => {
    const { pipeline: p } = pipeline({ a: { ms: 500 }, b: { ms: 1000 } });

    const { audio, report } = await p.buildWithReport([cue(1, 0, 2000, 'a'), cue(2, 2000, 3000, 'b')]);

    expect(audio.durationMs).toBe(3000);
    expect(report.cues.map((c) => c.action)).toEqual(['padded', 'as-is']);
    expect(report.cues[0].emittedMs).toBe(2000);
    expect(report.cues[1].placedAtMs).toBe(2000);
  });

  it('still starts the next cue on time without fillToEnd', async () => {
    const { pipeline: p } = pipeline({ a: { ms: 500 }, b: { ms: 1000 } }, { fillToEnd: false });

    const { audio, report } = await p.buildWithReport([cue(1, 0, 2000, 'a'), cue(2, 2000, 3000, 'b')]);

    expect(report.cues[0]).toMatchObject({ action: 'as-is', emittedMs: 500 });
    expect(report.cues[1].placedAtMs).toBe(2000);
    expect(audio.durationMs).toBe(3000);
  });

  it('speeds up audio that overruns its slot', async () => {
    const { pipeline: p } = pipeline({ long: { ms: 3000 } }, { maxSpeedup: 1.5 });

    const { audio, report } = await p.buildWithReport([cue(1, 0, 2000, 'long')]);

    expect(audio.durationMs).toBe(2000);
    expect(report.cues[0]).toMatchObject({ action: 'sped-up', speed: 1.5, rawMs: 3000, emittedMs: 2000 });
    expect(report.overflowingCues).toEqual([]);
  });

  it('caps the speedup and lets the residual overrun push later cues', async () => {
    const { pipeline: p } = pipeline({ long: { ms: 4000 }, next: { ms: 1000 } }, { maxSpeedup: 1.5 });

    const { audio, report } = await p.buildWithReport([cue(1, 0, 2000, 'long'), cue(2, 2000, 3000, 'next')]);

    expect(report.cues[0]).toMatchObject({ action: 'capped', speed: 1.5, emittedMs: 2667 });
    expect(report.cues[1].placedAtMs).toBe(2667);
    // The second cue starts late, so it ends past its slot too
    expect(report.overflowingCues).toEqual([1, 2]);
    expect(audio.durationMs).toBe(3667);
  });

  it('fits a barely overrunning cue to its slot at the track rate', async () => {
    const synthesizer = fakeSynthesizer({ long: { ms: 10009 } });
    const p = new AudioPipeline(synthesizer, { maxSpeedup: 1.5, fillToEnd: false }, { trackFormat: DEFAULT_PCM_FORMAT });

    const { audio, report } = await p.buildWithReport([cue(1, 0, 10000, 'long')]);

    // 10000 ms at 24 kHz
    expect(Math.abs(audio.frameCount - 240000)).toBeLessThanOrEqual(1);
    expect(report.cues[0].action).toBe('sped-up');
    expect(report.cues[0].speed).toBeCloseTo(240216 / 240000, 10);
    expect(report.overflowingCues).toEqual([]);
  });

  it('reports the speed that was actually applied', async () => {
    const synthesizer = fakeSynthesizer({ fits: { ms: 2400 }, long: { ms: 4000 } });
    const p = new AudioPipeline(synthesizer, { maxSpeedup: 1.5, fillToEnd: false }, { trackFormat: DEFAULT_PCM_FORMAT });

    const { audio, report } = await p.buildWithReport([cue(1, 0, 2000, 'fits'), cue(2, 2000, 4000, 'long')]);

    expect(report.cues.map((c) => c.action)).toEqual(['sped-up', 'capped']);
    for (const placed of report.cues) {
      expect(placed.rawMs / placed.emittedMs).toBeCloseTo(placed.speed, 6);
    }
    expect(report.cues[0].speed).toBeCloseTo(1.2, 10);
    expect(report.cues[1].speed).toBe(1.5);
    // 48000 fitted frames, then 96000 / 1.5
    expect(audio.frameCount).toBe(48000 + 64000);
  });

  it('truncates overrunning audio in hard-cut mode', async () => {
    const { pipeline: p } = pipeline({ long: { ms: 3000 } }, { hardCut: true, maxSpeedup: 1.5 });

    const { audio, report } = await p.buildWithReport([cue(1, 0, 2000, 'long')]);

    expect(audio.durationMs).toBe(2000);
    expect(report.cues[0]).toMatchObject({ action: 'hard-cut', speed: 1 });
  });

  it('never speeds up beyond what is needed', async () => {
    const { pipeline: p } = pipeline({ slightly: { ms: 2200 } }, { maxSpeedup: 2 });

    const { report } = await p.buildWithReport([cue(1, 0, 2000, 'slightly')]);

    expect(report.cues[0].speed).toBeCloseTo(1.1, 10);
    expect(report.cues[0].emittedMs).toBe(2000);
  });

  it('adds leading and trailing padding', async () => {
    const { pipeline: p } = pipeline({ a: { ms: 1000 } }, { padLeadingMs: 500, padTrailingMs: 250 });

    const { audio, report } = await p.buildWithReport([cue(1, 0, 1000, 'a')]);

    expect(report.cues[0].placedAtMs).toBe(500);
    expect(audio.durationMs).toBe(1750);
    expect(audio.getSamples()[499]).toBe(0);
    expect(audio.getSamples()[500]).toBe(1000);
  });

  it('returns only the padding when there are no cues', async () => {
    const { pipeline: p } = pipeline({}, { padLeadingMs: 500, padTrailingMs: 500 });

    const audio = await p.build([]);

    expect(audio.durationMs).toBe(1000);
    expect(audio.getSamples().every((s) => s === 0)).toBe(true);
  });

  it('keeps the slot of an empty cue without calling the backend', async () => {
    const { pipeline: p, synthesizer } = pipeline({ b: { ms: 500 } });

    const { audio, report } = await p.buildWithReport([cue(1, 0, 1000, '   '), cue(2, 1000, 1500, 'b')]);

    expect(report.cues[0]).toMatchObject({ action: 'empty', chunks: 0, emittedMs: 1000 });
    expect(synthesizer.synthesize).toHaveBeenCalledTimes(1);
    expect(audio.durationMs).toBe(1500);
  });

  it('emits a zero-length slot as-is', async () => {
    const { pipeline: p } = pipeline({ blip: { ms: 300 } });

    const { report } = await p.buildWithReport([cue(1, 1000, 1000, 'blip')]);

    expect(report.cues[0]).toMatchObject({ action: 'as-is', placedAtMs: 1000, emittedMs: 300 });
  });

  it('splits long text into several requests at normal speed', async () => {
    const { pipeline: p, synthesizer } = pipeline({ one: { ms: 400 }, two: { ms: 600 } }, { maxCharsPerCall: 3 });

    const { report } = await p.buildWithReport([cue(1, 0, 2000, 'one two')]);

    expect(synthesizer.synthesize.mock.calls).toEqual([['one', 1], ['two', 1]]);
    expect(report.cues[0]).toMatchObject({ chunks: 2, rawMs: 1000, emittedMs: 2000 });
  });

  it('keeps cue order when parallel synthesis finishes out of order', async () => {
    const { pipeline: p } = pipeline(
      {
        slow: { ms: 100, level: 1, delayMs: 20 },
        fast: { ms: 100, level: 2, delayMs: 1 },
      },
      { concurrency: 2, fillToEnd: false }
    );

    const audio = await p.build([cue(1, 0, 100, 'slow'), cue(2, 100, 200, 'fast')]);

    expect(audio.getSamples()[0]).toBe(1);
    expect(audio.getSamples()[100]).toBe(2);
  });

  it('produces audio at least as long as the last cue end', async () => {
    const { pipeline: p } = pipeline({ a: { ms: 100 }, b: { ms: 100 } }, { fillToEnd: false });

    const audio = await p.build([cue(1, 0, 1000, 'a'), cue(2, 5000, 6000, 'b')]);

    expect(audio.durationMs).toBeGreaterThanOrEqual(5000);
    expect(audio.durationMs).toBe(5100);
  });

  it('names the cue and chunk when synthesis fails', async () => {
    const { pipeline: p } = pipeline({ ok: { ms: 100 } }, { maxCharsPerCall: 3 });

    const error = await p.build([cue(7, 0, 1000, 'ok bad')]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SynthesisFailure);
    expect(error).toMatchObject({ cueIndex: 7, chunkIndex: 1 });
    expect(error instanceof Error ? error.message : '').toBe(
      'Speech synthesis via fake failed for cue 7 (chunk 2) after 4 attempt(s): service unavailable'
    );
  });

  it('rejects an invalid configuration up front', () => {
    const synthesizer = fakeSynthesizer({});
    expect(() => new AudioPipeline(synthesizer, { maxSpeedup: 0.9 })).toThrow(ConfigurationError);
    expect(() => new AudioPipeline(synthesizer, { padLeadingMs: -1 })).toThrow(ConfigurationError);
  });
});
