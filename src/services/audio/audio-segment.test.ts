import { describe, it, expect } from 'vitest';
import { AudioSegment, changePlaybackSpeed, resampleToFrames } from './audio-segment';
import { AudioCodecError } from '../../utils/errors';

// 1 frame per millisecond keeps the arithmetic readable
const MS_MONO = { frameRate: 1000, channels: 1 };

function ramp(frames: number): AudioSegment {
  return AudioSegment.fromSamples(Int16Array.from({ length: frames }, (_, i) => i), MS_MONO);
}

function constant(frames: number, value: number): AudioSegment {
  return AudioSegment.fromSamples(new Int16Array(frames).fill(value), MS_MONO);
}

describe('AudioSegment', () => {
  it('creates silence of the requested length', () => {
    const silence = AudioSegment.silent(500, MS_MONO);
    expect(silence.frameCount).toBe(500);
    expect(silence.durationMs).toBe(500);
    expect(silence.getSamples().every((s) => s === 0)).toBe(true);
  });

  it('decodes and re-encodes s16le PCM', () => {
    const bytes = Buffer.alloc(6);
    bytes.writeInt16LE(1, 0);
    bytes.writeInt16LE(-2, 2);
    bytes.writeInt16LE(300, 4);

    const segment = AudioSegment.fromPcm(bytes, MS_MONO);
    expect(Array.from(segment.getSamples())).toEqual([1, -2, 300]);
    expect(segment.toPcm().equals(bytes)).toBe(true);
  });

  it('rejects PCM that is not a whole number of frames', () => {
    expect(() => AudioSegment.fromPcm(Buffer.alloc(3), MS_MONO)).toThrow(AudioCodecError);
    expect(() => AudioSegment.fromPcm(Buffer.alloc(6), { frameRate: 1000, channels: 2 })).toThrow(AudioCodecError);
  });

  it('rejects an invalid format', () => {
    expect(() => AudioSegment.silent(10, { frameRate: 0, channels: 1 })).toThrow(AudioCodecError);
    expect(() => AudioSegment.silent(10, { frameRate: 1000, channels: 0 })).toThrow(AudioCodecError);
  });

  it('slices by time and clips out-of-range bounds', () => {
    const segment = ramp(1000);
    const middle = segment.slice(100, 300);
    expect(middle.frameCount).toBe(200);
    expect(middle.getSamples()[0]).toBe(100);
    expect(middle.getSamples()[199]).toBe(299);

    expect(segment.slice(900, 5000).frameCount).toBe(100);
    expect(segment.slice(-50, 10).frameCount).toBe(10);
  });

  it('pads with trailing silence but never shortens', () => {
    const segment = constant(1000, 7);
    const padded = segment.padTo(1500);
    expect(padded.frameCount).toBe(1500);
    expect(padded.getSamples()[999]).toBe(7);
    expect(padded.getSamples()[1000]).toBe(0);

    expect(segment.padTo(500)).toBe(segment);
  });

  it('concatenates parts in order', () => {
    const joined = AudioSegment.concat([constant(2, 1), constant(3, 2)]);
    expect(Array.from(joined.getSamples())).toEqual([1, 1, 2, 2, 2]);
    expect(joined.durationMs).toBe(5);
  });

  it('does not change the original when appending', () => {
    const first = constant(2, 1);
    const joined = first.append(constant(2, 2));
    expect(first.frameCount).toBe(2);
    expect(joined.frameCount).toBe(4);
  });

  it('downmixes stereo to mono by averaging', () => {
    const stereo = AudioSegment.fromSamples(Int16Array.from([100, 300, -50, 50]), { frameRate: 1000, channels: 2 });
    const mono = stereo.toFormat(MS_MONO);
    expect(mono.channels).toBe(1);
    expect(Array.from(mono.getSamples())).toEqual([200, 0]);
  });

  it('resamples to a new frame rate keeping the duration', () => {
    const upsampled = constant(100, 50).toFormat({ frameRate: 2000, channels: 1 });
    expect(upsampled.frameCount).toBe(200);
    expect(upsampled.durationMs).toBe(100);
    expect(upsampled.getSamples().every((s) => s === 50)).toBe(true);
  });
});

describe('changePlaybackSpeed', () => {
  it('shortens the audio by the speed factor', () => {
    expect(changePlaybackSpeed(constant(3000, 1), 1.5).frameCount).toBe(2000);
    expect(changePlaybackSpeed(constant(4000, 1), 1.5).frameCount).toBe(2667);
  });

  it('lengthens the audio when slowed down', () => {
    expect(changePlaybackSpeed(constant(1000, 1), 0.5).frameCount).toBe(2000);
  });

  it('keeps the frame rate and a constant signal level', () => {
    const faster = changePlaybackSpeed(constant(1200, 900), 1.2);
    expect(faster.frameRate).toBe(1000);
    expect(faster.frameCount).toBe(1000);
    expect(faster.getSamples().every((s) => s === 900)).toBe(true);
  });

  it('returns the same segment for a speed of one', () => {
    const segment = constant(10, 1);
    expect(changePlaybackSpeed(segment, 1.0)).toBe(segment);
    expect(changePlaybackSpeed(segment, 1.0005)).toBe(segment);
  });

  it('rejects non-positive speeds', () => {
    expect(() => changePlaybackSpeed(constant(10, 1), 0)).toThrow(RangeError);
    expect(() => changePlaybackSpeed(constant(10, 1), -1)).toThrow(RangeError);
  });
});

describe('resampleToFrames', () => {
  it('hits the exact frame count even for a tiny squeeze', () => {
    const squeezed = resampleToFrames(constant(10009, 300), 10000);
    expect(squeezed.frameCount).toBe(10000);
    expect(squeezed.getSamples().every((s) => s === 300)).toBe(true);
  });

  it('returns the same segment when the length already matches', () => {
    const segment = ramp(10);
    expect(resampleToFrames(segment, 10)).toBe(segment);
  });
});
