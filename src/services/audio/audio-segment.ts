import { AudioCodecError } from '../../utils/errors';
import { framesToMs, isClose, msToFrames } from '../../utils/timing';

/** Sample layout of a segment: signed 16-bit little-endian, interleaved channels. */
export interface PcmFormat {
  frameRate: number;
  channels: number;
}

export const DEFAULT_PCM_FORMAT: PcmFormat = { frameRate: 24000, channels: 1 };

const BYTES_PER_SAMPLE = 2;

/**
 * Decoded audio held in memory.
 *
 * Every operation returns a new segment; the sample buffer of an existing
 * segment is never written after construction.
 */
export class AudioSegment {
  readonly frameRate: number;
  readonly channels: number;
  private readonly samples: Int16Array;

  private constructor(samples: Int16Array, format: PcmFormat) {
    if (!Number.isInteger(format.frameRate) || format.frameRate <= 0) {
      throw new AudioCodecError(`Invalid frame rate ${format.frameRate}`);
    }
    if (!Number.isInteger(format.channels) || format.channels <= 0) {
      throw new AudioCodecError(`Invalid channel count ${format.channels}`);
    }
    if (samples.length % format.channels !== 0) {
      throw new AudioCodecError(`Sample count ${samples.length} is not a multiple of ${format.channels} channels`);
    }
    this.samples = samples;
    this.frameRate = format.frameRate;
    this.channels = format.channels;
  }

  static silent(durationMs: number, format: PcmFormat = DEFAULT_PCM_FORMAT): AudioSegment {
    const frames = Math.max(0, msToFrames(durationMs, format.frameRate));
    return new AudioSegment(new Int16Array(frames * format.channels), format);
  }

  static fromSamples(samples: Int16Array, format: PcmFormat): AudioSegment {
    return new AudioSegment(Int16Array.from(samples), format);
  }

  /** Wrap raw s16le PCM bytes. */
  static fromPcm(bytes: Buffer, format: PcmFormat): AudioSegment {
    const frameBytes = BYTES_PER_SAMPLE * format.channels;
    if (bytes.length % frameBytes !== 0) {
      throw new AudioCodecError(`PCM payload of ${bytes.length} bytes is not a whole number of ${frameBytes}-byte frames`);
    }
    const samples = new Int16Array(bytes.length / BYTES_PER_SAMPLE);
    for (let i = 0; i < samples.length; i++) {
      samples[i] = bytes.readInt16LE(i * BYTES_PER_SAMPLE);
    }
    return new AudioSegment(samples, format);
  }

  /**
   * Join segments end to end. Parts in a different format are converted to
   * the format of the first part (or `format` when given).
   */
  static concat(parts: AudioSegment[], format?: PcmFormat): AudioSegment {
    const target = format ?? (parts.length > 0 ? parts[0].format : DEFAULT_PCM_FORMAT);
    const converted = parts.map((part) => part.toFormat(target));
    const total = converted.reduce((sum, part) => sum + part.samples.length, 0);
    const samples = new Int16Array(total);
    let offset = 0;
    for (const part of converted) {
      samples.set(part.samples, offset);
      offset += part.samples.length;
    }
    return new AudioSegment(samples, target);
  }

  get format(): PcmFormat {
    return { frameRate: this.frameRate, channels: this.channels };
  }

  get frameCount(): number {
    return this.samples.length / this.channels;
  }

  get durationMs(): number {
    return framesToMs(this.frameCount, this.frameRate);
  }

  append(other: AudioSegment): AudioSegment {
    return AudioSegment.concat([this, other]);
  }

  /** Sub-range by time. Out-of-range bounds are clipped. */
  slice(startMs: number, endMs: number = this.durationMs): AudioSegment {
    const startFrame = Math.max(0, Math.min(this.frameCount, msToFrames(startMs, this.frameRate)));
    const endFrame = Math.max(startFrame, Math.min(this.frameCount, msToFrames(endMs, this.frameRate)));
    return new AudioSegment(
      this.samples.slice(startFrame * this.channels, endFrame * this.channels),
      this.format
    );
  }

  /** Extend with trailing silence up to `durationMs`. Never shortens. */
  padTo(durationMs: number): AudioSegment {
    const targetFrames = msToFrames(durationMs, this.frameRate);
    if (targetFrames <= this.frameCount) return this;
    const samples = new Int16Array(targetFrames * this.channels);
    samples.set(this.samples);
    return new AudioSegment(samples, this.format);
  }

  /** Convert sample rate and channel layout. */
  toFormat(format: PcmFormat): AudioSegment {
    let segment: AudioSegment = this;
    if (segment.channels !== format.channels) {
      segment = segment.remix(format.channels);
    }
    if (segment.frameRate !== format.frameRate) {
      const frames = Math.round((segment.frameCount * format.frameRate) / segment.frameRate);
      segment = new AudioSegment(resample(segment.samples, segment.channels, frames), format);
    }
    return segment;
  }

  toPcm(): Buffer {
    const bytes = Buffer.alloc(this.samples.length * BYTES_PER_SAMPLE);
    for (let i = 0; i < this.samples.length; i++) {
      bytes.writeInt16LE(this.samples[i], i * BYTES_PER_SAMPLE);
    }
    return bytes;
  }

  /** Copy of the interleaved samples. */
  getSamples(): Int16Array {
    return Int16Array.from(this.samples);
  }

  private remix(channels: number): AudioSegment {
    const frames = this.frameCount;
    const out = new Int16Array(frames * channels);
    for (let f = 0; f < frames; f++) {
      let sum = 0;
      for (let c = 0; c < this.channels; c++) {
        sum += this.samples[f * this.channels + c];
      }
      const mono = Math.round(sum / this.channels);
      for (let c = 0; c < channels; c++) {
        out[f * channels + c] = mono;
      }
    }
    return new AudioSegment(out, { frameRate: this.frameRate, channels });
  }
}

/**
 * Speed change by frame-rate reinterpretation: the samples are played as if
 * recorded at `frameRate * speed`, then resampled back to the original rate.
 * Duration scales by 1/speed; pitch moves with it.
 */
export function changePlaybackSpeed(segment: AudioSegment, speed: number): AudioSegment {
  if (!(speed > 0) || !Number.isFinite(speed)) {
    throw new RangeError(`Playback speed must be greater than zero, got ${speed}`);
  }
  if (isClose(speed, 1.0, 1e-3)) {
    return segment;
  }
  return resampleToFrames(segment, Math.round(segment.frameCount / speed));
}

/** Stretch or squeeze `segment` to exactly `frames` frames at its own frame rate. */
export function resampleToFrames(segment: AudioSegment, frames: number): AudioSegment {
  if (frames === segment.frameCount) {
    return segment;
  }
  return AudioSegment.fromSamples(
    resample(segment.getSamples(), segment.channels, frames),
    segment.format
  );
}

/** Linear-interpolation resample of interleaved samples to `outFrames` frames. */
function resample(samples: Int16Array, channels: number, outFrames: number): Int16Array {
  const inFrames = samples.length / channels;
  const out = new Int16Array(Math.max(0, outFrames) * channels);
  if (inFrames === 0 || outFrames <= 0) return out;

  const step = inFrames / outFrames;
  for (let f = 0; f < outFrames; f++) {
    const position = f * step;
    const i0 = Math.min(Math.floor(position), inFrames - 1);
    const i1 = Math.min(i0 + 1, inFrames - 1);
    const frac = position - i0;
    for (let c = 0; c < channels; c++) {
      const a = samples[i0 * channels + c];
      const b = samples[i1 * channels + c];
      out[f * channels + c] = Math.round(a + (b - a) * frac);
    }
  }
  return out;
}
