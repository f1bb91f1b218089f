/**
 * Time and number helpers shared by the subtitle loader and the timing pipeline.
 * All durations are milliseconds unless a name says otherwise.
 */

/** Clamp `value` into `[min, max]`. Both bounds are inclusive. */
export function clamp(value: number, min: number, max: number): number {
  if (min > max) {
    throw new RangeError(`clamp: min (${min}) is greater than max (${max})`);
  }
  return Math.max(min, Math.min(value, max));
}

/** True when `a` and `b` differ by at most `relTol` of the larger magnitude. */
export function isClose(a: number, b: number, relTol: number = 1e-9): boolean {
  if (a === b) return true;
  return Math.abs(a - b) <= relTol * Math.max(Math.abs(a), Math.abs(b));
}

const SRT_TIMESTAMP = /^(\d{1,3}):(\d{1,2}):(\d{1,2})(?:[,.](\d{1,3}))?$/;

/**
 * Parse an SRT timestamp (`HH:MM:SS,mmm`) into milliseconds.
 * A dot is accepted in place of the comma; a missing fraction means 0 ms.
 */
export function parseSrtTimestamp(value: string): number {
  const match = SRT_TIMESTAMP.exec(value.trim());
  if (!match) {
    throw new RangeError(`Invalid SRT timestamp "${value}"`);
  }
  const [, hours, minutes, seconds, fraction = '0'] = match;
  const minutesNum = Number(minutes);
  const secondsNum = Number(seconds);
  if (minutesNum > 59 || secondsNum > 59) {
    throw new RangeError(`Invalid SRT timestamp "${value}"`);
  }
  // "5" after the comma is 500 ms, not 5 ms
  const millis = Number(fraction.padEnd(3, '0'));
  return ((Number(hours) * 60 + minutesNum) * 60 + secondsNum) * 1000 + millis;
}

/** Format milliseconds as an SRT timestamp. */
export function formatSrtTimestamp(ms: number): string {
  const total = Math.max(0, Math.round(ms));
  const hours = Math.floor(total / 3_600_000);
  const minutes = Math.floor((total % 3_600_000) / 60_000);
  const seconds = Math.floor((total % 60_000) / 1000);
  const millis = total % 1000;
  return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)},${pad(millis, 3)}`;
}

export function msToFrames(ms: number, frameRate: number): number {
  return Math.round((ms * frameRate) / 1000);
}

export function framesToMs(frames: number, frameRate: number): number {
  return (frames * 1000) / frameRate;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}
