import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

// ---------------------------------------------------------------------------
// 1. CUES
// ---------------------------------------------------------------------------

/** One subtitle entry. Times are milliseconds from the start of the track. */
export interface Cue {
  index: number;
  startMs: number;
  endMs: number;
  text: string;
}

// ---------------------------------------------------------------------------
// 2. PIPELINE CONFIG
// ---------------------------------------------------------------------------

export interface PipelineConfig {
  /** Pad audio that finishes early with silence up to the end of its slot */
  fillToEnd: boolean;
  /** Truncate audio that overruns its slot instead of speeding it up */
  hardCut: boolean;
  padLeadingMs: number;
  padTrailingMs: number;
  maxCharsPerCall: number;
  /** Largest playback speed applied to an overrunning cue (>= 1.0) */
  maxSpeedup: number;
  /** How many cues are synthesized ahead in parallel */
  concurrency: number;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  fillToEnd: true,
  hardCut: false,
  padLeadingMs: 0,
  padTrailingMs: 0,
  maxCharsPerCall: 4000,
  maxSpeedup: 1.15,
  concurrency: 4,
};

export const PipelineConfigSchema = z.object({
  fillToEnd: z.boolean(),
  hardCut: z.boolean(),
  padLeadingMs: z.number().int().min(0, 'padLeadingMs must not be negative'),
  padTrailingMs: z.number().int().min(0, 'padTrailingMs must not be negative'),
  maxCharsPerCall: z.number().int().min(1, 'maxCharsPerCall must be at least 1'),
  maxSpeedup: z.number().finite().min(1.0, 'maxSpeedup must be at least 1.0'),
  concurrency: z.number().int().min(1).max(16),
});

/** Validate a (possibly partial) pipeline config, filling defaults. */
export function validatePipelineConfig(input: Partial<PipelineConfig> = {}): PipelineConfig {
  // An explicit undefined means "use the default"
  const provided = Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
  const result = PipelineConfigSchema.safeParse({ ...DEFAULT_PIPELINE_CONFIG, ...provided });
  if (result.success) {
    return Object.freeze({ ...result.data });
  }
  const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
  throw new ConfigurationError('Invalid pipeline configuration', issues);
}

// ---------------------------------------------------------------------------
// 3. BUILD REPORT
// ---------------------------------------------------------------------------

/** What the timing pass did with a cue's audio. */
export type CueAction =
  | 'as-is'      // emitted unchanged
  | 'padded'     // fits, tail filled with silence to the slot end
  | 'sped-up'    // overran, played faster and now fits
  | 'capped'     // overran, played at maxSpeedup and still overruns
  | 'hard-cut'   // overran, truncated at the slot end
  | 'empty';     // no text, nothing synthesized

export interface CuePlacement {
  index: number;
  slotStartMs: number;
  slotMs: number;
  /** Where the cue's audio actually starts in the track */
  placedAtMs: number;
  rawMs: number;
  emittedMs: number;
  speed: number;
  action: CueAction;
  chunks: number;
}

export interface BuildReport {
  durationMs: number;
  cues: CuePlacement[];
  /** Cues whose emitted audio runs past their slot end */
  overflowingCues: number[];
}
