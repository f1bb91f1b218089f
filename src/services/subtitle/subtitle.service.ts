import fs from 'fs';
import { logger } from '../../config/logger';
import type { Cue } from '../../types/pipeline.types';
import { SubtitleParseError } from '../../utils/errors';
import { parseSrtTimestamp } from '../../utils/timing';
import { containsCyrillic, latinToSerbianCyrillic } from './transliteration';

const TIMING_LINE = /^\s*(\S+)\s*-->\s*(\S+)/;

/**
 * Parse SRT content into cues ordered by start time.
 *
 * Tolerates a UTF-8 BOM, CRLF line endings, a missing index line and extra
 * blank lines. Multi-line cue text is joined with single spaces. A block
 * whose timing line cannot be read raises SubtitleParseError.
 */
export function parseSrt(content: string): Cue[] {
  const normalized = content.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
  const blocks = normalized.split(/\n\s*\n/).map((block) => block.trim()).filter(Boolean);
  const cues: Cue[] = [];

  blocks.forEach((block, blockIndex) => {
    const lines = block.split('\n');
    let lineIndex = 0;
    let index = blockIndex + 1;

    if (/^\d+$/.test(lines[0].trim())) {
      index = Number(lines[0].trim());
      lineIndex = 1;
    }

    const timing = lines[lineIndex] !== undefined ? TIMING_LINE.exec(lines[lineIndex]) : null;
    if (!timing) {
      throw new SubtitleParseError(blockIndex + 1, `expected "start --> end", got "${lines[lineIndex] ?? ''}"`);
    }

    let startMs: number;
    let endMs: number;
    try {
      startMs = parseSrtTimestamp(timing[1]);
      endMs = parseSrtTimestamp(timing[2]);
    } catch (error: unknown) {
      throw new SubtitleParseError(blockIndex + 1, error instanceof Error ? error.message : String(error));
    }

    if (endMs < startMs) {
      logger.warn(`Subtitle ${index} ends before it starts; treating it as zero-length`);
      endMs = startMs;
    }

    const text = lines
      .slice(lineIndex + 1)
      .map((line) => line.trim())
      .filter(Boolean)
      .join(' ');

    cues.push({ index, startMs, endMs, text });
  });

  // Stable sort keeps authored order for cues sharing a start time
  return cues
    .map((cue, position) => ({ cue, position }))
    .sort((a, b) => a.cue.startMs - b.cue.startMs || a.position - b.position)
    .map(({ cue }) => cue);
}

export interface SubtitleServiceOptions {
  /** Convert Serbian Latin text to Cyrillic unless the file already has Cyrillic */
  transliterate: boolean;
}

// ===========================================================================
// Subtitle Service
//
// Cue source for the pipeline: reads an SRT file and hands back ordered,
// optionally transliterated cues.
// ===========================================================================

export class SubtitleService {
  constructor(private readonly options: SubtitleServiceOptions = { transliterate: true }) {}

  async load(filePath: string): Promise<Cue[]> {
    const content = await fs.promises.readFile(filePath, 'utf-8');
    const cues = parseSrt(content);

    logger.info(`Loaded ${cues.length} subtitles from ${filePath}`);

    if (!this.options.transliterate) {
      return cues;
    }

    if (containsCyrillic(content)) {
      logger.debug('Subtitles already contain Cyrillic, skipping transliteration');
      return cues;
    }

    logger.info('Transliterating subtitles to Serbian Cyrillic');
    return cues.map((cue) => ({ ...cue, text: latinToSerbianCyrillic(cue.text) }));
  }
}
