import { ConfigurationError } from './errors';

/**
 * Splits cue text into request-sized pieces for the TTS backends.
 *
 * Break preference: sentence end, then clause punctuation, then whitespace.
 * A single token longer than the budget is hard-split; those pieces are
 * marked `glued` because no separator existed between them in the source.
 */

export interface TextChunk {
  text: string;
  /** True when this chunk continues a token cut at the end of the previous chunk. */
  glued: boolean;
}

interface Atom {
  text: string;
  glued: boolean;
}

const SENTENCE_BREAK = /(?<=[.!?…])\s+/;
const CLAUSE_BREAK = /(?<=[,;:])\s+/;

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Lazily yield the chunks of `text`. Empty input yields nothing. */
export function* iterateChunks(text: string, maxChars: number): Generator<TextChunk> {
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new ConfigurationError(`maxChars must be a positive integer, got ${maxChars}`);
  }

  const normalized = normalizeWhitespace(text);
  if (!normalized) return;

  let current = '';
  let currentGlued = false;

  for (const atom of atomize(normalized, maxChars)) {
    if (!current) {
      current = atom.text;
      currentGlued = atom.glued;
      continue;
    }

    const candidate = atom.glued ? `${current}${atom.text}` : `${current} ${atom.text}`;
    if (candidate.length <= maxChars) {
      current = candidate;
      continue;
    }

    yield { text: current, glued: currentGlued };
    current = atom.text;
    currentGlued = atom.glued;
  }

  if (current) {
    yield { text: current, glued: currentGlued };
  }
}

/** Chunk `text` so every piece is at most `maxChars` long. */
export function chunkText(text: string, maxChars: number = 4000): string[] {
  return Array.from(iterateChunks(text, maxChars), (chunk) => chunk.text);
}

/** Inverse of iterateChunks: rebuilds the whitespace-normalized source text. */
export function joinChunks(chunks: Iterable<TextChunk>): string {
  let joined = '';
  for (const chunk of chunks) {
    if (!joined) {
      joined = chunk.text;
    } else {
      joined += chunk.glued ? chunk.text : ` ${chunk.text}`;
    }
  }
  return joined;
}

/** Break normalized text into the coarsest units that fit the budget. */
function* atomize(normalized: string, maxChars: number): Generator<Atom> {
  for (const sentence of normalized.split(SENTENCE_BREAK)) {
    if (sentence.length <= maxChars) {
      yield { text: sentence, glued: false };
      continue;
    }

    for (const clause of sentence.split(CLAUSE_BREAK)) {
      if (clause.length <= maxChars) {
        yield { text: clause, glued: false };
        continue;
      }

      for (const word of clause.split(' ')) {
        if (word.length <= maxChars) {
          yield { text: word, glued: false };
          continue;
        }
        yield* hardSplit(word, maxChars);
      }
    }
  }
}

/** Cut on code point boundaries so a surrogate pair is never separated. */
function* hardSplit(word: string, maxChars: number): Generator<Atom> {
  let piece = '';
  let glued = false;
  for (const char of word) {
    if (piece && piece.length + char.length > maxChars) {
      yield { text: piece, glued };
      piece = '';
      glued = true;
    }
    piece += char;
  }
  if (piece) {
    yield { text: piece, glued };
  }
}
