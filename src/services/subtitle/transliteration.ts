import { z } from 'zod';
import serbianTable from '../../data/serbian-latin-cyrillic.json';

const TransliterationTableSchema = z.object({
  digraphs: z.record(z.string(), z.string()),
  letters: z.record(z.string(), z.string()),
});

const table = TransliterationTableSchema.parse(serbianTable);
const DIGRAPHS = new Map(Object.entries(table.digraphs));
const LETTERS = new Map(Object.entries(table.letters));

const CYRILLIC = /[\u0400-\u04FF]/;

export function containsCyrillic(text: string): boolean {
  return CYRILLIC.test(text);
}

/**
 * Serbian Latin → Cyrillic. Digraphs (lj, nj, dž) map to a single letter;
 * characters with no Serbian counterpart (q, w, x, y, digits, punctuation)
 * pass through unchanged.
 */
export function latinToSerbianCyrillic(text: string): string {
  const source = text.normalize('NFC');
  let out = '';

  for (let i = 0; i < source.length; i++) {
    const pair = DIGRAPHS.get(source.slice(i, i + 2));
    if (pair !== undefined) {
      out += pair;
      i++;
      continue;
    }
    const char = source[i];
    out += LETTERS.get(char) ?? char;
  }

  return out;
}
