import { DeepLDecodeError } from './deepl-errors.js';
import type { GlossaryEntry } from './deepl-types.js';

/** Format name DeepL expects in `entries_format`. */
export const GLOSSARY_ENTRIES_FORMAT = 'tsv';
export const TSV_MEDIA_TYPE = 'text/tab-separated-values';

/**
 * One `source<TAB>target` line per entry. Tabs and newlines inside a phrase
 * are not escaped.
 */
export function encodeGlossaryEntries(entries: readonly GlossaryEntry[]): string {
  return entries.map((entry) => `${entry.source}\t${entry.target}`).join('\n');
}

/**
 * Parses TSV glossary entries. Blank lines are skipped; any other line must
 * hold exactly two tab-separated fields or the whole decode fails.
 */
export function decodeGlossaryEntries(tsv: string): GlossaryEntry[] {
  const entries: GlossaryEntry[] = [];

  for (const line of tsv.split(/\r?\n/)) {
    if (line === '') {
      continue;
    }
    const parts = line.split('\t');
    if (parts.length !== 2) {
      throw new DeepLDecodeError(`expected 2 tab-separated values, got ${JSON.stringify(line)}`);
    }
    const [source, target] = parts;
    entries.push({ source, target });
  }

  return entries;
}
