import { readFileSync } from 'node:fs';
import { z } from 'zod';

const keywordListSchema = z.array(z.string().min(1)).nonempty();

/**
 * Read a keyword list shipped in the package `data/` directory.
 */
export function loadKeywordList(fileName: string): readonly string[] {
  const url = new URL(`../data/${fileName}`, import.meta.url);
  const parsed: unknown = JSON.parse(readFileSync(url, 'utf-8'));
  return keywordListSchema.parse(parsed);
}

/**
 * Dream-interpretation vocabulary whose presence marks genuine domain content.
 */
export const CULTURAL_INDICATORS = loadKeywordList('cultural-indicators.json');
