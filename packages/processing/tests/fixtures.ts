import type { RawRecord } from '@ruya-sft/record-sdk';
import { vi } from 'vitest';

export const SNAKE_TEXT =
  'Rüyada yılan görmek bereket ve bolluk işareti sayılır. Tabirciler bu rüyayı hayırlı olarak yorumlar.';

export const SNAKE_RECORD: RawRecord = {
  Title: 'Rüyada Yılan Görmek',
  Text: `<p>${SNAKE_TEXT}</p>`,
  Tags: ['yılan', 'SEO', '1'],
};

const SYMBOLS = ['yılan', 'deniz', 'altın', 'ev', 'kedi'];

/**
 * Deterministic raw records; every third one is too short to be kept.
 */
export function makeRawRecords(count: number): RawRecord[] {
  return Array.from({ length: count }, (_, index) => {
    const symbol = SYMBOLS[index % SYMBOLS.length] ?? 'yılan';
    const kept = index % 3 !== 0;

    return {
      _id: { $oid: `id-${index}` },
      Title: `Rüyada ${symbol} Görmek`,
      Text: kept
        ? `<p>Rüyada ${symbol} görmek bereket ve bolluk işareti sayılır. Tabirciler bu rüyayı hayırlı olarak yorumlar. Kayıt ${index}.</p>`
        : '<p>Kısa</p>',
      Tags: [symbol],
      Url: `https://example.com/${index}`,
    };
  });
}

export function createLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
