import type { CleanedRecord } from '@ruya-sft/record-sdk';

export const RICH_CONTENT =
  'Rüyada yılan görmek bereket ve bolluk işareti sayılır. Tabirciler bu rüyayı hayırlı olarak yorumlar ve düşmana karşı uyanık olmayı öğütler.';

export function cleanedRecord(overrides: Partial<CleanedRecord> = {}): CleanedRecord {
  const cleanedContent = overrides.cleanedContent ?? RICH_CONTENT;

  return {
    originalId: 'rec-1',
    title: 'Rüyada Yılan Görmek',
    description: 'Yılan rüyası',
    cleanedContent,
    dreamSymbol: 'yılan',
    tags: ['yılan'],
    seoTitle: 'Yılan Rüyası',
    seoDescription: '',
    originalLength: cleanedContent.length + 7,
    cleanedLength: cleanedContent.length,
    publishDate: '',
    url: 'https://example.com/yilan',
    ...overrides,
  };
}
