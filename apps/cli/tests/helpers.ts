import type { Logger } from 'pino';
import { vi } from 'vitest';

export function createLoggerMock(): Logger {
  const child = vi.fn();
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child,
  } as unknown as Logger;
  child.mockReturnValue(logger);

  return logger;
}

export const GOOD_TEXT =
  'Rüyada yılan görmek bereket ve bolluk işareti sayılır. Tabirciler bu rüyayı hayırlı olarak yorumlar.';

export function rawRecords(count: number, options: { shortEvery?: number } = {}): Array<Record<string, unknown>> {
  return Array.from({ length: count }, (_, index) => {
    const short = options.shortEvery !== undefined && index % options.shortEvery === 0;
    return {
      _id: { $oid: `id-${index}` },
      Title: 'Rüyada Yılan Görmek',
      Text: short ? '<p>Kısa</p>' : `<p>${GOOD_TEXT}</p>`,
      Tags: ['yılan', 'SEO'],
      Url: `https://example.com/${index}`,
    };
  });
}
