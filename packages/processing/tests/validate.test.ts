import { describe, expect, it } from 'vitest';
import { countCulturalIndicators, isAcceptable, rejectionReason } from '../src/validate.js';
import { SNAKE_TEXT } from './fixtures.js';

describe('countCulturalIndicators', () => {
  it('counts distinct terms by substring containment', () => {
    expect(countCulturalIndicators('Rüyada tabir')).toBe(3);
  });

  it('accepts a custom term list', () => {
    expect(countCulturalIndicators('Deniz DALGASI', ['dalga', 'deniz', 'kum'])).toBe(2);
  });
});

describe('rejectionReason', () => {
  it('rejects empty content first', () => {
    expect(rejectionReason({ cleanedContent: '', dreamSymbol: '' }, 0)).toBe('empty_content');
  });

  it('rejects content below the minimum length', () => {
    expect(rejectionReason({ cleanedContent: SNAKE_TEXT, dreamSymbol: 'yılan' }, SNAKE_TEXT.length + 1)).toBe(
      'too_short',
    );
  });

  it('rejects records without a symbol', () => {
    expect(rejectionReason({ cleanedContent: SNAKE_TEXT, dreamSymbol: '' }, 50)).toBe('missing_symbol');
  });

  it('rejects content with fewer than two indicator terms', () => {
    expect(rejectionReason({ cleanedContent: 'x'.repeat(120), dreamSymbol: 'yılan' }, 50)).toBe(
      'weak_cultural_context',
    );
  });

  it('accepts a record that passes every rule', () => {
    expect(rejectionReason({ cleanedContent: SNAKE_TEXT, dreamSymbol: 'yılan' }, 50)).toBeNull();
    expect(isAcceptable({ cleanedContent: SNAKE_TEXT, dreamSymbol: 'yılan' }, SNAKE_TEXT.length)).toBe(true);
  });
});

describe('isAcceptable', () => {
  it('only accepts records meeting the length and symbol rules', () => {
    const candidates = [
      { cleanedContent: SNAKE_TEXT, dreamSymbol: 'yılan' },
      { cleanedContent: SNAKE_TEXT, dreamSymbol: '' },
      { cleanedContent: 'Rüyada tabir', dreamSymbol: 'su' },
      { cleanedContent: '', dreamSymbol: 'su' },
      { cleanedContent: `${SNAKE_TEXT} ${SNAKE_TEXT}`, dreamSymbol: 'yılan' },
    ];

    for (const minContentLength of [0, 10, 50, 100, 150, 250]) {
      for (const candidate of candidates) {
        if (isAcceptable(candidate, minContentLength)) {
          expect(candidate.cleanedContent.length).toBeGreaterThanOrEqual(minContentLength);
          expect(candidate.dreamSymbol).not.toBe('');
        }
      }
    }
  });
});
