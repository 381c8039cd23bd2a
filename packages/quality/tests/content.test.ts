import { describe, expect, it } from 'vitest';
import { analyzeContentQuality } from '../src/content.js';
import { RICH_CONTENT } from './fixtures.js';

describe('analyzeContentQuality', () => {
  it('returns a zero result for empty content', () => {
    expect(analyzeContentQuality('')).toEqual({
      qualityScore: 0,
      issues: ['empty_content'],
      culturalIndicators: 0,
      readabilityScore: 0,
      contentLength: 0,
      sentenceCount: 0,
      avgSentenceLength: 0,
      uniqueWords: 0,
    });
  });

  it('gives full marks to rich, varied content', () => {
    const result = analyzeContentQuality(RICH_CONTENT);

    expect(result.qualityScore).toBe(100);
    expect(result.issues).toEqual([]);
    expect(result.contentLength).toBe(139);
    expect(result.sentenceCount).toBe(3);
    expect(result.uniqueWords).toBe(19);
  });

  it('penalizes short content and reports side metrics', () => {
    expect(analyzeContentQuality('Rüyada yılan görmek.')).toEqual({
      qualityScore: 55,
      issues: ['too_short', 'short_sentences', 'repetitive_content'],
      culturalIndicators: 3,
      readabilityScore: 90,
      contentLength: 20,
      sentenceCount: 2,
      avgSentenceLength: 1.5,
      uniqueWords: 3,
    });
  });

  it('counts function words in the repetition check', () => {
    const text =
      'Rüyada tabir edilen bereket ve hayır ve rızk ve fayda ve huzur ve sağlık ve mutluluk ve umut olarak yorumlanır.';
    const result = analyzeContentQuality(text);

    expect(result.issues).toEqual(['repetitive_content']);
    expect(result.qualityScore).toBe(85);
  });

  it('penalizes each noise marker', () => {
    const result = analyzeContentQuality(`${RICH_CONTENT} Milliyet`);

    expect(result.issues).toContain('contains_milliyet');
    expect(result.qualityScore).toBe(85);
  });

  it('never leaves the 0-100 range', () => {
    const samples = [
      'netcore seo amp milliyet pembenar anlamsız test',
      'a',
      RICH_CONTENT,
      'tekrar '.repeat(2000),
      `${RICH_CONTENT} `.repeat(60),
    ];

    for (const sample of samples) {
      const { qualityScore } = analyzeContentQuality(sample);
      expect(qualityScore).toBeGreaterThanOrEqual(0);
      expect(qualityScore).toBeLessThanOrEqual(100);
    }

    expect(analyzeContentQuality(samples[0] ?? '').qualityScore).toBe(0);
  });
});
