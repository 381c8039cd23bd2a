import { countContained, DREAM_KEYWORDS, NOISE_MARKERS } from './keywords.js';
import type { ContentIssue, ContentQuality } from './types.js';

const SHORT_CONTENT_LENGTH = 100;
const LONG_CONTENT_LENGTH = 5000;
const MIN_DREAM_KEYWORDS = 3;
const REPETITION_RATIO = 0.1;

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

function highestWordCount(words: readonly string[]): number {
  const counts = new Map<string, number>();
  let highest = 0;
  for (const word of words) {
    const count = (counts.get(word) ?? 0) + 1;
    counts.set(word, count);
    highest = Math.max(highest, count);
  }
  return highest;
}

/**
 * Heuristic 0-100 score for one piece of cleaned content, with readability
 * and vocabulary side metrics.
 *
 * The repetition check counts every word, function words included, so long
 * natural texts can trip it on words like "ve" or "bir".
 */
export function analyzeContentQuality(content: string): ContentQuality {
  if (!content) {
    return {
      qualityScore: 0,
      issues: ['empty_content'],
      culturalIndicators: 0,
      readabilityScore: 0,
      contentLength: 0,
      sentenceCount: 0,
      avgSentenceLength: 0,
      uniqueWords: 0,
    };
  }

  const issues: ContentIssue[] = [];
  let score = 100;
  const lowered = content.toLowerCase();

  if (content.length < SHORT_CONTENT_LENGTH) {
    issues.push('too_short');
    score -= 30;
  } else if (content.length > LONG_CONTENT_LENGTH) {
    issues.push('too_long');
    score -= 10;
  }

  const culturalIndicators = countContained(lowered, DREAM_KEYWORDS);
  if (culturalIndicators < MIN_DREAM_KEYWORDS) {
    issues.push('low_cultural_context');
    score -= 20;
  }

  for (const marker of NOISE_MARKERS) {
    if (lowered.includes(marker)) {
      issues.push(`contains_${marker}`);
      score -= 15;
    }
  }

  const sentences = content.split('.');
  const avgSentenceLength =
    sentences.reduce((sum, sentence) => sum + splitWords(sentence).length, 0) / Math.max(sentences.length, 1);

  let readabilityScore = 100;
  if (avgSentenceLength > 30) {
    readabilityScore -= 20;
    issues.push('long_sentences');
  } else if (avgSentenceLength < 5) {
    readabilityScore -= 10;
    issues.push('short_sentences');
  }

  const words = splitWords(lowered);
  if (words.length > 0 && highestWordCount(words) > words.length * REPETITION_RATIO) {
    issues.push('repetitive_content');
    score -= 15;
  }

  return {
    qualityScore: Math.max(0, score),
    issues,
    culturalIndicators,
    readabilityScore,
    contentLength: content.length,
    sentenceCount: sentences.length,
    avgSentenceLength,
    uniqueWords: new Set(words).size,
  };
}
