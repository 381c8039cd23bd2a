import type { CleanedRecord } from '@ruya-sft/record-sdk';

export const MAX_QUESTIONS_PER_RECORD = 4;
const SYMBOL_TEMPLATE_COUNT = 6;
const MAX_TAG_QUESTIONS = 2;

/**
 * Question templates, most generic first. Only the first
 * `SYMBOL_TEMPLATE_COUNT` are used when generating questions.
 */
export const QUESTION_TEMPLATES: readonly string[] = [
  'Rüyamda {symbol} gördüm, ne anlama gelir?',
  'Rüyada {symbol} görmek neye işaret eder?',
  '{symbol} rüyası nasıl yorumlanır?',
  'Rüyada {symbol} görmenin anlamı nedir?',
  '{symbol} rüyasının tabiri nedir?',
  'Rüyamda {symbol} vardı, bu neyi ifade eder?',
  'Rüyada {symbol} görmek iyi mi kötü mü?',
  '{symbol} ile ilgili rüyamın açıklaması nedir?',
  'Rüyada {symbol} görmek hakkında ne dersiniz?',
  '{symbol} rüyasının İslami yorumu nedir?',
];

function fillTemplate(template: string, symbol: string): string {
  return template.replaceAll('{symbol}', symbol);
}

function symbolQuestions(symbol: string, title: string): string[] {
  const questions = QUESTION_TEMPLATES.slice(0, SYMBOL_TEMPLATE_COUNT).map((template) =>
    fillTemplate(template, symbol),
  );

  if (title && !title.toLowerCase().includes(symbol.toLowerCase())) {
    questions.push(`${title} hakkında ne söyleyebilirsiniz?`);
  }

  return questions;
}

function titleQuestions(title: string): string[] {
  if (!title) return [];
  return [`${title} ne anlama gelir?`, `${title} nasıl yorumlanır?`, `${title} hakkında bilgi verir misiniz?`];
}

function tagQuestions(tags: readonly string[], symbol: string): string[] {
  return tags
    .slice(0, MAX_TAG_QUESTIONS)
    .filter((tag) => tag && tag !== symbol)
    .map((tag) => `Rüyada ${tag} görmek neyi ifade eder?`);
}

/**
 * Build the user questions for one record: symbol templates (or title
 * phrasings when no symbol was extracted), then tag questions, capped at
 * `MAX_QUESTIONS_PER_RECORD` in generation order.
 */
export function generateQuestions(record: Pick<CleanedRecord, 'dreamSymbol' | 'title' | 'tags'>): string[] {
  const { dreamSymbol, title, tags } = record;
  const questions = dreamSymbol ? symbolQuestions(dreamSymbol, title) : titleQuestions(title);
  questions.push(...tagQuestions(tags, dreamSymbol));
  return questions.slice(0, MAX_QUESTIONS_PER_RECORD);
}
