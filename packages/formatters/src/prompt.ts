import type { CleanedRecord, PromptExample } from '@ruya-sft/record-sdk';
import { composeAnswer } from './answer.js';
import { buildMetadata } from './metadata.js';
import { generateQuestions } from './questions.js';

const PROMPT_PERSONA =
  'Sen uzman bir Türk rüya yorumcususun. Türk kültürü ve İslami geleneklere uygun rüya tabirleri yaparsın.';

export function buildPrompt(question: string): string {
  return `${PROMPT_PERSONA}\n\nSoru: ${question}\n\nCevap:`;
}

/**
 * Prompt/completion pairs; the completion is the same composed answer for
 * every question of the record.
 */
export function toPromptExamples(record: CleanedRecord): PromptExample[] {
  const answer = composeAnswer(record.cleanedContent);
  if (!answer) return [];

  return generateQuestions(record).map((question): PromptExample => ({
    prompt: buildPrompt(question),
    completion: answer,
    metadata: buildMetadata(record),
  }));
}
