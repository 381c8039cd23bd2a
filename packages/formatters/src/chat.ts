import type { ChatExample, CleanedRecord } from '@ruya-sft/record-sdk';
import { composeAnswer } from './answer.js';
import { buildMetadata } from './metadata.js';
import { generateQuestions } from './questions.js';

export const CHAT_SYSTEM_MESSAGE = `Sen uzman bir Türk rüya yorumcususun. Türk kültürü ve İslami geleneklere uygun olarak rüya tabirlerini açıklarsın. Rüyaları yorumlarken:

1. Türk halk kültürü ve İslami kaynaklara dayanarak açıklama yap
2. Hem olumlu hem olumsuz anlamları belirt
3. Kültürel bağlamı ve geleneksel yorumları dahil et
4. Açıklayıcı ve anlayışlı bir dil kullan
5. Rüya sahibinin durumuna göre farklı yorumlar olabileceğini belirt`;

/**
 * One system/user/assistant triple per generated question.
 */
export function toChatExamples(record: CleanedRecord): ChatExample[] {
  const answer = composeAnswer(record.cleanedContent);
  if (!answer) return [];

  return generateQuestions(record).map((question): ChatExample => ({
    messages: [
      { role: 'system', content: CHAT_SYSTEM_MESSAGE },
      { role: 'user', content: question },
      { role: 'assistant', content: answer },
    ],
    metadata: buildMetadata(record),
  }));
}
