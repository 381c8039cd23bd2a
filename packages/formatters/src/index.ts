export { generateQuestions, QUESTION_TEMPLATES, MAX_QUESTIONS_PER_RECORD } from './questions.js';
export { composeAnswer } from './answer.js';
export { buildMetadata } from './metadata.js';
export { toChatExamples, CHAT_SYSTEM_MESSAGE } from './chat.js';
export { toPromptExamples, buildPrompt } from './prompt.js';
export { formatRecord, formatBatch } from './format.js';
export type { FormatBatchOptions } from './format.js';
