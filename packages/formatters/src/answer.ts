const MIN_PARAGRAPH_LENGTH = 30;
const MAX_PARAGRAPHS = 4;

/**
 * Turn cleaned content into an answer body: paragraphs of more than
 * `MIN_PARAGRAPH_LENGTH` characters, at most `MAX_PARAGRAPHS`, separated by a
 * blank line. Returns an empty string when nothing survives.
 */
export function composeAnswer(content: string): string {
  if (!content) return '';

  const paragraphs = content
    .split('\n')
    .map((p) => p.trim())
    .filter((p) => p.length > MIN_PARAGRAPH_LENGTH)
    .slice(0, MAX_PARAGRAPHS);

  return paragraphs.join('\n\n').replace(/ {2}/g, ' ').trim();
}
