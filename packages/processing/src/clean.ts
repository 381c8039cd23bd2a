import { convert, type HtmlToTextOptions } from 'html-to-text';
import { toErrorMessage, type CleanedRecord, type PipelineLogger, type RawRecord } from '@ruya-sft/record-sdk';

const SYMBOL_STOPWORDS = new Set(['ne', 'nedir', 'anlama', 'gelir', 'neye']);
const GENERIC_TAGS = new Set(['1', '2', '3', 'ruya', 'rüya']);
const TAG_NOISE_PATTERN = /(seo|amp|milliyet|pembenar)/i;

/**
 * Title rules for the dream symbol, most specific first. Each captures one
 * word; reordering changes results on ambiguous titles.
 */
const SYMBOL_PATTERNS: readonly RegExp[] = [
  /Rüyada\s+([\p{L}\p{N}_]+)\s+Görmek/iu,
  /Rüyada\s+([\p{L}\p{N}_]+)/iu,
  /([\p{L}\p{N}_]+)\s+Görmek/iu,
];

const NAMED_ENTITIES = new Map<string, string>([
  ['amp', '&'],
  ['lt', '<'],
  ['gt', '>'],
  ['quot', '"'],
  ['apos', "'"],
  ['nbsp', ' '],
  ['colon', ':'],
  ['hellip', '…'],
  ['ndash', '–'],
  ['mdash', '—'],
  ['lsquo', '‘'],
  ['rsquo', '’'],
  ['ldquo', '“'],
  ['rdquo', '”'],
]);

const HTML_TO_TEXT_OPTIONS: HtmlToTextOptions = {
  wordwrap: false,
  selectors: [
    { selector: 'script', format: 'skip' },
    { selector: 'style', format: 'skip' },
    { selector: 'img', format: 'skip' },
    { selector: 'hr', format: 'skip' },
    { selector: 'a', options: { ignoreHref: true } },
    { selector: 'blockquote', format: 'block' },
    { selector: 'ul', options: { itemPrefix: '' } },
    { selector: 'ol', format: 'unorderedList', options: { itemPrefix: '' } },
    ...(['h1', 'h2', 'h3', 'h4', 'h5', 'h6'] as const).map((selector) => ({
      selector,
      options: { uppercase: false },
    })),
  ],
};

/**
 * Trim whitespace and collapse multiple spaces.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Decode named and numeric HTML entities in a single pass, so `&amp;lt;`
 * becomes `&lt;` and not `<`. Unknown entities are left as they are.
 */
export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(#\d+|#x[0-9a-f]+|[a-z]+);/gi, (match, body: string) => {
    if (body.startsWith('#')) {
      const hex = body[1] === 'x' || body[1] === 'X';
      const codePoint = Number.parseInt(body.slice(hex ? 2 : 1), hex ? 16 : 10);
      return codePoint > 0 && codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match;
    }

    return NAMED_ENTITIES.get(body.toLowerCase()) ?? match;
  });
}

export type MarkupExtraction = { ok: true; text: string } | { ok: false; reason: string };

/**
 * One way of turning markup into raw text. Strategies report failure through
 * their result instead of throwing.
 */
export interface MarkupStrategy {
  name: string;
  extract(html: string): MarkupExtraction;
}

export const structuredStrategy: MarkupStrategy = {
  name: 'structured',
  extract(html) {
    try {
      return { ok: true, text: convert(html, HTML_TO_TEXT_OPTIONS) };
    } catch (err) {
      return { ok: false, reason: toErrorMessage(err) };
    }
  },
};

export const regexStrategy: MarkupStrategy = {
  name: 'regex',
  extract(html) {
    return { ok: true, text: html.replace(/<[^>]+>/g, '') };
  },
};

export const DEFAULT_MARKUP_STRATEGIES: readonly MarkupStrategy[] = [structuredStrategy, regexStrategy];

export interface CleanMarkupOptions {
  strategies?: readonly MarkupStrategy[];
  logger?: PipelineLogger;
}

/**
 * Extract visible text from HTML. The first strategy that succeeds wins; its
 * output is entity-decoded and whitespace-collapsed. Never throws.
 */
export function cleanMarkup(raw: string | undefined, options: CleanMarkupOptions = {}): string {
  if (!raw) return '';
  const { strategies = DEFAULT_MARKUP_STRATEGIES, logger } = options;

  for (const strategy of strategies) {
    const result = strategy.extract(raw);
    if (result.ok) {
      return normalizeWhitespace(decodeHtmlEntities(result.text));
    }
    logger?.warn(`[clean] ${strategy.name} markup extraction failed: ${result.reason}`);
  }

  return '';
}

/**
 * Extract the dream symbol from a title such as "Rüyada Yılan Görmek".
 * Returns an empty string when no rule yields a non-generic word.
 */
export function extractSymbol(title: string | undefined): string {
  if (!title) return '';

  for (const pattern of SYMBOL_PATTERNS) {
    const captured = pattern.exec(title)?.[1];
    if (!captured) continue;

    const symbol = captured.toLowerCase();
    if (!SYMBOL_STOPWORDS.has(symbol)) {
      return symbol;
    }
  }

  return '';
}

/**
 * Trim and lowercase tags, dropping branding/SEO noise, one-character tags and
 * generic domain words. Order is kept; duplicates are not removed.
 */
export function filterTags(rawTags: unknown): string[] {
  if (!Array.isArray(rawTags)) return [];

  const tags: string[] = [];
  for (const rawTag of rawTags) {
    if (typeof rawTag !== 'string') continue;

    const tag = rawTag.trim().toLowerCase();
    if (tag.length <= 1) continue;
    if (TAG_NOISE_PATTERN.test(tag)) continue;
    if (GENERIC_TAGS.has(tag)) continue;

    tags.push(tag);
  }

  return tags;
}

export interface SeoFields {
  seoTitle: string;
  seoDescription: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pick the SEO title and description out of `{ IxName, Value }` property
 * entries. The first match with a non-empty `Value` settles its field, trimmed,
 * even when only whitespace is left. Malformed entries are skipped.
 */
export function extractSeoFields(properties: unknown): SeoFields {
  const fields: SeoFields = { seoTitle: '', seoDescription: '' };
  if (!Array.isArray(properties)) return fields;

  let titleFound = false;
  let descriptionFound = false;

  for (const entry of properties) {
    if (!isRecord(entry)) continue;

    const name = entry.IxName;
    const value = entry.Value;
    if (typeof name !== 'string' || typeof value !== 'string' || value === '') continue;

    const key = name.toLowerCase();
    if (key === 'seotitle' && !titleFound) {
      fields.seoTitle = value.trim();
      titleFound = true;
    } else if (key === 'seodescription' && !descriptionFound) {
      fields.seoDescription = value.trim();
      descriptionFound = true;
    }
  }

  return fields;
}

function readScalar(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

/** `"abc"` or `{ $oid: "abc" }`; anything else reads as empty. */
function readOriginalId(id: unknown): string {
  if (typeof id === 'string') return id;
  return isRecord(id) ? readScalar(id.$oid) : '';
}

/**
 * Plain string or number, `{ $date: <string | number> }`, or the canonical
 * `{ $date: { $numberLong: "..." } }`. Anything else reads as empty.
 */
function readPublishDate(date: unknown): string {
  if (!isRecord(date)) return readScalar(date);

  const inner = date.$date;
  return isRecord(inner) ? readScalar(inner.$numberLong) : readScalar(inner);
}

/**
 * Build the cleaned record for one raw record. Does not decide whether the
 * record is kept; see `isAcceptable`.
 */
export function cleanRecord(raw: RawRecord, options: CleanMarkupOptions = {}): CleanedRecord {
  const html = raw.Text ?? '';
  const title = raw.Title ?? '';
  const cleanedContent = cleanMarkup(html, options);
  const { seoTitle, seoDescription } = extractSeoFields(raw.Properties);

  return {
    originalId: readOriginalId(raw._id),
    title: title.trim(),
    description: (raw.Description ?? '').trim(),
    cleanedContent,
    dreamSymbol: extractSymbol(title),
    tags: filterTags(raw.Tags),
    seoTitle,
    seoDescription,
    originalLength: html.length,
    cleanedLength: cleanedContent.length,
    publishDate: readPublishDate(raw.PublishDate),
    url: typeof raw.Url === 'string' ? raw.Url : '',
  };
}
