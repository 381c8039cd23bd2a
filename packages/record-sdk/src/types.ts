/**
 * Raw record as exported from the source collection. Only the fields the
 * pipeline reads are named; everything else is carried through untouched.
 * `Tags`, `Properties` and the metadata fields stay `unknown` here and are
 * narrowed by the cleaner. Ids and dates usually arrive as extended JSON
 * (`{ $oid }`, `{ $date }`).
 */
export interface RawRecord {
  _id?: unknown;
  Title?: string;
  Description?: string;
  Text?: string;
  Tags?: unknown;
  Properties?: unknown;
  PublishDate?: unknown;
  Url?: unknown;
  [key: string]: unknown;
}

/**
 * One record after markup cleaning and symbol/tag/SEO extraction.
 * Created once from exactly one raw record and never mutated afterwards.
 */
export interface CleanedRecord {
  readonly originalId: string;
  readonly title: string;
  readonly description: string;
  readonly cleanedContent: string;
  readonly dreamSymbol: string;
  readonly tags: readonly string[];
  readonly seoTitle: string;
  readonly seoDescription: string;
  readonly originalLength: number;
  readonly cleanedLength: number;
  readonly publishDate: string;
  readonly url: string;
}

export type TrainingFormat = 'chat' | 'prompt';

/**
 * Side record attached to every training example. Keys are part of the
 * emitted JSON, hence snake_case.
 */
export interface ExampleMetadata {
  dream_symbol: string;
  original_id: string;
  source_url: string;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatExample {
  messages: [ChatMessage, ChatMessage, ChatMessage];
  metadata: ExampleMetadata;
}

export interface PromptExample {
  prompt: string;
  completion: string;
  metadata: ExampleMetadata;
}

export interface TrainingExampleByFormat {
  chat: ChatExample;
  prompt: PromptExample;
}

export type TrainingExample = TrainingExampleByFormat[TrainingFormat];
