import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { rawRecordListSchema, toErrorMessage, type CleanedRecord } from '@ruya-sft/record-sdk';

/**
 * The input file is not a JSON list of records. Fatal: raised before any
 * record is processed.
 */
export class InputShapeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InputShapeError';
  }
}

export async function loadRecords(path: string): Promise<unknown[]> {
  const text = await readFile(path, 'utf8');

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new InputShapeError(`Input file ${path} is not valid JSON: ${toErrorMessage(error)}`, { cause: error });
  }

  const result = rawRecordListSchema.safeParse(data);
  if (!result.success) {
    throw new InputShapeError('Input data must be a list of dream records');
  }

  return result.data;
}

export async function writeJson(path: string, value: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
}

/**
 * One JSON object per line, each line newline-terminated. An empty list
 * writes an empty file.
 */
export async function writeJsonl(path: string, rows: readonly unknown[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, rows.map((row) => `${JSON.stringify(row)}\n`).join(''), 'utf8');
}

/** Persisted shape of a cleaned record. */
export interface ProcessedRow {
  original_id: string;
  title: string;
  description: string;
  cleaned_content: string;
  dream_symbol: string;
  tags: string[];
  seo_title: string;
  seo_description: string;
  original_length: number;
  cleaned_length: number;
  publish_date: string;
  url: string;
}

export function toProcessedRow(record: CleanedRecord): ProcessedRow {
  return {
    original_id: record.originalId,
    title: record.title,
    description: record.description,
    cleaned_content: record.cleanedContent,
    dream_symbol: record.dreamSymbol,
    tags: [...record.tags],
    seo_title: record.seoTitle,
    seo_description: record.seoDescription,
    original_length: record.originalLength,
    cleaned_length: record.cleanedLength,
    publish_date: record.publishDate,
    url: record.url,
  };
}
