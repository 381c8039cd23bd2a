import { z } from 'zod';

/**
 * Per-record shape check. `Tags`, `Properties` and the metadata fields (`_id`,
 * `PublishDate`, `Url`) stay loose: the cleaner narrows them and falls back to
 * empty values, so an odd export shape never drops a record.
 */
export const rawRecordSchema = z
  .object({
    _id: z.unknown(),
    Title: z.string().optional(),
    Description: z.string().optional(),
    Text: z.string().optional(),
    Tags: z.unknown(),
    Properties: z.unknown(),
    PublishDate: z.unknown(),
    Url: z.unknown(),
  })
  .passthrough();

export type ValidatedRawRecord = z.infer<typeof rawRecordSchema>;

/**
 * Top-level input shape: a list of anything. Individual entries are checked
 * later so that one bad record does not abort the run.
 */
export const rawRecordListSchema = z.array(z.unknown());

export type RawRecordParseResult =
  | { success: true; record: ValidatedRawRecord }
  | { success: false; issues: string[] };

export function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${path}: ${issue.message}`;
  });
}

export function parseRawRecord(value: unknown): RawRecordParseResult {
  const result = rawRecordSchema.safeParse(value);
  if (result.success) {
    return { success: true, record: result.data };
  }

  return { success: false, issues: formatIssues(result.error.issues) };
}
