import { z } from 'zod';

export const rawRecordSchema = z.object({
  feed: z.union([z.literal('applications'), z.literal('lms')]),
  /** 1-based position among the feed's data rows (header excluded). */
  row: z.number().int().positive(),
  values: z.record(z.string(), z.string().nullable()),
  /** Cells found past the last header column, in order. */
  overflow: z.array(z.string().nullable())
});

export type RawRecord = z.infer<typeof rawRecordSchema>;

export function rawValue(record: RawRecord, column: string): string | null {
  return record.values[column] ?? null;
}
