import { CsvError } from 'csv-parse';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { FeedLayout } from '../config/feeds.js';
import { FeedFormatError, PipelineError } from '../lib/errors.js';
import type { RawRecord } from './rawRecord.js';

const decodedRowsSchema = z.array(z.array(z.string().nullable()));

function parseCells(text: string, feed: string): unknown {
  try {
    return parse(text, {
      delimiter: ',',
      quote: '"',
      escape: '"',
      bom: true,
      relax_quotes: true,
      relax_column_count: true,
      skip_empty_lines: true,
      cast: (value, context) => (value === '' && !context.quoting ? null : value)
    });
  } catch (error) {
    if (error instanceof CsvError) {
      throw new PipelineError(`${feed} feed could not be decoded: ${error.message}`, 'ingest', 'FEED_UNREADABLE', {
        cause: error
      });
    }
    throw error;
  }
}

/**
 * Decodes one delimited feed into raw records. Every cell stays text; an unquoted empty cell
 * becomes null, a quoted empty cell stays `''`. Short rows are padded with null and cells past
 * the header land in `overflow`. A quote inside an unquoted cell is kept as a literal character.
 */
export function decodeFeed(text: string, layout: FeedLayout): RawRecord[] {
  const rows = decodedRowsSchema.parse(parseCells(text, layout.feed));

  const [headerRow, ...dataRows] = rows;
  if (!headerRow) {
    throw new FeedFormatError(layout.feed, [...layout.columns]);
  }

  const header = headerRow.map((cell) => (cell ?? '').trim());
  const missing = layout.columns.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new FeedFormatError(layout.feed, missing);
  }

  return dataRows.map((cells, index) => {
    const values: Record<string, string | null> = {};
    header.forEach((column, position) => {
      values[column] = cells[position] ?? null;
    });

    return {
      feed: layout.feed,
      row: index + 1,
      values,
      overflow: cells.slice(header.length)
    };
  });
}
