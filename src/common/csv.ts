import csvParser from 'csv-parser';
import { unparse } from 'papaparse';
import { Readable } from 'node:stream';

export type CsvRecord = Record<string, string>;

export interface ReadCsvOptions {
  separator?: string;
  /** Called once with the trimmed header row */
  onHeaders?: (headers: string[]) => void;
}

/**
 * Stream rows out of a CSV source with csv-parser.
 *
 * Headers are trimmed. Errors raised by the source are forwarded to the
 * parser so they surface from the iteration instead of stalling it.
 */
export async function* readCsvRecords(
  input: Readable | AsyncIterable<Buffer>,
  options: ReadCsvOptions = {},
): AsyncGenerator<CsvRecord> {
  const source = input instanceof Readable ? input : Readable.from(input);
  const parser = csvParser({
    separator: options.separator ?? ',',
    mapHeaders: ({ header }) => header.trim(),
  });

  const { onHeaders } = options;
  if (onHeaders) {
    parser.on('headers', (headers: string[]) => onHeaders(headers));
  }
  source.on('error', (error) => parser.destroy(error));
  source.pipe(parser);

  try {
    for await (const row of parser) {
      if (isCsvRecord(row)) {
        yield row;
      }
    }
  } finally {
    source.destroy();
  }
}

/**
 * Format rows with papaparse. Always ends with a newline so appends line up.
 */
export function formatCsv(
  rows: ReadonlyArray<ReadonlyArray<string | number>>,
  header?: readonly string[],
): string {
  if (rows.length === 0) {
    // papaparse reads empty `data` as one empty row
    return header ? `${unparse([[...header]], { newline: '\n' })}\n` : '';
  }
  const text = unparse(
    {
      fields: header ? [...header] : [],
      data: rows.map((row) => [...row]),
    },
    { header: header !== undefined, newline: '\n' },
  );
  return `${text}\n`;
}

function isCsvRecord(value: unknown): value is CsvRecord {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return Object.values(value).every((cell) => typeof cell === 'string');
}
