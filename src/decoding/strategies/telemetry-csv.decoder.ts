import { Injectable, Logger } from '@nestjs/common';
import { CorruptFormatError } from '../../common/errors';
import { CsvRecord, readCsvRecords } from '../../common/csv';
import {
  DecodeOptions,
  ILogDecoder,
  Sample,
} from '../interfaces/decoder.interface';

interface PendingSample {
  topic: string;
  instance: number;
  timestampUs: number;
  values: Record<string, number>;
}

/**
 * Telemetry CSV Decoder Strategy
 *
 * Handles long-format (EAV) exports of flight telemetry, one value per row:
 *
 * ```
 * timestamp_us,topic,instance,field,value
 * 1000000,sensor_accel,0,x,0.12
 * 1000000,sensor_accel,0,y,-0.04
 * ```
 *
 * Consecutive rows sharing timestamp, topic and instance form one sample.
 * Malformed rows are skipped with a warning; a file with rows but none
 * usable is corrupt.
 */
@Injectable()
export class TelemetryCsvDecoder implements ILogDecoder {
  private readonly logger = new Logger(TelemetryCsvDecoder.name);

  readonly name = 'telemetry-csv';
  readonly description = 'Telemetry CSV export (timestamp_us,topic,instance,field,value)';
  readonly extensions = ['.csv'] as const;

  private readonly REQUIRED_COLUMNS = [
    'timestamp_us',
    'topic',
    'instance',
    'field',
    'value',
  ];

  canHandle(_identifier: string, head: Buffer): boolean {
    const firstLine = head
      .toString('utf-8')
      .replace(/^\uFEFF/, '')
      .split(/\r?\n/, 1)[0]
      .toLowerCase();
    const columns = firstLine.split(',').map((column) => column.trim());
    return this.REQUIRED_COLUMNS.every((column) => columns.includes(column));
  }

  async *decode(
    chunks: AsyncIterable<Buffer>,
    options: DecodeOptions = {},
  ): AsyncGenerator<Sample> {
    let headers: string[] = [];
    let current: PendingSample | null = null;
    let rowCount = 0;
    let skippedCount = 0;

    const records = readCsvRecords(chunks, {
      onHeaders: (found) => {
        headers = found.map((header) => header.replace(/^\uFEFF/, '').toLowerCase());
      },
    });

    for await (const record of records) {
      if (rowCount === 0) {
        this.assertColumns(headers);
      }
      rowCount++;

      const row = this.parseRow(record);
      if (!row) {
        skippedCount++;
        continue;
      }
      if (options.topics && !options.topics.has(row.topic)) {
        continue;
      }

      if (
        current &&
        current.timestampUs === row.timestampUs &&
        current.topic === row.topic &&
        current.instance === row.instance
      ) {
        current.values[row.field] = row.value;
        continue;
      }

      if (current) {
        yield current;
      }
      current = {
        topic: row.topic,
        instance: row.instance,
        timestampUs: row.timestampUs,
        values: { [row.field]: row.value },
      };
    }

    if (current) {
      yield current;
    }

    if (rowCount === 0) {
      throw new CorruptFormatError(this.name, 'No data rows found in CSV file');
    }
    if (skippedCount === rowCount) {
      throw new CorruptFormatError(
        this.name,
        'No valid data rows found. Check file format.',
      );
    }
    if (skippedCount > 0) {
      this.logger.warn(`Skipped ${skippedCount}/${rowCount} malformed row(s)`);
    }
  }

  private assertColumns(headers: string[]): void {
    const missing = this.REQUIRED_COLUMNS.filter((column) => !headers.includes(column));
    if (missing.length > 0) {
      throw new CorruptFormatError(
        this.name,
        `Missing column(s): ${missing.join(', ')}`,
      );
    }
  }

  private parseRow(record: CsvRecord): {
    timestampUs: number;
    topic: string;
    instance: number;
    field: string;
    value: number;
  } | null {
    const lower = new Map(
      Object.entries(record).map(([key, value]): [string, string] => [
        key.replace(/^\uFEFF/, '').toLowerCase(),
        value.trim(),
      ]),
    );

    const rawTimestamp = lower.get('timestamp_us') ?? '';
    const timestampUs = rawTimestamp === '' ? Number.NaN : Number(rawTimestamp);
    const instance = Number(lower.get('instance') || '0');
    const topic = lower.get('topic') ?? '';
    const field = lower.get('field') ?? '';
    const rawValue = lower.get('value') ?? '';
    const value = rawValue === '' ? Number.NaN : Number(rawValue);

    if (
      !Number.isFinite(timestampUs) ||
      !Number.isInteger(instance) ||
      !topic ||
      !field ||
      Number.isNaN(value)
    ) {
      return null;
    }

    return { timestampUs, topic, instance, field, value };
  }
}
