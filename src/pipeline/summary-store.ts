import { Logger } from '@nestjs/common';
import { createReadStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { CsvRecord, formatCsv, readCsvRecords } from '../common/csv';
import { ConfigurationError, formatErrorMessage, WriterError } from '../common/errors';
import { LogSummary } from '../metrics/dto/log-summary.dto';
import { SUMMARY_COLUMNS, summaryFromRecord, summaryToRow } from '../metrics/summary-columns';

/**
 * SummaryStore - append-only CSV of per-log summaries
 *
 * Every append goes through a promise chain, so at most one write is in
 * flight and rows never interleave. The header is written once, by the
 * first append into an empty or missing file.
 */
export class SummaryStore {
  private readonly logger = new Logger(SummaryStore.name);
  private tail: Promise<void> = Promise.resolve();
  private hasHeader: boolean | null = null;
  private appended = 0;

  constructor(readonly filePath: string) {}

  /** Rows appended through this instance */
  get appendedCount(): number {
    return this.appended;
  }

  /**
   * Start from an empty store (non-resume runs).
   */
  async reset(): Promise<void> {
    await this.tail;
    try {
      await fs.rm(this.filePath, { force: true });
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    } catch (error) {
      throw new WriterError(
        `Cannot reset summary store ${this.filePath}: ${formatErrorMessage(error)}`,
        error,
      );
    }
    this.hasHeader = false;
    this.appended = 0;
  }

  append(summary: LogSummary): Promise<void> {
    const write = this.tail.then(() => this.write(summary));
    // the caller sees the failure; later appends still run in order
    this.tail = write.catch((error: unknown) => {
      this.logger.debug(`Append of ${summary.identifier} failed: ${formatErrorMessage(error)}`);
    });
    return write;
  }

  /**
   * Resolves once every append issued so far has settled.
   */
  async flush(): Promise<void> {
    await this.tail;
  }

  /**
   * Cut a partial last row left by an interrupted append. The next append
   * then starts on a fresh line, and the log behind the cut row is not
   * seen as done.
   *
   * @returns bytes removed
   */
  async repair(): Promise<number> {
    await this.tail;
    let handle: fs.FileHandle;
    try {
      handle = await fs.open(this.filePath, 'r+');
    } catch (error) {
      if (isNotFound(error)) {
        return 0;
      }
      throw new WriterError(
        `Cannot open summary store ${this.filePath}: ${formatErrorMessage(error)}`,
        error,
      );
    }

    try {
      const { size } = await handle.stat();
      const keep = await completeLength(handle, size);
      if (keep === size) {
        return 0;
      }
      await handle.truncate(keep);
      this.hasHeader = null;
      this.logger.warn(
        `Dropped a partial row (${size - keep} bytes) at the end of ${this.filePath}`,
      );
      return size - keep;
    } catch (error) {
      throw new WriterError(
        `Cannot repair summary store ${this.filePath}: ${formatErrorMessage(error)}`,
        error,
      );
    } finally {
      await handle.close();
    }
  }

  /**
   * @throws ConfigurationError when a stored row does not parse as a summary
   */
  async readIdentifiers(): Promise<string[]> {
    const identifiers: string[] = [];
    for await (const record of this.records()) {
      identifiers.push(summaryFromRecord(record).identifier);
    }
    return identifiers;
  }

  async readAll(): Promise<LogSummary[]> {
    const summaries: LogSummary[] = [];
    for await (const record of this.records()) {
      summaries.push(summaryFromRecord(record));
    }
    return summaries;
  }

  private async write(summary: LogSummary): Promise<void> {
    try {
      if (this.hasHeader === null) {
        this.hasHeader = await this.fileHasContent();
      }
      const text = this.hasHeader
        ? formatCsv([summaryToRow(summary)])
        : formatCsv([summaryToRow(summary)], SUMMARY_COLUMNS);

      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, text, 'utf-8');
      this.hasHeader = true;
      this.appended++;
    } catch (error) {
      throw new WriterError(
        `Cannot append ${summary.identifier} to ${this.filePath}: ${formatErrorMessage(error)}`,
        error,
      );
    }
  }

  private async fileHasContent(): Promise<boolean> {
    try {
      const stats = await fs.stat(this.filePath);
      return stats.size > 0;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * @throws ConfigurationError when the stored header differs from SUMMARY_COLUMNS
   */
  private async *records(): AsyncGenerator<CsvRecord> {
    if (!(await this.fileHasContent())) {
      return;
    }

    const seen: { headers: string[] | null } = { headers: null };
    const rows = readCsvRecords(createReadStream(this.filePath), {
      onHeaders: (headers) => {
        seen.headers = headers;
      },
    });

    for await (const record of rows) {
      this.checkHeader(seen.headers);
      yield record;
    }
    this.checkHeader(seen.headers);
  }

  private checkHeader(headers: string[] | null): void {
    if (headers === null) {
      return;
    }
    const mismatch =
      headers.length !== SUMMARY_COLUMNS.length ||
      headers.some((header, i) => header !== SUMMARY_COLUMNS[i]);
    if (mismatch) {
      throw new ConfigurationError(
        `Summary store ${this.filePath} has an incompatible header (${headers.join(',')}); ` +
          'move it away or run without --resume',
      );
    }
  }
}

const TAIL_CHUNK_BYTES = 64 * 1024;

/**
 * Length of the file up to and including its last newline.
 */
async function completeLength(handle: fs.FileHandle, size: number): Promise<number> {
  let end = size;
  while (end > 0) {
    const start = Math.max(0, end - TAIL_CHUNK_BYTES);
    const buffer = Buffer.alloc(end - start);
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, start);
    const newline = buffer.subarray(0, bytesRead).lastIndexOf(0x0a);
    if (newline >= 0) {
      return start + newline + 1;
    }
    end = start;
  }
  return 0;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
