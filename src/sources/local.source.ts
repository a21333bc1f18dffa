import { Logger } from '@nestjs/common';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { addAbortSignal, Readable } from 'node:stream';
import {
  AccessDeniedError,
  LogNotFoundError,
  TransientFetchError,
  formatErrorMessage,
} from '../common/errors';
import {
  DEFAULT_VEHICLE_ID_PATTERN,
  inferVehicleId,
  matchesVehicleFilter,
} from '../common/vehicle-id';
import { ILogSource, ListOptions, LogRef } from './interfaces/log-source.interface';

/**
 * LocalLogSource
 *
 * Serves logs from a directory tree, e.g. a mounted bucket or a folder of
 * downloaded flights. Identifiers are POSIX paths relative to the root.
 * Entries are visited in sorted order so listings are reproducible.
 */
export class LocalLogSource implements ILogSource {
  private readonly logger = new Logger(LocalLogSource.name);

  readonly location: string;

  constructor(
    private readonly rootDir: string,
    private readonly vehicleIdPattern: string = DEFAULT_VEHICLE_ID_PATTERN,
  ) {
    this.location = path.resolve(rootDir);
  }

  async *list(options: ListOptions = {}): AsyncGenerator<LogRef> {
    const { vehicleFilter = null, extensions, signal } = options;

    for await (const relative of this.walk('')) {
      if (signal?.aborted) return;

      if (extensions && !extensions.includes(path.extname(relative).toLowerCase())) {
        continue;
      }

      const vehicleId = inferVehicleId(relative, this.vehicleIdPattern);
      if (!matchesVehicleFilter(vehicleId, vehicleFilter)) {
        continue;
      }

      const stats = await fs.stat(path.join(this.location, relative));
      yield { identifier: relative, vehicleId, sizeHint: stats.size };
    }
  }

  async open(identifier: string, signal?: AbortSignal): Promise<Readable> {
    const fullPath = this.resolveIdentifier(identifier);

    let handle: fs.FileHandle;
    try {
      handle = await fs.open(fullPath, 'r');
    } catch (error) {
      throw this.mapOpenError(identifier, error);
    }

    const stream = handle.createReadStream();
    return signal ? addAbortSignal(signal, stream) : stream;
  }

  private async *walk(relativeDir: string): AsyncGenerator<string> {
    const entries = await fs.readdir(path.join(this.location, relativeDir), {
      withFileTypes: true,
    });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const relative = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        yield* this.walk(relative);
      } else if (entry.isFile() && !entry.name.startsWith('.')) {
        yield relative;
      }
    }
  }

  /**
   * Keep identifiers inside the root; "../" tricks read as not found.
   */
  private resolveIdentifier(identifier: string): string {
    const fullPath = path.resolve(this.location, identifier);
    if (!fullPath.startsWith(this.location + path.sep)) {
      throw new LogNotFoundError(identifier);
    }
    return fullPath;
  }

  private mapOpenError(identifier: string, error: unknown): Error {
    const code = errorCode(error);
    switch (code) {
      case 'ENOENT':
      case 'EISDIR':
      case 'ENOTDIR':
        return new LogNotFoundError(identifier, error);
      case 'EACCES':
      case 'EPERM':
        return new AccessDeniedError(identifier, error);
      default:
        this.logger.debug(`Open failed for ${identifier} (${code ?? 'no code'})`);
        return new TransientFetchError(identifier, formatErrorMessage(error), error);
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
