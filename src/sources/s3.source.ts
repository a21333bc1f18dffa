import { Logger } from '@nestjs/common';
import {
  GetObjectCommand,
  NoSuchKey,
  paginateListObjectsV2,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import {
  AccessDeniedError,
  formatErrorMessage,
  LogNotFoundError,
  TransientFetchError,
} from '../common/errors';
import {
  DEFAULT_VEHICLE_ID_PATTERN,
  inferVehicleId,
  matchesVehicleFilter,
} from '../common/vehicle-id';
import { ILogSource, ListOptions, LogRef } from './interfaces/log-source.interface';

/**
 * S3LogSource
 *
 * Lists objects under `s3://bucket/prefix` with ListObjectsV2 pagination
 * and streams each object's body straight into the decoder; nothing is
 * written to disk.
 *
 * Retries are not done here: the SDK client is built with maxAttempts 1
 * and failures are classified so the pipeline's RetryPolicy decides.
 */
export class S3LogSource implements ILogSource {
  private readonly logger = new Logger(S3LogSource.name);

  readonly location: string;

  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
    private readonly prefix: string,
    private readonly vehicleIdPattern: string = DEFAULT_VEHICLE_ID_PATTERN,
  ) {
    this.location = `s3://${bucket}/${prefix}`;
  }

  async *list(options: ListOptions = {}): AsyncGenerator<LogRef> {
    const { vehicleFilter = null, extensions, signal } = options;
    const pages = paginateListObjectsV2(
      { client: this.client, pageSize: 1000 },
      { Bucket: this.bucket, Prefix: this.prefix },
    );

    let pageCount = 0;
    for await (const page of pages) {
      pageCount++;
      this.logger.debug(
        `Listing page ${pageCount}: ${page.Contents?.length ?? 0} object(s)`,
      );

      for (const object of page.Contents ?? []) {
        if (signal?.aborted) return;

        const key = object.Key;
        if (!key || key.endsWith('/')) continue;
        if (extensions && !extensions.includes(path.posix.extname(key).toLowerCase())) {
          continue;
        }

        const vehicleId = inferVehicleId(key, this.vehicleIdPattern);
        if (!matchesVehicleFilter(vehicleId, vehicleFilter)) continue;

        yield { identifier: key, vehicleId, sizeHint: object.Size };
      }
    }
  }

  async open(identifier: string, signal?: AbortSignal): Promise<Readable> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: identifier }),
        { abortSignal: signal },
      );

      const body = response.Body;
      if (!(body instanceof Readable)) {
        throw new TransientFetchError(identifier, 'response has no readable body');
      }
      return body;
    } catch (error) {
      throw this.mapError(identifier, error);
    }
  }

  private mapError(identifier: string, error: unknown): Error {
    if (error instanceof TransientFetchError) {
      return error;
    }
    if (error instanceof NoSuchKey) {
      return new LogNotFoundError(identifier, error);
    }
    if (error instanceof S3ServiceException) {
      const status = error.$metadata.httpStatusCode;
      if (status === 404 || error.name === 'NotFound') {
        return new LogNotFoundError(identifier, error);
      }
      if (status === 403 || error.name === 'AccessDenied') {
        return new AccessDeniedError(identifier, error);
      }
    }
    // timeouts, aborts, throttling, 5xx, DNS and socket errors
    return new TransientFetchError(identifier, formatErrorMessage(error), error);
  }
}
