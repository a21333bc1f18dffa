import { Inject, Injectable, Logger } from '@nestjs/common';
import { S3Client } from '@aws-sdk/client-s3';
import * as fs from 'node:fs/promises';
import { ConfigurationError } from '../common/errors';
import { PIPELINE_SETTINGS, PipelineSettings } from '../config/pipeline.config';
import { ILogSource } from './interfaces/log-source.interface';
import { LocalLogSource } from './local.source';
import { S3LogSource } from './s3.source';

export type SourceLocation =
  | { kind: 's3'; bucket: string; prefix: string }
  | { kind: 'local'; dir: string };

/**
 * Parse `s3://bucket/prefix` or a local directory path.
 */
export function parseSourceLocation(location: string): SourceLocation {
  const trimmed = location.trim();
  if (!trimmed) {
    throw new ConfigurationError('Source location is empty');
  }

  if (/^s3:\/\//i.test(trimmed)) {
    const rest = trimmed.slice('s3://'.length);
    const slash = rest.indexOf('/');
    const bucket = slash === -1 ? rest : rest.slice(0, slash);
    const prefix = slash === -1 ? '' : rest.slice(slash + 1);
    if (!bucket) {
      throw new ConfigurationError(`Missing bucket in source location "${location}"`);
    }
    return { kind: 's3', bucket, prefix };
  }

  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
    throw new ConfigurationError(`Unsupported source scheme in "${location}"`);
  }
  return { kind: 'local', dir: trimmed };
}

/**
 * LogSourceFactory
 *
 * Builds the ILogSource for a run from its `--source` argument. S3 clients
 * are created lazily, one per factory, with SDK retries disabled.
 */
@Injectable()
export class LogSourceFactory {
  private readonly logger = new Logger(LogSourceFactory.name);
  private s3Client?: S3Client;

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {}

  async create(location: string): Promise<ILogSource> {
    const parsed = parseSourceLocation(location);

    if (parsed.kind === 's3') {
      this.logger.log(`Using S3 source s3://${parsed.bucket}/${parsed.prefix}`);
      return new S3LogSource(
        this.getS3Client(),
        parsed.bucket,
        parsed.prefix,
        this.settings.vehicleIdPattern,
      );
    }

    const stats = await fs.stat(parsed.dir).catch(() => null);
    if (!stats?.isDirectory()) {
      throw new ConfigurationError(`Source directory not found: ${parsed.dir}`);
    }
    this.logger.log(`Using local source ${parsed.dir}`);
    return new LocalLogSource(parsed.dir, this.settings.vehicleIdPattern);
  }

  private getS3Client(): S3Client {
    this.s3Client ??= new S3Client({
      region: this.settings.region,
      maxAttempts: 1,
    });
    return this.s3Client;
  }
}
