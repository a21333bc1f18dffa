import { Module } from '@nestjs/common';
import { LogSourceFactory } from './log-source.factory';

/**
 * SourcesModule
 *
 * Where flight logs come from:
 * - S3LogSource: objects under an s3:// prefix, streamed with the AWS SDK
 * - LocalLogSource: a directory tree on disk
 *
 * Both are built per run by LogSourceFactory from the `--source` argument.
 */
@Module({
  providers: [LogSourceFactory],
  exports: [LogSourceFactory],
})
export class SourcesModule {}
