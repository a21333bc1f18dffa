#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { parseCommandLine, USAGE } from './cli/run-command';
import { ConfigurationError, formatErrorMessage } from './common/errors';
import {
  enabledLogLevels,
  PIPELINE_SETTINGS,
  PipelineEnv,
  PipelineSettings,
} from './config/pipeline.config';
import { RunReport } from './pipeline/dto/run-options.dto';
import { PipelineService } from './pipeline/pipeline.service';

/** Process exit codes */
export const EXIT_OK = 0;
export const EXIT_ABORTED = 1;
export const EXIT_CONFIGURATION = 2;

export function exitCodeFor(report: RunReport): number {
  return report.aborted ? EXIT_ABORTED : EXIT_OK;
}

export async function bootstrap(argv: string[] = process.argv.slice(2)): Promise<number> {
  const logger = new Logger('Main');
  let app: INestApplicationContext | undefined;

  try {
    app = await NestFactory.createApplicationContext(AppModule, {
      bufferLogs: true,
      abortOnError: false,
    });
    const level = app.get(ConfigService).get<PipelineEnv['LOG_LEVEL']>('LOG_LEVEL') ?? 'log';
    app.useLogger(enabledLogLevels(level));
    app.flushLogs();

    const command = parseCommandLine(argv, app.get<PipelineSettings>(PIPELINE_SETTINGS));
    if (command.kind === 'help') {
      process.stdout.write(USAGE);
      return EXIT_OK;
    }

    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals) => {
      logger.warn(`Received ${signal}; finishing in-flight logs`);
      controller.abort(`received ${signal}`);
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    try {
      const report = await app.get(PipelineService).run(command.options, controller.signal);
      if (report.aborted) {
        logger.error(`Run aborted: ${report.abortReason ?? 'unknown reason'}`);
      }
      return exitCodeFor(report);
    } finally {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`${error.message} (see --help)`);
      return EXIT_CONFIGURATION;
    }
    logger.error(
      `Run failed: ${formatErrorMessage(error)}`,
      error instanceof Error ? error.stack : undefined,
    );
    return EXIT_ABORTED;
  } finally {
    await app?.close();
  }
}

if (require.main === module) {
  bootstrap().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${formatErrorMessage(error)}\n`);
      process.exitCode = EXIT_ABORTED;
    },
  );
}
