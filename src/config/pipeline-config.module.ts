import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  PIPELINE_SETTINGS,
  PipelineEnv,
  settingsFromConfig,
  validateEnv,
} from './pipeline.config';

/**
 * PipelineConfigModule
 *
 * Loads `.env` and the process environment through ConfigModule, validates
 * them with the zod schema and exposes a typed PipelineSettings object
 * under the PIPELINE_SETTINGS token.
 */
@Global()
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
  ],
  providers: [
    {
      provide: PIPELINE_SETTINGS,
      inject: [ConfigService],
      useFactory: (config: ConfigService<PipelineEnv, true>) =>
        settingsFromConfig(config),
    },
  ],
  exports: [PIPELINE_SETTINGS],
})
export class PipelineConfigModule {}
