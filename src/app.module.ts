import { Module } from '@nestjs/common';
import { PipelineConfigModule } from './config/pipeline-config.module';
import { PipelineModule } from './pipeline/pipeline.module';

@Module({
  imports: [PipelineConfigModule, PipelineModule],
})
export class AppModule {}
