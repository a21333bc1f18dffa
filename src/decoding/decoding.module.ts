import { Module } from '@nestjs/common';
import { DecodingService } from './decoding.service';
import { TelemetryCsvDecoder } from './strategies/telemetry-csv.decoder';
import { ULogDecoder } from './strategies/ulog.decoder';

/**
 * DecodingModule
 *
 * Turns log byte streams into samples.
 *
 * Components:
 * - DecodingService: sniffs the stream and dispatches to a decoder
 * - ULogDecoder: PX4 ULog binaries
 * - TelemetryCsvDecoder: long-format telemetry CSV exports
 */
@Module({
  providers: [DecodingService, ULogDecoder, TelemetryCsvDecoder],
  exports: [DecodingService],
})
export class DecodingModule {}
