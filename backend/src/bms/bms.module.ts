import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { collectorConfig } from '../config/collector.config';
import { BmsApiClient } from './bms-api.client';

/**
 * BmsModule
 *
 * Owns the outbound connection to the BMS REST gateway.
 */
@Module({
  imports: [ConfigModule.forFeature(collectorConfig)],
  providers: [BmsApiClient],
  exports: [BmsApiClient],
})
export class BmsModule {}
