import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BmsModule } from '../bms';
import { collectorConfig } from '../config/collector.config';
import { LiveController } from './live.controller';
import { PollerService } from './poller.service';
import { RollingStoreService } from './rolling-store.service';

/**
 * LiveModule
 *
 * Polls the BMS and serves the rolling in-memory history.
 *
 * Components:
 * - PollerService: fixed-interval collection loop
 * - RollingStoreService: bounded per-label history
 * - LiveController: read endpoints for the live chart
 *
 * The history sink (POINT_WRITER) is picked up when PersistenceModule is
 * loaded; it is global, so nothing is imported for it here.
 */
@Module({
  imports: [ConfigModule.forFeature(collectorConfig), BmsModule],
  controllers: [LiveController],
  providers: [RollingStoreService, PollerService],
  exports: [RollingStoreService, PollerService],
})
export class LiveModule {}
