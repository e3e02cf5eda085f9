// Re-export public API
export { LiveModule } from './live.module';
export { PollerService } from './poller.service';
export type {
  PollCycleResult,
  PollerStats,
  PollerState,
  SinkStatus,
} from './poller.service';
export { RollingStoreService } from './rolling-store.service';
export type { IngestSummary } from './rolling-store.service';
export { RollingSeries } from './rolling-series';
export type { SeriesEntry } from './rolling-series';
export { classifyFreshness } from './freshness';
export type { Freshness } from './freshness';
