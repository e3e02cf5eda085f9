import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { PointRecord } from '../bms';
import { collectorConfig } from '../config/collector.config';
import { RollingSeries, SeriesEntry } from './rolling-series';

/**
 * Summary of one ingest call.
 */
export interface IngestSummary {
  accepted: number;
  rejected: number;
  newLabels: string[];
}

/**
 * RollingStoreService - in-memory live history
 *
 * Keeps the most recent `historyCapacity` observations per label.
 *
 * Concurrency model:
 * - The poller is the only writer.
 * - Readers (HTTP handlers) run on the same event loop. `ingest` is fully
 *   synchronous, so a reader sees either none or all of a batch.
 * - Every read returns copies.
 *
 * Nothing here is persisted; a restart begins with an empty store.
 */
@Injectable()
export class RollingStoreService {
  private readonly logger = new Logger(RollingStoreService.name);
  private readonly series = new Map<string, RollingSeries>();
  private lastIngest: Date | null = null;

  constructor(
    @Inject(collectorConfig.KEY)
    private readonly config: ConfigType<typeof collectorConfig>,
  ) {}

  get capacity(): number {
    return this.config.historyCapacity;
  }

  get seriesCount(): number {
    return this.series.size;
  }

  get entryCount(): number {
    let total = 0;
    for (const series of this.series.values()) {
      total += series.length;
    }
    return total;
  }

  /** Time of the last ingest that stored at least one entry. */
  get lastIngestAt(): Date | null {
    return this.lastIngest ? new Date(this.lastIngest.getTime()) : null;
  }

  /**
   * Append a batch.
   *
   * The batch is validated before anything is written; records with a
   * non-finite value are dropped. Duplicate label+timestamp pairs are kept
   * as separate entries, so the same batch must not be ingested twice.
   */
  ingest(records: readonly PointRecord[]): IngestSummary {
    const accepted = records.filter((record) => Number.isFinite(record.value));
    const summary: IngestSummary = {
      accepted: accepted.length,
      rejected: records.length - accepted.length,
      newLabels: [],
    };

    if (summary.rejected > 0) {
      this.logger.warn(`Rejected ${summary.rejected} record(s) with non-numeric values`);
    }

    for (const record of accepted) {
      let series = this.series.get(record.label);
      if (!series) {
        series = new RollingSeries(this.config.historyCapacity);
        this.series.set(record.label, series);
        summary.newLabels.push(record.label);
      }
      series.push({ timestamp: record.timestamp, value: record.value });
    }

    if (accepted.length > 0) {
      this.lastIngest = new Date();
    }

    if (summary.newLabels.length > 0) {
      this.logger.debug(
        `Tracking ${summary.newLabels.length} new label(s), ${this.series.size} total`,
      );
    }

    return summary;
  }

  /**
   * Entries for one label, oldest first. Empty for unknown labels.
   */
  read(label: string): SeriesEntry[] {
    return this.series.get(label)?.toArray() ?? [];
  }

  /**
   * Every series, keyed by label.
   */
  readAll(): Record<string, SeriesEntry[]> {
    const snapshot: Record<string, SeriesEntry[]> = {};
    for (const [label, series] of this.series) {
      snapshot[label] = series.toArray();
    }
    return snapshot;
  }

  /** Most recent entry for a label. */
  latest(label: string): SeriesEntry | undefined {
    return this.series.get(label)?.latest();
  }

  /** Number of entries held for a label. */
  countFor(label: string): number {
    return this.series.get(label)?.length ?? 0;
  }

  has(label: string): boolean {
    return this.series.has(label);
  }

  /** Labels in first-seen order. */
  labels(): string[] {
    return [...this.series.keys()];
  }
}
