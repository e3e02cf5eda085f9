import {
  BadRequestException,
  Controller,
  Get,
  Inject,
  Logger,
  NotFoundException,
  Param,
  Query,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { PointCategory } from '../bms';
import { categorizeLabel } from '../bms/utils/category-utils';
import { displayLabel, naturalCompare } from '../bms/utils/label-utils';
import { collectorConfig } from '../config/collector.config';
import { Freshness, classifyFreshness } from './freshness';
import { PollerService, PollerStats } from './poller.service';
import { RollingStoreService } from './rolling-store.service';
import { SeriesEntry } from './rolling-series';

/**
 * Response for GET /live/status
 */
export interface LiveStatusResponse {
  freshness: Freshness;
  lastSuccessAt: Date | null;
  /** Last time a cycle stored at least one entry. */
  lastIngestAt: Date | null;
  staleAfterMs: number;
  seriesCount: number;
  entryCount: number;
  capacity: number;
  poller: PollerStats;
}

/**
 * Legend entry for GET /live/points
 */
export interface LivePointSummary {
  label: string;
  displayLabel: string;
  category: PointCategory;
  count: number;
  latest: SeriesEntry | null;
}

interface PointsQuery {
  labels?: string;
}

/**
 * LiveController
 *
 * Read-only view of the in-memory rolling history, for the live chart.
 *
 * Endpoints:
 * - GET /live/status - Freshness of the live view and poller statistics
 * - GET /live/points - Known labels, naturally sorted, for the legend
 * - GET /live/points/:label - History of one label, oldest first
 * - GET /live/series - Every series at once
 */
@Controller('live')
export class LiveController {
  private readonly logger = new Logger(LiveController.name);

  constructor(
    @Inject(collectorConfig.KEY)
    private readonly config: ConfigType<typeof collectorConfig>,
    private readonly store: RollingStoreService,
    private readonly poller: PollerService,
  ) {}

  /**
   * @example
   * GET /live/status
   * Response: { freshness: "live", lastSuccessAt: "...", seriesCount: 42, ... }
   */
  @Get('status')
  getStatus(): LiveStatusResponse {
    const poller = this.poller.getStats();
    const staleAfterMs = this.config.staleAfterPolls * this.config.pollIntervalMs;

    return {
      freshness: classifyFreshness({
        hasData: this.store.seriesCount > 0,
        lastSuccessAt: poller.lastSuccessAt,
        staleAfterMs,
        now: new Date(),
      }),
      lastSuccessAt: poller.lastSuccessAt,
      lastIngestAt: this.store.lastIngestAt,
      staleAfterMs,
      seriesCount: this.store.seriesCount,
      entryCount: this.store.entryCount,
      capacity: this.store.capacity,
      poller,
    };
  }

  /**
   * @param query.labels - 'full' (default) or 'short' display labels
   *
   * @example
   * GET /live/points?labels=short
   */
  @Get('points')
  getPoints(@Query() query: PointsQuery): { points: LivePointSummary[] } {
    const mode = query.labels ?? 'full';
    if (mode !== 'full' && mode !== 'short') {
      throw new BadRequestException(
        `Invalid labels mode: ${mode}. Use 'full' or 'short'.`,
      );
    }

    const points = this.store
      .labels()
      .map((label) => ({
        label,
        displayLabel: displayLabel(label, mode),
        category: categorizeLabel(label),
        count: this.store.countFor(label),
        latest: this.store.latest(label) ?? null,
      }))
      .sort((a, b) => naturalCompare(a.displayLabel, b.displayLabel));

    return { points };
  }

  /**
   * @example
   * GET /live/points/L11_O11_D1_ChW%20Sec%20Pump1%20Speed
   */
  @Get('points/:label')
  getPoint(@Param('label') label: string): {
    label: string;
    entries: SeriesEntry[];
  } {
    if (!this.store.has(label)) {
      throw new NotFoundException(`Unknown point label: ${label}`);
    }
    const entries = this.store.read(label);
    this.logger.debug(`GET /live/points/${label}: ${entries.length} entries`);
    return { label, entries };
  }

  @Get('series')
  getSeries(): { series: Record<string, SeriesEntry[]> } {
    return { series: this.store.readAll() };
  }
}
