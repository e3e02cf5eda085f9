import {
  BeforeApplicationShutdown,
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  Optional,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import {
  AuthError,
  BmsApiClient,
  FetchResult,
  PointRecord,
  SinkUnavailableError,
  describeError,
} from '../bms';
import { collectorConfig } from '../config/collector.config';
import {
  POINT_WRITER,
  PointWriter,
  WriteResult,
} from '../persistence/interfaces/point-writer.interface';
import { RollingStoreService } from './rolling-store.service';
import { createTrackFilter } from './track-filter';

export type PollerState = 'idle' | 'fetching' | 'distributing' | 'stopped';

export type SinkStatus = 'written' | 'failed' | 'disabled' | 'not-attempted';

/**
 * Outcome of one poll cycle. Logged and folded into PollerStats.
 */
export interface PollCycleResult {
  status: 'succeeded' | 'failed' | 'skipped';
  startedAt: Date;
  finishedAt: Date;
  recordsFetched: number;
  recordsSkipped: number;
  recordsFiltered: number;
  recordsIngested: number;
  sinkStatus: SinkStatus;
  error?: string;
}

export interface PollerStats {
  state: PollerState;
  pollCount: number;
  successfulPolls: number;
  failedPolls: number;
  skippedTicks: number;
  totalRecordsIngested: number;
  totalRecordsPersisted: number;
  lastAttemptAt: Date | null;
  lastSuccessAt: Date | null;
  lastError: string | null;
}

/**
 * PollerService - fixed-interval BMS collection loop
 *
 * Lifecycle: IDLE → FETCHING → DISTRIBUTING → IDLE, every
 * `pollIntervalMs`, starting with one immediate cycle at bootstrap.
 *
 * Failure policy:
 * - A failed fetch is logged and the store is left untouched; the next
 *   tick fires on the normal schedule. No backoff.
 * - A tick that fires while a cycle is running is skipped, not queued.
 * - The history sink is written after the live store and independently
 *   of it; a sink failure is logged and the batch is dropped. A write is
 *   given `requestTimeoutMs`, like the fetch, so a hung database can't hold
 *   the cycle open.
 *
 * Shutdown runs in `beforeApplicationShutdown`, ahead of every other
 * shutdown hook (the API client closes its connection pool in
 * `onApplicationShutdown`). It waits up to `shutdownGraceMs` for a running
 * cycle, then aborts its fetch or sink write. A cycle whose fetch was
 * aborted never writes to the store.
 */
@Injectable()
export class PollerService
  implements OnApplicationBootstrap, BeforeApplicationShutdown
{
  private readonly logger = new Logger(PollerService.name);
  private readonly tracks: (label: string) => boolean;

  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<PollCycleResult> | null = null;
  private abortController: AbortController | null = null;
  private stopping = false;

  private readonly stats: PollerStats = {
    state: 'idle',
    pollCount: 0,
    successfulPolls: 0,
    failedPolls: 0,
    skippedTicks: 0,
    totalRecordsIngested: 0,
    totalRecordsPersisted: 0,
    lastAttemptAt: null,
    lastSuccessAt: null,
    lastError: null,
  };

  constructor(
    @Inject(collectorConfig.KEY)
    private readonly config: ConfigType<typeof collectorConfig>,
    private readonly client: BmsApiClient,
    private readonly store: RollingStoreService,
    @Optional()
    @Inject(POINT_WRITER)
    private readonly writer: PointWriter | null = null,
  ) {
    this.tracks = createTrackFilter(config.trackFilter);
  }

  onApplicationBootstrap(): void {
    this.start();
  }

  async beforeApplicationShutdown(signal?: string): Promise<void> {
    if (signal) {
      this.logger.log(`Received ${signal}, stopping poller`);
    }
    await this.stop();
  }

  /**
   * Start polling: one cycle now, then one per interval.
   */
  start(): void {
    if (this.timer || this.stopping) {
      return;
    }

    this.logger.log(
      `Polling ${this.config.bmsUrl} every ${this.config.pollIntervalMs / 1000}s ` +
        `(history: ${this.config.historyCapacity} points/label, filter: ${this.config.trackFilter}, ` +
        `history sink: ${this.writer ? this.writer.name : 'disabled'})`,
    );

    this.timer = setInterval(() => this.tick(), this.config.pollIntervalMs);
    this.tick();
  }

  /**
   * Stop the timer and wait for the running cycle, aborting it after the
   * grace period. Safe to call more than once.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    const running = this.inFlight;
    if (running) {
      let graceTimer: NodeJS.Timeout | undefined;
      const graceElapsed = new Promise<'timeout'>((resolve) => {
        graceTimer = setTimeout(() => resolve('timeout'), this.config.shutdownGraceMs);
      });

      const outcome = await Promise.race([running, graceElapsed]);
      clearTimeout(graceTimer);

      if (outcome === 'timeout') {
        this.logger.warn(
          `Poll cycle still running after ${this.config.shutdownGraceMs}ms, aborting`,
        );
        this.abortController?.abort();
        await running;
      }
    }

    this.stats.state = 'stopped';
    this.logger.log(
      `Poller stopped after ${this.stats.pollCount} poll(s), ${this.stats.totalRecordsIngested} record(s) ingested`,
    );
  }

  /**
   * Run a cycle now unless one is already running.
   */
  pollNow(): Promise<PollCycleResult> {
    if (this.inFlight) {
      this.stats.skippedTicks++;
      const now = new Date();
      return Promise.resolve(this.emptyResult('skipped', now, now));
    }
    if (this.stopping) {
      const now = new Date();
      return Promise.resolve(
        this.emptyResult('skipped', now, now, 'poller is stopping'),
      );
    }

    const cycle = this.runCycle().finally(() => {
      this.inFlight = null;
      this.abortController = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  getStats(): PollerStats {
    return {
      ...this.stats,
      lastAttemptAt: this.copyDate(this.stats.lastAttemptAt),
      lastSuccessAt: this.copyDate(this.stats.lastSuccessAt),
    };
  }

  private tick(): void {
    if (this.inFlight) {
      this.stats.skippedTicks++;
      this.logger.warn('Previous poll cycle still running, skipping this tick');
      return;
    }
    // runCycle handles its own errors; the result only feeds stats
    this.pollNow().catch((error: unknown) =>
      this.logger.error(`Unexpected poll failure: ${describeError(error)}`),
    );
  }

  private async runCycle(): Promise<PollCycleResult> {
    const startedAt = new Date();
    this.stats.pollCount++;
    this.stats.lastAttemptAt = startedAt;
    this.stats.state = 'fetching';
    const controller = new AbortController();
    this.abortController = controller;

    let fetched: FetchResult;
    try {
      fetched = await this.client.fetchPoints(controller.signal);
    } catch (error) {
      return this.finishFailed(startedAt, error);
    }

    // fetch resolved after the shutdown abort; the store may be going away
    if (controller.signal.aborted) {
      return this.finishFailed(
        startedAt,
        new Error('cycle aborted during shutdown'),
      );
    }

    this.stats.state = 'distributing';
    const batch = fetched.records.filter((record) => this.tracks(record.label));
    const ingest = this.store.ingest(batch);
    this.stats.totalRecordsIngested += ingest.accepted;

    let sinkStatus: SinkStatus = 'disabled';
    let sinkError: string | undefined;
    if (this.writer) {
      try {
        const { written } = await this.writeWithDeadline(
          this.writer,
          batch,
          controller.signal,
        );
        this.stats.totalRecordsPersisted += written;
        sinkStatus = 'written';
      } catch (error) {
        sinkStatus = 'failed';
        sinkError = describeError(
          error instanceof SinkUnavailableError
            ? error
            : new SinkUnavailableError(`${this.writer.name} write failed`, {
                cause: error,
              }),
        );
        this.logger.warn(`History sink failed, batch dropped: ${sinkError}`);
      }
    }

    const finishedAt = new Date();
    this.stats.successfulPolls++;
    this.stats.lastSuccessAt = finishedAt;
    this.stats.lastError = sinkError ?? null;
    this.stats.state = this.stopping ? 'stopped' : 'idle';

    const result: PollCycleResult = {
      status: 'succeeded',
      startedAt,
      finishedAt,
      recordsFetched: fetched.records.length,
      recordsSkipped: fetched.skipped.length,
      recordsFiltered: fetched.records.length - batch.length,
      recordsIngested: ingest.accepted,
      sinkStatus,
      error: sinkError,
    };

    this.logger.log(
      `Poll #${this.stats.pollCount}: ingested ${result.recordsIngested} point(s)` +
        (result.recordsSkipped > 0 ? `, skipped ${result.recordsSkipped} malformed` : '') +
        (result.recordsFiltered > 0 ? `, filtered ${result.recordsFiltered}` : '') +
        ` (sink: ${sinkStatus}, ${finishedAt.getTime() - startedAt.getTime()}ms)`,
    );

    return result;
  }

  /**
   * Run a sink write, failing it with SinkUnavailableError after
   * `requestTimeoutMs` or when the cycle is aborted. An abandoned write is
   * left to finish or fail on its own.
   */
  private writeWithDeadline(
    writer: PointWriter,
    batch: readonly PointRecord[],
    signal: AbortSignal,
  ): Promise<WriteResult> {
    const limitMs = this.config.requestTimeoutMs;

    return new Promise<WriteResult>((resolve, reject) => {
      const onAbort = (): void => {
        cleanup();
        reject(
          new SinkUnavailableError(`${writer.name} write aborted during shutdown`),
        );
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(
          new SinkUnavailableError(
            `${writer.name} write timed out after ${limitMs}ms`,
          ),
        );
      }, limitMs);
      const cleanup = (): void => {
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
      };

      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });

      writer.write(batch).then(
        (result) => {
          cleanup();
          resolve(result);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        },
      );
    });
  }

  private finishFailed(startedAt: Date, error: unknown): PollCycleResult {
    const message = describeError(error);
    this.stats.failedPolls++;
    this.stats.lastError = message;
    this.stats.state = this.stopping ? 'stopped' : 'idle';

    if (error instanceof AuthError) {
      this.logger.error(`Poll #${this.stats.pollCount} failed: ${message}`);
    } else {
      this.logger.warn(
        `Poll #${this.stats.pollCount} failed, keeping previous data: ${message}`,
      );
    }

    return this.emptyResult('failed', startedAt, new Date(), message);
  }

  private emptyResult(
    status: PollCycleResult['status'],
    startedAt: Date,
    finishedAt: Date,
    error?: string,
  ): PollCycleResult {
    return {
      status,
      startedAt,
      finishedAt,
      recordsFetched: 0,
      recordsSkipped: 0,
      recordsFiltered: 0,
      recordsIngested: 0,
      sinkStatus: 'not-attempted',
      error,
    };
  }

  private copyDate(date: Date | null): Date | null {
    return date ? new Date(date.getTime()) : null;
  }
}
