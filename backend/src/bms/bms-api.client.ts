import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { Agent, fetch } from 'undici';
import type { Response } from 'undici';
import { collectorConfig } from '../config/collector.config';
import { PointRecord } from './dto/point-record.dto';
import {
  AuthError,
  ConnectivityError,
  MalformedRecordError,
} from './errors/bms.errors';
import {
  BmsResponseSchema,
  PointDetailsSchema,
  WrappedPointsSchema,
} from './interfaces/bms-response.interface';
import { categorizeLabel } from './utils/category-utils';
import { normalizeLabel, pointNameFromPath } from './utils/label-utils';
import { parseBmsTimestamp } from './utils/timestamp-utils';
import { parseBmsValue } from './utils/value-utils';

/**
 * Outcome of one fetch: the usable records plus the points that were dropped.
 */
export interface FetchResult {
  records: PointRecord[];
  skipped: MalformedRecordError[];
}

/**
 * BmsApiClient
 *
 * Single-shot HTTP client for the BMS REST gateway.
 *
 * - One GET per call, bearer-token auth, bounded by the request timeout.
 * - Certificate validation follows BMS_VERIFY_TLS. The gateway ships a
 *   self-signed certificate, so the default is off; the relaxed Agent is
 *   private to this client and no other outbound call uses it.
 * - Points with an unusable value or timestamp are skipped and reported
 *   in `skipped`, they never fail the batch.
 * - No retries. The poller owns scheduling.
 */
@Injectable()
export class BmsApiClient implements OnApplicationShutdown {
  private readonly logger = new Logger(BmsApiClient.name);
  private readonly dispatcher: Agent;

  constructor(
    @Inject(collectorConfig.KEY)
    private readonly config: ConfigType<typeof collectorConfig>,
  ) {
    this.dispatcher = new Agent({
      connect: { rejectUnauthorized: config.verifyTls },
    });
    this.logger.log(
      `BmsApiClient configured for ${config.bmsUrl} (installation: ${config.installationId}, TLS verification: ${config.verifyTls ? 'on' : 'off'})`,
    );
  }

  /**
   * Closes the connection pool. Runs after the poller has stopped in
   * `beforeApplicationShutdown`; `close()` waits for in-flight requests.
   */
  async onApplicationShutdown(): Promise<void> {
    await this.dispatcher.close();
  }

  /**
   * Fetch the current value of every point and normalize it.
   *
   * @param signal - aborts the request early (used on shutdown)
   * @throws AuthError on 401/403
   * @throws ConnectivityError on network failure, timeout, abort,
   *   other non-2xx statuses, or an unexpected body
   */
  async fetchPoints(signal?: AbortSignal): Promise<FetchResult> {
    const body = await this.fetchRaw(signal);
    const result = this.parseResponse(body);

    if (result.skipped.length > 0) {
      this.logger.debug(
        `Skipped ${result.skipped.length} malformed point(s): ${result.skipped
          .slice(0, 5)
          .map((error) => error.message)
          .join(', ')}${result.skipped.length > 5 ? ', ...' : ''}`,
      );
    }

    return result;
  }

  /**
   * Perform the GET and return the decoded JSON body.
   */
  async fetchRaw(signal?: AbortSignal): Promise<unknown> {
    const timeout = AbortSignal.timeout(this.config.requestTimeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await fetch(this.config.bmsUrl, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          Authorization: `Bearer ${this.config.bmsToken}`,
        },
        dispatcher: this.dispatcher,
        signal: combined,
      });
    } catch (error) {
      if (timeout.aborted) {
        throw new ConnectivityError(
          `BMS request timed out after ${this.config.requestTimeoutMs}ms`,
          undefined,
          { cause: error },
        );
      }
      if (signal?.aborted) {
        throw new ConnectivityError('BMS request aborted', undefined, {
          cause: error,
        });
      }
      throw new ConnectivityError(
        `BMS endpoint unreachable: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { cause: error },
      );
    }

    if (response.status === 401 || response.status === 403) {
      await response.body?.cancel();
      throw new AuthError(response.status);
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new ConnectivityError(
        `BMS responded with HTTP ${response.status}`,
        response.status,
      );
    }

    try {
      return await response.json();
    } catch (error) {
      throw new ConnectivityError(
        'BMS response is not valid JSON',
        response.status,
        { cause: error },
      );
    }
  }

  /**
   * Normalize a decoded BMS body into PointRecords.
   *
   * Accepts the flat `{ path: details }` map and the wrapped
   * `{ points: [{ path: details }, ...] }` form.
   *
   * @throws ConnectivityError if the body is not a JSON object
   */
  parseResponse(body: unknown): FetchResult {
    const parsed = BmsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ConnectivityError(
        'BMS response is not a point map',
        undefined,
        { cause: parsed.error },
      );
    }

    const wrapped = WrappedPointsSchema.safeParse(parsed.data);
    const groups: Record<string, unknown>[] = wrapped.success
      ? wrapped.data.points
      : [parsed.data];

    const result: FetchResult = { records: [], skipped: [] };
    for (const group of groups) {
      for (const [path, details] of Object.entries(group)) {
        try {
          result.records.push(this.toRecord(path, details));
        } catch (error) {
          if (!(error instanceof MalformedRecordError)) {
            throw error;
          }
          result.skipped.push(error);
        }
      }
    }

    return result;
  }

  /**
   * Build a single record.
   *
   * @throws MalformedRecordError when any field is unusable
   */
  private toRecord(path: string, details: unknown): PointRecord {
    const shape = PointDetailsSchema.safeParse(details);
    if (!shape.success) {
      throw new MalformedRecordError(path, 'point details are not an object');
    }

    const name = pointNameFromPath(path);
    if (name === '') {
      throw new MalformedRecordError(path, 'empty point name');
    }

    const value = parseBmsValue(shape.data.value);
    if (value === null) {
      throw new MalformedRecordError(
        path,
        `non-numeric value ${JSON.stringify(shape.data.value) ?? 'undefined'}`,
      );
    }

    const timestamp = parseBmsTimestamp(shape.data.last_update_time);
    if (timestamp === null) {
      throw new MalformedRecordError(
        path,
        `unparseable timestamp ${JSON.stringify(shape.data.last_update_time) ?? 'undefined'}`,
      );
    }

    const label = normalizeLabel(name);
    return {
      id: randomUUID(),
      installationId: this.config.installationId,
      label,
      sourcePath: path,
      value,
      timestamp,
      category: categorizeLabel(label),
    };
  }
}
