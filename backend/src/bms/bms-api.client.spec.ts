/**
 * Unit tests for bms-api.client.ts
 *
 * `undici.fetch` is replaced by a jest mock; responses are real undici
 * Response objects so status and body handling run unchanged.
 */
jest.mock('undici', () => ({
  ...jest.requireActual<typeof import('undici')>('undici'),
  fetch: jest.fn(),
}));

import { Test, TestingModule } from '@nestjs/testing';
import { fetch } from 'undici';
import type { Response } from 'undici';
import { collectorConfig, CollectorConfig } from '../config/collector.config';
import {
  SAMPLE_FLAT_PAYLOAD,
  SAMPLE_WRAPPED_PAYLOAD,
  TEST_BMS_URL,
  bmsPoint,
  createTestConfig,
  jsonResponse,
  textResponse,
} from '../test-utils';
import { BmsApiClient } from './bms-api.client';
import {
  AuthError,
  ConnectivityError,
  MalformedRecordError,
} from './errors/bms.errors';

const mockFetch = jest.mocked(fetch);

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/**
 * fetch stand-in that never answers and rejects once its signal aborts.
 */
function hangingFetch(): typeof fetch {
  return (_input, init) =>
    new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal;
      if (!signal) return;
      signal.addEventListener('abort', () => reject(signal.reason));
    });
}

describe('BmsApiClient', () => {
  let client: BmsApiClient;

  async function createClient(
    overrides: Partial<CollectorConfig> = {},
  ): Promise<BmsApiClient> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        BmsApiClient,
        {
          provide: collectorConfig.KEY,
          useValue: createTestConfig(overrides),
        },
      ],
    }).compile();

    return module.get<BmsApiClient>(BmsApiClient);
  }

  beforeEach(async () => {
    mockFetch.mockReset();
    client = await createClient();
  });

  afterEach(async () => {
    await client.onApplicationShutdown();
  });

  describe('request', () => {
    it('should send an authenticated GET to the configured URL', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}));

      await client.fetchPoints();

      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(mockFetch).toHaveBeenCalledWith(
        TEST_BMS_URL,
        expect.objectContaining({
          method: 'GET',
          headers: {
            Accept: 'application/json',
            Authorization: 'Bearer test-secret',
          },
        }),
      );
    });

    it('should route the request through its own dispatcher', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}));

      await client.fetchPoints();

      const init = mockFetch.mock.calls[0][1];
      expect(init?.dispatcher).toBeDefined();
      expect(init?.signal).toBeDefined();
    });
  });

  describe('parsing', () => {
    it('should turn a single point into one record', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({
          '/rest/Pump1': {
            value: '72.09',
            last_update_time: 'Wed Jan 7 14:45:53 2026 UTC',
          },
        }),
      );

      const result = await client.fetchPoints();

      expect(result.skipped).toEqual([]);
      expect(result.records).toHaveLength(1);
      const [record] = result.records;
      expect(record.value).toBe(72.09);
      expect(record.label).toBe('Pump1');
      expect(record.sourcePath).toBe('/rest/Pump1');
      expect(record.installationId).toBe('test-site');
      expect(record.timestamp.toISOString()).toBe('2026-01-07T14:45:53.000Z');
      expect(record.id).toMatch(UUID_PATTERN);
      expect(record.category).toEqual({
        system: 'pump',
        measurementType: 'status',
        line: 'unknown',
        outstation: 'unknown',
      });
    });

    it('should normalize labels and skip points without timestamp', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(SAMPLE_FLAT_PAYLOAD));

      const result = await client.fetchPoints();

      expect(result.records.map((r) => r.label)).toEqual([
        'L11_O11_D1_ChW Sec Pump1 Speed',
        'L11_O11_D2_ChW Sec Pump2 Speed',
        'L2_O4_S12_Boiler Flow Temp',
      ]);
      expect(result.records.map((r) => r.value)).toEqual([72.09, 68.5, 71.2]);
      expect(result.skipped).toHaveLength(1);
      expect(result.skipped[0]).toBeInstanceOf(MalformedRecordError);
      expect(result.skipped[0].path).toBe('/rest/L2OS4S13_Boiler Return Temp');
    });

    it('should accept the wrapped points form', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(SAMPLE_WRAPPED_PAYLOAD));

      const result = await client.fetchPoints();

      expect(result.records.map((r) => r.label)).toEqual([
        'L11_O11_D1_ChW Sec Pump1 Speed',
        'L11_O11_D2_ChW Sec Pump2 Speed',
        'L2_O4_S12_Boiler Flow Temp',
      ]);
      expect(result.skipped).toHaveLength(1);
    });

    it('should give every record its own id', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(SAMPLE_FLAT_PAYLOAD));

      const { records } = await client.fetchPoints();

      expect(new Set(records.map((r) => r.id)).size).toBe(records.length);
    });

    it('should skip non-numeric values without failing the batch', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({
          '/rest/Fan Status': bmsPoint('ON'),
          '/rest/Fan Speed': bmsPoint('40'),
          '/rest/Fan Fault': bmsPoint(null),
        }),
      );

      const result = await client.fetchPoints();

      expect(result.records.map((r) => r.label)).toEqual(['Fan Speed']);
      expect(result.skipped.map((e) => e.message)).toEqual([
        '[/rest/Fan Status] non-numeric value "ON"',
        '[/rest/Fan Fault] non-numeric value null',
      ]);
    });

    it('should skip entries whose details are not an object', async () => {
      const result = client.parseResponse({
        '/rest/Bad': 'oops',
        '/rest/Good': bmsPoint(1),
      });

      expect(result.records.map((r) => r.label)).toEqual(['Good']);
      expect(result.skipped[0].reason).toBe('point details are not an object');
    });

    it('should skip entries with an empty point name', () => {
      const result = client.parseResponse({ '/rest/': bmsPoint(1) });

      expect(result.records).toEqual([]);
      expect(result.skipped[0].reason).toBe('empty point name');
    });

    it('should never substitute the receive time for a bad timestamp', () => {
      const result = client.parseResponse({
        '/rest/Zone Temp': bmsPoint('21.5', 'not a date'),
      });

      expect(result.records).toEqual([]);
      expect(result.skipped[0].reason).toBe(
        'unparseable timestamp "not a date"',
      );
    });

    it('should reject a body that is not an object', () => {
      expect(() => client.parseResponse([1, 2, 3])).toThrow(ConnectivityError);
      expect(() => client.parseResponse(null)).toThrow(
        'BMS response is not a point map',
      );
    });
  });

  describe('failures', () => {
    it.each([401, 403])('should raise AuthError on HTTP %i', async (status) => {
      mockFetch.mockResolvedValueOnce(textResponse('denied', status));

      const error = await client.fetchPoints().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({ status });
    });

    it('should raise ConnectivityError on other non-success statuses', async () => {
      mockFetch.mockResolvedValueOnce(textResponse('boom', 502));

      const error = await client.fetchPoints().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConnectivityError);
      expect(error).toMatchObject({
        status: 502,
        message: 'BMS responded with HTTP 502',
      });
    });

    it('should raise ConnectivityError when the endpoint is unreachable', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(client.fetchPoints()).rejects.toThrow(
        'BMS endpoint unreachable: fetch failed',
      );
    });

    it('should raise ConnectivityError on invalid JSON', async () => {
      mockFetch.mockResolvedValueOnce(textResponse('<html>', 200));

      await expect(client.fetchPoints()).rejects.toThrow(
        'BMS response is not valid JSON',
      );
    });

    it('should time out after the configured request timeout', async () => {
      await client.onApplicationShutdown();
      client = await createClient({ requestTimeoutMs: 50 });
      mockFetch.mockImplementationOnce(hangingFetch());

      const error = await client.fetchPoints().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConnectivityError);
      expect(error).toMatchObject({
        message: 'BMS request timed out after 50ms',
      });
    });

    it('should stop when the caller aborts', async () => {
      mockFetch.mockImplementationOnce(hangingFetch());
      const controller = new AbortController();

      const pending = client.fetchPoints(controller.signal);
      controller.abort();

      await expect(pending).rejects.toThrow('BMS request aborted');
    });
  });
});
