/**
 * Test fixtures for the collector.
 *
 * Builders for config, records and BMS payloads shared by unit and e2e tests.
 */
import { randomUUID } from 'crypto';
import { PointRecord } from '../bms/dto/point-record.dto';
import { categorizeLabel } from '../bms/utils/category-utils';
import { CollectorConfig } from '../config/collector.config';

export const TEST_TOKEN = 'test-secret';
export const TEST_BMS_URL = 'https://bms.test/rest';

/**
 * Collector config with small, test-friendly numbers.
 */
export function createTestConfig(
  overrides: Partial<CollectorConfig> = {},
): CollectorConfig {
  return {
    bmsUrl: TEST_BMS_URL,
    bmsToken: TEST_TOKEN,
    installationId: 'test-site',
    pollIntervalMs: 60_000,
    requestTimeoutMs: 5_000,
    verifyTls: false,
    historyCapacity: 1000,
    trackFilter: 'all',
    staleAfterPolls: 3,
    shutdownGraceMs: 1_000,
    ...overrides,
  };
}

/**
 * A valid PointRecord. Pass `timestamp` as ISO text for readability.
 */
export function createRecord(
  label: string,
  value: number,
  timestamp: string,
): PointRecord {
  return {
    id: randomUUID(),
    installationId: 'test-site',
    label,
    sourcePath: `/rest/${label}`,
    value,
    timestamp: new Date(timestamp),
    category: categorizeLabel(label),
  };
}

/**
 * Raw details for one point, as the gateway sends them.
 */
export function bmsPoint(
  value: string | number | null,
  lastUpdateTime: string | null = 'Wed Jan  7 14:45:53 2026 UTC',
): { value: string | number | null; last_update_time: string | null } {
  return { value, last_update_time: lastUpdateTime };
}

/**
 * Sample flat payload: three valid points and one without timestamp.
 */
export const SAMPLE_FLAT_PAYLOAD = {
  '/rest/L11OS11D1_ChW Sec Pump1 Speed': bmsPoint('72.09'),
  '/rest/L11OS11D2_ChW Sec Pump2 Speed': bmsPoint('68.5'),
  '/rest/L2OS4S12_Boiler Flow Temp': bmsPoint(
    71.2,
    'Wed Jan  7 14:45:50 2026 UTC',
  ),
  '/rest/L2OS4S13_Boiler Return Temp': bmsPoint('55.0', ''),
};

/**
 * The same points in the wrapped `{ points: [...] }` form.
 */
export const SAMPLE_WRAPPED_PAYLOAD = {
  points: Object.entries(SAMPLE_FLAT_PAYLOAD).map(([path, details]) => ({
    [path]: details,
  })),
};
