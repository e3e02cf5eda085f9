import { parseCollectorConfig } from './collector.config';
import { parseDatabaseConfig } from './database.config';
import { resolveLogLevels } from './logger.config';

describe('parseCollectorConfig', () => {
  const required = {
    BMS_URL: 'https://bms.test/rest',
    BMS_TOKEN: 'test-secret',
  };

  it('should apply defaults', () => {
    expect(parseCollectorConfig(required)).toEqual({
      bmsUrl: 'https://bms.test/rest',
      bmsToken: 'test-secret',
      installationId: 'bms-live',
      pollIntervalMs: 300_000,
      requestTimeoutMs: 30_000,
      verifyTls: false,
      historyCapacity: 1000,
      trackFilter: 'all',
      staleAfterPolls: 3,
      shutdownGraceMs: 10_000,
    });
  });

  it('should read every variable', () => {
    const config = parseCollectorConfig({
      ...required,
      BMS_INSTALLATION_ID: 'site-a',
      BMS_POLL_INTERVAL_SECONDS: '60',
      BMS_REQUEST_TIMEOUT_SECONDS: '10',
      BMS_VERIFY_TLS: 'true',
      LIVE_HISTORY_CAPACITY: '50',
      LIVE_TRACK_FILTER: 'pumps',
      LIVE_STALE_AFTER_POLLS: '5',
      POLLER_SHUTDOWN_GRACE_SECONDS: '2',
    });

    expect(config).toEqual({
      bmsUrl: 'https://bms.test/rest',
      bmsToken: 'test-secret',
      installationId: 'site-a',
      pollIntervalMs: 60_000,
      requestTimeoutMs: 10_000,
      verifyTls: true,
      historyCapacity: 50,
      trackFilter: 'pumps',
      staleAfterPolls: 5,
      shutdownGraceMs: 2_000,
    });
  });

  it('should fail fast without an endpoint URL', () => {
    expect(() => parseCollectorConfig({ BMS_TOKEN: 'test-secret' })).toThrow(
      /Invalid collector configuration: BMS_URL/,
    );
  });

  it('should fail fast without a token', () => {
    expect(() =>
      parseCollectorConfig({ BMS_URL: 'https://bms.test/rest' }),
    ).toThrow(/BMS_TOKEN/);
  });

  it('should reject a malformed URL', () => {
    expect(() =>
      parseCollectorConfig({ ...required, BMS_URL: 'not a url' }),
    ).toThrow(/BMS_URL/);
  });

  it('should reject a zero capacity', () => {
    expect(() =>
      parseCollectorConfig({ ...required, LIVE_HISTORY_CAPACITY: '0' }),
    ).toThrow(/LIVE_HISTORY_CAPACITY/);
  });

  it('should reject an unknown track filter', () => {
    expect(() =>
      parseCollectorConfig({ ...required, LIVE_TRACK_FILTER: 'chillers' }),
    ).toThrow(/LIVE_TRACK_FILTER/);
  });

  it('should reject a timeout that is not shorter than the interval', () => {
    expect(() =>
      parseCollectorConfig({
        ...required,
        BMS_POLL_INTERVAL_SECONDS: '30',
        BMS_REQUEST_TIMEOUT_SECONDS: '30',
      }),
    ).toThrow(
      'Invalid collector configuration: BMS_REQUEST_TIMEOUT_SECONDS: BMS_REQUEST_TIMEOUT_SECONDS must be shorter than BMS_POLL_INTERVAL_SECONDS',
    );
  });
});

describe('parseDatabaseConfig', () => {
  it('should apply defaults around DB_HOST', () => {
    expect(parseDatabaseConfig({ DB_HOST: 'db.test' })).toEqual({
      host: 'db.test',
      port: 5432,
      username: 'postgres',
      password: 'postgres',
      database: 'bms',
      logging: true,
    });
  });

  it('should disable query logging outside development', () => {
    expect(
      parseDatabaseConfig({ DB_HOST: 'db.test', NODE_ENV: 'production' })
        .logging,
    ).toBe(false);
  });

  it('should require DB_HOST', () => {
    expect(() => parseDatabaseConfig({})).toThrow(/DB_HOST/);
  });
});

describe('resolveLogLevels', () => {
  it('should default to log and above', () => {
    expect(resolveLogLevels(undefined)).toEqual([
      'fatal',
      'error',
      'warn',
      'log',
    ]);
  });

  it('should include everything at verbose', () => {
    expect(resolveLogLevels('VERBOSE')).toHaveLength(6);
  });

  it('should fall back to log for unknown levels', () => {
    expect(resolveLogLevels('chatty')).toEqual(resolveLogLevels('log'));
  });
});
