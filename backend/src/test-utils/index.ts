/**
 * Collector test utilities
 *
 * ```typescript
 * import { createTestConfig, createRecord } from '../test-utils';
 * ```
 */
export {
  TEST_TOKEN,
  TEST_BMS_URL,
  createTestConfig,
  createRecord,
  bmsPoint,
  SAMPLE_FLAT_PAYLOAD,
  SAMPLE_WRAPPED_PAYLOAD,
} from './test-fixtures';
export { jsonResponse, textResponse } from './http-responses';
