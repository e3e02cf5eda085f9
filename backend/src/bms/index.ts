// Re-export public API
export { BmsModule } from './bms.module';
export { BmsApiClient } from './bms-api.client';
export type { FetchResult } from './bms-api.client';
export type { PointRecord, PointCategory } from './dto/point-record.dto';
export {
  BmsError,
  ConnectivityError,
  AuthError,
  MalformedRecordError,
  SinkUnavailableError,
  describeError,
} from './errors/bms.errors';
