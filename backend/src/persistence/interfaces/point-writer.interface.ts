import { PointRecord } from '../../bms';

/**
 * Injection token for the optional history sink.
 * Unbound when persistence is disabled.
 */
export const POINT_WRITER = Symbol('POINT_WRITER');

export interface WriteResult {
  written: number;
}

/**
 * PointWriter - sink for permanent retention of polled records.
 *
 * Contract:
 * - `write` either stores the whole batch or rejects with
 *   SinkUnavailableError.
 * - No buffering and no retry: a batch that fails is lost.
 */
export interface PointWriter {
  readonly name: string;
  write(records: readonly PointRecord[]): Promise<WriteResult>;
}
