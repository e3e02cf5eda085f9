import { z } from 'zod';

/**
 * Details reported by the BMS for a single point.
 * Both fields are validated again per point, so the schema stays loose here.
 */
export const PointDetailsSchema = z.object({
  value: z.unknown(),
  last_update_time: z.unknown().optional(),
});

/**
 * `{ "points": [ { "/rest/<name>": {...} }, ... ] }`
 *
 * Shape returned by the BMS REST gateway in production.
 */
export const WrappedPointsSchema = z.object({
  points: z.array(z.record(z.unknown())),
});

/**
 * `{ "/rest/<name>": {...}, ... }`
 */
const FlatPointsSchema = z.record(z.unknown());

export const BmsResponseSchema = z.union([
  WrappedPointsSchema,
  FlatPointsSchema,
]);
