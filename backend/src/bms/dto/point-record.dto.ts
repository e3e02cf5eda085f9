/**
 * Tags derived from a point label, used to group readings
 * in the history table and the dashboard legend.
 */
export interface PointCategory {
  /** Plant the point belongs to: 'boiler', 'ahu', 'chiller', 'pump', ... */
  system: string;
  /** Kind of reading: 'temperature', 'speed', 'position', ... */
  measurementType: string;
  /** BMS line number, or 'unknown' */
  line: string;
  /** Outstation number on that line, or 'unknown' */
  outstation: string;
}

/**
 * PointRecord
 *
 * One observation of one BMS point at one instant, in the shape every
 * downstream sink consumes.
 *
 * - `id` is unique per record and carries no meaning.
 * - `timestamp` is always the time reported by the BMS; a point without
 *   a usable timestamp never becomes a record.
 * - `value` is always finite.
 */
export interface PointRecord {
  id: string;
  installationId: string;
  label: string;
  sourcePath: string;
  value: number;
  timestamp: Date;
  category: PointCategory;
}
