import { PointCategory } from '../dto/point-record.dto';

/**
 * Keyword rules, checked in order; first match wins.
 */
const SYSTEM_RULES: ReadonlyArray<[string, readonly string[]]> = [
  ['boiler', ['boiler']],
  ['ahu', ['ahu', 'air']],
  ['chiller', ['chw', 'chiller']],
  ['heating', ['lphw']],
  ['pump', ['pump']],
  ['valve', ['valve']],
  ['temperature', ['temp']],
];

const MEASUREMENT_RULES: ReadonlyArray<[string, readonly string[]]> = [
  ['temperature', ['temp']],
  ['speed', ['speed']],
  ['position', ['valve', 'spt']],
  ['status', ['pump']],
  ['pressure', ['press']],
];

const LOCATION_PREFIX = /^L(\d+)_O(\d+)_/;

function firstMatch(
  text: string,
  rules: ReadonlyArray<[string, readonly string[]]>,
  fallback: string,
): string {
  for (const [name, keywords] of rules) {
    if (keywords.some((keyword) => text.includes(keyword))) {
      return name;
    }
  }
  return fallback;
}

/**
 * Derive grouping tags from a normalized label.
 *
 * @example
 * categorizeLabel('L11_O11_D1_ChW Sec Pump1 Speed')
 * // { system: 'chiller', measurementType: 'speed', line: '11', outstation: '11' }
 */
export function categorizeLabel(label: string): PointCategory {
  const lower = label.toLowerCase();
  const location = LOCATION_PREFIX.exec(label);

  return {
    system: firstMatch(lower, SYSTEM_RULES, 'other'),
    measurementType: firstMatch(lower, MEASUREMENT_RULES, 'value'),
    line: location ? location[1] : 'unknown',
    outstation: location ? location[2] : 'unknown',
  };
}
