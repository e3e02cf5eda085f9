/**
 * Timestamp parsing for BMS `last_update_time` fields.
 *
 * The gateway reports asctime-style strings in UTC:
 *
 *   "Wed Jan  7 14:45:53 2026 UTC"
 *
 * ISO-8601 strings with an explicit zone are accepted as well. Anything
 * else yields null; callers drop the point instead of substituting the
 * time it was received.
 */

const MONTHS: Record<string, number> = {
  jan: 0,
  feb: 1,
  mar: 2,
  apr: 3,
  may: 4,
  jun: 5,
  jul: 6,
  aug: 7,
  sep: 8,
  oct: 9,
  nov: 10,
  dec: 11,
};

const ASCTIME =
  /^(?:[A-Za-z]{3},?\s+)?([A-Za-z]{3})\s+(\d{1,2})\s+(\d{1,2}):(\d{2}):(\d{2})\s+(\d{4})(?:\s+(?:UTC|GMT|Z))?$/;

const ISO_WITH_ZONE =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/;

/**
 * Parse a BMS timestamp.
 *
 * @returns the instant, or null when the input is missing or not understood
 */
export function parseBmsTimestamp(input: unknown): Date | null {
  if (typeof input !== 'string') {
    return null;
  }

  const text = input.trim();
  if (text === '') {
    return null;
  }

  const asctime = ASCTIME.exec(text);
  if (asctime) {
    return fromAsctime(asctime);
  }

  if (ISO_WITH_ZONE.test(text)) {
    const parsed = new Date(text);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }

  return null;
}

function fromAsctime(match: RegExpExecArray): Date | null {
  const [, monthName, day, hour, minute, second, year] = match;
  const month = MONTHS[monthName.toLowerCase()];
  if (month === undefined) {
    return null;
  }

  const fields = {
    year: Number(year),
    month,
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
  };

  if (fields.hour > 23 || fields.minute > 59 || fields.second > 59) {
    return null;
  }

  const date = new Date(
    Date.UTC(
      fields.year,
      fields.month,
      fields.day,
      fields.hour,
      fields.minute,
      fields.second,
    ),
  );

  // Date.UTC rolls Feb 30 over into March; reject instead
  if (date.getUTCMonth() !== fields.month || date.getUTCDate() !== fields.day) {
    return null;
  }

  return date;
}
