export type Freshness = 'no-data' | 'live' | 'stale';

/**
 * Classify the live view so a viewer can tell a quiet sensor from a
 * broken pipeline.
 *
 * - 'no-data': nothing has been ingested yet
 * - 'stale':   data exists but the last successful cycle is older than
 *              `staleAfterMs` (or no cycle has succeeded since start)
 * - 'live':    otherwise
 */
export function classifyFreshness(options: {
  hasData: boolean;
  lastSuccessAt: Date | null;
  staleAfterMs: number;
  now: Date;
}): Freshness {
  if (!options.hasData) {
    return 'no-data';
  }
  if (!options.lastSuccessAt) {
    return 'stale';
  }
  const age = options.now.getTime() - options.lastSuccessAt.getTime();
  return age > options.staleAfterMs ? 'stale' : 'live';
}
