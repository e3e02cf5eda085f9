import { TrackFilter } from '../config/collector.config';

const KEYWORDS: Record<Exclude<TrackFilter, 'all'>, string> = {
  pumps: 'pump',
  valves: 'valve',
  ahu: 'ahu',
  temp: 'temp',
};

/**
 * Build the predicate deciding which labels the live view tracks.
 * Narrow filters keep the chart readable on sites with hundreds of points.
 */
export function createTrackFilter(filter: TrackFilter): (label: string) => boolean {
  if (filter === 'all') {
    return () => true;
  }
  const keyword = KEYWORDS[filter];
  return (label) => label.toLowerCase().includes(keyword);
}
