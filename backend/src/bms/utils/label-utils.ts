/**
 * Label utilities for BMS point names.
 *
 * BMS point names embed their location in a compact prefix:
 *
 *   L11OS11D1_ChW Sec Pump1 Speed
 *   │  │   └─ point type + number (D1)
 *   │  └───── outstation 11
 *   └──────── line 11
 *
 * The dashboard and history table use the expanded form
 * `L11_O11_D1_ChW Sec Pump1 Speed`.
 */

const REST_PREFIX = /^\/?rest\//i;
const COMPACT_PREFIX = /^L(\d+)OS(\d+)([A-Z])(\d+)$/;

/**
 * Turn a BMS point path into a bare point name.
 *
 * @example
 * pointNameFromPath('/rest/Pump1') // 'Pump1'
 */
export function pointNameFromPath(path: string): string {
  return path.replace(REST_PREFIX, '').replace(/^\/+/, '').trim();
}

/**
 * Expand the compact location prefix of a point name.
 * Names that don't follow the convention are returned unchanged.
 *
 * @example
 * normalizeLabel('L11OS11D1_ChW Sec Pump1 Speed')
 * // 'L11_O11_D1_ChW Sec Pump1 Speed'
 */
export function normalizeLabel(name: string): string {
  const separator = name.indexOf('_');
  if (separator === -1) {
    return name;
  }

  const prefix = name.slice(0, separator);
  const description = name.slice(separator + 1);
  const match = COMPACT_PREFIX.exec(prefix);
  if (!match) {
    return name;
  }

  const [, line, outstation, pointType, pointNumber] = match;
  return `L${line}_O${outstation}_${pointType}${pointNumber}_${description}`;
}

/**
 * Label as shown in a chart legend.
 *
 * Short form drops the `L11_O11_D1_` location prefix so the legend stays
 * narrow; labels with fewer than three separators are kept whole.
 */
export function displayLabel(label: string, mode: 'full' | 'short'): string {
  if (mode === 'full') {
    return label;
  }
  const parts = label.split('_');
  if (parts.length < 4) {
    return label;
  }
  return parts.slice(3).join('_');
}

/**
 * Natural ordering: digit runs compare numerically, text case-insensitively.
 * Keeps `D2` ahead of `D10` in the legend.
 */
export function naturalCompare(a: string, b: string): number {
  const left = a.split(/(\d+)/);
  const right = b.split(/(\d+)/);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const l = left[i];
    const r = right[i];
    if (l === r) continue;

    // split() with a capture group puts digit runs at odd indexes
    if (i % 2 === 1) {
      const diff = Number(l) - Number(r);
      if (diff !== 0) return diff;
      // '007' vs '7': fall back to length so the order stays total
      return l.length - r.length;
    }

    const cmp = l.toLowerCase().localeCompare(r.toLowerCase());
    if (cmp !== 0) return cmp;
    return l < r ? -1 : 1;
  }

  return left.length - right.length;
}
