/**
 * Pure circular geometry over ecliptic longitudes.
 * Layer 0: No interpretation, only gap and span measurements.
 */

const FULL_CIRCLE = 360;

/** Largest gap (deg) below which a chart has no isolated handle. */
export const HANDLE_MIN_GAP_DEG = 100;

/** Default separation (deg) that breaks one clump from the next. */
export const CLUMP_GAP_DEG = 60;

const SEESAW_MIN_LARGEST_GAP_DEG = 100;
const SEESAW_MAX_LARGEST_GAP_DEG = 200;
const SEESAW_SPLIT_GAP_DEG = 150;
const SEESAW_OPPOSITION_TOLERANCE_DEG = 60;

/**
 * Normalize degrees to 0-360 range
 */
export function normalizeDegrees(value: number): number {
  let v = value % FULL_CIRCLE;
  if (v < 0) v += FULL_CIRCLE;
  // -0 and values that round up to 360 both collapse to 0
  return v === FULL_CIRCLE || Object.is(v, -0) ? 0 : v;
}

/**
 * Compute angular separation between two longitudes (0-180 degrees)
 */
export function angularDistance(lon1: number, lon2: number): number {
  const diff = Math.abs(normalizeDegrees(lon1) - normalizeDegrees(lon2));
  return Math.min(diff, FULL_CIRCLE - diff);
}

function forwardGap(from: number, to: number): number {
  return normalizeDegrees(to - from);
}

export interface CircularGaps {
  /** Normalized longitudes sorted ascending. */
  sorted: number[];
  /** gaps[i] runs from sorted[i] to its successor; the last one wraps to sorted[0]. */
  gaps: number[];
}

/**
 * Normalize and sort longitudes, then measure the empty arc after each point.
 */
export function circularGaps(longitudes: readonly number[]): CircularGaps {
  const sorted = longitudes.map(normalizeDegrees).sort((a, b) => a - b);
  const gaps = sorted.map((lon, i) =>
    forwardGap(lon, sorted[(i + 1) % sorted.length])
  );
  return { sorted, gaps };
}

/** Index of the first maximal gap, or -1 when there are no gaps. */
function indexOfLargest(gaps: readonly number[]): number {
  let best = -1;
  for (let i = 0; i < gaps.length; i++) {
    if (best === -1 || gaps[i] > gaps[best]) best = i;
  }
  return best;
}

interface UnrolledArc {
  /** Points in circular order, starting just after the largest gap. */
  points: number[];
  /** innerGaps[i] runs from points[i] to points[i + 1]. */
  innerGaps: number[];
  largestGap: number;
}

/**
 * Cut the circle open at its widest empty arc, leaving the occupied arc as a
 * linear sequence. Splits made on this sequence do not depend on where 0°
 * falls.
 */
function unrollAtLargestGap(longitudes: readonly number[]): UnrolledArc {
  const { sorted, gaps } = circularGaps(longitudes);
  const cut = indexOfLargest(gaps);
  const n = sorted.length;
  const points: number[] = [];
  const innerGaps: number[] = [];
  for (let k = 1; k <= n; k++) {
    const i = (cut + k) % n;
    points.push(sorted[i]);
    if (k < n) innerGaps.push(gaps[i]);
  }
  return { points, innerGaps, largestGap: cut === -1 ? FULL_CIRCLE : gaps[cut] };
}

/**
 * Largest empty arc between consecutive longitudes.
 * With fewer than 2 points the circle is unbounded: 360.
 */
export function largestGap(longitudes: readonly number[]): number {
  if (longitudes.length < 2) return FULL_CIRCLE;
  const { gaps } = circularGaps(longitudes);
  return Math.max(...gaps);
}

/**
 * Smallest arc containing every point (360 - largest gap).
 */
export function span(longitudes: readonly number[]): number {
  if (longitudes.length < 2) return 0;
  return FULL_CIRCLE - largestGap(longitudes);
}

/**
 * Number of points in the "handle": the smaller of the two groups split
 * apart by a clear empty arc inside the occupied arc.
 */
export function handleCount(longitudes: readonly number[]): number {
  if (longitudes.length < 3) return 0;

  const arc = unrollAtLargestGap(longitudes);
  if (arc.largestGap < HANDLE_MIN_GAP_DEG) return 0;

  const split = indexOfLargest(arc.innerGaps);
  if (split === -1 || arc.innerGaps[split] < HANDLE_MIN_GAP_DEG) return 0;

  const before = split + 1;
  const after = arc.points.length - before;
  return Math.min(before, after);
}

/**
 * Count groupings: consecutive points within gapThreshold form a clump.
 */
export function clumpCount(
  longitudes: readonly number[],
  gapThreshold: number = CLUMP_GAP_DEG
): number {
  if (longitudes.length < 2) return longitudes.length;
  const { gaps } = circularGaps(longitudes);
  return 1 + gaps.filter((gap) => gap > gapThreshold).length;
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Two groups roughly opposite each other with empty space on both sides.
 *
 * Group centers are plain arithmetic means of the raw longitudes, so a group
 * straddling 0° gets a center on the wrong side of the circle.
 */
export function isSeesaw(longitudes: readonly number[]): boolean {
  if (longitudes.length < 4) return false;

  const arc = unrollAtLargestGap(longitudes);
  if (
    arc.largestGap < SEESAW_MIN_LARGEST_GAP_DEG ||
    arc.largestGap > SEESAW_MAX_LARGEST_GAP_DEG
  ) {
    return false;
  }

  const split = arc.innerGaps.findIndex((gap) => gap > SEESAW_SPLIT_GAP_DEG);
  if (split === -1) return false;

  const first = arc.points.slice(0, split + 1);
  const second = arc.points.slice(split + 1);
  if (first.length < 2 || second.length < 2) return false;

  const deviation = Math.abs(angularDistance(mean(first), mean(second)) - 180);
  return deviation < SEESAW_OPPOSITION_TOLERANCE_DEG;
}
