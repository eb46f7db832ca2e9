/**
 * Hemisphere and quadrant emphasis from house placements.
 */

export const DISTRIBUTION_KEYS = [
  "hemisphere_northern",
  "hemisphere_southern",
  "hemisphere_eastern",
  "hemisphere_western",
  "quadrant_1",
  "quadrant_2",
  "quadrant_3",
  "quadrant_4",
] as const;

export type DistributionKey = (typeof DISTRIBUTION_KEYS)[number];

// Northern is above the horizon, eastern the ascendant side.
const REGION_HOUSES: Record<DistributionKey, ReadonlySet<number>> = {
  hemisphere_northern: new Set([7, 8, 9, 10, 11, 12]),
  hemisphere_southern: new Set([1, 2, 3, 4, 5, 6]),
  hemisphere_eastern: new Set([10, 11, 12, 1, 2, 3]),
  hemisphere_western: new Set([4, 5, 6, 7, 8, 9]),
  quadrant_1: new Set([1, 2, 3]),
  quadrant_2: new Set([4, 5, 6]),
  quadrant_3: new Set([7, 8, 9]),
  quadrant_4: new Set([10, 11, 12]),
};

export type HouseValue = number | null | undefined;

export interface DistributionCounts {
  total: number;
  counts: Record<DistributionKey, number>;
}

export function isValidHouse(house: HouseValue): house is number {
  return (
    typeof house === "number" &&
    Number.isInteger(house) &&
    house >= 1 &&
    house <= 12
  );
}

/**
 * Count valid houses per region. Values outside 1..12 are dropped.
 */
export function countDistributions(
  houses: readonly HouseValue[]
): DistributionCounts {
  const valid = houses.filter(isValidHouse);
  const count = (key: DistributionKey) =>
    valid.filter((h) => REGION_HOUSES[key].has(h)).length;
  return {
    total: valid.length,
    counts: {
      hemisphere_northern: count("hemisphere_northern"),
      hemisphere_southern: count("hemisphere_southern"),
      hemisphere_eastern: count("hemisphere_eastern"),
      hemisphere_western: count("hemisphere_western"),
      quadrant_1: count("quadrant_1"),
      quadrant_2: count("quadrant_2"),
      quadrant_3: count("quadrant_3"),
      quadrant_4: count("quadrant_4"),
    },
  };
}

/**
 * Regions holding more than half of the placed bodies. A region at exactly
 * half does not count.
 */
export function detectDistributions(
  houses: readonly HouseValue[]
): DistributionKey[] {
  const { total, counts } = countDistributions(houses);
  if (total === 0) return [];
  const threshold = total / 2;
  return DISTRIBUTION_KEYS.filter((key) => counts[key] > threshold);
}

export function detectChartDistributions(
  bodies: ReadonlyArray<{ house?: HouseValue }>
): DistributionKey[] {
  return detectDistributions(bodies.map((b) => b.house));
}
