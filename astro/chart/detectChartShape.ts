/**
 * Chart shape detection after Marc Edmund Jones' seven patterns.
 * Layer 0: geometry in, one label out. No interpretation.
 */

import { isShapeBody } from "../schemas/natalChart.schema.js";
import {
  clumpCount,
  handleCount,
  isSeesaw,
  largestGap,
  normalizeDegrees,
  span,
} from "./geometry.js";

export const CHART_SHAPES = [
  "splash",
  "splay",
  "bundle",
  "bowl",
  "locomotive",
  "bucket",
  "see_saw",
] as const;

export type ChartShape = (typeof CHART_SHAPES)[number];

export const MIN_SHAPE_BODIES = 3;

export interface ChartGeometry {
  body_count: number;
  span: number;
  largest_gap: number;
  handle_count: number;
  clump_count: number;
  is_seesaw: boolean;
}

export interface ShapeRule {
  shape: ChartShape;
  matches: (geometry: ChartGeometry) => boolean;
}

/**
 * Evaluated top to bottom; the first match wins. The predicates overlap, so
 * this order decides every tie.
 */
export const SHAPE_RULES: readonly ShapeRule[] = [
  {
    // Bowl plus one or two planets in the handle
    shape: "bucket",
    matches: (g) =>
      (g.handle_count === 1 || g.handle_count === 2) &&
      g.span <= 180 &&
      g.body_count >= 5,
  },
  { shape: "bundle", matches: (g) => g.span <= 120 },
  { shape: "bowl", matches: (g) => g.span > 120 && g.span <= 180 },
  { shape: "see_saw", matches: (g) => g.is_seesaw },
  {
    // One trine left empty
    shape: "locomotive",
    matches: (g) => g.span >= 200 && g.span <= 280 && g.largest_gap >= 80,
  },
  { shape: "splay", matches: (g) => g.clump_count >= 3 },
  { shape: "splash", matches: (g) => g.span >= 200 && g.largest_gap < 80 },
];

const FALLBACK_SHAPE: ChartShape = "splay";

/**
 * Measure everything the shape rules look at.
 */
export function measureChartGeometry(longitudes: readonly number[]): ChartGeometry {
  const lons = longitudes.map(normalizeDegrees);
  return {
    body_count: lons.length,
    span: span(lons),
    largest_gap: largestGap(lons),
    handle_count: handleCount(lons),
    clump_count: clumpCount(lons),
    is_seesaw: isSeesaw(lons),
  };
}

export function classifyGeometry(geometry: ChartGeometry): ChartShape {
  const rule = SHAPE_RULES.find((r) => r.matches(geometry));
  return rule ? rule.shape : FALLBACK_SHAPE;
}

/**
 * Longitudes of the canonical shape bodies, other bodies (Chiron, nodes) dropped.
 */
export function shapeLongitudes(
  bodies: ReadonlyArray<{ name: string; longitude: number }>
): number[] {
  return bodies.filter((b) => isShapeBody(b.name)).map((b) => b.longitude);
}

/**
 * Detect the chart shape from planet positions.
 *
 * @returns The shape, or null when fewer than three canonical bodies are given.
 */
export function detectChartShape(
  bodies: ReadonlyArray<{ name: string; longitude: number }>
): ChartShape | null {
  const lons = shapeLongitudes(bodies);
  if (lons.length < MIN_SHAPE_BODIES) return null;
  return classifyGeometry(measureChartGeometry(lons));
}
