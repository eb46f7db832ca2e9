import type { ChartShape } from "../../astro/chart/detectChartShape.js";
import type { DistributionKey } from "../../astro/chart/detectDistributions.js";

/**
 * Keyed text lookup. A null result means no interpretation has been authored
 * for that key yet; it is not an error.
 */
export interface InterpretationStore {
  getChartShapeText(shape: ChartShape): Promise<string | null>;
  getDistributionText(key: DistributionKey): Promise<string | null>;
  getPlanetSignText(planet: string, sign: string): Promise<string | null>;
  getPlanetHouseText(planet: string, house: number): Promise<string | null>;
}

export type InterpretationSource = "local" | "supabase";
