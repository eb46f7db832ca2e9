import type { ChartShape } from "../../astro/chart/detectChartShape.js";
import type { DistributionKey } from "../../astro/chart/detectDistributions.js";
import type { InterpretationStore } from "./interpretationStore.js";
import { planetInHouseKey, planetInSignKey } from "./interpretationKeys.js";

export interface InterpretationRequest {
  planet_sign_pairs: Array<[planet: string, sign: string]>;
  planet_house_pairs: Array<[planet: string, house: number]>;
  chart_shape: ChartShape | null;
  distribution_keys: DistributionKey[];
}

export interface ChartInterpretations {
  planet_in_sign: Record<string, string>;
  planet_in_house: Record<string, string>;
  chart_shape: {
    primary: ChartShape | null;
    interpretation: string | null;
    distribution: Partial<Record<DistributionKey, string>>;
  };
}

async function collect<T>(
  items: readonly T[],
  keyOf: (item: T) => string,
  fetchText: (item: T) => Promise<string | null>
): Promise<Record<string, string>> {
  const texts = await Promise.all(items.map(fetchText));
  const out: Record<string, string> = {};
  items.forEach((item, i) => {
    const text = texts[i];
    if (text) out[keyOf(item)] = text;
  });
  return out;
}

/**
 * Look up every interpretation the chart calls for. Keys without authored
 * text are left out of the result.
 */
export async function fetchInterpretations(
  store: InterpretationStore,
  request: InterpretationRequest
): Promise<ChartInterpretations> {
  const [planetInSign, planetInHouse, shapeText, distribution] =
    await Promise.all([
      collect(
        request.planet_sign_pairs,
        ([planet, sign]) => planetInSignKey(planet, sign),
        ([planet, sign]) => store.getPlanetSignText(planet, sign)
      ),
      collect(
        request.planet_house_pairs,
        ([planet, house]) => planetInHouseKey(planet, house),
        ([planet, house]) => store.getPlanetHouseText(planet, house)
      ),
      request.chart_shape
        ? store.getChartShapeText(request.chart_shape)
        : Promise.resolve(null),
      collect(
        request.distribution_keys,
        (key) => key,
        (key) => store.getDistributionText(key)
      ),
    ]);

  return {
    planet_in_sign: planetInSign,
    planet_in_house: planetInHouse,
    chart_shape: {
      primary: request.chart_shape,
      interpretation: shapeText || null,
      distribution,
    },
  };
}
