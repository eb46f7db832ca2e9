import { z } from "zod";
import { getSupabase } from "../lib/supabaseClient.js";
import { chartLogHelpers } from "../logging/chartLog.js";
import { InterpretationLookupError } from "./errors.js";
import type { InterpretationStore } from "./interpretationStore.js";
import {
  displayBodyName,
  planetInHouseKey,
  planetInSignKey,
} from "./interpretationKeys.js";

export const INTERPRETATION_TABLES = {
  chartShape: "chart_shape_interpretations",
  distribution: "chart_distribution_interpretations",
  planetSign: "planet_sign_interpretations",
  planetHouse: "planet_house_interpretations",
} as const;

const TextRowSchema = z.object({
  interpretation_text: z.string(),
});

/**
 * Fetch one interpretation_text row matching every filter.
 * @returns The text, or null when no row exists (PGRST116)
 */
async function selectInterpretationText(
  table: string,
  filters: Record<string, string | number>,
  key: string
): Promise<string | null> {
  let query = getSupabase().from(table).select("interpretation_text");
  for (const [column, value] of Object.entries(filters)) {
    query = query.eq(column, value);
  }

  const { data, error } = await query.single();

  if (error) {
    // If no rows found, return null
    if (error.code === "PGRST116") {
      return null;
    }
    const failure = new InterpretationLookupError(table, key, error.message);
    chartLogHelpers.lookupFailed({ table, key, error: failure });
    throw failure;
  }

  const row = TextRowSchema.safeParse(data);
  if (!row.success) {
    const failure = new InterpretationLookupError(
      table,
      key,
      `unexpected row shape: ${row.error.message}`
    );
    chartLogHelpers.lookupFailed({ table, key, error: failure });
    throw failure;
  }

  return row.data.interpretation_text || null;
}

export function createSupabaseInterpretationStore(): InterpretationStore {
  return {
    getChartShapeText(shape) {
      return selectInterpretationText(
        INTERPRETATION_TABLES.chartShape,
        { shape_key: shape },
        shape
      );
    },
    getDistributionText(key) {
      return selectInterpretationText(
        INTERPRETATION_TABLES.distribution,
        { distribution_key: key },
        key
      );
    },
    getPlanetSignText(planet, sign) {
      return selectInterpretationText(
        INTERPRETATION_TABLES.planetSign,
        { planet: displayBodyName(planet), sign },
        planetInSignKey(planet, sign)
      );
    },
    getPlanetHouseText(planet, house) {
      return selectInterpretationText(
        INTERPRETATION_TABLES.planetHouse,
        { planet: displayBodyName(planet), house },
        planetInHouseKey(planet, house)
      );
    },
  };
}
