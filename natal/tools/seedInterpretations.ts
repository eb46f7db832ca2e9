#!/usr/bin/env node
/**
 * Seed the Supabase interpretation tables from the local catalog.
 * Keys the catalog does not cover get placeholder text. Existing rows are
 * left untouched, so re-running is safe.
 *
 * Usage:
 *   npx tsx natal/tools/seedInterpretations.ts [catalog.json]
 */

import "dotenv/config";
import { pathToFileURL } from "node:url";
import { CHART_SHAPES } from "../../astro/chart/detectChartShape.js";
import { DISTRIBUTION_KEYS } from "../../astro/chart/detectDistributions.js";
import { SHAPE_BODY_NAMES } from "../../astro/schemas/natalChart.schema.js";
import { SIGN_NAMES } from "../../astro/zodiac.js";
import type { InterpretationCatalog } from "../interpretation/catalog/interpretationCatalog.schema.js";
import { planetInHouseKey, planetInSignKey } from "../interpretation/interpretationKeys.js";
import { loadInterpretationCatalog } from "../interpretation/localInterpretationStore.js";
import { INTERPRETATION_TABLES } from "../interpretation/supabaseInterpretationStore.js";
import { getSupabase } from "../lib/supabaseClient.js";
import { chartLogHelpers } from "../logging/chartLog.js";

export const PLACEHOLDER_TEXT = "[Add your interpretation here]";

/** Bodies that get planet-in-sign and planet-in-house rows. */
export const SEED_PLANETS = [...SHAPE_BODY_NAMES, "Chiron"] as const;

const HOUSE_NUMBERS = Array.from({ length: 12 }, (_, i) => i + 1);

export interface SeedTable {
  table: string;
  onConflict: string;
  rows: Array<Record<string, string | number>>;
}

function textOr(map: Record<string, string>, key: string): string {
  return map[key] ?? PLACEHOLDER_TEXT;
}

export function buildSeedTables(catalog: InterpretationCatalog): SeedTable[] {
  return [
    {
      table: INTERPRETATION_TABLES.chartShape,
      onConflict: "shape_key",
      rows: CHART_SHAPES.map((shape) => ({
        shape_key: shape,
        interpretation_text: textOr(catalog.chart_shapes, shape),
      })),
    },
    {
      table: INTERPRETATION_TABLES.distribution,
      onConflict: "distribution_key",
      rows: DISTRIBUTION_KEYS.map((key) => ({
        distribution_key: key,
        interpretation_text: textOr(catalog.distributions, key),
      })),
    },
    {
      table: INTERPRETATION_TABLES.planetSign,
      onConflict: "planet,sign",
      rows: SEED_PLANETS.flatMap((planet) =>
        SIGN_NAMES.map((sign) => ({
          planet,
          sign,
          interpretation_text: textOr(
            catalog.planet_in_sign,
            planetInSignKey(planet, sign)
          ),
        }))
      ),
    },
    {
      table: INTERPRETATION_TABLES.planetHouse,
      onConflict: "planet,house",
      rows: SEED_PLANETS.flatMap((planet) =>
        HOUSE_NUMBERS.map((house) => ({
          planet,
          house,
          interpretation_text: textOr(
            catalog.planet_in_house,
            planetInHouseKey(planet, house)
          ),
        }))
      ),
    },
  ];
}

export async function seedInterpretations(
  catalog: InterpretationCatalog = loadInterpretationCatalog()
): Promise<SeedTable[]> {
  const tables = buildSeedTables(catalog);

  for (const { table, onConflict, rows } of tables) {
    const { error } = await getSupabase()
      .from(table)
      .upsert(rows, { onConflict, ignoreDuplicates: true });

    if (error) {
      throw error;
    }
    chartLogHelpers.seedCompleted({ table, rows: rows.length });
  }

  return tables;
}

async function main() {
  const catalogPath = process.argv[2];
  const catalog = catalogPath
    ? loadInterpretationCatalog(catalogPath)
    : loadInterpretationCatalog();

  console.log("Seeding interpretation tables...");
  const tables = await seedInterpretations(catalog);
  for (const { table, rows } of tables) {
    console.log(`  ${table}: ${rows.length} rows`);
  }
  console.log("✓ Seeding complete");
}

// Run CLI if invoked directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err) => {
    console.error("Error seeding interpretations:", err);
    process.exit(1);
  });
}
