import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  type InterpretationCatalog,
  InterpretationCatalogSchema,
} from "./catalog/interpretationCatalog.schema.js";
import type { InterpretationStore } from "./interpretationStore.js";
import { planetInHouseKey, planetInSignKey } from "./interpretationKeys.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
export const DEFAULT_CATALOG_PATH = path.resolve(
  __dirname,
  "catalog/interpretations.json"
);

const cachedCatalogs = new Map<string, InterpretationCatalog>();

export function resolveCatalogPath(): string {
  return process.env.NATAL_INTERPRETATION_CATALOG ?? DEFAULT_CATALOG_PATH;
}

export function loadInterpretationCatalog(
  filePath: string = resolveCatalogPath()
): InterpretationCatalog {
  const cached = cachedCatalogs.get(filePath);
  if (cached) return cached;

  const raw = fs.readFileSync(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(
      `Failed to parse interpretation catalog (${filePath}): ${
        err instanceof Error ? err.message : String(err)
      }`
    );
  }

  const result = InterpretationCatalogSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `Interpretation catalog validation failed for ${filePath}: ${result.error.message}`
    );
  }

  cachedCatalogs.set(filePath, result.data);
  return result.data;
}

function lookup(map: Record<string, string>, key: string): string | null {
  return Object.prototype.hasOwnProperty.call(map, key) ? map[key] : null;
}

/**
 * Store backed by an in-memory catalog (by default the JSON file shipped
 * beside this module).
 */
export function createLocalInterpretationStore(
  catalog: InterpretationCatalog = loadInterpretationCatalog()
): InterpretationStore {
  return {
    async getChartShapeText(shape) {
      return lookup(catalog.chart_shapes, shape);
    },
    async getDistributionText(key) {
      return lookup(catalog.distributions, key);
    },
    async getPlanetSignText(planet, sign) {
      return lookup(catalog.planet_in_sign, planetInSignKey(planet, sign));
    },
    async getPlanetHouseText(planet, house) {
      return lookup(catalog.planet_in_house, planetInHouseKey(planet, house));
    },
  };
}
