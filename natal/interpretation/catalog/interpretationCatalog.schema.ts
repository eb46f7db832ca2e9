import { z } from "zod";
import { CHART_SHAPES } from "../../../astro/chart/detectChartShape.js";
import { DISTRIBUTION_KEYS } from "../../../astro/chart/detectDistributions.js";

/**
 * Interpretation catalog: authored text keyed the same way the chart report
 * looks it up. Missing keys are allowed; unknown shape or distribution keys
 * are not.
 */

const TextMap = z.record(z.string(), z.string().min(1));

function knownKeys(allowed: readonly string[], label: string) {
  const set = new Set(allowed);
  return (val: Record<string, string>, ctx: z.RefinementCtx) => {
    for (const key of Object.keys(val)) {
      if (!set.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `unknown ${label} key: ${key}`,
          path: [key],
        });
      }
    }
  };
}

export const InterpretationCatalogSchema = z
  .object({
    chart_shapes: TextMap.superRefine(knownKeys(CHART_SHAPES, "chart shape")),
    distributions: TextMap.superRefine(
      knownKeys(DISTRIBUTION_KEYS, "distribution")
    ),
    planet_in_sign: TextMap.default({}),
    planet_in_house: TextMap.default({}),
  })
  .strict();

export type InterpretationCatalog = z.infer<typeof InterpretationCatalogSchema>;
