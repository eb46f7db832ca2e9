/**
 * Boundary to the external astrology library that turns a birth moment into
 * planetary positions and house placements.
 *
 * IMPORTANT:
 * - No ephemeris, geocoding or timezone logic lives here
 * - Implementations must return longitudes in degrees and houses 1-12
 */

import { z } from "zod";
import type { NatalChart } from "./schemas/natalChart.schema.js";

export const BIRTH_LOCATION_MESSAGE =
  "Provide either city+nation or lat+lng+tz_str.";

export const BirthInputSchema = z
  .object({
    year: z.number().int(),
    month: z.number().int().min(1).max(12),
    day: z.number().int().min(1).max(31),
    hour: z.number().int().min(0).max(23).default(12),
    minute: z.number().int().min(0).max(59).default(0),
    city: z.string().min(1).optional(),
    nation: z.string().min(1).optional(),
    lat: z.number().min(-90).max(90).optional(),
    lng: z.number().min(-180).max(180).optional(),
    tz_str: z.string().min(1).optional(),
    name: z.string().optional(),
  })
  .superRefine((val, ctx) => {
    const hasCoordinates =
      val.lat !== undefined && val.lng !== undefined && val.tz_str !== undefined;
    if (!hasCoordinates && !val.city) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: BIRTH_LOCATION_MESSAGE,
        path: ["city"],
      });
    }
  });

export type BirthInput = z.infer<typeof BirthInputSchema>;

export interface PositionProvider {
  computeChart(input: BirthInput): Promise<NatalChart>;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local birth moment as YYYY-MM-DDTHH:MM.
 */
export function birthDatetimeLabel(input: BirthInput): string {
  return `${String(input.year).padStart(4, "0")}-${pad2(input.month)}-${pad2(input.day)}T${pad2(
    input.hour
  )}:${pad2(input.minute)}`;
}
