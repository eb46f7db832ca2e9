import { z } from "zod";
import { SIGN_NAMES } from "../zodiac.js";

/**
 * Zod schema for a natal chart as handed over by a position provider.
 *
 * Notes:
 * - longitude may arrive in any real range; consumers normalize it.
 * - house is kept loose (null, 0 or out of range all pass) so that bodies the
 *   provider could not place still reach the shape classifier.
 */

/** The ten bodies that take part in chart shape detection. */
export const SHAPE_BODY_NAMES = [
  "Sun",
  "Moon",
  "Mercury",
  "Venus",
  "Mars",
  "Jupiter",
  "Saturn",
  "Uranus",
  "Neptune",
  "Pluto",
] as const;

export type ShapeBodyName = (typeof SHAPE_BODY_NAMES)[number];

export const BodyPositionSchema = z.object({
  name: z.string().min(1),
  longitude: z.number().finite(),
  house: z.number().nullable().optional(),
  sign: z.enum(SIGN_NAMES).optional(),
  retrograde: z.boolean().optional(),
});

export const NatalChartSchema = z
  .object({
    name: z.string().optional(),
    birth_datetime: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}$/)
      .optional(),
    bodies: z.array(BodyPositionSchema),
  })
  .superRefine((val, ctx) => {
    const seen = new Set<string>();
    val.bodies.forEach((body, i) => {
      if (seen.has(body.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate body name: ${body.name}`,
          path: ["bodies", i, "name"],
        });
      }
      seen.add(body.name);
    });
  });

export type BodyPosition = z.infer<typeof BodyPositionSchema>;
export type NatalChart = z.infer<typeof NatalChartSchema>;

const SHAPE_BODY_SET: ReadonlySet<string> = new Set(SHAPE_BODY_NAMES);

export function isShapeBody(name: string): name is ShapeBodyName {
  return SHAPE_BODY_SET.has(name);
}
