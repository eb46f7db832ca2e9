import { normalizeDegrees } from "./chart/geometry.js";

export const SIGN_NAMES = [
  "Aries",
  "Taurus",
  "Gemini",
  "Cancer",
  "Leo",
  "Virgo",
  "Libra",
  "Scorpio",
  "Sagittarius",
  "Capricorn",
  "Aquarius",
  "Pisces",
] as const;

export type SignName = (typeof SIGN_NAMES)[number];

/**
 * Tropical sign containing an ecliptic longitude (30° per sign from 0° Aries).
 */
export function signFromLongitude(longitude: number): SignName {
  const index = Math.floor(normalizeDegrees(longitude) / 30) % 12;
  return SIGN_NAMES[index];
}
