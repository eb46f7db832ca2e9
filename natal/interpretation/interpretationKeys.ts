/**
 * Lookup keys shared by every interpretation store and the chart report.
 */

/** Provider names use underscores ("True_North_Lunar_Node"); keys use spaces. */
export function displayBodyName(name: string): string {
  return name.replace(/_/g, " ");
}

export function planetInSignKey(planet: string, sign: string): string {
  return `${displayBodyName(planet)} in ${sign}`;
}

export function planetInHouseKey(planet: string, house: number): string {
  return `${displayBodyName(planet)} in House ${house}`;
}
