/**
 * Geographic position in decimal degrees (WGS84).
 *
 * Callers must supply lat in [-90, 90] and lon in [-180, 180]; the routing
 * engine takes coordinates as given and never clamps them.
 */
export interface Location {
  readonly lat: number;
  readonly lon: number;
}

export function createLocation(lat: number, lon: number): Location {
  return Object.freeze({ lat, lon });
}
