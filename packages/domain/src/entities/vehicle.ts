import type { Location } from './location.js';

export const DEFAULT_VEHICLE_CAPACITY = 100;

/** Single vehicle starting and ending at its depot. Capacity is advisory only. */
export interface Vehicle {
  readonly depot: Location;
  readonly capacity: number;
}

export function createVehicle(depot: Location, capacity: number = DEFAULT_VEHICLE_CAPACITY): Vehicle {
  return Object.freeze({ depot, capacity });
}
