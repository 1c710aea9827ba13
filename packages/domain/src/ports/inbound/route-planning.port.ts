import type { StoredRoutePlan } from '../../entities/route-plan.js';

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

export interface GenerateRoutesCommand {
  depotLat: number;
  depotLon: number;
  vehicleCapacity?: number;
  /** Recency window for active requests. Default 24. */
  sinceHours?: number;
  urgencyWeight?: number;
  distanceWeight?: number;
}

export const DEFAULT_SINCE_HOURS = 24;

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface RoutePlanningPort {
  /** Plans all three modes over the active requests and stores them. Empty when nothing is pending. */
  generateAndStore(cmd: GenerateRoutesCommand): Promise<StoredRoutePlan[]>;
  listRecent(limit: number): Promise<StoredRoutePlan[]>;
}
