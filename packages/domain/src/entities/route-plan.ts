// Field names are snake_case: plans are stored and served as-is.

export type RouteMode = 'distance' | 'priority' | 'blended';

export interface Stop {
  readonly lat: number;
  readonly lon: number;
  readonly node_id: string;
  readonly resource_type: string | null;
  readonly quantity: number;
  readonly urgency: number;
  /** Leg length from the previous stop, or from the depot for the first stop. */
  readonly distance_from_prev_km: number;
}

interface MetadataBase {
  readonly vehicle_capacity: number;
  /** Absent when the plan has no stops. */
  readonly return_to_depot_km?: number;
}

export interface NearestNeighborMetadata extends MetadataBase {
  readonly algorithm: 'nearest_neighbor';
}

export interface UrgencyFirstMetadata extends MetadataBase {
  readonly algorithm: 'urgency_first';
}

export interface WeightedScoringMetadata extends MetadataBase {
  readonly algorithm: 'weighted_scoring';
  readonly urgency_weight: number;
  readonly distance_weight: number;
}

export type RouteMetadata = NearestNeighborMetadata | UrgencyFirstMetadata | WeightedScoringMetadata;

interface RoutePlanShape<M extends RouteMode, D extends RouteMetadata> {
  readonly mode: M;
  readonly depot_lat: number;
  readonly depot_lon: number;
  readonly stops: readonly Stop[];
  readonly total_distance_km: number;
  readonly estimated_time_minutes: number;
  readonly urgent_requests_served: number;
  readonly metadata: D;
}

export type DistanceRoutePlan = RoutePlanShape<'distance', NearestNeighborMetadata>;
export type PriorityRoutePlan = RoutePlanShape<'priority', UrgencyFirstMetadata>;
export type BlendedRoutePlan = RoutePlanShape<'blended', WeightedScoringMetadata>;

export type RoutePlan = DistanceRoutePlan | PriorityRoutePlan | BlendedRoutePlan;

/** A plan after the route store has assigned it an id. */
export type StoredRoutePlan = RoutePlan & {
  readonly id: number;
  readonly created_at: number; // unix seconds
};
