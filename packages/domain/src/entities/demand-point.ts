import type { Location } from './location.js';

/** 3 = life-threatening, 1 = routine */
export type Urgency = 1 | 2 | 3;

/** Urgency at or above which a served stop counts as urgent. */
export const URGENT_THRESHOLD = 2;

export interface DemandPoint {
  readonly id: number;
  readonly nodeId: string;
  readonly location: Location;
  readonly urgency: Urgency;
  readonly resourceType: string | null;
  readonly quantity: number;
  readonly timestamp: number; // unix seconds
}

export function isUrgency(value: number): value is Urgency {
  return value === 1 || value === 2 || value === 3;
}
