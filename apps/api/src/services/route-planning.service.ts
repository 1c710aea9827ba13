import {
  DEFAULT_DISTANCE_WEIGHT,
  DEFAULT_SINCE_HOURS,
  DEFAULT_URGENCY_WEIGHT,
  DEFAULT_VEHICLE_CAPACITY,
  createLocation,
  createVehicle,
  generateAllRoutes,
} from '@relief-router/domain';
import type {
  GenerateRoutesCommand,
  MessageRepositoryPort,
  RoutePlanRepositoryPort,
  RoutePlanningPort,
  StoredRoutePlan,
} from '@relief-router/domain';

/**
 * Pulls the active requests, plans them in every mode and stores the plans.
 * Nothing is stored when there is nothing to serve.
 */
export class RoutePlanningService implements RoutePlanningPort {
  constructor(
    private readonly messages: MessageRepositoryPort,
    private readonly routePlans: RoutePlanRepositoryPort,
  ) {}

  async generateAndStore(cmd: GenerateRoutesCommand): Promise<StoredRoutePlan[]> {
    const demands = await this.messages.listActiveRequests(cmd.sinceHours ?? DEFAULT_SINCE_HOURS);
    if (demands.length === 0) {
      console.log('[routes] no active requests, nothing to plan');
      return [];
    }

    const vehicle = createVehicle(
      createLocation(cmd.depotLat, cmd.depotLon),
      cmd.vehicleCapacity ?? DEFAULT_VEHICLE_CAPACITY,
    );

    console.log(`[routes] generating routes for ${demands.length} demand points`);
    const plans = generateAllRoutes(
      demands,
      vehicle,
      cmd.urgencyWeight ?? DEFAULT_URGENCY_WEIGHT,
      cmd.distanceWeight ?? DEFAULT_DISTANCE_WEIGHT,
    );

    const stored = await this.routePlans.insertMany(plans);
    console.log(`[routes] generated and stored ${stored.length} route plans`);
    return stored;
  }

  async listRecent(limit: number): Promise<StoredRoutePlan[]> {
    return this.routePlans.listRecent(limit);
  }
}
