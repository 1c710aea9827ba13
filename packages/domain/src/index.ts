// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/location.js';
export * from './entities/demand-point.js';
export * from './entities/vehicle.js';
export * from './entities/route-plan.js';
export * from './entities/mesh-message.js';

// ─── Routing engine ───────────────────────────────────────────────────────────
export * from './routing/geo-distance.js';
export * from './routing/route-walk.js';
export * from './routing/distance-focused.js';
export * from './routing/priority-focused.js';
export * from './routing/blended.js';
export * from './routing/generate-all.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/route-planning.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/message-repository.port.js';
export * from './ports/outbound/route-plan-repository.port.js';
