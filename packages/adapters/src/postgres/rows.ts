import { z } from 'zod';
import { MESSAGE_TYPES, isUrgency } from '@relief-router/domain';

// pg hands BIGINT/BIGSERIAL back as strings, hence the coercions.

export const messageTypeSchema = z.enum(MESSAGE_TYPES);

export const urgencySchema = z.number().int().refine(isUrgency, { message: 'urgency must be 1, 2 or 3' });

export const messageRowSchema = z.object({
  id: z.coerce.number().int(),
  node_id: z.string(),
  timestamp: z.coerce.number().int(),
  message_type: messageTypeSchema,
  urgency: z.number().int(),
  lat: z.number().nullable(),
  lon: z.number().nullable(),
  resource_type: z.string().nullable(),
  quantity: z.number().int().nullable(),
  payload: z.string().nullable(),
});

export const activeRequestRowSchema = z.object({
  id: z.coerce.number().int(),
  node_id: z.string(),
  timestamp: z.coerce.number().int(),
  urgency: urgencySchema,
  lat: z.number(),
  lon: z.number(),
  resource_type: z.string().nullable(),
  quantity: z.number().int(),
});

export const nodeStatusRowSchema = z.object({
  node_id: z.string(),
  last_seen: z.coerce.number().int(),
  message_count: z.coerce.number().int(),
  last_message_type: messageTypeSchema.nullable(),
  last_urgency: z.number().int().nullable(),
  last_lat: z.number().nullable(),
  last_lon: z.number().nullable(),
});

export const statsRowSchema = z.object({
  total: z.coerce.number().int(),
  last_ts: z.coerce.number().int().nullable(),
});

export const insertedRowSchema = z.object({
  id: z.coerce.number().int(),
});

// ─── Route plans ──────────────────────────────────────────────────────────────

const stopSchema = z.object({
  lat: z.number(),
  lon: z.number(),
  node_id: z.string(),
  resource_type: z.string().nullable(),
  quantity: z.number(),
  urgency: z.number(),
  distance_from_prev_km: z.number(),
});

const metadataBase = {
  vehicle_capacity: z.number(),
  return_to_depot_km: z.number().optional(),
};

const planRowBase = {
  id: z.coerce.number().int(),
  created_at: z.coerce.number().int(),
  depot_lat: z.number(),
  depot_lon: z.number(),
  stops: z.array(stopSchema),
  total_distance_km: z.number(),
  estimated_time_minutes: z.number(),
  urgent_requests_served: z.number().int(),
};

export const routePlanRowSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('distance'),
    ...planRowBase,
    metadata: z.object({ algorithm: z.literal('nearest_neighbor'), ...metadataBase }),
  }),
  z.object({
    mode: z.literal('priority'),
    ...planRowBase,
    metadata: z.object({ algorithm: z.literal('urgency_first'), ...metadataBase }),
  }),
  z.object({
    mode: z.literal('blended'),
    ...planRowBase,
    metadata: z.object({
      algorithm: z.literal('weighted_scoring'),
      urgency_weight: z.number(),
      distance_weight: z.number(),
      ...metadataBase,
    }),
  }),
]);

export const insertedPlanRowSchema = z.object({
  id: z.coerce.number().int(),
  created_at: z.coerce.number().int(),
});
