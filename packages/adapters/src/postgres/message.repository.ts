import type {
  DemandPoint,
  MeshMessage,
  MessageRepositoryPort,
  MessageStoreStats,
  NewMeshMessage,
  NodeStatus,
} from '@relief-router/domain';
import { ACTIONABLE_MESSAGE_TYPES, createLocation } from '@relief-router/domain';
import { poolClient } from './pool.js';
import type { SqlClient } from './pool.js';
import {
  activeRequestRowSchema,
  insertedRowSchema,
  messageRowSchema,
  nodeStatusRowSchema,
  statsRowSchema,
} from './rows.js';

const MESSAGE_COLUMNS = `id, node_id, "timestamp", message_type, urgency,
  lat, lon, resource_type, quantity, payload`;

export class PgMessageRepository implements MessageRepositoryPort {
  constructor(private readonly db: SqlClient = poolClient()) {}

  async insert(message: NewMeshMessage): Promise<number> {
    const { rows } = await this.db.query(
      `INSERT INTO relief.messages
        (node_id, "timestamp", message_type, urgency, lat, lon, resource_type, quantity, payload)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)
       RETURNING id`,
      [
        message.node_id,
        message.timestamp,
        message.message_type,
        message.urgency,
        message.lat,
        message.lon,
        message.resource_type,
        message.quantity,
        message.payload,
      ],
    );
    const { id } = insertedRowSchema.parse(rows[0]);
    console.log(
      `[messages] stored id=${id} node=${message.node_id} type=${message.message_type} urgency=${message.urgency}`,
    );
    return id;
  }

  async listRecent(limit: number): Promise<MeshMessage[]> {
    const { rows } = await this.db.query(
      `SELECT ${MESSAGE_COLUMNS} FROM relief.messages ORDER BY "timestamp" DESC LIMIT $1`,
      [limit],
    );
    return rows.map((row) => messageRowSchema.parse(row));
  }

  async listUrgent(minUrgency: number, limit: number): Promise<MeshMessage[]> {
    const { rows } = await this.db.query(
      `SELECT ${MESSAGE_COLUMNS} FROM relief.messages
       WHERE urgency >= $1
       ORDER BY urgency DESC, "timestamp" DESC
       LIMIT $2`,
      [minUrgency, limit],
    );
    return rows.map((row) => messageRowSchema.parse(row));
  }

  async listNodeStatus(): Promise<NodeStatus[]> {
    const { rows } = await this.db.query(
      `SELECT
         s.node_id,
         s.last_seen,
         s.message_count,
         m.message_type AS last_message_type,
         m.urgency AS last_urgency,
         m.lat AS last_lat,
         m.lon AS last_lon
       FROM (
         SELECT node_id, MAX("timestamp") AS last_seen, COUNT(*)::int AS message_count
         FROM relief.messages
         GROUP BY node_id
       ) s
       LEFT JOIN LATERAL (
         SELECT message_type, urgency, lat, lon
         FROM relief.messages lm
         WHERE lm.node_id = s.node_id
         ORDER BY lm."timestamp" DESC, lm.id DESC
         LIMIT 1
       ) m ON TRUE
       ORDER BY s.last_seen DESC`,
    );
    return rows.map((row) => nodeStatusRowSchema.parse(row));
  }

  async listActiveRequests(sinceHours: number): Promise<DemandPoint[]> {
    const { rows } = await this.db.query(
      `SELECT id, node_id, "timestamp", urgency, lat, lon, resource_type,
              COALESCE(NULLIF(quantity, 0), 1) AS quantity
       FROM relief.messages
       WHERE message_type = ANY($1::text[])
         AND "timestamp" >= EXTRACT(EPOCH FROM NOW())::bigint - ($2::int * 3600)
         AND lat IS NOT NULL
         AND lon IS NOT NULL
       ORDER BY urgency DESC, "timestamp" DESC`,
      [[...ACTIONABLE_MESSAGE_TYPES], sinceHours],
    );
    return rows.map((row) => {
      const r = activeRequestRowSchema.parse(row);
      return {
        id: r.id,
        nodeId: r.node_id,
        location: createLocation(r.lat, r.lon),
        urgency: r.urgency,
        resourceType: r.resource_type,
        quantity: r.quantity,
        timestamp: r.timestamp,
      };
    });
  }

  async stats(): Promise<MessageStoreStats> {
    const { rows } = await this.db.query(
      `SELECT COUNT(*) AS total, MAX("timestamp") AS last_ts FROM relief.messages`,
    );
    const { total, last_ts } = statsRowSchema.parse(rows[0]);
    return { totalMessages: total, lastMessageTimestamp: last_ts };
  }
}
