import type { DemandPoint } from '../../entities/demand-point.js';
import type { MeshMessage, NewMeshMessage, NodeStatus } from '../../entities/mesh-message.js';

export interface MessageStoreStats {
  totalMessages: number;
  lastMessageTimestamp: number | null;
}

export interface MessageRepositoryPort {
  insert(message: NewMeshMessage): Promise<number>;
  listRecent(limit: number): Promise<MeshMessage[]>;
  listUrgent(minUrgency: number, limit: number): Promise<MeshMessage[]>;
  listNodeStatus(): Promise<NodeStatus[]>;
  /**
   * Supply requests and SOS messages with coordinates from the last
   * `sinceHours` hours, most urgent first. A missing or zero quantity reads as 1.
   */
  listActiveRequests(sinceHours: number): Promise<DemandPoint[]>;
  stats(): Promise<MessageStoreStats>;
}
