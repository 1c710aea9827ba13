export const MESSAGE_TYPES = ['sos', 'supply_request', 'status_update', 'broadcast'] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

/** Message types that become demand points when they carry coordinates. */
export const ACTIONABLE_MESSAGE_TYPES: readonly MessageType[] = ['supply_request', 'sos'];

export const MAX_PAYLOAD_LENGTH = 100;

/** Message reported by a mesh node, as accepted at the ingest boundary. */
export interface NewMeshMessage {
  readonly node_id: string;
  readonly timestamp: number; // unix seconds
  readonly message_type: MessageType;
  readonly urgency: number;
  readonly lat: number | null;
  readonly lon: number | null;
  readonly resource_type: string | null;
  readonly quantity: number | null;
  readonly payload: string | null;
}

export interface MeshMessage extends NewMeshMessage {
  readonly id: number;
}

/** Latest known state of one reporting node. */
export interface NodeStatus {
  readonly node_id: string;
  readonly last_seen: number;
  readonly message_count: number;
  readonly last_message_type: MessageType | null;
  readonly last_urgency: number | null;
  readonly last_lat: number | null;
  readonly last_lon: number | null;
}
