import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ZodError } from 'zod';
import { MESSAGE_TYPES } from '@relief-router/domain';

import { PgMessageRepository } from '../postgres/message.repository.js';
import { SqlStub } from './sql-stub.js';

let sql: SqlStub;
let repo: PgMessageRepository;

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  sql = new SqlStub();
  repo = new PgMessageRepository(sql);
});

afterEach(() => {
  jest.restoreAllMocks();
});

// ═══════════════════════════════════════════════════════════════════════════════
// Writes
// ═══════════════════════════════════════════════════════════════════════════════

describe('PgMessageRepository.insert', () => {
  it('binds every column in order and returns the new id', async () => {
    sql.respondWith([{ id: '42' }]);

    const id = await repo.insert({
      node_id: 'node-a',
      timestamp: 1_700_000_000,
      message_type: 'sos',
      urgency: 3,
      lat: 12.5,
      lon: -45.25,
      resource_type: 'medical',
      quantity: 2,
      payload: 'injured hiker',
    });

    expect(id).toBe(42);
    expect(sql.queries).toHaveLength(1);
    expect(sql.queries[0]?.text).toContain('INSERT INTO relief.messages');
    expect(sql.queries[0]?.values).toEqual([
      'node-a',
      1_700_000_000,
      'sos',
      3,
      12.5,
      -45.25,
      'medical',
      2,
      'injured hiker',
    ]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Reads
// ═══════════════════════════════════════════════════════════════════════════════

describe('PgMessageRepository.listRecent', () => {
  it('parses rows and coerces BIGINT columns', async () => {
    sql.respondWith([
      {
        id: '7',
        node_id: 'node-b',
        timestamp: '1700000100',
        message_type: 'status_update',
        urgency: 1,
        lat: null,
        lon: null,
        resource_type: null,
        quantity: null,
        payload: 'all quiet',
      },
    ]);

    const messages = await repo.listRecent(50);

    expect(sql.queries[0]?.values).toEqual([50]);
    expect(messages).toEqual([
      {
        id: 7,
        node_id: 'node-b',
        timestamp: 1_700_000_100,
        message_type: 'status_update',
        urgency: 1,
        lat: null,
        lon: null,
        resource_type: null,
        quantity: null,
        payload: 'all quiet',
      },
    ]);
  });

  it('accepts every message type the domain defines', async () => {
    sql.respondWith(
      MESSAGE_TYPES.map((type, i) => ({
        id: String(i + 1),
        node_id: 'node-b',
        timestamp: '1700000100',
        message_type: type,
        urgency: 1,
        lat: null,
        lon: null,
        resource_type: null,
        quantity: null,
        payload: null,
      })),
    );

    const messages = await repo.listRecent(10);

    expect(messages.map((m) => m.message_type)).toEqual(['sos', 'supply_request', 'status_update', 'broadcast']);
  });

  it('rejects rows with an unknown message type', async () => {
    sql.respondWith([
      {
        id: '1',
        node_id: 'node-b',
        timestamp: '1700000100',
        message_type: 'chatter',
        urgency: 1,
        lat: null,
        lon: null,
        resource_type: null,
        quantity: null,
        payload: null,
      },
    ]);

    await expect(repo.listRecent(10)).rejects.toBeInstanceOf(ZodError);
  });
});

describe('PgMessageRepository.listUrgent', () => {
  it('passes the urgency floor and limit', async () => {
    sql.respondWith([]);
    await expect(repo.listUrgent(2, 100)).resolves.toEqual([]);
    expect(sql.queries[0]?.values).toEqual([2, 100]);
    expect(sql.queries[0]?.text).toContain('urgency >= $1');
  });
});

describe('PgMessageRepository.listActiveRequests', () => {
  it('maps rows to demand points', async () => {
    sql.respondWith([
      {
        id: '3',
        node_id: 'node-c',
        timestamp: '1700000000',
        urgency: 3,
        lat: 1.5,
        lon: 2.5,
        resource_type: null,
        quantity: 1,
      },
    ]);

    const demands = await repo.listActiveRequests(24);

    expect(demands).toEqual([
      {
        id: 3,
        nodeId: 'node-c',
        location: { lat: 1.5, lon: 2.5 },
        urgency: 3,
        resourceType: null,
        quantity: 1,
        timestamp: 1_700_000_000,
      },
    ]);
  });

  it('filters on supply requests and SOS within the window, reading a missing or zero quantity as 1', async () => {
    sql.respondWith([]);
    await repo.listActiveRequests(6);

    expect(sql.queries[0]?.values).toEqual([['supply_request', 'sos'], 6]);
    expect(sql.queries[0]?.text).toContain('COALESCE(NULLIF(quantity, 0), 1) AS quantity');
    expect(sql.queries[0]?.text).toContain('ORDER BY urgency DESC, "timestamp" DESC');
  });

  it('rejects an urgency outside 1..3', async () => {
    sql.respondWith([
      {
        id: '3',
        node_id: 'node-c',
        timestamp: '1700000000',
        urgency: 5,
        lat: 1.5,
        lon: 2.5,
        resource_type: null,
        quantity: 1,
      },
    ]);

    await expect(repo.listActiveRequests(24)).rejects.toBeInstanceOf(ZodError);
  });
});

describe('PgMessageRepository.listNodeStatus', () => {
  it('parses the per-node summary', async () => {
    sql.respondWith([
      {
        node_id: 'node-d',
        last_seen: '1700000500',
        message_count: 4,
        last_message_type: 'supply_request',
        last_urgency: 2,
        last_lat: 10,
        last_lon: 20,
      },
    ]);

    await expect(repo.listNodeStatus()).resolves.toEqual([
      {
        node_id: 'node-d',
        last_seen: 1_700_000_500,
        message_count: 4,
        last_message_type: 'supply_request',
        last_urgency: 2,
        last_lat: 10,
        last_lon: 20,
      },
    ]);
  });
});

describe('PgMessageRepository.stats', () => {
  it('reports the message count and latest timestamp', async () => {
    sql.respondWith([{ total: '12', last_ts: '1700000900' }]);
    await expect(repo.stats()).resolves.toEqual({
      totalMessages: 12,
      lastMessageTimestamp: 1_700_000_900,
    });
  });

  it('reports a null timestamp for an empty store', async () => {
    sql.respondWith([{ total: '0', last_ts: null }]);
    await expect(repo.stats()).resolves.toEqual({ totalMessages: 0, lastMessageTimestamp: null });
  });
});
