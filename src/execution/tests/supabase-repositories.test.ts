import { describe, it, expect } from 'vitest';
import { createSupabaseClient } from '../../config/supabase';
import { SupabaseTradeEventRepository } from '../repositories/supabase-trade-event.repository';
import { SupabaseSnapshotRepository } from '../repositories/supabase-snapshot.repository';
import { SupabaseSignalInboxRepository } from '../repositories/supabase-signal-inbox.repository';
import { TEST_START } from './setup';

interface RecordedRequest {
  url: string;
  method: string | undefined;
  body: unknown;
}

/**
 * Supabase client on a stubbed fetch answering every request with the same response.
 */
function createClient(status: number, body: unknown) {
  const requests: RecordedRequest[] = [];
  const stubFetch: typeof fetch = async (input, init) => {
    requests.push({
      url: String(input),
      method: init?.method,
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    });
    const text = body === null ? null : JSON.stringify(body);
    return new Response(text, { status, headers: { 'Content-Type': 'application/json' } });
  };

  const client = createSupabaseClient({
    url: 'http://supabase.test',
    serviceRoleKey: 'test-service-role-key',
    fetch: stubFetch,
  });
  return { client, requests };
}

describe('SupabaseTradeEventRepository', () => {
  it('should insert an event as a snake_case row', async () => {
    const { client, requests } = createClient(201, null);
    const repository = new SupabaseTradeEventRepository(client);

    await repository.append({
      id: 'event-1',
      timestamp: new Date(TEST_START),
      type: 'ENTRY_QUEUED',
      symbol: 'EUR_USD',
      entityId: 'entry-1',
      before: null,
      after: { state: 'AWAITING_PROXIMITY' },
    });

    expect(requests[0]?.method).toBe('POST');
    expect(requests[0]?.url.startsWith('http://supabase.test/rest/v1/trade_events')).toBe(true);
    expect(requests[0]?.body).toEqual({
      id: 'event-1',
      timestamp: TEST_START,
      type: 'ENTRY_QUEUED',
      symbol: 'EUR_USD',
      entity_id: 'entry-1',
      before: null,
      after: { state: 'AWAITING_PROXIMITY' },
      message: null,
    });
  });

  it('should filter on the server and skip rows that fail validation', async () => {
    const { client, requests } = createClient(200, [
      {
        id: 'event-1',
        timestamp: TEST_START,
        type: 'POSITION_CLOSED',
        symbol: 'EUR_USD',
        entity_id: 'position-1',
        before: { remainingSize: 0.4 },
        after: { exitReason: 'STOP' },
        message: null,
      },
      { id: 'event-2', timestamp: TEST_START, type: 'NOT_A_TYPE', symbol: null, entity_id: null, message: null },
    ]);
    const repository = new SupabaseTradeEventRepository(client);

    const events = await repository.list({ symbol: 'EUR_USD', type: 'POSITION_CLOSED' });

    expect(events).toEqual([
      {
        id: 'event-1',
        timestamp: new Date(TEST_START),
        type: 'POSITION_CLOSED',
        symbol: 'EUR_USD',
        entityId: 'position-1',
        before: { remainingSize: 0.4 },
        after: { exitReason: 'STOP' },
      },
    ]);
    expect(requests[0]?.url).toContain('symbol=eq.EUR_USD');
    expect(requests[0]?.url).toContain('type=eq.POSITION_CLOSED');
    expect(requests[0]?.url).toContain('order=timestamp.asc');
  });

  it('should surface a failed insert', async () => {
    const { client } = createClient(400, { message: 'permission denied', code: '42501' });
    const repository = new SupabaseTradeEventRepository(client);

    await expect(
      repository.append({
        id: 'event-1',
        timestamp: new Date(TEST_START),
        type: 'DAY_ROLLOVER',
        symbol: null,
        entityId: null,
        before: null,
        after: null,
      })
    ).rejects.toThrow('Failed to append trade event: permission denied');
  });
});

describe('SupabaseSnapshotRepository', () => {
  it('should upsert the snapshot under its id', async () => {
    const { client, requests } = createClient(201, null);
    const repository = new SupabaseSnapshotRepository(client);
    const snapshot = {
      version: 1,
      savedAt: TEST_START,
      account: null,
      guard: null,
      entries: [],
      positions: [],
    };

    await repository.save(snapshot);

    expect(requests[0]?.url.startsWith('http://supabase.test/rest/v1/engine_snapshots')).toBe(true);
    expect(requests[0]?.body).toEqual({ id: 'primary', version: 1, saved_at: TEST_START, payload: snapshot });
  });

  it('should record a quarantined record with its snapshot id', async () => {
    const { client, requests } = createClient(201, null);
    const repository = new SupabaseSnapshotRepository(client, 'backtest');

    await repository.quarantine({
      kind: 'position',
      reason: 'remainingSize exceeds originalSize',
      payload: { id: 'position-1' },
      quarantinedAt: new Date(TEST_START),
    });

    expect(requests[0]?.body).toEqual({
      snapshot_id: 'backtest',
      kind: 'position',
      reason: 'remainingSize exceeds originalSize',
      payload: { id: 'position-1' },
      quarantined_at: TEST_START,
    });
  });
});

describe('SupabaseSignalInboxRepository', () => {
  it('should read the oldest new rows and skip rows without an id', async () => {
    const { client, requests } = createClient(200, [
      { id: 'row-1', payload: { symbol: 'EUR_USD' } },
      { payload: { symbol: 'GBP_USD' } },
    ]);
    const repository = new SupabaseSignalInboxRepository(client, 10);

    const messages = await repository.pending();

    expect(messages).toEqual([{ id: 'row-1', payload: { symbol: 'EUR_USD' } }]);
    expect(requests[0]?.url.startsWith('http://supabase.test/rest/v1/signal_inbox')).toBe(true);
    expect(requests[0]?.url).toContain('status=eq.NEW');
    expect(requests[0]?.url).toContain('order=created_at.asc');
    expect(requests[0]?.url).toContain('limit=10');
  });

  it('should stamp the outcome on the row', async () => {
    const { client, requests } = createClient(204, null);
    const repository = new SupabaseSignalInboxRepository(client);

    await repository.settle('row-1', { status: 'REJECTED', reason: 'Entry already active for EUR_USD' }, new Date(TEST_START));

    expect(requests[0]?.method).toBe('PATCH');
    expect(requests[0]?.url).toContain('id=eq.row-1');
    expect(requests[0]?.body).toEqual({
      status: 'REJECTED',
      entry_id: null,
      reason: 'Entry already active for EUR_USD',
      settled_at: TEST_START,
    });
  });

  it('should surface a failed read', async () => {
    const { client } = createClient(400, { message: 'relation does not exist', code: '42P01' });
    const repository = new SupabaseSignalInboxRepository(client);

    await expect(repository.pending()).rejects.toThrow('Failed to read signal inbox: relation does not exist');
  });
});
