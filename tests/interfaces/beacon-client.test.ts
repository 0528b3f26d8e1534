import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BeaconClient } from '../../src/interfaces/sdk/beacon-client.js';
import type { TimerClientOptions } from '../../src/interfaces/sdk/beacon-client.js';
import { createEvent } from '../../src/application/event-schema.js';
import { ConfigurationError, EventType, RegistrationError } from '../../src/domain/index.js';
import { FakeTransport, deferred, fakeLogger, serverError } from '../helpers.js';

describe('BeaconClient', () => {
  let transport: FakeTransport;
  let log: ReturnType<typeof fakeLogger>;
  const open: BeaconClient[] = [];

  function client(overrides: TimerClientOptions = {}): BeaconClient {
    const instance = new BeaconClient({
      apiKey: 'bk_test-secret',
      logger: log,
      transport,
      exitHook: false,
      env: {},
      ...overrides,
    });
    open.push(instance);
    return instance;
  }

  beforeEach(() => {
    transport = new FakeTransport();
    log = fakeLogger();
  });

  afterEach(async () => {
    transport.gate = null;
    await Promise.all(open.splice(0).map((c) => c.close()));
  });

  it('refuses to start without a key', () => {
    expect(() => new BeaconClient({ logger: log, transport, exitHook: false, env: {} })).toThrow(ConfigurationError);
  });

  it('warns about a key without the expected prefix', () => {
    client({ apiKey: 'test-secret' });

    expect(log.warn).toHaveBeenCalledWith({ expectedPrefix: 'bk_' }, "API key should start with 'bk_'");
  });

  it('registers the agent and caches its id', async () => {
    const c = client();

    const agentId = await c.registerAgent({ name: 'support-bot', framework: 'custom' });

    expect(agentId).toBe('agent-1');
    expect(c.agentId).toBe('agent-1');
    expect(transport.registrations).toEqual([{ name: 'support-bot', framework: 'custom' }]);
    expect(log.info).toHaveBeenCalledWith(
      { agent_id: 'agent-1', name: 'support-bot', framework: 'custom' },
      'Agent registered',
    );
  });

  it('surfaces registration failures', async () => {
    const c = client();
    vi.spyOn(transport, 'registerAgent').mockRejectedValue(
      new RegistrationError('Agent registration rejected with HTTP 401', { status: 401 }),
    );

    await expect(c.registerAgent({ name: 'a', framework: 'b' })).rejects.toThrow(RegistrationError);
    expect(c.agentId).toBeNull();
    expect(log.error).toHaveBeenCalledWith(expect.objectContaining({ name: 'a' }), 'Failed to register agent');
  });

  it('queues tracked events until flushed', async () => {
    const c = client();
    c.setAgentId('agent-1');

    c.track({ type: EventType.TOOL_CALL, name: 'search', payload: { query: 'weather' } });
    c.track(createEvent({ type: EventType.DECISION, name: 'route' }));
    expect(c.pendingEvents).toBe(2);
    expect(transport.batches).toHaveLength(0);

    const summary = await c.flush();

    expect(summary).toEqual({ batches: 1, delivered: 2, dropped: 0, attempts: 1 });
    expect(transport.sentNames()).toEqual(['search', 'route']);
    expect(transport.batches[0]?.events[0]?.payload).toEqual({ query: 'weather' });
  });

  it('delivers the payload as it was when tracked', async () => {
    const c = client();
    c.setAgentId('agent-1');
    const args = { query: 'weather', filters: ['today'] };

    c.track({ type: EventType.TOOL_CALL, name: 'search', payload: { args } });
    args.query = 'changed';
    args.filters.push('tomorrow');
    await c.flush();

    expect(transport.batches[0]?.events[0]?.payload).toEqual({ args: { query: 'weather', filters: ['today'] } });
  });

  it('drops malformed input without throwing', () => {
    const c = client();

    expect(() => c.track({ type: EventType.TOOL_CALL, name: '' })).not.toThrow();
    expect(c.pendingEvents).toBe(0);
    expect(log.warn).toHaveBeenCalledWith(expect.objectContaining({ err: expect.any(Error) }), 'Dropping malformed event');
  });

  it('keeps events queued until an agent id is known', async () => {
    const c = client();
    c.track({ type: EventType.TOOL_CALL, name: 'early' });

    await c.flush();
    expect(c.pendingEvents).toBe(1);
    expect(log.warn).toHaveBeenCalledWith({ pending: 1, trigger: 'manual' }, 'No agent ID set, cannot flush events');

    c.setAgentId('agent-1');
    await c.flush();
    expect(transport.sentNames()).toEqual(['early']);
  });

  it('flushes on its own once batchSize events are queued', async () => {
    const c = client({ batchSize: 5 });
    c.setAgentId('agent-1');

    for (let i = 0; i < 5; i++) c.track({ type: EventType.TOOL_CALL, name: `e-${i}` });

    await vi.waitFor(() => expect(transport.batches).toHaveLength(1));
    expect(transport.batches[0]?.events).toHaveLength(5);
  });

  it('flushes on its own when the interval elapses', async () => {
    const c = client({ flushIntervalMs: 20 });
    c.setAgentId('agent-1');
    c.track({ type: EventType.API_CALL, name: 'tick' });

    await vi.waitFor(() => expect(transport.sentNames()).toEqual(['tick']));
  });

  describe('close', () => {
    it('performs a final flush and is idempotent', async () => {
      const c = client();
      c.setAgentId('agent-1');
      c.track({ type: EventType.TOOL_CALL, name: 'last' });

      const first = c.close();
      const second = c.close();
      expect(second).toBe(first);
      expect(c.state).toBe('closing');
      await first;

      expect(c.state).toBe('closed');
      expect(transport.sentNames()).toEqual(['last']);
      expect(log.info).toHaveBeenCalledWith('Client closed');
    });

    it('ignores events tracked after close', async () => {
      const c = client();
      await c.close();

      c.track({ type: EventType.TOOL_CALL, name: 'too-late' });

      expect(c.pendingEvents).toBe(0);
      expect(log.warn).toHaveBeenCalledWith({ state: 'closed' }, 'Client is closed, event will not be tracked');
      await expect(c.flush()).resolves.toEqual({ batches: 0, delivered: 0, dropped: 0, attempts: 0 });
    });

    it('discards events that never got an agent id', async () => {
      const c = client();
      c.track({ type: EventType.TOOL_CALL, name: 'a' });
      c.track({ type: EventType.TOOL_CALL, name: 'b' });

      await c.close();

      expect(transport.batches).toHaveLength(0);
      expect(log.warn).toHaveBeenCalledWith({ count: 2, agent_id: null }, 'Discarding 2 undelivered events on close');
    });

    it('cuts backoff waits short', async () => {
      transport.fallback = serverError();
      const c = client({ maxRetries: 3, retryBaseDelayMs: 60_000, retryMaxDelayMs: 60_000, retryJitterMs: 0 });
      c.setAgentId('agent-1');
      c.track({ type: EventType.TOOL_CALL, name: 'doomed' });

      const flushing = c.flush();
      await vi.waitFor(() => expect(transport.batches).toHaveLength(1));
      await c.close();

      expect(transport.batches).toHaveLength(3);
      await expect(flushing).resolves.toEqual({ batches: 1, delivered: 0, dropped: 1, attempts: 3 });
      expect(log.error).toHaveBeenCalledWith(
        expect.objectContaining({ count: 1, attempts: 3 }),
        'Dropping 1 events after 3 failed attempts',
      );
    });

    it('gives up waiting after closeTimeoutMs', async () => {
      const gate = deferred();
      transport.gate = gate.promise;
      const c = client({ closeTimeoutMs: 50 });
      c.setAgentId('agent-1');
      c.track({ type: EventType.TOOL_CALL, name: 'slow' });

      await c.close();

      expect(c.state).toBe('closed');
      expect(log.warn).toHaveBeenCalledWith(
        { closeTimeoutMs: 50, pending: 0 },
        'Final flush did not finish in time; the request in flight is left to complete',
      );

      gate.resolve();
      await vi.waitFor(() =>
        expect(log.info).toHaveBeenCalledWith(
          { batches: 1, delivered: 1, dropped: 0, attempts: 1 },
          'Late final flush finished',
        ),
      );
    });
  });

  it('holds a beforeExit hook only while open', async () => {
    const before = process.listenerCount('beforeExit');
    const c = client({ exitHook: true });

    expect(process.listenerCount('beforeExit')).toBe(before + 1);
    await c.close();
    expect(process.listenerCount('beforeExit')).toBe(before);
  });
});
