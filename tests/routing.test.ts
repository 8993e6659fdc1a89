/**
 * Routing Tests for the message router
 *
 * Tests how host commands flow into the registry and connection manager:
 * - Reference stability of destinations
 * - Acknowledgments and correlation ids
 * - Once-only address error reporting
 * - Teardown, status and host lifecycle commands
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PassThrough } from 'stream';

import { ConnectionManager } from '../src/bridge/connections.js';
import { HostProtocolAdapter } from '../src/bridge/protocol.js';
import { DestinationRegistry } from '../src/bridge/registry.js';
import { MessageRouter } from '../src/bridge/router.js';
import { Logger, configureLogging } from '../src/lib/logger.js';
import type { BridgeEvent } from '../src/lib/types.js';
import { createFakeSockets, type FakeSocket } from './fake-socket.js';

const URL_A = 'ws://127.0.0.1:9000';
const URL_B = 'ws://127.0.0.1:9001';

describe('MessageRouter', () => {
  let events: BridgeEvent[];
  let sockets: FakeSocket[];
  let registry: DestinationRegistry;
  let router: MessageRouter;
  let onClose: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.useFakeTimers();
    configureLogging({ level: 'silent', file: null, stream: 'none' });
    events = [];
    const fakes = createFakeSockets();
    sockets = fakes.sockets;
    registry = new DestinationRegistry();
    onClose = vi.fn();
    const emit = (event: BridgeEvent) => events.push(event);
    const connections = new ConnectionManager({
      connection: {
        queue_capacity: 10,
        pending_ttl_ms: 0,
        close_timeout_ms: 1000,
        backoff: { base_ms: 100, max_ms: 1000, jitter: 0 },
      },
      onEvent: emit,
      createSocket: fakes.factory,
      logger: new Logger('test'),
    });
    router = new MessageRouter({
      registry,
      connections,
      emit,
      onClose: () => onClose(),
      logger: new Logger('test'),
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('sendmessage', () => {
    it('should route two commands for the same destination to the same entity', async () => {
      await router.handle({ action: 'sendmessage', destination: URL_A, message: 'one' });
      const first = registry.get(URL_A);
      await router.handle({ action: 'sendmessage', destination: URL_A, message: 'two' });

      expect(registry.get(URL_A)).toBe(first);
      expect(registry.size).toBe(1);
      expect(sockets).toHaveLength(1);
      expect(first?.pendingSends.map((p) => p.payload)).toEqual(['one', 'two']);
    });

    it('should acknowledge queued and flushed delivery with the correlation id', async () => {
      await router.handle({ action: 'sendmessage', destination: URL_A, message: 'hi', correlationId: 'c1' });
      sockets[0].open();

      expect(events).toEqual([
        { event: 'queued', destination: URL_A, detail: '1 pending', correlationId: 'c1' },
        { event: 'opened', destination: URL_A, detail: URL_A },
        { event: 'sent', destination: URL_A, detail: 'flushed', correlationId: 'c1' },
      ]);
    });

    it('should acknowledge immediate sends on an open connection', async () => {
      await router.handle({ action: 'connect', destination: URL_A });
      sockets[0].open();
      events.length = 0;

      await router.handle({ action: 'sendmessage', destination: URL_A, message: 'now', correlationId: 'c2' });

      expect(sockets[0].sent).toEqual(['now']);
      expect(events).toEqual([{ event: 'sent', destination: URL_A, correlationId: 'c2' }]);
    });

    it('should keep destinations independent', async () => {
      await router.handle({ action: 'sendmessage', destination: URL_A, message: 'to a' });
      await router.handle({ action: 'sendmessage', destination: URL_B, message: 'to b' });

      sockets[1].open();
      sockets[0].fail('unreachable');

      expect(sockets[1].sent).toEqual(['to b']);
      expect(registry.get(URL_A)?.connectionState).toBe('Failed');
      expect(registry.get(URL_B)?.connectionState).toBe('Open');
    });

    it('should surface an address error once per value without correlation ids', async () => {
      await router.handle({ action: 'sendmessage', destination: 'kitchen', message: 'one' });
      await router.handle({ action: 'sendmessage', destination: 'kitchen', message: 'two' });

      expect(events).toEqual([
        { event: 'error', destination: 'kitchen', detail: 'Destination "kitchen" is not a valid URL' },
      ]);
      expect(registry.get('kitchen')?.connectionState).toBe('Failed');
    });

    it('should always acknowledge correlated commands that are rejected', async () => {
      await router.handle({ action: 'sendmessage', destination: 'kitchen', message: 'one', correlationId: 'a' });
      await router.handle({ action: 'sendmessage', destination: 'kitchen', message: 'two', correlationId: 'b' });

      expect(events.map((e) => [e.event, e.correlationId])).toEqual([
        ['error', 'a'],
        ['error', 'b'],
      ]);
    });
  });

  describe('connect', () => {
    it('should create the destination and report its state', async () => {
      await router.handle({ action: 'connect', destination: URL_A, correlationId: 'p1' });

      expect(sockets).toHaveLength(1);
      expect(events).toEqual([
        { event: 'status', destination: URL_A, detail: 'Connecting', correlationId: 'p1' },
      ]);
    });
  });

  describe('disconnect', () => {
    it('should discard pending sends and remove the destination before the socket closes', async () => {
      await router.handle({ action: 'sendmessage', destination: URL_A, message: 'never sent' });
      const destination = registry.get(URL_A);

      await router.handle({ action: 'disconnect', destination: URL_A, correlationId: 'd1' });

      expect(registry.has(URL_A)).toBe(false);
      expect(destination?.pendingSends).toEqual([]);
      expect(destination?.connectionState).toBe('Closing');
      expect(events.at(-1)).toEqual({
        event: 'removed',
        destination: URL_A,
        detail: 'discarded 1 pending',
        correlationId: 'd1',
      });

      sockets[0].remoteClose(1000);

      expect(destination?.connectionState).toBe('Disconnected');
      expect(events.at(-1)).toEqual({ event: 'closed', destination: URL_A, detail: 'closed (1000)' });
    });

    it('should not hold later commands while a removed connection is closing', async () => {
      const adapter = new HostProtocolAdapter({ input: new PassThrough(), output: new PassThrough() });
      adapter.onCommand((command) => router.handle(command));

      adapter.push(`{"action":"connect","destination":"${URL_A}"}\n`);
      await adapter.idle();
      sockets[0].open();

      // The socket for A never answers the close handshake and no timer is advanced
      adapter.push(
        `{"action":"disconnect","destination":"${URL_A}"}\n` +
          `{"action":"sendmessage","destination":"${URL_B}","message":"to b"}\n`
      );
      await adapter.idle();

      expect(sockets[0].closeCalls).toHaveLength(1);
      expect(registry.has(URL_A)).toBe(false);
      expect(sockets).toHaveLength(2);
      expect(sockets[1].url).toBe(URL_B);
      expect(registry.get(URL_B)?.pendingSends.map((p) => p.payload)).toEqual(['to b']);
    });

    it('should give a fresh destination to commands after teardown', async () => {
      await router.handle({ action: 'sendmessage', destination: URL_A, message: 'one' });
      const before = registry.get(URL_A);
      await router.handle({ action: 'disconnect', destination: URL_A });
      sockets[0].remoteClose(1000);

      await router.handle({ action: 'sendmessage', destination: URL_A, message: 'two' });

      expect(registry.get(URL_A)).not.toBe(before);
      expect(sockets).toHaveLength(2);
    });

    it('should report an unknown destination', async () => {
      await router.handle({ action: 'disconnect', destination: URL_A });

      expect(events).toEqual([{ event: 'error', destination: URL_A, detail: 'Unknown destination' }]);
    });
  });

  describe('status', () => {
    it('should report every destination in registry order', async () => {
      await router.handle({ action: 'sendmessage', destination: URL_B, message: 'x' });
      await router.handle({ action: 'connect', destination: URL_A });
      sockets[1].open();
      events.length = 0;

      await router.handle({ action: 'status', correlationId: 's1' });

      expect(events).toEqual([
        { event: 'status', destination: URL_B, detail: 'Connecting (1 pending)', correlationId: 's1' },
        { event: 'status', destination: URL_A, detail: 'Open', correlationId: 's1' },
      ]);
    });

    it('should say when there are no destinations', async () => {
      await router.handle({ action: 'status' });

      expect(events).toEqual([{ event: 'status', detail: 'no destinations' }]);
    });
  });

  describe('host lifecycle', () => {
    it('should invoke the close hook when the host closes the plugin', async () => {
      await router.handle({ action: 'close' });

      expect(onClose).toHaveBeenCalledTimes(1);
    });

    it('should accept host info and settings without emitting events', async () => {
      await router.handle({ action: 'info', hostVersion: '4.3', pluginVersion: 10 });
      await router.handle({ action: 'settings', values: { Example: 'value' } });

      expect(events).toEqual([]);
      expect(registry.size).toBe(0);
    });

    it('should report a host running another manifest version', async () => {
      await router.handle({ action: 'info', hostVersion: '4.3', pluginVersion: 9 });

      expect(events).toEqual([
        { event: 'error', detail: 'Host loaded manifest version 9, bridge implements 10' },
      ]);
    });
  });
});
