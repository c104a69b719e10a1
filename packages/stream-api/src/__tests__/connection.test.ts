import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ClientConnection } from '../ws/connection.js';
import { FakeSocket } from './fake-socket.js';

function connect(socket = new FakeSocket()): { socket: FakeSocket; connection: ClientConnection } {
  const connection = new ClientConnection({
    socket,
    connectionId: 'client_1',
    heartbeat: { intervalMs: 20_000, timeoutMs: 10_000 },
  });
  return { socket, connection };
}

describe('ClientConnection', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('send', () => {
    it('hands the frame to an open socket', () => {
      const { socket, connection } = connect();

      expect(connection.send('{"type":"pong"}')).toBe(true);
      expect(socket.sent).toEqual(['{"type":"pong"}']);
    });

    it('reports failure when the socket is closed', () => {
      const { socket, connection } = connect();
      socket.drop();

      expect(connection.isOpen).toBe(false);
      expect(connection.send('x')).toBe(false);
      expect(socket.sent).toEqual([]);
    });

    it('reports failure when the write throws', () => {
      const { socket, connection } = connect();
      socket.failWrites = true;

      expect(connection.send('x')).toBe(false);
    });

    it('serializes protocol messages', () => {
      const { socket, connection } = connect();

      connection.sendMessage({ type: 'pong', timestamp: '2026-01-01T00:00:00.000Z' });

      expect(socket.sent).toEqual(['{"type":"pong","timestamp":"2026-01-01T00:00:00.000Z"}']);
    });
  });

  describe('subscription state', () => {
    it('starts idle at generation zero', () => {
      const { connection } = connect();

      expect(connection.state).toBe('idle');
      expect(connection.subscription).toBeNull();
      expect(connection.generation).toBe(0);
    });

    it('moves to subscribed with a fresh generation', () => {
      const { connection } = connect();

      const generation = connection.beginSubscription({ source: 'sensor', frequency: 1000 });

      expect(generation).toBe(1);
      expect(connection.state).toBe('subscribed');
      expect(connection.subscription).toEqual({ source: 'sensor', frequency: 1000 });
    });

    it('stops the attached dispatcher when the subscription is replaced', () => {
      const { connection } = connect();
      const first = { stop: vi.fn() };

      const generation = connection.beginSubscription({ source: 'stock', frequency: 500 });
      expect(connection.attachDispatcher(generation, first)).toBe(true);

      const next = connection.beginSubscription({ source: 'crypto', frequency: 250 });

      expect(first.stop).toHaveBeenCalledTimes(1);
      expect(next).toBe(generation + 1);
      expect(connection.hasActiveDispatcher).toBe(false);
      expect(connection.subscription).toEqual({ source: 'crypto', frequency: 250 });
    });

    it('refuses and stops a dispatcher for a superseded generation', () => {
      const { connection } = connect();
      const stale = { stop: vi.fn() };

      const generation = connection.beginSubscription({ source: 'stock', frequency: 500 });
      connection.beginSubscription({ source: 'stock', frequency: 500 });

      expect(connection.attachDispatcher(generation, stale)).toBe(false);
      expect(stale.stop).toHaveBeenCalledTimes(1);
      expect(connection.hasActiveDispatcher).toBe(false);
    });

    it('returns to idle on cancel and reports whether it was subscribed', () => {
      const { connection } = connect();
      const dispatcher = { stop: vi.fn() };
      const generation = connection.beginSubscription({ source: 'weather', frequency: 2000 });
      connection.attachDispatcher(generation, dispatcher);

      expect(connection.cancelSubscription()).toBe(true);
      expect(connection.state).toBe('idle');
      expect(dispatcher.stop).toHaveBeenCalledTimes(1);

      expect(connection.cancelSubscription()).toBe(false);
      expect(dispatcher.stop).toHaveBeenCalledTimes(1);
    });

    it('returns a copy of the subscription', () => {
      const { connection } = connect();
      connection.beginSubscription({ source: 'stock', frequency: 500 });

      const copy = connection.subscription;
      if (copy) copy.frequency = 1;

      expect(connection.subscription).toEqual({ source: 'stock', frequency: 500 });
    });
  });

  describe('heartbeat', () => {
    it('pings on every interval while pongs arrive', () => {
      const { socket, connection } = connect();
      connection.startHeartbeat();

      vi.advanceTimersByTime(20_000);
      expect(socket.pings).toBe(1);
      socket.pong();

      vi.advanceTimersByTime(20_000);
      expect(socket.pings).toBe(2);
      socket.pong();

      vi.advanceTimersByTime(10_000);
      expect(socket.terminated).toBe(false);
    });

    it('terminates the socket when no pong arrives in time', () => {
      const { socket, connection } = connect();
      connection.startHeartbeat();

      vi.advanceTimersByTime(20_000);
      vi.advanceTimersByTime(9_999);
      expect(socket.terminated).toBe(false);

      vi.advanceTimersByTime(1);
      expect(socket.terminated).toBe(true);
    });

    it('does not stack pings while one is outstanding', () => {
      const socket = new FakeSocket();
      const connection = new ClientConnection({
        socket,
        connectionId: 'client_9',
        heartbeat: { intervalMs: 1_000, timeoutMs: 5_000 },
      });
      connection.startHeartbeat();

      vi.advanceTimersByTime(4_000);

      expect(socket.pings).toBe(1);
    });

    it('stops pinging once stopped', () => {
      const { socket, connection } = connect();
      connection.startHeartbeat();
      connection.stopHeartbeat();

      vi.advanceTimersByTime(60_000);

      expect(socket.pings).toBe(0);
    });
  });

  describe('destroy', () => {
    it('ends the subscription, stops the heartbeat and closes the socket', () => {
      const { socket, connection } = connect();
      const dispatcher = { stop: vi.fn() };
      connection.startHeartbeat();
      connection.attachDispatcher(connection.beginSubscription({ source: 'stock', frequency: 500 }), dispatcher);

      connection.destroy(1001, 'Server shutting down');
      vi.advanceTimersByTime(60_000);

      expect(dispatcher.stop).toHaveBeenCalledTimes(1);
      expect(connection.state).toBe('idle');
      expect(socket.pings).toBe(0);
      expect(socket.closedWith).toEqual({ code: 1001, reason: 'Server shutting down' });
    });

    it('also closes a socket that is still connecting', () => {
      const { socket, connection } = connect(new FakeSocket().connecting());

      connection.destroy();

      expect(socket.closedWith).toEqual({ code: undefined, reason: undefined });
    });

    it('leaves an already closed socket alone', () => {
      const { socket, connection } = connect();
      socket.drop();

      connection.destroy();

      expect(socket.closedWith).toBeNull();
    });
  });
});
