import WebSocket from 'ws';
import { PING_INTERVAL_MS, PING_TIMEOUT_MS } from '@tickcast/schemas';
import { createLogger, type Logger } from '@tickcast/utils';
import type { ServerMessage, SessionState, StreamSocket, Subscription } from './types.js';

const logger = createLogger({ name: 'stream:connection', service: 'stream' });

/**
 * Transport-level liveness settings.
 * A ping goes out every `intervalMs`; no pong within `timeoutMs` terminates the socket.
 */
export interface HeartbeatOptions {
  intervalMs: number;
  timeoutMs: number;
}

export const DEFAULT_HEARTBEAT: HeartbeatOptions = {
  intervalMs: PING_INTERVAL_MS,
  timeoutMs: PING_TIMEOUT_MS,
};

/** Anything a session can stop when its subscription ends */
export interface Cancellable {
  stop(): void;
}

/**
 * ClientConnection is the server-side session for one WebSocket client:
 * - Identity (`client_<n>`)
 * - Subscription state and its generation counter
 * - The dispatcher currently bound to the subscription, if any
 * - Heartbeat ping/pong liveness detection
 *
 * The generation counter increases on every subscribe and unsubscribe.
 * A dispatcher captures the generation it was started for and checks it
 * before each send, so a replaced dispatcher can never deliver.
 */
export class ClientConnection {
  public readonly connectionId: string;
  public readonly connectedAt: Date;
  public readonly log: Logger;

  private readonly socket: StreamSocket;
  private readonly heartbeat: HeartbeatOptions;
  private current: Subscription | null = null;
  private generationCounter = 0;
  private dispatcher: Cancellable | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private pongTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(opts: { socket: StreamSocket; connectionId: string; heartbeat?: HeartbeatOptions }) {
    this.socket = opts.socket;
    this.connectionId = opts.connectionId;
    this.heartbeat = opts.heartbeat ?? DEFAULT_HEARTBEAT;
    this.connectedAt = new Date();
    this.log = logger.child({ clientId: this.connectionId });

    // Attach pong handler ONCE in constructor (not per heartbeat tick)
    this.socket.on('pong', () => {
      this.clearPongTimer();
    });
  }

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  get state(): SessionState {
    return this.current ? 'subscribed' : 'idle';
  }

  get subscription(): Subscription | null {
    return this.current ? { ...this.current } : null;
  }

  get generation(): number {
    return this.generationCounter;
  }

  get hasActiveDispatcher(): boolean {
    return this.dispatcher !== null;
  }

  /**
   * Start heartbeat ping/pong cycle.
   * Every interval: send a ping and arm the pong deadline. A ping is not
   * re-sent while a previous one is still waiting for its pong.
   */
  startHeartbeat(): void {
    if (this.heartbeatTimer) return;

    this.heartbeatTimer = setInterval(() => {
      if (!this.isOpen || this.pongTimer) return;

      this.socket.ping();
      this.pongTimer = setTimeout(() => {
        this.pongTimer = null;
        this.log.warn({ timeoutMs: this.heartbeat.timeoutMs }, 'Pong not received, terminating connection');
        this.socket.terminate();
      }, this.heartbeat.timeoutMs);
    }, this.heartbeat.intervalMs);
  }

  /** Stop heartbeat interval and any pending pong deadline */
  stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    this.clearPongTimer();
  }

  /**
   * Send a pre-serialized frame.
   *
   * @returns true if handed to the socket, false if the peer is gone or the write threw
   */
  send(data: string): boolean {
    if (!this.isOpen) {
      return false;
    }

    try {
      this.socket.send(data);
      return true;
    } catch (error) {
      this.log.debug({ err: error instanceof Error ? error.message : String(error) }, 'Socket write failed');
      return false;
    }
  }

  /** Serialize and send one protocol message */
  sendMessage(message: ServerMessage): boolean {
    return this.send(JSON.stringify(message));
  }

  /**
   * Replace the current subscription. Any running dispatcher is stopped
   * before the new subscription is recorded.
   *
   * @returns The generation the new subscription's dispatcher must carry
   */
  beginSubscription(subscription: Subscription): number {
    this.cancelSubscription();
    this.current = { ...subscription };
    return this.generationCounter;
  }

  /**
   * End the current subscription, if any, and stop its dispatcher.
   *
   * @returns true if a subscription was active
   */
  cancelSubscription(): boolean {
    const wasSubscribed = this.current !== null;

    this.generationCounter++;
    if (this.dispatcher) {
      this.dispatcher.stop();
      this.dispatcher = null;
    }
    this.current = null;

    return wasSubscribed;
  }

  /**
   * Bind a dispatcher to the subscription it was started for.
   * A dispatcher for a superseded generation is stopped instead.
   */
  attachDispatcher(generation: number, dispatcher: Cancellable): boolean {
    if (generation !== this.generationCounter || this.current === null) {
      dispatcher.stop();
      return false;
    }

    if (this.dispatcher && this.dispatcher !== dispatcher) {
      this.dispatcher.stop();
    }
    this.dispatcher = dispatcher;
    return true;
  }

  /** Clean up: end subscription, stop heartbeat, close socket if open */
  destroy(code?: number, reason?: string): void {
    this.cancelSubscription();
    this.stopHeartbeat();
    if (
      this.socket.readyState === WebSocket.OPEN ||
      this.socket.readyState === WebSocket.CONNECTING
    ) {
      this.socket.close(code, reason);
    }
  }

  private clearPongTimer(): void {
    if (this.pongTimer) {
      clearTimeout(this.pongTimer);
      this.pongTimer = null;
    }
  }
}
