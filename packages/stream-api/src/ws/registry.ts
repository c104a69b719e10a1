import type { ClientConnection } from './connection.js';

/**
 * ConnectionRegistry tracks every live session, keyed by connection id.
 *
 * Iteration always goes through `snapshot()`, a point-in-time copy, so
 * callers may add or remove sessions while walking it. A session removed
 * after the snapshot was taken simply fails its next send.
 */
export class ConnectionRegistry {
  private readonly sessions: Map<string, ClientConnection> = new Map();

  /**
   * Register a session. Adding one that is already present is a no-op.
   *
   * @returns true if the session was newly added
   */
  add(session: ClientConnection): boolean {
    if (this.sessions.has(session.connectionId)) {
      return false;
    }
    this.sessions.set(session.connectionId, session);
    return true;
  }

  /**
   * Remove a session. Removing one that is absent is a no-op.
   *
   * @returns true if a session was removed
   */
  remove(session: ClientConnection): boolean {
    const registered = this.sessions.get(session.connectionId);
    if (registered !== session) {
      return false;
    }
    return this.sessions.delete(session.connectionId);
  }

  get(connectionId: string): ClientConnection | undefined {
    return this.sessions.get(connectionId);
  }

  has(session: ClientConnection): boolean {
    return this.sessions.get(session.connectionId) === session;
  }

  /** Point-in-time copy of the live sessions */
  snapshot(): ClientConnection[] {
    return [...this.sessions.values()];
  }

  count(): number {
    return this.sessions.size;
  }

  clear(): void {
    this.sessions.clear();
  }
}
