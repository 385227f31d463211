import type { ConnectionSession } from "../types.js";

/**
 * Per-connection roleplay state. The pipeline only needs these three operations, so a
 * partitioned or shared store can replace the in-memory one.
 */
export interface SessionStore {
  get(connectionId: string): ConnectionSession | undefined;
  put(connectionId: string, session: ConnectionSession): void;
  delete(connectionId: string): boolean;
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, ConnectionSession>();

  public get size(): number {
    return this.sessions.size;
  }

  public get(connectionId: string): ConnectionSession | undefined {
    return this.sessions.get(connectionId);
  }

  public put(connectionId: string, session: ConnectionSession): void {
    this.sessions.set(connectionId, session);
  }

  public delete(connectionId: string): boolean {
    return this.sessions.delete(connectionId);
  }
}
