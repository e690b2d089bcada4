// packages/server/src/connectionRegistry.ts

import WebSocket from "ws";

/** The slice of a WebSocket the coordinator relies on. */
export interface Connection {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

/**
 * Exactly one live connection per id. A later `connect` for the same id
 * supersedes the earlier one; `disconnect` only removes the entry it was
 * given, so a stale close cannot evict a newer connection.
 */
export class ConnectionRegistry<K extends string = string> {
  private readonly connections = new Map<K, Connection>();

  connect(id: K, connection: Connection): Connection | null {
    const previous = this.connections.get(id) ?? null;
    this.connections.set(id, connection);
    return previous === connection ? null : previous;
  }

  disconnect(id: K, connection: Connection): boolean {
    if (this.connections.get(id) !== connection) return false;
    this.connections.delete(id);
    return true;
  }

  take(id: K): Connection | null {
    const connection = this.connections.get(id);
    if (!connection) return null;
    this.connections.delete(id);
    return connection;
  }

  get(id: K): Connection | null {
    return this.connections.get(id) ?? null;
  }

  has(id: K): boolean {
    return this.connections.has(id);
  }

  get size(): number {
    return this.connections.size;
  }

  ids(): K[] {
    return Array.from(this.connections.keys());
  }

  send(id: K, message: string): boolean {
    const connection = this.connections.get(id);
    if (!connection) return false;
    return sendText(connection, message);
  }

  broadcast(message: string): number {
    let delivered = 0;
    for (const connection of this.connections.values()) {
      if (sendText(connection, message)) delivered += 1;
    }
    return delivered;
  }

  clear(): void {
    this.connections.clear();
  }
}

export function isOpen(connection: Connection): boolean {
  return connection.readyState === WebSocket.OPEN;
}

export function sendText(connection: Connection, message: string): boolean {
  if (!isOpen(connection)) return false;
  connection.send(message);
  return true;
}
