/**
 * Router - session rooms and isolated fan-out of server messages.
 *
 * A room is the set of connections joined to one session. `emit()` delivers
 * a message only to the connections currently in that session's room;
 * membership confers no control over the session's lifecycle.
 */

import type { ServerMessage } from "./protocol.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("ROUTER");

// =============================================================================
// Types
// =============================================================================

/** Transport-agnostic view of one client connection. */
export interface Connection {
  readonly id: string;
  send(message: ServerMessage): void;
}

// =============================================================================
// Router
// =============================================================================

export class Router {
  private rooms = new Map<string, Set<Connection>>();
  private memberships = new Map<Connection, Set<string>>();

  /**
   * Add a connection to a session's room. Joining twice is a no-op.
   */
  join(connection: Connection, sessionId: string): void {
    let room = this.rooms.get(sessionId);
    if (!room) {
      room = new Set();
      this.rooms.set(sessionId, room);
    }
    room.add(connection);

    let joined = this.memberships.get(connection);
    if (!joined) {
      joined = new Set();
      this.memberships.set(connection, joined);
    }
    joined.add(sessionId);

    logger.debug(`${connection.id} joined ${sessionId} (members: ${room.size})`);
  }

  /**
   * Remove a connection from a session's room.
   */
  leave(connection: Connection, sessionId: string): void {
    const room = this.rooms.get(sessionId);
    if (room) {
      room.delete(connection);
      if (room.size === 0) {
        this.rooms.delete(sessionId);
      }
    }

    const joined = this.memberships.get(connection);
    if (joined) {
      joined.delete(sessionId);
      if (joined.size === 0) {
        this.memberships.delete(connection);
      }
    }
  }

  /**
   * Remove a connection from every room (on disconnect).
   * @returns the session ids it had joined
   */
  leaveAll(connection: Connection): string[] {
    const joined = Array.from(this.memberships.get(connection) ?? []);
    for (const sessionId of joined) {
      this.leave(connection, sessionId);
    }
    return joined;
  }

  /**
   * Drop a session's room entirely (on session destroy).
   * @returns the connections that were members
   */
  closeRoom(sessionId: string): Connection[] {
    const members = Array.from(this.rooms.get(sessionId) ?? []);
    for (const connection of members) {
      this.leave(connection, sessionId);
    }
    this.rooms.delete(sessionId);
    return members;
  }

  /**
   * Deliver a message to every connection joined to `sessionId`.
   * A failing connection does not prevent delivery to the others.
   * @returns the number of connections the message was handed to
   */
  emit(sessionId: string, message: ServerMessage): number {
    const room = this.rooms.get(sessionId);
    if (!room) return 0;

    let delivered = 0;
    for (const connection of Array.from(room)) {
      try {
        connection.send(message);
        delivered++;
      } catch (error) {
        logger.error(`Delivery of ${message.type} to ${connection.id} failed`, error);
      }
    }
    return delivered;
  }

  /**
   * Check if a connection is in a session's room.
   */
  isMember(connection: Connection, sessionId: string): boolean {
    return this.rooms.get(sessionId)?.has(connection) ?? false;
  }

  /**
   * Connections currently joined to a session.
   */
  members(sessionId: string): Connection[] {
    return Array.from(this.rooms.get(sessionId) ?? []);
  }

  /**
   * Session ids a connection has joined.
   */
  roomsOf(connection: Connection): string[] {
    return Array.from(this.memberships.get(connection) ?? []);
  }

  /**
   * Number of non-empty rooms.
   */
  get size(): number {
    return this.rooms.size;
  }
}
