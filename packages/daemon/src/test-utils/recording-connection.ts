/**
 * In-process Connection that records every message it is sent.
 */

import type { ServerMessage } from "../gateway/protocol.js";
import type { Connection } from "../gateway/router.js";

type MessageOf<T extends ServerMessage["type"]> = Extract<ServerMessage, { type: T }>;

export class RecordingConnection implements Connection {
  readonly messages: ServerMessage[] = [];

  constructor(readonly id: string = "conn-1") {}

  send(message: ServerMessage): void {
    this.messages.push(message);
  }

  /** Messages of one type, in arrival order. */
  ofType<T extends ServerMessage["type"]>(type: T): MessageOf<T>[] {
    return this.messages.filter((m): m is MessageOf<T> => m.type === type);
  }

  /** Concatenated pty-output received for a session. */
  outputFor(sessionId: string): string {
    return this.ofType("pty-output")
      .filter((m) => m.session_id === sessionId)
      .map((m) => m.output)
      .join("");
  }

  /** Index of the first message matching the predicate, or -1. */
  indexOf(predicate: (message: ServerMessage) => boolean): number {
    return this.messages.findIndex(predicate);
  }

  clear(): void {
    this.messages.length = 0;
  }
}
