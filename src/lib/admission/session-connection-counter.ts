import {
  ACQUIRE_SESSION_CONNECTION,
  RELEASE_SESSION_CONNECTION,
} from "@/lib/redis/lua-scripts";
import type { ScriptRunner } from "@/lib/redis/script-runner";

export const SESSION_CONN_KEY_PREFIX = "console:ws:session_conn:";

export type SessionCounterAcquireResult =
  | { admitted: true; key: string; count: number }
  | { admitted: false; key: string; count: number };

export interface SessionConnectionCounterOptions {
  maxPerSession: number;
  /** Bounds the lifetime of a counter left behind by a crashed process. */
  ttlSeconds: number;
}

/**
 * Shared (cross-process) count of connections per session, so one identity
 * cannot hold more than `maxPerSession` sockets across the whole fleet.
 */
export class SessionConnectionCounter {
  constructor(
    private readonly scripts: ScriptRunner,
    private readonly options: SessionConnectionCounterOptions
  ) {}

  keyFor(sessionId: string): string {
    return `${SESSION_CONN_KEY_PREFIX}${sessionId}`;
  }

  async acquire(sessionId: string): Promise<SessionCounterAcquireResult> {
    const key = this.keyFor(sessionId);
    const [admitted, count] = await this.scripts.run(ACQUIRE_SESSION_CONNECTION, [key], [
      String(this.options.maxPerSession),
      String(this.options.ttlSeconds),
    ]);
    return { admitted: admitted === 1, key, count };
  }

  /**
   * Returns the remaining count; the key is deleted once it reaches zero.
   */
  async release(key: string): Promise<number> {
    return this.scripts.run(RELEASE_SESSION_CONNECTION, [key], []);
  }
}
