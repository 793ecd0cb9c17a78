import { logger } from "@/lib/logger";
import type { CacheClient } from "./client";
import type { CacheScript, ScriptArg } from "./lua-scripts";

export type ScriptingMode = "atomic" | "best-effort";

/**
 * Executes the multi-command operations the session core needs to be atomic.
 * The strategy is fixed at construction; there is no runtime fallback from
 * one to the other.
 */
export interface ScriptRunner {
  readonly mode: ScriptingMode;
  run<T>(script: CacheScript<T>, keys: string[], args: ScriptArg[]): Promise<T>;
}

function assertKeyCount(script: CacheScript<unknown>, keys: string[]): void {
  if (script.keyCount !== "variadic" && script.keyCount !== keys.length) {
    throw new Error(
      `Script ${script.name} expects ${script.keyCount} keys, received ${keys.length}`
    );
  }
}

/**
 * Server-side EVAL. The only strategy acceptable in a real deployment.
 */
export class AtomicScriptRunner implements ScriptRunner {
  readonly mode = "atomic" as const;

  constructor(private readonly client: CacheClient) {}

  async run<T>(script: CacheScript<T>, keys: string[], args: ScriptArg[]): Promise<T> {
    assertKeyCount(script, keys);
    const raw = await this.client.eval(script.lua, keys.length, ...keys, ...args);
    return script.parse(raw);
  }
}

/**
 * Plain-command emulation for cache doubles without EVAL. Each step is a
 * separate round-trip, so concurrent callers can interleave between them.
 */
export class BestEffortScriptRunner implements ScriptRunner {
  readonly mode = "best-effort" as const;
  private warned = false;

  constructor(private readonly client: CacheClient) {}

  async run<T>(script: CacheScript<T>, keys: string[], args: ScriptArg[]): Promise<T> {
    assertKeyCount(script, keys);
    if (!this.warned && process.env.NODE_ENV !== "test") {
      this.warned = true;
      logger.warn(
        "[ScriptRunner] Non-atomic best-effort scripting in use. This should only happen in tests.",
        { script: script.name }
      );
    }
    const raw = await script.fallback(this.client, keys, args);
    return script.parse(raw);
  }
}

export function createScriptRunner(client: CacheClient, mode: ScriptingMode): ScriptRunner {
  return mode === "atomic" ? new AtomicScriptRunner(client) : new BestEffortScriptRunner(client);
}
