/**
 * Redis Lua 脚本集合
 *
 * 用于保证 Redis 操作的原子性。每个脚本同时声明一个 best-effort 等价实现，
 * 仅供不支持 EVAL 的测试替身使用（非原子，见 script-runner.ts）。
 */

import type { CacheClient } from "./client";

export type ScriptArg = string | Buffer;

export interface CacheScript<TResult> {
  readonly name: string;
  readonly lua: string;
  readonly keyCount: number | "variadic";
  parse(raw: unknown): TResult;
  /** Same effect with plain commands. Not atomic. */
  fallback(client: CacheClient, keys: string[], args: ScriptArg[]): Promise<unknown>;
}

export class ScriptResultError extends Error {
  constructor(scriptName: string, raw: unknown) {
    super(`Unexpected result from script ${scriptName}: ${JSON.stringify(raw)}`);
    this.name = "ScriptResultError";
  }
}

function toInteger(raw: unknown): number | null {
  if (typeof raw === "number" && Number.isInteger(raw)) return raw;
  if (typeof raw === "string" && /^-?\d+$/.test(raw)) return Number.parseInt(raw, 10);
  return null;
}

function parseInteger(scriptName: string, raw: unknown): number {
  const value = toInteger(raw);
  if (value === null) throw new ScriptResultError(scriptName, raw);
  return value;
}

function parsePair(scriptName: string, raw: unknown): [number, number] {
  if (!Array.isArray(raw) || raw.length !== 2) throw new ScriptResultError(scriptName, raw);
  const first = toInteger(raw[0]);
  const second = toInteger(raw[1]);
  if (first === null || second === null) throw new ScriptResultError(scriptName, raw);
  return [first, second];
}

function argNumber(args: ScriptArg[], index: number): number {
  return Number(String(args[index]));
}

async function remainingTtl(client: CacheClient, key: string): Promise<number> {
  const ttl = await client.ttl(key);
  return ttl > 0 ? ttl : 0;
}

/**
 * 固定窗口计数：INCR，首次创建时设置过期
 *
 * KEYS[1]: counter key
 * ARGV[1]: window seconds
 *
 * 返回值：递增后的计数
 */
export const INCREMENT_WINDOW: CacheScript<number> = {
  name: "incrementWindow",
  keyCount: 1,
  lua: `
local current = redis.call('INCR', KEYS[1])
if current == 1 then
  redis.call('EXPIRE', KEYS[1], ARGV[1])
end
return current
`,
  parse: (raw) => parseInteger("incrementWindow", raw),
  async fallback(client, keys, args) {
    const current = await client.incr(keys[0]);
    if (current === 1) {
      await client.expire(keys[0], argNumber(args, 0));
    }
    return current;
  },
};

/**
 * 原子会话轮换：旧会话存在时写入新会话并删除旧会话
 *
 * KEYS[1]: old session key
 * KEYS[2]: new session key
 * ARGV[1]: new encrypted blob
 * ARGV[2]: TTL seconds
 *
 * 返回值：1 = 已轮换，0 = 旧会话已不存在（放弃，不创建孤儿会话）
 */
export const ROTATE_SESSION: CacheScript<boolean> = {
  name: "rotateSession",
  keyCount: 2,
  lua: `
if redis.call('EXISTS', KEYS[1]) == 0 then
  return 0
end
redis.call('SETEX', KEYS[2], ARGV[2], ARGV[1])
redis.call('DEL', KEYS[1])
return 1
`,
  parse: (raw) => parseInteger("rotateSession", raw) === 1,
  async fallback(client, keys, args) {
    if ((await client.exists(keys[0])) === 0) {
      return 0;
    }
    await client.setex(keys[1], argNumber(args, 1), args[0]);
    await client.del(keys[0]);
    return 1;
  },
};

/**
 * 条件刷新会话：仅当会话仍存在时覆写（避免复活已轮换或已登出的会话）
 *
 * KEYS[1]: session key
 * ARGV[1]: refreshed encrypted blob
 * ARGV[2]: TTL seconds
 *
 * 返回值：1 = 已刷新，0 = 会话已不存在
 */
export const REFRESH_SESSION: CacheScript<boolean> = {
  name: "refreshSession",
  keyCount: 1,
  lua: `
if redis.call('EXISTS', KEYS[1]) == 0 then
  return 0
end
redis.call('SETEX', KEYS[1], ARGV[2], ARGV[1])
return 1
`,
  parse: (raw) => parseInteger("refreshSession", raw) === 1,
  async fallback(client, keys, args) {
    if ((await client.exists(keys[0])) === 0) {
      return 0;
    }
    await client.setex(keys[0], argNumber(args, 1), args[0]);
    return 1;
  },
};

/**
 * 认证限流决策码（与 auth-rate-limiter.ts 中的联合类型对应）
 */
export const AUTH_DECISION = {
  ALLOWED: 0,
  IP_RATE_LIMITED: 1,
  ACCOUNT_LOCKED: 2,
  ACCOUNT_LOCKED_NOW: 3,
} as const;

/**
 * 只读检查：IP 窗口计数是否已达上限，账户是否处于锁定
 *
 * KEYS[1]: ip counter key
 * KEYS[2]: (optional) account lockout key
 * ARGV[1]: ip max attempts
 *
 * 返回值：{code, retryAfterSeconds}
 */
export const AUTH_CHECK_ONLY: CacheScript<[number, number]> = {
  name: "authCheckOnly",
  keyCount: "variadic",
  lua: `
local ip_count = tonumber(redis.call('GET', KEYS[1]) or '0')
if ip_count >= tonumber(ARGV[1]) then
  return {1, math.max(redis.call('TTL', KEYS[1]), 0)}
end
if #KEYS >= 2 and redis.call('EXISTS', KEYS[2]) == 1 then
  return {2, math.max(redis.call('TTL', KEYS[2]), 0)}
end
return {0, 0}
`,
  parse: (raw) => parsePair("authCheckOnly", raw),
  async fallback(client, keys, args) {
    const ipCount = Number((await client.get(keys[0])) ?? "0");
    if (ipCount >= argNumber(args, 0)) {
      return [AUTH_DECISION.IP_RATE_LIMITED, await remainingTtl(client, keys[0])];
    }
    if (keys.length >= 2 && (await client.exists(keys[1])) === 1) {
      return [AUTH_DECISION.ACCOUNT_LOCKED, await remainingTtl(client, keys[1])];
    }
    return [AUTH_DECISION.ALLOWED, 0];
  },
};

/**
 * 记录一次失败：IP 计数 +1；未超 IP 上限时账户失败计数 +1，达到阈值即锁定
 *
 * KEYS[1]: ip counter key
 * KEYS[2]: (optional) account failure counter key
 * KEYS[3]: (optional) account lockout key
 * ARGV[1]: ip max attempts
 * ARGV[2]: ip window seconds
 * ARGV[3]: account failure window seconds
 * ARGV[4]: lockout threshold
 * ARGV[5]: lockout seconds
 *
 * 返回值：{code, retryAfterSeconds}，code 0 表示仅记录失败
 */
export const AUTH_RECORD_FAILURE: CacheScript<[number, number]> = {
  name: "authRecordFailure",
  keyCount: "variadic",
  lua: `
local ip_count = redis.call('INCR', KEYS[1])
if ip_count == 1 then
  redis.call('EXPIRE', KEYS[1], ARGV[2])
end
if ip_count > tonumber(ARGV[1]) then
  return {1, math.max(redis.call('TTL', KEYS[1]), 0)}
end
if #KEYS < 3 then
  return {0, 0}
end
if redis.call('EXISTS', KEYS[3]) == 1 then
  return {2, math.max(redis.call('TTL', KEYS[3]), 0)}
end
local failures = redis.call('INCR', KEYS[2])
if failures == 1 then
  redis.call('EXPIRE', KEYS[2], ARGV[3])
end
if failures >= tonumber(ARGV[4]) then
  redis.call('SET', KEYS[3], '1', 'EX', ARGV[5])
  redis.call('DEL', KEYS[2])
  return {3, tonumber(ARGV[5])}
end
return {0, 0}
`,
  parse: (raw) => parsePair("authRecordFailure", raw),
  async fallback(client, keys, args) {
    const ipCount = await client.incr(keys[0]);
    if (ipCount === 1) {
      await client.expire(keys[0], argNumber(args, 1));
    }
    if (ipCount > argNumber(args, 0)) {
      return [AUTH_DECISION.IP_RATE_LIMITED, await remainingTtl(client, keys[0])];
    }
    if (keys.length < 3) {
      return [AUTH_DECISION.ALLOWED, 0];
    }
    if ((await client.exists(keys[2])) === 1) {
      return [AUTH_DECISION.ACCOUNT_LOCKED, await remainingTtl(client, keys[2])];
    }
    const failures = await client.incr(keys[1]);
    if (failures === 1) {
      await client.expire(keys[1], argNumber(args, 2));
    }
    const lockoutSeconds = argNumber(args, 4);
    if (failures >= argNumber(args, 3)) {
      await client.setex(keys[2], lockoutSeconds, "1");
      await client.del(keys[1]);
      return [AUTH_DECISION.ACCOUNT_LOCKED_NOW, lockoutSeconds];
    }
    return [AUTH_DECISION.ALLOWED, 0];
  },
};

/**
 * 仅按 IP 的检查并递增（尚无账户标识的流程，如 OIDC 回调）
 *
 * KEYS[1]: ip counter key
 * ARGV[1]: ip max attempts
 * ARGV[2]: ip window seconds
 *
 * 返回值：{code, retryAfterSeconds}
 */
export const AUTH_CHECK_AND_INCREMENT_IP: CacheScript<[number, number]> = {
  name: "authCheckAndIncrementIp",
  keyCount: 1,
  lua: `
local ip_count = tonumber(redis.call('GET', KEYS[1]) or '0')
if ip_count >= tonumber(ARGV[1]) then
  return {1, math.max(redis.call('TTL', KEYS[1]), 0)}
end
local current = redis.call('INCR', KEYS[1])
if current == 1 then
  redis.call('EXPIRE', KEYS[1], ARGV[2])
end
return {0, 0}
`,
  parse: (raw) => parsePair("authCheckAndIncrementIp", raw),
  async fallback(client, keys, args) {
    const ipCount = Number((await client.get(keys[0])) ?? "0");
    if (ipCount >= argNumber(args, 0)) {
      return [AUTH_DECISION.IP_RATE_LIMITED, await remainingTtl(client, keys[0])];
    }
    const current = await client.incr(keys[0]);
    if (current === 1) {
      await client.expire(keys[0], argNumber(args, 1));
    }
    return [AUTH_DECISION.ALLOWED, 0];
  },
};

/**
 * 单会话连接计数：递增并检查上限，超限时回退
 *
 * KEYS[1]: session connection counter key
 * ARGV[1]: per-session cap
 * ARGV[2]: counter TTL seconds（防止崩溃进程永久占用）
 *
 * 返回值：{admitted(1|0), count}
 */
export const ACQUIRE_SESSION_CONNECTION: CacheScript<[number, number]> = {
  name: "acquireSessionConnection",
  keyCount: 1,
  lua: `
local count = redis.call('INCR', KEYS[1])
if count == 1 then
  redis.call('EXPIRE', KEYS[1], ARGV[2])
end
if count > tonumber(ARGV[1]) then
  local restored = redis.call('DECR', KEYS[1])
  if restored <= 0 then
    redis.call('DEL', KEYS[1])
  end
  return {0, restored}
end
return {1, count}
`,
  parse: (raw) => parsePair("acquireSessionConnection", raw),
  async fallback(client, keys, args) {
    const count = await client.incr(keys[0]);
    if (count === 1) {
      await client.expire(keys[0], argNumber(args, 1));
    }
    if (count > argNumber(args, 0)) {
      const restored = await client.decr(keys[0]);
      if (restored <= 0) {
        await client.del(keys[0]);
      }
      return [0, restored];
    }
    return [1, count];
  },
};

/**
 * 单会话连接计数：递减，归零时删除
 *
 * KEYS[1]: session connection counter key
 *
 * 返回值：剩余计数（不小于 0）
 */
export const RELEASE_SESSION_CONNECTION: CacheScript<number> = {
  name: "releaseSessionConnection",
  keyCount: 1,
  lua: `
local count = redis.call('DECR', KEYS[1])
if count <= 0 then
  redis.call('DEL', KEYS[1])
  return 0
end
return count
`,
  parse: (raw) => parseInteger("releaseSessionConnection", raw),
  async fallback(client, keys) {
    const count = await client.decr(keys[0]);
    if (count <= 0) {
      await client.del(keys[0]);
      return 0;
    }
    return count;
  },
};
