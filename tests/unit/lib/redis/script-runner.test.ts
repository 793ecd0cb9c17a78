import { afterEach, describe, expect, it, vi } from "vitest";

const { loggerMock } = vi.hoisted(() => ({
  loggerMock: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
  },
}));

vi.mock("@/lib/logger", () => ({
  logger: loggerMock,
}));

import {
  ACQUIRE_SESSION_CONNECTION,
  INCREMENT_WINDOW,
  REFRESH_SESSION,
  RELEASE_SESSION_CONNECTION,
  ROTATE_SESSION,
  ScriptResultError,
} from "@/lib/redis/lua-scripts";
import {
  AtomicScriptRunner,
  BestEffortScriptRunner,
  createScriptRunner,
} from "@/lib/redis/script-runner";
import { FakeRedis } from "../../../helpers/fake-redis";

describe("AtomicScriptRunner", () => {
  it("sends the script through EVAL with keys before arguments", async () => {
    const redis = new FakeRedis();
    const runner = new AtomicScriptRunner(redis);

    await expect(runner.run(INCREMENT_WINDOW, ["counter"], ["60"])).resolves.toBe(1);

    expect(redis.eval).toHaveBeenCalledWith(INCREMENT_WINDOW.lua, 1, "counter", "60");
    expect(redis.incr).not.toHaveBeenCalled();
  });

  it("rejects a key list that does not match the script", async () => {
    const runner = new AtomicScriptRunner(new FakeRedis());

    await expect(runner.run(ROTATE_SESSION, ["only-one"], ["blob", "60"])).rejects.toThrow(
      "Script rotateSession expects 2 keys, received 1"
    );
  });

  it("propagates EVAL failures", async () => {
    const redis = new FakeRedis();
    redis.supportsEval = false;

    await expect(
      new AtomicScriptRunner(redis).run(INCREMENT_WINDOW, ["counter"], ["60"])
    ).rejects.toThrow("ERR unknown command 'eval'");
  });

  it("rejects a malformed script reply", async () => {
    const redis = new FakeRedis();
    redis.eval.mockResolvedValueOnce("not-a-number");

    await expect(
      new AtomicScriptRunner(redis).run(INCREMENT_WINDOW, ["counter"], ["60"])
    ).rejects.toBeInstanceOf(ScriptResultError);
  });
});

describe("BestEffortScriptRunner", () => {
  const originalEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
  });

  it("runs the plain-command equivalent", async () => {
    const redis = new FakeRedis();
    redis.supportsEval = false;
    const runner = new BestEffortScriptRunner(redis);

    await runner.run(INCREMENT_WINDOW, ["counter"], ["60"]);
    await expect(runner.run(INCREMENT_WINDOW, ["counter"], ["60"])).resolves.toBe(2);

    expect(redis.eval).not.toHaveBeenCalled();
    expect(redis.expire).toHaveBeenCalledTimes(1);
    await expect(redis.ttl("counter")).resolves.toBe(60);
  });

  it("stays silent under test", async () => {
    const runner = new BestEffortScriptRunner(new FakeRedis());

    await runner.run(INCREMENT_WINDOW, ["counter"], ["60"]);

    expect(loggerMock.warn).not.toHaveBeenCalled();
  });

  it("warns once outside of tests", async () => {
    process.env.NODE_ENV = "development";
    const runner = new BestEffortScriptRunner(new FakeRedis());

    await runner.run(INCREMENT_WINDOW, ["a"], ["60"]);
    await runner.run(INCREMENT_WINDOW, ["b"], ["60"]);

    expect(loggerMock.warn).toHaveBeenCalledTimes(1);
    expect(loggerMock.warn).toHaveBeenCalledWith(
      "[ScriptRunner] Non-atomic best-effort scripting in use. This should only happen in tests.",
      { script: "incrementWindow" }
    );
  });
});

describe("createScriptRunner", () => {
  it("picks the runner for the mode", () => {
    const redis = new FakeRedis();

    expect(createScriptRunner(redis, "atomic")).toBeInstanceOf(AtomicScriptRunner);
    expect(createScriptRunner(redis, "best-effort")).toBeInstanceOf(BestEffortScriptRunner);
  });
});

describe.each([
  ["atomic", (redis: FakeRedis) => new AtomicScriptRunner(redis)],
  ["best-effort", (redis: FakeRedis) => new BestEffortScriptRunner(redis)],
])("session scripts (%s)", (_mode, build) => {
  it("admits up to the cap and restores the count on refusal", async () => {
    const redis = new FakeRedis();
    const runner = build(redis);

    await expect(runner.run(ACQUIRE_SESSION_CONNECTION, ["conn"], ["2", "86400"])).resolves.toEqual([1, 1]);
    await expect(runner.run(ACQUIRE_SESSION_CONNECTION, ["conn"], ["2", "86400"])).resolves.toEqual([1, 2]);
    await expect(runner.run(ACQUIRE_SESSION_CONNECTION, ["conn"], ["2", "86400"])).resolves.toEqual([0, 2]);

    expect(redis.peek("conn")).toBe("2");
  });

  it("deletes the counter when it drops to zero", async () => {
    const redis = new FakeRedis();
    const runner = build(redis);
    await runner.run(ACQUIRE_SESSION_CONNECTION, ["conn"], ["2", "86400"]);

    await expect(runner.run(RELEASE_SESSION_CONNECTION, ["conn"], [])).resolves.toBe(0);
    await expect(runner.run(RELEASE_SESSION_CONNECTION, ["conn"], [])).resolves.toBe(0);

    expect(redis.peek("conn")).toBeNull();
  });

  it("rotates only while the old key still exists", async () => {
    const redis = new FakeRedis();
    const runner = build(redis);
    await redis.setex("old", 60, "blob-old");

    await expect(runner.run(ROTATE_SESSION, ["old", "new"], ["blob-new", "60"])).resolves.toBe(true);
    await expect(runner.run(ROTATE_SESSION, ["old", "newer"], ["blob-newer", "60"])).resolves.toBe(false);

    expect(redis.peek("old")).toBeNull();
    expect(redis.peek("new")).toBe("blob-new");
    expect(redis.peek("newer")).toBeNull();
  });

  it("refreshes a session only while its key still exists", async () => {
    const redis = new FakeRedis();
    const runner = build(redis);
    await redis.setex("live", 60, "blob-old");

    await expect(runner.run(REFRESH_SESSION, ["live"], ["blob-new", "30"])).resolves.toBe(true);
    await expect(runner.run(REFRESH_SESSION, ["gone"], ["blob-new", "30"])).resolves.toBe(false);

    expect(redis.peek("live")).toBe("blob-new");
    expect(await redis.ttl("live")).toBe(30);
    expect(redis.peek("gone")).toBeNull();
  });
});
