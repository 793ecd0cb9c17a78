export {
  buildRedisOptionsForUrl,
  type CacheClient,
  type OwnedCacheClient,
  closeRedis,
  createRedisClient,
  pingRedis,
} from "./client";
export { type CacheScript, type ScriptArg, ScriptResultError } from "./lua-scripts";
export {
  AtomicScriptRunner,
  BestEffortScriptRunner,
  createScriptRunner,
  type ScriptingMode,
  type ScriptRunner,
} from "./script-runner";
