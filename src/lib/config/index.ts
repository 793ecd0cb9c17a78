export { type EnvConfig, getEnvConfig, resetEnvConfigForTests } from "./env.schema";
export {
  ConfigurationError,
  loadSessionSecurityConfig,
  type SessionSecurityConfig,
  type SessionTimeouts,
} from "./session-security";
