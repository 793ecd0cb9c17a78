export {
  type AdmissionControllerOptions,
  type AdmissionOutcome,
  type AdmissionRejection,
  type AdmissionRequest,
  AdmissionController,
  CAPACITY_RETRY_AFTER_SECONDS,
  type InnerHandshake,
  type ReadinessStatus,
} from "./admission-controller";
export {
  type ConnectionContext,
  createConnectionContext,
  type HandshakeState,
  releaseReservations,
} from "./connection-context";
export { ConnectionLifecycle, type ConnectionLifecycleOptions } from "./connection-lifecycle";
export { ConnectionSemaphore, type SemaphorePermit } from "./connection-semaphore";
export {
  type ConnectionMetrics,
  ConnectionStats,
  type ConnectionStatsSnapshot,
  type DisconnectReason,
  type RejectionReason,
} from "./connection-stats";
export {
  SESSION_CONN_KEY_PREFIX,
  SessionConnectionCounter,
  type SessionCounterAcquireResult,
} from "./session-connection-counter";
