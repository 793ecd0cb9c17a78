export type RejectionReason =
  | "draining"
  | "at_capacity"
  | "invalid_session"
  | "validation_timeout"
  | "validation_unavailable"
  | "session_connection_limit"
  | "counter_unavailable";

export type DisconnectReason = "normal" | "error";

/**
 * Operability counters. Implementations must not throw; callers treat them
 * as side effects.
 */
export interface ConnectionMetrics {
  recordRejection(reason: RejectionReason): void;
  recordConnect(activeConnections: number): void;
  recordDisconnect(reason: DisconnectReason, activeConnections: number): void;
}

export interface ConnectionStatsSnapshot {
  totalConnections: number;
  activeConnections: number;
  rejections: Partial<Record<RejectionReason, number>>;
  disconnects: Record<DisconnectReason, number>;
  lastUpdateAt: number;
}

/**
 * In-memory metrics.
 */
export class ConnectionStats implements ConnectionMetrics {
  private stats: ConnectionStatsSnapshot = {
    totalConnections: 0,
    activeConnections: 0,
    rejections: {},
    disconnects: { normal: 0, error: 0 },
    lastUpdateAt: Date.now(),
  };

  recordRejection(reason: RejectionReason): void {
    this.stats.rejections[reason] = (this.stats.rejections[reason] ?? 0) + 1;
    this.stats.lastUpdateAt = Date.now();
  }

  recordConnect(activeConnections: number): void {
    this.stats.totalConnections++;
    this.stats.activeConnections = activeConnections;
    this.stats.lastUpdateAt = Date.now();
  }

  recordDisconnect(reason: DisconnectReason, activeConnections: number): void {
    this.stats.disconnects[reason]++;
    this.stats.activeConnections = activeConnections;
    this.stats.lastUpdateAt = Date.now();
  }

  snapshot(): ConnectionStatsSnapshot {
    return {
      ...this.stats,
      rejections: { ...this.stats.rejections },
      disconnects: { ...this.stats.disconnects },
    };
  }
}
