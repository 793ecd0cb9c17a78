import { randomUUID } from "node:crypto";
import { logger, maskSessionId, toLogError } from "@/lib/logger";
import { type ConnectionContext, releaseReservations } from "./connection-context";
import type { ConnectionMetrics, DisconnectReason } from "./connection-stats";
import type { SessionConnectionCounter } from "./session-connection-counter";

interface ConnectionRecord {
  context: ConnectionContext;
  connectedAt: number;
  errored: boolean;
}

export interface ConnectionLifecycleOptions {
  counter: SessionConnectionCounter;
  metrics: ConnectionMetrics;
}

/**
 * Second half of the admission hand-off: takes ownership of a connection's
 * reservations on connect and gives them back on disconnect.
 */
export class ConnectionLifecycle {
  private readonly connections = new Map<string, ConnectionRecord>();
  private readonly counter: SessionConnectionCounter;
  private readonly metrics: ConnectionMetrics;

  constructor(options: ConnectionLifecycleOptions) {
    this.counter = options.counter;
    this.metrics = options.metrics;
  }

  /**
   * Returns the client id, or null when admission already gave up on this
   * connection (the caller must then drop it without releasing anything).
   */
  onConnect(context: ConnectionContext, clientId: string = randomUUID()): string | null {
    if (context.handshake !== "pending") {
      logger.warn("[ConnectionLifecycle] Connect after admission released, dropping", {
        state: context.handshake,
      });
      return null;
    }

    context.handshake = "handshake_complete";
    context.clientId = clientId;
    this.connections.set(clientId, { context, connectedAt: Date.now(), errored: false });
    this.metrics.recordConnect(this.connections.size);

    logger.info("[ConnectionLifecycle] Client connected", {
      clientId,
      sessionId: maskSessionId(context.session?.sessionId),
      userId: context.session?.user.userId,
      activeConnections: this.connections.size,
    });

    return clientId;
  }

  /**
   * An error surfaced during the connection. Release still happens on
   * disconnect; only the recorded reason changes.
   */
  recordError(clientId: string, error: unknown): void {
    const record = this.connections.get(clientId);
    if (!record) return;
    record.errored = true;
    logger.warn("[ConnectionLifecycle] Connection error", { clientId, error: toLogError(error) });
  }

  async onDisconnect(clientId: string, reason: DisconnectReason = "normal"): Promise<void> {
    const record = this.connections.get(clientId);
    if (!record) {
      // never completed the handshake, or already disconnected
      return;
    }
    this.connections.delete(clientId);

    await releaseReservations(record.context, this.counter);

    const finalReason: DisconnectReason = record.errored ? "error" : reason;
    this.metrics.recordDisconnect(finalReason, this.connections.size);

    logger.info("[ConnectionLifecycle] Client disconnected", {
      clientId,
      reason: finalReason,
      durationMs: Date.now() - record.connectedAt,
      activeConnections: this.connections.size,
    });
  }

  has(clientId: string): boolean {
    return this.connections.has(clientId);
  }

  get activeConnections(): number {
    return this.connections.size;
  }
}
