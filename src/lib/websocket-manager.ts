import type { IncomingHttpHeaders } from "node:http";
import type { Server as SocketIOServer, Socket } from "socket.io";
import type {
  AdmissionController,
  AdmissionRejection,
} from "./admission/admission-controller";
import type { ConnectionContext } from "./admission/connection-context";
import type { ConnectionLifecycle } from "./admission/connection-lifecycle";
import type { ConnectionStats } from "./admission/connection-stats";
import { logger, toLogError } from "./logger";
import type {
  AdmissionErrorData,
  ClientToServerEvents,
  GatewaySocketData,
  InterServerEvents,
  ServerToClientEvents,
} from "@/types/websocket";

export type GatewayServer = SocketIOServer<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  GatewaySocketData
>;

type GatewaySocket = Socket<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  GatewaySocketData
>;

export interface HandshakeCredentials {
  auth: Record<string, unknown>;
  headers: IncomingHttpHeaders;
}

/**
 * connect_error 携带的错误；`data` 会被 Socket.IO 原样下发给客户端
 */
export class AdmissionRejectedError extends Error {
  readonly data: AdmissionErrorData;

  constructor(rejection: AdmissionRejection) {
    super(rejection.message);
    this.name = "AdmissionRejectedError";
    this.data = {
      status: rejection.status,
      reason: rejection.reason,
      retryAfterSeconds: rejection.retryAfterSeconds,
    };
  }
}

/**
 * 从 Cookie 字符串中提取会话 token
 */
export function extractCookieToken(cookieString: string | undefined, cookieName: string): string | null {
  if (!cookieString) return null;

  for (const part of cookieString.split(";")) {
    const separator = part.indexOf("=");
    if (separator <= 0) continue;
    if (part.slice(0, separator).trim() !== cookieName) continue;

    const value = part.slice(separator + 1).trim();
    try {
      return decodeURIComponent(value) || null;
    } catch {
      return value || null;
    }
  }
  return null;
}

/**
 * 会话 token 来源优先级：auth.token > Authorization: Bearer > Cookie
 */
export function extractSessionToken(credentials: HandshakeCredentials, cookieName: string): string | null {
  const authToken = credentials.auth.token;
  if (typeof authToken === "string" && authToken.length > 0) {
    return authToken;
  }

  const authorization = credentials.headers.authorization;
  if (authorization?.startsWith("Bearer ")) {
    const bearer = authorization.slice("Bearer ".length).trim();
    if (bearer) return bearer;
  }

  return extractCookieToken(credentials.headers.cookie, cookieName);
}

export interface WebSocketManagerOptions {
  admission: AdmissionController;
  lifecycle: ConnectionLifecycle;
  stats: ConnectionStats;
  cookieName: string;
  /** 0 disables the periodic stats log. */
  statsLogIntervalMs?: number;
}

/**
 * WebSocket 管理器
 *
 * Socket.IO 与准入控制之间的桥接：
 * 1. `io.use` 中间件执行准入（排空 / 会话校验 / 容量 / 单会话上限）
 * 2. 内部握手 = 放行中间件，等待 `connection` 事件触发
 * 3. `connection` → 生命周期接管资源，`disconnect` → 释放
 */
export class WebSocketManager {
  private readonly io: GatewayServer;
  private readonly admission: AdmissionController;
  private readonly lifecycle: ConnectionLifecycle;
  private readonly stats: ConnectionStats;
  private readonly cookieName: string;
  private statsTimer: NodeJS.Timeout | null = null;

  constructor(io: GatewayServer, options: WebSocketManagerOptions) {
    this.io = io;
    this.admission = options.admission;
    this.lifecycle = options.lifecycle;
    this.stats = options.stats;
    this.cookieName = options.cookieName;
    this.setupMiddleware();
    this.setupConnectionHandlers();
    this.setupStatsLogging(options.statsLogIntervalMs ?? 5 * 60 * 1000);
  }

  /**
   * 设置准入中间件
   */
  private setupMiddleware(): void {
    this.io.use(async (socket, next) => {
      const token = extractSessionToken(
        { auth: socket.handshake.auth, headers: socket.handshake.headers },
        this.cookieName
      );

      try {
        const result = await this.admission.admit(
          {
            token,
            clientIp: socket.handshake.address,
            userAgent: socket.handshake.headers["user-agent"] ?? null,
          },
          (context) => this.handOver(socket, context, next)
        );

        if (result.outcome === "rejected") {
          logger.warn("WebSocket: Admission rejected", {
            socketId: socket.id,
            status: result.rejection.status,
            reason: result.rejection.reason,
          });
          next(new AdmissionRejectedError(result.rejection));
        } else if (result.outcome === "aborted") {
          logger.warn("WebSocket: Handshake did not complete", { socketId: socket.id });
        }
      } catch (error) {
        logger.error("WebSocket: Admission error", {
          socketId: socket.id,
          error: toLogError(error),
        });
        next(new Error("Connection failed"));
      }
    });
  }

  /**
   * 内部握手：放行中间件，Socket.IO 在 nextTick 中触发 `connection`，
   * 因此 setImmediate 时握手状态已确定
   */
  private handOver(
    socket: GatewaySocket,
    context: ConnectionContext,
    next: (err?: Error) => void
  ): Promise<void> {
    socket.data.context = context;
    return new Promise<void>((resolve) => {
      next();
      setImmediate(resolve);
    });
  }

  /**
   * 设置连接处理器
   */
  private setupConnectionHandlers(): void {
    this.io.on("connection", (socket) => {
      const context = socket.data.context;
      const clientId = context ? this.lifecycle.onConnect(context, socket.id) : null;
      if (!clientId) {
        socket.disconnect(true);
        return;
      }

      socket.on("error", (error: Error) => {
        this.lifecycle.recordError(clientId, error);
      });

      socket.on("disconnect", (reason) => {
        this.lifecycle
          .onDisconnect(clientId, reason === "transport error" ? "error" : "normal")
          .catch((error: unknown) => {
            logger.error("WebSocket: Disconnect cleanup failed", {
              socketId: socket.id,
              error: toLogError(error),
            });
          });
      });
    });
  }

  /**
   * 设置定期统计日志
   */
  private setupStatsLogging(intervalMs: number): void {
    if (intervalMs <= 0) return;
    this.statsTimer = setInterval(() => {
      logger.info("WebSocket: Connection stats", this.stats.snapshot());
    }, intervalMs);
    this.statsTimer.unref();
  }

  public getStats() {
    return this.stats.snapshot();
  }

  /**
   * 优雅关闭：通知客户端后断开全部连接（disconnect 处理器负责释放资源）
   */
  public async close(): Promise<void> {
    if (this.statsTimer) {
      clearInterval(this.statsTimer);
      this.statsTimer = null;
    }

    logger.info("WebSocket: Closing all connections", {
      activeConnections: this.lifecycle.activeConnections,
    });

    this.io.emit("system:shutdown", { message: "Server is shutting down" });
    await this.io.close();

    logger.info("WebSocket: All connections closed");
  }
}
