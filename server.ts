#!/usr/bin/env node

/**
 * 会话网关服务器 with Socket.IO
 *
 * HTTP 提供健康检查（/healthz 存活、/readyz 就绪），
 * Socket.IO 连接经准入控制后建立，共享端口（APP_PORT）
 */

import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { Server as SocketIOServer } from "socket.io";
import { getEnvConfig } from "./src/lib/config/env.schema";
import { logger, toLogError } from "./src/lib/logger";
import { createSessionRuntime, type SessionRuntime } from "./src/lib/runtime";
import type {
  ClientToServerEvents,
  GatewaySocketData,
  InterServerEvents,
  ServerToClientEvents,
  WebSocketConfig,
} from "./src/types/websocket";

// 环境配置
const env = getEnvConfig();
const dev = env.NODE_ENV === "development";
const hostname = "0.0.0.0"; // 监听所有网络接口
const port = env.APP_PORT;

/**
 * 创建 WebSocket 配置
 */
function createWebSocketConfig(): WebSocketConfig {
  return {
    enabled: env.ENABLE_WEBSOCKET,
    path: env.WEBSOCKET_PATH,
    pingInterval: 30000, // 30 秒心跳间隔
    pingTimeout: 5000, // 5 秒心跳超时
    cors: {
      origin: dev ? "*" : false, // 开发环境允许所有来源，生产环境禁用
      credentials: true,
    },
    transports: ["websocket", "polling"],
  };
}

function sendJson(res: ServerResponse, status: number, body: Record<string, unknown>): void {
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(body));
}

async function handleRequest(
  runtime: SessionRuntime,
  req: IncomingMessage,
  res: ServerResponse
): Promise<void> {
  const path = (req.url ?? "/").split("?")[0];

  if (path === "/healthz") {
    sendJson(res, 200, { status: "ok" });
    return;
  }

  if (path === "/readyz") {
    const readiness = await runtime.admission.checkReadiness();
    if (readiness.ready) {
      sendJson(res, 200, { status: "ready" });
    } else {
      res.setHeader("retry-after", String(env.WS_DRAIN_RETRY_AFTER_SECONDS));
      sendJson(res, 503, { status: "not_ready", reason: readiness.reason });
    }
    return;
  }

  sendJson(res, 404, { error: "Not found" });
}

/**
 * 优雅关闭处理
 */
async function gracefulShutdown(
  signal: string,
  server: ReturnType<typeof createServer>,
  runtime: SessionRuntime
): Promise<void> {
  logger.info(`Received ${signal}, starting graceful shutdown...`);

  // 超时强制退出（最多 10 秒）
  const forceExit = setTimeout(() => {
    logger.warn("Forced shutdown after 10 seconds");
    process.exit(1);
  }, 10000);
  forceExit.unref();

  try {
    // 1. 排空：新连接返回 503；2. 关闭 Socket.IO（同时关闭 HTTP）；3. 关闭 Redis
    await runtime.shutdown();
    if (server.listening) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    logger.info("Shutdown complete");
    process.exit(0);
  } catch (error) {
    logger.error("Shutdown failed", { error: toLogError(error) });
    process.exit(1);
  }
}

/**
 * 启动服务器
 */
async function startServer(): Promise<void> {
  const runtime = createSessionRuntime(env);

  const server = createServer((req, res) => {
    handleRequest(runtime, req, res).catch((error: unknown) => {
      logger.error("Error handling request", { error: toLogError(error) });
      res.statusCode = 500;
      res.end("Internal Server Error");
    });
  });

  const wsConfig = createWebSocketConfig();
  if (wsConfig.enabled) {
    logger.info("Initializing Socket.IO WebSocket server...");

    const io = new SocketIOServer<
      ClientToServerEvents,
      ServerToClientEvents,
      InterServerEvents,
      GatewaySocketData
    >(server, {
      path: wsConfig.path,
      cors: wsConfig.cors,
      transports: wsConfig.transports,
      pingInterval: wsConfig.pingInterval,
      pingTimeout: wsConfig.pingTimeout,
      connectTimeout: 45000, // 45 秒连接超时
      upgradeTimeout: 10000, // 10 秒升级超时
      maxHttpBufferSize: 1024 * 1024,
      perMessageDeflate: false,
    });
    runtime.attachWebSocket(io);

    logger.info("Socket.IO WebSocket server initialized", {
      path: wsConfig.path,
      maxConnections: env.WS_MAX_CONNECTIONS,
      maxConnectionsPerSession: env.WS_MAX_CONNECTIONS_PER_SESSION,
    });
  } else {
    logger.info("WebSocket server disabled (ENABLE_WEBSOCKET=false)");
  }

  await new Promise<void>((resolve, reject) => {
    server.once("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "EADDRINUSE") {
        logger.error(`Port ${port} is already in use`);
      } else {
        logger.error("Server error", { error: toLogError(err) });
      }
      reject(err);
    });
    server.listen(port, hostname, () => resolve());
  });

  logger.info("Server is ready", {
    hostname,
    port,
    websocketEnabled: wsConfig.enabled,
    websocketPath: wsConfig.enabled ? wsConfig.path : undefined,
    environment: env.NODE_ENV,
  });

  process.once("SIGTERM", () => void gracefulShutdown("SIGTERM", server, runtime));
  process.once("SIGINT", () => void gracefulShutdown("SIGINT", server, runtime));
}

startServer().catch((error: unknown) => {
  logger.fatal("Failed to start server", { error: toLogError(error) });
  process.exit(1);
});
