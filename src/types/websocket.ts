/**
 * WebSocket 类型定义
 */

import type { ConnectionContext } from "@/lib/admission/connection-context";
import type { RejectionReason } from "@/lib/admission/connection-stats";

/**
 * 服务端 → 客户端事件
 */
export type ServerToClientEvents = {
  "system:shutdown": (payload: { message: string }) => void;
};

export type ClientToServerEvents = Record<string, never>;

export type InterServerEvents = Record<string, never>;

/**
 * Socket 数据（存储在 socket.data 中），由准入中间件写入
 */
export type GatewaySocketData = {
  context?: ConnectionContext;
};

/**
 * 准入拒绝时随 connect_error 下发的机器可读数据
 */
export interface AdmissionErrorData {
  status: 401 | 429 | 503;
  reason: RejectionReason;
  retryAfterSeconds?: number;
}

/**
 * WebSocket 配置
 */
export interface WebSocketConfig {
  enabled: boolean;
  path: string;
  pingInterval: number;
  pingTimeout: number;
  cors: {
    origin: string | string[] | boolean;
    credentials: boolean;
  };
  transports: ("websocket" | "polling")[];
}
