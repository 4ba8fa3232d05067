// src/config/tcp.ts
// TCP listener settings for watch connections
import dotenv from "dotenv";
import { DEFAULT_MAX_FRAME_BYTES } from "../tcp/frameSplitter";
dotenv.config();

export const tcpConfig = {
  host: process.env.TCP_HOST ?? "0.0.0.0",
  port: Number(process.env.TCP_PORT ?? 9001),
  maxFrameBytes: Number(process.env.TCP_MAX_FRAME_BYTES ?? DEFAULT_MAX_FRAME_BYTES),
  keepAlive: true,
  keepAliveInitialDelayMs: 30_000,
  noDelay: true, // small frames, don't batch
} as const;

export type TcpConfig = typeof tcpConfig;
