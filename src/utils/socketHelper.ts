// src/utils/socketHelper.ts
// Centralized Socket.IO helper to avoid multiple initializations and provide type-safe access

import { Server as SocketIOServer } from "socket.io";
import { StoredRecord } from "../protocol/types";

let ioInstance: SocketIOServer | null = null;

/**
 * Initialize Socket.IO instance (called from server.ts)
 */
export function setSocketIO(io: SocketIOServer | null): void {
  ioInstance = io;
}

/**
 * Get Socket.IO instance safely
 * Returns null if not initialized
 */
export function getSocketIO(): SocketIOServer | null {
  return ioInstance;
}

/**
 * Emit event to specific rooms safely
 */
export function emitToRoom(room: string, event: string, data: unknown): void {
  const io = getSocketIO();
  if (io) {
    io.to(room).emit(event, data);
  }
}

/**
 * Standard room names (consistent across app)
 */
export const ROOMS = {
  ADMINS: "admins",
  device: (deviceId: string) => `device:${deviceId}`,
} as const;

/**
 * Standard socket event names
 */
export const EVENTS = {
  DEVICE_RECORD: "device-record",
  DEVICE_CONNECTED: "device-connected",
  DEVICE_DISCONNECTED: "device-disconnected",
} as const;

/** Live feed of stored records for dashboards */
export function emitDeviceRecord(record: StoredRecord): void {
  emitToRoom(ROOMS.ADMINS, EVENTS.DEVICE_RECORD, record);
  emitToRoom(ROOMS.device(record.deviceId), EVENTS.DEVICE_RECORD, record);
}
