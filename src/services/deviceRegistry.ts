// src/services/deviceRegistry.ts
// deviceId -> live TCP connection, used to push replies and admin commands

import { DeviceTransport } from "../protocol/types";
import { encodeFrame } from "../tcp/frameSplitter";

/** The slice of net.Socket the registry needs */
export interface DeviceConnection {
  readonly remoteAddress?: string;
  readonly destroyed: boolean;
  write(data: string): boolean;
}

export interface DeviceSession {
  deviceId: string;
  remoteAddress: string | null;
  connectedAt: Date;
  lastFrameAt: Date;
}

interface Entry {
  connection: DeviceConnection;
  session: DeviceSession;
}

export class DeviceRegistry implements DeviceTransport {
  private devices: Map<string, Entry> = new Map();

  /**
   * Bind a device to the connection it last spoke on. A device reconnecting on a new
   * socket replaces the old binding.
   */
  touch(deviceId: string, connection: DeviceConnection, at: Date = new Date()): void {
    const existing = this.devices.get(deviceId);
    if (existing && existing.connection === connection) {
      existing.session.lastFrameAt = at;
      return;
    }

    if (existing) console.log(`🔁 Device ${deviceId} moved to a new connection`);
    this.devices.set(deviceId, {
      connection,
      session: {
        deviceId,
        remoteAddress: connection.remoteAddress ?? null,
        connectedAt: at,
        lastFrameAt: at,
      },
    });
  }

  /** Drop every device still bound to this connection; returns their ids */
  release(connection: DeviceConnection): string[] {
    const released: string[] = [];
    for (const [deviceId, entry] of this.devices) {
      if (entry.connection === connection) {
        this.devices.delete(deviceId);
        released.push(deviceId);
      }
    }
    return released;
  }

  send(deviceId: string, frame: string): boolean {
    const entry = this.devices.get(deviceId);
    if (!entry || entry.connection.destroyed) {
      console.warn(`⚠️ Device ${deviceId} is not connected, frame not sent: ${frame}`);
      return false;
    }

    entry.connection.write(encodeFrame(frame));
    return true;
  }

  isConnected(deviceId: string): boolean {
    const entry = this.devices.get(deviceId);
    return !!entry && !entry.connection.destroyed;
  }

  sessions(): DeviceSession[] {
    return [...this.devices.values()].map((entry) => ({ ...entry.session }));
  }

  get size(): number {
    return this.devices.size;
  }
}
