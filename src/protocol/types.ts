// src/protocol/types.ts
// Shared shapes of the watch protocol engine and the collaborators it talks to

/**
 * One inbound frame split into its four `*` fields.
 * Structure: [manufacturer*deviceId*LEN*content]
 */
export interface ParsedMessage {
  readonly manufacturer: string; // e.g. 3G, CS, SG
  readonly deviceId: string;
  readonly declaredLength: number;
  readonly content: string; // e.g. LK,50,100,100
}

export type RecordKind = "baseline" | "position" | "image";

/**
 * Normalized record handed to the store. Optional fields are only set on
 * position / image records.
 */
export interface CommandRecord {
  kind: RecordKind;
  deviceId: string;
  type: string;
  rawContent: string;
  receivedAt: Date;
  latitude?: number | null;
  longitude?: number | null;
  batteryLevel?: number | null;
  signalStrength?: number | null;
  imageData?: string;
  deviceTimestamp?: string;
}

export interface AlarmFlags {
  bits: string;
  fallDown: boolean;
  sos: boolean;
}

export interface OutboundCommand {
  deviceId: string;
  commandToken: string;
  extraContent: string;
}

/* ----------------------------------------------
 *  COLLABORATORS
 * ---------------------------------------------- */

export interface RecordQuery {
  type?: string;
  skip?: number;
  limit?: number;
}

export interface StoredRecord extends CommandRecord {
  id: string;
}

/** Persistence for classified records. `save` rejects with a StoreError. */
export interface RecordStore {
  save(record: CommandRecord): Promise<string>;
  findByDevice(deviceId: string, query?: RecordQuery): Promise<{ records: StoredRecord[]; total: number }>;
  deleteOlderThan(cutoff: Date): Promise<number>;
}

/** Write-back side of the TCP transport. Returns false when no live connection took the frame. */
export interface DeviceTransport {
  send(deviceId: string, frame: string): boolean;
}

/** Called after each record is stored (live feed, caches). */
export type RecordListener = (record: StoredRecord) => void | Promise<void>;
