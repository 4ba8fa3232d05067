// src/workers/cleanup.service.ts
// Retention of stored device records

import { RecordStore } from "../protocol/types";

export const CLEANUP_OLD_RECORDS = "cleanupOldRecords";

export interface CleanupJobPayload {
  retentionDays?: number;
}

const DAY_MS = 86_400_000;

export const defaultRetentionDays = (): number => {
  const days = parseInt(process.env.RECORD_RETENTION_DAYS || "30", 10);
  return Number.isInteger(days) && days > 0 ? days : 30;
};

export const retentionCutoff = (retentionDays: number, now: Date = new Date()): Date =>
  new Date(now.getTime() - retentionDays * DAY_MS);

/** Deletes records received before the retention window; returns how many went */
export async function cleanupOldRecords(
  store: RecordStore,
  payload: CleanupJobPayload = {},
  now: Date = new Date()
): Promise<number> {
  const retention = payload.retentionDays ?? defaultRetentionDays();
  const cutoff = retentionCutoff(retention, now);

  const deleted = await store.deleteOlderThan(cutoff);
  console.log(`🗑️ Deleted ${deleted} device records older than ${retention} days`);
  return deleted;
}
