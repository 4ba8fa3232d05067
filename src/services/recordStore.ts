// src/services/recordStore.ts
// MongoDB-backed RecordStore

import DeviceRecord from "../models/DeviceRecord.model";
import { StoreError, describeError } from "../protocol/errors";
import { CommandRecord, RecordQuery, RecordStore, StoredRecord } from "../protocol/types";

const MAX_PAGE_SIZE = 100;

type RecordDoc = CommandRecord & { _id: unknown };

const toStoredRecord = (doc: RecordDoc): StoredRecord => ({
  id: String(doc._id),
  kind: doc.kind,
  deviceId: doc.deviceId,
  type: doc.type,
  rawContent: doc.rawContent,
  receivedAt: doc.receivedAt,
  latitude: doc.latitude ?? null,
  longitude: doc.longitude ?? null,
  batteryLevel: doc.batteryLevel ?? null,
  signalStrength: doc.signalStrength ?? null,
  ...(doc.imageData !== undefined && { imageData: doc.imageData }),
  ...(doc.deviceTimestamp !== undefined && { deviceTimestamp: doc.deviceTimestamp }),
});

export class MongoRecordStore implements RecordStore {
  async save(record: CommandRecord): Promise<string> {
    try {
      const doc = await DeviceRecord.create(record);
      return String(doc._id);
    } catch (err) {
      throw new StoreError(`Failed to save ${record.type} record: ${describeError(err)}`, err);
    }
  }

  async findByDevice(
    deviceId: string,
    query: RecordQuery = {}
  ): Promise<{ records: StoredRecord[]; total: number }> {
    const filter: { deviceId: string; type?: string } = { deviceId };
    if (query.type) filter.type = query.type;

    const limit = Math.min(MAX_PAGE_SIZE, Math.max(1, query.limit ?? 20));
    const skip = Math.max(0, query.skip ?? 0);

    try {
      const [docs, total] = await Promise.all([
        DeviceRecord.find(filter)
          .sort({ receivedAt: -1 })
          .skip(skip)
          .limit(limit)
          .lean<RecordDoc[]>(),
        DeviceRecord.countDocuments(filter),
      ]);
      return { records: docs.map(toStoredRecord), total };
    } catch (err) {
      throw new StoreError(`Failed to read records of ${deviceId}: ${describeError(err)}`, err);
    }
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    try {
      const deleted = await DeviceRecord.deleteMany({ receivedAt: { $lt: cutoff } });
      return deleted.deletedCount;
    } catch (err) {
      throw new StoreError(`Failed to delete records before ${cutoff.toISOString()}: ${describeError(err)}`, err);
    }
  }
}
