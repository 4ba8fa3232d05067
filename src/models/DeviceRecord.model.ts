// src/models/DeviceRecord.model.ts
import mongoose, { Schema } from "mongoose";
import { IDeviceRecord } from "../interfaces/DeviceRecord";

const deviceRecordSchema = new Schema<IDeviceRecord>(
  {
    kind: {
      type: String,
      enum: ["baseline", "position", "image"],
      default: "baseline",
    },
    // Empty strings are valid: "[3G**0002*LK]" and "[3G*1*0000*]" still get a baseline record
    deviceId: {
      type: String,
      required: function (this: IDeviceRecord) {
        return typeof this.deviceId !== "string";
      },
    },
    type: {
      type: String,
      required: function (this: IDeviceRecord) {
        return typeof this.type !== "string";
      },
    },
    rawContent: { type: String, default: "" },
    receivedAt: { type: Date, default: Date.now },
    latitude: { type: Number, default: null },
    longitude: { type: Number, default: null },
    batteryLevel: { type: Number, default: null },
    signalStrength: { type: Number, default: null },
    imageData: String, // raw snapshot payload, stored as received
    deviceTimestamp: String,
  },
  { timestamps: true }
);

// Records of one device filtered by command, newest first
deviceRecordSchema.index({ deviceId: 1, type: 1, receivedAt: -1 });

// Per-device history
deviceRecordSchema.index({ deviceId: 1, receivedAt: -1 });

// Retention cleanup
deviceRecordSchema.index({ receivedAt: -1 });

export default mongoose.model<IDeviceRecord>("DeviceRecord", deviceRecordSchema);
