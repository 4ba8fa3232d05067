import { Document } from "mongoose";
import { RecordKind } from "../protocol/types";

export interface IDeviceRecord extends Document {
  kind: RecordKind;
  deviceId: string;
  type: string; // command token: LK, UD, AL, img...
  rawContent: string;
  receivedAt: Date;
  latitude?: number | null;
  longitude?: number | null;
  batteryLevel?: number | null;
  signalStrength?: number | null;
  imageData?: string;
  deviceTimestamp?: string;
  createdAt: Date;
  updatedAt: Date;
}
