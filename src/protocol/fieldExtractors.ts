// src/protocol/fieldExtractors.ts
// Position / alarm / image sub-parsers. All of them tolerate short or malformed content.

import { AlarmFlags, CommandRecord } from "./types";

export const MIN_POSITION_FIELDS = 5;
export const ALARM_STATUS_INDEX = 15;
export const ALARM_DEFAULT_BITS = "00000000";
export const FALL_DOWN_BIT = 11;
export const SOS_BIT = 16;
export const REMOTE_SNAPSHOT_SUBTYPE = "5";

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)$/;
const INTEGER = /^[+-]?\d+$/;
const HEX = /^[0-9a-fA-F]+$/;

/** Best effort: absent / empty / non-numeric -> null */
export const toDecimalOrNull = (field: string | undefined): number | null => {
  if (field === undefined) return null;
  const trimmed = field.trim();
  return DECIMAL.test(trimmed) ? Number(trimmed) : null;
};

export const toIntOrNull = (field: string | undefined): number | null => {
  if (field === undefined) return null;
  const trimmed = field.trim();
  return INTEGER.test(trimmed) ? parseInt(trimmed, 10) : null;
};

export interface PositionFields {
  type: string;
  latitude: number | null;
  longitude: number | null;
  signalStrength: number | null;
  batteryLevel: number | null;
}

/**
 * UD / UD2 / PP payloads. Reads latitude from field 3, longitude from field 5,
 * signal from 11 and battery from 12; fields 1, 2 and 4 are not consumed.
 * Returns null when there are fewer than 5 fields.
 */
export function extractPosition(content: string): PositionFields | null {
  const parts = content.split(",");
  if (parts.length < MIN_POSITION_FIELDS) return null;

  return {
    type: parts[0],
    latitude: toDecimalOrNull(parts[3]),
    longitude: toDecimalOrNull(parts[5]),
    signalStrength: toIntOrNull(parts[11]),
    batteryLevel: toIntOrNull(parts[12]),
  };
}

/**
 * Renders a hex status word as a 32 char MSB-first bit string.
 * Unparsable or missing input yields the 8 char default, so bit reads past
 * index 7 come back false.
 */
export const alarmBits = (statusField: string | undefined): string => {
  if (statusField === undefined || !HEX.test(statusField)) return ALARM_DEFAULT_BITS;
  return BigInt(`0x${statusField}`).toString(2).padStart(32, "0");
};

export function decodeAlarm(content: string): AlarmFlags {
  const parts = content.split(",");
  const bits = alarmBits(parts[ALARM_STATUS_INDEX]);

  return {
    bits,
    fallDown: bits.charAt(FALL_DOWN_BIT) === "1",
    sos: bits.charAt(SOS_BIT) === "1",
  };
}

export interface ImageFields {
  deviceTimestamp: string;
  imageData: string;
}

// img,5,<timestamp>,<data...>; the data itself may contain commas
export function extractImage(content: string): ImageFields | null {
  const parts = content.split(",");
  if (parts.length < 3 || parts[1] !== REMOTE_SNAPSHOT_SUBTYPE) return null;

  return {
    deviceTimestamp: parts[2],
    imageData: parts.slice(3).join(","),
  };
}

export const positionRecord = (
  deviceId: string,
  content: string,
  fields: PositionFields,
  receivedAt: Date
): CommandRecord => ({
  kind: "position",
  deviceId,
  type: fields.type,
  rawContent: content,
  receivedAt,
  latitude: fields.latitude,
  longitude: fields.longitude,
  signalStrength: fields.signalStrength,
  batteryLevel: fields.batteryLevel,
});

export const imageRecord = (
  deviceId: string,
  type: string,
  content: string,
  fields: ImageFields,
  receivedAt: Date
): CommandRecord => ({
  kind: "image",
  deviceId,
  type,
  rawContent: content,
  receivedAt,
  imageData: fields.imageData,
  deviceTimestamp: fields.deviceTimestamp,
});
