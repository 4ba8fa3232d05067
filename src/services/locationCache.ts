// src/services/locationCache.ts
// Last known position per device, kept in Redis

import { RecordListener } from "../protocol/types";

export const LOCATION_CACHE_TTL_SEC = Number(process.env.LOCATION_CACHE_TTL_SEC ?? 600);

export interface CachedLocation {
  latitude: number | null;
  longitude: number | null;
  batteryLevel: number | null;
  signalStrength: number | null;
  receivedAt: string;
}

/** The part of the ioredis client the cache uses */
export interface CacheClient {
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  get(key: string): Promise<string | null>;
}

export const locationKey = (deviceId: string) => `device:location:${deviceId}`;

export const createLocationCache = (client: CacheClient) => ({
  async setDeviceLocation(deviceId: string, location: CachedLocation, ttl: number = LOCATION_CACHE_TTL_SEC) {
    await client.setex(locationKey(deviceId), ttl, JSON.stringify(location));
  },

  async getDeviceLocation(deviceId: string): Promise<CachedLocation | null> {
    const data = await client.get(locationKey(deviceId));
    return data ? JSON.parse(data) : null;
  },
});

export type LocationCache = ReturnType<typeof createLocationCache>;

/** Keeps the cache in step with stored position records */
export const cacheLocationListener =
  (cache: LocationCache, ttl: number = LOCATION_CACHE_TTL_SEC): RecordListener =>
  async (record) => {
    if (record.kind !== "position") return;

    await cache.setDeviceLocation(
      record.deviceId,
      {
        latitude: record.latitude ?? null,
        longitude: record.longitude ?? null,
        batteryLevel: record.batteryLevel ?? null,
        signalStrength: record.signalStrength ?? null,
        receivedAt: record.receivedAt.toISOString(),
      },
      ttl
    );
  };
