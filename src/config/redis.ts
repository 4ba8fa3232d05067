import { Redis } from "ioredis";
import dotenv from "dotenv";
import { createLocationCache } from "../services/locationCache";
dotenv.config();

const REDIS_URL = process.env.REDIS_URL ?? "redis://localhost:6379";

export const redisClient = new Redis(REDIS_URL, {
  // Upstash and other managed instances are reached over rediss://
  ...(REDIS_URL.startsWith("rediss://") && { tls: { rejectUnauthorized: false } }),
  maxRetriesPerRequest: null, // required by bullmq
});

redisClient.on("connect", () => console.log("✅ Redis connected"));
redisClient.on("error", (err) => console.error("❌ Redis Error:", err));

// Last known device positions
export const cacheHelpers = createLocationCache(redisClient);
