import { Queue } from "bullmq";
import { redisClient } from "../config/redis";
import { CleanupJobPayload } from "./cleanup.service";

// Retention jobs for stored device records
export const cleanupQueue = new Queue<CleanupJobPayload>("cleanupQueue", {
  connection: redisClient,
});
