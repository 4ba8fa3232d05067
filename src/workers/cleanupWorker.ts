import { Worker, Job } from "bullmq";
import { redisClient } from "../config/redis";
import { RecordStore } from "../protocol/types";
import { CLEANUP_OLD_RECORDS, CleanupJobPayload, cleanupOldRecords } from "./cleanup.service";

/* --------------------- Worker Definition ---------------------- */

export function createCleanupWorker(store: RecordStore): Worker<CleanupJobPayload> {
  const worker = new Worker<CleanupJobPayload>(
    "cleanupQueue",
    async (job: Job<CleanupJobPayload>) => {
      console.log(`🧽 Processing cleanup job: ${job.name}`);

      if (job.name === CLEANUP_OLD_RECORDS) {
        return cleanupOldRecords(store, job.data);
      }

      console.warn(`⚠️ Unknown cleanup job: ${job.name}`);
      return 0;
    },
    {
      connection: redisClient,
      concurrency: 1,
      drainDelay: 5000, // Poll every 5 seconds instead of every tick
      removeOnComplete: { count: 20 },
      removeOnFail: { count: 10 },
    }
  );

  /* --------------------- Worker Monitoring ---------------------- */

  worker.on("completed", (job) => {
    console.log(`✔️ Cleanup job completed: ${job.name}`);
  });

  worker.on("failed", (job, err) => {
    console.error(`❌ Cleanup job failed: ${job?.name}`, err.message);
  });

  worker.on("error", (err) => {
    console.error("💥 Worker-level error:", err.message);
  });

  return worker;
}
