import * as cron from "node-cron";
import { cleanupQueue } from "./queue";
import { CLEANUP_OLD_RECORDS } from "./cleanup.service";
import { describeError } from "../protocol/errors";

async function safeJob(fn: () => Promise<void>, label: string) {
  try {
    await fn();
  } catch (err) {
    console.error(`❌ Error running ${label}:`, describeError(err));
  }
}

// --------------------- CRON JOBS ----------------------

export function scheduleCronJobs(): cron.ScheduledTask[] {
  // Daily record retention - 3 AM
  const retention = cron.schedule("0 3 * * *", () =>
    safeJob(async () => {
      console.log("🔄 Starting daily record cleanup...");

      await cleanupQueue.add(CLEANUP_OLD_RECORDS, {}, {
        attempts: 3,
        backoff: { type: "exponential", delay: 2000 },
      });

      console.log("✅ Record cleanup job scheduled");
    }, "record-cleanup")
  );

  console.log("🕐 Cron jobs initialized:");
  console.log("  - Record cleanup: 3:00 AM");

  return [retention];
}
