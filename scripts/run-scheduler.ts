import { sql } from "@/lib/db/client";
import { buildScheduler } from "@/lib/services";

async function main(): Promise<void> {
  const scheduler = buildScheduler();
  scheduler.start();
  console.log(`[scheduler] started with jobs: ${scheduler.jobNames().join(", ")}`);

  const stop = async (signal: string): Promise<void> => {
    console.log(`[scheduler] ${signal} received; waiting for running jobs...`);
    await scheduler.stop();
    await sql.end({ timeout: 5 });
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      stop(signal).catch((error: unknown) => {
        console.error("[scheduler] shutdown failed", error);
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
