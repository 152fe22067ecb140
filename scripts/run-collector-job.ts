import { sql } from "@/lib/db/client";
import { getServices } from "@/lib/services";

async function main(): Promise<void> {
  console.log("[job:collector] launching manual collector run...");
  const result = await getServices().collector.run({ triggeredBy: "local_script" });

  console.log("[job:collector] run complete.");
  console.log(JSON.stringify(result, null, 2));
}

async function shutdown(): Promise<void> {
  await sql.end({ timeout: 5 }).catch((error: unknown) => {
    console.warn("[job:collector] failed to close database pool", error);
  });
}

main()
  .then(async () => {
    await shutdown();
  })
  .catch(async (error) => {
    console.error(error);
    await shutdown();
    process.exit(1);
  });
