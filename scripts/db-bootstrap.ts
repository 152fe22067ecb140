import { readFile } from "node:fs/promises";
import path from "node:path";

import postgres from "postgres";

// Drop order respects foreign keys.
const TABLES = [
  "job_events",
  "job_runs",
  "comparison_snapshots",
  "group_members",
  "comparison_groups",
  "price_snapshots",
  "tracked_products"
] as const;

interface BootstrapOptions {
  databaseUrl: string;
  ssl: "require" | false;
  prepare: boolean;
  reset: boolean;
  schemaPath: string;
}

function readOptions(argv: string[]): BootstrapOptions {
  const databaseUrl = process.env.DATABASE_ADMIN_URL || process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error("Missing required environment variable: DATABASE_URL (or DATABASE_ADMIN_URL)");
  }

  const resetFlag = process.env.DB_BOOTSTRAP_RESET;

  return {
    databaseUrl,
    ssl: process.env.DATABASE_SSL_MODE === "disable" ? false : "require",
    prepare: process.env.DATABASE_PREPARE === "true",
    reset: argv.includes("--reset") || resetFlag === "true" || resetFlag === "1",
    schemaPath: path.join(process.cwd(), "sql", "schema.sql")
  };
}

function quoteIdent(identifier: string): string {
  return `"${identifier.replaceAll("\"", "\"\"")}"`;
}

async function dropTables(sql: postgres.Sql): Promise<void> {
  console.log("[db] reset requested; dropping price monitor tables");

  for (const table of TABLES) {
    await sql.unsafe(`drop table if exists ${quoteIdent(table)} cascade`);
  }
}

async function missingTables(sql: postgres.Sql): Promise<string[]> {
  const rows = await sql<{ tableName: string }[]>`
    select table_name as "tableName"
    from information_schema.tables
    where table_schema = current_schema()
      and table_name in ${sql([...TABLES])}
  `;

  const present = new Set(rows.map((row) => row.tableName));
  return TABLES.filter((table) => !present.has(table));
}

async function main(): Promise<void> {
  const options = readOptions(process.argv.slice(2));
  const sql = postgres(options.databaseUrl, {
    max: 1,
    ssl: options.ssl,
    prepare: options.prepare
  });

  try {
    if (options.reset) {
      await dropTables(sql);
    }

    console.log(`[db] applying ${path.relative(process.cwd(), options.schemaPath)}`);
    // schema.sql is committed in-repo and idempotent.
    await sql.unsafe(await readFile(options.schemaPath, "utf8"));

    const missing = await missingTables(sql);
    if (missing.length > 0) {
      throw new Error(`Schema applied but tables are missing: ${missing.join(", ")}`);
    }

    console.log(`[db] bootstrap complete (${TABLES.length} tables present)`);
  } finally {
    await sql.end({ timeout: 5 });
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
