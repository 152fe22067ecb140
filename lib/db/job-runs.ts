import type { JSONValue } from "postgres";

import { sql } from "@/lib/db/client";
import { windowStart } from "@/lib/pricing/aggregate";
import { redactPayload } from "@/lib/security/redaction";
import type { JobName, JobStatus } from "@/lib/types";

const toJson = (value: unknown) => sql.json(value as JSONValue);

export type JobEventSeverity = "info" | "warn" | "error";

/**
 * Inserts the running row for a job, or returns null when another process
 * already holds one (`job_runs_one_running_idx`).
 */
export async function acquireJobRun(input: { job: JobName; triggeredBy: string | null }): Promise<string | null> {
  const rows = await sql<{ id: string }[]>`
    insert into job_runs (job, status, triggered_by, started_at, heartbeat_at)
    values (${input.job}, 'running', ${input.triggeredBy}, now(), now())
    on conflict (job) where status = 'running' do nothing
    returning id
  `;

  return rows.length > 0 ? rows[0].id : null;
}

export async function heartbeatJobRun(runId: string): Promise<void> {
  await sql`
    update job_runs
    set heartbeat_at = now()
    where id = ${runId} and status = 'running'
  `;
}

/** Fails running rows whose process stopped reporting, so they release the job. */
export async function reconcileStaleJobRuns(input: {
  job: JobName;
  staleAfterMinutes: number;
}): Promise<Array<{ id: string }>> {
  return sql<Array<{ id: string }>>`
    update job_runs
    set
      status = 'failed',
      finished_at = now(),
      summary = summary || ${toJson({ error: "stale run reconciled" })}
    where
      job = ${input.job}
      and status = 'running'
      and coalesce(heartbeat_at, started_at) <= now() - make_interval(mins => ${input.staleAfterMinutes}::int)
    returning id
  `;
}

export async function finishJobRun(input: {
  runId: string;
  status: JobStatus;
  summary: Record<string, unknown>;
}): Promise<void> {
  await sql`
    update job_runs
    set status = ${input.status}, summary = ${toJson(input.summary)}, finished_at = now()
    where id = ${input.runId}
  `;
}

export async function recordJobEvent(input: {
  runId: string;
  severity: JobEventSeverity;
  code: string;
  message: string;
  payload?: Record<string, unknown>;
}): Promise<void> {
  await sql`
    insert into job_events (job_run_id, severity, code, message, payload)
    values (
      ${input.runId},
      ${input.severity},
      ${input.code},
      ${input.message},
      ${toJson(redactPayload(input.payload ?? {}))}
    )
  `;
}

export async function pruneJobEvents(olderThanDays: number): Promise<number> {
  const cutoff = windowStart(new Date(), olderThanDays);

  const rows = await sql`
    delete from job_events
    where created_at < ${cutoff.toISOString()}
    returning id
  `;

  return rows.length;
}
