import { acquireJobRun, heartbeatJobRun, reconcileStaleJobRuns, recordJobEvent } from "@/lib/db/job-runs";
import { errorMessage } from "@/lib/errors";
import type { JobName } from "@/lib/types";

export const DEFAULT_STALE_RUN_MINUTES = 30;

/**
 * Cross-process run lock backed by the running row in `job_runs`. Rows left
 * behind by a crashed process are failed once their heartbeat is older than
 * `staleAfterMinutes`. Returns the new run id, or null when another live run
 * holds the job.
 */
export async function claimJobRun(input: {
  job: JobName;
  triggeredBy: string;
  staleAfterMinutes: number;
}): Promise<string | null> {
  const scope = `[job:${input.job}]`;
  const staleRuns = await reconcileStaleJobRuns({ job: input.job, staleAfterMinutes: input.staleAfterMinutes });
  const runId = await acquireJobRun({ job: input.job, triggeredBy: input.triggeredBy });

  if (!runId) {
    console.warn(`${scope} another process holds the run lock; trigger skipped`, { triggeredBy: input.triggeredBy });
    return null;
  }

  if (staleRuns.length > 0) {
    const staleRunIds = staleRuns.map((run) => run.id);
    console.warn(`${scope} reconciled ${staleRuns.length} stale run(s): ${staleRunIds.join(", ")}`);

    try {
      await recordJobEvent({
        runId,
        severity: "warn",
        code: "STALE_RUN_RECONCILED",
        message: `Marked ${staleRuns.length} stale ${input.job} run(s) as failed`,
        payload: { staleAfterMinutes: input.staleAfterMinutes, staleRunIds }
      });
    } catch (error) {
      console.warn(`${scope} failed to record stale run reconciliation`, { error: errorMessage(error) });
    }
  }

  return runId;
}

export async function pulseJobRun(runId: string, job: JobName): Promise<void> {
  try {
    await heartbeatJobRun(runId);
  } catch (error) {
    console.warn(`[job:${job}] heartbeat update failed`, { runId, error: errorMessage(error) });
  }
}
