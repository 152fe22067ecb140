import { listComparisonGroups, listGroupMembers } from "@/lib/db/groups";
import { finishJobRun, recordJobEvent, type JobEventSeverity } from "@/lib/db/job-runs";
import type { ComparisonEngine } from "@/lib/comparison/engine";
import { JobAlreadyRunningError, errorMessage } from "@/lib/errors";
import { DEFAULT_STALE_RUN_MINUTES, claimJobRun, pulseJobRun } from "@/lib/jobs/run-lock";
import type { JobStatus } from "@/lib/types";

export interface ComparisonRefreshSummary {
  runId: string;
  status: JobStatus;
  groupsTotal: number;
  computed: number;
  skipped: number;
  errors: number;
  staleResults: number;
  durationMs: number;
}

/**
 * Recomputes every comparison group with a live refetch so the snapshot
 * history gains one point per group per day. A failing group is recorded and
 * the run moves on.
 */
async function recordEventSafely(input: {
  runId: string;
  severity: JobEventSeverity;
  code: string;
  message: string;
  payload?: Record<string, unknown>;
}): Promise<void> {
  try {
    await recordJobEvent(input);
  } catch (error) {
    console.warn("[job:comparisons] failed to record job event", { code: input.code, error: errorMessage(error) });
  }
}

export async function runComparisonRefreshJob(input: {
  engine: Pick<ComparisonEngine, "computeComparison">;
  triggeredBy: string;
  staleRunMinutes?: number;
  now?: () => number;
}): Promise<ComparisonRefreshSummary> {
  const now = input.now ?? Date.now;
  const startedAt = now();
  const runId = await claimJobRun({
    job: "comparisons",
    triggeredBy: input.triggeredBy,
    staleAfterMinutes: input.staleRunMinutes ?? DEFAULT_STALE_RUN_MINUTES
  });
  if (!runId) {
    throw new JobAlreadyRunningError("comparisons");
  }

  const counters = {
    groupsTotal: 0,
    computed: 0,
    skipped: 0,
    errors: 0,
    staleResults: 0
  };

  try {
    const groups = await listComparisonGroups();
    counters.groupsTotal = groups.length;

    for (const group of groups) {
      try {
        const members = await listGroupMembers(group.id);
        if (members.length < 2) {
          counters.skipped += 1;
          continue;
        }

        const result = await input.engine.computeComparison(group.ownerId, group.id, { refresh: true });
        counters.computed += 1;
        if (!result.isFresh) {
          counters.staleResults += 1;
        }

        for (const historyError of result.historyErrors) {
          await recordEventSafely({
            runId,
            severity: "warn",
            code: historyError.code,
            message: `Price snapshot not stored for ${historyError.article}`,
            payload: { groupId: group.id, article: historyError.article, error: historyError.message }
          });
        }

        if (result.snapshotError) {
          counters.errors += 1;
          await recordEventSafely({
            runId,
            severity: "error",
            code: result.snapshotError.code,
            message: `Snapshot not stored for group ${group.id}`,
            payload: { groupId: group.id, error: result.snapshotError.message }
          });
        }
      } catch (error) {
        counters.errors += 1;
        console.warn(`[job:comparisons] group ${group.id} failed`, { error: errorMessage(error) });
        await recordEventSafely({
          runId,
          severity: "warn",
          code: "GROUP_COMPUTE_FAILED",
          message: `Comparison failed for group ${group.id}`,
          payload: { groupId: group.id, error: errorMessage(error) }
        });
      }

      await pulseJobRun(runId, "comparisons");
    }

    const status: JobStatus = counters.errors > 0 ? "partial" : "success";
    const summary: ComparisonRefreshSummary = { runId, status, ...counters, durationMs: now() - startedAt };
    await finishJobRun({ runId, status, summary: { ...summary } });

    console.log(`[job:comparisons] run ${runId} finished`, {
      computed: summary.computed,
      skipped: summary.skipped,
      errors: summary.errors
    });

    return summary;
  } catch (error) {
    const message = errorMessage(error);
    await finishJobRun({ runId, status: "failed", summary: { ...counters, error: message } });
    console.error(`[job:comparisons] run ${runId} failed`, { error: message });
    throw error;
  }
}
