import { pruneComparisonSnapshots } from "@/lib/db/comparison-snapshots";
import { finishJobRun, pruneJobEvents } from "@/lib/db/job-runs";
import { prunePriceHistory } from "@/lib/db/price-history";
import { JobAlreadyRunningError, errorMessage } from "@/lib/errors";
import { DEFAULT_STALE_RUN_MINUTES, claimJobRun } from "@/lib/jobs/run-lock";
import type { JobStatus } from "@/lib/types";

export interface RetentionPolicy {
  priceHistoryDays: number;
  comparisonSnapshotDays: number;
  jobEventDays: number;
}

export interface RetentionSummary {
  runId: string;
  status: JobStatus;
  priceSnapshotsDeleted: number;
  comparisonSnapshotsDeleted: number;
  jobEventsDeleted: number;
  durationMs: number;
}

export async function runRetentionJob(input: {
  policy: RetentionPolicy;
  triggeredBy: string;
  staleRunMinutes?: number;
  now?: () => number;
}): Promise<RetentionSummary> {
  const now = input.now ?? Date.now;
  const startedAt = now();
  const runId = await claimJobRun({
    job: "retention",
    triggeredBy: input.triggeredBy,
    staleAfterMinutes: input.staleRunMinutes ?? DEFAULT_STALE_RUN_MINUTES
  });
  if (!runId) {
    throw new JobAlreadyRunningError("retention");
  }

  try {
    const priceSnapshotsDeleted = await prunePriceHistory(input.policy.priceHistoryDays);
    const comparisonSnapshotsDeleted = await pruneComparisonSnapshots(input.policy.comparisonSnapshotDays);
    const jobEventsDeleted = await pruneJobEvents(input.policy.jobEventDays);

    const summary: RetentionSummary = {
      runId,
      status: "success",
      priceSnapshotsDeleted,
      comparisonSnapshotsDeleted,
      jobEventsDeleted,
      durationMs: now() - startedAt
    };

    await finishJobRun({ runId, status: "success", summary: { ...summary, policy: input.policy } });
    console.log(`[job:retention] run ${runId} pruned old rows`, {
      priceSnapshotsDeleted,
      comparisonSnapshotsDeleted,
      jobEventsDeleted
    });

    return summary;
  } catch (error) {
    const message = errorMessage(error);
    await finishJobRun({ runId, status: "failed", summary: { error: message } });
    console.error(`[job:retention] run ${runId} failed`, { error: message });
    throw error;
  }
}
