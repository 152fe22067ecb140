import type { JSONValue } from "postgres";

import { sql } from "@/lib/db/client";
import { toIso } from "@/lib/db/products";
import { windowStart } from "@/lib/pricing/aggregate";
import type { ComparisonMetrics, ComparisonPayload, ComparisonSnapshot, Grade } from "@/lib/types";

const toJson = (value: unknown) => sql.json(value as JSONValue);

interface SnapshotRow {
  id: string;
  groupId: string;
  createdAt: Date;
  payload: ComparisonPayload;
  metrics: ComparisonMetrics;
  competitivenessIndex: number;
  grade: Grade;
}

function mapSnapshotRow(row: SnapshotRow): ComparisonSnapshot {
  return {
    ...row,
    createdAt: toIso(row.createdAt) ?? new Date(0).toISOString()
  };
}

export async function insertComparisonSnapshot(input: {
  groupId: string;
  createdAt: string;
  payload: ComparisonPayload;
  metrics: ComparisonMetrics;
}): Promise<string> {
  const rows = await sql<{ id: string }[]>`
    insert into comparison_snapshots (group_id, created_at, payload, metrics, competitiveness_index, grade)
    values (
      ${input.groupId},
      ${input.createdAt},
      ${toJson(input.payload)},
      ${toJson(input.metrics)},
      ${input.metrics.competitivenessIndex},
      ${input.metrics.grade}
    )
    returning id
  `;

  return rows[0].id;
}

export async function listComparisonSnapshots(input: { groupId: string; days: number }): Promise<ComparisonSnapshot[]> {
  const from = windowStart(new Date(), input.days);

  const rows = await sql<SnapshotRow[]>`
    select
      id,
      group_id,
      created_at,
      payload,
      metrics,
      competitiveness_index::float8 as competitiveness_index,
      grade
    from comparison_snapshots
    where group_id = ${input.groupId} and created_at > ${from.toISOString()}
    order by created_at asc, id asc
  `;

  return rows.map(mapSnapshotRow);
}

export async function pruneComparisonSnapshots(olderThanDays: number): Promise<number> {
  const cutoff = windowStart(new Date(), olderThanDays);

  const rows = await sql`
    delete from comparison_snapshots
    where created_at < ${cutoff.toISOString()}
    returning id
  `;

  return rows.length;
}

/**
 * Average index over the newest snapshot of each of the owner's groups.
 */
export async function summarizeLatestSnapshots(ownerId: string): Promise<{
  avgCompetitivenessIndex: number | null;
  lastComparisonAt: string | null;
}> {
  const rows = await sql<{ avgIndex: number | null; lastAt: Date | null }[]>`
    with latest as (
      select distinct on (s.group_id)
        s.group_id,
        s.competitiveness_index,
        s.created_at
      from comparison_snapshots s
      inner join comparison_groups g on g.id = s.group_id
      where g.owner_id = ${ownerId}
      order by s.group_id, s.created_at desc
    )
    select
      avg(competitiveness_index)::float8 as avg_index,
      max(created_at) as last_at
    from latest
  `;

  const row = rows[0];
  return {
    avgCompetitivenessIndex: row?.avgIndex ?? null,
    lastComparisonAt: toIso(row?.lastAt ?? null)
  };
}
