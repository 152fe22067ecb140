import { sql } from "@/lib/db/client";
import { toIso } from "@/lib/db/products";
import { toWindowAggregate, windowStart } from "@/lib/pricing/aggregate";
import type { FetchErrorKind, PriceSnapshot, PriceSnapshotInput, SnapshotSource, WindowAggregate } from "@/lib/types";

interface PriceSnapshotRow {
  id: string;
  article: string;
  capturedAt: Date;
  price: number | null;
  normalPrice: number | null;
  cardPrice: number | null;
  oldPrice: number | null;
  available: boolean | null;
  rating: number | null;
  reviewCount: number | null;
  success: boolean;
  errorKind: FetchErrorKind | null;
  errorMessage: string | null;
  durationMs: number;
  source: SnapshotSource | null;
}

function mapSnapshotRow(row: PriceSnapshotRow): PriceSnapshot {
  return {
    ...row,
    capturedAt: toIso(row.capturedAt) ?? new Date(0).toISOString()
  };
}

export async function appendPriceSnapshot(input: PriceSnapshotInput): Promise<string> {
  const rows = await sql<{ id: string }[]>`
    insert into price_snapshots (
      article,
      captured_at,
      price,
      normal_price,
      card_price,
      old_price,
      available,
      rating,
      review_count,
      success,
      error_kind,
      error_message,
      duration_ms,
      source
    )
    values (
      ${input.article},
      ${input.capturedAt},
      ${input.price},
      ${input.normalPrice},
      ${input.cardPrice},
      ${input.oldPrice},
      ${input.available},
      ${input.rating},
      ${input.reviewCount},
      ${input.success},
      ${input.errorKind},
      ${input.errorMessage},
      ${Math.round(input.durationMs)},
      ${input.source}
    )
    returning id
  `;

  return rows[0].id;
}

export async function queryPriceWindow(input: {
  article: string;
  days: number;
  asOf?: Date;
}): Promise<WindowAggregate> {
  const asOf = input.asOf ?? new Date();
  const from = windowStart(asOf, input.days);

  const rows = await sql<
    {
      avg: number | null;
      min: number | null;
      max: number | null;
      sampleCount: number;
      firstDate: Date | null;
      lastDate: Date | null;
    }[]
  >`
    select
      avg(price)::float8 as avg,
      min(price)::float8 as min,
      max(price)::float8 as max,
      count(*)::int as sample_count,
      min(captured_at) as first_date,
      max(captured_at) as last_date
    from price_snapshots
    where
      article = ${input.article}
      and success = true
      and price is not null
      and captured_at > ${from.toISOString()}
      and captured_at <= ${asOf.toISOString()}
  `;

  const row = rows[0];
  return toWindowAggregate({
    article: input.article,
    days: input.days,
    row: row
      ? {
          avg: row.avg,
          min: row.min,
          max: row.max,
          sampleCount: row.sampleCount,
          firstDate: toIso(row.firstDate),
          lastDate: toIso(row.lastDate)
        }
      : null
  });
}

export async function queryRecentPriceSnapshots(input: {
  article: string;
  days: number;
  limit: number;
  includeFailed: boolean;
}): Promise<PriceSnapshot[]> {
  const from = windowStart(new Date(), input.days);

  const rows = await sql<PriceSnapshotRow[]>`
    select
      id,
      article,
      captured_at,
      price::float8 as price,
      normal_price::float8 as normal_price,
      card_price::float8 as card_price,
      old_price::float8 as old_price,
      available,
      rating::float8 as rating,
      review_count,
      success,
      error_kind,
      error_message,
      duration_ms,
      source
    from price_snapshots
    where
      article = ${input.article}
      and captured_at > ${from.toISOString()}
      and (${input.includeFailed} or success = true)
    order by captured_at desc, id desc
    limit ${input.limit}
  `;

  return rows.map(mapSnapshotRow);
}

export async function prunePriceHistory(olderThanDays: number): Promise<number> {
  const cutoff = windowStart(new Date(), olderThanDays);

  const rows = await sql`
    delete from price_snapshots
    where captured_at < ${cutoff.toISOString()}
    returning id
  `;

  return rows.length;
}
