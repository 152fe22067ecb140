import { sql } from "@/lib/db/client";
import type { ProductSnapshot, ProductStatus, TrackedProduct } from "@/lib/types";

interface ProductRow {
  id: string;
  ownerId: string;
  article: string;
  status: ProductStatus;
  isProblematic: boolean;
  name: string | null;
  price: number | null;
  normalPrice: number | null;
  cardPrice: number | null;
  oldPrice: number | null;
  rating: number | null;
  reviewCount: number | null;
  available: boolean;
  imageUrl: string | null;
  productUrl: string | null;
  lastCheckedAt: Date | null;
  rollingAvgPrice: number | null;
  rollingAvgComputedAt: Date | null;
  createdAt: Date;
}

export function toIso(value: Date | string | null): string | null {
  if (value === null) {
    return null;
  }

  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

function productColumns() {
  return sql`
    id,
    owner_id,
    article,
    status,
    is_problematic,
    name,
    price::float8 as price,
    normal_price::float8 as normal_price,
    card_price::float8 as card_price,
    old_price::float8 as old_price,
    rating::float8 as rating,
    review_count,
    available,
    image_url,
    product_url,
    last_checked_at,
    rolling_avg_price::float8 as rolling_avg_price,
    rolling_avg_computed_at,
    created_at
  `;
}

export function mapProductRow(row: ProductRow): TrackedProduct {
  return {
    ...row,
    lastCheckedAt: toIso(row.lastCheckedAt),
    rollingAvgComputedAt: toIso(row.rollingAvgComputedAt),
    createdAt: toIso(row.createdAt) ?? new Date(0).toISOString()
  };
}

export async function getProductById(productId: string): Promise<TrackedProduct | null> {
  const rows = await sql<ProductRow[]>`
    select ${productColumns()}
    from tracked_products
    where id = ${productId}
    limit 1
  `;

  return rows[0] ? mapProductRow(rows[0]) : null;
}

export async function getProductByOwnerArticle(ownerId: string, article: string): Promise<TrackedProduct | null> {
  const rows = await sql<ProductRow[]>`
    select ${productColumns()}
    from tracked_products
    where owner_id = ${ownerId} and article = ${article}
    limit 1
  `;

  return rows[0] ? mapProductRow(rows[0]) : null;
}

export async function insertTrackedProduct(input: {
  ownerId: string;
  article: string;
  snapshot: ProductSnapshot | null;
}): Promise<TrackedProduct> {
  const snapshot = input.snapshot;
  const rows = await sql<ProductRow[]>`
    insert into tracked_products (
      owner_id,
      article,
      name,
      price,
      normal_price,
      card_price,
      old_price,
      rating,
      review_count,
      available,
      image_url,
      product_url,
      last_checked_at
    )
    values (
      ${input.ownerId},
      ${input.article},
      ${snapshot?.name ?? null},
      ${snapshot?.price ?? null},
      ${snapshot?.normalPrice ?? null},
      ${snapshot?.cardPrice ?? null},
      ${snapshot?.oldPrice ?? null},
      ${snapshot?.rating ?? null},
      ${snapshot?.reviewCount ?? null},
      ${snapshot?.available ?? false},
      ${snapshot?.imageUrl ?? null},
      ${snapshot?.productUrl ?? null},
      ${snapshot ? snapshot.fetchedAt : null}
    )
    on conflict (owner_id, article) do update
    set status = 'active',
        updated_at = now()
    returning ${productColumns()}
  `;

  return mapProductRow(rows[0]);
}

/**
 * Writes the latest fetched attributes onto every tracked row for the article.
 * The rolling average columns are left alone; only the aggregator writes them.
 */
export async function applyFetchedAttributes(snapshot: ProductSnapshot): Promise<number> {
  const rows = await sql`
    update tracked_products
    set
      name = coalesce(${snapshot.name}, name),
      price = ${snapshot.price},
      normal_price = ${snapshot.normalPrice},
      card_price = ${snapshot.cardPrice},
      old_price = ${snapshot.oldPrice},
      rating = ${snapshot.rating},
      review_count = ${snapshot.reviewCount},
      available = ${snapshot.available},
      image_url = coalesce(${snapshot.imageUrl}, image_url),
      product_url = coalesce(${snapshot.productUrl}, product_url),
      last_checked_at = ${snapshot.fetchedAt},
      is_problematic = false,
      updated_at = now()
    where article = ${snapshot.article}
    returning id
  `;

  return rows.length;
}

export async function markArticleProblematic(article: string): Promise<void> {
  await sql`
    update tracked_products
    set is_problematic = true,
        updated_at = now()
    where article = ${article}
  `;
}

/** Products no group of the owner references any more drop out of collection. */
export async function deactivateUngroupedProducts(ownerId: string): Promise<number> {
  const rows = await sql`
    update tracked_products p
    set status = 'inactive',
        updated_at = now()
    where p.owner_id = ${ownerId}
      and p.status = 'active'
      and not exists (select 1 from group_members m where m.product_id = p.id)
    returning p.id
  `;

  return rows.length;
}

export async function listActiveArticles(): Promise<string[]> {
  const rows = await sql<{ article: string }[]>`
    select distinct article
    from tracked_products
    where status = 'active'
    order by article asc
  `;

  return rows.map((row) => row.article);
}

export async function writeRollingAverage(input: {
  article: string;
  avgPrice: number | null;
  computedAt: string;
}): Promise<void> {
  await sql`
    update tracked_products
    set rolling_avg_price = ${input.avgPrice},
        rolling_avg_computed_at = ${input.computedAt}
    where article = ${input.article}
  `;
}

export async function countProductsForOwner(ownerId: string): Promise<number> {
  const rows = await sql<{ count: number }[]>`
    select count(*)::int as count
    from tracked_products
    where owner_id = ${ownerId} and status <> 'inactive'
  `;

  return rows[0]?.count ?? 0;
}
