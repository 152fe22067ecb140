import postgres from "postgres";

import { sql } from "@/lib/db/client";
import { mapProductRow, toIso } from "@/lib/db/products";
import { DuplicateMemberError } from "@/lib/errors";
import type { ComparisonGroup, GroupMember, GroupMembership, GroupType, MemberRole, ProductStatus } from "@/lib/types";

const UNIQUE_VIOLATION = "23505";

interface GroupRow {
  id: string;
  ownerId: string;
  name: string | null;
  groupType: GroupType;
  createdAt: Date;
  updatedAt: Date;
}

interface MembershipRow {
  id: string;
  groupId: string;
  productId: string;
  role: MemberRole;
  position: number;
  addedAt: Date;
}

interface MemberProductRow extends MembershipRow {
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
  productCreatedAt: Date;
}

function mapGroupRow(row: GroupRow): ComparisonGroup {
  return {
    ...row,
    createdAt: toIso(row.createdAt) ?? new Date(0).toISOString(),
    updatedAt: toIso(row.updatedAt) ?? new Date(0).toISOString()
  };
}

function mapMembershipRow(row: MembershipRow): GroupMembership {
  return {
    id: row.id,
    groupId: row.groupId,
    productId: row.productId,
    role: row.role,
    position: row.position,
    addedAt: toIso(row.addedAt) ?? new Date(0).toISOString()
  };
}

export async function insertGroup(input: {
  ownerId: string;
  name: string | null;
  groupType: GroupType;
}): Promise<ComparisonGroup> {
  const rows = await sql<GroupRow[]>`
    insert into comparison_groups (owner_id, name, group_type)
    values (${input.ownerId}, ${input.name}, ${input.groupType})
    returning id, owner_id, name, group_type, created_at, updated_at
  `;

  return mapGroupRow(rows[0]);
}

export async function getGroupForOwner(ownerId: string, groupId: string): Promise<ComparisonGroup | null> {
  const rows = await sql<GroupRow[]>`
    select id, owner_id, name, group_type, created_at, updated_at
    from comparison_groups
    where id = ${groupId} and owner_id = ${ownerId}
    limit 1
  `;

  return rows[0] ? mapGroupRow(rows[0]) : null;
}

export async function listGroupsForOwner(ownerId: string): Promise<Array<ComparisonGroup & { memberCount: number }>> {
  const rows = await sql<Array<GroupRow & { memberCount: number }>>`
    select
      g.id,
      g.owner_id,
      g.name,
      g.group_type,
      g.created_at,
      g.updated_at,
      count(m.id)::int as member_count
    from comparison_groups g
    left join group_members m on m.group_id = g.id
    where g.owner_id = ${ownerId}
    group by g.id
    order by g.created_at desc
  `;

  return rows.map((row) => ({ ...mapGroupRow(row), memberCount: row.memberCount }));
}

export async function listComparisonGroups(): Promise<ComparisonGroup[]> {
  const rows = await sql<GroupRow[]>`
    select id, owner_id, name, group_type, created_at, updated_at
    from comparison_groups
    where group_type = 'comparison'
    order by created_at asc
  `;

  return rows.map(mapGroupRow);
}

export async function deleteGroup(ownerId: string, groupId: string): Promise<boolean> {
  const rows = await sql`
    delete from comparison_groups
    where id = ${groupId} and owner_id = ${ownerId}
    returning id
  `;

  return rows.length > 0;
}

export async function listGroupMembers(groupId: string): Promise<GroupMember[]> {
  const rows = await sql<MemberProductRow[]>`
    select
      m.id,
      m.group_id,
      m.product_id,
      m.role,
      m.position,
      m.added_at,
      p.owner_id,
      p.article,
      p.status,
      p.is_problematic,
      p.name,
      p.price::float8 as price,
      p.normal_price::float8 as normal_price,
      p.card_price::float8 as card_price,
      p.old_price::float8 as old_price,
      p.rating::float8 as rating,
      p.review_count,
      p.available,
      p.image_url,
      p.product_url,
      p.last_checked_at,
      p.rolling_avg_price::float8 as rolling_avg_price,
      p.rolling_avg_computed_at,
      p.created_at as product_created_at
    from group_members m
    inner join tracked_products p on p.id = m.product_id
    where m.group_id = ${groupId}
    order by m.position asc, m.added_at asc
  `;

  return rows.map((row) => ({
    membership: mapMembershipRow(row),
    product: mapProductRow({
      id: row.productId,
      ownerId: row.ownerId,
      article: row.article,
      status: row.status,
      isProblematic: row.isProblematic,
      name: row.name,
      price: row.price,
      normalPrice: row.normalPrice,
      cardPrice: row.cardPrice,
      oldPrice: row.oldPrice,
      rating: row.rating,
      reviewCount: row.reviewCount,
      available: row.available,
      imageUrl: row.imageUrl,
      productUrl: row.productUrl,
      lastCheckedAt: row.lastCheckedAt,
      rollingAvgPrice: row.rollingAvgPrice,
      rollingAvgComputedAt: row.rollingAvgComputedAt,
      createdAt: row.productCreatedAt
    })
  }));
}

/**
 * Inserts a membership; a second insert of the same product into the same group
 * surfaces as DuplicateMemberError. Without an explicit position the member is
 * appended after the current last one.
 */
export async function insertMembership(input: {
  groupId: string;
  productId: string;
  article: string;
  role: MemberRole;
  position: number | null;
}): Promise<GroupMembership> {
  try {
    const rows = await sql<MembershipRow[]>`
      insert into group_members (group_id, product_id, role, position)
      values (
        ${input.groupId},
        ${input.productId},
        ${input.role},
        coalesce(
          ${input.position}::int,
          (select coalesce(max(position) + 1, 0) from group_members where group_id = ${input.groupId})
        )
      )
      returning id, group_id, product_id, role, position, added_at
    `;

    return mapMembershipRow(rows[0]);
  } catch (error) {
    if (error instanceof postgres.PostgresError && error.code === UNIQUE_VIOLATION) {
      throw new DuplicateMemberError({ groupId: input.groupId, article: input.article });
    }

    throw error;
  }
}

export async function deleteMembership(groupId: string, productId: string): Promise<boolean> {
  const rows = await sql`
    delete from group_members
    where group_id = ${groupId} and product_id = ${productId}
    returning id
  `;

  return rows.length > 0;
}

export async function countGroupsForOwner(ownerId: string): Promise<{ total: number; comparison: number }> {
  const rows = await sql<{ total: number; comparison: number }[]>`
    select
      count(*)::int as total,
      count(*) filter (where group_type = 'comparison')::int as comparison
    from comparison_groups
    where owner_id = ${ownerId}
  `;

  return rows[0] ?? { total: 0, comparison: 0 };
}
