import type { FetchErrorKind } from "@/lib/types";

export class AppError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(code: string, message: string, status: number) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.status = status;
  }
}

const RETRYABLE_KINDS: ReadonlySet<FetchErrorKind> = new Set(["timeout", "rate_limited_by_remote", "transport"]);

export class FetchError extends AppError {
  readonly kind: FetchErrorKind;
  readonly article: string;
  readonly retryAfterMs: number | null;

  constructor(input: { kind: FetchErrorKind; article: string; message: string; retryAfterMs?: number | null }) {
    super(`FETCH_${input.kind.toUpperCase()}`, input.message, input.kind === "not_found" ? 404 : 502);
    this.name = "FetchError";
    this.kind = input.kind;
    this.article = input.article;
    this.retryAfterMs = input.retryAfterMs ?? null;
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError;
}

export class ProductNotFoundError extends AppError {
  readonly article: string;

  constructor(article: string, cause?: FetchError) {
    super("PRODUCT_NOT_FOUND", `Product ${article} could not be fetched${cause ? ` (${cause.kind})` : ""}`, 404);
    this.name = "ProductNotFoundError";
    this.article = article;
  }
}

export class GroupNotFoundError extends AppError {
  constructor(groupId: string) {
    super("GROUP_NOT_FOUND", `Comparison group ${groupId} not found`, 404);
    this.name = "GroupNotFoundError";
  }
}

export class DuplicateMemberError extends AppError {
  constructor(input: { groupId: string; article: string }) {
    super("DUPLICATE_MEMBER", `Product ${input.article} is already a member of group ${input.groupId}`, 409);
    this.name = "DuplicateMemberError";
  }
}

export class InsufficientMembersError extends AppError {
  readonly memberCount: number;

  constructor(input: { groupId: string; memberCount: number }) {
    super(
      "INSUFFICIENT_MEMBERS",
      `Group ${input.groupId} has ${input.memberCount} member(s); at least 2 are required to compare`,
      422
    );
    this.name = "InsufficientMembersError";
    this.memberCount = input.memberCount;
  }
}

export class PersistenceError extends AppError {
  constructor(message: string) {
    super("PERSISTENCE_ERROR", message, 503);
    this.name = "PersistenceError";
  }
}

export class JobAlreadyRunningError extends AppError {
  constructor(job: string) {
    super("JOB_ALREADY_RUNNING", `Job ${job} is already running`, 409);
    this.name = "JobAlreadyRunningError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "unknown";
}
