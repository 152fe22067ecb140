import { NextResponse } from "next/server";
import { ZodError, z } from "zod";

import { AppError, GroupNotFoundError, errorMessage } from "@/lib/errors";

export class MissingOwnerError extends AppError {
  constructor() {
    super("OWNER_REQUIRED", "Missing x-owner-id header", 401);
    this.name = "MissingOwnerError";
  }
}

/** Owner identity is set by the upstream auth layer. */
export function requireOwnerId(request: Request): string {
  const ownerId = request.headers.get("x-owner-id")?.trim();
  if (!ownerId) {
    throw new MissingOwnerError();
  }

  return ownerId;
}

const groupIdSchema = z.string().uuid();

/** Group ids are uuids; anything else cannot name a group. */
export async function requireGroupId(params: Promise<{ id: string }>): Promise<string> {
  const { id } = await params;
  const parsed = groupIdSchema.safeParse(id);
  if (!parsed.success) {
    throw new GroupNotFoundError(id);
  }

  return parsed.data;
}

export async function readJsonBody(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    throw new AppError("INVALID_JSON", "Request body must be valid JSON", 400);
  }
}

export function errorResponse(error: unknown, scope: string): Response {
  if (error instanceof AppError) {
    return NextResponse.json({ error: error.message, code: error.code }, { status: error.status });
  }

  if (error instanceof ZodError) {
    return NextResponse.json(
      {
        error: "Invalid request",
        code: "INVALID_REQUEST",
        issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
      },
      { status: 400 }
    );
  }

  console.error(`[api] ${scope} failed`, { error: errorMessage(error) });
  return NextResponse.json({ error: "Internal server error", code: "INTERNAL_ERROR" }, { status: 500 });
}
