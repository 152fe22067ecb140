import { NextResponse } from "next/server";

import { errorResponse, requireOwnerId } from "@/lib/http";
import { getServices } from "@/lib/services";

export async function GET(request: Request): Promise<Response> {
  try {
    const ownerId = requireOwnerId(request);
    const stats = await getServices().engine.getUserStats(ownerId);
    return NextResponse.json(stats);
  } catch (error) {
    return errorResponse(error, "user stats");
  }
}
