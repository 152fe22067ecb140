import { NextResponse } from "next/server";

import { errorResponse } from "@/lib/http";
import { isAuthorizedInternalRequest } from "@/lib/internal-auth";
import { getServices } from "@/lib/services";

async function handle(request: Request): Promise<Response> {
  if (!isAuthorizedInternalRequest(request)) {
    return NextResponse.json({ error: "Unauthorized" }, { status: 401 });
  }

  try {
    const summary = await getServices().runComparisonRefresh("api");
    return NextResponse.json({ ok: true, ...summary });
  } catch (error) {
    return errorResponse(error, "comparison refresh job");
  }
}

export async function GET(request: Request): Promise<Response> {
  return handle(request);
}

export async function POST(request: Request): Promise<Response> {
  return handle(request);
}
