import { NextResponse } from "next/server";
import { z } from "zod";

import { errorResponse, readJsonBody, requireOwnerId } from "@/lib/http";
import { getServices } from "@/lib/services";

const createGroupSchema = z.object({
  name: z.string().trim().max(200).nullish(),
  type: z.enum(["comparison", "variants", "similar"]).default("comparison")
});

export async function GET(request: Request): Promise<Response> {
  try {
    const ownerId = requireOwnerId(request);
    const groups = await getServices().engine.listGroups(ownerId);
    return NextResponse.json({ groups });
  } catch (error) {
    return errorResponse(error, "list groups");
  }
}

export async function POST(request: Request): Promise<Response> {
  try {
    const ownerId = requireOwnerId(request);
    const body = createGroupSchema.parse(await readJsonBody(request));
    const group = await getServices().engine.createGroup(ownerId, { name: body.name ?? null, type: body.type });
    return NextResponse.json({ group }, { status: 201 });
  } catch (error) {
    return errorResponse(error, "create group");
  }
}
