import { NextResponse } from "next/server";
import { z } from "zod";

import { errorResponse, readJsonBody, requireOwnerId } from "@/lib/http";
import { getServices } from "@/lib/services";

const quickCompareSchema = z.object({
  ownArticle: z.string().trim().min(1),
  competitorArticle: z.string().trim().min(1),
  groupName: z.string().trim().max(200).nullish(),
  groupId: z.string().uuid().nullish()
});

export async function POST(request: Request): Promise<Response> {
  try {
    const ownerId = requireOwnerId(request);
    const body = quickCompareSchema.parse(await readJsonBody(request));
    const result = await getServices().engine.quickCompare(ownerId, {
      ownArticle: body.ownArticle,
      competitorArticle: body.competitorArticle,
      groupName: body.groupName ?? null,
      groupId: body.groupId ?? null
    });

    return NextResponse.json(result);
  } catch (error) {
    return errorResponse(error, "quick compare");
  }
}
