import { env } from "@/lib/env";

export function isAuthorizedInternalRequest(request: Request): boolean {
  const authorization = request.headers.get("authorization");
  if (!authorization) {
    return false;
  }

  const token = authorization.replace(/^Bearer\s+/i, "").trim();
  return token === env.CRON_SECRET;
}
