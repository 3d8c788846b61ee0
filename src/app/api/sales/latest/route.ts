import { loadConfig } from "@/lib/config";
import { resolveServerDeps } from "@/lib/server/deps";
import { createLatestSalesHandler } from "@/lib/server/sales";

export const runtime = "nodejs";

const handle = createLatestSalesHandler(() => resolveServerDeps(loadConfig()));

export async function GET(request: Request) {
  return handle(request);
}
