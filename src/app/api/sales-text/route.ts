import { loadConfig } from "@/lib/config";
import { resolveServerDeps } from "@/lib/server/deps";
import { createSalesTextHandler } from "@/lib/server/sales";

export const runtime = "nodejs";

const handle = createSalesTextHandler(() => resolveServerDeps(loadConfig()));

export async function POST(request: Request) {
  return handle(request);
}
