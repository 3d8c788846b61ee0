import { loadConfig } from "@/lib/config";
import { resolveServerDeps } from "@/lib/server/deps";
import { createListSalesHandler } from "@/lib/server/sales";

export const runtime = "nodejs";

const handle = createListSalesHandler(() => resolveServerDeps(loadConfig()));

export async function GET(request: Request) {
  return handle(request);
}
