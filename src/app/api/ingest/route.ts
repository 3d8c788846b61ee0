import { loadConfig } from "@/lib/config";
import { resolveServerDeps } from "@/lib/server/deps";
import { createIngestHandler } from "@/lib/server/ingest";

export const runtime = "nodejs";

const handle = createIngestHandler(() => resolveServerDeps(loadConfig()));

export async function POST(request: Request) {
  return handle(request);
}
