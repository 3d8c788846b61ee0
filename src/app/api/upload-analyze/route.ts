import { loadConfig } from "@/lib/config";
import { resolveServerDeps } from "@/lib/server/deps";
import { createUploadAnalyzeHandler } from "@/lib/server/uploadAnalyze";

export const runtime = "nodejs";

const handle = createUploadAnalyzeHandler(() => resolveServerDeps(loadConfig()));

export async function POST(request: Request) {
  return handle(request);
}
