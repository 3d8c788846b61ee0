import { createHash } from "node:crypto";
import type { Grid } from "./contracts";
import { PREVIEW_ROWS } from "./limits";

export function previewOf(grid: Grid, n = PREVIEW_ROWS): Grid {
  return grid.slice(0, n);
}

// Hex SHA-256 of the preview's JSON form. Used as a cache key, nothing more.
export function signatureForPreview(preview: Grid): string {
  return createHash("sha256").update(JSON.stringify(preview)).digest("hex");
}
