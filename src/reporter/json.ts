import type { BuildResult } from "../types.js";

export function formatJsonReport(result: BuildResult): string {
  return JSON.stringify(result, null, 2);
}
