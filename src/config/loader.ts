import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { mkgraphConfigSchema } from "./schema.js";
import type { MkgraphConfig } from "../types.js";

export const CONFIG_FILE = ".mkgraph.json";

export async function loadConfig(
  projectDir: string = process.cwd(),
): Promise<MkgraphConfig> {
  let raw: unknown;

  try {
    const content = await readFile(join(projectDir, CONFIG_FILE), "utf-8");
    raw = JSON.parse(content);
  } catch (err: unknown) {
    // A missing config file means defaults
    const missing =
      typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
    if (!missing) throw err;
  }

  return mkgraphConfigSchema.parse(raw ?? {});
}
