import { readFile, readdir } from "node:fs/promises";
import { basename, join } from "node:path";
import type { RawTarget } from "../target/types.js";
import { makefileFormat } from "./makefile.js";
import type { Format, FormatName } from "./types.js";
import { yamlFormat } from "./yaml.js";

export type { Format, FormatName } from "./types.js";
export { FormatError } from "./types.js";
export { parseYamlTargets, yamlFormat, yamlBuildFileSchema } from "./yaml.js";
export { parseMakefileTargets, makefileFormat } from "./makefile.js";

/** Format registry, in the order build files are searched for. */
export const formatRegistry: Record<FormatName, Format> = {
  yaml: yamlFormat,
  makefile: makefileFormat,
};

/** Format whose file names match the base name of `path`. */
export function formatForFile(path: string): Format | undefined {
  const name = basename(path);
  return Object.values(formatRegistry).find((format) => format.fileNames.test(name));
}

/** Locate a build file in `dir`. Returns null if none is present. */
export async function findBuildFile(
  dir: string,
): Promise<{ path: string; format: Format } | null> {
  let entries: string[];
  try {
    entries = (await readdir(dir)).sort();
  } catch {
    return null;
  }

  for (const format of Object.values(formatRegistry)) {
    const match = entries.find((entry) => format.fileNames.test(entry));
    if (match) return { path: join(dir, match), format };
  }
  return null;
}

/**
 * Read and parse a build file. The format is taken from `formatName` when
 * given, otherwise from the file name.
 */
export async function loadTargets(
  path: string,
  formatName?: FormatName,
): Promise<{ format: Format; targets: RawTarget[] }> {
  const format = formatName ? formatRegistry[formatName] : formatForFile(path);
  if (!format) {
    throw new Error(
      `Cannot tell the format of "${path}" from its name; pass one of: ${Object.keys(formatRegistry).join(", ")}`,
    );
  }

  const source = await readFile(path, "utf-8");
  return { format, targets: format.parse(source, path) };
}
