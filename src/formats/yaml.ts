import { parse as yamlParse, YAMLParseError } from "yaml";
import { z } from "zod";
import type { RawTarget } from "../target/types.js";
import { FormatError, type Format } from "./types.js";

const stringList = z.array(z.string()).optional();

/** Long key and the short key that may stand in for it. */
const KEY_PAIRS = [
  ["commands", "cmds"],
  ["inputs", "ins"],
  ["outputs", "outs"],
  ["dependencies", "deps"],
] as const;

/**
 * One entry of the YAML build file. The short keys (`cmds`, `ins`, `outs`,
 * `deps`) are accepted in place of the long ones, never beside them. A key
 * with no value (`clean:`) is an empty definition.
 */
export const yamlTargetSchema = z.preprocess(
  (value) => value ?? {},
  z
    .object({
      commands: stringList,
      cmds: stringList,
      inputs: stringList,
      ins: stringList,
      outputs: stringList,
      outs: stringList,
      deps: stringList,
      dependencies: stringList,
      aliases: stringList,
    })
    .strict()
    .superRefine((entry, ctx) => {
      for (const [long, short] of KEY_PAIRS) {
        if (entry[long] !== undefined && entry[short] !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `"${long}" and "${short}" are the same key; use one`,
          });
        }
      }
    })
    .transform((entry) => ({
      commands: entry.commands ?? entry.cmds ?? [],
      inputs: entry.inputs ?? entry.ins ?? [],
      outputs: entry.outputs ?? entry.outs ?? [],
      dependencies: entry.dependencies ?? entry.deps ?? [],
      aliases: entry.aliases ?? [],
    })),
);

export const yamlBuildFileSchema = z.record(z.string(), yamlTargetSchema);

function parseDocument(source: string, origin: string): unknown {
  try {
    return yamlParse(source);
  } catch (error: unknown) {
    if (error instanceof YAMLParseError) {
      throw new FormatError("yaml", origin, error.message, error.linePos?.[0].line);
    }
    throw error;
  }
}

/** Parse a YAML build file: a mapping of target name to its definition. */
export function parseYamlTargets(source: string, origin: string): RawTarget[] {
  const document = parseDocument(source, origin) ?? {};
  const parsed = yamlBuildFileSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new FormatError("yaml", origin, `${where}${issue.message}`);
  }

  return Object.entries(parsed.data).map(([name, entry]): RawTarget => ({
    name,
    outputs: entry.outputs,
    dependencies: {
      kind: "split",
      inputs: entry.inputs,
      dependencies: entry.dependencies,
    },
    commands: entry.commands,
    extra: { format: "yaml", aliases: entry.aliases },
  }));
}

export const yamlFormat: Format = {
  name: "yaml",
  fileNames: /^(Buildfile|mkgraph)\.ya?ml$/,
  parse: parseYamlTargets,
};
