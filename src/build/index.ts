import { isAbsolute, join } from "node:path";
import { findBuildFile, formatRegistry, loadTargets } from "../formats/index.js";
import type { FormatName } from "../formats/types.js";
import { createFsProbe } from "../runner/probe.js";
import { createShellRunner } from "../runner/shell.js";
import { finalizeAll } from "../target/finalizer.js";
import { hasName } from "../target/names.js";
import { err, ok, type Result } from "../target/result.js";
import type { FinalizedGraph, RawTarget } from "../target/types.js";
import { update } from "../target/updater.js";
import type {
  BuildInput,
  BuildLog,
  BuildProblem,
  BuildResult,
  TargetOutcome,
} from "../types.js";

/** A build file read and finalized. */
export interface LoadedGraph {
  buildFile: string;
  format: FormatName;
  /** Targets in file order, before finalization. */
  targets: RawTarget[];
  graph: FinalizedGraph;
}

export const consoleLog: BuildLog = {
  info: (message) => console.log(message),
  error: (message) => console.error(message),
};

/** Locate, parse and finalize the build file for a project. */
export async function loadGraph(
  input: Pick<BuildInput, "projectDir" | "file" | "format" | "maxDepth">,
): Promise<Result<LoadedGraph, BuildProblem>> {
  let buildFile: string;
  let formatName = input.format;

  if (input.file) {
    buildFile = isAbsolute(input.file) ? input.file : join(input.projectDir, input.file);
  } else {
    const found = await findBuildFile(input.projectDir);
    if (!found) {
      const candidates = Object.values(formatRegistry).map((f) => f.fileNames.source).join(", ");
      return err({
        stage: "load",
        message: `No build file found in ${input.projectDir} (looked for ${candidates})`,
      });
    }
    buildFile = found.path;
    formatName ??= found.format.name;
  }

  let loaded: Awaited<ReturnType<typeof loadTargets>>;
  try {
    loaded = await loadTargets(buildFile, formatName);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return err({ stage: "load", message });
  }

  const finalized = finalizeAll(loaded.targets, { maxDepth: input.maxDepth });
  if (!finalized.ok) {
    return err({ stage: "finalize", message: finalized.error.message, error: finalized.error });
  }

  return ok({
    buildFile,
    format: loaded.format.name,
    targets: loaded.targets,
    graph: finalized.value,
  });
}

/**
 * Canonical name of the target `requested` refers to. Resolves the way
 * dependencies are resolved during finalization: a primary name first,
 * then the first target in file order that answers to it.
 */
export function canonicalName(targets: readonly RawTarget[], requested: string): string {
  const target =
    targets.find((t) => t.name === requested) ?? targets.find((t) => hasName(t, requested));
  return target?.name ?? requested;
}

/**
 * Build the requested targets in order.
 *
 * With no requested targets the first target of the build file is built.
 * A failed target stops the run unless `keepGoing` is set; the targets not
 * attempted are reported as skipped.
 */
export async function runBuild(input: BuildInput): Promise<BuildResult> {
  const start = Date.now();
  const log = input.log ?? consoleLog;
  const dryRun = input.dryRun ?? false;

  const loaded = await loadGraph(input);
  if (!loaded.ok) {
    log.error(`[mkgraph] ${loaded.error.message}`);
    return {
      passed: false,
      dryRun,
      targets: [],
      problems: [loaded.error],
      duration_ms: Date.now() - start,
    };
  }

  const { graph, buildFile, format } = loaded.value;
  const requested =
    input.targets.length > 0
      ? input.targets
      : loaded.value.targets.slice(0, 1).map((t) => t.name);

  if (requested.length === 0) {
    log.info(`[mkgraph] ${buildFile} defines no targets.`);
  }

  const files = input.files ?? createFsProbe(input.projectDir);
  const runner = input.runner ?? createShellRunner({ cwd: input.projectDir, shell: input.shell });
  const echo = input.echo ?? true;

  const outcomes: TargetOutcome[] = [];
  let stopped = false;

  for (const name of requested) {
    if (stopped) {
      outcomes.push({ target: name, status: "skipped", duration_ms: 0 });
      continue;
    }

    const targetStart = Date.now();
    const result = update(graph, canonicalName(loaded.value.targets, name), {
      files,
      runner,
      dryRun,
      maxDepth: input.maxDepth,
      memo: input.memoize ? new Map<string, boolean>() : undefined,
      onCommand: echo ? (_target, command) => log.info(command) : undefined,
    });
    const duration_ms = Date.now() - targetStart;

    if (!result.ok) {
      log.error(`[mkgraph] ${result.error.message}`);
      outcomes.push({ target: name, status: "failed", error: result.error, duration_ms });
      if (!input.keepGoing) stopped = true;
      continue;
    }

    if (!result.value) {
      log.info(`[mkgraph] "${name}" is up to date.`);
    }
    outcomes.push({
      target: name,
      status: result.value ? "updated" : "up_to_date",
      duration_ms,
    });
  }

  return {
    passed: outcomes.every((o) => o.status !== "failed" && o.status !== "skipped"),
    buildFile,
    format,
    dryRun,
    targets: outcomes,
    problems: [],
    duration_ms: Date.now() - start,
  };
}
