import type { FileProbe } from "../runner/probe.js";
import {
  describeError,
  errnoCode,
  missingTargetError,
  type UpdateError,
} from "./errors.js";
import { err, ok, type Result } from "./result.js";
import type { FinalizedGraph, FinalizedTarget, Timestamp } from "./types.js";

/** Where one output stands relative to the target's inputs. */
export type OutputState =
  | { path: string; status: "missing" }
  | {
      path: string;
      status: "outdated";
      modified: Timestamp;
      /** Inputs modified after this output, in declaration order. */
      newerInputs: string[];
    }
  | { path: string; status: "fresh"; modified: Timestamp };

export interface Staleness {
  stale: boolean;
  /**
   * `no_inputs`: nothing can prove the outputs fresh.
   * `outputs`: at least one output is missing or outdated.
   * `fresh`: every output is at least as new as every input.
   */
  reason: "no_inputs" | "outputs" | "fresh";
  latestInput?: Timestamp;
  outputs: OutputState[];
}

function probeError(target: string, path: string, error: unknown): UpdateError {
  return {
    type: "io",
    message: `Cannot read modification time of "${path}" for "${target}": ${describeError(error)}`,
    target,
    path,
    code: errnoCode(error),
  };
}

function probe(
  files: FileProbe,
  target: string,
  path: string,
): Result<Timestamp | undefined, UpdateError> {
  try {
    return ok(files.modifiedTime(path));
  } catch (error: unknown) {
    return err(probeError(target, path, error));
  }
}

/**
 * Compare a target's outputs against its inputs.
 *
 * Equal timestamps count as fresh. A missing input is an I/O error.
 */
export function assessStaleness(
  target: FinalizedTarget,
  files: FileProbe,
): Result<Staleness, UpdateError> {
  const inputTimes: Array<{ path: string; modified: Timestamp }> = [];
  for (const path of target.dependencies.inputs) {
    const probed = probe(files, target.name, path);
    if (!probed.ok) return probed;
    if (probed.value === undefined) {
      return err({
        type: "io",
        message: `Input "${path}" of "${target.name}" not found`,
        target: target.name,
        path,
        code: "ENOENT",
      });
    }
    inputTimes.push({ path, modified: probed.value });
  }

  if (inputTimes.length === 0) {
    return ok({ stale: true, reason: "no_inputs", outputs: [] });
  }

  const latestInput = inputTimes.reduce(
    (latest, input) => (input.modified > latest ? input.modified : latest),
    inputTimes[0].modified,
  );

  const outputs: OutputState[] = [];
  for (const path of target.outputs) {
    const probed = probe(files, target.name, path);
    if (!probed.ok) return probed;
    const modified = probed.value;

    if (modified === undefined) {
      outputs.push({ path, status: "missing" });
    } else if (modified < latestInput) {
      const newerInputs = inputTimes
        .filter((input) => input.modified > modified)
        .map((input) => input.path);
      outputs.push({ path, status: "outdated", modified, newerInputs });
    } else {
      outputs.push({ path, status: "fresh", modified });
    }
  }

  const stale = outputs.some((o) => o.status !== "fresh");
  return ok({ stale, reason: stale ? "outputs" : "fresh", latestInput, outputs });
}

/** Staleness of a named target, without looking at its dependencies. */
export function explainTarget(
  graph: FinalizedGraph,
  name: string,
  files: FileProbe,
): Result<Staleness, UpdateError> {
  const target = graph.get(name);
  if (!target) return err(missingTargetError(name));
  return assessStaleness(target, files);
}

/** One line per output, for `mkgraph explain`. */
export function describeStaleness(name: string, staleness: Staleness): string[] {
  if (staleness.reason === "no_inputs") {
    return [`"${name}" has no input files, always needs update.`];
  }
  if (staleness.outputs.length === 0) {
    return [`"${name}" has no outputs, does not need update.`];
  }
  return staleness.outputs.map((output) => {
    switch (output.status) {
      case "missing":
        return `"${output.path}" does not exist, needs update.`;
      case "outdated":
        return `"${output.path}" older than ${output.newerInputs.map((i) => `"${i}"`).join(", ")}, needs update.`;
      case "fresh":
        return `"${output.path}" is newer than all inputs, does not need update.`;
    }
  });
}
