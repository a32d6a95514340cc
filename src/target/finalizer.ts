import type { TargetLookup, TargetReference } from "./dependencies.js";
import { resolveDependencies } from "./dependencies.js";
import {
  cycleError,
  duplicateNameError,
  type FinalizeError,
} from "./errors.js";
import { hasAlternateNames, hasName } from "./names.js";
import { err, ok, type Result } from "./result.js";
import type { FinalizedGraph, FinalizedTarget, RawTarget } from "./types.js";

export const DEFAULT_MAX_DEPTH = 256;

export interface FinalizeOptions {
  /** Longest dependency chain finalized before giving up. */
  maxDepth?: number;
}

type NodeState = "unvisited" | "in_progress" | "done";

interface Arena {
  targets: RawTarget[];
  state: NodeState[];
  /** Canonical name → index of the first target carrying it. */
  byName: Map<string, number>;
  /** Indices of targets that answer to more than their own name. */
  aliased: number[];
  output: Map<string, FinalizedTarget>;
  maxDepth: number;
}

/**
 * Resolve and validate a batch of raw targets into a finalized graph.
 *
 * Targets are finalized depth-first, dependencies before dependents, so the
 * returned map's insertion order is a topological order. Any cycle,
 * duplicate canonical name or unresolvable dependency fails the whole batch.
 */
export function finalizeAll(
  rawTargets: readonly RawTarget[],
  options: FinalizeOptions = {},
): Result<FinalizedGraph, FinalizeError> {
  const arena: Arena = {
    targets: [...rawTargets],
    state: rawTargets.map((): NodeState => "unvisited"),
    byName: new Map(),
    aliased: [],
    output: new Map(),
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
  };

  arena.targets.forEach((target, index) => {
    if (!arena.byName.has(target.name)) arena.byName.set(target.name, index);
    if (hasAlternateNames(target)) arena.aliased.push(index);
  });

  for (let index = 0; index < arena.targets.length; index++) {
    if (arena.state[index] !== "unvisited") continue;
    const error = finalizeNode(arena, index, []);
    if (error) return err(error);
  }

  return ok(arena.output);
}

/** Index of the target `name` refers to, by primary name first, then alias. */
function findTarget(arena: Arena, name: string): number | undefined {
  const direct = arena.byName.get(name);
  if (direct !== undefined) return direct;
  return arena.aliased.find((index) => hasName(arena.targets[index], name));
}

function lookupIn(arena: Arena): TargetLookup {
  return (name): TargetReference | undefined => {
    const index = findTarget(arena, name);
    if (index === undefined) return undefined;
    const canonical = arena.targets[index].name;
    return canonical === name ? {} : { canonical };
  };
}

function finalizeNode(
  arena: Arena,
  index: number,
  path: readonly number[],
): FinalizeError | undefined {
  const target = arena.targets[index];

  if (path.length >= arena.maxDepth) {
    return {
      type: "depth_exceeded",
      message: `Dependency chain deeper than ${arena.maxDepth} at "${target.name}"`,
      target: target.name,
      maxDepth: arena.maxDepth,
    };
  }

  const resolved = resolveDependencies(target.dependencies, lookupIn(arena), target.name);
  if (!resolved.ok) return resolved.error;

  arena.state[index] = "in_progress";
  const inner = [...path, index];

  for (const dep of resolved.value.dependencies) {
    // resolveDependencies only yields names of targets in this batch
    const depIndex = arena.byName.get(dep);
    if (depIndex === undefined) continue;

    if (arena.state[depIndex] === "in_progress") {
      return cycleError(dep, inner.map((i) => arena.targets[i].name));
    }
    if (arena.state[depIndex] === "unvisited") {
      const error = finalizeNode(arena, depIndex, inner);
      if (error) return error;
    }
  }

  arena.state[index] = "done";

  if (arena.output.has(target.name)) {
    return duplicateNameError(target.name);
  }
  arena.output.set(target.name, { ...target, dependencies: resolved.value });
  return undefined;
}
