import { unresolvedDependencyError, type FinalizeError } from "./errors.js";
import { err, ok, type Result } from "./result.js";
import type { DependencyList, SplitDependencies, Target } from "./types.js";

/**
 * Answer of a name lookup that found a target. `canonical` is set only when
 * the name used differs from the target's primary name.
 */
export interface TargetReference {
  canonical?: string;
}

/** Returns `undefined` when the name is not a known target. */
export type TargetLookup = (name: string) => TargetReference | undefined;

/**
 * Split a dependency list into input paths and canonical target names.
 *
 * Mixed lists are partitioned by the lookup, keeping order within each half.
 * Already-split lists keep their inputs, and every dependency must be a
 * known target.
 */
export function resolveDependencies(
  list: DependencyList,
  lookup: TargetLookup,
  owner: string,
): Result<SplitDependencies, FinalizeError> {
  if (list.kind === "mixed") {
    const inputs: string[] = [];
    const dependencies: string[] = [];
    for (const name of list.names) {
      const ref = lookup(name);
      if (ref) {
        dependencies.push(ref.canonical ?? name);
      } else {
        inputs.push(name);
      }
    }
    return ok({ kind: "split", inputs, dependencies });
  }

  const dependencies: string[] = [];
  for (const name of list.dependencies) {
    const ref = lookup(name);
    if (!ref) {
      return err(unresolvedDependencyError(name, owner));
    }
    dependencies.push(ref.canonical ?? name);
  }
  return ok({ kind: "split", inputs: [...list.inputs], dependencies });
}

/** Input files of a target. Throws if its dependencies are still mixed. */
export function inputsOf(target: Target): string[] {
  if (target.dependencies.kind !== "split") {
    throw new Error(`Input files of "${target.name}" are still mixed`);
  }
  return target.dependencies.inputs;
}

/** Dependency names of a target. Throws if its dependencies are still mixed. */
export function dependenciesOf(target: Target): string[] {
  if (target.dependencies.kind !== "split") {
    throw new Error(`Dependencies of "${target.name}" are still mixed`);
  }
  return target.dependencies.dependencies;
}
