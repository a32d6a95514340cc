/** Structural error raised while finalizing a batch of raw targets. */
export type FinalizeError =
  | {
      type: "cycle";
      message: string;
      /** Dependency that closed the cycle. */
      name: string;
      /** Targets being finalized when the cycle was found, outermost first. */
      path: string[];
    }
  | {
      type: "duplicate_name";
      message: string;
      name: string;
    }
  | {
      type: "unresolved_dependency";
      message: string;
      /** Dependency name no target answers to. */
      name: string;
      /** Target that declared it. */
      target: string;
    }
  | {
      type: "depth_exceeded";
      message: string;
      target: string;
      maxDepth: number;
    };

/** Error raised while bringing a target up to date. */
export type UpdateError =
  | {
      type: "missing_target";
      message: string;
      name: string;
    }
  | {
      type: "io";
      message: string;
      target: string;
      /** Path being probed, absent for spawn failures. */
      path?: string;
      code?: string;
    }
  | {
      type: "non_zero_exit";
      message: string;
      target: string;
      command: string;
      code: number;
    }
  | {
      type: "signaled";
      message: string;
      target: string;
      command: string;
      signal: string;
    }
  | {
      type: "depth_exceeded";
      message: string;
      target: string;
      maxDepth: number;
    };

export function cycleError(name: string, path: string[]): FinalizeError {
  return {
    type: "cycle",
    message: `Cyclic dependency on "${name}": ${[...path, name].join(" → ")}`,
    name,
    path,
  };
}

export function duplicateNameError(name: string): FinalizeError {
  return {
    type: "duplicate_name",
    message: `Duplicate target "${name}"`,
    name,
  };
}

export function unresolvedDependencyError(name: string, target: string): FinalizeError {
  return {
    type: "unresolved_dependency",
    message: `Target "${target}" depends on unknown target "${name}"`,
    name,
    target,
  };
}

export function missingTargetError(name: string): UpdateError {
  return {
    type: "missing_target",
    message: `No target named "${name}"`,
    name,
  };
}

/** Extract `code` from a Node system error, if it carries one. */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
