import type { FileProbe } from "../runner/probe.js";
import type { CommandRunner, ExitOutcome } from "../runner/shell.js";
import {
  describeError,
  errnoCode,
  missingTargetError,
  type UpdateError,
} from "./errors.js";
import { DEFAULT_MAX_DEPTH } from "./finalizer.js";
import { err, ok, type Result } from "./result.js";
import { assessStaleness } from "./staleness.js";
import type { FinalizedGraph, FinalizedTarget } from "./types.js";

export interface UpdateContext {
  files: FileProbe;
  runner: CommandRunner;
  /** Longest dependency chain walked before giving up. */
  maxDepth?: number;
  /**
   * Results of targets already visited during this top-level call. When
   * given, a revisited target (diamond graphs) returns its recorded result
   * instead of being probed again.
   */
  memo?: Map<string, boolean>;
  /**
   * Report commands instead of running them. Outputs are never refreshed,
   * so a dry run always visits each target once, with or without a memo.
   */
  dryRun?: boolean;
  /** Called before each command runs (or would run, in a dry run). */
  onCommand?: (target: string, command: string) => void;
}

/**
 * Bring a target up to date, dependencies first.
 *
 * Returns whether this target's own commands ran. A target is rebuilt when
 * a dependency was rebuilt, when it has no inputs, or when an output is
 * missing or older than the newest input. The first failure anywhere in the
 * walk stops it; outputs refreshed before that stay refreshed.
 */
export function update(
  graph: FinalizedGraph,
  name: string,
  context: UpdateContext,
): Result<boolean, UpdateError> {
  if (context.dryRun && !context.memo) {
    return updateAt(graph, name, { ...context, memo: new Map<string, boolean>() }, 0);
  }
  return updateAt(graph, name, context, 0);
}

function updateAt(
  graph: FinalizedGraph,
  name: string,
  context: UpdateContext,
  depth: number,
): Result<boolean, UpdateError> {
  const target = graph.get(name);
  if (!target) return err(missingTargetError(name));

  const maxDepth = context.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (depth >= maxDepth) {
    return err({
      type: "depth_exceeded",
      message: `Dependency chain deeper than ${maxDepth} at "${name}"`,
      target: name,
      maxDepth,
    });
  }

  const recorded = context.memo?.get(name);
  if (recorded !== undefined) return ok(recorded);

  let dependencyUpdated = false;
  for (const dep of target.dependencies.dependencies) {
    const result = updateAt(graph, dep, context, depth + 1);
    if (!result.ok) return result;
    dependencyUpdated = dependencyUpdated || result.value;
  }

  let forced = dependencyUpdated;
  if (!forced) {
    const staleness = assessStaleness(target, context.files);
    if (!staleness.ok) return staleness;
    forced = staleness.value.stale;
  }

  if (forced) {
    const ran = runCommands(target, context);
    if (!ran.ok) return ran;
  }

  context.memo?.set(name, forced);
  return ok(forced);
}

function runCommands(
  target: FinalizedTarget,
  context: UpdateContext,
): Result<void, UpdateError> {
  for (const command of target.commands) {
    context.onCommand?.(target.name, command);
    if (context.dryRun) continue;

    const started = start(context.runner, target.name, command);
    if (!started.ok) return started;
    const outcome = started.value;

    switch (outcome.kind) {
      case "success":
        break;
      case "exit":
        return err({
          type: "non_zero_exit",
          message: `"${command}" (target "${target.name}") exited with code ${outcome.code}`,
          target: target.name,
          command,
          code: outcome.code,
        });
      case "signal":
        return err({
          type: "signaled",
          message: `"${command}" (target "${target.name}") was terminated by ${outcome.signal}`,
          target: target.name,
          command,
          signal: outcome.signal,
        });
    }
  }
  return ok(undefined);
}

function start(
  runner: CommandRunner,
  target: string,
  command: string,
): Result<ExitOutcome, UpdateError> {
  try {
    return ok(runner.run(command));
  } catch (error: unknown) {
    return err({
      type: "io",
      message: `Failed to start "${command}" for "${target}": ${describeError(error)}`,
      target,
      code: errnoCode(error),
    });
  }
}
