// Types (re-export as types)
export type {
  MixedDependencies,
  SplitDependencies,
  DependencyList,
  TargetExtra,
  TargetFormat,
  Target,
  RawTarget,
  FinalizedTarget,
  FinalizedGraph,
  Timestamp,
} from "./types.js";
export type { FinalizeError, UpdateError } from "./errors.js";
export type { Result } from "./result.js";
export type { TargetLookup, TargetReference } from "./dependencies.js";
export type { FinalizeOptions } from "./finalizer.js";
export type { OutputState, Staleness } from "./staleness.js";
export type { UpdateContext } from "./updater.js";

export { ok, err } from "./result.js";
export { hasName, hasAlternateNames } from "./names.js";
export { resolveDependencies, inputsOf, dependenciesOf } from "./dependencies.js";
export { finalizeAll, DEFAULT_MAX_DEPTH } from "./finalizer.js";
export { assessStaleness, explainTarget, describeStaleness } from "./staleness.js";
export { update } from "./updater.js";
