/** Dependency list whose entries may be input files or target names. */
export interface MixedDependencies {
  kind: "mixed";
  names: string[];
}

/** Dependency list already split into input paths and target names. */
export interface SplitDependencies {
  kind: "split";
  inputs: string[];
  dependencies: string[];
}

export type DependencyList = MixedDependencies | SplitDependencies;

/** Format-specific payload carried by each target. */
export type TargetExtra =
  | {
      format: "yaml";
      /** Additional names the target may be referred to by. */
      aliases: string[];
    }
  | {
      format: "makefile";
      /** Every target word of the rule, the primary name first. */
      names: string[];
    }
  | { format: "inline" };

export type TargetFormat = TargetExtra["format"];

/** A named build unit: commands that turn inputs into outputs. */
export interface Target<D extends DependencyList = DependencyList> {
  /** Canonical name. Unique within a finalized graph. */
  name: string;
  /** Files produced by the commands. */
  outputs: string[];
  dependencies: D;
  /** Shell command lines, run in order. */
  commands: string[];
  extra: TargetExtra;
}

/** Target as produced by a format parser, before finalization. */
export type RawTarget = Target;

/** Target whose dependencies have been resolved against the whole batch. */
export type FinalizedTarget = Target<SplitDependencies>;

/** Finalized targets keyed by canonical name, dependencies first. */
export type FinalizedGraph = ReadonlyMap<string, FinalizedTarget>;

/** Modification time in nanoseconds since the epoch. */
export type Timestamp = bigint;
