import type { FormatName } from "./formats/types.js";
import type { FileProbe } from "./runner/probe.js";
import type { CommandRunner, ShellSpec } from "./runner/shell.js";
import type { FinalizeError, UpdateError } from "./target/errors.js";

/** Configuration from .mkgraph.json */
export interface MkgraphConfig {
  file?: string;
  format?: FormatName;
  shell?: ShellSpec;
  keepGoing: boolean;
  memoize: boolean;
  maxDepth: number;
  echo: boolean;
  defaultTargets: string[];
}

/** Where build progress is written. Defaults to the console. */
export interface BuildLog {
  info(message: string): void;
  error(message: string): void;
}

/** Input for a build run */
export interface BuildInput {
  projectDir: string;
  /** Build file; searched for in projectDir when absent. */
  file?: string;
  format?: FormatName;
  /** Requested targets; the file's default target when empty. */
  targets: string[];
  dryRun?: boolean;
  keepGoing?: boolean;
  memoize?: boolean;
  maxDepth?: number;
  /** Print each command before it runs. */
  echo?: boolean;
  shell?: ShellSpec;
  /** Overrides for the command runner and file probe (tests). */
  runner?: CommandRunner;
  files?: FileProbe;
  log?: BuildLog;
}

/** Result of bringing one requested target up to date */
export interface TargetOutcome {
  target: string;
  status: "updated" | "up_to_date" | "failed" | "skipped";
  error?: UpdateError;
  duration_ms: number;
}

/** Failure that stopped the build before any target was updated */
export interface BuildProblem {
  stage: "load" | "finalize";
  message: string;
  /** Set for finalize-stage problems. */
  error?: FinalizeError;
}

/** Result from a full build run */
export interface BuildResult {
  passed: boolean;
  buildFile?: string;
  format?: FormatName;
  dryRun: boolean;
  targets: TargetOutcome[];
  problems: BuildProblem[];
  duration_ms: number;
}
