import type { FileProbe } from "../../src/runner/probe.js";
import type { CommandRunner, ExitOutcome } from "../../src/runner/shell.js";
import type { RawTarget, Timestamp } from "../../src/target/types.js";

/** In-memory file probe with a clock that only moves when touched. */
export class MemoryFiles implements FileProbe {
  private readonly times = new Map<string, Timestamp>();
  private readonly broken = new Map<string, Error>();
  private clock = 1_000n;
  readonly probed: string[] = [];

  /** Set (or bump to "now") the modification time of each path. */
  touch(...paths: string[]): void {
    for (const path of paths) {
      this.clock += 10n;
      this.times.set(path, this.clock);
    }
  }

  setTime(path: string, time: Timestamp): void {
    this.times.set(path, time);
  }

  remove(path: string): void {
    this.times.delete(path);
  }

  /** Make probing `path` throw. */
  breakPath(path: string, error: Error): void {
    this.broken.set(path, error);
  }

  modifiedTime(path: string): Timestamp | undefined {
    this.probed.push(path);
    const error = this.broken.get(path);
    if (error) throw error;
    return this.times.get(path);
  }
}

/**
 * Runner that records command lines. Outcomes default to success; a
 * command's side effect (usually touching outputs) runs before it returns.
 */
export class RecordingRunner implements CommandRunner {
  readonly ran: string[] = [];
  private readonly outcomes = new Map<string, ExitOutcome>();
  private readonly effects = new Map<string, () => void>();

  fail(command: string, outcome: ExitOutcome): void {
    this.outcomes.set(command, outcome);
  }

  onRun(command: string, effect: () => void): void {
    this.effects.set(command, effect);
  }

  run(command: string): ExitOutcome {
    this.ran.push(command);
    this.effects.get(command)?.();
    return this.outcomes.get(command) ?? { kind: "success" };
  }
}

export function mixedTarget(
  name: string,
  names: string[],
  overrides: Partial<RawTarget> = {},
): RawTarget {
  return {
    name,
    outputs: [],
    dependencies: { kind: "mixed", names },
    commands: [],
    extra: { format: "inline" },
    ...overrides,
  };
}

export function splitTarget(
  name: string,
  inputs: string[],
  dependencies: string[],
  overrides: Partial<RawTarget> = {},
): RawTarget {
  return {
    name,
    outputs: [],
    dependencies: { kind: "split", inputs, dependencies },
    commands: [],
    extra: { format: "inline" },
    ...overrides,
  };
}
