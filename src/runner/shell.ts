import { spawnSync } from "node:child_process";

/** How a command line finished. */
export type ExitOutcome =
  | { kind: "success" }
  | { kind: "exit"; code: number }
  | { kind: "signal"; signal: string };

export interface CommandRunner {
  /** Run one command line to completion. Throws if it cannot be started. */
  run(command: string): ExitOutcome;
}

/** Program and flag a command line is handed to, e.g. `sh -c`. */
export interface ShellSpec {
  program: string;
  flag: string;
}

export interface ShellRunnerOptions {
  cwd?: string;
  shell?: ShellSpec;
  env?: NodeJS.ProcessEnv;
}

/** The host platform's default command shell. */
export function defaultShell(platform: NodeJS.Platform = process.platform): ShellSpec {
  return platform === "win32"
    ? { program: "cmd", flag: "/C" }
    : { program: "sh", flag: "-c" };
}

/**
 * Runner that hands each command line to the shell and blocks until it exits.
 * Output goes straight to the terminal.
 */
export function createShellRunner(options: ShellRunnerOptions = {}): CommandRunner {
  const shell = options.shell ?? defaultShell();

  return {
    run(command) {
      const result = spawnSync(shell.program, [shell.flag, command], {
        cwd: options.cwd,
        env: options.env,
        stdio: "inherit",
      });

      if (result.error) throw result.error;
      if (result.signal) return { kind: "signal", signal: result.signal };
      if (result.status === 0) return { kind: "success" };
      return { kind: "exit", code: result.status ?? 1 };
    },
  };
}
