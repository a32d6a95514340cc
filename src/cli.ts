#!/usr/bin/env node

import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { canonicalName, loadGraph, runBuild } from "./build/index.js";
import { loadConfig } from "./config/loader.js";
import type { FormatName } from "./formats/types.js";
import { formatHumanReport, formatTargetList } from "./reporter/human.js";
import { formatJsonReport } from "./reporter/json.js";
import { createFsProbe } from "./runner/probe.js";
import { describeStaleness, explainTarget } from "./target/staleness.js";
import type { MkgraphConfig } from "./types.js";

const __filename_cli = fileURLToPath(import.meta.url);
const __dirname_cli = dirname(__filename_cli);
const cliPkgVersion = JSON.parse(
  readFileSync(join(__dirname_cli, "..", "package.json"), "utf-8"),
).version as string;

/** Options shared by every command that reads a build file. */
interface FileOptions {
  file?: string;
  format?: FormatName;
  directory?: string;
}

interface BuildOptions extends FileOptions {
  dryRun?: boolean;
  keepGoing?: boolean;
  memoize?: boolean;
  json?: boolean;
  quiet?: boolean;
}

function withFileOptions(command: Command): Command {
  return command
    .option("-f, --file <path>", "Build file to read (default: searched in the project directory)")
    .addOption(new Option("--format <format>", "Build file format").choices(["yaml", "makefile"]))
    .option("-C, --directory <dir>", "Project directory to run in");
}

async function resolveProject(
  opts: FileOptions,
): Promise<{ projectDir: string; config: MkgraphConfig; file?: string; format?: FormatName }> {
  const projectDir = resolve(opts.directory ?? process.cwd());
  const config = await loadConfig(projectDir);
  return {
    projectDir,
    config,
    file: opts.file ?? config.file,
    format: opts.format ?? config.format,
  };
}

function fail(command: string, err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: mkgraph ${command} failed — ${message}`);
  process.exit(1);
}

const program = new Command();

program
  .name("mkgraph")
  .description("mkgraph — rebuild stale targets from a dependency graph")
  .version(cliPkgVersion);

withFileOptions(
  program
    .command("build [targets...]", { isDefault: true })
    .description("Bring the given targets (default: the first one) up to date"),
)
  .option("-n, --dry-run", "Print the commands that would run without running them")
  .option("-k, --keep-going", "Continue with the next target after a failure")
  .option("--memoize", "Visit each target at most once per requested target")
  .option("--json", "Output structured JSON instead of human-readable report")
  .option("-q, --quiet", "Do not echo commands or print a report")
  .action(async (targets: string[], opts: BuildOptions) => {
    try {
      const { projectDir, config, file, format } = await resolveProject(opts);

      const result = await runBuild({
        projectDir,
        file,
        format,
        targets: targets.length > 0 ? targets : config.defaultTargets,
        dryRun: opts.dryRun,
        keepGoing: opts.keepGoing ?? config.keepGoing,
        memoize: opts.memoize ?? config.memoize,
        maxDepth: config.maxDepth,
        echo: !opts.quiet && !opts.json && config.echo,
        shell: config.shell,
      });

      if (opts.json) {
        console.log(formatJsonReport(result));
      } else if (!opts.quiet) {
        console.log(formatHumanReport(result));
      }

      process.exit(result.passed ? 0 : 1);
    } catch (err) {
      fail("build", err);
    }
  });

withFileOptions(
  program
    .command("list")
    .description("List targets in dependency order"),
).action(async (opts: FileOptions) => {
  try {
    const { projectDir, config, file, format } = await resolveProject(opts);
    const loaded = await loadGraph({ projectDir, file, format, maxDepth: config.maxDepth });
    if (!loaded.ok) {
      console.error(`Error: ${loaded.error.message}`);
      process.exit(1);
    }
    console.log(formatTargetList(loaded.value.graph));
  } catch (err) {
    fail("list", err);
  }
});

withFileOptions(
  program
    .command("check")
    .description("Validate the build file: cycles, duplicate names, unknown dependencies"),
).action(async (opts: FileOptions) => {
  try {
    const { projectDir, config, file, format } = await resolveProject(opts);
    const loaded = await loadGraph({ projectDir, file, format, maxDepth: config.maxDepth });
    if (!loaded.ok) {
      console.error(`Error: ${loaded.error.message}`);
      process.exit(1);
    }
    const count = loaded.value.graph.size;
    console.log(`${loaded.value.buildFile}: ${count} target${count === 1 ? "" : "s"}, no problems found.`);
  } catch (err) {
    fail("check", err);
  }
});

withFileOptions(
  program
    .command("explain <target>")
    .description("Explain why a target does or does not need an update"),
).action(async (name: string, opts: FileOptions) => {
  try {
    const { projectDir, config, file, format } = await resolveProject(opts);
    const loaded = await loadGraph({ projectDir, file, format, maxDepth: config.maxDepth });
    if (!loaded.ok) {
      console.error(`Error: ${loaded.error.message}`);
      process.exit(1);
    }

    const { graph, targets } = loaded.value;
    const canonical = canonicalName(targets, name);
    const explained = explainTarget(graph, canonical, createFsProbe(projectDir));
    if (!explained.ok) {
      console.error(`Error: ${explained.error.message}`);
      process.exit(1);
    }

    for (const line of describeStaleness(canonical, explained.value)) {
      console.log(line);
    }
    const deps = graph.get(canonical)?.dependencies.dependencies ?? [];
    if (deps.length > 0) {
      console.log(`Also rebuilt if any of these is rebuilt: ${deps.join(", ")}`);
    }
  } catch (err) {
    fail("explain", err);
  }
});

await program.parseAsync(process.argv);
