export * from "./target/index.js";
export * from "./formats/index.js";
export { canonicalName, loadGraph, runBuild, consoleLog, type LoadedGraph } from "./build/index.js";
export { loadConfig, CONFIG_FILE } from "./config/loader.js";
export { mkgraphConfigSchema, type MkgraphConfigInput } from "./config/schema.js";
export { createFsProbe, type FileProbe } from "./runner/probe.js";
export {
  createShellRunner,
  defaultShell,
  type CommandRunner,
  type ExitOutcome,
  type ShellSpec,
  type ShellRunnerOptions,
} from "./runner/shell.js";
export { formatHumanReport, formatTargetList } from "./reporter/human.js";
export { formatJsonReport } from "./reporter/json.js";
export type {
  MkgraphConfig,
  BuildLog,
  BuildInput,
  TargetOutcome,
  BuildProblem,
  BuildResult,
} from "./types.js";
