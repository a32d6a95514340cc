import type { FinalizedGraph } from "../target/types.js";
import type { BuildResult, TargetOutcome } from "../types.js";

const STATUS_TEXT: Record<TargetOutcome["status"], string> = {
  updated: "UPDATED",
  up_to_date: "UP TO DATE",
  failed: "FAILED",
  skipped: "SKIPPED",
};

export function formatHumanReport(result: BuildResult): string {
  const lines: string[] = [];

  // Header
  const status = result.passed ? "PASSED" : "FAILED";
  lines.push("## Build Report");
  lines.push(`**Status:** ${status}${result.dryRun ? " (dry run)" : ""}`);
  if (result.buildFile) {
    lines.push(`**Build File:** ${result.buildFile} (${result.format ?? "unknown"})`);
  }
  lines.push(`**Duration:** ${formatDuration(result.duration_ms)}`);
  lines.push("");

  // Target results
  if (result.targets.length > 0) {
    lines.push("### Targets");
    for (const outcome of result.targets) {
      const icon = outcome.status === "failed" || outcome.status === "skipped" ? "[ ]" : "[x]";
      const dur = outcome.status === "skipped" ? "" : ` (${formatDuration(outcome.duration_ms)})`;
      lines.push(`- ${icon} ${outcome.target}: ${STATUS_TEXT[outcome.status]}${dur}`);
    }
    lines.push("");
  }

  // Errors section
  const failed = result.targets.filter((t) => t.error);
  if (result.problems.length > 0 || failed.length > 0) {
    lines.push("### Errors");
    for (const problem of result.problems) {
      lines.push(`- ${problem.stage}: ${problem.message}`);
    }
    for (const outcome of failed) {
      lines.push(`- ${outcome.target}: ${outcome.error?.message ?? "failed"}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * One line per finalized target, dependencies first:
 *   name: outputs <- inputs [after dependencies]
 */
export function formatTargetList(graph: FinalizedGraph): string {
  if (graph.size === 0) {
    return "No targets.";
  }

  const lines: string[] = [];
  for (const target of graph.values()) {
    const outputs = target.outputs.length > 0 ? target.outputs.join(" ") : "(no outputs)";
    const inputs = target.dependencies.inputs.length > 0
      ? ` <- ${target.dependencies.inputs.join(" ")}`
      : "";
    const deps = target.dependencies.dependencies.length > 0
      ? ` [after ${target.dependencies.dependencies.join(", ")}]`
      : "";
    lines.push(`${target.name}: ${outputs}${inputs}${deps}`);
  }
  return lines.join("\n");
}
