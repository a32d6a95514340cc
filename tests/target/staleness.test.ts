import { describe, it, expect, beforeEach } from "vitest";
import { finalizeAll } from "../../src/target/finalizer.js";
import {
  assessStaleness,
  describeStaleness,
  explainTarget,
} from "../../src/target/staleness.js";
import type { FinalizedGraph, FinalizedTarget } from "../../src/target/types.js";
import { MemoryFiles, splitTarget } from "../helpers/fakes.js";

function finalized(inputs: string[], outputs: string[]): FinalizedTarget {
  return {
    name: "t",
    outputs,
    dependencies: { kind: "split", inputs, dependencies: [] },
    commands: [],
    extra: { format: "inline" },
  };
}

let files: MemoryFiles;

beforeEach(() => {
  files = new MemoryFiles();
});

describe("assessStaleness", () => {
  it("classifies each output against the inputs", () => {
    files.setTime("a.c", 100n);
    files.setTime("b.c", 300n);
    files.setTime("old.o", 200n);
    files.setTime("new.o", 300n);

    const result = assessStaleness(finalized(["a.c", "b.c"], ["old.o", "new.o", "gone.o"]), files);

    expect(result).toEqual({
      ok: true,
      value: {
        stale: true,
        reason: "outputs",
        latestInput: 300n,
        outputs: [
          { path: "old.o", status: "outdated", modified: 200n, newerInputs: ["b.c"] },
          { path: "new.o", status: "fresh", modified: 300n },
          { path: "gone.o", status: "missing" },
        ],
      },
    });
  });

  it("is fresh when every output is at least as new as every input", () => {
    files.setTime("a.c", 100n);
    files.setTime("a.o", 150n);

    const result = assessStaleness(finalized(["a.c"], ["a.o"]), files);

    expect(result.ok && result.value.stale).toBe(false);
    expect(result.ok && result.value.reason).toBe("fresh");
  });

  it("is stale without probing outputs when there are no inputs", () => {
    const result = assessStaleness(finalized([], ["a.o"]), files);

    expect(result).toEqual({ ok: true, value: { stale: true, reason: "no_inputs", outputs: [] } });
    expect(files.probed).toEqual([]);
  });
});

describe("explainTarget", () => {
  function graph(): FinalizedGraph {
    const result = finalizeAll([splitTarget("t", ["a.c"], [], { outputs: ["a.o"] })]);
    if (!result.ok) throw new Error(result.error.message);
    return result.value;
  }

  it("explains a named target", () => {
    files.setTime("a.c", 100n);

    const result = explainTarget(graph(), "t", files);

    expect(result.ok && result.value.outputs).toEqual([{ path: "a.o", status: "missing" }]);
  });

  it("reports an unknown name", () => {
    const result = explainTarget(graph(), "u", files);

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.type).toBe("missing_target");
  });
});

describe("describeStaleness", () => {
  it("writes one line per output", () => {
    const lines = describeStaleness("t", {
      stale: true,
      reason: "outputs",
      latestInput: 300n,
      outputs: [
        { path: "old.o", status: "outdated", modified: 200n, newerInputs: ["b.c", "c.c"] },
        { path: "new.o", status: "fresh", modified: 300n },
        { path: "gone.o", status: "missing" },
      ],
    });

    expect(lines).toEqual([
      '"old.o" older than "b.c", "c.c", needs update.',
      '"new.o" is newer than all inputs, does not need update.',
      '"gone.o" does not exist, needs update.',
    ]);
  });

  it("explains targets without inputs or without outputs", () => {
    expect(describeStaleness("all", { stale: true, reason: "no_inputs", outputs: [] })).toEqual([
      '"all" has no input files, always needs update.',
    ]);
    expect(
      describeStaleness("lint", { stale: false, reason: "fresh", latestInput: 1n, outputs: [] }),
    ).toEqual(['"lint" has no outputs, does not need update.']);
  });
});
