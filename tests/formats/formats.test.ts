import { describe, it, expect, afterEach } from "vitest";
import { join } from "node:path";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import {
  findBuildFile,
  formatForFile,
  loadTargets,
  FormatError,
} from "../../src/formats/index.js";

const dirs: string[] = [];

async function createTempDir(files: Record<string, string> = {}): Promise<string> {
  const dir = join(tmpdir(), `mkgraph-test-${randomUUID()}`);
  await mkdir(dir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    await writeFile(join(dir, name), content);
  }
  dirs.push(dir);
  return dir;
}

afterEach(async () => {
  for (const d of dirs) await rm(d, { recursive: true, force: true });
  dirs.length = 0;
});

describe("formatForFile", () => {
  it("picks the format from the base name", () => {
    expect(formatForFile("/some/dir/Buildfile.yaml")?.name).toBe("yaml");
    expect(formatForFile("mkgraph.yml")?.name).toBe("yaml");
    expect(formatForFile("sub/Makefile")?.name).toBe("makefile");
    expect(formatForFile("GNUmakefile")?.name).toBe("makefile");
  });

  it("returns undefined for unrecognized names", () => {
    expect(formatForFile("build.ninja")).toBeUndefined();
    expect(formatForFile("Makefile.am")).toBeUndefined();
  });
});

describe("findBuildFile", () => {
  it("finds a YAML build file before a Makefile", async () => {
    const dir = await createTempDir({ Makefile: "all:\n", "Buildfile.yaml": "all: {}\n" });

    const found = await findBuildFile(dir);

    expect(found?.path).toBe(join(dir, "Buildfile.yaml"));
    expect(found?.format.name).toBe("yaml");
  });

  it("finds a Makefile", async () => {
    const dir = await createTempDir({ "README.md": "", Makefile: "all:\n" });

    const found = await findBuildFile(dir);

    expect(found?.path).toBe(join(dir, "Makefile"));
    expect(found?.format.name).toBe("makefile");
  });

  it("returns null when no build file is present", async () => {
    const dir = await createTempDir({ "notes.txt": "" });

    expect(await findBuildFile(dir)).toBeNull();
  });

  it("returns null for a directory that does not exist", async () => {
    expect(await findBuildFile(join(tmpdir(), `mkgraph-missing-${randomUUID()}`))).toBeNull();
  });
});

describe("loadTargets", () => {
  it("parses the file with the format its name implies", async () => {
    const dir = await createTempDir({ Makefile: "all: app\napp: main.c\n\tcc -o app main.c\n" });

    const { format, targets } = await loadTargets(join(dir, "Makefile"));

    expect(format.name).toBe("makefile");
    expect(targets.map((t) => t.name)).toEqual(["all", "app"]);
  });

  it("uses an explicit format over the file name", async () => {
    const dir = await createTempDir({ "rules.txt": "lib:\n  outs: [lib.a]\n" });

    const { format, targets } = await loadTargets(join(dir, "rules.txt"), "yaml");

    expect(format.name).toBe("yaml");
    expect(targets[0].outputs).toEqual(["lib.a"]);
  });

  it("rejects a file whose format cannot be told from its name", async () => {
    const path = join(tmpdir(), "rules.txt");

    await expect(loadTargets(path)).rejects.toThrow(
      `Cannot tell the format of "${path}" from its name; pass one of: yaml, makefile`,
    );
  });

  it("surfaces parse errors as FormatError", async () => {
    const dir = await createTempDir({ Makefile: "\techo orphan\n" });

    await expect(loadTargets(join(dir, "Makefile"))).rejects.toBeInstanceOf(FormatError);
  });
});
