import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { CandidateFile } from "./types.js";
import { walkSourceFiles, type WalkOptions } from "./scan.js";

async function collect(root: string, opts: WalkOptions): Promise<string[]> {
  const files: CandidateFile[] = [];
  for await (const f of walkSourceFiles(root, opts)) {
    files.push(f);
  }
  return files.map((f) => f.rel_path.split(path.sep).join("/"));
}

describe("walkSourceFiles", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "tidyfs-scan-test-"));
    await fs.mkdir(path.join(tmpDir, "docs", "drafts"), { recursive: true });
    await fs.mkdir(path.join(tmpDir, "node_modules", "pkg"), { recursive: true });
    await fs.mkdir(path.join(tmpDir, ".cache"), { recursive: true });

    await fs.writeFile(path.join(tmpDir, "b.txt"), "b");
    await fs.writeFile(path.join(tmpDir, "a.txt"), "aaaa");
    await fs.writeFile(path.join(tmpDir, ".hidden"), "h");
    await fs.writeFile(path.join(tmpDir, "docs", "guide.md"), "g");
    await fs.writeFile(path.join(tmpDir, "docs", "drafts", "wip.md"), "w");
    await fs.writeFile(path.join(tmpDir, "node_modules", "pkg", "index.js"), "i");
    await fs.writeFile(path.join(tmpDir, ".cache", "blob"), "c");
    await fs.symlink(path.join(tmpDir, "a.txt"), path.join(tmpDir, "link-to-a.txt"));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("prunes excluded and hidden directories and skips hidden files", async () => {
    const files = await collect(tmpDir, {
      exclude_dirs: new Set(["node_modules"]),
      exclude_hidden: true,
    });
    expect(files).toEqual(["a.txt", "b.txt", "docs/guide.md", "docs/drafts/wip.md"]);
  });

  it("includes hidden entries when hidden exclusion is off", async () => {
    const files = await collect(tmpDir, {
      exclude_dirs: new Set(["node_modules"]),
      exclude_hidden: false,
    });
    expect(files).toEqual([
      ".hidden",
      "a.txt",
      "b.txt",
      ".cache/blob",
      "docs/guide.md",
      "docs/drafts/wip.md",
    ]);
  });

  it("reports symlinks it does not follow", async () => {
    const skipped: Array<[string, string]> = [];
    const files = await collect(tmpDir, {
      exclude_dirs: new Set(["node_modules"]),
      exclude_hidden: true,
      on_skip: (absPath, reason) => skipped.push([absPath, reason]),
    });
    expect(files).not.toContain("link-to-a.txt");
    expect(skipped).toEqual([[path.join(tmpDir, "link-to-a.txt"), "symlink"]]);
  });

  it("reports size and modification time", async () => {
    const files: CandidateFile[] = [];
    for await (const f of walkSourceFiles(tmpDir, { exclude_dirs: new Set(), exclude_hidden: true })) {
      files.push(f);
    }
    const a = files.find((f) => f.rel_path === "a.txt");
    const stat = await fs.stat(path.join(tmpDir, "a.txt"));
    expect(a).toEqual({
      abs_path: path.join(tmpDir, "a.txt"),
      rel_path: "a.txt",
      size: 4,
      mtime_ms: stat.mtimeMs,
    });
  });
});
