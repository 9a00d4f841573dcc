import path from "node:path";
import { describe, expect, it } from "vitest";
import type { CandidateFile } from "./types.js";
import { buildRuleSet } from "../config/load.js";
import {
  computeDestination,
  dateSegments,
  fileExtension,
  guessMimeType,
  matchClassificationFolder,
  matchGlob,
  matchSizeBucket,
  normalizeExtension,
} from "./rules.js";

const MB = 1024 * 1024;
const destRoot = path.join(path.sep, "dest");

function candidate(absPath: string, size = 10, mtime = new Date(2024, 0, 15, 12)): CandidateFile {
  return {
    abs_path: absPath,
    rel_path: path.basename(absPath),
    size,
    mtime_ms: mtime.getTime(),
  };
}

describe("normalizeExtension", () => {
  it("adds exactly one leading dot and lower-cases", () => {
    expect(normalizeExtension("JPG")).toBe(".jpg");
    expect(normalizeExtension(".Png")).toBe(".png");
    expect(normalizeExtension("..Jpg")).toBe(".jpg");
  });
});

describe("fileExtension", () => {
  it("returns the last suffix lower-cased", () => {
    expect(fileExtension("ARCHIVE.TAR.GZ")).toBe(".gz");
  });

  it("returns empty for dotfiles and trailing dots", () => {
    expect(fileExtension(".bashrc")).toBe("");
    expect(fileExtension("file.")).toBe("");
    expect(fileExtension("Makefile")).toBe("");
  });
});

describe("matchGlob", () => {
  it("anchors relative patterns at the end of the path", () => {
    expect(matchGlob("*.txt", "/src/a/b/notes.txt")).toBe(true);
    expect(matchGlob("docs/*.md", "/src/docs/readme.md")).toBe(true);
    expect(matchGlob("docs/*.md", "/src/readme.md")).toBe(false);
    expect(matchGlob("docs/*.md", "/src/docs/sub/readme.md")).toBe(false);
  });

  it("lets ** span several trailing segments", () => {
    expect(matchGlob("notes/**/*.md", "/src/notes/2024/jan/day.md")).toBe(true);
    expect(matchGlob("notes/**/*.md", "/src/other/day.md")).toBe(false);
  });

  it("matches absolute patterns against the whole path", () => {
    expect(matchGlob("/src/*/*.log", "/src/app/out.log")).toBe(true);
    expect(matchGlob("/src/*.log", "/src/app/out.log")).toBe(false);
  });

  it("lets * match names starting with a dot", () => {
    expect(matchGlob("*.env", "/src/.prod.env")).toBe(true);
  });
});

describe("guessMimeType", () => {
  it("guesses from the name", () => {
    expect(guessMimeType("photo.png")).toBe("image/png");
    expect(guessMimeType("no-extension")).toBeNull();
  });
});

describe("matchClassificationFolder", () => {
  it("prefers extension rules over globs", () => {
    const rules = buildRuleSet({
      by_extension: { txt: "Text" },
      by_glob: { "*.txt": "Globbed" },
    });
    expect(matchClassificationFolder("/src/a.TXT", rules)).toBe("Text");
  });

  it("uses the first matching glob in declared order", () => {
    const rules = buildRuleSet({
      by_glob: { "report*": "Reports", "*.pdf": "PDFs" },
    });
    expect(matchClassificationFolder("/src/report-q1.pdf", rules)).toBe("Reports");
    expect(matchClassificationFolder("/src/invoice.pdf", rules)).toBe("PDFs");
  });

  it("falls back to MIME prefixes in declared order", () => {
    const rules = buildRuleSet({
      by_mime: { "image/": "Images", "image/png": "PNG" },
    });
    expect(matchClassificationFolder("/src/pic.png", rules)).toBe("Images");
  });

  it("returns null when nothing matches", () => {
    const rules = buildRuleSet({ by_mime: { "video/": "Videos" } });
    expect(matchClassificationFolder("/src/data.unknownext", rules)).toBeNull();
  });
});

describe("matchSizeBucket", () => {
  const rules = buildRuleSet({
    size_buckets: [
      { max_mb: 0, folder: "Empty" },
      { max_mb: 1, folder: "Small" },
      { folder: "Large" },
    ],
  });

  it("matches max_mb 0 only for zero-byte files", () => {
    expect(matchSizeBucket(0, rules)).toBe("Empty");
    expect(matchSizeBucket(1, rules)).toBe("Small");
  });

  it("treats the limit as inclusive", () => {
    expect(matchSizeBucket(MB, rules)).toBe("Small");
    expect(matchSizeBucket(MB + 1, rules)).toBe("Large");
  });

  it("returns null without buckets", () => {
    expect(matchSizeBucket(5, buildRuleSet({}))).toBeNull();
  });
});

describe("dateSegments", () => {
  const ts = new Date(2025, 2, 7, 9, 30).getTime();

  it("groups by year, month or day", () => {
    expect(dateSegments(ts, "year")).toEqual(["2025"]);
    expect(dateSegments(ts, "month")).toEqual(["2025", "03"]);
    expect(dateSegments(ts, "day")).toEqual(["2025", "03", "07"]);
  });
});

describe("computeDestination", () => {
  it("puts date folders ahead of the classification folder", () => {
    const rules = buildRuleSet({
      by_extension: { ".jpg": "Images" },
      by_date: { enabled: true, group: "month" },
    });
    const file = candidate("/src/photo.jpg", 100, new Date(2025, 5, 1, 12));
    expect(computeDestination(file, destRoot, rules)).toBe(
      path.join(destRoot, "By Date", "2025", "06", "Images", "photo.jpg"),
    );
  });

  it("puts the size bucket outermost", () => {
    const rules = buildRuleSet({
      by_extension: { ".mp4": "Videos" },
      by_date: { enabled: true, base_folder: "Dated", group: "year" },
      size_buckets: [{ max_mb: 10, folder: "Small" }, { folder: "Big" }],
    });
    const file = candidate("/src/clip.mp4", 20 * MB, new Date(2023, 11, 31, 12));
    expect(computeDestination(file, destRoot, rules)).toBe(
      path.join(destRoot, "Big", "Dated", "2023", "Videos", "clip.mp4"),
    );
  });

  it("uses the unknown folder when no rule matches", () => {
    const rules = buildRuleSet({ unknown_folder: "Misc" });
    expect(computeDestination(candidate("/src/deep/thing.zzz"), destRoot, rules)).toBe(
      path.join(destRoot, "Misc", "thing.zzz"),
    );
  });

  it("keeps the classification folder innermost", () => {
    const rules = buildRuleSet({
      by_extension: { ".txt": "Text" },
      by_date: { enabled: true, group: "day" },
      size_buckets: [{ folder: "All" }],
    });
    const dst = computeDestination(candidate("/src/a.txt"), destRoot, rules);
    expect(path.basename(path.dirname(dst))).toBe("Text");
  });
});
