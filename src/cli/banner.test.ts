import { describe, expect, it } from "vitest";
import { formatCliBannerLine } from "./banner.js";

describe("formatCliBannerLine", () => {
  it("fits on one line when the terminal is wide enough", () => {
    expect(formatCliBannerLine("1.2.3", { columns: 120 })).toBe(
      "tidyfs 1.2.3 - rule-based file organizer with dry-run and undo",
    );
  });

  it("wraps the tagline on narrow terminals", () => {
    expect(formatCliBannerLine("1.2.3", { columns: 20 })).toBe(
      "tidyfs 1.2.3\n  rule-based file organizer with dry-run and undo",
    );
  });
});
