/**
 * Tests for source diagnostics rendering
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { COLORS, color, colorsEnabled, renderSourceLocation } from "../src/index.js";

describe("colors", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should be disabled by NO_COLOR", () => {
    vi.stubEnv("NO_COLOR", "1");
    expect(colorsEnabled()).toBe(false);
    expect(color("plain", "red")).toBe("plain");
  });

  it("should be disabled by GRAMMARKIT_NO_COLOR", () => {
    vi.stubEnv("NO_COLOR", "");
    vi.stubEnv("GRAMMARKIT_NO_COLOR", "1");
    expect(colorsEnabled()).toBe(false);
  });

  it("should be disabled by FORCE_COLOR=0", () => {
    vi.stubEnv("NO_COLOR", "");
    vi.stubEnv("GRAMMARKIT_NO_COLOR", "");
    vi.stubEnv("FORCE_COLOR", "0");
    expect(colorsEnabled()).toBe(false);
  });

  it("should wrap text in escape codes when enabled", () => {
    vi.stubEnv("NO_COLOR", "");
    vi.stubEnv("GRAMMARKIT_NO_COLOR", "");
    vi.stubEnv("FORCE_COLOR", "1");
    expect(color("hot", "bold", "red")).toBe(`${COLORS.bold}${COLORS.red}hot${COLORS.reset}`);
  });
});

describe("renderSourceLocation", () => {
  const source = "x = 1\ny = @\nz = 3";

  it("should show the reported line with a caret under the column", () => {
    const out = renderSourceLocation(source, 2, 5, "unexpected '@'", { colors: false });
    expect(out.split("\n")).toEqual([
      "error: unexpected '@'",
      "  --> <input>:2:5",
      "     |",
      "   1 | x = 1",
      "   2 | y = @",
      "     |     ^",
      "   3 | z = 3",
      "     |",
    ]);
  });

  it("should honor contextLines, fileName and severity", () => {
    const out = renderSourceLocation(source, 3, 1, "check this", {
      colors: false,
      contextLines: 0,
      fileName: "demo.lang",
      severity: "warning",
    });
    expect(out.split("\n")).toEqual([
      "warning: check this",
      "  --> demo.lang:3:1",
      "     |",
      "   3 | z = 3",
      "     | ^",
      "     |",
    ]);
  });

  it("should color the caret when colors are on", () => {
    const out = renderSourceLocation("ab", 1, 2, "here", { colors: true });
    expect(out).toContain(`${COLORS.red} ^${COLORS.reset}`);
  });
});
