import { describe, it, expect } from "vitest";
import { stripAnsi } from "../ansi.js";
import { THRESHOLDS, barFill, colorTier, renderBar, renderSparkline, sparkLevel, sparkline } from "./widgets.js";

describe("barFill", () => {
  it("fills proportionally, rounding down", () => {
    expect(barFill(65, 40)).toBe(26);
    expect(barFill(100, 40)).toBe(40);
    expect(barFill(0, 40)).toBe(0);
  });

  it("is monotonic and bounded", () => {
    let previous = 0;
    for (let percent = -10; percent <= 110; percent += 0.5) {
      const filled = barFill(percent, 40);
      expect(filled).toBeGreaterThanOrEqual(previous);
      expect(filled).toBeGreaterThanOrEqual(0);
      expect(filled).toBeLessThanOrEqual(40);
      previous = filled;
    }
  });

  it("draws nothing for an unknown reading", () => {
    expect(barFill(null, 40)).toBe(0);
    expect(barFill(Number.NaN, 40)).toBe(0);
  });
});

describe("renderBar", () => {
  it("draws filled and empty cells to the full width", () => {
    expect(stripAnsi(renderBar(65, 40, THRESHOLDS.utilization))).toBe("█".repeat(26) + "░".repeat(14));
  });
});

describe("colorTier", () => {
  it("switches tiers strictly above each threshold", () => {
    expect(colorTier(50, THRESHOLDS.utilization)).toBe("low");
    expect(colorTier(51, THRESHOLDS.utilization)).toBe("medium");
    expect(colorTier(80, THRESHOLDS.utilization)).toBe("medium");
    expect(colorTier(81, THRESHOLDS.utilization)).toBe("high");
  });

  it("uses the temperature thresholds", () => {
    expect(colorTier(65, THRESHOLDS.temperature)).toBe("low");
    expect(colorTier(72, THRESHOLDS.temperature)).toBe("medium");
    expect(colorTier(85, THRESHOLDS.temperature)).toBe("high");
  });

  it("marks unknown readings", () => {
    expect(colorTier(null, THRESHOLDS.memory)).toBe("unknown");
  });
});

describe("sparkLevel", () => {
  it("maps the window minimum to the lowest level and the maximum to the highest", () => {
    expect(sparkLevel(10, 10, 90)).toBe(0);
    expect(sparkLevel(90, 10, 90)).toBe(7);
  });

  it("maps every sample of a flat window to the lowest level", () => {
    expect(sparkLevel(42, 42, 42)).toBe(0);
  });
});

describe("sparkline", () => {
  it("spans every glyph across an increasing series", () => {
    expect(sparkline([1, 2, 3, 4, 5, 6, 7, 8], 8)).toBe("▁▂▃▄▅▆▇█");
  });

  it("draws a flat series at the lowest glyph", () => {
    expect(sparkline([5, 5, 5], 10)).toBe("▁▁▁");
  });

  it("shows the newest samples scaled over the whole window", () => {
    expect(sparkline([0, 10, 5], 2)).toBe("█▅");
  });

  it("is empty without samples", () => {
    expect(sparkline([], 10)).toBe("");
  });
});

describe("renderSparkline", () => {
  it("colors glyphs without changing them", () => {
    const values = [10, 60, 90, 30];
    expect(stripAnsi(renderSparkline(values, 4, THRESHOLDS.utilization))).toBe(sparkline(values, 4));
    expect(stripAnsi(renderSparkline(values, 4))).toBe(sparkline(values, 4));
  });
});
