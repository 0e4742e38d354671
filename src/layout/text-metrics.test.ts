import { describe, expect, it } from "vitest";
import { DEFAULT_GLYPH_MODEL, TextMetrics } from "./text-metrics";

describe("TextMetrics", () => {
  const metrics = new TextMetrics();

  describe("charWeight", () => {
    it("weights ordinary characters 1", () => {
      expect(metrics.charWeight("a")).toBe(1);
      expect(metrics.charWeight("Z")).toBe(1);
    });

    it("weights narrow characters 0.55", () => {
      for (const char of " iIljtfr.,;:'!|") {
        expect(metrics.charWeight(char)).toBe(0.55);
      }
    });

    it("weights wide characters 1.45", () => {
      for (const char of "mwMW@%") {
        expect(metrics.charWeight(char)).toBe(1.45);
      }
    });
  });

  describe("estimateWidth", () => {
    it("is 6pt per ordinary character at 12pt", () => {
      expect(metrics.estimateWidth("abcde", 12)).toBe(30);
    });

    it("scales with font size", () => {
      expect(metrics.estimateWidth("abcde", 24)).toBe(60);
      expect(metrics.estimateWidth("abcde", 6)).toBe(15);
    });

    it("mixes character classes", () => {
      // H e l l o = 1 + 1 + 0.55 + 0.55 + 1
      expect(metrics.estimateWidth("Hello", 12)).toBeCloseTo(24.6);
      expect(metrics.estimateWidth("mm", 12)).toBeCloseTo(17.4);
    });

    it("applies the bold and italic factors", () => {
      expect(metrics.estimateWidth("abcde", 12, "bold")).toBeCloseTo(33);
      expect(metrics.estimateWidth("abcde", 12, "italic")).toBeCloseTo(32.4);
      expect(metrics.estimateWidth("abcde", 12, "bold-italic")).toBeCloseTo(35.64);
    });

    it("is 0 for empty text", () => {
      expect(metrics.estimateWidth("", 12)).toBe(0);
    });
  });

  it("accepts a custom model", () => {
    const wide = new TextMetrics({ ...DEFAULT_GLYPH_MODEL, baseWidth: 10 });

    expect(wide.estimateWidth("ab", 12)).toBe(20);
  });
});
