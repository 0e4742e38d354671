import { describe, expect, it } from "vitest";
import { STANDARD_FONTS } from "#src/fonts/standard-fonts";
import { TextMetrics } from "#src/layout/text-metrics";
import { clampOpacity, normalizeRotation, TextElement } from "./text-element";
import type { RenderContext } from "./types";

function context(opacities: number[] = []): RenderContext {
  return {
    pageHeight: 792,
    fonts: STANDARD_FONTS,
    metrics: new TextMetrics(),
    graphicsStateFor(opacity) {
      opacities.push(opacity);

      return "GS1";
    },
  };
}

describe("normalizeRotation", () => {
  it("wraps into [0, 360)", () => {
    expect(normalizeRotation(45)).toBe(45);
    expect(normalizeRotation(360)).toBe(0);
    expect(normalizeRotation(-90)).toBe(270);
    expect(normalizeRotation(810)).toBe(90);
  });

  it("maps non-finite angles to 0", () => {
    expect(normalizeRotation(Number.NaN)).toBe(0);
    expect(normalizeRotation(Number.POSITIVE_INFINITY)).toBe(0);
  });
});

describe("clampOpacity", () => {
  it("clamps into [0, 1]", () => {
    expect(clampOpacity(0.3)).toBe(0.3);
    expect(clampOpacity(2)).toBe(1);
    expect(clampOpacity(-1)).toBe(0);
    expect(clampOpacity(Number.NaN)).toBe(1);
  });
});

describe("TextElement", () => {
  describe("create", () => {
    it("applies defaults", () => {
      const el = TextElement.create({ text: "Hi", x: 1, y: 2 });

      expect(el.fontSize).toBe(12);
      expect(el.fontStyle).toBe("normal");
      expect(el.fontFamily).toBe("helvetica");
      expect(el.color).toBe("000000");
      expect(el.rotation).toBe(0);
      expect(el.scaleX).toBe(1);
      expect(el.scaleY).toBe(1);
      expect(el.opacity).toBe(1);
      expect(el.strikethrough).toBe(false);
      expect(el.pageBreakNeeded).toBe(false);
    });

    it("falls back to black for an invalid color", () => {
      const warnings: string[] = [];
      const el = TextElement.create({ text: "Hi", x: 0, y: 0, color: "red" }, w =>
        warnings.push(w),
      );

      expect(el.color).toBe("000000");
      expect(warnings).toEqual(['Invalid color "red", using black']);
    });

    it("falls back to helvetica for an unsupported font", () => {
      const warnings: string[] = [];
      const el = TextElement.create({ text: "Hi", x: 0, y: 0, fontFamily: "Comic Sans" }, w =>
        warnings.push(w),
      );

      expect(el.fontFamily).toBe("helvetica");
      expect(warnings).toEqual(['Unsupported font "Comic Sans", using helvetica']);
    });

    it("accepts family names with spaces and capitals", () => {
      const el = TextElement.create({ text: "Hi", x: 0, y: 0, fontFamily: "Times New Roman" });

      expect(el.fontFamily).toBe("times-new-roman");
    });

    it("replaces a non-positive scale with 1", () => {
      const warnings: string[] = [];
      const el = TextElement.create({ text: "Hi", x: 0, y: 0, scaleX: 0, scaleY: 2 }, w =>
        warnings.push(w),
      );

      expect(el.scaleX).toBe(1);
      expect(el.scaleY).toBe(2);
      expect(warnings).toEqual(["Invalid scale 0, using 1"]);
    });
  });

  describe("builders", () => {
    it("return new elements and leave the original untouched", () => {
      const el = TextElement.create({ text: "Hi", x: 0, y: 0 });
      const changed = el.withRotation(-45).withOpacity(3).withColor("00ff00").withScale(2);

      expect(changed.rotation).toBe(315);
      expect(changed.opacity).toBe(1);
      expect(changed.color).toBe("00FF00");
      expect(changed.scaleX).toBe(2);
      expect(changed.scaleY).toBe(2);
      expect(el.rotation).toBe(0);
      expect(el.color).toBe("000000");
    });
  });

  describe("toOperators", () => {
    it("positions plain text with the text matrix", () => {
      const el = TextElement.create({ text: "Hi", x: 50, y: 100 });

      expect(el.toOperators(context())).toEqual([
        "q",
        "0.000 0.000 0.000 rg",
        "BT",
        "/F1 12 Tf",
        "1 0 0 1 50 680 Tm",
        "(Hi) Tj",
        "ET",
        "Q",
      ]);
    });

    it("selects the font slot by family and style", () => {
      const el = TextElement.create({
        text: "Hi",
        x: 50,
        y: 100,
        fontFamily: "times",
        fontStyle: "bold",
      });

      expect(el.toOperators(context())).toContain("/F6 12 Tf");
    });

    it("writes the fill color", () => {
      const el = TextElement.create({ text: "Hi", x: 50, y: 100, color: "FF8000" });

      expect(el.toOperators(context())[1]).toBe("1.000 0.502 0.000 rg");
    });

    it("escapes literal string delimiters", () => {
      const el = TextElement.create({ text: "a(b)", x: 50, y: 100 });

      expect(el.toOperators(context())).toContain("(a\\(b\\)) Tj");
    });

    it("applies an ExtGState for partial opacity", () => {
      const opacities: number[] = [];
      const el = TextElement.create({ text: "Hi", x: 50, y: 100, opacity: 0.5 });
      const ops = el.toOperators(context(opacities));

      expect(ops[1]).toBe("/GS1 gs");
      expect(opacities).toEqual([0.5]);
    });

    it("moves the origin with cm when rotated", () => {
      const el = TextElement.create({ text: "Hi", x: 50, y: 100, rotation: 90 });
      const ops = el.toOperators(context());

      expect(ops[1]).toBe("0 1 -1 0 50 680 cm");
      expect(ops).toContain("1 0 0 1 0 0 Tm");
    });

    it("draws a strike line across the estimated width", () => {
      const el = TextElement.create({ text: "abcde", x: 50, y: 100, strikethrough: true });
      const ops = el.toOperators(context());

      expect(ops.slice(ops.indexOf("ET") + 1)).toEqual([
        "0.000 0.000 0.000 RG",
        "0.6 w",
        "50 683.6 m",
        "80 683.6 l",
        "S",
        "Q",
      ]);
    });
  });
});
