import { describe, expect, it } from "vitest";
import { HEADING_SIZES, isHeadingSize, lineHeightFor, TextLayout } from "./text-layout";

const LETTER = { width: 612, height: 792, margin: 50 };

/** `count` five-letter words, each exactly 30pt wide at 12pt */
function words(count: number): string {
  return Array.from({ length: count }, () => "abcde").join(" ");
}

describe("lineHeightFor", () => {
  it("uses 1.2 for body text", () => {
    expect(lineHeightFor(12)).toBeCloseTo(14.4);
    expect(lineHeightFor(10)).toBe(12);
  });

  it("uses the heading ratios for heading sizes", () => {
    expect(lineHeightFor(HEADING_SIZES[1])).toBe(36);
    expect(lineHeightFor(HEADING_SIZES[2])).toBeCloseTo(25.2);
    expect(lineHeightFor(HEADING_SIZES[3])).toBeCloseTo(20.8);
  });

  it("recognizes heading sizes", () => {
    expect(isHeadingSize(24)).toBe(true);
    expect(isHeadingSize(18)).toBe(true);
    expect(isHeadingSize(16)).toBe(true);
    expect(isHeadingSize(12)).toBe(false);
  });
});

describe("TextLayout", () => {
  describe("starting position", () => {
    it("defaults to the top-left margin", () => {
      const [element] = new TextLayout(LETTER).layout("Hi");

      expect(element.x).toBe(50);
      expect(element.y).toBe(50);
    });

    it("places text one line below the previous Y", () => {
      const [element] = new TextLayout(LETTER).layout("Hi", undefined, undefined, {
        previousY: 100,
      });

      expect(element.y).toBeCloseTo(114.4);
    });

    it("advances by the previous line's height when given", () => {
      const [element] = new TextLayout(LETTER).layout("Hi", undefined, undefined, {
        previousY: 50,
        previousLineHeight: 36,
      });

      expect(element.y).toBe(86);
    });

    it("uses an explicit position", () => {
      const [element] = new TextLayout(LETTER).layout("Hi", 80, 200, { previousY: 100 });

      expect(element.x).toBe(80);
      expect(element.y).toBe(200);
    });
  });

  describe("wrapping", () => {
    it("returns fitting text unchanged as one element", () => {
      const text = "hello   there";
      const elements = new TextLayout(LETTER).layout(text, undefined, undefined, {
        maxWidth: 500,
      });

      expect(elements).toHaveLength(1);
      expect(elements[0].text).toBe(text);
    });

    it("returns empty and blank text as one element each", () => {
      const layout = new TextLayout(LETTER);

      expect(layout.layout("").map(e => [e.text, e.y])).toEqual([["", 50]]);
      expect(layout.layout("   ").map(e => [e.text, e.y])).toEqual([["   ", 50]]);
      expect(
        layout.layout("", undefined, undefined, { maxWidth: 100 }).map(e => e.text),
      ).toEqual([""]);
    });

    it("does not wrap without maxWidth", () => {
      const elements = new TextLayout(LETTER).layout(words(40));

      expect(elements).toHaveLength(1);
    });

    it("fills each line greedily", () => {
      // 3 words = 96.6pt, a 4th adds 33.3pt
      const elements = new TextLayout(LETTER).layout(words(7), undefined, undefined, {
        maxWidth: 100,
      });

      expect(elements.map(e => e.text)).toEqual([words(3), words(3), words(1)]);
      expect(elements.map(e => e.x)).toEqual([50, 50, 50]);
      expect(elements[0].y).toBe(50);
      expect(elements[1].y).toBeCloseTo(64.4);
      expect(elements[2].y).toBeCloseTo(78.8);
    });

    it("wraps 12 words into 3 lines at maxWidth 150", () => {
      const elements = new TextLayout(LETTER).layout(words(12), undefined, undefined, {
        maxWidth: 150,
      });

      expect(elements.map(e => e.text)).toEqual([words(4), words(4), words(4)]);
    });

    it("keeps a word wider than the budget on its own line", () => {
      const long = "abcdeabcdeabcdeabcde";
      const elements = new TextLayout(LETTER).layout(`${long} abcde`, undefined, undefined, {
        maxWidth: 100,
      });

      expect(elements.map(e => e.text)).toEqual([long, "abcde"]);
    });

    it("shrinks the first line budget by the indent", () => {
      // budget 100 - (100 - 50) = 50 fits a single word
      const elements = new TextLayout(LETTER).layout(words(4), 100, 50, { maxWidth: 100 });

      expect(elements.map(e => e.text)).toEqual([words(1), words(3)]);
    });

    it("reuses the starting X for continuation lines", () => {
      const elements = new TextLayout(LETTER).layout(words(4), 100, 50, { maxWidth: 100 });

      expect(elements.map(e => e.x)).toEqual([100, 100]);
    });

    it("uses wrapX for continuation lines", () => {
      const elements = new TextLayout(LETTER).layout(words(4), 100, 50, {
        maxWidth: 100,
        wrapX: 50,
      });

      expect(elements.map(e => e.x)).toEqual([100, 50]);
    });

    it("flushes on explicit line breaks", () => {
      const elements = new TextLayout(LETTER).layout("first\r\nsecond\nthird");

      expect(elements.map(e => e.text)).toEqual(["first", "second", "third"]);
    });

    it("advances past blank lines without an element", () => {
      const elements = new TextLayout(LETTER).layout("first\n\nthird");

      expect(elements.map(e => e.text)).toEqual(["first", "third"]);
      expect(elements[1].y).toBeCloseTo(78.8);
    });

    it("warns about an invalid maxWidth and does not wrap", () => {
      const warnings: string[] = [];
      const elements = new TextLayout(LETTER, undefined, w => warnings.push(w)).layout(
        words(40),
        undefined,
        undefined,
        { maxWidth: -5 },
      );

      expect(elements).toHaveLength(1);
      expect(warnings).toEqual(["Invalid maxWidth -5, text is not wrapped"]);
    });
  });

  describe("overflow", () => {
    it("returns the remainder as one flagged element", () => {
      // bottom limit 742: a line at 720 fits, the next at 734.4 does not
      const elements = new TextLayout(LETTER).layout(words(9), undefined, 720, {
        maxWidth: 100,
      });

      expect(elements).toHaveLength(2);
      expect(elements[0].text).toBe(words(3));
      expect(elements[0].pageBreakNeeded).toBe(false);
      expect(elements[1].text).toBe(words(6));
      expect(elements[1].pageBreakNeeded).toBe(true);
      expect(elements[1].y).toBeCloseTo(734.4);
    });

    it("keeps explicit line breaks in the remainder", () => {
      const elements = new TextLayout(LETTER).layout("one\ntwo\nthree", undefined, 720);

      expect(elements.map(e => e.text)).toEqual(["one", "two\nthree"]);
      expect(elements[1].pageBreakNeeded).toBe(true);
    });

    it("flags a single line that crosses the bottom margin", () => {
      const elements = new TextLayout(LETTER).layout("late", undefined, 730);

      expect(elements).toHaveLength(1);
      expect(elements[0].text).toBe("late");
      expect(elements[0].pageBreakNeeded).toBe(true);
    });
  });

  describe("headings", () => {
    it("never wraps heading sizes", () => {
      const elements = new TextLayout(LETTER).layout(words(20), undefined, undefined, {
        fontSize: 24,
        maxWidth: 100,
      });

      expect(elements).toHaveLength(1);
      expect(elements[0].text).toBe(words(20));
    });

    it("flags a heading that would cross the bottom margin", () => {
      const layout = new TextLayout(LETTER);

      // 700 + 36 = 736 fits, 710 + 36 = 746 does not
      expect(layout.layout("Title", undefined, 700, { fontSize: 24 })[0].pageBreakNeeded).toBe(
        false,
      );
      expect(layout.layout("Title", undefined, 710, { fontSize: 24 })[0].pageBreakNeeded).toBe(
        true,
      );
    });
  });

  it("carries styling onto every element", () => {
    const elements = new TextLayout(LETTER).layout(words(4), undefined, undefined, {
      maxWidth: 100,
      fontStyle: "italic",
      color: "#ff0000",
      opacity: 0.5,
    });

    for (const element of elements) {
      expect(element.fontStyle).toBe("italic");
      expect(element.color).toBe("FF0000");
      expect(element.opacity).toBe(0.5);
    }
  });
});
