import { describe, expect, it } from "vitest";
import { flipY } from "./coordinates";

describe("flipY", () => {
  it("maps the top of the page to the page height", () => {
    expect(flipY(0, 0, 792)).toBe(792);
  });

  it("maps the bottom of the page to 0", () => {
    expect(flipY(792, 0, 792)).toBe(0);
  });

  it("returns the bottom edge of an object with height", () => {
    expect(flipY(100, 12, 792)).toBe(680);
    expect(flipY(20, 40, 792)).toBe(732);
  });
});
