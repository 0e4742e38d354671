import { deflate } from "pako";
import { describe, expect, it } from "vitest";
import { ASCIIHexFilter } from "./ascii-hex-filter";
import { FilterPipeline } from "./filter-pipeline";

const ascii = (text: string) => new TextEncoder().encode(text);
const text = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

describe("ASCIIHexFilter", () => {
  const filter = new ASCIIHexFilter();

  it("encodes uppercase hex with an end marker", () => {
    expect(text(filter.encode(ascii("Hello")))).toBe("48656C6C6F>");
  });

  it("encodes empty data as the end marker alone", () => {
    expect(text(filter.encode(new Uint8Array(0)))).toBe(">");
  });
});

describe("FilterPipeline", () => {
  it("registers the built-in filters", () => {
    expect(FilterPipeline.hasFilter("ASCIIHexDecode")).toBe(true);
    expect(FilterPipeline.hasFilter("FlateDecode")).toBe(true);
    expect(FilterPipeline.hasFilter("DCTDecode")).toBe(false);
  });

  it("passes data through an empty chain", () => {
    const data = new Uint8Array([1, 2, 3]);

    expect(FilterPipeline.encode(data, [])).toEqual(data);
  });

  it("applies the last filter of the chain first when encoding", () => {
    const data = ascii("stream content stream content");
    const encoded = FilterPipeline.encode(data, ["ASCIIHexDecode", "FlateDecode"]);

    expect(encoded).toEqual(new ASCIIHexFilter().encode(deflate(data)));
  });

  it("rejects a filter without an implementation", () => {
    expect(() => FilterPipeline.encode(new Uint8Array(1), ["DCTDecode"])).toThrow(
      "Unknown filter: DCTDecode",
    );
  });
});
