import { describe, expect, it } from "vitest";
import { decodeLatin1 } from "#src/helpers/strings";
import { ByteWriter } from "#src/io/byte-writer";
import { PdfArray } from "./pdf-array";
import { PdfDict } from "./pdf-dict";
import { PdfName } from "./pdf-name";
import { PdfNumber } from "./pdf-number";
import type { PdfObject } from "./pdf-object";
import { PdfRef } from "./pdf-ref";
import { PdfStream } from "./pdf-stream";
import { PdfString } from "./pdf-string";

function serialize(obj: PdfObject): string {
  const writer = new ByteWriter();

  obj.toBytes(writer);

  return decodeLatin1(writer.toBytes());
}

describe("PdfNumber", () => {
  it("writes integers without a decimal point", () => {
    expect(serialize(PdfNumber.of(612))).toBe("612");
  });

  it("writes reals with trailing zeros stripped", () => {
    expect(serialize(PdfNumber.of(0.1 + 0.2))).toBe("0.3");
    expect(serialize(PdfNumber.of(-0.000001))).toBe("0");
  });

  it("rejects values PDF cannot express", () => {
    expect(() => PdfNumber.of(Number.NaN)).toThrow(RangeError);
    expect(() => PdfNumber.of(Number.POSITIVE_INFINITY)).toThrow(RangeError);
  });
});

describe("PdfName", () => {
  it("is interned", () => {
    expect(PdfName.of("Font")).toBe(PdfName.of("Font"));
    expect(PdfName.Font).toBe(PdfName.of("Font"));
  });

  it("escapes whitespace and delimiters", () => {
    expect(serialize(PdfName.of("F1"))).toBe("/F1");
    expect(serialize(PdfName.of("A B"))).toBe("/A#20B");
    expect(serialize(PdfName.of("x(y)"))).toBe("/x#28y#29");
  });
});

describe("PdfString", () => {
  it("escapes parentheses in literal strings", () => {
    expect(serialize(PdfString.fromString("a(b)"))).toBe("(a\\(b\\))");
  });

  it("writes hex strings", () => {
    expect(serialize(new PdfString(new Uint8Array([0x48, 0x69]), "hex"))).toBe("<4869>");
  });
});

describe("PdfRef", () => {
  it("is interned and written as an indirect reference", () => {
    expect(PdfRef.of(3)).toBe(PdfRef.of(3));
    expect(serialize(PdfRef.of(3))).toBe("3 0 R");
  });
});

describe("PdfArray", () => {
  it("separates items with single spaces", () => {
    expect(serialize(PdfArray.of(PdfNumber.of(1), PdfNumber.of(2.5), PdfName.Page))).toBe(
      "[1 2.5 /Page]",
    );
    expect(serialize(new PdfArray())).toBe("[]");
  });
});

describe("PdfDict", () => {
  it("writes one entry per line in insertion order", () => {
    const dict = PdfDict.of({ Type: PdfName.Page, Count: PdfNumber.of(3) });

    expect(serialize(dict)).toBe("<<\n/Type /Page\n/Count 3\n>>");
  });

  it("keeps the original position when a key is replaced", () => {
    const dict = new PdfDict();

    dict.set("A", PdfNumber.of(1));
    dict.set("B", PdfNumber.of(2));
    dict.set("A", PdfNumber.of(3));

    expect(dict.size).toBe(2);
    expect(dict.has("B")).toBe(true);
    expect(serialize(dict)).toBe("<<\n/A 3\n/B 2\n>>");
  });

  it("nests dictionaries", () => {
    const dict = PdfDict.of({ Font: PdfDict.of({ F1: PdfRef.of(5) }) });

    expect(serialize(dict)).toBe("<<\n/Font <<\n/F1 5 0 R\n>>\n>>");
  });
});

describe("PdfStream", () => {
  it("writes /Length from the data ahead of the other entries", () => {
    const stream = new PdfStream(
      [
        ["Filter", PdfName.FlateDecode],
        ["Length", PdfNumber.of(99)],
      ],
      new Uint8Array([0x61, 0x62, 0x63]),
    );

    expect(serialize(stream)).toBe(
      "<<\n/Length 3\n/Filter /FlateDecode\n>>\nstream\nabc\nendstream",
    );
  });

  it("writes an empty stream", () => {
    expect(serialize(new PdfStream())).toBe("<<\n/Length 0\n>>\nstream\n\nendstream");
  });
});
