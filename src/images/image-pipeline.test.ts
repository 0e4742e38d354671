import { describe, expect, it } from "vitest";
import { ByteWriter } from "#src/io/byte-writer";
import {
  buildImageXObject,
  embedImage,
  normalizeImageFormat,
  selectFilterChain,
} from "./image-pipeline";

const JPEG_BYTES = new Uint8Array([0xff, 0xd8, 0x01]);

describe("normalizeImageFormat", () => {
  it("maps JPG, JPEG and empty tags to JPEG", () => {
    expect(normalizeImageFormat("jpg")).toBe("JPEG");
    expect(normalizeImageFormat(" Jpeg ")).toBe("JPEG");
    expect(normalizeImageFormat("")).toBe("JPEG");
    expect(normalizeImageFormat(undefined)).toBe("JPEG");
  });

  it("recognizes PNG", () => {
    expect(normalizeImageFormat("png")).toBe("PNG");
  });

  it("returns unknown tags unchanged with a warning", () => {
    const warnings: string[] = [];

    expect(normalizeImageFormat(" Gif ", w => warnings.push(w))).toBe(" Gif ");
    expect(warnings).toEqual(['Unrecognized image format " Gif ", embedding as JPEG']);
  });
});

describe("selectFilterChain", () => {
  it("uses DCTDecode for JPEG and unknown formats", () => {
    expect(selectFilterChain("JPEG")).toEqual(["ASCIIHexDecode", "DCTDecode"]);
    expect(selectFilterChain("gif")).toEqual(["ASCIIHexDecode", "DCTDecode"]);
  });

  it("uses FlateDecode for PNG", () => {
    expect(selectFilterChain("PNG")).toEqual(["ASCIIHexDecode", "FlateDecode"]);
  });
});

describe("embedImage", () => {
  it("hex-encodes the payload with a terminator", () => {
    const image = embedImage(JPEG_BYTES, "jpg");

    expect(new TextDecoder().decode(image.hexPayload)).toBe("FFD801>");
    expect(image.byteLength).toBe(7);
    expect(image.normalizedFormat).toBe("JPEG");
    expect(image.colorSpace).toBe("DeviceRGB");
  });

  it("encodes empty data as just the terminator", () => {
    const image = embedImage(new Uint8Array(0), "png");

    expect(new TextDecoder().decode(image.hexPayload)).toBe(">");
    expect(image.byteLength).toBe(1);
    expect(image.filterChain).toEqual(["ASCIIHexDecode", "FlateDecode"]);
  });
});

describe("buildImageXObject", () => {
  it("describes the image with the placement box", () => {
    const stream = buildImageXObject(embedImage(JPEG_BYTES, "JPEG"), 100, 50);
    const writer = new ByteWriter();

    stream.toBytes(writer);

    expect(new TextDecoder().decode(writer.toBytes())).toBe(
      [
        "<<",
        "/Length 7",
        "/Type /XObject",
        "/Subtype /Image",
        "/Width 100",
        "/Height 50",
        "/ColorSpace /DeviceRGB",
        "/BitsPerComponent 8",
        "/Filter [/ASCIIHexDecode /DCTDecode]",
        ">>",
        "stream",
        "FFD801>",
        "endstream",
      ].join("\n"),
    );
  });
});
