import { describe, expect, it, vi } from "vitest";
import { embedImage } from "#src/images/image-pipeline";
import { PDFResources } from "./pdf-resources";

const image = embedImage(new Uint8Array([0]), "jpeg");

describe("PDFResources", () => {
  describe("graphicsStateFor", () => {
    it("shares one state per rounded opacity", () => {
      const resources = new PDFResources();

      expect(resources.graphicsStateFor(0.5)).toBe("GS1");
      expect(resources.graphicsStateFor(0.501)).toBe("GS1");
      expect(resources.graphicsStateFor(0.25)).toBe("GS2");
      expect([...resources.graphicsStates]).toEqual([
        ["GS1", 0.5],
        ["GS2", 0.25],
      ]);
    });
  });

  describe("uniqueImageId", () => {
    it("numbers images without an id", () => {
      const resources = new PDFResources();

      expect(resources.uniqueImageId(undefined)).toBe("Im1");

      resources.addImage({ id: "Im1", image, width: 1, height: 1 });

      expect(resources.uniqueImageId("")).toBe("Im2");
    });

    it("replaces characters a resource name cannot hold", () => {
      const onWarning = vi.fn();

      expect(new PDFResources().uniqueImageId("my logo", onWarning)).toBe("my_logo");
      expect(onWarning).toHaveBeenCalledWith(
        'Image id "my logo" contains invalid characters, using "my_logo"',
      );
    });

    it("suffixes taken ids", () => {
      const resources = new PDFResources();
      const onWarning = vi.fn();

      resources.addImage({ id: "logo", image, width: 1, height: 1 });
      resources.addImage({ id: "logo-2", image, width: 1, height: 1 });

      expect(resources.uniqueImageId("logo", onWarning)).toBe("logo-3");
      expect(onWarning).toHaveBeenCalledWith('Duplicate image id "logo", using "logo-3"');
    });
  });

  it("refuses to register an id twice", () => {
    const resources = new PDFResources();

    resources.addImage({ id: "a", image, width: 1, height: 1 });

    expect(() => resources.addImage({ id: "a", image, width: 2, height: 2 })).toThrow(
      'Image id "a" is already registered',
    );
    expect(resources.images).toHaveLength(1);
  });
});
