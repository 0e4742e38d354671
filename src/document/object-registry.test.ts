import { describe, expect, it } from "vitest";
import { PdfNumber } from "#src/objects/pdf-number";
import { PdfRef } from "#src/objects/pdf-ref";
import { ObjectRegistry } from "./object-registry";

describe("ObjectRegistry", () => {
  it("numbers objects from 1", () => {
    const registry = new ObjectRegistry();
    const first = registry.register(PdfNumber.of(10));
    const second = registry.register(PdfNumber.of(20));

    expect(first.objectNumber).toBe(1);
    expect(second.objectNumber).toBe(2);
    expect(registry.size).toBe(2);
    expect(registry.nextObjectNumber).toBe(3);
    expect(registry.getObject(second)).toEqual(PdfNumber.of(20));
  });

  it("fills pre-allocated refs and yields in number order", () => {
    const registry = new ObjectRegistry();
    const early = registry.allocateRef();
    const late = registry.register(PdfNumber.of(2));

    registry.registerAt(early, PdfNumber.of(1));

    expect([...registry.entries()].map(([ref]) => ref.objectNumber)).toEqual([1, 2]);
    expect(late.objectNumber).toBe(2);
  });

  it("rejects refs it never allocated or already filled", () => {
    const registry = new ObjectRegistry();
    const ref = registry.register(PdfNumber.of(1));

    expect(() => registry.registerAt(PdfRef.of(7), PdfNumber.of(0))).toThrow(
      "Object 7 was not allocated",
    );
    expect(() => registry.registerAt(ref, PdfNumber.of(0))).toThrow(
      "Object 1 is already registered",
    );
  });

  it("refuses to enumerate while a ref is still empty", () => {
    const registry = new ObjectRegistry();

    registry.allocateRef();

    expect(() => [...registry.entries()]).toThrow("Object 1 was allocated but never registered");
    expect(registry.getObject(PdfRef.of(1))).toBeNull();
  });
});
