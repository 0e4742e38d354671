import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileSink } from "./file-sink";
import { MemorySink } from "./memory-sink";

describe("MemorySink", () => {
  it("returns sequential ids", async () => {
    const sink = new MemorySink();

    expect(await sink.write(new Uint8Array([1]), "a.pdf")).toBe("blob-1");
    expect(await sink.write(new Uint8Array([2]), "b.pdf")).toBe("blob-2");
    expect(sink.size).toBe(2);
  });

  it("keeps a copy of the bytes", async () => {
    const sink = new MemorySink();
    const bytes = new Uint8Array([1, 2, 3]);
    const id = await sink.write(bytes, "doc.pdf");

    bytes[0] = 9;

    expect(sink.get(id)).toEqual({ name: "doc.pdf", bytes: new Uint8Array([1, 2, 3]) });
  });
});

describe("FileSink", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "sink-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the file and returns its path", async () => {
    const sink = new FileSink(join(dir, "out"));
    const path = await sink.write(new Uint8Array([0x25, 0x50]), "doc.pdf");

    expect(path).toBe(join(dir, "out", "doc.pdf"));
    expect(new Uint8Array(await readFile(path))).toEqual(new Uint8Array([0x25, 0x50]));
  });

  it("propagates file system errors", async () => {
    // A regular file where the directory should be
    const blocker = join(dir, "blocker");

    await writeFile(blocker, "x");

    await expect(new FileSink(blocker).write(new Uint8Array(1), "doc.pdf")).rejects.toThrow();
  });
});
