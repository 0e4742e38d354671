import type { OutputSink } from "./output-sink";

/**
 * A document held by a MemorySink.
 */
export interface StoredBlob {
  readonly name: string;
  readonly bytes: Uint8Array;
}

/**
 * Keeps written documents in memory under ids "blob-1", "blob-2", …
 */
export class MemorySink implements OutputSink {
  private readonly blobs = new Map<string, StoredBlob>();
  private counter = 0;

  async write(bytes: Uint8Array, name: string): Promise<string> {
    const id = `blob-${++this.counter}`;

    this.blobs.set(id, { name, bytes: bytes.slice() });

    return id;
  }

  get(id: string): StoredBlob | undefined {
    return this.blobs.get(id);
  }

  get size(): number {
    return this.blobs.size;
  }
}
