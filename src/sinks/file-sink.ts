import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { OutputSink } from "./output-sink";

/**
 * Writes documents to `<directory>/<name>` and returns the path.
 *
 * The directory is created when missing. File system errors propagate
 * unchanged.
 */
export class FileSink implements OutputSink {
  constructor(readonly directory: string) {}

  async write(bytes: Uint8Array, name: string): Promise<string> {
    const path = join(this.directory, name);

    await mkdir(this.directory, { recursive: true });
    await writeFile(path, bytes);

    return path;
  }
}
