/**
 * Destination for finished documents.
 *
 * Storage and access control live behind this interface; the document only
 * hands over bytes and a name and keeps whatever identifier comes back.
 */
export interface OutputSink {
  /**
   * Store `bytes` under `name`.
   *
   * @returns An identifier for the stored document
   */
  write(bytes: Uint8Array, name: string): Promise<string>;
}
