/** biome-ignore-all lint/complexity/noStaticOnlyClass: utility class */

import { ASCIIHexFilter } from "./ascii-hex-filter";
import type { Filter, FilterName } from "./filter";
import { FlateFilter } from "./flate-filter";

/**
 * Registry and executor for stream filters.
 *
 * A /Filter array lists decode steps in the order a reader applies them, so
 * encoding walks the chain in reverse.
 *
 * @example
 * ```typescript
 * // Data a reader decodes with [/ASCIIHexDecode /FlateDecode]
 * const encoded = FilterPipeline.encode(data, ["ASCIIHexDecode", "FlateDecode"]);
 * ```
 */
export class FilterPipeline {
  private static filters = new Map<string, Filter>();

  static register(filter: Filter): void {
    FilterPipeline.filters.set(filter.name, filter);
  }

  static hasFilter(name: string): boolean {
    return FilterPipeline.filters.has(name);
  }

  /**
   * Encode data so that decoding with `chain` (in order) yields `data`.
   *
   * @throws {Error} if a filter in the chain has no implementation
   */
  static encode(data: Uint8Array, chain: readonly FilterName[]): Uint8Array {
    let result = data;

    for (const name of [...chain].reverse()) {
      result = FilterPipeline.require(name).encode(result);
    }

    return result;
  }

  private static require(name: FilterName): Filter {
    const filter = FilterPipeline.filters.get(name);

    if (!filter) {
      throw new Error(`Unknown filter: ${name}`);
    }

    return filter;
  }
}

FilterPipeline.register(new ASCIIHexFilter());
FilterPipeline.register(new FlateFilter());
