/**
 * Definition collector — groups (event key, asset path) pairs into a
 * Bedrock sound definition document.
 */

import { SOUND_CATEGORY, SOUND_DEFINITIONS_FORMAT_VERSION } from "@soundport/schema";
import type { SoundDefinition, SoundDefinitionDocument } from "@soundport/schema";
import { ConversionError } from "../errors.js";

/**
 * Accumulates pairs with set semantics per key.
 *
 * Insertion happens on the event loop thread only, so concurrent resolver
 * tasks can add without further coordination.
 */
export class DefinitionCollector {
  private readonly groups = new Map<string, Set<string>>();

  /** Records one pair. Adding the same pair twice has no effect. */
  add(eventKey: string, assetPath: string): void {
    let paths = this.groups.get(eventKey);
    if (!paths) {
      paths = new Set();
      this.groups.set(eventKey, paths);
    }
    paths.add(assetPath);
  }

  /** Number of distinct event keys. */
  get size(): number {
    return this.groups.size;
  }

  /**
   * Emits the document, keys and paths sorted.
   *
   * @throws ConversionError (`no_sounds`) when nothing was collected
   */
  build(): SoundDefinitionDocument {
    if (this.groups.size === 0) {
      throw new ConversionError(
        "No sound files were successfully processed. Check file names and paths in the input pack.",
        "no_sounds",
      );
    }

    const definitions: Record<string, SoundDefinition> = {};
    for (const key of [...this.groups.keys()].sort()) {
      const paths = this.groups.get(key) ?? new Set<string>();
      definitions[key] = { category: SOUND_CATEGORY, sounds: [...paths].sort() };
    }

    return {
      format_version: SOUND_DEFINITIONS_FORMAT_VERSION,
      sound_definitions: definitions,
    };
  }
}

/** One-shot aggregation of a finished pair sequence. */
export function aggregateDefinitions(
  pairs: Iterable<readonly [eventKey: string, assetPath: string]>,
): SoundDefinitionDocument {
  const collector = new DefinitionCollector();
  for (const [key, path] of pairs) collector.add(key, path);
  return collector.build();
}
