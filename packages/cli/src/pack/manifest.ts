/**
 * Bedrock manifests for the converted resource pack and its companion
 * (empty) behavior pack.
 */

import { randomUUID } from "node:crypto";
import type { BedrockManifest, SemverTuple } from "@soundport/schema";

const PACK_VERSION: SemverTuple = [1, 0, 0];
const MIN_ENGINE_VERSION: SemverTuple = [1, 18, 3];

export interface ManifestOptions {
  /** Resource pack description, usually taken from pack.mcmeta. */
  readonly description: string;
  /** Pack base name, shown in the resource pack title. */
  readonly packName: string;
  /** UUID source. Defaults to `crypto.randomUUID`. */
  readonly uuid?: () => string;
}

export interface PackManifests {
  readonly resource: BedrockManifest;
  readonly behavior: BedrockManifest;
}

/** Builds both manifests; the behavior pack depends on the resource pack. */
export function createManifests(options: ManifestOptions): PackManifests {
  const uuid = (): string => (options.uuid ?? randomUUID)().toLowerCase();
  const resourceUuid = uuid();
  const resourceModuleUuid = uuid();
  const behaviorUuid = uuid();
  const behaviorModuleUuid = uuid();

  const resource: BedrockManifest = {
    format_version: 2,
    header: {
      description: options.description,
      name: `Converted Java Sound Pack (${options.packName})`,
      uuid: resourceUuid,
      version: PACK_VERSION,
      min_engine_version: MIN_ENGINE_VERSION,
    },
    modules: [
      {
        description: "Resource module for sounds",
        type: "resources",
        uuid: resourceModuleUuid,
        version: PACK_VERSION,
      },
    ],
  };

  const behavior: BedrockManifest = {
    format_version: 2,
    header: {
      description: "Minimal Behavior Pack for Sound Conversion",
      name: "Converted Sound BP (Empty)",
      uuid: behaviorUuid,
      version: PACK_VERSION,
      min_engine_version: MIN_ENGINE_VERSION,
    },
    modules: [
      {
        description: "Data module (empty)",
        type: "data",
        uuid: behaviorModuleUuid,
        version: PACK_VERSION,
      },
    ],
    dependencies: [{ uuid: resourceUuid, version: PACK_VERSION }],
  };

  return { resource, behavior };
}
