/**
 * @soundport/schema — schemas and types for every JSON document soundport
 * reads from a Java pack or writes into a Bedrock pack.
 *
 * @packageDocumentation
 */

// Java input
export {
  javaSoundEntrySchema,
  javaSoundEventSchema,
  javaSoundsDocumentSchema,
  soundEntryReference,
} from "./java-sounds.js";
export type { JavaSoundEntry, JavaSoundEvent, JavaSoundsDocument } from "./java-sounds.js";

export { packMcmetaSchema, textComponentSchema, flattenTextComponent } from "./pack-meta.js";
export type { PackMcmeta, TextComponent, TextComponentValue } from "./pack-meta.js";

// Bedrock output
export {
  SOUND_DEFINITIONS_FORMAT_VERSION,
  SOUND_CATEGORY,
  soundDefinitionSchema,
  soundDefinitionDocumentSchema,
} from "./sound-definitions.js";
export type { SoundDefinition, SoundDefinitionDocument } from "./sound-definitions.js";

export {
  bedrockManifestSchema,
  manifestModuleSchema,
  manifestDependencySchema,
} from "./manifest.js";
export type {
  BedrockManifest,
  ManifestModule,
  ManifestDependency,
  SemverTuple,
} from "./manifest.js";
