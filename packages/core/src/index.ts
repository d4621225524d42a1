/**
 * @soundport/core — sound-event resolution and definition aggregation.
 *
 * Turns the `sounds.json` declarations of a Java resource pack into
 * Bedrock sound events and a `sound_definitions.json` document.
 *
 * @packageDocumentation
 */

// Types
export { VANILLA_NAMESPACE, silentLogger } from "./types.js";
export type {
  SoundDeclaration,
  ResolvedAsset,
  ResolveResult,
  ResolveFailureReason,
  BedrockSoundEvent,
  Transcoder,
  ConversionLogger,
} from "./types.js";

// Errors
export { ConversionError, isConversionError, hasErrorCode, describeError } from "./errors.js";
export type { ConversionErrorCode } from "./errors.js";

// Scanner
export { scanDeclarations, namespaceFromLocation, DECLARATIONS_FILE } from "./scanner/declaration-scanner.js";

// Resolver
export {
  resolveAsset,
  isSafeRelativePath,
  splitReference,
  stripNamespacePrefix,
  candidateBasePaths,
  statProbe,
  AUDIO_EXTENSIONS,
} from "./resolver/asset-resolver.js";
export type { FileProbe } from "./resolver/asset-resolver.js";

// Suffix policy
export {
  needsNamespaceSuffix,
  applyNamespaceSuffix,
  pathDepth,
  NAMESPACE_SUFFIX,
  SUFFIX_DEPTH_THRESHOLD,
} from "./policy/namespace-suffix.js";

// Key and path
export { buildSoundEvent, bedrockEventKey, outputAssetPath, OUTPUT_EXTENSION } from "./builder/key-path.js";

// Aggregation
export { DefinitionCollector, aggregateDefinitions } from "./aggregate/definition-collector.js";

// Dispatch
export { JobPool, defaultConcurrency } from "./dispatch/job-pool.js";

// Pipeline
export { convertSounds, describeResolveFailure } from "./pipeline/convert-sounds.js";
export type { ConvertSoundsOptions, ConversionResult } from "./pipeline/convert-sounds.js";
