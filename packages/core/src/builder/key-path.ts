/**
 * Builds the Bedrock event key and output asset path for a resolved
 * declaration.
 *
 * The key uses the (possibly suffixed) event namespace while the asset path
 * keeps the unsuffixed origin namespace, so several event namespaces can
 * share one physical tree.
 */

import { join } from "node:path";
import { applyNamespaceSuffix, needsNamespaceSuffix } from "../policy/namespace-suffix.js";
import type { BedrockSoundEvent, ResolvedAsset, SoundDeclaration } from "../types.js";

/** Extension of every transcoded file. */
export const OUTPUT_EXTENSION = ".ogg";

/** `<namespace>:<eventKey>`. The event key is not sanitized. */
export function bedrockEventKey(namespace: string, eventKey: string): string {
  return `${namespace}:${eventKey}`;
}

/** `sounds/<originNamespace>/sounds/<relativePath>`, relative to the resource pack root. */
export function outputAssetPath(originNamespace: string, relativePath: string): string {
  return `sounds/${originNamespace}/sounds/${relativePath}`;
}

/**
 * Combines a declaration and its resolved asset into a BedrockSoundEvent.
 *
 * @param resourcePackRoot - Directory the `.ogg` output is written under
 */
export function buildSoundEvent(
  declaration: SoundDeclaration,
  asset: ResolvedAsset,
  resourcePackRoot: string,
): BedrockSoundEvent {
  const { originNamespace } = declaration;
  const namespace = needsNamespaceSuffix(originNamespace, asset.relativePath, asset.fromVanillaTree)
    ? applyNamespaceSuffix(originNamespace)
    : originNamespace;
  const assetPath = outputAssetPath(originNamespace, asset.relativePath);

  return {
    eventKey: bedrockEventKey(namespace, declaration.eventKey),
    outputAssetPath: assetPath,
    sourceFile: asset.sourceFile,
    outputFile: join(resourcePackRoot, assetPath + OUTPUT_EXTENSION),
  };
}
