/**
 * Namespace suffix policy.
 *
 * Deep custom sound trees (three or more path components) get their event
 * namespace suffixed with `_sounds`. Vanilla namespaces and assets served
 * from the vanilla tree are never renamespaced.
 */

import { VANILLA_NAMESPACE } from "../types.js";

export const NAMESPACE_SUFFIX = "_sounds";

/** Minimum path depth that triggers the suffix. */
export const SUFFIX_DEPTH_THRESHOLD = 3;

/** Number of `/`-separated components. A bare file name has depth 1. */
export function pathDepth(relativePath: string): number {
  return relativePath.split("/").length;
}

export function needsNamespaceSuffix(
  originNamespace: string,
  relativePath: string,
  isVanillaAsset: boolean,
): boolean {
  if (originNamespace === VANILLA_NAMESPACE || isVanillaAsset) return false;
  return pathDepth(relativePath) >= SUFFIX_DEPTH_THRESHOLD;
}

/** Appends the suffix unless `namespace` already carries it. */
export function applyNamespaceSuffix(namespace: string): string {
  if (namespace.endsWith(NAMESPACE_SUFFIX)) return namespace;
  return namespace + NAMESPACE_SUFFIX;
}
