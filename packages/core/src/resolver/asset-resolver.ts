/**
 * Asset resolver — maps a declared sound reference to an audio file on disk.
 *
 * Java packs may qualify references with another namespace, repeat the
 * namespace inside the path, or reuse files from the vanilla sound tree.
 * Resolution undoes the first two and probes the vanilla tree as a fallback.
 * It never throws: a missing file is a normal `{ ok: false }` result.
 */

import { stat } from "node:fs/promises";
import { join } from "node:path";
import { VANILLA_NAMESPACE } from "../types.js";
import type { ResolveResult, SoundDeclaration } from "../types.js";

/** Recognized source audio extensions, in probe order. */
export const AUDIO_EXTENSIONS = [".ogg", ".wav", ".mp3"] as const;

/** Returns true when `file` exists and is a regular file. */
export type FileProbe = (file: string) => Promise<boolean>;

/** Default probe backed by `fs.stat`. */
export const statProbe: FileProbe = async (file) => {
  try {
    return (await stat(file)).isFile();
  } catch {
    return false;
  }
};

/**
 * Splits a reference into the namespace to search and the candidate path.
 *
 * `ns:rest` searches `ns`; a bare path searches `originNamespace`.
 * An empty qualifier (`:rest`) means the vanilla namespace.
 */
export function splitReference(
  reference: string,
  originNamespace: string,
): { searchNamespace: string; path: string } {
  const colon = reference.indexOf(":");
  if (colon === -1) {
    return { searchNamespace: originNamespace, path: reference };
  }
  const qualifier = reference.slice(0, colon);
  return {
    searchNamespace: qualifier === "" ? VANILLA_NAMESPACE : qualifier,
    path: reference.slice(colon + 1),
  };
}

/**
 * Removes a leading `<namespace>/` from `path`, once.
 *
 * Vanilla paths are left alone: `minecraft/` is a legitimate folder there.
 */
export function stripNamespacePrefix(path: string, namespace: string): string {
  const prefix = `${namespace}/`;
  if (namespace !== VANILLA_NAMESPACE && path.startsWith(prefix)) {
    return path.slice(prefix.length);
  }
  return path;
}

/** Base paths (no extension) to probe, native tree first. */
export function candidateBasePaths(
  packRoot: string,
  searchNamespace: string,
  relativePath: string,
): { base: string; vanilla: boolean }[] {
  const native = {
    base: join(packRoot, "assets", searchNamespace, "sounds", relativePath),
    vanilla: searchNamespace === VANILLA_NAMESPACE,
  };
  if (native.vanilla) return [native];
  return [
    native,
    { base: join(packRoot, "assets", VANILLA_NAMESPACE, "sounds", relativePath), vanilla: true },
  ];
}

/**
 * True when every `/`-separated segment of `relativePath` names a child:
 * no empty, `.` or `..` segment, and no `:` or backslash inside one.
 */
export function isSafeRelativePath(relativePath: string): boolean {
  return relativePath
    .split("/")
    .every((segment) => segment !== "" && segment !== "." && segment !== ".." && !/[:\\]/.test(segment));
}

/**
 * Resolves a declaration to its source audio file.
 *
 * Every extension of the native tree is tried before any extension of the
 * vanilla tree. Paths that could leave the sound tree, and references with
 * more than one `:`, are rejected as `invalid_path` without probing.
 */
export async function resolveAsset(
  declaration: SoundDeclaration,
  packRoot: string,
  probe: FileProbe = statProbe,
): Promise<ResolveResult> {
  const { searchNamespace, path } = splitReference(
    declaration.soundReference,
    declaration.originNamespace,
  );
  const relativePath = stripNamespacePrefix(path, searchNamespace);

  if (relativePath === "") {
    return { ok: false, reason: "empty_path", searchNamespace, searched: [] };
  }
  if (!isSafeRelativePath(relativePath)) {
    return { ok: false, reason: "invalid_path", searchNamespace, searched: [] };
  }

  const candidates = candidateBasePaths(packRoot, searchNamespace, relativePath);
  for (const candidate of candidates) {
    for (const ext of AUDIO_EXTENSIONS) {
      const file = candidate.base + ext;
      if (await probe(file)) {
        return {
          ok: true,
          asset: {
            searchNamespace,
            relativePath,
            sourceFile: file,
            fromVanillaTree: candidate.vanilla,
          },
        };
      }
    }
  }

  return {
    ok: false,
    reason: "not_found",
    searchNamespace,
    searched: candidates.map((c) => c.base),
  };
}
