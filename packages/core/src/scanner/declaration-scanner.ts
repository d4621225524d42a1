/**
 * Declaration scanner — walks `assets/` for `sounds.json` documents and
 * flattens them into a lazy stream of SoundDeclaration.
 *
 * The stream is single-pass. Call `scanDeclarations` again for a new run.
 */

import { readdir, readFile } from "node:fs/promises";
import type { Dirent } from "node:fs";
import { join, relative, sep } from "node:path";
import { javaSoundEventSchema, soundEntryReference } from "@soundport/schema";
import type { JavaSoundEvent } from "@soundport/schema";
import { describeError, hasErrorCode } from "../errors.js";
import { VANILLA_NAMESPACE, silentLogger } from "../types.js";
import type { ConversionLogger, SoundDeclaration } from "../types.js";

/** File name of a Java declarations document. */
export const DECLARATIONS_FILE = "sounds.json";

/** Characters allowed in a Java namespace. */
const NAMESPACE_PATTERN = /^[a-z0-9_.-]+$/;

/**
 * Derives the owning namespace from a document's path relative to `assets/`.
 *
 * @returns The namespace, or null when the location is not `<ns>/sounds.json`.
 */
export function namespaceFromLocation(relativeToAssets: string): string | null {
  const [namespace, file, ...rest] = relativeToAssets.split(sep).join("/").split("/");
  if (namespace === undefined || file !== DECLARATIONS_FILE || rest.length > 0) return null;
  return NAMESPACE_PATTERN.test(namespace) ? namespace : null;
}

/** Recursively collects every declarations document under `dir`, sorted. */
async function findDeclarationDocuments(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) return [];
    throw err;
  }

  const found: string[] = [];
  for (const entry of [...entries].sort((a, b) => a.name.localeCompare(b.name))) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await findDeclarationDocuments(full)));
    } else if (entry.isFile() && entry.name === DECLARATIONS_FILE) {
      found.push(full);
    }
  }
  return found;
}

/**
 * Reads one document and validates it event by event.
 *
 * Returns null (after warning) when the file is unreadable or not a JSON
 * object. An event that does not match the schema is warned about and
 * left out; its siblings are kept. Keys come from the parsed object as-is.
 */
async function loadDocument(
  file: string,
  logger: ConversionLogger,
): Promise<[eventKey: string, event: JavaSoundEvent][] | null> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, "utf8"));
  } catch (err) {
    logger.warn(`Could not read ${file}: ${describeError(err)}. Skipping.`);
    return null;
  }

  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    logger.warn(`Invalid sound declarations in ${file}: expected an object of sound events. Skipping.`);
    return null;
  }

  const events: [string, JavaSoundEvent][] = [];
  const entries: [string, unknown][] = Object.entries(raw);
  for (const [eventKey, value] of entries) {
    const parsed = javaSoundEventSchema.safeParse(value);
    if (parsed.success) {
      events.push([eventKey, parsed.data]);
      continue;
    }
    const issue = parsed.error.issues[0];
    const where = [eventKey, ...(issue?.path ?? [])].join(".");
    logger.warn(`Invalid sound declarations in ${file} at ${where}: ${issue?.message ?? "unknown error"}. Skipping.`);
  }
  return events;
}

/**
 * Yields one SoundDeclaration per sound entry of every non-vanilla
 * declarations document under `<packRoot>/assets`.
 *
 * Documents in the vanilla namespace are skipped with an info note.
 * Documents at a location that does not identify a namespace are skipped
 * with a warning.
 */
export async function* scanDeclarations(
  packRoot: string,
  logger: ConversionLogger = silentLogger,
): AsyncGenerator<SoundDeclaration> {
  const assetsRoot = join(packRoot, "assets");
  const documents = await findDeclarationDocuments(assetsRoot);

  for (const file of documents) {
    const originNamespace = namespaceFromLocation(relative(assetsRoot, file));

    if (originNamespace === null) {
      logger.warn(`Could not determine namespace for ${file}. Skipping.`);
      continue;
    }
    if (originNamespace === VANILLA_NAMESPACE) {
      logger.info(`Skipping vanilla declarations: ${file}`);
      continue;
    }

    const events = await loadDocument(file, logger);
    if (!events) continue;

    for (const [eventKey, event] of events) {
      for (const entry of event.sounds ?? []) {
        yield {
          originNamespace,
          eventKey,
          soundReference: soundEntryReference(entry),
          sourceDocument: file,
        };
      }
    }
  }
}
