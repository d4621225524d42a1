/**
 * Input preparation — a pack directory is used in place, a `.zip` is
 * unpacked (via fflate) into a scratch directory.
 */

import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import type { Stats } from "node:fs";
import { dirname, resolve, sep } from "node:path";
import { unzipSync } from "fflate";
import { ConversionError, describeError, hasErrorCode } from "@soundport/core";

/** Where the Java pack lives, and whether it was extracted. */
export interface PreparedInput {
  readonly packRoot: string;
  readonly extracted: boolean;
}

/**
 * Writes every entry of a zip archive under `destination`.
 *
 * @returns Number of files written
 * @throws ConversionError (`invalid_pack`) for an unreadable archive or an
 *   entry that would land outside `destination`
 */
export async function extractZip(archive: Uint8Array, destination: string): Promise<number> {
  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(archive);
  } catch (err) {
    throw new ConversionError(`Input is not a readable zip archive: ${describeError(err)}`, "invalid_pack", {
      cause: err,
    });
  }

  const root = resolve(destination);
  let written = 0;
  for (const [name, data] of Object.entries(entries)) {
    const target = resolve(root, name.replace(/\\/g, "/"));
    if (target !== root && !target.startsWith(root + sep)) {
      throw new ConversionError(`Archive entry escapes the extraction directory: ${name}`, "invalid_pack");
    }

    if (name.endsWith("/")) {
      await mkdir(target, { recursive: true });
      continue;
    }
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, data);
    written++;
  }
  return written;
}

/**
 * Resolves the input to a pack directory, extracting archives into `workDir`.
 *
 * @throws ConversionError (`input_missing`) when the input does not exist
 */
export async function prepareInput(input: string, workDir: string): Promise<PreparedInput> {
  let info: Stats;
  try {
    info = await stat(input);
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      throw new ConversionError(`Input resource pack ${input} does not exist`, "input_missing");
    }
    throw err;
  }

  if (info.isDirectory()) {
    return { packRoot: resolve(input), extracted: false };
  }

  await mkdir(workDir, { recursive: true });
  await extractZip(await readFile(input), workDir);
  return { packRoot: resolve(workDir), extracted: true };
}
