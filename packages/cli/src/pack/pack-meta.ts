/**
 * Reads the Java pack's `pack.mcmeta`.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { flattenTextComponent, packMcmetaSchema } from "@soundport/schema";
import type { PackMcmeta } from "@soundport/schema";
import { ConversionError, describeError, hasErrorCode } from "@soundport/core";

export const PACK_MCMETA = "pack.mcmeta";

/** Used when the pack carries no description. */
export const DEFAULT_DESCRIPTION = "Converted Java Sound Resource Pack";

/**
 * Loads and validates `<packRoot>/pack.mcmeta`.
 *
 * @throws ConversionError (`invalid_pack`) when missing or malformed
 */
export async function readPackMeta(packRoot: string): Promise<PackMcmeta> {
  const file = join(packRoot, PACK_MCMETA);

  let raw: string;
  try {
    raw = await readFile(file, "utf8");
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      throw new ConversionError(`Invalid resource pack! The ${PACK_MCMETA} file does not exist.`, "invalid_pack");
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConversionError(`Invalid resource pack! ${PACK_MCMETA} is not valid JSON: ${describeError(err)}`, "invalid_pack", {
      cause: err,
    });
  }

  const parsed = packMcmetaSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConversionError(
      `Invalid resource pack! ${PACK_MCMETA} ${issue ? `${issue.path.join(".")}: ${issue.message}` : "is malformed"}`,
      "invalid_pack",
    );
  }
  return parsed.data;
}

/** Plain-text description for the Bedrock manifest. */
export function packDescription(meta: PackMcmeta): string {
  const description = meta.pack.description;
  if (description === undefined) return DEFAULT_DESCRIPTION;
  const text = flattenTextComponent(description).trim();
  return text === "" ? DEFAULT_DESCRIPTION : text;
}
