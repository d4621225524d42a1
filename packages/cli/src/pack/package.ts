/**
 * Packaging — zips the resource and behavior pack directories into
 * `.mcpack` archives and bundles both into an `.mcaddon`.
 */

import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { zipSync } from "fflate";

/** Deflate level used for every archive. */
const ZIP_LEVEL = 8;

/** Collects every non-hidden file under `dir`, keyed by its `/`-separated relative path. */
export async function collectFiles(dir: string, prefix = ""): Promise<Record<string, Uint8Array>> {
  const files: Record<string, Uint8Array> = {};
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    if (entry.name.startsWith(".")) continue;
    const rel = prefix === "" ? entry.name : `${prefix}/${entry.name}`;
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      Object.assign(files, await collectFiles(full, rel));
    } else if (entry.isFile()) {
      files[rel] = await readFile(full);
    }
  }
  return files;
}

/** Zips the contents of `dir` (not the directory itself). */
export async function zipDirectory(dir: string): Promise<Uint8Array> {
  return zipSync(await collectFiles(dir), { level: ZIP_LEVEL });
}

export interface PackageOptions {
  readonly resourcePackDir: string;
  readonly behaviorPackDir: string;
  /** Directory the archives are written to. */
  readonly packagedDir: string;
  readonly packName: string;
}

/** Paths of the written archives. */
export interface PackagedOutput {
  readonly resourcePack: string;
  readonly behaviorPack: string;
  readonly addon: string;
}

/**
 * Writes `<name>.mcpack`, `<name>_behavior.mcpack` and `<name>_addon.mcaddon`.
 */
export async function packageAddon(options: PackageOptions): Promise<PackagedOutput> {
  await mkdir(options.packagedDir, { recursive: true });

  const resourceName = `${options.packName}.mcpack`;
  const behaviorName = `${options.packName}_behavior.mcpack`;
  const resourceZip = await zipDirectory(options.resourcePackDir);
  const behaviorZip = await zipDirectory(options.behaviorPackDir);

  const output: PackagedOutput = {
    resourcePack: join(options.packagedDir, resourceName),
    behaviorPack: join(options.packagedDir, behaviorName),
    addon: join(options.packagedDir, `${options.packName}_addon.mcaddon`),
  };

  await writeFile(output.resourcePack, resourceZip);
  await writeFile(output.behaviorPack, behaviorZip);
  await writeFile(
    output.addon,
    zipSync({ [resourceName]: resourceZip, [behaviorName]: behaviorZip }, { level: ZIP_LEVEL }),
  );
  return output;
}
