/**
 * CLI argument parsing for the soundport command.
 *
 * Supports:
 *   soundport MyPack.zip
 *   soundport ./extracted-pack --output ./build --jobs 4
 *   soundport MyPack.zip --quality 6 --name my_sounds --no-package --verbose
 */

import { ConversionError, defaultConcurrency } from "@soundport/core";

/** Parsed configuration for a soundport run. */
export interface SoundportConfig {
  /** Java pack `.zip` or extracted directory. */
  input?: string;
  /** Directory receiving `rp/`, `bp/`, `packaged/` and the scratch `work/`. */
  outputDir: string;
  /** Maximum concurrent transcodes. */
  jobs: number;
  /** libvorbis quality (`-q:a`), 0-10. */
  quality: number;
  /** ffmpeg executable. */
  ffmpegPath: string;
  /** Base name of the packaged files. */
  packName: string;
  /** Build `.mcpack`/`.mcaddon` archives. */
  packageOutput: boolean;
  /** Leave the extracted input in `work/` after the run. */
  keepWorkdir: boolean;
  /** Show informational notes. */
  verbose: boolean;
  /** Print usage and exit. */
  help: boolean;
}

export const DEFAULT_OUTPUT_DIR = "./target";
export const DEFAULT_QUALITY = 4;
export const DEFAULT_PACK_NAME = "geyser_sound";

/** Pack names end up in file names. */
const PACK_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

export const USAGE = `Usage: soundport <pack.zip | pack-dir> [options]

Options:
  --output <dir>     output directory (default: ${DEFAULT_OUTPUT_DIR}, env SOUNDPORT_OUTPUT)
  --jobs <n>         concurrent transcodes (default: 2 x CPUs, env SOUNDPORT_JOBS)
  --quality <0-10>   Ogg Vorbis quality (default: ${String(DEFAULT_QUALITY)})
  --ffmpeg <path>    ffmpeg executable (default: ffmpeg, env SOUNDPORT_FFMPEG)
  --name <name>      packaged file base name (default: ${DEFAULT_PACK_NAME})
  --no-package       skip .mcpack/.mcaddon creation
  --keep-workdir     keep the extracted input pack
  --verbose          show informational notes
  --help             show this message`;

function parseInteger(flag: string, raw: string, min: number, max: number): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConversionError(
      `${flag} must be an integer between ${String(min)} and ${String(max)}, got "${raw}"`,
      "invalid_config",
    );
  }
  return value;
}

/**
 * Parses process.argv (and environment fallbacks) into a SoundportConfig.
 *
 * @throws ConversionError (`invalid_config`) on malformed option values
 */
export function parseConfig(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): SoundportConfig {
  const args = argv.slice(2); // skip node + script

  let input: string | undefined;
  let outputDir: string | undefined;
  let jobs: string | undefined;
  let quality: string | undefined;
  let ffmpegPath: string | undefined;
  let packName: string | undefined;
  let packageOutput = true;
  let keepWorkdir = false;
  let verbose = false;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) break;
    const next = args[i + 1];

    if (arg === "--output" && next !== undefined) {
      outputDir = next;
      i++;
    } else if (arg === "--jobs" && next !== undefined) {
      jobs = next;
      i++;
    } else if (arg === "--quality" && next !== undefined) {
      quality = next;
      i++;
    } else if (arg === "--ffmpeg" && next !== undefined) {
      ffmpegPath = next;
      i++;
    } else if (arg === "--name" && next !== undefined) {
      packName = next;
      i++;
    } else if (arg === "--no-package") {
      packageOutput = false;
    } else if (arg === "--keep-workdir") {
      keepWorkdir = true;
    } else if (arg === "--verbose") {
      verbose = true;
    } else if (arg === "--help" || arg === "-h") {
      help = true;
    } else if (!arg.startsWith("--") && input === undefined) {
      input = arg;
    } else {
      throw new ConversionError(`Unknown or incomplete option: ${arg}`, "invalid_config");
    }
  }

  const jobsRaw = jobs ?? env["SOUNDPORT_JOBS"];
  const name = packName ?? DEFAULT_PACK_NAME;
  if (!PACK_NAME_PATTERN.test(name)) {
    throw new ConversionError(
      `--name may only contain letters, digits, "_", "." and "-", got "${name}"`,
      "invalid_config",
    );
  }

  return {
    input,
    outputDir: outputDir ?? env["SOUNDPORT_OUTPUT"] ?? DEFAULT_OUTPUT_DIR,
    jobs: jobsRaw === undefined ? defaultConcurrency() : parseInteger("--jobs", jobsRaw, 1, 1024),
    quality: quality === undefined ? DEFAULT_QUALITY : parseInteger("--quality", quality, 0, 10),
    ffmpegPath: ffmpegPath ?? env["SOUNDPORT_FFMPEG"] ?? "ffmpeg",
    packName: name,
    packageOutput,
    keepWorkdir,
    verbose,
    help,
  };
}
