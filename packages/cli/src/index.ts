/**
 * @soundport/cli — Java Edition to Bedrock Edition sound pack conversion.
 *
 * The `soundport` binary lives in cli.ts; everything it is built from is
 * exported here for programmatic use.
 *
 * @packageDocumentation
 */

// Configuration
export { parseConfig, USAGE, DEFAULT_OUTPUT_DIR, DEFAULT_QUALITY, DEFAULT_PACK_NAME } from "./config/config.js";
export type { SoundportConfig } from "./config/config.js";

// Logging
export { createConsoleLogger } from "./logger/console-logger.js";
export type { ConsoleLoggerOptions } from "./logger/console-logger.js";

// Preflight
export { runCommand } from "./preflight/command.js";
export type { CommandRunner, CommandResult } from "./preflight/command.js";
export { checkFfmpeg, FFMPEG_DOWNLOAD_URL } from "./preflight/dependencies.js";

// Pack input/output
export { prepareInput, extractZip } from "./pack/extract.js";
export type { PreparedInput } from "./pack/extract.js";
export { readPackMeta, packDescription, PACK_MCMETA, DEFAULT_DESCRIPTION } from "./pack/pack-meta.js";
export { createManifests } from "./pack/manifest.js";
export type { ManifestOptions, PackManifests } from "./pack/manifest.js";
export { packageAddon, zipDirectory, collectFiles } from "./pack/package.js";
export type { PackageOptions, PackagedOutput } from "./pack/package.js";

// Transcoding
export { createFfmpegTranscoder, ffmpegArgs } from "./transcode/ffmpeg.js";
export type { FfmpegTranscoderOptions } from "./transcode/ffmpeg.js";

// Run
export { runConversion, outputLayout, SOUND_DEFINITIONS_FILE } from "./run.js";
export type { RunDependencies, RunSummary } from "./run.js";
