/**
 * One full conversion run: preflight, input preparation, sound conversion,
 * manifests and packaging.
 */

import { copyFile, mkdir, rm, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { ConversionError, convertSounds, hasErrorCode, silentLogger } from "@soundport/core";
import type { ConversionLogger, ConversionResult, Transcoder } from "@soundport/core";
import type { SoundportConfig } from "./config/config.js";
import { runCommand } from "./preflight/command.js";
import type { CommandRunner } from "./preflight/command.js";
import { checkFfmpeg } from "./preflight/dependencies.js";
import { prepareInput } from "./pack/extract.js";
import { createManifests } from "./pack/manifest.js";
import { packDescription, readPackMeta } from "./pack/pack-meta.js";
import { packageAddon } from "./pack/package.js";
import type { PackagedOutput } from "./pack/package.js";
import { createFfmpegTranscoder } from "./transcode/ffmpeg.js";

/** Name of the definitions document inside `<rp>/sounds/`. */
export const SOUND_DEFINITIONS_FILE = "sound_definitions.json";

/** Collaborators a run can be given in place of the real ones. */
export interface RunDependencies {
  readonly logger?: ConversionLogger;
  /** Runs external commands (ffmpeg preflight and transcodes). */
  readonly run?: CommandRunner;
  /** Overrides the ffmpeg transcoder. */
  readonly transcode?: Transcoder;
  /** UUID source for the manifests. */
  readonly uuid?: () => string;
}

/** Directories and archives a run produced. */
export interface RunSummary {
  readonly result: ConversionResult;
  readonly resourcePackDir: string;
  readonly behaviorPackDir: string;
  readonly soundDefinitionsFile: string;
  /** Absent with `--no-package`. */
  readonly packaged?: PackagedOutput;
}

/** Output layout under the configured output directory. */
export function outputLayout(outputDir: string): {
  resourcePackDir: string;
  behaviorPackDir: string;
  packagedDir: string;
  workDir: string;
} {
  const root = resolve(outputDir);
  return {
    resourcePackDir: join(root, "rp"),
    behaviorPackDir: join(root, "bp"),
    packagedDir: join(root, "packaged"),
    workDir: join(root, "work"),
  };
}

async function writeJson(file: string, value: unknown): Promise<void> {
  await writeFile(file, JSON.stringify(value, null, 2) + "\n", "utf8");
}

/** Copies `pack.png` to `pack_icon.png` when the Java pack has one. */
async function copyPackIcon(packRoot: string, resourcePackDir: string): Promise<boolean> {
  try {
    await copyFile(join(packRoot, "pack.png"), join(resourcePackDir, "pack_icon.png"));
    return true;
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) return false;
    throw err;
  }
}

/**
 * Converts the configured input pack.
 *
 * @throws ConversionError for every fatal condition (missing input or
 *   dependency, invalid pack, no sounds converted)
 */
export async function runConversion(
  config: SoundportConfig,
  deps: RunDependencies = {},
): Promise<RunSummary> {
  const logger = deps.logger ?? silentLogger;
  const run = deps.run ?? runCommand;

  if (config.input === undefined) {
    throw new ConversionError("Please specify the input Java resource pack (e.g. soundport MyPack.zip)", "input_missing");
  }

  logger.progress("Checking required dependencies: ffmpeg");
  const banner = await checkFfmpeg(config.ffmpegPath, run);
  logger.success(`Dependency ffmpeg satisfied (${banner})`);

  const layout = outputLayout(config.outputDir);
  logger.progress("Initial cleanup: removing previous output");
  for (const dir of [layout.resourcePackDir, layout.behaviorPackDir, layout.packagedDir, layout.workDir]) {
    await rm(dir, { recursive: true, force: true });
  }

  logger.progress(`Preparing input pack ${config.input}`);
  const input = await prepareInput(config.input, layout.workDir);
  logger.success(input.extracted ? "Input pack decompressed" : "Using input pack directory");

  try {
    const meta = await readPackMeta(input.packRoot);

    const soundsDir = join(layout.resourcePackDir, "sounds");
    await mkdir(soundsDir, { recursive: true });
    await mkdir(layout.behaviorPackDir, { recursive: true });

    logger.progress("Processing Java sound files");
    const result = await convertSounds({
      packRoot: input.packRoot,
      resourcePackRoot: layout.resourcePackDir,
      transcode:
        deps.transcode ??
        createFfmpegTranscoder({ ffmpegPath: config.ffmpegPath, quality: config.quality, run }),
      concurrency: config.jobs,
      logger,
    });

    const soundDefinitionsFile = join(soundsDir, SOUND_DEFINITIONS_FILE);
    await writeJson(soundDefinitionsFile, result.document);
    logger.success(`Generated ${soundDefinitionsFile}`);

    const manifests = createManifests({
      description: packDescription(meta),
      packName: config.packName,
      uuid: deps.uuid,
    });
    await writeJson(join(layout.resourcePackDir, "manifest.json"), manifests.resource);
    await writeJson(join(layout.behaviorPackDir, "manifest.json"), manifests.behavior);
    if (await copyPackIcon(input.packRoot, layout.resourcePackDir)) {
      logger.info("Copied pack.png to pack_icon.png");
    }
    logger.success("Manifests generated");

    let packaged: PackagedOutput | undefined;
    if (config.packageOutput) {
      logger.progress("Compressing output packs");
      packaged = await packageAddon({
        resourcePackDir: layout.resourcePackDir,
        behaviorPackDir: layout.behaviorPackDir,
        packagedDir: layout.packagedDir,
        packName: config.packName,
      });
      logger.success(`Packaged ${packaged.resourcePack} and ${packaged.addon}`);
    }

    return {
      result,
      resourcePackDir: layout.resourcePackDir,
      behaviorPackDir: layout.behaviorPackDir,
      soundDefinitionsFile,
      packaged,
    };
  } finally {
    if (input.extracted && !config.keepWorkdir) {
      logger.info(`Removing ${layout.workDir}`);
      await rm(layout.workDir, { recursive: true, force: true });
    }
  }
}
