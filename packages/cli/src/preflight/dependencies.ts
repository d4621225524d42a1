/**
 * Dependency preflight — verifies external tools before any work starts.
 */

import { ConversionError, describeError } from "@soundport/core";
import { runCommand } from "./command.js";
import type { CommandResult, CommandRunner } from "./command.js";

export const FFMPEG_DOWNLOAD_URL = "https://ffmpeg.org/download.html";

/**
 * Checks that `ffmpegPath -version` runs and identifies itself as ffmpeg.
 *
 * @returns The first line of the version banner
 * @throws ConversionError (`dependency_missing`)
 */
export async function checkFfmpeg(
  ffmpegPath: string,
  run: CommandRunner = runCommand,
): Promise<string> {
  const missing = (detail: string, cause?: unknown): ConversionError =>
    new ConversionError(
      `Dependency ffmpeg must be installed to proceed (${detail}). See ${FFMPEG_DOWNLOAD_URL}`,
      "dependency_missing",
      cause === undefined ? undefined : { cause },
    );

  let result: CommandResult;
  try {
    result = await run(ffmpegPath, ["-version"]);
  } catch (err) {
    throw missing(`could not run "${ffmpegPath}": ${describeError(err)}`, err);
  }

  const banner = result.stdout.split("\n", 1)[0]?.trim() ?? "";
  if (result.code !== 0 || !banner.startsWith("ffmpeg version")) {
    throw missing(`"${ffmpegPath} -version" did not report an ffmpeg version`);
  }
  return banner;
}
