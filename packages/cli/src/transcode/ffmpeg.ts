/**
 * ffmpeg-backed Transcoder: any supported input to Ogg Vorbis.
 */

import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { Transcoder } from "@soundport/core";
import { runCommand } from "../preflight/command.js";
import type { CommandRunner } from "../preflight/command.js";

export interface FfmpegTranscoderOptions {
  /** ffmpeg executable. Defaults to "ffmpeg". */
  readonly ffmpegPath?: string;
  /** libvorbis quality, 0-10. Defaults to 4. */
  readonly quality?: number;
  readonly run?: CommandRunner;
}

/** Arguments for one conversion. Audio streams only, existing output overwritten. */
export function ffmpegArgs(source: string, destination: string, quality: number): string[] {
  return [
    "-y",
    "-loglevel",
    "quiet",
    "-i",
    source,
    "-map",
    "0:a",
    "-c:a",
    "libvorbis",
    "-q:a",
    String(quality),
    destination,
  ];
}

export function createFfmpegTranscoder(options: FfmpegTranscoderOptions = {}): Transcoder {
  const ffmpegPath = options.ffmpegPath ?? "ffmpeg";
  const quality = options.quality ?? 4;
  const run = options.run ?? runCommand;

  return async (source, destination) => {
    await mkdir(dirname(destination), { recursive: true });
    const { code } = await run(ffmpegPath, ffmpegArgs(source, destination, quality));
    if (code !== 0) {
      throw new Error(`ffmpeg exited with code ${String(code)}`);
    }
  };
}
