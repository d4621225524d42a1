#!/usr/bin/env tsx
/**
 * soundport — main CLI entry point.
 *
 * Usage:
 *   soundport MyResourcePack.zip
 *   soundport ./pack-dir --output ./build --jobs 8 --verbose
 */

import { isConversionError } from "@soundport/core";
import { parseConfig, USAGE } from "./config/config.js";
import { createConsoleLogger } from "./logger/console-logger.js";
import { runConversion } from "./run.js";

/** Entry point for the soundport CLI. */
async function main(): Promise<void> {
  const config = parseConfig(process.argv);

  if (config.help || config.input === undefined) {
    console.error(USAGE);
    process.exitCode = config.help ? 0 : 1;
    return;
  }

  const logger = createConsoleLogger({ verbose: config.verbose });
  const { result, packaged, resourcePackDir } = await runConversion(config, { logger });

  logger.success(
    `${String(Object.keys(result.document.sound_definitions).length)} events, ` +
      `${String(result.transcoded)} files, ${String(result.skipped)} skipped, ` +
      `${String(result.transcodeFailures.length)} failed transcodes`,
  );
  logger.success(`Process complete. Files are in ${packaged ? packaged.addon : resourcePackDir}`);
}

main().catch((err: unknown) => {
  if (isConversionError(err)) {
    console.error(`[soundport] Error: ${err.message}`);
  } else {
    console.error("[soundport] Fatal:", err);
  }
  process.exitCode = 1;
});
