/**
 * Console logger — prefixed lines on stdout (progress) and stderr
 * (notes and warnings).
 */

import type { ConversionLogger } from "@soundport/core";

const PREFIX = "[soundport]";

export interface ConsoleLoggerOptions {
  /** Print `info` notes. Defaults to false. */
  readonly verbose?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): ConversionLogger {
  const verbose = options.verbose ?? false;
  return {
    info(message) {
      if (verbose) console.error(`${PREFIX} ${message}`);
    },
    warn(message) {
      console.error(`${PREFIX} Warning: ${message}`);
    },
    progress(message) {
      console.log(`${PREFIX} ${message}`);
    },
    success(message) {
      console.log(`${PREFIX} [+] ${message}`);
    },
  };
}
