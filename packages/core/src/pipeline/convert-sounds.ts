/**
 * Conversion pipeline — scan, resolve, key, transcode, aggregate.
 *
 * Declarations are resolved one at a time as the scan yields them; each
 * resolved asset is handed to the job pool for transcoding. The definition
 * document is only built after the pool has drained.
 */

import type { SoundDefinitionDocument } from "@soundport/schema";
import { DefinitionCollector } from "../aggregate/definition-collector.js";
import { buildSoundEvent } from "../builder/key-path.js";
import { JobPool, defaultConcurrency } from "../dispatch/job-pool.js";
import { describeError } from "../errors.js";
import { resolveAsset, statProbe } from "../resolver/asset-resolver.js";
import type { FileProbe } from "../resolver/asset-resolver.js";
import { scanDeclarations } from "../scanner/declaration-scanner.js";
import { silentLogger } from "../types.js";
import type {
  BedrockSoundEvent,
  ConversionLogger,
  ResolveResult,
  SoundDeclaration,
  Transcoder,
} from "../types.js";

/** Options for a conversion run. */
export interface ConvertSoundsOptions {
  /** Root of the extracted Java pack (contains `assets/`). */
  readonly packRoot: string;
  /** Root of the Bedrock resource pack being written. */
  readonly resourcePackRoot: string;
  /** Converts one source file to Ogg Vorbis. */
  readonly transcode: Transcoder;
  /** Maximum concurrent transcodes. Defaults to twice the processing units. */
  readonly concurrency?: number;
  readonly logger?: ConversionLogger;
  /** File existence check. Defaults to `fs.stat`. */
  readonly probe?: FileProbe;
}

/** Outcome of a conversion run. */
export interface ConversionResult {
  readonly document: SoundDefinitionDocument;
  /** One entry per resolved declaration, in scan order. */
  readonly events: readonly BedrockSoundEvent[];
  /** Declarations read from all documents. */
  readonly declarations: number;
  /** Declarations dropped because their reference did not resolve. */
  readonly skipped: number;
  /** Distinct output files transcoded successfully. */
  readonly transcoded: number;
  /** Source files whose transcode failed. */
  readonly transcodeFailures: readonly string[];
}

/** Builds the warning for a declaration that did not resolve. */
export function describeResolveFailure(
  declaration: SoundDeclaration,
  result: Extract<ResolveResult, { ok: false }>,
): string {
  const key = `${result.searchNamespace}:${declaration.eventKey}`;
  if (result.reason === "empty_path") {
    return `Empty sound path "${declaration.soundReference}" for key ${key} in ${declaration.sourceDocument}. Skipping.`;
  }
  if (result.reason === "invalid_path") {
    return `Invalid sound path "${declaration.soundReference}" for key ${key} in ${declaration.sourceDocument}. Skipping.`;
  }
  const searched = result.searched.map((base, i) => `${String(i + 1)}) ${base}.*`).join(" ");
  return `Could not find sound file. Searched base paths: ${searched} (Key: ${key})`;
}

/**
 * Runs the full conversion of a Java pack's sounds into `resourcePackRoot`.
 *
 * @throws ConversionError (`no_sounds`) when no declaration resolved
 */
export async function convertSounds(options: ConvertSoundsOptions): Promise<ConversionResult> {
  const logger = options.logger ?? silentLogger;
  const probe = options.probe ?? statProbe;
  const pool = new JobPool(options.concurrency ?? defaultConcurrency());
  const collector = new DefinitionCollector();

  const events: BedrockSoundEvent[] = [];
  // output file -> source file it is transcoded from
  const scheduled = new Map<string, string>();
  const transcodeFailures: string[] = [];
  let transcoded = 0;
  let declarations = 0;
  let skipped = 0;

  for await (const declaration of scanDeclarations(options.packRoot, logger)) {
    declarations++;

    const result = await resolveAsset(declaration, options.packRoot, probe);
    if (!result.ok) {
      logger.warn(describeResolveFailure(declaration, result));
      skipped++;
      continue;
    }

    const event = buildSoundEvent(declaration, result.asset, options.resourcePackRoot);
    events.push(event);
    collector.add(event.eventKey, event.outputAssetPath);
    logger.progress(`${event.eventKey} (${event.sourceFile} -> ${event.outputFile})`);

    const claimedBy = scheduled.get(event.outputFile);
    if (claimedBy !== undefined) {
      if (claimedBy !== event.sourceFile) {
        logger.warn(
          `Output ${event.outputFile} for key ${event.eventKey} is already transcoded from ${claimedBy}; ` +
            `${event.sourceFile} is not converted.`,
        );
      }
      continue;
    }
    scheduled.set(event.outputFile, event.sourceFile);

    await pool.submit(async () => {
      try {
        await options.transcode(event.sourceFile, event.outputFile);
        transcoded++;
      } catch (err) {
        transcodeFailures.push(event.sourceFile);
        logger.warn(`Transcode failed for ${event.sourceFile}: ${describeError(err)}`);
      }
    });
  }

  await pool.drain();

  return {
    document: collector.build(),
    events,
    declarations,
    skipped,
    transcoded,
    transcodeFailures,
  };
}
