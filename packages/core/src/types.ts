/**
 * Shared types for the conversion engine.
 *
 * Every record here is derived and transient: a run rebuilds all of them
 * from the input declarations.
 */

/** The reserved vanilla namespace. Never remapped. */
export const VANILLA_NAMESPACE = "minecraft";

/** One (namespace, event key, sound reference) triple from a declarations document. */
export interface SoundDeclaration {
  /** Namespace owning the declarations document. Never empty, never vanilla. */
  readonly originNamespace: string;
  /** Event identifier as declared. Passed through verbatim. */
  readonly eventKey: string;
  /** `ns:path` or bare `path`. */
  readonly soundReference: string;
  /** Absolute path of the `sounds.json` this came from. */
  readonly sourceDocument: string;
}

/** A declaration whose reference was located on disk. */
export interface ResolvedAsset {
  /** Namespace whose sound tree was searched first. */
  readonly searchNamespace: string;
  /** Reference path with any redundant self-namespace prefix removed. */
  readonly relativePath: string;
  /** Absolute path of the matched audio file. */
  readonly sourceFile: string;
  /** True when the match came from the vanilla sound tree fallback. */
  readonly fromVanillaTree: boolean;
}

/** Why a reference could not be resolved. */
export type ResolveFailureReason = "empty_path" | "invalid_path" | "not_found";

export type ResolveResult =
  | { readonly ok: true; readonly asset: ResolvedAsset }
  | {
      readonly ok: false;
      readonly reason: ResolveFailureReason;
      readonly searchNamespace: string;
      /** Base paths probed (without extension). Empty unless `not_found`. */
      readonly searched: readonly string[];
    };

/** The final mapped record for one resolved declaration. */
export interface BedrockSoundEvent {
  /** `<namespace>:<eventKey>`, namespace possibly suffixed. */
  readonly eventKey: string;
  /** `sounds/<originNamespace>/sounds/<relativePath>`, relative to the resource pack root. */
  readonly outputAssetPath: string;
  /** Absolute source audio file. */
  readonly sourceFile: string;
  /** Absolute `.ogg` file the transcoder writes. */
  readonly outputFile: string;
}

/**
 * Converts one audio file to Ogg Vorbis.
 *
 * Implementations create the destination's parent directory and reject
 * when the conversion fails.
 */
export type Transcoder = (source: string, destination: string) => Promise<void>;

/** Sink for user-visible progress and diagnostics. */
export interface ConversionLogger {
  /** Informational note, hidden unless verbose. */
  info(message: string): void;
  /** A skipped item or other recoverable problem. */
  warn(message: string): void;
  /** A unit of work in flight. */
  progress(message: string): void;
  /** A finished step. */
  success(message: string): void;
}

/** A logger that discards everything. */
export const silentLogger: ConversionLogger = {
  info: () => {},
  warn: () => {},
  progress: () => {},
  success: () => {},
};
