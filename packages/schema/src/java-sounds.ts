/**
 * Java Edition `assets/<namespace>/sounds.json` declarations.
 *
 * Only the flat sound list is modeled. Per-entry metadata (volume, pitch,
 * stream, weight, type) is accepted and ignored.
 */

import { z } from "zod";

/** One entry of a sound list: a bare reference or an object carrying `name`. */
export const javaSoundEntrySchema = z.union([
  z.string(),
  z.object({ name: z.string() }).passthrough(),
]);

/** A single named sound event. */
export const javaSoundEventSchema = z
  .object({
    sounds: z.array(javaSoundEntrySchema).optional(),
    replace: z.boolean().optional(),
    subtitle: z.string().optional(),
  })
  .passthrough();

/** A whole declarations document, keyed by event id. */
export const javaSoundsDocumentSchema = z.record(javaSoundEventSchema);

export type JavaSoundEntry = z.infer<typeof javaSoundEntrySchema>;
export type JavaSoundEvent = z.infer<typeof javaSoundEventSchema>;
export type JavaSoundsDocument = z.infer<typeof javaSoundsDocumentSchema>;

/** Normalizes both entry forms to the reference string. */
export function soundEntryReference(entry: JavaSoundEntry): string {
  return typeof entry === "string" ? entry : entry.name;
}
