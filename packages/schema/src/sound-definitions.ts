/**
 * Bedrock Edition `sounds/sound_definitions.json`.
 */

import { z } from "zod";

/** Format version written into every generated document. */
export const SOUND_DEFINITIONS_FORMAT_VERSION = "1.14.0";

/** Every converted event is played on the master channel. */
export const SOUND_CATEGORY = "master";

export const soundDefinitionSchema = z.object({
  category: z.literal(SOUND_CATEGORY),
  sounds: z.array(z.string()).min(1),
});

export const soundDefinitionDocumentSchema = z.object({
  format_version: z.literal(SOUND_DEFINITIONS_FORMAT_VERSION),
  sound_definitions: z.record(soundDefinitionSchema),
});

export type SoundDefinition = z.infer<typeof soundDefinitionSchema>;
export type SoundDefinitionDocument = z.infer<typeof soundDefinitionDocumentSchema>;
