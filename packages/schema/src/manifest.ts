/**
 * Bedrock Edition pack `manifest.json` (format version 2).
 */

import { z } from "zod";

const semverTuple = z.tuple([z.number().int(), z.number().int(), z.number().int()]);

export const manifestModuleSchema = z.object({
  description: z.string(),
  type: z.enum(["resources", "data"]),
  uuid: z.string().uuid(),
  version: semverTuple,
});

export const manifestDependencySchema = z.object({
  uuid: z.string().uuid(),
  version: semverTuple,
});

export const bedrockManifestSchema = z.object({
  format_version: z.literal(2),
  header: z.object({
    description: z.string(),
    name: z.string(),
    uuid: z.string().uuid(),
    version: semverTuple,
    min_engine_version: semverTuple,
  }),
  modules: z.array(manifestModuleSchema).min(1),
  dependencies: z.array(manifestDependencySchema).optional(),
});

export type SemverTuple = z.infer<typeof semverTuple>;
export type ManifestModule = z.infer<typeof manifestModuleSchema>;
export type ManifestDependency = z.infer<typeof manifestDependencySchema>;
export type BedrockManifest = z.infer<typeof bedrockManifestSchema>;
