/**
 * Java Edition `pack.mcmeta`.
 *
 * The description may be a plain string or a JSON text component
 * (object or array of components).
 */

import { z } from "zod";

/** A JSON text component, reduced to the fields that carry text. */
export interface TextComponent {
  text?: string;
  translate?: string;
  extra?: TextComponentValue[];
}

export type TextComponentValue = string | TextComponent | TextComponentValue[];

export const textComponentSchema: z.ZodType<TextComponentValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.array(textComponentSchema),
    z.object({
      text: z.string().optional(),
      translate: z.string().optional(),
      extra: z.array(textComponentSchema).optional(),
    }),
  ]),
);

export const packMcmetaSchema = z
  .object({
    pack: z
      .object({
        pack_format: z.number().int(),
        description: textComponentSchema.optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type PackMcmeta = z.infer<typeof packMcmetaSchema>;

/** Flattens a text component into plain text, depth first. */
export function flattenTextComponent(value: TextComponentValue): string {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) return value.map(flattenTextComponent).join("");
  const head = value.text ?? value.translate ?? "";
  const tail = (value.extra ?? []).map(flattenTextComponent).join("");
  return head + tail;
}
