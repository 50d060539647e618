import { z } from 'zod';

export const richTextItemSchema = z
  .object({
    type: z.string().optional(),
    plain_text: z.string().optional(),
    href: z.string().nullish(),
    text: z
      .object({
        content: z.string(),
        link: z.object({ url: z.string() }).nullish(),
      })
      .nullish(),
    annotations: z
      .object({
        bold: z.boolean().optional(),
        italic: z.boolean().optional(),
        strikethrough: z.boolean().optional(),
        underline: z.boolean().optional(),
        code: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type RichTextItem = z.infer<typeof richTextItemSchema>;

export const rawBlockSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    has_children: z.boolean().optional(),
  })
  .passthrough();

export type RawBlock = z.infer<typeof rawBlockSchema>;

export const pageSchema = z
  .object({
    id: z.string(),
    properties: z.record(z.unknown()).default({}),
  })
  .passthrough();

export type NotionPage = z.infer<typeof pageSchema>;

export const propertySchemaEntry = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    type: z.string(),
  })
  .passthrough();

export type PropertySchemaEntry = z.infer<typeof propertySchemaEntry>;

export const databaseSchema = z
  .object({
    id: z.string(),
    title: z.array(richTextItemSchema).default([]),
    properties: z.record(propertySchemaEntry).default({}),
  })
  .passthrough();

export type NotionDatabase = z.infer<typeof databaseSchema>;

export const listResponseSchema = z.object({
  results: z.array(z.unknown()),
  has_more: z.boolean().default(false),
  next_cursor: z.string().nullish(),
});

export type ListResponse = z.infer<typeof listResponseSchema>;

export function plainText(items: readonly RichTextItem[]): string {
  return items.map((item) => item.plain_text ?? item.text?.content ?? '').join('');
}
