import { z } from 'zod';
import { richTextItemSchema, type RawBlock, type RichTextItem } from './schemas';

const DEFAULT_CALLOUT_ICON = '💡';

const textPayloadSchema = z
  .object({
    rich_text: z.array(richTextItemSchema).default([]),
    checked: z.boolean().optional(),
    language: z.string().optional(),
    icon: z.object({ emoji: z.string().optional() }).passthrough().nullish(),
  })
  .passthrough();

type TextPayload = z.infer<typeof textPayloadSchema>;

export type Block =
  | { kind: 'paragraph'; richText: RichTextItem[] }
  | { kind: 'heading'; level: 1 | 2 | 3; richText: RichTextItem[] }
  | { kind: 'bulleted_list_item'; richText: RichTextItem[] }
  | { kind: 'numbered_list_item'; richText: RichTextItem[] }
  | { kind: 'to_do'; richText: RichTextItem[]; checked: boolean }
  | { kind: 'code'; richText: RichTextItem[]; language: string }
  | { kind: 'quote'; richText: RichTextItem[] }
  | { kind: 'divider' }
  | { kind: 'callout'; richText: RichTextItem[]; icon: string }
  | { kind: 'unsupported'; type: string };

function readPayload(raw: RawBlock): TextPayload {
  const parsed = textPayloadSchema.safeParse(raw[raw.type] ?? {});
  return parsed.success ? parsed.data : { rich_text: [] };
}

export function toBlock(raw: RawBlock): Block {
  const payload = readPayload(raw);
  const richText = payload.rich_text;

  switch (raw.type) {
    case 'paragraph':
      return { kind: 'paragraph', richText };
    case 'heading_1':
      return { kind: 'heading', level: 1, richText };
    case 'heading_2':
      return { kind: 'heading', level: 2, richText };
    case 'heading_3':
      return { kind: 'heading', level: 3, richText };
    case 'bulleted_list_item':
      return { kind: 'bulleted_list_item', richText };
    case 'numbered_list_item':
      return { kind: 'numbered_list_item', richText };
    case 'to_do':
      return { kind: 'to_do', richText, checked: payload.checked ?? false };
    case 'code':
      return { kind: 'code', richText, language: payload.language ?? '' };
    case 'quote':
      return { kind: 'quote', richText };
    case 'divider':
      return { kind: 'divider' };
    case 'callout':
      return { kind: 'callout', richText, icon: payload.icon?.emoji ?? DEFAULT_CALLOUT_ICON };
    default:
      return { kind: 'unsupported', type: raw.type };
  }
}

export function renderRichText(items: readonly RichTextItem[]): string {
  return items
    .map((item) => {
      let content = item.text?.content ?? item.plain_text ?? '';
      const annotations = item.annotations ?? {};
      if (annotations.bold) {
        content = `**${content}**`;
      }
      if (annotations.italic) {
        content = `*${content}*`;
      }
      if (annotations.strikethrough) {
        content = `~~${content}~~`;
      }
      if (annotations.code) {
        content = `\`${content}\``;
      }
      if (item.href) {
        content = `[${content}](${item.href})`;
      }
      return content;
    })
    .join('');
}

function withText(richText: RichTextItem[], format: (text: string) => string): string {
  const text = renderRichText(richText);
  return text ? format(text) : '';
}

export function renderBlock(block: Block): string {
  switch (block.kind) {
    case 'paragraph':
      return withText(block.richText, (text) => `${text}\n\n`);
    case 'heading':
      return withText(block.richText, (text) => `${'#'.repeat(block.level)} ${text}\n\n`);
    case 'bulleted_list_item':
      return withText(block.richText, (text) => `* ${text}\n`);
    case 'numbered_list_item':
      return withText(block.richText, (text) => `1. ${text}\n`);
    case 'to_do':
      return withText(block.richText, (text) => `- [${block.checked ? 'x' : ' '}] ${text}\n`);
    case 'code':
      return withText(block.richText, (text) => `\`\`\`${block.language}\n${text}\n\`\`\`\n\n`);
    case 'quote':
      return withText(block.richText, (text) => `> ${text}\n\n`);
    case 'divider':
      return '---\n\n';
    case 'callout':
      return withText(block.richText, (text) => `${block.icon} ${text}\n\n`);
    case 'unsupported':
      return '';
    default: {
      const exhaustive: never = block;
      return exhaustive;
    }
  }
}

/**
 * Renders a page's top-level blocks to Markdown. Returns `null` when nothing
 * but whitespace would be produced.
 */
export function renderMarkdown(blocks: readonly RawBlock[]): string | null {
  const markdown = blocks.map((raw) => renderBlock(toBlock(raw))).join('');
  return markdown.trim() ? markdown : null;
}
