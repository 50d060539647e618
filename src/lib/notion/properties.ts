import { z } from 'zod';
import { plainText, richTextItemSchema, type PropertySchemaEntry } from './schemas';
import { silentLogger, type CurationLogger } from '../logging';

export type PropertyValue = string | number | boolean | null | ReadonlyArray<string | null>;

export interface PropertyUpdate {
  value: PropertyValue;
  /** Overrides the type found in the database schema. */
  type?: string;
}

export type PropertyUpdates = Record<string, PropertyUpdate>;

export type PropertyPayload = Record<string, unknown>;

const TYPE_ALIASES: Record<string, string> = {
  text: 'rich_text',
};

export function normalizePropertyType(type: string): string {
  return TYPE_ALIASES[type] ?? type;
}

function textContent(content: string) {
  return [{ type: 'text', text: { content } }];
}

function asString(value: PropertyValue): string | null {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

function asList(value: PropertyValue): string[] | null {
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string' && item.length > 0);
  }
  return null;
}

/**
 * Converts one value into the write payload for a property of the given type.
 * Returns `null` when the type is unsupported or the value has the wrong shape.
 */
export function buildPropertyPayload(type: string, value: PropertyValue): PropertyPayload | null {
  switch (normalizePropertyType(type)) {
    case 'title': {
      const text = asString(value);
      return text === null ? null : { title: textContent(text) };
    }
    case 'rich_text': {
      const text = asString(value);
      return text === null ? null : { rich_text: textContent(text) };
    }
    case 'select': {
      const name = asString(value);
      return { select: name ? { name } : null };
    }
    case 'status': {
      const name = asString(value);
      return name ? { status: { name } } : null;
    }
    case 'multi_select': {
      const names = asList(value);
      return names === null ? null : { multi_select: names.map((name) => ({ name })) };
    }
    case 'relation': {
      const ids = asList(value);
      return ids === null ? null : { relation: ids.map((id) => ({ id })) };
    }
    case 'checkbox':
      return typeof value === 'boolean' ? { checkbox: value } : null;
    case 'number': {
      if (value === null) {
        return { number: null };
      }
      const numeric = typeof value === 'number' ? value : Number(asString(value));
      return Number.isFinite(numeric) ? { number: numeric } : null;
    }
    case 'date': {
      if (value === null) {
        return { date: null };
      }
      const start = asString(value);
      return start ? { date: { start } } : null;
    }
    default:
      return null;
  }
}

export function buildPropertiesPayload(
  updates: PropertyUpdates,
  schema: Record<string, PropertySchemaEntry>,
  logger: CurationLogger = silentLogger,
): Record<string, PropertyPayload> {
  const payload: Record<string, PropertyPayload> = {};
  for (const [name, update] of Object.entries(updates)) {
    const type = update.type ?? schema[name]?.type;
    if (!type) {
      logger.warn('notion.property.unknown', { property: name });
      continue;
    }
    const built = buildPropertyPayload(type, update.value);
    if (!built) {
      logger.warn('notion.property.unsupported', { property: name, type });
      continue;
    }
    payload[name] = built;
  }
  return payload;
}

export const ADDABLE_PROPERTY_TYPES = ['text', 'rich_text', 'number', 'checkbox', 'select', 'date'] as const;

export type AddablePropertyType = (typeof ADDABLE_PROPERTY_TYPES)[number];

export function buildPropertyConfig(type: AddablePropertyType): PropertyPayload {
  switch (type) {
    case 'text':
    case 'rich_text':
      return { rich_text: {} };
    case 'number':
      return { number: { format: 'number' } };
    case 'checkbox':
      return { checkbox: {} };
    case 'select':
      return { select: { options: [] } };
    case 'date':
      return { date: {} };
  }
}

const titlePropertySchema = z.object({ title: z.array(richTextItemSchema) });
const richTextPropertySchema = z.object({ rich_text: z.array(richTextItemSchema) });
const relationPropertySchema = z.object({ relation: z.array(z.object({ id: z.string() })) });
const namedOptionSchema = z.object({ name: z.string() }).nullable();
const statusPropertySchema = z.union([
  z.object({ status: namedOptionSchema }),
  z.object({ select: namedOptionSchema }),
]);

export function readTitle(properties: Record<string, unknown>, name: string): string | null {
  const parsed = titlePropertySchema.safeParse(properties[name]);
  if (!parsed.success || parsed.data.title.length === 0) {
    return null;
  }
  return plainText(parsed.data.title);
}

export function readRichText(properties: Record<string, unknown>, name: string): string | null {
  const parsed = richTextPropertySchema.safeParse(properties[name]);
  if (!parsed.success || parsed.data.rich_text.length === 0) {
    return null;
  }
  return plainText(parsed.data.rich_text);
}

export function readRelationIds(properties: Record<string, unknown>, name: string): string[] | null {
  const parsed = relationPropertySchema.safeParse(properties[name]);
  return parsed.success ? parsed.data.relation.map((entry) => entry.id) : null;
}

export function readOptionName(properties: Record<string, unknown>, name: string): string | null {
  const parsed = statusPropertySchema.safeParse(properties[name]);
  if (!parsed.success) {
    return null;
  }
  const option = 'status' in parsed.data ? parsed.data.status : parsed.data.select;
  return option?.name ?? null;
}

/** Finds the page title regardless of what the title property is called. */
export function readAnyTitle(properties: Record<string, unknown>): string | null {
  for (const name of Object.keys(properties)) {
    const title = readTitle(properties, name);
    if (title !== null) {
      return title;
    }
  }
  return null;
}
