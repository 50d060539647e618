import { z } from 'zod';
import type { DatabaseSummary, NotionGateway } from '../notion/gateway';
import { ADDABLE_PROPERTY_TYPES, readAnyTitle, readRichText } from '../notion/properties';
import { renderMarkdown } from '../notion/rich-text';
import type { NotionPage } from '../notion/schemas';

export const TEXT_PROPERTY = '文本';
export const UNTITLED_PAGE = 'Untitled';

const scalarValue = z.union([z.string(), z.number(), z.boolean()]);

const addPropertySchema = z.object({
  database_id: z.string().trim().min(1),
  property_name: z.string().trim().min(1),
  property_type: z.enum(ADDABLE_PROPERTY_TYPES),
  default_value: scalarValue.nullish(),
});

const filterSchema = z.object({
  database_id: z.string().trim().min(1),
  filter_property: z.string().trim().min(1),
  filter_value: scalarValue,
  filter_type: z.enum(['equals', 'contains', 'greater_than', 'less_than']).default('equals'),
});

const updateTextSchema = z.object({
  database_id: z.string().trim().min(1),
  text_content: z.string().min(1),
});

export type AddPropertyInput = z.infer<typeof addPropertySchema>;
export type FilterInput = z.infer<typeof filterSchema>;
export type UpdateTextInput = z.infer<typeof updateTextSchema>;

export function parseAddPropertyPayload(input: unknown): AddPropertyInput {
  return addPropertySchema.parse(input);
}

export function parseFilterPayload(input: unknown): FilterInput {
  return filterSchema.parse(input);
}

export function parseUpdateTextPayload(input: unknown): UpdateTextInput {
  return updateTextSchema.parse(input);
}

type AdminGateway = Pick<
  NotionGateway,
  | 'listDatabases'
  | 'findDatabaseByName'
  | 'getDatabaseContent'
  | 'addProperty'
  | 'removeProperty'
  | 'queryDatabase'
  | 'updatePageText'
  | 'listBlockChildren'
>;

export function pageTitle(page: NotionPage): string {
  return readAnyTitle(page.properties) || UNTITLED_PAGE;
}

/** Database maintenance operations shared by the HTTP server and the CLI. */
export class WorkspaceAdmin {
  private readonly gateway: AdminGateway;

  private readonly textProperty: string;

  constructor(gateway: AdminGateway, textProperty: string = TEXT_PROPERTY) {
    this.gateway = gateway;
    this.textProperty = textProperty;
  }

  listDatabases(): Promise<DatabaseSummary[]> {
    return this.gateway.listDatabases();
  }

  findDatabaseByName(name: string): Promise<string | null> {
    return this.gateway.findDatabaseByName(name);
  }

  getDatabaseContent(databaseId: string): Promise<NotionPage[]> {
    return this.gateway.getDatabaseContent(databaseId);
  }

  addProperty(input: AddPropertyInput): Promise<boolean> {
    return this.gateway.addProperty(
      input.database_id,
      input.property_name,
      input.property_type,
      input.default_value ?? undefined,
    );
  }

  removeProperty(databaseId: string, propertyName: string): Promise<boolean> {
    return this.gateway.removeProperty(databaseId, propertyName);
  }

  filter(input: FilterInput): Promise<NotionPage[]> {
    return this.gateway.queryDatabase(input.database_id, {
      property: input.filter_property,
      condition: input.filter_type,
      value: input.filter_value,
    });
  }

  /** Writes `text` into every page whose text property is still empty. */
  async fillEmptyText(input: UpdateTextInput): Promise<{ candidates: number; successCount: number }> {
    const pages = await this.gateway.getDatabaseContent(input.database_id, { useCache: false });
    const candidates = pages.filter((page) => !readRichText(page.properties, this.textProperty));
    const results = await Promise.all(
      candidates.map((page) =>
        this.gateway.updatePageText(page.id, input.text_content, this.textProperty),
      ),
    );
    return {
      candidates: candidates.length,
      successCount: results.filter(Boolean).length,
    };
  }

  /** Renders the first page with the given title, or `null` if none matches. */
  async renderPage(databaseId: string, title: string): Promise<string | null> {
    const pages = await this.gateway.getDatabaseContent(databaseId);
    const page = pages.find((candidate) => pageTitle(candidate) === title);
    if (!page) {
      return null;
    }
    const blocks = await this.gateway.listBlockChildren(page.id);
    return renderMarkdown(blocks) ?? '';
  }
}
