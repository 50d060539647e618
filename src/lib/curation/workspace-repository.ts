import { defaultLogger, type CurationLogger } from '../logging';
import type { NotionGateway, RecordFilter } from '../notion/gateway';
import {
  readOptionName,
  readRelationIds,
  readRichText,
  readTitle,
  type PropertyUpdates,
} from '../notion/properties';
import { renderMarkdown } from '../notion/rich-text';
import type { NotionPage } from '../notion/schemas';
import {
  DEFAULT_WORKSPACE_SCHEMA,
  type ArticleStatus,
  type ArticleStub,
  type AuthorDescriptionUpdate,
  type AuthorSummary,
  type FieldEntry,
  type FieldReasonUpdate,
  type RenderedContent,
  type WorkspacePort,
  type WorkspaceSchema,
} from './types';

export interface WorkspaceDatabases {
  authors: string;
  fields: string;
  articles: string;
}

type GatewayPort = Pick<
  NotionGateway,
  'queryDatabase' | 'listBlockChildren' | 'createPage' | 'updatePage' | 'getSchema'
>;

interface WorkspaceRepositoryOptions {
  gateway: GatewayPort;
  databases: WorkspaceDatabases;
  schema?: WorkspaceSchema;
  logger?: CurationLogger;
}

/**
 * Projects the three curation databases into domain records and writes
 * changes back. Records that lack a required property are skipped.
 */
export class WorkspaceRepository implements WorkspacePort {
  readonly schema: WorkspaceSchema;

  private readonly gateway: GatewayPort;

  private readonly databases: WorkspaceDatabases;

  private readonly logger: CurationLogger;

  constructor(options: WorkspaceRepositoryOptions) {
    this.gateway = options.gateway;
    this.databases = options.databases;
    this.schema = options.schema ?? DEFAULT_WORKSPACE_SCHEMA;
    this.logger = options.logger ?? defaultLogger;
  }

  async getAuthors(filter?: RecordFilter): Promise<AuthorSummary[]> {
    const pages = await this.gateway.queryDatabase(this.databases.authors, filter);
    const { name, description } = this.schema.authors;
    const authors: AuthorSummary[] = [];
    for (const page of pages) {
      const title = readTitle(page.properties, name);
      if (title === null) {
        this.skip('author', page);
        continue;
      }
      authors.push({
        id: page.id,
        name: title,
        description: readRichText(page.properties, description),
      });
    }
    return authors;
  }

  async getAuthorIds(): Promise<Set<string>> {
    const pages = await this.gateway.queryDatabase(this.databases.authors);
    return new Set(pages.map((page) => page.id));
  }

  async getFields(filter?: RecordFilter): Promise<FieldEntry[]> {
    const pages = await this.gateway.queryDatabase(this.databases.fields, filter);
    const fields: FieldEntry[] = [];
    for (const page of pages) {
      const name = readTitle(page.properties, this.schema.fields.name);
      if (name === null) {
        this.skip('field', page);
        continue;
      }
      fields.push({
        id: page.id,
        name,
        category: name,
        reason: readRichText(page.properties, this.schema.fields.reason) ?? '',
      });
    }
    return fields;
  }

  async getArticles(filter?: RecordFilter): Promise<ArticleStub[]> {
    const pages = await this.gateway.queryDatabase(this.databases.articles, filter);
    const { title, author, status } = this.schema.articles;
    const articles: ArticleStub[] = [];
    for (const page of pages) {
      const name = readTitle(page.properties, title);
      const authorRelationIds = readRelationIds(page.properties, author);
      if (name === null || authorRelationIds === null) {
        this.skip('article', page);
        continue;
      }
      if (this.schema.placeholderTitles.includes(name)) {
        continue;
      }
      articles.push({
        id: page.id,
        name,
        authorRelationIds,
        status: this.toStatus(readOptionName(page.properties, status)),
      });
    }
    return articles;
  }

  async getArticleContent(pageId: string): Promise<RenderedContent | null> {
    const blocks = await this.gateway.listBlockChildren(pageId);
    const markdown = renderMarkdown(blocks);
    return markdown === null ? null : { markdown, blocks };
  }

  async newAuthor(properties: PropertyUpdates): Promise<string | null> {
    return this.gateway.createPage(this.databases.authors, properties);
  }

  async updateArticleDetail(pageId: string, properties: PropertyUpdates): Promise<boolean> {
    const schema = await this.gateway.getSchema(this.databases.articles);
    return this.gateway.updatePage(pageId, properties, schema);
  }

  async updateAuthorDescriptions(items: readonly AuthorDescriptionUpdate[]): Promise<number> {
    const schema = await this.gateway.getSchema(this.databases.authors);
    const { description, englishName, chineseName } = this.schema.authors;
    let updated = 0;
    for (const item of items) {
      const ok = await this.gateway.updatePage(
        item.id,
        {
          [description]: { value: item.description, type: 'rich_text' },
          [englishName]: { value: item.englishName, type: 'rich_text' },
          [chineseName]: { value: item.chineseName, type: 'rich_text' },
        },
        schema,
      );
      if (ok) {
        updated += 1;
      }
    }
    return updated;
  }

  async updateFieldReasons(items: readonly FieldReasonUpdate[]): Promise<number> {
    const schema = await this.gateway.getSchema(this.databases.fields);
    let updated = 0;
    for (const item of items) {
      const ok = await this.gateway.updatePage(
        item.id,
        { [this.schema.fields.reason]: { value: item.reason, type: 'rich_text' } },
        schema,
      );
      if (ok) {
        updated += 1;
      }
    }
    return updated;
  }

  private toStatus(label: string | null): ArticleStatus | null {
    if (label === null) {
      return null;
    }
    const entries = Object.entries(this.schema.statusLabels);
    for (const [status, statusLabel] of entries) {
      if (statusLabel === label && isArticleStatus(status)) {
        return status;
      }
    }
    return null;
  }

  private skip(kind: string, page: NotionPage): void {
    this.logger.warn('curation.record.skipped', { kind, pageId: page.id });
  }
}

const ARTICLE_STATUSES: readonly ArticleStatus[] = ['NotStarted', 'InProgress', 'InfoMissing'];

function isArticleStatus(value: string): value is ArticleStatus {
  return ARTICLE_STATUSES.some((status) => status === value);
}
