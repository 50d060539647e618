import { WorkspaceRequestError } from '../curation/errors';
import type { FetchFn } from '../http';
import { defaultLogger, describeError, type CurationLogger } from '../logging';
import {
  buildPropertiesPayload,
  buildPropertyConfig,
  buildPropertyPayload,
  normalizePropertyType,
  type AddablePropertyType,
  type PropertyPayload,
  type PropertyUpdates,
  type PropertyValue,
} from './properties';
import {
  databaseSchema,
  listResponseSchema,
  pageSchema,
  plainText,
  rawBlockSchema,
  type NotionPage,
  type PropertySchemaEntry,
  type RawBlock,
} from './schemas';
import { RateThrottle } from './throttle';

export type FilterCondition = 'equals' | 'contains' | 'greater_than' | 'less_than';

export interface RecordFilter {
  property: string;
  condition: FilterCondition;
  value: string | number | boolean;
}

export interface DatabaseSummary {
  id: string;
  title: string;
}

export type DatabaseProperties = Record<string, PropertySchemaEntry>;

interface NotionGatewayOptions {
  token: string;
  baseUrl?: string;
  notionVersion?: string;
  rateLimitSeconds?: number;
  requestTimeoutMs?: number;
  throttle?: RateThrottle;
  fetch?: FetchFn;
  logger?: CurationLogger;
}

const DEFAULT_BASE_URL = 'https://api.notion.com/v1';
const DEFAULT_NOTION_VERSION = '2022-06-28';
const DEFAULT_TIMEOUT_MS = 30_000;
const PAGE_SIZE = 100;
const UNTITLED = 'Untitled';

type HttpMethod = 'GET' | 'POST' | 'PATCH';

const DATE_CONDITIONS: Record<FilterCondition, string> = {
  equals: 'equals',
  contains: 'equals',
  greater_than: 'after',
  less_than: 'before',
};

/**
 * Thin client over the Notion REST API. Every request waits on the shared
 * throttle first. Public methods log failures and return an empty value.
 */
export class NotionGateway {
  private readonly token: string;

  private readonly baseUrl: string;

  private readonly notionVersion: string;

  private readonly requestTimeoutMs: number;

  private readonly throttle: RateThrottle;

  private readonly fetchImpl: FetchFn;

  private readonly logger: CurationLogger;

  private readonly contentCache = new Map<string, NotionPage[]>();

  private readonly schemaCache = new Map<string, DatabaseProperties>();

  constructor(options: NotionGatewayOptions) {
    this.token = options.token;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.notionVersion = options.notionVersion ?? DEFAULT_NOTION_VERSION;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.throttle =
      options.throttle ?? new RateThrottle({ minIntervalSeconds: options.rateLimitSeconds ?? 0.5 });
    this.fetchImpl = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.logger = options.logger ?? defaultLogger;
  }

  async listDatabases(): Promise<DatabaseSummary[]> {
    try {
      const results = await this.paginate('POST', '/search', {
        filter: { property: 'object', value: 'database' },
      });
      const databases: DatabaseSummary[] = [];
      for (const entry of results) {
        const parsed = databaseSchema.safeParse(entry);
        if (parsed.success) {
          databases.push({ id: parsed.data.id, title: plainText(parsed.data.title) || UNTITLED });
        }
      }
      return databases;
    } catch (error) {
      this.logFailure('notion.search.failed', error);
      return [];
    }
  }

  async findDatabaseByName(name: string): Promise<string | null> {
    const databases = await this.listDatabases();
    return databases.find((database) => database.title === name)?.id ?? null;
  }

  async getSchema(databaseId: string): Promise<DatabaseProperties> {
    const cached = this.schemaCache.get(databaseId);
    if (cached) {
      return cached;
    }
    try {
      const data = await this.request('GET', `/databases/${databaseId}`);
      const database = databaseSchema.parse(data);
      this.schemaCache.set(databaseId, database.properties);
      return database.properties;
    } catch (error) {
      this.logFailure('notion.schema.failed', error, { databaseId });
      return {};
    }
  }

  async addProperty(
    databaseId: string,
    name: string,
    type: AddablePropertyType,
    defaultValue?: PropertyValue,
  ): Promise<boolean> {
    const schema = await this.getSchema(databaseId);
    if (name in schema) {
      this.logger.warn('notion.property.exists', { databaseId, property: name });
      return false;
    }
    try {
      await this.request('PATCH', `/databases/${databaseId}`, {
        properties: { [name]: buildPropertyConfig(type) },
      });
    } catch (error) {
      this.logFailure('notion.property.add-failed', error, { databaseId, property: name });
      return false;
    } finally {
      this.schemaCache.delete(databaseId);
    }

    if (defaultValue === undefined || defaultValue === null) {
      return true;
    }
    const payload = buildPropertyPayload(type, defaultValue);
    if (!payload) {
      this.logger.warn('notion.property.default-skipped', { databaseId, property: name, type });
      return true;
    }
    const pages = await this.getDatabaseContent(databaseId, { useCache: false });
    for (const page of pages) {
      await this.updatePageRaw(page.id, { [name]: payload });
    }
    return true;
  }

  async removeProperty(databaseId: string, name: string): Promise<boolean> {
    const schema = await this.getSchema(databaseId);
    if (!(name in schema)) {
      this.logger.warn('notion.property.missing', { databaseId, property: name });
      return false;
    }
    try {
      await this.request('PATCH', `/databases/${databaseId}`, { properties: { [name]: null } });
      return true;
    } catch (error) {
      this.logFailure('notion.property.remove-failed', error, { databaseId, property: name });
      return false;
    } finally {
      this.schemaCache.delete(databaseId);
    }
  }

  async queryDatabase(databaseId: string, filter?: RecordFilter): Promise<NotionPage[]> {
    try {
      const body: Record<string, unknown> = {};
      if (filter) {
        const built = await this.buildFilter(databaseId, filter);
        if (!built) {
          return [];
        }
        body.filter = built;
      }
      const results = await this.paginate('POST', `/databases/${databaseId}/query`, body);
      return this.parsePages(results);
    } catch (error) {
      this.logFailure('notion.query.failed', error, { databaseId, filter });
      return [];
    }
  }

  async getDatabaseContent(
    databaseId: string,
    options: { useCache?: boolean } = {},
  ): Promise<NotionPage[]> {
    const useCache = options.useCache ?? true;
    const cached = this.contentCache.get(databaseId);
    if (useCache && cached) {
      return cached;
    }
    try {
      const results = await this.paginate('POST', `/databases/${databaseId}/query`, {});
      const pages = this.parsePages(results);
      this.contentCache.set(databaseId, pages);
      return pages;
    } catch (error) {
      this.logFailure('notion.content.failed', error, { databaseId });
      return [];
    }
  }

  clearCache(databaseId?: string): void {
    if (databaseId) {
      this.contentCache.delete(databaseId);
      return;
    }
    this.contentCache.clear();
  }

  async listBlockChildren(blockId: string): Promise<RawBlock[]> {
    try {
      const results = await this.paginate('GET', `/blocks/${blockId}/children`);
      const blocks: RawBlock[] = [];
      for (const entry of results) {
        const parsed = rawBlockSchema.safeParse(entry);
        if (parsed.success) {
          blocks.push(parsed.data);
        }
      }
      return blocks;
    } catch (error) {
      this.logFailure('notion.blocks.failed', error, { blockId });
      return [];
    }
  }

  async createPage(databaseId: string, properties: PropertyUpdates): Promise<string | null> {
    const schema = await this.getSchema(databaseId);
    const payload = buildPropertiesPayload(properties, schema, this.logger);
    try {
      const data = await this.request('POST', '/pages', {
        parent: { database_id: databaseId },
        properties: payload,
      });
      return pageSchema.parse(data).id;
    } catch (error) {
      this.logFailure('notion.page.create-failed', error, { databaseId });
      return null;
    }
  }

  async updatePage(
    pageId: string,
    properties: PropertyUpdates,
    schema: DatabaseProperties = {},
  ): Promise<boolean> {
    const payload = buildPropertiesPayload(properties, schema, this.logger);
    if (Object.keys(payload).length === 0) {
      this.logger.warn('notion.page.nothing-to-update', { pageId });
      return false;
    }
    return this.updatePageRaw(pageId, payload);
  }

  async updatePageText(pageId: string, text: string, propertyName: string): Promise<boolean> {
    return this.updatePage(pageId, { [propertyName]: { value: text, type: 'rich_text' } });
  }

  private async updatePageRaw(pageId: string, payload: Record<string, PropertyPayload>): Promise<boolean> {
    try {
      await this.request('PATCH', `/pages/${pageId}`, { properties: payload });
      return true;
    } catch (error) {
      this.logFailure('notion.page.update-failed', error, { pageId });
      return false;
    }
  }

  private async buildFilter(
    databaseId: string,
    filter: RecordFilter,
  ): Promise<Record<string, unknown> | null> {
    const schema = await this.getSchema(databaseId);
    const entry = schema[filter.property];
    if (!entry) {
      this.logger.warn('notion.filter.unknown-property', { databaseId, property: filter.property });
      return null;
    }
    const type = normalizePropertyType(entry.type);
    let condition: string = filter.condition;
    let value: string | number | boolean = filter.value;

    switch (type) {
      case 'number':
        value = Number(filter.value);
        if (filter.condition === 'greater_than' || filter.condition === 'less_than') {
          break;
        }
        condition = 'equals';
        break;
      case 'checkbox':
        value = filter.value === true || String(filter.value).toLowerCase() === 'true';
        condition = 'equals';
        break;
      case 'date':
        condition = DATE_CONDITIONS[filter.condition];
        value = String(filter.value);
        break;
      case 'relation':
      case 'multi_select':
        condition = 'contains';
        value = String(filter.value);
        break;
      default:
        value = String(filter.value);
    }

    return { property: filter.property, [type]: { [condition]: value } };
  }

  private parsePages(results: unknown[]): NotionPage[] {
    const pages: NotionPage[] = [];
    for (const entry of results) {
      const parsed = pageSchema.safeParse(entry);
      if (parsed.success) {
        pages.push(parsed.data);
      }
    }
    return pages;
  }

  private async paginate(
    method: HttpMethod,
    path: string,
    body?: Record<string, unknown>,
  ): Promise<unknown[]> {
    const results: unknown[] = [];
    let cursor: string | null = null;

    do {
      let data: unknown;
      if (method === 'GET') {
        const params = new URLSearchParams({ page_size: String(PAGE_SIZE) });
        if (cursor) {
          params.set('start_cursor', cursor);
        }
        data = await this.request('GET', `${path}?${params.toString()}`);
      } else {
        data = await this.request(method, path, {
          ...body,
          page_size: PAGE_SIZE,
          ...(cursor ? { start_cursor: cursor } : {}),
        });
      }
      const page = listResponseSchema.parse(data);
      results.push(...page.results);
      cursor = page.has_more && page.next_cursor ? page.next_cursor : null;
    } while (cursor);

    return results;
  }

  private async request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    await this.throttle.wait();

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.requestTimeoutMs).unref?.();

    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${this.token}`,
          'Notion-Version': this.notionVersion,
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const text = await response.text();
        throw new WorkspaceRequestError(`Notion request failed (status ${response.status})`, {
          details: { status: response.status, method, path, body: text.slice(0, 500) },
        });
      }

      const data: unknown = await response.json();
      return data;
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }

  private logFailure(message: string, error: unknown, extra: Record<string, unknown> = {}): void {
    const details = error instanceof WorkspaceRequestError ? error.details : {};
    this.logger.error(message, {
      code: error instanceof WorkspaceRequestError ? error.code : 'WORKSPACE_REQUEST_FAILED',
      ...describeError(error),
      ...details,
      ...extra,
    });
  }
}
