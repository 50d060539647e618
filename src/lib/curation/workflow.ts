import { defaultLogger, type CurationLogger } from '../logging';
import type { ClassificationResult } from '../model/model-client';
import type { RecordFilter } from '../notion/gateway';
import type { PropertyUpdates } from '../notion/properties';
import type { ArtifactStore } from './artifacts';
import {
  AuthorResolutionError,
  ClassificationError,
  EmptyArticleContentError,
  WorkspaceWriteError,
} from './errors';
import type {
  ArticleOutcome,
  ArticleStatus,
  ArticleStub,
  AuthorDescriptionUpdate,
  ClassifierPort,
  FieldEntry,
  FieldReasonUpdate,
  WorkspacePort,
} from './types';

const UNKNOWN_SENTINELS = new Set(['unknown', '未知', 'none', '']);

export function isUnknownValue(value: string | null | undefined): boolean {
  if (value === null || value === undefined) {
    return true;
  }
  return UNKNOWN_SENTINELS.has(value.trim());
}

export function isUnknownAuthor(result: ClassificationResult): boolean {
  return (
    isUnknownValue(result.author) &&
    isUnknownValue(result.authorEnglishName) &&
    isUnknownValue(result.authorChineseName)
  );
}

export function decideStatus(result: ClassificationResult): ArticleStatus {
  return isUnknownAuthor(result) ? 'InfoMissing' : 'InProgress';
}

/** Maps category names to field ids; unmatched names become `null`. */
export function resolveCategoryIds(
  fieldIds: ReadonlyMap<string, string>,
  category: string | readonly string[] | null,
): Array<string | null> {
  if (category === null) {
    return [];
  }
  const names = typeof category === 'string' ? category.split(',') : category;
  return names.map((name) => fieldIds.get(name.trim()) ?? null);
}

export function buildClassificationPrompt(
  article: Pick<ArticleStub, 'name'>,
  content: string,
  fields?: readonly FieldEntry[],
): string {
  const body = [`文章标题：${article.name}`, `文章内容：${content}`];
  if (!fields) {
    return body.join('\n');
  }
  return [
    '==============',
    '【分类类型】:【理由】',
    '==============',
    fields.map((field) => `${field.category}:${field.reason}`).join('\n'),
    ...body,
  ].join('\n');
}

interface ReconciliationWorkflowOptions {
  workspace: WorkspacePort;
  classifier: ClassifierPort;
  artifacts: ArtifactStore;
  logger?: CurationLogger;
}

export interface AuthorResolution {
  authorId: string;
  created: boolean;
}

export class ReconciliationWorkflow {
  private readonly workspace: WorkspacePort;

  private readonly classifier: ClassifierPort;

  private readonly artifacts: ArtifactStore;

  private readonly logger: CurationLogger;

  constructor(options: ReconciliationWorkflowOptions) {
    this.workspace = options.workspace;
    this.classifier = options.classifier;
    this.artifacts = options.artifacts;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Classifies one article and writes status, author and category back.
   * Pass `fields` to classify against the taxonomy; without it only
   * authorship is extracted.
   */
  async processArticle(article: ArticleStub, fields?: readonly FieldEntry[]): Promise<ArticleOutcome> {
    const content = await this.workspace.getArticleContent(article.id);
    if (!content) {
      throw new EmptyArticleContentError('Article has no renderable content', {
        details: { articleId: article.id },
      });
    }

    const classification = await this.classifier.getArticleInfo({
      prompt: buildClassificationPrompt(article, content.markdown, fields),
      tag: article.id,
      searchSeed: content.markdown,
      withCategories: fields !== undefined,
    });
    if (!classification) {
      throw new ClassificationError('Model did not return a usable classification', {
        details: { articleId: article.id },
      });
    }

    await this.artifacts.writeArticleArtifact(article.id, { ...classification.raw, ...article });

    const status = decideStatus(classification);
    const resolution = status === 'InfoMissing' ? null : await this.resolveAuthor(classification);

    const categoryIds = fields
      ? resolveCategoryIds(new Map(fields.map((field) => [field.category, field.id])), classification.category)
      : [];

    const { articles } = this.workspace.schema;
    const updates: PropertyUpdates = {};
    if (article.status !== status) {
      updates[articles.status] = { value: this.workspace.schema.statusLabels[status] };
    }
    if (resolution && !isSameRelation(article.authorRelationIds, [resolution.authorId])) {
      updates[articles.author] = { value: [resolution.authorId], type: 'relation' };
    }
    if (fields) {
      updates[articles.category] = { value: categoryIds, type: 'relation' };
    }

    let written = false;
    if (Object.keys(updates).length > 0) {
      written = await this.workspace.updateArticleDetail(article.id, updates);
      if (!written) {
        throw new WorkspaceWriteError('Article update was rejected', {
          details: { articleId: article.id, properties: Object.keys(updates) },
        });
      }
    }

    this.logger.info('curation.article.processed', {
      articleId: article.id,
      status,
      authorId: resolution?.authorId ?? null,
      authorCreated: resolution?.created ?? false,
      written,
    });

    return {
      articleId: article.id,
      status,
      authorId: resolution?.authorId ?? null,
      authorCreated: resolution?.created ?? false,
      categoryIds,
      written,
    };
  }

  /**
   * Looks the author up by English name (substring match), then by Chinese
   * name (exact match), and creates a record when both miss. Marker values
   * such as `unknown` are looked up like any other name; only an absent or
   * blank key is not sent, since it would match every author.
   */
  async resolveAuthor(result: ClassificationResult): Promise<AuthorResolution> {
    const { englishName, chineseName, name, description } = this.workspace.schema.authors;

    const lookups: RecordFilter[] = [];
    if (result.authorEnglishName?.trim()) {
      lookups.push({ property: englishName, condition: 'contains', value: result.authorEnglishName });
    }
    if (result.authorChineseName?.trim()) {
      lookups.push({ property: chineseName, condition: 'equals', value: result.authorChineseName });
    }

    for (const filter of lookups) {
      const matches = await this.workspace.getAuthors(filter);
      if (matches.length > 0) {
        return { authorId: matches[0].id, created: false };
      }
    }

    const info = await this.classifier.getAuthorInfo({ name: result.author ?? '' });
    const authorId = await this.workspace.newAuthor({
      [chineseName]: { value: isUnknownValue(result.authorChineseName) ? '' : result.authorChineseName, type: 'rich_text' },
      [englishName]: { value: result.authorEnglishName ?? '', type: 'rich_text' },
      [name]: { value: result.author ?? '', type: 'title' },
      [description]: { value: info?.introduction ?? '', type: 'rich_text' },
    });
    if (!authorId) {
      throw new AuthorResolutionError('Author record could not be created', {
        details: { author: result.author, englishName: result.authorEnglishName },
      });
    }
    this.logger.info('curation.author.created', { authorId, author: result.author });
    return { authorId, created: true };
  }

  /**
   * Drops author relations that point at deleted author records. Returns the
   * number of articles rewritten.
   */
  async removeUnknownAuthors(statusFilter?: ArticleStatus): Promise<number> {
    const authorIds = await this.workspace.getAuthorIds();
    const { status, author } = this.workspace.schema.articles;
    const filter: RecordFilter | undefined = statusFilter
      ? { property: status, condition: 'equals', value: this.workspace.schema.statusLabels[statusFilter] }
      : undefined;
    const articles = await this.workspace.getArticles(filter);

    let updated = 0;
    for (const article of articles) {
      const kept = article.authorRelationIds.filter((id) => authorIds.has(id));
      if (kept.length === article.authorRelationIds.length) {
        continue;
      }
      const ok = await this.workspace.updateArticleDetail(article.id, {
        [author]: { value: kept, type: 'relation' },
      });
      if (ok) {
        updated += 1;
      } else {
        this.logger.error('curation.cleanup.update-failed', { articleId: article.id });
      }
    }
    this.logger.info('curation.cleanup.complete', { scanned: articles.length, updated });
    return updated;
  }

  /** Reads the taxonomy from the workspace, or from the local catalog file. */
  async loadFields(options: { refresh?: boolean } = {}): Promise<FieldEntry[]> {
    if (!options.refresh) {
      const cached = await this.artifacts.readFieldCatalog();
      if (cached) {
        return cached;
      }
    }
    const fields = await this.workspace.getFields();
    await this.artifacts.writeFieldCatalog(fields);
    return fields;
  }

  async refreshFieldReasons(): Promise<number> {
    const fields = await this.workspace.getFields();
    const updates: FieldReasonUpdate[] = [];
    for (const field of fields) {
      const info = await this.classifier.getFieldInfo({ id: field.id, name: field.name });
      if (info?.reason) {
        updates.push({ id: field.id, reason: info.reason });
      }
    }
    return this.workspace.updateFieldReasons(updates);
  }

  async enrichAuthors(): Promise<number> {
    const authors = await this.workspace.getAuthors();
    const updates: AuthorDescriptionUpdate[] = [];
    for (const author of authors) {
      const info = await this.classifier.getAuthorInfo({
        id: author.id,
        name: author.name,
        description: author.description,
      });
      if (!info || isUnknownValue(info.introduction)) {
        continue;
      }
      updates.push({
        id: author.id,
        description: info.introduction ?? '',
        englishName: isUnknownValue(info.englishName) ? '' : info.englishName ?? '',
        chineseName: isUnknownValue(info.chineseName) ? '' : info.chineseName ?? '',
      });
    }
    return this.workspace.updateAuthorDescriptions(updates);
  }
}

function isSameRelation(current: readonly string[], next: readonly string[]): boolean {
  return current.length === next.length && current.every((id, index) => id === next[index]);
}
