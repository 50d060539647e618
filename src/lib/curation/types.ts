import type { RecordFilter } from '../notion/gateway';
import type { PropertyUpdates } from '../notion/properties';
import type { RawBlock } from '../notion/schemas';
import type { AuthorInfo, ArticleInfoRequest, ClassificationResult, FieldInfo } from '../model/model-client';

export type ArticleStatus = 'NotStarted' | 'InProgress' | 'InfoMissing';

/** Property names and option labels as they appear in the workspace. */
export interface WorkspaceSchema {
  articles: {
    title: string;
    author: string;
    status: string;
    category: string;
  };
  authors: {
    name: string;
    englishName: string;
    chineseName: string;
    description: string;
  };
  fields: {
    name: string;
    reason: string;
  };
  statusLabels: Record<ArticleStatus, string>;
  placeholderTitles: readonly string[];
}

export const DEFAULT_WORKSPACE_SCHEMA: WorkspaceSchema = {
  articles: {
    title: '标题',
    author: '作者',
    status: '状态',
    category: '领域',
  },
  authors: {
    name: '名称',
    englishName: '英文名称',
    chineseName: '中文名称',
    description: '简述',
  },
  fields: {
    name: '领域名称',
    reason: '分类概述',
  },
  statusLabels: {
    NotStarted: '未开始',
    InProgress: '进行中',
    InfoMissing: '信息缺失',
  },
  placeholderTitles: ['新文章', 'New Article'],
};

export interface ArticleStub {
  id: string;
  name: string;
  authorRelationIds: string[];
  status: ArticleStatus | null;
}

export interface AuthorSummary {
  id: string;
  name: string;
  description: string | null;
}

export interface FieldEntry {
  id: string;
  name: string;
  category: string;
  reason: string;
}

export interface RenderedContent {
  markdown: string;
  blocks: RawBlock[];
}

export interface AuthorDescriptionUpdate {
  id: string;
  description: string;
  englishName: string;
  chineseName: string;
}

export interface FieldReasonUpdate {
  id: string;
  reason: string;
}

export interface WorkspacePort {
  readonly schema: WorkspaceSchema;
  getAuthors(filter?: RecordFilter): Promise<AuthorSummary[]>;
  getAuthorIds(): Promise<Set<string>>;
  getFields(filter?: RecordFilter): Promise<FieldEntry[]>;
  getArticles(filter?: RecordFilter): Promise<ArticleStub[]>;
  getArticleContent(pageId: string): Promise<RenderedContent | null>;
  newAuthor(properties: PropertyUpdates): Promise<string | null>;
  updateArticleDetail(pageId: string, properties: PropertyUpdates): Promise<boolean>;
  updateAuthorDescriptions(items: readonly AuthorDescriptionUpdate[]): Promise<number>;
  updateFieldReasons(items: readonly FieldReasonUpdate[]): Promise<number>;
}

export interface ClassifierPort {
  getArticleInfo(request: ArticleInfoRequest): Promise<ClassificationResult | null>;
  getAuthorInfo(input: { id?: string; name: string; description?: string | null }): Promise<AuthorInfo | null>;
  getFieldInfo(input: { id?: string; name: string }): Promise<FieldInfo | null>;
}

export interface ArticleOutcome {
  articleId: string;
  status: ArticleStatus;
  authorId: string | null;
  authorCreated: boolean;
  categoryIds: Array<string | null>;
  written: boolean;
}

export interface CurationStats {
  listed: number;
  inProgress: number;
  infoMissing: number;
  authorsCreated: number;
  skipped: number;
  errors: number;
}

export interface RunReport {
  startedAt: string;
  finishedAt: string;
  passed: string[];
  skipped: string[];
  failed: Array<{ id: string; code: string; error: string }>;
}

export interface CurationResult {
  stats: CurationStats;
  report: RunReport;
}
