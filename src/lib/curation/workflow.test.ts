import { describe, it, expect, vi } from 'vitest';
import { silentLogger } from '../logging';
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
import {
  DEFAULT_WORKSPACE_SCHEMA,
  type ArticleStub,
  type AuthorDescriptionUpdate,
  type AuthorSummary,
  type ClassifierPort,
  type FieldEntry,
  type FieldReasonUpdate,
  type RenderedContent,
  type RunReport,
  type WorkspacePort,
} from './types';
import {
  buildClassificationPrompt,
  decideStatus,
  isUnknownValue,
  ReconciliationWorkflow,
  resolveCategoryIds,
} from './workflow';

interface StoredAuthor extends AuthorSummary {
  englishName: string;
  chineseName: string;
}

class MemoryWorkspace implements WorkspacePort {
  readonly schema = DEFAULT_WORKSPACE_SCHEMA;

  authors: StoredAuthor[] = [];

  articles: ArticleStub[] = [];

  fields: FieldEntry[] = [];

  contents = new Map<string, string>();

  authorQueries: RecordFilter[] = [];

  articleQueries: Array<RecordFilter | undefined> = [];

  created: PropertyUpdates[] = [];

  updates: Array<{ pageId: string; properties: PropertyUpdates }> = [];

  authorUpdates: AuthorDescriptionUpdate[] = [];

  fieldUpdates: FieldReasonUpdate[] = [];

  rejectUpdates = false;

  failCreate = false;

  private nextId = 1;

  async getAuthors(filter?: RecordFilter): Promise<AuthorSummary[]> {
    if (!filter) {
      return this.authors;
    }
    this.authorQueries.push(filter);
    const value = String(filter.value);
    return this.authors.filter((author) =>
      filter.property === this.schema.authors.englishName
        ? author.englishName.includes(value)
        : author.chineseName === value,
    );
  }

  async getAuthorIds(): Promise<Set<string>> {
    return new Set(this.authors.map((author) => author.id));
  }

  async getFields(): Promise<FieldEntry[]> {
    return this.fields;
  }

  async getArticles(filter?: RecordFilter): Promise<ArticleStub[]> {
    this.articleQueries.push(filter);
    return this.articles;
  }

  async getArticleContent(pageId: string): Promise<RenderedContent | null> {
    const markdown = this.contents.get(pageId);
    return markdown === undefined ? null : { markdown, blocks: [] };
  }

  async newAuthor(properties: PropertyUpdates): Promise<string | null> {
    if (this.failCreate) {
      return null;
    }
    this.created.push(properties);
    const id = `author-${this.nextId}`;
    this.nextId += 1;
    this.authors.push({
      id,
      name: String(properties[this.schema.authors.name]?.value ?? ''),
      description: null,
      englishName: String(properties[this.schema.authors.englishName]?.value ?? ''),
      chineseName: String(properties[this.schema.authors.chineseName]?.value ?? ''),
    });
    return id;
  }

  async updateArticleDetail(pageId: string, properties: PropertyUpdates): Promise<boolean> {
    if (this.rejectUpdates) {
      return false;
    }
    this.updates.push({ pageId, properties });
    return true;
  }

  async updateAuthorDescriptions(items: readonly AuthorDescriptionUpdate[]): Promise<number> {
    this.authorUpdates.push(...items);
    return items.length;
  }

  async updateFieldReasons(items: readonly FieldReasonUpdate[]): Promise<number> {
    this.fieldUpdates.push(...items);
    return items.length;
  }
}

class MemoryArtifacts implements ArtifactStore {
  articles = new Map<string, Record<string, unknown>>();

  catalog: FieldEntry[] | null = null;

  async writeArticleArtifact(articleId: string, data: Record<string, unknown>): Promise<void> {
    this.articles.set(articleId, data);
  }

  async readFieldCatalog(): Promise<FieldEntry[] | null> {
    return this.catalog;
  }

  async writeFieldCatalog(fields: readonly FieldEntry[]): Promise<void> {
    this.catalog = [...fields];
  }

  async writeRunReport(report: RunReport): Promise<string> {
    return `runs/${report.startedAt}.json`;
  }
}

function classification(values: Partial<Omit<ClassificationResult, 'raw'>>): ClassificationResult {
  const result = {
    author: values.author ?? null,
    authorEnglishName: values.authorEnglishName ?? null,
    authorChineseName: values.authorChineseName ?? null,
    category: values.category ?? null,
    coverImagePrompt: values.coverImagePrompt ?? null,
  };
  return {
    ...result,
    raw: {
      author: result.author,
      author_english_name: result.authorEnglishName,
      author_chinese_name: result.authorChineseName,
      category: result.category,
    },
  };
}

function setup(answer: ClassificationResult | null) {
  const workspace = new MemoryWorkspace();
  const artifacts = new MemoryArtifacts();
  const classifier = {
    getArticleInfo: vi.fn<ClassifierPort['getArticleInfo']>().mockResolvedValue(answer),
    getAuthorInfo: vi.fn<ClassifierPort['getAuthorInfo']>().mockResolvedValue({
      englishName: null,
      chineseName: null,
      introduction: 'Writes about markets.',
    }),
    getFieldInfo: vi.fn<ClassifierPort['getFieldInfo']>().mockResolvedValue(null),
  };
  const workflow = new ReconciliationWorkflow({ workspace, classifier, artifacts, logger: silentLogger });
  return { workspace, artifacts, classifier, workflow };
}

const stub = (id: string, overrides: Partial<ArticleStub> = {}): ArticleStub => ({
  id,
  name: `Article ${id}`,
  authorRelationIds: [],
  status: 'NotStarted',
  ...overrides,
});

describe('isUnknownValue', () => {
  it('treats missing values and the unknown markers as unknown', () => {
    expect([null, undefined, '', '  ', 'unknown', ' unknown ', '未知', 'none'].map(isUnknownValue)).toEqual([
      true, true, true, true, true, true, true, true,
    ]);
    expect(isUnknownValue('Jane Doe')).toBe(false);
  });

  it('compares the markers exactly', () => {
    expect(['Unknown', 'NONE', 'None'].map(isUnknownValue)).toEqual([false, false, false]);
  });
});

describe('decideStatus', () => {
  it('needs all three author fields to be unknown for missing info', () => {
    expect(decideStatus(classification({ author: 'unknown', authorEnglishName: '未知' }))).toBe('InfoMissing');
    expect(decideStatus(classification({ author: 'unknown', authorChineseName: '张三' }))).toBe('InProgress');
    expect(
      decideStatus(classification({ author: 'Unknown', authorEnglishName: 'Unknown', authorChineseName: 'None' })),
    ).toBe('InProgress');
  });
});

describe('resolveCategoryIds', () => {
  const ids = new Map([
    ['科技', 'f1'],
    ['历史', 'f2'],
  ]);

  it('splits a comma-separated answer and keeps misses as null', () => {
    expect(resolveCategoryIds(ids, '科技, 历史,体育')).toEqual(['f1', 'f2', null]);
  });

  it('accepts a list and an absent category', () => {
    expect(resolveCategoryIds(ids, ['历史'])).toEqual(['f2']);
    expect(resolveCategoryIds(ids, null)).toEqual([]);
  });
});

describe('buildClassificationPrompt', () => {
  it('lists the taxonomy ahead of the article', () => {
    const prompt = buildClassificationPrompt({ name: 'T' }, 'Body', [
      { id: 'f1', name: '科技', category: '科技', reason: '技术' },
      { id: 'f2', name: '历史', category: '历史', reason: '过去' },
    ]);
    expect(prompt).toBe(
      '==============\n【分类类型】:【理由】\n==============\n科技:技术\n历史:过去\n文章标题：T\n文章内容：Body',
    );
  });

  it('sends only the article without a taxonomy', () => {
    expect(buildClassificationPrompt({ name: 'T' }, 'Body')).toBe('文章标题：T\n文章内容：Body');
  });
});

describe('ReconciliationWorkflow.processArticle', () => {
  it('marks an article with no identifiable author as missing info', async () => {
    const { workspace, artifacts, classifier, workflow } = setup(
      classification({ author: 'unknown', authorEnglishName: 'unknown', authorChineseName: 'unknown' }),
    );
    workspace.contents.set('p1', 'Some text');
    const article = stub('p1');

    const outcome = await workflow.processArticle(article);

    expect(outcome).toEqual({
      articleId: 'p1',
      status: 'InfoMissing',
      authorId: null,
      authorCreated: false,
      categoryIds: [],
      written: true,
    });
    expect(workspace.updates).toEqual([{ pageId: 'p1', properties: { 状态: { value: '信息缺失' } } }]);
    expect(workspace.authorQueries).toEqual([]);
    expect(workspace.created).toEqual([]);
    expect(classifier.getAuthorInfo).not.toHaveBeenCalled();
    expect(classifier.getArticleInfo).toHaveBeenCalledWith({
      prompt: '文章标题：Article p1\n文章内容：Some text',
      tag: 'p1',
      searchSeed: 'Some text',
      withCategories: false,
    });
    expect(artifacts.articles.get('p1')).toEqual({
      author: 'unknown',
      author_english_name: 'unknown',
      author_chinese_name: 'unknown',
      category: null,
      id: 'p1',
      name: 'Article p1',
      authorRelationIds: [],
      status: 'NotStarted',
    });
  });

  it('sets missing info for unknown authorship and records the unmatched category', async () => {
    const fields: FieldEntry[] = [{ id: 'f1', name: '科技', category: '科技', reason: '技术' }];
    const { workspace, artifacts, workflow } = setup(
      classification({ author: 'unknown', authorEnglishName: 'unknown', authorChineseName: 'none', category: 'Tech' }),
    );
    workspace.contents.set('p1', 'Some text');

    const outcome = await workflow.processArticle(stub('p1', { name: 'Title' }), fields);

    expect(outcome).toEqual({
      articleId: 'p1',
      status: 'InfoMissing',
      authorId: null,
      authorCreated: false,
      categoryIds: [null],
      written: true,
    });
    expect(workspace.updates).toEqual([
      {
        pageId: 'p1',
        properties: {
          状态: { value: '信息缺失' },
          领域: { value: [null], type: 'relation' },
        },
      },
    ]);
    expect(workspace.authorQueries).toEqual([]);
    expect(artifacts.articles.get('p1')).toEqual({
      author: 'unknown',
      author_english_name: 'unknown',
      author_chinese_name: 'none',
      category: 'Tech',
      id: 'p1',
      name: 'Title',
      authorRelationIds: [],
      status: 'NotStarted',
    });
  });

  it('creates a missing author once and links the article to it', async () => {
    const { workspace, classifier, workflow } = setup(
      classification({ author: 'Jane', authorEnglishName: 'Jane Doe', authorChineseName: 'none' }),
    );
    workspace.contents.set('p2', 'Essay');

    const outcome = await workflow.processArticle(stub('p2'));

    expect(workspace.authorQueries).toEqual([
      { property: '英文名称', condition: 'contains', value: 'Jane Doe' },
      { property: '中文名称', condition: 'equals', value: 'none' },
    ]);
    expect(classifier.getAuthorInfo).toHaveBeenCalledWith({ name: 'Jane' });
    expect(workspace.created).toEqual([
      {
        中文名称: { value: '', type: 'rich_text' },
        英文名称: { value: 'Jane Doe', type: 'rich_text' },
        名称: { value: 'Jane', type: 'title' },
        简述: { value: 'Writes about markets.', type: 'rich_text' },
      },
    ]);
    expect(workspace.updates).toEqual([
      {
        pageId: 'p2',
        properties: {
          状态: { value: '进行中' },
          作者: { value: ['author-1'], type: 'relation' },
        },
      },
    ]);
    expect(outcome).toMatchObject({ status: 'InProgress', authorId: 'author-1', authorCreated: true });
  });

  it('writes nothing when the article already matches the decision', async () => {
    const { workspace, workflow } = setup(
      classification({ author: 'Jane', authorEnglishName: 'Jane Doe', authorChineseName: 'none' }),
    );
    workspace.contents.set('p2', 'Essay');
    workspace.authors.push({ id: 'a7', name: 'Jane', description: null, englishName: 'Jane Doe', chineseName: '' });

    const outcome = await workflow.processArticle(stub('p2', { status: 'InProgress', authorRelationIds: ['a7'] }));

    expect(outcome).toMatchObject({ authorId: 'a7', authorCreated: false, written: false });
    expect(workspace.updates).toEqual([]);
    expect(workspace.created).toEqual([]);
  });

  it('finds the author it created on a second run even when the names are markers', async () => {
    const { workspace, workflow } = setup(
      classification({ author: '张三', authorEnglishName: 'unknown', authorChineseName: 'none' }),
    );
    workspace.contents.set('p9', '正文');

    const first = await workflow.processArticle(stub('p9'));
    const second = await workflow.processArticle(
      stub('p9', { status: 'InProgress', authorRelationIds: [first.authorId ?? ''] }),
    );

    expect(first).toMatchObject({ status: 'InProgress', authorId: 'author-1', authorCreated: true });
    expect(second).toMatchObject({ authorId: 'author-1', authorCreated: false, written: false });
    expect(workspace.created).toHaveLength(1);
    expect(workspace.created[0]).toMatchObject({
      中文名称: { value: '', type: 'rich_text' },
      英文名称: { value: 'unknown', type: 'rich_text' },
    });
  });

  it('does not look up an absent or blank name', async () => {
    const { workspace, workflow } = setup(classification({ author: 'Jane', authorEnglishName: '  ' }));
    workspace.contents.set('p10', 'text');

    await workflow.processArticle(stub('p10'));

    expect(workspace.authorQueries).toEqual([]);
    expect(workspace.created).toHaveLength(1);
  });

  it('links a name fragment to an existing author through substring matching', async () => {
    const { workspace, workflow } = setup(classification({ author: 'Lee', authorEnglishName: 'Lee' }));
    workspace.contents.set('p11', 'text');
    workspace.authors.push({ id: 'a5', name: 'Bruce Lee', description: null, englishName: 'Bruce Lee', chineseName: '' });

    const outcome = await workflow.processArticle(stub('p11'));

    // substring matching merges distinct people who share a fragment
    expect(outcome).toMatchObject({ authorId: 'a5', authorCreated: false });
    expect(workspace.created).toEqual([]);
  });

  it('creates a new author when the Chinese name differs only in punctuation width', async () => {
    const { workspace, workflow } = setup(
      classification({ author: '约翰･史密斯', authorChineseName: '约翰･史密斯' }),
    );
    workspace.contents.set('p12', '正文');
    workspace.authors.push({ id: 'a6', name: '约翰・史密斯', description: null, englishName: '', chineseName: '约翰・史密斯' });

    const outcome = await workflow.processArticle(stub('p12'));

    // exact matching treats width variants as different names
    expect(workspace.authorQueries).toEqual([{ property: '中文名称', condition: 'equals', value: '约翰･史密斯' }]);
    expect(outcome).toMatchObject({ authorId: 'author-1', authorCreated: true });
    expect(workspace.created).toHaveLength(1);
  });

  it('falls back to the Chinese name with an exact match', async () => {
    const { workspace, workflow } = setup(
      classification({ author: '李四', authorEnglishName: 'Li Si', authorChineseName: '李四' }),
    );
    workspace.contents.set('p3', '正文');
    workspace.authors.push({ id: 'a3', name: '李四', description: null, englishName: '', chineseName: '李四' });

    const outcome = await workflow.processArticle(stub('p3'));

    expect(workspace.authorQueries).toEqual([
      { property: '英文名称', condition: 'contains', value: 'Li Si' },
      { property: '中文名称', condition: 'equals', value: '李四' },
    ]);
    expect(outcome.authorId).toBe('a3');
  });

  it('links categories from the taxonomy and keeps unmatched ones as empty slots', async () => {
    const fields: FieldEntry[] = [
      { id: 'f1', name: '科技', category: '科技', reason: '技术' },
      { id: 'f2', name: '历史', category: '历史', reason: '过去' },
    ];
    const { workspace, classifier, workflow } = setup(
      classification({ author: 'unknown', category: '科技, 天文' }),
    );
    workspace.contents.set('p4', 'Stars');

    const outcome = await workflow.processArticle(stub('p4', { status: 'InfoMissing' }), fields);

    expect(classifier.getArticleInfo.mock.calls[0][0].withCategories).toBe(true);
    expect(outcome.categoryIds).toEqual(['f1', null]);
    expect(workspace.updates).toEqual([
      { pageId: 'p4', properties: { 领域: { value: ['f1', null], type: 'relation' } } },
    ]);
  });

  it('rejects an article without content before calling the model', async () => {
    const { classifier, workflow } = setup(classification({}));
    await expect(workflow.processArticle(stub('empty'))).rejects.toBeInstanceOf(EmptyArticleContentError);
    expect(classifier.getArticleInfo).not.toHaveBeenCalled();
  });

  it('fails when the model gives no usable answer', async () => {
    const { workspace, workflow } = setup(null);
    workspace.contents.set('p5', 'text');
    await expect(workflow.processArticle(stub('p5'))).rejects.toBeInstanceOf(ClassificationError);
    expect(workspace.updates).toEqual([]);
  });

  it('fails when the author record cannot be created', async () => {
    const { workspace, artifacts, workflow } = setup(
      classification({ author: 'Jane', authorEnglishName: 'Jane Doe' }),
    );
    workspace.contents.set('p6', 'text');
    workspace.failCreate = true;
    await expect(workflow.processArticle(stub('p6'))).rejects.toBeInstanceOf(AuthorResolutionError);
    expect(workspace.updates).toEqual([]);
    expect(artifacts.articles.get('p6')).toEqual({
      author: 'Jane',
      author_english_name: 'Jane Doe',
      author_chinese_name: null,
      category: null,
      id: 'p6',
      name: 'Article p6',
      authorRelationIds: [],
      status: 'NotStarted',
    });
  });

  it('fails when the workspace rejects the update', async () => {
    const { workspace, workflow } = setup(classification({ author: 'unknown' }));
    workspace.contents.set('p7', 'text');
    workspace.rejectUpdates = true;
    await expect(workflow.processArticle(stub('p7'))).rejects.toBeInstanceOf(WorkspaceWriteError);
  });
});

describe('ReconciliationWorkflow maintenance', () => {
  it('removes relations to deleted authors', async () => {
    const { workspace, workflow } = setup(null);
    workspace.authors.push({ id: 'a1', name: 'Ada', description: null, englishName: '', chineseName: '' });
    workspace.articles = [
      stub('x', { authorRelationIds: ['a1', 'gone'] }),
      stub('y', { authorRelationIds: ['a1'] }),
    ];

    await expect(workflow.removeUnknownAuthors('InProgress')).resolves.toBe(1);

    expect(workspace.articleQueries).toEqual([{ property: '状态', condition: 'equals', value: '进行中' }]);
    expect(workspace.updates).toEqual([
      { pageId: 'x', properties: { 作者: { value: ['a1'], type: 'relation' } } },
    ]);
  });

  it('reads the taxonomy from the catalog file unless asked to refresh', async () => {
    const { workspace, artifacts, workflow } = setup(null);
    const cached: FieldEntry[] = [{ id: 'c1', name: '旧', category: '旧', reason: '' }];
    const live: FieldEntry[] = [{ id: 'f1', name: '新', category: '新', reason: '' }];
    artifacts.catalog = cached;
    workspace.fields = live;

    await expect(workflow.loadFields()).resolves.toEqual(cached);
    await expect(workflow.loadFields({ refresh: true })).resolves.toEqual(live);
    expect(artifacts.catalog).toEqual(live);
  });

  it('writes the catalog file on first use', async () => {
    const { workspace, artifacts, workflow } = setup(null);
    workspace.fields = [{ id: 'f1', name: '新', category: '新', reason: '' }];
    await workflow.loadFields();
    expect(artifacts.catalog).toEqual(workspace.fields);
  });

  it('rewrites field reasons the model can explain', async () => {
    const { workspace, classifier, workflow } = setup(null);
    workspace.fields = [
      { id: 'f1', name: '科技', category: '科技', reason: '' },
      { id: 'f2', name: '历史', category: '历史', reason: '' },
    ];
    classifier.getFieldInfo.mockImplementation(async ({ id }) =>
      id === 'f1' ? { category: '科技', reason: '技术与工程' } : null,
    );

    await expect(workflow.refreshFieldReasons()).resolves.toBe(1);
    expect(workspace.fieldUpdates).toEqual([{ id: 'f1', reason: '技术与工程' }]);
  });

  it('fills author descriptions and blanks unknown names', async () => {
    const { workspace, classifier, workflow } = setup(null);
    workspace.authors = [
      { id: 'a1', name: 'Ada', description: null, englishName: '', chineseName: '' },
      { id: 'a2', name: 'Bob', description: 'old', englishName: '', chineseName: '' },
    ];
    classifier.getAuthorInfo.mockImplementation(async ({ id }) =>
      id === 'a1'
        ? { englishName: 'Ada Lovelace', chineseName: 'unknown', introduction: 'Mathematician' }
        : { englishName: null, chineseName: null, introduction: 'unknown' },
    );

    await expect(workflow.enrichAuthors()).resolves.toBe(1);
    expect(classifier.getAuthorInfo).toHaveBeenCalledWith({ id: 'a2', name: 'Bob', description: 'old' });
    expect(workspace.authorUpdates).toEqual([
      { id: 'a1', description: 'Mathematician', englishName: 'Ada Lovelace', chineseName: '' },
    ]);
  });
});
