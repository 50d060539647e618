import { describe, it, expect, vi } from 'vitest';
import { silentLogger } from '../logging';
import { ClassificationError, EmptyArticleContentError } from './errors';
import { CurationJobRunner } from './job-runner';
import { DEFAULT_WORKSPACE_SCHEMA, type ArticleOutcome, type ArticleStub, type FieldEntry, type RunReport } from './types';
import type { ReconciliationWorkflow } from './workflow';

const article = (id: string): ArticleStub => ({ id, name: `Article ${id}`, authorRelationIds: [], status: 'NotStarted' });

const outcome = (articleId: string, overrides: Partial<ArticleOutcome> = {}): ArticleOutcome => ({
  articleId,
  status: 'InProgress',
  authorId: 'a1',
  authorCreated: false,
  categoryIds: [],
  written: true,
  ...overrides,
});

function setup(options: { useFields: boolean; articles: ArticleStub[] }) {
  const getArticles = vi.fn(async () => options.articles);
  const processArticle = vi.fn<ReconciliationWorkflow['processArticle']>();
  const loadFields = vi.fn<ReconciliationWorkflow['loadFields']>().mockResolvedValue([]);
  const reports: RunReport[] = [];
  const times = [new Date('2024-05-01T08:00:00.000Z'), new Date('2024-05-01T08:05:00.000Z')];
  const runner = new CurationJobRunner({
    workspace: { getArticles, schema: DEFAULT_WORKSPACE_SCHEMA },
    workflow: { processArticle, loadFields },
    artifacts: {
      writeRunReport: async (report) => {
        reports.push(report);
        return 'runs/report.json';
      },
    },
    statusFilter: '未开始',
    useFields: options.useFields,
    logger: silentLogger,
    now: () => times.shift() ?? new Date('2024-05-01T09:00:00.000Z'),
  });
  return { runner, getArticles, processArticle, loadFields, reports };
}

describe('CurationJobRunner', () => {
  it('processes every listed article and tallies the outcomes', async () => {
    const { runner, getArticles, processArticle, reports } = setup({
      useFields: false,
      articles: [article('p1'), article('p2'), article('p3'), article('p4')],
    });
    processArticle
      .mockResolvedValueOnce(outcome('p1', { authorCreated: true }))
      .mockResolvedValueOnce(outcome('p2', { status: 'InfoMissing', authorId: null }))
      .mockRejectedValueOnce(new EmptyArticleContentError('empty'))
      .mockRejectedValueOnce(new ClassificationError('no answer'));

    const result = await runner.run();

    expect(getArticles).toHaveBeenCalledWith({ property: '状态', condition: 'equals', value: '未开始' });
    expect(processArticle.mock.calls.map(([entry, fields]) => [entry.id, fields])).toEqual([
      ['p1', undefined],
      ['p2', undefined],
      ['p3', undefined],
      ['p4', undefined],
    ]);
    expect(result.stats).toEqual({
      listed: 4,
      inProgress: 1,
      infoMissing: 1,
      authorsCreated: 1,
      skipped: 1,
      errors: 1,
    });
    expect(result.report).toEqual({
      startedAt: '2024-05-01T08:00:00.000Z',
      finishedAt: '2024-05-01T08:05:00.000Z',
      passed: ['p1', 'p2'],
      skipped: ['p3'],
      failed: [{ id: 'p4', code: 'CLASSIFICATION_FAILED', error: 'no answer' }],
    });
    expect(reports).toEqual([result.report]);
  });

  it('records unexpected errors with a generic code and continues', async () => {
    const { runner, processArticle } = setup({ useFields: false, articles: [article('p1'), article('p2')] });
    processArticle.mockRejectedValueOnce(new Error('socket hang up')).mockResolvedValueOnce(outcome('p2'));

    const result = await runner.run();

    expect(result.report.failed).toEqual([{ id: 'p1', code: 'ARTICLE_PROCESS_FAILED', error: 'socket hang up' }]);
    expect(result.report.passed).toEqual(['p2']);
  });

  it('loads the taxonomy once and passes it to every article', async () => {
    const fields: FieldEntry[] = [{ id: 'f1', name: '科技', category: '科技', reason: '技术' }];
    const { runner, processArticle, loadFields } = setup({ useFields: true, articles: [article('p1'), article('p2')] });
    loadFields.mockResolvedValue(fields);
    processArticle.mockResolvedValue(outcome('p'));

    await runner.run();

    expect(loadFields).toHaveBeenCalledTimes(1);
    expect(loadFields).toHaveBeenCalledWith({ refresh: false });
    expect(processArticle.mock.calls.map(([, passed]) => passed)).toEqual([fields, fields]);
  });

  it('writes a report for an empty batch', async () => {
    const { runner, processArticle, reports } = setup({ useFields: false, articles: [] });
    const result = await runner.run();
    expect(processArticle).not.toHaveBeenCalled();
    expect(result.stats.listed).toBe(0);
    expect(reports).toHaveLength(1);
  });
});
