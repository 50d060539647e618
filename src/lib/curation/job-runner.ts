import { defaultLogger, type CurationLogger } from '../logging';
import type { RecordFilter } from '../notion/gateway';
import type { ArtifactStore } from './artifacts';
import { CurationError, EmptyArticleContentError } from './errors';
import type {
  ArticleStub,
  CurationResult,
  CurationStats,
  FieldEntry,
  RunReport,
  WorkspacePort,
} from './types';
import type { ReconciliationWorkflow } from './workflow';

type WorkflowPort = Pick<ReconciliationWorkflow, 'processArticle' | 'loadFields'>;

interface Dependencies {
  workspace: Pick<WorkspacePort, 'getArticles' | 'schema'>;
  workflow: WorkflowPort;
  artifacts: Pick<ArtifactStore, 'writeRunReport'>;
  /** Status label articles are selected by. */
  statusFilter: string;
  useFields: boolean;
  refreshFields?: boolean;
  logger?: CurationLogger;
  now?: () => Date;
}

/**
 * Runs the workflow over every article waiting for curation, one at a time.
 * A failed article is recorded and the batch moves on.
 */
export class CurationJobRunner {
  private readonly workspace: Dependencies['workspace'];

  private readonly workflow: WorkflowPort;

  private readonly artifacts: Dependencies['artifacts'];

  private readonly statusFilter: string;

  private readonly useFields: boolean;

  private readonly refreshFields: boolean;

  private readonly logger: CurationLogger;

  private readonly now: () => Date;

  constructor(deps: Dependencies) {
    this.workspace = deps.workspace;
    this.workflow = deps.workflow;
    this.artifacts = deps.artifacts;
    this.statusFilter = deps.statusFilter;
    this.useFields = deps.useFields;
    this.refreshFields = deps.refreshFields ?? false;
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async run(): Promise<CurationResult> {
    const startedAt = this.now();
    const stats: CurationStats = {
      listed: 0,
      inProgress: 0,
      infoMissing: 0,
      authorsCreated: 0,
      skipped: 0,
      errors: 0,
    };
    const report: RunReport = {
      startedAt: startedAt.toISOString(),
      finishedAt: startedAt.toISOString(),
      passed: [],
      skipped: [],
      failed: [],
    };

    const fields = this.useFields
      ? await this.workflow.loadFields({ refresh: this.refreshFields })
      : undefined;

    const filter: RecordFilter = {
      property: this.workspace.schema.articles.status,
      condition: 'equals',
      value: this.statusFilter,
    };
    const articles = await this.workspace.getArticles(filter);
    stats.listed = articles.length;

    for (const article of articles) {
      await this.processOne(article, fields, stats, report);
    }

    report.finishedAt = this.now().toISOString();
    const reportPath = await this.artifacts.writeRunReport(report);

    this.logger.info('curation.job.complete', { ...stats, report: reportPath });
    return { stats, report };
  }

  private async processOne(
    article: ArticleStub,
    fields: FieldEntry[] | undefined,
    stats: CurationStats,
    report: RunReport,
  ): Promise<void> {
    try {
      const outcome = await this.workflow.processArticle(article, fields);
      if (outcome.status === 'InfoMissing') {
        stats.infoMissing += 1;
      } else {
        stats.inProgress += 1;
      }
      if (outcome.authorCreated) {
        stats.authorsCreated += 1;
      }
      report.passed.push(article.id);
    } catch (error) {
      if (error instanceof EmptyArticleContentError) {
        stats.skipped += 1;
        report.skipped.push(article.id);
        this.logger.warn('curation.article.empty', { articleId: article.id, name: article.name });
        return;
      }
      stats.errors += 1;
      const code = error instanceof CurationError ? error.code : 'ARTICLE_PROCESS_FAILED';
      const message = error instanceof Error ? error.message : String(error);
      report.failed.push({ id: article.id, code, error: message });
      this.logger.error('curation.article.failed', {
        code,
        error: message,
        stack: error instanceof Error ? error.stack : undefined,
        ...(error instanceof CurationError ? error.details : {}),
        articleId: article.id,
        name: article.name,
      });
    }
  }
}
