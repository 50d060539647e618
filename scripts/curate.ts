import 'dotenv/config';
import { FileArtifactStore } from '../src/lib/curation/artifacts';
import { CurationJobRunner } from '../src/lib/curation/job-runner';
import { CurationScheduler } from '../src/lib/curation/scheduler';
import type { CurationResult } from '../src/lib/curation/types';
import { ReconciliationWorkflow } from '../src/lib/curation/workflow';
import { WorkspaceRepository } from '../src/lib/curation/workspace-repository';
import { buildCurationConfig, getEnv, type AppEnv } from '../src/lib/env';
import type { FetchFn } from '../src/lib/http';
import { defaultLogger, type CurationLogger } from '../src/lib/logging';
import { ModelClient } from '../src/lib/model/model-client';
import { FileOutcomeSink } from '../src/lib/model/outcome-sink';
import { NotionGateway } from '../src/lib/notion/gateway';
import { SearchAugmenter, SearxngClient } from '../src/lib/search/searxng';

export interface CurationApplication {
  env: AppEnv;
  gateway: NotionGateway;
  model: ModelClient;
  workflow: ReconciliationWorkflow;
  runOnce(): Promise<CurationResult>;
  startScheduler(): void;
  stopScheduler(): void;
}

interface CreateCurationApplicationOptions {
  env?: AppEnv;
  logger?: CurationLogger;
  fetchImpl?: FetchFn;
}

export function createCurationApplication(options: CreateCurationApplicationOptions = {}): CurationApplication {
  const env = options.env ?? getEnv();
  const config = buildCurationConfig(env);
  const logger = options.logger ?? defaultLogger;

  const gateway = new NotionGateway({
    token: env.NOTION_TOKEN,
    baseUrl: env.NOTION_BASE_URL,
    notionVersion: env.NOTION_VERSION,
    rateLimitSeconds: config.rateLimitSeconds,
    requestTimeoutMs: env.NOTION_TIMEOUT_MS,
    fetch: options.fetchImpl,
    logger,
  });

  const search = config.searchBaseUrl
    ? new SearchAugmenter({
        provider: new SearxngClient({
          baseUrl: config.searchBaseUrl,
          apiKey: config.searchApiKey,
          timeoutMs: config.searchTimeoutMs,
          fetch: options.fetchImpl,
        }),
        maxRetries: config.maxSearchRetries,
        resultLimit: config.searchResultLimit,
        logger,
      })
    : null;

  const model = new ModelClient({
    endpoint: {
      endpointUrl: config.endpointUrl,
      apiKey: config.apiKey,
      modelName: config.modelName,
    },
    sink: new FileOutcomeSink(config.decodeLogDir),
    search,
    fetch: options.fetchImpl,
    logger,
    requestTimeoutMs: config.modelTimeoutMs,
    translationConcurrency: env.TRANSLATION_CONCURRENCY,
  });

  const workspace = new WorkspaceRepository({
    gateway,
    databases: config.databases,
    logger,
  });
  const artifacts = new FileArtifactStore(config.workspaceDir);

  const workflow = new ReconciliationWorkflow({
    workspace,
    classifier: model,
    artifacts,
    logger,
  });

  const jobRunner = new CurationJobRunner({
    workspace,
    workflow,
    artifacts,
    statusFilter: env.ARTICLE_STATUS_FILTER,
    useFields: env.USE_FIELD_CATEGORIES,
    refreshFields: env.REFRESH_FIELDS,
    logger,
  });

  const scheduler = new CurationScheduler({
    enableInternalCron: env.ENABLE_INTERNAL_CRON,
    cronExpression: env.CURATION_CRON,
    jobRunner: () => jobRunner.run(),
    logger,
  });

  return {
    env,
    gateway,
    model,
    workflow,
    runOnce() {
      return scheduler.runOnce();
    },
    startScheduler() {
      scheduler.start();
    },
    stopScheduler() {
      scheduler.stop();
    },
  };
}

type Mode = 'run' | 'cleanup' | 'refresh-fields' | 'enrich-authors';

function readMode(argv: readonly string[]): Mode {
  if (argv.includes('--cleanup')) {
    return 'cleanup';
  }
  if (argv.includes('--refresh-fields')) {
    return 'refresh-fields';
  }
  if (argv.includes('--enrich-authors')) {
    return 'enrich-authors';
  }
  return 'run';
}

export async function main(argv: readonly string[] = process.argv.slice(2)) {
  const app = createCurationApplication();
  const mode = readMode(argv);

  if (mode === 'cleanup') {
    const updated = await app.workflow.removeUnknownAuthors('InProgress');
    defaultLogger.info('curation.cleanup.done', { updated });
    return;
  }
  if (mode === 'refresh-fields') {
    const updated = await app.workflow.refreshFieldReasons();
    await app.workflow.loadFields({ refresh: true });
    defaultLogger.info('curation.fields.refreshed', { updated });
    return;
  }
  if (mode === 'enrich-authors') {
    const updated = await app.workflow.enrichAuthors();
    defaultLogger.info('curation.authors.enriched', { updated });
    return;
  }

  if (app.env.ENABLE_INTERNAL_CRON) {
    defaultLogger.info('curation.scheduler.start', { cron: app.env.CURATION_CRON });
    app.startScheduler();

    const shutdown = () => {
      defaultLogger.info('curation.scheduler.stop');
      app.stopScheduler();
      process.exit(0);
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
    return;
  }

  await app.runOnce();
}
