import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createWorkspaceApp } from '../src/app/routes';
import { WorkspaceAdmin } from '../src/lib/api/workspace';
import { getEnv } from '../src/lib/env';
import { defaultLogger } from '../src/lib/logging';
import { NotionGateway } from '../src/lib/notion/gateway';

const env = getEnv();
const gateway = new NotionGateway({
  token: env.NOTION_TOKEN,
  baseUrl: env.NOTION_BASE_URL,
  notionVersion: env.NOTION_VERSION,
  rateLimitSeconds: env.NOTION_RATE_LIMIT_SECONDS,
  requestTimeoutMs: env.NOTION_TIMEOUT_MS,
});
const app = createWorkspaceApp(new WorkspaceAdmin(gateway));

serve({ fetch: app.fetch, port: env.HTTP_PORT }, (info) => {
  defaultLogger.info('api.server.listening', { port: info.port });
});
