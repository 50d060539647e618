import 'dotenv/config';
import { ZodError } from 'zod';
import { WorkspaceAdmin } from '../src/lib/api/workspace';
import {
  parseWorkspaceCommand,
  runWorkspaceCommand,
  type WorkspaceCommand,
} from '../src/lib/cli/workspace-command';
import { getEnv } from '../src/lib/env';
import { NotionGateway } from '../src/lib/notion/gateway';

function readCommand(argv: string[]): WorkspaceCommand | null {
  try {
    return parseWorkspaceCommand(argv);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error(error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('\n'));
      return null;
    }
    throw error;
  }
}

async function main() {
  const command = readCommand(process.argv.slice(2));
  if (!command) {
    process.exitCode = 2;
    return;
  }

  const env = getEnv();
  const gateway = new NotionGateway({
    token: env.NOTION_TOKEN,
    baseUrl: env.NOTION_BASE_URL,
    notionVersion: env.NOTION_VERSION,
    rateLimitSeconds: env.NOTION_RATE_LIMIT_SECONDS,
    requestTimeoutMs: env.NOTION_TIMEOUT_MS,
  });
  process.exitCode = await runWorkspaceCommand(command, new WorkspaceAdmin(gateway), (line) => console.log(line));
}

main().catch((error) => {
  console.error(
    JSON.stringify({
      level: 'error',
      message: 'workspace.cli.failure',
      meta: {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      },
    }),
  );
  process.exitCode = 1;
});
