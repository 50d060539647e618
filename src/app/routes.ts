import { Hono, type Context } from 'hono';
import { ZodError } from 'zod';
import {
  pageTitle,
  parseAddPropertyPayload,
  parseFilterPayload,
  parseUpdateTextPayload,
  type WorkspaceAdmin,
} from '../lib/api/workspace';
import { defaultLogger, describeError, type CurationLogger } from '../lib/logging';

type AdminPort = Pick<
  WorkspaceAdmin,
  'listDatabases' | 'getDatabaseContent' | 'addProperty' | 'removeProperty' | 'filter' | 'fillEmptyText'
>;

async function readJson(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json();
    return body;
  } catch {
    return null;
  }
}

/**
 * HTTP surface over the workspace maintenance operations.
 *
 * GET    /databases
 * GET    /databases/:id
 * POST   /databases/property
 * DELETE /databases/:id/properties/:name
 * POST   /databases/filter
 * POST   /databases/update-text
 */
export function createWorkspaceApp(admin: AdminPort, logger: CurationLogger = defaultLogger): Hono {
  const app = new Hono();

  app.onError((error, c) => {
    if (error instanceof ZodError) {
      return c.json({ error: 'Invalid payload', issues: error.issues }, 400);
    }
    logger.error('api.request.failed', { path: c.req.path, method: c.req.method, ...describeError(error) });
    return c.json({ error: 'Internal Server Error' }, 500);
  });

  app.get('/databases', async (c) => {
    const databases = await admin.listDatabases();
    return c.json(databases);
  });

  app.get('/databases/:id', async (c) => {
    const pages = await admin.getDatabaseContent(c.req.param('id'));
    return c.json(pages);
  });

  app.post('/databases/property', async (c) => {
    const input = parseAddPropertyPayload(await readJson(c));
    const added = await admin.addProperty(input);
    if (!added) {
      return c.json({ error: `Failed to add property: ${input.property_name}` }, 400);
    }
    return c.json({ message: `Added property: ${input.property_name}` });
  });

  app.delete('/databases/:id/properties/:name', async (c) => {
    const name = c.req.param('name');
    const removed = await admin.removeProperty(c.req.param('id'), name);
    if (!removed) {
      return c.json({ error: `Failed to remove property: ${name}` }, 400);
    }
    return c.json({ message: `Removed property: ${name}` });
  });

  app.post('/databases/filter', async (c) => {
    const input = parseFilterPayload(await readJson(c));
    const pages = await admin.filter(input);
    return c.json(pages.map((page) => ({ id: page.id, title: pageTitle(page), properties: page.properties })));
  });

  app.post('/databases/update-text', async (c) => {
    const input = parseUpdateTextPayload(await readJson(c));
    const result = await admin.fillEmptyText(input);
    return c.json({ message: 'Update complete', success_count: result.successCount });
  });

  return app;
}
