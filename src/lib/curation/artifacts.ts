import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { FieldEntry, RunReport } from './types';

export interface ArtifactStore {
  writeArticleArtifact(articleId: string, data: Record<string, unknown>): Promise<void>;
  readFieldCatalog(): Promise<FieldEntry[] | null>;
  writeFieldCatalog(fields: readonly FieldEntry[]): Promise<void>;
  writeRunReport(report: RunReport): Promise<string>;
}

const fieldCatalogSchema = z.array(
  z.object({
    id: z.string(),
    name: z.string(),
    category: z.string(),
    reason: z.string(),
  }),
);

export const FIELD_CATALOG_FILE = 'field.info.json';

/**
 * Files kept under the workspace directory:
 * `output/<pageId>.json`, `field.info.json` and `runs/<timestamp>.json`.
 */
export class FileArtifactStore implements ArtifactStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  async writeArticleArtifact(articleId: string, data: Record<string, unknown>): Promise<void> {
    await this.writeJson(path.join('output', `${articleId}.json`), data);
  }

  async readFieldCatalog(): Promise<FieldEntry[] | null> {
    let text: string;
    try {
      text = await readFile(path.join(this.root, FIELD_CATALOG_FILE), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
    const data: unknown = JSON.parse(text);
    return fieldCatalogSchema.parse(data);
  }

  async writeFieldCatalog(fields: readonly FieldEntry[]): Promise<void> {
    await this.writeJson(FIELD_CATALOG_FILE, fields);
  }

  async writeRunReport(report: RunReport): Promise<string> {
    const name = `${report.startedAt.replace(/[:.]/g, '-')}.json`;
    return this.writeJson(path.join('runs', name), report);
  }

  private async writeJson(relativePath: string, data: unknown): Promise<string> {
    const file = path.join(this.root, relativePath);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, JSON.stringify(data, null, 4), 'utf-8');
    return file;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
