import path from 'path';
import { promises as fs } from 'fs';
import { vi } from 'vitest';
import { ensureDir, remove } from 'fs-extra/esm';
import { applySchema, Logger, withDatabase, type PublishConfig, type PublishDatabase } from 'shared';
import type { PublishCollaborators, PublishContext } from '../src/types.js';
import type { ContentMetadataMap } from '../src/metadata-reader.js';

export const TEST_MEDIA_URL = 'https://cdn.example.test/bucket';
export const TEST_SITE_URL = 'https://site.example.test';
export const FIXED_NOW = new Date('2024-05-01T10:00:00.000Z');

export interface TestWorkspace {
  root: string;
  dbPath: string;
  storageRoot: string;
  stagingRoot: string;
  sourceRoot: string;
  config: PublishConfig;
}

/**
 * Fresh directory tree and schema-initialised database under test-output/<name>
 */
export async function createWorkspace(name: string): Promise<TestWorkspace> {
  const root = path.join(process.cwd(), 'test-output', name);
  await remove(root);

  const storageRoot = path.join(root, 'storage');
  const stagingRoot = path.join(root, 'staging');
  const sourceRoot = path.join(root, 'source');
  await Promise.all([ensureDir(storageRoot), ensureDir(stagingRoot), ensureDir(sourceRoot)]);

  const dbPath = path.join(root, 'content.db');
  await applySchema(dbPath);

  return {
    root,
    dbPath,
    storageRoot,
    stagingRoot,
    sourceRoot,
    config: {
      dbPath,
      storageRoot,
      stagingRoot,
      mediaPublicUrl: TEST_MEDIA_URL,
      mediaBucketDir: path.join(root, 'bucket'),
      siteUrl: TEST_SITE_URL,
      mediaConcurrency: 2,
      port: 0,
      nodeEnv: 'test',
      logFormat: 'text',
    },
  };
}

/**
 * Write a content directory; keys are paths relative to it
 */
export async function writeContentDir(dir: string, files: Record<string, string>): Promise<string> {
  await ensureDir(dir);
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(dir, relativePath);
    await ensureDir(path.dirname(target));
    await fs.writeFile(target, content, 'utf-8');
  }
  return dir;
}

export function metadataFile(entries: Record<string, string>): string {
  return Object.entries(entries)
    .map(([key, value]) => `${key}=${value}`)
    .join('\n');
}

export function createFakeCollaborators() {
  const upload = vi.fn(async (_localPath: string, remoteKey: string) => `${TEST_MEDIA_URL}/${remoteKey}`);
  const probeImage = vi.fn(async (_filePath: string) => ({ width: 640, height: 480, mimeType: 'image/jpeg' }));
  const probeVideo = vi.fn(async (_filePath: string) => ({ durationSeconds: 12, mimeType: 'video/mp4' }));

  const collaborators: PublishCollaborators = {
    uploader: { upload },
    imageProber: { probeImage },
    videoProber: { probeVideo },
  };

  return { collaborators, upload, probeImage, probeVideo };
}

export function createContext(
  db: PublishDatabase,
  workspace: TestWorkspace,
  contentDir: string,
  metadata: ContentMetadataMap,
  overrides: Partial<Pick<PublishContext, 'kind' | 'requestedStatus'>> = {}
): PublishContext {
  return {
    kind: overrides.kind ?? 'article',
    contentDir,
    metadata,
    requestedStatus: overrides.requestedStatus ?? 'draft',
    db,
    config: workspace.config,
    logger: new Logger(),
  };
}

export function readDatabase<T>(workspace: TestWorkspace, read: (db: PublishDatabase) => T): Promise<T> {
  return withDatabase(workspace.dbPath, read);
}
