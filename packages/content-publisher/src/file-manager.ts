import path from 'path';
import { copy, ensureDir, remove } from 'fs-extra/esm';
import {
  contentFiles,
  ENTRY_MARKUP_FILE,
  PersistenceError,
  StorageIOError,
  toErrorMessage,
  type DatabaseExecutor,
  type Logger,
} from 'shared';
import { extensionOf, listStaticAssets } from './content-directory.js';
import type { StoredFile } from './types.js';

/**
 * File storage writer: copies the static assets of a content directory into
 * the persisted local tree and records a content_files row for each
 */
export class FileManager {
  private storageRoot: string;
  private stagingRoot: string;

  constructor(
    storageRoot: string,
    stagingRoot: string,
    private logger: Logger,
    private now: () => Date = () => new Date()
  ) {
    this.storageRoot = path.resolve(storageRoot);
    this.stagingRoot = path.resolve(stagingRoot);
  }

  /**
   * Persisted directory of a piece of content
   */
  contentRoot(contentId: number): string {
    return path.join(this.storageRoot, String(contentId));
  }

  /**
   * Copy every static asset to `<storage root>/<content id>/<relative path>`
   * and upsert its content_files row. A copy failure aborts the pass.
   */
  async store(db: DatabaseExecutor, contentDir: string, contentId: number): Promise<StoredFile[]> {
    const assets = await listStaticAssets(contentDir);
    const targetRoot = this.contentRoot(contentId);
    const stored: StoredFile[] = [];

    for (const asset of assets) {
      const destination = path.join(targetRoot, asset.relativePath);

      try {
        await ensureDir(path.dirname(destination));
        await copy(asset.absolutePath, destination, { overwrite: true });
      } catch (error) {
        throw new StorageIOError(`Failed to copy ${asset.relativePath}: ${toErrorMessage(error)}`, {
          contentId,
          source: asset.absolutePath,
          destination,
        }, error);
      }

      const fileType = extensionOf(asset.relativePath).slice(1);
      this.recordFile(db, contentId, fileType, asset.relativePath);
      stored.push({ fileType, relativePath: asset.relativePath, destination });
    }

    this.logger.info('Static assets stored', { contentId, count: stored.length, target: targetRoot });

    if (this.isStaged(contentDir)) {
      await this.cleanupStaging(contentDir, contentId);
    }

    return stored;
  }

  /**
   * Whether the directory lies strictly below the staging root
   */
  isStaged(contentDir: string): boolean {
    const relative = path.relative(this.stagingRoot, path.resolve(contentDir));
    return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
  }

  private recordFile(db: DatabaseExecutor, contentId: number, fileType: string, filePath: string): void {
    const timestamp = this.now().toISOString();
    const isMain = filePath === ENTRY_MARKUP_FILE;

    try {
      db.insert(contentFiles)
        .values({ contentId, fileType, filePath, isMain, createdAt: timestamp, updatedAt: timestamp })
        .onConflictDoUpdate({
          target: [contentFiles.contentId, contentFiles.filePath],
          set: { fileType, isMain, updatedAt: timestamp },
        })
        .run();
    } catch (error) {
      throw new PersistenceError(`Failed to record file ${filePath}: ${toErrorMessage(error)}`, {
        contentId,
        filePath,
      }, error);
    }
  }

  private async cleanupStaging(contentDir: string, contentId: number): Promise<void> {
    try {
      await remove(contentDir);
      this.logger.info('Staging directory removed', { contentId, path: contentDir });
    } catch (error) {
      this.logger.warn('Failed to remove staging directory', {
        contentId,
        path: contentDir,
        error: toErrorMessage(error),
      });
    }
  }
}
