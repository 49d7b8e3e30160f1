import { promises as fs } from 'fs';
import path from 'path';
import { pathExists } from 'fs-extra/esm';
import {
  withDatabase,
  KeyedMutex,
  Logger,
  ValidationError,
  ENTRY_MARKUP_FILE,
  METADATA_FILE,
  toErrorMessage,
  type ContentKind,
  type PublishConfig,
  type PublishDatabase,
} from 'shared';
import { MetadataReader, type ContentMetadataMap } from './metadata-reader.js';
import { ContentUpsertEngine, requiredKeysFor, resolveStatus } from './content-upsert.js';
import { MediaProcessor } from './media-processor.js';
import { ReferenceRewriter } from './reference-rewriter.js';
import { FileManager } from './file-manager.js';
import { GalleryPublisher, type GalleryPlan } from './gallery-publisher.js';
import { createDefaultCollaborators } from './collaborators.js';
import type {
  PublishCollaborators,
  PublishContext,
  PublishRequest,
  PublishingResult,
  ValidationResult,
} from './types.js';

export interface ContentPublisherOptions {
  config: PublishConfig;
  collaborators?: PublishCollaborators;
  logger?: Logger;
  now?: () => Date;
}

interface PreparedContent {
  contentDir: string;
  metadata: ContentMetadataMap;
}

/**
 * Main content publisher class - orchestrates the entire publishing workflow:
 * metadata, upsert, thumbnail, media, reference rewriting, storage
 */
export class ContentPublisher {
  private config: PublishConfig;
  private logger: Logger;
  private metadataReader: MetadataReader;
  private mediaProcessor: MediaProcessor;
  private upsertEngine: ContentUpsertEngine;
  private rewriter: ReferenceRewriter;
  private fileManager: FileManager;
  private galleryPublisher: GalleryPublisher;
  private locks = new KeyedMutex();

  constructor(options: ContentPublisherOptions) {
    const now = options.now ?? (() => new Date());
    this.config = options.config;
    this.logger = options.logger ?? new Logger(options.config.logFormat === 'json');

    const collaborators = options.collaborators ?? createDefaultCollaborators(options.config);
    this.metadataReader = new MetadataReader(this.logger);
    this.mediaProcessor = new MediaProcessor(collaborators, now);
    this.upsertEngine = new ContentUpsertEngine(this.mediaProcessor, now);
    this.rewriter = new ReferenceRewriter(options.config.siteUrl, this.logger);
    this.fileManager = new FileManager(options.config.storageRoot, options.config.stagingRoot, this.logger, now);
    this.galleryPublisher = new GalleryPublisher(this.mediaProcessor, this.metadataReader, this.logger);
  }

  /**
   * Publish a single article directory
   */
  async publish(request: PublishRequest): Promise<PublishingResult> {
    const prepared = await this.prepare(request.path, 'article');
    const status = resolveStatus(request.status, prepared.metadata);

    return this.withContentLock(prepared.metadata, () =>
      withDatabase(this.config.dbPath, db => this.runArticle(this.createContext(db, 'article', prepared, status)))
    );
  }

  /**
   * Publish an image-set (gallery) directory
   */
  async publishGallery(request: PublishRequest): Promise<PublishingResult> {
    const prepared = await this.prepare(request.path, 'gallery');
    const plan = await this.galleryPublisher.inspect(prepared.contentDir, prepared.metadata);
    const status = resolveStatus(request.status, prepared.metadata);

    return this.withContentLock(prepared.metadata, () =>
      withDatabase(this.config.dbPath, db => this.runGallery(this.createContext(db, 'gallery', prepared, status), plan))
    );
  }

  /**
   * Check a directory the way publish would, without side effects
   */
  async validate(contentPath: string, kind: ContentKind = 'article'): Promise<ValidationResult> {
    try {
      const prepared = await this.prepare(contentPath, kind);
      if (kind === 'gallery') {
        await this.galleryPublisher.inspect(prepared.contentDir, prepared.metadata);
      }
      return { path: contentPath, valid: true };
    } catch (error) {
      return { path: contentPath, valid: false, error: toErrorMessage(error) };
    }
  }

  /**
   * Validate multiple content directories
   */
  async validateDirectories(
    contentPaths: string[],
    kind: ContentKind = 'article'
  ): Promise<{ valid: number; invalid: number; results: ValidationResult[] }> {
    const results: ValidationResult[] = [];
    for (const contentPath of contentPaths) {
      results.push(await this.validate(contentPath, kind));
    }

    const valid = results.filter(r => r.valid).length;
    return { valid, invalid: results.length - valid, results };
  }

  private async runArticle(ctx: PublishContext): Promise<PublishingResult> {
    ctx.logger.info('Publishing content', { status: ctx.requestedStatus });

    const upsert = this.upsertEngine.upsert(ctx);
    const published = upsert.status === 'published';

    const thumbnailUrl = await this.upsertEngine.attachThumbnail(ctx, upsert.contentId, published);
    const { media, urlMap } = await this.mediaProcessor.processDirectory(ctx, upsert.contentId, published);
    const rewrittenFiles = await this.rewriter.rewrite({
      contentDir: ctx.contentDir,
      mediaMap: urlMap,
      contentId: upsert.contentId,
      kind: ctx.kind,
      published,
    });
    const storedFiles = await this.fileManager.store(ctx.db, ctx.contentDir, upsert.contentId);

    ctx.logger.info('Content published', { contentId: upsert.contentId, status: upsert.status });

    return {
      contentId: upsert.contentId,
      kind: ctx.kind,
      status: upsert.status,
      created: upsert.created,
      thumbnailUrl,
      mediaCount: media.length,
      media,
      rewrittenFiles,
      storedFiles,
    };
  }

  private async runGallery(ctx: PublishContext, plan: GalleryPlan): Promise<PublishingResult> {
    ctx.logger.info('Publishing gallery', { status: ctx.requestedStatus, images: plan.images.length });

    const upsert = this.upsertEngine.upsert(ctx);
    const published = upsert.status === 'published';

    const outcome = await this.galleryPublisher.apply(ctx, upsert.contentId, published, plan);
    let thumbnailUrl = await this.upsertEngine.attachThumbnail(ctx, upsert.contentId, published);
    if (!thumbnailUrl) {
      thumbnailUrl = await this.galleryPublisher.publishCoverThumbnail(ctx, upsert.contentId, published, plan);
      this.upsertEngine.setThumbnailUrl(ctx.db, upsert.contentId, thumbnailUrl);
    }

    ctx.logger.info('Gallery published', { contentId: upsert.contentId, status: upsert.status });

    return {
      contentId: upsert.contentId,
      kind: ctx.kind,
      status: upsert.status,
      created: upsert.created,
      thumbnailUrl,
      mediaCount: outcome.media.length,
      media: outcome.media,
      rewrittenFiles: [],
      storedFiles: [],
      gallery: outcome.summary,
    };
  }

  /**
   * Preconditions shared by publish and validate. Every failure is a
   * ValidationError raised before anything is written.
   */
  private async prepare(contentPath: string, kind: ContentKind): Promise<PreparedContent> {
    if (!contentPath || contentPath.trim() === '') {
      throw new ValidationError('Missing content directory path');
    }

    const contentDir = path.resolve(contentPath.trim());
    const isDirectory = await fs
      .stat(contentDir)
      .then(stats => stats.isDirectory())
      .catch(() => false);
    if (!isDirectory) {
      throw new ValidationError(`Content directory not found: ${contentDir}`, { path: contentDir });
    }

    const metadataPath = path.join(contentDir, METADATA_FILE);
    if (!(await pathExists(metadataPath))) {
      throw new ValidationError(`Missing ${METADATA_FILE} in ${contentDir}`, { path: contentDir });
    }

    if (kind === 'article' && !(await pathExists(path.join(contentDir, ENTRY_MARKUP_FILE)))) {
      throw new ValidationError(`Missing ${ENTRY_MARKUP_FILE} in ${contentDir}`, { path: contentDir });
    }

    const metadata = await this.metadataReader.parseRequired(metadataPath, requiredKeysFor(kind));
    return { contentDir, metadata };
  }

  private createContext(
    db: PublishDatabase,
    kind: ContentKind,
    prepared: PreparedContent,
    status: PublishContext['requestedStatus']
  ): PublishContext {
    return {
      kind,
      contentDir: prepared.contentDir,
      metadata: prepared.metadata,
      requestedStatus: status,
      db,
      config: this.config,
      logger: this.logger.child({ kind, slug: prepared.metadata.slug, siteId: prepared.metadata.site_id }),
    };
  }

  private withContentLock<T>(metadata: ContentMetadataMap, work: () => Promise<T>): Promise<T> {
    return this.locks.run(`${metadata.site_id ?? ''}:${metadata.slug ?? ''}`, work);
  }
}
