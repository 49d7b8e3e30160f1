import { promises as fs } from 'fs';
import path from 'path';
import { eq } from 'drizzle-orm';
import {
  assetId,
  images,
  videos,
  parallelMap,
  CollaboratorError,
  PersistenceError,
  StorageIOError,
  MEDIA_DIR,
  REELS_DIR,
  THUMBNAIL_DIR,
  REMOTE_CATEGORIES,
  toErrorMessage,
  type AssetType,
  type DatabaseExecutor,
  type ProcessingStatus,
  type RemoteCategory,
} from 'shared';
import { classify, extensionOf, listFiles, listImages, type ContentFileEntry } from './content-directory.js';
import { imageMimeType, videoMimeType } from './mime.js';
import type {
  ImageProbe,
  MediaUrlMap,
  PublishCollaborators,
  PublishContext,
  StoredMedia,
  VideoProbe,
} from './types.js';

export interface MediaFileOptions {
  assetType: AssetType;
  /** Content is published: upload now and mark complete */
  published: boolean;
  /** Upload failure fails the publish instead of leaving the asset pending */
  critical?: boolean;
  /** Overrides the category derived from the file class */
  category?: RemoteCategory;
  shortForm?: boolean;
}

export interface MediaBatchResult {
  media: StoredMedia[];
  urlMap: MediaUrlMap;
  skipped: string[];
}

/**
 * Media classifier and uploader: gives every image and video of a content
 * directory a stable identity, probes it, uploads it when the content is
 * published and records it in the images/videos tables.
 */
export class MediaProcessor {
  constructor(
    private collaborators: PublishCollaborators,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Process the media/ and reels/ subtrees and build the reference map
   */
  async processDirectory(ctx: PublishContext, contentId: number, published: boolean): Promise<MediaBatchResult> {
    const media = await this.processSubtree(ctx, contentId, MEDIA_DIR, published);
    const reels = await this.processSubtree(ctx, contentId, REELS_DIR, published);

    const result: MediaBatchResult = {
      media: [...media.media, ...reels.media],
      urlMap: new Map([...media.urlMap, ...reels.urlMap]),
      skipped: [...media.skipped, ...reels.skipped],
    };

    ctx.logger.info('Media processed', {
      contentId,
      processed: result.media.length,
      skipped: result.skipped.length,
      published,
    });

    return result;
  }

  /**
   * Process every image and video below one subdirectory. Videos under
   * reels/ are recorded as short-form.
   */
  async processSubtree(
    ctx: PublishContext,
    contentId: number,
    subdir: string,
    published: boolean
  ): Promise<MediaBatchResult> {
    const targets: ContentFileEntry[] = [];
    const skipped: string[] = [];

    for (const entry of await listFiles(ctx.contentDir, subdir)) {
      const mediaClass = classify(entry.relativePath);
      if (mediaClass === 'image' || mediaClass === 'video') {
        targets.push(entry);
      } else if (mediaClass === 'unsupported') {
        ctx.logger.warn('Unsupported media type skipped', { path: entry.relativePath, contentId });
        skipped.push(entry.relativePath);
      }
    }

    const media = await parallelMap(
      targets,
      entry =>
        this.processFile(ctx, contentId, entry, {
          assetType: 'content',
          published,
          shortForm: subdir === REELS_DIR && classify(entry.relativePath) === 'video',
        }),
      ctx.config.mediaConcurrency
    );

    const urlMap: MediaUrlMap = new Map();
    for (const item of media) {
      urlMap.set(item.sourcePath, item.canonicalUrl);
    }

    return { media, urlMap, skipped };
  }

  /**
   * Process the lexicographically first image of thumbnail/, if any
   */
  async processThumbnail(ctx: PublishContext, contentId: number, published: boolean): Promise<StoredMedia | null> {
    const [first, ...rest] = await listImages(ctx.contentDir, THUMBNAIL_DIR);
    if (!first) {
      ctx.logger.info('No thumbnail image found', { contentId });
      return null;
    }

    if (rest.length > 0) {
      ctx.logger.warn('Several thumbnail images found, using the first', {
        contentId,
        selected: first.relativePath,
        ignored: rest.map(entry => entry.relativePath).join(','),
      });
    }

    return this.processFile(ctx, contentId, first, {
      assetType: 'thumbnail',
      category: REMOTE_CATEGORIES.thumbnail,
      published,
      critical: true,
    });
  }

  /**
   * Probe, upload (when published) and record a single media file
   */
  async processFile(
    ctx: PublishContext,
    contentId: number,
    entry: ContentFileEntry,
    options: MediaFileOptions
  ): Promise<StoredMedia> {
    const mediaClass = classify(entry.relativePath);
    if (mediaClass !== 'image' && mediaClass !== 'video') {
      throw new CollaboratorError(`Not a media file: ${entry.relativePath}`, { path: entry.relativePath, contentId });
    }

    const id = assetId(contentId, entry.relativePath);
    const extension = extensionOf(entry.relativePath);
    const category = options.category ?? defaultCategory(mediaClass);
    const remoteKey = `${category}${id}${extension}`;
    const canonicalUrl = `${ctx.config.mediaPublicUrl}/${remoteKey}`;
    const log = ctx.logger.child({ contentId, path: entry.relativePath, assetId: id });

    let sizeBytes: number;
    try {
      sizeBytes = (await fs.stat(entry.absolutePath)).size;
    } catch (error) {
      throw new StorageIOError(`Cannot read media file ${entry.relativePath}: ${toErrorMessage(error)}`, {
        path: entry.absolutePath,
        contentId,
      }, error);
    }

    const filename = path.basename(entry.relativePath);
    this.assertOwnership(ctx.db, mediaClass, id, contentId, filename);

    const processingStatus = options.published
      ? await this.upload(entry, remoteKey, canonicalUrl, options.critical ?? false, log)
      : 'pending';

    const timestamp = this.now().toISOString();

    if (mediaClass === 'image') {
      const probe = await this.probeImage(entry, extension, log);
      const row = {
        originalUrl: canonicalUrl,
        filename,
        mimeType: probe.mimeType,
        sizeBytes,
        width: probe.width,
        height: probe.height,
        contentId,
        imageType: options.assetType,
        processingStatus,
        updatedAt: timestamp,
      };
      ctx.db
        .insert(images)
        .values({ id, ...row, createdAt: timestamp })
        .onConflictDoUpdate({ target: images.id, set: row })
        .run();
    } else {
      const probe = await this.probeVideo(entry, extension, log);
      const row = {
        originalUrl: canonicalUrl,
        filename,
        mimeType: probe.mimeType,
        sizeBytes,
        durationSeconds: probe.durationSeconds,
        contentId,
        videoType: options.assetType,
        isShortForm: options.shortForm ?? false,
        processingStatus,
        updatedAt: timestamp,
      };
      ctx.db
        .insert(videos)
        .values({ id, ...row, createdAt: timestamp })
        .onConflictDoUpdate({ target: videos.id, set: row })
        .run();
    }

    log.debug('Media recorded', { canonicalUrl, processingStatus });

    return {
      id,
      sourcePath: entry.relativePath,
      canonicalUrl,
      kind: mediaClass,
      processingStatus,
    };
  }

  /**
   * Publish a copy of a media file under another category without recording
   * a row, and return its canonical URL. The upload is required.
   */
  async publishCopy(
    ctx: PublishContext,
    contentId: number,
    entry: ContentFileEntry,
    category: RemoteCategory,
    published: boolean
  ): Promise<string> {
    const id = assetId(contentId, entry.relativePath);
    const remoteKey = `${category}${id}${extensionOf(entry.relativePath)}`;
    const canonicalUrl = `${ctx.config.mediaPublicUrl}/${remoteKey}`;

    if (published) {
      const log = ctx.logger.child({ contentId, path: entry.relativePath, assetId: id });
      await this.upload(entry, remoteKey, canonicalUrl, true, log);
    }
    return canonicalUrl;
  }

  /**
   * A stored row under `id` must belong to this content and file. Anything
   * else is an id collision: fail before the upload can overwrite the other
   * asset's object.
   */
  private assertOwnership(
    db: DatabaseExecutor,
    mediaClass: 'image' | 'video',
    id: number,
    contentId: number,
    filename: string
  ): void {
    const owner =
      mediaClass === 'image'
        ? db.select({ contentId: images.contentId, filename: images.filename }).from(images).where(eq(images.id, id)).get()
        : db.select({ contentId: videos.contentId, filename: videos.filename }).from(videos).where(eq(videos.id, id)).get();

    if (owner && (owner.contentId !== contentId || owner.filename !== filename)) {
      throw new PersistenceError(
        `Asset id ${id} for ${filename} is already held by ${owner.filename} of content ${owner.contentId}`,
        { assetId: id, contentId, ownerContentId: owner.contentId }
      );
    }
  }

  private async upload(
    entry: ContentFileEntry,
    remoteKey: string,
    canonicalUrl: string,
    critical: boolean,
    log: PublishContext['logger']
  ): Promise<ProcessingStatus> {
    try {
      const uploadedUrl = await this.collaborators.uploader.upload(entry.absolutePath, remoteKey);
      if (uploadedUrl !== canonicalUrl) {
        log.warn('Uploader returned a URL other than the canonical one', { uploadedUrl, canonicalUrl });
      }
      return 'complete';
    } catch (error) {
      if (critical) {
        throw new CollaboratorError(`Upload of required asset ${entry.relativePath} failed: ${toErrorMessage(error)}`, {
          path: entry.relativePath,
          key: remoteKey,
        }, error);
      }
      log.error('Upload failed, asset left pending', { key: remoteKey, error: toErrorMessage(error) });
      return 'pending';
    }
  }

  private async probeImage(entry: ContentFileEntry, extension: string, log: PublishContext['logger']): Promise<ImageProbe> {
    try {
      return await this.collaborators.imageProber.probeImage(entry.absolutePath);
    } catch (error) {
      log.warn('Image probe failed, storing without dimensions', { error: toErrorMessage(error) });
      return { width: 0, height: 0, mimeType: imageMimeType(extension) };
    }
  }

  private async probeVideo(entry: ContentFileEntry, extension: string, log: PublishContext['logger']): Promise<VideoProbe> {
    try {
      return await this.collaborators.videoProber.probeVideo(entry.absolutePath);
    } catch (error) {
      log.warn('Video probe failed, storing without duration', { error: toErrorMessage(error) });
      return { durationSeconds: 0, mimeType: videoMimeType(extension) };
    }
  }
}

function defaultCategory(mediaClass: 'image' | 'video'): RemoteCategory {
  return mediaClass === 'image' ? REMOTE_CATEGORIES.imageOriginal : REMOTE_CATEGORIES.videoOriginal;
}
