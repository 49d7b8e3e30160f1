import path from 'path';
import { eq } from 'drizzle-orm';
import { pathExists } from 'fs-extra/esm';
import {
  galleryItems,
  galleryLinks,
  galleryPosts,
  parallelMap,
  LINK_DIR,
  LINK_FILE,
  MEDIA_DIR,
  REELS_DIR,
  REMOTE_CATEGORIES,
  PersistenceError,
  PublishError,
  ValidationError,
  toErrorMessage,
  type Logger,
} from 'shared';
import { classify, listImages, type ContentFileEntry } from './content-directory.js';
import type { MediaProcessor } from './media-processor.js';
import type { ContentMetadataMap, MetadataReader } from './metadata-reader.js';
import type { GallerySummary, PublishContext, StoredMedia } from './types.js';

export interface GalleryLinkPlan {
  image: ContentFileEntry;
  url: string;
  name: string;
}

/**
 * What a gallery directory will publish, resolved before anything is written
 */
export interface GalleryPlan {
  images: ContentFileEntry[];
  link: GalleryLinkPlan | null;
  hashtagCount: number;
}

export interface GalleryOutcome {
  media: StoredMedia[];
  summary: GallerySummary;
}

export function countHashtags(hashtags: string | undefined): number {
  return hashtags ? hashtags.split('#').length - 1 : 0;
}

/**
 * Image-set posts: ordered images named by the `1`, `2`, ... metadata keys,
 * an optional link card and optional reels
 */
export class GalleryPublisher {
  constructor(
    private mediaProcessor: MediaProcessor,
    private metadataReader: MetadataReader,
    private logger: Logger
  ) {}

  /**
   * Resolve the ordered images and the link card. Throws ValidationError
   * when the directory cannot form a gallery.
   */
  async inspect(contentDir: string, metadata: ContentMetadataMap): Promise<GalleryPlan> {
    const available = await listImages(contentDir, MEDIA_DIR);
    if (available.length === 0) {
      throw new ValidationError(`Gallery has no images in ${MEDIA_DIR}/`, { path: contentDir });
    }

    const images: ContentFileEntry[] = [];
    for (let position = 1; metadata[String(position)] !== undefined; position++) {
      const filename = metadata[String(position)] ?? '';
      const relativePath = `${MEDIA_DIR}/${filename}`;
      const absolutePath = path.join(contentDir, MEDIA_DIR, filename);

      if (classify(relativePath) === 'image' && (await pathExists(absolutePath))) {
        images.push({ absolutePath, relativePath });
      } else {
        this.logger.warn('Listed gallery image not found, skipping', { path: contentDir, position, filename });
      }
    }

    if (images.length === 0) {
      throw new ValidationError('None of the images listed under 1, 2, 3... exist in media/', { path: contentDir });
    }

    return {
      images,
      link: await this.inspectLink(contentDir),
      hashtagCount: countHashtags(metadata.hashtags),
    };
  }

  /**
   * Process the gallery media and record the post, its ordered items and
   * its link card. The first image is the cover and must upload when published.
   */
  async apply(ctx: PublishContext, contentId: number, published: boolean, plan: GalleryPlan): Promise<GalleryOutcome> {
    const items = await parallelMap(
      plan.images,
      (entry, index) =>
        this.mediaProcessor.processFile(ctx, contentId, entry, {
          assetType: 'content',
          published,
          critical: index === 0,
        }),
      ctx.config.mediaConcurrency
    );

    const reels = await this.mediaProcessor.processSubtree(ctx, contentId, REELS_DIR, published);

    const linkMedia = plan.link
      ? await this.mediaProcessor.processFile(ctx, contentId, plan.link.image, { assetType: 'content', published })
      : null;

    if (items.length === 0) {
      throw new ValidationError('Gallery has no cover image', { contentId });
    }

    const link = plan.link && linkMedia ? { url: plan.link.url, name: plan.link.name, imageId: linkMedia.id } : null;

    try {
      ctx.db.transaction(
        tx => {
          const post = {
            caption: ctx.metadata.caption ?? '',
            location: ctx.metadata.location ?? '',
            hashtagCount: plan.hashtagCount,
            single: items.length === 1,
            hasLink: link !== null,
          };
          tx.insert(galleryPosts)
            .values({ contentId, ...post })
            .onConflictDoUpdate({ target: galleryPosts.contentId, set: post })
            .run();

          tx.delete(galleryItems).where(eq(galleryItems.contentId, contentId)).run();
          items.forEach((item, index) => {
            tx.insert(galleryItems).values({ contentId, position: index + 1, imageId: item.id }).run();
          });

          if (link) {
            tx.insert(galleryLinks)
              .values({ contentId, ...link })
              .onConflictDoUpdate({ target: galleryLinks.contentId, set: link })
              .run();
          } else {
            tx.delete(galleryLinks).where(eq(galleryLinks.contentId, contentId)).run();
          }
        },
        { behavior: 'immediate' }
      );
    } catch (error) {
      if (error instanceof PublishError) throw error;
      throw new PersistenceError(`Failed to record gallery ${contentId}: ${toErrorMessage(error)}`, { contentId }, error);
    }

    this.logger.info('Gallery recorded', {
      contentId,
      images: items.length,
      reels: reels.media.length,
      hasLink: link !== null,
    });

    return {
      media: [...items, ...reels.media, ...(linkMedia ? [linkMedia] : [])],
      summary: {
        images: items.length,
        reels: reels.media.length,
        hashtagCount: plan.hashtagCount,
        link,
      },
    };
  }

  /**
   * Thumbnail for a gallery without a thumbnail/ image: the cover, copied
   * under the thumbnail category
   */
  async publishCoverThumbnail(ctx: PublishContext, contentId: number, published: boolean, plan: GalleryPlan): Promise<string> {
    const [cover] = plan.images;
    if (!cover) {
      throw new ValidationError('Gallery has no cover image', { contentId });
    }
    return this.mediaProcessor.publishCopy(ctx, contentId, cover, REMOTE_CATEGORIES.thumbnail, published);
  }

  private async inspectLink(contentDir: string): Promise<GalleryLinkPlan | null> {
    const linkDir = path.join(contentDir, LINK_DIR);
    if (!(await pathExists(linkDir))) return null;

    const linkFile = path.join(linkDir, LINK_FILE);
    if (!(await pathExists(linkFile))) {
      throw new ValidationError(`Missing ${LINK_FILE} in ${LINK_DIR}/`, { path: contentDir });
    }

    const images = await listImages(contentDir, LINK_DIR);
    const [image] = images;
    if (!image || images.length > 1) {
      throw new ValidationError(`${LINK_DIR}/ must hold exactly one image, found ${images.length}`, { path: contentDir });
    }

    const data = await this.metadataReader.parse(linkFile);
    if (!data.url || !data.name) {
      throw new ValidationError(`${LINK_FILE} requires url and name`, { path: linkFile });
    }

    return { image, url: data.url, name: data.name };
  }
}
