import { and, asc, eq } from 'drizzle-orm';
import {
  articles,
  contentBlocks,
  contentMetadata,
  contentTags,
  tags,
  PersistenceError,
  PublishError,
  ValidationError,
  toErrorMessage,
  type ContentStatus,
  type DatabaseExecutor,
} from 'shared';
import { missingKeys, parseTags, type ContentMetadataMap } from './metadata-reader.js';
import type { MediaProcessor } from './media-processor.js';
import type { PublishContext, UpsertResult } from './types.js';

export const ARTICLE_REQUIRED_KEYS = ['title', 'slug', 'site_id'] as const;
export const GALLERY_REQUIRED_KEYS = ['title', 'slug', 'site_id', 'type_id', 'caption', 'location', '1'] as const;

/**
 * Scalar attributes copied into content_metadata when present and non-empty
 */
export const OPTIONAL_METADATA_KEYS = ['read_time', 'author', 'subtitle', 'canonical_url'] as const;

export const DEFAULT_TYPE_ID = 1;
export const DEFAULT_LANGUAGE = 'en';

interface ContentIdentity {
  title: string;
  slug: string;
  siteId: number;
  typeId: number;
  language: string;
  summary: string | null;
  body: string | null;
}

export function requiredKeysFor(kind: PublishContext['kind']): readonly string[] {
  return kind === 'gallery' ? GALLERY_REQUIRED_KEYS : ARTICLE_REQUIRED_KEYS;
}

/**
 * Status requested by the caller wins; otherwise metadata `status` of `1`
 * or `published` means published, anything else draft
 */
export function resolveStatus(requested: ContentStatus | undefined, metadata: ContentMetadataMap): ContentStatus {
  if (requested) return requested;
  const declared = metadata.status?.trim().toLowerCase();
  return declared === '1' || declared === 'published' ? 'published' : 'draft';
}

/**
 * Parse an integer metadata value, rejecting anything that is not a plain integer
 */
export function parseIntegerKey(metadata: ContentMetadataMap, key: string): number {
  const raw = metadata[key]?.trim() ?? '';
  if (!/^-?\d+$/.test(raw)) {
    throw new ValidationError(`Metadata key "${key}" must be an integer, got "${metadata[key] ?? ''}"`, { key });
  }
  return parseInt(raw, 10);
}

/**
 * Content upsert engine. Owns the content block, article, tag and
 * content metadata rows of a piece of content.
 */
export class ContentUpsertEngine {
  constructor(
    private mediaProcessor: MediaProcessor,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Create or update the content identified by the context metadata in a
   * single immediate transaction. Nothing is written when validation fails.
   */
  upsert(ctx: PublishContext): UpsertResult {
    const missing = missingKeys(ctx.metadata, requiredKeysFor(ctx.kind));
    if (missing.length > 0) {
      throw new ValidationError(`Missing required metadata keys: ${missing.join(', ')}`, {
        path: ctx.contentDir,
        missing: missing.join(','),
      });
    }

    const identity = this.readIdentity(ctx);
    const log = ctx.logger.child({ slug: identity.slug, siteId: identity.siteId });

    try {
      const result = ctx.db.transaction(
        tx => {
          const written = this.writeContent(tx, ctx.kind, identity, ctx.requestedStatus);
          this.writeTags(tx, written.contentId, parseTags(ctx.metadata.tags));
          this.writeMetadata(tx, written.contentId, ctx.metadata);
          return written;
        },
        { behavior: 'immediate' }
      );

      log.info(result.created ? 'Content created' : 'Content updated', {
        contentId: result.contentId,
        status: result.status,
        firstPublished: result.firstPublished,
      });

      return result;
    } catch (error) {
      if (error instanceof PublishError) throw error;
      throw new PersistenceError(`Upsert failed for "${identity.slug}": ${toErrorMessage(error)}`, {
        slug: identity.slug,
        siteId: identity.siteId,
      }, error);
    }
  }

  /**
   * Resolve the thumbnail/ image and record its canonical URL on the content block.
   * Returns null (and leaves the column untouched) when there is no thumbnail.
   */
  async attachThumbnail(ctx: PublishContext, contentId: number, published: boolean): Promise<string | null> {
    const thumbnail = await this.mediaProcessor.processThumbnail(ctx, contentId, published);
    if (!thumbnail) return null;

    this.setThumbnailUrl(ctx.db, contentId, thumbnail.canonicalUrl);
    return thumbnail.canonicalUrl;
  }

  setThumbnailUrl(db: DatabaseExecutor, contentId: number, url: string): void {
    try {
      db.update(contentBlocks)
        .set({ thumbnailUrl: url, updatedAt: this.now().toISOString() })
        .where(eq(contentBlocks.id, contentId))
        .run();
    } catch (error) {
      throw new PersistenceError(`Failed to set thumbnail for content ${contentId}: ${toErrorMessage(error)}`, {
        contentId,
      }, error);
    }
  }

  private readIdentity(ctx: PublishContext): ContentIdentity {
    const { metadata } = ctx;
    const gallery = ctx.kind === 'gallery';

    return {
      title: metadata.title ?? '',
      slug: metadata.slug ?? '',
      siteId: parseIntegerKey(metadata, 'site_id'),
      typeId: metadata.type_id === undefined ? DEFAULT_TYPE_ID : parseIntegerKey(metadata, 'type_id'),
      language: metadata.language || DEFAULT_LANGUAGE,
      summary: (gallery ? metadata.caption : metadata.summary) ?? null,
      body: gallery ? null : (metadata.body ?? null),
    };
  }

  private findExisting(db: DatabaseExecutor, kind: PublishContext['kind'], identity: ContentIdentity) {
    const bySlugAndSite = and(eq(contentBlocks.urlSlug, identity.slug), eq(contentBlocks.siteId, identity.siteId));
    const where = kind === 'gallery' ? and(bySlugAndSite, eq(contentBlocks.typeId, identity.typeId)) : bySlugAndSite;

    return db.select().from(contentBlocks).where(where).orderBy(asc(contentBlocks.id)).get();
  }

  private writeContent(
    db: DatabaseExecutor,
    kind: PublishContext['kind'],
    identity: ContentIdentity,
    requestedStatus: ContentStatus
  ): UpsertResult {
    const timestamp = this.now().toISOString();
    const existing = this.findExisting(db, kind, identity);

    let contentId: number;
    let status: ContentStatus;

    if (existing) {
      contentId = existing.id;
      // Published content never returns to draft
      status = existing.status === 'published' ? 'published' : requestedStatus;
      db.update(contentBlocks)
        .set({
          title: identity.title,
          status,
          language: identity.language,
          updatedAt: timestamp,
        })
        .where(eq(contentBlocks.id, contentId))
        .run();
    } else {
      status = requestedStatus;
      const inserted = db
        .insert(contentBlocks)
        .values({
          title: identity.title,
          urlSlug: identity.slug,
          siteId: identity.siteId,
          typeId: identity.typeId,
          status,
          language: identity.language,
          thumbnailUrl: null,
          createdAt: timestamp,
          updatedAt: timestamp,
        })
        .run();
      contentId = Number(inserted.lastInsertRowid);
    }

    const article = db.select().from(articles).where(eq(articles.contentId, contentId)).get();
    const firstPublished = status === 'published' && !article?.publishedAt;
    const publishedAt = article?.publishedAt ?? (firstPublished ? timestamp : null);

    const articleRow = {
      summary: identity.summary,
      bodyMarkdown: identity.body,
      lastEdited: timestamp,
      publishedAt,
    };
    db.insert(articles)
      .values({ contentId, ...articleRow })
      .onConflictDoUpdate({ target: articles.contentId, set: articleRow })
      .run();

    return { contentId, created: !existing, status, firstPublished };
  }

  private writeTags(db: DatabaseExecutor, contentId: number, names: string[]): void {
    for (const name of names) {
      db.insert(tags).values({ name }).onConflictDoNothing().run();
      const tag = db.select({ id: tags.id }).from(tags).where(eq(tags.name, name)).get();
      if (!tag) {
        throw new PersistenceError(`Tag "${name}" missing after insert`, { contentId, tag: name });
      }
      db.insert(contentTags).values({ contentId, tagId: tag.id }).onConflictDoNothing().run();
    }
  }

  private writeMetadata(db: DatabaseExecutor, contentId: number, metadata: ContentMetadataMap): void {
    for (const key of OPTIONAL_METADATA_KEYS) {
      const value = metadata[key];
      if (!value) continue;

      db.insert(contentMetadata)
        .values({ contentId, key, value })
        .onConflictDoUpdate({
          target: [contentMetadata.contentId, contentMetadata.key],
          set: { value },
        })
        .run();
    }
  }
}
