import { sqliteTable, text, integer, primaryKey, uniqueIndex, index } from 'drizzle-orm/sqlite-core';

/**
 * Table definitions for the content store. DDL lives in sql/schema.sql and
 * must stay in step with these definitions.
 */

export const contentBlocks = sqliteTable(
  'content_blocks',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    title: text('title').notNull(),
    urlSlug: text('url_slug').notNull(),
    siteId: integer('site_id').notNull(),
    typeId: integer('type_id').notNull(),
    status: text('status', { enum: ['draft', 'published'] }).notNull(),
    language: text('language').notNull(),
    thumbnailUrl: text('thumbnail_url'),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  table => ({
    identity: uniqueIndex('content_blocks_identity').on(table.urlSlug, table.siteId, table.typeId),
  })
);

export const articles = sqliteTable('articles', {
  contentId: integer('content_id')
    .primaryKey()
    .references(() => contentBlocks.id),
  summary: text('summary'),
  bodyMarkdown: text('body_markdown'),
  lastEdited: text('last_edited').notNull(),
  publishedAt: text('published_at'),
});

export const tags = sqliteTable('tags', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
});

export const contentTags = sqliteTable(
  'content_tags',
  {
    contentId: integer('content_id')
      .notNull()
      .references(() => contentBlocks.id),
    tagId: integer('tag_id')
      .notNull()
      .references(() => tags.id),
  },
  table => ({
    pk: primaryKey({ columns: [table.contentId, table.tagId] }),
  })
);

export const images = sqliteTable(
  'images',
  {
    id: integer('id').primaryKey(),
    originalUrl: text('original_url').notNull(),
    filename: text('filename').notNull(),
    mimeType: text('mime_type').notNull(),
    sizeBytes: integer('size_bytes').notNull(),
    width: integer('width').notNull(),
    height: integer('height').notNull(),
    contentId: integer('content_id')
      .notNull()
      .references(() => contentBlocks.id),
    imageType: text('image_type', { enum: ['content', 'thumbnail'] }).notNull(),
    processingStatus: text('processing_status', { enum: ['pending', 'complete'] }).notNull(),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  table => ({
    byContent: index('images_content_id').on(table.contentId),
  })
);

export const videos = sqliteTable(
  'videos',
  {
    id: integer('id').primaryKey(),
    originalUrl: text('original_url').notNull(),
    filename: text('filename').notNull(),
    mimeType: text('mime_type').notNull(),
    sizeBytes: integer('size_bytes').notNull(),
    durationSeconds: integer('duration_seconds').notNull(),
    contentId: integer('content_id')
      .notNull()
      .references(() => contentBlocks.id),
    videoType: text('video_type', { enum: ['content', 'thumbnail'] }).notNull(),
    isShortForm: integer('is_short_form', { mode: 'boolean' }).notNull(),
    processingStatus: text('processing_status', { enum: ['pending', 'complete'] }).notNull(),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  table => ({
    byContent: index('videos_content_id').on(table.contentId),
  })
);

export const contentFiles = sqliteTable(
  'content_files',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    contentId: integer('content_id')
      .notNull()
      .references(() => contentBlocks.id),
    fileType: text('file_type').notNull(),
    filePath: text('file_path').notNull(),
    isMain: integer('is_main', { mode: 'boolean' }).notNull(),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  table => ({
    byPath: uniqueIndex('content_files_path').on(table.contentId, table.filePath),
  })
);

export const contentMetadata = sqliteTable(
  'content_metadata',
  {
    contentId: integer('content_id')
      .notNull()
      .references(() => contentBlocks.id),
    key: text('key').notNull(),
    value: text('value').notNull(),
  },
  table => ({
    pk: primaryKey({ columns: [table.contentId, table.key] }),
  })
);

export const galleryPosts = sqliteTable('gallery_posts', {
  contentId: integer('content_id')
    .primaryKey()
    .references(() => contentBlocks.id),
  caption: text('caption').notNull(),
  location: text('location').notNull(),
  hashtagCount: integer('hashtag_count').notNull(),
  single: integer('single', { mode: 'boolean' }).notNull(),
  hasLink: integer('has_link', { mode: 'boolean' }).notNull(),
});

export const galleryItems = sqliteTable(
  'gallery_items',
  {
    contentId: integer('content_id')
      .notNull()
      .references(() => contentBlocks.id),
    position: integer('position').notNull(),
    imageId: integer('image_id').notNull(),
  },
  table => ({
    pk: primaryKey({ columns: [table.contentId, table.position] }),
  })
);

export const galleryLinks = sqliteTable('gallery_links', {
  contentId: integer('content_id')
    .primaryKey()
    .references(() => contentBlocks.id),
  imageId: integer('image_id').notNull(),
  url: text('url').notNull(),
  name: text('name').notNull(),
});

export type ContentBlockRow = typeof contentBlocks.$inferSelect;
export type ArticleRow = typeof articles.$inferSelect;
export type ImageRow = typeof images.$inferSelect;
export type VideoRow = typeof videos.$inferSelect;
export type ContentFileRow = typeof contentFiles.$inferSelect;
