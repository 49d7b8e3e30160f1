import { z } from 'zod';

/**
 * File extensions classified as images (compared lower-cased, with the dot)
 */
export const IMAGE_EXTENSIONS = [
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.webp',
  '.heic',
  '.bmp',
  '.tiff',
] as const;

/**
 * File extensions classified as videos
 */
export const VIDEO_EXTENSIONS = ['.mp4', '.mov', '.webm', '.avi', '.mkv'] as const;

/**
 * Static asset types copied into the persisted local tree (no dot)
 */
export const STATIC_FILE_TYPES = ['html', 'css', 'js'] as const;

export type StaticFileType = (typeof STATIC_FILE_TYPES)[number];

/**
 * Content directory conventions
 */
export const METADATA_FILE = 'metadata.txt';
export const ENTRY_MARKUP_FILE = 'index.html';
export const MEDIA_DIR = 'media';
export const THUMBNAIL_DIR = 'thumbnail';
export const LINK_DIR = 'link';
export const LINK_FILE = 'link.txt';
export const REELS_DIR = 'reels';

/**
 * Remote object categories; the canonical key is `<category><asset id><ext>`
 */
export const REMOTE_CATEGORIES = {
  imageOriginal: 'images/originals/',
  videoOriginal: 'videos/originals/',
  thumbnail: 'images/thumbnails/',
} as const;

export type RemoteCategory = (typeof REMOTE_CATEGORIES)[keyof typeof REMOTE_CATEGORIES];

export const CONTENT_STATUSES = ['draft', 'published'] as const;
export type ContentStatus = (typeof CONTENT_STATUSES)[number];

export const CONTENT_KINDS = ['article', 'gallery'] as const;
export type ContentKind = (typeof CONTENT_KINDS)[number];

export type MediaClass = 'image' | 'video' | 'static' | 'unsupported';
export type AssetType = 'content' | 'thumbnail';
export type ProcessingStatus = 'pending' | 'complete';

/**
 * Environment configuration
 */
export const EnvironmentConfigSchema = z.object({
  DB_PATH: z.string().min(1).default('/var/lib/content-db/content.db'),
  STORAGE_ROOT: z.string().min(1).default('/var/lib/article-content'),
  STAGING_ROOT: z.string().min(1).default('/tmp'),
  MEDIA_PUBLIC_URL: z.string().url().default('https://storage.googleapis.com/content-media-public'),
  MEDIA_BUCKET_DIR: z.string().min(1).default('/var/lib/content-media'),
  SITE_URL: z.string().url().default('https://server.example.com'),
  MEDIA_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  PORT: z.string().default('8082'),
  NODE_ENV: z.string().default('development'),
  LOG_FORMAT: z.enum(['text', 'json']).default('text'),
});

export type EnvironmentConfig = z.infer<typeof EnvironmentConfigSchema>;

/**
 * Resolved configuration handed to the pipeline
 */
export interface PublishConfig {
  dbPath: string;
  storageRoot: string;
  stagingRoot: string;
  mediaPublicUrl: string;
  mediaBucketDir: string;
  siteUrl: string;
  mediaConcurrency: number;
  port: number;
  nodeEnv: string;
  logFormat: 'text' | 'json';
}
