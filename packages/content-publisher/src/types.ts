import type {
  ContentKind,
  ContentStatus,
  DatabaseExecutor,
  Logger,
  PublishConfig,
  ProcessingStatus,
} from 'shared';
import type { ContentMetadataMap } from './metadata-reader.js';

/**
 * Image probe result
 */
export interface ImageProbe {
  width: number;
  height: number;
  mimeType: string;
}

/**
 * Video probe result
 */
export interface VideoProbe {
  durationSeconds: number;
  mimeType: string;
}

/**
 * Object store upload. Returns the public URL of the stored object.
 */
export interface MediaUploader {
  upload(localPath: string, remoteKey: string): Promise<string>;
}

export interface ImageProber {
  probeImage(filePath: string): Promise<ImageProbe>;
}

export interface VideoProber {
  probeVideo(filePath: string): Promise<VideoProbe>;
}

/**
 * External collaborators of the pipeline
 */
export interface PublishCollaborators {
  uploader: MediaUploader;
  imageProber: ImageProber;
  videoProber: VideoProber;
}

/**
 * A publish invocation, as received from the request layer
 */
export interface PublishRequest {
  /** Content directory on the local filesystem */
  path: string;
  /** Publish state requested by the caller; undefined defers to metadata */
  status?: ContentStatus;
}

/**
 * Request-scoped state threaded through the pipeline stages
 */
export interface PublishContext {
  kind: ContentKind;
  contentDir: string;
  metadata: ContentMetadataMap;
  requestedStatus: ContentStatus;
  db: DatabaseExecutor;
  config: PublishConfig;
  logger: Logger;
}

/**
 * Outcome of the upsert stage
 */
export interface UpsertResult {
  contentId: number;
  created: boolean;
  status: ContentStatus;
  /** True when this publish stamped published_at */
  firstPublished: boolean;
}

/**
 * A classified media file and where it now lives
 */
export interface StoredMedia {
  id: number;
  sourcePath: string;
  canonicalUrl: string;
  kind: 'image' | 'video';
  processingStatus: ProcessingStatus;
}

/**
 * Local reference (`media/pic.jpg`) to canonical URL
 */
export type MediaUrlMap = Map<string, string>;

export interface StoredFile {
  fileType: string;
  relativePath: string;
  destination: string;
}

/**
 * Publishing result
 */
export interface PublishingResult {
  contentId: number;
  kind: ContentKind;
  status: ContentStatus;
  created: boolean;
  thumbnailUrl: string | null;
  mediaCount: number;
  media: StoredMedia[];
  rewrittenFiles: string[];
  storedFiles: StoredFile[];
  gallery?: GallerySummary;
}

export interface GalleryLink {
  url: string;
  name: string;
  imageId: number;
}

export interface GallerySummary {
  images: number;
  reels: number;
  hashtagCount: number;
  link: GalleryLink | null;
}

/**
 * Validation outcome for a content directory
 */
export interface ValidationResult {
  path: string;
  valid: boolean;
  error?: string;
}
