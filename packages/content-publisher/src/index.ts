/**
 * Content Publisher - filesystem content directories into the content store,
 * the object store and the persisted local tree.
 */

export { ContentPublisher, type ContentPublisherOptions } from './content-publisher.js';
export { MetadataReader, parseMetadata, parseTags, missingKeys, type ContentMetadataMap } from './metadata-reader.js';
export {
  ContentUpsertEngine,
  resolveStatus,
  requiredKeysFor,
  ARTICLE_REQUIRED_KEYS,
  GALLERY_REQUIRED_KEYS,
  OPTIONAL_METADATA_KEYS,
} from './content-upsert.js';
export { MediaProcessor, type MediaFileOptions, type MediaBatchResult } from './media-processor.js';
export { ReferenceRewriter, substituteReferences, absolutizeEntryReferences } from './reference-rewriter.js';
export { FileManager } from './file-manager.js';
export { GalleryPublisher, countHashtags, type GalleryPlan } from './gallery-publisher.js';
export { classify, listFiles, listStaticAssets, listImages, type ContentFileEntry } from './content-directory.js';
export {
  LocalBucketUploader,
  ImageSizeProber,
  FfprobeVideoProber,
  createDefaultCollaborators,
} from './collaborators.js';

export type {
  ImageProbe,
  VideoProbe,
  MediaUploader,
  ImageProber,
  VideoProber,
  PublishCollaborators,
  PublishRequest,
  PublishContext,
  PublishingResult,
  ValidationResult,
  StoredMedia,
  StoredFile,
  GallerySummary,
} from './types.js';
