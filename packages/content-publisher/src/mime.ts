/**
 * Image format name (as reported by a prober, or the bare extension) to MIME type
 */
const IMAGE_MIME_BY_FORMAT: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
  heic: 'image/heic',
  heif: 'image/heif',
  bmp: 'image/bmp',
  tif: 'image/tiff',
  tiff: 'image/tiff',
  svg: 'image/svg+xml',
};

const VIDEO_MIME_BY_EXTENSION: Record<string, string> = {
  '.mp4': 'video/mp4',
  '.mov': 'video/quicktime',
  '.webm': 'video/webm',
  '.avi': 'video/x-msvideo',
  '.mkv': 'video/x-matroska',
};

export const DEFAULT_VIDEO_MIME = 'video/mp4';

export function imageMimeType(format: string): string {
  const normalized = format.replace(/^\./, '').toLowerCase();
  return IMAGE_MIME_BY_FORMAT[normalized] ?? `image/${normalized}`;
}

export function videoMimeType(extension: string): string {
  return VIDEO_MIME_BY_EXTENSION[extension.toLowerCase()] ?? DEFAULT_VIDEO_MIME;
}
