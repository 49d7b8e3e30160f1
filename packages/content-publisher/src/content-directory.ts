import path from 'path';
import glob from 'fast-glob';
import { pathExists } from 'fs-extra/esm';
import {
  IMAGE_EXTENSIONS,
  VIDEO_EXTENSIONS,
  STATIC_FILE_TYPES,
  METADATA_FILE,
  type MediaClass,
  type StaticFileType,
} from 'shared';

/**
 * A file inside a content directory
 */
export interface ContentFileEntry {
  absolutePath: string;
  /** Path relative to the content directory, always with forward slashes */
  relativePath: string;
}

const imageExtensions: ReadonlySet<string> = new Set(IMAGE_EXTENSIONS);
const videoExtensions: ReadonlySet<string> = new Set(VIDEO_EXTENSIONS);
const staticTypes: ReadonlySet<string> = new Set(STATIC_FILE_TYPES);

/**
 * Lower-cased extension including the dot, or '' when there is none
 */
export function extensionOf(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

/**
 * Classify a file purely by its extension
 */
export function classify(filePath: string): MediaClass {
  const ext = extensionOf(filePath);
  if (imageExtensions.has(ext)) return 'image';
  if (videoExtensions.has(ext)) return 'video';
  if (staticTypes.has(ext.slice(1))) return 'static';
  return 'unsupported';
}

export function isStaticFileType(value: string): value is StaticFileType {
  return staticTypes.has(value);
}

/**
 * Regular files below `subdir` of the content directory, sorted by relative path
 */
export async function listFiles(contentDir: string, subdir = ''): Promise<ContentFileEntry[]> {
  const cwd = subdir ? path.join(contentDir, subdir) : contentDir;
  if (!(await pathExists(cwd))) return [];

  const matches = await glob('**/*', {
    cwd,
    onlyFiles: true,
    dot: false,
    followSymbolicLinks: false,
  });

  return matches.sort().map(match => {
    const relativePath = subdir ? `${subdir}/${match}` : match;
    return {
      absolutePath: path.join(contentDir, relativePath),
      relativePath,
    };
  });
}

/**
 * Markup, script and style files of the content directory (any depth),
 * excluding the metadata file
 */
export async function listStaticAssets(contentDir: string): Promise<ContentFileEntry[]> {
  const files = await listFiles(contentDir);
  return files.filter(file => file.relativePath !== METADATA_FILE && classify(file.relativePath) === 'static');
}

/**
 * Images directly inside `subdir`, lexicographically sorted
 */
export async function listImages(contentDir: string, subdir: string): Promise<ContentFileEntry[]> {
  const files = await listFiles(contentDir, subdir);
  return files.filter(file => !file.relativePath.slice(subdir.length + 1).includes('/') && classify(file.relativePath) === 'image');
}
