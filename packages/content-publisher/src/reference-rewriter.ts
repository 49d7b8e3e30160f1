import { promises as fs } from 'fs';
import { ENTRY_MARKUP_FILE, StorageIOError, toErrorMessage, type ContentKind, type Logger } from 'shared';
import { listStaticAssets } from './content-directory.js';
import type { MediaUrlMap } from './types.js';

export interface RewriteOptions {
  contentDir: string;
  mediaMap: MediaUrlMap;
  contentId: number;
  kind: ContentKind;
  published: boolean;
}

// Relative attribute values only: no scheme, no leading slash
const RELATIVE_TARGET = String.raw`(?:\.\/)?(?![a-zA-Z][a-zA-Z0-9+.-]*:|\/)`;
const STYLESHEET_HREF = new RegExp(String.raw`\b(href)(\s*=\s*)(["'])${RELATIVE_TARGET}([^"']+?\.css)\3`, 'gi');
const SCRIPT_SRC = new RegExp(String.raw`\b(src)(\s*=\s*)(["'])${RELATIVE_TARGET}([^"']+?\.js)\3`, 'gi');

/**
 * Replace every literal occurrence of each map key, longest key first so a
 * reference is never clobbered by one of its prefixes
 */
export function substituteReferences(content: string, mediaMap: MediaUrlMap): string {
  const keys = [...mediaMap.keys()].sort((a, b) => b.length - a.length || a.localeCompare(b));
  let result = content;
  for (const key of keys) {
    const url = mediaMap.get(key);
    if (url === undefined || !result.includes(key)) continue;
    result = result.split(key).join(url);
  }
  return result;
}

/**
 * Point relative stylesheet and script references of the entry markup at
 * the per-content canonical base
 */
export function absolutizeEntryReferences(markup: string, base: string): string {
  const rebase = (_match: string, attribute: string, assign: string, quote: string, target: string) =>
    `${attribute}${assign}${quote}${base}/${target}${quote}`;
  return markup.replace(STYLESHEET_HREF, rebase).replace(SCRIPT_SRC, rebase);
}

/**
 * Rewrites local media, style and script references of published content
 * into canonical absolute URLs, in place
 */
export class ReferenceRewriter {
  constructor(
    private siteUrl: string,
    private logger: Logger
  ) {}

  canonicalBase(kind: ContentKind, contentId: number): string {
    return `${this.siteUrl}/${kind}/${contentId}`;
  }

  /**
   * Returns the relative paths of the files that were written.
   * Drafts keep their authored references untouched.
   */
  async rewrite(options: RewriteOptions): Promise<string[]> {
    if (!options.published) {
      this.logger.debug('Draft content, references left relative', { contentId: options.contentId });
      return [];
    }

    const base = this.canonicalBase(options.kind, options.contentId);
    const files = await listStaticAssets(options.contentDir);
    const rewritten: string[] = [];

    for (const file of files) {
      let original: string;
      try {
        original = await fs.readFile(file.absolutePath, 'utf-8');
      } catch (error) {
        throw new StorageIOError(`Cannot read ${file.relativePath} for rewriting: ${toErrorMessage(error)}`, {
          path: file.absolutePath,
          contentId: options.contentId,
        }, error);
      }

      let updated = substituteReferences(original, options.mediaMap);
      if (file.relativePath === ENTRY_MARKUP_FILE) {
        updated = absolutizeEntryReferences(updated, base);
      }

      if (updated === original) continue;

      try {
        await fs.writeFile(file.absolutePath, updated, 'utf-8');
      } catch (error) {
        throw new StorageIOError(`Cannot write rewritten ${file.relativePath}: ${toErrorMessage(error)}`, {
          path: file.absolutePath,
          contentId: options.contentId,
        }, error);
      }
      rewritten.push(file.relativePath);
    }

    this.logger.info('References rewritten', {
      contentId: options.contentId,
      scanned: files.length,
      rewritten: rewritten.length,
    });

    return rewritten;
  }
}
