import { promises as fs } from 'fs';
import { ValidationError, type Logger } from 'shared';

export type ContentMetadataMap = Record<string, string>;

/**
 * Reader for the flat `key=value` description files (metadata.txt, link.txt)
 */
export class MetadataReader {
  constructor(private logger?: Logger) {}

  /**
   * Parse a description file. The first `=` splits key from value and the
   * value is kept verbatim. An unreadable file yields an empty mapping.
   */
  async parse(filePath: string): Promise<ContentMetadataMap> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      this.logger?.warn('Cannot open metadata file', {
        path: filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return {};
    }

    return parseMetadata(content);
  }

  /**
   * Parse and fail eagerly when any of `required` is absent
   */
  async parseRequired(filePath: string, required: readonly string[]): Promise<ContentMetadataMap> {
    const metadata = await this.parse(filePath);

    if (Object.keys(metadata).length === 0) {
      throw new ValidationError(`Metadata file is missing or empty: ${filePath}`, { path: filePath });
    }

    const missing = missingKeys(metadata, required);
    if (missing.length > 0) {
      throw new ValidationError(`Missing required metadata keys: ${missing.join(', ')}`, {
        path: filePath,
        missing: missing.join(','),
      });
    }

    return metadata;
  }
}

/**
 * Parse `key=value` text. Later duplicates of a key win. The map has no
 * prototype, so keys such as `__proto__` are stored like any other.
 */
export function parseMetadata(content: string): ContentMetadataMap {
  const metadata: ContentMetadataMap = Object.create(null);

  for (const rawLine of content.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    const delimiter = line.indexOf('=');
    if (delimiter === -1) continue;

    metadata[line.slice(0, delimiter)] = line.slice(delimiter + 1);
  }

  return metadata;
}

export function missingKeys(metadata: ContentMetadataMap, required: readonly string[]): string[] {
  return required.filter(key => !Object.prototype.hasOwnProperty.call(metadata, key));
}

/**
 * Split a comma separated tag list; tokens are trimmed of spaces and tabs,
 * empty tokens dropped and duplicates removed
 */
export function parseTags(value: string | undefined): string[] {
  if (!value) return [];

  const tags = value
    .split(',')
    .map(token => token.replace(/^[ \t]+|[ \t]+$/g, ''))
    .filter(token => token.length > 0);

  return [...new Set(tags)];
}
