import { createHash } from 'crypto';

// 48 bits: stays below Number.MAX_SAFE_INTEGER
const ASSET_ID_BYTES = 6;

/**
 * Deterministic media asset id for a file of a content block.
 *
 * `sourcePath` is the path relative to the content directory
 * (`media/pic.jpg`, `thumbnail/cover.png`), so the same filename in two
 * subtrees yields two assets. Never returns 0.
 *
 * Ids are not rehashed on collision. The media processor refuses an id whose
 * stored row belongs to another content or filename, failing the publish
 * before anything is uploaded under that id.
 */
export function assetId(contentId: number, sourcePath: string): number {
  const digest = createHash('sha256').update(`${contentId}:${sourcePath}`, 'utf-8').digest();
  const id = digest.readUIntBE(0, ASSET_ID_BYTES);
  return id === 0 ? 1 : id;
}
