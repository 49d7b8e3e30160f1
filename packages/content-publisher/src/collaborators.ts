import path from 'path';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { copy, ensureDir } from 'fs-extra/esm';
import { imageSize } from 'image-size';
import type { ISizeCalculationResult } from 'image-size/dist/types/interface.js';
import { CollaboratorError, toErrorMessage, type PublishConfig } from 'shared';
import { imageMimeType, videoMimeType } from './mime.js';
import type {
  ImageProbe,
  ImageProber,
  MediaUploader,
  PublishCollaborators,
  VideoProbe,
  VideoProber,
} from './types.js';

const execFileAsync = promisify(execFile);

/**
 * Uploader backed by a local directory that is served (or synced) under
 * MEDIA_PUBLIC_URL. Keys map one-to-one onto paths below the bucket directory.
 */
export class LocalBucketUploader implements MediaUploader {
  constructor(
    private bucketDir: string,
    private publicUrl: string
  ) {}

  async upload(localPath: string, remoteKey: string): Promise<string> {
    const destination = path.join(this.bucketDir, remoteKey);
    try {
      await ensureDir(path.dirname(destination));
      await copy(localPath, destination, { overwrite: true });
    } catch (error) {
      throw new CollaboratorError(`Upload failed for ${localPath}: ${toErrorMessage(error)}`, {
        path: localPath,
        key: remoteKey,
      }, error);
    }
    return `${this.publicUrl}/${remoteKey}`;
  }
}

/**
 * Reads dimensions and format from the image header
 */
export class ImageSizeProber implements ImageProber {
  async probeImage(filePath: string): Promise<ImageProbe> {
    let result: ISizeCalculationResult;
    try {
      result = imageSize(filePath);
    } catch (error) {
      throw new CollaboratorError(`Image probe failed for ${filePath}: ${toErrorMessage(error)}`, { path: filePath }, error);
    }

    if (result.width === undefined || result.height === undefined) {
      throw new CollaboratorError(`Image probe returned no dimensions for ${filePath}`, { path: filePath });
    }

    const format = result.type ?? path.extname(filePath);
    return {
      width: result.width,
      height: result.height,
      mimeType: imageMimeType(format),
    };
  }
}

/**
 * Reads the container duration with ffprobe
 */
export class FfprobeVideoProber implements VideoProber {
  constructor(private binary = 'ffprobe') {}

  async probeVideo(filePath: string): Promise<VideoProbe> {
    let stdout: string;
    try {
      ({ stdout } = await execFileAsync(this.binary, [
        '-v',
        'error',
        '-show_entries',
        'format=duration',
        '-of',
        'default=noprint_wrappers=1:nokey=1',
        filePath,
      ]));
    } catch (error) {
      throw new CollaboratorError(`Video probe failed for ${filePath}: ${toErrorMessage(error)}`, { path: filePath }, error);
    }

    const duration = parseFloat(stdout.trim());
    if (!Number.isFinite(duration)) {
      throw new CollaboratorError(`Video probe returned no duration for ${filePath}`, { path: filePath });
    }

    return {
      durationSeconds: Math.trunc(duration),
      mimeType: videoMimeType(path.extname(filePath)),
    };
  }
}

export function createDefaultCollaborators(config: PublishConfig): PublishCollaborators {
  return {
    uploader: new LocalBucketUploader(config.mediaBucketDir, config.mediaPublicUrl),
    imageProber: new ImageSizeProber(),
    videoProber: new FfprobeVideoProber(),
  };
}
