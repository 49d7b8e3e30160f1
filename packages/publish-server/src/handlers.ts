import { z } from 'zod';
import { PublishError, toErrorMessage, type ContentStatus, type Logger } from 'shared';
import type { PublishRequest, PublishingResult } from 'content-publisher';
import { jsonResponse, type DispatchRequest, type DispatchResponse, type Route } from './dispatch.js';

export const SERVICE_VERSION = '0.1.0';

/**
 * The publishing operations the routes call into
 */
export interface PublishService {
  publish(request: PublishRequest): Promise<PublishingResult>;
  publishGallery(request: PublishRequest): Promise<PublishingResult>;
}

/**
 * Content directory from the `path` query parameter, else the trimmed raw body
 */
export function contentPathOf(request: DispatchRequest): string {
  const fromQuery = request.query_params.path;
  if (fromQuery && fromQuery.trim() !== '') return fromQuery.trim();
  return request.body.trim();
}

/**
 * `status=1` forces published and any other value forces draft. Without the
 * parameter the metadata decides.
 */
export function requestedStatusOf(request: DispatchRequest): ContentStatus | undefined {
  const status = request.query_params.status;
  if (status === undefined) return undefined;
  return status === '1' ? 'published' : 'draft';
}

export function errorResponse(error: unknown): DispatchResponse {
  if (error instanceof PublishError) {
    return jsonResponse(error.statusCode, {
      error: error.name,
      message: error.message,
    });
  }

  if (error instanceof z.ZodError) {
    return jsonResponse(400, {
      error: 'Invalid request',
      details: error.errors,
    });
  }

  return jsonResponse(500, {
    error: 'Internal server error',
    message: toErrorMessage(error),
  });
}

function summarize(result: PublishingResult) {
  return {
    contentId: result.contentId,
    kind: result.kind,
    status: result.status,
    created: result.created,
    thumbnailUrl: result.thumbnailUrl,
    mediaCount: result.mediaCount,
    rewrittenFiles: result.rewrittenFiles,
    storedFiles: result.storedFiles.map(file => file.relativePath),
    ...(result.gallery ? { gallery: result.gallery } : {}),
  };
}

function publishRoute(
  logger: Logger,
  operation: 'publish' | 'gallery',
  run: (request: PublishRequest) => Promise<PublishingResult>
): Route {
  return {
    method: 'POST',
    handler: async request => {
      const contentPath = contentPathOf(request);
      if (!contentPath) {
        return jsonResponse(400, { error: 'ValidationError', message: 'Missing content path' });
      }

      const status = requestedStatusOf(request);
      try {
        const result = await run({ path: contentPath, status });
        return jsonResponse(200, summarize(result));
      } catch (error) {
        const response = errorResponse(error);
        const log = response.status >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
        log(`${operation} request failed`, {
          path: contentPath,
          status: response.status,
          error: toErrorMessage(error),
        });
        return response;
      }
    },
  };
}

export function createRoutes(service: PublishService, logger: Logger): Record<string, Route> {
  return {
    '/health': {
      method: 'GET',
      handler: async () =>
        jsonResponse(200, {
          status: 'healthy',
          timestamp: new Date().toISOString(),
          version: SERVICE_VERSION,
        }),
    },
    '/publish': publishRoute(logger, 'publish', request => service.publish(request)),
    '/gallery': publishRoute(logger, 'gallery', request => service.publishGallery(request)),
  };
}
