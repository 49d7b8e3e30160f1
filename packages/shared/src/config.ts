import { EnvironmentConfigSchema, type PublishConfig } from './types.js';

/**
 * Validate environment variables and resolve the pipeline configuration.
 * Unset keys fall back to the schema defaults.
 */
export function validateEnvironment(env: Record<string, string | undefined>): PublishConfig {
  const result = EnvironmentConfigSchema.safeParse(env);

  if (!result.success) {
    const invalid = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${invalid.join('; ')}`);
  }

  const config = result.data;

  return {
    dbPath: config.DB_PATH,
    storageRoot: config.STORAGE_ROOT,
    stagingRoot: config.STAGING_ROOT,
    mediaPublicUrl: stripTrailingSlash(config.MEDIA_PUBLIC_URL),
    mediaBucketDir: config.MEDIA_BUCKET_DIR,
    siteUrl: stripTrailingSlash(config.SITE_URL),
    mediaConcurrency: config.MEDIA_CONCURRENCY,
    port: parseInt(config.PORT, 10),
    nodeEnv: config.NODE_ENV,
    logFormat: config.LOG_FORMAT,
  };
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
