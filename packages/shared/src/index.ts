// Types and constants
export * from './types.js';

// Configuration
export { validateEnvironment } from './config.js';

// Logging and errors
export { Logger, createLogger } from './logger.js';
export * from './errors.js';

// Persistence
export * from './db/schema.js';
export {
  openDatabase,
  withDatabase,
  applySchema,
  type PublishDatabase,
  type DatabaseExecutor,
  type DatabaseConnection,
} from './db/client.js';

// Utilities
export { assetId } from './hash.js';
export { Semaphore, parallelMap, KeyedMutex } from './concurrency.js';
