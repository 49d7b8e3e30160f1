import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { createLogger, toErrorMessage, validateEnvironment, type Logger, type PublishConfig } from 'shared';
import { ContentPublisher, type PublishCollaborators } from 'content-publisher';
import { createDispatcher, type DispatchRequest, type Dispatcher } from './dispatch.js';
import { createRoutes } from './handlers.js';

export interface PublishServerOptions {
  env?: Record<string, string | undefined>;
  collaborators?: PublishCollaborators;
  logger?: Logger;
}

/**
 * Publish server class: adapts Express requests onto the dispatcher
 */
class PublishServer {
  private app: express.Application;
  private config: PublishConfig;
  private logger: Logger;
  private dispatch: Dispatcher;

  constructor(options: PublishServerOptions = {}) {
    // Validate environment
    this.config = validateEnvironment(options.env ?? process.env);
    this.logger = options.logger ?? createLogger(this.config.logFormat);

    const publisher = new ContentPublisher({
      config: this.config,
      collaborators: options.collaborators,
      logger: this.logger,
    });
    this.dispatch = createDispatcher(createRoutes(publisher, this.logger));

    // Initialize Express app
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    // Security headers
    this.app.use(helmet());

    this.app.use(
      cors({
        origin: this.config.nodeEnv !== 'production',
      })
    );

    // Rate limiting
    const limiter = rateLimit({
      windowMs: 15 * 60 * 1000, // 15 minutes
      max: 100,
      message: 'Too many requests from this IP',
      standardHeaders: true,
      legacyHeaders: false,
    });
    this.app.use(limiter);

    // Bodies are plain content paths whatever the declared type
    this.app.use(express.text({ type: '*/*', limit: '1MB' }));
  }

  /**
   * Flatten an Express request into the dispatcher's shape
   */
  private toDispatchRequest(req: express.Request): DispatchRequest {
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(req.headers)) {
      if (typeof value === 'string') headers[name] = value;
      else if (Array.isArray(value)) headers[name] = value.join(', ');
    }

    const queryParams: Record<string, string> = {};
    for (const [name, value] of Object.entries(req.query)) {
      if (typeof value === 'string') queryParams[name] = value;
    }

    return {
      method: req.method,
      path: req.path,
      headers,
      query_params: queryParams,
      body: typeof req.body === 'string' ? req.body : '',
    };
  }

  /**
   * Setup Express routes
   */
  private setupRoutes(): void {
    this.app.use((req, res, next) => {
      this.dispatch(this.toDispatchRequest(req))
        .then(response => {
          res.status(response.status).type('application/json').send(response.body);
        })
        .catch(next);
    });

    // Error handling middleware
    this.app.use(
      (error: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
        this.logger.error('Unhandled error', {
          error: toErrorMessage(error),
          stack: error.stack,
          path: req.path,
          method: req.method,
        });

        const status = 'status' in error && typeof error.status === 'number' ? error.status : 500;
        res.status(status).json({
          error: status === 500 ? 'Internal server error' : error.message,
          timestamp: new Date().toISOString(),
        });
      }
    );
  }

  /**
   * Start the server
   */
  public start(): void {
    const port = this.config.port;

    this.app.listen(port, () => {
      this.logger.info(`🚀 Publish server running on port ${port}`);
      this.logger.info(`📝 Publish endpoint: http://localhost:${port}/publish?path=<dir>&status=1`);
      this.logger.info(`🖼️ Gallery endpoint: http://localhost:${port}/gallery?path=<dir>&status=1`);
      this.logger.info(`💚 Health check: http://localhost:${port}/health`);
    });
  }

  /**
   * Get Express app instance
   */
  public getApp(): express.Application {
    return this.app;
  }
}

export default PublishServer;
