import express from 'express';
import cors from 'cors';
import { createServer, Server as HttpServer } from 'http';
import { AppConfig } from './config/types.js';
import { ConfigManager } from './config/ConfigManager.js';
import { DatabaseManager } from './database/DatabaseManager.js';
import { MigrationRunner } from './database/MigrationRunner.js';
import { TMDBClient } from './services/providers/tmdb/TMDBClient.js';
import { securityMiddleware, rateLimitByIp } from './middleware/security.js';
import { requestLoggingMiddleware, errorLoggingMiddleware, logger } from './middleware/logging.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { RATE_LIMITS } from './config/constants.js';
import { getErrorMessage } from './utils/errorHandling.js';

// Import routes
import { createApiRouter } from './routes/api.js';

export interface AppDependencies {
  dbManager?: DatabaseManager;
  /** Overrides the client built from config; null disables TMDB */
  tmdbClient?: TMDBClient | null;
}

export function createTmdbClient(config: AppConfig['tmdb']): TMDBClient | null {
  if (!config.apiKey) {
    return null;
  }
  return new TMDBClient({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    language: config.language,
    includeAdult: config.includeAdult,
    timeout: config.timeout,
    cacheTtl: config.cacheTtl,
    rateLimit: config.rateLimit,
    rateLimitWindow: config.rateLimitWindow,
  });
}

export class App {
  public express: express.Application;
  private httpServer: HttpServer;
  private config: AppConfig;
  private dbManager: DatabaseManager;
  private tmdbClient: TMDBClient | null;
  private initialized = false;

  constructor(config: AppConfig, dependencies: AppDependencies = {}) {
    this.express = express();
    this.httpServer = createServer(this.express);
    this.config = config;
    this.dbManager = dependencies.dbManager ?? new DatabaseManager(config.database);
    this.tmdbClient =
      dependencies.tmdbClient !== undefined ? dependencies.tmdbClient : createTmdbClient(config.tmdb);

    this.initializeMiddleware();
    this.initializeRoutes(); // Basic routes (health)
    // API routes and error handling are added by initialize()
  }

  private initializeMiddleware(): void {
    // Trust proxy for rate limiting and IP detection
    this.express.set('trust proxy', 1);

    // Security middleware
    this.express.use(securityMiddleware);

    // CORS
    this.express.use(
      cors({
        origin: this.config.server.env === 'development' ? true : false,
      })
    );

    this.express.use(express.json({ limit: '1mb' }));

    // Request logging
    this.express.use(requestLoggingMiddleware);

    // Rate limiting
    this.express.use('/api', rateLimitByIp(RATE_LIMITS.API_WINDOW, RATE_LIMITS.API_MAX_REQUESTS));
  }

  private initializeRoutes(): void {
    // Health check endpoint (no auth required)
    this.express.get('/health', (_req, res) => {
      res.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        version: process.env.npm_package_version || '1.0.0',
        database: this.dbManager.isConnected() ? 'connected' : 'disconnected',
        tmdb: this.tmdbClient ? 'configured' : 'disabled',
        tmdbStats: this.tmdbClient ? this.tmdbClient.getStats() : null,
      });
    });
  }

  private initializeErrorHandling(): void {
    // Error logging middleware
    this.express.use(errorLoggingMiddleware);

    // 404 handler
    this.express.use(notFoundHandler);

    // Global error handler
    this.express.use(errorHandler);
  }

  /**
   * Mount the API and the error handlers. Expects a connected, migrated database.
   */
  public initialize(): void {
    if (this.initialized) {
      return;
    }

    this.express.use(
      '/api',
      createApiRouter(this.dbManager, { auth: this.config.auth, tmdbClient: this.tmdbClient })
    );
    logger.info('API routes initialized');

    // Error handling (MUST be after all routes)
    this.initializeErrorHandling();
    this.initialized = true;
  }

  public async start(): Promise<void> {
    // Validate configuration
    const warnings = ConfigManager.getInstance().validate();
    for (const warning of warnings) {
      logger.warn(warning);
    }

    // Connect to database
    await this.dbManager.connect();
    logger.info('Database connected successfully');

    // Run migrations
    const migrationRunner = new MigrationRunner(this.dbManager.getConnection());
    await migrationRunner.migrate();
    logger.info('Database migrations completed');

    this.initialize();

    // Start server
    const { port, host } = this.config.server;
    await new Promise<void>((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(port, host, () => {
        this.httpServer.off('error', reject);
        resolve();
      });
    });

    logger.info(`Watchlog server started on ${host}:${port}`);
    logger.info(`Environment: ${this.config.server.env}`);
    logger.info(`Database: ${this.config.database.filename}`);
  }

  public async stop(): Promise<void> {
    try {
      if (this.httpServer.listening) {
        await new Promise<void>((resolve, reject) => {
          this.httpServer.close(error => (error ? reject(error) : resolve()));
        });
        logger.info('HTTP server closed');
      }

      await this.dbManager.disconnect();
      logger.info('Server stopped gracefully');
    } catch (error) {
      logger.error('Error during server shutdown', { error: getErrorMessage(error) });
      throw error;
    }
  }

  public getDatabaseManager(): DatabaseManager {
    return this.dbManager;
  }
}
