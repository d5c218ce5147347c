/**
 * Querywise - HTTP Server
 * Express application hosting the query API
 */

import http from 'http';
import { type AddressInfo } from 'net';

import compression from 'compression';
import cors from 'cors';
import express, { type Application, type Request, type Response } from 'express';
import helmet from 'helmet';

import { createApiRouter, type ApiDependencies } from '../api/index.js';
import logger, { logLifecycle } from '../utils/logger.js';
import type { ServerConfig } from '../utils/types.js';

import { errorHandler, notFoundHandler, requestIdMiddleware, requestLogger } from './middleware/index.js';

export const SERVICE_NAME = 'querywise';
export const SERVICE_VERSION = '1.0.0';

// =============================================================================
// Types
// =============================================================================

export interface QuerywiseServerOptions {
  config: ServerConfig;
  api: Omit<ApiDependencies, 'serviceName'>;
}

// =============================================================================
// Server Class
// =============================================================================

export class QuerywiseServer {
  private app: Application;
  private server: http.Server | null = null;
  private config: ServerConfig;
  private isShuttingDown = false;

  constructor(options: QuerywiseServerOptions) {
    this.app = express();
    this.config = options.config;

    this.setupMiddleware();
    this.setupRoutes(options.api);
  }

  /**
   * Set up Express middleware
   */
  private setupMiddleware(): void {
    this.app.use(helmet());
    this.app.use(cors());
    this.app.use(compression());

    this.app.use(requestIdMiddleware());
    this.app.use(requestLogger({ skipPaths: ['/health'] }));

    // OAuth2 password form on /auth/token, JSON everywhere else
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(express.urlencoded({ extended: false, limit: '1mb' }));

    this.app.set('trust proxy', true);
  }

  /**
   * Set up Express routes
   */
  private setupRoutes(api: Omit<ApiDependencies, 'serviceName'>): void {
    this.app.get('/', this.welcome.bind(this));

    this.app.use(this.config.apiPrefix, createApiRouter({ ...api, serviceName: SERVICE_NAME }));

    // 404 handler for unmatched routes
    this.app.use(notFoundHandler);

    // Error handler (must be last)
    this.app.use(errorHandler);
  }

  private welcome(_req: Request, res: Response): void {
    res.status(200).json({
      message: 'Welcome to the Querywise natural-language query API',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      docs: `${this.config.apiPrefix}/health`,
    });
  }

  /**
   * Start listening. Port 0 picks a free port; see `address()`.
   */
  public async start(): Promise<void> {
    const { port, host } = this.config;

    return new Promise((resolve, reject) => {
      const server = http.createServer(this.app);
      this.server = server;

      server.once('error', (error) => {
        logLifecycle('error', 'Server error', { error: error.message });
        reject(error);
      });

      server.listen(port, host, () => {
        const address = this.address();
        logLifecycle('ready', `Querywise listening on ${address?.address ?? host}:${address?.port ?? port}`, {
          environment: this.config.nodeEnv,
          apiPrefix: this.config.apiPrefix,
        });
        resolve();
      });
    });
  }

  /**
   * Stop accepting connections and wait for open ones to finish
   */
  public async shutdown(signal?: string): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }
    this.isShuttingDown = true;

    logLifecycle('shutdown', `Shutting down HTTP server${signal ? ` (${signal})` : ''}...`);

    const server = this.server;
    if (server !== null) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
      this.server = null;
    }

    logger.info('HTTP server closed');
  }

  /**
   * Bound address once listening
   */
  public address(): AddressInfo | null {
    const address = this.server?.address();
    return address !== null && typeof address === 'object' ? address : null;
  }

  /**
   * Get the Express application (for testing)
   */
  public getApp(): Application {
    return this.app;
  }
}

export function createQuerywiseServer(options: QuerywiseServerOptions): QuerywiseServer {
  return new QuerywiseServer(options);
}

export default QuerywiseServer;
