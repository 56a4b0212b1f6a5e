/**
 * API Server
 *
 * Express front for one serving endpoint. Routes (with the default route):
 * - POST /serve            body = request contract, version via header
 * - GET  /serve/contract   ordered input/output fields and default version
 * - GET  /serve/versions   version cache statistics
 * - GET  /health
 */

import express, { type Application, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import type { Server } from 'node:http';
import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { SERVER } from '../config/defaults.js';
import { RequestRouter } from '../core/request-router.js';
import type { EndpointDescriptor } from '../types/endpoint.js';

export interface ApiServerOptions {
  host?: string;
  port?: number;
  route?: string;
  /** Header carrying the requested version id */
  versionHeader?: string;
  corsOrigin?: string | string[];
  logger?: Logger;
}

/**
 * API Server
 *
 * @example
 * ```typescript
 * const endpoint = await buildEndpoint(registry, { modelName: 'translator', defaultVersion: '1' });
 * const server = new ApiServer(endpoint, { port: 8080 });
 * await server.start();
 * ```
 */
export class ApiServer {
  private readonly app: Application;
  private server?: Server;
  private readonly endpoint: EndpointDescriptor;
  private readonly router: RequestRouter;
  private readonly host: string;
  private readonly port: number;
  private readonly route: string;
  private readonly versionHeader: string;
  private readonly corsOrigin: string | string[];
  private readonly logger?: Logger;

  constructor(endpoint: EndpointDescriptor, options: ApiServerOptions = {}) {
    this.endpoint = endpoint;
    this.host = options.host ?? SERVER.DEFAULT_HOST;
    this.port = options.port ?? SERVER.DEFAULT_PORT;
    this.route = options.route ?? SERVER.DEFAULT_ROUTE;
    this.versionHeader = (options.versionHeader ?? SERVER.DEFAULT_VERSION_HEADER).toLowerCase();
    this.corsOrigin = options.corsOrigin ?? '*';
    this.logger = options.logger;
    this.router = new RequestRouter(endpoint, this.logger?.child({ component: 'RequestRouter' }));

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  /**
   * Express application (for in-process testing)
   */
  public getApp(): Application {
    return this.app;
  }

  /**
   * Start listening
   *
   * @returns the bound port (useful with port 0)
   */
  public async start(): Promise<number> {
    if (this.server) {
      throw new Error('API server already started');
    }

    const server = this.app.listen(this.port, this.host);
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('listening', () => resolve());
      server.once('error', reject);
    });

    const address = server.address();
    const boundPort = typeof address === 'object' && address !== null ? address.port : this.port;

    this.logger?.info(
      {
        host: this.host,
        port: boundPort,
        route: this.route,
        model: this.endpoint.modelName,
        defaultVersion: this.endpoint.defaultVersion,
      },
      'API server listening'
    );
    return boundPort;
  }

  /**
   * Stop listening and release every cached version
   */
  public async stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;

    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }

    await this.endpoint.cache.close();
    this.logger?.info('API server stopped');
  }

  private setupMiddleware(): void {
    this.app.use(
      cors({
        origin: this.corsOrigin,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', this.versionHeader],
      })
    );

    this.app.use(express.json({ limit: SERVER.MAX_BODY_BYTES }));

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.logger?.debug({ method: req.method, path: req.path }, 'HTTP request');
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/health', this.handleHealth.bind(this));
    this.app.post(this.route, this.handleServe.bind(this));
    this.app.get(`${this.route}/contract`, this.handleContract.bind(this));
    this.app.get(`${this.route}/versions`, this.handleVersions.bind(this));
  }

  private setupErrorHandling(): void {
    // 404 handler
    this.app.use((req: Request, res: Response) => {
      res.status(404).json({
        error: {
          code: 'NOT_FOUND',
          message: `Route ${req.method} ${req.path} not found`,
        },
      });
    });

    // Global error handler (body parser failures land here too)
    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (isBodyParserError(err)) {
        res.status(400).json({
          error: {
            code: 'VALIDATION_FAILED',
            message: 'Request body is not valid JSON',
          },
        });
        return;
      }

      this.logger?.error({ err, method: req.method, path: req.path }, 'API error');
      res.status(500).json({
        error: {
          code: 'INTERNAL_ERROR',
          message: 'Internal server error',
        },
      });
    });
  }

  private handleHealth(_req: Request, res: Response): void {
    res.json({
      status: 'ok',
      timestamp: Date.now(),
    });
  }

  private async handleServe(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      await this.serve(req, res);
    } catch (error) {
      next(error);
    }
  }

  private async serve(req: Request, res: Response): Promise<void> {
    const controller = new AbortController();
    // Stop waiting on a version load once the client has gone away
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort(new Error('Client disconnected'));
      }
    });

    const result = await this.router.handle(req.body, req.get(this.versionHeader), {
      signal: controller.signal,
      requestId: randomUUID(),
    });

    if (result.ok) {
      res.status(200).json(result.val);
      return;
    }

    const { status, ...error } = result.val;
    res.status(status).json({ error });
  }

  private handleContract(_req: Request, res: Response): void {
    res.json({
      model: this.endpoint.modelName,
      defaultVersion: this.endpoint.defaultVersion,
      versionHeader: this.versionHeader,
      ...this.endpoint.contract.describe(),
    });
  }

  private handleVersions(_req: Request, res: Response): void {
    res.json({
      model: this.endpoint.modelName,
      defaultVersion: this.endpoint.defaultVersion,
      ...this.endpoint.cache.getStats(),
    });
  }
}

function isBodyParserError(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'type' in err &&
    err.type === 'entity.parse.failed'
  );
}
