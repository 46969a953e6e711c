/**
 * Application Class
 *
 * The main entry point for building Brisk applications. Holds the route
 * table and middleware, and drives the server that dispatches connections.
 */

import type { Duplex } from 'node:stream';
import { Config, type ConfigOptions } from './config/config.ts';
import type { AssetSource } from './http/assets.ts';
import { Server } from './http/server.ts';
import type { Handler, Middleware } from './http/types.ts';
import { staticFiles } from './middleware/static.ts';
import type { RouteGroup } from './router/group.ts';
import { normalizePrefix, RouteRegistrar } from './router/registrar.ts';
import { Router, type RouteDefinition } from './router/router.ts';
import { isLogFormat, isLogLevel, Logger } from './telemetry/logger.ts';

export interface ApplicationOptions {
  config?: Config | ConfigOptions;
  logger?: Logger;
  /** Asset source for file responses and static routes (default: filesystem) */
  assets?: AssetSource;
}

function loggerFromConfig(config: Config): Logger {
  const level = config.get<unknown>('logLevel');
  const format = config.get<unknown>('logFormat');
  return new Logger({
    level: isLogLevel(level) ? level : undefined,
    format: isLogFormat(format) ? format : undefined,
  });
}

/**
 * Main Application class
 */
export class Application extends RouteRegistrar {
  readonly router: Router;
  readonly config: Config;
  readonly logger: Logger;
  private assets?: AssetSource;
  private server: Server;

  constructor(options: ApplicationOptions = {}) {
    super();
    this.config = options.config instanceof Config ? options.config : new Config(options.config);
    this.logger = options.logger ?? loggerFromConfig(this.config);
    this.assets = options.assets;
    this.router = new Router();
    this.server = new Server({
      router: this.router,
      logger: this.logger,
      assets: this.assets,
      ...this.config.serverSettings(),
    });
  }

  /**
   * Register a route
   */
  add(method: string, pattern: string, handler: Handler): this {
    this.router.add(method, pattern, handler);
    return this;
  }

  /**
   * Create a registrar that prefixes every pattern
   */
  group(prefix: string): RouteGroup {
    return this.router.group(prefix);
  }

  /**
   * Add global middleware
   */
  use(middleware: Middleware): this {
    this.router.use(middleware);
    return this;
  }

  /**
   * Serve files beneath rootDir at prefix
   */
  serveStatic(prefix: string, rootDir: string): this {
    const base = normalizePrefix(prefix);
    this.router.get(`${base}/:filepath*`, staticFiles(rootDir, { assets: this.assets }));
    this.logger.debug('Static route registered', { prefix: base || '/', rootDir });
    return this;
  }

  getRoutes(): RouteDefinition[] {
    return this.router.getRoutes();
  }

  /**
   * Serve one request on an already accepted connection
   */
  handleConnection(conn: Duplex): Promise<void> {
    return this.server.serveConnection(conn);
  }

  /**
   * Start listening. Resolves when the server is closed and rejects with
   * ListenerError when the listener fails.
   */
  start(port?: number, host?: string): Promise<void> {
    return this.server.listen(
      port ?? this.config.get<number>('port', 8080),
      host ?? this.config.get<string>('host', '0.0.0.0'),
    );
  }

  /**
   * Stop accepting connections
   */
  close(): Promise<void> {
    return this.server.close();
  }
}

/**
 * Create a new Brisk application
 */
export function createApp(options?: ApplicationOptions): Application {
  return new Application(options);
}
