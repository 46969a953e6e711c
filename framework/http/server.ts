/**
 * HTTP Server
 *
 * Accepts raw TCP connections and serves exactly one request on each:
 * read and decode the request, look up the route, run the handler through
 * the middleware chain, then close the connection. Every connection is an
 * independent async task sharing nothing but the router.
 */

import { createServer, type AddressInfo, type Server as NetServer, type Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import type { Router } from '../router/router.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { SpanKind, requestAttributes, withSpan } from '../telemetry/otel.ts';
import { DEFAULT_SERVER_SETTINGS, type ServerSettings } from '../config/config.ts';
import type { AssetSource } from './assets.ts';
import { decodeHead } from './decoder.ts';
import { HttpError, ListenerError } from './errors.ts';
import { RequestBuilder } from './request.ts';
import { BriskResponse } from './response.ts';
import { WireReader } from './wire_reader.ts';

export interface ServerOptions extends Partial<ServerSettings> {
  router: Router;
  logger?: Logger;
  assets?: AssetSource;
}

/**
 * HTTP Server for Brisk applications
 */
export class Server {
  private router: Router;
  private logger: Logger;
  private assets?: AssetSource;
  private settings: ServerSettings;
  private listener: NetServer | null = null;
  private connections = 0;

  constructor(options: ServerOptions) {
    this.router = options.router;
    this.logger = options.logger ?? getLogger();
    this.assets = options.assets;
    this.settings = {
      maxHeaderSize: options.maxHeaderSize ?? DEFAULT_SERVER_SETTINGS.maxHeaderSize,
      maxBodySize: options.maxBodySize ?? DEFAULT_SERVER_SETTINGS.maxBodySize,
      idleTimeout: options.idleTimeout ?? DEFAULT_SERVER_SETTINGS.idleTimeout,
    };
  }

  /**
   * Serve one request on a connection and close it. Never rejects.
   */
  async serveConnection(conn: Duplex): Promise<void> {
    const log = this.logger.child({ conn: ++this.connections });
    const onSocketError = (error: Error): void => {
      log.debug('Connection error', { error: error.message });
    };
    conn.on('error', onSocketError);

    const reader = new WireReader(conn);
    const res = new BriskResponse(conn, { assets: this.assets });

    try {
      await this.dispatch(reader, res, log);
    } catch (error) {
      await this.handleFailure(error, res, conn, log);
    } finally {
      reader.detach();
      if (!conn.destroyed && !conn.writableEnded) {
        conn.end();
      }
    }
  }

  private async dispatch(reader: WireReader, res: BriskResponse, log: Logger): Promise<void> {
    const head = await reader.readHead(this.settings.maxHeaderSize);
    if (!head) {
      if (reader.aborted) log.debug('Connection closed before the request was complete');
      return;
    }

    const decoded = decodeHead(head.lines);
    const body = await reader.readBody(head.rest, decoded.contentLength, this.settings.maxBodySize);
    if (reader.aborted) {
      log.debug('Connection closed before the request was complete');
      return;
    }

    const match = this.router.match(decoded.method, decoded.path);
    if (!match) {
      // Middleware wraps matched handlers only
      log.debug('No route matched', { method: decoded.method, path: decoded.path });
      await res.notFound();
      return;
    }

    const req = new RequestBuilder(decoded).params(match.params).body(body).build();

    await withSpan(
      `${req.method} ${match.route.pattern}`,
      async (span) => {
        await match.handler(req, res);
        span.setAttribute('http.status_code', res.statusCode);
      },
      {
        kind: SpanKind.SERVER,
        attributes: requestAttributes(req.method, match.route.pattern, req.target),
      },
    );

    if (!res.headersSent) {
      log.debug('Handler sent no response', { route: match.route.pattern });
      await res.text('');
    }
  }

  /**
   * Turn a failure into a response when nothing was sent yet, otherwise
   * abort the connection
   */
  private async handleFailure(
    error: unknown,
    res: BriskResponse,
    conn: Duplex,
    log: Logger,
  ): Promise<void> {
    if (error instanceof HttpError && error.statusCode < 500) {
      log.warn('Request rejected', { status: error.statusCode, reason: error.message });
    } else {
      log.error('Request failed', error);
    }

    if (res.headersSent || conn.destroyed) {
      conn.destroy();
      return;
    }

    try {
      if (error instanceof HttpError && error.statusCode < 500) {
        await res.text(error.message, error.statusCode);
      } else {
        await res.text('Internal Server Error', 500);
      }
    } catch (writeError) {
      log.error('Failed to send error response', writeError);
      conn.destroy();
    }
  }

  /**
   * Accept connections until closed. Resolves once the listener has closed;
   * rejects with ListenerError when it cannot bind or stops accepting.
   */
  listen(
    port: number,
    hostname = '0.0.0.0',
    onListen?: (address: AddressInfo) => void,
  ): Promise<void> {
    if (this.listener) {
      return Promise.reject(new ListenerError('Server is already listening'));
    }

    return new Promise((resolve, reject) => {
      const listener = createServer((socket) => this.accept(socket));
      this.listener = listener;

      listener.on('error', (error) => {
        this.listener = null;
        listener.close();
        reject(new ListenerError(`Listener failed on ${hostname}:${port}`, error));
      });
      listener.on('close', () => {
        this.listener = null;
        resolve();
      });

      listener.listen(port, hostname, () => {
        const address = listener.address();
        if (address && typeof address === 'object') {
          this.logger.info(`Listening on http://${address.address}:${address.port}`);
          onListen?.(address);
        }
      });
    });
  }

  /**
   * Stop accepting connections; in-flight requests finish
   */
  close(): Promise<void> {
    const listener = this.listener;
    if (!listener) return Promise.resolve();

    return new Promise((resolve, reject) => {
      listener.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private accept(socket: Socket): void {
    socket.setTimeout(this.settings.idleTimeout, () => {
      this.logger.debug('Connection idle timeout', { remote: socket.remoteAddress });
      socket.destroy();
    });

    this.serveConnection(socket).catch((error: unknown) => {
      this.logger.error('Unhandled connection failure', error);
      socket.destroy();
    });
  }
}
