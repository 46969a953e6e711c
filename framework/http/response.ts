/**
 * Response Context
 *
 * Per-request response bound to one connection. Headers accumulate while the
 * response is unstarted; the first send emits the status line, then the
 * header block and body, after which the response is immutable.
 *
 *   unstarted -> header-sent -> flushed
 */

import type { Duplex } from 'node:stream';
import { fileSystemAssets, mimeType, type AssetSource } from './assets.ts';
import {
  AssetNotFoundError,
  ConnectionWriteError,
  EncodeError,
  ResponseStateError,
} from './errors.ts';
import { statusLine } from './status.ts';

export type ResponseState = 'unstarted' | 'header-sent' | 'flushed';

export type RedirectStatus = 301 | 302 | 303 | 307 | 308;

export const NOT_FOUND_BODY = '<h1>Error 404 Not Found</h1>';

export interface ResponseOptions {
  assets?: AssetSource;
}

const HEADER_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/**
 * Serialize a value as JSON bytes
 */
export function encodeJson(value: unknown): Buffer {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (error) {
    throw new EncodeError('Value cannot be encoded as JSON', error);
  }
  if (text === undefined) {
    throw new EncodeError('Value cannot be encoded as JSON');
  }
  return Buffer.from(text, 'utf8');
}

/**
 * Response writer for Brisk
 */
export class BriskResponse {
  private conn: Duplex;
  private assets: AssetSource;
  private state: ResponseState = 'unstarted';
  private _status = 0;
  private _headers = new Map<string, { name: string; value: string }>();

  constructor(conn: Duplex, options: ResponseOptions = {}) {
    this.conn = conn;
    this.assets = options.assets ?? fileSystemAssets;
  }

  /**
   * Current framing state
   */
  get framing(): ResponseState {
    return this.state;
  }

  /**
   * True once the status line has been emitted
   */
  get headersSent(): boolean {
    return this.state !== 'unstarted';
  }

  get finished(): boolean {
    return this.state === 'flushed';
  }

  /**
   * Status code that was sent, 0 before sending
   */
  get statusCode(): number {
    return this._status;
  }

  /**
   * Set a response header; names are case-insensitive
   */
  setHeader(name: string, value: string): this {
    this.assertUnstarted('set a header');
    if (!HEADER_NAME.test(name)) {
      throw new TypeError(`Invalid header name: ${JSON.stringify(name)}`);
    }
    if (/[\r\n]/.test(value)) {
      throw new TypeError(`Invalid value for header ${name}`);
    }
    this._headers.set(name.toLowerCase(), { name, value });
    return this;
  }

  getHeader(name: string): string | undefined {
    return this._headers.get(name.toLowerCase())?.value;
  }

  /**
   * Send a plain text response
   */
  text(body: string, status = 200): Promise<number> {
    return this.send(status, Buffer.from(body, 'utf8'), 'text/plain; charset=utf-8');
  }

  /**
   * Send an HTML response
   */
  html(body: string, status = 200): Promise<number> {
    return this.send(status, Buffer.from(body, 'utf8'), 'text/html; charset=utf-8');
  }

  /**
   * Send a JSON response. The value is encoded before anything is written.
   */
  async json(value: unknown, status = 200): Promise<number> {
    this.assertUnstarted('send a response');
    return await this.send(status, encodeJson(value), 'application/json; charset=utf-8');
  }

  /**
   * Send a file's contents, typed by its extension
   */
  async file(path: string, status = 200): Promise<number> {
    this.assertUnstarted('send a response');
    const asset = await this.assets.open(path);
    if (!asset || asset.kind !== 'file') {
      throw new AssetNotFoundError(path);
    }
    return await this.send(status, asset.data, mimeType(path));
  }

  /**
   * Send the fixed 404 page
   */
  notFound(): Promise<number> {
    return this.html(NOT_FOUND_BODY, 404);
  }

  /**
   * Send a redirect with an empty body and close the connection
   */
  async redirect(location: string, status: RedirectStatus = 302): Promise<void> {
    this.setHeader('Location', location);
    await this.send(status, Buffer.alloc(0), 'text/plain; charset=utf-8');
    this.conn.end();
  }

  /**
   * Write raw bytes as a 200 response. Content-Type defaults to
   * application/octet-stream unless already set.
   */
  write(data: Uint8Array | string): Promise<number> {
    const body = typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
    return this.send(200, body, this.getHeader('Content-Type') ?? 'application/octet-stream');
  }

  private assertUnstarted(action: string): void {
    if (this.state !== 'unstarted') {
      throw new ResponseStateError(`Cannot ${action}: response already ${this.state}`);
    }
  }

  private async send(status: number, body: Buffer, contentType: string): Promise<number> {
    this.assertUnstarted('send a response');
    const line = statusLine(status);

    this._headers.set('content-type', { name: 'Content-Type', value: contentType });
    this._headers.set('content-length', { name: 'Content-Length', value: String(body.length) });
    if (!this._headers.has('connection')) {
      this._headers.set('connection', { name: 'Connection', value: 'close' });
    }
    this._status = status;

    this.state = 'header-sent';
    await this.transmit(Buffer.from(line, 'latin1'));

    let block = '';
    for (const { name, value } of this._headers.values()) {
      block += `${name}: ${value}\r\n`;
    }
    block += '\r\n';

    this.state = 'flushed';
    await this.transmit(Buffer.concat([Buffer.from(block, 'latin1'), body]));

    return body.length;
  }

  private transmit(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.conn.write(data, (error) => {
        if (!error) {
          resolve();
          return;
        }
        this.state = 'flushed';
        this.conn.destroy();
        reject(new ConnectionWriteError(error));
      });
    });
  }
}
