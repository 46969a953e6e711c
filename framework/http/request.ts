/**
 * Request Object
 *
 * Read-only view of one decoded request. Instances come from RequestBuilder,
 * which the dispatcher fills in once per connection; handlers never mutate a
 * request.
 */

import { Readable } from 'node:stream';
import { BodyAlreadyConsumedError, BodyDecodeError } from './errors.ts';
import type { DecodedHead } from './decoder.ts';
import type { Params } from './types.ts';

interface RequestParts {
  method: string;
  target: string;
  path: string;
  query: URLSearchParams;
  version: string;
  headers: ReadonlyMap<string, string>;
  params: Params;
  body: Buffer;
}

/**
 * Request class for Brisk
 */
export class BriskRequest {
  private parts: RequestParts;
  private headerIndex = new Map<string, string>();
  private bodyConsumed = false;

  constructor(parts: RequestParts) {
    this.parts = parts;
    for (const [name, value] of parts.headers) {
      this.headerIndex.set(name.toLowerCase(), value);
    }
  }

  /**
   * HTTP method as sent (GET, POST, etc.)
   */
  get method(): string {
    return this.parts.method;
  }

  /**
   * Request target as sent, including any query string
   */
  get target(): string {
    return this.parts.target;
  }

  /**
   * URL path (without query string)
   */
  get path(): string {
    return this.parts.path;
  }

  get query(): URLSearchParams {
    return this.parts.query;
  }

  /**
   * Protocol version from the request line, empty when omitted
   */
  get version(): string {
    return this.parts.version;
  }

  /**
   * Route parameters extracted from path
   */
  get params(): Readonly<Params> {
    return this.parts.params;
  }

  param(name: string): string | undefined {
    return this.parts.params[name];
  }

  /**
   * Request headers with names as received
   */
  get headers(): ReadonlyMap<string, string> {
    return this.parts.headers;
  }

  /**
   * Get a header value, case-insensitive
   */
  header(name: string): string | null {
    return this.headerIndex.get(name.toLowerCase()) ?? null;
  }

  get host(): string {
    return this.header('Host') ?? '';
  }

  get userAgent(): string {
    return this.header('User-Agent') ?? '';
  }

  get accept(): string {
    return this.header('Accept') ?? '';
  }

  /**
   * Client platform hint (Sec-CH-UA-Platform)
   */
  get platform(): string {
    return this.header('Sec-CH-UA-Platform') ?? '';
  }

  get contentType(): string | null {
    return this.header('Content-Type');
  }

  /**
   * Whether body() or one of the decoders has been called
   */
  get bodyUsed(): boolean {
    return this.bodyConsumed;
  }

  /**
   * Hand out the body as a stream. The body can be taken once.
   */
  body(): Readable {
    if (this.bodyConsumed) {
      throw new BodyAlreadyConsumedError();
    }
    this.bodyConsumed = true;
    return Readable.from([this.parts.body]);
  }

  /**
   * Read the whole body as UTF-8 text
   */
  async text(): Promise<string> {
    const data = await collect(this.body());
    return data.toString('utf8');
  }

  /**
   * Parse the body as JSON
   */
  async json<T = unknown>(): Promise<T> {
    const text = await this.text();
    if (!text) {
      throw new BodyDecodeError('Request has no body');
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new BodyDecodeError('Invalid JSON body', error);
    }
  }

  /**
   * Parse the body as application/x-www-form-urlencoded
   */
  async form(): Promise<URLSearchParams> {
    const text = await this.text();
    if (!text) {
      throw new BodyDecodeError('Request has no body');
    }
    return new URLSearchParams(text);
  }
}

async function collect(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

/**
 * Assembles a BriskRequest from a decoded head, matched params and body bytes
 */
export class RequestBuilder {
  private head: DecodedHead;
  private routeParams: Params = {};
  private bodyBytes: Buffer = Buffer.alloc(0);

  constructor(head: DecodedHead) {
    this.head = head;
  }

  params(params: Params): this {
    this.routeParams = { ...params };
    return this;
  }

  body(body: Buffer): this {
    this.bodyBytes = body;
    return this;
  }

  build(): BriskRequest {
    return new BriskRequest({
      method: this.head.method,
      target: this.head.target,
      path: this.head.path,
      query: this.head.query,
      version: this.head.version,
      headers: new Map(this.head.headers),
      params: this.routeParams,
      body: this.bodyBytes,
    });
  }
}
