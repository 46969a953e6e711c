/**
 * Wire Reader
 *
 * Pulls request bytes off a connection. The head is read incrementally until
 * the blank line that ends it, bounded by a maximum size; the body is read
 * up to its declared Content-Length.
 */

import type { Duplex } from 'node:stream';
import { RequestTooLargeError } from './errors.ts';

const HEAD_TERMINATOR = Buffer.from('\r\n\r\n', 'latin1');

export interface RequestHead {
  /** Request line followed by header lines, without the terminating blank line */
  lines: string[];
  /** Bytes received after the blank line */
  rest: Buffer;
}

interface PendingRead {
  resolve: (chunk: Buffer | null) => void;
  reject: (error: Error) => void;
}

/**
 * Split a request head on CRLF into line records
 */
export function splitLines(head: string): string[] {
  return head.split('\r\n');
}

/**
 * Chunk-level reader over a connection.
 *
 * Chunks are queued as they arrive so nothing is lost between reads. Once the
 * body has been read the connection is paused until detach().
 */
export class WireReader {
  private conn: Duplex;
  private queue: Buffer[] = [];
  private pending: PendingRead | null = null;
  private ended = false;
  private closed = false;
  private failure: Error | null = null;

  private onData = (chunk: Buffer | string): void => {
    const buf = typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk;
    if (this.pending) {
      const { resolve } = this.pending;
      this.pending = null;
      resolve(buf);
      return;
    }
    this.queue.push(buf);
  };

  private onEnd = (): void => {
    this.ended = true;
    if (this.pending) {
      const { resolve } = this.pending;
      this.pending = null;
      resolve(null);
    }
  };

  private onClose = (): void => {
    this.closed = true;
    if (this.pending) {
      const { resolve } = this.pending;
      this.pending = null;
      resolve(null);
    }
  };

  private onError = (error: Error): void => {
    this.failure = error;
    if (this.pending) {
      const { reject } = this.pending;
      this.pending = null;
      reject(error);
    }
  };

  constructor(conn: Duplex) {
    this.conn = conn;
    conn.on('data', this.onData);
    conn.on('end', this.onEnd);
    conn.on('error', this.onError);
    conn.on('close', this.onClose);
  }

  /**
   * True when the connection was torn down before the peer finished sending
   */
  get aborted(): boolean {
    return this.closed && !this.ended;
  }

  /** Bytes received but not yet read */
  get queuedBytes(): number {
    return this.queue.reduce((total, chunk) => total + chunk.length, 0);
  }

  /**
   * Next chunk from the connection, or null once the peer stopped sending
   */
  read(): Promise<Buffer | null> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended || this.closed) return Promise.resolve(null);

    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  /**
   * Read until the blank line that ends the head.
   *
   * Returns null when the connection closed before sending anything or was
   * destroyed mid-head. When the peer stops sending before the blank line,
   * whatever arrived is the head.
   */
  async readHead(maxHeaderSize: number): Promise<RequestHead | null> {
    let buffered = Buffer.alloc(0);

    for (;;) {
      const end = buffered.indexOf(HEAD_TERMINATOR);
      if (end >= 0) {
        if (end > maxHeaderSize) {
          throw new RequestTooLargeError('head', maxHeaderSize);
        }
        return {
          lines: splitLines(buffered.subarray(0, end).toString('latin1')),
          rest: buffered.subarray(end + HEAD_TERMINATOR.length),
        };
      }

      if (buffered.length > maxHeaderSize) {
        throw new RequestTooLargeError('head', maxHeaderSize);
      }

      const chunk = await this.read();
      if (chunk === null) {
        if (buffered.length === 0 || this.aborted) return null;
        return {
          lines: splitLines(buffered.toString('latin1')),
          rest: Buffer.alloc(0),
        };
      }
      buffered = Buffer.concat([buffered, chunk]);
    }
  }

  /**
   * Read the body that follows the head.
   *
   * Without a declared length the body is whatever arrived with the head.
   * A body cut short by the peer is returned as received. Nothing more is
   * read from the connection afterwards.
   */
  async readBody(
    initial: Buffer,
    contentLength: number | null,
    maxBodySize: number,
  ): Promise<Buffer> {
    try {
      return await this.collectBody(initial, contentLength, maxBodySize);
    } finally {
      this.stopReading();
    }
  }

  private async collectBody(
    initial: Buffer,
    contentLength: number | null,
    maxBodySize: number,
  ): Promise<Buffer> {
    if (contentLength === null) {
      if (initial.length > maxBodySize) {
        throw new RequestTooLargeError('body', maxBodySize);
      }
      return initial;
    }
    if (contentLength > maxBodySize) {
      throw new RequestTooLargeError('body', maxBodySize);
    }

    const chunks = [initial];
    let received = initial.length;
    while (received < contentLength) {
      const chunk = await this.read();
      if (chunk === null) break;
      chunks.push(chunk);
      received += chunk.length;
    }

    return Buffer.concat(chunks).subarray(0, contentLength);
  }

  private stopReading(): void {
    this.conn.off('data', this.onData);
    this.conn.pause();
    this.queue = [];
    this.ended = true;
  }

  /**
   * Stop listening on the connection. Unread input is drained and dropped so
   * the peer's close is still seen.
   */
  detach(): void {
    this.conn.off('data', this.onData);
    this.conn.off('end', this.onEnd);
    this.conn.off('error', this.onError);
    this.conn.off('close', this.onClose);
    this.queue = [];
    if (this.pending) {
      const { resolve } = this.pending;
      this.pending = null;
      resolve(null);
    }
    this.conn.resume();
  }
}
