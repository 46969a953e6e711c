/**
 * Request and response builders for tests
 */

import { decodeHead } from '../../framework/http/decoder.ts';
import { RequestBuilder, type BriskRequest } from '../../framework/http/request.ts';
import { BriskResponse, type ResponseOptions } from '../../framework/http/response.ts';
import type { Params } from '../../framework/http/types.ts';
import { FakeConnection } from './connection.ts';

/**
 * Build a request from head lines, as the dispatcher would
 */
export function requestFor(lines: string[], body = '', params: Params = {}): BriskRequest {
  return new RequestBuilder(decodeHead(lines))
    .params(params)
    .body(Buffer.from(body, 'utf8'))
    .build();
}

/**
 * A response bound to a fresh recording connection
 */
export function responseFor(options?: ResponseOptions): { conn: FakeConnection; res: BriskResponse } {
  const conn = new FakeConnection();
  return { conn, res: new BriskResponse(conn, options) };
}
