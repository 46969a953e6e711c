/**
 * HTTP Layer Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { statusLine, statusText } from '../../framework/http/status.ts';
import {
  decodeHead,
  parseHeaders,
  parseRequestLine,
  splitTarget,
} from '../../framework/http/decoder.ts';
import {
  BadRequestError,
  HttpError,
  MalformedRequestLineError,
  RequestTooLargeError,
  extractErrorMessage,
} from '../../framework/http/errors.ts';

describe('statusLine', () => {
  it('formats known codes with their reason phrase', () => {
    assert.equal(statusLine(200), 'HTTP/1.1 200 OK\r\n');
    assert.equal(statusLine(404), 'HTTP/1.1 404 Not Found\r\n');
    assert.equal(statusLine(302), 'HTTP/1.1 302 Found\r\n');
  });

  it('leaves the reason empty for unlisted codes', () => {
    assert.equal(statusText(299), '');
    assert.equal(statusLine(299), 'HTTP/1.1 299 \r\n');
  });

  it('rejects codes outside 100-599', () => {
    assert.throws(() => statusLine(99), RangeError);
    assert.throws(() => statusLine(600), RangeError);
    assert.throws(() => statusLine(200.5), RangeError);
  });
});

describe('parseRequestLine', () => {
  it('splits method, target and version', () => {
    assert.deepEqual(parseRequestLine('GET /index.html HTTP/1.1'), {
      method: 'GET',
      target: '/index.html',
      version: 'HTTP/1.1',
    });
  });

  it('accepts a line without a version', () => {
    assert.deepEqual(parseRequestLine('GET /'), { method: 'GET', target: '/', version: '' });
  });

  it('rejects a line with fewer than two tokens', () => {
    assert.throws(() => parseRequestLine('GET'), MalformedRequestLineError);
    assert.throws(() => parseRequestLine(''), MalformedRequestLineError);
  });

  it('reports malformed lines as 400', () => {
    const error = new MalformedRequestLineError('GET');
    assert.ok(error instanceof BadRequestError);
    assert.equal(error.statusCode, 400);
    assert.equal(error.line, 'GET');
  });
});

describe('splitTarget', () => {
  it('separates path and query', () => {
    const { path, query } = splitTarget('/search?q=brisk&page=2');
    assert.equal(path, '/search');
    assert.equal(query.get('q'), 'brisk');
    assert.equal(query.get('page'), '2');
  });

  it('drops the fragment', () => {
    const { path, query } = splitTarget('/docs?x=1#intro');
    assert.equal(path, '/docs');
    assert.equal(query.get('x'), '1');
  });

  it('returns an empty query when there is none', () => {
    const { path, query } = splitTarget('/plain');
    assert.equal(path, '/plain');
    assert.equal(query.toString(), '');
  });
});

describe('parseHeaders', () => {
  it('splits on the first colon and trims', () => {
    const headers = parseHeaders(['Host: example.test:8080', 'Accept:  text/html ']);
    assert.equal(headers.get('Host'), 'example.test:8080');
    assert.equal(headers.get('Accept'), 'text/html');
  });

  it('skips lines without a colon', () => {
    const headers = parseHeaders(['garbage', 'X-One: 1']);
    assert.deepEqual([...headers.keys()], ['X-One']);
  });

  it('keeps the last of repeated names, case-insensitively', () => {
    const headers = parseHeaders(['x-token: first', 'X-Token: second']);
    assert.deepEqual([...headers.entries()], [['X-Token', 'second']]);
  });

  it('stops at the first empty line', () => {
    const headers = parseHeaders(['A: 1', '', 'B: 2']);
    assert.deepEqual([...headers.keys()], ['A']);
  });
});

describe('decodeHead', () => {
  it('decodes a full head', () => {
    const head = decodeHead([
      'POST /api/items?draft=1 HTTP/1.1',
      'Host: example.test',
      'Content-Length: 11',
    ]);
    assert.equal(head.method, 'POST');
    assert.equal(head.target, '/api/items?draft=1');
    assert.equal(head.path, '/api/items');
    assert.equal(head.query.get('draft'), '1');
    assert.equal(head.version, 'HTTP/1.1');
    assert.equal(head.contentLength, 11);
  });

  it('has no content length when the header is absent', () => {
    assert.equal(decodeHead(['GET / HTTP/1.1']).contentLength, null);
  });

  it('rejects a non-numeric Content-Length', () => {
    assert.throws(
      () => decodeHead(['POST / HTTP/1.1', 'Content-Length: ten']),
      (error: unknown) => error instanceof BadRequestError && error.message === 'Invalid Content-Length',
    );
  });
});

describe('errors', () => {
  it('maps oversized parts to 431 and 413', () => {
    assert.equal(new RequestTooLargeError('head', 10).statusCode, 431);
    assert.equal(new RequestTooLargeError('body', 10).statusCode, 413);
  });

  it('serializes HttpError as JSON', () => {
    const error = new HttpError('Teapot', 418);
    assert.equal(error.name, 'HttpError');
    assert.deepEqual(error.toJSON(), { error: 'Teapot', status: 418 });
  });

  it('extracts messages from thrown values', () => {
    assert.equal(extractErrorMessage(new Error('boom')), 'boom');
    assert.equal(extractErrorMessage('plain'), 'plain');
    assert.equal(extractErrorMessage(42, 'fallback'), 'fallback');
  });
});
