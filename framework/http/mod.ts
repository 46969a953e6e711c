/**
 * HTTP Layer
 *
 * Reads requests off raw connections and frames responses back onto them.
 */

export { Server, type ServerOptions } from './server.ts';
export { BriskRequest, RequestBuilder } from './request.ts';
export {
  BriskResponse,
  NOT_FOUND_BODY,
  encodeJson,
  type RedirectStatus,
  type ResponseOptions,
  type ResponseState,
} from './response.ts';
export { WireReader, splitLines, type RequestHead } from './wire_reader.ts';
export { decodeHead, parseHeaders, parseRequestLine, splitTarget, type DecodedHead } from './decoder.ts';
export { statusLine, statusText } from './status.ts';
export { fileSystemAssets, mimeType, type Asset, type AssetSource } from './assets.ts';
export {
  AssetNotFoundError,
  BadRequestError,
  BodyAlreadyConsumedError,
  BodyDecodeError,
  ConnectionWriteError,
  EncodeError,
  HttpError,
  ListenerError,
  MalformedRequestLineError,
  PathTraversalError,
  RequestTooLargeError,
  ResponseStateError,
  RouteDefinitionError,
  extractErrorMessage,
} from './errors.ts';
export type { Handler, Middleware, Params } from './types.ts';
