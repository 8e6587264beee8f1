import { randomUUID } from 'node:crypto';

import type { RequestContext, RequestWithContext } from './request-context.interfaces';

export const REQUEST_ID_HEADER = 'X-Request-ID';

const REQUEST_ID_PATTERN: RegExp = /^[A-Za-z0-9._-]{1,128}$/;

export const resolveRequestId = (inboundRequestId: string | undefined): string =>
  inboundRequestId !== undefined && REQUEST_ID_PATTERN.test(inboundRequestId)
    ? inboundRequestId
    : randomUUID();

/** Returns the context attached by the request-id middleware, creating it when the middleware did not run. */
export const getRequestContext = (request: RequestWithContext): RequestContext => {
  if (request.requestContext === undefined) {
    request.requestContext = {
      requestId: resolveRequestId(request.get(REQUEST_ID_HEADER)),
      receivedAtMs: Date.now(),
    };
  }

  return request.requestContext;
};

export const readRawBody = (request: RequestWithContext): Buffer => {
  const body: unknown = request.body;
  return Buffer.isBuffer(body) ? body : Buffer.alloc(0);
};
