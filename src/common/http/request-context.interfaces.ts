import type { Request } from 'express';

export interface RequestContext {
  readonly requestId: string;
  readonly receivedAtMs: number;
}

export type RequestWithContext = Request & {
  requestContext?: RequestContext;
};
