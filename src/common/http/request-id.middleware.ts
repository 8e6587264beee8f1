import { Injectable, Logger, type NestMiddleware } from '@nestjs/common';
import type { NextFunction, Response } from 'express';

import { getRequestContext, REQUEST_ID_HEADER } from './request-context';
import type { RequestContext, RequestWithContext } from './request-context.interfaces';

@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  private readonly logger: Logger = new Logger('HTTP');

  public use(request: RequestWithContext, response: Response, next: NextFunction): void {
    const context: RequestContext = getRequestContext(request);
    response.setHeader(REQUEST_ID_HEADER, context.requestId);

    response.on('finish', (): void => {
      const durationMs: number = Date.now() - context.receivedAtMs;
      this.logger.log(
        `request completed requestId=${context.requestId} method=${request.method} path=${request.originalUrl} status=${response.statusCode.toString()} durationMs=${durationMs.toString()}`,
      );
    });

    next();
  }
}
