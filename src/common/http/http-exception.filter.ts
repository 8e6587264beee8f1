import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';

import { getRequestContext, REQUEST_ID_HEADER } from './request-context';
import type { RequestWithContext } from './request-context.interfaces';
import { AlertValidationError } from '../../alerts/alert-validation.error';
import type { AlertValidationIssue } from '../../alerts/alert.interfaces';

export interface ErrorResponseBody {
  readonly status: 'error';
  readonly message: string;
  readonly request_id: string;
  readonly errors?: readonly AlertValidationIssue[];
}

const INTERNAL_ERROR_MESSAGE = 'Internal server error';
const INVALID_WEBHOOK_DATA_MESSAGE = 'Invalid webhook data';

const extractHttpExceptionMessage = (exception: HttpException): string => {
  const body: string | object = exception.getResponse();

  if (typeof body === 'string') {
    return body;
  }

  if ('message' in body && typeof body.message === 'string') {
    return body.message;
  }

  return exception.message;
};

// body-parser and other express middleware signal client faults with `status`/`statusCode`.
const readClientErrorStatus = (exception: unknown): number | null => {
  if (typeof exception !== 'object' || exception === null) {
    return null;
  }

  const status: unknown =
    'status' in exception
      ? exception.status
      : 'statusCode' in exception
        ? exception.statusCode
        : undefined;

  if (
    typeof status !== 'number' ||
    status < HttpStatus.BAD_REQUEST ||
    status >= HttpStatus.INTERNAL_SERVER_ERROR
  ) {
    return null;
  }

  return status;
};

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger: Logger = new Logger(HttpExceptionFilter.name);

  public catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request: RequestWithContext = http.getRequest<RequestWithContext>();
    const response: Response = http.getResponse<Response>();
    const { requestId } = getRequestContext(request);

    const [statusCode, body] = this.buildErrorResponse(exception, requestId, request);

    response.setHeader(REQUEST_ID_HEADER, requestId);
    response.status(statusCode).json(body);
  }

  private buildErrorResponse(
    exception: unknown,
    requestId: string,
    request: RequestWithContext,
  ): [number, ErrorResponseBody] {
    if (exception instanceof AlertValidationError) {
      return [
        HttpStatus.UNPROCESSABLE_ENTITY,
        {
          status: 'error',
          message: INVALID_WEBHOOK_DATA_MESSAGE,
          request_id: requestId,
          errors: exception.issues,
        },
      ];
    }

    if (exception instanceof HttpException) {
      const statusCode: number = exception.getStatus();
      const message: string = extractHttpExceptionMessage(exception);

      if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(
          `request failed requestId=${requestId} method=${request.method} path=${request.originalUrl} status=${statusCode.toString()} reason=${message}`,
        );
      }

      return [statusCode, { status: 'error', message, request_id: requestId }];
    }

    const clientErrorStatus: number | null = readClientErrorStatus(exception);

    if (clientErrorStatus !== null) {
      const message: string = exception instanceof Error ? exception.message : 'Bad request';
      this.logger.warn(
        `request rejected requestId=${requestId} method=${request.method} path=${request.originalUrl} status=${clientErrorStatus.toString()} reason=${message}`,
      );

      return [clientErrorStatus, { status: 'error', message, request_id: requestId }];
    }

    const errorMessage: string = exception instanceof Error ? exception.message : String(exception);
    this.logger.error(
      `unhandled error requestId=${requestId} method=${request.method} path=${request.originalUrl} reason=${errorMessage}`,
      exception instanceof Error ? exception.stack : undefined,
    );

    return [
      HttpStatus.INTERNAL_SERVER_ERROR,
      { status: 'error', message: INTERNAL_ERROR_MESSAGE, request_id: requestId },
    ];
  }
}
