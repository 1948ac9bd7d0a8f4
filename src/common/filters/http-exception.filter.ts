import { Catch, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { ArgumentsHost, ExceptionFilter } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import type { FastifyRequest } from 'fastify';
import { ZodValidationException } from 'nestjs-zod';
import { ZodError } from 'zod';

import { Diagnostic, SchemaError, SchemaParseError } from '../../language/diagnostics';
import { createApiResponse } from '../utils/response.util';

const STATUS_TITLES: Record<number, string> = {
  [HttpStatus.BAD_REQUEST]: 'Bad request',
  [HttpStatus.NOT_FOUND]: 'Not found',
  [HttpStatus.PAYLOAD_TOO_LARGE]: 'Payload too large',
  [HttpStatus.UNPROCESSABLE_ENTITY]: 'Invalid schema',
  [HttpStatus.INTERNAL_SERVER_ERROR]: 'Internal server error',
};

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<FastifyRequest>();

    let statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let title = STATUS_TITLES[HttpStatus.INTERNAL_SERVER_ERROR];
    let message: string | Diagnostic[] | object = 'An unexpected error occurred';

    if (exception instanceof SchemaError) {
      statusCode = HttpStatus.UNPROCESSABLE_ENTITY;
      title = exception instanceof SchemaParseError ? 'Schema parsing failed' : 'Invalid schema';
      message = exception.diagnostics;
      this.logger.debug(`${exception.message} (${request.url})`);
    } else if (exception instanceof ZodValidationException) {
      statusCode = HttpStatus.BAD_REQUEST;
      title = 'Validation failed';
      const zodError = exception.getZodError();
      message =
        zodError instanceof ZodError
          ? zodError.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
          : exception.message;
    } else if (exception instanceof HttpException) {
      statusCode = exception.getStatus();
      const response = exception.getResponse();
      title = STATUS_TITLES[statusCode] ?? 'Error';

      if (statusCode === HttpStatus.BAD_REQUEST || statusCode === HttpStatus.NOT_FOUND) {
        this.logger.debug(`Error (${statusCode}): ${JSON.stringify(response, null, 2)}`);
      }

      message = this.extractMessage(response);

      // Fastify's default 404 text names the method, replace it with the path
      if (
        statusCode === HttpStatus.NOT_FOUND &&
        typeof message === 'string' &&
        message.startsWith('Cannot ')
      ) {
        message = `Route not found: ${request.url}`;
      }
    } else {
      this.logger.error(exception);
    }

    const responseBody = createApiResponse(false, undefined, { title, message });
    httpAdapter.reply(ctx.getResponse(), responseBody, statusCode);
  }

  private extractMessage(response: string | object): string | object {
    if (typeof response === 'string') return response;
    if (!('message' in response)) return response;
    const { message } = response;
    if (Array.isArray(message)) return message.join(', ');
    if (typeof message === 'string' && message.length > 0) return message;
    return response;
  }
}
