import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';

export interface ErrorPayload {
  statusCode: number;
  message: string | string[];
  path: string;
  timestamp: string;
}

// Fastify and its plugins raise plain errors carrying a numeric statusCode
const getStatus = (exception: unknown) => {
  if (exception instanceof HttpException) {
    return exception.getStatus();
  }
  if (exception && typeof exception === 'object' && 'statusCode' in exception) {
    const value = exception.statusCode;
    if (typeof value === 'number' && value >= 400 && value < 600) {
      return value;
    }
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
};

const getMessage = (exception: unknown, status: number): string | string[] => {
  if (exception instanceof HttpException) {
    const response = exception.getResponse();
    if (typeof response === 'string') {
      return response;
    }
    if ('message' in response) {
      const { message } = response;
      if (typeof message === 'string' || Array.isArray(message)) {
        return message;
      }
    }
    return exception.message;
  }
  if (status >= 500) {
    return 'Internal server error';
  }
  return exception instanceof Error ? exception.message : 'Request failed';
};

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger('ExceptionsHandler');

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<FastifyRequest>();
    const reply = ctx.getResponse<FastifyReply>();

    const status = getStatus(exception);
    if (status >= 500) {
      this.logger.error(
        `Unhandled exception on ${request.method} ${request.url}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }

    const payload: ErrorPayload = {
      statusCode: status,
      message: getMessage(exception, status),
      path: request.url,
      timestamp: new Date().toISOString(),
    };

    reply.status(status).send(payload);
  }
}
