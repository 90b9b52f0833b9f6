import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  AnalysisError,
  AnalysisNotFoundError,
  DocumentAnalysisError,
  DocumentNotFoundError,
  ValidationError,
} from './errors/analysis-errors';

export interface ErrorResponseBody {
  statusCode: number;
  error: string;
  message: string | string[];
}

/**
 * Maps boundary errors to HTTP responses; everything else is a 500
 */
@Catch()
export class AnalysisExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(AnalysisExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const body = this.toBody(exception);

    response.status(body.statusCode).json(body);
  }

  toBody(exception: unknown): ErrorResponseBody {
    if (exception instanceof ValidationError) {
      return {
        statusCode: HttpStatus.BAD_REQUEST,
        error: exception.code,
        message: exception.details.length > 0 ? exception.details : exception.message,
      };
    }

    const status = statusFor(exception);
    if (status !== undefined && exception instanceof AnalysisError) {
      return { statusCode: status, error: exception.code, message: exception.message };
    }

    if (exception instanceof HttpException) {
      return {
        statusCode: exception.getStatus(),
        error: exception.name,
        message: exception.message,
      };
    }

    this.logger.error(
      `Unhandled error: ${exception instanceof Error ? exception.message : String(exception)}`,
      exception instanceof Error ? exception.stack : undefined,
    );

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
  }
}

function statusFor(exception: unknown): number | undefined {
  if (exception instanceof DocumentNotFoundError) return HttpStatus.NOT_FOUND;
  if (exception instanceof AnalysisNotFoundError) return HttpStatus.NOT_FOUND;
  if (exception instanceof DocumentAnalysisError) return HttpStatus.UNPROCESSABLE_ENTITY;
  return undefined;
}
