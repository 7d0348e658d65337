import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { WeatherError } from '../errors/weather-errors.js';

@Catch()
export class WeatherExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(WeatherExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();

    if (exception instanceof WeatherError) {
      if (exception.httpStatus >= 500) {
        this.logger.error(`${exception.code}: ${exception.message}`);
      }
      res.status(exception.httpStatus).json({
        code: exception.code,
        message: exception.message,
        details: exception.details ?? null,
      });
      return;
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();
      res.status(status).json({
        code: 'HTTP_ERROR',
        message: typeof body === 'string' ? body : exception.message,
        details: typeof body === 'object' ? body : null,
      });
      return;
    }

    this.logger.error(
      'Unhandled exception',
      exception instanceof Error ? exception.stack : String(exception),
    );
    res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
      details: null,
    });
  }
}
