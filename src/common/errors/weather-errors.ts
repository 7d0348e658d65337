import { HttpStatus } from '@nestjs/common';

export class WeatherError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly httpStatus: number = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'WeatherError';
  }
}

/** 알 수 없는 region/season/날씨 키, 또는 깨진 테이블 컨텐츠 */
export class ConfigurationError extends WeatherError {
  constructor(
    message = 'Configuration error',
    details?: Record<string, unknown>,
    httpStatus: number = HttpStatus.UNPROCESSABLE_ENTITY,
  ) {
    super('CONFIGURATION_ERROR', message, httpStatus, details);
    this.name = 'ConfigurationError';
  }
}

/** 저장소 접근/쓰기 실패: persistedThroughDay 까지는 유효 */
export class StorageError extends WeatherError {
  constructor(
    message = 'Storage unavailable',
    details?: Record<string, unknown>,
    public readonly persistedThroughDay: number | null = null,
  ) {
    super(
      'STORAGE_ERROR',
      message,
      HttpStatus.SERVICE_UNAVAILABLE,
      persistedThroughDay === null ? details : { ...details, persistedThroughDay },
    );
    this.name = 'StorageError';
  }
}

/** 호출자 버그: 두 이벤트 동시 활성, remaining/total 범위 이탈 등 */
export class InvariantViolationError extends WeatherError {
  constructor(
    message = 'Invariant violation',
    details?: Record<string, unknown>,
  ) {
    super(
      'INVARIANT_VIOLATION',
      message,
      HttpStatus.INTERNAL_SERVER_ERROR,
      details,
    );
    this.name = 'InvariantViolationError';
  }
}

export class NotFoundError extends WeatherError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND, details);
  }
}

export class ConflictError extends WeatherError {
  constructor(message = 'Conflict', details?: Record<string, unknown>) {
    super('CONFLICT', message, HttpStatus.CONFLICT, details);
  }
}

export class InvalidInputError extends WeatherError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, 422, details);
  }
}
