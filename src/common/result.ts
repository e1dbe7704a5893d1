import {
  BadRequestException,
  ConflictException,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';

export type FailureKind = 'AuthFailure' | 'NotFound' | 'Conflict' | 'ValidationFailure' | 'PersistenceFailure';

export interface Failure<R extends string = string> {
  kind: FailureKind;
  reason: R;
  message: string;
}

export type Result<T, R extends string = string> = { ok: true; value: T } | { ok: false; failure: Failure<R> };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<R extends string>(kind: FailureKind, reason: R, message: string): { ok: false; failure: Failure<R> } {
  return { ok: false, failure: { kind, reason, message } };
}

export function toHttpException(failure: Failure): HttpException {
  switch (failure.kind) {
    case 'AuthFailure':
      return new UnauthorizedException(failure.message);
    case 'NotFound':
      return new NotFoundException(failure.message);
    case 'Conflict':
      return new ConflictException(failure.message);
    case 'ValidationFailure':
      return new BadRequestException(failure.message);
    case 'PersistenceFailure':
      return new InternalServerErrorException(failure.message);
  }
}

/**
 * Unwraps a successful result or throws the HTTP exception matching the
 * failure kind. Used at the controller boundary.
 */
export function throwFailure<T>(result: Result<T>): T {
  if (!result.ok) {
    throw toHttpException(result.failure);
  }
  return result.value;
}
