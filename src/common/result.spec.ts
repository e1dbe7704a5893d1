import { ConflictException, InternalServerErrorException, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { fail, ok, throwFailure, toHttpException } from './result';

describe('result', () => {
  it('unwraps a successful result', () => {
    expect(throwFailure(ok(42))).toBe(42);
  });

  it('throws the exception matching the failure kind', () => {
    expect(() => throwFailure(fail('NotFound', 'NotFound', 'Appointment not found.'))).toThrow(
      new NotFoundException('Appointment not found.')
    );
  });

  it.each([
    { kind: 'AuthFailure' as const, type: UnauthorizedException, status: 401 },
    { kind: 'NotFound' as const, type: NotFoundException, status: 404 },
    { kind: 'Conflict' as const, type: ConflictException, status: 409 },
    { kind: 'PersistenceFailure' as const, type: InternalServerErrorException, status: 500 },
  ])('maps $kind to HTTP $status', ({ kind, type, status }) => {
    const exception = toHttpException({ kind, reason: 'Any', message: 'failed' });

    expect(exception).toBeInstanceOf(type);
    expect(exception.getStatus()).toBe(status);
  });

  it('maps validation failures to 400', () => {
    expect(toHttpException({ kind: 'ValidationFailure', reason: 'DoctorNotFound', message: 'Invalid doctor ID.' }).getStatus()).toBe(400);
  });
});
