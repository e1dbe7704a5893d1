import { JwtService } from '@nestjs/jwt';
import { TOKEN_TTL_SECONDS } from '../config/configuration';
import { RoleAuthorizer } from './authorizers/role-authorizer.interface';
import { Role } from './role.enum';
import { TokenService } from './token.service';

function authorizerFor(role: Role, accounts: Record<string, number>): RoleAuthorizer {
  return {
    role,
    resolveAccountId: jest.fn(async (identity: string) => accounts[identity] ?? null),
  };
}

describe('TokenService', () => {
  const jwtService = new JwtService({ secret: 'test-secret', signOptions: { expiresIn: TOKEN_TTL_SECONDS } });
  let tokenService: TokenService;

  beforeEach(() => {
    tokenService = new TokenService(jwtService, [
      authorizerFor(Role.ADMIN, { admin: 1 }),
      authorizerFor(Role.DOCTOR, { 'doctor@example.com': 7 }),
      authorizerFor(Role.PATIENT, { 'patient@example.com': 3 }),
    ]);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('issues tokens whose identity verifies back', () => {
    const result = tokenService.verify(tokenService.issue('doctor@example.com'));

    expect(result.ok && result.value.identity).toBe('doctor@example.com');
  });

  it('sets a seven day expiry', () => {
    jest.useFakeTimers({ now: new Date('2024-01-01T00:00:00Z') });

    const result = tokenService.verify(tokenService.issue('patient@example.com'));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.issuedAt.toISOString()).toBe('2024-01-01T00:00:00.000Z');
      expect(result.value.expiresAt.toISOString()).toBe('2024-01-08T00:00:00.000Z');
    }
  });

  it('rejects a token past its expiry', () => {
    jest.useFakeTimers({ now: new Date('2024-01-01T00:00:00Z') });
    const token = tokenService.issue('patient@example.com');
    jest.setSystemTime(new Date('2024-01-08T00:00:01Z'));

    expect(tokenService.verify(token)).toEqual({
      ok: false,
      failure: { kind: 'AuthFailure', reason: 'TokenExpired', message: 'Authentication token has expired' },
    });
  });

  it('rejects malformed tokens and foreign signatures', () => {
    const foreign = new JwtService({ secret: 'other-secret' }).sign({ sub: 'patient@example.com' });

    for (const token of ['not-a-token', foreign]) {
      const result = tokenService.verify(token);
      expect(!result.ok && result.failure.reason).toBe('InvalidToken');
    }
  });

  it('rejects a token without a subject', () => {
    const result = tokenService.verify(jwtService.sign({ role: 'doctor' }));

    expect(!result.ok && result.failure.message).toBe('Invalid token: cannot extract identity');
  });

  it('authorizes a token for the role owning the identity', async () => {
    const result = await tokenService.authorize(tokenService.issue('doctor@example.com'), 'DOCTOR');

    expect(result).toEqual({ ok: true, value: { role: Role.DOCTOR, accountId: 7, identity: 'doctor@example.com' } });
  });

  it('reports an unknown role', async () => {
    const result = await tokenService.authorize(tokenService.issue('doctor@example.com'), 'nurse');

    expect(!result.ok && result.failure).toEqual({ kind: 'AuthFailure', reason: 'InvalidRole', message: 'Invalid role: nurse' });
  });

  it('reports a valid token without an account of the role', async () => {
    const result = await tokenService.authorize(tokenService.issue('doctor@example.com'), 'patient');

    expect(!result.ok && result.failure).toEqual({
      kind: 'AuthFailure',
      reason: 'AccountNotFound',
      message: 'Invalid patient token: user not found',
    });
  });
});
