import { Inject, Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { fail, ok, Result } from '../common/result';
import { RoleAuthorizer, ROLE_AUTHORIZERS } from './authorizers/role-authorizer.interface';
import { AuthenticatedAccount } from './interfaces/authenticated-account.interface';

export interface TokenIdentity {
  identity: string;
  issuedAt: Date;
  expiresAt: Date;
}

export type TokenFailureReason = 'InvalidToken' | 'TokenExpired';
export type AuthorizationFailureReason = TokenFailureReason | 'InvalidRole' | 'AccountNotFound';

interface TokenPayload {
  sub?: unknown;
  iat?: number;
  exp?: number;
}

@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);

  constructor(
    private readonly jwtService: JwtService,
    @Inject(ROLE_AUTHORIZERS) private readonly authorizers: RoleAuthorizer[]
  ) {}

  /** Signs a token for the identity; expiry comes from the JWT module options (7 days). */
  issue(identity: string): string {
    return this.jwtService.sign({ sub: identity });
  }

  verify(token: string): Result<TokenIdentity, TokenFailureReason> {
    let payload: TokenPayload;
    try {
      payload = this.jwtService.verify<TokenPayload>(token);
    } catch (error) {
      if (error instanceof Error && error.name === 'TokenExpiredError') {
        return fail('AuthFailure', 'TokenExpired', 'Authentication token has expired');
      }
      if (error instanceof Error && (error.name === 'JsonWebTokenError' || error.name === 'NotBeforeError')) {
        return fail('AuthFailure', 'InvalidToken', 'Invalid token: cannot extract identity');
      }
      throw error;
    }

    const { sub, iat, exp } = payload;
    if (typeof sub !== 'string' || sub.length === 0 || iat === undefined || exp === undefined) {
      return fail('AuthFailure', 'InvalidToken', 'Invalid token: cannot extract identity');
    }
    return ok({ identity: sub, issuedAt: new Date(iat * 1000), expiresAt: new Date(exp * 1000) });
  }

  async authorize(token: string, role: string): Promise<Result<AuthenticatedAccount, AuthorizationFailureReason>> {
    const verified = this.verify(token);
    if (!verified.ok) {
      return verified;
    }

    const authorizer = this.authorizers.find((candidate) => candidate.role === role.toLowerCase());
    if (!authorizer) {
      return fail('AuthFailure', 'InvalidRole', `Invalid role: ${role}`);
    }

    const { identity } = verified.value;
    const accountId = await authorizer.resolveAccountId(identity);
    if (accountId === null) {
      this.logger.warn(`No ${authorizer.role} account for token identity ${identity}`);
      return fail('AuthFailure', 'AccountNotFound', `Invalid ${authorizer.role} token: user not found`);
    }
    return ok({ role: authorizer.role, accountId, identity });
  }
}
