import { Injectable } from '@nestjs/common';
import { Failure, fail, Result } from '../common/result';
import { AuthenticatedAccount } from './interfaces/authenticated-account.interface';
import { Role } from './role.enum';
import { AuthorizationFailureReason, TokenService } from './token.service';

@Injectable()
export class AccessGateway {
  constructor(private readonly tokenService: TokenService) {}

  /**
   * Authorizes the token for the first of `roles` that owns an account with
   * the token's identity. Reports the first failure when none does.
   */
  async authorize(token: string, roles: Role[]): Promise<Result<AuthenticatedAccount, AuthorizationFailureReason>> {
    let firstFailure: Failure<AuthorizationFailureReason> | undefined;

    for (const role of roles) {
      const result = await this.tokenService.authorize(token, role);
      if (result.ok) {
        return result;
      }
      // a token that fails verification fails it for every role
      if (result.failure.reason !== 'AccountNotFound') {
        return result;
      }
      if (!firstFailure) {
        firstFailure = result.failure;
      }
    }

    return firstFailure ? { ok: false, failure: firstFailure } : fail('AuthFailure', 'InvalidRole', 'No role may access this resource');
  }

  async doctorIdFromToken(token: string): Promise<number | null> {
    const result = await this.tokenService.authorize(token, Role.DOCTOR);
    return result.ok ? result.value.accountId : null;
  }

  async patientIdFromToken(token: string): Promise<number | null> {
    const result = await this.tokenService.authorize(token, Role.PATIENT);
    return result.ok ? result.value.accountId : null;
  }
}
