import { CanActivate, ExecutionContext, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AccessGateway } from '../access-gateway.service';
import { extractBearerToken } from '../bearer-token';
import { ROLES_KEY } from '../decorators/roles.decorator';
import { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';
import { Role } from '../role.enum';

/**
 * Authorizes the bearer token against the roles named by `@Roles`. Handlers
 * without `@Roles` are public.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  private readonly logger = new Logger(JwtAuthGuard.name);

  constructor(
    private readonly reflector: Reflector,
    private readonly accessGateway: AccessGateway
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const roles = this.reflector.getAllAndOverride<Role[] | undefined>(ROLES_KEY, [context.getHandler(), context.getClass()]);
    if (!roles || roles.length === 0) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearerToken(request.headers.authorization);
    if (!token) {
      throw new UnauthorizedException('No authentication token provided');
    }

    const result = await this.accessGateway.authorize(token, roles);
    if (!result.ok) {
      this.logger.warn(`Rejected ${request.method} ${request.path}: ${result.failure.message}`);
      throw new UnauthorizedException(result.failure.message);
    }

    request.account = result.value;
    return true;
  }
}
