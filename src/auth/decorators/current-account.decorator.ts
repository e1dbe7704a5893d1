import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { AuthenticatedAccount } from '../interfaces/authenticated-account.interface';
import { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';

export const CurrentAccount = createParamDecorator((_data: unknown, context: ExecutionContext): AuthenticatedAccount => {
  const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
  if (!request.account) {
    throw new UnauthorizedException('Authentication required');
  }
  return request.account;
});
