import { Request } from 'express';
import { AuthenticatedAccount } from './authenticated-account.interface';

export interface AuthenticatedRequest extends Request {
  account?: AuthenticatedAccount;
}
