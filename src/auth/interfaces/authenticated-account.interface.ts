import { Role } from '../role.enum';

export interface AuthenticatedAccount {
  role: Role;
  accountId: number;
  /** Email for doctors and patients, username for admins. */
  identity: string;
}
