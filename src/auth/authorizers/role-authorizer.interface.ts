import { Role } from '../role.enum';

export const ROLE_AUTHORIZERS = 'ROLE_AUTHORIZERS';

/**
 * Resolves a token identity to the primary key of an account of one role.
 */
export interface RoleAuthorizer {
  readonly role: Role;
  resolveAccountId(identity: string): Promise<number | null>;
}
