/**
 * Account domain model.
 *
 * A registered user. Accounts own realms; tokens hang off realms. Only an
 * active, approved account can authenticate through any of its tokens.
 */

export interface Account {
  id: string;
  /** Unique, case-insensitive login name. */
  username: string;
  /** Unique contact address. */
  email: string;
  passwordHash: string;
  isApproved: boolean;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

/** Whether an account may currently authenticate. */
export function isAccountUsable(account: Account): boolean {
  return account.isActive && account.isApproved;
}
