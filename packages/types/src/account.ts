/**
 * Account Types
 *
 * Chart-of-accounts primitives for the GL generator.
 *
 * Rules:
 * - Accounts are immutable once defined
 * - Classification is derived from the account itself, never stored twice
 * - Capex accounts are exactly the 6xxx codes
 */

/**
 * Ledger-facing account type, as it appears on every record.
 */
export type AccountType = "REVENUE" | "EXPENSE";

/**
 * Catalog grouping used by the weighted account draw.
 */
export type AccountKind = "revenue" | "operating_expense" | "capex" | "admin";

/**
 * A GL account.
 */
export interface Account {
  /** Four-digit account code (e.g., "4100") */
  readonly code: string;

  /** Human-readable name */
  readonly name: string;

  /** Revenue or expense */
  readonly type: AccountType;
}

export const ACCOUNT_KINDS: readonly AccountKind[] = [
  "revenue",
  "operating_expense",
  "capex",
  "admin",
];

export function isRevenue(account: Account): boolean {
  return account.type === "REVENUE";
}

export function isCapex(account: Account): boolean {
  return account.code.startsWith("6");
}
