/**
 * @glstream/generator — Account catalog.
 *
 * Static chart of accounts grouped by kind. Immutable once constructed.
 *
 * Rules:
 * - No duplicate account codes
 * - Every kind has at least one account
 * - Lookups never mutate the catalog
 */

import type { Account, AccountKind } from "@glstream/types";
import { ACCOUNT_KINDS } from "@glstream/types";
import type { AccountTable } from "./data.js";
import { loadAccountTable } from "./data.js";
import { GeneratorError } from "./types.js";

/** Legend of account-code ranges, as served by the service root. */
export const ACCOUNT_TYPES_INFO: Readonly<Record<string, string>> = {
  "4xxx": "Revenue Accounts",
  "5xxx": "Operating Expense Accounts",
  "6xxx": "Capital Expenditure Accounts",
  "7xxx": "Administrative Accounts",
};

export class AccountCatalog {
  private readonly _byKind: AccountTable;
  private readonly _byCode = new Map<string, { account: Account; kind: AccountKind }>();

  constructor(table: AccountTable = loadAccountTable()) {
    this._byKind = table;

    for (const kind of ACCOUNT_KINDS) {
      for (const account of table[kind]) {
        if (this._byCode.has(account.code)) {
          throw new GeneratorError(
            "INVALID_DATA",
            `Duplicate account code: "${account.code}"`,
          );
        }
        this._byCode.set(account.code, { account, kind });
      }
    }
  }

  /**
   * All accounts of a given kind, in catalog order.
   */
  listByType(kind: AccountKind): readonly Account[] {
    return this._byKind[kind];
  }

  /**
   * Get an account by code.
   * Returns undefined if not found.
   */
  get(code: string): Account | undefined {
    return this._byCode.get(code)?.account;
  }

  kindOf(code: string): AccountKind | undefined {
    return this._byCode.get(code)?.kind;
  }

  /**
   * All accounts, grouped in kind order.
   */
  all(): readonly Account[] {
    return ACCOUNT_KINDS.flatMap((kind) => this._byKind[kind]);
  }

  get count(): number {
    return this._byCode.size;
  }
}
