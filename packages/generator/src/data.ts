/**
 * @glstream/generator — Static data files.
 *
 * The chart of accounts and the identifier vocabularies ship as JSON next
 * to the package sources and are validated once, at load time.
 */

import { readFileSync } from "node:fs";
import type { Account, AccountKind } from "@glstream/types";
import { isAccount } from "@glstream/types";
import { GeneratorError } from "./types.js";

export interface Vocabulary {
  readonly basins: readonly string[];
  readonly states: readonly string[];
  readonly counties: readonly string[];
  readonly leasePrefixes: readonly string[];
  readonly leaseSuffixes: readonly string[];
  readonly costCenterRegions: readonly string[];
  readonly journalSources: readonly string[];
  readonly transactionTypes: readonly string[];
}

export type AccountTable = Readonly<Record<AccountKind, readonly Account[]>>;

function readJson(file: string): unknown {
  const url = new URL(`../data/${file}`, import.meta.url);
  return JSON.parse(readFileSync(url, "utf8")) as unknown;
}

function isNonEmptyStringList(value: unknown): value is readonly string[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((v) => typeof v === "string" && v.length > 0)
  );
}

function asObject(raw: unknown, what: string): Record<string, unknown> {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new GeneratorError("INVALID_DATA", `${what} must be an object`);
  }
  return raw as Record<string, unknown>;
}

export function parseVocabulary(raw: unknown): Vocabulary {
  const v = asObject(raw, "Vocabulary");
  const list = (key: keyof Vocabulary): readonly string[] => {
    const value = v[key];
    if (!isNonEmptyStringList(value)) {
      throw new GeneratorError("INVALID_DATA", `Vocabulary "${key}" must be a non-empty list of strings`);
    }
    return value;
  };

  return {
    basins: list("basins"),
    states: list("states"),
    counties: list("counties"),
    leasePrefixes: list("leasePrefixes"),
    leaseSuffixes: list("leaseSuffixes"),
    costCenterRegions: list("costCenterRegions"),
    journalSources: list("journalSources"),
    transactionTypes: list("transactionTypes"),
  };
}

export function parseAccountTable(raw: unknown): AccountTable {
  const v = asObject(raw, "Account table");
  const group = (kind: AccountKind): readonly Account[] => {
    const value = v[kind];
    if (!Array.isArray(value) || value.length === 0) {
      throw new GeneratorError("INVALID_DATA", `Account group "${kind}" must be a non-empty list`);
    }
    const accounts: Account[] = [];
    for (const entry of value) {
      if (!isAccount(entry)) {
        throw new GeneratorError("INVALID_DATA", `Account group "${kind}" contains a malformed account`);
      }
      accounts.push({ code: entry.code, name: entry.name, type: entry.type });
    }
    return accounts;
  };

  return {
    revenue: group("revenue"),
    operating_expense: group("operating_expense"),
    capex: group("capex"),
    admin: group("admin"),
  };
}

export function loadVocabulary(): Vocabulary {
  return parseVocabulary(readJson("vocabulary.json"));
}

export function loadAccountTable(): AccountTable {
  return parseAccountTable(readJson("accounts.json"));
}
