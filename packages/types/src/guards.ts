/**
 * Runtime Type Guards
 *
 * Narrowing functions for payledger domain types, used at
 * system boundaries (configuration, adapter output).
 */

import type { Account, AccountRole, Split, Transaction } from "./financial.js";
import type { RawRow } from "./event.js";

const ACCOUNT_ROLES = new Set<string>(["asset", "liability", "equity", "revenue", "expense"]);

export function isAccountRole(value: unknown): value is AccountRole {
  return typeof value === "string" && ACCOUNT_ROLES.has(value);
}

export function isAccount(value: unknown): value is Account {
  if (value === null || typeof value !== "object") return false;
  return (
    "identifier" in value &&
    "role" in value &&
    typeof value.identifier === "string" &&
    value.identifier.length > 0 &&
    isAccountRole(value.role)
  );
}

export function isRawRow(value: unknown): value is RawRow {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  return Object.values(value).every((v) => v === undefined || typeof v === "string");
}

function isSplit(value: unknown): value is Split {
  if (value === null || typeof value !== "object") return false;
  return (
    "account" in value &&
    "signedAmount" in value &&
    "memo" in value &&
    typeof value.account === "string" &&
    typeof value.signedAmount === "bigint" &&
    typeof value.memo === "string"
  );
}

export function isTransaction(value: unknown): value is Transaction {
  if (value === null || typeof value !== "object") return false;
  const field = (key: keyof Transaction): unknown => Reflect.get(value, key);
  const splits = field("splits");
  return (
    typeof field("id") === "string" &&
    typeof field("date") === "string" &&
    typeof field("timestamp") === "string" &&
    typeof field("description") === "string" &&
    typeof field("currency") === "string" &&
    Array.isArray(field("eventIds")) &&
    Array.isArray(splits) &&
    splits.every(isSplit)
  );
}
