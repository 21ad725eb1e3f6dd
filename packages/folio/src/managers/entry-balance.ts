// =============================================================================
// SIGN CONVENTION
// =============================================================================
// Raw balance is always debit - credit. Assets and expenses are debit-normal;
// liabilities, equity and revenue are credit-normal and report the negation.

import type { AccountType, NormalBalance } from "@folio/core";

export function normalBalance(type: AccountType): NormalBalance {
	return type === "asset" || type === "expense" ? "debit" : "credit";
}

export function rawBalance(debit: number, credit: number): number {
	return debit - credit;
}

/** Balance signed by the account type's normal side. */
export function signedBalance(type: AccountType, debit: number, credit: number): number {
	return normalBalance(type) === "debit" ? debit - credit : credit - debit;
}
