import type { FolioTenantApi } from "folio";

/**
 * Assert that the fundamental double-entry invariant holds: across every
 * account of the tenant, total debits equal total credits.
 */
export async function assertLedgerBalanced(api: FolioTenantApi): Promise<void> {
	const entries = await api.ledger.listEntries();
	let debit = 0;
	let credit = 0;
	for (const entry of entries) {
		debit += entry.debit;
		credit += entry.credit;
	}
	if (debit !== credit) {
		throw new Error(`Double-entry invariant violated: debits(${debit}) != credits(${credit})`);
	}
}

/**
 * Assert that every posting balances on its own and that no entry has both
 * sides zero.
 */
export async function assertPostingsBalanced(api: FolioTenantApi): Promise<void> {
	const totals = new Map<string, { debit: number; credit: number }>();
	for (const entry of await api.ledger.listEntries()) {
		if (entry.debit === 0 && entry.credit === 0) {
			throw new Error(`Entry ${entry.id} of posting ${entry.postingId} has neither a debit nor a credit`);
		}
		const current = totals.get(entry.postingId) ?? { debit: 0, credit: 0 };
		current.debit += entry.debit;
		current.credit += entry.credit;
		totals.set(entry.postingId, current);
	}
	for (const [postingId, { debit, credit }] of totals) {
		if (debit !== credit) {
			throw new Error(`Posting ${postingId} is unbalanced: debits(${debit}) != credits(${credit})`);
		}
	}
}

/**
 * Assert that an account has the expected balance, signed by its normal side.
 */
export async function assertAccountBalance(
	api: FolioTenantApi,
	accountId: string,
	expectedBalance: number,
): Promise<void> {
	const balance = await api.accounts.getBalance(accountId);
	if (balance !== expectedBalance) {
		throw new Error(`Account ${accountId}: expected balance ${expectedBalance}, got ${balance}`);
	}
}

/**
 * Assert that a linked bank account's cached balance equals its chart
 * account's ledger balance.
 */
export async function assertBankMatchesLedger(api: FolioTenantApi, bankAccountId: string): Promise<void> {
	const result = await api.banking.checkLedgerConsistency(bankAccountId);
	if (!result.consistent) {
		throw new Error(
			`Bank account ${bankAccountId}: cached balance ${result.currentBalance} != ledger balance ${result.ledgerBalance}`,
		);
	}
}
