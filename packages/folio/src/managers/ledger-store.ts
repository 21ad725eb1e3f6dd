// =============================================================================
// LEDGER STORE — append-only entry log
// =============================================================================
// Single write path for ledger entries. Every posting is validated as a whole
// before the first row is written:
//   - at least two lines
//   - amounts are non-negative safe integers, each line has a nonzero side
//   - sum(debit) == sum(credit) > 0
//   - every account exists in the tenant and is active
// Entries are never updated or deleted. Bank accounts linked to a posted
// chart account have their cached balance moved in the same transaction.

import { randomUUID } from "node:crypto";
import type {
	Account,
	BankAccount,
	EntrySource,
	EntrySourceField,
	FolioAdapter,
	FolioContext,
	FolioTransactionAdapter,
	LedgerEntry,
	LedgerLine,
	Posting,
	SortBy,
	Where,
} from "@folio/core";
import { assertAmount, assertIsoDate, FolioError, NotFoundError, ValidationError } from "@folio/core";
import { reserveSequence } from "./numbering.js";

type Reader = Pick<FolioAdapter, "findMany">;

export interface PostEntriesParams {
	tenantId: string;
	branchId: string | null;
	transactionDate: string;
	description: string | null;
	lines: LedgerLine[];
	source?: EntrySource;
	createdBy: string | null;
}

export interface LineTotals {
	totalDebit: number;
	totalCredit: number;
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Check the shape and balance of a set of lines. Does not touch storage.
 *
 * @throws ValidationError with reason UNBALANCED_ENTRIES when the sides differ
 */
export function validateLedgerLines(lines: LedgerLine[], maxAmount: number): LineTotals {
	if (lines.length < 2) {
		throw new ValidationError("A posting needs at least two lines", {
			reason: "TOO_FEW_LINES",
			details: { lineCount: lines.length },
		});
	}

	let totalDebit = 0;
	let totalCredit = 0;
	lines.forEach((line, i) => {
		const debit = assertAmount(line.debit ?? 0, `lines[${i}].debit`, { allowZero: true, max: maxAmount });
		const credit = assertAmount(line.credit ?? 0, `lines[${i}].credit`, { allowZero: true, max: maxAmount });
		if (debit === 0 && credit === 0) {
			throw new ValidationError(`lines[${i}] has neither a debit nor a credit`, {
				reason: "EMPTY_LINE",
				details: { line: i },
			});
		}
		totalDebit += debit;
		totalCredit += credit;
	});

	if (totalDebit !== totalCredit || totalDebit === 0) {
		throw FolioError.unbalanced(totalDebit, totalCredit);
	}
	return { totalDebit, totalCredit };
}

/** Every account must exist in the tenant and be active. */
export async function assertPostableAccounts(
	db: Reader,
	tenantId: string,
	accountIds: string[],
): Promise<Map<string, Account>> {
	const unique = [...new Set(accountIds)];
	const accounts = await db.findMany<Account>({
		model: "account",
		where: [
			{ field: "tenantId", operator: "eq", value: tenantId },
			{ field: "id", operator: "in", value: unique },
		],
	});
	const byId = new Map(accounts.map((a) => [a.id, a]));
	for (const id of unique) {
		const account = byId.get(id);
		if (!account) throw new NotFoundError("Account", id);
		if (!account.isActive) {
			throw new ValidationError(`Account ${account.code} is inactive`, {
				reason: "ACCOUNT_INACTIVE",
				details: { accountId: id },
			});
		}
	}
	return byId;
}

// =============================================================================
// WRITE
// =============================================================================

function sourceLinks(source: EntrySource = {}): Record<EntrySourceField, string | null> {
	return {
		salesInvoiceId: source.salesInvoiceId ?? null,
		purchaseBillId: source.purchaseBillId ?? null,
		journalVoucherId: source.journalVoucherId ?? null,
		creditNoteId: source.creditNoteId ?? null,
		debitNoteId: source.debitNoteId ?? null,
		fundTransferId: source.fundTransferId ?? null,
		bankTransactionId: source.bankTransactionId ?? null,
		fixedAssetId: source.fixedAssetId ?? null,
		payslipId: source.payslipId ?? null,
		customerId: source.customerId ?? null,
		vendorId: source.vendorId ?? null,
	};
}

/** Move the cached balance of every bank account linked to a posted account. */
async function syncLinkedBankBalances(
	tx: FolioTransactionAdapter,
	tenantId: string,
	lines: LedgerLine[],
): Promise<void> {
	const net = new Map<string, number>();
	for (const line of lines) {
		net.set(line.accountId, (net.get(line.accountId) ?? 0) + (line.debit ?? 0) - (line.credit ?? 0));
	}
	const banks = await tx.findMany<BankAccount>({
		model: "bank_account",
		where: [
			{ field: "tenantId", operator: "eq", value: tenantId },
			{ field: "chartAccountId", operator: "in", value: [...net.keys()] },
		],
	});
	for (const bank of banks) {
		const change = bank.chartAccountId ? (net.get(bank.chartAccountId) ?? 0) : 0;
		if (change === 0) continue;
		await tx.update<BankAccount>({
			model: "bank_account",
			where: [
				{ field: "tenantId", operator: "eq", value: tenantId },
				{ field: "id", operator: "eq", value: bank.id },
			],
			update: { currentBalance: bank.currentBalance + change, updatedAt: new Date().toISOString() },
		});
	}
}

/**
 * Validate and append one balanced set of entries. Must run inside the
 * posting transaction.
 */
export async function postEntries(
	tx: FolioTransactionAdapter,
	ctx: FolioContext,
	params: PostEntriesParams,
): Promise<Posting> {
	assertIsoDate(params.transactionDate, "transactionDate");
	const totals = validateLedgerLines(params.lines, ctx.options.advanced.maxAmount);
	await assertPostableAccounts(
		tx,
		params.tenantId,
		params.lines.map((l) => l.accountId),
	);

	const postingId = randomUUID();
	const firstSequence = await reserveSequence(tx, params.tenantId, "ledger", params.lines.length);
	const links = sourceLinks(params.source);
	const createdAt = new Date().toISOString();

	const entries: LedgerEntry[] = [];
	for (const [i, line] of params.lines.entries()) {
		const entry = await tx.create<LedgerEntry>({
			model: "ledger_entry",
			data: {
				id: randomUUID(),
				tenantId: params.tenantId,
				branchId: params.branchId,
				postingId,
				sequence: firstSequence + i,
				transactionDate: params.transactionDate,
				description: line.description ?? params.description,
				accountId: line.accountId,
				debit: line.debit ?? 0,
				credit: line.credit ?? 0,
				...links,
				createdBy: params.createdBy,
				createdAt,
			},
		});
		entries.push(entry);
	}

	await syncLinkedBankBalances(tx, params.tenantId, params.lines);

	return { postingId, transactionDate: params.transactionDate, entries, ...totals };
}

// =============================================================================
// READ
// =============================================================================

export interface EntryFilter {
	accountId?: string;
	accountIds?: string[];
	postingId?: string;
	/** Inclusive */
	startDate?: string;
	/** Inclusive */
	endDate?: string;
	/** Exclusive upper bound, for opening balances */
	before?: string;
	source?: EntrySource;
	limit?: number;
	offset?: number;
}

/** Ledger order: transaction date, then insertion sequence. */
export const LEDGER_ORDER: SortBy[] = [
	{ field: "transactionDate", direction: "asc" },
	{ field: "sequence", direction: "asc" },
];

function entryWhere(tenantId: string, filter: EntryFilter): Where[] {
	const where: Where[] = [{ field: "tenantId", operator: "eq", value: tenantId }];
	if (filter.accountId) where.push({ field: "accountId", operator: "eq", value: filter.accountId });
	if (filter.accountIds) where.push({ field: "accountId", operator: "in", value: filter.accountIds });
	if (filter.postingId) where.push({ field: "postingId", operator: "eq", value: filter.postingId });
	if (filter.startDate) where.push({ field: "transactionDate", operator: "gte", value: filter.startDate });
	if (filter.endDate) where.push({ field: "transactionDate", operator: "lte", value: filter.endDate });
	if (filter.before) where.push({ field: "transactionDate", operator: "lt", value: filter.before });
	for (const [field, value] of Object.entries(filter.source ?? {})) {
		if (value) where.push({ field, operator: "eq", value });
	}
	return where;
}

export async function listEntries(db: Reader, tenantId: string, filter: EntryFilter = {}): Promise<LedgerEntry[]> {
	return db.findMany<LedgerEntry>({
		model: "ledger_entry",
		where: entryWhere(tenantId, filter),
		sortBy: LEDGER_ORDER,
		limit: filter.limit,
		offset: filter.offset,
	});
}

export async function sumEntries(db: Reader, tenantId: string, filter: EntryFilter = {}): Promise<LineTotals> {
	const entries = await listEntries(db, tenantId, filter);
	let totalDebit = 0;
	let totalCredit = 0;
	for (const entry of entries) {
		totalDebit += entry.debit;
		totalCredit += entry.credit;
	}
	return { totalDebit, totalCredit };
}

/** Debit and credit totals per account id. */
export async function totalsByAccount(
	db: Reader,
	tenantId: string,
	filter: EntryFilter = {},
): Promise<Map<string, LineTotals>> {
	const totals = new Map<string, LineTotals>();
	for (const entry of await listEntries(db, tenantId, filter)) {
		const current = totals.get(entry.accountId) ?? { totalDebit: 0, totalCredit: 0 };
		current.totalDebit += entry.debit;
		current.totalCredit += entry.credit;
		totals.set(entry.accountId, current);
	}
	return totals;
}

/** Entries of one posting, in line order. */
export async function getPosting(db: Reader, tenantId: string, postingId: string): Promise<Posting | null> {
	const entries = await listEntries(db, tenantId, { postingId });
	const first = entries[0];
	if (!first) return null;
	let totalDebit = 0;
	let totalCredit = 0;
	for (const entry of entries) {
		totalDebit += entry.debit;
		totalCredit += entry.credit;
	}
	return { postingId, transactionDate: first.transactionDate, entries, totalDebit, totalCredit };
}
