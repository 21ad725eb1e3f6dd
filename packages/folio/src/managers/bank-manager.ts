// =============================================================================
// BANKING — bank accounts, deposits, withdrawals, fund transfers
// =============================================================================
// `currentBalance` is a cache kept beside the ledger. For a bank account
// linked to a chart account it must always equal that account's raw ledger
// balance: postEntries() moves it for every posting that touches the chart
// account, and checkLedgerConsistency() verifies it. Unlinked accounts are
// moved here directly.
//
// Deposit:   DR bank chart account, CR counter account
// Withdraw:  DR counter account, CR bank chart account
// Transfer:  DR destination chart account, CR source chart account

import { randomUUID } from "node:crypto";
import type {
	Account,
	BankAccount,
	BankTransaction,
	BankTransactionKind,
	FolioContext,
	FolioTransactionAdapter,
	FundTransfer,
	LedgerConsistency,
	ReconciliationResult,
	Where,
} from "@folio/core";
import {
	assertAmount,
	assertIsoDate,
	assertText,
	ConfigurationError,
	ConflictError,
	FolioError,
	NotFoundError,
	ValidationError,
} from "@folio/core";
import { isKnownCurrency } from "../config/index.js";
import { rawBalance } from "./entry-balance.js";
import { postEntries, sumEntries } from "./ledger-store.js";
import { nextDocumentNumber } from "./numbering.js";
import { logAfterCommit, runOperation } from "./operation.js";
import { byTenantAndId, getActor, getBranchId, getTenantId, nowIso } from "./scope.js";

export interface CreateBankAccountParams {
	name: string;
	bankName?: string;
	accountNumber?: string;
	/** Defaults to the instance currency */
	currency?: string;
	/** Asset account that mirrors this bank account in the ledger */
	chartAccountId?: string;
}

export interface BankMovementParams {
	amount: number;
	transactionDate: string;
	description?: string;
	/** Required when the bank account is linked to a chart account */
	counterAccountId?: string;
	idempotencyKey?: string;
}

export interface CreateTransferParams {
	fromAccountId: string;
	toAccountId: string;
	amount: number;
	transferDate: string;
	reference?: string;
	description?: string;
	idempotencyKey?: string;
}

async function lockBankAccount(
	tx: FolioTransactionAdapter,
	tenantId: string,
	bankAccountId: string,
): Promise<BankAccount> {
	const account = await tx.findOne<BankAccount>({
		model: "bank_account",
		where: byTenantAndId(tenantId, bankAccountId),
		forUpdate: true,
	});
	if (!account) throw new NotFoundError("Bank account", bankAccountId);
	return account;
}

// =============================================================================
// BANK ACCOUNTS
// =============================================================================

export async function createBankAccount(ctx: FolioContext, params: CreateBankAccountParams): Promise<BankAccount> {
	const tenantId = getTenantId(ctx);
	const name = assertText(params.name, "name");
	const currency = params.currency ?? ctx.options.currency;
	if (!isKnownCurrency(currency)) {
		throw new ValidationError(`Unknown currency "${currency}"`, { details: { field: "currency" } });
	}

	return ctx.adapter.transaction(async (tx) => {
		let openingBalance = 0;
		if (params.chartAccountId) {
			const chart = await tx.findOne<Account>({
				model: "account",
				where: byTenantAndId(tenantId, params.chartAccountId),
			});
			if (!chart) throw new NotFoundError("Account", params.chartAccountId);
			if (chart.type !== "asset") {
				throw new ValidationError(`Bank accounts must link to an asset account, ${chart.code} is ${chart.type}`, {
					reason: "INVALID_CHART_ACCOUNT",
					details: { chartAccountId: chart.id },
				});
			}
			const linked = await tx.findOne<BankAccount>({
				model: "bank_account",
				where: [
					{ field: "tenantId", operator: "eq", value: tenantId },
					{ field: "chartAccountId", operator: "eq", value: chart.id },
				],
			});
			if (linked) {
				throw new ConflictError(`Account ${chart.code} is already linked to bank account ${linked.name}`, {
					details: { chartAccountId: chart.id, bankAccountId: linked.id, reason: "CHART_ACCOUNT_IN_USE" },
				});
			}
			// Linking to an account that already carries entries starts the cache at its balance.
			const totals = await sumEntries(tx, tenantId, { accountId: chart.id });
			openingBalance = rawBalance(totals.totalDebit, totals.totalCredit);
		}

		const now = nowIso();
		return tx.create<BankAccount>({
			model: "bank_account",
			data: {
				id: randomUUID(),
				tenantId,
				branchId: getBranchId(ctx),
				name,
				bankName: params.bankName ?? null,
				accountNumber: params.accountNumber ?? null,
				currency,
				currentBalance: openingBalance,
				chartAccountId: params.chartAccountId ?? null,
				isActive: true,
				lastReconciledAt: null,
				lastStatementBalance: null,
				createdAt: now,
				updatedAt: now,
			},
		});
	});
}

export async function getBankAccount(ctx: FolioContext, bankAccountId: string): Promise<BankAccount> {
	const account = await ctx.adapter.findOne<BankAccount>({
		model: "bank_account",
		where: byTenantAndId(getTenantId(ctx), bankAccountId),
	});
	if (!account) throw new NotFoundError("Bank account", bankAccountId);
	return account;
}

export async function listBankAccounts(ctx: FolioContext, params: { isActive?: boolean } = {}): Promise<BankAccount[]> {
	const where: Where[] = [{ field: "tenantId", operator: "eq", value: getTenantId(ctx) }];
	if (params.isActive !== undefined) where.push({ field: "isActive", operator: "eq", value: params.isActive });
	return ctx.adapter.findMany<BankAccount>({ model: "bank_account", where, sortBy: { field: "name", direction: "asc" } });
}

/**
 * Delete a bank account that no transfer or bank transaction references.
 */
export async function deleteBankAccount(ctx: FolioContext, bankAccountId: string): Promise<void> {
	const tenantId = getTenantId(ctx);
	await ctx.adapter.transaction(async (tx) => {
		await lockBankAccount(tx, tenantId, bankAccountId);

		const tenant: Where = { field: "tenantId", operator: "eq", value: tenantId };
		const outgoing = await tx.count({
			model: "fund_transfer",
			where: [tenant, { field: "fromAccountId", operator: "eq", value: bankAccountId }],
		});
		const incoming = await tx.count({
			model: "fund_transfer",
			where: [tenant, { field: "toAccountId", operator: "eq", value: bankAccountId }],
		});
		if (outgoing + incoming > 0) {
			throw new ConflictError("Bank account is referenced by fund transfers", {
				details: { bankAccountId, transfers: outgoing + incoming, reason: "HAS_TRANSFERS" },
			});
		}

		const movements = await tx.count({
			model: "bank_transaction",
			where: [tenant, { field: "bankAccountId", operator: "eq", value: bankAccountId }],
		});
		if (movements > 0) {
			throw new ConflictError("Bank account has recorded transactions", {
				details: { bankAccountId, transactions: movements, reason: "HAS_TRANSACTIONS" },
			});
		}

		await tx.delete({ model: "bank_account", where: byTenantAndId(tenantId, bankAccountId) });
	});
	ctx.logger.info("Bank account deleted", { tenantId, bankAccountId });
}

// =============================================================================
// DEPOSITS & WITHDRAWALS
// =============================================================================

/**
 * The counter side of a deposit or withdrawal may be neither the bank's own
 * ledger account nor one backing another bank account; money between banks
 * moves through createTransfer().
 */
async function assertCounterAccount(
	tx: FolioTransactionAdapter,
	tenantId: string,
	bank: BankAccount,
	counterAccountId: string,
): Promise<void> {
	if (counterAccountId === bank.chartAccountId) {
		throw new ValidationError(`counterAccountId cannot be the ledger account of ${bank.name}`, {
			reason: "INVALID_COUNTER_ACCOUNT",
			details: { bankAccountId: bank.id, counterAccountId },
		});
	}
	const otherBank = await tx.findOne<BankAccount>({
		model: "bank_account",
		where: [
			{ field: "tenantId", operator: "eq", value: tenantId },
			{ field: "chartAccountId", operator: "eq", value: counterAccountId },
		],
	});
	if (otherBank) {
		throw new ValidationError(`Account backs bank account ${otherBank.name}; use a fund transfer instead`, {
			reason: "INVALID_COUNTER_ACCOUNT",
			details: { bankAccountId: bank.id, counterAccountId, counterBankAccountId: otherBank.id },
		});
	}
}

async function recordMovement(
	ctx: FolioContext,
	kind: BankTransactionKind,
	bankAccountId: string,
	params: BankMovementParams,
): Promise<BankTransaction> {
	const tenantId = getTenantId(ctx);
	const actor = getActor(ctx);
	const amount = assertAmount(params.amount, "amount", { max: ctx.options.advanced.maxAmount });
	assertIsoDate(params.transactionDate, "transactionDate");

	const { idempotencyKey, ...request } = params;

	return runOperation(
		ctx,
		{ type: kind === "deposit" ? "bank.deposit" : "bank.withdraw", params: { bankAccountId, ...request } },
		async (tx) => {
			const bank = await lockBankAccount(tx, tenantId, bankAccountId);
			if (!bank.isActive) {
				throw new ValidationError(`Bank account ${bank.name} is inactive`, {
					reason: "ACCOUNT_INACTIVE",
					details: { bankAccountId },
				});
			}
			if (kind === "withdrawal" && bank.currentBalance < amount) {
				throw FolioError.insufficientFunds(
					`Insufficient funds in ${bank.name}: balance ${bank.currentBalance}, requested ${amount}`,
					{ bankAccountId, available: bank.currentBalance, requested: amount },
				);
			}
			if (bank.chartAccountId && !params.counterAccountId) {
				throw new ValidationError("counterAccountId is required for a bank account linked to the ledger", {
					reason: "COUNTER_ACCOUNT_REQUIRED",
					details: { bankAccountId },
				});
			}
			if (bank.chartAccountId && params.counterAccountId) {
				await assertCounterAccount(tx, tenantId, bank, params.counterAccountId);
			}

			const transactionId = randomUUID();
			let postingId: string | null = null;
			if (bank.chartAccountId && params.counterAccountId) {
				const bankSide = { accountId: bank.chartAccountId };
				const counterSide = { accountId: params.counterAccountId };
				const posting = await postEntries(tx, ctx, {
					tenantId,
					branchId: bank.branchId,
					transactionDate: params.transactionDate,
					description: params.description ?? `Bank ${kind} ${bank.name}`,
					lines:
						kind === "deposit"
							? [
									{ ...bankSide, debit: amount },
									{ ...counterSide, credit: amount },
								]
							: [
									{ ...counterSide, debit: amount },
									{ ...bankSide, credit: amount },
								],
					source: { bankTransactionId: transactionId },
					createdBy: actor,
				});
				postingId = posting.postingId;
			}

			const balanceAfter = kind === "deposit" ? bank.currentBalance + amount : bank.currentBalance - amount;
			if (!postingId) {
				await tx.update<BankAccount>({
					model: "bank_account",
					where: byTenantAndId(tenantId, bank.id),
					update: { currentBalance: balanceAfter, updatedAt: nowIso() },
				});
			}

			const movement = await tx.create<BankTransaction>({
				model: "bank_transaction",
				data: {
					id: transactionId,
					tenantId,
					bankAccountId: bank.id,
					kind,
					amount,
					transactionDate: params.transactionDate,
					description: params.description ?? null,
					counterAccountId: params.counterAccountId ?? null,
					postingId,
					balanceAfter,
					createdBy: actor,
					createdAt: nowIso(),
				},
			});

			logAfterCommit(ctx, kind === "deposit" ? "Bank deposit posted" : "Bank withdrawal posted", {
				tenantId,
				bankAccountId: bank.id,
				amount,
				balanceAfter,
			});
			return movement;
		},
		{
			key: idempotencyKey,
			request: { bankAccountId, kind, ...request },
			resultId: (movement) => movement.id,
			load: async (tx, id) => {
				const movement = await tx.findOne<BankTransaction>({
					model: "bank_transaction",
					where: byTenantAndId(tenantId, id),
				});
				if (!movement) throw new NotFoundError("Bank transaction", id);
				return movement;
			},
		},
	);
}

export async function deposit(
	ctx: FolioContext,
	bankAccountId: string,
	params: BankMovementParams,
): Promise<BankTransaction> {
	return recordMovement(ctx, "deposit", bankAccountId, params);
}

export async function withdraw(
	ctx: FolioContext,
	bankAccountId: string,
	params: BankMovementParams,
): Promise<BankTransaction> {
	return recordMovement(ctx, "withdrawal", bankAccountId, params);
}

export async function listBankTransactions(ctx: FolioContext, bankAccountId: string): Promise<BankTransaction[]> {
	return ctx.adapter.findMany<BankTransaction>({
		model: "bank_transaction",
		where: [
			{ field: "tenantId", operator: "eq", value: getTenantId(ctx) },
			{ field: "bankAccountId", operator: "eq", value: bankAccountId },
		],
		sortBy: [
			{ field: "transactionDate", direction: "asc" },
			{ field: "createdAt", direction: "asc" },
		],
	});
}

// =============================================================================
// FUND TRANSFERS
// =============================================================================

/**
 * Move money between two bank accounts of the same currency. Ledger legs are
 * posted when both accounts are linked; a transfer between a linked and an
 * unlinked account is a configuration error.
 */
export async function createTransfer(ctx: FolioContext, params: CreateTransferParams): Promise<FundTransfer> {
	const tenantId = getTenantId(ctx);
	const actor = getActor(ctx);

	if (params.fromAccountId === params.toAccountId) {
		throw new ValidationError("Cannot transfer to the same account", {
			reason: "SAME_ACCOUNT_TRANSFER",
			details: { accountId: params.fromAccountId },
		});
	}
	const amount = assertAmount(params.amount, "amount", { max: ctx.options.advanced.maxAmount });
	assertIsoDate(params.transferDate, "transferDate");

	const { idempotencyKey, ...request } = params;

	return runOperation(
		ctx,
		{ type: "transfer.create", params: { ...request } },
		async (tx) => {
			// Lock in id order so opposite transfers cannot deadlock.
			const [firstId, secondId] = [params.fromAccountId, params.toAccountId].sort();
			const locked = new Map<string, BankAccount>();
			for (const id of [firstId, secondId]) {
				if (id === undefined) continue;
				locked.set(id, await lockBankAccount(tx, tenantId, id));
			}
			const from = locked.get(params.fromAccountId);
			const to = locked.get(params.toAccountId);
			if (!from) throw new NotFoundError("Bank account", params.fromAccountId);
			if (!to) throw new NotFoundError("Bank account", params.toAccountId);

			if (from.currency !== to.currency) {
				throw new ValidationError(`Currency mismatch: ${from.currency} to ${to.currency}`, {
					reason: "CURRENCY_MISMATCH",
					details: { fromCurrency: from.currency, toCurrency: to.currency },
				});
			}
			if (from.currentBalance < amount) {
				throw FolioError.insufficientFunds(
					`Insufficient funds in ${from.name}: balance ${from.currentBalance}, requested ${amount}`,
					{ bankAccountId: from.id, available: from.currentBalance, requested: amount },
				);
			}
			if (Boolean(from.chartAccountId) !== Boolean(to.chartAccountId)) {
				throw new ConfigurationError(
					"Both bank accounts must be linked to chart accounts, or neither, to transfer between them",
					{ details: { fromAccountId: from.id, toAccountId: to.id } },
				);
			}

			const transferId = randomUUID();
			const transferNumber = await nextDocumentNumber(tx, tenantId, "FT");

			let postingId: string | null = null;
			if (from.chartAccountId && to.chartAccountId) {
				const posting = await postEntries(tx, ctx, {
					tenantId,
					branchId: getBranchId(ctx) ?? from.branchId,
					transactionDate: params.transferDate,
					description: params.description ?? `Fund transfer ${transferNumber}`,
					lines: [
						{ accountId: to.chartAccountId, debit: amount },
						{ accountId: from.chartAccountId, credit: amount },
					],
					source: { fundTransferId: transferId },
					createdBy: actor,
				});
				postingId = posting.postingId;
			}

			const now = nowIso();
			if (!postingId) {
				await tx.update<BankAccount>({
					model: "bank_account",
					where: byTenantAndId(tenantId, from.id),
					update: { currentBalance: from.currentBalance - amount, updatedAt: now },
				});
				await tx.update<BankAccount>({
					model: "bank_account",
					where: byTenantAndId(tenantId, to.id),
					update: { currentBalance: to.currentBalance + amount, updatedAt: now },
				});
			}

			const transfer = await tx.create<FundTransfer>({
				model: "fund_transfer",
				data: {
					id: transferId,
					tenantId,
					branchId: getBranchId(ctx) ?? from.branchId,
					transferNumber,
					fromAccountId: from.id,
					toAccountId: to.id,
					amount,
					transferDate: params.transferDate,
					reference: params.reference ?? null,
					description: params.description ?? null,
					postingId,
					createdBy: actor,
					createdAt: now,
				},
			});

			logAfterCommit(ctx, "Fund transfer posted", { tenantId, transferNumber, amount });
			return transfer;
		},
		{
			key: idempotencyKey,
			request: { ...request },
			resultId: (transfer) => transfer.id,
			load: (tx, id) => loadTransfer(tx, tenantId, id),
		},
	);
}

async function loadTransfer(
	db: Pick<FolioTransactionAdapter, "findOne">,
	tenantId: string,
	transferId: string,
): Promise<FundTransfer> {
	const transfer = await db.findOne<FundTransfer>({ model: "fund_transfer", where: byTenantAndId(tenantId, transferId) });
	if (!transfer) throw new NotFoundError("Fund transfer", transferId);
	return transfer;
}

export async function getTransfer(ctx: FolioContext, transferId: string): Promise<FundTransfer> {
	return loadTransfer(ctx.adapter, getTenantId(ctx), transferId);
}

export async function listTransfers(ctx: FolioContext, params: { bankAccountId?: string } = {}): Promise<FundTransfer[]> {
	const tenantId = getTenantId(ctx);
	const transfers = await ctx.adapter.findMany<FundTransfer>({
		model: "fund_transfer",
		where: [{ field: "tenantId", operator: "eq", value: tenantId }],
		sortBy: { field: "transferNumber", direction: "asc" },
	});
	const { bankAccountId } = params;
	if (!bankAccountId) return transfers;
	return transfers.filter((t) => t.fromAccountId === bankAccountId || t.toAccountId === bankAccountId);
}

// =============================================================================
// RECONCILIATION
// =============================================================================

/**
 * Compare the book balance with a bank statement and record the statement.
 */
export async function reconcile(
	ctx: FolioContext,
	bankAccountId: string,
	params: { statementBalance: number; statementDate: string },
): Promise<ReconciliationResult> {
	const tenantId = getTenantId(ctx);
	if (!Number.isSafeInteger(params.statementBalance)) {
		throw new ValidationError("statementBalance must be an integer amount in minor units", {
			details: { field: "statementBalance" },
		});
	}
	assertIsoDate(params.statementDate, "statementDate");

	const result = await ctx.adapter.transaction(async (tx) => {
		const bank = await lockBankAccount(tx, tenantId, bankAccountId);
		await tx.update<BankAccount>({
			model: "bank_account",
			where: byTenantAndId(tenantId, bank.id),
			update: {
				lastReconciledAt: params.statementDate,
				lastStatementBalance: params.statementBalance,
				updatedAt: nowIso(),
			},
		});
		const difference = params.statementBalance - bank.currentBalance;
		return {
			bankAccountId: bank.id,
			statementDate: params.statementDate,
			bookBalance: bank.currentBalance,
			statementBalance: params.statementBalance,
			difference,
			reconciled: difference === 0,
		};
	});

	ctx.logger.info("Bank account reconciled", { tenantId, ...result });
	return result;
}

/**
 * The cache-consistency invariant: a linked bank account's currentBalance
 * equals the raw ledger balance of its chart account.
 */
export async function checkLedgerConsistency(ctx: FolioContext, bankAccountId: string): Promise<LedgerConsistency> {
	const bank = await getBankAccount(ctx, bankAccountId);
	if (!bank.chartAccountId) {
		throw new ValidationError(`Bank account ${bank.name} is not linked to a chart account`, {
			reason: "BANK_ACCOUNT_NOT_LINKED",
			details: { bankAccountId },
		});
	}
	const totals = await sumEntries(ctx.adapter, bank.tenantId, { accountId: bank.chartAccountId });
	const ledgerBalance = rawBalance(totals.totalDebit, totals.totalCredit);
	return {
		bankAccountId: bank.id,
		chartAccountId: bank.chartAccountId,
		currentBalance: bank.currentBalance,
		ledgerBalance,
		consistent: ledgerBalance === bank.currentBalance,
	};
}
