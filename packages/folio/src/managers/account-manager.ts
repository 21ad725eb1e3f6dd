// =============================================================================
// ACCOUNT MANAGER — chart-of-accounts lifecycle and balances
// =============================================================================
// Accounts are unique by code per tenant. System accounts (seeded by tenant
// setup) cannot be deleted or deactivated. An account that carries entries
// is deactivated instead of removed.

import { randomUUID } from "node:crypto";
import type { Account, AccountType, AccountWithBalance, FolioContext, FolioTransactionAdapter, Where } from "@folio/core";
import { ACCOUNT_TYPES, assertText, ConflictError, NotFoundError, ValidationError } from "@folio/core";
import { collectDescendantIds } from "./chart-of-accounts.js";
import { rawBalance, signedBalance } from "./entry-balance.js";
import { sumEntries } from "./ledger-store.js";
import { logAfterCommit, runOperation } from "./operation.js";
import { byTenantAndId, getTenantId, nowIso } from "./scope.js";

export interface CreateAccountParams {
	code: string;
	name: string;
	type: AccountType;
	parentId?: string;
	description?: string;
}

export interface UpdateAccountParams {
	code?: string;
	name?: string;
	parentId?: string | null;
	description?: string | null;
	isActive?: boolean;
}

function assertAccountType(type: string): AccountType {
	const match = ACCOUNT_TYPES.find((t) => t === type);
	if (!match) {
		throw new ValidationError(`Invalid account type "${type}". Must be one of: ${ACCOUNT_TYPES.join(", ")}`, {
			details: { field: "type" },
		});
	}
	return match;
}

async function assertCodeAvailable(
	tx: FolioTransactionAdapter,
	tenantId: string,
	code: string,
	exceptId?: string,
): Promise<void> {
	const where: Where[] = [
		{ field: "tenantId", operator: "eq", value: tenantId },
		{ field: "code", operator: "eq", value: code },
	];
	if (exceptId) where.push({ field: "id", operator: "ne", value: exceptId });
	const clash = await tx.findOne<Account>({ model: "account", where });
	if (clash) {
		throw new ConflictError(`Account code "${code}" already exists`, { details: { code, reason: "DUPLICATE_CODE" } });
	}
}

// =============================================================================
// CREATE
// =============================================================================

export async function createAccount(ctx: FolioContext, params: CreateAccountParams): Promise<Account> {
	const tenantId = getTenantId(ctx);
	const code = assertText(params.code, "code");
	const name = assertText(params.name, "name");
	const type = assertAccountType(params.type);

	return runOperation(ctx, { type: "account.create", params: { ...params } }, async (tx) => {
		await assertCodeAvailable(tx, tenantId, code);

		if (params.parentId) {
			const parent = await tx.findOne<Account>({ model: "account", where: byTenantAndId(tenantId, params.parentId) });
			if (!parent) throw new NotFoundError("Parent account", params.parentId);
		}

		const now = nowIso();
		const account = await tx.create<Account>({
			model: "account",
			data: {
				id: randomUUID(),
				tenantId,
				code,
				name,
				type,
				parentId: params.parentId ?? null,
				description: params.description ?? null,
				isActive: true,
				isSystem: false,
				createdAt: now,
				updatedAt: now,
			},
		});

		logAfterCommit(ctx, "Account created", { tenantId, accountId: account.id, code, type });
		return account;
	});
}

// =============================================================================
// READ
// =============================================================================

export async function getAccount(ctx: FolioContext, accountId: string): Promise<Account> {
	const tenantId = getTenantId(ctx);
	const account = await ctx.adapter.findOne<Account>({ model: "account", where: byTenantAndId(tenantId, accountId) });
	if (!account) throw new NotFoundError("Account", accountId);
	return account;
}

export async function getAccountByCode(ctx: FolioContext, code: string): Promise<Account> {
	const tenantId = getTenantId(ctx);
	const account = await ctx.adapter.findOne<Account>({
		model: "account",
		where: [
			{ field: "tenantId", operator: "eq", value: tenantId },
			{ field: "code", operator: "eq", value: code },
		],
	});
	if (!account) throw new NotFoundError("Account", code);
	return account;
}

export async function listAccounts(
	ctx: FolioContext,
	params: { type?: AccountType; isActive?: boolean } = {},
): Promise<Account[]> {
	const tenantId = getTenantId(ctx);
	const where: Where[] = [{ field: "tenantId", operator: "eq", value: tenantId }];
	if (params.type) where.push({ field: "type", operator: "eq", value: params.type });
	if (params.isActive !== undefined) where.push({ field: "isActive", operator: "eq", value: params.isActive });
	return ctx.adapter.findMany<Account>({ model: "account", where, sortBy: { field: "code", direction: "asc" } });
}

// =============================================================================
// BALANCES
// =============================================================================

/** sum(debit) - sum(credit) over all entries of the account. */
export async function getRawBalance(ctx: FolioContext, accountId: string, asOf?: string): Promise<number> {
	const account = await getAccount(ctx, accountId);
	const totals = await sumEntries(ctx.adapter, account.tenantId, { accountId: account.id, endDate: asOf });
	return rawBalance(totals.totalDebit, totals.totalCredit);
}

/** Balance signed by the account type's normal side. */
export async function getBalance(ctx: FolioContext, accountId: string, asOf?: string): Promise<number> {
	return (await getAccountWithBalance(ctx, accountId, asOf)).balance;
}

export async function getAccountWithBalance(
	ctx: FolioContext,
	accountId: string,
	asOf?: string,
): Promise<AccountWithBalance> {
	const account = await getAccount(ctx, accountId);
	const totals = await sumEntries(ctx.adapter, account.tenantId, { accountId: account.id, endDate: asOf });
	return { account, balance: signedBalance(account.type, totals.totalDebit, totals.totalCredit) };
}

// =============================================================================
// UPDATE
// =============================================================================

export async function updateAccount(
	ctx: FolioContext,
	accountId: string,
	params: UpdateAccountParams,
): Promise<Account> {
	const tenantId = getTenantId(ctx);

	return runOperation(ctx, { type: "account.update", params: { accountId, ...params } }, async (tx) => {
		const account = await tx.findOne<Account>({
			model: "account",
			where: byTenantAndId(tenantId, accountId),
			forUpdate: true,
		});
		if (!account) throw new NotFoundError("Account", accountId);

		const update: Record<string, unknown> = { updatedAt: nowIso() };

		if (params.name !== undefined) update.name = assertText(params.name, "name");
		if (params.description !== undefined) update.description = params.description;

		if (params.code !== undefined) {
			const code = assertText(params.code, "code");
			if (code !== account.code) await assertCodeAvailable(tx, tenantId, code, account.id);
			update.code = code;
		}

		if (params.isActive === false && account.isSystem) {
			throw new ValidationError(`System account ${account.code} cannot be deactivated`, {
				reason: "SYSTEM_ACCOUNT",
				details: { accountId },
			});
		}
		if (params.isActive !== undefined) update.isActive = params.isActive;

		if (params.parentId !== undefined) {
			if (params.parentId !== null) {
				if (params.parentId === account.id) {
					throw new ValidationError("An account cannot be its own parent", { reason: "INVALID_PARENT" });
				}
				const parent = await tx.findOne<Account>({
					model: "account",
					where: byTenantAndId(tenantId, params.parentId),
				});
				if (!parent) throw new NotFoundError("Parent account", params.parentId);

				const all = await tx.findMany<Account>({
					model: "account",
					where: [{ field: "tenantId", operator: "eq", value: tenantId }],
				});
				if (collectDescendantIds(all, account.id).has(parent.id)) {
					throw new ValidationError("A descendant cannot become the parent (cycle)", {
						reason: "INVALID_PARENT",
						details: { accountId, parentId: parent.id },
					});
				}
			}
			update.parentId = params.parentId;
		}

		const updated = await tx.update<Account>({ model: "account", where: byTenantAndId(tenantId, accountId), update });
		if (!updated) throw new NotFoundError("Account", accountId);
		return updated;
	});
}

// =============================================================================
// DELETE
// =============================================================================

export interface DeleteAccountResult {
	deleted: boolean;
	deactivated: boolean;
}

/**
 * Remove an account, or deactivate it when it already carries entries.
 */
export async function deleteAccount(ctx: FolioContext, accountId: string): Promise<DeleteAccountResult> {
	const tenantId = getTenantId(ctx);

	return runOperation(ctx, { type: "account.delete", params: { accountId } }, async (tx) => {
		const account = await tx.findOne<Account>({
			model: "account",
			where: byTenantAndId(tenantId, accountId),
			forUpdate: true,
		});
		if (!account) throw new NotFoundError("Account", accountId);
		if (account.isSystem) {
			throw new ValidationError(`System account ${account.code} cannot be deleted`, {
				reason: "SYSTEM_ACCOUNT",
				details: { accountId },
			});
		}

		const entryCount = await tx.count({
			model: "ledger_entry",
			where: [
				{ field: "tenantId", operator: "eq", value: tenantId },
				{ field: "accountId", operator: "eq", value: accountId },
			],
		});
		if (entryCount > 0) {
			await tx.update<Account>({
				model: "account",
				where: byTenantAndId(tenantId, accountId),
				update: { isActive: false, updatedAt: nowIso() },
			});
			logAfterCommit(ctx, "Account deactivated", { tenantId, accountId, entryCount });
			return { deleted: false, deactivated: true };
		}

		const childCount = await tx.count({
			model: "account",
			where: [
				{ field: "tenantId", operator: "eq", value: tenantId },
				{ field: "parentId", operator: "eq", value: accountId },
			],
		});
		if (childCount > 0) {
			throw new ConflictError(`Account ${account.code} has child accounts`, {
				details: { accountId, childCount, reason: "HAS_CHILDREN" },
			});
		}

		await tx.delete({ model: "account", where: byTenantAndId(tenantId, accountId) });
		logAfterCommit(ctx, "Account deleted", { tenantId, accountId });
		return { deleted: true, deactivated: false };
	});
}
