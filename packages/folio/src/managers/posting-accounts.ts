// =============================================================================
// POSTING ACCOUNTS — role -> account resolution per tenant
// =============================================================================
// Postings never look accounts up by name. Each posting rule names the roles
// it needs; the assignments are loaded once per tenant into
// `ctx.postingAccounts` and reloaded only after `assign()`.

import type {
	Account,
	FolioAdapter,
	FolioContext,
	FolioTransactionAdapter,
	PostingAccountAssignment,
	PostingRole,
} from "@folio/core";
import { ConfigurationError, isPostingRole, NotFoundError, queueAfterTransactionHook, ValidationError } from "@folio/core";
import { byTenantAndId, getTenantId, nowIso } from "./scope.js";

type Reader = Pick<FolioAdapter, "findMany">;

async function loadAssignments(
	db: Reader,
	ctx: FolioContext,
	tenantId: string,
): Promise<Partial<Record<PostingRole, string>>> {
	const cached = ctx.postingAccounts.get(tenantId);
	if (cached) return cached;

	const rows = await db.findMany<PostingAccountAssignment>({
		model: "posting_account",
		where: [{ field: "tenantId", operator: "eq", value: tenantId }],
	});
	const map: Partial<Record<PostingRole, string>> = {};
	for (const row of rows) {
		if (isPostingRole(row.role)) map[row.role] = row.accountId;
	}
	ctx.postingAccounts.set(tenantId, map);
	return map;
}

function hasRoles<R extends PostingRole>(
	map: Partial<Record<R, string>>,
	roles: readonly R[],
): map is Record<R, string> {
	return roles.every((role) => map[role] !== undefined);
}

/**
 * Resolve the accounts for `roles`.
 *
 * @throws ConfigurationError listing every unassigned role in `details.missingRoles`
 */
export async function requirePostingAccounts<R extends PostingRole>(
	db: Reader,
	ctx: FolioContext,
	tenantId: string,
	roles: readonly R[],
): Promise<Record<R, string>> {
	const map = await loadAssignments(db, ctx, tenantId);
	const resolved: Partial<Record<R, string>> = {};
	for (const role of roles) {
		resolved[role] = map[role];
	}
	if (hasRoles(resolved, roles)) return resolved;

	const missingRoles = roles.filter((role) => resolved[role] === undefined);
	throw new ConfigurationError(`Posting accounts not configured for: ${missingRoles.join(", ")}`, {
		details: { tenantId, missingRoles },
	});
}

export async function writePostingAccount(
	tx: FolioTransactionAdapter,
	tenantId: string,
	role: PostingRole,
	accountId: string,
): Promise<PostingAccountAssignment> {
	const id = `${tenantId}:${role}`;
	const updatedAt = nowIso();
	const updated = await tx.update<PostingAccountAssignment>({
		model: "posting_account",
		where: [{ field: "id", operator: "eq", value: id }],
		update: { accountId, updatedAt },
	});
	if (updated) return updated;
	return tx.create<PostingAccountAssignment>({
		model: "posting_account",
		data: { id, tenantId, role, accountId, updatedAt },
	});
}

/** Point `role` at an active account of the scoped tenant. */
export async function assignPostingAccount(
	ctx: FolioContext,
	params: { role: PostingRole; accountId: string },
): Promise<PostingAccountAssignment> {
	const tenantId = getTenantId(ctx);
	if (!isPostingRole(params.role)) {
		throw new ValidationError(`Unknown posting role "${params.role}"`, { reason: "UNKNOWN_POSTING_ROLE" });
	}

	const assignment = await ctx.adapter.transaction(async (tx) => {
		const account = await tx.findOne<Account>({
			model: "account",
			where: byTenantAndId(tenantId, params.accountId),
		});
		if (!account) throw new NotFoundError("Account", params.accountId);
		if (!account.isActive) {
			throw new ValidationError(`Account ${account.code} is inactive`, {
				reason: "ACCOUNT_INACTIVE",
				details: { accountId: account.id },
			});
		}
		return writePostingAccount(tx, tenantId, params.role, account.id);
	});

	ctx.postingAccounts.delete(tenantId);
	queueAfterTransactionHook(() => {
		ctx.logger.info("Posting account assigned", { tenantId, role: params.role, accountId: params.accountId });
	});
	return assignment;
}

/** Current role -> account assignments of the scoped tenant. */
export async function getPostingAccounts(ctx: FolioContext): Promise<Partial<Record<PostingRole, string>>> {
	const tenantId = getTenantId(ctx);
	return { ...(await loadAssignments(ctx.adapter, ctx, tenantId)) };
}
