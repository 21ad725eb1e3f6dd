// =============================================================================
// CHART OF ACCOUNTS
// =============================================================================
// The default chart seeded per tenant, hierarchy queries and tenant setup.

import { randomUUID } from "node:crypto";
import type {
	Account,
	AccountNode,
	ChartAccountDefinition,
	FolioContext,
	FolioTransactionAdapter,
	PostingRole,
} from "@folio/core";
import { NotFoundError, queueAfterTransactionHook } from "@folio/core";
import { writePostingAccount } from "./posting-accounts.js";
import { getTenantId, nowIso } from "./scope.js";

export const DEFAULT_CHART: ChartAccountDefinition[] = [
	{ code: "1000", name: "Assets", type: "asset" },
	{ code: "1100", name: "Cash", type: "asset", parentCode: "1000" },
	{ code: "1110", name: "Bank", type: "asset", parentCode: "1000" },
	{ code: "1200", name: "Accounts Receivable", type: "asset", parentCode: "1000", role: "accountsReceivable" },
	{ code: "1300", name: "Inventory", type: "asset", parentCode: "1000", role: "inventory" },
	{ code: "1500", name: "Fixed Assets", type: "asset", parentCode: "1000" },
	{
		code: "1510",
		name: "Accumulated Depreciation",
		type: "asset",
		parentCode: "1500",
		role: "accumulatedDepreciation",
	},
	{ code: "2000", name: "Liabilities", type: "liability" },
	{ code: "2100", name: "Accounts Payable", type: "liability", parentCode: "2000", role: "accountsPayable" },
	{ code: "2200", name: "VAT Payable", type: "liability", parentCode: "2000", role: "vatPayable" },
	{
		code: "2300",
		name: "Payroll Liabilities",
		type: "liability",
		parentCode: "2000",
		role: "payrollLiabilities",
	},
	{ code: "2400", name: "Salaries Payable", type: "liability", parentCode: "2000", role: "salariesPayable" },
	{ code: "3000", name: "Equity", type: "equity" },
	{ code: "3100", name: "Owner's Capital", type: "equity", parentCode: "3000" },
	{ code: "3200", name: "Retained Earnings", type: "equity", parentCode: "3000" },
	{ code: "4000", name: "Revenue", type: "revenue" },
	{ code: "4100", name: "Sales Revenue", type: "revenue", parentCode: "4000", role: "salesRevenue" },
	{ code: "4200", name: "Other Income", type: "revenue", parentCode: "4000" },
	{ code: "5000", name: "Expenses", type: "expense" },
	{ code: "5100", name: "Cost of Goods Sold", type: "expense", parentCode: "5000" },
	{ code: "5200", name: "Operating Expenses", type: "expense", parentCode: "5000", role: "badDebtExpense" },
	{
		code: "5300",
		name: "Depreciation Expense",
		type: "expense",
		parentCode: "5000",
		role: "depreciationExpense",
	},
	{ code: "5400", name: "Salary Expense", type: "expense", parentCode: "5000", role: "salaryExpense" },
];

export interface TenantSetupResult {
	accounts: Account[];
	postingAccounts: Partial<Record<PostingRole, string>>;
}

/**
 * Seed the configured chart for the scoped tenant and assign every posting
 * role it names. Accounts whose code already exists are reused, so running
 * setup twice is harmless.
 */
export async function setupTenant(ctx: FolioContext): Promise<TenantSetupResult> {
	const tenantId = getTenantId(ctx);
	const chart = ctx.options.defaultChart;

	const result = await ctx.adapter.transaction(async (tx) => {
		const existing = await tx.findMany<Account>({
			model: "account",
			where: [{ field: "tenantId", operator: "eq", value: tenantId }],
		});
		const byCode = new Map(existing.map((a) => [a.code, a]));

		const accounts: Account[] = [];
		for (const def of orderParentsFirst(chart)) {
			const found = byCode.get(def.code);
			if (found) {
				accounts.push(found);
				continue;
			}
			const parentId = def.parentCode ? (byCode.get(def.parentCode)?.id ?? null) : null;
			const created = await insertSystemAccount(tx, tenantId, def, parentId);
			byCode.set(created.code, created);
			accounts.push(created);
		}

		const postingAccounts: Partial<Record<PostingRole, string>> = {};
		for (const def of chart) {
			if (!def.role) continue;
			const account = byCode.get(def.code);
			if (!account) continue;
			await writePostingAccount(tx, tenantId, def.role, account.id);
			postingAccounts[def.role] = account.id;
		}

		return { accounts, postingAccounts };
	});

	ctx.postingAccounts.delete(tenantId);
	queueAfterTransactionHook(() => {
		ctx.logger.info("Tenant chart seeded", {
			tenantId,
			accounts: result.accounts.length,
			roles: Object.keys(result.postingAccounts).length,
		});
	});
	return result;
}

async function insertSystemAccount(
	tx: FolioTransactionAdapter,
	tenantId: string,
	def: ChartAccountDefinition,
	parentId: string | null,
): Promise<Account> {
	const now = nowIso();
	return tx.create<Account>({
		model: "account",
		data: {
			id: randomUUID(),
			tenantId,
			code: def.code,
			name: def.name,
			type: def.type,
			parentId,
			description: null,
			isActive: true,
			isSystem: true,
			createdAt: now,
			updatedAt: now,
		},
	});
}

function orderParentsFirst(chart: ChartAccountDefinition[]): ChartAccountDefinition[] {
	const ordered: ChartAccountDefinition[] = [];
	const placed = new Set<string>();
	let pending = [...chart];
	while (pending.length > 0) {
		const next = pending.filter((def) => !def.parentCode || placed.has(def.parentCode));
		// Parents outside the chart never resolve; place the rest as roots.
		const batch = next.length > 0 ? next : pending;
		for (const def of batch) {
			ordered.push(def);
			placed.add(def.code);
		}
		pending = pending.filter((def) => !placed.has(def.code));
	}
	return ordered;
}

// =============================================================================
// HIERARCHY
// =============================================================================

/**
 * Build a tree of the tenant's accounts, ordered by code at every level.
 * If rootAccountId is provided, returns the subtree rooted at that account.
 */
export async function getAccountHierarchy(ctx: FolioContext, rootAccountId?: string): Promise<AccountNode[]> {
	const tenantId = getTenantId(ctx);
	const accounts = await ctx.adapter.findMany<Account>({
		model: "account",
		where: [{ field: "tenantId", operator: "eq", value: tenantId }],
		sortBy: { field: "code", direction: "asc" },
	});

	const byId = new Map<string, AccountNode>();
	for (const account of accounts) {
		byId.set(account.id, { ...account, children: [] });
	}

	const roots: AccountNode[] = [];
	for (const node of byId.values()) {
		const parent = node.parentId ? byId.get(node.parentId) : undefined;
		if (parent) {
			parent.children.push(node);
		} else {
			roots.push(node);
		}
	}

	if (rootAccountId) {
		const root = byId.get(rootAccountId);
		if (!root) throw new NotFoundError("Account", rootAccountId);
		return [root];
	}

	return roots;
}

/** Ids of every account below `accountId` in the tree. */
export function collectDescendantIds(accounts: Pick<Account, "id" | "parentId">[], accountId: string): Set<string> {
	const children = new Map<string, string[]>();
	for (const account of accounts) {
		if (!account.parentId) continue;
		const list = children.get(account.parentId) ?? [];
		list.push(account.id);
		children.set(account.parentId, list);
	}

	const result = new Set<string>();
	const stack = [...(children.get(accountId) ?? [])];
	for (let id = stack.pop(); id !== undefined; id = stack.pop()) {
		if (result.has(id)) continue;
		result.add(id);
		stack.push(...(children.get(id) ?? []));
	}
	return result;
}
