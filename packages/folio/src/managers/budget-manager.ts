// =============================================================================
// BUDGETS
// =============================================================================

import { randomUUID } from "node:crypto";
import type { Budget, BudgetItem, FolioContext, FolioTransactionAdapter, Where } from "@folio/core";
import { assertAmount, assertText, NotFoundError, ValidationError } from "@folio/core";
import { assertPostableAccounts } from "./ledger-store.js";
import { byTenantAndId, getActor, getTenantId, nowIso } from "./scope.js";

type BudgetRow = Omit<Budget, "items">;

export interface BudgetItemInput {
	accountId: string;
	amount: number;
	/** 1-12; omit for the whole fiscal year */
	month?: number;
}

function assertFiscalYear(year: number): number {
	if (!Number.isInteger(year) || year < 1900 || year > 9999) {
		throw new ValidationError(`fiscalYear must be a four-digit year, got ${year}`, {
			details: { field: "fiscalYear" },
		});
	}
	return year;
}

function assertMonth(month: number | undefined, field: string): number | null {
	if (month === undefined) return null;
	if (!Number.isInteger(month) || month < 1 || month > 12) {
		throw new ValidationError(`${field} must be between 1 and 12, got ${month}`, { details: { field } });
	}
	return month;
}

async function loadBudget(
	db: Pick<FolioTransactionAdapter, "findOne" | "findMany">,
	tenantId: string,
	budgetId: string,
): Promise<Budget> {
	const row = await db.findOne<BudgetRow>({ model: "budget", where: byTenantAndId(tenantId, budgetId) });
	if (!row) throw new NotFoundError("Budget", budgetId);
	const items = await db.findMany<BudgetItem>({
		model: "budget_item",
		where: [
			{ field: "tenantId", operator: "eq", value: tenantId },
			{ field: "budgetId", operator: "eq", value: budgetId },
		],
	});
	return { ...row, items };
}

async function insertItems(
	tx: FolioTransactionAdapter,
	ctx: FolioContext,
	tenantId: string,
	budgetId: string,
	items: BudgetItemInput[],
): Promise<BudgetItem[]> {
	const validated = items.map((item, i) => ({
		accountId: item.accountId,
		amount: assertAmount(item.amount, `items[${i}].amount`, { allowZero: true, max: ctx.options.advanced.maxAmount }),
		month: assertMonth(item.month, `items[${i}].month`),
	}));
	if (validated.length > 0) {
		await assertPostableAccounts(
			tx,
			tenantId,
			validated.map((item) => item.accountId),
		);
	}

	const created: BudgetItem[] = [];
	for (const item of validated) {
		created.push(
			await tx.create<BudgetItem>({
				model: "budget_item",
				data: { id: randomUUID(), tenantId, budgetId, ...item },
			}),
		);
	}
	return created;
}

export async function createBudget(
	ctx: FolioContext,
	params: { name?: string; fiscalYear: number; items?: BudgetItemInput[] },
): Promise<Budget> {
	const tenantId = getTenantId(ctx);
	const fiscalYear = assertFiscalYear(params.fiscalYear);
	const name = params.name === undefined ? `Budget ${fiscalYear}` : assertText(params.name, "name");

	const budget = await ctx.adapter.transaction(async (tx) => {
		const row = await tx.create<BudgetRow>({
			model: "budget",
			data: {
				id: randomUUID(),
				tenantId,
				name,
				fiscalYear,
				createdBy: getActor(ctx),
				createdAt: nowIso(),
			},
		});
		const items = await insertItems(tx, ctx, tenantId, row.id, params.items ?? []);
		return { ...row, items };
	});

	ctx.logger.info("Budget created", { tenantId, budgetId: budget.id, fiscalYear, items: budget.items.length });
	return budget;
}

export async function addBudgetItem(ctx: FolioContext, budgetId: string, item: BudgetItemInput): Promise<BudgetItem> {
	const tenantId = getTenantId(ctx);
	return ctx.adapter.transaction(async (tx) => {
		const budget = await tx.findOne<BudgetRow>({ model: "budget", where: byTenantAndId(tenantId, budgetId) });
		if (!budget) throw new NotFoundError("Budget", budgetId);
		const [created] = await insertItems(tx, ctx, tenantId, budget.id, [item]);
		if (!created) throw new NotFoundError("Budget item");
		return created;
	});
}

export async function getBudget(ctx: FolioContext, budgetId: string): Promise<Budget> {
	return loadBudget(ctx.adapter, getTenantId(ctx), budgetId);
}

export async function listBudgets(ctx: FolioContext, params: { fiscalYear?: number } = {}): Promise<Budget[]> {
	const tenantId = getTenantId(ctx);
	const where: Where[] = [{ field: "tenantId", operator: "eq", value: tenantId }];
	if (params.fiscalYear !== undefined) where.push({ field: "fiscalYear", operator: "eq", value: params.fiscalYear });
	const rows = await ctx.adapter.findMany<BudgetRow>({
		model: "budget",
		where,
		sortBy: [
			{ field: "fiscalYear", direction: "desc" },
			{ field: "name", direction: "asc" },
		],
	});
	return Promise.all(rows.map((row) => loadBudget(ctx.adapter, tenantId, row.id)));
}

export async function deleteBudget(ctx: FolioContext, budgetId: string): Promise<void> {
	const tenantId = getTenantId(ctx);
	await ctx.adapter.transaction(async (tx) => {
		const budget = await tx.findOne<BudgetRow>({ model: "budget", where: byTenantAndId(tenantId, budgetId) });
		if (!budget) throw new NotFoundError("Budget", budgetId);
		await tx.delete({
			model: "budget_item",
			where: [
				{ field: "tenantId", operator: "eq", value: tenantId },
				{ field: "budgetId", operator: "eq", value: budgetId },
			],
		});
		await tx.delete({ model: "budget", where: byTenantAndId(tenantId, budgetId) });
	});
}
