// =============================================================================
// REPORTS — aggregations over the ledger
// =============================================================================
// Every report is computed from ledger_entry; nothing here reads a cached
// balance except the dashboard's cash position, which sums bank accounts.

import type {
	Account,
	AccountRef,
	AgingBucket,
	AgingKind,
	AgingReport,
	AgingRow,
	BalanceSheet,
	BankAccount,
	BudgetVsActual,
	BudgetVsActualRow,
	DashboardSummary,
	FolioContext,
	GeneralLedger,
	GeneralLedgerRow,
	IncomeStatement,
	PurchaseBill,
	ReportLine,
	SalesInvoice,
	TrialBalance,
	TrialBalanceRow,
	Where,
} from "@folio/core";
import {
	assertIsoDate,
	daysBetween,
	ENTRY_SOURCE_FIELDS,
	NotFoundError,
	periodBounds,
	todayIso,
	ValidationError,
} from "@folio/core";
import { getBudget } from "./budget-manager.js";
import { outstandingAmount } from "./document-helpers.js";
import { rawBalance, signedBalance } from "./entry-balance.js";
import { type LineTotals, listEntries, totalsByAccount } from "./ledger-store.js";
import { getBranchId, getTenantId } from "./scope.js";

const ZERO: LineTotals = { totalDebit: 0, totalCredit: 0 };

function toRef(account: Account): AccountRef {
	return { accountId: account.id, code: account.code, name: account.name, type: account.type };
}

async function loadAccounts(ctx: FolioContext, tenantId: string, activeOnly: boolean): Promise<Account[]> {
	const where: Where[] = [{ field: "tenantId", operator: "eq", value: tenantId }];
	if (activeOnly) where.push({ field: "isActive", operator: "eq", value: true });
	return ctx.adapter.findMany<Account>({ model: "account", where, sortBy: { field: "code", direction: "asc" } });
}

// =============================================================================
// TRIAL BALANCE
// =============================================================================

export async function trialBalance(ctx: FolioContext, asOf?: string): Promise<TrialBalance> {
	const tenantId = getTenantId(ctx);
	if (asOf) assertIsoDate(asOf, "asOf");

	const accounts = await loadAccounts(ctx, tenantId, true);
	const totals = await totalsByAccount(ctx.adapter, tenantId, { endDate: asOf });

	const rows: TrialBalanceRow[] = [];
	let totalDebit = 0;
	let totalCredit = 0;
	for (const account of accounts) {
		const { totalDebit: debitTotal, totalCredit: creditTotal } = totals.get(account.id) ?? ZERO;
		if (debitTotal === 0 && creditTotal === 0) continue;
		rows.push({ ...toRef(account), debitTotal, creditTotal, balance: rawBalance(debitTotal, creditTotal) });
		totalDebit += debitTotal;
		totalCredit += creditTotal;
	}

	return { asOf: asOf ?? null, rows, totalDebit, totalCredit, balanced: totalDebit === totalCredit };
}

// =============================================================================
// BALANCE SHEET
// =============================================================================

export async function balanceSheet(ctx: FolioContext, asOf?: string): Promise<BalanceSheet> {
	const tenantId = getTenantId(ctx);
	if (asOf) assertIsoDate(asOf, "asOf");

	const accounts = await loadAccounts(ctx, tenantId, true);
	const totals = await totalsByAccount(ctx.adapter, tenantId, { endDate: asOf });

	const assets: ReportLine[] = [];
	const liabilities: ReportLine[] = [];
	const equity: ReportLine[] = [];
	for (const account of accounts) {
		const { totalDebit, totalCredit } = totals.get(account.id) ?? ZERO;
		const raw = rawBalance(totalDebit, totalCredit);
		if (raw === 0) continue;
		if (account.type === "asset") assets.push({ ...toRef(account), balance: raw });
		else if (account.type === "liability") liabilities.push({ ...toRef(account), balance: Math.abs(raw) });
		else if (account.type === "equity") equity.push({ ...toRef(account), balance: Math.abs(raw) });
	}

	const sum = (lines: ReportLine[]) => lines.reduce((acc, line) => acc + line.balance, 0);
	const totalAssets = sum(assets);
	const totalLiabilities = sum(liabilities);
	const totalEquity = sum(equity);

	return {
		asOf: asOf ?? null,
		assets,
		liabilities,
		equity,
		totalAssets,
		totalLiabilities,
		totalEquity,
		balanced: totalAssets === totalLiabilities + totalEquity,
	};
}

// =============================================================================
// INCOME STATEMENT
// =============================================================================

export async function incomeStatement(ctx: FolioContext, startDate: string, endDate: string): Promise<IncomeStatement> {
	const tenantId = getTenantId(ctx);
	assertIsoDate(startDate, "startDate");
	assertIsoDate(endDate, "endDate");
	if (endDate < startDate) {
		throw new ValidationError("endDate must not be before startDate", { details: { startDate, endDate } });
	}

	const accounts = await loadAccounts(ctx, tenantId, true);
	const totals = await totalsByAccount(ctx.adapter, tenantId, { startDate, endDate });

	const revenue: ReportLine[] = [];
	const expenses: ReportLine[] = [];
	for (const account of accounts) {
		if (account.type !== "revenue" && account.type !== "expense") continue;
		const { totalDebit, totalCredit } = totals.get(account.id) ?? ZERO;
		const balance = signedBalance(account.type, totalDebit, totalCredit);
		if (balance === 0) continue;
		(account.type === "revenue" ? revenue : expenses).push({ ...toRef(account), balance });
	}

	const totalRevenue = revenue.reduce((acc, line) => acc + line.balance, 0);
	const totalExpenses = expenses.reduce((acc, line) => acc + line.balance, 0);
	return {
		startDate,
		endDate,
		revenue,
		expenses,
		totalRevenue,
		totalExpenses,
		netIncome: totalRevenue - totalExpenses,
	};
}

// =============================================================================
// GENERAL LEDGER
// =============================================================================

export interface GeneralLedgerParams {
	accountId?: string;
	startDate?: string;
	endDate?: string;
}

/**
 * Entries in ledger order with a running debit - credit balance. With both
 * `accountId` and `startDate`, the running balance opens at the account's
 * raw balance before `startDate`.
 */
export async function generalLedger(ctx: FolioContext, params: GeneralLedgerParams = {}): Promise<GeneralLedger> {
	const tenantId = getTenantId(ctx);
	if (params.startDate) assertIsoDate(params.startDate, "startDate");
	if (params.endDate) assertIsoDate(params.endDate, "endDate");

	const accounts = new Map((await loadAccounts(ctx, tenantId, false)).map((a) => [a.id, a]));
	if (params.accountId && !accounts.has(params.accountId)) {
		throw new NotFoundError("Account", params.accountId);
	}

	let openingBalance = 0;
	if (params.accountId && params.startDate) {
		const before = await totalsByAccount(ctx.adapter, tenantId, {
			accountId: params.accountId,
			before: params.startDate,
		});
		const totals = before.get(params.accountId) ?? ZERO;
		openingBalance = rawBalance(totals.totalDebit, totals.totalCredit);
	}

	const entries = await listEntries(ctx.adapter, tenantId, {
		accountId: params.accountId,
		startDate: params.startDate,
		endDate: params.endDate,
	});

	let running = openingBalance;
	const rows: GeneralLedgerRow[] = entries.map((entry) => {
		running += rawBalance(entry.debit, entry.credit);
		const account = accounts.get(entry.accountId);
		const row: GeneralLedgerRow = {
			entryId: entry.id,
			postingId: entry.postingId,
			sequence: entry.sequence,
			transactionDate: entry.transactionDate,
			description: entry.description,
			accountId: entry.accountId,
			accountCode: account?.code ?? "",
			accountName: account?.name ?? "",
			debit: entry.debit,
			credit: entry.credit,
			runningBalance: running,
		};
		for (const field of ENTRY_SOURCE_FIELDS) {
			if (entry[field]) row[field] = entry[field];
		}
		return row;
	});

	return {
		accountId: params.accountId ?? null,
		startDate: params.startDate ?? null,
		endDate: params.endDate ?? null,
		openingBalance,
		closingBalance: running,
		rows,
	};
}

// =============================================================================
// AGING
// =============================================================================

export function agingBucket(daysOverdue: number): AgingBucket {
	if (daysOverdue <= 0) return "current";
	if (daysOverdue <= 30) return "1_30";
	if (daysOverdue <= 60) return "31_60";
	if (daysOverdue <= 90) return "61_90";
	return "over_90";
}

interface AgingSource {
	id: string;
	number: string;
	partyId: string;
	documentDate: string;
	dueDate: string | null;
	totalAmount: number;
	paidAmount: number;
}

async function openDocuments(ctx: FolioContext, tenantId: string, kind: AgingKind): Promise<AgingSource[]> {
	const where: Where[] = [
		{ field: "tenantId", operator: "eq", value: tenantId },
		{ field: "status", operator: "in", value: ["unpaid", "partial"] },
	];
	const branchId = getBranchId(ctx);
	if (branchId) where.push({ field: "branchId", operator: "eq", value: branchId });

	if (kind === "receivables") {
		const invoices = await ctx.adapter.findMany<Omit<SalesInvoice, "items">>({
			model: "sales_invoice",
			where,
			sortBy: { field: "invoiceDate", direction: "asc" },
		});
		return invoices.map((doc) => ({
			id: doc.id,
			number: doc.invoiceNumber,
			partyId: doc.customerId,
			documentDate: doc.invoiceDate,
			dueDate: doc.dueDate,
			totalAmount: doc.totalAmount,
			paidAmount: doc.paidAmount,
		}));
	}

	const bills = await ctx.adapter.findMany<Omit<PurchaseBill, "items">>({
		model: "purchase_bill",
		where,
		sortBy: { field: "billDate", direction: "asc" },
	});
	return bills.map((doc) => ({
		id: doc.id,
		number: doc.billNumber,
		partyId: doc.vendorId,
		documentDate: doc.billDate,
		dueDate: doc.dueDate,
		totalAmount: doc.totalAmount,
		paidAmount: doc.paidAmount,
	}));
}

/** Outstanding unpaid and partially paid documents, bucketed by days past due. */
export async function aging(ctx: FolioContext, kind: AgingKind, asOf?: string): Promise<AgingReport> {
	if (kind !== "receivables" && kind !== "payables") {
		throw new ValidationError(`Aging kind must be "receivables" or "payables", got "${kind}"`);
	}
	const tenantId = getTenantId(ctx);
	const reportDate = asOf ?? todayIso();
	assertIsoDate(reportDate, "asOf");

	const buckets: Record<AgingBucket, number> = { current: 0, "1_30": 0, "31_60": 0, "61_90": 0, over_90: 0 };
	const rows: AgingRow[] = [];
	let totalOutstanding = 0;

	for (const doc of await openDocuments(ctx, tenantId, kind)) {
		const outstanding = outstandingAmount(doc);
		if (outstanding <= 0) continue;
		const daysOverdue = doc.dueDate ? Math.max(0, daysBetween(doc.dueDate, reportDate)) : 0;
		const bucket = agingBucket(daysOverdue);
		rows.push({
			documentId: doc.id,
			documentNumber: doc.number,
			partyId: doc.partyId,
			documentDate: doc.documentDate,
			dueDate: doc.dueDate,
			totalAmount: doc.totalAmount,
			paidAmount: doc.paidAmount,
			outstanding,
			daysOverdue,
			bucket,
		});
		buckets[bucket] += outstanding;
		totalOutstanding += outstanding;
	}

	return { kind, asOf: reportDate, rows, buckets, totalOutstanding };
}

// =============================================================================
// BUDGET VS ACTUAL
// =============================================================================

export async function budgetVsActual(ctx: FolioContext, budgetId: string): Promise<BudgetVsActual> {
	const tenantId = getTenantId(ctx);
	const budget = await getBudget(ctx, budgetId);
	const accounts = new Map((await loadAccounts(ctx, tenantId, false)).map((a) => [a.id, a]));

	const rows: BudgetVsActualRow[] = [];
	for (const item of budget.items) {
		const account = accounts.get(item.accountId);
		if (!account) throw new NotFoundError("Account", item.accountId);
		const { start, end } = periodBounds(budget.fiscalYear, item.month);
		const totals = await totalsByAccount(ctx.adapter, tenantId, {
			accountId: account.id,
			startDate: start,
			endDate: end,
		});
		const { totalDebit, totalCredit } = totals.get(account.id) ?? ZERO;
		const actual = signedBalance(account.type, totalDebit, totalCredit);
		rows.push({ ...toRef(account), month: item.month, budgeted: item.amount, actual, variance: item.amount - actual });
	}
	rows.sort((a, b) => a.code.localeCompare(b.code) || (a.month ?? 0) - (b.month ?? 0));

	const totalBudgeted = rows.reduce((acc, row) => acc + row.budgeted, 0);
	const totalActual = rows.reduce((acc, row) => acc + row.actual, 0);
	return {
		budgetId: budget.id,
		fiscalYear: budget.fiscalYear,
		rows,
		totalBudgeted,
		totalActual,
		totalVariance: totalBudgeted - totalActual,
	};
}

// =============================================================================
// DASHBOARD
// =============================================================================

export async function dashboardSummary(ctx: FolioContext, asOf?: string): Promise<DashboardSummary> {
	const tenantId = getTenantId(ctx);
	const reportDate = asOf ?? todayIso();
	assertIsoDate(reportDate, "asOf");

	const [receivables, payables] = await Promise.all([
		aging(ctx, "receivables", reportDate),
		aging(ctx, "payables", reportDate),
	]);

	const bankAccounts = await ctx.adapter.findMany<BankAccount>({
		model: "bank_account",
		where: [
			{ field: "tenantId", operator: "eq", value: tenantId },
			{ field: "isActive", operator: "eq", value: true },
		],
	});
	const cashPosition = bankAccounts.reduce((acc, account) => acc + account.currentBalance, 0);

	const monthStart = `${reportDate.slice(0, 7)}-01`;
	const month = await incomeStatement(ctx, monthStart, reportDate);

	return {
		asOf: reportDate,
		receivablesOutstanding: receivables.totalOutstanding,
		payablesOutstanding: payables.totalOutstanding,
		cashPosition,
		monthToDateRevenue: month.totalRevenue,
		monthToDateExpenses: month.totalExpenses,
	};
}
