// =============================================================================
// REPORT TYPES
// =============================================================================

import type { AccountType } from "./account.js";
import type { EntrySourceField } from "./ledger.js";

export interface AccountRef {
	accountId: string;
	code: string;
	name: string;
	type: AccountType;
}

export interface TrialBalanceRow extends AccountRef {
	debitTotal: number;
	creditTotal: number;
	/** debitTotal - creditTotal */
	balance: number;
}

export interface TrialBalance {
	asOf: string | null;
	rows: TrialBalanceRow[];
	totalDebit: number;
	totalCredit: number;
	balanced: boolean;
}

export interface ReportLine extends AccountRef {
	balance: number;
}

export interface BalanceSheet {
	asOf: string | null;
	assets: ReportLine[];
	liabilities: ReportLine[];
	equity: ReportLine[];
	totalAssets: number;
	totalLiabilities: number;
	totalEquity: number;
	/** Not guaranteed: there is no equity plug for undistributed income. */
	balanced: boolean;
}

export interface IncomeStatement {
	startDate: string;
	endDate: string;
	revenue: ReportLine[];
	expenses: ReportLine[];
	totalRevenue: number;
	totalExpenses: number;
	netIncome: number;
}

export interface GeneralLedgerRow extends Partial<Record<EntrySourceField, string | null>> {
	entryId: string;
	postingId: string;
	sequence: number;
	transactionDate: string;
	description: string | null;
	accountId: string;
	accountCode: string;
	accountName: string;
	debit: number;
	credit: number;
	/** Running debit - credit */
	runningBalance: number;
}

export interface GeneralLedger {
	accountId: string | null;
	startDate: string | null;
	endDate: string | null;
	openingBalance: number;
	closingBalance: number;
	rows: GeneralLedgerRow[];
}

export type AgingKind = "receivables" | "payables";

export type AgingBucket = "current" | "1_30" | "31_60" | "61_90" | "over_90";

export interface AgingRow {
	documentId: string;
	documentNumber: string;
	partyId: string;
	documentDate: string;
	dueDate: string | null;
	totalAmount: number;
	paidAmount: number;
	outstanding: number;
	daysOverdue: number;
	bucket: AgingBucket;
}

export interface AgingReport {
	kind: AgingKind;
	asOf: string;
	rows: AgingRow[];
	buckets: Record<AgingBucket, number>;
	totalOutstanding: number;
}

export interface BudgetVsActualRow extends AccountRef {
	month: number | null;
	budgeted: number;
	actual: number;
	/** budgeted - actual */
	variance: number;
}

export interface BudgetVsActual {
	budgetId: string;
	fiscalYear: number;
	rows: BudgetVsActualRow[];
	totalBudgeted: number;
	totalActual: number;
	totalVariance: number;
}

export interface DashboardSummary {
	asOf: string;
	receivablesOutstanding: number;
	payablesOutstanding: number;
	cashPosition: number;
	monthToDateRevenue: number;
	monthToDateExpenses: number;
}
