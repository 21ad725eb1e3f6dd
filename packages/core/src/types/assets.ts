// =============================================================================
// BUDGETS, FIXED ASSETS, PAYROLL
// =============================================================================

export interface BudgetItem {
	id: string;
	tenantId: string;
	budgetId: string;
	accountId: string;
	amount: number;
	/** 1-12, or null for the whole fiscal year */
	month: number | null;
}

export interface Budget {
	id: string;
	tenantId: string;
	name: string;
	fiscalYear: number;
	createdBy: string | null;
	createdAt: string;
	items: BudgetItem[];
}

export interface FixedAsset {
	id: string;
	tenantId: string;
	branchId: string | null;
	name: string;
	assetAccountId: string | null;
	purchaseDate: string;
	purchaseCost: number;
	salvageValue: number;
	usefulLifeYears: number;
	accumulatedDepreciation: number;
	/** purchaseCost - accumulatedDepreciation */
	bookValue: number;
	lastDepreciationDate: string | null;
	isActive: boolean;
	createdAt: string;
}

export interface DepreciationRecord {
	id: string;
	tenantId: string;
	assetId: string;
	amount: number;
	depreciationDate: string;
	postingId: string;
	createdAt: string;
}

export interface Employee {
	id: string;
	tenantId: string;
	branchId: string | null;
	name: string;
	email: string | null;
	grossSalary: number;
	/** Basis points */
	payeRate: number;
	/** Basis points */
	pensionRate: number;
	isActive: boolean;
	createdAt: string;
}

export interface Payslip {
	id: string;
	tenantId: string;
	branchId: string | null;
	/** `PS-00001` */
	payslipNumber: string;
	employeeId: string;
	periodStart: string;
	periodEnd: string;
	payDate: string;
	grossSalary: number;
	allowances: number;
	payeAmount: number;
	pensionAmount: number;
	otherDeductions: number;
	totalDeductions: number;
	netPay: number;
	postingId: string;
	createdBy: string | null;
	createdAt: string;
}
