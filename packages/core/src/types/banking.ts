export interface BankAccount {
	id: string;
	tenantId: string;
	branchId: string | null;
	name: string;
	bankName: string | null;
	accountNumber: string | null;
	currency: string;
	/** Cached running balance; must match the linked chart account's ledger balance. */
	currentBalance: number;
	chartAccountId: string | null;
	isActive: boolean;
	lastReconciledAt: string | null;
	lastStatementBalance: number | null;
	createdAt: string;
	updatedAt: string;
}

export type BankTransactionKind = "deposit" | "withdrawal";

export interface BankTransaction {
	id: string;
	tenantId: string;
	bankAccountId: string;
	kind: BankTransactionKind;
	amount: number;
	transactionDate: string;
	description: string | null;
	counterAccountId: string | null;
	postingId: string | null;
	balanceAfter: number;
	createdBy: string | null;
	createdAt: string;
}

export interface FundTransfer {
	id: string;
	tenantId: string;
	branchId: string | null;
	/** `FT-00001` */
	transferNumber: string;
	fromAccountId: string;
	toAccountId: string;
	amount: number;
	transferDate: string;
	reference: string | null;
	description: string | null;
	postingId: string | null;
	createdBy: string | null;
	createdAt: string;
}

export interface ReconciliationResult {
	bankAccountId: string;
	statementDate: string;
	bookBalance: number;
	statementBalance: number;
	/** statement - book */
	difference: number;
	reconciled: boolean;
}

export interface LedgerConsistency {
	bankAccountId: string;
	chartAccountId: string;
	currentBalance: number;
	ledgerBalance: number;
	consistent: boolean;
}
