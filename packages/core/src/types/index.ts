export type { Account, AccountNode, AccountType, AccountWithBalance, NormalBalance } from "./account.js";
export { ACCOUNT_TYPES } from "./account.js";
export type {
	Budget,
	BudgetItem,
	DepreciationRecord,
	Employee,
	FixedAsset,
	Payslip,
} from "./assets.js";
export type {
	BankAccount,
	BankTransaction,
	BankTransactionKind,
	FundTransfer,
	LedgerConsistency,
	ReconciliationResult,
} from "./banking.js";
export type {
	ChartAccountDefinition,
	FolioAdvancedOptions,
	FolioLogger,
	FolioOptions,
} from "./config.js";
export type {
	FolioContext,
	RequestContext,
	ResolvedAdvancedOptions,
	ResolvedFolioOptions,
} from "./context.js";
export type {
	CreditNote,
	DebitNote,
	DocumentItem,
	DocumentPayment,
	DocumentStatus,
	Party,
	PartyKind,
	PayableDocumentType,
	Product,
	PurchaseBill,
	PurchaseBillItem,
	ReturnNoteItem,
	SalesInvoice,
	SalesInvoiceItem,
	StockMovement,
	StockMovementReason,
} from "./documents.js";
export type {
	EntrySource,
	EntrySourceField,
	JournalVoucher,
	JournalVoucherLine,
	LedgerEntry,
	LedgerLine,
	Posting,
} from "./ledger.js";
export { ENTRY_SOURCE_FIELDS } from "./ledger.js";
export type {
	ColumnDefinition,
	FolioHookContext,
	FolioOperation,
	FolioOperationType,
	FolioPlugin,
	InferPluginTypes,
	TableDefinition,
} from "./plugin.js";
export type { PostingAccountAssignment, PostingRole } from "./posting.js";
export { isPostingRole, POSTING_ROLES } from "./posting.js";
export type {
	AccountRef,
	AgingBucket,
	AgingKind,
	AgingReport,
	AgingRow,
	BalanceSheet,
	BudgetVsActual,
	BudgetVsActualRow,
	DashboardSummary,
	GeneralLedger,
	GeneralLedgerRow,
	IncomeStatement,
	ReportLine,
	TrialBalance,
	TrialBalanceRow,
} from "./reports.js";
