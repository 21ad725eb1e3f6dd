// =============================================================================
// folio — public API
// =============================================================================

export type {
	Account,
	AccountType,
	BalanceSheet,
	Budget,
	DocumentPayment,
	FolioAdapter,
	FolioContext,
	FolioLogger,
	FolioOperation,
	FolioOptions,
	FolioPlugin,
	FundTransfer,
	GeneralLedger,
	IncomeStatement,
	JournalVoucher,
	LedgerEntry,
	Party,
	Payslip,
	PostingRole,
	Product,
	PurchaseBill,
	RequestContext,
	SalesInvoice,
	TrialBalance,
} from "@folio/core";
export {
	ConfigurationError,
	ConflictError,
	decimalToMinor,
	FolioError,
	minorToDecimal,
	NotFoundError,
	ValidationError,
} from "@folio/core";
export { defineFolioConfig, isKnownCurrency, validateConfig } from "./config/index.js";
export { buildContext, sortPlugins } from "./context/context.js";
export { getFolioTables, getNumericColumns } from "./db/schema.js";
export { createFolio, type Folio, type FolioInstance, type FolioTenantApi } from "./folio/base.js";
export type { CreateAccountParams, DeleteAccountResult, UpdateAccountParams } from "./managers/account-manager.js";
export type {
	BankMovementParams,
	CreateBankAccountParams,
	CreateTransferParams,
} from "./managers/bank-manager.js";
export type { BudgetItemInput } from "./managers/budget-manager.js";
export { DEFAULT_CHART, type TenantSetupResult } from "./managers/chart-of-accounts.js";
export { annualDepreciation, type CreateFixedAssetParams } from "./managers/fixed-asset-manager.js";
export type { CreateProductParams } from "./managers/inventory-manager.js";
export type { CreateJournalVoucherParams } from "./managers/journal-manager.js";
export type { EntryFilter } from "./managers/ledger-store.js";
export { formatDocumentNumber } from "./managers/numbering.js";
export {
	computePayslipAmounts,
	type CreateEmployeeParams,
	type CreatePayslipParams,
	type PayslipAmounts,
} from "./managers/payroll-manager.js";
export type { CreateBillParams, CreateDebitNoteParams } from "./managers/purchase-manager.js";
export { agingBucket, type GeneralLedgerParams } from "./managers/report-manager.js";
export type {
	CreateCreditNoteParams,
	CreateInvoiceParams,
	DocumentItemInput,
	PaymentParams,
	ReturnItemInput,
} from "./managers/sales-manager.js";
export { normalBalance, rawBalance, signedBalance } from "./managers/entry-balance.js";
export { type AuditLogEntry, type AuditLogOptions, auditLog, queryAuditLog } from "./plugins/audit-log.js";
