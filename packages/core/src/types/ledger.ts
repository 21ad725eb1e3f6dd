// =============================================================================
// LEDGER TYPES — entries, posting input, journal vouchers
// =============================================================================

/** Optional links from a ledger entry back to the document that produced it. */
export const ENTRY_SOURCE_FIELDS = [
	"salesInvoiceId",
	"purchaseBillId",
	"journalVoucherId",
	"creditNoteId",
	"debitNoteId",
	"fundTransferId",
	"bankTransactionId",
	"fixedAssetId",
	"payslipId",
	"customerId",
	"vendorId",
] as const;

export type EntrySourceField = (typeof ENTRY_SOURCE_FIELDS)[number];

export type EntrySource = Partial<Record<EntrySourceField, string>>;

/**
 * One debit-or-credit line against an account. Immutable once written;
 * `postingId` groups the balanced set it belongs to.
 */
export interface LedgerEntry extends Record<EntrySourceField, string | null> {
	id: string;
	tenantId: string;
	branchId: string | null;
	postingId: string;
	/** Per-tenant insertion order; ties on `transactionDate` sort by it. */
	sequence: number;
	transactionDate: string;
	description: string | null;
	accountId: string;
	debit: number;
	credit: number;
	createdBy: string | null;
	createdAt: string;
}

export interface LedgerLine {
	accountId: string;
	debit?: number;
	credit?: number;
	description?: string;
}

export interface Posting {
	postingId: string;
	transactionDate: string;
	entries: LedgerEntry[];
	totalDebit: number;
	totalCredit: number;
}

export interface JournalVoucherLine {
	id: string;
	tenantId: string;
	voucherId: string;
	lineNo: number;
	accountId: string;
	debit: number;
	credit: number;
	description: string | null;
}

export interface JournalVoucher {
	id: string;
	tenantId: string;
	branchId: string | null;
	/** `JV-00001` */
	voucherNumber: string;
	voucherDate: string;
	description: string | null;
	reference: string | null;
	isPosted: boolean;
	postingId: string | null;
	createdBy: string | null;
	createdAt: string;
	lines: JournalVoucherLine[];
}
