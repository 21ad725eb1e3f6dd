// =============================================================================
// DOCUMENT TYPES — parties, products, invoices, bills, returns, payments
// =============================================================================

export type PartyKind = "customer" | "vendor";

export interface Party {
	id: string;
	tenantId: string;
	kind: PartyKind;
	name: string;
	email: string | null;
	phone: string | null;
	isActive: boolean;
	createdAt: string;
}

export interface Product {
	id: string;
	tenantId: string;
	branchId: string | null;
	name: string;
	sku: string | null;
	unitPrice: number;
	stockQuantity: number;
	isActive: boolean;
	createdAt: string;
	updatedAt: string;
}

export type StockMovementReason =
	| "sale"
	| "purchase"
	| "sales_return"
	| "purchase_return"
	| "adjustment";

export interface StockMovement {
	id: string;
	tenantId: string;
	productId: string;
	quantityChange: number;
	quantityAfter: number;
	reason: StockMovementReason;
	sourceId: string | null;
	createdAt: string;
}

export type DocumentStatus = "unpaid" | "partial" | "paid" | "written_off";

export type PayableDocumentType = "sales_invoice" | "purchase_bill";

export interface DocumentItem {
	id: string;
	tenantId: string;
	productId: string;
	description: string | null;
	quantity: number;
	unitPrice: number;
	amount: number;
	returnedQuantity: number;
}

interface PayableDocument {
	id: string;
	tenantId: string;
	branchId: string | null;
	dueDate: string | null;
	notes: string | null;
	subTotal: number;
	/** Basis points: 10% = 1000 */
	vatRate: number;
	vatAmount: number;
	totalAmount: number;
	paidAmount: number;
	status: DocumentStatus;
	postingId: string;
	createdBy: string | null;
	createdAt: string;
	updatedAt: string;
}

export interface SalesInvoice extends PayableDocument {
	/** `INV-00001` */
	invoiceNumber: string;
	customerId: string;
	invoiceDate: string;
	items: SalesInvoiceItem[];
}

export interface SalesInvoiceItem extends DocumentItem {
	invoiceId: string;
}

export interface PurchaseBill extends PayableDocument {
	/** `PO-00001`, or the vendor's own number when supplied */
	billNumber: string;
	vendorId: string;
	billDate: string;
	items: PurchaseBillItem[];
}

export interface PurchaseBillItem extends DocumentItem {
	billId: string;
}

export interface DocumentPayment {
	id: string;
	tenantId: string;
	documentType: PayableDocumentType;
	documentId: string;
	amount: number;
	paymentAccountId: string;
	paymentDate: string;
	reference: string | null;
	postingId: string;
	createdBy: string | null;
	createdAt: string;
}

export interface ReturnNoteItem {
	id: string;
	tenantId: string;
	noteId: string;
	/** The invoice or bill item being returned */
	sourceItemId: string;
	productId: string;
	quantity: number;
	unitPrice: number;
	amount: number;
}

interface ReturnNote {
	id: string;
	tenantId: string;
	branchId: string | null;
	noteNumber: string;
	noteDate: string;
	reason: string | null;
	totalAmount: number;
	postingId: string;
	createdBy: string | null;
	createdAt: string;
	items: ReturnNoteItem[];
}

/** Sales return: `CN-00001` */
export interface CreditNote extends ReturnNote {
	invoiceId: string;
	customerId: string;
}

/** Purchase return: `DN-00001` */
export interface DebitNote extends ReturnNote {
	billId: string;
	vendorId: string;
}
