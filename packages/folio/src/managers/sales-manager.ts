// =============================================================================
// SALES — invoices, customer payments, write-offs, credit notes
// =============================================================================
// Invoice creation:  DR accountsReceivable (total)
//                    CR salesRevenue (subTotal), CR vatPayable (vat, if > 0)
// Payment:           DR payment account, CR accountsReceivable
// Write-off:         DR badDebtExpense, CR accountsReceivable (remaining)
// Credit note:       DR salesRevenue, CR accountsReceivable (returned amount)

import { randomUUID } from "node:crypto";
import type {
	Account,
	CreditNote,
	DocumentPayment,
	DocumentStatus,
	FolioContext,
	FolioTransactionAdapter,
	LedgerLine,
	Product,
	ReturnNoteItem,
	SalesInvoice,
	SalesInvoiceItem,
	Where,
} from "@folio/core";
import { assertAmount, assertIsoDate, assertQuantity, NotFoundError, todayIso, ValidationError } from "@folio/core";
import { computeDocumentTotals, outstandingAmount, statusAfterPayment } from "./document-helpers.js";
import { moveStock } from "./inventory-manager.js";
import { postEntries } from "./ledger-store.js";
import { nextDocumentNumber } from "./numbering.js";
import { logAfterCommit, runOperation } from "./operation.js";
import { findParty } from "./party-manager.js";
import { requirePostingAccounts } from "./posting-accounts.js";
import { byTenantAndId, getActor, getBranchId, getTenantId, nowIso } from "./scope.js";

type InvoiceRow = Omit<SalesInvoice, "items">;
type CreditNoteRow = Omit<CreditNote, "items">;

export interface DocumentItemInput {
	productId: string;
	quantity: number;
	/** Defaults to the product's unit price */
	unitPrice?: number;
	description?: string;
}

export interface CreateInvoiceParams {
	customerId: string;
	invoiceDate: string;
	dueDate?: string;
	notes?: string;
	/** Percent, at most two decimals. Default 0 */
	vatRate?: number;
	items: DocumentItemInput[];
	idempotencyKey?: string;
}

export interface PaymentParams {
	amount: number;
	paymentAccountId: string;
	paymentDate: string;
	reference?: string;
	idempotencyKey?: string;
}

export interface ReturnItemInput {
	/** Item of the original invoice or bill */
	itemId: string;
	quantity: number;
}

// =============================================================================
// SHARED (also used by purchasing)
// =============================================================================

export interface PricedItem {
	productId: string;
	quantity: number;
	unitPrice: number;
	description: string | null;
}

/** Load products and fill in default unit prices. */
export async function resolveItemPrices(
	tx: FolioTransactionAdapter,
	tenantId: string,
	items: DocumentItemInput[],
): Promise<PricedItem[]> {
	const resolved: PricedItem[] = [];
	for (const item of items) {
		const product = await tx.findOne<Product>({ model: "product", where: byTenantAndId(tenantId, item.productId) });
		if (!product) throw new NotFoundError("Product", item.productId);
		resolved.push({
			productId: product.id,
			quantity: item.quantity,
			unitPrice: item.unitPrice ?? product.unitPrice,
			description: item.description ?? product.name,
		});
	}
	return resolved;
}

/**
 * The payment account must be an active asset account of the tenant, and not
 * the control account the payment settles.
 */
export async function assertPaymentAccount(
	tx: FolioTransactionAdapter,
	tenantId: string,
	accountId: string,
	controlAccountId: string,
): Promise<Account> {
	const account = await tx.findOne<Account>({ model: "account", where: byTenantAndId(tenantId, accountId) });
	if (!account) throw new NotFoundError("Account", accountId);
	if (!account.isActive) {
		throw new ValidationError(`Payment account ${account.code} is inactive`, {
			reason: "ACCOUNT_INACTIVE",
			details: { accountId },
		});
	}
	if (account.type !== "asset" || account.id === controlAccountId) {
		throw new ValidationError(`Account ${account.code} cannot receive or make payments`, {
			reason: "INVALID_PAYMENT_ACCOUNT",
			details: { accountId, type: account.type },
		});
	}
	return account;
}

/** Sum requested quantities per source item. */
export function groupReturnItems(items: ReturnItemInput[]): Map<string, number> {
	if (items.length === 0) {
		throw new ValidationError("A return needs at least one item", { reason: "NO_ITEMS" });
	}
	const grouped = new Map<string, number>();
	items.forEach((item, i) => {
		const quantity = assertQuantity(item.quantity, `items[${i}].quantity`);
		grouped.set(item.itemId, (grouped.get(item.itemId) ?? 0) + quantity);
	});
	return grouped;
}

export async function getDocumentPayment(
	tx: Pick<FolioTransactionAdapter, "findOne">,
	tenantId: string,
	paymentId: string,
): Promise<DocumentPayment> {
	const payment = await tx.findOne<DocumentPayment>({
		model: "document_payment",
		where: byTenantAndId(tenantId, paymentId),
	});
	if (!payment) throw new NotFoundError("Payment", paymentId);
	return payment;
}

// =============================================================================
// INVOICES
// =============================================================================

async function loadInvoice(
	db: Pick<FolioTransactionAdapter, "findOne" | "findMany">,
	tenantId: string,
	invoiceId: string,
): Promise<SalesInvoice> {
	const row = await db.findOne<InvoiceRow>({ model: "sales_invoice", where: byTenantAndId(tenantId, invoiceId) });
	if (!row) throw new NotFoundError("Sales invoice", invoiceId);
	const items = await db.findMany<SalesInvoiceItem>({
		model: "sales_invoice_item",
		where: [
			{ field: "tenantId", operator: "eq", value: tenantId },
			{ field: "invoiceId", operator: "eq", value: invoiceId },
		],
	});
	return { ...row, items };
}

export async function createInvoice(ctx: FolioContext, params: CreateInvoiceParams): Promise<SalesInvoice> {
	const tenantId = getTenantId(ctx);
	const branchId = getBranchId(ctx);
	const actor = getActor(ctx);
	assertIsoDate(params.invoiceDate, "invoiceDate");
	if (params.dueDate !== undefined) assertIsoDate(params.dueDate, "dueDate");

	const { idempotencyKey, ...request } = params;

	return runOperation(
		ctx,
		{ type: "invoice.create", params: { ...request } },
		async (tx) => {
			const customer = await findParty(tx, tenantId, params.customerId, "customer");
			if (!customer) throw new NotFoundError("Customer", params.customerId);

			const lines = await resolveItemPrices(tx, tenantId, params.items);
			const totals = computeDocumentTotals(lines, params.vatRate ?? 0, ctx.options.advanced.maxAmount);
			const roles = await requirePostingAccounts(tx, ctx, tenantId, ["accountsReceivable", "salesRevenue"]);
			const vat = totals.vatAmount > 0 ? await requirePostingAccounts(tx, ctx, tenantId, ["vatPayable"]) : null;

			const invoiceId = randomUUID();
			const invoiceNumber = await nextDocumentNumber(tx, tenantId, "INV");

			const entryLines: LedgerLine[] = [
				{ accountId: roles.accountsReceivable, debit: totals.totalAmount },
				{ accountId: roles.salesRevenue, credit: totals.subTotal },
			];
			if (vat) {
				entryLines.push({ accountId: vat.vatPayable, credit: totals.vatAmount });
			}
			const posting = await postEntries(tx, ctx, {
				tenantId,
				branchId,
				transactionDate: params.invoiceDate,
				description: `Sales invoice ${invoiceNumber}`,
				lines: entryLines,
				source: { salesInvoiceId: invoiceId, customerId: customer.id },
				createdBy: actor,
			});

			const now = nowIso();
			const row = await tx.create<InvoiceRow>({
				model: "sales_invoice",
				data: {
					id: invoiceId,
					tenantId,
					branchId,
					invoiceNumber,
					customerId: customer.id,
					invoiceDate: params.invoiceDate,
					dueDate: params.dueDate ?? null,
					notes: params.notes ?? null,
					subTotal: totals.subTotal,
					vatRate: totals.vatRate,
					vatAmount: totals.vatAmount,
					totalAmount: totals.totalAmount,
					paidAmount: 0,
					status: "unpaid",
					postingId: posting.postingId,
					createdBy: actor,
					createdAt: now,
					updatedAt: now,
				},
			});

			const items: SalesInvoiceItem[] = [];
			for (const [i, line] of lines.entries()) {
				items.push(
					await tx.create<SalesInvoiceItem>({
						model: "sales_invoice_item",
						data: {
							id: randomUUID(),
							tenantId,
							invoiceId,
							productId: line.productId,
							description: line.description,
							quantity: line.quantity,
							unitPrice: line.unitPrice,
							amount: totals.lineAmounts[i] ?? 0,
							returnedQuantity: 0,
						},
					}),
				);
				await moveStock(tx, tenantId, line.productId, -line.quantity, "sale", invoiceId);
			}

			logAfterCommit(ctx, "Sales invoice posted", {
				tenantId,
				invoiceNumber,
				subTotal: totals.subTotal,
				vatAmount: totals.vatAmount,
				totalAmount: totals.totalAmount,
			});
			return { ...row, items };
		},
		{
			key: idempotencyKey,
			request: { ...request },
			resultId: (invoice) => invoice.id,
			load: (tx, id) => loadInvoice(tx, tenantId, id),
		},
	);
}

export async function getInvoice(ctx: FolioContext, invoiceId: string): Promise<SalesInvoice> {
	return loadInvoice(ctx.adapter, getTenantId(ctx), invoiceId);
}

export async function listInvoices(
	ctx: FolioContext,
	params: { status?: DocumentStatus; customerId?: string; limit?: number; offset?: number } = {},
): Promise<SalesInvoice[]> {
	const tenantId = getTenantId(ctx);
	const where: Where[] = [{ field: "tenantId", operator: "eq", value: tenantId }];
	const branchId = getBranchId(ctx);
	if (branchId) where.push({ field: "branchId", operator: "eq", value: branchId });
	if (params.status) where.push({ field: "status", operator: "eq", value: params.status });
	if (params.customerId) where.push({ field: "customerId", operator: "eq", value: params.customerId });

	const rows = await ctx.adapter.findMany<InvoiceRow>({
		model: "sales_invoice",
		where,
		sortBy: [
			{ field: "invoiceDate", direction: "desc" },
			{ field: "invoiceNumber", direction: "desc" },
		],
		limit: params.limit,
		offset: params.offset,
	});
	return Promise.all(rows.map((row) => loadInvoice(ctx.adapter, tenantId, row.id)));
}

// =============================================================================
// PAYMENTS
// =============================================================================

export async function recordInvoicePayment(
	ctx: FolioContext,
	invoiceId: string,
	params: PaymentParams,
): Promise<{ invoice: SalesInvoice; payment: DocumentPayment }> {
	const tenantId = getTenantId(ctx);
	const actor = getActor(ctx);
	const amount = assertAmount(params.amount, "amount", { max: ctx.options.advanced.maxAmount });
	assertIsoDate(params.paymentDate, "paymentDate");

	const { idempotencyKey, ...request } = params;

	return runOperation(
		ctx,
		{ type: "invoice.payment", params: { invoiceId, ...request } },
		async (tx) => {
			const invoice = await tx.findOne<InvoiceRow>({
				model: "sales_invoice",
				where: byTenantAndId(tenantId, invoiceId),
				forUpdate: true,
			});
			if (!invoice) throw new NotFoundError("Sales invoice", invoiceId);
			if (invoice.status === "written_off") {
				throw new ValidationError(`Invoice ${invoice.invoiceNumber} has been written off`, {
					reason: "DOCUMENT_WRITTEN_OFF",
					details: { invoiceId },
				});
			}
			const roles = await requirePostingAccounts(tx, ctx, tenantId, ["accountsReceivable"]);
			const paymentAccount = await assertPaymentAccount(
				tx,
				tenantId,
				params.paymentAccountId,
				roles.accountsReceivable,
			);

			const posting = await postEntries(tx, ctx, {
				tenantId,
				branchId: invoice.branchId,
				transactionDate: params.paymentDate,
				description: `Payment for ${invoice.invoiceNumber}`,
				lines: [
					{ accountId: paymentAccount.id, debit: amount },
					{ accountId: roles.accountsReceivable, credit: amount },
				],
				source: { salesInvoiceId: invoice.id, customerId: invoice.customerId },
				createdBy: actor,
			});

			const payment = await tx.create<DocumentPayment>({
				model: "document_payment",
				data: {
					id: randomUUID(),
					tenantId,
					documentType: "sales_invoice",
					documentId: invoice.id,
					amount,
					paymentAccountId: paymentAccount.id,
					paymentDate: params.paymentDate,
					reference: params.reference ?? null,
					postingId: posting.postingId,
					createdBy: actor,
					createdAt: nowIso(),
				},
			});

			const paidAmount = invoice.paidAmount + amount;
			await tx.update<InvoiceRow>({
				model: "sales_invoice",
				where: byTenantAndId(tenantId, invoice.id),
				update: {
					paidAmount,
					status: statusAfterPayment(paidAmount, invoice.totalAmount, invoice.status),
					updatedAt: nowIso(),
				},
			});

			logAfterCommit(ctx, "Invoice payment posted", {
				tenantId,
				invoiceNumber: invoice.invoiceNumber,
				amount,
				paidAmount,
			});
			return { invoice: await loadInvoice(tx, tenantId, invoice.id), payment };
		},
		{
			key: idempotencyKey,
			request: { invoiceId, ...request },
			resultId: (result) => result.payment.id,
			load: async (tx, paymentId) => {
				const payment = await getDocumentPayment(tx, tenantId, paymentId);
				return { invoice: await loadInvoice(tx, tenantId, payment.documentId), payment };
			},
		},
	);
}

export async function listInvoicePayments(ctx: FolioContext, invoiceId: string): Promise<DocumentPayment[]> {
	return ctx.adapter.findMany<DocumentPayment>({
		model: "document_payment",
		where: [
			{ field: "tenantId", operator: "eq", value: getTenantId(ctx) },
			{ field: "documentType", operator: "eq", value: "sales_invoice" },
			{ field: "documentId", operator: "eq", value: invoiceId },
		],
		sortBy: [
			{ field: "paymentDate", direction: "asc" },
			{ field: "createdAt", direction: "asc" },
		],
	});
}

// =============================================================================
// WRITE-OFF
// =============================================================================

export async function writeOffInvoice(
	ctx: FolioContext,
	invoiceId: string,
	params: { date?: string; reason?: string } = {},
): Promise<SalesInvoice> {
	const tenantId = getTenantId(ctx);
	const date = params.date ?? todayIso();
	assertIsoDate(date, "date");

	return runOperation(ctx, { type: "invoice.write_off", params: { invoiceId, ...params } }, async (tx) => {
		const invoice = await tx.findOne<InvoiceRow>({
			model: "sales_invoice",
			where: byTenantAndId(tenantId, invoiceId),
			forUpdate: true,
		});
		if (!invoice) throw new NotFoundError("Sales invoice", invoiceId);

		const remaining = invoice.status === "written_off" ? 0 : outstandingAmount(invoice);
		if (remaining <= 0) {
			throw new ValidationError(`Invoice ${invoice.invoiceNumber} has no balance to write off`, {
				reason: "NOTHING_TO_WRITE_OFF",
				details: { invoiceId, totalAmount: invoice.totalAmount, paidAmount: invoice.paidAmount },
			});
		}

		const roles = await requirePostingAccounts(tx, ctx, tenantId, ["badDebtExpense", "accountsReceivable"]);
		await postEntries(tx, ctx, {
			tenantId,
			branchId: invoice.branchId,
			transactionDate: date,
			description: params.reason ?? `Write-off of ${invoice.invoiceNumber}`,
			lines: [
				{ accountId: roles.badDebtExpense, debit: remaining },
				{ accountId: roles.accountsReceivable, credit: remaining },
			],
			source: { salesInvoiceId: invoice.id, customerId: invoice.customerId },
			createdBy: getActor(ctx),
		});

		await tx.update<InvoiceRow>({
			model: "sales_invoice",
			where: byTenantAndId(tenantId, invoice.id),
			update: { status: "written_off", updatedAt: nowIso() },
		});

		logAfterCommit(ctx, "Invoice written off", { tenantId, invoiceNumber: invoice.invoiceNumber, amount: remaining });
		return loadInvoice(tx, tenantId, invoice.id);
	});
}

// =============================================================================
// CREDIT NOTES (sales returns)
// =============================================================================

export interface CreateCreditNoteParams {
	invoiceId: string;
	noteDate: string;
	reason?: string;
	items: ReturnItemInput[];
	idempotencyKey?: string;
}

async function loadCreditNote(
	db: Pick<FolioTransactionAdapter, "findOne" | "findMany">,
	tenantId: string,
	noteId: string,
): Promise<CreditNote> {
	const row = await db.findOne<CreditNoteRow>({ model: "credit_note", where: byTenantAndId(tenantId, noteId) });
	if (!row) throw new NotFoundError("Credit note", noteId);
	const items = await db.findMany<ReturnNoteItem>({
		model: "credit_note_item",
		where: [
			{ field: "tenantId", operator: "eq", value: tenantId },
			{ field: "noteId", operator: "eq", value: noteId },
		],
	});
	return { ...row, items };
}

export async function createCreditNote(ctx: FolioContext, params: CreateCreditNoteParams): Promise<CreditNote> {
	const tenantId = getTenantId(ctx);
	const actor = getActor(ctx);
	assertIsoDate(params.noteDate, "noteDate");
	const requested = groupReturnItems(params.items);

	const { idempotencyKey, ...request } = params;

	return runOperation(
		ctx,
		{ type: "credit_note.create", params: { ...request } },
		async (tx) => {
			const invoice = await tx.findOne<InvoiceRow>({
				model: "sales_invoice",
				where: byTenantAndId(tenantId, params.invoiceId),
				forUpdate: true,
			});
			if (!invoice) throw new NotFoundError("Sales invoice", params.invoiceId);

			const invoiceItems = await tx.findMany<SalesInvoiceItem>({
				model: "sales_invoice_item",
				where: [
					{ field: "tenantId", operator: "eq", value: tenantId },
					{ field: "invoiceId", operator: "eq", value: invoice.id },
				],
			});
			const byId = new Map(invoiceItems.map((item) => [item.id, item]));

			const returns: { source: SalesInvoiceItem; quantity: number; amount: number }[] = [];
			for (const [itemId, quantity] of requested) {
				const source = byId.get(itemId);
				if (!source) throw new NotFoundError("Invoice item", itemId);
				const returnable = source.quantity - source.returnedQuantity;
				if (quantity > returnable) {
					throw new ValidationError(
						`Cannot return ${quantity} of item ${itemId}: only ${returnable} remain returnable`,
						{ reason: "RETURN_EXCEEDS_QUANTITY", details: { itemId, requested: quantity, returnable } },
					);
				}
				returns.push({ source, quantity, amount: quantity * source.unitPrice });
			}
			const totalAmount = returns.reduce((sum, r) => sum + r.amount, 0);

			const roles = await requirePostingAccounts(tx, ctx, tenantId, ["salesRevenue", "accountsReceivable"]);
			const noteId = randomUUID();
			const noteNumber = await nextDocumentNumber(tx, tenantId, "CN");

			const posting = await postEntries(tx, ctx, {
				tenantId,
				branchId: invoice.branchId,
				transactionDate: params.noteDate,
				description: `Credit note ${noteNumber} for ${invoice.invoiceNumber}`,
				lines: [
					{ accountId: roles.salesRevenue, debit: totalAmount },
					{ accountId: roles.accountsReceivable, credit: totalAmount },
				],
				source: { creditNoteId: noteId, salesInvoiceId: invoice.id, customerId: invoice.customerId },
				createdBy: actor,
			});

			const row = await tx.create<CreditNoteRow>({
				model: "credit_note",
				data: {
					id: noteId,
					tenantId,
					branchId: invoice.branchId,
					noteNumber,
					invoiceId: invoice.id,
					customerId: invoice.customerId,
					noteDate: params.noteDate,
					reason: params.reason ?? null,
					totalAmount,
					postingId: posting.postingId,
					createdBy: actor,
					createdAt: nowIso(),
				},
			});

			const items: ReturnNoteItem[] = [];
			for (const r of returns) {
				items.push(
					await tx.create<ReturnNoteItem>({
						model: "credit_note_item",
						data: {
							id: randomUUID(),
							tenantId,
							noteId,
							sourceItemId: r.source.id,
							productId: r.source.productId,
							quantity: r.quantity,
							unitPrice: r.source.unitPrice,
							amount: r.amount,
						},
					}),
				);
				await tx.update<SalesInvoiceItem>({
					model: "sales_invoice_item",
					where: byTenantAndId(tenantId, r.source.id),
					update: { returnedQuantity: r.source.returnedQuantity + r.quantity },
				});
				await moveStock(tx, tenantId, r.source.productId, r.quantity, "sales_return", noteId);
			}

			logAfterCommit(ctx, "Credit note posted", {
				tenantId,
				noteNumber,
				invoiceNumber: invoice.invoiceNumber,
				totalAmount,
			});
			return { ...row, items };
		},
		{
			key: idempotencyKey,
			request: { ...request },
			resultId: (note) => note.id,
			load: (tx, id) => loadCreditNote(tx, tenantId, id),
		},
	);
}

export async function getCreditNote(ctx: FolioContext, noteId: string): Promise<CreditNote> {
	return loadCreditNote(ctx.adapter, getTenantId(ctx), noteId);
}

export async function listCreditNotes(ctx: FolioContext, params: { invoiceId?: string } = {}): Promise<CreditNote[]> {
	const tenantId = getTenantId(ctx);
	const where: Where[] = [{ field: "tenantId", operator: "eq", value: tenantId }];
	if (params.invoiceId) where.push({ field: "invoiceId", operator: "eq", value: params.invoiceId });
	const rows = await ctx.adapter.findMany<CreditNoteRow>({
		model: "credit_note",
		where,
		sortBy: { field: "noteNumber", direction: "asc" },
	});
	return Promise.all(rows.map((row) => loadCreditNote(ctx.adapter, tenantId, row.id)));
}
