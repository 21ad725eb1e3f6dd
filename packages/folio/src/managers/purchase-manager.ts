// =============================================================================
// PURCHASING — bills, vendor payments, debit notes
// =============================================================================
// Bill creation:  DR inventory (subTotal), DR vatPayable (vat, if > 0)
//                 CR accountsPayable (total)
// Payment:        DR accountsPayable, CR payment account
// Debit note:     DR accountsPayable, CR inventory (returned amount)

import { randomUUID } from "node:crypto";
import type {
	DebitNote,
	DocumentPayment,
	DocumentStatus,
	FolioContext,
	FolioTransactionAdapter,
	LedgerLine,
	PurchaseBill,
	PurchaseBillItem,
	ReturnNoteItem,
	Where,
} from "@folio/core";
import { assertAmount, assertIsoDate, assertText, ConflictError, NotFoundError, ValidationError } from "@folio/core";
import { computeDocumentTotals, statusAfterPayment } from "./document-helpers.js";
import { moveStock } from "./inventory-manager.js";
import { postEntries } from "./ledger-store.js";
import { nextDocumentNumber } from "./numbering.js";
import { logAfterCommit, runOperation } from "./operation.js";
import { findParty } from "./party-manager.js";
import { requirePostingAccounts } from "./posting-accounts.js";
import {
	assertPaymentAccount,
	type DocumentItemInput,
	getDocumentPayment,
	groupReturnItems,
	type PaymentParams,
	type ReturnItemInput,
	resolveItemPrices,
} from "./sales-manager.js";
import { byTenantAndId, getActor, getBranchId, getTenantId, nowIso } from "./scope.js";

type BillRow = Omit<PurchaseBill, "items">;
type DebitNoteRow = Omit<DebitNote, "items">;

export interface CreateBillParams {
	vendorId: string;
	billDate: string;
	dueDate?: string;
	/** Vendor's own bill number; replaces the generated `PO-` number */
	billNumber?: string;
	notes?: string;
	/** Percent, at most two decimals. Default 0 */
	vatRate?: number;
	items: DocumentItemInput[];
	idempotencyKey?: string;
}

async function loadBill(
	db: Pick<FolioTransactionAdapter, "findOne" | "findMany">,
	tenantId: string,
	billId: string,
): Promise<PurchaseBill> {
	const row = await db.findOne<BillRow>({ model: "purchase_bill", where: byTenantAndId(tenantId, billId) });
	if (!row) throw new NotFoundError("Purchase bill", billId);
	const items = await db.findMany<PurchaseBillItem>({
		model: "purchase_bill_item",
		where: [
			{ field: "tenantId", operator: "eq", value: tenantId },
			{ field: "billId", operator: "eq", value: billId },
		],
	});
	return { ...row, items };
}

async function billNumberTaken(tx: FolioTransactionAdapter, tenantId: string, billNumber: string): Promise<boolean> {
	const clash = await tx.findOne<BillRow>({
		model: "purchase_bill",
		where: [
			{ field: "tenantId", operator: "eq", value: tenantId },
			{ field: "billNumber", operator: "eq", value: billNumber },
		],
	});
	return clash !== null;
}

async function resolveBillNumber(
	tx: FolioTransactionAdapter,
	tenantId: string,
	supplied: string | undefined,
): Promise<string> {
	if (supplied === undefined) {
		// Vendor numbers may already occupy a PO- number; skip those.
		for (;;) {
			const generated = await nextDocumentNumber(tx, tenantId, "PO");
			if (!(await billNumberTaken(tx, tenantId, generated))) return generated;
		}
	}
	const billNumber = assertText(supplied, "billNumber");
	if (await billNumberTaken(tx, tenantId, billNumber)) {
		throw new ConflictError(`Bill number "${billNumber}" already exists`, {
			details: { billNumber, reason: "DUPLICATE_NUMBER" },
		});
	}
	return billNumber;
}

// =============================================================================
// BILLS
// =============================================================================

export async function createBill(ctx: FolioContext, params: CreateBillParams): Promise<PurchaseBill> {
	const tenantId = getTenantId(ctx);
	const branchId = getBranchId(ctx);
	const actor = getActor(ctx);
	assertIsoDate(params.billDate, "billDate");
	if (params.dueDate !== undefined) assertIsoDate(params.dueDate, "dueDate");

	const { idempotencyKey, ...request } = params;

	return runOperation(
		ctx,
		{ type: "bill.create", params: { ...request } },
		async (tx) => {
			const vendor = await findParty(tx, tenantId, params.vendorId, "vendor");
			if (!vendor) throw new NotFoundError("Vendor", params.vendorId);

			const lines = await resolveItemPrices(tx, tenantId, params.items);
			const totals = computeDocumentTotals(lines, params.vatRate ?? 0, ctx.options.advanced.maxAmount);
			const roles = await requirePostingAccounts(tx, ctx, tenantId, ["inventory", "accountsPayable"]);
			const vat = totals.vatAmount > 0 ? await requirePostingAccounts(tx, ctx, tenantId, ["vatPayable"]) : null;

			const billId = randomUUID();
			const billNumber = await resolveBillNumber(tx, tenantId, params.billNumber);

			const entryLines: LedgerLine[] = [{ accountId: roles.inventory, debit: totals.subTotal }];
			if (vat) entryLines.push({ accountId: vat.vatPayable, debit: totals.vatAmount });
			entryLines.push({ accountId: roles.accountsPayable, credit: totals.totalAmount });

			const posting = await postEntries(tx, ctx, {
				tenantId,
				branchId,
				transactionDate: params.billDate,
				description: `Purchase bill ${billNumber}`,
				lines: entryLines,
				source: { purchaseBillId: billId, vendorId: vendor.id },
				createdBy: actor,
			});

			const now = nowIso();
			const row = await tx.create<BillRow>({
				model: "purchase_bill",
				data: {
					id: billId,
					tenantId,
					branchId,
					billNumber,
					vendorId: vendor.id,
					billDate: params.billDate,
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

			const items: PurchaseBillItem[] = [];
			for (const [i, line] of lines.entries()) {
				items.push(
					await tx.create<PurchaseBillItem>({
						model: "purchase_bill_item",
						data: {
							id: randomUUID(),
							tenantId,
							billId,
							productId: line.productId,
							description: line.description,
							quantity: line.quantity,
							unitPrice: line.unitPrice,
							amount: totals.lineAmounts[i] ?? 0,
							returnedQuantity: 0,
						},
					}),
				);
				await moveStock(tx, tenantId, line.productId, line.quantity, "purchase", billId);
			}

			logAfterCommit(ctx, "Purchase bill posted", {
				tenantId,
				billNumber,
				subTotal: totals.subTotal,
				vatAmount: totals.vatAmount,
				totalAmount: totals.totalAmount,
			});
			return { ...row, items };
		},
		{
			key: idempotencyKey,
			request: { ...request },
			resultId: (bill) => bill.id,
			load: (tx, id) => loadBill(tx, tenantId, id),
		},
	);
}

export async function getBill(ctx: FolioContext, billId: string): Promise<PurchaseBill> {
	return loadBill(ctx.adapter, getTenantId(ctx), billId);
}

export async function listBills(
	ctx: FolioContext,
	params: { status?: DocumentStatus; vendorId?: string; limit?: number; offset?: number } = {},
): Promise<PurchaseBill[]> {
	const tenantId = getTenantId(ctx);
	const where: Where[] = [{ field: "tenantId", operator: "eq", value: tenantId }];
	const branchId = getBranchId(ctx);
	if (branchId) where.push({ field: "branchId", operator: "eq", value: branchId });
	if (params.status) where.push({ field: "status", operator: "eq", value: params.status });
	if (params.vendorId) where.push({ field: "vendorId", operator: "eq", value: params.vendorId });

	const rows = await ctx.adapter.findMany<BillRow>({
		model: "purchase_bill",
		where,
		sortBy: [
			{ field: "billDate", direction: "desc" },
			{ field: "createdAt", direction: "desc" },
		],
		limit: params.limit,
		offset: params.offset,
	});
	return Promise.all(rows.map((row) => loadBill(ctx.adapter, tenantId, row.id)));
}

// =============================================================================
// PAYMENTS
// =============================================================================

export async function recordBillPayment(
	ctx: FolioContext,
	billId: string,
	params: PaymentParams,
): Promise<{ bill: PurchaseBill; payment: DocumentPayment }> {
	const tenantId = getTenantId(ctx);
	const actor = getActor(ctx);
	const amount = assertAmount(params.amount, "amount", { max: ctx.options.advanced.maxAmount });
	assertIsoDate(params.paymentDate, "paymentDate");

	const { idempotencyKey, ...request } = params;

	return runOperation(
		ctx,
		{ type: "bill.payment", params: { billId, ...request } },
		async (tx) => {
			const bill = await tx.findOne<BillRow>({
				model: "purchase_bill",
				where: byTenantAndId(tenantId, billId),
				forUpdate: true,
			});
			if (!bill) throw new NotFoundError("Purchase bill", billId);
			if (bill.status === "written_off") {
				throw new ValidationError(`Bill ${bill.billNumber} has been written off`, {
					reason: "DOCUMENT_WRITTEN_OFF",
					details: { billId },
				});
			}
			const roles = await requirePostingAccounts(tx, ctx, tenantId, ["accountsPayable"]);
			const paymentAccount = await assertPaymentAccount(tx, tenantId, params.paymentAccountId, roles.accountsPayable);

			const posting = await postEntries(tx, ctx, {
				tenantId,
				branchId: bill.branchId,
				transactionDate: params.paymentDate,
				description: `Payment for ${bill.billNumber}`,
				lines: [
					{ accountId: roles.accountsPayable, debit: amount },
					{ accountId: paymentAccount.id, credit: amount },
				],
				source: { purchaseBillId: bill.id, vendorId: bill.vendorId },
				createdBy: actor,
			});

			const payment = await tx.create<DocumentPayment>({
				model: "document_payment",
				data: {
					id: randomUUID(),
					tenantId,
					documentType: "purchase_bill",
					documentId: bill.id,
					amount,
					paymentAccountId: paymentAccount.id,
					paymentDate: params.paymentDate,
					reference: params.reference ?? null,
					postingId: posting.postingId,
					createdBy: actor,
					createdAt: nowIso(),
				},
			});

			const paidAmount = bill.paidAmount + amount;
			await tx.update<BillRow>({
				model: "purchase_bill",
				where: byTenantAndId(tenantId, bill.id),
				update: {
					paidAmount,
					status: statusAfterPayment(paidAmount, bill.totalAmount, bill.status),
					updatedAt: nowIso(),
				},
			});

			logAfterCommit(ctx, "Bill payment posted", { tenantId, billNumber: bill.billNumber, amount, paidAmount });
			return { bill: await loadBill(tx, tenantId, bill.id), payment };
		},
		{
			key: idempotencyKey,
			request: { billId, ...request },
			resultId: (result) => result.payment.id,
			load: async (tx, paymentId) => {
				const payment = await getDocumentPayment(tx, tenantId, paymentId);
				return { bill: await loadBill(tx, tenantId, payment.documentId), payment };
			},
		},
	);
}

export async function listBillPayments(ctx: FolioContext, billId: string): Promise<DocumentPayment[]> {
	return ctx.adapter.findMany<DocumentPayment>({
		model: "document_payment",
		where: [
			{ field: "tenantId", operator: "eq", value: getTenantId(ctx) },
			{ field: "documentType", operator: "eq", value: "purchase_bill" },
			{ field: "documentId", operator: "eq", value: billId },
		],
		sortBy: [
			{ field: "paymentDate", direction: "asc" },
			{ field: "createdAt", direction: "asc" },
		],
	});
}

// =============================================================================
// DEBIT NOTES (purchase returns)
// =============================================================================

export interface CreateDebitNoteParams {
	billId: string;
	noteDate: string;
	reason?: string;
	items: ReturnItemInput[];
	idempotencyKey?: string;
}

async function loadDebitNote(
	db: Pick<FolioTransactionAdapter, "findOne" | "findMany">,
	tenantId: string,
	noteId: string,
): Promise<DebitNote> {
	const row = await db.findOne<DebitNoteRow>({ model: "debit_note", where: byTenantAndId(tenantId, noteId) });
	if (!row) throw new NotFoundError("Debit note", noteId);
	const items = await db.findMany<ReturnNoteItem>({
		model: "debit_note_item",
		where: [
			{ field: "tenantId", operator: "eq", value: tenantId },
			{ field: "noteId", operator: "eq", value: noteId },
		],
	});
	return { ...row, items };
}

export async function createDebitNote(ctx: FolioContext, params: CreateDebitNoteParams): Promise<DebitNote> {
	const tenantId = getTenantId(ctx);
	const actor = getActor(ctx);
	assertIsoDate(params.noteDate, "noteDate");
	const requested = groupReturnItems(params.items);

	const { idempotencyKey, ...request } = params;

	return runOperation(
		ctx,
		{ type: "debit_note.create", params: { ...request } },
		async (tx) => {
			const bill = await tx.findOne<BillRow>({
				model: "purchase_bill",
				where: byTenantAndId(tenantId, params.billId),
				forUpdate: true,
			});
			if (!bill) throw new NotFoundError("Purchase bill", params.billId);

			const billItems = await tx.findMany<PurchaseBillItem>({
				model: "purchase_bill_item",
				where: [
					{ field: "tenantId", operator: "eq", value: tenantId },
					{ field: "billId", operator: "eq", value: bill.id },
				],
			});
			const byId = new Map(billItems.map((item) => [item.id, item]));

			const returns: { source: PurchaseBillItem; quantity: number; amount: number }[] = [];
			for (const [itemId, quantity] of requested) {
				const source = byId.get(itemId);
				if (!source) throw new NotFoundError("Bill item", itemId);
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

			const roles = await requirePostingAccounts(tx, ctx, tenantId, ["accountsPayable", "inventory"]);
			const noteId = randomUUID();
			const noteNumber = await nextDocumentNumber(tx, tenantId, "DN");

			const posting = await postEntries(tx, ctx, {
				tenantId,
				branchId: bill.branchId,
				transactionDate: params.noteDate,
				description: `Debit note ${noteNumber} for ${bill.billNumber}`,
				lines: [
					{ accountId: roles.accountsPayable, debit: totalAmount },
					{ accountId: roles.inventory, credit: totalAmount },
				],
				source: { debitNoteId: noteId, purchaseBillId: bill.id, vendorId: bill.vendorId },
				createdBy: actor,
			});

			const row = await tx.create<DebitNoteRow>({
				model: "debit_note",
				data: {
					id: noteId,
					tenantId,
					branchId: bill.branchId,
					noteNumber,
					billId: bill.id,
					vendorId: bill.vendorId,
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
						model: "debit_note_item",
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
				await tx.update<PurchaseBillItem>({
					model: "purchase_bill_item",
					where: byTenantAndId(tenantId, r.source.id),
					update: { returnedQuantity: r.source.returnedQuantity + r.quantity },
				});
				await moveStock(tx, tenantId, r.source.productId, -r.quantity, "purchase_return", noteId);
			}

			logAfterCommit(ctx, "Debit note posted", { tenantId, noteNumber, billNumber: bill.billNumber, totalAmount });
			return { ...row, items };
		},
		{
			key: idempotencyKey,
			request: { ...request },
			resultId: (note) => note.id,
			load: (tx, id) => loadDebitNote(tx, tenantId, id),
		},
	);
}

export async function getDebitNote(ctx: FolioContext, noteId: string): Promise<DebitNote> {
	return loadDebitNote(ctx.adapter, getTenantId(ctx), noteId);
}

export async function listDebitNotes(ctx: FolioContext, params: { billId?: string } = {}): Promise<DebitNote[]> {
	const tenantId = getTenantId(ctx);
	const where: Where[] = [{ field: "tenantId", operator: "eq", value: tenantId }];
	if (params.billId) where.push({ field: "billId", operator: "eq", value: params.billId });
	const rows = await ctx.adapter.findMany<DebitNoteRow>({
		model: "debit_note",
		where,
		sortBy: { field: "noteNumber", direction: "asc" },
	});
	return Promise.all(rows.map((row) => loadDebitNote(ctx.adapter, tenantId, row.id)));
}
