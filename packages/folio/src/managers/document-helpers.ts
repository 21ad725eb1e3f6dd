// =============================================================================
// DOCUMENT TOTALS & STATUS
// =============================================================================

import type { DocumentStatus } from "@folio/core";
import { applyBasisPoints, assertAmount, assertQuantity, rateToBasisPoints, ValidationError } from "@folio/core";

export interface PricedLine {
	quantity: number;
	unitPrice: number;
}

export interface DocumentTotals {
	/** quantity * unitPrice per line, in input order */
	lineAmounts: number[];
	subTotal: number;
	/** Basis points */
	vatRate: number;
	vatAmount: number;
	totalAmount: number;
}

/**
 * subTotal = sum(quantity * unitPrice); vatAmount = subTotal * rate rounded
 * half up; totalAmount = subTotal + vatAmount.
 *
 * @param vatRatePercent - percent with at most two decimals, e.g. 7.5
 */
export function computeDocumentTotals(lines: PricedLine[], vatRatePercent: number, maxAmount: number): DocumentTotals {
	if (lines.length === 0) {
		throw new ValidationError("A document needs at least one item", { reason: "NO_ITEMS" });
	}
	const vatRate = rateToBasisPoints(vatRatePercent);

	const lineAmounts = lines.map((line, i) => {
		const quantity = assertQuantity(line.quantity, `items[${i}].quantity`);
		const unitPrice = assertAmount(line.unitPrice, `items[${i}].unitPrice`, { max: maxAmount });
		return quantity * unitPrice;
	});
	const subTotal = lineAmounts.reduce((sum, amount) => sum + amount, 0);
	const vatAmount = applyBasisPoints(subTotal, vatRate);
	const totalAmount = assertAmount(subTotal + vatAmount, "totalAmount", { max: maxAmount });

	return { lineAmounts, subTotal, vatRate, vatAmount, totalAmount };
}

/**
 * Status after a payment: paid when nothing is left, partial when something
 * was paid, otherwise unchanged. Overpayment counts as paid.
 */
export function statusAfterPayment(paidAmount: number, totalAmount: number, current: DocumentStatus): DocumentStatus {
	if (paidAmount >= totalAmount) return "paid";
	if (paidAmount > 0) return "partial";
	return current;
}

export function outstandingAmount(doc: { totalAmount: number; paidAmount: number }): number {
	return Math.max(doc.totalAmount - doc.paidAmount, 0);
}
