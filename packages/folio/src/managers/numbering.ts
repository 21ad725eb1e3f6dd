// =============================================================================
// SEQUENCES & DOCUMENT NUMBERS
// =============================================================================
// Per-tenant counters in `sequence_counter`, incremented inside the posting
// transaction under an advisory lock on (tenant, name). A rolled-back posting
// therefore consumes no number.

import type { FolioTransactionAdapter } from "@folio/core";
import { lockKeyFor } from "@folio/core";

export type DocumentPrefix = "JV" | "INV" | "PO" | "CN" | "DN" | "FT" | "PS";

interface SequenceCounterRow {
	id: string;
	tenantId: string;
	name: string;
	value: number;
}

/**
 * Reserve `count` consecutive values of a counter. Returns the first one.
 */
export async function reserveSequence(
	tx: FolioTransactionAdapter,
	tenantId: string,
	name: string,
	count = 1,
): Promise<number> {
	await tx.advisoryLock(lockKeyFor(tenantId, "sequence", name));

	const id = `${tenantId}:${name}`;
	const current = await tx.findOne<SequenceCounterRow>({
		model: "sequence_counter",
		where: [{ field: "id", operator: "eq", value: id }],
		forUpdate: true,
	});

	if (!current) {
		await tx.create<SequenceCounterRow>({
			model: "sequence_counter",
			data: { id, tenantId, name, value: count },
		});
		return 1;
	}

	await tx.update<SequenceCounterRow>({
		model: "sequence_counter",
		where: [{ field: "id", operator: "eq", value: id }],
		update: { value: current.value + count },
	});
	return current.value + 1;
}

/** `INV-00001` */
export function formatDocumentNumber(prefix: DocumentPrefix, value: number): string {
	return `${prefix}-${String(value).padStart(5, "0")}`;
}

export async function nextDocumentNumber(
	tx: FolioTransactionAdapter,
	tenantId: string,
	prefix: DocumentPrefix,
): Promise<string> {
	return formatDocumentNumber(prefix, await reserveSequence(tx, tenantId, prefix));
}
