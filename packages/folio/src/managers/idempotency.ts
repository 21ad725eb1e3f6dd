// =============================================================================
// IDEMPOTENCY KEY HANDLER
// =============================================================================
// Dedupes document creation. The key, operation name and a fingerprint of the
// request are stored in the same transaction as the document; a retry with a
// matching fingerprint reloads the stored result instead of posting again.
// Keys expire after `advanced.idempotencyTTL`.

import type { FolioContext, FolioTransactionAdapter, Where } from "@folio/core";
import { ConflictError, lockKeyFor } from "@folio/core";
import { nowIso } from "./scope.js";

export interface IdempotencyKeyRow {
	id: string;
	tenantId: string;
	key: string;
	operation: string;
	fingerprint: string;
	resultId: string;
	expiresAt: string;
	createdAt: string;
}

export interface IdempotencyCheck {
	tenantId: string;
	key: string;
	operation: string;
	fingerprint: string;
}

/**
 * Check an idempotency key inside the posting transaction. Takes an advisory
 * lock on the key so concurrent retries queue behind the first.
 *
 * Rules:
 * - same key, same operation and fingerprint -> already processed
 * - same key, anything else different -> ConflictError (IDEMPOTENCY_MISMATCH)
 * - expired key -> removed, processed as new
 */
export async function checkIdempotencyKeyInTx(
	tx: FolioTransactionAdapter,
	params: IdempotencyCheck,
): Promise<{ alreadyProcessed: false } | { alreadyProcessed: true; resultId: string }> {
	await tx.advisoryLock(lockKeyFor(params.tenantId, "idempotency", params.key));

	const id = `${params.tenantId}:${params.key}`;
	const row = await tx.findOne<IdempotencyKeyRow>({
		model: "idempotency_key",
		where: [{ field: "id", operator: "eq", value: id }],
		forUpdate: true,
	});
	if (!row) return { alreadyProcessed: false };

	if (Date.parse(row.expiresAt) <= Date.now()) {
		await tx.delete({ model: "idempotency_key", where: [{ field: "id", operator: "eq", value: id }] });
		return { alreadyProcessed: false };
	}

	if (row.operation !== params.operation) {
		throw new ConflictError(
			`Idempotency key "${params.key}" was already used for ${row.operation}`,
			{ code: "IDEMPOTENCY_MISMATCH", details: { key: params.key, field: "operation" } },
		);
	}
	if (row.fingerprint !== params.fingerprint) {
		throw new ConflictError(
			`Idempotency key "${params.key}" was already used with a different request`,
			{ code: "IDEMPOTENCY_MISMATCH", details: { key: params.key, field: "request" } },
		);
	}

	return { alreadyProcessed: true, resultId: row.resultId };
}

export async function saveIdempotencyKeyInTx(
	tx: FolioTransactionAdapter,
	ctx: FolioContext,
	params: IdempotencyCheck & { resultId: string },
): Promise<void> {
	const now = Date.now();
	await tx.create<IdempotencyKeyRow>({
		model: "idempotency_key",
		data: {
			id: `${params.tenantId}:${params.key}`,
			tenantId: params.tenantId,
			key: params.key,
			operation: params.operation,
			fingerprint: params.fingerprint,
			resultId: params.resultId,
			expiresAt: new Date(now + ctx.options.advanced.idempotencyTTL).toISOString(),
			createdAt: new Date(now).toISOString(),
		},
	});
}

/**
 * Remove expired idempotency keys across all tenants.
 */
export async function cleanupExpiredKeys(ctx: FolioContext): Promise<{ deleted: number }> {
	const where: Where[] = [{ field: "expiresAt", operator: "lt", value: nowIso() }];
	const deleted = await ctx.adapter.count({ model: "idempotency_key", where });
	if (deleted > 0) {
		await ctx.adapter.delete({ model: "idempotency_key", where });
		ctx.logger.info("Cleaned up expired idempotency keys", { count: deleted });
	}
	return { deleted };
}
