// =============================================================================
// OPERATION RUNNER
// =============================================================================
// Every mutating operation goes through here:
//   1. before-hooks (may cancel)
//   2. one adapter transaction, with the idempotency check and save inside it
//   3. after-commit callbacks queued during the transaction (log lines)
//   4. after-hooks with the committed result

import type { FolioContext, FolioOperation, FolioTransactionAdapter } from "@folio/core";
import {
	computeRequestFingerprint,
	queueAfterTransactionHook,
	runWithTransactionContext,
	ValidationError,
} from "@folio/core";
import { runAfterOperationHooks, runBeforeOperationHooks } from "../context/hooks.js";
import { checkIdempotencyKeyInTx, saveIdempotencyKeyInTx } from "./idempotency.js";
import { getTenantId } from "./scope.js";

export interface IdempotencyOptions<T> {
	key: string | undefined;
	/** Request payload the fingerprint is computed from */
	request: Record<string, unknown>;
	/** Id stored with the key; `load` receives it on a retry */
	resultId: (result: T) => string;
	load: (tx: FolioTransactionAdapter, resultId: string) => Promise<T>;
}

export async function runOperation<T>(
	ctx: FolioContext,
	operation: FolioOperation,
	fn: (tx: FolioTransactionAdapter) => Promise<T>,
	idempotency?: IdempotencyOptions<T>,
): Promise<T> {
	const before = await runBeforeOperationHooks(ctx, operation);
	if (before.cancelled) {
		throw new ValidationError(`Operation "${operation.type}" was cancelled: ${before.reason}`, {
			reason: "OPERATION_CANCELLED",
			details: { operation: operation.type, pluginId: before.pluginId },
		});
	}

	const tenantId = getTenantId(ctx);
	let replayed = false;

	const result = await runWithTransactionContext(
		() =>
			ctx.adapter.transaction(async (tx) => {
				const key = idempotency?.key;
				if (!idempotency || !key) return fn(tx);

				const check = {
					tenantId,
					key,
					operation: operation.type,
					fingerprint: computeRequestFingerprint(idempotency.request),
				};
				const existing = await checkIdempotencyKeyInTx(tx, check);
				if (existing.alreadyProcessed) {
					replayed = true;
					return idempotency.load(tx, existing.resultId);
				}

				const value = await fn(tx);
				await saveIdempotencyKeyInTx(tx, ctx, { ...check, resultId: idempotency.resultId(value) });
				return value;
			}),
		(error, index) => {
			ctx.logger.error("After-commit callback failed", {
				error: String(error),
				index,
				operation: operation.type,
			});
		},
	);

	if (replayed) {
		ctx.logger.debug("Idempotent retry returned the stored result", {
			tenantId,
			operation: operation.type,
			key: idempotency?.key,
		});
		return result;
	}

	await runAfterOperationHooks(ctx, operation, result);
	return result;
}

/** Log at `info` once the surrounding transaction has committed. */
export function logAfterCommit(ctx: FolioContext, message: string, data: Record<string, unknown>): void {
	queueAfterTransactionHook(() => {
		ctx.logger.info(message, data);
	});
}
