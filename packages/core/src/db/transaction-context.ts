// =============================================================================
// TRANSACTION CONTEXT — AsyncLocalStorage-based post-commit callback queue
// =============================================================================
// Code running inside a posting registers callbacks that run only AFTER the
// surrounding transaction commits: log lines, after-operation hooks.

import { AsyncLocalStorage } from "node:async_hooks";

type AfterCommitCallback = () => void | Promise<void>;

interface TransactionStore {
	callbacks: AfterCommitCallback[];
}

const storage = new AsyncLocalStorage<TransactionStore>();

/**
 * Queue a callback to run after the current transaction commits.
 * Outside a transaction context the callback runs immediately.
 *
 * @example
 * ```ts
 * queueAfterTransactionHook(() => {
 *   ctx.logger.info("Invoice posted", { invoiceNumber });
 * });
 * ```
 */
export function queueAfterTransactionHook(cb: AfterCommitCallback): void {
	const store = storage.getStore();
	if (store) {
		store.callbacks.push(cb);
		return;
	}
	void Promise.resolve()
		.then(cb)
		.catch((error: unknown) => {
			console.error("[folio] after-commit callback failed", error);
		});
}

/** True while running inside `runWithTransactionContext`. */
export function isInTransactionContext(): boolean {
	return storage.getStore() !== undefined;
}

/**
 * Run `fn` within a transaction context, then drain all queued callbacks
 * once `fn` resolves. If `fn` throws, the callbacks are discarded.
 *
 * @param onCallbackError - Invoked when an after-commit callback throws.
 *   Without it, failures go to stderr.
 */
export async function runWithTransactionContext<T>(
	fn: () => Promise<T>,
	onCallbackError?: (error: unknown, index: number) => void,
): Promise<T> {
	const store: TransactionStore = { callbacks: [] };

	const result = await storage.run(store, fn);

	for (let i = 0; i < store.callbacks.length; i++) {
		try {
			const cb = store.callbacks[i];
			if (cb) await cb();
		} catch (error) {
			if (onCallbackError) {
				onCallbackError(error, i);
			} else {
				console.error("[folio] after-commit callback failed", error);
			}
		}
	}

	return result;
}
