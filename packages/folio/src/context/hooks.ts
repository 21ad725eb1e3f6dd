// =============================================================================
// PLUGIN HOOKS RUNNER
// =============================================================================
// Iterates registered plugins and invokes matching operation hooks.
// Before-hooks propagate errors and may cancel the operation.
// After-hooks catch and log errors (never roll back the operation).
//
// Hook presence is pre-computed via buildHookCache() at context creation, so
// the runners only iterate plugins that define the relevant hook.

import type { FolioContext, FolioOperation, FolioPlugin } from "@folio/core";

export interface HookCache {
	beforeOperation: FolioPlugin[];
	afterOperation: FolioPlugin[];
}

/** Build a hook cache from the plugin list. Call once at context creation. */
export function buildHookCache(plugins: FolioPlugin[]): HookCache {
	return {
		beforeOperation: plugins.filter((p) => p.operationHooks?.before?.length),
		afterOperation: plugins.filter((p) => p.operationHooks?.after?.length),
	};
}

// =============================================================================
// BEFORE HOOKS — sequential, errors propagate
// =============================================================================

/**
 * Run before-operation hooks. Returns `{ cancelled: true, reason }` if any
 * plugin cancels the operation, otherwise `{ cancelled: false }`.
 */
export async function runBeforeOperationHooks(
	ctx: FolioContext,
	operation: FolioOperation,
): Promise<{ cancelled: false } | { cancelled: true; reason: string; pluginId: string }> {
	const plugins = ctx._hookCache?.beforeOperation ?? ctx.plugins;
	for (const plugin of plugins) {
		if (!plugin.operationHooks?.before) continue;
		for (const hook of plugin.operationHooks.before) {
			if (!hook.matcher(operation)) continue;
			const result = await hook.handler({
				operation,
				context: ctx,
				requestContext: ctx.requestContext,
			});
			if (result?.cancel) {
				return { cancelled: true, reason: result.reason, pluginId: plugin.id };
			}
		}
	}
	return { cancelled: false };
}

// =============================================================================
// AFTER HOOKS — parallel, errors caught and logged
// =============================================================================

/**
 * Run after-operation hooks with the committed result. Errors are caught and
 * logged per plugin.
 */
export async function runAfterOperationHooks(
	ctx: FolioContext,
	operation: FolioOperation,
	result: unknown,
): Promise<void> {
	const plugins = ctx._hookCache?.afterOperation ?? ctx.plugins;
	if (plugins.length === 0) return;

	const promises: Promise<void>[] = [];
	for (const plugin of plugins) {
		if (!plugin.operationHooks?.after) continue;
		for (const hook of plugin.operationHooks.after) {
			if (!hook.matcher(operation)) continue;
			promises.push(
				hook
					.handler({ operation, context: ctx, requestContext: ctx.requestContext, result })
					.catch((err: unknown) => {
						ctx.logger.error(`Plugin "${plugin.id}" operationHooks.after failed`, {
							error: String(err),
							operation: operation.type,
						});
					}),
			);
		}
	}
	if (promises.length > 0) await Promise.all(promises);
}
