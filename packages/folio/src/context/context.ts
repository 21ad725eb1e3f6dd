// =============================================================================
// CONTEXT BUILDER
// =============================================================================
// Builds FolioContext from FolioOptions. Resolves adapter and logger, merges
// config defaults and orders plugins by their dependencies.

import type {
	FolioAdapter,
	FolioContext,
	FolioOptions,
	FolioPlugin,
	ResolvedAdvancedOptions,
	ResolvedFolioOptions,
} from "@folio/core";
import { ConfigurationError } from "@folio/core";
import { createConsoleLogger } from "@folio/core/logger";
import { validateConfig } from "../config/index.js";
import { getFolioTables, getNumericColumns } from "../db/schema.js";
import { DEFAULT_CHART } from "../managers/chart-of-accounts.js";
import { buildHookCache } from "./hooks.js";

// =============================================================================
// DEFAULT CONFIG VALUES
// =============================================================================

const DEFAULT_ADVANCED: ResolvedAdvancedOptions = {
	idempotencyTTL: 24 * 60 * 60 * 1000, // 24 hours in ms
	maxAmount: 1_000_000_000_00,
};

// =============================================================================
// BUILD CONTEXT
// =============================================================================

export async function buildContext(options: FolioOptions): Promise<FolioContext> {
	validateConfig(options);

	const adapter: FolioAdapter =
		typeof options.database === "function" ? options.database() : options.database;

	const logger = options.logger ?? createConsoleLogger();

	const advanced: ResolvedAdvancedOptions = {
		...DEFAULT_ADVANCED,
		...(options.advanced ?? {}),
	};

	const schema = options.schema ?? "folio";
	const resolvedOptions: ResolvedFolioOptions = {
		currency: options.currency ?? "USD",
		schema,
		defaultChart: options.defaultChart ?? DEFAULT_CHART,
		advanced,
	};

	const plugins = sortPlugins(options.plugins ?? []);

	// Propagate schema and integer columns to adapter options for the SQL builder
	if (adapter.options) {
		adapter.options.schema = schema;
		adapter.options.numericColumns = getNumericColumns(getFolioTables({ plugins }));
	}

	if (!plugins.some((p) => p.id === "audit-log")) {
		logger.debug("audit-log plugin is not registered; operations will not be recorded");
	}

	return {
		adapter,
		options: resolvedOptions,
		logger,
		plugins,
		postingAccounts: new Map(),
		_hookCache: buildHookCache(plugins),
	};
}

// =============================================================================
// PLUGIN DEPENDENCY VALIDATION & TOPOLOGICAL SORT
// =============================================================================

export function sortPlugins(plugins: FolioPlugin[]): FolioPlugin[] {
	if (plugins.length <= 1) return plugins;

	const pluginMap = new Map<string, FolioPlugin>();
	for (const plugin of plugins) {
		if (pluginMap.has(plugin.id)) {
			throw new ConfigurationError(`Duplicate plugin ID: "${plugin.id}"`);
		}
		pluginMap.set(plugin.id, plugin);
	}

	for (const plugin of plugins) {
		for (const dep of plugin.dependencies ?? []) {
			if (!pluginMap.has(dep)) {
				throw new ConfigurationError(
					`Plugin "${plugin.id}" requires plugin "${dep}" which is not registered`,
				);
			}
		}
	}

	// Kahn's algorithm
	const inDegree = new Map<string, number>();
	const adj = new Map<string, string[]>();

	for (const plugin of plugins) {
		inDegree.set(plugin.id, 0);
		adj.set(plugin.id, []);
	}

	for (const plugin of plugins) {
		for (const dep of plugin.dependencies ?? []) {
			adj.get(dep)?.push(plugin.id);
			inDegree.set(plugin.id, (inDegree.get(plugin.id) ?? 0) + 1);
		}
	}

	const queue: string[] = [];
	for (const [id, deg] of inDegree) {
		if (deg === 0) queue.push(id);
	}

	const sorted: FolioPlugin[] = [];
	for (let id = queue.shift(); id !== undefined; id = queue.shift()) {
		const plugin = pluginMap.get(id);
		if (plugin) sorted.push(plugin);
		for (const neighbor of adj.get(id) ?? []) {
			const newDeg = (inDegree.get(neighbor) ?? 1) - 1;
			inDegree.set(neighbor, newDeg);
			if (newDeg === 0) queue.push(neighbor);
		}
	}

	if (sorted.length !== plugins.length) {
		const unsorted = plugins.filter((p) => !sorted.includes(p)).map((p) => p.id);
		throw new ConfigurationError(`Circular plugin dependency detected among: ${unsorted.join(", ")}`);
	}

	return sorted;
}
