// =============================================================================
// MEMORY ADAPTER — FolioAdapter implementation backed by in-memory Maps
// =============================================================================
// For tests and single-process embedding; no database required.
// Data lives in nested Maps: model name -> record id -> record.
// Transactions run one at a time and roll back by restoring a snapshot.

import { randomUUID } from "node:crypto";
import type { FolioAdapter, FolioAdapterOptions, FolioTransactionAdapter, SortBy, Where } from "@folio/core/db";
import { toSortList } from "@folio/core/db";

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

type StoredRecord = Record<string, unknown>;
type Store = Map<string, Map<string, StoredRecord>>;

const OPTIONS: FolioAdapterOptions = {
	supportsAdvisoryLocks: false,
	supportsForUpdate: false,
	dialectName: "memory",
};

function cloneStore(store: Store): Store {
	const clone: Store = new Map();
	for (const [model, records] of store) {
		const recordClone = new Map<string, StoredRecord>();
		for (const [id, record] of records) {
			recordClone.set(id, structuredClone(record));
		}
		clone.set(model, recordClone);
	}
	return clone;
}

function getModelStore(store: Store, model: string): Map<string, StoredRecord> {
	let modelStore = store.get(model);
	if (!modelStore) {
		modelStore = new Map();
		store.set(model, modelStore);
	}
	return modelStore;
}

/** Ordering for comparable scalars; null when the values are not comparable. */
function compareValues(a: unknown, b: unknown): number | null {
	if (typeof a === "number" && typeof b === "number") return a - b;
	if (typeof a === "string" && typeof b === "string") {
		return a < b ? -1 : a > b ? 1 : 0;
	}
	if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
	return null;
}

function likeToRegExp(pattern: string): RegExp {
	const source = pattern
		.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
		.replace(/%/g, ".*")
		.replace(/_/g, ".");
	return new RegExp(`^${source}$`, "i");
}

function matchesCondition(record: StoredRecord, condition: Where): boolean {
	const value = record[condition.field];

	switch (condition.operator) {
		case "eq":
			return value === condition.value;
		case "ne":
			return value !== condition.value;
		case "gt": {
			const c = compareValues(value, condition.value);
			return c !== null && c > 0;
		}
		case "gte": {
			const c = compareValues(value, condition.value);
			return c !== null && c >= 0;
		}
		case "lt": {
			const c = compareValues(value, condition.value);
			return c !== null && c < 0;
		}
		case "lte": {
			const c = compareValues(value, condition.value);
			return c !== null && c <= 0;
		}
		case "in":
			return Array.isArray(condition.value) && condition.value.includes(value);
		case "like":
			if (typeof value !== "string" || typeof condition.value !== "string") {
				return false;
			}
			return likeToRegExp(condition.value).test(value);
		case "is_null":
			return value === null || value === undefined;
		case "is_not_null":
			return value !== null && value !== undefined;
		default:
			return false;
	}
}

function filterRecords(records: Map<string, StoredRecord>, where: Where[]): StoredRecord[] {
	const results: StoredRecord[] = [];
	for (const record of records.values()) {
		if (where.every((w) => matchesCondition(record, w))) {
			results.push(record);
		}
	}
	return results;
}

/** Stable multi-column sort; nulls sort last in either direction. */
function sortRecords(records: StoredRecord[], sortBy: SortBy[]): StoredRecord[] {
	return [...records].sort((a, b) => {
		for (const { field, direction } of sortBy) {
			const aVal = a[field];
			const bVal = b[field];
			if (aVal === bVal) continue;
			if (aVal === null || aVal === undefined) return 1;
			if (bVal === null || bVal === undefined) return -1;

			const comparison = compareValues(aVal, bVal) ?? 0;
			if (comparison !== 0) {
				return direction === "desc" ? -comparison : comparison;
			}
		}
		return 0;
	});
}

function recordId(record: StoredRecord): string {
	const id = record.id;
	if (typeof id !== "string") {
		throw new Error("Memory adapter records need a string id");
	}
	return id;
}

// =============================================================================
// ADAPTER METHODS BUILDER
// =============================================================================

/**
 * Build the adapter methods over a store reference. `getStore` is a closure
 * so a rollback can swap the store underneath.
 */
function buildAdapterMethods(getStore: () => Store): Omit<FolioTransactionAdapter, "id" | "options"> {
	return {
		create: async <T extends object>({ model, data }: { model: string; data: T }): Promise<T> => {
			const modelStore = getModelStore(getStore(), model);

			const record: StoredRecord = structuredClone(Object.fromEntries(Object.entries(data)));
			if (record.id === undefined || record.id === null) {
				record.id = randomUUID();
			}
			const id = recordId(record);
			if (modelStore.has(id)) {
				throw new Error(`Duplicate id "${id}" in ${model}`);
			}

			modelStore.set(id, record);
			return structuredClone(record) as T;
		},

		findOne: async <T>({ model, where }: { model: string; where: Where[]; forUpdate?: boolean }): Promise<T | null> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return null;

			const first = filterRecords(modelStore, where)[0];
			if (!first) return null;
			return structuredClone(first) as T;
		},

		findMany: async <T>({
			model,
			where,
			limit,
			offset,
			sortBy,
		}: {
			model: string;
			where?: Where[];
			limit?: number;
			offset?: number;
			sortBy?: SortBy | SortBy[];
		}): Promise<T[]> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return [];

			let results = filterRecords(modelStore, where ?? []);

			const sortList = toSortList(sortBy);
			if (sortList.length > 0) {
				results = sortRecords(results, sortList);
			}
			if (offset !== undefined) {
				results = results.slice(offset);
			}
			if (limit !== undefined) {
				results = results.slice(0, limit);
			}

			return results.map((r) => structuredClone(r) as T);
		},

		update: async <T>({
			model,
			where,
			update: updateData,
		}: {
			model: string;
			where: Where[];
			update: Record<string, unknown>;
		}): Promise<T | null> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return null;

			const first = filterRecords(modelStore, where)[0];
			if (!first) return null;

			const changes = Object.fromEntries(Object.entries(updateData).filter(([, v]) => v !== undefined));
			const updated: StoredRecord = { ...first, ...structuredClone(changes) };
			modelStore.set(recordId(updated), updated);
			return structuredClone(updated) as T;
		},

		delete: async ({ model, where }: { model: string; where: Where[] }): Promise<void> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return;

			for (const match of filterRecords(modelStore, where)) {
				modelStore.delete(recordId(match));
			}
		},

		count: async ({ model, where }: { model: string; where?: Where[] }): Promise<number> => {
			const modelStore = getStore().get(model);
			if (!modelStore) return 0;

			if (!where || where.length === 0) {
				return modelStore.size;
			}
			return filterRecords(modelStore, where).length;
		},

		// Transactions are already serialized, so there is nothing to lock.
		advisoryLock: async (_key: number): Promise<void> => {},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create a FolioAdapter backed by an in-memory store.
 *
 * @example
 * ```ts
 * import { memoryAdapter } from "@folio/memory-adapter";
 * import { createFolio } from "folio";
 *
 * const folio = createFolio({ database: memoryAdapter() });
 * ```
 */
export function memoryAdapter(): FolioAdapter {
	let store: Store = new Map();
	let queue: Promise<unknown> = Promise.resolve();

	const getStore = () => store;
	const methods = buildAdapterMethods(getStore);

	async function runTransaction<T>(fn: (tx: FolioTransactionAdapter) => Promise<T>): Promise<T> {
		const snapshot = cloneStore(store);
		try {
			const txAdapter: FolioTransactionAdapter = {
				id: "memory",
				...buildAdapterMethods(getStore),
				options: { ...OPTIONS },
			};
			return await fn(txAdapter);
		} catch (error) {
			store = snapshot;
			throw error;
		}
	}

	return {
		id: "memory",
		...methods,

		transaction: <T>(fn: (tx: FolioTransactionAdapter) => Promise<T>): Promise<T> => {
			const run = queue.then(() => runTransaction(fn));
			// Keep the chain alive after a failed transaction; the caller gets the rejection.
			queue = run.catch(() => undefined);
			return run;
		},

		options: { ...OPTIONS },
	};
}
