// =============================================================================
// SQL ADAPTER METHODS — CRUD built once on top of a minimal executor
// =============================================================================
// SQL adapters only differ in how they execute a parameterized statement.
// Each one implements `SqlExecutor`; the CRUD SQL is built here.

import type { FolioTransactionAdapter, SortBy, Where } from "./adapter.js";
import { buildOrderByClause, buildWhereClause, keysToCamel, keysToSnake } from "./adapter-utils.js";
import { createTableResolver } from "./schema-prefix.js";

// =============================================================================
// SQL EXECUTOR INTERFACE
// =============================================================================

export interface SqlExecutor {
	/** Execute a statement and return its rows (snake_case keys). */
	query(sql: string, params: unknown[]): Promise<Record<string, unknown>[]>;
	/** Execute an INSERT/UPDATE/DELETE and return the affected row count. */
	mutate(sql: string, params: unknown[]): Promise<number>;
	/** Acquire a transaction-scoped advisory lock. */
	advisoryLock(key: number): Promise<void>;
}

// =============================================================================
// SHARED CRUD BUILDER
// =============================================================================

/**
 * Build the standard adapter methods from a SqlExecutor.
 * Returns everything a FolioTransactionAdapter needs except `id` and `options`.
 */
export function buildSqlAdapterMethods(
	executor: SqlExecutor,
	getSchema: () => string,
	getNumericColumns: () => Record<string, readonly string[]> = () => ({}),
): Omit<FolioTransactionAdapter, "id" | "options"> {
	// Rows come back snake_case, with BIGINT as text and timestamps as Date.
	function fromRow(model: string, row: Record<string, unknown>): Record<string, unknown> {
		const record = keysToCamel(row);
		for (const [key, value] of Object.entries(record)) {
			if (value instanceof Date) record[key] = value.toISOString();
		}
		for (const column of getNumericColumns()[model] ?? []) {
			const value = record[column];
			if (typeof value === "string") record[column] = Number(value);
		}
		return record;
	}

	return {
		create: async <T extends object>({
			model,
			data,
		}: {
			model: string;
			data: T;
		}): Promise<T> => {
			const t = createTableResolver(getSchema());
			const snakeData = keysToSnake(data);
			const columns = Object.keys(snakeData);
			const values = Object.values(snakeData).map(toParam);

			if (columns.length === 0) {
				throw new Error(`Cannot insert empty data into ${model}`);
			}

			const columnList = columns.map((c) => `"${c}"`).join(", ");
			const placeholders = columns.map((_, i) => `$${i + 1}`).join(", ");
			const query = `INSERT INTO ${t(model)} (${columnList}) VALUES (${placeholders}) RETURNING *`;

			const rows = await executor.query(query, values);
			const row = rows[0];
			if (!row) {
				throw new Error(`Insert into ${model} returned no rows`);
			}
			return fromRow(model, row) as T;
		},

		findOne: async <T>({
			model,
			where,
			forUpdate,
		}: {
			model: string;
			where: Where[];
			forUpdate?: boolean;
		}): Promise<T | null> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where);
			let query = `SELECT * FROM ${t(model)} WHERE ${clause} LIMIT 1`;
			if (forUpdate) {
				query += " FOR UPDATE";
			}

			const rows = await executor.query(query, params);
			const row = rows[0];
			if (!row) return null;
			return fromRow(model, row) as T;
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
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where ?? []);
			let query = `SELECT * FROM ${t(model)} WHERE ${clause}${buildOrderByClause(sortBy)}`;

			if (limit !== undefined) {
				params.push(limit);
				query += ` LIMIT $${params.length}`;
			}

			if (offset !== undefined) {
				params.push(offset);
				query += ` OFFSET $${params.length}`;
			}

			const rows = await executor.query(query, params);
			return rows.map((r) => fromRow(model, r) as T);
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
			const snakeData = keysToSnake(updateData);
			const setCols = Object.keys(snakeData);
			const setValues = Object.values(snakeData).map(toParam);

			if (setCols.length === 0) {
				throw new Error(`Cannot update ${model} with empty data`);
			}

			const setClause = setCols.map((c, i) => `"${c}" = $${i + 1}`).join(", ");
			const { clause: whereClause, params: whereParams } = buildWhereClause(
				where,
				setCols.length + 1,
			);

			const t = createTableResolver(getSchema());
			const query = `UPDATE ${t(model)} SET ${setClause} WHERE ${whereClause} RETURNING *`;

			const rows = await executor.query(query, [...setValues, ...whereParams]);
			const row = rows[0];
			if (!row) return null;
			return fromRow(model, row) as T;
		},

		delete: async ({ model, where }: { model: string; where: Where[] }): Promise<void> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where);
			await executor.mutate(`DELETE FROM ${t(model)} WHERE ${clause}`, params);
		},

		count: async ({ model, where }: { model: string; where?: Where[] }): Promise<number> => {
			const t = createTableResolver(getSchema());
			const { clause, params } = buildWhereClause(where ?? []);
			const query = `SELECT COUNT(*)::int AS count FROM ${t(model)} WHERE ${clause}`;

			const rows = await executor.query(query, params);
			return Number(rows[0]?.count ?? 0);
		},

		advisoryLock: executor.advisoryLock.bind(executor),
	};
}

/** JSON columns are sent as text; everything else passes through. */
function toParam(value: unknown): unknown {
	if (value !== null && typeof value === "object" && !(value instanceof Date)) {
		return JSON.stringify(value);
	}
	return value;
}
