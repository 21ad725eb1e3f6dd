// =============================================================================
// DRIZZLE ADAPTER — FolioAdapter implementation backed by Drizzle ORM
// =============================================================================
// All statements are plain parameterized SQL run through `db.execute`, so the
// same CRUD builder serves every table without a typed Drizzle schema per model.

import type { FolioAdapter, FolioAdapterOptions, FolioTransactionAdapter, SqlExecutor } from "@folio/core/db";
import { buildSqlAdapterMethods } from "@folio/core/db";
import { type SQL, sql } from "drizzle-orm";

// =============================================================================
// TYPES
// =============================================================================

/**
 * The part of a Drizzle database (or transaction) handle the adapter uses.
 * `drizzle(pool)` from `drizzle-orm/node-postgres` satisfies it.
 */
export interface DrizzleDatabase {
	execute(query: SQL): Promise<unknown>;
	transaction<T>(fn: (tx: DrizzleDatabase) => Promise<T>): Promise<T>;
}

export interface DrizzleAdapterConfig {
	/** PostgreSQL schema holding the folio tables. Default: `"public"` */
	schema?: string;
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

/**
 * Turn `$1, $2` placeholders plus a params array into a drizzle `sql` template,
 * so values are still sent as bound parameters.
 */
export function buildDrizzleSql(query: string, params: unknown[]): SQL {
	const chunks: SQL[] = [];
	let lastIdx = 0;
	const regex = /\$(\d+)/g;
	let match: RegExpExecArray | null = regex.exec(query);

	while (match !== null) {
		if (match.index > lastIdx) {
			chunks.push(sql.raw(query.slice(lastIdx, match.index)));
		}
		const paramIndex = Number(match[1]) - 1;
		chunks.push(sql`${params[paramIndex]}`);
		lastIdx = match.index + match[0].length;
		match = regex.exec(query);
	}

	if (lastIdx < query.length) {
		chunks.push(sql.raw(query.slice(lastIdx)));
	}

	const [first, ...rest] = chunks;
	if (!first) {
		return sql.raw(query);
	}
	return rest.reduce((acc, chunk) => sql`${acc}${chunk}`, first);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** node-postgres returns `{ rows }`; postgres-js returns the rows array itself. */
function extractRows(result: unknown): Record<string, unknown>[] {
	if (Array.isArray(result)) return result.filter(isRecord);
	if (isRecord(result) && Array.isArray(result.rows)) return result.rows.filter(isRecord);
	return [];
}

function extractRowCount(result: unknown): number {
	if (isRecord(result) && typeof result.rowCount === "number") return result.rowCount;
	if (Array.isArray(result)) return result.length;
	return 0;
}

function createExecutor(db: DrizzleDatabase): SqlExecutor {
	return {
		query: async (query, params) => extractRows(await db.execute(buildDrizzleSql(query, params))),
		mutate: async (query, params) => extractRowCount(await db.execute(buildDrizzleSql(query, params))),
		advisoryLock: async (key) => {
			await db.execute(sql`SELECT pg_advisory_xact_lock(${key})`);
		},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create a FolioAdapter backed by a Drizzle ORM database instance.
 *
 * @example
 * ```ts
 * import { drizzle } from "drizzle-orm/node-postgres";
 * import { Pool } from "pg";
 * import { drizzleAdapter } from "@folio/drizzle-adapter";
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const adapter = drizzleAdapter(drizzle(pool), { schema: "erp" });
 * ```
 */
export function drizzleAdapter(db: DrizzleDatabase, config: DrizzleAdapterConfig = {}): FolioAdapter {
	const options: FolioAdapterOptions = {
		supportsAdvisoryLocks: true,
		supportsForUpdate: true,
		dialectName: "postgres",
		schema: config.schema,
	};
	const getSchema = () => options.schema ?? "public";
	const getNumericColumns = () => options.numericColumns ?? {};

	return {
		id: "drizzle",
		...buildSqlAdapterMethods(createExecutor(db), getSchema, getNumericColumns),

		transaction: <T>(fn: (tx: FolioTransactionAdapter) => Promise<T>): Promise<T> =>
			db.transaction((tx) =>
				fn({
					id: "drizzle",
					...buildSqlAdapterMethods(createExecutor(tx), getSchema, getNumericColumns),
					options,
				}),
			),

		options,
	};
}
