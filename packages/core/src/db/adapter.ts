// =============================================================================
// FOLIO ADAPTER INTERFACE
// =============================================================================
// Storage contract used by every manager. Managers speak only in terms of
// these CRUD methods plus `transaction` and `advisoryLock`, so the same
// posting code runs on PostgreSQL (drizzle adapter) and in memory.
//
// Models are addressed by their snake_case table name ("ledger_entry");
// record fields are camelCase and converted by the SQL adapters.

export interface Where {
	field: string;
	operator: WhereOperator;
	value: unknown;
}

export type WhereOperator =
	| "eq"
	| "ne"
	| "gt"
	| "gte"
	| "lt"
	| "lte"
	| "in"
	| "like"
	| "is_null"
	| "is_not_null";

export interface SortBy {
	field: string;
	direction: "asc" | "desc";
}

export interface FolioAdapter {
	id: string;

	create<T extends object>(data: { model: string; data: T }): Promise<T>;

	/** `forUpdate` takes a row lock for the rest of the enclosing transaction. */
	findOne<T>(data: { model: string; where: Where[]; forUpdate?: boolean }): Promise<T | null>;

	findMany<T>(data: {
		model: string;
		where?: Where[];
		limit?: number;
		offset?: number;
		sortBy?: SortBy | SortBy[];
	}): Promise<T[]>;

	update<T>(data: {
		model: string;
		where: Where[];
		update: Record<string, unknown>;
	}): Promise<T | null>;

	delete(data: { model: string; where: Where[] }): Promise<void>;

	count(data: { model: string; where?: Where[] }): Promise<number>;

	transaction<T>(fn: (tx: FolioTransactionAdapter) => Promise<T>): Promise<T>;

	/** Transaction-scoped lock on an integer key (see `hashLockKey`). */
	advisoryLock(key: number): Promise<void>;

	options?: FolioAdapterOptions;
}

export type FolioTransactionAdapter = Omit<FolioAdapter, "transaction">;

export interface FolioAdapterOptions {
	supportsAdvisoryLocks: boolean;
	supportsForUpdate: boolean;
	dialectName: "postgres" | "memory";
	/** PostgreSQL schema for table qualification. Set by the folio context. */
	schema?: string;
	/**
	 * camelCase integer columns per model. pg returns BIGINT as text; SQL
	 * adapters convert these back to numbers. Set by the folio context.
	 */
	numericColumns?: Record<string, readonly string[]>;
}
