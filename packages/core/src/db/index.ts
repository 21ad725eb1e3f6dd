export type {
	FolioAdapter,
	FolioAdapterOptions,
	FolioTransactionAdapter,
	SortBy,
	Where,
	WhereOperator,
} from "./adapter.js";
export {
	buildOrderByClause,
	buildWhereClause,
	keysToCamel,
	keysToSnake,
	toCamelCase,
	toSnakeCase,
	toSortList,
} from "./adapter-utils.js";
export {
	createPooledAdapterResult,
	getPoolStats,
	type PooledAdapterResult,
	type PoolLike,
	type PoolStats,
	RECOMMENDED_POOL_CONFIG,
} from "./pool.js";
export { createTableResolver } from "./schema-prefix.js";
export { buildSqlAdapterMethods, type SqlExecutor } from "./sql-adapter-methods.js";
export {
	isInTransactionContext,
	queueAfterTransactionHook,
	runWithTransactionContext,
} from "./transaction-context.js";
