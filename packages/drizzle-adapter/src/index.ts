export {
	buildDrizzleSql,
	type DrizzleAdapterConfig,
	type DrizzleDatabase,
	drizzleAdapter,
} from "./adapter.js";
export { createPooledAdapter, type DrizzlePooledAdapterConfig } from "./pool.js";
export type { PooledAdapterResult, PoolLike, PoolStats } from "@folio/core/db";
export { RECOMMENDED_POOL_CONFIG } from "@folio/core/db";
