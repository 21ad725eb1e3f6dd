// =============================================================================
// CONNECTION POOL — drizzle adapter over a pg.Pool with stats and shutdown
// =============================================================================

import type { PooledAdapterResult, PoolLike } from "@folio/core/db";
import { createPooledAdapterResult } from "@folio/core/db";
import { type DrizzleDatabase, drizzleAdapter } from "./adapter.js";

export interface DrizzlePooledAdapterConfig {
	/** A pg.Pool instance (or compatible pool) */
	pool: PoolLike;
	/** `drizzle(pool)` from `drizzle-orm/node-postgres`, built on the same pool */
	drizzle: DrizzleDatabase;
	schema?: string;
}

/**
 * Wrap a pool and its drizzle instance into an adapter with monitoring and shutdown.
 *
 * @example
 * ```ts
 * import { Pool } from "pg";
 * import { drizzle } from "drizzle-orm/node-postgres";
 * import { RECOMMENDED_POOL_CONFIG } from "@folio/core/db";
 * import { createPooledAdapter } from "@folio/drizzle-adapter";
 *
 * const pool = new Pool({ ...RECOMMENDED_POOL_CONFIG, connectionString: process.env.DATABASE_URL });
 * const { adapter, close, stats } = createPooledAdapter({ pool, drizzle: drizzle(pool) });
 * const folio = createFolio({ database: adapter });
 *
 * // On shutdown:
 * await close();
 * ```
 */
export function createPooledAdapter(config: DrizzlePooledAdapterConfig): PooledAdapterResult {
	const adapter = drizzleAdapter(config.drizzle, { schema: config.schema });
	return createPooledAdapterResult(adapter, config.pool);
}
