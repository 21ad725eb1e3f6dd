// =============================================================================
// POOL TYPES & CONSTANTS — shared by the SQL adapter pool factories
// =============================================================================

import type { FolioAdapter } from "./adapter.js";

/**
 * Minimal interface for a pg-compatible connection pool.
 * Matches the `pg.Pool` surface needed here.
 */
export interface PoolLike {
	end(): Promise<void>;
	totalCount: number;
	idleCount: number;
	waitingCount: number;
}

export interface PoolStats {
	totalCount: number;
	idleCount: number;
	/** Clients checked out (in use) */
	activeCount: number;
	waitingCount: number;
}

export interface PooledAdapterResult {
	adapter: FolioAdapter;
	/** Shut down the pool. Call during application shutdown. */
	close: () => Promise<void>;
	stats: () => PoolStats;
}

/**
 * Recommended pool settings. Spread them into `new Pool()` and override as needed.
 *
 * @example
 * ```ts
 * const pool = new Pool({
 *   ...RECOMMENDED_POOL_CONFIG,
 *   connectionString: process.env.DATABASE_URL,
 * });
 * ```
 */
export const RECOMMENDED_POOL_CONFIG = {
	max: 20,
	min: 2,
	idleTimeoutMillis: 30_000,
	connectionTimeoutMillis: 10_000,
	/** Postings are short; a long statement means something is stuck. */
	statement_timeout: 30_000,
} as const;

export function getPoolStats(pool: PoolLike): PoolStats {
	return {
		totalCount: pool.totalCount,
		idleCount: pool.idleCount,
		activeCount: pool.totalCount - pool.idleCount,
		waitingCount: pool.waitingCount,
	};
}

export function createPooledAdapterResult(
	adapter: FolioAdapter,
	pool: PoolLike,
): PooledAdapterResult {
	return {
		adapter,
		close: () => pool.end(),
		stats: () => getPoolStats(pool),
	};
}
