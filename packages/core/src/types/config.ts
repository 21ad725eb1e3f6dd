import type { FolioAdapter } from "../db/adapter.js";
import type { AccountType } from "./account.js";
import type { FolioPlugin } from "./plugin.js";
import type { PostingRole } from "./posting.js";

export interface FolioOptions {
	/** Database adapter instance or factory function */
	database: FolioAdapter | (() => FolioAdapter);

	/** ISO 4217 currency of all amounts (default: "USD") */
	currency?: string;

	/** PostgreSQL schema holding the folio tables (default: "folio") */
	schema?: string;

	/** Plugins to enable */
	plugins?: FolioPlugin[];

	/** Chart seeded by `setupTenant()`. Default: the built-in chart. */
	defaultChart?: ChartAccountDefinition[];

	/** Advanced configuration */
	advanced?: FolioAdvancedOptions;

	/** Custom logger (default: console logger) */
	logger?: FolioLogger;
}

export interface ChartAccountDefinition {
	code: string;
	name: string;
	type: AccountType;
	/** Code of the parent account in the same chart */
	parentCode?: string;
	/** Posting role this account fills */
	role?: PostingRole;
}

export interface FolioAdvancedOptions {
	/** Idempotency key TTL in ms. Default: 24h */
	idempotencyTTL?: number;
	/** Largest single amount accepted, in minor units. Default: 1_000_000_000_00 */
	maxAmount?: number;
}

export interface FolioLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}
