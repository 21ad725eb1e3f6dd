import type { FolioAdapter } from "../db/adapter.js";
import type { ChartAccountDefinition, FolioLogger } from "./config.js";
import type { FolioPlugin } from "./plugin.js";
import type { PostingRole } from "./posting.js";

/** Who is acting, and for which tenant. Every query filters by `tenantId`. */
export interface RequestContext {
	tenantId: string;
	branchId?: string;
	/** Acting user id, recorded as `createdBy` */
	actor?: string;
	requestId?: string;
}

export interface FolioContext {
	adapter: FolioAdapter;
	options: ResolvedFolioOptions;
	logger: FolioLogger;
	plugins: FolioPlugin[];
	requestContext?: RequestContext;
	/** Posting-account assignments per tenant, loaded once and reused. */
	postingAccounts: Map<string, Partial<Record<PostingRole, string>>>;
	/** Pre-computed hook cache. Built at context creation. */
	_hookCache?: {
		beforeOperation: FolioPlugin[];
		afterOperation: FolioPlugin[];
	};
}

export interface ResolvedFolioOptions {
	currency: string;
	schema: string;
	defaultChart: ChartAccountDefinition[];
	advanced: ResolvedAdvancedOptions;
}

export interface ResolvedAdvancedOptions {
	idempotencyTTL: number;
	maxAmount: number;
}
