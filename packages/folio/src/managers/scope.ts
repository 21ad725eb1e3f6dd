// =============================================================================
// REQUEST SCOPE HELPERS
// =============================================================================
// Every read and write is filtered by the tenant id of the request scope.

import type { FolioContext, Where } from "@folio/core";
import { ConfigurationError } from "@folio/core";

/**
 * Extract the tenant id from the request scope.
 * Throws ConfigurationError when the context is not tenant-scoped.
 */
export function getTenantId(ctx: FolioContext): string {
	const tenantId = ctx.requestContext?.tenantId;
	if (!tenantId) {
		throw new ConfigurationError(
			"tenantId is required. Use folio.forTenant({ tenantId }) to obtain a scoped API.",
		);
	}
	return tenantId;
}

export function getBranchId(ctx: FolioContext): string | null {
	return ctx.requestContext?.branchId ?? null;
}

export function getActor(ctx: FolioContext): string | null {
	return ctx.requestContext?.actor ?? null;
}

/** `[tenant_id = ?, id = ?]` */
export function byTenantAndId(tenantId: string, id: string): Where[] {
	return [
		{ field: "tenantId", operator: "eq", value: tenantId },
		{ field: "id", operator: "eq", value: id },
	];
}

export function nowIso(): string {
	return new Date().toISOString();
}
