// =============================================================================
// PARTY REGISTRY — customers and vendors
// =============================================================================

import { randomUUID } from "node:crypto";
import type { FolioContext, FolioTransactionAdapter, Party, PartyKind, Where } from "@folio/core";
import { assertText, NotFoundError, ValidationError } from "@folio/core";
import { byTenantAndId, getTenantId, nowIso } from "./scope.js";

const PARTY_KINDS: readonly PartyKind[] = ["customer", "vendor"];

export async function createParty(
	ctx: FolioContext,
	params: { kind: PartyKind; name: string; email?: string; phone?: string },
): Promise<Party> {
	const tenantId = getTenantId(ctx);
	if (!PARTY_KINDS.includes(params.kind)) {
		throw new ValidationError(`Invalid party kind "${params.kind}"`, { details: { field: "kind" } });
	}
	return ctx.adapter.create<Party>({
		model: "party",
		data: {
			id: randomUUID(),
			tenantId,
			kind: params.kind,
			name: assertText(params.name, "name"),
			email: params.email ?? null,
			phone: params.phone ?? null,
			isActive: true,
			createdAt: nowIso(),
		},
	});
}

export async function getParty(ctx: FolioContext, partyId: string, kind?: PartyKind): Promise<Party> {
	const party = await findParty(ctx.adapter, getTenantId(ctx), partyId, kind);
	if (!party) throw new NotFoundError(kind === "vendor" ? "Vendor" : kind === "customer" ? "Customer" : "Party", partyId);
	return party;
}

export async function listParties(
	ctx: FolioContext,
	params: { kind?: PartyKind; isActive?: boolean } = {},
): Promise<Party[]> {
	const where: Where[] = [{ field: "tenantId", operator: "eq", value: getTenantId(ctx) }];
	if (params.kind) where.push({ field: "kind", operator: "eq", value: params.kind });
	if (params.isActive !== undefined) where.push({ field: "isActive", operator: "eq", value: params.isActive });
	return ctx.adapter.findMany<Party>({ model: "party", where, sortBy: { field: "name", direction: "asc" } });
}

export async function updateParty(
	ctx: FolioContext,
	partyId: string,
	params: { name?: string; email?: string | null; phone?: string | null; isActive?: boolean },
): Promise<Party> {
	const tenantId = getTenantId(ctx);
	const update: Record<string, unknown> = {};
	if (params.name !== undefined) update.name = assertText(params.name, "name");
	if (params.email !== undefined) update.email = params.email;
	if (params.phone !== undefined) update.phone = params.phone;
	if (params.isActive !== undefined) update.isActive = params.isActive;
	if (Object.keys(update).length === 0) return getParty(ctx, partyId);

	const updated = await ctx.adapter.update<Party>({ model: "party", where: byTenantAndId(tenantId, partyId), update });
	if (!updated) throw new NotFoundError("Party", partyId);
	return updated;
}

/** Party of the given kind in the tenant, or null. */
export async function findParty(
	db: Pick<FolioTransactionAdapter, "findOne">,
	tenantId: string,
	partyId: string,
	kind?: PartyKind,
): Promise<Party | null> {
	const where = byTenantAndId(tenantId, partyId);
	if (kind) where.push({ field: "kind", operator: "eq", value: kind });
	return db.findOne<Party>({ model: "party", where });
}
