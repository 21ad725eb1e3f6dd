import type { FolioOptions, FolioPlugin } from "@folio/core";
import { memoryAdapter } from "@folio/memory-adapter";
import { vi } from "vitest";
import { createFolio, type FolioTenantApi } from "../index.js";

export function createMockLogger() {
	return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

export interface TenantFixture {
	folio: ReturnType<typeof createFolio>;
	api: FolioTenantApi;
	logger: ReturnType<typeof createMockLogger>;
	/** Id of the seeded account with this code, e.g. "1100" */
	account: (code: string) => string;
}

/**
 * A memory-backed instance with tenant "t1" seeded from the default chart.
 */
export async function setupTenantFixture(
	options: Omit<FolioOptions, "database" | "plugins"> & { plugins?: FolioPlugin[] } = {},
): Promise<TenantFixture> {
	const logger = createMockLogger();
	const folio = createFolio({ ...options, database: memoryAdapter(), logger });
	const api = folio.forTenant({ tenantId: "t1", actor: "user-1" });
	const { accounts } = await api.setup();

	const byCode = new Map(accounts.map((a) => [a.code, a.id]));
	const account = (code: string) => {
		const id = byCode.get(code);
		if (!id) throw new Error(`No seeded account with code ${code}`);
		return id;
	};
	return { folio, api, logger, account };
}

/** A customer, a vendor and a product with 100 units in stock at 1000 each. */
export async function seedTradingParties(api: FolioTenantApi) {
	const customer = await api.parties.create({ kind: "customer", name: "Acme Retail" });
	const vendor = await api.parties.create({ kind: "vendor", name: "Northwind Supply" });
	const product = await api.products.create({ name: "Widget", sku: "W-1", unitPrice: 1000, stockQuantity: 100 });
	return { customer, vendor, product };
}
