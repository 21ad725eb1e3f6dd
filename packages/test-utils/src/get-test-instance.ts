import type { FolioOptions, FolioPlugin } from "@folio/core";
import { createNoopLogger } from "@folio/core/logger";
import { memoryAdapter } from "@folio/memory-adapter";
import { createFolio, type FolioInstance, type FolioTenantApi } from "folio";

export interface TestInstanceOptions {
	/** Database adapter. Default: a fresh memoryAdapter() */
	adapter?: FolioOptions["database"];
	/** Currency. Default: "USD" */
	currency?: string;
	/** Chart seeded by setup(). Default: the built-in chart */
	defaultChart?: FolioOptions["defaultChart"];
	/** Plugins to enable */
	plugins?: FolioPlugin[];
	/** Default: "test-tenant" */
	tenantId?: string;
}

export interface TestInstance {
	folio: FolioInstance;
	/** API scoped to the test tenant, already set up */
	api: FolioTenantApi;
	tenantId: string;
	/** Id of the seeded account with this code */
	accountId: (code: string) => string;
}

/**
 * A silent folio instance with one tenant whose chart is already seeded.
 */
export async function getTestInstance(options: TestInstanceOptions = {}): Promise<TestInstance> {
	const folio = createFolio({
		database: options.adapter ?? memoryAdapter(),
		currency: options.currency ?? "USD",
		defaultChart: options.defaultChart,
		plugins: options.plugins ?? [],
		logger: createNoopLogger(),
	});

	const tenantId = options.tenantId ?? "test-tenant";
	const api = folio.forTenant({ tenantId, actor: "test" });
	const { accounts } = await api.setup();
	const byCode = new Map(accounts.map((a) => [a.code, a.id]));

	return {
		folio,
		api,
		tenantId,
		accountId: (code) => {
			const id = byCode.get(code);
			if (!id) throw new Error(`No seeded account with code ${code}`);
			return id;
		},
	};
}
