import { assertBankMatchesLedger, assertPostingsBalanced, getTestInstance, type TestInstance } from "@folio/test-utils";
import type { BankAccount, Party, Product } from "@folio/core";
import { auditLog } from "folio";

export interface TradingCompany extends TestInstance {
	customer: Party;
	vendor: Party;
	widget: Product;
	gadget: Product;
	bank: BankAccount;
	/** Check the ledger invariants; call after every mutation. */
	checkInvariants: () => Promise<void>;
}

/**
 * A small trading company: one customer, one vendor, two products with no
 * stock, and a bank account linked to the 1110 ledger account holding the
 * owner's opening capital of 50000.
 */
export async function setupTradingCompany(tenantId = "trading-co"): Promise<TradingCompany> {
	const instance = await getTestInstance({ tenantId, plugins: [auditLog()] });
	const { api, accountId } = instance;

	const customer = await api.parties.create({ kind: "customer", name: "Harbour Cafe" });
	const vendor = await api.parties.create({ kind: "vendor", name: "Coastal Wholesale" });
	const widget = await api.products.create({ name: "Widget", sku: "W-1", unitPrice: 1000 });
	const gadget = await api.products.create({ name: "Gadget", sku: "G-1", unitPrice: 500 });

	const bank = await api.banking.createAccount({ name: "Operating", chartAccountId: accountId("1110") });
	await api.banking.deposit(bank.id, {
		amount: 50000,
		transactionDate: "2024-01-01",
		description: "Opening capital",
		counterAccountId: accountId("3100"),
	});

	return {
		...instance,
		customer,
		vendor,
		widget,
		gadget,
		bank,
		checkInvariants: async () => {
			await assertPostingsBalanced(api);
			await assertBankMatchesLedger(api, bank.id);
		},
	};
}
