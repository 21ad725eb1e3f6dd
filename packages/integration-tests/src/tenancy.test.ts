import { getTestInstance } from "@folio/test-utils";
import { describe, expect, it } from "vitest";
import { setupTradingCompany } from "./setup.js";

describe("tenant isolation", () => {
	it("keeps documents, entries and numbering per tenant", async () => {
		const a = await setupTradingCompany("tenant-a");
		const sample = await a.api.products.create({ name: "Sample", unitPrice: 100, stockQuantity: 5 });
		const invoice = await a.api.sales.createInvoice({
			customerId: a.customer.id,
			invoiceDate: "2024-05-01",
			items: [{ productId: sample.id, quantity: 1 }],
		});
		expect(invoice.invoiceNumber).toBe("INV-00001");

		const b = a.folio.forTenant({ tenantId: "tenant-b" });
		await b.setup();

		await expect(b.sales.getInvoice(invoice.id)).rejects.toMatchObject({ code: "NOT_FOUND" });
		await expect(b.parties.get(a.customer.id)).rejects.toMatchObject({ code: "NOT_FOUND" });
		await expect(b.banking.getAccount(a.bank.id)).rejects.toMatchObject({ code: "NOT_FOUND" });
		expect(await b.ledger.listEntries()).toEqual([]);
		expect((await b.reports.trialBalance()).rows).toEqual([]);

		const bAccounts = await b.accounts.list();
		const aIds = new Set((await a.api.accounts.list()).map((acc) => acc.id));
		expect(bAccounts.some((acc) => aIds.has(acc.id))).toBe(false);

		const bCustomer = await b.parties.create({ kind: "customer", name: "Other Cafe" });
		const bSample = await b.products.create({ name: "Sample", unitPrice: 100, stockQuantity: 5 });
		const own = await b.sales.createInvoice({
			customerId: bCustomer.id,
			invoiceDate: "2024-05-02",
			items: [{ productId: bSample.id, quantity: 2 }],
		});
		expect(own.invoiceNumber).toBe("INV-00001");
		expect((await a.api.products.get(sample.id)).stockQuantity).toBe(4);
	});

	it("cannot post to another tenant's accounts", async () => {
		const a = await getTestInstance({ tenantId: "tenant-a" });
		const b = await getTestInstance({ tenantId: "tenant-b" });

		await expect(
			b.api.journals.create({
				voucherDate: "2024-05-01",
				lines: [
					{ accountId: a.accountId("1100"), debit: 100 },
					{ accountId: b.accountId("3100"), credit: 100 },
				],
			}),
		).rejects.toMatchObject({ code: "NOT_FOUND" });
		expect(await b.api.ledger.listEntries()).toEqual([]);
	});
});
