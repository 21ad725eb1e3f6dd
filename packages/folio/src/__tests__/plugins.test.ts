import type { FolioPlugin } from "@folio/core";
import { describe, expect, it } from "vitest";
import { auditLog } from "../index.js";
import { seedTradingParties, setupTenantFixture } from "./fixtures.js";

const blockLargeInvoices: FolioPlugin = {
	id: "credit-limit",
	operationHooks: {
		before: [
			{
				matcher: (op) => op.type === "invoice.create",
				handler: async ({ operation }) => {
					const items = operation.params.items;
					if (Array.isArray(items) && items.length > 1) {
						return { cancel: true, reason: "too many lines" };
					}
					return undefined;
				},
			},
		],
	},
};

const failingAfterHook: FolioPlugin = {
	id: "webhook",
	operationHooks: {
		after: [
			{
				matcher: () => true,
				handler: async () => {
					throw new Error("endpoint unreachable");
				},
			},
		],
	},
};

describe("operation hooks", () => {
	it("cancels an operation from a before-hook without writing anything", async () => {
		const { api } = await setupTenantFixture({ plugins: [blockLargeInvoices] });
		const { customer, product } = await seedTradingParties(api);

		await expect(
			api.sales.createInvoice({
				customerId: customer.id,
				invoiceDate: "2024-04-01",
				items: [
					{ productId: product.id, quantity: 1 },
					{ productId: product.id, quantity: 1 },
				],
			}),
		).rejects.toMatchObject({
			reason: "OPERATION_CANCELLED",
			details: { operation: "invoice.create", pluginId: "credit-limit" },
		});
		expect(await api.ledger.listEntries()).toHaveLength(0);

		const single = await api.sales.createInvoice({
			customerId: customer.id,
			invoiceDate: "2024-04-01",
			items: [{ productId: product.id, quantity: 1 }],
		});
		expect(single.invoiceNumber).toBe("INV-00001");
	});

	it("logs a failing after-hook and keeps the committed result", async () => {
		const { api, account, logger } = await setupTenantFixture({ plugins: [failingAfterHook] });

		const voucher = await api.journals.create({
			voucherDate: "2024-01-05",
			lines: [
				{ accountId: account("1100"), debit: 10 },
				{ accountId: account("3100"), credit: 10 },
			],
		});

		expect(voucher.isPosted).toBe(true);
		expect(logger.error).toHaveBeenCalledWith('Plugin "webhook" operationHooks.after failed', {
			error: "Error: endpoint unreachable",
			operation: "journal.create",
		});
		expect(await api.accounts.getBalance(account("1100"))).toBe(10);
	});

	it("logs postings only after they commit", async () => {
		const { api, logger } = await setupTenantFixture();
		const { customer, product } = await seedTradingParties(api);

		await api.sales.createInvoice({
			customerId: customer.id,
			invoiceDate: "2024-04-01",
			items: [{ productId: product.id, quantity: 1 }],
		});
		expect(logger.info).toHaveBeenCalledWith("Sales invoice posted", {
			tenantId: "t1",
			invoiceNumber: "INV-00001",
			subTotal: 1000,
			vatAmount: 0,
			totalAmount: 1000,
		});

		logger.info.mockClear();
		await expect(
			api.sales.createInvoice({
				customerId: customer.id,
				invoiceDate: "2024-04-01",
				items: [{ productId: product.id, quantity: 500 }],
			}),
		).rejects.toMatchObject({ code: "NEGATIVE_STOCK" });
		expect(logger.info).not.toHaveBeenCalled();
	});
});

describe("audit log", () => {
	it("records committed operations with actor and result id", async () => {
		const { api, account } = await setupTenantFixture({ plugins: [auditLog()] });

		const voucher = await api.journals.create({
			voucherDate: "2024-01-05",
			lines: [
				{ accountId: account("1100"), debit: 10 },
				{ accountId: account("3100"), credit: 10 },
			],
		});

		const entries = await api.auditLog.query();
		expect(entries).toHaveLength(1);
		expect(entries[0]).toMatchObject({
			tenantId: "t1",
			operation: "journal.create",
			actor: "user-1",
			resultId: voucher.id,
		});
		expect(entries[0]?.entryHash).toMatch(/^[0-9a-f]{64}$/);
	});

	it("does not record rejected operations", async () => {
		const { api, account } = await setupTenantFixture({ plugins: [auditLog()] });

		await expect(
			api.journals.create({
				voucherDate: "2024-01-05",
				lines: [
					{ accountId: account("1100"), debit: 10 },
					{ accountId: account("3100"), credit: 9 },
				],
			}),
		).rejects.toMatchObject({ code: "UNBALANCED_ENTRIES" });
		expect(await api.auditLog.query()).toEqual([]);
	});

	it("filters by operation type and tenant", async () => {
		const { folio, api, account } = await setupTenantFixture({
			plugins: [auditLog({ operations: ["journal.create", "bank.deposit"] })],
		});
		await api.accounts.create({ code: "5500", name: "Rent", type: "expense" });
		await api.journals.create({
			voucherDate: "2024-01-05",
			lines: [
				{ accountId: account("1100"), debit: 10 },
				{ accountId: account("3100"), credit: 10 },
			],
		});

		expect((await api.auditLog.query()).map((e) => e.operation)).toEqual(["journal.create"]);
		expect(await api.auditLog.query({ operation: "account.create" })).toEqual([]);
		expect(await folio.forTenant({ tenantId: "t2" }).auditLog.query()).toEqual([]);
	});
});
