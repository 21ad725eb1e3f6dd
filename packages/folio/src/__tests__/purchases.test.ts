import { describe, expect, it } from "vitest";
import { seedTradingParties, setupTenantFixture } from "./fixtures.js";

async function billFixture() {
	const fixture = await setupTenantFixture();
	const parties = await seedTradingParties(fixture.api);
	const gadget = await fixture.api.products.create({ name: "Gadget", unitPrice: 500 });
	return { ...fixture, ...parties, gadget };
}

describe("purchase bills", () => {
	it("posts inventory and VAT against payables and increases stock", async () => {
		const { api, account, vendor, product, gadget } = await billFixture();

		const bill = await api.purchases.createBill({
			vendorId: vendor.id,
			billDate: "2024-03-01",
			vatRate: 10,
			items: [
				{ productId: product.id, quantity: 2 },
				{ productId: gadget.id, quantity: 1 },
			],
		});

		expect(bill).toMatchObject({
			billNumber: "PO-00001",
			subTotal: 2500,
			vatAmount: 250,
			totalAmount: 2750,
			status: "unpaid",
		});
		expect(bill.items.map((i) => i.amount)).toEqual([2000, 500]);

		expect(await api.accounts.getBalance(account("1300"))).toBe(2500);
		expect(await api.accounts.getRawBalance(account("2200"))).toBe(250);
		expect(await api.accounts.getBalance(account("2100"))).toBe(2750);
		expect((await api.products.get(product.id)).stockQuantity).toBe(102);
		expect((await api.products.get(gadget.id)).stockQuantity).toBe(1);
	});

	it("keeps a supplied bill number and refuses a duplicate", async () => {
		const { api, vendor, product } = await billFixture();
		const params = {
			vendorId: vendor.id,
			billDate: "2024-03-01",
			billNumber: "NW-7781",
			items: [{ productId: product.id, quantity: 1 }],
		};

		const bill = await api.purchases.createBill(params);
		expect(bill.billNumber).toBe("NW-7781");

		await expect(api.purchases.createBill(params)).rejects.toMatchObject({
			code: "CONFLICT",
			reason: "DUPLICATE_NUMBER",
		});
		expect(await api.purchases.listBills()).toHaveLength(1);
		expect((await api.products.get(product.id)).stockQuantity).toBe(101);
	});

	it("numbers past a supplied PO- number", async () => {
		const { api, vendor, product } = await billFixture();
		const base = { vendorId: vendor.id, billDate: "2024-03-01", items: [{ productId: product.id, quantity: 1 }] };

		await api.purchases.createBill({ ...base, billNumber: "PO-00001" });
		const generated = await api.purchases.createBill(base);

		expect(generated.billNumber).toBe("PO-00002");
		expect((await api.purchases.listBills()).map((b) => b.billNumber).sort()).toEqual(["PO-00001", "PO-00002"]);
	});

	it("only bills vendors", async () => {
		const { api, customer, product } = await billFixture();
		await expect(
			api.purchases.createBill({
				vendorId: customer.id,
				billDate: "2024-03-01",
				items: [{ productId: product.id, quantity: 1 }],
			}),
		).rejects.toMatchObject({ code: "NOT_FOUND" });
	});

	it("settles payables through payments", async () => {
		const { api, account, vendor, product } = await billFixture();
		const bill = await api.purchases.createBill({
			vendorId: vendor.id,
			billDate: "2024-03-01",
			items: [{ productId: product.id, quantity: 3 }],
		});

		const { bill: partial } = await api.purchases.recordPayment(bill.id, {
			amount: 1000,
			paymentAccountId: account("1110"),
			paymentDate: "2024-03-05",
		});
		expect(partial).toMatchObject({ paidAmount: 1000, status: "partial" });

		const { bill: paid, payment } = await api.purchases.recordPayment(bill.id, {
			amount: 2000,
			paymentAccountId: account("1110"),
			paymentDate: "2024-03-10",
		});
		expect(paid).toMatchObject({ paidAmount: 3000, status: "paid" });
		expect(payment.documentType).toBe("purchase_bill");

		expect(await api.accounts.getBalance(account("2100"))).toBe(0);
		expect(await api.accounts.getRawBalance(account("1110"))).toBe(-3000);
		expect(await api.purchases.listPayments(bill.id)).toHaveLength(2);
	});

	it("pays only from asset accounts", async () => {
		const { api, account, vendor, product } = await billFixture();
		const bill = await api.purchases.createBill({
			vendorId: vendor.id,
			billDate: "2024-03-01",
			items: [{ productId: product.id, quantity: 1 }],
		});
		const pay = (paymentAccountId: string) =>
			api.purchases.recordPayment(bill.id, { amount: 1000, paymentAccountId, paymentDate: "2024-03-05" });

		await expect(pay(account("2100"))).rejects.toMatchObject({ reason: "INVALID_PAYMENT_ACCOUNT" });
		await expect(pay(account("5200"))).rejects.toMatchObject({ reason: "INVALID_PAYMENT_ACCOUNT" });

		expect(await api.purchases.getBill(bill.id)).toMatchObject({ paidAmount: 0, status: "unpaid" });
		expect(await api.accounts.getBalance(account("2100"))).toBe(1000);
	});
});

describe("debit notes", () => {
	it("returns goods to the vendor against payables", async () => {
		const { api, account, vendor, product } = await billFixture();
		const bill = await api.purchases.createBill({
			vendorId: vendor.id,
			billDate: "2024-03-01",
			items: [{ productId: product.id, quantity: 4 }],
		});
		const itemId = bill.items[0]?.id ?? "";

		const note = await api.purchases.createDebitNote({
			billId: bill.id,
			noteDate: "2024-03-03",
			items: [
				{ itemId, quantity: 1 },
				{ itemId, quantity: 2 },
			],
		});

		expect(note).toMatchObject({ noteNumber: "DN-00001", totalAmount: 3000, vendorId: vendor.id });
		expect(note.items).toHaveLength(1);
		expect(note.items[0]).toMatchObject({ quantity: 3, sourceItemId: itemId });
		expect(await api.accounts.getBalance(account("2100"))).toBe(1000);
		expect(await api.accounts.getBalance(account("1300"))).toBe(1000);
		expect((await api.products.get(product.id)).stockQuantity).toBe(101);

		await expect(
			api.purchases.createDebitNote({ billId: bill.id, noteDate: "2024-03-04", items: [{ itemId, quantity: 2 }] }),
		).rejects.toMatchObject({ reason: "RETURN_EXCEEDS_QUANTITY" });
		expect(await api.purchases.listDebitNotes({ billId: bill.id })).toHaveLength(1);
	});

	it("cannot return stock that has already been sold", async () => {
		const { api, vendor, customer, gadget } = await billFixture();
		const bill = await api.purchases.createBill({
			vendorId: vendor.id,
			billDate: "2024-03-01",
			items: [{ productId: gadget.id, quantity: 2 }],
		});
		await api.sales.createInvoice({
			customerId: customer.id,
			invoiceDate: "2024-03-02",
			items: [{ productId: gadget.id, quantity: 2 }],
		});

		await expect(
			api.purchases.createDebitNote({
				billId: bill.id,
				noteDate: "2024-03-03",
				items: [{ itemId: bill.items[0]?.id ?? "", quantity: 1 }],
			}),
		).rejects.toMatchObject({ code: "NEGATIVE_STOCK" });
		expect(await api.purchases.listDebitNotes()).toHaveLength(0);
	});
});
