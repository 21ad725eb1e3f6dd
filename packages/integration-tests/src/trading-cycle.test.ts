import { assertLedgerBalanced } from "@folio/test-utils";
import { beforeAll, describe, expect, it } from "vitest";
import { setupTradingCompany, type TradingCompany } from "./setup.js";

/**
 * One quarter of trading, run in order. Each step checks the per-posting
 * balance and the bank cache against the ledger.
 */
describe("a quarter of trading", () => {
	let co: TradingCompany;
	let invoiceId: string;

	beforeAll(async () => {
		co = await setupTradingCompany();
	});

	it("buys stock on credit", async () => {
		const bill = await co.api.purchases.createBill({
			vendorId: co.vendor.id,
			billDate: "2024-01-05",
			vatRate: 10,
			items: [
				{ productId: co.widget.id, quantity: 20, unitPrice: 600 },
				{ productId: co.gadget.id, quantity: 10, unitPrice: 300 },
			],
		});
		expect(bill).toMatchObject({ subTotal: 15000, vatAmount: 1500, totalAmount: 16500 });
		await co.checkInvariants();

		const { bill: paid } = await co.api.purchases.recordPayment(bill.id, {
			amount: 16500,
			paymentAccountId: co.accountId("1110"),
			paymentDate: "2024-01-20",
		});
		expect(paid.status).toBe("paid");
		expect((await co.api.banking.getAccount(co.bank.id)).currentBalance).toBe(33500);
		await co.checkInvariants();
	});

	it("sells, collects part and takes a return", async () => {
		const invoice = await co.api.sales.createInvoice({
			customerId: co.customer.id,
			invoiceDate: "2024-02-01",
			dueDate: "2024-03-02",
			vatRate: 10,
			items: [
				{ productId: co.widget.id, quantity: 5 },
				{ productId: co.gadget.id, quantity: 4 },
			],
		});
		invoiceId = invoice.id;
		expect(invoice).toMatchObject({ subTotal: 7000, vatAmount: 700, totalAmount: 7700 });
		await co.checkInvariants();

		const { invoice: partial } = await co.api.sales.recordPayment(invoice.id, {
			amount: 3000,
			paymentAccountId: co.accountId("1110"),
			paymentDate: "2024-02-15",
		});
		expect(partial.status).toBe("partial");
		await co.checkInvariants();

		const gadgetLine = invoice.items.find((i) => i.productId === co.gadget.id);
		const note = await co.api.sales.createCreditNote({
			invoiceId: invoice.id,
			noteDate: "2024-02-20",
			items: [{ itemId: gadgetLine?.id ?? "", quantity: 1 }],
		});
		expect(note.totalAmount).toBe(500);
		await co.checkInvariants();
	});

	it("runs payroll and pays salaries from the bank", async () => {
		const employee = await co.api.payroll.createEmployee({ name: "Sam Reyes", grossSalary: 10000 });
		await co.api.payroll.createPayslip({
			employeeId: employee.id,
			periodStart: "2024-03-01",
			periodEnd: "2024-03-31",
			payDate: "2024-03-31",
		});
		await co.checkInvariants();

		await co.api.journals.create({
			voucherDate: "2024-03-31",
			description: "March salaries",
			lines: [
				{ accountId: co.accountId("2400"), debit: 10000 },
				{ accountId: co.accountId("1110"), credit: 10000 },
			],
		});
		expect((await co.api.banking.getAccount(co.bank.id)).currentBalance).toBe(26500);
		await co.checkInvariants();
	});

	it("ends the quarter with consistent balances", async () => {
		const { api, accountId } = co;
		await assertLedgerBalanced(api);

		expect((await api.products.get(co.widget.id)).stockQuantity).toBe(15);
		expect((await api.products.get(co.gadget.id)).stockQuantity).toBe(7);

		expect(await api.accounts.getBalance(accountId("1110"))).toBe(26500);
		expect(await api.accounts.getBalance(accountId("1200"))).toBe(4200);
		expect(await api.accounts.getBalance(accountId("1300"))).toBe(15000);
		expect(await api.accounts.getBalance(accountId("2100"))).toBe(0);
		expect(await api.accounts.getRawBalance(accountId("2200"))).toBe(800);
		expect(await api.accounts.getBalance(accountId("2400"))).toBe(0);
		expect(await api.accounts.getBalance(accountId("4100"))).toBe(6500);

		const tb = await api.reports.trialBalance("2024-03-31");
		expect(tb.balanced).toBe(true);

		const quarter = await api.reports.incomeStatement("2024-01-01", "2024-03-31");
		expect(quarter).toMatchObject({ totalRevenue: 6500, totalExpenses: 10000, netIncome: -3500 });
	});

	it("replays every account's general ledger to its balance", async () => {
		const { api } = co;
		for (const account of await api.accounts.list()) {
			const gl = await api.reports.generalLedger({ accountId: account.id });
			expect(gl.closingBalance).toBe(await api.accounts.getRawBalance(account.id));
			if (account.type === "asset" || account.type === "expense") {
				expect(gl.closingBalance).toBe(await api.accounts.getBalance(account.id));
			}
		}
	});

	it("ages the open invoice", async () => {
		const receivables = await co.api.reports.aging("receivables", "2024-04-16");
		expect(receivables.rows.map((r) => [r.documentId, r.outstanding, r.daysOverdue, r.bucket])).toEqual([
			[invoiceId, 4700, 45, "31_60"],
		]);
		expect((await co.api.reports.aging("payables", "2024-04-16")).rows).toEqual([]);
	});

	it("audits every posting operation", async () => {
		const entries = await co.api.auditLog.query();
		expect(entries.map((e) => e.operation).sort()).toEqual([
			"bank.deposit",
			"bill.create",
			"bill.payment",
			"credit_note.create",
			"invoice.create",
			"invoice.payment",
			"journal.create",
			"payslip.create",
		]);
		expect(entries.every((e) => e.actor === "test")).toBe(true);
	});
});
