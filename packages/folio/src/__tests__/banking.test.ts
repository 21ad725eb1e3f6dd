import { describe, expect, it } from "vitest";
import { setupTenantFixture } from "./fixtures.js";

async function bankFixture() {
	const fixture = await setupTenantFixture();
	const { api, account } = fixture;
	const savingsAccount = await api.accounts.create({
		code: "1120",
		name: "Savings",
		type: "asset",
		parentId: account("1000"),
	});
	const current = await api.banking.createAccount({ name: "Current", chartAccountId: account("1110") });
	const savings = await api.banking.createAccount({ name: "Savings", chartAccountId: savingsAccount.id });
	return { ...fixture, current, savings, savingsChartId: savingsAccount.id };
}

describe("bank movements", () => {
	it("keeps the bank balance equal to the linked ledger balance", async () => {
		const { api, account, current } = await bankFixture();

		const first = await api.banking.deposit(current.id, {
			amount: 10000,
			transactionDate: "2024-01-02",
			counterAccountId: account("3100"),
		});
		expect(first).toMatchObject({ kind: "deposit", balanceAfter: 10000 });

		const second = await api.banking.withdraw(current.id, {
			amount: 2500,
			transactionDate: "2024-01-05",
			counterAccountId: account("5200"),
		});
		expect(second.balanceAfter).toBe(7500);

		expect(await api.banking.checkLedgerConsistency(current.id)).toMatchObject({
			currentBalance: 7500,
			ledgerBalance: 7500,
			consistent: true,
		});
		expect(await api.accounts.getBalance(account("3100"))).toBe(10000);
		expect(await api.accounts.getBalance(account("5200"))).toBe(2500);
		expect((await api.banking.listTransactions(current.id)).map((t) => t.kind)).toEqual(["deposit", "withdrawal"]);
	});

	it("requires a counter account for a linked bank account", async () => {
		const { api, current } = await bankFixture();
		await expect(
			api.banking.deposit(current.id, { amount: 100, transactionDate: "2024-01-02" }),
		).rejects.toMatchObject({ reason: "COUNTER_ACCOUNT_REQUIRED" });
	});

	it("refuses a counter account that is a bank's own ledger account", async () => {
		const { api, account, current, savings, savingsChartId } = await bankFixture();
		await api.banking.deposit(current.id, {
			amount: 500,
			transactionDate: "2024-01-02",
			counterAccountId: account("3100"),
		});

		await expect(
			api.banking.withdraw(current.id, {
				amount: 200,
				transactionDate: "2024-01-03",
				counterAccountId: account("1110"),
			}),
		).rejects.toMatchObject({ reason: "INVALID_COUNTER_ACCOUNT" });
		await expect(
			api.banking.deposit(current.id, {
				amount: 200,
				transactionDate: "2024-01-03",
				counterAccountId: savingsChartId,
			}),
		).rejects.toMatchObject({ reason: "INVALID_COUNTER_ACCOUNT", details: { counterBankAccountId: savings.id } });

		expect((await api.banking.getAccount(current.id)).currentBalance).toBe(500);
		expect((await api.banking.getAccount(savings.id)).currentBalance).toBe(0);
		expect(await api.banking.listTransactions(current.id)).toHaveLength(1);
	});

	it("tracks an unlinked bank account without touching the ledger", async () => {
		const { api } = await bankFixture();
		const petty = await api.banking.createAccount({ name: "Petty cash box" });

		await api.banking.deposit(petty.id, { amount: 300, transactionDate: "2024-01-02" });

		expect((await api.banking.getAccount(petty.id)).currentBalance).toBe(300);
		expect(await api.ledger.listEntries()).toHaveLength(0);
		await expect(api.banking.checkLedgerConsistency(petty.id)).rejects.toMatchObject({
			reason: "BANK_ACCOUNT_NOT_LINKED",
		});
	});

	it("refuses a withdrawal beyond the balance", async () => {
		const { api, account, current } = await bankFixture();
		await api.banking.deposit(current.id, {
			amount: 100,
			transactionDate: "2024-01-02",
			counterAccountId: account("3100"),
		});

		await expect(
			api.banking.withdraw(current.id, {
				amount: 101,
				transactionDate: "2024-01-03",
				counterAccountId: account("5200"),
			}),
		).rejects.toMatchObject({ code: "INSUFFICIENT_FUNDS", details: { available: 100, requested: 101 } });
		expect((await api.banking.getAccount(current.id)).currentBalance).toBe(100);
	});

	it("follows document payments posted to the linked account", async () => {
		const { api, account, current } = await bankFixture();
		const customer = await api.parties.create({ kind: "customer", name: "Acme Retail" });
		const product = await api.products.create({ name: "Widget", unitPrice: 1000, stockQuantity: 5 });
		const invoice = await api.sales.createInvoice({
			customerId: customer.id,
			invoiceDate: "2024-01-10",
			items: [{ productId: product.id, quantity: 2 }],
		});

		await api.sales.recordPayment(invoice.id, {
			amount: 2000,
			paymentAccountId: account("1110"),
			paymentDate: "2024-01-12",
		});

		expect((await api.banking.getAccount(current.id)).currentBalance).toBe(2000);
		expect((await api.banking.checkLedgerConsistency(current.id)).consistent).toBe(true);
	});

	it("links a chart account to one bank account only, starting at its balance", async () => {
		const { api, account } = await bankFixture();
		await api.journals.create({
			voucherDate: "2024-01-02",
			lines: [
				{ accountId: account("1100"), debit: 750 },
				{ accountId: account("3100"), credit: 750 },
			],
		});

		await expect(
			api.banking.createAccount({ name: "Second", chartAccountId: account("1110") }),
		).rejects.toMatchObject({ code: "CONFLICT", reason: "CHART_ACCOUNT_IN_USE" });

		const till = await api.banking.createAccount({ name: "Till", chartAccountId: account("1100") });
		expect(till.currentBalance).toBe(750);
		expect((await api.banking.checkLedgerConsistency(till.id)).consistent).toBe(true);
	});

	it("only links bank accounts to asset accounts", async () => {
		const { api, account } = await bankFixture();
		await expect(
			api.banking.createAccount({ name: "Wrong", chartAccountId: account("4100") }),
		).rejects.toMatchObject({ reason: "INVALID_CHART_ACCOUNT" });
	});
});

describe("fund transfers", () => {
	it("moves money and posts both ledger legs", async () => {
		const { api, account, current, savings, savingsChartId } = await bankFixture();
		await api.banking.deposit(current.id, {
			amount: 5000,
			transactionDate: "2024-02-01",
			counterAccountId: account("3100"),
		});

		const transfer = await api.banking.transfer({
			fromAccountId: current.id,
			toAccountId: savings.id,
			amount: 2000,
			transferDate: "2024-02-02",
		});

		expect(transfer.transferNumber).toBe("FT-00001");
		expect((await api.banking.getAccount(current.id)).currentBalance).toBe(3000);
		expect((await api.banking.getAccount(savings.id)).currentBalance).toBe(2000);
		expect(await api.accounts.getBalance(account("1110"))).toBe(3000);
		expect(await api.accounts.getBalance(savingsChartId)).toBe(2000);
		expect((await api.banking.checkLedgerConsistency(savings.id)).consistent).toBe(true);
		expect(await api.banking.listTransfers({ bankAccountId: savings.id })).toHaveLength(1);
	});

	it("changes nothing when funds are insufficient", async () => {
		const { api, account, current, savings } = await bankFixture();
		await api.banking.deposit(current.id, {
			amount: 1000,
			transactionDate: "2024-02-01",
			counterAccountId: account("3100"),
		});

		await expect(
			api.banking.transfer({
				fromAccountId: current.id,
				toAccountId: savings.id,
				amount: 1500,
				transferDate: "2024-02-02",
			}),
		).rejects.toMatchObject({ code: "INSUFFICIENT_FUNDS" });

		expect((await api.banking.getAccount(current.id)).currentBalance).toBe(1000);
		expect((await api.banking.getAccount(savings.id)).currentBalance).toBe(0);
		expect(await api.banking.listTransfers()).toHaveLength(0);
		expect(await api.ledger.listEntries()).toHaveLength(2);
	});

	it("rejects same-account and cross-currency transfers", async () => {
		const { api, current } = await bankFixture();
		const euro = await api.banking.createAccount({ name: "Euro", currency: "EUR" });
		const dollar = await api.banking.createAccount({ name: "Dollar" });

		await expect(
			api.banking.transfer({ fromAccountId: current.id, toAccountId: current.id, amount: 1, transferDate: "2024-02-02" }),
		).rejects.toMatchObject({ reason: "SAME_ACCOUNT_TRANSFER" });
		await expect(
			api.banking.transfer({ fromAccountId: dollar.id, toAccountId: euro.id, amount: 1, transferDate: "2024-02-02" }),
		).rejects.toMatchObject({ reason: "CURRENCY_MISMATCH" });
	});
});

describe("reconciliation and deletion", () => {
	it("reports the difference against a statement", async () => {
		const { api, account, current } = await bankFixture();
		await api.banking.deposit(current.id, {
			amount: 4200,
			transactionDate: "2024-03-01",
			counterAccountId: account("3100"),
		});

		const result = await api.banking.reconcile(current.id, { statementBalance: 4150, statementDate: "2024-03-31" });

		expect(result).toEqual({
			bankAccountId: current.id,
			statementDate: "2024-03-31",
			bookBalance: 4200,
			statementBalance: 4150,
			difference: -50,
			reconciled: false,
		});
		expect(await api.banking.getAccount(current.id)).toMatchObject({
			lastReconciledAt: "2024-03-31",
			lastStatementBalance: 4150,
		});
	});

	it("deletes only unreferenced bank accounts", async () => {
		const { api, account, current, savings } = await bankFixture();
		const spare = await api.banking.createAccount({ name: "Spare" });
		await api.banking.deposit(current.id, {
			amount: 100,
			transactionDate: "2024-03-01",
			counterAccountId: account("3100"),
		});
		await api.banking.transfer({
			fromAccountId: current.id,
			toAccountId: savings.id,
			amount: 50,
			transferDate: "2024-03-02",
		});

		await expect(api.banking.deleteAccount(savings.id)).rejects.toMatchObject({ reason: "HAS_TRANSFERS" });

		const other = await api.banking.createAccount({ name: "Other" });
		await api.banking.deposit(other.id, { amount: 10, transactionDate: "2024-03-01" });
		await expect(api.banking.deleteAccount(other.id)).rejects.toMatchObject({ reason: "HAS_TRANSACTIONS" });

		await api.banking.deleteAccount(spare.id);
		await expect(api.banking.getAccount(spare.id)).rejects.toMatchObject({ code: "NOT_FOUND" });
	});
});
