import { describe, expect, it } from "vitest";
import {
	assertAccountBalance,
	assertBankMatchesLedger,
	assertLedgerBalanced,
	assertPostingsBalanced,
	getTestInstance,
} from "../index.js";

describe("ledger assertions", () => {
	it("pass on a freshly posted ledger", async () => {
		const { api, accountId } = await getTestInstance();
		await api.journals.create({
			voucherDate: "2024-01-01",
			lines: [
				{ accountId: accountId("1100"), debit: 700 },
				{ accountId: accountId("3100"), credit: 700 },
			],
		});

		await expect(assertLedgerBalanced(api)).resolves.toBeUndefined();
		await expect(assertPostingsBalanced(api)).resolves.toBeUndefined();
		await expect(assertAccountBalance(api, accountId("3100"), 700)).resolves.toBeUndefined();
	});

	it("report a wrong expected balance", async () => {
		const { api, accountId } = await getTestInstance();
		await expect(assertAccountBalance(api, accountId("1100"), 5)).rejects.toThrow(
			`Account ${accountId("1100")}: expected balance 5, got 0`,
		);
	});

	it("compare a linked bank account with its ledger account", async () => {
		const { api, accountId } = await getTestInstance();
		const bank = await api.banking.createAccount({ name: "Main", chartAccountId: accountId("1110") });
		await api.banking.deposit(bank.id, {
			amount: 900,
			transactionDate: "2024-01-01",
			counterAccountId: accountId("3100"),
		});

		await expect(assertBankMatchesLedger(api, bank.id)).resolves.toBeUndefined();
	});

	it("scope the instance to its own tenant", async () => {
		const { api, tenantId } = await getTestInstance({ tenantId: "acme" });
		expect(tenantId).toBe("acme");
		expect((await api.accounts.list()).every((a) => a.tenantId === "acme")).toBe(true);
	});
});
