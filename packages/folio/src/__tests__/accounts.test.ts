import { describe, expect, it } from "vitest";
import { setupTenantFixture } from "./fixtures.js";

describe("chart of accounts", () => {
	it("seeds the default chart with posting roles", async () => {
		const { api, account } = await setupTenantFixture();

		const roots = await api.accounts.getHierarchy();
		expect(roots.map((n) => n.code)).toEqual(["1000", "2000", "3000", "4000", "5000"]);
		const assets = roots[0];
		expect(assets?.children.map((n) => n.code)).toEqual(["1100", "1110", "1200", "1300", "1500"]);
		expect(assets?.children[4]?.children.map((n) => n.code)).toEqual(["1510"]);

		const roles = await api.postingAccounts.get();
		expect(roles.accountsReceivable).toBe(account("1200"));
		expect(roles.salaryExpense).toBe(account("5400"));
	});

	it("runs setup again without duplicating accounts", async () => {
		const { api } = await setupTenantFixture();
		const before = await api.accounts.list();
		const again = await api.setup();

		expect(again.accounts).toHaveLength(before.length);
		expect(await api.accounts.list()).toHaveLength(before.length);
	});

	it("returns the subtree of one account", async () => {
		const { api, account } = await setupTenantFixture();
		const [expenses] = await api.accounts.getHierarchy(account("5000"));
		expect(expenses?.children.map((n) => n.name)).toEqual([
			"Cost of Goods Sold",
			"Operating Expenses",
			"Depreciation Expense",
			"Salary Expense",
		]);
	});
});

describe("account lifecycle", () => {
	it("creates accounts with unique codes", async () => {
		const { api, account } = await setupTenantFixture();
		const created = await api.accounts.create({
			code: "5500",
			name: "Rent",
			type: "expense",
			parentId: account("5000"),
		});

		expect(created).toMatchObject({ code: "5500", isActive: true, isSystem: false, parentId: account("5000") });
		expect((await api.accounts.getByCode("5500")).id).toBe(created.id);

		await expect(api.accounts.create({ code: "5500", name: "Rent again", type: "expense" })).rejects.toMatchObject({
			code: "CONFLICT",
			reason: "DUPLICATE_CODE",
		});
	});

	it("rejects a blank code", async () => {
		const { api } = await setupTenantFixture();
		await expect(api.accounts.create({ code: "  ", name: "Blank", type: "expense" })).rejects.toMatchObject({
			code: "VALIDATION_FAILED",
		});
	});

	it("deletes an unused account and deactivates one with entries", async () => {
		const { api, account } = await setupTenantFixture();
		const unused = await api.accounts.create({ code: "5600", name: "Travel", type: "expense" });
		const used = await api.accounts.create({ code: "5700", name: "Utilities", type: "expense" });
		await api.journals.create({
			voucherDate: "2024-02-01",
			lines: [
				{ accountId: used.id, debit: 120 },
				{ accountId: account("1100"), credit: 120 },
			],
		});

		expect(await api.accounts.delete(unused.id)).toEqual({ deleted: true, deactivated: false });
		await expect(api.accounts.get(unused.id)).rejects.toMatchObject({ code: "NOT_FOUND" });

		expect(await api.accounts.delete(used.id)).toEqual({ deleted: false, deactivated: true });
		expect((await api.accounts.get(used.id)).isActive).toBe(false);
		expect(await api.accounts.getBalance(used.id)).toBe(120);

		await expect(
			api.journals.create({
				voucherDate: "2024-02-02",
				lines: [
					{ accountId: used.id, debit: 10 },
					{ accountId: account("1100"), credit: 10 },
				],
			}),
		).rejects.toMatchObject({ reason: "ACCOUNT_INACTIVE" });
	});

	it("refuses to delete a parent or a system account", async () => {
		const { api, account } = await setupTenantFixture();
		const parent = await api.accounts.create({ code: "6000", name: "Other", type: "expense" });
		await api.accounts.create({ code: "6100", name: "Sundry", type: "expense", parentId: parent.id });

		await expect(api.accounts.delete(parent.id)).rejects.toMatchObject({ reason: "HAS_CHILDREN" });
		await expect(api.accounts.delete(account("1100"))).rejects.toMatchObject({ reason: "SYSTEM_ACCOUNT" });
		await expect(api.accounts.update(account("1100"), { isActive: false })).rejects.toMatchObject({
			reason: "SYSTEM_ACCOUNT",
		});
	});

	it("prevents cycles when re-parenting", async () => {
		const { api } = await setupTenantFixture();
		const top = await api.accounts.create({ code: "7000", name: "Top", type: "expense" });
		const mid = await api.accounts.create({ code: "7100", name: "Mid", type: "expense", parentId: top.id });

		await expect(api.accounts.update(top.id, { parentId: mid.id })).rejects.toMatchObject({
			reason: "INVALID_PARENT",
		});
		await expect(api.accounts.update(top.id, { parentId: top.id })).rejects.toMatchObject({
			reason: "INVALID_PARENT",
		});

		const moved = await api.accounts.update(mid.id, { parentId: null, name: "Middle" });
		expect(moved).toMatchObject({ parentId: null, name: "Middle" });
	});
});

describe("balances", () => {
	it("signs balances by the normal side and honours asOf", async () => {
		const { api, account } = await setupTenantFixture();
		await api.journals.create({
			voucherDate: "2024-01-10",
			lines: [
				{ accountId: account("1100"), debit: 800 },
				{ accountId: account("4200"), credit: 800 },
			],
		});
		await api.journals.create({
			voucherDate: "2024-02-10",
			lines: [
				{ accountId: account("1100"), debit: 200 },
				{ accountId: account("4200"), credit: 200 },
			],
		});

		expect(await api.accounts.getBalance(account("4200"))).toBe(1000);
		expect(await api.accounts.getRawBalance(account("4200"))).toBe(-1000);
		expect(await api.accounts.getBalance(account("1100"), "2024-01-31")).toBe(800);

		const withBalance = await api.accounts.getWithBalance(account("4200"));
		expect(withBalance.account.code).toBe("4200");
		expect(withBalance.balance).toBe(1000);
	});
});

describe("posting roles and tenants", () => {
	it("only assigns active accounts to roles", async () => {
		const { api } = await setupTenantFixture();
		const spare = await api.accounts.create({ code: "4300", name: "Spare", type: "revenue" });
		await api.accounts.update(spare.id, { isActive: false });

		await expect(
			api.postingAccounts.assign({ role: "salesRevenue", accountId: spare.id }),
		).rejects.toMatchObject({ reason: "ACCOUNT_INACTIVE" });
	});

	it("keeps tenants apart", async () => {
		const { folio, account } = await setupTenantFixture();
		const other = folio.forTenant({ tenantId: "t2" });

		expect(await other.accounts.list()).toHaveLength(0);
		await expect(other.accounts.get(account("1100"))).rejects.toMatchObject({ code: "NOT_FOUND" });
		await expect(other.accounts.getByCode("1100")).rejects.toMatchObject({ code: "NOT_FOUND" });
	});

	it("refuses an empty tenant id", async () => {
		const { folio } = await setupTenantFixture();
		expect(() => folio.forTenant({ tenantId: " " })).toThrow("forTenant() requires a non-empty tenantId");
	});
});
