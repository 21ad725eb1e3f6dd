import { describe, expect, it } from "vitest";
import { setupTenantFixture } from "./fixtures.js";

describe("journal vouchers", () => {
	it("posts a balanced voucher and updates balances", async () => {
		const { api, account } = await setupTenantFixture();

		const voucher = await api.journals.create({
			voucherDate: "2024-01-05",
			description: "Owner investment",
			lines: [
				{ accountId: account("1100"), debit: 5000 },
				{ accountId: account("3100"), credit: 5000 },
			],
		});

		expect(voucher.voucherNumber).toBe("JV-00001");
		expect(voucher.isPosted).toBe(true);
		expect(voucher.lines.map((l) => [l.lineNo, l.debit, l.credit])).toEqual([
			[1, 5000, 0],
			[2, 0, 5000],
		]);

		expect(await api.accounts.getRawBalance(account("1100"))).toBe(5000);
		expect(await api.accounts.getBalance(account("3100"))).toBe(5000);
		expect(await api.accounts.getRawBalance(account("3100"))).toBe(-5000);

		const entries = await api.ledger.listEntries({ postingId: voucher.postingId ?? "" });
		expect(entries).toHaveLength(2);
		expect(entries.every((e) => e.journalVoucherId === voucher.id)).toBe(true);
		expect(entries.map((e) => e.sequence)).toEqual([1, 2]);
	});

	it("rejects an unbalanced voucher without writing entries or consuming a number", async () => {
		const { api, account } = await setupTenantFixture();

		await expect(
			api.journals.create({
				voucherDate: "2024-01-05",
				lines: [
					{ accountId: account("1100"), debit: 5000 },
					{ accountId: account("3100"), credit: 4000 },
				],
			}),
		).rejects.toMatchObject({ code: "UNBALANCED_ENTRIES", status: 400 });

		expect(await api.ledger.listEntries()).toHaveLength(0);
		expect(await api.journals.list()).toHaveLength(0);

		const next = await api.journals.create({
			voucherDate: "2024-01-05",
			lines: [
				{ accountId: account("1100"), debit: 100 },
				{ accountId: account("3100"), credit: 100 },
			],
		});
		expect(next.voucherNumber).toBe("JV-00001");
	});

	it("rejects lines with neither side set", async () => {
		const { api, account } = await setupTenantFixture();
		await expect(
			api.journals.create({
				voucherDate: "2024-01-05",
				lines: [
					{ accountId: account("1100"), debit: 100 },
					{ accountId: account("3100"), credit: 100 },
					{ accountId: account("3200") },
				],
			}),
		).rejects.toMatchObject({ reason: "EMPTY_LINE" });
	});

	it("rejects a single-line voucher", async () => {
		const { api, account } = await setupTenantFixture();
		await expect(
			api.journals.create({ voucherDate: "2024-01-05", lines: [{ accountId: account("1100"), debit: 100 }] }),
		).rejects.toMatchObject({ reason: "TOO_FEW_LINES" });
	});

	it("rejects unknown and inactive accounts", async () => {
		const { api, account } = await setupTenantFixture();

		await expect(
			api.journals.create({
				voucherDate: "2024-01-05",
				lines: [
					{ accountId: "missing", debit: 100 },
					{ accountId: account("3100"), credit: 100 },
				],
			}),
		).rejects.toMatchObject({ code: "NOT_FOUND" });

		const petty = await api.accounts.create({ code: "1150", name: "Petty Cash", type: "asset" });
		await api.accounts.update(petty.id, { isActive: false });
		await expect(
			api.journals.create({
				voucherDate: "2024-01-05",
				lines: [
					{ accountId: petty.id, debit: 100 },
					{ accountId: account("3100"), credit: 100 },
				],
			}),
		).rejects.toMatchObject({ reason: "ACCOUNT_INACTIVE" });
	});

	it("keeps drafts off the ledger until posted", async () => {
		const { api, account } = await setupTenantFixture();

		const draft = await api.journals.create({
			voucherDate: "2024-02-01",
			post: false,
			lines: [
				{ accountId: account("5200"), debit: 750 },
				{ accountId: account("1100"), credit: 750 },
			],
		});
		expect(draft.isPosted).toBe(false);
		expect(draft.postingId).toBeNull();
		expect(await api.ledger.listEntries()).toHaveLength(0);

		const posted = await api.journals.post(draft.id);
		expect(posted.isPosted).toBe(true);
		expect(await api.accounts.getBalance(account("5200"))).toBe(750);

		await expect(api.journals.post(draft.id)).rejects.toMatchObject({ reason: "VOUCHER_ALREADY_POSTED" });
		await expect(api.journals.delete(draft.id)).rejects.toMatchObject({ reason: "VOUCHER_POSTED" });
	});

	it("posting an unbalanced draft fails and leaves it a draft", async () => {
		const { api, account } = await setupTenantFixture();

		const draft = await api.journals.create({
			voucherDate: "2024-02-01",
			post: false,
			lines: [
				{ accountId: account("5200"), debit: 750 },
				{ accountId: account("1100"), credit: 700 },
			],
		});
		await expect(api.journals.post(draft.id)).rejects.toMatchObject({ code: "UNBALANCED_ENTRIES" });
		expect((await api.journals.get(draft.id)).isPosted).toBe(false);

		await api.journals.delete(draft.id);
		await expect(api.journals.get(draft.id)).rejects.toMatchObject({ code: "NOT_FOUND" });
	});

	it("lists vouchers by posting state", async () => {
		const { api, account } = await setupTenantFixture();
		const lines = [
			{ accountId: account("1100"), debit: 10 },
			{ accountId: account("3100"), credit: 10 },
		];
		await api.journals.create({ voucherDate: "2024-03-01", lines });
		await api.journals.create({ voucherDate: "2024-03-02", lines, post: false });

		expect((await api.journals.list({ isPosted: true })).map((v) => v.voucherNumber)).toEqual(["JV-00001"]);
		expect((await api.journals.list({ isPosted: false })).map((v) => v.voucherNumber)).toEqual(["JV-00002"]);
	});
});
