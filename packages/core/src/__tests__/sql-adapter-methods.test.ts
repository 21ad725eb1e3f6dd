import { beforeEach, describe, expect, it, vi } from "vitest";
import { buildSqlAdapterMethods, type SqlExecutor } from "../db/sql-adapter-methods.js";

function createExecutor(rows: Record<string, unknown>[] = []) {
	const query = vi.fn<SqlExecutor["query"]>().mockResolvedValue(rows);
	const mutate = vi.fn<SqlExecutor["mutate"]>().mockResolvedValue(1);
	const advisoryLock = vi.fn<SqlExecutor["advisoryLock"]>().mockResolvedValue(undefined);
	return { query, mutate, advisoryLock };
}

describe("buildSqlAdapterMethods", () => {
	let executor: ReturnType<typeof createExecutor>;

	beforeEach(() => {
		executor = createExecutor();
	});

	it("inserts snake_case columns into the schema-qualified table", async () => {
		executor.query.mockResolvedValue([{ id: "a1", tenant_id: "t1", is_active: true }]);
		const methods = buildSqlAdapterMethods(executor, () => "folio");

		const result = await methods.create({
			model: "account",
			data: { id: "a1", tenantId: "t1", isActive: true, meta: { x: 1 }, parentId: undefined },
		});

		expect(executor.query).toHaveBeenCalledWith(
			'INSERT INTO "folio"."account" ("id", "tenant_id", "is_active", "meta") VALUES ($1, $2, $3, $4) RETURNING *',
			["a1", "t1", true, '{"x":1}'],
		);
		expect(result).toEqual({ id: "a1", tenantId: "t1", isActive: true });
	});

	it("locks the row when findOne is called with forUpdate", async () => {
		const methods = buildSqlAdapterMethods(executor, () => "public");

		const found = await methods.findOne({
			model: "account",
			where: [{ field: "id", operator: "eq", value: "a1" }],
			forUpdate: true,
		});

		expect(found).toBeNull();
		expect(executor.query).toHaveBeenCalledWith(
			'SELECT * FROM "account" WHERE "id" = $1 LIMIT 1 FOR UPDATE',
			["a1"],
		);
	});

	it("appends ORDER BY, LIMIT and OFFSET to findMany", async () => {
		const methods = buildSqlAdapterMethods(executor, () => "public");

		await methods.findMany({
			model: "ledger_entry",
			where: [{ field: "tenantId", operator: "eq", value: "t1" }],
			sortBy: [
				{ field: "transactionDate", direction: "asc" },
				{ field: "sequence", direction: "asc" },
			],
			limit: 10,
			offset: 5,
		});

		expect(executor.query).toHaveBeenCalledWith(
			'SELECT * FROM "ledger_entry" WHERE "tenant_id" = $1 ORDER BY "transaction_date" ASC, "sequence" ASC LIMIT $2 OFFSET $3',
			["t1", 10, 5],
		);
	});

	it("numbers WHERE placeholders after the SET values on update", async () => {
		const methods = buildSqlAdapterMethods(executor, () => "public");

		await methods.update({
			model: "sales_invoice",
			where: [{ field: "id", operator: "eq", value: "i1" }],
			update: { paidAmount: 100, status: "partial" },
		});

		expect(executor.query).toHaveBeenCalledWith(
			'UPDATE "sales_invoice" SET "paid_amount" = $1, "status" = $2 WHERE "id" = $3 RETURNING *',
			[100, "partial", "i1"],
		);
	});

	it("rejects an empty update", async () => {
		const methods = buildSqlAdapterMethods(executor, () => "public");
		await expect(
			methods.update({ model: "account", where: [], update: { name: undefined } }),
		).rejects.toThrow("Cannot update account with empty data");
	});

	it("deletes through mutate", async () => {
		const methods = buildSqlAdapterMethods(executor, () => "public");
		await methods.delete({ model: "account", where: [{ field: "id", operator: "eq", value: "a1" }] });
		expect(executor.mutate).toHaveBeenCalledWith('DELETE FROM "account" WHERE "id" = $1', ["a1"]);
	});

	it("converts the count column to a number", async () => {
		executor.query.mockResolvedValue([{ count: "3" }]);
		const methods = buildSqlAdapterMethods(executor, () => "public");

		const count = await methods.count({ model: "account" });

		expect(count).toBe(3);
		expect(executor.query).toHaveBeenCalledWith(
			'SELECT COUNT(*)::int AS count FROM "account" WHERE TRUE',
			[],
		);
	});

	it("restores numeric columns and ISO timestamps from driver values", async () => {
		executor.query.mockResolvedValue([
			{ id: "e1", code: "1100", debit: "250000", created_at: new Date("2024-03-01T10:00:00.000Z") },
		]);
		const methods = buildSqlAdapterMethods(executor, () => "public", () => ({ ledger_entry: ["debit"] }));

		const rows = await methods.findMany({ model: "ledger_entry" });

		expect(rows).toEqual([{ id: "e1", code: "1100", debit: 250000, createdAt: "2024-03-01T10:00:00.000Z" }]);
	});

	it("delegates advisory locks to the executor", async () => {
		const methods = buildSqlAdapterMethods(executor, () => "public");
		await methods.advisoryLock(42);
		expect(executor.advisoryLock).toHaveBeenCalledWith(42);
	});
});
