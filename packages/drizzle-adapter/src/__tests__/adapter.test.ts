import type { SQL } from "drizzle-orm";
import { PgDialect } from "drizzle-orm/pg-core";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { buildDrizzleSql, type DrizzleDatabase, drizzleAdapter } from "../adapter.js";
import { createPooledAdapter } from "../pool.js";

/**
 * SQL generation against a mocked Drizzle database. No PostgreSQL required;
 * executed statements are rendered back to text with the pg dialect.
 */

const dialect = new PgDialect();

function createMockDb() {
	let nextResult: unknown = { rows: [], rowCount: 0 };
	const executed: { sql: string; params: unknown[] }[] = [];

	const execute = vi.fn(async (query: SQL): Promise<unknown> => {
		const rendered = dialect.sqlToQuery(query);
		executed.push({ sql: rendered.sql, params: rendered.params });
		return nextResult;
	});
	const transaction = vi.fn();
	const db: DrizzleDatabase = {
		execute,
		async transaction<T>(fn: (tx: DrizzleDatabase) => Promise<T>): Promise<T> {
			transaction();
			return fn(db);
		},
	};

	return {
		db,
		execute,
		transaction,
		executed,
		setNextResult: (result: unknown) => {
			nextResult = result;
		},
	};
}

describe("buildDrizzleSql", () => {
	it("binds each placeholder to its parameter", () => {
		const query = buildDrizzleSql('SELECT * FROM "account" WHERE "tenant_id" = $1 AND "code" = $2', ["t1", "1000"]);
		expect(dialect.sqlToQuery(query)).toMatchObject({
			sql: 'SELECT * FROM "account" WHERE "tenant_id" = $1 AND "code" = $2',
			params: ["t1", "1000"],
		});
	});

	it("passes statements without placeholders through", () => {
		expect(dialect.sqlToQuery(buildDrizzleSql("SELECT 1", []))).toMatchObject({ sql: "SELECT 1", params: [] });
	});
});

describe("drizzleAdapter", () => {
	let mock: ReturnType<typeof createMockDb>;

	beforeEach(() => {
		mock = createMockDb();
	});

	it("reports postgres capabilities", () => {
		const adapter = drizzleAdapter(mock.db);
		expect(adapter.id).toBe("drizzle");
		expect(adapter.options).toEqual({
			supportsAdvisoryLocks: true,
			supportsForUpdate: true,
			dialectName: "postgres",
			schema: undefined,
		});
	});

	it("inserts into the configured schema and camel-cases the returned row", async () => {
		mock.setNextResult({ rows: [{ id: "a1", tenant_id: "t1", is_system: false }], rowCount: 1 });
		const adapter = drizzleAdapter(mock.db, { schema: "erp" });

		const result = await adapter.create({
			model: "account",
			data: { id: "a1", tenantId: "t1", isSystem: false },
		});

		expect(result).toEqual({ id: "a1", tenantId: "t1", isSystem: false });
		expect(mock.executed[0]).toEqual({
			sql: 'INSERT INTO "erp"."account" ("id", "tenant_id", "is_system") VALUES ($1, $2, $3) RETURNING *',
			params: ["a1", "t1", false],
		});
	});

	it("reads rows returned as a bare array", async () => {
		mock.setNextResult([{ id: "e1", posting_id: "p1" }]);
		const adapter = drizzleAdapter(mock.db);

		const rows = await adapter.findMany({ model: "ledger_entry" });

		expect(rows).toEqual([{ id: "e1", postingId: "p1" }]);
	});

	it("returns null from findOne when nothing matches", async () => {
		const adapter = drizzleAdapter(mock.db);
		const found = await adapter.findOne({
			model: "sales_invoice",
			where: [{ field: "id", operator: "eq", value: "missing" }],
		});
		expect(found).toBeNull();
	});

	it("counts rows", async () => {
		mock.setNextResult({ rows: [{ count: 4 }], rowCount: 1 });
		const adapter = drizzleAdapter(mock.db);

		const count = await adapter.count({
			model: "ledger_entry",
			where: [{ field: "accountId", operator: "eq", value: "a1" }],
		});

		expect(count).toBe(4);
		expect(mock.executed[0]?.sql).toBe('SELECT COUNT(*)::int AS count FROM "ledger_entry" WHERE "account_id" = $1');
	});

	it("takes a transaction-scoped advisory lock", async () => {
		const adapter = drizzleAdapter(mock.db);
		await adapter.advisoryLock(42);
		expect(mock.executed[0]).toEqual({ sql: "SELECT pg_advisory_xact_lock($1)", params: [42] });
	});

	it("runs transaction work on the transaction handle", async () => {
		mock.setNextResult({ rows: [{ id: "c1", value: 1 }], rowCount: 1 });
		const adapter = drizzleAdapter(mock.db, { schema: "erp" });

		const result = await adapter.transaction(async (tx) => {
			expect(tx.id).toBe("drizzle");
			await tx.advisoryLock(7);
			return tx.update<{ id: string; value: number }>({
				model: "sequence_counter",
				where: [{ field: "id", operator: "eq", value: "c1" }],
				update: { value: 1 },
			});
		});

		expect(result).toEqual({ id: "c1", value: 1 });
		expect(mock.transaction).toHaveBeenCalledTimes(1);
		expect(mock.executed.map((e) => e.sql)).toEqual([
			"SELECT pg_advisory_xact_lock($1)",
			'UPDATE "erp"."sequence_counter" SET "value" = $1 WHERE "id" = $2 RETURNING *',
		]);
	});
});

describe("createPooledAdapter", () => {
	it("reports pool stats and closes the pool", async () => {
		const end = vi.fn(async () => {});
		const pool = { end, totalCount: 10, idleCount: 4, waitingCount: 1 };

		const { adapter, close, stats } = createPooledAdapter({ pool, drizzle: createMockDb().db });

		expect(adapter.id).toBe("drizzle");
		expect(stats()).toEqual({ totalCount: 10, idleCount: 4, activeCount: 6, waitingCount: 1 });
		await close();
		expect(end).toHaveBeenCalledTimes(1);
	});
});
