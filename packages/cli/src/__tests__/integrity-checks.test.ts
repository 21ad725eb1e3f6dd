import { describe, expect, it } from "vitest";
import type { Queryable, QueryResultLike } from "../utils/database.js";
import { INTEGRITY_CHECKS, runIntegrityChecks } from "../utils/integrity-checks.js";

/** Answers each query with the rows of the first matching table name. */
function fakeClient(rowsByTable: Record<string, Record<string, unknown>[]> = {}) {
	const queries: string[] = [];
	const client: Queryable = {
		query: async (text: string): Promise<QueryResultLike> => {
			queries.push(text);
			const match = Object.keys(rowsByTable).find((table) => text.includes(`"${table}"`));
			return { rows: match ? (rowsByTable[match] ?? []) : [] };
		},
	};
	return { client, queries };
}

describe("runIntegrityChecks", () => {
	it("passes every check on a consistent database", async () => {
		const { client, queries } = fakeClient();
		const results = await runIntegrityChecks(client, "folio");

		expect(results).toHaveLength(INTEGRITY_CHECKS.length);
		expect(results.every((r) => r.passed)).toBe(true);
		expect(queries[0]).toContain(`FROM "folio"."ledger_entry"`);
		expect(queries[0]).toContain("LIMIT 10");
	});

	it("reports offending rows per check", async () => {
		const { client } = fakeClient({
			bank_account: [{ tenant_id: "t1", id: "b1", name: "Operating", current_balance: "500", ledger_balance: "450" }],
			sales_invoice: [
				{ tenant_id: "t1", number: "INV-00001", status: "unpaid", paid_amount: "100", total_amount: "200" },
			],
		});

		const results = await runIntegrityChecks(client, "public", 3);

		expect(results.map((r) => r.passed)).toEqual([true, true, false, false, true]);
		expect(results[2]?.failures).toEqual([`bank "Operating" (t1) cached=500 ledger=450`]);
		expect(results[3]?.failures).toEqual(["INV-00001 (t1) status=unpaid paid=100 total=200"]);
	});

	it("qualifies tables with the schema and applies the row limit", async () => {
		const { client, queries } = fakeClient();
		await runIntegrityChecks(client, "books", 3);
		expect(queries[4]).toContain(`FROM "books"."purchase_bill"`);
		expect(queries.every((q) => q.includes("LIMIT 3"))).toBe(true);
	});
});
