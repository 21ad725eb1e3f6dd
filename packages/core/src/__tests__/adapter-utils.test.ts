import { describe, expect, it } from "vitest";
import {
	buildOrderByClause,
	buildWhereClause,
	keysToCamel,
	keysToSnake,
	toCamelCase,
	toSnakeCase,
} from "../db/adapter-utils.js";

describe("case conversion", () => {
	it("converts between camelCase and snake_case", () => {
		expect(toSnakeCase("transactionDate")).toBe("transaction_date");
		expect(toCamelCase("sales_invoice_id")).toBe("salesInvoiceId");
		expect(toCamelCase("address_line2")).toBe("addressLine2");
	});

	it("skips undefined values when snake-casing keys", () => {
		expect(keysToSnake({ tenantId: "t1", parentId: undefined, isActive: false })).toEqual({
			tenant_id: "t1",
			is_active: false,
		});
	});

	it("camel-cases row keys", () => {
		expect(keysToCamel({ paid_amount: 40, due_date: null })).toEqual({ paidAmount: 40, dueDate: null });
	});
});

describe("buildWhereClause", () => {
	it("returns TRUE for no conditions", () => {
		expect(buildWhereClause([])).toEqual({ clause: "TRUE", params: [] });
	});

	it("numbers placeholders across operators", () => {
		const { clause, params } = buildWhereClause([
			{ field: "tenantId", operator: "eq", value: "t1" },
			{ field: "accountId", operator: "in", value: ["a", "b"] },
			{ field: "parentId", operator: "is_null", value: null },
			{ field: "transactionDate", operator: "lte", value: "2024-01-31" },
		]);
		expect(clause).toBe(
			'"tenant_id" = $1 AND "account_id" IN ($2, $3) AND "parent_id" IS NULL AND "transaction_date" <= $4',
		);
		expect(params).toEqual(["t1", "a", "b", "2024-01-31"]);
	});

	it("starts numbering at the given index", () => {
		const { clause } = buildWhereClause([{ field: "id", operator: "eq", value: "x" }], 3);
		expect(clause).toBe('"id" = $3');
	});

	it("turns an empty IN list into FALSE", () => {
		expect(buildWhereClause([{ field: "id", operator: "in", value: [] }])).toEqual({
			clause: "FALSE",
			params: [],
		});
	});

	it("rejects IN with a non-array value", () => {
		expect(() => buildWhereClause([{ field: "id", operator: "in", value: "a" }])).toThrow(
			'Operator "in" on field "id" requires an array value',
		);
	});
});

describe("buildOrderByClause", () => {
	it("is empty when unsorted", () => {
		expect(buildOrderByClause(undefined)).toBe("");
	});

	it("supports multiple columns", () => {
		expect(
			buildOrderByClause([
				{ field: "transactionDate", direction: "asc" },
				{ field: "sequence", direction: "desc" },
			]),
		).toBe(' ORDER BY "transaction_date" ASC, "sequence" DESC');
	});
});
