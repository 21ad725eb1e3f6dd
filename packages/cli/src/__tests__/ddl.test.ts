import type { ColumnDefinition, TableDefinition } from "@folio/core";
import { describe, expect, it } from "vitest";
import { collectInfo } from "../commands/info.js";
import { migrationTables } from "../commands/migrate.js";
import {
	appendOnlyTriggerStatements,
	buildMigrationPlan,
	createTableSQL,
	type ExistingSchema,
	planIsEmpty,
	planToStatements,
} from "../utils/ddl.js";

const uuidPk: ColumnDefinition = { type: "uuid", primaryKey: true, notNull: true };

const tables: Record<string, TableDefinition> = {
	widget: {
		columns: {
			id: uuidPk,
			tenant_id: { type: "text", notNull: true },
			note: { type: "text" },
			qty: { type: "bigint", notNull: true, default: "0" },
		},
		indexes: [
			{ name: "uq_widget_tenant", columns: ["tenant_id", "id"], unique: true },
			{ name: "idx_widget_note", columns: ["note"] },
		],
	},
	gizmo: {
		columns: {
			id: uuidPk,
			widget_id: { type: "uuid", references: { table: "widget", column: "id" } },
		},
	},
};

function existing(tablesWithColumns: Record<string, string[]>, indexes: string[] = []): ExistingSchema {
	return {
		tables: new Map(Object.entries(tablesWithColumns).map(([name, cols]) => [name, new Set(cols)])),
		indexes: new Set(indexes),
	};
}

describe("createTableSQL", () => {
	it("renders columns with keys, defaults and references", () => {
		expect(createTableSQL("widget", tables.widget ?? { columns: {} }, "folio")).toBe(
			[
				`CREATE TABLE IF NOT EXISTS "folio"."widget" (`,
				"  id UUID PRIMARY KEY,",
				"  tenant_id TEXT NOT NULL,",
				"  note TEXT,",
				"  qty BIGINT NOT NULL DEFAULT 0",
				");",
			].join("\n"),
		);
	});

	it("leaves tables unqualified in the public schema", () => {
		expect(createTableSQL("gizmo", tables.gizmo ?? { columns: {} }, "public")).toBe(
			`CREATE TABLE IF NOT EXISTS "gizmo" (\n  id UUID PRIMARY KEY,\n  widget_id UUID REFERENCES "widget"(id)\n);`,
		);
	});
});

describe("buildMigrationPlan", () => {
	it("creates every table on an empty database", () => {
		const plan = buildMigrationPlan(tables, existing({}));
		expect(plan.tablesToCreate.map((t) => t.name)).toEqual(["widget", "gizmo"]);
		expect(plan.columnsToAdd).toEqual([]);
		expect(plan.indexesToCreate.map((i) => i.name)).toEqual(["uq_widget_tenant", "idx_widget_note"]);
	});

	it("adds only the missing columns and indexes", () => {
		const plan = buildMigrationPlan(tables, existing({ widget: ["id", "tenant_id"] }, ["uq_widget_tenant"]));

		expect(plan.tablesToCreate.map((t) => t.name)).toEqual(["gizmo"]);
		expect(plan.columnsToAdd.map((c) => `${c.table}.${c.column}`)).toEqual(["widget.note", "widget.qty"]);
		expect(plan.indexesToCreate).toEqual([
			{ table: "widget", name: "idx_widget_note", columns: ["note"], unique: false },
		]);

		expect(planToStatements(plan, "folio").slice(0, 5)).toEqual([
			`CREATE SCHEMA IF NOT EXISTS "folio";`,
			`CREATE TABLE IF NOT EXISTS "folio"."gizmo" (\n  id UUID PRIMARY KEY,\n  widget_id UUID REFERENCES "folio"."widget"(id)\n);`,
			`ALTER TABLE "folio"."widget" ADD COLUMN IF NOT EXISTS note TEXT;`,
			`ALTER TABLE "folio"."widget" ADD COLUMN IF NOT EXISTS qty BIGINT NOT NULL DEFAULT 0;`,
			`CREATE INDEX IF NOT EXISTS idx_widget_note ON "folio"."widget" (note);`,
		]);
	});

	it("drops NOT NULL from an added column that has no default", () => {
		const plan = buildMigrationPlan(tables, existing({ widget: ["id", "note", "qty"], gizmo: ["id", "widget_id"] }));
		expect(planToStatements(plan, "public")[0]).toBe(
			`ALTER TABLE "widget" ADD COLUMN IF NOT EXISTS tenant_id TEXT;`,
		);
	});

	it("is empty when the database already matches", () => {
		const plan = buildMigrationPlan(
			tables,
			existing(
				{ widget: ["id", "tenant_id", "note", "qty"], gizmo: ["id", "widget_id"] },
				["uq_widget_tenant", "idx_widget_note"],
			),
		);
		expect(planIsEmpty(plan)).toBe(true);
	});
});

describe("append-only triggers", () => {
	it("guards each table against UPDATE and DELETE", () => {
		const statements = appendOnlyTriggerStatements("public", ["ledger_entry"]);
		expect(statements).toHaveLength(2);
		expect(statements[0]).toContain("CREATE OR REPLACE FUNCTION folio_prevent_mutation()");
		expect(statements[1]).toContain(
			`CREATE TRIGGER trg_append_only_ledger_entry BEFORE UPDATE OR DELETE ON "ledger_entry"`,
		);
	});

	it("is appended to every migration", () => {
		const plan = buildMigrationPlan(tables, existing({}));
		// schema + 2 tables + 2 indexes + function + ledger_entry + audit_log
		expect(planToStatements(plan, "folio")).toHaveLength(8);
	});
});

describe("migrationTables", () => {
	it("includes the audit trail table unless switched off", () => {
		expect(Object.keys(migrationTables({ auditLog: true }))).toContain("audit_log");
		expect(Object.keys(migrationTables({ auditLog: false }))).not.toContain("audit_log");
		expect(Object.keys(migrationTables({ auditLog: false }))).toContain("ledger_entry");
	});
});

describe("collectInfo", () => {
	it("lists every table with its column and index counts", () => {
		const info = collectInfo("1.2.3");
		expect(info.version).toBe("1.2.3");
		expect(info.node).toBe(process.version);
		expect(info.tables.map((t) => t.name)).toEqual(Object.keys(migrationTables({ auditLog: true })));
		expect(info.tables.find((t) => t.name === "audit_log")?.indexes).toBe(3);
	});
});
