// =============================================================================
// DDL — PostgreSQL statements generated from folio table definitions
// =============================================================================
// Planning is pure: it compares the definitions with a snapshot of what the
// database already has, so it can be inspected (and tested) without a server.

import type { ColumnDefinition, TableDefinition } from "@folio/core";
import { createTableResolver } from "@folio/core/db";

/** Tables whose rows are never updated or deleted once written. */
export const APPEND_ONLY_TABLES: readonly string[] = ["ledger_entry", "audit_log"];

export interface ExistingSchema {
	/** Table name → column names */
	tables: Map<string, Set<string>>;
	indexes: Set<string>;
}

export interface MigrationPlan {
	tablesToCreate: Array<{ name: string; def: TableDefinition }>;
	columnsToAdd: Array<{ table: string; column: string; def: ColumnDefinition }>;
	indexesToCreate: Array<{ table: string; name: string; columns: string[]; unique: boolean }>;
}

function pgType(col: ColumnDefinition): string {
	switch (col.type) {
		case "uuid":
			return "UUID";
		case "bigint":
			return "BIGINT";
		case "integer":
			return "INTEGER";
		case "boolean":
			return "BOOLEAN";
		case "timestamp":
			return "TIMESTAMPTZ";
		case "jsonb":
			return "JSONB";
		default:
			return "TEXT";
	}
}

function columnSQL(name: string, col: ColumnDefinition, schema: string): string {
	const t = createTableResolver(schema);
	const parts = [name, pgType(col)];
	if (col.primaryKey) parts.push("PRIMARY KEY");
	if (col.notNull && !col.primaryKey) parts.push("NOT NULL");
	if (col.default) parts.push(`DEFAULT ${col.default}`);
	if (col.references) parts.push(`REFERENCES ${t(col.references.table)}(${col.references.column})`);
	return parts.join(" ");
}

function indexSQL(table: string, index: { name: string; columns: string[]; unique?: boolean }, schema: string): string {
	const t = createTableResolver(schema);
	// Indexes always live in their table's schema.
	const kind = index.unique ? "UNIQUE INDEX" : "INDEX";
	return `CREATE ${kind} IF NOT EXISTS ${index.name} ON ${t(table)} (${index.columns.join(", ")});`;
}

export function createTableSQL(name: string, def: TableDefinition, schema: string): string {
	const t = createTableResolver(schema);
	const columns = Object.entries(def.columns).map(([column, col]) => `  ${columnSQL(column, col, schema)}`);
	return `CREATE TABLE IF NOT EXISTS ${t(name)} (\n${columns.join(",\n")}\n);`;
}

// =============================================================================
// PLANNING
// =============================================================================

/**
 * Tables, columns and indexes the database is missing. Existing columns are
 * never altered or dropped.
 */
export function buildMigrationPlan(tables: Record<string, TableDefinition>, existing: ExistingSchema): MigrationPlan {
	const plan: MigrationPlan = { tablesToCreate: [], columnsToAdd: [], indexesToCreate: [] };

	for (const [name, def] of Object.entries(tables)) {
		const columns = existing.tables.get(name);
		if (!columns) {
			plan.tablesToCreate.push({ name, def });
		} else {
			for (const [column, col] of Object.entries(def.columns)) {
				if (!columns.has(column)) plan.columnsToAdd.push({ table: name, column, def: col });
			}
		}
		for (const index of def.indexes ?? []) {
			if (existing.indexes.has(index.name)) continue;
			plan.indexesToCreate.push({
				table: name,
				name: index.name,
				columns: index.columns,
				unique: index.unique ?? false,
			});
		}
	}

	return plan;
}

export function planIsEmpty(plan: MigrationPlan): boolean {
	return plan.tablesToCreate.length === 0 && plan.columnsToAdd.length === 0 && plan.indexesToCreate.length === 0;
}

/**
 * Tables are created in definition order, which lists every referenced table
 * before the tables that point at it.
 */
export function planToStatements(plan: MigrationPlan, schema: string): string[] {
	const t = createTableResolver(schema);
	const statements: string[] = [];
	if (schema !== "public") statements.push(`CREATE SCHEMA IF NOT EXISTS "${schema}";`);

	for (const table of plan.tablesToCreate) {
		statements.push(createTableSQL(table.name, table.def, schema));
	}
	for (const { table, column, def } of plan.columnsToAdd) {
		// NOT NULL without a default would fail on a table that has rows.
		const notNull = def.notNull && def.default ? " NOT NULL" : "";
		const defaultClause = def.default ? ` DEFAULT ${def.default}` : "";
		statements.push(
			`ALTER TABLE ${t(table)} ADD COLUMN IF NOT EXISTS ${column} ${pgType(def)}${notNull}${defaultClause};`,
		);
	}
	for (const index of plan.indexesToCreate) {
		statements.push(indexSQL(index.table, index, schema));
	}
	statements.push(...appendOnlyTriggerStatements(schema, [...APPEND_ONLY_TABLES]));
	return statements;
}

// =============================================================================
// APPEND-ONLY TRIGGERS
// =============================================================================

/** Reject UPDATE and DELETE on ledger tables at the database level. */
export function appendOnlyTriggerStatements(schema: string, tableNames: string[]): string[] {
	const t = createTableResolver(schema);
	const fn = schema === "public" ? "folio_prevent_mutation" : `"${schema}".folio_prevent_mutation`;
	const statements = [
		`CREATE OR REPLACE FUNCTION ${fn}()
RETURNS TRIGGER AS $$
BEGIN
  RAISE EXCEPTION 'Table %.% is append-only', TG_TABLE_SCHEMA, TG_TABLE_NAME;
  RETURN NULL;
END;
$$ LANGUAGE plpgsql;`,
	];

	for (const table of tableNames) {
		const trigger = `trg_append_only_${table}`;
		statements.push(`DO $$ BEGIN
  IF EXISTS (SELECT 1 FROM information_schema.tables WHERE table_schema = '${schema}' AND table_name = '${table}') THEN
    DROP TRIGGER IF EXISTS ${trigger} ON ${t(table)};
    CREATE TRIGGER ${trigger} BEFORE UPDATE OR DELETE ON ${t(table)}
      FOR EACH ROW EXECUTE FUNCTION ${fn}();
  END IF;
END $$;`);
	}
	return statements;
}
