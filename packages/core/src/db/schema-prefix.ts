// =============================================================================
// SCHEMA PREFIX — qualifies table names with the configured PostgreSQL schema
// =============================================================================

/**
 * Creates a function that returns quoted, schema-qualified table names.
 *
 * - `"public"` → `"ledger_entry"`
 * - `"folio"` → `"folio"."ledger_entry"`
 *
 * @example
 * ```ts
 * const t = createTableResolver("folio");
 * `SELECT * FROM ${t("ledger_entry")} WHERE ...`
 * ```
 */
export function createTableResolver(schema: string): (tableName: string) => string {
	if (schema === "public") {
		return (tableName: string) => `"${tableName}"`;
	}
	return (tableName: string) => `"${schema}"."${tableName}"`;
}
