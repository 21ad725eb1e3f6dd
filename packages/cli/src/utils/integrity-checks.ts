// =============================================================================
// INTEGRITY CHECKS — read-only queries over a live folio database
// =============================================================================

import { createTableResolver } from "@folio/core/db";
import type { Queryable } from "./database.js";

export interface CheckResult {
	name: string;
	passed: boolean;
	/** Up to `limit` offending rows, one line each */
	failures: string[];
}

interface IntegrityCheck {
	name: string;
	sql: (t: (table: string) => string, limit: number) => string;
	describe: (row: Record<string, unknown>) => string;
}

const short = (value: unknown) => String(value).slice(0, 8);

/** Expected status of a document from its paid and total amounts. */
const EXPECTED_STATUS = `CASE WHEN paid_amount = 0 THEN 'unpaid' WHEN paid_amount >= total_amount THEN 'paid' ELSE 'partial' END`;

export const INTEGRITY_CHECKS: readonly IntegrityCheck[] = [
	{
		name: "Postings balance (debits equal credits)",
		sql: (t, limit) => `
			SELECT tenant_id, posting_id, SUM(debit)::bigint AS debit, SUM(credit)::bigint AS credit
			FROM ${t("ledger_entry")}
			GROUP BY tenant_id, posting_id
			HAVING SUM(debit) <> SUM(credit)
			LIMIT ${limit}`,
		describe: (row) =>
			`posting ${short(row.posting_id)}... (${String(row.tenant_id)}) debit=${String(row.debit)} credit=${String(row.credit)}`,
	},
	{
		name: "Every entry has exactly one non-zero side",
		sql: (t, limit) => `
			SELECT tenant_id, id, debit, credit
			FROM ${t("ledger_entry")}
			WHERE (debit = 0) = (credit = 0) OR debit < 0 OR credit < 0
			LIMIT ${limit}`,
		describe: (row) =>
			`entry ${short(row.id)}... (${String(row.tenant_id)}) debit=${String(row.debit)} credit=${String(row.credit)}`,
	},
	{
		name: "Bank balances match their ledger accounts",
		sql: (t, limit) => `
			SELECT b.tenant_id, b.id, b.name, b.current_balance,
			       COALESCE(SUM(e.debit) - SUM(e.credit), 0)::bigint AS ledger_balance
			FROM ${t("bank_account")} b
			LEFT JOIN ${t("ledger_entry")} e ON e.tenant_id = b.tenant_id AND e.account_id = b.chart_account_id
			WHERE b.chart_account_id IS NOT NULL
			GROUP BY b.tenant_id, b.id, b.name, b.current_balance
			HAVING b.current_balance <> COALESCE(SUM(e.debit) - SUM(e.credit), 0)
			LIMIT ${limit}`,
		describe: (row) =>
			`bank "${String(row.name)}" (${String(row.tenant_id)}) cached=${String(row.current_balance)} ledger=${String(row.ledger_balance)}`,
	},
	{
		name: "Sales invoice status matches payments",
		sql: (t, limit) => `
			SELECT tenant_id, invoice_number AS number, status, total_amount, paid_amount
			FROM ${t("sales_invoice")}
			WHERE status <> 'written_off' AND status <> ${EXPECTED_STATUS}
			LIMIT ${limit}`,
		describe: describeDocument,
	},
	{
		name: "Purchase bill status matches payments",
		sql: (t, limit) => `
			SELECT tenant_id, bill_number AS number, status, total_amount, paid_amount
			FROM ${t("purchase_bill")}
			WHERE status <> 'written_off' AND status <> ${EXPECTED_STATUS}
			LIMIT ${limit}`,
		describe: describeDocument,
	},
];

function describeDocument(row: Record<string, unknown>): string {
	return `${String(row.number)} (${String(row.tenant_id)}) status=${String(row.status)} paid=${String(row.paid_amount)} total=${String(row.total_amount)}`;
}

export async function runIntegrityChecks(client: Queryable, schema: string, limit = 10): Promise<CheckResult[]> {
	const t = createTableResolver(schema);
	const results: CheckResult[] = [];
	for (const check of INTEGRITY_CHECKS) {
		const { rows } = await client.query(check.sql(t, limit));
		results.push({ name: check.name, passed: rows.length === 0, failures: rows.map(check.describe) });
	}
	return results;
}
