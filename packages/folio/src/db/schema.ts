// =============================================================================
// SCHEMA — table definitions for the ledger and the documents that post to it
// =============================================================================
// Column names are snake_case; adapters map them to camelCase record fields.
// The CLI generates PostgreSQL DDL from these definitions.

import type { ColumnDefinition, FolioOptions, TableDefinition } from "@folio/core";
import { toCamelCase } from "@folio/core/db";

const pk: ColumnDefinition = { type: "uuid", primaryKey: true, notNull: true };
const textKey: ColumnDefinition = { type: "text", primaryKey: true, notNull: true };
const tenant: ColumnDefinition = { type: "text", notNull: true };
const money: ColumnDefinition = { type: "bigint", notNull: true, default: "0" };
const date: ColumnDefinition = { type: "text", notNull: true };
const createdAt: ColumnDefinition = { type: "timestamp", notNull: true, default: "NOW()" };

function ref(table: string, notNull = false): ColumnDefinition {
	return { type: "uuid", notNull, references: { table, column: "id" } };
}

const CORE_TABLES: Record<string, TableDefinition> = {
	// --- Account registry ---------------------------------------------------
	account: {
		columns: {
			id: pk,
			tenant_id: tenant,
			code: { type: "text", notNull: true },
			name: { type: "text", notNull: true },
			type: { type: "text", notNull: true },
			parent_id: ref("account"),
			description: { type: "text" },
			is_active: { type: "boolean", notNull: true, default: "TRUE" },
			is_system: { type: "boolean", notNull: true, default: "FALSE" },
			created_at: createdAt,
			updated_at: createdAt,
		},
		indexes: [
			{ name: "uq_account_tenant_code", columns: ["tenant_id", "code"], unique: true },
			{ name: "idx_account_tenant_type", columns: ["tenant_id", "type"] },
		],
	},
	posting_account: {
		columns: {
			id: textKey,
			tenant_id: tenant,
			role: { type: "text", notNull: true },
			account_id: ref("account", true),
			updated_at: createdAt,
		},
		indexes: [{ name: "uq_posting_account_role", columns: ["tenant_id", "role"], unique: true }],
	},

	// --- Ledger store -------------------------------------------------------
	ledger_entry: {
		columns: {
			id: pk,
			tenant_id: tenant,
			branch_id: { type: "text" },
			posting_id: { type: "uuid", notNull: true },
			sequence: { type: "bigint", notNull: true },
			transaction_date: date,
			description: { type: "text" },
			account_id: ref("account", true),
			debit: money,
			credit: money,
			sales_invoice_id: { type: "uuid" },
			purchase_bill_id: { type: "uuid" },
			journal_voucher_id: { type: "uuid" },
			credit_note_id: { type: "uuid" },
			debit_note_id: { type: "uuid" },
			fund_transfer_id: { type: "uuid" },
			bank_transaction_id: { type: "uuid" },
			fixed_asset_id: { type: "uuid" },
			payslip_id: { type: "uuid" },
			customer_id: { type: "uuid" },
			vendor_id: { type: "uuid" },
			created_by: { type: "text" },
			created_at: createdAt,
		},
		indexes: [
			{ name: "uq_ledger_entry_sequence", columns: ["tenant_id", "sequence"], unique: true },
			{ name: "idx_ledger_entry_account_date", columns: ["tenant_id", "account_id", "transaction_date"] },
			{ name: "idx_ledger_entry_posting", columns: ["posting_id"] },
		],
	},
	sequence_counter: {
		columns: {
			id: textKey,
			tenant_id: tenant,
			name: { type: "text", notNull: true },
			value: { type: "bigint", notNull: true, default: "0" },
		},
	},
	idempotency_key: {
		columns: {
			id: textKey,
			tenant_id: tenant,
			key: { type: "text", notNull: true },
			operation: { type: "text", notNull: true },
			fingerprint: { type: "text", notNull: true },
			result_id: { type: "text", notNull: true },
			expires_at: { type: "timestamp", notNull: true },
			created_at: createdAt,
		},
		indexes: [{ name: "idx_idempotency_key_expires", columns: ["expires_at"] }],
	},

	// --- Journal vouchers ---------------------------------------------------
	journal_voucher: {
		columns: {
			id: pk,
			tenant_id: tenant,
			branch_id: { type: "text" },
			voucher_number: { type: "text", notNull: true },
			voucher_date: date,
			description: { type: "text" },
			reference: { type: "text" },
			is_posted: { type: "boolean", notNull: true, default: "FALSE" },
			posting_id: { type: "uuid" },
			created_by: { type: "text" },
			created_at: createdAt,
		},
		indexes: [{ name: "uq_journal_voucher_number", columns: ["tenant_id", "voucher_number"], unique: true }],
	},
	journal_voucher_line: {
		columns: {
			id: pk,
			tenant_id: tenant,
			voucher_id: ref("journal_voucher", true),
			line_no: { type: "integer", notNull: true },
			account_id: ref("account", true),
			debit: money,
			credit: money,
			description: { type: "text" },
		},
		indexes: [{ name: "idx_journal_voucher_line_voucher", columns: ["voucher_id"] }],
	},

	// --- Parties and inventory ---------------------------------------------
	party: {
		columns: {
			id: pk,
			tenant_id: tenant,
			kind: { type: "text", notNull: true },
			name: { type: "text", notNull: true },
			email: { type: "text" },
			phone: { type: "text" },
			is_active: { type: "boolean", notNull: true, default: "TRUE" },
			created_at: createdAt,
		},
		indexes: [{ name: "idx_party_tenant_kind", columns: ["tenant_id", "kind"] }],
	},
	product: {
		columns: {
			id: pk,
			tenant_id: tenant,
			branch_id: { type: "text" },
			name: { type: "text", notNull: true },
			sku: { type: "text" },
			unit_price: money,
			stock_quantity: { type: "bigint", notNull: true, default: "0" },
			is_active: { type: "boolean", notNull: true, default: "TRUE" },
			created_at: createdAt,
			updated_at: createdAt,
		},
		indexes: [{ name: "idx_product_tenant", columns: ["tenant_id"] }],
	},
	stock_movement: {
		columns: {
			id: pk,
			tenant_id: tenant,
			product_id: ref("product", true),
			quantity_change: { type: "bigint", notNull: true },
			quantity_after: { type: "bigint", notNull: true },
			reason: { type: "text", notNull: true },
			source_id: { type: "uuid" },
			created_at: createdAt,
		},
		indexes: [{ name: "idx_stock_movement_product", columns: ["tenant_id", "product_id"] }],
	},

	// --- Sales --------------------------------------------------------------
	sales_invoice: {
		columns: {
			id: pk,
			tenant_id: tenant,
			branch_id: { type: "text" },
			invoice_number: { type: "text", notNull: true },
			customer_id: ref("party", true),
			invoice_date: date,
			due_date: { type: "text" },
			notes: { type: "text" },
			sub_total: money,
			vat_rate: { type: "integer", notNull: true, default: "0" },
			vat_amount: money,
			total_amount: money,
			paid_amount: money,
			status: { type: "text", notNull: true },
			posting_id: { type: "uuid", notNull: true },
			created_by: { type: "text" },
			created_at: createdAt,
			updated_at: createdAt,
		},
		indexes: [
			{ name: "uq_sales_invoice_number", columns: ["tenant_id", "invoice_number"], unique: true },
			{ name: "idx_sales_invoice_status", columns: ["tenant_id", "status"] },
		],
	},
	sales_invoice_item: {
		columns: {
			id: pk,
			tenant_id: tenant,
			invoice_id: ref("sales_invoice", true),
			product_id: ref("product", true),
			description: { type: "text" },
			quantity: { type: "bigint", notNull: true },
			unit_price: money,
			amount: money,
			returned_quantity: { type: "bigint", notNull: true, default: "0" },
		},
		indexes: [{ name: "idx_sales_invoice_item_invoice", columns: ["invoice_id"] }],
	},
	credit_note: {
		columns: {
			id: pk,
			tenant_id: tenant,
			branch_id: { type: "text" },
			note_number: { type: "text", notNull: true },
			invoice_id: ref("sales_invoice", true),
			customer_id: ref("party", true),
			note_date: date,
			reason: { type: "text" },
			total_amount: money,
			posting_id: { type: "uuid", notNull: true },
			created_by: { type: "text" },
			created_at: createdAt,
		},
		indexes: [{ name: "uq_credit_note_number", columns: ["tenant_id", "note_number"], unique: true }],
	},
	credit_note_item: {
		columns: {
			id: pk,
			tenant_id: tenant,
			note_id: ref("credit_note", true),
			source_item_id: ref("sales_invoice_item", true),
			product_id: ref("product", true),
			quantity: { type: "bigint", notNull: true },
			unit_price: money,
			amount: money,
		},
	},

	// --- Purchasing ---------------------------------------------------------
	purchase_bill: {
		columns: {
			id: pk,
			tenant_id: tenant,
			branch_id: { type: "text" },
			bill_number: { type: "text", notNull: true },
			vendor_id: ref("party", true),
			bill_date: date,
			due_date: { type: "text" },
			notes: { type: "text" },
			sub_total: money,
			vat_rate: { type: "integer", notNull: true, default: "0" },
			vat_amount: money,
			total_amount: money,
			paid_amount: money,
			status: { type: "text", notNull: true },
			posting_id: { type: "uuid", notNull: true },
			created_by: { type: "text" },
			created_at: createdAt,
			updated_at: createdAt,
		},
		indexes: [
			{ name: "uq_purchase_bill_number", columns: ["tenant_id", "bill_number"], unique: true },
			{ name: "idx_purchase_bill_status", columns: ["tenant_id", "status"] },
		],
	},
	purchase_bill_item: {
		columns: {
			id: pk,
			tenant_id: tenant,
			bill_id: ref("purchase_bill", true),
			product_id: ref("product", true),
			description: { type: "text" },
			quantity: { type: "bigint", notNull: true },
			unit_price: money,
			amount: money,
			returned_quantity: { type: "bigint", notNull: true, default: "0" },
		},
		indexes: [{ name: "idx_purchase_bill_item_bill", columns: ["bill_id"] }],
	},
	debit_note: {
		columns: {
			id: pk,
			tenant_id: tenant,
			branch_id: { type: "text" },
			note_number: { type: "text", notNull: true },
			bill_id: ref("purchase_bill", true),
			vendor_id: ref("party", true),
			note_date: date,
			reason: { type: "text" },
			total_amount: money,
			posting_id: { type: "uuid", notNull: true },
			created_by: { type: "text" },
			created_at: createdAt,
		},
		indexes: [{ name: "uq_debit_note_number", columns: ["tenant_id", "note_number"], unique: true }],
	},
	debit_note_item: {
		columns: {
			id: pk,
			tenant_id: tenant,
			note_id: ref("debit_note", true),
			source_item_id: ref("purchase_bill_item", true),
			product_id: ref("product", true),
			quantity: { type: "bigint", notNull: true },
			unit_price: money,
			amount: money,
		},
	},
	document_payment: {
		columns: {
			id: pk,
			tenant_id: tenant,
			document_type: { type: "text", notNull: true },
			document_id: { type: "uuid", notNull: true },
			amount: money,
			payment_account_id: ref("account", true),
			payment_date: date,
			reference: { type: "text" },
			posting_id: { type: "uuid", notNull: true },
			created_by: { type: "text" },
			created_at: createdAt,
		},
		indexes: [{ name: "idx_document_payment_document", columns: ["document_type", "document_id"] }],
	},

	// --- Banking ------------------------------------------------------------
	bank_account: {
		columns: {
			id: pk,
			tenant_id: tenant,
			branch_id: { type: "text" },
			name: { type: "text", notNull: true },
			bank_name: { type: "text" },
			account_number: { type: "text" },
			currency: { type: "text", notNull: true },
			current_balance: money,
			chart_account_id: ref("account"),
			is_active: { type: "boolean", notNull: true, default: "TRUE" },
			last_reconciled_at: { type: "text" },
			last_statement_balance: { type: "bigint" },
			created_at: createdAt,
			updated_at: createdAt,
		},
	},
	bank_transaction: {
		columns: {
			id: pk,
			tenant_id: tenant,
			bank_account_id: ref("bank_account", true),
			kind: { type: "text", notNull: true },
			amount: money,
			transaction_date: date,
			description: { type: "text" },
			counter_account_id: ref("account"),
			posting_id: { type: "uuid" },
			balance_after: money,
			created_by: { type: "text" },
			created_at: createdAt,
		},
		indexes: [{ name: "idx_bank_transaction_account", columns: ["bank_account_id"] }],
	},
	fund_transfer: {
		columns: {
			id: pk,
			tenant_id: tenant,
			branch_id: { type: "text" },
			transfer_number: { type: "text", notNull: true },
			from_account_id: ref("bank_account", true),
			to_account_id: ref("bank_account", true),
			amount: money,
			transfer_date: date,
			reference: { type: "text" },
			description: { type: "text" },
			posting_id: { type: "uuid" },
			created_by: { type: "text" },
			created_at: createdAt,
		},
		indexes: [{ name: "uq_fund_transfer_number", columns: ["tenant_id", "transfer_number"], unique: true }],
	},

	// --- Budgets, fixed assets, payroll ------------------------------------
	budget: {
		columns: {
			id: pk,
			tenant_id: tenant,
			name: { type: "text", notNull: true },
			fiscal_year: { type: "integer", notNull: true },
			created_by: { type: "text" },
			created_at: createdAt,
		},
	},
	budget_item: {
		columns: {
			id: pk,
			tenant_id: tenant,
			budget_id: ref("budget", true),
			account_id: ref("account", true),
			amount: money,
			month: { type: "integer" },
		},
	},
	fixed_asset: {
		columns: {
			id: pk,
			tenant_id: tenant,
			branch_id: { type: "text" },
			name: { type: "text", notNull: true },
			asset_account_id: ref("account"),
			purchase_date: date,
			purchase_cost: money,
			salvage_value: money,
			useful_life_years: { type: "integer", notNull: true },
			accumulated_depreciation: money,
			book_value: money,
			last_depreciation_date: { type: "text" },
			is_active: { type: "boolean", notNull: true, default: "TRUE" },
			created_at: createdAt,
		},
	},
	depreciation_record: {
		columns: {
			id: pk,
			tenant_id: tenant,
			asset_id: ref("fixed_asset", true),
			amount: money,
			depreciation_date: date,
			posting_id: { type: "uuid", notNull: true },
			created_at: createdAt,
		},
	},
	employee: {
		columns: {
			id: pk,
			tenant_id: tenant,
			branch_id: { type: "text" },
			name: { type: "text", notNull: true },
			email: { type: "text" },
			gross_salary: money,
			paye_rate: { type: "integer", notNull: true, default: "0" },
			pension_rate: { type: "integer", notNull: true, default: "0" },
			is_active: { type: "boolean", notNull: true, default: "TRUE" },
			created_at: createdAt,
		},
	},
	payslip: {
		columns: {
			id: pk,
			tenant_id: tenant,
			branch_id: { type: "text" },
			payslip_number: { type: "text", notNull: true },
			employee_id: ref("employee", true),
			period_start: date,
			period_end: date,
			pay_date: date,
			gross_salary: money,
			allowances: money,
			paye_amount: money,
			pension_amount: money,
			other_deductions: money,
			total_deductions: money,
			net_pay: money,
			posting_id: { type: "uuid", notNull: true },
			created_by: { type: "text" },
			created_at: createdAt,
		},
		indexes: [{ name: "uq_payslip_number", columns: ["tenant_id", "payslip_number"], unique: true }],
	},
};

/**
 * Core tables merged with the tables plugins contribute.
 *
 * @throws Error when a plugin redefines an existing table
 */
export function getFolioTables(options?: Pick<FolioOptions, "plugins">): Record<string, TableDefinition> {
	const merged: Record<string, TableDefinition> = {};
	for (const [name, def] of Object.entries(CORE_TABLES)) {
		merged[name] = {
			columns: { ...def.columns },
			indexes: def.indexes ? [...def.indexes] : undefined,
		};
	}

	for (const plugin of options?.plugins ?? []) {
		if (!plugin.schema) continue;
		for (const [tableName, tableDef] of Object.entries(plugin.schema)) {
			if (merged[tableName]) {
				throw new Error(`Table "${tableName}" is already defined. Plugin "${plugin.id}" cannot override it.`);
			}
			merged[tableName] = tableDef;
		}
	}

	return merged;
}

/** Integer columns per table, camelCased, for adapters that read BIGINT as text. */
export function getNumericColumns(tables: Record<string, TableDefinition>): Record<string, string[]> {
	const result: Record<string, string[]> = {};
	for (const [tableName, def] of Object.entries(tables)) {
		const numeric = Object.entries(def.columns)
			.filter(([, column]) => column.type === "bigint" || column.type === "integer")
			.map(([name]) => toCamelCase(name));
		if (numeric.length > 0) result[tableName] = numeric;
	}
	return result;
}
