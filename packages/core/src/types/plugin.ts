import type { RawErrorCode } from "../error/codes.js";
import type { FolioContext, RequestContext } from "./context.js";

// =============================================================================
// OPERATION TYPES (for matcher-based hooks)
// =============================================================================

export type FolioOperationType =
	| "account.create"
	| "account.update"
	| "account.delete"
	| "journal.create"
	| "journal.post"
	| "invoice.create"
	| "invoice.payment"
	| "invoice.write_off"
	| "credit_note.create"
	| "bill.create"
	| "bill.payment"
	| "debit_note.create"
	| "bank.deposit"
	| "bank.withdraw"
	| "transfer.create"
	| "asset.depreciate"
	| "payslip.create"
	| "stock.adjust";

export interface FolioOperation {
	type: FolioOperationType;
	params: Record<string, unknown>;
}

export interface FolioHookContext {
	operation: FolioOperation;
	context: FolioContext;
	requestContext?: RequestContext;
	/** The committed result; set for after-hooks only. */
	result?: unknown;
}

// =============================================================================
// TABLE DEFINITION (schema contributions)
// =============================================================================

export interface ColumnDefinition {
	type: "text" | "integer" | "bigint" | "boolean" | "timestamp" | "jsonb" | "uuid";
	primaryKey?: boolean;
	notNull?: boolean;
	default?: string;
	references?: { table: string; column: string };
}

export interface TableDefinition {
	columns: Record<string, ColumnDefinition>;
	indexes?: Array<{
		name: string;
		columns: string[];
		unique?: boolean;
	}>;
}

// =============================================================================
// PLUGIN INTERFACE
// =============================================================================

export interface FolioPlugin {
	id: string;

	/** Plugin IDs that must be registered before this one. */
	dependencies?: string[];

	/** Called once when the context is built */
	init?: (ctx: FolioContext) => Promise<void> | void;

	/**
	 * Matcher-based hooks around every ledger operation.
	 * Before-hooks may cancel; after-hooks run after commit and never roll back.
	 */
	operationHooks?: {
		before?: Array<{
			matcher: (op: FolioOperation) => boolean;
			handler: (params: FolioHookContext) => Promise<undefined | { cancel: true; reason: string }>;
		}>;
		after?: Array<{
			matcher: (op: FolioOperation) => boolean;
			handler: (params: FolioHookContext) => Promise<void>;
		}>;
	};

	/** Tables added by this plugin, keyed by table name */
	schema?: Record<string, TableDefinition>;

	/** Typed error codes contributed by this plugin */
	$ERROR_CODES?: Record<string, RawErrorCode>;

	/** Type inference hints (runtime value is unused) */
	$Infer?: Record<string, unknown>;
}

/**
 * Merge the `$Infer` maps of a plugin tuple.
 *
 * @example
 * ```ts
 * type Types = InferPluginTypes<[ReturnType<typeof auditLog>]>;
 * // { AuditLogEntry: AuditLogEntry }
 * ```
 */
export type InferPluginTypes<TPlugins extends readonly FolioPlugin[]> = TPlugins extends readonly [
	infer First extends FolioPlugin,
	...infer Rest extends FolioPlugin[],
]
	? (First["$Infer"] extends Record<string, unknown> ? First["$Infer"] : Record<string, never>) &
			InferPluginTypes<Rest>
	: Record<string, never>;
