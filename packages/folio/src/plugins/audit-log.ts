// =============================================================================
// AUDIT LOG PLUGIN
// =============================================================================
// Append-only trail of committed operations: type, tenant, actor, params and
// the id of the resulting record, each row sealed with a SHA-256 hash.

import { randomUUID } from "node:crypto";
import type { FolioContext, FolioOperation, FolioPlugin, TableDefinition, Where } from "@folio/core";
import { sha256, stableStringify } from "@folio/core";
import { getTenantId } from "../managers/scope.js";

// =============================================================================
// TYPES
// =============================================================================

export interface AuditLogOptions {
	/** Which operation types to audit. Default: all operations */
	operations?: FolioOperation["type"][];
}

export interface AuditLogEntry {
	id: string;
	tenantId: string;
	operation: string;
	params: Record<string, unknown>;
	actor: string | null;
	resultId: string | null;
	entryHash: string;
	createdAt: string;
}

// =============================================================================
// SCHEMA
// =============================================================================

const auditLogSchema: Record<string, TableDefinition> = {
	audit_log: {
		columns: {
			id: { type: "uuid", primaryKey: true, notNull: true },
			tenant_id: { type: "text", notNull: true },
			operation: { type: "text", notNull: true },
			params: { type: "jsonb", notNull: true },
			actor: { type: "text" },
			result_id: { type: "text" },
			entry_hash: { type: "text", notNull: true },
			created_at: { type: "timestamp", notNull: true, default: "NOW()" },
		},
		indexes: [
			{ name: "idx_audit_log_tenant_operation", columns: ["tenant_id", "operation"] },
			{ name: "idx_audit_log_actor", columns: ["actor"] },
			{ name: "idx_audit_log_created_at", columns: ["created_at"] },
		],
	},
};

function hashEntry(entry: Pick<AuditLogEntry, "tenantId" | "operation" | "params" | "actor">): string {
	return sha256(
		stableStringify({
			tenantId: entry.tenantId,
			operation: entry.operation,
			params: entry.params,
			actor: entry.actor,
		}),
	);
}

function resultIdOf(result: unknown): string | null {
	if (typeof result !== "object" || result === null || !("id" in result)) return null;
	return typeof result.id === "string" ? result.id : null;
}

// =============================================================================
// PLUGIN FACTORY
// =============================================================================

export function auditLog(options?: AuditLogOptions): FolioPlugin {
	const allowedOps = options?.operations ? new Set<string>(options.operations) : null;

	return {
		id: "audit-log",

		$Infer: {} as { AuditLogEntry: AuditLogEntry },

		schema: auditLogSchema,

		operationHooks: {
			after: [
				{
					matcher: (op) => !allowedOps || allowedOps.has(op.type),
					handler: async ({ operation, context, requestContext, result }) => {
						const entry = {
							tenantId: getTenantId(context),
							operation: operation.type,
							params: operation.params,
							actor: requestContext?.actor ?? null,
						};
						await context.adapter.create<AuditLogEntry>({
							model: "audit_log",
							data: {
								id: randomUUID(),
								...entry,
								resultId: resultIdOf(result),
								entryHash: hashEntry(entry),
								createdAt: new Date().toISOString(),
							},
						});
					},
				},
			],
		},
	};
}

// =============================================================================
// QUERY
// =============================================================================

/**
 * Audit entries of the scoped tenant, newest first. Entries whose hash no
 * longer matches their content are logged as integrity violations.
 */
export async function queryAuditLog(
	ctx: FolioContext,
	params?: {
		operation?: string;
		actor?: string;
		since?: Date;
		until?: Date;
		limit?: number;
		offset?: number;
	},
): Promise<AuditLogEntry[]> {
	const where: Where[] = [{ field: "tenantId", operator: "eq", value: getTenantId(ctx) }];
	if (params?.operation) where.push({ field: "operation", operator: "eq", value: params.operation });
	if (params?.actor) where.push({ field: "actor", operator: "eq", value: params.actor });
	if (params?.since) where.push({ field: "createdAt", operator: "gte", value: params.since.toISOString() });
	if (params?.until) where.push({ field: "createdAt", operator: "lte", value: params.until.toISOString() });

	const entries = await ctx.adapter.findMany<AuditLogEntry>({
		model: "audit_log",
		where,
		sortBy: { field: "createdAt", direction: "desc" },
		limit: params?.limit ?? 50,
		offset: params?.offset ?? 0,
	});

	for (const entry of entries) {
		if (hashEntry(entry) !== entry.entryHash) {
			ctx.logger.error("Audit log entry integrity violation: hash mismatch", {
				entryId: entry.id,
				operation: entry.operation,
			});
		}
	}
	return entries;
}
