// =============================================================================
// POSTING ROLES — typed replacement for well-known account names
// =============================================================================

export const POSTING_ROLES = [
	"accountsReceivable",
	"accountsPayable",
	"salesRevenue",
	"inventory",
	"vatPayable",
	"badDebtExpense",
	"depreciationExpense",
	"accumulatedDepreciation",
	"salaryExpense",
	"payrollLiabilities",
	"salariesPayable",
] as const;

export type PostingRole = (typeof POSTING_ROLES)[number];

export interface PostingAccountAssignment {
	id: string;
	tenantId: string;
	role: PostingRole;
	accountId: string;
	updatedAt: string;
}

export function isPostingRole(value: string): value is PostingRole {
	return POSTING_ROLES.some((role) => role === value);
}
