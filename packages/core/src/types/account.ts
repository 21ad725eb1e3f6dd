export type AccountType = "asset" | "liability" | "equity" | "revenue" | "expense";
export type NormalBalance = "debit" | "credit";

export const ACCOUNT_TYPES: readonly AccountType[] = [
	"asset",
	"liability",
	"equity",
	"revenue",
	"expense",
];

export interface Account {
	id: string;
	tenantId: string;
	/** Unique per tenant, e.g. "1100" */
	code: string;
	name: string;
	type: AccountType;
	parentId: string | null;
	description: string | null;
	isActive: boolean;
	/** Seeded by tenant setup; cannot be deleted or deactivated. */
	isSystem: boolean;
	createdAt: string;
	updatedAt: string;
}

export interface AccountWithBalance {
	account: Account;
	/** Signed by the account type's normal side. */
	balance: number;
}

export interface AccountNode extends Account {
	children: AccountNode[];
}
