// =============================================================================
// FOLIO — Main entry point
// =============================================================================
// createFolio() builds the context once; forTenant() returns the full API bound
// to a request scope. Every call awaits the shared context lazily.

import type {
	FolioContext,
	FolioOptions,
	FolioPlugin,
	InferPluginTypes,
	LedgerEntry,
	Posting,
	RequestContext,
} from "@folio/core";
import { ConfigurationError } from "@folio/core";
import { buildContext } from "../context/context.js";
import * as accounts from "../managers/account-manager.js";
import * as banking from "../managers/bank-manager.js";
import * as budgets from "../managers/budget-manager.js";
import { getAccountHierarchy, setupTenant } from "../managers/chart-of-accounts.js";
import * as fixedAssets from "../managers/fixed-asset-manager.js";
import { cleanupExpiredKeys } from "../managers/idempotency.js";
import * as inventory from "../managers/inventory-manager.js";
import * as journals from "../managers/journal-manager.js";
import { type EntryFilter, getPosting, listEntries } from "../managers/ledger-store.js";
import * as parties from "../managers/party-manager.js";
import * as payroll from "../managers/payroll-manager.js";
import { assignPostingAccount, getPostingAccounts } from "../managers/posting-accounts.js";
import * as purchases from "../managers/purchase-manager.js";
import * as reports from "../managers/report-manager.js";
import * as sales from "../managers/sales-manager.js";
import { getTenantId } from "../managers/scope.js";
import { queryAuditLog } from "../plugins/audit-log.js";

type ContextGetter = () => Promise<FolioContext>;

/** Bind a `(ctx, ...args)` manager function to a lazily resolved context. */
function scoped<A extends unknown[], R>(
	getCtx: ContextGetter,
	fn: (ctx: FolioContext, ...args: A) => Promise<R>,
): (...args: A) => Promise<R> {
	return async (...args) => fn(await getCtx(), ...args);
}

async function listLedgerEntries(ctx: FolioContext, filter: EntryFilter = {}): Promise<LedgerEntry[]> {
	return listEntries(ctx.adapter, getTenantId(ctx), filter);
}

async function getLedgerPosting(ctx: FolioContext, postingId: string): Promise<Posting | null> {
	return getPosting(ctx.adapter, getTenantId(ctx), postingId);
}

function createTenantApi(getCtx: ContextGetter) {
	return {
		/** Seed the default chart and assign every posting role. Safe to re-run. */
		setup: scoped(getCtx, setupTenant),
		accounts: {
			create: scoped(getCtx, accounts.createAccount),
			get: scoped(getCtx, accounts.getAccount),
			getByCode: scoped(getCtx, accounts.getAccountByCode),
			list: scoped(getCtx, accounts.listAccounts),
			update: scoped(getCtx, accounts.updateAccount),
			delete: scoped(getCtx, accounts.deleteAccount),
			getBalance: scoped(getCtx, accounts.getBalance),
			getRawBalance: scoped(getCtx, accounts.getRawBalance),
			getWithBalance: scoped(getCtx, accounts.getAccountWithBalance),
			getHierarchy: scoped(getCtx, getAccountHierarchy),
		},
		postingAccounts: {
			assign: scoped(getCtx, assignPostingAccount),
			get: scoped(getCtx, getPostingAccounts),
		},
		ledger: {
			listEntries: scoped(getCtx, listLedgerEntries),
			getPosting: scoped(getCtx, getLedgerPosting),
		},
		journals: {
			create: scoped(getCtx, journals.createJournalVoucher),
			post: scoped(getCtx, journals.postJournalVoucher),
			delete: scoped(getCtx, journals.deleteJournalVoucher),
			get: scoped(getCtx, journals.getJournalVoucher),
			list: scoped(getCtx, journals.listJournalVouchers),
		},
		parties: {
			create: scoped(getCtx, parties.createParty),
			get: scoped(getCtx, parties.getParty),
			list: scoped(getCtx, parties.listParties),
			update: scoped(getCtx, parties.updateParty),
		},
		products: {
			create: scoped(getCtx, inventory.createProduct),
			get: scoped(getCtx, inventory.getProduct),
			list: scoped(getCtx, inventory.listProducts),
			update: scoped(getCtx, inventory.updateProduct),
			adjustStock: scoped(getCtx, inventory.adjustStock),
			listMovements: scoped(getCtx, inventory.listStockMovements),
		},
		sales: {
			createInvoice: scoped(getCtx, sales.createInvoice),
			getInvoice: scoped(getCtx, sales.getInvoice),
			listInvoices: scoped(getCtx, sales.listInvoices),
			recordPayment: scoped(getCtx, sales.recordInvoicePayment),
			listPayments: scoped(getCtx, sales.listInvoicePayments),
			writeOff: scoped(getCtx, sales.writeOffInvoice),
			createCreditNote: scoped(getCtx, sales.createCreditNote),
			getCreditNote: scoped(getCtx, sales.getCreditNote),
			listCreditNotes: scoped(getCtx, sales.listCreditNotes),
		},
		purchases: {
			createBill: scoped(getCtx, purchases.createBill),
			getBill: scoped(getCtx, purchases.getBill),
			listBills: scoped(getCtx, purchases.listBills),
			recordPayment: scoped(getCtx, purchases.recordBillPayment),
			listPayments: scoped(getCtx, purchases.listBillPayments),
			createDebitNote: scoped(getCtx, purchases.createDebitNote),
			getDebitNote: scoped(getCtx, purchases.getDebitNote),
			listDebitNotes: scoped(getCtx, purchases.listDebitNotes),
		},
		banking: {
			createAccount: scoped(getCtx, banking.createBankAccount),
			getAccount: scoped(getCtx, banking.getBankAccount),
			listAccounts: scoped(getCtx, banking.listBankAccounts),
			deleteAccount: scoped(getCtx, banking.deleteBankAccount),
			deposit: scoped(getCtx, banking.deposit),
			withdraw: scoped(getCtx, banking.withdraw),
			listTransactions: scoped(getCtx, banking.listBankTransactions),
			transfer: scoped(getCtx, banking.createTransfer),
			getTransfer: scoped(getCtx, banking.getTransfer),
			listTransfers: scoped(getCtx, banking.listTransfers),
			reconcile: scoped(getCtx, banking.reconcile),
			checkLedgerConsistency: scoped(getCtx, banking.checkLedgerConsistency),
		},
		budgets: {
			create: scoped(getCtx, budgets.createBudget),
			addItem: scoped(getCtx, budgets.addBudgetItem),
			get: scoped(getCtx, budgets.getBudget),
			list: scoped(getCtx, budgets.listBudgets),
			delete: scoped(getCtx, budgets.deleteBudget),
		},
		fixedAssets: {
			create: scoped(getCtx, fixedAssets.createFixedAsset),
			get: scoped(getCtx, fixedAssets.getFixedAsset),
			list: scoped(getCtx, fixedAssets.listFixedAssets),
			dispose: scoped(getCtx, fixedAssets.disposeFixedAsset),
			depreciate: scoped(getCtx, fixedAssets.depreciate),
			listDepreciation: scoped(getCtx, fixedAssets.listDepreciation),
		},
		payroll: {
			createEmployee: scoped(getCtx, payroll.createEmployee),
			getEmployee: scoped(getCtx, payroll.getEmployee),
			listEmployees: scoped(getCtx, payroll.listEmployees),
			createPayslip: scoped(getCtx, payroll.createPayslip),
			getPayslip: scoped(getCtx, payroll.getPayslip),
			listPayslips: scoped(getCtx, payroll.listPayslips),
		},
		reports: {
			trialBalance: scoped(getCtx, reports.trialBalance),
			balanceSheet: scoped(getCtx, reports.balanceSheet),
			incomeStatement: scoped(getCtx, reports.incomeStatement),
			generalLedger: scoped(getCtx, reports.generalLedger),
			aging: scoped(getCtx, reports.aging),
			budgetVsActual: scoped(getCtx, reports.budgetVsActual),
			dashboard: scoped(getCtx, reports.dashboardSummary),
		},
		auditLog: {
			query: scoped(getCtx, queryAuditLog),
		},
	};
}

/** The API of one tenant (and optional branch and actor). */
export type FolioTenantApi = ReturnType<typeof createTenantApi>;

// =============================================================================
// FOLIO INTERFACE
// =============================================================================

export interface Folio<TInfer = Record<string, never>> {
	/** Scope every call to a tenant. All reads and writes filter by `tenantId`. */
	forTenant: (scope: RequestContext) => FolioTenantApi;
	/** Delete idempotency keys past their TTL, across all tenants. */
	cleanupExpiredIdempotencyKeys: () => Promise<{ deleted: number }>;
	$context: Promise<FolioContext>;
	$options: FolioOptions;
	/** Type inference from plugins — type-only, runtime value is empty object */
	$Infer: TInfer;
}

export type FolioInstance<TPlugins extends readonly FolioPlugin[] = FolioPlugin[]> = Folio<
	InferPluginTypes<TPlugins>
>;

// =============================================================================
// CREATE FOLIO
// =============================================================================

export function createFolio<const TPlugins extends readonly FolioPlugin[] = FolioPlugin[]>(
	options: FolioOptions & { plugins?: [...TPlugins] },
): Folio<InferPluginTypes<TPlugins>> {
	const ctxPromise = (async () => {
		const ctx = await buildContext(options);
		for (const plugin of ctx.plugins) {
			if (plugin.init) await plugin.init(ctx);
		}
		return ctx;
	})();

	const getCtx = () => ctxPromise;

	return {
		forTenant: (scope) => {
			if (!scope.tenantId || scope.tenantId.trim() === "") {
				throw new ConfigurationError("forTenant() requires a non-empty tenantId");
			}
			const requestContext: RequestContext = { ...scope };
			return createTenantApi(async () => ({ ...(await getCtx()), requestContext }));
		},
		cleanupExpiredIdempotencyKeys: async () => {
			const ctx = await getCtx();
			return cleanupExpiredKeys(ctx);
		},
		$context: ctxPromise,
		$options: options,
		$Infer: {} as InferPluginTypes<TPlugins>,
	};
}
