// =============================================================================
// PAYROLL — employees and payslips
// =============================================================================
// paye    = gross × payeRate
// pension = gross × pensionRate
// net     = gross + allowances − (paye + pension + otherDeductions)
//
// Payslip:  DR salaryExpense       (gross + allowances)
//           CR payrollLiabilities  (deductions, when > 0)
//           CR salariesPayable     (net, when > 0)

import { randomUUID } from "node:crypto";
import type { Employee, FolioContext, FolioTransactionAdapter, LedgerLine, Payslip, Where } from "@folio/core";
import {
	applyBasisPoints,
	assertAmount,
	assertIsoDate,
	assertText,
	NotFoundError,
	rateToBasisPoints,
	ValidationError,
} from "@folio/core";
import { postEntries } from "./ledger-store.js";
import { nextDocumentNumber } from "./numbering.js";
import { logAfterCommit, runOperation } from "./operation.js";
import { requirePostingAccounts } from "./posting-accounts.js";
import { byTenantAndId, getActor, getBranchId, getTenantId, nowIso } from "./scope.js";

export interface CreateEmployeeParams {
	name: string;
	email?: string;
	grossSalary: number;
	/** Percent, e.g. 7.5 */
	payeRate?: number;
	/** Percent */
	pensionRate?: number;
}

export interface CreatePayslipParams {
	employeeId: string;
	periodStart: string;
	periodEnd: string;
	payDate: string;
	/** Defaults to the employee's gross salary */
	grossSalary?: number;
	allowances?: number;
	otherDeductions?: number;
	idempotencyKey?: string;
}

export interface PayslipAmounts {
	grossSalary: number;
	allowances: number;
	payeAmount: number;
	pensionAmount: number;
	otherDeductions: number;
	totalDeductions: number;
	netPay: number;
}

export function computePayslipAmounts(
	employee: Pick<Employee, "payeRate" | "pensionRate">,
	input: { grossSalary: number; allowances: number; otherDeductions: number },
): PayslipAmounts {
	const payeAmount = applyBasisPoints(input.grossSalary, employee.payeRate);
	const pensionAmount = applyBasisPoints(input.grossSalary, employee.pensionRate);
	const totalDeductions = payeAmount + pensionAmount + input.otherDeductions;
	return {
		...input,
		payeAmount,
		pensionAmount,
		totalDeductions,
		netPay: input.grossSalary + input.allowances - totalDeductions,
	};
}

export async function createEmployee(ctx: FolioContext, params: CreateEmployeeParams): Promise<Employee> {
	const tenantId = getTenantId(ctx);
	const employee = await ctx.adapter.create<Employee>({
		model: "employee",
		data: {
			id: randomUUID(),
			tenantId,
			branchId: getBranchId(ctx),
			name: assertText(params.name, "name"),
			email: params.email ?? null,
			grossSalary: assertAmount(params.grossSalary, "grossSalary", {
				allowZero: true,
				max: ctx.options.advanced.maxAmount,
			}),
			payeRate: rateToBasisPoints(params.payeRate ?? 0),
			pensionRate: rateToBasisPoints(params.pensionRate ?? 0),
			isActive: true,
			createdAt: nowIso(),
		},
	});
	ctx.logger.info("Employee created", { tenantId, employeeId: employee.id });
	return employee;
}

export async function getEmployee(ctx: FolioContext, employeeId: string): Promise<Employee> {
	const employee = await ctx.adapter.findOne<Employee>({
		model: "employee",
		where: byTenantAndId(getTenantId(ctx), employeeId),
	});
	if (!employee) throw new NotFoundError("Employee", employeeId);
	return employee;
}

export async function listEmployees(ctx: FolioContext, params: { isActive?: boolean } = {}): Promise<Employee[]> {
	const where: Where[] = [{ field: "tenantId", operator: "eq", value: getTenantId(ctx) }];
	if (params.isActive !== undefined) where.push({ field: "isActive", operator: "eq", value: params.isActive });
	return ctx.adapter.findMany<Employee>({ model: "employee", where, sortBy: { field: "name", direction: "asc" } });
}

async function loadPayslip(
	db: Pick<FolioTransactionAdapter, "findOne">,
	tenantId: string,
	payslipId: string,
): Promise<Payslip> {
	const payslip = await db.findOne<Payslip>({ model: "payslip", where: byTenantAndId(tenantId, payslipId) });
	if (!payslip) throw new NotFoundError("Payslip", payslipId);
	return payslip;
}

/**
 * Compute and post a payslip.
 *
 * @throws ValidationError (NEGATIVE_NET_PAY) when deductions exceed gross + allowances
 */
export async function createPayslip(ctx: FolioContext, params: CreatePayslipParams): Promise<Payslip> {
	const tenantId = getTenantId(ctx);
	const actor = getActor(ctx);
	const maxAmount = ctx.options.advanced.maxAmount;
	assertIsoDate(params.periodStart, "periodStart");
	assertIsoDate(params.periodEnd, "periodEnd");
	assertIsoDate(params.payDate, "payDate");
	if (params.periodEnd < params.periodStart) {
		throw new ValidationError("periodEnd must not be before periodStart", {
			details: { periodStart: params.periodStart, periodEnd: params.periodEnd },
		});
	}
	const allowances = assertAmount(params.allowances ?? 0, "allowances", { allowZero: true, max: maxAmount });
	const otherDeductions = assertAmount(params.otherDeductions ?? 0, "otherDeductions", {
		allowZero: true,
		max: maxAmount,
	});

	const { idempotencyKey, ...request } = params;

	return runOperation(
		ctx,
		{ type: "payslip.create", params: { ...request } },
		async (tx) => {
			const employee = await tx.findOne<Employee>({
				model: "employee",
				where: byTenantAndId(tenantId, params.employeeId),
			});
			if (!employee) throw new NotFoundError("Employee", params.employeeId);
			if (!employee.isActive) {
				throw new ValidationError(`Employee ${employee.name} is inactive`, {
					reason: "EMPLOYEE_INACTIVE",
					details: { employeeId: employee.id },
				});
			}

			const grossSalary = assertAmount(params.grossSalary ?? employee.grossSalary, "grossSalary", {
				max: maxAmount,
			});
			const amounts = computePayslipAmounts(employee, { grossSalary, allowances, otherDeductions });
			if (amounts.netPay < 0) {
				throw new ValidationError(`Deductions of ${amounts.totalDeductions} exceed pay for ${employee.name}`, {
					reason: "NEGATIVE_NET_PAY",
					details: { employeeId: employee.id, ...amounts },
				});
			}

			const roles = await requirePostingAccounts(tx, ctx, tenantId, [
				"salaryExpense",
				"payrollLiabilities",
				"salariesPayable",
			]);
			const payslipId = randomUUID();
			const payslipNumber = await nextDocumentNumber(tx, tenantId, "PS");

			const lines: LedgerLine[] = [
				{ accountId: roles.salaryExpense, debit: amounts.grossSalary + amounts.allowances },
			];
			if (amounts.totalDeductions > 0) {
				lines.push({ accountId: roles.payrollLiabilities, credit: amounts.totalDeductions });
			}
			if (amounts.netPay > 0) {
				lines.push({ accountId: roles.salariesPayable, credit: amounts.netPay });
			}

			const branchId = getBranchId(ctx) ?? employee.branchId;
			const posting = await postEntries(tx, ctx, {
				tenantId,
				branchId,
				transactionDate: params.payDate,
				description: `Payslip ${payslipNumber} for ${employee.name}`,
				lines,
				source: { payslipId },
				createdBy: actor,
			});

			const payslip = await tx.create<Payslip>({
				model: "payslip",
				data: {
					id: payslipId,
					tenantId,
					branchId,
					payslipNumber,
					employeeId: employee.id,
					periodStart: params.periodStart,
					periodEnd: params.periodEnd,
					payDate: params.payDate,
					...amounts,
					postingId: posting.postingId,
					createdBy: actor,
					createdAt: nowIso(),
				},
			});

			logAfterCommit(ctx, "Payslip posted", { tenantId, payslipNumber, netPay: amounts.netPay });
			return payslip;
		},
		{
			key: idempotencyKey,
			request: { ...request },
			resultId: (payslip) => payslip.id,
			load: (tx, id) => loadPayslip(tx, tenantId, id),
		},
	);
}

export async function getPayslip(ctx: FolioContext, payslipId: string): Promise<Payslip> {
	return loadPayslip(ctx.adapter, getTenantId(ctx), payslipId);
}

export async function listPayslips(ctx: FolioContext, params: { employeeId?: string } = {}): Promise<Payslip[]> {
	const where: Where[] = [{ field: "tenantId", operator: "eq", value: getTenantId(ctx) }];
	if (params.employeeId) where.push({ field: "employeeId", operator: "eq", value: params.employeeId });
	return ctx.adapter.findMany<Payslip>({
		model: "payslip",
		where,
		sortBy: [
			{ field: "payDate", direction: "desc" },
			{ field: "payslipNumber", direction: "desc" },
		],
	});
}
