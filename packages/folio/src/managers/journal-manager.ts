// =============================================================================
// JOURNAL VOUCHERS — manual balanced postings
// =============================================================================
// The caller supplies arbitrary lines; the only rule is debit == credit.
// Lines are validated before a number is reserved, so a rejected voucher
// writes nothing and consumes no `JV-` number. Drafts store their lines and
// post later; a posted voucher is immutable.

import { randomUUID } from "node:crypto";
import type {
	FolioContext,
	FolioTransactionAdapter,
	JournalVoucher,
	JournalVoucherLine,
	LedgerLine,
	Where,
} from "@folio/core";
import { assertAmount, assertIsoDate, NotFoundError, ValidationError } from "@folio/core";
import { assertPostableAccounts, postEntries, validateLedgerLines } from "./ledger-store.js";
import { nextDocumentNumber } from "./numbering.js";
import { logAfterCommit, runOperation } from "./operation.js";
import { byTenantAndId, getActor, getBranchId, getTenantId, nowIso } from "./scope.js";

type VoucherRow = Omit<JournalVoucher, "lines">;

export interface CreateJournalVoucherParams {
	voucherDate: string;
	description?: string;
	reference?: string;
	lines: LedgerLine[];
	/** Post immediately (default) or keep as a draft */
	post?: boolean;
	idempotencyKey?: string;
}

async function loadVoucher(
	db: Pick<FolioTransactionAdapter, "findOne" | "findMany">,
	tenantId: string,
	voucherId: string,
): Promise<JournalVoucher> {
	const row = await db.findOne<VoucherRow>({ model: "journal_voucher", where: byTenantAndId(tenantId, voucherId) });
	if (!row) throw new NotFoundError("Journal voucher", voucherId);
	const lines = await db.findMany<JournalVoucherLine>({
		model: "journal_voucher_line",
		where: [
			{ field: "tenantId", operator: "eq", value: tenantId },
			{ field: "voucherId", operator: "eq", value: voucherId },
		],
		sortBy: { field: "lineNo", direction: "asc" },
	});
	return { ...row, lines };
}

function toLedgerLines(lines: JournalVoucherLine[]): LedgerLine[] {
	return lines.map((line) => ({
		accountId: line.accountId,
		debit: line.debit,
		credit: line.credit,
		description: line.description ?? undefined,
	}));
}

export async function createJournalVoucher(
	ctx: FolioContext,
	params: CreateJournalVoucherParams,
): Promise<JournalVoucher> {
	const tenantId = getTenantId(ctx);
	const branchId = getBranchId(ctx);
	const actor = getActor(ctx);
	const post = params.post ?? true;
	const maxAmount = ctx.options.advanced.maxAmount;

	assertIsoDate(params.voucherDate, "voucherDate");
	if (post) {
		validateLedgerLines(params.lines, maxAmount);
	} else {
		params.lines.forEach((line, i) => {
			assertAmount(line.debit ?? 0, `lines[${i}].debit`, { allowZero: true, max: maxAmount });
			assertAmount(line.credit ?? 0, `lines[${i}].credit`, { allowZero: true, max: maxAmount });
		});
	}

	const { idempotencyKey, ...request } = params;

	return runOperation(
		ctx,
		{ type: "journal.create", params: { ...request } },
		async (tx) => {
			await assertPostableAccounts(
				tx,
				tenantId,
				params.lines.map((l) => l.accountId),
			);

			const voucherId = randomUUID();
			const voucherNumber = await nextDocumentNumber(tx, tenantId, "JV");

			let postingId: string | null = null;
			if (post) {
				const posting = await postEntries(tx, ctx, {
					tenantId,
					branchId,
					transactionDate: params.voucherDate,
					description: params.description ?? `Journal voucher ${voucherNumber}`,
					lines: params.lines,
					source: { journalVoucherId: voucherId },
					createdBy: actor,
				});
				postingId = posting.postingId;
			}

			const row = await tx.create<VoucherRow>({
				model: "journal_voucher",
				data: {
					id: voucherId,
					tenantId,
					branchId,
					voucherNumber,
					voucherDate: params.voucherDate,
					description: params.description ?? null,
					reference: params.reference ?? null,
					isPosted: post,
					postingId,
					createdBy: actor,
					createdAt: nowIso(),
				},
			});

			const lines: JournalVoucherLine[] = [];
			for (const [i, line] of params.lines.entries()) {
				lines.push(
					await tx.create<JournalVoucherLine>({
						model: "journal_voucher_line",
						data: {
							id: randomUUID(),
							tenantId,
							voucherId,
							lineNo: i + 1,
							accountId: line.accountId,
							debit: line.debit ?? 0,
							credit: line.credit ?? 0,
							description: line.description ?? null,
						},
					}),
				);
			}

			if (post) {
				const total = lines.reduce((sum, l) => sum + l.debit, 0);
				logAfterCommit(ctx, "Journal voucher posted", { tenantId, voucherNumber, total });
			}
			return { ...row, lines };
		},
		{
			key: idempotencyKey,
			request: { ...request },
			resultId: (voucher) => voucher.id,
			load: (tx, id) => loadVoucher(tx, tenantId, id),
		},
	);
}

/** Post a draft voucher. */
export async function postJournalVoucher(ctx: FolioContext, voucherId: string): Promise<JournalVoucher> {
	const tenantId = getTenantId(ctx);

	return runOperation(ctx, { type: "journal.post", params: { voucherId } }, async (tx) => {
		const row = await tx.findOne<VoucherRow>({
			model: "journal_voucher",
			where: byTenantAndId(tenantId, voucherId),
			forUpdate: true,
		});
		if (!row) throw new NotFoundError("Journal voucher", voucherId);
		if (row.isPosted) {
			throw new ValidationError(`Journal voucher ${row.voucherNumber} is already posted`, {
				reason: "VOUCHER_ALREADY_POSTED",
				details: { voucherId },
			});
		}

		const voucher = await loadVoucher(tx, tenantId, voucherId);
		const posting = await postEntries(tx, ctx, {
			tenantId,
			branchId: row.branchId,
			transactionDate: row.voucherDate,
			description: row.description ?? `Journal voucher ${row.voucherNumber}`,
			lines: toLedgerLines(voucher.lines),
			source: { journalVoucherId: row.id },
			createdBy: getActor(ctx),
		});

		await tx.update<VoucherRow>({
			model: "journal_voucher",
			where: byTenantAndId(tenantId, voucherId),
			update: { isPosted: true, postingId: posting.postingId },
		});

		logAfterCommit(ctx, "Journal voucher posted", {
			tenantId,
			voucherNumber: row.voucherNumber,
			total: posting.totalDebit,
		});
		return { ...voucher, isPosted: true, postingId: posting.postingId };
	});
}

/** Delete a draft. Posted vouchers are immutable. */
export async function deleteJournalVoucher(ctx: FolioContext, voucherId: string): Promise<void> {
	const tenantId = getTenantId(ctx);
	await ctx.adapter.transaction(async (tx) => {
		const row = await tx.findOne<VoucherRow>({
			model: "journal_voucher",
			where: byTenantAndId(tenantId, voucherId),
			forUpdate: true,
		});
		if (!row) throw new NotFoundError("Journal voucher", voucherId);
		if (row.isPosted) {
			throw new ValidationError(`Journal voucher ${row.voucherNumber} is posted and cannot be deleted`, {
				reason: "VOUCHER_POSTED",
				details: { voucherId },
			});
		}
		await tx.delete({
			model: "journal_voucher_line",
			where: [
				{ field: "tenantId", operator: "eq", value: tenantId },
				{ field: "voucherId", operator: "eq", value: voucherId },
			],
		});
		await tx.delete({ model: "journal_voucher", where: byTenantAndId(tenantId, voucherId) });
	});
}

export async function getJournalVoucher(ctx: FolioContext, voucherId: string): Promise<JournalVoucher> {
	return loadVoucher(ctx.adapter, getTenantId(ctx), voucherId);
}

export async function listJournalVouchers(
	ctx: FolioContext,
	params: { isPosted?: boolean; startDate?: string; endDate?: string } = {},
): Promise<JournalVoucher[]> {
	const tenantId = getTenantId(ctx);
	const where: Where[] = [{ field: "tenantId", operator: "eq", value: tenantId }];
	const branchId = getBranchId(ctx);
	if (branchId) where.push({ field: "branchId", operator: "eq", value: branchId });
	if (params.isPosted !== undefined) where.push({ field: "isPosted", operator: "eq", value: params.isPosted });
	if (params.startDate) where.push({ field: "voucherDate", operator: "gte", value: params.startDate });
	if (params.endDate) where.push({ field: "voucherDate", operator: "lte", value: params.endDate });

	const rows = await ctx.adapter.findMany<VoucherRow>({
		model: "journal_voucher",
		where,
		sortBy: { field: "voucherNumber", direction: "asc" },
	});
	return Promise.all(rows.map((row) => loadVoucher(ctx.adapter, tenantId, row.id)));
}
