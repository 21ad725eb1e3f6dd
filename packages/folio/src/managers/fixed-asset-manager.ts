// =============================================================================
// FIXED ASSETS — register and straight-line depreciation
// =============================================================================
// Depreciation:  DR depreciationExpense, CR accumulatedDepreciation
// bookValue = purchaseCost - accumulatedDepreciation, never below salvageValue.

import { randomUUID } from "node:crypto";
import type { Account, DepreciationRecord, FixedAsset, FolioContext, Where } from "@folio/core";
import {
	assertAmount,
	assertIsoDate,
	assertText,
	divideRoundHalfUp,
	NotFoundError,
	todayIso,
	ValidationError,
} from "@folio/core";
import { postEntries } from "./ledger-store.js";
import { logAfterCommit, runOperation } from "./operation.js";
import { requirePostingAccounts } from "./posting-accounts.js";
import { byTenantAndId, getActor, getBranchId, getTenantId, nowIso } from "./scope.js";

export interface CreateFixedAssetParams {
	name: string;
	assetAccountId?: string;
	purchaseDate: string;
	purchaseCost: number;
	salvageValue?: number;
	usefulLifeYears: number;
}

/** (purchaseCost - salvageValue) / usefulLifeYears, rounded half up. */
export function annualDepreciation(asset: Pick<FixedAsset, "purchaseCost" | "salvageValue" | "usefulLifeYears">): number {
	return divideRoundHalfUp(asset.purchaseCost - asset.salvageValue, asset.usefulLifeYears);
}

export async function createFixedAsset(ctx: FolioContext, params: CreateFixedAssetParams): Promise<FixedAsset> {
	const tenantId = getTenantId(ctx);
	const maxAmount = ctx.options.advanced.maxAmount;
	const name = assertText(params.name, "name");
	assertIsoDate(params.purchaseDate, "purchaseDate");
	const purchaseCost = assertAmount(params.purchaseCost, "purchaseCost", { max: maxAmount });
	const salvageValue = assertAmount(params.salvageValue ?? 0, "salvageValue", { allowZero: true, max: purchaseCost });
	if (!Number.isInteger(params.usefulLifeYears) || params.usefulLifeYears <= 0) {
		throw new ValidationError(`usefulLifeYears must be a positive whole number, got ${params.usefulLifeYears}`, {
			details: { field: "usefulLifeYears" },
		});
	}

	if (params.assetAccountId) {
		const account = await ctx.adapter.findOne<Account>({
			model: "account",
			where: byTenantAndId(tenantId, params.assetAccountId),
		});
		if (!account) throw new NotFoundError("Account", params.assetAccountId);
	}

	const asset = await ctx.adapter.create<FixedAsset>({
		model: "fixed_asset",
		data: {
			id: randomUUID(),
			tenantId,
			branchId: getBranchId(ctx),
			name,
			assetAccountId: params.assetAccountId ?? null,
			purchaseDate: params.purchaseDate,
			purchaseCost,
			salvageValue,
			usefulLifeYears: params.usefulLifeYears,
			accumulatedDepreciation: 0,
			bookValue: purchaseCost,
			lastDepreciationDate: null,
			isActive: true,
			createdAt: nowIso(),
		},
	});
	ctx.logger.info("Fixed asset registered", { tenantId, assetId: asset.id, purchaseCost });
	return asset;
}

export async function getFixedAsset(ctx: FolioContext, assetId: string): Promise<FixedAsset> {
	const asset = await ctx.adapter.findOne<FixedAsset>({
		model: "fixed_asset",
		where: byTenantAndId(getTenantId(ctx), assetId),
	});
	if (!asset) throw new NotFoundError("Fixed asset", assetId);
	return asset;
}

export async function listFixedAssets(ctx: FolioContext, params: { includeInactive?: boolean } = {}): Promise<FixedAsset[]> {
	const where: Where[] = [{ field: "tenantId", operator: "eq", value: getTenantId(ctx) }];
	if (!params.includeInactive) where.push({ field: "isActive", operator: "eq", value: true });
	return ctx.adapter.findMany<FixedAsset>({
		model: "fixed_asset",
		where,
		sortBy: { field: "createdAt", direction: "desc" },
	});
}

export async function disposeFixedAsset(ctx: FolioContext, assetId: string): Promise<FixedAsset> {
	const tenantId = getTenantId(ctx);
	const updated = await ctx.adapter.update<FixedAsset>({
		model: "fixed_asset",
		where: byTenantAndId(tenantId, assetId),
		update: { isActive: false },
	});
	if (!updated) throw new NotFoundError("Fixed asset", assetId);
	return updated;
}

/**
 * Record depreciation. The amount defaults to one year of straight-line
 * depreciation.
 *
 * @throws ValidationError (BELOW_SALVAGE_VALUE) when bookValue would drop below salvageValue
 */
export async function depreciate(
	ctx: FolioContext,
	assetId: string,
	params: { amount?: number; date?: string; idempotencyKey?: string } = {},
): Promise<{ asset: FixedAsset; record: DepreciationRecord }> {
	const tenantId = getTenantId(ctx);
	const date = params.date ?? todayIso();
	assertIsoDate(date, "date");

	const { idempotencyKey, ...request } = params;

	return runOperation(
		ctx,
		{ type: "asset.depreciate", params: { assetId, ...request } },
		async (tx) => {
			const asset = await tx.findOne<FixedAsset>({
				model: "fixed_asset",
				where: byTenantAndId(tenantId, assetId),
				forUpdate: true,
			});
			if (!asset) throw new NotFoundError("Fixed asset", assetId);
			if (!asset.isActive) {
				throw new ValidationError(`Fixed asset ${asset.name} is disposed`, {
					reason: "ASSET_INACTIVE",
					details: { assetId },
				});
			}

			const amount = assertAmount(params.amount ?? annualDepreciation(asset), "amount", {
				max: ctx.options.advanced.maxAmount,
			});
			const accumulatedDepreciation = asset.accumulatedDepreciation + amount;
			const bookValue = asset.purchaseCost - accumulatedDepreciation;
			if (bookValue < asset.salvageValue) {
				throw new ValidationError(
					`Depreciating ${amount} would take ${asset.name} below its salvage value of ${asset.salvageValue}`,
					{
						reason: "BELOW_SALVAGE_VALUE",
						details: { assetId, bookValue: asset.bookValue, salvageValue: asset.salvageValue, amount },
					},
				);
			}

			const roles = await requirePostingAccounts(tx, ctx, tenantId, [
				"depreciationExpense",
				"accumulatedDepreciation",
			]);
			const posting = await postEntries(tx, ctx, {
				tenantId,
				branchId: asset.branchId,
				transactionDate: date,
				description: `Depreciation of ${asset.name}`,
				lines: [
					{ accountId: roles.depreciationExpense, debit: amount },
					{ accountId: roles.accumulatedDepreciation, credit: amount },
				],
				source: { fixedAssetId: asset.id },
				createdBy: getActor(ctx),
			});

			const updated = await tx.update<FixedAsset>({
				model: "fixed_asset",
				where: byTenantAndId(tenantId, asset.id),
				update: { accumulatedDepreciation, bookValue, lastDepreciationDate: date },
			});
			if (!updated) throw new NotFoundError("Fixed asset", assetId);

			const record = await tx.create<DepreciationRecord>({
				model: "depreciation_record",
				data: {
					id: randomUUID(),
					tenantId,
					assetId: asset.id,
					amount,
					depreciationDate: date,
					postingId: posting.postingId,
					createdAt: nowIso(),
				},
			});

			logAfterCommit(ctx, "Depreciation posted", { tenantId, assetId: asset.id, amount, bookValue });
			return { asset: updated, record };
		},
		{
			key: idempotencyKey,
			request: { assetId, ...request },
			resultId: (result) => result.record.id,
			load: async (tx, recordId) => {
				const record = await tx.findOne<DepreciationRecord>({
					model: "depreciation_record",
					where: byTenantAndId(tenantId, recordId),
				});
				if (!record) throw new NotFoundError("Depreciation record", recordId);
				const asset = await tx.findOne<FixedAsset>({
					model: "fixed_asset",
					where: byTenantAndId(tenantId, record.assetId),
				});
				if (!asset) throw new NotFoundError("Fixed asset", record.assetId);
				return { asset, record };
			},
		},
	);
}

export async function listDepreciation(ctx: FolioContext, assetId: string): Promise<DepreciationRecord[]> {
	return ctx.adapter.findMany<DepreciationRecord>({
		model: "depreciation_record",
		where: [
			{ field: "tenantId", operator: "eq", value: getTenantId(ctx) },
			{ field: "assetId", operator: "eq", value: assetId },
		],
		sortBy: [
			{ field: "depreciationDate", direction: "asc" },
			{ field: "createdAt", direction: "asc" },
		],
	});
}
