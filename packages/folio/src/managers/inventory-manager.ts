// =============================================================================
// INVENTORY — products and stock movements
// =============================================================================
// Stock only changes through moveStock(), inside the transaction of the
// document that causes it. Quantities never go negative.

import { randomUUID } from "node:crypto";
import type {
	FolioContext,
	FolioTransactionAdapter,
	Product,
	StockMovement,
	StockMovementReason,
	Where,
} from "@folio/core";
import { assertAmount, assertText, FolioError, NotFoundError, ValidationError } from "@folio/core";
import { logAfterCommit, runOperation } from "./operation.js";
import { byTenantAndId, getBranchId, getTenantId, nowIso } from "./scope.js";

export interface CreateProductParams {
	name: string;
	sku?: string;
	unitPrice: number;
	/** Opening stock, recorded as an adjustment */
	stockQuantity?: number;
}

export async function createProduct(ctx: FolioContext, params: CreateProductParams): Promise<Product> {
	const tenantId = getTenantId(ctx);
	const name = assertText(params.name, "name");
	const unitPrice = assertAmount(params.unitPrice, "unitPrice", {
		allowZero: true,
		max: ctx.options.advanced.maxAmount,
	});
	const opening = params.stockQuantity ?? 0;
	if (!Number.isSafeInteger(opening) || opening < 0) {
		throw new ValidationError(`stockQuantity must be a non-negative whole number, got ${opening}`, {
			details: { field: "stockQuantity" },
		});
	}

	return ctx.adapter.transaction(async (tx) => {
		const now = nowIso();
		const product = await tx.create<Product>({
			model: "product",
			data: {
				id: randomUUID(),
				tenantId,
				branchId: getBranchId(ctx),
				name,
				sku: params.sku ?? null,
				unitPrice,
				stockQuantity: 0,
				isActive: true,
				createdAt: now,
				updatedAt: now,
			},
		});
		if (opening === 0) return product;
		const { product: stocked } = await moveStock(tx, tenantId, product.id, opening, "adjustment", null);
		return stocked;
	});
}

export async function getProduct(ctx: FolioContext, productId: string): Promise<Product> {
	const product = await ctx.adapter.findOne<Product>({
		model: "product",
		where: byTenantAndId(getTenantId(ctx), productId),
	});
	if (!product) throw new NotFoundError("Product", productId);
	return product;
}

export async function listProducts(ctx: FolioContext, params: { isActive?: boolean } = {}): Promise<Product[]> {
	const where: Where[] = [{ field: "tenantId", operator: "eq", value: getTenantId(ctx) }];
	const branchId = getBranchId(ctx);
	if (branchId) where.push({ field: "branchId", operator: "eq", value: branchId });
	if (params.isActive !== undefined) where.push({ field: "isActive", operator: "eq", value: params.isActive });
	return ctx.adapter.findMany<Product>({ model: "product", where, sortBy: { field: "name", direction: "asc" } });
}

export async function updateProduct(
	ctx: FolioContext,
	productId: string,
	params: { name?: string; sku?: string | null; unitPrice?: number; isActive?: boolean },
): Promise<Product> {
	const tenantId = getTenantId(ctx);
	const update: Record<string, unknown> = { updatedAt: nowIso() };
	if (params.name !== undefined) update.name = assertText(params.name, "name");
	if (params.sku !== undefined) update.sku = params.sku;
	if (params.unitPrice !== undefined) {
		update.unitPrice = assertAmount(params.unitPrice, "unitPrice", {
			allowZero: true,
			max: ctx.options.advanced.maxAmount,
		});
	}
	if (params.isActive !== undefined) update.isActive = params.isActive;

	const updated = await ctx.adapter.update<Product>({
		model: "product",
		where: byTenantAndId(tenantId, productId),
		update,
	});
	if (!updated) throw new NotFoundError("Product", productId);
	return updated;
}

/**
 * Manual stock correction. Does not post to the ledger.
 */
export async function adjustStock(
	ctx: FolioContext,
	params: { productId: string; quantityChange: number },
): Promise<{ product: Product; movement: StockMovement }> {
	const tenantId = getTenantId(ctx);
	if (!Number.isSafeInteger(params.quantityChange) || params.quantityChange === 0) {
		throw new ValidationError("quantityChange must be a nonzero whole number", {
			details: { field: "quantityChange" },
		});
	}

	return runOperation(ctx, { type: "stock.adjust", params: { ...params } }, async (tx) => {
		const result = await moveStock(tx, tenantId, params.productId, params.quantityChange, "adjustment", null);
		logAfterCommit(ctx, "Stock adjusted", {
			tenantId,
			productId: params.productId,
			quantityChange: params.quantityChange,
			quantityAfter: result.movement.quantityAfter,
		});
		return result;
	});
}

export async function listStockMovements(ctx: FolioContext, productId: string): Promise<StockMovement[]> {
	return ctx.adapter.findMany<StockMovement>({
		model: "stock_movement",
		where: [
			{ field: "tenantId", operator: "eq", value: getTenantId(ctx) },
			{ field: "productId", operator: "eq", value: productId },
		],
		sortBy: { field: "createdAt", direction: "asc" },
	});
}

// =============================================================================
// STOCK MOVEMENT (transaction-scoped)
// =============================================================================

/**
 * Change a product's stock by `quantityChange` and record the movement.
 *
 * @throws ValidationError (NEGATIVE_STOCK) when the result would be negative
 */
export async function moveStock(
	tx: FolioTransactionAdapter,
	tenantId: string,
	productId: string,
	quantityChange: number,
	reason: StockMovementReason,
	sourceId: string | null,
): Promise<{ product: Product; movement: StockMovement }> {
	const product = await tx.findOne<Product>({
		model: "product",
		where: byTenantAndId(tenantId, productId),
		forUpdate: true,
	});
	if (!product) throw new NotFoundError("Product", productId);

	const quantityAfter = product.stockQuantity + quantityChange;
	if (quantityAfter < 0) {
		throw FolioError.negativeStock(productId, product.stockQuantity, -quantityChange);
	}

	const now = nowIso();
	const updated = await tx.update<Product>({
		model: "product",
		where: byTenantAndId(tenantId, productId),
		update: { stockQuantity: quantityAfter, updatedAt: now },
	});
	if (!updated) throw new NotFoundError("Product", productId);

	const movement = await tx.create<StockMovement>({
		model: "stock_movement",
		data: {
			id: randomUUID(),
			tenantId,
			productId,
			quantityChange,
			quantityAfter,
			reason,
			sourceId,
			createdAt: now,
		},
	});
	return { product: updated, movement };
}
