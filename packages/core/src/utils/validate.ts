// =============================================================================
// INPUT VALIDATION — amounts and quantities
// =============================================================================

import { ValidationError } from "../error/index.js";

export interface AmountRule {
	/** Accept 0. Default: false */
	allowZero?: boolean;
	/** Inclusive upper bound */
	max?: number;
}

/**
 * Assert that `value` is a safe integer amount in minor units.
 *
 * @example
 * ```ts
 * assertAmount(params.amount, "amount", { max: ctx.options.advanced.maxAmount });
 * ```
 */
export function assertAmount(value: number, field: string, rule: AmountRule = {}): number {
	if (!Number.isSafeInteger(value)) {
		throw new ValidationError(`${field} must be an integer amount in minor units, got ${value}`, {
			details: { field },
		});
	}
	if (value < 0 || (value === 0 && !rule.allowZero)) {
		throw new ValidationError(
			`${field} must be ${rule.allowZero ? "zero or positive" : "positive"}, got ${value}`,
			{ details: { field } },
		);
	}
	if (rule.max !== undefined && value > rule.max) {
		throw new ValidationError(`${field} exceeds the maximum of ${rule.max}`, {
			details: { field, max: rule.max },
		});
	}
	return value;
}

/** Assert a positive whole quantity. */
export function assertQuantity(value: number, field: string): number {
	if (!Number.isSafeInteger(value) || value <= 0) {
		throw new ValidationError(`${field} must be a positive whole number, got ${value}`, {
			details: { field },
		});
	}
	return value;
}

/** Assert a non-empty trimmed string and return it trimmed. */
export function assertText(value: string, field: string): string {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new ValidationError(`${field} is required`, { details: { field } });
	}
	return trimmed;
}
