// =============================================================================
// MONEY — integer minor units only
// =============================================================================
// Every amount in the ledger is a safe integer count of minor units (cents).
// Conversions to and from decimal strings never go through float arithmetic.

import { ValidationError } from "../error/index.js";

/**
 * Convert minor units to a decimal string.
 * 2750 → "27.50"
 */
export function minorToDecimal(amount: number, currency = "USD"): string {
	const decimals = getDecimalPlaces(currency);
	const negative = amount < 0;
	const digits = String(Math.abs(amount)).padStart(decimals + 1, "0");
	const major = decimals === 0 ? digits : digits.slice(0, -decimals);
	const minor = decimals === 0 ? "" : `.${digits.slice(-decimals)}`;
	return `${negative ? "-" : ""}${major}${minor}`;
}

/**
 * Parse a decimal amount into minor units without float rounding.
 * "27.50" → 2750, "27.5" → 2750, "3" → 300
 *
 * @throws ValidationError on malformed input or too many decimal places
 */
export function decimalToMinor(value: string | number, currency = "USD"): number {
	const decimals = getDecimalPlaces(currency);
	const text = typeof value === "number" ? String(value) : value.trim();
	const match = /^(-)?(\d+)(?:\.(\d+))?$/.exec(text);
	if (!match) {
		throw new ValidationError(`Invalid decimal amount: "${text}"`);
	}
	const [, sign, whole = "0", fraction = ""] = match;
	if (fraction.length > decimals) {
		throw new ValidationError(
			`Amount "${text}" has more than ${decimals} decimal places for ${currency}`,
		);
	}
	const minor = Number(whole + fraction.padEnd(decimals, "0"));
	if (!Number.isSafeInteger(minor)) {
		throw new ValidationError(`Amount "${text}" is out of range`);
	}
	return sign ? -minor : minor;
}

/**
 * Get precision (subunit count) for a currency.
 * USD → 100, JPY → 1, KWD → 1000
 */
export function getCurrencyPrecision(currency: string): number {
	return 10 ** getDecimalPlaces(currency);
}

/** Decimal places used for display and parsing. */
export function getDecimalPlaces(currency: string): number {
	switch (currency) {
		case "JPY":
		case "KRW":
		case "CLP":
		case "VND":
		case "XOF":
		case "XAF":
		case "XPF":
			return 0;
		case "BHD":
		case "KWD":
		case "OMR":
			return 3;
		default:
			return 2;
	}
}

// =============================================================================
// RATES
// =============================================================================

/** Basis points in 100%. */
export const BASIS_POINTS = 10_000;

/**
 * Convert a percentage with at most two decimals into basis points.
 * 10 → 1000, 7.5 → 750
 */
export function rateToBasisPoints(percent: number): number {
	const scaled = percent * 100;
	const bps = Math.round(scaled);
	if (!Number.isFinite(percent) || Math.abs(scaled - bps) > 1e-6) {
		throw new ValidationError(`Rate ${percent}% must have at most two decimal places`);
	}
	if (bps < 0 || bps > BASIS_POINTS) {
		throw new ValidationError(`Rate ${percent}% must be between 0 and 100`);
	}
	return bps;
}

/**
 * Apply a basis-point rate to a non-negative amount, rounding half up.
 * applyBasisPoints(2500, 1000) → 250, applyBasisPoints(105, 1000) → 11
 */
export function applyBasisPoints(amount: number, bps: number): number {
	if (amount < 0) {
		throw new ValidationError("Rates apply to non-negative amounts only");
	}
	return Math.floor((amount * bps + BASIS_POINTS / 2) / BASIS_POINTS);
}

/** Integer division rounding half up, for non-negative operands. */
export function divideRoundHalfUp(numerator: number, denominator: number): number {
	if (denominator <= 0) {
		throw new ValidationError("Divisor must be positive");
	}
	return Math.floor((2 * numerator + denominator) / (2 * denominator));
}
