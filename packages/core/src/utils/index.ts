export { assertIsoDate, daysBetween, isIsoDate, periodBounds, todayIso } from "./date.js";
export { computeRequestFingerprint, sha256, stableStringify } from "./hash.js";
export { hashLockKey, lockKeyFor } from "./lock.js";
export {
	applyBasisPoints,
	BASIS_POINTS,
	decimalToMinor,
	divideRoundHalfUp,
	getCurrencyPrecision,
	getDecimalPlaces,
	minorToDecimal,
	rateToBasisPoints,
} from "./money.js";
export { type AmountRule, assertAmount, assertQuantity, assertText } from "./validate.js";
