// =============================================================================
// CALENDAR DATES — ISO `YYYY-MM-DD` strings, interpreted in UTC
// =============================================================================

import { ValidationError } from "../error/index.js";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 86_400_000;

export function isIsoDate(value: string): boolean {
	const match = ISO_DATE.exec(value);
	if (!match) return false;
	const [, y, m, d] = match;
	const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
	return date.toISOString().slice(0, 10) === value;
}

/** @throws ValidationError when `value` is not a real calendar date */
export function assertIsoDate(value: string, field: string): string {
	if (!isIsoDate(value)) {
		throw new ValidationError(`${field} must be a date in YYYY-MM-DD form, got "${value}"`, {
			details: { field },
		});
	}
	return value;
}

export function todayIso(now: Date = new Date()): string {
	return now.toISOString().slice(0, 10);
}

function toUtcMs(date: string): number {
	return Date.parse(`${date}T00:00:00Z`);
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: string, to: string): number {
	return Math.round((toUtcMs(to) - toUtcMs(from)) / DAY_MS);
}

/** First and last day of a calendar year, or of one month in it. */
export function periodBounds(year: number, month?: number | null): { start: string; end: string } {
	if (month === undefined || month === null) {
		return { start: `${year}-01-01`, end: `${year}-12-31` };
	}
	const mm = String(month).padStart(2, "0");
	const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
	return { start: `${year}-${mm}-01`, end: `${year}-${mm}-${String(lastDay).padStart(2, "0")}` };
}
