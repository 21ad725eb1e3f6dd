// =============================================================================
// SHARED ADAPTER UTILITIES
// =============================================================================
// camelCase <-> snake_case conversion and WHERE / ORDER BY building for the
// SQL adapters.

import type { SortBy, Where } from "./adapter.js";

export function toSnakeCase(str: string): string {
	return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

export function toCamelCase(str: string): string {
	return str.replace(/_([a-z0-9])/g, (_, letter: string) => letter.toUpperCase());
}

export function keysToSnake(obj: object): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		if (value === undefined) continue;
		result[toSnakeCase(key)] = value;
	}
	return result;
}

export function keysToCamel(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[toCamelCase(key)] = value;
	}
	return result;
}

function listValue(w: Where): unknown[] {
	if (!Array.isArray(w.value)) {
		throw new Error(`Operator "in" on field "${w.field}" requires an array value`);
	}
	return w.value;
}

const COMPARATORS = {
	eq: "=",
	ne: "!=",
	gt: ">",
	gte: ">=",
	lt: "<",
	lte: "<=",
	like: "LIKE",
} as const;

/**
 * Build a SQL WHERE clause from an array of Where conditions (AND-ed).
 * Returns the clause (without the WHERE keyword) and its parameters, numbered
 * `$startIndex`, `$startIndex + 1`, ...
 */
export function buildWhereClause(
	where: Where[],
	startIndex = 1,
): { clause: string; params: unknown[] } {
	if (where.length === 0) {
		return { clause: "TRUE", params: [] };
	}

	const conditions: string[] = [];
	const params: unknown[] = [];
	let paramIdx = startIndex;

	for (const w of where) {
		const col = toSnakeCase(w.field);

		switch (w.operator) {
			case "in": {
				const values = listValue(w);
				if (values.length === 0) {
					conditions.push("FALSE");
					break;
				}
				const placeholders = values.map((_, i) => `$${paramIdx + i}`).join(", ");
				conditions.push(`"${col}" IN (${placeholders})`);
				params.push(...values);
				paramIdx += values.length;
				break;
			}
			case "is_null":
				conditions.push(`"${col}" IS NULL`);
				break;
			case "is_not_null":
				conditions.push(`"${col}" IS NOT NULL`);
				break;
			default:
				conditions.push(`"${col}" ${COMPARATORS[w.operator]} $${paramIdx}`);
				params.push(w.value);
				paramIdx++;
		}
	}

	return { clause: conditions.join(" AND "), params };
}

/** Normalize a single or multi-column sort into a list. */
export function toSortList(sortBy: SortBy | SortBy[] | undefined): SortBy[] {
	if (!sortBy) return [];
	return Array.isArray(sortBy) ? sortBy : [sortBy];
}

/** Build an ORDER BY clause (with leading space), or "" when unsorted. */
export function buildOrderByClause(sortBy: SortBy | SortBy[] | undefined): string {
	const list = toSortList(sortBy);
	if (list.length === 0) return "";
	const cols = list.map(
		(s) => `"${toSnakeCase(s.field)}" ${s.direction === "desc" ? "DESC" : "ASC"}`,
	);
	return ` ORDER BY ${cols.join(", ")}`;
}
