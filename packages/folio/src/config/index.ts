import { readFileSync } from "node:fs";
import type { FolioOptions } from "@folio/core";
import { ACCOUNT_TYPES, ConfigurationError, isPostingRole } from "@folio/core";

function loadCurrencies(): Set<string> {
	const parsed: unknown = JSON.parse(
		readFileSync(new URL("./currencies.json", import.meta.url), "utf8"),
	);
	if (!Array.isArray(parsed)) {
		throw new ConfigurationError("currencies.json must contain an array of ISO 4217 codes");
	}
	return new Set(parsed.filter((code): code is string => typeof code === "string"));
}

const VALID_CURRENCIES = loadCurrencies();

export function isKnownCurrency(code: string): boolean {
	return VALID_CURRENCIES.has(code);
}

/**
 * Validate folio configuration options at runtime.
 * Throws ConfigurationError on invalid configuration.
 */
export function validateConfig(options: FolioOptions): void {
	if (!options.database) {
		throw new ConfigurationError("Folio config: 'database' adapter is required");
	}

	if (options.currency !== undefined && !VALID_CURRENCIES.has(options.currency)) {
		throw new ConfigurationError(
			`Folio config: unknown currency "${options.currency}". Use a valid ISO 4217 code.`,
		);
	}

	const adv = options.advanced;
	if (adv) {
		if (
			adv.idempotencyTTL !== undefined &&
			(adv.idempotencyTTL < 0 || !Number.isFinite(adv.idempotencyTTL))
		) {
			throw new ConfigurationError(
				"Folio config: 'advanced.idempotencyTTL' must be a non-negative finite number",
			);
		}
		if (adv.maxAmount !== undefined && (adv.maxAmount <= 0 || !Number.isSafeInteger(adv.maxAmount))) {
			throw new ConfigurationError("Folio config: 'advanced.maxAmount' must be a positive safe integer");
		}
	}

	if (options.schema !== undefined) {
		if (options.schema.length === 0) {
			throw new ConfigurationError("Folio config: 'schema' must be a non-empty string");
		}
		if (!/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(options.schema)) {
			throw new ConfigurationError(
				`Folio config: 'schema' must contain only alphanumeric characters and underscores, got "${options.schema}"`,
			);
		}
	}

	if (options.defaultChart) {
		const codes = new Set<string>();
		const roles = new Set<string>();
		for (const def of options.defaultChart) {
			if (codes.has(def.code)) {
				throw new ConfigurationError(`Folio config: duplicate chart account code "${def.code}"`);
			}
			codes.add(def.code);
			if (!ACCOUNT_TYPES.includes(def.type)) {
				throw new ConfigurationError(
					`Folio config: chart account "${def.code}" has unknown type "${def.type}"`,
				);
			}
			if (def.role !== undefined) {
				if (!isPostingRole(def.role)) {
					throw new ConfigurationError(`Folio config: unknown posting role "${def.role}"`);
				}
				if (roles.has(def.role)) {
					throw new ConfigurationError(`Folio config: posting role "${def.role}" is assigned twice`);
				}
				roles.add(def.role);
			}
		}
		for (const def of options.defaultChart) {
			if (def.parentCode !== undefined && !codes.has(def.parentCode)) {
				throw new ConfigurationError(
					`Folio config: chart account "${def.code}" references unknown parent "${def.parentCode}"`,
				);
			}
		}
	}
}

/**
 * Identity function for defining folio configuration with autocomplete support.
 * Validates configuration at runtime before returning.
 *
 * @example
 * ```ts
 * import { defineFolioConfig } from "folio/config";
 *
 * export default defineFolioConfig({
 *   database: drizzleAdapter(db),
 *   currency: "USD",
 *   plugins: [auditLog()],
 * });
 * ```
 */
export function defineFolioConfig(options: FolioOptions): FolioOptions {
	validateConfig(options);
	return options;
}
