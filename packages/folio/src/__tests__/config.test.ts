import type { FolioPlugin } from "@folio/core";
import { memoryAdapter } from "@folio/memory-adapter";
import { describe, expect, it } from "vitest";
import {
	buildContext,
	DEFAULT_CHART,
	defineFolioConfig,
	formatDocumentNumber,
	isKnownCurrency,
	sortPlugins,
	validateConfig,
} from "../index.js";
import { createMockLogger } from "./fixtures.js";

describe("validateConfig", () => {
	const database = memoryAdapter();

	it("accepts a minimal configuration", () => {
		expect(() => validateConfig({ database })).not.toThrow();
		expect(defineFolioConfig({ database, currency: "EUR" }).currency).toBe("EUR");
	});

	it("knows ISO 4217 codes in upper case only", () => {
		expect(isKnownCurrency("EUR")).toBe(true);
		expect(isKnownCurrency("eur")).toBe(false);
		expect(isKnownCurrency("XYZ")).toBe(false);
	});

	it("rejects an unknown currency", () => {
		expect(() => validateConfig({ database, currency: "XYZ" })).toThrow('unknown currency "XYZ"');
	});

	it("rejects an invalid schema name", () => {
		expect(() => validateConfig({ database, schema: "ledger-data" })).toThrow(
			"'schema' must contain only alphanumeric characters and underscores",
		);
	});

	it("rejects a non-integer maximum amount", () => {
		expect(() => validateConfig({ database, advanced: { maxAmount: 10.5 } })).toThrow(
			"'advanced.maxAmount' must be a positive safe integer",
		);
	});

	it("checks the chart for duplicate codes, roles and unknown parents", () => {
		expect(() =>
			validateConfig({
				database,
				defaultChart: [
					{ code: "1000", name: "Cash", type: "asset" },
					{ code: "1000", name: "Bank", type: "asset" },
				],
			}),
		).toThrow('duplicate chart account code "1000"');

		expect(() =>
			validateConfig({
				database,
				defaultChart: [
					{ code: "1200", name: "Receivables", type: "asset", role: "accountsReceivable" },
					{ code: "1210", name: "Other receivables", type: "asset", role: "accountsReceivable" },
				],
			}),
		).toThrow('posting role "accountsReceivable" is assigned twice');

		expect(() =>
			validateConfig({
				database,
				defaultChart: [{ code: "1100", name: "Cash", type: "asset", parentCode: "1000" }],
			}),
		).toThrow('references unknown parent "1000"');
	});

	it("accepts the default chart", () => {
		expect(() => validateConfig({ database, defaultChart: DEFAULT_CHART })).not.toThrow();
	});
});

describe("buildContext", () => {
	it("fills in defaults", async () => {
		const logger = createMockLogger();
		const ctx = await buildContext({ database: memoryAdapter(), logger });

		expect(ctx.options).toMatchObject({ currency: "USD", schema: "folio", defaultChart: DEFAULT_CHART });
		expect(ctx.options.advanced.idempotencyTTL).toBe(86_400_000);
		expect(ctx.postingAccounts.size).toBe(0);
		expect(logger.debug).toHaveBeenCalledWith(
			"audit-log plugin is not registered; operations will not be recorded",
		);
	});
});

describe("sortPlugins", () => {
	const plugin = (id: string, dependencies?: string[]): FolioPlugin => ({ id, dependencies });

	it("orders plugins after their dependencies", () => {
		const sorted = sortPlugins([plugin("c", ["b"]), plugin("b", ["a"]), plugin("a")]);
		expect(sorted.map((p) => p.id)).toEqual(["a", "b", "c"]);
	});

	it("rejects duplicates, missing dependencies and cycles", () => {
		expect(() => sortPlugins([plugin("a"), plugin("a")])).toThrow('Duplicate plugin ID: "a"');
		expect(() => sortPlugins([plugin("a", ["x"]), plugin("b")])).toThrow(
			'Plugin "a" requires plugin "x" which is not registered',
		);
		expect(() => sortPlugins([plugin("a", ["b"]), plugin("b", ["a"])])).toThrow(
			"Circular plugin dependency detected among: a, b",
		);
	});
});

describe("formatDocumentNumber", () => {
	it("zero-pads to five digits and grows past them", () => {
		expect(formatDocumentNumber("INV", 42)).toBe("INV-00042");
		expect(formatDocumentNumber("JV", 123456)).toBe("JV-123456");
	});
});
