import { describe, expect, it } from "vitest";
import { computeRequestFingerprint, sha256, stableStringify } from "../utils/hash.js";

describe("stableStringify", () => {
	it("sorts keys at every depth", () => {
		expect(stableStringify({ b: 1, a: { d: 2, c: 3 } })).toBe('{"a":{"c":3,"d":2},"b":1}');
	});

	it("drops undefined properties", () => {
		expect(stableStringify({ a: 1, b: undefined })).toBe('{"a":1}');
	});

	it("keeps array order", () => {
		expect(stableStringify([3, 1, 2])).toBe("[3,1,2]");
	});
});

describe("sha256", () => {
	it("returns the hex digest", () => {
		expect(sha256("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
	});
});

describe("computeRequestFingerprint", () => {
	it("ignores key order", () => {
		const first = computeRequestFingerprint({ customerId: "c1", items: [{ qty: 2 }], vatRate: 10 });
		const second = computeRequestFingerprint({ vatRate: 10, items: [{ qty: 2 }], customerId: "c1" });
		expect(first).toBe(second);
	});

	it("changes when any value changes", () => {
		const first = computeRequestFingerprint({ amount: 100 });
		const second = computeRequestFingerprint({ amount: 101 });
		expect(first).not.toBe(second);
		expect(first).toHaveLength(64);
	});
});
