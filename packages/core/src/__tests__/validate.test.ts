import { describe, expect, it } from "vitest";
import { ValidationError } from "../error/index.js";
import { assertAmount, assertQuantity, assertText } from "../utils/validate.js";

describe("assertAmount", () => {
	it("accepts positive integers", () => {
		expect(assertAmount(2750, "amount")).toBe(2750);
	});

	it("rejects zero unless allowed", () => {
		expect(() => assertAmount(0, "amount")).toThrow("amount must be positive, got 0");
		expect(assertAmount(0, "amount", { allowZero: true })).toBe(0);
	});

	it("rejects fractions and negatives", () => {
		expect(() => assertAmount(10.5, "amount")).toThrow(ValidationError);
		expect(() => assertAmount(-1, "amount", { allowZero: true })).toThrow(
			"amount must be zero or positive, got -1",
		);
	});

	it("enforces the maximum", () => {
		try {
			assertAmount(1001, "amount", { max: 1000 });
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(ValidationError);
			if (error instanceof ValidationError) {
				expect(error.details).toEqual({ field: "amount", max: 1000, reason: "VALIDATION_FAILED" });
			}
		}
	});
});

describe("assertQuantity", () => {
	it("accepts positive whole numbers only", () => {
		expect(assertQuantity(3, "quantity")).toBe(3);
		expect(() => assertQuantity(0, "quantity")).toThrow("quantity must be a positive whole number, got 0");
		expect(() => assertQuantity(1.5, "quantity")).toThrow(ValidationError);
	});
});

describe("assertText", () => {
	it("trims and requires content", () => {
		expect(assertText("  Cash  ", "name")).toBe("Cash");
		expect(() => assertText("   ", "name")).toThrow("name is required");
	});
});
