import { describe, expect, it } from "vitest";
import { ValidationError } from "../error/index.js";
import { assertIsoDate, daysBetween, isIsoDate, periodBounds, todayIso } from "../utils/date.js";

describe("isIsoDate", () => {
	it("accepts real calendar dates", () => {
		expect(isIsoDate("2024-02-29")).toBe(true);
		expect(isIsoDate("2024-12-31")).toBe(true);
	});

	it("rejects impossible or malformed dates", () => {
		expect(isIsoDate("2023-02-29")).toBe(false);
		expect(isIsoDate("2024-13-01")).toBe(false);
		expect(isIsoDate("2024-1-01")).toBe(false);
		expect(isIsoDate("01/02/2024")).toBe(false);
	});
});

describe("assertIsoDate", () => {
	it("returns the value when valid", () => {
		expect(assertIsoDate("2024-03-01", "dueDate")).toBe("2024-03-01");
	});

	it("names the field on failure", () => {
		expect(() => assertIsoDate("2024-02-30", "dueDate")).toThrow(ValidationError);
		expect(() => assertIsoDate("2024-02-30", "dueDate")).toThrow(
			'dueDate must be a date in YYYY-MM-DD form, got "2024-02-30"',
		);
	});
});

describe("day arithmetic", () => {
	it("counts whole days between dates", () => {
		expect(daysBetween("2024-01-01", "2024-02-15")).toBe(45);
		expect(daysBetween("2024-02-15", "2024-01-01")).toBe(-45);
		expect(daysBetween("2024-03-01", "2024-03-01")).toBe(0);
	});

	it("formats today from a given instant", () => {
		expect(todayIso(new Date("2024-06-15T23:59:00Z"))).toBe("2024-06-15");
	});
});

describe("periodBounds", () => {
	it("covers a whole year", () => {
		expect(periodBounds(2024)).toEqual({ start: "2024-01-01", end: "2024-12-31" });
		expect(periodBounds(2024, null)).toEqual({ start: "2024-01-01", end: "2024-12-31" });
	});

	it("covers one month", () => {
		expect(periodBounds(2024, 2)).toEqual({ start: "2024-02-01", end: "2024-02-29" });
		expect(periodBounds(2023, 11)).toEqual({ start: "2023-11-01", end: "2023-11-30" });
	});
});
