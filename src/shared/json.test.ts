import { describe, expect, it } from "vitest";
import { jsonObjectSchema, jsonValueSchema } from "./json.js";

describe("json schemas", () => {
	it("accept nested JSON", () => {
		const value = { a: 1, b: ["x", null, { c: true }] };
		expect(jsonObjectSchema.parse(value)).toEqual(value);
	});

	it("reject values JSON cannot carry", () => {
		expect(jsonValueSchema.safeParse(undefined).success).toBe(false);
		expect(jsonObjectSchema.safeParse({ f: () => 1 }).success).toBe(false);
		expect(jsonObjectSchema.safeParse([1, 2]).success).toBe(false);
	});
});
