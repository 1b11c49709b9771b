import { describe, expect, it } from "vitest";
import { TradingError } from "../../shared/errors.js";
import { ValidationError, formatIssues, validate, z } from "./index.js";

describe("validate()", () => {
	it("returns ok(data) for valid input", () => {
		const result = validate(z.object({ price: z.number().positive() }), { price: 101.5 });

		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value).toEqual({ price: 101.5 });
		}
	});

	it("returns err(ValidationError) carrying every issue path", () => {
		const schema = z.object({
			order: z.object({ size: z.number(), side: z.enum(["buy", "sell"]) }),
		});
		const result = validate(schema, { order: { size: "2", side: "hold" } });

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ValidationError);
			expect(result.error).toBeInstanceOf(TradingError);
			expect(result.error.code).toBe("VALIDATION_FAILED");
			expect(result.error.issues.map((i) => i.path.join("."))).toEqual([
				"order.size",
				"order.side",
			]);
		}
	});

	it("uses the supplied message", () => {
		const result = validate(z.string(), 42, "bad record");
		expect(!result.ok && result.error.message).toBe("bad record");
	});
});

describe("formatIssues()", () => {
	it("joins path and message pairs", () => {
		expect(
			formatIssues([
				{ path: ["trading", "accountSize"], message: "too small" },
				{ path: [], message: "root problem" },
			]),
		).toBe("trading.accountSize: too small; root problem");
	});
});
