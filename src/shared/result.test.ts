import { describe, expect, it } from "vitest";
import { InvalidStateError, ValidationError } from "./errors.js";
import { type Result, err, isErr, isOk, ok, unwrap } from "./result.js";

const positive = (n: number): Result<number, ValidationError> =>
	n > 0
		? ok(n)
		: err(new ValidationError("Invalid size", [{ path: ["size"], message: "must be positive" }]));

describe("Result", () => {
	it("carries the value of a passing check", () => {
		const r = positive(3);

		expect(isOk(r)).toBe(true);
		expect(isErr(r)).toBe(false);
		expect(r).toEqual({ ok: true, value: 3 });
	});

	it("carries the error of a failing check", () => {
		const r = positive(-1);

		expect(isErr(r)).toBe(true);
		if (isErr(r)) {
			expect(r.error.issues).toEqual([{ path: ["size"], message: "must be positive" }]);
		}
	});

	it("unwrap returns the value", () => {
		expect(unwrap(positive(7))).toBe(7);
	});

	it("unwrap throws the carried error instance", () => {
		const e = new InvalidStateError("order already filled");

		expect(() => unwrap(err(e))).toThrow(e);
		expect(() => unwrap(positive(0))).toThrow(ValidationError);
	});
});
