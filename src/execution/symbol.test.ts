import { describe, expect, it } from "vitest";
import { ValidationError } from "../shared/errors.js";
import { splitSymbol } from "./symbol.js";

describe("splitSymbol", () => {
	it("splits BASE-QUOTE", () => {
		expect(splitSymbol("SOL-USDC")).toEqual({ base: "SOL", quote: "USDC" });
	});

	it.each(["SOLUSDC", "SOL-", "-USDC", "A-B-C", ""])("rejects %j", (symbol) => {
		expect(() => splitSymbol(symbol)).toThrow(ValidationError);
	});
});
