import { ValidationError } from "../shared/errors.js";

export interface TokenPair {
	readonly base: string;
	readonly quote: string;
}

/**
 * Split a "BASE-QUOTE" market symbol into its tokens.
 * @throws ValidationError unless the symbol is exactly two non-empty tokens
 */
export function splitSymbol(symbol: string): TokenPair {
	const parts = symbol.split("-");
	const [base, quote] = parts;
	if (parts.length !== 2 || !base || !quote) {
		throw new ValidationError(`Invalid market symbol: "${symbol}"`, [
			{ path: ["symbol"], message: 'expected "BASE-QUOTE"' },
		]);
	}
	return { base, quote };
}
