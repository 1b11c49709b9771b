/**
 * Exact decimal arithmetic for prices, sizes and PnL.
 *
 * Records keep plain numbers since that is what the store persists. Anything
 * that adds or multiplies money converts through here first, so that
 * (110 − 100) × 2 comes out as 20 and not an IEEE 754 neighbour.
 */

import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

export type Sign = -1 | 0 | 1;

export class Decimal {
	static readonly ZERO = new Decimal(new DecimalLight(0));

	private constructor(private readonly raw: DecimalLight) {}

	/** @throws Error for NaN, infinities and blank strings */
	static from(value: string | number): Decimal {
		if (typeof value === "number" && !Number.isFinite(value)) {
			throw new Error(`Decimal.from: invalid number ${value}`);
		}
		if (typeof value === "string" && value.trim() === "") {
			throw new Error("Decimal.from: empty string");
		}
		return new Decimal(new DecimalLight(typeof value === "string" ? value.trim() : value));
	}

	static sum(values: readonly Decimal[]): Decimal {
		let total = Decimal.ZERO;
		for (const v of values) total = total.add(v);
		return total;
	}

	add(other: Decimal): Decimal {
		return new Decimal(this.raw.plus(other.raw));
	}

	sub(other: Decimal): Decimal {
		return new Decimal(this.raw.minus(other.raw));
	}

	mul(other: Decimal): Decimal {
		return new Decimal(this.raw.times(other.raw));
	}

	/** @throws Error on a zero divisor */
	div(other: Decimal): Decimal {
		if (other.raw.isZero()) throw new Error("Decimal.div: division by zero");
		return new Decimal(this.raw.dividedBy(other.raw));
	}

	cmp(other: Decimal): Sign {
		return normalizeSign(this.raw.comparedTo(other.raw));
	}

	eq(other: Decimal): boolean {
		return this.cmp(other) === 0;
	}

	sign(): Sign {
		return this.cmp(Decimal.ZERO);
	}

	/** Negative zero comes back as 0. */
	toNumber(): number {
		const n = this.raw.toNumber();
		return n === 0 ? 0 : n;
	}

	toString(): string {
		return this.raw.toString();
	}
}

function normalizeSign(n: number): Sign {
	if (n > 0) return 1;
	if (n < 0) return -1;
	return 0;
}
