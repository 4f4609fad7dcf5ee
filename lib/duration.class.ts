import { pad } from './shared/string.library.js';
import { ownEntries } from './shared/reflection.library.js';
import { isDefined, isInteger } from './shared/type.library.js';
import { roundHalfEven, toMicroseconds } from './shared/number.library.js';
import { MICRO } from './chronicle.config/chronicle.enum.js';
import { humanize } from './humanize.library.js';
import type { Humanize } from './humanize.library.js';

const SECOND = MICRO.second;
const DAY = MICRO.day;

/** floor division, so that the remainder is never negative */
function divmod(num: bigint, den: bigint): [bigint, bigint] {
	const rem = ((num % den) + den) % den;
	return [(num - rem) / den, rem];
}

/**
 * An immutable, signed elapsed time with microsecond resolution.
 * Arithmetic is on total microseconds; the (days, seconds, microseconds) view
 * keeps seconds and microseconds non-negative, so -1µs is '-1 day, 23:59:59.999999'.
 */
export class Duration {
	/** total microseconds */																	#micro: bigint;

	constructor(micro: bigint = 0n) {
		this.#micro = micro;
	}

	// #region Static public methods~~~~~~~~~~~~~~~~~~~~~~~~~~

	static readonly ZERO = new Duration(0n);

	/**
	 * build from component parts; fractional parts are summed before
	 * a single half-even rounding to microseconds
	 */
	static of(parts: Duration.Parts = {}) {
		let micro = 0n;
		let fraction = 0;

		ownEntries(parts)
			.forEach(([unit, val]) => {
				if (!isDefined(val))
					return;
				if (isInteger(val))
					return void (micro += val * MICRO[unit]);
				if (!Number.isFinite(val))
					throw new RangeError(`Duration ${unit} must be finite, not ${val}`);

				const whole = Math.trunc(val);
				micro += BigInt(whole) * MICRO[unit];
				fraction += (val - whole) * Number(MICRO[unit]);
			})

		const odd = Number(micro % 2n);													// ties go to the even total, not the even fraction
		return new Duration(micro + BigInt(roundHalfEven(fraction + odd) - odd));
	}

	static fromMicroseconds(micro: bigint) {
		return new Duration(micro);
	}

	/** seconds as a number or decimal string; converted without floating-point multiplication */
	static fromSeconds(seconds: number | string) {
		return new Duration(toMicroseconds(seconds));
	}

	/** for Array.sort() */
	static compare(a: Duration, b: Duration) {
		return a.compare(b);
	}

	// #endregion Static public methods

	// #region Instance accessors~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	get totalMicroseconds() { return this.#micro }
	/** whole days, may be negative */
	get days() { return Number(divmod(this.#micro, DAY)[0]) }
	/** 0 … 86399 */
	get seconds() { return Number(divmod(divmod(this.#micro, DAY)[1], SECOND)[0]) }
	/** 0 … 999999 */
	get microseconds() { return Number(divmod(this.#micro, SECOND)[1]) }
	/** -1, 0 or 1 */
	get sign() { return this.#micro < 0n ? -1 : this.#micro > 0n ? 1 : 0 }

	/** total seconds (may lose precision beyond ±2^53 microseconds) */
	totalSeconds() {
		return Number(this.#micro) / Number(SECOND);
	}

	// #endregion Instance accessors

	// #region Instance methods~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	plus(other: Duration) { return new Duration(this.#micro + other.#micro) }
	minus(other: Duration) { return new Duration(this.#micro - other.#micro) }
	negate() { return new Duration(-this.#micro) }
	abs() { return this.#micro < 0n ? this.negate() : this }

	/** scale by an integer (exact) or a fraction (rounded half-even) */
	multiply(factor: number | bigint) {
		return isInteger(factor)
			? new Duration(this.#micro * factor)
			: Number.isInteger(factor)
				? new Duration(this.#micro * BigInt(factor))
				: new Duration(BigInt(roundHalfEven(Number(this.#micro) * factor)));
	}

	compare(other: Duration) {
		return this.#micro < other.#micro ? -1 : this.#micro > other.#micro ? 1 : 0;
	}

	equals(other: Duration) {
		return this.#micro === other.#micro;
	}

	/** a localized phrase, e.g. '3 hours' or 'in 3 hours' */
	humanize(config?: Humanize.Config) {
		return humanize(this, config);
	}

	/** clock form: '2 days, 4:13:02.266000', '-1 day, 23:59:59', '0:05:00' */
	toString() {
		const days = this.days;
		const [hh, rest] = divmod(BigInt(this.seconds), 3_600n);
		const [mi, ss] = divmod(rest, 60n);
		const clock = `${hh}:${pad(mi)}:${pad(ss)}` + (this.microseconds ? `.${pad(this.microseconds, 6)}` : '');

		return days === 0
			? clock
			: `${days} ${Math.abs(days) === 1 ? 'day' : 'days'}, ${clock}`;
	}

	toJSON() {
		return this.toString();
	}

	get [Symbol.toStringTag]() {
		return 'Duration';																			// hard-coded to avoid minification mangling
	}

	// #endregion Instance methods
}

export namespace Duration {
	/** component parts accepted by Duration.of() */
	export type Parts = Partial<Record<keyof typeof MICRO, number | bigint>>
}
