import { patDecimal } from './regexp.library.js';
import { isString } from './type.library.js';

/** round half-to-even, so that .5 ties land on the even neighbour */
export function roundHalfEven(nbr: number) {
	const floor = Math.floor(nbr);
	const diff = nbr - floor;

	switch (true) {
		case diff > .5:
			return floor + 1;
		case diff < .5:
			return floor;
		default:
			return floor % 2 === 0 ? floor : floor + 1;
	}
}

const MICRO = 1_000_000n;

/**
 * convert a decimal count of seconds into integer microseconds.
 * the decimal text is split on '.', so no floating-point multiplication is involved;
 * digits beyond the sixth fractional place are rounded half-to-even
 */
export function toMicroseconds(value: string | number) {
	const text = isString(value)
		? value.trim()
		: Number.isInteger(value) ? value.toFixed(0) : String(value);
	const match = patDecimal.exec(text) ?? patDecimal.exec(isString(value) ? '' : value.toFixed(7));

	if (!match?.groups)
		throw new RangeError(`Not a decimal number: ${text}`);

	const { sign = '+', int = '0', frac = '' } = match.groups;
	const digits = frac.padEnd(7, '0');												// one guard digit beyond microseconds
	let micro = BigInt(int) * MICRO + BigInt(digits.substring(0, 6));
	const guard = Number(digits[6]);
	const rest = /[1-9]/.test(digits.substring(7));

	if (guard > 5 || (guard === 5 && (rest || micro % 2n === 1n)))
		micro += 1n;

	return sign === '-' ? -micro : micro;
}
