/** string representation of a decimal Number (no exponent) */
export const patDecimal = /^(?<sign>[+-])?(?<int>\d+)(?:\.(?<frac>\d*))?$/;

/** escape every character that carries meaning inside a RegExp */
export const escapeRegExp = (str: string) =>
	str.replace(/[.*+?^${}()|[\]\\\/]/g, '\\$&');

/** wrap a pattern so it must match the whole input */
export const anchor = (source: string, flags = 'i') =>
	new RegExp(`^${source}$`, flags);
