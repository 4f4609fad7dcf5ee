/**
 * Error kinds raised by the library.
 * every error carries a {detail} record of the values that raised it
 */

/** Optional metadata attached to an error. */
export type ErrorDetail = Record<string, unknown>;

/** Base for all library errors. Preserves prototype chain for instanceof. */
export class ChronicleError extends Error {
	readonly detail: ErrorDetail;

	constructor(message: string, detail: ErrorDetail = {}) {
		super(message);
		this.name = new.target.name;
		this.detail = detail;
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/** a pattern token or directive with no mapping in the requested mode */
export class UnsupportedTokenError extends ChronicleError {
	readonly token: string;
	readonly mode: string;

	constructor(token: string, mode: string) {
		super(`Unsupported token "${token}" in ${mode} mode`, { token, mode });
		this.token = token;
		this.mode = mode;
	}
}

/** one candidate format that failed to match, and why */
export interface Attempt {
	/** the FormatSpec entry (pattern or keyword) */					format: string;
	/** concrete pattern, when a keyword expanded */					pattern?: string;
	/** why the candidate was rejected */											reason: string;
}

/** describe an attempt as it appears in a ParseError message */
const label = ({ format, pattern, reason }: Attempt) =>
	`"${pattern && pattern !== format ? `${format} ${pattern}` : format}" (${reason})`;

/** no candidate format (or duration grammar) matched the value */
export class ParseError extends ChronicleError {
	readonly value: string;
	readonly attempted: ReadonlyArray<Attempt>;

	constructor(value: string | number, attempted: Attempt[]) {
		super(`Value "${value}" does not match any format in [${attempted.map(label).join(', ')}]`, { value, attempted });
		this.value = String(value);
		this.attempted = Object.freeze([...attempted]);
	}
}

/** a single candidate failed; collected by the parsers, never surfaced on its own */
export class MatchError extends ChronicleError {
	constructor(reason: string) {
		super(reason);
	}
}

/** an unrecognized span or humanize unit */
export class InvalidUnitError extends ChronicleError {
	constructor(unit: unknown, allowed: ReadonlyArray<string>) {
		super(`Unit must be one of [${allowed.join(', ')}], not "${String(unit)}"`, { unit, allowed });
	}
}

/** a computed Instant falls outside 0001-01-01 … 9999-12-31 */
export class RangeOverflowError extends ChronicleError {
	constructor(message: string, detail?: ErrorDetail) {
		super(message, detail);
	}
}

/** an unknown time-zone identifier */
export class TimezoneError extends ChronicleError {
	constructor(zone: string) {
		super(`Unrecognized timezone: ${zone}`, { zone });
	}
}

/** an option value outside its allowed set */
export class InvalidOptionError extends ChronicleError {
	constructor(option: string, value: unknown, allowed: ReadonlyArray<string>) {
		super(`Option "${option}" must be one of [${allowed.join(', ')}], not "${String(value)}"`, { option, value, allowed });
	}
}
