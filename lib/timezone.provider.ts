import { Temporal } from '@js-temporal/polyfill';

import { TimezoneError } from './error.library.js';
import { toPlain, toZoned } from './calendar.library.js';
import type { CivilFields } from './calendar.library.js';

/** the special zone name for the host system's zone */
export const LOCAL = 'local';

/** offset in effect for a zone at some moment, in seconds east of UTC */
export interface ZoneOffset {
	/** resolved zone identifier */														zone: string;
	/** total UTC offset */																		offset: number;
	/** daylight-saving portion of {offset} */								dst: number;
}

/**
 * Supplies UTC offsets for named zones.
 * Used only where an Instant meets a non-UTC wall-clock (parsing without an explicit offset, or formatting in a zone)
 */
export interface TimezoneProvider {
	/** confirm {zone} is known, and return its canonical name (throws TimezoneError) */
	validate(zone: string): string;
	/** offset in effect at a UTC instant */
	resolve(zone: string, epoch: bigint): ZoneOffset;
	/** offset in effect for local wall-clock fields; a repeated time takes the earlier offset, a skipped time moves forward */
	resolveLocal(zone: string, fields: CivilFields): ZoneOffset;
}

const SECOND = 1_000_000_000;																// nanoseconds per second

/** TimezoneProvider backed by the Temporal time-zone database */
export class TemporalZone implements TimezoneProvider {
	/** map {LOCAL} to the host's zone */
	#name(zone: string) {
		return zone.toLowerCase() === LOCAL
			? Intl.DateTimeFormat().resolvedOptions().timeZone
			: zone;
	}

	/** standard (non-DST) offset for a year: the lesser of the January and July offsets */
	#standard(zone: string, year: number) {
		const jan = Temporal.ZonedDateTime.from({ timeZone: zone, year, month: 1, day: 1 }).offsetNanoseconds;
		const jul = Temporal.ZonedDateTime.from({ timeZone: zone, year, month: 7, day: 1 }).offsetNanoseconds;

		return Math.min(jan, jul) / SECOND;
	}

	#offset(zone: string, zdt: Temporal.ZonedDateTime): ZoneOffset {
		const offset = zdt.offsetNanoseconds / SECOND;

		return { zone, offset, dst: offset - this.#standard(zone, zdt.year) };
	}

	validate(zone: string) {
		const name = this.#name(zone);

		try {
			toZoned(0n, name);																		// throws RangeError on an unknown zone
		} catch (err) {
			if (err instanceof RangeError)
				throw new TimezoneError(zone);
			throw err;
		}

		return name;
	}

	resolve(zone: string, epoch: bigint) {
		const name = this.validate(zone);

		return this.#offset(name, toZoned(epoch, name));
	}

	resolveLocal(zone: string, fields: CivilFields) {
		const name = this.validate(zone);

		return this.#offset(name, toPlain(fields).toZonedDateTime(name, { disambiguation: 'compatible' }));
	}
}
