import { Temporal } from '@js-temporal/polyfill';

import { enumify } from '../shared/enumerate.library.js';
import { secure } from '../shared/reflection.library.js';
import type { Enum } from '../shared/enumerate.library.js';

/**
 * Various enumerations used throughout the library.
 * Usage example:
 ```javascript
			const units = SPAN_UNIT.keys();	// ['century', 'decade', 'year', 'month', 'week', 'day', 'hour', 'minute', 'second']
 ```
 */

/** calendrical units, coarsest first */
export const SPAN_UNIT = enumify(['century', 'decade', 'year', 'month', 'week', 'day', 'hour', 'minute', 'second']);
export type SpanUnit = Enum.keys<typeof SPAN_UNIT>

/** number of calendar years in each multi-year unit */
export const YEARS = enumify({
		/** one hundred years */																century: 100,
		/** ten years */																				decade: 10,
		/** a calendar year */																	year: 1,
});

/** the humanize ladder, in seconds per unit (coarsest first) */
export const TIME = enumify({
		/** nominal number of seconds in a year */							year: 31_536_000,
		/** nominal number of seconds in a month */							month: 2_592_000,
		/** number of seconds in a week */											week: 604_800,
		/** number of seconds in a day */												day: 86_400,
		/** number of seconds in an hour */											hour: 3_600,
		/** number of seconds in a minute */										minute: 60,
		/** one second */																				second: 1,
});
export type TimeUnit = Enum.keys<typeof TIME>

/** exact unit lengths in microseconds, used by the duration grammar */
export const MICRO = secure({
		/** microseconds in a week */														week: 604_800_000_000n,
		/** microseconds in a day */														day: 86_400_000_000n,
		/** microseconds in an hour */													hour: 3_600_000_000n,
		/** microseconds in a minute */													minute: 60_000_000n,
		/** microseconds in a second */													second: 1_000_000n,
		/** microseconds in a millisecond */										millisecond: 1_000n,
		/** one microsecond */																	microsecond: 1n,
});
export type MicroUnit = keyof typeof MICRO

/** humanize rendering styles */
export const STYLE = enumify(['long', 'short', 'narrow']);
export type Style = Enum.keys<typeof STYLE>

/** FormatSpec keyword aliases (matched case-insensitively) */
export const KEYWORD = enumify({
		/** the ISO-8601 pattern family */											iso: 'ISO8601',
		/** POSIX seconds */																		timestamp: 'timestamp',
});

const MIN_ISO = '0001-01-01T00:00:00.000000+00:00';
const MAX_ISO = '9999-12-31T23:59:59.999999+00:00';

/** representable bounds of an Instant */
export const LIMIT = secure({
		/** earliest year */																		minYear: 1,
		/** latest year */																			maxYear: 9999,
		/** earliest Instant as text */													minIso: MIN_ISO,
		/** latest Instant as text */														maxIso: MAX_ISO,
		/** 0001-01-01T00:00:00 as epoch-microseconds */				minEpoch: Temporal.Instant.from(MIN_ISO).epochNanoseconds / 1_000n,
		/** 9999-12-31T23:59:59.999999 as epoch-microseconds */	maxEpoch: Temporal.Instant.from(MAX_ISO).epochNanoseconds / 1_000n,
});
