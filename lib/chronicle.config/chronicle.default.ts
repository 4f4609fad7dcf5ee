import { secure } from '../shared/reflection.library.js';
import { IntlLocale } from '../locale.provider.js';
import { TemporalZone } from '../timezone.provider.js';
import { KEYWORD } from './chronicle.enum.js';
import type { MicroUnit } from './chronicle.enum.js';
import type { Chronicle } from './chronicle.config.js';

// #region local const variables ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

/**
 * the ISO-8601 family, most specific first.
 * a value is tried against each in turn until one matches
 */
export const IsoFamily = secure([
	`yyyy-MM-dd'T'HH:mm:ss.SSSSSSZZZZZ`,												// date, time, fraction, offset
	`yyyy-MM-dd'T'HH:mm:ssZZZZZ`,																// date, time, offset
	`yyyy-MM-dd'T'HH:mmZZZZZ`,																	// date, hour-minute, offset
	`yyyy-MM-dd'T'HH:mm:ss.SSSSSS`,															// date, time, fraction
	`yyyy-MM-dd'T'HH:mm:ss`,																		// date, time
	`yyyy-MM-dd'T'HH:mm`,																				// date, hour-minute
	`yyyy-MM-dd`,																								// date only
	`yyyy-MM`,																									// year-month only
] as const)

/**
 * duration-unit spellings, keyed by canonical unit.
 * each alias is matched case-insensitively, with an optional trailing '.'
 */
export const UnitAlias = secure({
	week: ['w', 'wk', 'wks', 'week', 'weeks'],
	day: ['d', 'dy', 'dys', 'day', 'days'],
	hour: ['h', 'hr', 'hrs', 'hour', 'hours'],
	minute: ['m', 'min', 'mins', 'minute', 'minutes'],
	second: ['s', 'sec', 'secs', 'second', 'seconds'],
	millisecond: ['ms', 'msec', 'msecs', 'millisecond', 'milliseconds'],
	microsecond: ['us', 'µs', 'usec', 'usecs', 'microsecond', 'microseconds'],
} as const satisfies Record<MicroUnit, ReadonlyArray<string>>)

/** Reasonable default options for initial Chronicle config */
export const Default = {
	/** log to console */																			debug: false,
	/** locale for names and phrases */												locale: 'en-US',
	/** zone applied to parsed values without an offset */		timeZone: undefined,
	/** candidate formats when parse() is given none */				formats: [KEYWORD.iso, KEYWORD.timestamp],
	/** humanize cut-over to a finer unit */									threshold: 0.85,
	/** humanize rendering style */														style: 'long',
	/** humanize with 'in …' / '… ago' */											addDirection: false,
	/** calendar names and phrases */													localeProvider: new IntlLocale(),
	/** UTC offsets for named zones */												timezoneProvider: new TemporalZone(),
} satisfies Chronicle.Config

// #endregion
