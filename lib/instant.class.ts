// #region library modules~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

import { Temporal } from '@js-temporal/polyfill';

import { isDefined, isDuration, isInteger } from './shared/type.library.js';
import { toMicroseconds } from './shared/number.library.js';
import { LIMIT, MICRO } from './chronicle.config/chronicle.enum.js';
import { IsoFamily } from './chronicle.config/chronicle.default.js';
import { Chronicle } from './chronicle.config/chronicle.config.js';
import { compile } from './token.library.js';
import { Duration } from './duration.class.js';
import * as calendar from './calendar.library.js';
import * as span from './span.library.js';

import type { Renderer, Subject } from './token.library.js';
import type { CivilFields, CalendarShift } from './calendar.library.js';
import type { SpanUnit } from './chronicle.config/chronicle.enum.js';
import type { SpanBoundary } from './span.library.js';
import type { Humanize } from './humanize.library.js';

// #endregion

/** the ISO format plans, compiled once; other patterns are compiled per call */
const Plans: ReadonlyMap<string, Renderer> = new Map<string, Renderer>(IsoFamily.map(pattern => [pattern, compile(pattern, 'format')] as const));

const plan = (pattern: string) =>
	Plans.get(pattern) ?? compile(pattern, 'format');

/** drop three decimal places, rounding toward negative infinity */
function floorMille(value: bigint) {
	const rem = ((value % 1_000n) + 1_000n) % 1_000n;
	return (value - rem) / 1_000n;
}

/**
 * # Instant
 * An immutable UTC timestamp with microsecond resolution,
 * held as microseconds since 1970-01-01T00:00:00Z.
 * Zones other than UTC only appear when parsing or formatting.
 */
export class Instant {
	/** microseconds since Unix epoch */											#epoch: bigint;
	/** UTC wall-clock fields, resolved on first use */				#fields?: CivilFields;

	constructor(epochMicroseconds: bigint) {
		this.#epoch = calendar.checkRange(epochMicroseconds);
	}

	// #region Static public methods~~~~~~~~~~~~~~~~~~~~~~~~~~

	/**
	 * build from wall-clock fields.
	 * with a {tz}, the fields are local to that zone (a skipped local time moves forward, a repeated one takes the earlier offset)
	 */
	static of(fields: Instant.Fields, tz?: string) {
		const civil: CivilFields = { hour: 0, minute: 0, second: 0, microsecond: 0, ...fields };
		const epoch = calendar.toEpoch(civil);

		if (!isDefined(tz))
			return new Instant(epoch);

		const { offset } = Chronicle.config.timezoneProvider.resolveLocal(tz, civil);
		return new Instant(epoch - BigInt(offset) * MICRO.second);
	}

	static fromEpochMicroseconds(epochMicroseconds: bigint) {
		return new Instant(epochMicroseconds);
	}

	/** POSIX seconds, as a number or decimal string (converted exactly) */
	static fromTimestamp(seconds: number | string) {
		return new Instant(toMicroseconds(seconds));
	}

	/** sub-microsecond precision is floored away */
	static fromTemporal(value: Temporal.Instant | Temporal.ZonedDateTime) {
		return new Instant(floorMille(value.epochNanoseconds));
	}

	static now() {
		return Instant.fromTemporal(Temporal.Now.instant());
	}

	/** for Array.sort() */
	static compare(a: Instant, b: Instant) {
		return a.compare(b);
	}

	/** instants {start} + k·{count} {unit}s, while before {end} */
	static range(unit: SpanUnit, start: Instant, end: Instant, count = 1) {
		return span.range(unit, start, end, count);
	}

	/** [start, end] spans of {count} {unit}s, from the one containing {start}, while before {end} */
	static spanRange(unit: SpanUnit, start: Instant, end: Instant, count = 1) {
		return span.spanRange(unit, start, end, count);
	}

	/** 0001-01-01T00:00:00Z */																static readonly MIN = new Instant(LIMIT.minEpoch);
	/** 9999-12-31T23:59:59.999999Z */												static readonly MAX = new Instant(LIMIT.maxEpoch);
	/** 1970-01-01T00:00:00Z */																static readonly EPOCH = new Instant(0n);

	// #endregion Static public methods

	// #region Instance accessors~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	/** UTC wall-clock fields */															get fields() { return { ...(this.#fields ??= calendar.fromEpoch(this.#epoch)) } }
	/** 4-digit year */																				get year() { return this.fields.year }
	/** month: Jan=1, Dec=12 */																get month() { return this.fields.month }
	/** day of month */																				get day() { return this.fields.day }
	/** hours since midnight: 24-hour format */								get hour() { return this.fields.hour }
	/** minutes since last hour */														get minute() { return this.fields.minute }
	/** seconds since last minute */													get second() { return this.fields.second }
	/** microseconds since last second */											get microsecond() { return this.fields.microsecond }
	/** microseconds since Unix epoch */											get epochMicroseconds() { return this.#epoch }
	/** POSIX seconds (fractional) */													get timestamp() { return Number(this.#epoch) / 1_000_000 }
	/** weekday: Mon=1, Sun=7 */															get dayOfWeek() { return calendar.dayOfWeek(this.fields) }
	/** day of year: 1 … 366 */																get dayOfYear() { return calendar.dayOfYear(this.fields) }
	/** days in this month */																	get daysInMonth() { return calendar.daysInMonth(this.year, this.month) }
	/** is this a leap year */																get isLeapYear() { return calendar.isLeapYear(this.year) }

	// #endregion Instance accessors

	// #region Instance methods~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	/**
	 * move by calendar units, then by exact time.
	 * calendar units clamp to the month's end (Jan-31 + 1 month = Feb-28/29);
	 * time units are fixed lengths, with fractions rounded to the microsecond
	 */
	shift({ years, months, weeks, days, hours, minutes, seconds, milliseconds, microseconds }: Instant.Shift) {
		const cal: CalendarShift = {};
		if (years) cal.years = years;
		if (months) cal.months = months;
		if (weeks) cal.weeks = weeks;
		if (days) cal.days = days;

		const start = Object.keys(cal).length
			? calendar.civilEpoch(calendar.shiftCalendar(this.fields, cal))
			: this.#epoch;
		const exact = Duration.of({ hour: hours, minute: minutes, second: seconds, millisecond: milliseconds, microsecond: microseconds });

		return new Instant(start + exact.totalMicroseconds);
	}

	/** add a Duration, or calendar / time units */
	add(value: Duration | Instant.Shift) {
		return isDuration(value)
			? new Instant(this.#epoch + value.totalMicroseconds)
			: this.shift(value);
	}

	/** subtract a Duration, or calendar / time units */
	subtract(value: Duration | Instant.Shift) {
		if (isDuration(value))
			return this.add(value.negate());

		const { years, months, weeks, days, hours, minutes, seconds, milliseconds, microseconds } = value;
		const neg = (val?: number) => isDefined(val) ? -val : undefined;

		return this.shift({
			years: neg(years), months: neg(months), weeks: neg(weeks), days: neg(days),
			hours: neg(hours), minutes: neg(minutes), seconds: neg(seconds), milliseconds: neg(milliseconds),
			microseconds: isInteger(microseconds) ? -microseconds : neg(microseconds),
		});
	}

	/** elapsed time from {other} to this */
	since(other: Instant) {
		return new Duration(this.#epoch - other.#epoch);
	}

	/** a copy with some wall-clock fields replaced */
	replace({ year = this.year, month = this.month, day = this.day, hour = this.hour, minute = this.minute, second = this.second, microsecond = this.microsecond }: Partial<CivilFields> = {}) {
		return new Instant(calendar.toEpoch({ year, month, day, hour, minute, second, microsecond }));
	}

	compare(other: Instant) {
		return this.#epoch < other.#epoch ? -1 : this.#epoch > other.#epoch ? 1 : 0;
	}

	equals(other: Instant) { return this.#epoch === other.#epoch }
	isBefore(other: Instant) { return this.#epoch < other.#epoch }
	isOnOrBefore(other: Instant) { return this.#epoch <= other.#epoch }
	isAfter(other: Instant) { return this.#epoch > other.#epoch }
	isOnOrAfter(other: Instant) { return this.#epoch >= other.#epoch }
	/** inclusive at both ends */
	isBetween(start: Instant, end: Instant) { return this.isOnOrAfter(start) && this.isOnOrBefore(end) }

	/** first microsecond of the {unit} */										startOf(unit: SpanUnit) { return span.startOf(unit, this) }
	/** last microsecond of {count} {unit}s */								endOf(unit: SpanUnit, count = 1) { return span.endOf(unit, this, count) }
	/** [startOf, endOf] */																		span(unit: SpanUnit, count = 1): SpanBoundary { return span.span(unit, this, count) }

	/**
	 * render with a token pattern.
	 * with no pattern, ISO-8601 with offset (microseconds only when non-zero);
	 * with a {tz}, the wall-clock fields and offset are those of that zone
	 */
	format(pattern?: string, { tz, locale }: Instant.FormatOptions = {}) {
		const config = Chronicle.config;
		const subject: Subject = {
			fields: this.fields,
			offset: 0,
			zone: 'UTC',
			epoch: this.#epoch,
			locale: locale ?? config.locale,
			provider: config.localeProvider,
		}

		if (isDefined(tz) && tz.toUpperCase() !== 'UTC') {
			const { zone, offset } = config.timezoneProvider.resolve(tz, this.#epoch);
			Object.assign(subject, { zone, offset, fields: calendar.fromEpoch(this.#epoch + BigInt(offset) * MICRO.second) });
		}

		return plan(pattern ?? (subject.fields.microsecond ? IsoFamily[0] : IsoFamily[1]))
			.render(subject);
	}

	/** as Temporal.ZonedDateTime in {tz} (IANA name or 'local') */
	toZoned(tz = 'UTC') {
		return calendar.toZoned(this.#epoch, Chronicle.config.timezoneProvider.validate(tz));
	}

	/** as Temporal.Instant */																toTemporal() { return Temporal.Instant.fromEpochNanoseconds(this.#epoch * 1_000n) }
	/** as Date object (milliseconds, floored) */							toDate() { return new Date(Number(floorMille(this.#epoch))) }

	/** humanized {this} − {other}, with direction unless {config} says otherwise */
	timeFrom(other: Instant, config: Humanize.Config = {}) {
		return this.since(other).humanize({ addDirection: true, ...config });
	}

	/** humanized {other} − {this}, with direction unless {config} says otherwise */
	timeTo(other: Instant, config: Humanize.Config = {}) {
		return other.since(this).humanize({ addDirection: true, ...config });
	}

	timeFromNow(config?: Humanize.Config) { return this.timeFrom(Instant.now(), config) }
	timeToNow(config?: Humanize.Config) { return this.timeTo(Instant.now(), config) }

	/** ISO-8601, '2016-07-25T19:33:18+00:00' */							toString() { return this.format() }
	toISOString() { return this.format() }
	toJSON() { return this.format() }

	get [Symbol.toStringTag]() {
		return 'Instant';																				// hard-coded to avoid minification mangling
	}

	// #endregion Instance methods
}

export namespace Instant {
	/** wall-clock fields for Instant.of(); time fields default to zero */
	export type Fields = Pick<CivilFields, 'year' | 'month' | 'day'> & Partial<Omit<CivilFields, 'year' | 'month' | 'day'>>

	/** offsets accepted by shift(), add() and subtract() */
	export interface Shift extends CalendarShift {
		hours?: number;
		minutes?: number;
		seconds?: number;
		milliseconds?: number;
		microseconds?: number | bigint;
	}

	export interface FormatOptions {
		/** IANA zone or 'local' (default: UTC) */								tz?: string;
		/** locale for month and weekday names */								locale?: string;
	}
}
