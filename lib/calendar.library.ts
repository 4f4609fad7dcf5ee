import { Temporal } from '@js-temporal/polyfill';

import { RangeOverflowError } from './error.library.js';
import { LIMIT } from './chronicle.config/chronicle.enum.js';

/**
 * Civil (wall-clock) calendar arithmetic, always in the proleptic-Gregorian ISO calendar.
 * Instants are carried as epoch-microseconds (bigint); Temporal does the calendar work.
 */

/** wall-clock fields of a date-time */
export interface CivilFields {
	/** 1 … 9999 */																					year: number;
	/** 1 … 12 */																						month: number;
	/** 1 … 31 */																						day: number;
	/** 0 … 23 */																						hour: number;
	/** 0 … 59 */																						minute: number;
	/** 0 … 59 */																						second: number;
	/** 0 … 999999 */																				microsecond: number;
}

/** calendar-based offsets; applied with 'constrain' so Jan-31 + 1 month = Feb-28/29 */
export interface CalendarShift {
	years?: number;
	months?: number;
	weeks?: number;
	days?: number;
}

const NANO = 1_000n;																				// nanoseconds per microsecond

/** convert CivilFields into a Temporal.PlainDateTime; throws RangeError on an invalid date */
export function toPlain({ year, month, day, hour, minute, second, microsecond }: CivilFields) {
	return new Temporal.PlainDateTime(year, month, day, hour, minute, second,
		Math.trunc(microsecond / 1_000), microsecond % 1_000, 0);
}

/** read CivilFields from any Temporal date-time */
export function fromPlain(dt: Temporal.PlainDateTime | Temporal.ZonedDateTime): CivilFields {
	return {
		year: dt.year,
		month: dt.month,
		day: dt.day,
		hour: dt.hour,
		minute: dt.minute,
		second: dt.second,
		microsecond: dt.millisecond * 1_000 + dt.microsecond,
	}
}

/** raise if an epoch-microsecond value is outside the representable range */
export function checkRange(epoch: bigint) {
	if (epoch < LIMIT.minEpoch || epoch > LIMIT.maxEpoch)
		throw new RangeOverflowError(`Instant is outside the range ${LIMIT.minIso} … ${LIMIT.maxIso}`, { epoch });

	return epoch;
}

/** UTC wall-clock fields to epoch-microseconds, without a range check */
export function civilEpoch(fields: CivilFields) {
	return toPlain(fields).toZonedDateTime('UTC').epochNanoseconds / NANO;
}

/** UTC wall-clock fields to epoch-microseconds */
export function toEpoch(fields: CivilFields) {
	if (fields.year < LIMIT.minYear || fields.year > LIMIT.maxYear)
		throw new RangeOverflowError(`Year ${fields.year} is out of range ${LIMIT.minYear} … ${LIMIT.maxYear}`, { ...fields });

	return checkRange(civilEpoch(fields));
}

/** epoch-microseconds to UTC wall-clock fields */
export function fromEpoch(epoch: bigint) {
	return fromPlain(toZoned(epoch, 'UTC'));
}

/** epoch-microseconds as a ZonedDateTime in {zone} */
export function toZoned(epoch: bigint, zone: string) {
	return Temporal.Instant.fromEpochNanoseconds(epoch * NANO).toZonedDateTimeISO(zone);
}

/** apply calendar offsets to wall-clock fields (time-of-day is kept) */
export function shiftCalendar(fields: CivilFields, shift: CalendarShift) {
	return fromPlain(toPlain(fields).add(shift, { overflow: 'constrain' }));
}

/** ISO day-of-week, Monday = 1 … Sunday = 7 */
export const dayOfWeek = (fields: CivilFields) => toPlain(fields).dayOfWeek;
/** 1 … 366 */
export const dayOfYear = (fields: CivilFields) => toPlain(fields).dayOfYear;
export const daysInMonth = (year: number, month: number) => Temporal.PlainYearMonth.from({ year, month }).daysInMonth;
export const isLeapYear = (year: number) => Temporal.PlainYearMonth.from({ year, month: 1 }).inLeapYear;

/** is {year, month, day} a real calendar date */
export function isValidDate(year: number, month: number, day: number) {
	return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

/** the (month, day) of an ordinal day in {year} */
export function fromDayOfYear(year: number, ordinal: number) {
	const date = Temporal.PlainDate.from({ year, month: 1, day: 1 }).add({ days: ordinal - 1 });

	return { month: date.month, day: date.day, year: date.year };
}
