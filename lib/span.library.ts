import { Logify } from './shared/logify.class.js';
import { MICRO, SPAN_UNIT, YEARS } from './chronicle.config/chronicle.enum.js';
import { Chronicle } from './chronicle.config/chronicle.config.js';
import { InvalidUnitError } from './error.library.js';
import { civilEpoch, dayOfWeek, shiftCalendar } from './calendar.library.js';
import type { CivilFields } from './calendar.library.js';
import type { SpanUnit } from './chronicle.config/chronicle.enum.js';
import type { Instant } from './instant.class.js';

/**
 * Calendrical boundaries and ranges.
 * Every step is computed from a fixed origin ({origin} + k·{count} units),
 * so month-end clamping on one step never carries into the next.
 */

const log = new Logify('span', { debug: () => Chronicle.config.debug });

/** a [start, end] pair; end is one microsecond before the next span's start */
export type SpanBoundary = readonly [start: Instant, end: Instant]

// #region helpers ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

/** confirm a SpanUnit */
export function asUnit(unit: unknown): SpanUnit {
	if (SPAN_UNIT.has(unit))
		return unit;

	throw new InvalidUnitError(unit, SPAN_UNIT.keys());
}

function asCount(count: number) {
	if (!Number.isInteger(count) || count < 1)
		throw new RangeError(`Span count must be a positive integer, not ${count}`);

	return count;
}

const midnight = { hour: 0, minute: 0, second: 0, microsecond: 0 } as const;

/** truncate wall-clock fields to the start of their {unit} */
function floor(unit: SpanUnit, fields: CivilFields): CivilFields {
	switch (unit) {
		case 'century':
		case 'decade':
			return { ...fields, ...midnight, year: fields.year - fields.year % YEARS[unit], month: 1, day: 1 };
		case 'year':
			return { ...fields, ...midnight, month: 1, day: 1 };
		case 'month':
			return { ...fields, ...midnight, day: 1 };
		case 'week':																						// back to the ISO Monday
			return shiftCalendar({ ...fields, ...midnight }, { days: 1 - dayOfWeek(fields) });
		case 'day':
			return { ...fields, ...midnight };
		case 'hour':
			return { ...fields, minute: 0, second: 0, microsecond: 0 };
		case 'minute':
			return { ...fields, second: 0, microsecond: 0 };
		case 'second':
			return { ...fields, microsecond: 0 };
	}
}

/**
 * epoch-microseconds of {fields} moved forward {steps} units.
 * unchecked, so the end of the last representable span can still be reached
 */
function advance(fields: CivilFields, unit: SpanUnit, steps: number) {
	switch (unit) {
		case 'century':
		case 'decade':
		case 'year':
			return civilEpoch(shiftCalendar(fields, { years: steps * YEARS[unit] }));
		case 'month':
			return civilEpoch(shiftCalendar(fields, { months: steps }));
		case 'week':
			return civilEpoch(shiftCalendar(fields, { weeks: steps }));
		case 'day':
			return civilEpoch(shiftCalendar(fields, { days: steps }));
		default:
			return civilEpoch(fields) + BigInt(steps) * MICRO[unit];
	}
}

/** an Instant at {epoch}, reached by an exact shift from {base} */
const move = (base: Instant, epoch: bigint) =>
	base.shift({ microseconds: epoch - base.epochMicroseconds });

/** the span of {count} units that opens at {start} */
function boundary(start: Instant, unit: SpanUnit, count: number): SpanBoundary {
	return [start, move(start, advance(start.fields, unit, count) - 1n)] as const;
}

// #endregion

/** the first microsecond of the {unit} containing {instant} */
export function startOf(unit: SpanUnit, instant: Instant) {
	return instant.replace(floor(asUnit(unit), instant.fields));
}

/** the last microsecond of {count} {unit}s, beginning with the one containing {instant} */
export function endOf(unit: SpanUnit, instant: Instant, count = 1) {
	return span(unit, instant, count)[1];
}

/** [startOf, endOf] */
export function span(unit: SpanUnit, instant: Instant, count = 1): SpanBoundary {
	asCount(count);

	return boundary(startOf(unit, instant), unit, count);
}

/**
 * spans of {count} {unit}s, beginning with the one containing {start}.
 * a span is emitted only while its start is strictly before {end}.
 * the result is lazy, and can be iterated more than once
 */
export function spanRange(unit: SpanUnit, start: Instant, end: Instant, count = 1): Iterable<SpanBoundary> {
	asCount(count);
	const origin = startOf(unit, start);
	const limit = end.epochMicroseconds;

	log.debug('spanRange %s ×%s from %s to %s', unit, count, origin, end);

	return {
		*[Symbol.iterator]() {
			for (let step = 0; ; step += count) {
				const epoch = advance(origin.fields, unit, step);
				if (epoch >= limit)
					return;

				yield boundary(move(origin, epoch), unit, count);
			}
		}
	}
}

/**
 * instants {start} + k·{count} {unit}s (start is not truncated), while strictly before {end}.
 * the result is lazy, and can be iterated more than once
 */
export function range(unit: SpanUnit, start: Instant, end: Instant, count = 1): Iterable<Instant> {
	asUnit(unit);
	asCount(count);
	const fields = start.fields;
	const limit = end.epochMicroseconds;

	log.debug('range %s ×%s from %s to %s', unit, count, start, end);

	return {
		*[Symbol.iterator]() {
			for (let step = 0; ; step += count) {
				const epoch = advance(fields, unit, step);
				if (epoch >= limit)
					return;

				yield move(start, epoch);
			}
		}
	}
}
