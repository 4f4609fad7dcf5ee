import { Logify } from './shared/logify.class.js';
import { ownEntries } from './shared/reflection.library.js';
import { isNumber, isUndefined } from './shared/type.library.js';
import { roundHalfEven, toMicroseconds } from './shared/number.library.js';
import { patDecimal } from './shared/regexp.library.js';
import { MICRO } from './chronicle.config/chronicle.enum.js';
import { UnitAlias } from './chronicle.config/chronicle.default.js';
import { Chronicle } from './chronicle.config/chronicle.config.js';
import { MatchError, ParseError } from './error.library.js';
import { Duration } from './duration.class.js';
import type { Attempt } from './error.library.js';
import type { MicroUnit } from './chronicle.config/chronicle.enum.js';

const log = new Logify('duration', { debug: () => Chronicle.config.debug });

/** lower-cased alias → canonical unit */
const Alias = new Map<string, MicroUnit>(
	ownEntries(UnitAlias)
		.flatMap(([unit, list]) => list.map(alias => [alias.toLowerCase(), unit] as const))
);

/** clock fields captured by a clock sub-grammar */
interface Clock {
	sign?: string;
	days?: string;
	word?: string;
	hours?: string;
	mins: string;
	secs: string;
	frac?: string;
}

const FRAC = '(?:[.,](?<frac>\\d+))?';
const SIGN = '(?<sign>[+-])?\\s*';

/**
 * clock sub-grammars, tried in order.
 * the verbose form is how Duration.toString() writes, so its sign belongs to the day count alone
 */
const ClockGrammar = [
	{ name: 'D:HH:MM:SS', regexp: new RegExp(`^${SIGN}(?<days>\\d+):(?<hours>\\d{1,2}):(?<mins>\\d{2}):(?<secs>\\d{2})${FRAC}$`), dayClock: true },
	{ name: 'N days, H:MM:SS', regexp: new RegExp(`^${SIGN}(?<days>\\d+)\\s*(?<word>[a-z]+)\\s*,?\\s*(?<hours>\\d{1,2}):(?<mins>\\d{2}):(?<secs>\\d{2})${FRAC}$`, 'i'), dayClock: true },
	{ name: 'H:MM:SS', regexp: new RegExp(`^${SIGN}(?<hours>\\d+):(?<mins>\\d{2}):(?<secs>\\d{2})${FRAC}$`), dayClock: false },
	{ name: 'M:SS', regexp: new RegExp(`^${SIGN}(?<mins>\\d+):(?<secs>\\d{2})${FRAC}$`), dayClock: false },
] as const

/** one quantity-unit token, with any leading separators */
const UnitToken = /\s*(?:(?:,|and\b|&)\s*)*(?<sign>[+-])?\s*(?<qty>\d+(?:[.,]\d*)?|[.,]\d+)\s*(?<unit>[a-zµ]+)\.?/iy;

/** check a clock component is below its limit */
function below(name: string, val: string | undefined, limit: number) {
	const num = Number(val ?? 0);
	if (num >= limit)
		throw new MatchError(`${name} ${num} must be below ${limit}`);
	return BigInt(num);
}

/** read a clock match into microseconds */
function readClock(clock: Clock, dayClock: boolean, verbose: boolean) {
	if (verbose && Alias.get(clock.word?.toLowerCase() ?? '') !== 'day')
		throw new MatchError(`"${clock.word}" is not a day unit`);

	const days = BigInt(clock.days ?? 0);
	const hours = dayClock ? below('hours', clock.hours, 24) : BigInt(clock.hours ?? 0);
	const mins = isUndefined(clock.hours) ? BigInt(clock.mins) : below('minutes', clock.mins, 60);
	const secs = below('seconds', clock.secs, 60);
	const frac = toMicroseconds(`0.${clock.frac ?? 0}`);

	const clockTime = hours * MICRO.hour + mins * MICRO.minute + secs * MICRO.second + frac;
	const negative = clock.sign === '-';

	return verbose																						// '-1 day, 23:59:59' is -1 day plus 23:59:59
		? (negative ? -days : days) * MICRO.day + clockTime
		: (negative ? -1n : 1n) * (days * MICRO.day + clockTime);
}

/** the clock grammar: first matching sub-grammar wins */
function parseClock(text: string, attempted: Attempt[]) {
	for (const { name, regexp, dayClock } of ClockGrammar) {
		try {
			const groups = regexp.exec(text)?.groups;
			if (isUndefined(groups))
				throw new MatchError('no match');

			const clock: Clock = { ...groups, mins: groups['mins'], secs: groups['secs'] };
			log.debug('"%s" matched %s', text, name);
			return readClock(clock, dayClock, name.startsWith('N '));
		} catch (err) {
			if (!(err instanceof MatchError))
				throw err;
			attempted.push({ format: name, reason: err.message });
		}
	}

	return undefined;
}

/** the unit-token grammar: sum of quantity × unit, rounded once at the end */
function parseUnits(text: string) {
	const whole = /^\s*(?<neg>-)?\s*/.exec(text);						// a leading '-' negates the total
	let idx = whole?.[0].length ?? 0;
	let total = 0;
	let count = 0;

	for (; ;) {
		UnitToken.lastIndex = idx;
		const groups = UnitToken.exec(text)?.groups;
		if (isUndefined(groups))
			break;

		const unit = Alias.get(groups['unit'].toLowerCase());
		if (isUndefined(unit))
			throw new MatchError(`unknown unit "${groups['unit']}"`);

		const qty = Number(groups['qty'].replace(',', '.'));
		total += (groups['sign'] === '-' ? -qty : qty) * Number(MICRO[unit]);
		idx = UnitToken.lastIndex;
		count++;
	}

	const rest = text.substring(idx).trim();
	if (count === 0)
		throw new MatchError('no quantity and unit found');
	if (rest !== '')
		throw new MatchError(`unexpected text "${rest}"`);
	if (!Number.isFinite(total))
		throw new MatchError('quantity is too large');

	const micro = BigInt(roundHalfEven(total));
	return whole?.groups?.['neg'] ? -micro : micro;
}

/**
 * parse a duration.
 * text containing ':' uses the clock grammar, a bare decimal is seconds,
 * anything else is read as quantity-unit tokens ('1w 3d 2h 32m', '2 days, 5 hours and 3.5 minutes')
 */
export function parseDuration(value: string | number) {
	if (isNumber(value))
		return Duration.fromSeconds(value);

	const text = value.trim();
	const attempted: Attempt[] = [];

	if (text.includes(':')) {
		const micro = parseClock(text, attempted);
		if (micro !== undefined)
			return new Duration(micro);
	} else if (patDecimal.test(text)) {
		return Duration.fromSeconds(text);
	} else {
		try {
			return new Duration(parseUnits(text));
		} catch (err) {
			if (!(err instanceof MatchError))
				throw err;
			attempted.push({ format: 'quantity unit', reason: err.message });
		}
	}

	return log.fail(new ParseError(value, attempted));
}
