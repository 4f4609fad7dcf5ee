import { pad } from './shared/string.library.js';
import { isDefined, isUndefined } from './shared/type.library.js';
import { toMicroseconds } from './shared/number.library.js';
import { anchor, escapeRegExp } from './shared/regexp.library.js';
import { MatchError, UnsupportedTokenError } from './error.library.js';
import { Chronicle } from './chronicle.config/chronicle.config.js';
import { dayOfWeek, dayOfYear, fromDayOfYear, isLeapYear, isValidDate } from './calendar.library.js';
import type { CivilFields } from './calendar.library.js';
import type { LocaleProvider } from './locale.provider.js';

// #region Types ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

export type Mode = 'parse' | 'format';

/** raw field values captured by a Matcher, before defaults are applied */
interface Capture {
	year?: number;
	month?: number;
	day?: number;
	dayOfYear?: number;
	weekday?: number;
	hour?: number;
	hour12?: number;
	pm?: boolean;
	minute?: number;
	second?: number;
	microsecond?: number;
	offset?: number;
	epoch?: bigint;
}

/** locale lookups needed while compiling or rendering */
export interface Names {
	locale: string;
	provider: LocaleProvider;
}

/** what a Renderer needs to know about the value it renders */
export interface Subject extends Names {
	/** wall-clock fields in the target zone */								fields: CivilFields;
	/** seconds east of UTC */																offset: number;
	/** zone identifier */																		zone: string;
	/** epoch-microseconds */																	epoch: bigint;
}

/** the result of a successful match */
export interface Matched {
	/** wall-clock fields (defaults applied) */								fields: CivilFields;
	/** explicit offset in seconds, when the text carried one */	offset?: number;
	/** epoch-microseconds, when the text was a raw timestamp */	epoch?: bigint;
}

interface Rule {
	/** regex source for parse mode; undefined when the token cannot be parsed */
	source?: (names: Names) => string;
	/** store the captured text into a Capture */
	read?: (text: string, capture: Capture, names: Names) => void;
	/** emit the token's text for a value */
	render: (subject: Subject) => string;
	/** captures only digits, so can match the decimal text of a number */
	numeric?: boolean;
}

type Segment =
	| { type: 'literal', text: string }
	| { type: 'token', token: string, rule: Rule }

// #endregion

// #region Rules ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

/** assert a captured number is within [min, max] */
function within(name: string, val: number, min: number, max: number) {
	if (val < min || val > max)
		throw new MatchError(`${name} ${val} is out of range ${min}-${max}`);
	return val;
}

/** the Capture properties that hold a plain number */
type NumberKey = { [K in keyof Capture]-?: Capture[K] extends number | undefined ? K : never }[keyof Capture]

/** a digits-only rule: parse 1…{max} digits, render padded to {width} */
function digits(name: string, key: NumberKey, min: number, max: number, width: number, pick: (subject: Subject) => number, len = `1,${String(max).length}`): Rule {
	return {
		numeric: true,
		source: () => `\\d{${len}}`,
		read: (text, capture) => Object.assign(capture, { [key]: within(name, Number(text), min, max) }),
		render: subject => pad(pick(subject), width),
	}
}

/** case-insensitive lookup of a name in a locale list; returns its 1-based position */
function lookup(text: string, list: ReadonlyArray<string>) {
	const idx = list.findIndex(name => name.toLocaleLowerCase() === text.toLocaleLowerCase());
	if (idx === -1)
		throw new MatchError(`"${text}" is not a recognised name`);
	return idx + 1;
}

/** alternation of names, longest first so that 'June' is tried before 'Jun' */
const alternate = (list: ReadonlyArray<string>) =>
	[...list]
		.sort((a, b) => b.length - a.length)
		.map(escapeRegExp)
		.join('|');

/** 2-digit year: 69–99 in the 1900s, 00–68 in the 2000s */
const century = (yy: number) => yy < 69 ? 2000 + yy : 1900 + yy;

/** seconds east of UTC to ±HH[:]MM */
function offsetText(offset: number, colon: boolean) {
	const sign = offset < 0 ? '-' : '+';
	const mins = Math.trunc(Math.abs(offset) / 60);

	return sign + pad(Math.trunc(mins / 60)) + (colon ? ':' : '') + pad(mins % 60);
}

const hour12 = (hour: number) => hour % 12 || 12;

const offsetRule = (colon: boolean): Rule => ({
	source: () => 'Z|[+-]\\d{2}(?::?\\d{2})?',
	read: (text, capture) => {
		if (text.toUpperCase() === 'Z')
			return void (capture.offset = 0);

		const [, sign, hh, mm = '0'] = /^([+-])(\d{2}):?(\d{2})?$/.exec(text) ?? [];
		const secs = within('offset hour', Number(hh), 0, 23) * 3_600 + within('offset minute', Number(mm), 0, 59) * 60;
		capture.offset = sign === '-' ? -secs : secs;
	},
	render: ({ offset }) => offsetText(offset, colon),
})

/** microseconds; parse 1–6 digits (right-padded), render the first {width} of six digits */
const fractionRule = (width: number): Rule => ({
	numeric: true,
	source: () => '\\d{1,6}',
	read: (text, capture) => void (capture.microsecond = Number(text.padEnd(6, '0'))),
	render: ({ fields }) => pad(fields.microsecond, 6).substring(0, width),		// truncated, never rounded
})

const nameRule = (kind: 'months' | 'weekdays', width: 'long' | 'short'): Rule => ({
	source: ({ locale, provider }) => alternate(provider[kind](locale, width)),
	read: (text, capture, { locale, provider }) => {
		const idx = lookup(text, provider[kind](locale, width));
		if (kind === 'months')
			capture.month = idx;
		else capture.weekday = idx;
	},
	render: ({ fields, locale, provider }) => kind === 'months'
		? provider.months(locale, width)[fields.month - 1]
		: provider.weekdays(locale, width)[dayOfWeek(fields) - 1],
})

/** every field rule, keyed by an internal name */
const Rules = {
	year4: digits('year', 'year', 1, 9999, 4, ({ fields }) => fields.year, '4'),
	year: digits('year', 'year', 1, 9999, 1, ({ fields }) => fields.year),
	year2: {
		numeric: true,
		source: () => '\\d{2}',
		read: (text, capture) => void (capture.year = century(Number(text))),
		render: ({ fields }) => pad(fields.year % 100),
	},
	monthName: nameRule('months', 'long'),
	monthAbbr: nameRule('months', 'short'),
	month2: digits('month', 'month', 1, 12, 2, ({ fields }) => fields.month),
	month: digits('month', 'month', 1, 12, 1, ({ fields }) => fields.month),
	day2: digits('day', 'day', 1, 31, 2, ({ fields }) => fields.day),
	day: digits('day', 'day', 1, 31, 1, ({ fields }) => fields.day),
	doy3: digits('day of year', 'dayOfYear', 1, 366, 3, ({ fields }) => dayOfYear(fields)),
	doy2: digits('day of year', 'dayOfYear', 1, 366, 2, ({ fields }) => dayOfYear(fields)),
	doy: digits('day of year', 'dayOfYear', 1, 366, 1, ({ fields }) => dayOfYear(fields)),
	weekdayName: nameRule('weekdays', 'long'),
	weekdayAbbr: nameRule('weekdays', 'short'),
	isoWeekday: digits('weekday', 'weekday', 1, 7, 1, ({ fields }) => dayOfWeek(fields), '1'),
	isoWeekday2: digits('weekday', 'weekday', 1, 7, 2, ({ fields }) => dayOfWeek(fields), '1,2'),
	sundayWeekday: {																					// 0 = Sunday … 6 = Saturday
		numeric: true,
		source: () => '\\d',
		read: (text, capture) => void (capture.weekday = within('weekday', Number(text), 0, 6) || 7),
		render: ({ fields }) => String(dayOfWeek(fields) % 7),
	},
	hour2: digits('hour', 'hour', 0, 23, 2, ({ fields }) => fields.hour),
	hour: digits('hour', 'hour', 0, 23, 1, ({ fields }) => fields.hour),
	hour12_2: digits('12-hour', 'hour12', 1, 12, 2, ({ fields }) => hour12(fields.hour)),
	hour12: digits('12-hour', 'hour12', 1, 12, 1, ({ fields }) => hour12(fields.hour)),
	meridiem: {
		source: ({ locale, provider }) => alternate(provider.meridiem(locale)),
		read: (text, capture, { locale, provider }) => void (capture.pm = lookup(text, provider.meridiem(locale)) === 2),
		render: ({ fields, locale, provider }) => provider.meridiem(locale)[fields.hour < 12 ? 0 : 1],
	},
	minute2: digits('minute', 'minute', 0, 59, 2, ({ fields }) => fields.minute),
	minute: digits('minute', 'minute', 0, 59, 1, ({ fields }) => fields.minute),
	second2: digits('second', 'second', 0, 59, 2, ({ fields }) => fields.second),
	second: digits('second', 'second', 0, 59, 1, ({ fields }) => fields.second),
	fraction: fractionRule(6),
	offset: offsetRule(false),
	offsetColon: offsetRule(true),
	zoneName: {																								// format-only
		render: ({ zone }) => zone,
	},
	timestamp: {
		numeric: true,
		source: () => '[+-]?\\d+(?:\\.\\d+)?',
		read: (text, capture) => void (capture.epoch = toMicroseconds(text)),
		render: ({ epoch }) => {
			const secs = epoch / 1_000_000n;
			return String(epoch < 0n && secs * 1_000_000n !== epoch ? secs - 1n : secs);	// floor, not truncate
		},
	},
} satisfies Record<string, Rule>

/** '%' directives (the modifiers '-' and ':' are part of the key) */
const Directive: Record<string, Rule> = {
	'Y': Rules.year4, 'y': Rules.year2,
	'm': Rules.month2, '-m': Rules.month, 'B': Rules.monthName, 'b': Rules.monthAbbr, 'h': Rules.monthAbbr,
	'd': Rules.day2, '-d': Rules.day, 'j': Rules.doy3, '-j': Rules.doy,
	'A': Rules.weekdayName, 'a': Rules.weekdayAbbr, 'u': Rules.isoWeekday, 'w': Rules.sundayWeekday,
	'H': Rules.hour2, '-H': Rules.hour, 'I': Rules.hour12_2, '-I': Rules.hour12, 'p': Rules.meridiem,
	'M': Rules.minute2, '-M': Rules.minute, 'S': Rules.second2, '-S': Rules.second, 'f': Rules.fraction,
	'z': Rules.offset, ':z': Rules.offsetColon, 'Z': Rules.zoneName, 's': Rules.timestamp,
}

/** pattern letters; the array index is the run-length minus one */
const Letter: Record<string, ReadonlyArray<Rule | undefined>> = {
	y: [Rules.year, Rules.year2, Rules.year4, Rules.year4],
	Y: [Rules.year, Rules.year2, Rules.year4, Rules.year4],
	M: [Rules.month, Rules.month2, Rules.monthAbbr, Rules.monthName],
	d: [Rules.day, Rules.day2],
	D: [Rules.doy, Rules.doy2, Rules.doy3],
	E: [Rules.weekdayAbbr, Rules.weekdayAbbr, Rules.weekdayAbbr, Rules.weekdayName],
	e: [Rules.isoWeekday, Rules.isoWeekday2, Rules.weekdayAbbr, Rules.weekdayName],
	a: [Rules.meridiem],
	H: [Rules.hour, Rules.hour2],
	h: [Rules.hour12, Rules.hour12_2],
	m: [Rules.minute, Rules.minute2],
	s: [Rules.second, Rules.second2],
	S: [1, 2, 3, 4, 5, 6].map(fractionRule),
	z: [Rules.offset, Rules.offset, Rules.offset],
	Z: [Rules.offset, Rules.offset, Rules.offset, undefined, Rules.offsetColon],
}

// #endregion

// #region Scanners ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

/** append literal text, merging with a preceding literal */
function literal(segments: Segment[], text: string) {
	const last = segments.at(-1);

	if (last?.type === 'literal')
		last.text += text;
	else segments.push({ type: 'literal', text });
}

/** scan a '%' directive pattern; letters are literal */
function scanDirectives(pattern: string, mode: Mode) {
	const segments: Segment[] = [];

	for (let idx = 0; idx < pattern.length; idx++) {
		const chr = pattern[idx];

		if (chr !== '%') {
			literal(segments, chr);
			continue;
		}

		let key = pattern[++idx] ?? '';
		if (key === '%') {
			literal(segments, '%');
			continue;
		}
		if (key === '-' || key === ':')													// modifier, then the directive itself
			key += pattern[++idx] ?? '';

		const rule = Directive[key];
		if (isUndefined(rule))
			throw new UnsupportedTokenError(`%${key}`, mode);

		segments.push({ type: 'token', token: `%${key}`, rule });
	}

	return segments;
}

/** scan a letter pattern; quoted text is literal, '' is an apostrophe */
function scanLetters(pattern: string, mode: Mode) {
	const segments: Segment[] = [];
	let quoted = false;

	for (let idx = 0; idx < pattern.length; idx++) {
		const chr = pattern[idx];

		if (chr === "'") {
			if (pattern[idx + 1] === "'") {												// escaped apostrophe
				literal(segments, "'");
				idx++;
			} else quoted = !quoted;
			continue;
		}

		const rules = Letter[chr];
		if (quoted || isUndefined(rules)) {
			literal(segments, chr);
			continue;
		}

		let len = 1;
		while (pattern[idx + len] === chr)
			len++;

		const token = chr.repeat(len);
		const rule = rules[len - 1];
		if (isUndefined(rule))
			throw new UnsupportedTokenError(token, mode);

		segments.push({ type: 'token', token, rule });
		idx += len - 1;
	}

	return segments;
}

/** split a pattern into literal and token segments, checking every token supports {mode} */
function scan(pattern: string, mode: Mode) {
	const segments = pattern.includes('%')
		? scanDirectives(pattern, mode)
		: scanLetters(pattern, mode);

	if (mode === 'parse')
		segments.forEach(seg => {
			if (seg.type === 'token' && (isUndefined(seg.rule.source) || isUndefined(seg.rule.read)))
				throw new UnsupportedTokenError(seg.token, mode);
		})

	return segments;
}

// #endregion

// #region Compiled plans ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

/** a parse-mode plan: an anchored, case-insensitive RegExp plus a reader per token */
export class Matcher {
	readonly pattern: string;
	/** every token captures digits only */
	readonly numeric: boolean;
	#segments: Segment[];
	#names: Names;
	#regexp?: RegExp;

	constructor(pattern: string, segments: Segment[], names: Names) {
		this.pattern = pattern;
		this.#segments = segments;
		this.#names = names;
		this.numeric = segments.every(seg => seg.type === 'literal' || seg.rule.numeric === true);
	}

	/** built on first use, since name tokens need the locale's names */
	get regexp() {
		return this.#regexp ??= anchor(this.#segments
			.map((seg, idx) => seg.type === 'literal'
				? seg.text.split(/(\s+)/).map(txt => /^\s+$/.test(txt) ? '\\s+' : escapeRegExp(txt)).join('')
				: `(?<t${idx}>${seg.rule.source?.(this.#names) ?? ''})`)
			.join(''));
	}

	/** extract fields from {text}; throws MatchError with a reason */
	match(text: string): Matched {
		const groups = this.regexp.exec(text)?.groups;
		if (isUndefined(groups))
			throw new MatchError('no match');

		const capture: Capture = {};
		this.#segments.forEach((seg, idx) => {
			const val = groups[`t${idx}`];
			if (seg.type === 'token' && isDefined(val))
				seg.rule.read?.(val, capture, this.#names);
		})

		return assemble(capture);
	}
}

/** a format-mode plan: an ordered list of literal and computed segments */
export class Renderer {
	readonly pattern: string;
	#segments: Segment[];

	constructor(pattern: string, segments: Segment[]) {
		this.pattern = pattern;
		this.#segments = segments;
	}

	render(subject: Subject) {
		return this.#segments
			.map(seg => seg.type === 'literal' ? seg.text : seg.rule.render(subject))
			.join('');
	}
}

/** apply defaults and cross-field rules to a Capture */
function assemble(capture: Capture): Matched {
	const { epoch, offset } = capture;
	let { year = 1900, month, day } = capture;

	if (isUndefined(month) && isUndefined(day) && isDefined(capture.dayOfYear)) {
		if (capture.dayOfYear > (isLeapYear(year) ? 366 : 365))
			throw new MatchError(`day of year ${capture.dayOfYear} is out of range for ${year}`);
		({ month, day } = fromDayOfYear(year, capture.dayOfYear));
	}

	month ??= 1;
	day ??= 1;
	if (!isValidDate(year, month, day))
		throw new MatchError(`day ${day} is out of range for ${year}-${pad(month)}`);

	const hour = isDefined(capture.hour12)
		? capture.hour12 % 12 + (capture.pm ? 12 : 0)
		: capture.hour ?? 0;

	const fields: CivilFields = {
		year, month, day, hour,
		minute: capture.minute ?? 0,
		second: capture.second ?? 0,
		microsecond: capture.microsecond ?? 0,
	}

	const matched: Matched = { fields };
	if (isDefined(offset))
		matched.offset = offset;
	if (isDefined(epoch))
		matched.epoch = epoch;

	return matched;
}

// #endregion

/**
 * compile a pattern into a Matcher (parse mode) or a Renderer (format mode).
 * a pattern containing '%' is read as POSIX directives, otherwise as Unicode pattern letters
 */
export function compile(pattern: string, mode: 'parse', names?: Partial<Names>): Matcher;
export function compile(pattern: string, mode: 'format'): Renderer;
export function compile(pattern: string, mode: Mode, names: Partial<Names> = {}) {
	const segments = scan(pattern, mode);

	if (mode === 'format')
		return new Renderer(pattern, segments);

	const config = Chronicle.config;
	return new Matcher(pattern, segments, {
		locale: names.locale ?? config.locale,
		provider: names.provider ?? config.localeProvider,
	});
}
