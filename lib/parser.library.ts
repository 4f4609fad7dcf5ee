import { Logify } from './shared/logify.class.js';
import { isDefined, isNumber } from './shared/type.library.js';
import { toMicroseconds } from './shared/number.library.js';
import { KEYWORD, MICRO } from './chronicle.config/chronicle.enum.js';
import { IsoFamily } from './chronicle.config/chronicle.default.js';
import { Chronicle } from './chronicle.config/chronicle.config.js';
import { MatchError, ParseError, RangeOverflowError, UnsupportedTokenError } from './error.library.js';
import { toEpoch } from './calendar.library.js';
import { compile } from './token.library.js';
import { Instant } from './instant.class.js';
import type { Attempt } from './error.library.js';
import type { Matcher } from './token.library.js';
import type { LocaleProvider } from './locale.provider.js';

const log = new Logify('parse', { debug: () => Chronicle.config.debug });

/** the raw value, resolved at the parser boundary */
export type Input =
	| { type: 'Text', value: string }
	| { type: 'Numeric', value: number }

/** a successful parse, and the candidate that produced it */
export interface ParseOutcome {
	/** the parsed value */																		instant: Instant;
	/** the FormatSpec entry that matched */									format: string;
	/** the concrete pattern (or keyword) that matched */			pattern: string;
}

/** one concrete candidate, and the FormatSpec entry it came from */
interface Candidate {
	format: string;
	pattern: string;
}

const isKeyword = (format: string, keyword: string) => format.toLowerCase() === keyword.toLowerCase();

/** compiled ISO matchers, per locale provider and locale; other patterns are compiled per call */
const Matchers = new WeakMap<LocaleProvider, Map<string, Matcher>>();
const Reusable = new Set<string>(IsoFamily);

function matcher(pattern: string, locale: string, provider: LocaleProvider) {
	if (!Reusable.has(pattern))
		return compile(pattern, 'parse', { locale, provider });

	let cache = Matchers.get(provider);
	if (!cache)
		Matchers.set(provider, cache = new Map<string, Matcher>());

	const key = `${locale}\u0000${pattern}`;
	let plan = cache.get(key);
	if (!plan) {
		plan = compile(pattern, 'parse', { locale, provider });
		cache.set(key, plan);
	}

	return plan;
}

/** expand keywords into concrete candidates, in order */
function expand(formats: ReadonlyArray<string>): Candidate[] {
	return formats.flatMap(format => {
		if (isKeyword(format, KEYWORD.iso))
			return IsoFamily.map(pattern => ({ format, pattern }));
		if (isKeyword(format, KEYWORD.timestamp))
			return [{ format, pattern: KEYWORD.timestamp }];
		return [{ format, pattern: format }];
	})
}

/**
 * a number is only tried against the timestamp keyword and patterns built from numeric tokens;
 * timestamp is appended when the list lacks it
 */
function numericOnly(candidates: Candidate[], locale: string, provider: LocaleProvider) {
	const list = candidates.filter(({ pattern }) => {
		if (pattern === KEYWORD.timestamp)
			return true;

		try {
			return matcher(pattern, locale, provider).numeric;
		} catch (err) {
			if (err instanceof UnsupportedTokenError)
				return false;
			throw err;
		}
	})

	if (!list.some(({ pattern }) => pattern === KEYWORD.timestamp))
		list.push({ format: KEYWORD.timestamp, pattern: KEYWORD.timestamp });

	return list;
}

/** resolve the raw value */
const toInput = (value: string | number): Input => isNumber(value)
	? { type: 'Numeric', value }
	: { type: 'Text', value };

/**
 * parse a value against an ordered list of candidate formats.
 * the first candidate to match wins; when none does, a single ParseError lists every attempt with its reason,
 * unless a candidate matched but fell outside the representable range, which raises that RangeOverflowError.
 * an explicit offset in the text takes precedence, then {defaultTz}, then UTC
 */
export function parseOutcome(value: string | number, formats?: Chronicle.FormatSpec, defaultTz?: string, options: Chronicle.Options = {}): ParseOutcome {
	const config = Chronicle.resolve({ ...options, formats: formats ?? options.formats, timeZone: defaultTz ?? options.timeZone });
	const { locale, localeProvider, timezoneProvider } = config;
	const input = toInput(value);
	const text = String(input.value);

	const zone = isDefined(config.timeZone)										// an unknown zone fails before any candidate is tried
		? timezoneProvider.validate(config.timeZone)
		: undefined;

	const candidates = input.type === 'Numeric'
		? numericOnly(expand(config.formats), locale, localeProvider)
		: expand(config.formats);
	const attempted: Attempt[] = [];
	let overflow: RangeOverflowError | undefined;

	for (const { format, pattern } of candidates) {
		try {
			let epoch: bigint;

			if (pattern === KEYWORD.timestamp) {
				epoch = toMicroseconds(input.value);
			} else {
				const { fields, offset, epoch: stamp } = matcher(pattern, locale, localeProvider).match(text);
				const shift = offset
					?? (isDefined(zone) ? timezoneProvider.resolveLocal(zone, fields).offset : 0);

				epoch = stamp ?? toEpoch(fields) - BigInt(shift) * MICRO.second;
			}

			const instant = new Instant(epoch);
			log.debug('"%s" matched %s', text, pattern);

			return { instant, format, pattern };
		} catch (err) {
			if (err instanceof RangeOverflowError)
				overflow ??= err;
			else if (!(err instanceof MatchError || err instanceof UnsupportedTokenError || err instanceof RangeError))
				throw err;

			log.debug('"%s" failed %s: %s', text, pattern, err.message);
			attempted.push({ format, pattern, reason: err.message });
		}
	}

	return log.fail(overflow ?? new ParseError(value, attempted));	// a value out of range outranks a mismatch
}

/** parse a value into an Instant; see parseOutcome() */
export function parse(value: string | number, formats?: Chronicle.FormatSpec, defaultTz?: string, options?: Chronicle.Options) {
	return parseOutcome(value, formats, defaultTz, options).instant;
}
