import { Logify } from './shared/logify.class.js';
import { isDefined } from './shared/type.library.js';
import { roundHalfEven } from './shared/number.library.js';
import { TIME } from './chronicle.config/chronicle.enum.js';
import { Chronicle } from './chronicle.config/chronicle.config.js';
import { InvalidUnitError } from './error.library.js';
import type { SpanUnit, Style, TimeUnit } from './chronicle.config/chronicle.enum.js';
import type { LocaleProvider } from './locale.provider.js';
import type { Duration } from './duration.class.js';

const log = new Logify('humanize', { debug: () => Chronicle.config.debug });

/**
 * pick the humanize unit for a magnitude (in seconds).
 * walk the ladder coarsest-first and take the first unit whose scaled value reaches {threshold};
 * seconds are the floor
 */
export function selectUnit(seconds: number, threshold: number): TimeUnit {
	return TIME.keys()
		.find(unit => seconds / TIME[unit] >= threshold) ?? 'second';
}

/** an explicit granularity must be on the humanize ladder */
function pinned(granularity: SpanUnit): TimeUnit {
	if (TIME.has(granularity))
		return granularity;

	throw new InvalidUnitError(granularity, TIME.keys());
}

/**
 * render a Duration as a localized phrase.
 * the count is the magnitude in the chosen unit, rounded half-to-even;
 * in the finest unit allowed ({granularity}, else seconds) a non-zero magnitude counts at least 1.
 * with {addDirection}, a non-negative duration reads as the future ('in …') and a negative one as the past ('… ago')
 */
export function humanize(duration: Duration, config: Humanize.Config = {}) {
	const { granularity, ...options } = config;
	const { locale, threshold, style, addDirection, localeProvider } = Chronicle.resolve(options);

	const micro = duration.totalMicroseconds;
	const seconds = Math.abs(Number(micro)) / 1_000_000;
	const finest = isDefined(granularity) ? pinned(granularity) : 'second';
	const unit = isDefined(granularity) ? finest : selectUnit(seconds, threshold);
	const value = seconds / TIME[unit];
	const count = roundHalfEven(unit === finest && value > 0 ? Math.max(1, value) : value);

	log.debug('%s seconds as %s %s', seconds, count, unit);

	return addDirection
		? localeProvider.relative(locale, unit, count, micro >= 0n, style)
		: localeProvider.unit(locale, unit, count, style);
}

export namespace Humanize {
	export interface Config {
		/** locale for the phrase */															locale?: string;
		/** wrap with 'in …' / '… ago' */													addDirection?: boolean;
		/** pin the unit instead of selecting by threshold */		granularity?: SpanUnit;
		/** cut-over to a finer unit (default 0.85) */						threshold?: number;
		/** long | short | narrow */															style?: Style;
		/** supplies the phrases */																localeProvider?: LocaleProvider;
	}
}
