import type { Style, TimeUnit } from './chronicle.config/chronicle.enum.js';

export type NameWidth = 'long' | 'short';

/**
 * Supplies locale-specific calendar names and duration phrases.
 * Names are returned in calendar order: months from January, weekdays from Monday.
 */
export interface LocaleProvider {
	/** twelve month names */
	months(locale: string, width: NameWidth): ReadonlyArray<string>;
	/** seven weekday names, Monday first */
	weekdays(locale: string, width: NameWidth): ReadonlyArray<string>;
	/** the AM and PM markers */
	meridiem(locale: string): readonly [am: string, pm: string];
	/** a pluralized count of units, e.g. '3 hours' */
	unit(locale: string, unit: TimeUnit, count: number, style: Style): string;
	/** a count of units with a direction, e.g. 'in 3 hours' or '3 hours ago' */
	relative(locale: string, unit: TimeUnit, count: number, future: boolean, style: Style): string;
}

/** a fixed reference date: Monday 3-Jan-2000, UTC */
const monday = (offset = 0, hour = 0) => new Date(Date.UTC(2000, 0, 3 + offset, hour));

/** LocaleProvider backed by the runtime's Intl data; each lookup is resolved once per locale */
export class IntlLocale implements LocaleProvider {
	#cache = new Map<string, unknown>();

	#memo<T>(key: string, make: () => T, guard: (val: unknown) => val is T) {
		const hit = this.#cache.get(key);
		if (guard(hit))
			return hit;

		const val = make();
		this.#cache.set(key, val);
		return val;
	}

	months(locale: string, width: NameWidth) {
		return this.#memo(`months.${locale}.${width}`, () => {
			const fmt = new Intl.DateTimeFormat(locale, { month: width, timeZone: 'UTC' });
			return Object.freeze(Array.from({ length: 12 }, (_, idx) => fmt.format(new Date(Date.UTC(2000, idx, 1)))));
		}, isNames)
	}

	weekdays(locale: string, width: NameWidth) {
		return this.#memo(`weekdays.${locale}.${width}`, () => {
			const fmt = new Intl.DateTimeFormat(locale, { weekday: width, timeZone: 'UTC' });
			return Object.freeze(Array.from({ length: 7 }, (_, idx) => fmt.format(monday(idx))));
		}, isNames)
	}

	meridiem(locale: string) {
		return this.#memo(`meridiem.${locale}`, () => {
			const fmt = new Intl.DateTimeFormat(locale, { hour: 'numeric', hour12: true, timeZone: 'UTC' });
			const mark = (hour: number, fallback: string) => fmt.formatToParts(monday(0, hour))
				.find(part => part.type === 'dayPeriod')?.value ?? fallback;

			return Object.freeze([mark(1, 'AM'), mark(13, 'PM')] as const);
		}, isPair)
	}

	unit(locale: string, unit: TimeUnit, count: number, style: Style) {
		const fmt = this.#memo(`unit.${locale}.${unit}.${style}`,
			() => new Intl.NumberFormat(locale, { style: 'unit', unit, unitDisplay: style, useGrouping: false }),
			(val): val is Intl.NumberFormat => val instanceof Intl.NumberFormat);

		return fmt.format(count);
	}

	relative(locale: string, unit: TimeUnit, count: number, future: boolean, style: Style) {
		const fmt = this.#memo(`relative.${locale}.${style}`,
			() => new Intl.RelativeTimeFormat(locale, { numeric: 'always', style }),
			(val): val is Intl.RelativeTimeFormat => val instanceof Intl.RelativeTimeFormat);

		let number = false;																			// the (possibly grouped) number spans several parts
		return fmt.formatToParts(future ? count : -count, unit)	// -0 reads as the past
			.map(part => {
				if (part.type === 'literal')
					return part.value;
				if (number)
					return '';
				number = true;
				return String(count);																// ungrouped, like unit()
			})
			.join('');
	}
}

const isNames = (val: unknown): val is ReadonlyArray<string> => Array.isArray(val);
const isPair = (val: unknown): val is readonly [string, string] => Array.isArray(val) && val.length === 2;
