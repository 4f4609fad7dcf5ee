import { Default } from './chronicle.default.js';
import { STYLE } from './chronicle.enum.js';
import { InvalidOptionError } from '../error.library.js';
import { isDefined, isString } from '../shared/type.library.js';
import { ownEntries } from '../shared/reflection.library.js';
import type { Style } from './chronicle.enum.js';
import type { LocaleProvider } from '../locale.provider.js';
import type { TimezoneProvider } from '../timezone.provider.js';

/**
 * Process-wide configuration.
 * Chronicle.#global is set from
 * a) reasonable default values, then
 * b) 'init' argument values
 * Each operation reads the config at call time; per-call arguments take precedence.
 */
export class Chronicle {
	static #global: Chronicle.Config = { ...Default };

	/** validate and merge options over a base config */
	static #merge(base: Chronicle.Config, options: Chronicle.Options) {
		const { formats, ...rest } = options;
		const config: Chronicle.Config = { ...base };

		ownEntries(rest)
			.forEach(([key, val]) => {
				if (isDefined(val))
					Object.assign(config, { [key]: val });
			})

		if (isDefined(formats))
			config.formats = isString(formats) ? [formats] : [...formats];

		if (!STYLE.has(config.style))
			throw new InvalidOptionError('style', config.style, STYLE.keys());
		if (!Number.isFinite(config.threshold) || config.threshold < 0)
			throw new InvalidOptionError('threshold', config.threshold, ['a non-negative number']);

		return config;
	}

	/**
	 * set a default configuration for subsequent operations.
	 * with no options, the defaults are restored
	 */
	static init(options: Chronicle.Options = {}) {
		Chronicle.#global = Chronicle.#merge(Default, options);

		return Chronicle.config;
	}

	/** apply per-call options over the global config, without changing it */
	static resolve(options: Chronicle.Options = {}) {
		return Chronicle.#merge(Chronicle.#global, options);
	}

	/** Chronicle global config settings */
	static get config() {
		return { ...Chronicle.#global, formats: [...Chronicle.#global.formats] }
	}

	/** Chronicle initial default settings */
	static get default() {
		return { ...Default, formats: [...Default.formats] }
	}

	get [Symbol.toStringTag]() {
		return 'Chronicle';
	}
}

export namespace Chronicle {
	/** candidate formats: a pattern, a keyword, or an ordered list of either */
	export type FormatSpec = string | string[]

	/** the options accepted by init() and by individual operations */
	export interface Options {
		/** log to console */																		debug?: boolean;
		/** locale for names and phrases */											locale?: string;
		/** zone for parsed values without an offset */					timeZone?: string;
		/** default candidate formats */												formats?: FormatSpec;
		/** humanize cut-over to a finer unit */								threshold?: number;
		/** humanize rendering style */													style?: Style;
		/** humanize with 'in …' / '… ago' */										addDirection?: boolean;
		/** calendar names and phrases */												localeProvider?: LocaleProvider;
		/** UTC offsets for named zones */											timezoneProvider?: TimezoneProvider;
	}

	/** the resolved configuration */
	export interface Config extends Required<Omit<Options, 'timeZone' | 'formats'>> {
		timeZone?: string;
		formats: string[];
	}
}
