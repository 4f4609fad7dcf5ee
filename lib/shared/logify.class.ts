import { sprintf } from './string.library.js';

const Level = {
	Debug: 'debug',
	Log: 'log',
	Info: 'info',
	Warn: 'warn',
	Error: 'error',
} as const

/**
 * console logger for a named component.
 * nothing is written unless {debug} resolves true; errors handed to fail() are always thrown
 */
export class Logify {
	#name;
	#debug: () => boolean;

	#log(method: Logify.Method, fmt: unknown, ...msg: unknown[]) {
		if (this.#debug())
			console[method](this.#name, sprintf(fmt, ...msg));
	}

	/** log the error (when debugging) and throw it back to the caller */
	fail(err: Error): never {
		this.error(err.message);																// this goes to the console
		throw err;																							// this goes back to the caller
	}

	log = this.#log.bind(this, Level.Log);
	info = this.#log.bind(this, Level.Info);
	warn = this.#log.bind(this, Level.Warn);
	debug = this.#log.bind(this, Level.Debug);
	error = this.#log.bind(this, Level.Error);

	constructor(name: string, opts: Logify.Constructor = {}) {
		const debug = opts.debug ?? false;

		this.#name = name.concat(':');
		this.#debug = typeof debug === 'function' ? debug : () => debug;
	}
}

export namespace Logify {
	export type Method = Extract<keyof Console, 'log' | 'info' | 'debug' | 'warn' | 'error'>;

	export interface Constructor {
		/** a fixed flag, or a callback read on every message */	debug?: boolean | (() => boolean),
	}
}
