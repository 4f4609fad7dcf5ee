import { Temporal } from '@js-temporal/polyfill';

import { isDefined, isUndefined } from './shared/type.library.js';

/** wall-clock seconds */
const wallClock = () => Temporal.Now.instant().epochMilliseconds / 1_000;

/**
 * A stopwatch, and a countdown when given a {timeout}.
 * start() after stop() resumes, carrying the elapsed time forward;
 * start() while running restarts from zero.
 */
export class Timer {
	/** countdown length, in seconds */												readonly timeout: number;
	/** source of the current time, in seconds */							#clock: () => number;
	#startedAt?: number;
	#stoppedAt?: number;

	constructor({ timeout = 0, clock = wallClock }: Timer.Options = {}) {
		this.timeout = timeout;
		this.#clock = clock;
	}

	/** run {fn} between start() and stop(); the timer stops even if {fn} throws */
	static time<T>(fn: (timer: Timer) => T, options?: Timer.Options) {
		const timer = new Timer(options).start();

		try {
			return { timer, result: fn(timer) };
		} finally {
			timer.stop();
		}
	}

	/** back to the initial, never-started state */
	reset() {
		this.#startedAt = undefined;
		this.#stoppedAt = undefined;
		return this;
	}

	start() {
		const carry = isDefined(this.#startedAt) && isDefined(this.#stoppedAt) && this.#startedAt < this.#stoppedAt
			? this.#stoppedAt - this.#startedAt
			: 0;

		this.#startedAt = this.#clock() - carry;
		this.#stoppedAt = undefined;
		return this;
	}

	stop() {
		this.#stoppedAt = this.#clock();
		return this;
	}

	started() {
		return isDefined(this.#startedAt)
			&& (isUndefined(this.#stoppedAt) || this.#stoppedAt < this.#startedAt);
	}

	stopped() {
		return !this.started();
	}

	/** seconds on the clock */
	elapsed() {
		if (isUndefined(this.#startedAt))
			return 0;

		return (this.#stoppedAt ?? this.#clock()) - this.#startedAt;
	}

	/** seconds left before the timeout; negative once it has passed */
	remaining() {
		return this.timeout - this.elapsed();
	}

	/** has the countdown run out */
	done() {
		return this.elapsed() >= this.timeout;
	}

	get [Symbol.toStringTag]() {
		return 'Timer';
	}
}

export namespace Timer {
	export interface Options {
		/** countdown length, in seconds (default 0) */					timeout?: number;
		/** seconds source, injectable for tests */							clock?: () => number;
	}
}
