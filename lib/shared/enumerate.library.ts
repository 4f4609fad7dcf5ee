import { isArray, isObject } from './type.library.js';
import { ownKeys, ownValues, ownEntries } from './reflection.library.js';
import type { Prettify } from './type.library.js';

/**
 * The intent of this module is to provide a Javascript-supported syntax for an object to behave as an Enum.
 * It can be used instead of Typescript's Enum (which is not supported in vanilla JS)
 */

/**
 * This is the prototype for an Enum object.
 * It contains just the methods / symbols we need.
 */
const ENUM = Object.create(null, {
	count: value(function (this: object) { return ownKeys(this).length }),
	keys: value(function (this: object) { return ownKeys(this) }),
	values: value(function (this: object) { return ownValues(this) }),
	entries: value(function (this: object) { return ownEntries(this) }),
	has: value(function (this: object, key: unknown) { return typeof key === 'string' && Object.hasOwn(this, key) }),
	keyOf: value(function (this: object, search: unknown) { return ownEntries(this).find(([, val]) => val === search)?.[0] }),
	toString: value(function (this: object) { return JSON.stringify({ ...this }) }),
	[Symbol.toStringTag]: value('Enumify'),
	[Symbol.iterator]: value(function (this: object) { return ownEntries(this)[Symbol.iterator](); }),
})

/** define a Descriptor for an Enum's method */
function value(value: PropertyDescriptor["value"]) {
	return Object.assign({ enumerable: false, configurable: false, writable: false } as const, { value } as const);
}

/** an Array-based Enum maps each entry to its index */
type Index<T extends ReadonlyArray<string>> = { readonly [K in T[number]]: number }

/** extend the Enum object with 'helper' methods */
type Methods<T> = {
	/** count of Enum keys */																	count(): number;
	/** array of Enum keys */																	keys(): (keyof T & string)[];
	/** array of Enum values */																values(): T[keyof T][];
	/** tuple of Enum entries */															entries(): { [K in keyof T]: [K, T[K]] }[keyof T][];
	/** test for an Enum key */																has(key: unknown): key is keyof T & string;
	/** reverse lookup of Enum key by value */								keyOf(value: T[keyof T]): keyof T | undefined;
	/** stringify method */																		toString(): string;
	/** Iterator for Enum */																	[Symbol.iterator](): Iterator<[keyof T, T[keyof T]]>;
}

export type Enumify<T> = Prettify<Readonly<T>> & Methods<T>

export namespace Enum {
	export type keys<T extends { keys(): unknown[] }> = ReturnType<T['keys']>[number]
	export type values<T extends { values(): unknown[] }> = ReturnType<T['values']>[number]
}

/**
 * function to return an 'enum-like' object (that we can use until Javascript implements its own)
 * with useful helper-methods on the prototype
 */
export function enumify<const T extends ReadonlyArray<string>>(list: T): Enumify<Index<T>>;
export function enumify<const T extends Record<string, unknown>>(list: T): Enumify<T>;
export function enumify(list: ReadonlyArray<string> | Record<string, unknown>) {
	if (!isArray(list) && !isObject(list))
		throw new Error(`enumify requires an array or object as input`);

	const stash = isArray<string>(list)												// refactor Array as an Object
		? list.reduce<Record<string, number>>((acc, itm, idx) => Object.assign(acc, { [itm]: idx }), {})
		: { ...list }

	return Object.freeze(Object.create(ENUM, Object.getOwnPropertyDescriptors(stash)));
}

/**
 * Example of usage
 *
 * const SEASON = enumify({ Spring: 'spring', Summer: 'summer', Autumn: 'autumn', Winter: 'winter' });
 * type SEASON = Enum.values<typeof SEASON>
 *
 * SEASON.keys()																						// Spring | Summer | Autumn | Winter
 * SEASON.values()																					// spring | summer | autumn | winter
 * SEASON.count()																						// 4
 * SEASON.keyOf('summer')																		// Summer
 * SEASON.has('Winter')																			// true
 */
