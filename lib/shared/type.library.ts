import type { Duration } from '../duration.class.js';

/** the primitive type reported by toStringTag() */
const protoType = (obj?: unknown) => Object.prototype.toString.call(obj).slice(8, -1);

/**
 * return an object's type as a ProperCase string.
 * if instance, return Class name
 */
export const getType = (obj?: unknown) => {
	const type = protoType(obj);

	if (type === 'Object' && isRecord(obj))
		return (obj.constructor?.name ?? 'Object') as Types;		// some Objects do not have a constructor method

	if (type === 'Function' && String(obj).startsWith('class '))
		return 'Class';

	return type as Types;
}

/** assert value is one of a list of Types */
export const isType = <T>(obj: unknown, ...types: Types[]): obj is T => types.includes(getType(obj));

/** Type-Guards: assert \<obj> is of \<type> */
export const isString = <T>(obj?: T): obj is Extract<T, string> => isType(obj, 'String');
export const isNumber = <T>(obj?: T): obj is Extract<T, number> => isType(obj, 'Number');
export const isInteger = <T>(obj?: T): obj is Extract<T, bigint> => isType(obj, 'BigInt');
export const isArray = <T>(obj: unknown): obj is T[] => isType(obj, 'Array');
export const isObject = <T>(obj?: T): obj is Extract<T, Property<unknown>> => isType(obj, 'Object');

export const isNullish = <T>(obj: T): obj is Extract<T, Nullish> => isType(obj, 'Null', 'Undefined');
export const isUndefined = <T>(obj?: T): obj is undefined => isType(obj, 'Undefined');
export const isDefined = <T>(obj: T): obj is NonNullable<T> => !isNullish(obj);

// library Objects (each class reports its own toStringTag)
export const isDuration = (obj: unknown): obj is Duration => isType(obj, 'Duration');

/** narrow to a non-null object, so that its properties can be probed */
function isRecord(obj: unknown): obj is { constructor?: { name?: string } } {
	return typeof obj === 'object' && obj !== null;
}

/** bottom value */
export type Nullish = null | undefined | void;

export type KeyOf<T> = keyof T;
export type ValueOf<T> = T[keyof T];

/** Generic Record */
export type Property<T> = Record<PropertyKey, T>

export type Prettify<T> = { [K in keyof T]: T[K]; } & {}

/** mark every property (to any depth) as readonly */
export type Secure<T> = T extends ReadonlyArray<infer A>
	? ReadonlyArray<Secure<A>>
	: T extends Function
	? T
	: T extends object
	? { readonly [K in keyof T]: Secure<T[K]> }
	: T

// ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

export type Types =
	| 'String'
	| 'Number'
	| 'BigInt'
	| 'Boolean'
	| 'Object'
	| 'Array'
	| 'Null'
	| 'Undefined'
	| 'Date'
	| 'Function'
	| 'Class'
	| 'RegExp'
	| 'Map'
	| 'Set'
	| 'Symbol'
	| 'Error'

	| 'Temporal.Instant'
	| 'Temporal.ZonedDateTime'
	| 'Temporal.PlainDateTime'

	| 'Enumify'
	| 'Instant'
	| 'Duration'
