import { isArray, isObject } from './type.library.js';
import type { KeyOf, ValueOf, Secure } from './type.library.js';

type Obj = object

// These functions are to preserve the typescript 'type' of an object's keys & values
// and will include string | symbol keys

/** array of PropertyKeys as string | symbol */
export function ownKeys<T extends Obj>(json: T) {
	return Reflect.ownKeys(json) as KeyOf<T>[]                // Object.keys() would discard symbol-keys
}

/** array of object values */
export function ownValues<T extends Obj>(json: T) {
	return ownKeys(json)                                      // Object.values() would discard symbol-keys
		.map(key => json[key] as ValueOf<T>)
}

/** tuple of object entries with string | symbol keys */
export function ownEntries<T extends Obj>(json: T) {
	return ownKeys(json)                                      // Object.entries() would discard symbol-keys
		.map(key => [key, json[key]] as [KeyOf<T>, ValueOf<T>]) // cast as tuple
}

/** deep-freeze an <object | array> to make it immutable */
export function secure<T>(obj: T) {
	if (isObject(obj) || isArray(obj)) {											// only works on objects or arrays at this time
		Object.values(obj)																			// retrieve the properties on obj
			.forEach(val => Object.isFrozen(val) || secure(val));	// secure each value, if not already Frozen

		Object.freeze(obj);																			// freeze the object itself
	}

	return obj as Secure<T>;
}
