/**
 * Export names: `_T`, then the unit and the function, each prefixed by its
 * length in bytes, e.g. `_T5token8transfer`.
 */

import { utf8 } from '../host/encoding.ts'

function segment(name: string): string {
	return `${utf8(name).length}${name}`
}

export function mangle(unit: string, fn: string): string {
	return `_T${segment(unit)}${segment(fn)}`
}

/** Inverse of `mangle`; null for names it did not produce. */
export function demangle(name: string): { unit: string; fn: string } | null {
	if (!name.startsWith('_T')) return null
	const bytes = utf8(name.slice(2))
	const decoder = new TextDecoder()
	const parts: string[] = []
	let cursor = 0
	while (cursor < bytes.length && parts.length < 2) {
		let length = 0
		let digits = 0
		for (let byte = bytes[cursor]; byte !== undefined && byte >= 0x30 && byte <= 0x39; byte = bytes[cursor]) {
			length = length * 10 + (byte - 0x30)
			cursor++
			digits++
		}
		if (digits === 0 || cursor + length > bytes.length) return null
		parts.push(decoder.decode(bytes.subarray(cursor, cursor + length)))
		cursor += length
	}
	const [unit, fn] = parts
	if (unit === undefined || fn === undefined || cursor !== bytes.length) return null
	return { fn, unit }
}
