/**
 * Values as the reference runtimes observe them.
 */

import { DIGEST_BYTES, isStruct, type StructType, type Type, wrapInt } from '../check/types.ts'
import { bytesEqual, bytesToWord, fitDigest, fromUtf8, utf8, wordToBytes, wordToInt } from '../host/encoding.ts'

export interface StructValue {
	readonly kind: 'struct'
	readonly type: StructType
	readonly fields: RuntimeValue[]
}

export type RuntimeValue = bigint | boolean | string | Uint8Array | StructValue

export function isStructValue(value: RuntimeValue): value is StructValue {
	return typeof value === 'object' && !(value instanceof Uint8Array)
}

export function zeroValue(type: Type): RuntimeValue {
	switch (type.kind) {
		case 'int':
			return 0n
		case 'bool':
			return false
		case 'string':
			return ''
		case 'digest':
			return new Uint8Array(DIGEST_BYTES)
		case 'struct':
			return { fields: type.fields.map((f) => zeroValue(f.type)), kind: 'struct', type }
		case 'unit':
			throw new Error('unit has no value')
	}
}

/** Bytes a value is handed to the host as. */
export function encodeValue(value: RuntimeValue): Uint8Array {
	if (typeof value === 'bigint') return wordToBytes(value)
	if (typeof value === 'boolean') return wordToBytes(value ? 1n : 0n)
	if (typeof value === 'string') return utf8(value)
	if (value instanceof Uint8Array) return value
	throw new Error(`struct ${value.type.name} cannot cross the host boundary`)
}

/** Value of `type` from bytes the host returned. */
export function decodeValue(type: Type, bytes: Uint8Array): RuntimeValue {
	switch (type.kind) {
		case 'int':
			return wordToInt(type, bytesToWord(bytes))
		case 'bool':
			return bytesToWord(bytes) !== 0n
		case 'string':
			return fromUtf8(bytes)
		case 'digest':
			return fitDigest(bytes)
		default:
			throw new Error(`${type.kind} cannot cross the host boundary`)
	}
}

/** Deep copy; nested structs are copied, digests and strings are immutable. */
export function copyValue(value: RuntimeValue): RuntimeValue {
	if (!isStructValue(value)) return value
	return { fields: value.fields.map(copyValue), kind: 'struct', type: value.type }
}

export function valuesEqual(a: RuntimeValue, b: RuntimeValue): boolean {
	if (a instanceof Uint8Array || b instanceof Uint8Array) {
		return a instanceof Uint8Array && b instanceof Uint8Array && bytesEqual(a, b)
	}
	if (isStructValue(a) || isStructValue(b)) {
		if (!isStructValue(a) || !isStructValue(b) || a.fields.length !== b.fields.length) return false
		return a.fields.every((f, i) => {
			const other = b.fields[i]
			return other !== undefined && valuesEqual(f, other)
		})
	}
	return a === b
}

/** Canonical value of a machine word for a scalar type. */
export function fromWord(type: Type, word: bigint): RuntimeValue {
	if (type.kind === 'bool') return word !== 0n
	if (type.kind === 'int') return wordToInt(type, word)
	throw new Error(`${type.kind} is not a word type`)
}

/** Machine word of a scalar value. */
export function toWord(type: Type, value: RuntimeValue): bigint {
	if (typeof value === 'boolean') return value ? 1n : 0n
	if (typeof value === 'bigint' && type.kind === 'int') return BigInt.asUintN(64, wrapInt(type, value))
	throw new Error(`${isStruct(type) ? type.name : type.kind} is not a word type`)
}

export function formatValue(value: RuntimeValue): string {
	if (typeof value === 'string') return JSON.stringify(value)
	if (value instanceof Uint8Array) return `0x${Buffer.from(value).toString('hex')}`
	if (typeof value === 'object') return `${value.type.name} { ${value.fields.map(formatValue).join(', ')} }`
	return String(value)
}
