/**
 * Language types shared by the front end, HIR, SSA and the backend.
 *
 * Every value occupies one 64-bit machine word at run time: integers and
 * booleans directly, strings as a packed (offset, length) pair, digests and
 * structs as a pointer into linear memory.
 */

export type IntBits = 8 | 16 | 32 | 64

export interface IntType {
	readonly kind: 'int'
	readonly signed: boolean
	readonly bits: IntBits
}

export interface BoolType {
	readonly kind: 'bool'
}

/** Immutable string literal. */
export interface StringType {
	readonly kind: 'string'
}

/** 32-byte cryptographic digest, stored in linear memory. */
export interface DigestType {
	readonly kind: 'digest'
}

export interface UnitType {
	readonly kind: 'unit'
}

export interface FieldDef {
	readonly name: string
	readonly type: Type
}

/**
 * A declared struct. `fields` is filled once all struct names are known, so
 * self-referential declarations resolve.
 */
export interface StructType {
	readonly kind: 'struct'
	readonly name: string
	/** Declared with `copy struct` */
	readonly declaredCopy: boolean
	fields: FieldDef[]
}

export type Type = IntType | BoolType | StringType | DigestType | UnitType | StructType

export const BOOL: BoolType = { kind: 'bool' }
export const STRING: StringType = { kind: 'string' }
export const DIGEST: DigestType = { kind: 'digest' }
export const UNIT: UnitType = { kind: 'unit' }

function int(signed: boolean, bits: IntBits): IntType {
	return { bits, kind: 'int', signed }
}

export const U8 = int(false, 8)
export const U16 = int(false, 16)
export const U32 = int(false, 32)
export const U64 = int(false, 64)
export const I8 = int(true, 8)
export const I16 = int(true, 16)
export const I32 = int(true, 32)
export const I64 = int(true, 64)

/** Built-in type names, in lookup order. */
export const BUILTIN_TYPES: ReadonlyMap<string, Type> = new Map<string, Type>([
	['u8', U8],
	['u16', U16],
	['u32', U32],
	['u64', U64],
	['i8', I8],
	['i16', I16],
	['i32', I32],
	['i64', I64],
	['bool', BOOL],
	['string', STRING],
	['digest', DIGEST],
])

/** Every value is one machine word; aggregates store one word per field. */
export const WORD_BYTES = 8

/** Size of a digest buffer in linear memory. */
export const DIGEST_BYTES = 32

export function isInt(type: Type): type is IntType {
	return type.kind === 'int'
}

export function isStruct(type: Type): type is StructType {
	return type.kind === 'struct'
}

export function typeEquals(a: Type, b: Type): boolean {
	if (a.kind !== b.kind) return false
	if (a.kind === 'int' && b.kind === 'int') return a.signed === b.signed && a.bits === b.bits
	if (a.kind === 'struct' && b.kind === 'struct') return a.name === b.name
	return true
}

export function typeName(type: Type): string {
	switch (type.kind) {
		case 'int':
			return `${type.signed ? 'i' : 'u'}${type.bits}`
		case 'struct':
			return type.name
		default:
			return type.kind
	}
}

/**
 * Copy-or-move classification. Scalars, strings and digests are immutable
 * and copy freely; a struct copies only when declared `copy struct` and every
 * field copies too.
 */
export function isCopyType(type: Type, seen: Set<string> = new Set()): boolean {
	if (type.kind !== 'struct') return true
	if (!type.declaredCopy) return false
	if (seen.has(type.name)) return false
	seen.add(type.name)
	return type.fields.every((f) => isCopyType(f.type, seen))
}

/** Bytes an aggregate occupies in linear memory. */
export function aggregateSize(type: Type): number {
	if (type.kind === 'struct') return type.fields.length * WORD_BYTES
	if (type.kind === 'digest') return DIGEST_BYTES
	return 0
}

export function intMin(type: IntType): bigint {
	return type.signed ? -(1n << BigInt(type.bits - 1)) : 0n
}

export function intMax(type: IntType): bigint {
	return type.signed ? (1n << BigInt(type.bits - 1)) - 1n : (1n << BigInt(type.bits)) - 1n
}

export function fitsInt(type: IntType, value: bigint): boolean {
	return value >= intMin(type) && value <= intMax(type)
}

/** Reduce an arbitrary integer to the type's two's-complement range. */
export function wrapInt(type: IntType, value: bigint): bigint {
	return type.signed ? BigInt.asIntN(type.bits, value) : BigInt.asUintN(type.bits, value)
}

/** Types that may live in persistent state (as keys or values). */
export function isStorable(type: Type): boolean {
	return type.kind === 'int' || type.kind === 'bool' || type.kind === 'digest'
}

export function isKeyType(type: Type): boolean {
	return isStorable(type) || type.kind === 'string'
}
