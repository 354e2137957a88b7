/**
 * Lowering of integer operations with their overflow semantics.
 *
 * Integers are held sign- or zero-extended to 64 bits, so results of
 * narrower types are computed exactly in 64 bits and range-checked. 64-bit
 * operations detect overflow from the operands and the wrapped result.
 * Division by zero is left to the machine's own trap except under
 * `fallback`, which substitutes a safe divisor and selects the fallback.
 */

import { type IntType, intMax, intMin, type Type } from '../check/types.ts'
import { TrapCode } from '../host/status.ts'
import type { ArithMode, ArithOp, BitOp, CmpOp } from '../ssa/ir.ts'
import type { CodeBuffer } from './emitter.ts'
import type { BinOp } from './isa.ts'

const MINUS_ONE = -1n

function signedOp(type: IntType, signed: BinOp, unsigned: BinOp): BinOp {
	return type.signed ? signed : unsigned
}

function rawOp(type: IntType, op: ArithOp): BinOp {
	switch (op) {
		case 'add':
		case 'sub':
		case 'mul':
			return op
		case 'div':
			return signedOp(type, 'div_s', 'div_u')
		case 'rem':
			return signedOp(type, 'rem_s', 'rem_u')
	}
}

/** Reduce the word on top of the stack to the type's canonical extension. */
export function normalize(e: CodeBuffer, type: Type): void {
	if (type.kind === 'bool') {
		e.constant(0n)
		e.bin('ne')
		return
	}
	if (type.kind !== 'int' || type.bits === 64) return
	if (!type.signed) {
		e.constant(intMax(type))
		e.bin('and')
		return
	}
	const shift = BigInt(64 - type.bits)
	e.constant(shift)
	e.bin('shl')
	e.constant(shift)
	e.bin('shr_s')
}

/** Pushes 1 when the exact 64-bit result in `r` is outside a narrow type. */
function rangeFlag(e: CodeBuffer, type: IntType, r: number): void {
	if (!type.signed) {
		e.get(r)
		e.constant(intMax(type))
		e.bin('gt_u')
		return
	}
	e.get(r)
	e.constant(intMin(type))
	e.bin('lt_s')
	e.get(r)
	e.constant(intMax(type))
	e.bin('gt_s')
	e.bin('or')
}

/** Pushes 1 when a 64-bit add, sub or mul wrapped. */
function wrapFlag(e: CodeBuffer, type: IntType, op: 'add' | 'sub' | 'mul', a: number, b: number, r: number): void {
	if (!type.signed) {
		switch (op) {
			case 'add':
				e.get(r)
				e.get(a)
				e.bin('lt_u')
				return
			case 'sub':
				e.get(a)
				e.get(b)
				e.bin('lt_u')
				return
			case 'mul':
				// a != 0 && r / a != b
				e.get(a)
				e.constant(0n)
				e.bin('ne')
				e.get(r)
				e.constant(1n)
				e.get(a)
				e.get(a)
				e.eqz()
				e.select()
				e.bin('div_u')
				e.get(b)
				e.bin('ne')
				e.bin('and')
				return
		}
	}
	switch (op) {
		case 'add':
			// Operands share a sign the result lacks.
			e.get(a)
			e.get(r)
			e.bin('xor')
			e.get(b)
			e.get(r)
			e.bin('xor')
			e.bin('and')
			e.constant(0n)
			e.bin('lt_s')
			return
		case 'sub':
			e.get(a)
			e.get(b)
			e.bin('xor')
			e.get(a)
			e.get(r)
			e.bin('xor')
			e.bin('and')
			e.constant(0n)
			e.bin('lt_s')
			return
		case 'mul':
			// (a == -1 && b == MIN) || (a != 0 && a != -1 && r / a != b)
			e.get(a)
			e.constant(MINUS_ONE)
			e.bin('eq')
			e.get(b)
			e.constant(intMin(type))
			e.bin('eq')
			e.bin('and')
			e.get(a)
			e.constant(0n)
			e.bin('ne')
			e.get(a)
			e.constant(MINUS_ONE)
			e.bin('ne')
			e.bin('and')
			e.get(r)
			e.constant(1n)
			e.get(a)
			e.get(a)
			e.eqz()
			e.get(a)
			e.constant(MINUS_ONE)
			e.bin('eq')
			e.bin('or')
			e.select()
			e.bin('div_s')
			e.get(b)
			e.bin('ne')
			e.bin('and')
			e.bin('or')
			return
	}
}

function overflowFlag(e: CodeBuffer, type: IntType, op: 'add' | 'sub' | 'mul', a: number, b: number, r: number): void {
	if (type.bits < 64) rangeFlag(e, type, r)
	else wrapFlag(e, type, op, a, b, r)
}

/** Pushes 1 for the one signed quotient that overflows: MIN / -1. */
function minOverMinusOne(e: CodeBuffer, type: IntType, a: number, b: number): void {
	e.get(a)
	e.constant(intMin(type))
	e.bin('eq')
	e.get(b)
	e.constant(MINUS_ONE)
	e.bin('eq')
	e.bin('and')
}

/** Divide `a` by `b`, or by 1 where `flag` is set. */
function guardedDivide(e: CodeBuffer, op: BinOp, a: number, b: number, flag: number): void {
	e.get(a)
	e.constant(1n)
	e.get(b)
	e.get(flag)
	e.select()
	e.bin(op)
}

function computeRaw(e: CodeBuffer, op: BinOp, a: number, b: number): number {
	e.get(a)
	e.get(b)
	e.bin(op)
	return e.spill()
}

/**
 * Stack in: `a b` (and the fallback value under `fallback` mode).
 * Stack out: the result.
 */
export function lowerArith(e: CodeBuffer, type: IntType, op: ArithOp, mode: ArithMode): void {
	const fb = mode === 'fallback' ? e.spill() : -1
	const b = e.spill()
	const a = e.spill()
	const raw = rawOp(type, op)

	if (op === 'div' || op === 'rem') {
		lowerDivision(e, type, op, mode, a, b, fb)
		return
	}

	const r = computeRaw(e, raw, a, b)
	switch (mode) {
		case 'checked':
			overflowFlag(e, type, op, a, b, r)
			e.trapIf(TrapCode.Overflow)
			e.get(r)
			return
		case 'wrapping':
			e.get(r)
			normalize(e, type)
			return
		case 'fallback':
			e.get(fb)
			e.get(r)
			overflowFlag(e, type, op, a, b, r)
			e.select()
			return
		case 'saturating':
			lowerSaturating(e, type, op, a, b, r)
			return
	}
}

function lowerSaturating(e: CodeBuffer, type: IntType, op: 'add' | 'sub' | 'mul', a: number, b: number, r: number): void {
	if (!type.signed) {
		if (op === 'sub') {
			e.constant(0n)
			e.get(r)
			e.get(a)
			e.get(b)
			e.bin('lt_u')
			e.select()
			return
		}
		e.constant(intMax(type))
		e.get(r)
		overflowFlag(e, type, op, a, b, r)
		e.select()
		return
	}

	if (type.bits < 64) {
		e.constant(intMax(type))
		e.constant(intMin(type))
		e.get(r)
		e.get(r)
		e.constant(intMin(type))
		e.bin('lt_s')
		e.select()
		e.get(r)
		e.constant(intMax(type))
		e.bin('gt_s')
		e.select()
		return
	}

	// The bound an overflow saturates to follows the sign of the exact result.
	const [negative, positive] = op === 'sub' ? [intMax(type), intMin(type)] : [intMin(type), intMax(type)]
	e.constant(negative)
	e.constant(positive)
	if (op === 'mul') {
		e.get(a)
		e.get(b)
		e.bin('xor')
	} else {
		e.get(b)
	}
	e.constant(0n)
	e.bin('lt_s')
	e.select()
	e.get(r)
	overflowFlag(e, type, op, a, b, r)
	e.select()
}

function lowerDivision(
	e: CodeBuffer,
	type: IntType,
	op: 'div' | 'rem',
	mode: ArithMode,
	a: number,
	b: number,
	fb: number
): void {
	const raw = rawOp(type, op)

	if (mode === 'fallback') {
		e.get(b)
		e.eqz()
		if (type.signed && op === 'div') {
			minOverMinusOne(e, type, a, b)
			e.bin('or')
		}
		const flag = e.spill()
		e.get(fb)
		guardedDivide(e, raw, a, b, flag)
		e.get(flag)
		e.select()
		return
	}

	// Remainders and unsigned quotients cannot overflow.
	if (op === 'rem' || !type.signed) {
		e.get(a)
		e.get(b)
		e.bin(raw)
		return
	}

	if (mode === 'checked') {
		// The 64-bit machine division traps on MIN / -1 by itself.
		const r = computeRaw(e, raw, a, b)
		if (type.bits < 64) {
			rangeFlag(e, type, r)
			e.trapIf(TrapCode.Overflow)
		}
		e.get(r)
		return
	}

	minOverMinusOne(e, type, a, b)
	const flag = e.spill()
	e.constant(mode === 'saturating' ? intMax(type) : intMin(type))
	guardedDivide(e, raw, a, b, flag)
	e.get(flag)
	e.select()
}

/** Stack in: `a b`. Shift amounts are reduced modulo the width. */
export function lowerBitwise(e: CodeBuffer, type: IntType, op: BitOp): void {
	switch (op) {
		case 'and':
		case 'or':
		case 'xor':
			e.bin(op)
			return
		case 'shl':
			e.constant(BigInt(type.bits - 1))
			e.bin('and')
			e.bin('shl')
			normalize(e, type)
			return
		case 'shr':
			e.constant(BigInt(type.bits - 1))
			e.bin('and')
			e.bin(signedOp(type, 'shr_s', 'shr_u'))
			return
	}
}

const DIGEST_WORDS = 4

/** Stack in: `a b` of the operand type. Stack out: 0 or 1. */
export function lowerCmp(e: CodeBuffer, type: Type, op: CmpOp): void {
	if (type.kind === 'digest') {
		const b = e.spill()
		const a = e.spill()
		for (let word = 0; word < DIGEST_WORDS; word++) {
			e.get(a)
			e.load(word * 8)
			e.get(b)
			e.load(word * 8)
			e.bin('eq')
			if (word > 0) e.bin('and')
		}
		if (op === 'ne') e.eqz()
		return
	}
	const int = type.kind === 'int' ? type : null
	switch (op) {
		case 'eq':
		case 'ne':
			e.bin(op)
			return
		case 'lt':
			e.bin(int?.signed === true ? 'lt_s' : 'lt_u')
			return
		case 'le':
			e.bin(int?.signed === true ? 'le_s' : 'le_u')
			return
		case 'gt':
			e.bin(int?.signed === true ? 'gt_s' : 'gt_u')
			return
		case 'ge':
			e.bin(int?.signed === true ? 'ge_s' : 'ge_u')
			return
	}
}
