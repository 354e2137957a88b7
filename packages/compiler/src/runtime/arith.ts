/**
 * Reference integer semantics on canonical values. The interpreter runs
 * them, the optimizer folds with them, and lowered code must agree.
 */

import { fitsInt, type IntType, intMax, intMin, wrapInt } from '../check/types.ts'
import type { ArithMode, ArithOp, BitOp, CmpOp } from '../ssa/ir.ts'
import { TrapCode } from '../host/status.ts'

export type ArithResult = { readonly ok: true; readonly value: bigint } | { readonly ok: false; readonly trap: TrapCode }

function ok(value: bigint): ArithResult {
	return { ok: true, value }
}

function trap(code: TrapCode): ArithResult {
	return { ok: false, trap: code }
}

/** Exact result; division truncates toward zero. */
function exact(op: ArithOp, a: bigint, b: bigint): bigint {
	switch (op) {
		case 'add':
			return a + b
		case 'sub':
			return a - b
		case 'mul':
			return a * b
		case 'div':
			return a / b
		case 'rem':
			return a % b
	}
}

export function evalArith(
	type: IntType,
	op: ArithOp,
	mode: ArithMode,
	a: bigint,
	b: bigint,
	fallback: bigint | null = null
): ArithResult {
	const divides = op === 'div' || op === 'rem'
	if (divides && b === 0n) {
		if (mode === 'fallback') return ok(fallback ?? 0n)
		return trap(TrapCode.DivideByZero)
	}
	const r = exact(op, a, b)
	if (fitsInt(type, r)) return ok(r)

	switch (mode) {
		case 'checked':
			return trap(TrapCode.Overflow)
		case 'wrapping':
			return ok(wrapInt(type, r))
		case 'saturating':
			return ok(r > intMax(type) ? intMax(type) : intMin(type))
		case 'fallback':
			return ok(fallback ?? 0n)
	}
}

/** Shift amounts are taken modulo the bit width. */
export function evalBitwise(type: IntType, op: BitOp, a: bigint, b: bigint): bigint {
	switch (op) {
		case 'and':
			return a & b
		case 'or':
			return a | b
		case 'xor':
			return a ^ b
		case 'shl':
		case 'shr': {
			const amount = BigInt.asUintN(64, b) % BigInt(type.bits)
			return wrapInt(type, op === 'shl' ? a << amount : a >> amount)
		}
	}
}

export function evalCmp(op: CmpOp, a: bigint, b: bigint): boolean {
	switch (op) {
		case 'eq':
			return a === b
		case 'ne':
			return a !== b
		case 'lt':
			return a < b
		case 'le':
			return a <= b
		case 'gt':
			return a > b
		case 'ge':
			return a >= b
	}
}
