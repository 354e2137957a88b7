/**
 * Constant folding and branch simplification.
 *
 * Only operations that cannot trap are folded: a checked add that would
 * overflow stays in place so it still aborts at run time.
 */

import { isInt } from '../check/types.ts'
import { evalArith, evalBitwise, evalCmp } from '../runtime/arith.ts'
import { removeUnreachable } from '../ssa/cfg.ts'
import {
	type ConstValue,
	getBlock,
	type Inst,
	type SsaFunction,
	type ValueId,
	valueType,
} from '../ssa/ir.ts'
import { removeTrivialPhis } from '../ssa/phis.ts'

function foldInst(fn: SsaFunction, inst: Inst, consts: ReadonlyMap<ValueId, ConstValue>): ConstValue | null {
	const int = (v: ValueId): bigint | null => {
		const c = consts.get(v)
		return c?.kind === 'int' ? c.value : null
	}
	const bool = (v: ValueId): boolean | null => {
		const c = consts.get(v)
		return c?.kind === 'bool' ? c.value : null
	}

	switch (inst.kind) {
		case 'arith': {
			const type = valueType(fn, inst.result)
			const a = int(inst.lhs)
			const b = int(inst.rhs)
			const fallback = inst.fallback !== null ? int(inst.fallback) : null
			if (!isInt(type) || a === null || b === null) return null
			if (inst.fallback !== null && fallback === null) return null
			const result = evalArith(type, inst.op, inst.mode, a, b, fallback)
			return result.ok ? { kind: 'int', value: result.value } : null
		}
		case 'bitwise': {
			const type = valueType(fn, inst.result)
			const a = int(inst.lhs)
			const b = int(inst.rhs)
			if (!isInt(type) || a === null || b === null) return null
			return { kind: 'int', value: evalBitwise(type, inst.op, a, b) }
		}
		case 'cmp': {
			const a = int(inst.lhs)
			const b = int(inst.rhs)
			if (a !== null && b !== null) return { kind: 'bool', value: evalCmp(inst.op, a, b) }
			const x = bool(inst.lhs)
			const y = bool(inst.rhs)
			if (x === null || y === null || (inst.op !== 'eq' && inst.op !== 'ne')) return null
			return { kind: 'bool', value: inst.op === 'eq' ? x === y : x !== y }
		}
		case 'not': {
			const a = bool(inst.operand)
			return a !== null ? { kind: 'bool', value: !a } : null
		}
		default:
			return null
	}
}

/**
 * Fold constants and turn branches on constants into jumps.
 * Returns the number of changes made.
 */
export function foldConstants(fn: SsaFunction): number {
	let changes = 0
	const consts = new Map<ValueId, ConstValue>()
	let changed = true
	while (changed) {
		changed = false
		for (const block of fn.blocks) {
			block.insts = block.insts.map((inst): Inst => {
				if (inst.kind === 'const') {
					consts.set(inst.result, inst.value)
					return inst
				}
				const folded = foldInst(fn, inst, consts)
				if (folded === null || inst.kind === 'field_set' || inst.kind === 'state_write' || inst.kind === 'emit_log') {
					return inst
				}
				changed = true
				changes++
				consts.set(inst.result, folded)
				return { kind: 'const', result: inst.result, span: inst.span, value: folded }
			})
		}
	}

	for (const block of fn.blocks) {
		const term = block.terminator
		if (term.kind !== 'cond_br') continue
		const cond = consts.get(term.cond)
		if (cond?.kind !== 'bool') continue
		const target = cond.value ? term.then : term.else
		const dropped = cond.value ? term.else : term.then
		block.terminator = { kind: 'br', span: term.span, target }
		if (dropped !== target) {
			const lost = getBlock(fn, dropped)
			for (const phi of lost.phis) phi.incoming = phi.incoming.filter((i) => i.block !== block.id)
		}
		changes++
	}

	if (changes > 0) {
		removeUnreachable(fn)
		removeTrivialPhis(fn)
	}
	return changes
}
