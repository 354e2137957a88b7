/**
 * Inlining of small straight-line callees.
 *
 * A callee qualifies when it is one block ending in `return`, has no more
 * than `maxInstructions` instructions and does not call itself. Its
 * instructions are cloned into the caller with fresh values, parameters
 * mapped to the call's arguments.
 */

import {
	findSsaFunction,
	type Inst,
	instResult,
	mapOperands,
	type SsaFunction,
	type SsaModule,
	type ValueId,
	valueId,
} from '../ssa/ir.ts'
import { substituteValues } from '../ssa/phis.ts'

export interface InlineOptions {
	maxInstructions: number
}

function inlineable(callee: SsaFunction, maxInstructions: number): boolean {
	const [only] = callee.blocks
	if (only === undefined || callee.blocks.length !== 1) return false
	if (only.terminator.kind !== 'return' || only.phis.length > 0) return false
	if (only.insts.length > maxInstructions) return false
	return !only.insts.some((i) => i.kind === 'call' && i.callee === callee.name)
}

/**
 * Inline qualifying calls in `fn`. The callee's result is substituted for
 * the call's result. Returns the number of calls inlined.
 */
export function inlineCalls(module: SsaModule, fn: SsaFunction, options: InlineOptions): number {
	let inlined = 0
	const substitution = new Map<ValueId, ValueId>()
	for (const block of fn.blocks) {
		const insts: Inst[] = []
		for (const inst of block.insts) {
			const callee = inst.kind === 'call' ? findSsaFunction(module, inst.callee) : undefined
			if (inst.kind !== 'call' || callee === undefined || callee === fn || !inlineable(callee, options.maxInstructions)) {
				insts.push(inst)
				continue
			}
			const [body] = callee.blocks
			if (body === undefined || body.terminator.kind !== 'return') {
				insts.push(inst)
				continue
			}

			const mapping = new Map<ValueId, ValueId>()
			for (const [i, param] of callee.params.entries()) {
				const arg = inst.args[i]
				if (arg !== undefined) mapping.set(param, arg)
			}
			const map = (v: ValueId): ValueId => {
				const mapped = mapping.get(v)
				if (mapped === undefined) throw new Error(`v${v} of ${callee.name} has no mapping`)
				return mapped
			}
			for (const calleeInst of body.insts) {
				const result = instResult(calleeInst)
				let cloned = mapOperands(calleeInst, map)
				if (result !== null) {
					const fresh = valueId(fn.values.length)
					const info = callee.values[result]
					if (info === undefined) throw new Error(`v${result} of ${callee.name} has no type`)
					fn.values.push(info)
					mapping.set(result, fresh)
					cloned = withResult(cloned, fresh)
				}
				insts.push(cloned)
			}

			const returned = body.terminator.value
			if (inst.result !== null && returned !== null) substitution.set(inst.result, map(returned))
			inlined++
		}
		block.insts = insts
	}
	substituteValues(fn, substitution)
	return inlined
}

function withResult(inst: Inst, result: ValueId): Inst {
	switch (inst.kind) {
		case 'field_set':
		case 'state_write':
		case 'emit_log':
			return inst
		default:
			return { ...inst, result }
	}
}
