/**
 * Structural checks over SSA functions. Used after construction and after
 * every optimizer pass in tests; a failure is a compiler bug, not a
 * language error.
 */

import { typeEquals } from '../check/types.ts'
import { buildCfg, predecessorsOf } from './cfg.ts'
import { computeDominators } from './dominance.ts'
import {
	type BlockId,
	ENTRY_BLOCK,
	instOperands,
	instResult,
	type SsaFunction,
	successors,
	terminatorOperands,
	type ValueId,
	valueType,
} from './ir.ts'

interface Definition {
	readonly block: BlockId
	/** Position within the block; phis sit at -1, parameters in the entry at -2 */
	readonly index: number
}

export function verifyFunction(fn: SsaFunction): string[] {
	const problems: string[] = []
	const cfg = buildCfg(fn)
	const reachable = new Set(cfg.order)
	const dominators = computeDominators(cfg)
	const defs = new Map<ValueId, Definition>()

	const define = (v: ValueId, def: Definition): void => {
		if (defs.has(v)) problems.push(`v${v} defined twice`)
		if (fn.values[v] === undefined) problems.push(`v${v} has no type`)
		defs.set(v, def)
	}

	for (const [i, block] of fn.blocks.entries()) {
		if (block.id !== i) problems.push(`block at index ${i} has id ${block.id}`)
		if (!reachable.has(block.id)) problems.push(`block${block.id} is unreachable`)
		for (const target of successors(block.terminator)) {
			if (fn.blocks[target] === undefined) problems.push(`block${block.id} branches to missing block${target}`)
		}
	}

	for (const param of fn.params) define(param, { block: ENTRY_BLOCK, index: -2 })
	for (const block of fn.blocks) {
		for (const phi of block.phis) define(phi.result, { block: block.id, index: -1 })
		for (const [index, inst] of block.insts.entries()) {
			const result = instResult(inst)
			if (result !== null) define(result, { block: block.id, index })
		}
	}

	const dominatesUse = (v: ValueId, block: BlockId, index: number): boolean => {
		const def = defs.get(v)
		if (def === undefined) return false
		if (def.block === block) return def.index < index
		return dominators.dominates(def.block, block)
	}

	for (const block of fn.blocks) {
		const preds = predecessorsOf(cfg, block.id)
		for (const phi of block.phis) {
			if (phi.incoming.length !== preds.length) {
				problems.push(`phi v${phi.result} in block${block.id} has ${phi.incoming.length} inputs for ${preds.length} predecessors`)
			}
			const type = valueType(fn, phi.result)
			for (const input of phi.incoming) {
				if (!preds.includes(input.block)) {
					problems.push(`phi v${phi.result} has an input from block${input.block}, which is not a predecessor`)
				}
				if (!defs.has(input.value)) {
					problems.push(`phi v${phi.result} reads undefined v${input.value}`)
					continue
				}
				if (!typeEquals(valueType(fn, input.value), type)) {
					problems.push(`phi v${phi.result} mixes operand types`)
				}
				// The input must be available at the end of its predecessor.
				if (!dominatesUse(input.value, input.block, Number.MAX_SAFE_INTEGER)) {
					problems.push(`phi v${phi.result} input v${input.value} does not dominate block${input.block}`)
				}
			}
		}

		for (const [index, inst] of block.insts.entries()) {
			for (const operand of instOperands(inst)) {
				if (!dominatesUse(operand, block.id, index)) {
					problems.push(`v${operand} used by ${inst.kind} in block${block.id} before its definition`)
				}
			}
		}
		for (const operand of terminatorOperands(block.terminator)) {
			if (!dominatesUse(operand, block.id, Number.MAX_SAFE_INTEGER)) {
				problems.push(`v${operand} used by ${block.terminator.kind} in block${block.id} before its definition`)
			}
		}
	}

	return problems
}

/** Throw when any function of the module is malformed. */
export function assertValid(fns: readonly SsaFunction[]): void {
	for (const fn of fns) {
		const problems = verifyFunction(fn)
		if (problems.length > 0) throw new Error(`invalid SSA in ${fn.name}:\n  ${problems.join('\n  ')}`)
	}
}
