/**
 * Dead-code elimination: pure instructions whose results nothing reads,
 * then phis nothing needs.
 */

import {
	instOperands,
	instResult,
	isPure,
	type SsaFunction,
	terminatorOperands,
	type ValueId,
} from '../ssa/ir.ts'
import { pruneDeadPhis } from '../ssa/phis.ts'

function useCounts(fn: SsaFunction): Map<ValueId, number> {
	const counts = new Map<ValueId, number>()
	const use = (v: ValueId): void => {
		counts.set(v, (counts.get(v) ?? 0) + 1)
	}
	for (const block of fn.blocks) {
		for (const phi of block.phis) for (const input of phi.incoming) use(input.value)
		for (const inst of block.insts) instOperands(inst).forEach(use)
		terminatorOperands(block.terminator).forEach(use)
	}
	return counts
}

/** Returns the number of instructions and phis removed. */
export function eliminateDeadCode(fn: SsaFunction): number {
	let removed = 0
	let changed = true
	while (changed) {
		changed = false
		const counts = useCounts(fn)
		for (const block of fn.blocks) {
			const kept = block.insts.filter((inst) => {
				const result = instResult(inst)
				return result === null || !isPure(inst) || (counts.get(result) ?? 0) > 0
			})
			if (kept.length !== block.insts.length) {
				removed += block.insts.length - kept.length
				block.insts = kept
				changed = true
			}
		}
		const phis = pruneDeadPhis(fn)
		if (phis > 0) {
			removed += phis
			changed = true
		}
	}
	return removed
}
