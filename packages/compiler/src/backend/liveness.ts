/**
 * Block-level liveness over the values that need a local.
 *
 * Live-in sets exclude a block's own phi results; a phi input counts as a
 * use at the end of the predecessor it arrives from.
 */

import type { Cfg } from '../ssa/cfg.ts'
import {
	type BlockId,
	getBlock,
	instOperands,
	instResult,
	type SsaFunction,
	terminatorOperands,
	type ValueId,
} from '../ssa/ir.ts'

export interface Liveness {
	readonly liveIn: ReadonlyMap<BlockId, ReadonlySet<ValueId>>
	readonly liveOut: ReadonlyMap<BlockId, ReadonlySet<ValueId>>
}

/** Values flowing from `pred` into the phis of `succ`. */
export function phiInputs(fn: SsaFunction, pred: BlockId, succ: BlockId): ValueId[] {
	const inputs: ValueId[] = []
	for (const phi of getBlock(fn, succ).phis) {
		for (const input of phi.incoming) if (input.block === pred) inputs.push(input.value)
	}
	return inputs
}

export function computeLiveness(fn: SsaFunction, cfg: Cfg, tracked: (v: ValueId) => boolean): Liveness {
	const liveIn = new Map<BlockId, Set<ValueId>>()
	const liveOut = new Map<BlockId, Set<ValueId>>()
	for (const id of cfg.order) {
		liveIn.set(id, new Set())
		liveOut.set(id, new Set())
	}

	const postorder = [...cfg.order].reverse()
	let changed = true
	while (changed) {
		changed = false
		for (const id of postorder) {
			const block = getBlock(fn, id)
			const out = new Set<ValueId>()
			for (const succ of cfg.succs.get(id) ?? []) {
				for (const v of liveIn.get(succ) ?? []) out.add(v)
				for (const v of phiInputs(fn, id, succ)) if (tracked(v)) out.add(v)
			}

			const live = new Set(out)
			for (const v of terminatorOperands(block.terminator)) if (tracked(v)) live.add(v)
			for (let i = block.insts.length - 1; i >= 0; i--) {
				const inst = block.insts[i]
				if (inst === undefined) continue
				const result = instResult(inst)
				if (result !== null) live.delete(result)
				for (const v of instOperands(inst)) if (tracked(v)) live.add(v)
			}
			for (const phi of block.phis) live.delete(phi.result)

			if (out.size !== liveOut.get(id)?.size || live.size !== liveIn.get(id)?.size) changed = true
			liveOut.set(id, out)
			liveIn.set(id, live)
		}
	}
	return { liveIn, liveOut }
}
