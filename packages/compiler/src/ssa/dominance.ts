/**
 * Immediate dominators by the Cooper-Harvey-Kennedy iterative algorithm.
 */

import type { Cfg } from './cfg.ts'
import type { BlockId } from './ir.ts'

export interface DominatorTree {
	readonly idom: ReadonlyMap<BlockId, BlockId>
	/** Whether `a` dominates `b` (reflexive) */
	dominates(a: BlockId, b: BlockId): boolean
}

export function computeDominators(cfg: Cfg): DominatorTree {
	const { order, preds } = cfg
	const idom = new Map<BlockId, BlockId>()
	const entry = order[0]
	if (entry === undefined) return { dominates: () => false, idom }

	const rpoIndex = new Map<BlockId, number>()
	for (const [i, id] of order.entries()) rpoIndex.set(id, i)
	const indexOf = (id: BlockId): number => rpoIndex.get(id) ?? -1

	idom.set(entry, entry)

	// Walk both fingers up the tree until they meet.
	const intersect = (a: BlockId, b: BlockId): BlockId => {
		let x = a
		let y = b
		while (x !== y) {
			while (indexOf(x) > indexOf(y)) x = idom.get(x) ?? entry
			while (indexOf(y) > indexOf(x)) y = idom.get(y) ?? entry
		}
		return x
	}

	let changed = true
	while (changed) {
		changed = false
		for (const id of order.slice(1)) {
			let next: BlockId | null = null
			for (const pred of preds.get(id) ?? []) {
				if (!idom.has(pred)) continue
				next = next === null ? pred : intersect(pred, next)
			}
			if (next !== null && idom.get(id) !== next) {
				idom.set(id, next)
				changed = true
			}
		}
	}

	return {
		dominates(a: BlockId, b: BlockId): boolean {
			if (!idom.has(b)) return false
			let cursor = b
			for (;;) {
				if (cursor === a) return true
				const parent = idom.get(cursor)
				if (parent === undefined || parent === cursor) return false
				cursor = parent
			}
		},
		idom,
	}
}
