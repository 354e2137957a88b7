/**
 * Control-flow graph helpers: predecessor and successor maps, reverse
 * post-order, unreachable-block removal and critical-edge splitting.
 */

import {
	type BasicBlock,
	type BlockId,
	blockId,
	ENTRY_BLOCK,
	getBlock,
	mapSuccessors,
	retarget,
	type SsaFunction,
	successors,
} from './ir.ts'

export interface Cfg {
	readonly preds: ReadonlyMap<BlockId, readonly BlockId[]>
	readonly succs: ReadonlyMap<BlockId, readonly BlockId[]>
	/** Blocks reachable from the entry, in reverse post-order */
	readonly order: readonly BlockId[]
}

export function buildCfg(fn: SsaFunction): Cfg {
	const preds = new Map<BlockId, BlockId[]>()
	const succs = new Map<BlockId, BlockId[]>()
	for (const block of fn.blocks) {
		preds.set(block.id, [])
		succs.set(block.id, [])
	}
	for (const block of fn.blocks) {
		const targets = successors(block.terminator)
		succs.set(block.id, targets)
		for (const target of targets) preds.get(target)?.push(block.id)
	}

	// Iterative DFS keeps deep CFGs off the call stack.
	const visited = new Set<BlockId>()
	const postorder: BlockId[] = []
	const stack: { id: BlockId; next: number }[] = []
	if (fn.blocks.length > 0) {
		visited.add(ENTRY_BLOCK)
		stack.push({ id: ENTRY_BLOCK, next: 0 })
	}
	while (stack.length > 0) {
		const frame = stack[stack.length - 1]
		if (frame === undefined) break
		const targets = succs.get(frame.id) ?? []
		const target = targets[frame.next]
		if (target === undefined) {
			postorder.push(frame.id)
			stack.pop()
			continue
		}
		frame.next++
		if (!visited.has(target)) {
			visited.add(target)
			stack.push({ id: target, next: 0 })
		}
	}

	return { order: postorder.reverse(), preds, succs }
}

export function predecessorsOf(cfg: Cfg, id: BlockId): readonly BlockId[] {
	return cfg.preds.get(id) ?? []
}

/**
 * Drop blocks not reachable from the entry, renumbering the survivors
 * densely and dropping phi inputs from removed predecessors.
 * Returns true when anything was removed.
 */
export function removeUnreachable(fn: SsaFunction): boolean {
	const reachable = new Set(buildCfg(fn).order)
	if (reachable.size === fn.blocks.length) return false

	const kept = fn.blocks.filter((b) => reachable.has(b.id))
	const renumber = new Map<BlockId, BlockId>()
	for (const [i, block] of kept.entries()) renumber.set(block.id, blockId(i))
	const map = (id: BlockId): BlockId => {
		const mapped = renumber.get(id)
		if (mapped === undefined) throw new Error(`edge into removed block ${id}`)
		return mapped
	}

	fn.blocks = kept.map((block): BasicBlock => {
		return {
			id: map(block.id),
			insts: block.insts,
			phis: block.phis.map((phi) => ({
				incoming: phi.incoming.filter((i) => reachable.has(i.block)).map((i) => ({ ...i, block: map(i.block) })),
				result: phi.result,
			})),
			terminator: mapSuccessors(block.terminator, map),
		}
	})
	return true
}

/**
 * Split every edge whose source has several successors and whose target
 * has several predecessors, so phi copies can be placed on the edge.
 * Returns the number of edges split.
 */
export function splitCriticalEdges(fn: SsaFunction): number {
	const cfg = buildCfg(fn)
	let split = 0
	for (const id of cfg.order) {
		const block = getBlock(fn, id)
		const targets = successors(block.terminator)
		if (targets.length < 2) continue
		for (const target of targets) {
			if (predecessorsOf(cfg, target).length < 2) continue
			const edge = blockId(fn.blocks.length)
			fn.blocks.push({
				id: edge,
				insts: [],
				phis: [],
				terminator: { kind: 'br', span: block.terminator.span, target },
			})
			block.terminator = retarget(block.terminator, target, edge)
			for (const phi of getBlock(fn, target).phis) {
				phi.incoming = phi.incoming.map((i) => (i.block === id ? { ...i, block: edge } : i))
			}
			split++
		}
	}
	return split
}
