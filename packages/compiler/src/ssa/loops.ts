/**
 * Natural loops from back edges: an edge whose target dominates its source.
 */

import { buildCfg, type Cfg, predecessorsOf } from './cfg.ts'
import { computeDominators } from './dominance.ts'
import type { BlockId, SsaFunction } from './ir.ts'

export interface Loop {
	readonly header: BlockId
	readonly body: ReadonlySet<BlockId>
}

/** One loop per header; back edges sharing a header are merged. */
export function findLoops(fn: SsaFunction, cfg: Cfg = buildCfg(fn)): Loop[] {
	const dom = computeDominators(cfg)
	const bodies = new Map<BlockId, Set<BlockId>>()

	for (const source of cfg.order) {
		for (const header of cfg.succs.get(source) ?? []) {
			if (!dom.dominates(header, source)) continue
			let body = bodies.get(header)
			if (body === undefined) {
				body = new Set([header])
				bodies.set(header, body)
			}
			const work = [source]
			while (work.length > 0) {
				const id = work.pop()
				if (id === undefined || body.has(id)) continue
				body.add(id)
				work.push(...predecessorsOf(cfg, id))
			}
		}
	}

	return [...bodies].map(([header, body]) => ({ body, header }))
}

/** Number of loops containing each block. Blocks outside every loop are absent. */
export function loopDepths(fn: SsaFunction, cfg: Cfg = buildCfg(fn)): Map<BlockId, number> {
	const depths = new Map<BlockId, number>()
	for (const loop of findLoops(fn, cfg)) {
		for (const id of loop.body) depths.set(id, (depths.get(id) ?? 0) + 1)
	}
	return depths
}
