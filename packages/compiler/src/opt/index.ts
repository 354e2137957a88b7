/**
 * SSA-to-SSA optimizer. Runs after domain analysis, so nothing it removes
 * can narrow a function's domain sets.
 */

import type { SsaModule } from '../ssa/ir.ts'
import { eliminateDeadCode } from './dce.ts'
import { foldConstants } from './fold.ts'
import { inlineCalls } from './inline.ts'

export { eliminateDeadCode } from './dce.ts'
export { foldConstants } from './fold.ts'
export { type InlineOptions, inlineCalls } from './inline.ts'

export interface OptimizeOptions {
	inline: boolean
	maxInlineInstructions: number
}

export interface OptimizeStats {
	inlined: number
	folded: number
	removed: number
}

export function optimizeModule(module: SsaModule, options: OptimizeOptions): OptimizeStats {
	const stats: OptimizeStats = { folded: 0, inlined: 0, removed: 0 }
	for (const fn of module.functions) {
		if (options.inline) stats.inlined += inlineCalls(module, fn, { maxInstructions: options.maxInlineInstructions })
		for (;;) {
			const folded = foldConstants(fn)
			const removed = eliminateDeadCode(fn)
			stats.folded += folded
			stats.removed += removed
			if (folded === 0 && removed === 0) break
		}
	}
	return stats
}
