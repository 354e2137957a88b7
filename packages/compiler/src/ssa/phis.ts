/**
 * Phi cleanup shared by the builder and the optimizer.
 */

import {
	type Inst,
	instOperands,
	mapOperands,
	mapTerminatorOperands,
	type SsaFunction,
	terminatorOperands,
	type ValueId,
} from './ir.ts'

/** Rewrite every use of `from` to `to`, including phi inputs. */
export function replaceAllUses(fn: SsaFunction, from: ValueId, to: ValueId): void {
	substituteValues(fn, new Map([[from, to]]))
}

/**
 * Rewrite uses through a substitution map. Chains (`a -> b -> c`) resolve to
 * their final value.
 */
export function substituteValues(fn: SsaFunction, substitution: ReadonlyMap<ValueId, ValueId>): void {
	if (substitution.size === 0) return
	const map = (v: ValueId): ValueId => {
		let current = v
		for (let hops = 0; hops <= substitution.size; hops++) {
			const next = substitution.get(current)
			if (next === undefined) return current
			current = next
		}
		throw new Error(`cyclic value substitution at v${v} in ${fn.name}`)
	}
	for (const block of fn.blocks) {
		for (const phi of block.phis) {
			phi.incoming = phi.incoming.map((i) => ({ ...i, value: map(i.value) }))
		}
		block.insts = block.insts.map((inst): Inst => mapOperands(inst, map))
		block.terminator = mapTerminatorOperands(block.terminator, map)
	}
}

/**
 * Remove phis whose inputs, ignoring the phi itself, are all one value.
 * Loop-header phis for bindings the body never really changes end up here.
 */
export function removeTrivialPhis(fn: SsaFunction): number {
	let removed = 0
	let changed = true
	while (changed) {
		changed = false
		for (const block of fn.blocks) {
			for (const phi of block.phis) {
				const inputs = new Set(phi.incoming.map((i) => i.value).filter((v) => v !== phi.result))
				if (inputs.size !== 1) continue
				const [only] = inputs
				if (only === undefined) continue
				block.phis = block.phis.filter((p) => p !== phi)
				replaceAllUses(fn, phi.result, only)
				removed++
				changed = true
				break
			}
		}
	}
	return removed
}

/**
 * Remove phis no instruction or terminator needs, directly or through
 * other live phis.
 */
export function pruneDeadPhis(fn: SsaFunction): number {
	const phiInputs = new Map<ValueId, ValueId[]>()
	const live = new Set<ValueId>()
	const work: ValueId[] = []

	for (const block of fn.blocks) {
		for (const phi of block.phis) phiInputs.set(phi.result, phi.incoming.map((i) => i.value))
		for (const inst of block.insts) work.push(...instOperands(inst))
		work.push(...terminatorOperands(block.terminator))
	}

	while (work.length > 0) {
		const v = work.pop()
		if (v === undefined || live.has(v)) continue
		live.add(v)
		work.push(...(phiInputs.get(v) ?? []))
	}

	let removed = 0
	for (const block of fn.blocks) {
		const kept = block.phis.filter((phi) => live.has(phi.result))
		removed += block.phis.length - kept.length
		block.phis = kept
	}
	return removed
}
