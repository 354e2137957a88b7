/**
 * Local slot assignment.
 *
 * Constants are rematerialized at each use and get no slot. A value used
 * once, as the last operand of the very next instruction (or of the block's
 * terminator), stays on the operand stack. Everything else is colored into
 * locals by interference; parameters keep locals 0..n-1.
 */

import type { Cfg } from '../ssa/cfg.ts'
import {
	type ConstValue,
	getBlock,
	instOperands,
	instResult,
	type SsaFunction,
	terminatorOperands,
	type ValueId,
	valueId,
} from '../ssa/ir.ts'
import { computeLiveness } from './liveness.ts'

export interface SlotAssignment {
	readonly slots: ReadonlyMap<ValueId, number>
	/** Locals holding values, parameters included */
	readonly slotCount: number
	readonly transient: ReadonlySet<ValueId>
	readonly constants: ReadonlyMap<ValueId, ConstValue>
	readonly uses: ReadonlyMap<ValueId, number>
}

function countUses(fn: SsaFunction): Map<ValueId, number> {
	const uses = new Map<ValueId, number>()
	const use = (v: ValueId): void => {
		uses.set(v, (uses.get(v) ?? 0) + 1)
	}
	for (const block of fn.blocks) {
		for (const phi of block.phis) for (const input of phi.incoming) use(input.value)
		for (const inst of block.insts) for (const v of instOperands(inst)) use(v)
		for (const v of terminatorOperands(block.terminator)) use(v)
	}
	return uses
}

function findTransients(
	fn: SsaFunction,
	uses: ReadonlyMap<ValueId, number>,
	constants: ReadonlyMap<ValueId, ConstValue>
): Set<ValueId> {
	const transient = new Set<ValueId>()
	for (const block of fn.blocks) {
		for (const [i, inst] of block.insts.entries()) {
			const result = instResult(inst)
			if (result === null || constants.has(result) || uses.get(result) !== 1) continue
			const next = block.insts[i + 1]
			const operands = next !== undefined ? instOperands(next) : terminatorOperands(block.terminator)
			if (operands[operands.length - 1] === result) transient.add(result)
		}
	}
	return transient
}

class InterferenceGraph {
	private readonly edges = new Map<ValueId, Set<ValueId>>()

	node(v: ValueId): Set<ValueId> {
		let set = this.edges.get(v)
		if (set === undefined) {
			set = new Set()
			this.edges.set(v, set)
		}
		return set
	}

	add(a: ValueId, b: ValueId): void {
		if (a === b) return
		this.node(a).add(b)
		this.node(b).add(a)
	}

	addAll(v: ValueId, live: Iterable<ValueId>): void {
		this.node(v)
		for (const other of live) this.add(v, other)
	}
}

export function assignSlots(fn: SsaFunction, cfg: Cfg): SlotAssignment {
	const constants = new Map<ValueId, ConstValue>()
	for (const block of fn.blocks) {
		for (const inst of block.insts) if (inst.kind === 'const') constants.set(inst.result, inst.value)
	}
	const uses = countUses(fn)
	const transient = findTransients(fn, uses, constants)
	const params = new Set(fn.params)
	const tracked = (v: ValueId): boolean =>
		params.has(v) || ((uses.get(v) ?? 0) > 0 && !constants.has(v) && !transient.has(v))

	const { liveIn, liveOut } = computeLiveness(fn, cfg, tracked)
	const graph = new InterferenceGraph()

	for (const id of cfg.order) {
		const block = getBlock(fn, id)
		const live = new Set(liveOut.get(id))
		for (const v of terminatorOperands(block.terminator)) if (tracked(v)) live.add(v)
		for (let i = block.insts.length - 1; i >= 0; i--) {
			const inst = block.insts[i]
			if (inst === undefined) continue
			const result = instResult(inst)
			if (result !== null && tracked(result)) {
				live.delete(result)
				graph.addAll(result, live)
			}
			for (const v of instOperands(inst)) if (tracked(v)) live.add(v)
		}
		// Phi results are written together on every incoming edge.
		const phis = block.phis.map((p) => p.result).filter(tracked)
		for (const result of phis) {
			graph.addAll(result, liveIn.get(id) ?? [])
			graph.addAll(result, phis)
		}
	}
	const entry = cfg.order[0]
	for (const param of fn.params) {
		graph.addAll(param, fn.params)
		if (entry !== undefined) graph.addAll(param, liveIn.get(entry) ?? [])
	}

	const slots = new Map<ValueId, number>()
	for (const [i, param] of fn.params.entries()) slots.set(param, i)
	let slotCount = fn.params.length

	const candidates = fn.values.map((_, i) => valueId(i)).filter(tracked)
	for (const v of candidates) {
		if (slots.has(v)) continue
		const taken = new Set<number>()
		for (const other of graph.node(v)) {
			const slot = slots.get(other)
			if (slot !== undefined) taken.add(slot)
		}
		let slot = 0
		while (taken.has(slot)) slot++
		slots.set(v, slot)
		slotCount = Math.max(slotCount, slot + 1)
	}

	return { constants, slotCount, slots, transient, uses }
}
