/**
 * Gas schedule and static per-function estimates.
 *
 * The VM charges `opGas` for every op it executes. The static estimate
 * charges each op once, scaled by `loopFactor` per enclosing loop, and adds
 * the estimate of every callee at the call site. Calls back into the
 * caller's own recursive component add nothing.
 */

import { buildCallGraph, stronglyConnectedComponents } from '../domains/callgraph.ts'
import { getCapability } from '../host/capabilities.ts'
import type { BytecodeFunction, BytecodeModule, Op, OpName } from './isa.ts'

export const OP_GAS: Record<OpName, number> = {
	add: 1,
	alloc: 3,
	and: 1,
	br: 1,
	br_if: 1,
	call: 5,
	const: 1,
	div_s: 3,
	div_u: 3,
	drop: 1,
	eq: 1,
	eqz: 1,
	ge_s: 1,
	ge_u: 1,
	gt_s: 1,
	gt_u: 1,
	host: 1,
	label: 0,
	le_s: 1,
	le_u: 1,
	load: 2,
	'local.get': 1,
	'local.set': 1,
	lt_s: 1,
	lt_u: 1,
	mul: 3,
	ne: 1,
	or: 1,
	rem_s: 3,
	rem_u: 3,
	return: 1,
	select: 1,
	shl: 1,
	shr_s: 1,
	shr_u: 1,
	store: 2,
	sub: 1,
	trap_if: 1,
	unreachable: 0,
	xor: 1,
}

/** Cost of executing `op` once; host calls add the capability's charge. */
export function opGas(op: Op): number {
	if (op.op === 'host') return OP_GAS.host + getCapability(op.capability).gas
	return OP_GAS[op.op]
}

function callees(fn: BytecodeFunction): string[] {
	return fn.code.flatMap((op) => (op.op === 'call' ? [op.callee] : []))
}

/** Estimate of one function, given estimates of everything it calls. */
function estimateFunction(
	fn: BytecodeFunction,
	loopFactor: number,
	calleeGas: (name: string) => number
): number {
	let total = 0
	let weight = 1
	for (const op of fn.code) {
		if (op.op === 'label') {
			weight = loopFactor ** (fn.loopDepth[op.id] ?? 0)
			continue
		}
		total += opGas(op) * weight
		if (op.op === 'call') total += calleeGas(op.callee) * weight
	}
	return total
}

export function estimateGas(module: BytecodeModule, loopFactor: number): Map<string, number> {
	const graph = buildCallGraph(module.functions.map((fn) => ({ callees: callees(fn), name: fn.name })))
	const estimates = new Map<string, number>()

	for (const component of stronglyConnectedComponents(graph)) {
		const members = new Set(component.map((i) => graph.names[i]))
		for (const i of component) {
			const fn = module.functions[i]
			if (fn === undefined) continue
			const gas = estimateFunction(fn, loopFactor, (name) =>
				members.has(name) ? 0 : (estimates.get(name) ?? 0)
			)
			estimates.set(fn.name, gas)
		}
	}
	return estimates
}
