/**
 * Call graph over named functions, arena-indexed, with Tarjan's strongly
 * connected components.
 */

import type { SsaFunction, SsaModule } from '../ssa/ir.ts'

export interface CallGraph {
	readonly names: readonly string[]
	readonly index: ReadonlyMap<string, number>
	/** Callees of each node, deduplicated; unknown callees are left out */
	readonly edges: readonly (readonly number[])[]
}

export function buildCallGraph(nodes: readonly { name: string; callees: Iterable<string> }[]): CallGraph {
	const names = nodes.map((n) => n.name)
	const index = new Map<string, number>()
	for (const [i, name] of names.entries()) index.set(name, i)
	const edges = nodes.map((n) => {
		const targets = new Set<number>()
		for (const callee of n.callees) {
			const target = index.get(callee)
			if (target !== undefined) targets.add(target)
		}
		return [...targets]
	})
	return { edges, index, names }
}

export function functionCallees(fn: SsaFunction): string[] {
	return fn.blocks.flatMap((b) => b.insts.flatMap((i) => (i.kind === 'call' ? [i.callee] : [])))
}

export function moduleCallGraph(module: SsaModule): CallGraph {
	return buildCallGraph(module.functions.map((fn) => ({ callees: functionCallees(fn), name: fn.name })))
}

/**
 * Strongly connected components, callees before callers (reverse
 * topological order of the condensed graph).
 */
export function stronglyConnectedComponents(graph: CallGraph): number[][] {
	const count = graph.names.length
	const order = new Array<number>(count).fill(-1)
	const low = new Array<number>(count).fill(0)
	const onStack = new Array<boolean>(count).fill(false)
	const stack: number[] = []
	const components: number[][] = []
	let counter = 0

	// Explicit work stack: (node, next edge index).
	for (let root = 0; root < count; root++) {
		if (order[root] !== -1) continue
		const work: [number, number][] = [[root, 0]]
		order[root] = low[root] = counter++
		stack.push(root)
		onStack[root] = true

		while (work.length > 0) {
			const frame = work[work.length - 1]
			if (frame === undefined) break
			const [node, edge] = frame
			const targets = graph.edges[node] ?? []
			const target = targets[edge]
			if (target !== undefined) {
				frame[1]++
				if (order[target] === -1) {
					order[target] = low[target] = counter++
					stack.push(target)
					onStack[target] = true
					work.push([target, 0])
				} else if (onStack[target]) {
					low[node] = Math.min(low[node] ?? 0, order[target] ?? 0)
				}
				continue
			}

			work.pop()
			const parent = work[work.length - 1]
			if (parent !== undefined) low[parent[0]] = Math.min(low[parent[0]] ?? 0, low[node] ?? 0)
			if (low[node] === order[node]) {
				const component: number[] = []
				for (;;) {
					const member = stack.pop()
					if (member === undefined) break
					onStack[member] = false
					component.push(member)
					if (member === node) break
				}
				components.push(component.sort((a, b) => a - b))
			}
		}
	}
	return components
}

/** Whether a component calls itself (a cycle, or one self-recursive node). */
export function isRecursive(graph: CallGraph, component: readonly number[]): boolean {
	if (component.length > 1) return true
	const [only] = component
	return only !== undefined && (graph.edges[only] ?? []).includes(only)
}

/** Callers of each node. */
export function invertEdges(graph: CallGraph): number[][] {
	const callers: number[][] = graph.names.map(() => [])
	for (const [caller, callees] of graph.edges.entries()) {
		for (const callee of callees) callers[callee]?.push(caller)
	}
	return callers
}

/**
 * Everything that transitively calls one of `roots`, excluding the roots,
 * as pairs of caller and the callee that taints it.
 */
export function transitiveCallers(graph: CallGraph, roots: Iterable<string>): Map<string, string> {
	const callers = invertEdges(graph)
	const tainted = new Map<string, string>()
	const seen = new Set<number>()
	const work: number[] = []
	for (const root of roots) {
		const i = graph.index.get(root)
		if (i !== undefined && !seen.has(i)) {
			seen.add(i)
			work.push(i)
		}
	}
	while (work.length > 0) {
		const callee = work.pop()
		if (callee === undefined) break
		for (const caller of callers[callee] ?? []) {
			if (seen.has(caller)) continue
			seen.add(caller)
			tainted.set(graph.names[caller] ?? '', graph.names[callee] ?? '')
			work.push(caller)
		}
	}
	return tainted
}
