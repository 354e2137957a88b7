/**
 * Conflict-domain analysis.
 *
 * 1. Local pass: every state access of a function becomes a domain; keys are
 *    resolved statically where possible and coarsened to the namespace
 *    wildcard otherwise.
 * 2. Aggregation: components of the call graph are processed callees first;
 *    a recursive component is iterated until its sets stop changing.
 * 3. Declared `#[reads]` / `#[writes]` sets replace the computed ones before
 *    they reach callers, and the computed sets are checked against them.
 */

import type { CompilationContext } from '../core/context.ts'
import type { SsaFunction, SsaModule } from '../ssa/ir.ts'
import { type FunctionAnnotations, interpretAnnotations, NO_ANNOTATIONS } from './annotations.ts'
import { isRecursive, moduleCallGraph, stronglyConnectedComponents } from './callgraph.ts'
import {
	type DomainEntry,
	type DomainKey,
	type DomainSet,
	EMPTY_DOMAIN_SET,
	entriesOverlap,
	formatDomain,
	isCovered,
	keyedDomain,
	normalizeEntries,
	scalarDomain,
	setsEqual,
	toEntry,
	unionSets,
	wildcardDomain,
} from './domain.ts'
import { DomainKeyTable } from './hash.ts'
import { KeyResolver } from './keys.ts'

export type DynamicKeyPolicy = 'coarsen' | 'reject'

export interface DomainOptions {
	/** What to do with a key that cannot be resolved statically */
	dynamicKeyPolicy: DynamicKeyPolicy
	/** Largest number of distinct keys a phi may resolve to */
	maxEnumeratedKeys: number
}

export const DEFAULT_DOMAIN_OPTIONS: DomainOptions = {
	dynamicKeyPolicy: 'coarsen',
	maxEnumeratedKeys: 8,
}

export interface FunctionDomains {
	readonly name: string
	/** Aggregate sets after declared overrides; what callers and the manifest see */
	readonly effective: DomainSet
	/** Aggregate sets computed from the body and callees */
	readonly computed: DomainSet
	/** Domains the body itself touches */
	readonly local: DomainSet
	/** Whether any domain set was declared */
	readonly declared: boolean
	readonly annotations: FunctionAnnotations
}

export interface DomainAnalysis {
	readonly functions: ReadonlyMap<string, FunctionDomains>
	/** Functions with a rejected key or a malformed annotation */
	readonly failed: ReadonlySet<string>
	/** Aggregation passes over all components */
	readonly passes: number
	readonly components: number
	readonly table: DomainKeyTable
	/** Human form of every hash seen, for diagnostics and tooling */
	readonly labels: ReadonlyMap<string, string>
}

interface AnalyzerState {
	readonly context: CompilationContext
	readonly module: SsaModule
	readonly options: DomainOptions
	readonly table: DomainKeyTable
	readonly labels: Map<string, string>
	readonly failed: Set<string>
}

function entryOf(state: AnalyzerState, domain: DomainKey): DomainEntry {
	const entry = toEntry(state.module.unit, domain, state.table)
	state.labels.set(entry.hash, formatDomain(domain))
	return entry
}

// ============================================================================
// Local pass
// ============================================================================

function localDomains(state: AnalyzerState, fn: SsaFunction): DomainSet {
	const { context, options } = state
	const resolver = new KeyResolver(fn, options.maxEnumeratedKeys)
	const reads: DomainEntry[] = []
	const writes: DomainEntry[] = []

	for (const block of fn.blocks) {
		for (const inst of block.insts) {
			if (inst.kind !== 'state_read' && inst.kind !== 'state_write' && inst.kind !== 'state_exists') continue
			const into = inst.kind === 'state_write' ? writes : reads
			if (inst.key === null) {
				into.push(entryOf(state, scalarDomain(inst.namespace)))
				continue
			}
			const keys = resolver.keys(inst.key)
			if (keys !== null) {
				for (const key of keys) into.push(entryOf(state, keyedDomain(inst.namespace, key)))
				continue
			}

			const wildcard = wildcardDomain(inst.namespace)
			if (options.dynamicKeyPolicy === 'reject') {
				context.emit('TEDOM001', inst.span, { namespace: inst.namespace }, { functionName: fn.name })
				state.failed.add(fn.name)
				continue
			}
			context.emit(
				'TEDOM050',
				inst.span,
				{ domain: formatDomain(wildcard), namespace: inst.namespace },
				{ functionName: fn.name }
			)
			into.push(entryOf(state, wildcard))
		}
	}
	return { reads: normalizeEntries(reads), writes: normalizeEntries(writes) }
}

// ============================================================================
// Overrides
// ============================================================================

function applyOverrides(state: AnalyzerState, computed: DomainSet, annotations: FunctionAnnotations): DomainSet {
	if (annotations.pure) return EMPTY_DOMAIN_SET
	const declared = (domains: readonly DomainKey[] | null, fallback: readonly DomainEntry[]): DomainEntry[] =>
		domains === null ? [...fallback] : normalizeEntries(domains.map((d) => entryOf(state, d)))
	return {
		reads: declared(annotations.reads, computed.reads),
		writes: declared(annotations.writes, computed.writes),
	}
}

/** Warn about computed accesses the declaration misses and note unused declarations. */
function checkDeclared(state: AnalyzerState, fn: SsaFunction, result: FunctionDomains): void {
	const { annotations, computed, effective } = result
	if (annotations.pure) return
	const report = (code: 'TEDOM051' | 'TEDOM052', access: 'reads' | 'writes', entry: DomainEntry): void => {
		state.context.emit(
			code,
			fn.span,
			{ access, domain: state.labels.get(entry.hash) ?? entry.hash, function: fn.name },
			{ functionName: fn.name }
		)
	}

	if (annotations.reads !== null) {
		const cover = [...effective.reads, ...effective.writes]
		for (const entry of computed.reads) if (!isCovered(entry, cover)) report('TEDOM051', 'reads', entry)
		for (const entry of effective.reads) {
			if (!computed.reads.some((c) => entriesOverlap(entry, c))) report('TEDOM052', 'reads', entry)
		}
	}
	if (annotations.writes !== null) {
		for (const entry of computed.writes) if (!isCovered(entry, effective.writes)) report('TEDOM051', 'writes', entry)
		for (const entry of effective.writes) {
			if (!computed.writes.some((c) => entriesOverlap(entry, c))) report('TEDOM052', 'writes', entry)
		}
	}
}

// ============================================================================
// Aggregation
// ============================================================================

export function analyzeDomains(
	context: CompilationContext,
	module: SsaModule,
	options: DomainOptions = DEFAULT_DOMAIN_OPTIONS
): DomainAnalysis {
	const state: AnalyzerState = {
		context,
		failed: new Set(),
		labels: new Map(),
		module,
		options,
		table: new DomainKeyTable(),
	}
	const graph = moduleCallGraph(module)
	const components = stronglyConnectedComponents(graph)
	const annotations: FunctionAnnotations[] = []
	const locals: DomainSet[] = []
	const results: (FunctionDomains | undefined)[] = []

	for (const fn of module.functions) {
		const interpreted = interpretAnnotations(context, fn.name, fn.annotations, module.storage)
		if (interpreted === null) state.failed.add(fn.name)
		const ann = interpreted ?? NO_ANNOTATIONS
		annotations.push(ann)
		locals.push(ann.pure ? EMPTY_DOMAIN_SET : localDomains(state, fn))
	}

	const step = (i: number): boolean => {
		const fn = module.functions[i]
		const ann = annotations[i]
		const local = locals[i]
		if (fn === undefined || ann === undefined || local === undefined) return false
		const callees = (graph.edges[i] ?? []).map((c) => results[c]?.effective ?? EMPTY_DOMAIN_SET)
		const computed = ann.pure ? EMPTY_DOMAIN_SET : unionSets(local, ...callees)
		const effective = applyOverrides(state, computed, ann)
		const previous = results[i]
		results[i] = {
			annotations: ann,
			computed,
			declared: ann.reads !== null || ann.writes !== null,
			effective,
			local,
			name: fn.name,
		}
		return previous === undefined || !setsEqual(previous.effective, effective) || !setsEqual(previous.computed, computed)
	}

	let passes = 0
	for (const component of components) {
		if (!isRecursive(graph, component)) {
			for (const member of component) step(member)
			passes++
			continue
		}
		let changed = true
		while (changed) {
			changed = false
			passes++
			for (const member of component) if (step(member)) changed = true
		}
	}

	const functions = new Map<string, FunctionDomains>()
	for (const [i, fn] of module.functions.entries()) {
		const result = results[i]
		if (result === undefined) continue
		checkDeclared(state, fn, result)
		functions.set(fn.name, result)
	}

	return {
		components: components.length,
		failed: state.failed,
		functions,
		labels: state.labels,
		passes,
		table: state.table,
	}
}
