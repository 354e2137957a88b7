/**
 * Backend driver: lowers every function of an SSA module to bytecode, lays
 * out static data, enforces the target's limits and estimates gas.
 *
 * A function over a limit is reported and left out, and so is everything
 * that calls it. Static data larger than memory fails the whole module.
 */

import { aggregateSize, typeName } from '../check/types.ts'
import type { CompilationContext } from '../core/context.ts'
import { NO_SPAN } from '../core/span.ts'
import { moduleCallGraph, transitiveCallers } from '../domains/callgraph.ts'
import { CAPABILITY_IDS, type CapabilityId } from '../host/capabilities.ts'
import { mangle } from '../metadata/mangle.ts'
import type { SsaFunction, SsaModule } from '../ssa/ir.ts'
import { estimateGas } from './gas.ts'
import { type BytecodeFunction, type BytecodeModule, PAGE_BYTES } from './isa.ts'
import { alignWord, DATA_OFFSET, DataLayout } from './layout.ts'
import { lowerFunction } from './lower.ts'

export interface BackendOptions {
	/** Locals per function, parameters and scratch included */
	maxLocals: number
	/** Bytes of the largest aggregate value */
	maxValueBytes: number
	memoryPages: number
	/** Gas multiplier per level of loop nesting in static estimates */
	loopGasFactor: number
}

export const DEFAULT_BACKEND_OPTIONS: BackendOptions = {
	loopGasFactor: 10,
	maxLocals: 50_000,
	maxValueBytes: 4096,
	memoryPages: 2,
}

export interface BackendResult {
	/** Null when the module as a whole does not fit the target */
	readonly module: BytecodeModule | null
	/** Functions left out, with the callee that excluded callers */
	readonly failed: ReadonlySet<string>
	readonly gas: ReadonlyMap<string, number>
}

function checkValueSizes(context: CompilationContext, fn: SsaFunction, limit: number): boolean {
	const reported = new Set<string>()
	for (const value of fn.values) {
		const size = aggregateSize(value.type)
		const name = typeName(value.type)
		if (size <= limit || reported.has(name)) continue
		reported.add(name)
		context.emit('TEGEN002', value.span, { limit, size, type: name }, { functionName: fn.name })
	}
	return reported.size === 0
}

function usedCapabilities(functions: readonly BytecodeFunction[]): CapabilityId[] {
	const used = new Set<CapabilityId>()
	for (const fn of functions) for (const op of fn.code) if (op.op === 'host') used.add(op.capability)
	return CAPABILITY_IDS.filter((id) => used.has(id))
}

export function lowerModule(
	context: CompilationContext,
	ssa: SsaModule,
	options: BackendOptions = DEFAULT_BACKEND_OPTIONS
): BackendResult {
	const layout = new DataLayout()
	const lowered = new Map<string, BytecodeFunction>()
	const failed = new Set<string>()

	for (const fn of ssa.functions) {
		if (!checkValueSizes(context, fn, options.maxValueBytes)) {
			failed.add(fn.name)
			continue
		}
		const bytecode = lowerFunction(ssa, fn, layout, fn.pub ? mangle(ssa.unit, fn.name) : null)
		if (bytecode.locals > options.maxLocals) {
			context.emit(
				'TEGEN001',
				fn.span,
				{ count: bytecode.locals, function: fn.name, limit: options.maxLocals },
				{ functionName: fn.name }
			)
			failed.add(fn.name)
			continue
		}
		lowered.set(fn.name, bytecode)
	}

	for (const [caller, callee] of transitiveCallers(moduleCallGraph(ssa), failed)) {
		const fn = ssa.functions.find((f) => f.name === caller)
		context.emit('TEGEN050', fn?.span ?? NO_SPAN, { callee, function: caller }, { functionName: caller })
		failed.add(caller)
		lowered.delete(caller)
	}

	const functions = ssa.functions.flatMap((fn) => {
		const bytecode = lowered.get(fn.name)
		return bytecode !== undefined ? [bytecode] : []
	})
	const memoryBytes = options.memoryPages * PAGE_BYTES
	const heapBase = alignWord(layout.end)
	if (heapBase > memoryBytes) {
		context.emit('TEGEN003', NO_SPAN, { limit: memoryBytes, size: heapBase })
		return { failed, gas: new Map(), module: null }
	}

	const module: BytecodeModule = {
		functions,
		imports: usedCapabilities(functions),
		memory: { data: layout.bytes(), dataOffset: DATA_OFFSET, heapBase, pages: options.memoryPages },
		unit: ssa.unit,
	}
	return { failed, gas: estimateGas(module, options.loopGasFactor), module }
}

export type { BytecodeFunction, BytecodeModule, MemoryLayout, Op } from './isa.ts'
export { disassemble, disassembleModule, findBytecodeFunction } from './isa.ts'
