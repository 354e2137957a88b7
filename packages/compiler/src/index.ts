/**
 * Tessera compiler public API.
 *
 * Pipeline: parse, resolve to HIR, check ownership, build SSA, analyze
 * conflict domains, optimize, lower to bytecode, emit WebAssembly and the
 * metadata manifest.
 *
 * Syntax and resolution errors stop the unit. Later failures are scoped to
 * one function: it is left out of the artifacts together with every
 * function that calls it, and the rest of the unit still compiles.
 */

import { type BackendOptions, DEFAULT_BACKEND_OPTIONS, lowerModule } from './backend/index.ts'
import type { BytecodeModule } from './backend/isa.ts'
import { resolve } from './check/index.ts'
import { emitWasm, type WasmResult } from './codegen/wasm.ts'
import { CompilationContext, type Diagnostic, DiagnosticSeverity } from './core/context.ts'
import { CompileError } from './core/errors.ts'
import { NO_SPAN } from './core/span.ts'
import {
	analyzeDomains,
	DEFAULT_DOMAIN_OPTIONS,
	type DomainAnalysis,
	type DynamicKeyPolicy,
} from './domains/analyzer.ts'
import { buildCallGraph, functionCallees, transitiveCallers } from './domains/callgraph.ts'
import { parse } from './front/parser.ts'
import type { HirUnit } from './hir/hir.ts'
import { buildManifest, type Manifest } from './metadata/manifest.ts'
import { type OptimizeStats, optimizeModule } from './opt/index.ts'
import { checkOwnership } from './ownership/index.ts'
import { buildModule } from './ssa/builder.ts'
import type { SsaModule } from './ssa/ir.ts'
import { assertValid } from './ssa/verify.ts'

export { DEFAULT_BACKEND_OPTIONS, lowerModule } from './backend/index.ts'
export {
	type BinOp,
	type BytecodeFunction,
	type BytecodeModule,
	disassemble,
	disassembleModule,
	findBytecodeFunction,
	type MemoryLayout,
	type Op,
} from './backend/isa.ts'
export { OP_GAS, opGas } from './backend/gas.ts'
export { resolve } from './check/index.ts'
export * from './check/types.ts'
export { emitWasm, type WasmOptions, type WasmResult } from './codegen/wasm.ts'
export { CompilationContext, type Diagnostic, DiagnosticSeverity } from './core/context.ts'
export { CompileError } from './core/errors.ts'
export type { Span } from './core/span.ts'
export * from './domains/index.ts'
export { parse } from './front/parser.ts'
export type { HirFunction, HirUnit } from './hir/hir.ts'
export {
	CAPABILITY_IDS,
	type CapabilityDef,
	type CapabilityId,
	getCapability,
	HOST_CAPABILITIES,
} from './host/capabilities.ts'
export type { Host, HostReadResult, JournaledHost } from './host/host.ts'
export { type HostContext, type LogEntry, MemoryHost, type MemoryHostOptions } from './host/memory-host.ts'
export { HostStatus, statusName, TrapCode, trapName } from './host/status.ts'
export { demangle, mangle } from './metadata/mangle.ts'
export {
	buildManifest,
	type DeclaredDomains,
	type Manifest,
	ManifestError,
	type ManifestFunction,
	parseManifest,
	serializeManifest,
	type VerifyResult,
	verifyDeclaredDomains,
} from './metadata/manifest.ts'
export { optimizeModule } from './opt/index.ts'
export { checkOwnership, type OwnershipViolation } from './ownership/index.ts'
export type { ExecutionResult, Outcome } from './runtime/outcome.ts'
export { formatValue, type RuntimeValue, type StructValue, valuesEqual } from './runtime/values.ts'
export { execute, type VmOptions } from './runtime/vm.ts'
export { buildModule } from './ssa/builder.ts'
export { interpret, type InterpretOptions } from './ssa/interpreter.ts'
export type { SsaFunction, SsaModule } from './ssa/ir.ts'
export { printFunction, printModule } from './ssa/printer.ts'
export { verifyFunction } from './ssa/verify.ts'

/**
 * Options for the compile function.
 */
export interface CompileOptions {
	/** Path to the source file (for error messages) */
	filename?: string
	/** Run the SSA optimizer and binaryen's passes */
	optimize?: boolean
	/** Inline small callees when optimizing */
	inline?: boolean
	maxInlineInstructions?: number
	dynamicKeyPolicy?: DynamicKeyPolicy
	maxEnumeratedKeys?: number
	maxLocals?: number
	maxValueBytes?: number
	memoryPages?: number
	loopGasFactor?: number
	/** Produce a WebAssembly module alongside the bytecode */
	emitWasm?: boolean
}

export interface CompileResult {
	readonly context: CompilationContext
	readonly hir: HirUnit
	/** SSA of every function that passed the ownership checker, after optimization */
	readonly ssa: SsaModule
	readonly domains: DomainAnalysis
	readonly optimizer: OptimizeStats | null
	/** Null when the unit as a whole does not fit the target */
	readonly bytecode: BytecodeModule | null
	readonly wasm: WasmResult | null
	readonly manifest: Manifest | null
	/** Functions left out of the artifacts, with the diagnostic code that excluded them */
	readonly excluded: ReadonlyMap<string, string>
	readonly gas: ReadonlyMap<string, number>
	readonly warnings: readonly Diagnostic[]
}

/**
 * Get the formatted error message from the first diagnostic.
 */
function getFormattedError(context: CompilationContext, fallback: string): string {
	const errors = context.getErrors()
	if (errors.length === 0) return fallback
	return errors.map((e) => context.formatDiagnostic(e)).join('\n\n')
}

/**
 * Code of the first error reported against a function.
 */
function failureCode(context: CompilationContext, name: string): string {
	const error = context.getErrors().find((d) => d.functionName === name)
	return error?.def.code ?? 'TEGEN050'
}

/**
 * Drop excluded functions from the module, and with them everything that
 * calls them, reporting each caller once.
 */
function excludeCallers(context: CompilationContext, module: SsaModule, excluded: Map<string, string>): SsaModule {
	const graph = buildCallGraph([
		...module.functions.map((fn) => ({ callees: functionCallees(fn), name: fn.name })),
		...[...excluded.keys()]
			.filter((name) => !module.functions.some((fn) => fn.name === name))
			.map((name) => ({ callees: [], name })),
	])
	for (const [caller, callee] of transitiveCallers(graph, excluded.keys())) {
		if (excluded.has(caller)) continue
		const fn = module.functions.find((f) => f.name === caller)
		context.emit('TEGEN050', fn?.span ?? NO_SPAN, { callee, function: caller }, { functionName: caller })
		excluded.set(caller, 'TEGEN050')
	}
	return { ...module, functions: module.functions.filter((fn) => !excluded.has(fn.name)) }
}

/**
 * Compile Tessera source to bytecode, WebAssembly and a metadata manifest.
 *
 * @throws {CompileError} On syntax or resolution errors
 */
export function compile(source: string, options: CompileOptions = {}): CompileResult {
	const context = new CompilationContext(source, options.filename)
	const optimize = options.optimize ?? true

	const ast = parse(context)
	if (ast === null) {
		throw new CompileError(getFormattedError(context, 'Parse failed'))
	}

	const hir = resolve(context, ast)
	if (context.hasErrors()) {
		throw new CompileError(getFormattedError(context, 'Resolution failed'))
	}

	const excluded = new Map<string, string>()
	for (const [name, violation] of checkOwnership(context, hir)) excluded.set(name, violation.code)

	let ssa = buildModule(
		hir,
		hir.functions.filter((fn) => !excluded.has(fn.name))
	)
	assertValid(ssa.functions)
	ssa = excludeCallers(context, ssa, excluded)

	const domains = analyzeDomains(context, ssa, {
		dynamicKeyPolicy: options.dynamicKeyPolicy ?? DEFAULT_DOMAIN_OPTIONS.dynamicKeyPolicy,
		maxEnumeratedKeys: options.maxEnumeratedKeys ?? DEFAULT_DOMAIN_OPTIONS.maxEnumeratedKeys,
	})
	for (const name of domains.failed) excluded.set(name, failureCode(context, name))
	ssa = excludeCallers(context, ssa, excluded)

	let optimizer: OptimizeStats | null = null
	if (optimize) {
		optimizer = optimizeModule(ssa, {
			inline: options.inline ?? true,
			maxInlineInstructions: options.maxInlineInstructions ?? 24,
		})
		assertValid(ssa.functions)
	}

	const backendOptions: BackendOptions = {
		loopGasFactor: options.loopGasFactor ?? DEFAULT_BACKEND_OPTIONS.loopGasFactor,
		maxLocals: options.maxLocals ?? DEFAULT_BACKEND_OPTIONS.maxLocals,
		maxValueBytes: options.maxValueBytes ?? DEFAULT_BACKEND_OPTIONS.maxValueBytes,
		memoryPages: options.memoryPages ?? DEFAULT_BACKEND_OPTIONS.memoryPages,
	}
	const backend = lowerModule(context, ssa, backendOptions)
	for (const name of backend.failed) if (!excluded.has(name)) excluded.set(name, failureCode(context, name))

	const bytecode = backend.module
	if (bytecode !== null && !bytecode.functions.some((fn) => fn.exportName !== null)) {
		context.emit('TEGEN051', NO_SPAN)
	}

	const wasm = bytecode !== null && options.emitWasm !== false ? emitWasm(bytecode, { optimize }) : null
	const manifest = bytecode !== null ? buildManifest(bytecode, domains, backend.gas) : null

	return {
		bytecode,
		context,
		domains,
		excluded,
		gas: backend.gas,
		hir,
		manifest,
		optimizer,
		ssa,
		wasm,
		warnings: context.getDiagnostics().filter((d) => d.def.severity === DiagnosticSeverity.Warning),
	}
}
