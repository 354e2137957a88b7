/**
 * Shared state for the resolver.
 *
 * Resolution walks the AST once per function; scopes are a stack of maps
 * from source names to binding ids.
 */

import type { CompilationContext } from '../core/context.ts'
import type { DiagnosticArgs, DiagnosticCode } from '../core/diagnostics.ts'
import type { Span } from '../core/span.ts'
import type { ParamMode } from '../front/ast.ts'
import {
	type Binding,
	type BindingId,
	bindingId,
	Capability,
	type StorageNamespace,
} from '../hir/hir.ts'
import { isStruct, type StructType, type Type } from './types.ts'

export interface ParamSignature {
	readonly name: string
	readonly mode: ParamMode
	readonly type: Type
	readonly span: Span
}

export interface FnSignature {
	readonly name: string
	readonly pub: boolean
	readonly params: readonly ParamSignature[]
	readonly returnType: Type
	readonly span: Span
}

export interface ResolverState {
	readonly context: CompilationContext
	readonly unitName: string
	readonly structs: Map<string, StructType>
	readonly storage: Map<string, StorageNamespace>
	readonly signatures: Map<string, FnSignature>
	/** Arena indexed by BindingId */
	readonly bindings: Binding[]
	readonly scopes: Map<string, BindingId>[]
	currentFunction: FnSignature | null
}

/**
 * Raised after a diagnostic has been emitted, to abandon the current
 * statement. Caught at statement and declaration boundaries.
 */
export class ResolveFailure extends Error {
	constructor(readonly code: DiagnosticCode) {
		super(code)
		this.name = 'ResolveFailure'
	}
}

export function createResolverState(context: CompilationContext, unitName: string): ResolverState {
	return {
		bindings: [],
		context,
		currentFunction: null,
		scopes: [],
		signatures: new Map(),
		storage: new Map(),
		structs: new Map(),
		unitName,
	}
}

export function fail(state: ResolverState, code: DiagnosticCode, span: Span, args?: DiagnosticArgs): never {
	state.context.emit(code, span, args)
	throw new ResolveFailure(code)
}

export function pushScope(state: ResolverState): void {
	state.scopes.push(new Map())
}

export function popScope(state: ResolverState): void {
	state.scopes.pop()
}

export function lookupBinding(state: ResolverState, name: string): Binding | undefined {
	for (let i = state.scopes.length - 1; i >= 0; i--) {
		const id = state.scopes[i]?.get(name)
		if (id !== undefined) return state.bindings[id]
	}
	return undefined
}

export interface BindingSpec {
	readonly name: string
	readonly type: Type
	readonly mutable: boolean
	readonly capability: Capability
	readonly isParam: boolean
	readonly span: Span
}

/** Declare a binding in the innermost scope. Later declarations shadow. */
export function declareBinding(state: ResolverState, spec: BindingSpec): Binding {
	const binding: Binding = { ...spec, id: bindingId(state.bindings.length) }
	state.bindings.push(binding)
	const scope = state.scopes[state.scopes.length - 1]
	if (scope === undefined) throw new Error('declareBinding called outside any scope')
	scope.set(spec.name, binding.id)
	return binding
}

/**
 * Capability and mutability of a parameter. For structs `ref` and `mut` are
 * borrows of the caller's value; for scalars they only control whether the
 * callee may reassign its own copy.
 */
export function paramCapability(mode: ParamMode, type: Type): { capability: Capability; mutable: boolean } {
	if (isStruct(type)) {
		if (mode === 'ref') return { capability: Capability.Shared, mutable: false }
		if (mode === 'mut') return { capability: Capability.Exclusive, mutable: false }
		return { capability: Capability.Owned, mutable: false }
	}
	if (mode === 'ref') return { capability: Capability.Shared, mutable: false }
	return { capability: Capability.Owned, mutable: mode === 'mut' }
}
