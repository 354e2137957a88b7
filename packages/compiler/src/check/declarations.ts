/**
 * Unit-level declarations: structs, storage namespaces and function
 * signatures are collected before any body is resolved, so declaration
 * order in the source does not matter.
 */

import type { AstFunction, AstStorage, AstStruct, AstUnit } from '../front/ast.ts'
import type { HirFunction, HirParam } from '../hir/hir.ts'
import { alwaysExits, resolveBlock, resolveTypeRef } from './statements.ts'
import {
	declareBinding,
	type FnSignature,
	paramCapability,
	popScope,
	pushScope,
	ResolveFailure,
	type ResolverState,
} from './state.ts'
import { isKeyType, isStorable, type StructType, type Type, typeName, UNIT } from './types.ts'

/** Run a declaration step; a reported failure skips only that declaration. */
function attempt(step: () => void): void {
	try {
		step()
	} catch (error) {
		if (!(error instanceof ResolveFailure)) throw error
	}
}

// ============================================================================
// Structs
// ============================================================================

function collectStructs(state: ResolverState, decls: readonly AstStruct[]): void {
	const declared: [AstStruct, StructType][] = []
	for (const decl of decls) {
		if (state.structs.has(decl.name)) {
			state.context.emit('TERES008', decl.span, { name: decl.name })
			continue
		}
		const struct: StructType = { declaredCopy: decl.copy, fields: [], kind: 'struct', name: decl.name }
		state.structs.set(decl.name, struct)
		declared.push([decl, struct])
	}

	// Field types resolve once every struct name is known.
	for (const [decl, struct] of declared) {
		for (const field of decl.fields) {
			attempt(() => {
				if (struct.fields.some((f) => f.name === field.name)) {
					state.context.emit('TERES008', field.span, { name: field.name })
					return
				}
				struct.fields.push({ name: field.name, type: resolveTypeRef(state, field.type) })
			})
		}
	}
}

// ============================================================================
// Storage
// ============================================================================

function collectStorage(state: ResolverState, decls: readonly AstStorage[]): void {
	for (const decl of decls) {
		for (const field of decl.fields) {
			attempt(() => {
				if (state.storage.has(field.name)) {
					state.context.emit('TERES008', field.span, { name: field.name })
					return
				}
				const keyType = field.keyType !== null ? resolveTypeRef(state, field.keyType) : null
				const valueType = resolveTypeRef(state, field.valueType)
				if (keyType !== null && !isKeyType(keyType)) {
					state.context.emit('TERES015', field.span, { position: 'a storage key', type: typeName(keyType) })
					return
				}
				if (!isStorable(valueType)) {
					state.context.emit('TERES015', field.span, { position: 'a storage value', type: typeName(valueType) })
					return
				}
				state.storage.set(field.name, { keyType, name: field.name, span: field.span, valueType })
			})
		}
	}
}

// ============================================================================
// Functions
// ============================================================================

/** Public functions are called by the host with plain words. */
function isAbiType(type: Type): boolean {
	return type.kind === 'int' || type.kind === 'bool'
}

function collectSignature(state: ResolverState, decl: AstFunction): void {
	if (state.signatures.has(decl.name)) {
		state.context.emit('TERES008', decl.span, { name: decl.name })
		return
	}
	const params = decl.params.map((p) => ({ mode: p.mode, name: p.name, span: p.span, type: resolveTypeRef(state, p.type) }))
	const returnType = decl.returnType !== null ? resolveTypeRef(state, decl.returnType) : UNIT

	if (decl.pub) {
		for (const param of params) {
			if (!isAbiType(param.type)) {
				state.context.emit('TERES015', param.span, { position: 'a public parameter', type: typeName(param.type) })
			}
		}
		if (returnType.kind !== 'unit' && !isAbiType(returnType)) {
			state.context.emit('TERES015', decl.span, { position: 'a public return value', type: typeName(returnType) })
		}
	}

	state.signatures.set(decl.name, { name: decl.name, params, pub: decl.pub, returnType, span: decl.span })
}

function resolveFunction(state: ResolverState, decl: AstFunction, signature: FnSignature): HirFunction {
	state.currentFunction = signature
	pushScope(state)

	const params: HirParam[] = signature.params.map((p) => ({
		binding: declareBinding(state, {
			...paramCapability(p.mode, p.type),
			isParam: true,
			name: p.name,
			span: p.span,
			type: p.type,
		}),
		mode: p.mode,
	}))
	const body = resolveBlock(state, decl.body)

	popScope(state)
	state.currentFunction = null

	if (signature.returnType.kind !== 'unit' && !alwaysExits(body)) {
		state.context.emit('TERES014', decl.span, { name: decl.name, type: typeName(signature.returnType) })
	}

	return {
		annotations: decl.annotations,
		body,
		name: decl.name,
		params,
		pub: decl.pub,
		returnType: signature.returnType,
		span: decl.span,
	}
}

/**
 * Collect every declaration of the unit, then resolve each function body.
 */
export function resolveDeclarations(state: ResolverState, unit: AstUnit): HirFunction[] {
	const structs: AstStruct[] = []
	const storage: AstStorage[] = []
	const functions: AstFunction[] = []
	for (const item of unit.items) {
		if (item.kind === 'struct') structs.push(item)
		else if (item.kind === 'storage') storage.push(item)
		else functions.push(item)
	}

	collectStructs(state, structs)
	collectStorage(state, storage)
	for (const decl of functions) attempt(() => collectSignature(state, decl))

	const resolved: HirFunction[] = []
	for (const decl of functions) {
		const signature = state.signatures.get(decl.name)
		// Duplicates keep the first definition.
		if (signature === undefined || signature.span !== decl.span) continue
		resolved.push(resolveFunction(state, decl, signature))
	}
	return resolved
}
