/**
 * Statement resolution. A failing statement is dropped after its diagnostic
 * so the rest of the block is still checked.
 */

import type { Span } from '../core/span.ts'
import type { AstBlock, AstExpr, AstStmt, AstTypeRef } from '../front/ast.ts'
import { AccessKind, Capability, type HirBlock, type HirExpr, type HirPlace, type HirStmt } from '../hir/hir.ts'
import { expectType, isWordLike, lookupNamespace, resolveExpr, resolveStorageKey } from './expressions.ts'
import {
	declareBinding,
	fail,
	lookupBinding,
	popScope,
	pushScope,
	ResolveFailure,
	type ResolverState,
} from './state.ts'
import { BOOL, BUILTIN_TYPES, isStruct, type Type, typeName, UNIT } from './types.ts'

export function resolveTypeRef(state: ResolverState, ref: AstTypeRef): Type {
	const type = BUILTIN_TYPES.get(ref.name) ?? state.structs.get(ref.name)
	if (type === undefined) fail(state, 'TERES002', ref.span, { name: ref.name })
	return type
}

function currentReturnType(state: ResolverState): Type {
	return state.currentFunction?.returnType ?? UNIT
}

// ============================================================================
// Assignment
// ============================================================================

function resolvePlace(state: ResolverState, target: AstExpr, span: Span): HirPlace {
	const names: string[] = []
	let cursor = target
	while (cursor.kind === 'field') {
		names.unshift(cursor.name)
		cursor = cursor.base
	}
	if (cursor.kind !== 'name') fail(state, 'TERES009', span)

	const binding = lookupBinding(state, cursor.name)
	if (binding === undefined) fail(state, 'TERES001', cursor.span, { name: cursor.name })
	if (names.length === 0 && binding.capability === Capability.Exclusive) {
		// A `mut` struct parameter refers to the caller's value; only its fields can change.
		fail(state, 'TERES009', span)
	}

	const path: number[] = []
	let type: Type = binding.type
	for (const name of names) {
		if (!isStruct(type)) fail(state, 'TERES006', span, { field: name, type: typeName(type) })
		const index = type.fields.findIndex((f) => f.name === name)
		const field = type.fields[index]
		if (field === undefined) fail(state, 'TERES006', span, { field: name, type: type.name })
		path.push(index)
		type = field.type
	}

	return {
		path,
		root: {
			access: AccessKind.Copy,
			binding: binding.id,
			kind: 'use',
			name: binding.name,
			span: cursor.span,
			type: binding.type,
		},
		span,
		type,
	}
}

function resolveAssign(state: ResolverState, stmt: Extract<AstStmt, { kind: 'assign' }>): HirStmt {
	const { span, target } = stmt

	if (target.kind === 'storage') {
		const ns = lookupNamespace(state, target.namespace, target.span)
		if (ns.keyType !== null) {
			fail(state, 'TERES013', target.span, { detail: 'is keyed; index it with a key', name: ns.name })
		}
		const value = expectType(state, resolveExpr(state, stmt.value, ns.valueType), ns.valueType)
		return { key: null, kind: 'storage_write', namespace: ns.name, span, value }
	}

	if (target.kind === 'index' && target.base.kind === 'storage') {
		const ns = lookupNamespace(state, target.base.namespace, target.base.span)
		const key = resolveStorageKey(state, ns, target.index, target.span)
		const value = expectType(state, resolveExpr(state, stmt.value, ns.valueType), ns.valueType)
		return { key, kind: 'storage_write', namespace: ns.name, span, value }
	}

	const place = resolvePlace(state, target, target.span)
	const value = expectType(state, resolveExpr(state, stmt.value, place.type), place.type)
	return { kind: 'assign', place, span, value }
}

// ============================================================================
// Statements
// ============================================================================

function resolveLet(state: ResolverState, stmt: Extract<AstStmt, { kind: 'let' }>): HirStmt {
	const annotated = stmt.type !== null ? resolveTypeRef(state, stmt.type) : null
	const init = resolveExpr(state, stmt.init, annotated)
	if (annotated !== null) expectType(state, init, annotated)
	if (init.type.kind === 'unit') {
		fail(state, 'TERES003', init.span, { expected: 'a value', found: 'unit' })
	}

	const binding = declareBinding(state, {
		capability: Capability.Owned,
		isParam: false,
		mutable: stmt.mutable,
		name: stmt.name,
		span: stmt.span,
		type: init.type,
	})
	return { binding, init, kind: 'let', span: stmt.span }
}

function resolveCondition(state: ResolverState, cond: AstExpr): HirExpr {
	return expectType(state, resolveExpr(state, cond, BOOL), BOOL)
}

function resolveReturn(state: ResolverState, stmt: Extract<AstStmt, { kind: 'return' }>): HirStmt {
	const returnType = currentReturnType(state)
	if (stmt.value === null) {
		if (returnType.kind !== 'unit') {
			fail(state, 'TERES003', stmt.span, { expected: typeName(returnType), found: 'unit' })
		}
		return { kind: 'return', span: stmt.span, value: null }
	}
	const value = resolveExpr(state, stmt.value, returnType)
	expectType(state, value, returnType)
	return { kind: 'return', span: stmt.span, value }
}

function resolveStmt(state: ResolverState, stmt: AstStmt): HirStmt {
	switch (stmt.kind) {
		case 'let':
			return resolveLet(state, stmt)
		case 'assign':
			return resolveAssign(state, stmt)
		case 'expr':
			return { expr: resolveExpr(state, stmt.expr, null), kind: 'expr', span: stmt.span }
		case 'if': {
			const cond = resolveCondition(state, stmt.cond)
			const then = resolveBlock(state, stmt.then)
			const otherwise = stmt.else !== null ? resolveBlock(state, stmt.else) : null
			return { cond, else: otherwise, kind: 'if', span: stmt.span, then }
		}
		case 'while': {
			const cond = resolveCondition(state, stmt.cond)
			return { body: resolveBlock(state, stmt.body), cond, kind: 'while', span: stmt.span }
		}
		case 'return':
			return resolveReturn(state, stmt)
		case 'revert':
			return { kind: 'revert', message: stmt.message, span: stmt.span }
		case 'require': {
			// require(c, m) is `if !c { revert(m) }`
			const cond = resolveCondition(state, stmt.cond)
			const revert: HirStmt = { kind: 'revert', message: stmt.message, span: stmt.span }
			return {
				cond: { kind: 'not', operand: cond, span: cond.span, type: BOOL },
				else: null,
				kind: 'if',
				span: stmt.span,
				then: { drops: [], span: stmt.span, stmts: [revert] },
			}
		}
		case 'emit': {
			const value = resolveExpr(state, stmt.value, null)
			if (!isWordLike(value.type)) {
				fail(state, 'TERES015', value.span, { position: 'a log value', type: typeName(value.type) })
			}
			return { kind: 'emit', span: stmt.span, topic: stmt.topic, value }
		}
	}
}

export function resolveBlock(state: ResolverState, block: AstBlock): HirBlock {
	pushScope(state)
	const stmts: HirStmt[] = []
	for (const stmt of block.stmts) {
		try {
			stmts.push(resolveStmt(state, stmt))
		} catch (error) {
			if (!(error instanceof ResolveFailure)) throw error
		}
	}
	popScope(state)
	return { drops: [], span: block.span, stmts }
}

/**
 * Whether every path through the block ends in `return` or `revert`.
 * Loops never count: their condition may be false on entry.
 */
export function alwaysExits(block: HirBlock): boolean {
	return block.stmts.some((stmt) => {
		if (stmt.kind === 'return' || stmt.kind === 'revert') return true
		if (stmt.kind === 'if') return stmt.else !== null && alwaysExits(stmt.then) && alwaysExits(stmt.else)
		return false
	})
}
