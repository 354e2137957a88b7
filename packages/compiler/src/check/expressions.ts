/**
 * Expression resolution: binds names, infers and checks types, and lowers
 * surface sugar (method calls, storage access, negation) to HIR.
 *
 * Integer literals take the type the context expects and default to u64.
 * For binary operators the non-literal operand is resolved first so a
 * literal on either side adopts its type.
 */

import type { Span } from '../core/span.ts'
import type { AstExpr, AstFieldInit, BinaryOp } from '../front/ast.ts'
import {
	AccessKind,
	type ArithOp,
	type BitOp,
	type BuiltinArithMode,
	type CmpOp,
	type ContextQuery,
	type HirExpr,
	type StorageNamespace,
} from '../hir/hir.ts'
import { fail, lookupBinding, type ResolverState } from './state.ts'
import {
	BOOL,
	DIGEST,
	fitsInt,
	isInt,
	isStruct,
	STRING,
	type Type,
	typeEquals,
	typeName,
	U64,
} from './types.ts'

// ============================================================================
// Operator tables
// ============================================================================

const ARITH_OPS: Partial<Record<BinaryOp, ArithOp>> = {
	'%': 'rem',
	'*': 'mul',
	'+': 'add',
	'-': 'sub',
	'/': 'div',
}

const BIT_OPS: Partial<Record<BinaryOp, BitOp>> = {
	'&': 'and',
	'<<': 'shl',
	'>>': 'shr',
	'^': 'xor',
	'|': 'or',
}

const CMP_OPS: Partial<Record<BinaryOp, CmpOp>> = {
	'!=': 'ne',
	'<': 'lt',
	'<=': 'le',
	'==': 'eq',
	'>': 'gt',
	'>=': 'ge',
}

const BUILTIN_ARITH = /^(wrapping|saturating|checked)_(add|sub|mul|div)$/

const CONTEXT_BUILTINS: Record<string, { query: ContextQuery; type: Type }> = {
	block_height: { query: 'block_height', type: U64 },
	call_value: { query: 'call_value', type: U64 },
	caller: { query: 'caller', type: DIGEST },
}

// ============================================================================
// Helpers
// ============================================================================

export function expectType(state: ResolverState, expr: HirExpr, expected: Type): HirExpr {
	if (!typeEquals(expr.type, expected)) {
		fail(state, 'TERES003', expr.span, { expected: typeName(expected), found: typeName(expr.type) })
	}
	return expr
}

function isLiteral(expr: AstExpr): boolean {
	return expr.kind === 'int' || (expr.kind === 'unary' && expr.op === '-' && expr.operand.kind === 'int')
}

/** Types a value of which can be logged, hashed or keyed. */
export function isWordLike(type: Type): boolean {
	return type.kind === 'int' || type.kind === 'bool' || type.kind === 'string' || type.kind === 'digest'
}

export function lookupNamespace(state: ResolverState, name: string, span: Span): StorageNamespace {
	const ns = state.storage.get(name)
	if (ns === undefined) fail(state, 'TERES007', span, { name })
	return ns
}

function resolveOperands(
	state: ResolverState,
	lhs: AstExpr,
	rhs: AstExpr,
	expected: Type | null
): [HirExpr, HirExpr] {
	if (isLiteral(lhs) && !isLiteral(rhs)) {
		const right = resolveExpr(state, rhs, expected)
		const left = expectType(state, resolveExpr(state, lhs, right.type), right.type)
		return [left, right]
	}
	const left = resolveExpr(state, lhs, expected)
	const right = expectType(state, resolveExpr(state, rhs, left.type), left.type)
	return [left, right]
}

function requireInt(state: ResolverState, op: string, expr: HirExpr): void {
	if (!isInt(expr.type)) fail(state, 'TERES012', expr.span, { op, type: typeName(expr.type) })
}

// ============================================================================
// Literals and names
// ============================================================================

function resolveIntLiteral(state: ResolverState, value: bigint, span: Span, expected: Type | null): HirExpr {
	const type = expected !== null && isInt(expected) ? expected : U64
	if (!fitsInt(type, value)) {
		fail(state, 'TERES010', span, { type: typeName(type), value })
	}
	return { kind: 'int', span, type, value }
}

function resolveName(state: ResolverState, name: string, span: Span): HirExpr {
	const binding = lookupBinding(state, name)
	if (binding === undefined) fail(state, 'TERES001', span, { name })
	return { access: AccessKind.Copy, binding: binding.id, kind: 'use', name, span, type: binding.type }
}

// ============================================================================
// Operators
// ============================================================================

function resolveBinary(
	state: ResolverState,
	expr: Extract<AstExpr, { kind: 'binary' }>,
	expected: Type | null
): HirExpr {
	const { op, span } = expr

	if (op === '&&' || op === '||') {
		const lhs = expectType(state, resolveExpr(state, expr.lhs, BOOL), BOOL)
		const rhs = expectType(state, resolveExpr(state, expr.rhs, BOOL), BOOL)
		return { kind: 'logical', lhs, op: op === '&&' ? 'and' : 'or', rhs, span, type: BOOL }
	}

	const cmp = CMP_OPS[op]
	if (cmp !== undefined) {
		const [lhs, rhs] = resolveOperands(state, expr.lhs, expr.rhs, null)
		const equality = cmp === 'eq' || cmp === 'ne'
		const supported = isInt(lhs.type) || (equality && (lhs.type.kind === 'bool' || lhs.type.kind === 'digest'))
		if (!supported) fail(state, 'TERES012', span, { op, type: typeName(lhs.type) })
		return { kind: 'cmp', lhs, op: cmp, rhs, span, type: BOOL }
	}

	const [lhs, rhs] = resolveOperands(state, expr.lhs, expr.rhs, expected)
	requireInt(state, op, lhs)

	const arith = ARITH_OPS[op]
	if (arith !== undefined) return { kind: 'arith', lhs, op: arith, rhs, span, type: lhs.type }

	const bit = BIT_OPS[op]
	if (bit !== undefined) return { kind: 'bitwise', lhs, op: bit, rhs, span, type: lhs.type }

	return fail(state, 'TERES012', span, { op, type: typeName(lhs.type) })
}

function resolveUnary(
	state: ResolverState,
	expr: Extract<AstExpr, { kind: 'unary' }>,
	expected: Type | null
): HirExpr {
	if (expr.op === '!') {
		const operand = resolveExpr(state, expr.operand, BOOL)
		if (operand.type.kind !== 'bool') fail(state, 'TERES012', expr.span, { op: '!', type: typeName(operand.type) })
		return { kind: 'not', operand, span: expr.span, type: BOOL }
	}

	if (expr.operand.kind === 'int') {
		return resolveIntLiteral(state, -expr.operand.value, expr.span, expected)
	}

	const operand = resolveExpr(state, expr.operand, expected)
	if (!isInt(operand.type) || !operand.type.signed) {
		fail(state, 'TERES012', expr.span, { op: '-', type: typeName(operand.type) })
	}
	const zero: HirExpr = { kind: 'int', span: expr.span, type: operand.type, value: 0n }
	return { kind: 'arith', lhs: zero, op: 'sub', rhs: operand, span: expr.span, type: operand.type }
}

// ============================================================================
// Places, fields and structs
// ============================================================================

function resolveField(state: ResolverState, expr: Extract<AstExpr, { kind: 'field' }>): HirExpr {
	const base = resolveExpr(state, expr.base, null)
	if (!isStruct(base.type)) {
		fail(state, 'TERES006', expr.span, { field: expr.name, type: typeName(base.type) })
	}
	const index = base.type.fields.findIndex((f) => f.name === expr.name)
	const field = base.type.fields[index]
	if (field === undefined) {
		fail(state, 'TERES006', expr.span, { field: expr.name, type: base.type.name })
	}
	return { base, index, kind: 'field', name: expr.name, span: expr.span, type: field.type }
}

function resolveStructLiteral(
	state: ResolverState,
	name: string,
	inits: readonly AstFieldInit[],
	span: Span
): HirExpr {
	const struct = state.structs.get(name)
	if (struct === undefined) fail(state, 'TERES002', span, { name })

	const values: (HirExpr | undefined)[] = struct.fields.map(() => undefined)
	for (const init of inits) {
		const index = struct.fields.findIndex((f) => f.name === init.name)
		const field = struct.fields[index]
		if (field === undefined) fail(state, 'TERES006', init.span, { field: init.name, type: name })
		if (values[index] !== undefined) fail(state, 'TERES008', init.span, { name: init.name })
		values[index] = expectType(state, resolveExpr(state, init.value, field.type), field.type)
	}

	const fields: HirExpr[] = []
	for (const [i, value] of values.entries()) {
		if (value === undefined) {
			fail(state, 'TERES011', span, { field: struct.fields[i]?.name ?? '?', type: name })
		}
		fields.push(value)
	}
	return { fields, kind: 'struct', span, struct, type: struct }
}

// ============================================================================
// Storage
// ============================================================================

function resolveStorageScalar(state: ResolverState, namespace: string, span: Span): HirExpr {
	const ns = lookupNamespace(state, namespace, span)
	if (ns.keyType !== null) {
		fail(state, 'TERES013', span, { detail: 'is keyed; index it with a key', name: namespace })
	}
	return { key: null, kind: 'storage_read', namespace, span, type: ns.valueType }
}

/** Resolve the key of a keyed namespace access. */
export function resolveStorageKey(state: ResolverState, ns: StorageNamespace, key: AstExpr, span: Span): HirExpr {
	if (ns.keyType === null) {
		fail(state, 'TERES013', span, { detail: 'is scalar; it takes no key', name: ns.name })
	}
	return expectType(state, resolveExpr(state, key, ns.keyType), ns.keyType)
}

function resolveIndex(state: ResolverState, expr: Extract<AstExpr, { kind: 'index' }>): HirExpr {
	if (expr.base.kind !== 'storage') {
		const base = resolveExpr(state, expr.base, null)
		return fail(state, 'TERES012', expr.span, { op: '[]', type: typeName(base.type) })
	}
	const ns = lookupNamespace(state, expr.base.namespace, expr.base.span)
	const key = resolveStorageKey(state, ns, expr.index, expr.span)
	return { key, kind: 'storage_read', namespace: ns.name, span: expr.span, type: ns.valueType }
}

// ============================================================================
// Calls
// ============================================================================

function checkArgCount(
	state: ResolverState,
	name: string,
	args: readonly AstExpr[],
	expected: number,
	span: Span
): void {
	if (args.length !== expected) {
		fail(state, 'TERES005', span, { expected, found: args.length, name })
	}
}

function resolveBuiltinArith(
	state: ResolverState,
	callee: string,
	mode: BuiltinArithMode,
	op: ArithOp,
	args: readonly AstExpr[],
	span: Span,
	expected: Type | null
): HirExpr {
	const takesFallback = mode === 'fallback'
	checkArgCount(state, callee, args, takesFallback ? 3 : 2, span)
	const [a, b, c] = args
	if (a === undefined || b === undefined) throw new Error('unreachable: argument count checked')
	const [lhs, rhs] = resolveOperands(state, a, b, expected)
	requireInt(state, callee, lhs)
	const fallback = c !== undefined ? expectType(state, resolveExpr(state, c, lhs.type), lhs.type) : null
	return { fallback, kind: 'builtin_arith', lhs, mode, op, rhs, span, type: lhs.type }
}

function resolveBuiltin(
	state: ResolverState,
	callee: string,
	args: readonly AstExpr[],
	span: Span,
	expected: Type | null
): HirExpr | null {
	const arith = BUILTIN_ARITH.exec(callee)
	if (arith !== null) {
		const [, prefix, op] = arith
		const mode: BuiltinArithMode = prefix === 'checked' ? 'fallback' : prefix === 'wrapping' ? 'wrapping' : 'saturating'
		const arithOp: ArithOp = op === 'add' ? 'add' : op === 'sub' ? 'sub' : op === 'mul' ? 'mul' : 'div'
		return resolveBuiltinArith(state, callee, mode, arithOp, args, span, expected)
	}

	if (callee === 'sha256') {
		checkArgCount(state, callee, args, 1, span)
		const [arg] = args
		if (arg === undefined) throw new Error('unreachable: argument count checked')
		const input = resolveExpr(state, arg, null)
		if (!isWordLike(input.type)) {
			fail(state, 'TERES015', input.span, { position: 'a hash input', type: typeName(input.type) })
		}
		return { input, kind: 'hash', span, type: DIGEST }
	}

	const context = CONTEXT_BUILTINS[callee]
	if (context !== undefined) {
		checkArgCount(state, callee, args, 0, span)
		return { kind: 'context', query: context.query, span, type: context.type }
	}

	return null
}

function resolveCall(
	state: ResolverState,
	callee: string,
	args: readonly AstExpr[],
	span: Span,
	expected: Type | null
): HirExpr {
	const builtin = resolveBuiltin(state, callee, args, span, expected)
	if (builtin !== null) return builtin

	const signature = state.signatures.get(callee)
	if (signature === undefined) fail(state, 'TERES004', span, { name: callee })
	checkArgCount(state, callee, args, signature.params.length, span)

	const resolved = args.map((arg, i) => {
		const param = signature.params[i]
		if (param === undefined) throw new Error('unreachable: argument count checked')
		return expectType(state, resolveExpr(state, arg, param.type), param.type)
	})
	return { args: resolved, callee, kind: 'call', span, type: signature.returnType }
}

function resolveMethod(
	state: ResolverState,
	expr: Extract<AstExpr, { kind: 'method' }>,
	expected: Type | null
): HirExpr {
	if (expr.receiver.kind === 'storage' && expr.name === 'contains') {
		const ns = lookupNamespace(state, expr.receiver.namespace, expr.receiver.span)
		checkArgCount(state, 'contains', expr.args, 1, expr.span)
		const [arg] = expr.args
		if (arg === undefined) throw new Error('unreachable: argument count checked')
		const key = resolveStorageKey(state, ns, arg, expr.span)
		return { key, kind: 'storage_exists', namespace: ns.name, span: expr.span, type: BOOL }
	}
	return resolveCall(state, expr.name, [expr.receiver, ...expr.args], expr.span, expected)
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Resolve an expression. `expected` guides literal typing only; callers
 * check the resulting type themselves.
 */
export function resolveExpr(state: ResolverState, expr: AstExpr, expected: Type | null): HirExpr {
	switch (expr.kind) {
		case 'int':
			return resolveIntLiteral(state, expr.value, expr.span, expected)
		case 'bool':
			return { kind: 'bool', span: expr.span, type: BOOL, value: expr.value }
		case 'string':
			return { kind: 'string', span: expr.span, type: STRING, value: expr.value }
		case 'name':
			return resolveName(state, expr.name, expr.span)
		case 'field':
			return resolveField(state, expr)
		case 'index':
			return resolveIndex(state, expr)
		case 'call':
			return resolveCall(state, expr.callee, expr.args, expr.span, expected)
		case 'method':
			return resolveMethod(state, expr, expected)
		case 'struct':
			return resolveStructLiteral(state, expr.name, expr.fields, expr.span)
		case 'binary':
			return resolveBinary(state, expr, expected)
		case 'unary':
			return resolveUnary(state, expr, expected)
		case 'storage':
			return resolveStorageScalar(state, expr.namespace, expr.span)
	}
}
