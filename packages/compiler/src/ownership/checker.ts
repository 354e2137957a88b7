/**
 * Ownership and borrow checking over HIR.
 *
 * A single forward pass over the structured control flow of each function.
 * Every binding use is classified as copy, move, shared or exclusive, the
 * flow state is updated, and the first conflicting request fails the
 * function. Borrows exist only while a call's arguments are evaluated and
 * end when the call returns.
 *
 * Loops are checked twice: from the entry state, then from the join of the
 * entry and the end of the body, so a move that only bites on the next
 * iteration is still found.
 */

import { alwaysExits } from '../check/index.ts'
import { isCopyType, isStruct } from '../check/types.ts'
import type { CompilationContext, RelatedLocation } from '../core/context.ts'
import type { DiagnosticArgs, DiagnosticCode } from '../core/diagnostics.ts'
import type { Span } from '../core/span.ts'
import {
	AccessKind,
	type Binding,
	type BindingId,
	Capability,
	findFunction,
	getBinding,
	type HirBlock,
	type HirExpr,
	type HirFunction,
	type HirStmt,
	type HirUnit,
	type UseExpr,
} from '../hir/hir.ts'
import { type BorrowState, FlowState, OWNED, UNBORROWED } from './state.ts'

export interface OwnershipViolation {
	readonly functionName: string
	readonly code: DiagnosticCode
	/** Binding (or field path) the conflicting access touched */
	readonly name: string
	readonly span: Span
	/** The earlier move or borrow that the access conflicts with */
	readonly related: readonly RelatedLocation[]
}

class Violation extends Error {
	constructor(readonly violation: OwnershipViolation) {
		super(violation.code)
		this.name = 'Violation'
	}
}

interface CheckerState {
	readonly context: CompilationContext
	readonly unit: HirUnit
	readonly fn: HirFunction
	flow: FlowState
	/** Bodies of loops in their second pass, innermost last */
	readonly loops: Span[]
}

type ValueContext = 'value' | 'read'

// ============================================================================
// Reporting
// ============================================================================

function report(
	state: CheckerState,
	code: DiagnosticCode,
	span: Span,
	name: string,
	related: readonly RelatedLocation[] = [],
	args: DiagnosticArgs = {}
): never {
	const violation: OwnershipViolation = { code, functionName: state.fn.name, name, related, span }
	state.context.emit(code, span, { name, ...args }, { functionName: state.fn.name, related })
	throw new Violation(violation)
}

function within(inner: Span, outer: Span): boolean {
	return inner.start >= outer.start && inner.end <= outer.end
}

function borrowedAt(borrow: BorrowState): RelatedLocation[] {
	return borrow.kind === 'unborrowed' ? [] : [{ label: 'borrow taken here', span: borrow.at }]
}

// ============================================================================
// Accesses
// ============================================================================

/** A moved binding may not be touched again until reassigned. */
function checkLive(state: CheckerState, use: UseExpr): void {
	const { ownership } = state.flow.get(use.binding)
	if (ownership.kind === 'owned') return

	const label = ownership.kind === 'moved' ? 'value moved here' : 'value moved here on another path'
	const related = [{ label, span: ownership.at }]
	if (state.loops.some((loop) => within(ownership.at, loop))) {
		report(state, 'TEOWN006', use.span, use.name, related)
	}
	report(state, 'TEOWN001', use.span, use.name, related)
}

function canMutate(binding: Binding): boolean {
	return binding.mutable || binding.capability === Capability.Exclusive
}

function access(state: CheckerState, use: UseExpr, kind: AccessKind): void {
	const binding = getBinding(state.unit, use.binding)
	use.access = kind
	checkLive(state, use)

	const { borrow } = state.flow.get(use.binding)
	switch (kind) {
		case AccessKind.Copy:
		case AccessKind.Shared:
			if (borrow.kind === 'exclusive') report(state, 'TEOWN008', use.span, use.name, borrowedAt(borrow))
			return
		case AccessKind.Move:
			if (binding.capability !== Capability.Owned) {
				report(state, 'TEOWN007', use.span, use.name, [], { reason: 'it is borrowed from the caller' })
			}
			if (borrow.kind !== 'unborrowed') report(state, 'TEOWN003', use.span, use.name, borrowedAt(borrow))
			state.flow.setOwnership(use.binding, { at: use.span, kind: 'moved' })
			return
		case AccessKind.Exclusive:
			if (!canMutate(binding)) report(state, 'TEOWN005', use.span, use.name)
			if (borrow.kind !== 'unborrowed') report(state, 'TEOWN002', use.span, use.name, borrowedAt(borrow))
			return
	}
}

function takeBorrow(state: CheckerState, use: UseExpr, exclusive: boolean, active: BindingId[]): void {
	access(state, use, exclusive ? AccessKind.Exclusive : AccessKind.Shared)
	const current = state.flow.get(use.binding).borrow
	const next: BorrowState = exclusive
		? { at: use.span, kind: 'exclusive' }
		: current.kind === 'shared'
			? { at: current.at, count: current.count + 1, kind: 'shared' }
			: { at: use.span, count: 1, kind: 'shared' }
	state.flow.setBorrow(use.binding, next)
	active.push(use.binding)
}

function releaseBorrows(state: CheckerState, active: readonly BindingId[]): void {
	for (const id of active) {
		const current = state.flow.get(id).borrow
		const next: BorrowState =
			current.kind === 'shared' && current.count > 1
				? { at: current.at, count: current.count - 1, kind: 'shared' }
				: UNBORROWED
		state.flow.setBorrow(id, next)
	}
}

/** Root binding of a place expression (`x`, `x.a.b`), if the expression is one. */
function placeRoot(expr: HirExpr): UseExpr | null {
	if (expr.kind === 'use') return expr
	if (expr.kind === 'field') return placeRoot(expr.base)
	return null
}

function describePlace(expr: HirExpr): string {
	if (expr.kind === 'use') return expr.name
	if (expr.kind === 'field') return `${describePlace(expr.base)}.${expr.name}`
	return 'a temporary'
}

// ============================================================================
// Expressions
// ============================================================================

function useKind(use: UseExpr, ctx: ValueContext): AccessKind {
	if (!isStruct(use.type)) return AccessKind.Copy
	if (ctx === 'read') return AccessKind.Shared
	return isCopyType(use.type) ? AccessKind.Copy : AccessKind.Move
}

function checkCall(state: CheckerState, expr: Extract<HirExpr, { kind: 'call' }>): void {
	const callee = findFunction(state.unit, expr.callee)
	const active: BindingId[] = []
	for (const [i, arg] of expr.args.entries()) {
		const param = callee?.params[i]
		const root = placeRoot(arg)
		if (param !== undefined && param.mode !== 'value' && isStruct(param.binding.type) && root !== null) {
			if (arg.kind === 'field') checkFieldPath(state, arg)
			takeBorrow(state, root, param.mode === 'mut', active)
		} else {
			checkExpr(state, arg, 'value')
		}
	}
	releaseBorrows(state, active)
}

/** Intermediate links of a field path are read through, never moved. */
function checkFieldPath(state: CheckerState, expr: Extract<HirExpr, { kind: 'field' }>): void {
	if (expr.base.kind === 'field') checkFieldPath(state, expr.base)
	else if (expr.base.kind !== 'use') checkExpr(state, expr.base, 'read')
}

function checkExpr(state: CheckerState, expr: HirExpr, ctx: ValueContext): void {
	switch (expr.kind) {
		case 'int':
		case 'bool':
		case 'string':
		case 'context':
			return
		case 'use':
			access(state, expr, useKind(expr, ctx))
			return
		case 'field':
			if (ctx === 'value' && !isCopyType(expr.type)) {
				const name = describePlace(expr)
				report(state, 'TEOWN007', expr.span, name, [], { reason: 'it is a field of a struct' })
			}
			checkExpr(state, expr.base, 'read')
			return
		case 'struct':
			for (const field of expr.fields) checkExpr(state, field, 'value')
			return
		case 'arith':
		case 'bitwise':
		case 'cmp':
		case 'logical':
			checkExpr(state, expr.lhs, 'value')
			checkExpr(state, expr.rhs, 'value')
			return
		case 'builtin_arith':
			checkExpr(state, expr.lhs, 'value')
			checkExpr(state, expr.rhs, 'value')
			if (expr.fallback !== null) checkExpr(state, expr.fallback, 'value')
			return
		case 'not':
			checkExpr(state, expr.operand, 'value')
			return
		case 'call':
			checkCall(state, expr)
			return
		case 'storage_read':
			if (expr.key !== null) checkExpr(state, expr.key, 'value')
			return
		case 'storage_exists':
			checkExpr(state, expr.key, 'value')
			return
		case 'hash':
			checkExpr(state, expr.input, 'value')
			return
	}
}

// ============================================================================
// Statements
// ============================================================================

function checkAssign(state: CheckerState, stmt: Extract<HirStmt, { kind: 'assign' }>): void {
	checkExpr(state, stmt.value, 'value')
	const { root, path } = stmt.place
	const binding = getBinding(state.unit, root.binding)
	root.access = AccessKind.Exclusive

	if (path.length === 0) {
		if (!binding.mutable) report(state, 'TEOWN004', root.span, root.name)
		// Reassignment re-initialises a moved binding.
		state.flow.setOwnership(root.binding, OWNED)
		return
	}

	checkLive(state, root)
	if (!canMutate(binding)) report(state, 'TEOWN004', root.span, root.name)
}

function checkIf(state: CheckerState, stmt: Extract<HirStmt, { kind: 'if' }>): void {
	checkExpr(state, stmt.cond, 'value')
	const before = state.flow

	state.flow = before.clone()
	checkBlock(state, stmt.then)
	const afterThen = state.flow

	state.flow = before.clone()
	if (stmt.else !== null) checkBlock(state, stmt.else)
	const afterElse = state.flow

	// A branch that always exits does not reach the join.
	const thenExits = alwaysExits(stmt.then)
	const elseExits = stmt.else !== null && alwaysExits(stmt.else)
	if (thenExits && !elseExits) state.flow = afterElse
	else if (elseExits && !thenExits) state.flow = afterThen
	else state.flow = FlowState.merge(afterThen, afterElse)
}

function checkWhile(state: CheckerState, stmt: Extract<HirStmt, { kind: 'while' }>): void {
	const entry = state.flow.clone()
	checkExpr(state, stmt.cond, 'value')
	const afterCond = state.flow.clone()
	checkBlock(state, stmt.body)

	if (alwaysExits(stmt.body)) {
		state.flow = afterCond
		return
	}

	state.flow = FlowState.merge(entry, state.flow)
	state.loops.push(stmt.body.span)
	checkExpr(state, stmt.cond, 'value')
	const exit = state.flow.clone()
	checkBlock(state, stmt.body)
	state.loops.pop()
	state.flow = exit
}

function checkStmt(state: CheckerState, stmt: HirStmt, declared: Binding[]): void {
	switch (stmt.kind) {
		case 'let':
			checkExpr(state, stmt.init, 'value')
			state.flow.set(stmt.binding.id, { borrow: UNBORROWED, ownership: OWNED })
			declared.push(stmt.binding)
			return
		case 'assign':
			checkAssign(state, stmt)
			return
		case 'storage_write':
			if (stmt.key !== null) checkExpr(state, stmt.key, 'value')
			checkExpr(state, stmt.value, 'value')
			return
		case 'expr':
			checkExpr(state, stmt.expr, 'value')
			return
		case 'if':
			checkIf(state, stmt)
			return
		case 'while':
			checkWhile(state, stmt)
			return
		case 'return':
			if (stmt.value !== null) checkExpr(state, stmt.value, 'value')
			return
		case 'revert':
			return
		case 'emit':
			checkExpr(state, stmt.value, 'value')
			return
	}
}

/**
 * Check a block. Bindings it declares are dropped at its end; the
 * move-typed ones still owned there are recorded on `block.drops`.
 */
function checkBlock(state: CheckerState, block: HirBlock, params: readonly Binding[] = []): void {
	const declared: Binding[] = [...params]
	for (const stmt of block.stmts) checkStmt(state, stmt, declared)
	block.drops = declared
		.filter(
			(b) =>
				b.capability === Capability.Owned &&
				!isCopyType(b.type) &&
				state.flow.get(b.id).ownership.kind === 'owned'
		)
		.map((b) => b.id)
}

// ============================================================================
// Entry points
// ============================================================================

/**
 * Check one function, annotating its HIR in place. Returns the first
 * violation, or null when the function is accepted.
 */
export function checkFunction(
	context: CompilationContext,
	unit: HirUnit,
	fn: HirFunction
): OwnershipViolation | null {
	const state: CheckerState = { context, flow: new FlowState(), fn, loops: [], unit }
	try {
		checkBlock(state, fn.body, fn.params.map((p) => p.binding))
		return null
	} catch (error) {
		if (error instanceof Violation) return error.violation
		throw error
	}
}

/**
 * Check every function of the unit. Returns the violations keyed by
 * function name; functions absent from the map were accepted.
 */
export function checkOwnership(context: CompilationContext, unit: HirUnit): Map<string, OwnershipViolation> {
	const violations = new Map<string, OwnershipViolation>()
	for (const fn of unit.functions) {
		const violation = checkFunction(context, unit, fn)
		if (violation !== null) violations.set(fn.name, violation)
	}
	return violations
}
