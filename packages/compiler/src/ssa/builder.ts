/**
 * SSA construction from checked HIR.
 *
 * Structured lowering: each `if` arm and loop body gets its own blocks and
 * the builder carries an environment from binding to current value. Joins
 * get a phi only for bindings whose incoming values differ; loop headers get
 * one for every outer binding the body reassigns, seeded with the pre-loop
 * value and completed with the value at the end of the body. Trivial and
 * unused phis are removed afterwards.
 */

import { isStruct, type Type } from '../check/types.ts'
import type { Span } from '../core/span.ts'
import {
	AccessKind,
	type BindingId,
	findFunction,
	type HirBlock,
	type HirExpr,
	type HirFunction,
	type HirStmt,
	type HirUnit,
} from '../hir/hir.ts'
import { removeUnreachable } from './cfg.ts'
import {
	type BasicBlock,
	blockId,
	type ConstValue,
	type Inst,
	type Phi,
	type SsaFunction,
	type SsaModule,
	type Terminator,
	type ValueId,
	valueId,
	valueType,
} from './ir.ts'
import { pruneDeadPhis, removeTrivialPhis } from './phis.ts'

/** A path reaching a join: the block it leaves from and its environment. */
interface Arrival {
	readonly block: BasicBlock
	readonly env: Map<BindingId, ValueId>
	/** Still needs a branch to the join */
	readonly open: boolean
}

/** Bindings a block rebinds with `x = ...`, at any depth. */
function reassignedBindings(block: HirBlock, into: Set<BindingId> = new Set()): Set<BindingId> {
	for (const stmt of block.stmts) {
		if (stmt.kind === 'assign' && stmt.place.path.length === 0) into.add(stmt.place.root.binding)
		else if (stmt.kind === 'if') {
			reassignedBindings(stmt.then, into)
			if (stmt.else !== null) reassignedBindings(stmt.else, into)
		} else if (stmt.kind === 'while') reassignedBindings(stmt.body, into)
	}
	return into
}

function isPlace(expr: HirExpr): boolean {
	return expr.kind === 'use' || (expr.kind === 'field' && isPlace(expr.base))
}

class FunctionBuilder {
	readonly fn: SsaFunction
	private current: BasicBlock | null
	private env = new Map<BindingId, ValueId>()

	constructor(
		private readonly unit: HirUnit,
		hir: HirFunction
	) {
		this.fn = {
			annotations: hir.annotations,
			blocks: [],
			name: hir.name,
			params: [],
			pub: hir.pub,
			returnType: hir.returnType,
			span: hir.span,
			values: [],
		}
		this.current = this.newBlock(hir.span)
		const params: ValueId[] = []
		for (const param of hir.params) {
			const v = this.newValue(param.binding.type, param.binding.span)
			params.push(v)
			this.env.set(param.binding.id, v)
		}
		this.fn = { ...this.fn, params }
	}

	// ==========================================================================
	// Blocks and values
	// ==========================================================================

	private newBlock(span: Span): BasicBlock {
		const block: BasicBlock = {
			id: blockId(this.fn.blocks.length),
			insts: [],
			phis: [],
			terminator: { kind: 'unreachable', span },
		}
		this.fn.blocks.push(block)
		return block
	}

	private newValue(type: Type, span: Span): ValueId {
		const id = valueId(this.fn.values.length)
		this.fn.values.push({ span, type })
		return id
	}

	private open(): BasicBlock {
		if (this.current === null) throw new Error(`emitting into a terminated block in ${this.fn.name}`)
		return this.current
	}

	private push(inst: Inst): void {
		this.open().insts.push(inst)
	}

	private terminate(terminator: Terminator): void {
		this.open().terminator = terminator
		this.current = null
	}

	private lookup(id: BindingId): ValueId {
		const v = this.env.get(id)
		if (v === undefined) throw new Error(`binding ${id} has no value in ${this.fn.name}`)
		return v
	}

	private constant(value: ConstValue, type: Type, span: Span): ValueId {
		const result = this.newValue(type, span)
		this.push({ kind: 'const', result, span, value })
		return result
	}

	private copy(source: ValueId, type: Type, span: Span): ValueId {
		const result = this.newValue(type, span)
		this.push({ kind: 'copy', result, source, span })
		return result
	}

	private fieldGet(base: ValueId, index: number, span: Span): ValueId {
		const baseType = valueType(this.fn, base)
		const field = isStruct(baseType) ? baseType.fields[index] : undefined
		if (field === undefined) throw new Error(`field ${index} of non-struct value in ${this.fn.name}`)
		const result = this.newValue(field.type, span)
		this.push({ base, index, kind: 'field_get', result, span })
		return result
	}

	// ==========================================================================
	// Expressions
	// ==========================================================================

	private value(expr: HirExpr): ValueId {
		const v = this.lowerExpr(expr)
		if (v === null) throw new Error(`unit-typed expression used as a value in ${this.fn.name}`)
		return v
	}

	/** The struct a place refers to, without copying it. */
	private pointer(expr: HirExpr): ValueId {
		if (expr.kind === 'use') return this.lookup(expr.binding)
		if (expr.kind === 'field') return this.fieldGet(this.pointer(expr.base), expr.index, expr.span)
		return this.value(expr)
	}

	private lowerExpr(expr: HirExpr): ValueId | null {
		const { span, type } = expr
		switch (expr.kind) {
			case 'int':
				return this.constant({ kind: 'int', value: expr.value }, type, span)
			case 'bool':
				return this.constant({ kind: 'bool', value: expr.value }, type, span)
			case 'string':
				return this.constant({ kind: 'string', value: expr.value }, type, span)
			case 'use': {
				const v = this.lookup(expr.binding)
				return expr.access === AccessKind.Copy && isStruct(type) ? this.copy(v, type, span) : v
			}
			case 'field': {
				const v = this.fieldGet(this.pointer(expr.base), expr.index, span)
				return isStruct(type) ? this.copy(v, type, span) : v
			}
			case 'struct': {
				const fields = expr.fields.map((f) => this.value(f))
				const result = this.newValue(type, span)
				this.push({ fields, kind: 'struct_new', result, span })
				return result
			}
			case 'arith': {
				const lhs = this.value(expr.lhs)
				const rhs = this.value(expr.rhs)
				const result = this.newValue(type, span)
				this.push({ fallback: null, kind: 'arith', lhs, mode: 'checked', op: expr.op, result, rhs, span })
				return result
			}
			case 'builtin_arith': {
				const lhs = this.value(expr.lhs)
				const rhs = this.value(expr.rhs)
				const fallback = expr.fallback !== null ? this.value(expr.fallback) : null
				const result = this.newValue(type, span)
				this.push({ fallback, kind: 'arith', lhs, mode: expr.mode, op: expr.op, result, rhs, span })
				return result
			}
			case 'bitwise':
			case 'cmp': {
				const lhs = this.value(expr.lhs)
				const rhs = this.value(expr.rhs)
				const result = this.newValue(type, span)
				if (expr.kind === 'bitwise') this.push({ kind: 'bitwise', lhs, op: expr.op, result, rhs, span })
				else this.push({ kind: 'cmp', lhs, op: expr.op, result, rhs, span })
				return result
			}
			case 'not': {
				const operand = this.value(expr.operand)
				const result = this.newValue(type, span)
				this.push({ kind: 'not', operand, result, span })
				return result
			}
			case 'logical':
				return this.lowerLogical(expr)
			case 'call':
				return this.lowerCall(expr)
			case 'storage_read': {
				const key = expr.key !== null ? this.value(expr.key) : null
				const result = this.newValue(type, span)
				this.push({ key, kind: 'state_read', namespace: expr.namespace, result, span })
				return result
			}
			case 'storage_exists': {
				const key = this.value(expr.key)
				const result = this.newValue(type, span)
				this.push({ key, kind: 'state_exists', namespace: expr.namespace, result, span })
				return result
			}
			case 'context': {
				const result = this.newValue(type, span)
				this.push({ kind: 'context', query: expr.query, result, span })
				return result
			}
			case 'hash': {
				const input = this.value(expr.input)
				const result = this.newValue(type, span)
				this.push({ input, kind: 'hash', result, span })
				return result
			}
		}
	}

	/** `a && b` and `a || b` evaluate `b` only when needed; the result is a phi. */
	private lowerLogical(expr: Extract<HirExpr, { kind: 'logical' }>): ValueId {
		const lhs = this.value(expr.lhs)
		const lhsEnd = this.open()
		const rhsBlock = this.newBlock(expr.rhs.span)
		const join = this.newBlock(expr.span)
		this.terminate(
			expr.op === 'and'
				? { cond: lhs, else: join.id, kind: 'cond_br', span: expr.span, then: rhsBlock.id }
				: { cond: lhs, else: rhsBlock.id, kind: 'cond_br', span: expr.span, then: join.id }
		)

		this.current = rhsBlock
		const rhs = this.value(expr.rhs)
		const rhsEnd = this.open()
		this.terminate({ kind: 'br', span: expr.span, target: join.id })

		const result = this.newValue(expr.type, expr.span)
		join.phis.push({
			incoming: [
				{ block: lhsEnd.id, value: lhs },
				{ block: rhsEnd.id, value: rhs },
			],
			result,
		})
		this.current = join
		return result
	}

	private lowerCall(expr: Extract<HirExpr, { kind: 'call' }>): ValueId | null {
		const callee = findFunction(this.unit, expr.callee)
		const args = expr.args.map((arg, i) => {
			const param = callee?.params[i]
			const byReference = param !== undefined && param.mode !== 'value' && isStruct(param.binding.type)
			return byReference && isPlace(arg) ? this.pointer(arg) : this.value(arg)
		})
		const result = expr.type.kind === 'unit' ? null : this.newValue(expr.type, expr.span)
		this.push({ args, callee: expr.callee, kind: 'call', result, span: expr.span })
		return result
	}

	// ==========================================================================
	// Statements
	// ==========================================================================

	lowerBlock(block: HirBlock): void {
		for (const stmt of block.stmts) {
			// Statements after a return or revert are unreachable.
			if (this.current === null) return
			this.lowerStmt(stmt)
		}
	}

	private lowerStmt(stmt: HirStmt): void {
		switch (stmt.kind) {
			case 'let':
				this.env.set(stmt.binding.id, this.value(stmt.init))
				return
			case 'assign': {
				const value = this.value(stmt.value)
				const { path, root } = stmt.place
				const last = path[path.length - 1]
				if (last === undefined) {
					this.env.set(root.binding, value)
					return
				}
				let base = this.lookup(root.binding)
				for (const index of path.slice(0, -1)) base = this.fieldGet(base, index, stmt.span)
				this.push({ base, index: last, kind: 'field_set', span: stmt.span, value })
				return
			}
			case 'storage_write': {
				const key = stmt.key !== null ? this.value(stmt.key) : null
				const value = this.value(stmt.value)
				this.push({ key, kind: 'state_write', namespace: stmt.namespace, span: stmt.span, value })
				return
			}
			case 'expr':
				this.lowerExpr(stmt.expr)
				return
			case 'if':
				this.lowerIf(stmt)
				return
			case 'while':
				this.lowerWhile(stmt)
				return
			case 'return': {
				const value = stmt.value !== null ? this.value(stmt.value) : null
				this.terminate({ kind: 'return', span: stmt.span, value })
				return
			}
			case 'revert':
				this.terminate({ kind: 'revert', message: stmt.message, span: stmt.span })
				return
			case 'emit': {
				const value = this.value(stmt.value)
				this.push({ kind: 'emit_log', span: stmt.span, topic: stmt.topic, value })
				return
			}
		}
	}

	private lowerIf(stmt: Extract<HirStmt, { kind: 'if' }>): void {
		const cond = this.value(stmt.cond)
		const before = new Map(this.env)
		const pre = this.open()
		const thenBlock = this.newBlock(stmt.then.span)
		const arrivals: Arrival[] = []

		let join: BasicBlock | null = null
		if (stmt.else === null) {
			join = this.newBlock(stmt.span)
			this.terminate({ cond, else: join.id, kind: 'cond_br', span: stmt.span, then: thenBlock.id })
			arrivals.push({ block: pre, env: before, open: false })
		} else {
			const elseBlock = this.newBlock(stmt.else.span)
			this.terminate({ cond, else: elseBlock.id, kind: 'cond_br', span: stmt.span, then: thenBlock.id })
			this.current = elseBlock
			this.env = new Map(before)
			this.lowerBlock(stmt.else)
			if (this.current !== null) arrivals.push({ block: this.current, env: this.env, open: true })
		}

		this.current = thenBlock
		this.env = new Map(before)
		this.lowerBlock(stmt.then)
		if (this.current !== null) arrivals.unshift({ block: this.current, env: this.env, open: true })

		if (arrivals.length === 0) {
			this.current = null
			return
		}

		const target = join ?? this.newBlock(stmt.span)
		for (const arrival of arrivals) {
			if (arrival.open) arrival.block.terminator = { kind: 'br', span: stmt.span, target: target.id }
		}
		this.current = target
		this.env = this.merge(target, arrivals, before.keys(), stmt.span)
	}

	/** Environment at a join; a phi for each binding whose incoming values differ. */
	private merge(
		join: BasicBlock,
		arrivals: readonly Arrival[],
		keys: Iterable<BindingId>,
		span: Span
	): Map<BindingId, ValueId> {
		const [first] = arrivals
		if (first === undefined) return new Map()
		if (arrivals.length === 1) return first.env

		const env = new Map<BindingId, ValueId>()
		for (const key of keys) {
			const incoming = arrivals.map((a) => {
				const value = a.env.get(key)
				if (value === undefined) throw new Error(`binding ${key} lost on a branch of ${this.fn.name}`)
				return { block: a.block.id, value }
			})
			const distinct = new Set(incoming.map((i) => i.value))
			const [only] = distinct
			if (distinct.size === 1 && only !== undefined) {
				env.set(key, only)
				continue
			}
			const result = this.newValue(valueType(this.fn, incoming[0]?.value ?? this.lookup(key)), span)
			join.phis.push({ incoming, result })
			env.set(key, result)
		}
		return env
	}

	private lowerWhile(stmt: Extract<HirStmt, { kind: 'while' }>): void {
		const pre = this.open()
		const header = this.newBlock(stmt.span)
		this.terminate({ kind: 'br', span: stmt.span, target: header.id })

		const headerPhis = new Map<BindingId, Phi>()
		for (const id of reassignedBindings(stmt.body)) {
			const initial = this.env.get(id)
			if (initial === undefined) continue
			const result = this.newValue(valueType(this.fn, initial), stmt.span)
			const phi: Phi = { incoming: [{ block: pre.id, value: initial }], result }
			header.phis.push(phi)
			headerPhis.set(id, phi)
			this.env.set(id, result)
		}

		this.current = header
		const cond = this.value(stmt.cond)
		const body = this.newBlock(stmt.body.span)
		const exit = this.newBlock(stmt.span)
		const exitEnv = new Map(this.env)
		this.terminate({ cond, else: exit.id, kind: 'cond_br', span: stmt.span, then: body.id })

		this.current = body
		this.lowerBlock(stmt.body)
		if (this.current !== null) {
			const latch = this.current.id
			for (const [id, phi] of headerPhis) phi.incoming.push({ block: latch, value: this.lookup(id) })
			this.terminate({ kind: 'br', span: stmt.span, target: header.id })
		}

		this.current = exit
		this.env = exitEnv
	}

	finish(): SsaFunction {
		if (this.current !== null) {
			const span = this.fn.span
			this.terminate(
				this.fn.returnType.kind === 'unit' ? { kind: 'return', span, value: null } : { kind: 'unreachable', span }
			)
		}
		removeTrivialPhis(this.fn)
		pruneDeadPhis(this.fn)
		removeUnreachable(this.fn)
		return this.fn
	}
}

export function buildFunction(unit: HirUnit, fn: HirFunction): SsaFunction {
	const builder = new FunctionBuilder(unit, fn)
	builder.lowerBlock(fn.body)
	return builder.finish()
}

/** Build SSA for the given functions of a checked unit. */
export function buildModule(unit: HirUnit, functions: readonly HirFunction[]): SsaModule {
	return {
		functions: functions.map((fn) => buildFunction(unit, fn)),
		storage: unit.storage,
		unit: unit.name,
	}
}
