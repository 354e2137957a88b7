import binaryen from 'binaryen'

import { type BinOp, type BytecodeFunction, type BytecodeModule, type Op, PAGE_BYTES } from '../backend/isa.ts'
import { type CapabilityId, getCapability, importModule, paramWords } from '../host/capabilities.ts'
import { TrapCode } from '../host/status.ts'

export interface WasmOptions {
	optimize?: boolean
}

export interface WasmResult {
	binary: Uint8Array
	text: string
	valid: boolean
}

type Expr = binaryen.ExpressionRef
type RelooperBlock = ReturnType<binaryen.Relooper['addBlock']>

const ALLOC = '__alloc'
const HEAP = '__heap'
const ABORT: CapabilityId = 'control.abort'

function internalName(name: string): string {
	return `fn.${name}`
}

function i64Const(mod: binaryen.Module, value: bigint): Expr {
	return mod.i64.const(Number(BigInt.asIntN(32, value)), Number(BigInt.asIntN(32, value >> 32n)))
}

/** Addresses are held as i64 words and narrowed for memory access. */
function address(mod: binaryen.Module, word: Expr): Expr {
	return mod.i32.wrap(word)
}

function isTrue(mod: binaryen.Module, word: Expr): Expr {
	return mod.i64.ne(word, i64Const(mod, 0n))
}

function trap(mod: binaryen.Module, code: number): Expr {
	return mod.block(null, [mod.call(ABORT, [i64Const(mod, BigInt(code))], binaryen.none), mod.unreachable()])
}

function binaryExpr(mod: binaryen.Module, op: BinOp, a: Expr, b: Expr): Expr {
	const i64 = mod.i64
	const flag = (e: Expr): Expr => i64.extend_u(e)
	switch (op) {
		case 'add':
			return i64.add(a, b)
		case 'sub':
			return i64.sub(a, b)
		case 'mul':
			return i64.mul(a, b)
		case 'div_s':
			return i64.div_s(a, b)
		case 'div_u':
			return i64.div_u(a, b)
		case 'rem_s':
			return i64.rem_s(a, b)
		case 'rem_u':
			return i64.rem_u(a, b)
		case 'and':
			return i64.and(a, b)
		case 'or':
			return i64.or(a, b)
		case 'xor':
			return i64.xor(a, b)
		case 'shl':
			return i64.shl(a, b)
		case 'shr_s':
			return i64.shr_s(a, b)
		case 'shr_u':
			return i64.shr_u(a, b)
		case 'eq':
			return flag(i64.eq(a, b))
		case 'ne':
			return flag(i64.ne(a, b))
		case 'lt_s':
			return flag(i64.lt_s(a, b))
		case 'lt_u':
			return flag(i64.lt_u(a, b))
		case 'le_s':
			return flag(i64.le_s(a, b))
		case 'le_u':
			return flag(i64.le_u(a, b))
		case 'gt_s':
			return flag(i64.gt_s(a, b))
		case 'gt_u':
			return flag(i64.gt_u(a, b))
		case 'ge_s':
			return flag(i64.ge_s(a, b))
		case 'ge_u':
			return flag(i64.ge_u(a, b))
	}
}

// ============================================================================
// Segments
// ============================================================================

type SegmentEnd =
	| { readonly kind: 'jump'; readonly label: number }
	| { readonly kind: 'branch'; readonly label: number }
	| { readonly kind: 'fall' }
	| { readonly kind: 'exit' }

interface Segment {
	readonly label: number | null
	readonly ops: Op[]
	end: SegmentEnd
}

/**
 * Cut a function's code into straight-line segments: one starts at every
 * label and after every branch. Unlabeled code that nothing falls into is
 * dropped.
 */
function segment(code: readonly Op[]): Segment[] {
	const segments: Segment[] = []
	let current: Segment = { end: { kind: 'fall' }, label: null, ops: [] }
	let reachable = true

	const close = (end: SegmentEnd): void => {
		current.end = end
		if (reachable || current.label !== null) segments.push(current)
		reachable = end.kind === 'fall' || end.kind === 'branch'
		current = { end: { kind: 'fall' }, label: null, ops: [] }
	}

	for (const op of code) {
		switch (op.op) {
			case 'label':
				if (current.label !== null || current.ops.length > 0) close({ kind: 'fall' })
				current = { end: { kind: 'fall' }, label: op.id, ops: [] }
				break
			case 'br':
				close({ kind: 'jump', label: op.label })
				break
			case 'br_if':
				current.ops.push(op)
				close({ kind: 'branch', label: op.label })
				break
			case 'return':
			case 'unreachable':
				current.ops.push(op)
				close({ kind: 'exit' })
				break
			default:
				current.ops.push(op)
		}
	}
	if (current.label !== null || current.ops.length > 0) close({ kind: 'exit' })
	return segments
}

// ============================================================================
// Functions
// ============================================================================

interface StackEntry {
	readonly expr: Expr
	/** Reads nothing a later statement can change */
	readonly stable: boolean
}

/**
 * Rebuilds expression trees from stack code. Before any side effect is
 * emitted, everything still on the stack is evaluated into a fresh local so
 * evaluation order matches the stack code.
 */
class FunctionTranslator {
	private stack: StackEntry[] = []
	private statements: Expr[] = []
	private readonly extra: binaryen.Type[] = []

	constructor(
		private readonly mod: binaryen.Module,
		private readonly fn: BytecodeFunction
	) {}

	get extraLocals(): readonly binaryen.Type[] {
		return this.extra
	}

	private freshLocal(type: binaryen.Type = binaryen.i64): number {
		const index = this.fn.locals + this.extra.length
		this.extra.push(type)
		return index
	}

	private push(expr: Expr, stable = false): void {
		this.stack.push({ expr, stable })
	}

	private pop(): Expr {
		const entry = this.stack.pop()
		if (entry === undefined) throw new Error(`stack underflow in ${this.fn.name}`)
		return entry.expr
	}

	private popMany(count: number): Expr[] {
		const values: Expr[] = []
		for (let i = 0; i < count; i++) values.unshift(this.pop())
		return values
	}

	private statement(expr: Expr): void {
		this.stack = this.stack.map((entry) => {
			if (entry.stable) return entry
			const local = this.freshLocal()
			this.statements.push(this.mod.local.set(local, entry.expr))
			return { expr: this.mod.local.get(local, binaryen.i64), stable: true }
		})
		this.statements.push(expr)
	}

	private callWithResult(call: Expr): void {
		const local = this.freshLocal()
		this.statement(this.mod.local.set(local, call))
		this.push(this.mod.local.get(local, binaryen.i64), true)
	}

	/** Translate one segment; returns its code and the local holding a branch flag. */
	private translateSegment(seg: Segment): { code: Expr; flag: number | null } {
		const { mod } = this
		let flag: number | null = null
		this.stack = []
		this.statements = []

		for (const op of seg.ops) {
			switch (op.op) {
				case 'const':
					this.push(i64Const(mod, op.value), true)
					break
				case 'local.get':
					this.push(mod.local.get(op.index, binaryen.i64))
					break
				case 'local.set':
					this.statement(mod.local.set(op.index, this.pop()))
					break
				case 'eqz':
					this.push(mod.i64.extend_u(mod.i64.eqz(this.pop())))
					break
				case 'select': {
					const c = this.pop()
					const b = this.pop()
					const a = this.pop()
					this.push(mod.select(isTrue(mod, c), a, b, binaryen.i64))
					break
				}
				case 'load':
					this.push(mod.i64.load(op.offset, 8, address(mod, this.pop())))
					break
				case 'store': {
					const value = this.pop()
					this.statement(mod.i64.store(op.offset, 8, address(mod, this.pop()), value))
					break
				}
				case 'alloc':
					this.callWithResult(mod.call(ALLOC, [this.pop()], binaryen.i64))
					break
				case 'call': {
					const args = this.popMany(op.arity)
					const name = internalName(op.callee)
					if (op.results === 1) this.callWithResult(mod.call(name, args, binaryen.i64))
					else this.statement(mod.call(name, args, binaryen.none))
					break
				}
				case 'host': {
					const cap = getCapability(op.capability)
					const args = this.popMany(paramWords(cap))
					if (cap.result === 'status') this.callWithResult(mod.call(op.capability, args, binaryen.i64))
					else this.statement(mod.call(op.capability, args, binaryen.none))
					break
				}
				case 'trap_if':
					this.statement(mod.if(isTrue(mod, this.pop()), trap(mod, op.code)))
					break
				case 'br_if':
					flag = this.freshLocal()
					this.statement(mod.local.set(flag, this.pop()))
					break
				case 'return':
					this.statement(this.fn.results === 1 ? mod.return(this.pop()) : mod.return())
					break
				case 'drop':
					this.statement(mod.drop(this.pop()))
					break
				case 'unreachable':
					this.statement(mod.unreachable())
					break
				case 'label':
				case 'br':
					throw new Error(`${op.op} inside a segment of ${this.fn.name}`)
				default: {
					const b = this.pop()
					this.push(binaryExpr(mod, op.op, this.pop(), b))
				}
			}
		}
		const code = this.statements.length > 0 ? mod.block(null, this.statements) : mod.nop()
		return { code, flag }
	}

	translate(): Expr {
		const { mod } = this
		const segments = segment(this.fn.code)
		const relooper = new binaryen.Relooper(mod)
		const blocks: RelooperBlock[] = []
		const flags: (number | null)[] = []
		const byLabel = new Map<number, RelooperBlock>()

		for (const seg of segments) {
			const { code, flag } = this.translateSegment(seg)
			const block = relooper.addBlock(code)
			blocks.push(block)
			flags.push(flag)
			if (seg.label !== null) byLabel.set(seg.label, block)
		}

		const target = (label: number): RelooperBlock => {
			const block = byLabel.get(label)
			if (block === undefined) throw new Error(`no label L${label} in ${this.fn.name}`)
			return block
		}

		for (const [i, seg] of segments.entries()) {
			const from = blocks[i]
			const next = blocks[i + 1]
			if (from === undefined) continue
			switch (seg.end.kind) {
				case 'jump':
					relooper.addBranch(from, target(seg.end.label), 0, 0)
					break
				case 'branch': {
					const flag = flags[i]
					if (flag === null || flag === undefined) throw new Error(`branch without a flag in ${this.fn.name}`)
					relooper.addBranch(from, target(seg.end.label), isTrue(mod, mod.local.get(flag, binaryen.i64)), 0)
					if (next !== undefined) relooper.addBranch(from, next, 0, 0)
					break
				}
				case 'fall':
					if (next !== undefined) relooper.addBranch(from, next, 0, 0)
					break
				case 'exit':
					break
			}
		}

		const entry = blocks[0]
		if (entry === undefined) return mod.unreachable()
		const helper = this.freshLocal(binaryen.i32)
		// Every path returns or traps; the trailing unreachable types the body.
		return mod.block(null, [relooper.renderAndDispose(entry, helper), mod.unreachable()])
	}
}

// ============================================================================
// Module
// ============================================================================

function addAllocator(mod: binaryen.Module, memoryBytes: number): void {
	const size = mod.local.get(0, binaryen.i64)
	const start = mod.local.get(1, binaryen.i64)
	const heap = mod.global.get(HEAP, binaryen.i64)
	const body = mod.block(null, [
		mod.local.set(1, heap),
		mod.global.set(
			HEAP,
			mod.i64.and(mod.i64.add(mod.i64.add(start, size), i64Const(mod, 7n)), i64Const(mod, ~7n))
		),
		mod.if(
			mod.i32.or(
				mod.i64.gt_u(size, i64Const(mod, BigInt(memoryBytes))),
				mod.i64.gt_u(mod.global.get(HEAP, binaryen.i64), i64Const(mod, BigInt(memoryBytes)))
			),
			trap(mod, TrapCode.OutOfMemory)
		),
		mod.return(mod.local.get(1, binaryen.i64)),
	])
	mod.addFunction(ALLOC, binaryen.i64, binaryen.i64, [binaryen.i64], body)
}

function addImports(mod: binaryen.Module, imports: readonly CapabilityId[]): void {
	const all = imports.includes(ABORT) ? imports : [...imports, ABORT]
	for (const id of all) {
		const cap = getCapability(id)
		const params = binaryen.createType(new Array<binaryen.Type>(paramWords(cap)).fill(binaryen.i64))
		mod.addFunctionImport(id, importModule(cap), cap.name, params, cap.result === 'status' ? binaryen.i64 : binaryen.none)
	}
}

function addFunction(mod: binaryen.Module, fn: BytecodeFunction): void {
	const translator = new FunctionTranslator(mod, fn)
	const body = translator.translate()
	const params = binaryen.createType(new Array<binaryen.Type>(fn.params).fill(binaryen.i64))
	const locals = [...new Array<binaryen.Type>(fn.locals - fn.params).fill(binaryen.i64), ...translator.extraLocals]
	const name = internalName(fn.name)
	mod.addFunction(name, params, fn.results === 1 ? binaryen.i64 : binaryen.none, locals, body)
	if (fn.exportName !== null) mod.addFunctionExport(name, fn.exportName)
}

/**
 * Emit a WebAssembly module from bytecode. Every word is an i64; memory is
 * exported as `memory` and exports use the mangled names.
 */
export function emitWasm(module: BytecodeModule, options: WasmOptions = {}): WasmResult {
	const mod = new binaryen.Module()
	const { memory } = module
	const memoryBytes = memory.pages * PAGE_BYTES

	mod.setMemory(memory.pages, memory.pages, 'memory', [
		{ data: memory.data, offset: mod.i32.const(memory.dataOffset), passive: false },
	])
	mod.addGlobal(HEAP, binaryen.i64, true, i64Const(mod, BigInt(memory.heapBase)))
	addImports(mod, module.imports)
	addAllocator(mod, memoryBytes)
	for (const fn of module.functions) addFunction(mod, fn)

	if (options.optimize) {
		mod.optimize()
	}

	const valid = mod.validate() === 1
	const binary = mod.emitBinary()
	const text = mod.emitText()
	mod.dispose()
	return { binary, text, valid }
}
