/**
 * Bytecode virtual machine.
 *
 * Frames live on an explicit stack, so guest recursion never grows the JS
 * call stack. Every op is charged from the gas schedule before it runs.
 */

import { DIGEST_BYTES, type Type, WORD_BYTES } from '../check/types.ts'
import { opGas } from '../backend/gas.ts'
import {
	type BinOp,
	type BytecodeFunction,
	type BytecodeModule,
	findBytecodeFunction,
	type MemoryLayout,
	PAGE_BYTES,
} from '../backend/isa.ts'
import { alignWord, packString, unpackString } from '../backend/layout.ts'
import { createHostBindings, type HostBindings, type LinearMemory } from '../host/bindings.ts'
import { getCapability, paramWords } from '../host/capabilities.ts'
import { fromUtf8, utf8 } from '../host/encoding.ts'
import type { JournaledHost } from '../host/host.ts'
import { RevertSignal, TrapSignal } from '../host/signals.ts'
import { TrapCode } from '../host/status.ts'
import type { ExecutionResult } from './outcome.ts'
import { fromWord, isStructValue, type RuntimeValue, toWord } from './values.ts'

export interface VmOptions {
	/** Gas budget; exhausting it aborts with OutOfGas */
	gas?: number
	maxDepth?: number
}

const MIN_I64 = -(1n << 63n)

function signed(word: bigint): bigint {
	return BigInt.asIntN(64, word)
}

function word(value: bigint): bigint {
	return BigInt.asUintN(64, value)
}

function flag(condition: boolean): bigint {
	return condition ? 1n : 0n
}

export function binary(op: BinOp, a: bigint, b: bigint): bigint {
	switch (op) {
		case 'add':
			return word(a + b)
		case 'sub':
			return word(a - b)
		case 'mul':
			return word(a * b)
		case 'div_s':
			if (b === 0n) throw new TrapSignal(TrapCode.DivideByZero)
			if (signed(a) === MIN_I64 && signed(b) === -1n) throw new TrapSignal(TrapCode.Overflow)
			return word(signed(a) / signed(b))
		case 'div_u':
			if (b === 0n) throw new TrapSignal(TrapCode.DivideByZero)
			return a / b
		case 'rem_s':
			if (b === 0n) throw new TrapSignal(TrapCode.DivideByZero)
			return word(signed(a) % signed(b))
		case 'rem_u':
			if (b === 0n) throw new TrapSignal(TrapCode.DivideByZero)
			return a % b
		case 'and':
			return a & b
		case 'or':
			return a | b
		case 'xor':
			return a ^ b
		case 'shl':
			return word(a << (b & 63n))
		case 'shr_s':
			return word(signed(a) >> (b & 63n))
		case 'shr_u':
			return a >> (b & 63n)
		case 'eq':
			return flag(a === b)
		case 'ne':
			return flag(a !== b)
		case 'lt_s':
			return flag(signed(a) < signed(b))
		case 'lt_u':
			return flag(a < b)
		case 'le_s':
			return flag(signed(a) <= signed(b))
		case 'le_u':
			return flag(a <= b)
		case 'gt_s':
			return flag(signed(a) > signed(b))
		case 'gt_u':
			return flag(a > b)
		case 'ge_s':
			return flag(signed(a) >= signed(b))
		case 'ge_u':
			return flag(a >= b)
	}
}

/** Zero-initialized linear memory with a bump allocator. */
export class VmMemory implements LinearMemory {
	private readonly bytes: Uint8Array
	private readonly view: DataView
	private heap: number

	constructor(layout: MemoryLayout) {
		this.bytes = new Uint8Array(layout.pages * PAGE_BYTES)
		this.view = new DataView(this.bytes.buffer)
		this.bytes.set(layout.data, layout.dataOffset)
		this.heap = layout.heapBase
	}

	get size(): number {
		return this.bytes.length
	}

	private check(address: number, length: number): void {
		if (address < 0 || address + length > this.bytes.length) throw new TrapSignal(TrapCode.OutOfMemory)
	}

	read(address: number, length: number): Uint8Array {
		this.check(address, length)
		return this.bytes.slice(address, address + length)
	}

	write(address: number, bytes: Uint8Array): void {
		this.check(address, bytes.length)
		this.bytes.set(bytes, address)
	}

	loadWord(address: bigint): bigint {
		const at = Number(address)
		this.check(at, WORD_BYTES)
		return this.view.getBigUint64(at, true)
	}

	storeWord(address: bigint, value: bigint): void {
		const at = Number(address)
		this.check(at, WORD_BYTES)
		this.view.setBigUint64(at, value, true)
	}

	alloc(size: bigint): number {
		const address = this.heap
		const end = alignWord(address + Number(size))
		if (size > BigInt(this.bytes.length) || end > this.bytes.length) throw new TrapSignal(TrapCode.OutOfMemory)
		this.heap = end
		return address
	}

	/** Place a value given from outside the module and return its word. */
	encode(type: Type, value: RuntimeValue): bigint {
		switch (type.kind) {
			case 'string': {
				if (typeof value !== 'string') break
				const bytes = utf8(value)
				const address = this.alloc(BigInt(bytes.length))
				this.write(address, bytes)
				return packString(address, bytes.length)
			}
			case 'digest': {
				if (!(value instanceof Uint8Array)) break
				const address = this.alloc(BigInt(DIGEST_BYTES))
				this.write(address, value.subarray(0, DIGEST_BYTES))
				return BigInt(address)
			}
			case 'struct': {
				if (!isStructValue(value)) break
				const words = type.fields.map((f, i) => {
					const field = value.fields[i]
					if (field === undefined) throw new Error(`${type.name}.${f.name} is missing`)
					return this.encode(f.type, field)
				})
				const address = BigInt(this.alloc(BigInt(words.length * WORD_BYTES)))
				for (const [i, w] of words.entries()) this.storeWord(address + BigInt(i * WORD_BYTES), w)
				return address
			}
			default:
				return toWord(type, value)
		}
		throw new Error(`value does not match type ${type.kind}`)
	}

	/** Read back a value of `type` from its word. */
	decode(type: Type, w: bigint): RuntimeValue {
		switch (type.kind) {
			case 'string': {
				const { address, length } = unpackString(w)
				return fromUtf8(this.read(address, length))
			}
			case 'digest':
				return this.read(Number(w), DIGEST_BYTES)
			case 'struct':
				return {
					fields: type.fields.map((f, i) => this.decode(f.type, this.loadWord(w + BigInt(i * WORD_BYTES)))),
					kind: 'struct',
					type,
				}
			default:
				return fromWord(type, w)
		}
	}
}

interface Frame {
	readonly fn: BytecodeFunction
	readonly locals: bigint[]
	pc: number
}

const labelCache = new WeakMap<BytecodeFunction, Map<number, number>>()

function labelsOf(fn: BytecodeFunction): Map<number, number> {
	let labels = labelCache.get(fn)
	if (labels === undefined) {
		labels = new Map()
		for (const [i, op] of fn.code.entries()) if (op.op === 'label') labels.set(op.id, i)
		labelCache.set(fn, labels)
	}
	return labels
}

class Machine {
	private readonly stack: bigint[] = []
	private readonly frames: Frame[] = []
	private readonly bindings: HostBindings
	gasUsed = 0

	constructor(
		private readonly module: BytecodeModule,
		readonly memory: VmMemory,
		host: JournaledHost,
		private readonly gasLimit: number,
		private readonly maxDepth: number
	) {
		this.bindings = createHostBindings(host, () => memory)
	}

	private pop(): bigint {
		const value = this.stack.pop()
		if (value === undefined) throw new Error('operand stack underflow')
		return value
	}

	private popMany(count: number): bigint[] {
		if (this.stack.length < count) throw new Error('operand stack underflow')
		return this.stack.splice(this.stack.length - count, count)
	}

	private enter(fn: BytecodeFunction, args: readonly bigint[]): void {
		if (this.frames.length > this.maxDepth) throw new TrapSignal(TrapCode.OutOfGas)
		const locals = new Array<bigint>(fn.locals).fill(0n)
		for (const [i, arg] of args.entries()) locals[i] = arg
		this.frames.push({ fn, locals, pc: 0 })
	}

	private jump(frame: Frame, label: number): void {
		const target = labelsOf(frame.fn).get(label)
		if (target === undefined) throw new Error(`no label L${label} in ${frame.fn.name}`)
		frame.pc = target
	}

	run(entry: BytecodeFunction, args: readonly bigint[]): bigint | null {
		this.enter(entry, args)
		for (;;) {
			const frame = this.frames[this.frames.length - 1]
			if (frame === undefined) throw new Error('no active frame')
			const op = frame.fn.code[frame.pc++]
			if (op === undefined) throw new Error(`${frame.fn.name} ran past its last op`)

			this.gasUsed += opGas(op)
			if (this.gasUsed > this.gasLimit) throw new TrapSignal(TrapCode.OutOfGas)

			switch (op.op) {
				case 'const':
					this.stack.push(op.value)
					break
				case 'local.get':
					this.stack.push(frame.locals[op.index] ?? 0n)
					break
				case 'local.set':
					frame.locals[op.index] = this.pop()
					break
				case 'eqz':
					this.stack.push(flag(this.pop() === 0n))
					break
				case 'select': {
					const c = this.pop()
					const b = this.pop()
					const a = this.pop()
					this.stack.push(c !== 0n ? a : b)
					break
				}
				case 'load':
					this.stack.push(this.memory.loadWord(this.pop() + BigInt(op.offset)))
					break
				case 'store': {
					const value = this.pop()
					this.memory.storeWord(this.pop() + BigInt(op.offset), value)
					break
				}
				case 'alloc':
					this.stack.push(BigInt(this.memory.alloc(this.pop())))
					break
				case 'call': {
					const callee = findBytecodeFunction(this.module, op.callee)
					if (callee === undefined) throw new Error(`unknown function ${op.callee}`)
					this.enter(callee, this.popMany(op.arity))
					break
				}
				case 'host': {
					const cap = getCapability(op.capability)
					const status = this.bindings[op.capability](this.popMany(paramWords(cap)))
					if (status !== null) this.stack.push(word(status))
					break
				}
				case 'trap_if':
					if (this.pop() !== 0n) throw new TrapSignal(op.code)
					break
				case 'label':
					break
				case 'br':
					this.jump(frame, op.label)
					break
				case 'br_if':
					if (this.pop() !== 0n) this.jump(frame, op.label)
					break
				case 'return': {
					const result = frame.fn.results === 1 ? this.pop() : null
					this.frames.pop()
					if (this.frames.length === 0) return result
					if (result !== null) this.stack.push(result)
					break
				}
				case 'drop':
					this.pop()
					break
				case 'unreachable':
					throw new TrapSignal(TrapCode.Unreachable)
				default:
					this.stack.push(binary(op.op, ...this.binaryOperands()))
			}
		}
	}

	private binaryOperands(): [bigint, bigint] {
		const b = this.pop()
		return [this.pop(), b]
	}
}

/**
 * Run exported or internal function `name` as one transaction. Arguments
 * and the result are source-level values; aggregates are copied in and out
 * of linear memory.
 */
export function execute(
	module: BytecodeModule,
	name: string,
	args: readonly RuntimeValue[],
	host: JournaledHost,
	options: VmOptions = {}
): ExecutionResult {
	const fn = findBytecodeFunction(module, name)
	if (fn === undefined) throw new Error(`unknown function ${name}`)
	if (args.length !== fn.signature.params.length) {
		throw new Error(`${name} takes ${fn.signature.params.length} arguments, got ${args.length}`)
	}
	const gasLimit = options.gas ?? 10_000_000
	const memory = new VmMemory(module.memory)
	const machine = new Machine(module, memory, host, gasLimit, options.maxDepth ?? 200)

	host.begin()
	try {
		const words = fn.signature.params.map((type, i) => memory.encode(type, args[i] ?? 0n))
		const result = machine.run(fn, words)
		const value = result !== null ? memory.decode(fn.signature.result, result) : null
		host.commit()
		return { gasUsed: machine.gasUsed, outcome: { kind: 'returned', value } }
	} catch (error) {
		host.rollback()
		if (error instanceof RevertSignal) {
			return { gasUsed: machine.gasUsed, outcome: { kind: 'reverted', message: error.reason } }
		}
		if (error instanceof TrapSignal) {
			return { gasUsed: gasLimit, outcome: { kind: 'aborted', status: error.status, trap: error.trap } }
		}
		throw error
	}
}
