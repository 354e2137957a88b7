/**
 * Reference interpreter for SSA. Executes a function directly against a
 * host, with the same status handling and traps the backend generates.
 */

import { DIGEST_BYTES, isInt, type Type, WORD_BYTES } from '../check/types.ts'
import { namespaceDigest } from '../domains/hash.ts'
import { utf8 } from '../host/encoding.ts'
import type { JournaledHost } from '../host/host.ts'
import { RevertSignal, TrapSignal } from '../host/signals.ts'
import { HostStatus, TrapCode } from '../host/status.ts'
import { evalArith, evalBitwise, evalCmp } from '../runtime/arith.ts'
import type { Outcome } from '../runtime/outcome.ts'
import {
	copyValue,
	decodeValue,
	encodeValue,
	isStructValue,
	type RuntimeValue,
	valuesEqual,
	zeroValue,
} from '../runtime/values.ts'
import {
	type BlockId,
	ENTRY_BLOCK,
	findSsaFunction,
	getBlock,
	type Inst,
	type SsaFunction,
	type SsaModule,
	type ValueId,
	valueType,
} from './ir.ts'

export interface InterpretOptions {
	/** Instructions executed before the run aborts with OutOfGas */
	maxSteps?: number
	maxDepth?: number
}

const EMPTY = new Uint8Array(0)

class Frame {
	private readonly values = new Map<ValueId, RuntimeValue>()

	constructor(readonly fn: SsaFunction) {}

	get(v: ValueId): RuntimeValue {
		const value = this.values.get(v)
		if (value === undefined) throw new Error(`v${v} read before definition in ${this.fn.name}`)
		return value
	}

	int(v: ValueId): bigint {
		const value = this.get(v)
		if (typeof value !== 'bigint') throw new Error(`v${v} is not an integer in ${this.fn.name}`)
		return value
	}

	bool(v: ValueId): boolean {
		const value = this.get(v)
		if (typeof value !== 'boolean') throw new Error(`v${v} is not a bool in ${this.fn.name}`)
		return value
	}

	set(v: ValueId, value: RuntimeValue): void {
		this.values.set(v, value)
	}
}

function bufferCapacity(type: Type): number {
	return type.kind === 'digest' ? DIGEST_BYTES : WORD_BYTES
}

class Interpreter {
	private steps = 0

	constructor(
		private readonly module: SsaModule,
		private readonly host: JournaledHost,
		private readonly maxSteps: number,
		private readonly maxDepth: number
	) {}

	private ns(name: string): Uint8Array {
		return namespaceDigest(this.module.unit, name)
	}

	private check(status: number): void {
		if (status < 0) throw new TrapSignal(TrapCode.HostFailure, status)
	}

	private keyBytes(frame: Frame, key: ValueId | null): Uint8Array {
		return key === null ? EMPTY : encodeValue(frame.get(key))
	}

	call(name: string, args: readonly RuntimeValue[], depth: number): RuntimeValue | null {
		const fn = findSsaFunction(this.module, name)
		if (fn === undefined) throw new Error(`unknown function ${name}`)
		if (depth > this.maxDepth) throw new TrapSignal(TrapCode.OutOfGas)

		const frame = new Frame(fn)
		for (const [i, param] of fn.params.entries()) {
			const arg = args[i]
			if (arg === undefined) throw new Error(`missing argument ${i} for ${name}`)
			frame.set(param, arg)
		}

		let previous: BlockId | null = null
		let current: BlockId = ENTRY_BLOCK
		for (;;) {
			const block = getBlock(fn, current)
			// Phis read their inputs in parallel.
			const incoming = block.phis.map((phi) => {
				const input = phi.incoming.find((i) => i.block === previous)
				if (input === undefined) throw new Error(`phi v${phi.result} has no input from block${previous}`)
				return [phi.result, frame.get(input.value)] as const
			})
			for (const [result, value] of incoming) frame.set(result, value)

			for (const inst of block.insts) {
				if (++this.steps > this.maxSteps) throw new TrapSignal(TrapCode.OutOfGas)
				this.exec(frame, inst, depth)
			}

			const term = block.terminator
			switch (term.kind) {
				case 'br':
					previous = current
					current = term.target
					continue
				case 'cond_br':
					previous = current
					current = frame.bool(term.cond) ? term.then : term.else
					continue
				case 'return':
					return term.value !== null ? frame.get(term.value) : null
				case 'revert':
					throw new RevertSignal(term.message)
				case 'unreachable':
					throw new TrapSignal(TrapCode.Unreachable)
			}
		}
	}

	private exec(frame: Frame, inst: Inst, depth: number): void {
		const { fn } = frame
		switch (inst.kind) {
			case 'const':
				frame.set(inst.result, inst.value.value)
				return
			case 'arith': {
				const type = valueType(fn, inst.result)
				if (!isInt(type)) throw new Error(`arith on ${type.kind}`)
				const fallback = inst.fallback !== null ? frame.int(inst.fallback) : null
				const result = evalArith(type, inst.op, inst.mode, frame.int(inst.lhs), frame.int(inst.rhs), fallback)
				if (!result.ok) throw new TrapSignal(result.trap)
				frame.set(inst.result, result.value)
				return
			}
			case 'bitwise': {
				const type = valueType(fn, inst.result)
				if (!isInt(type)) throw new Error(`bitwise on ${type.kind}`)
				frame.set(inst.result, evalBitwise(type, inst.op, frame.int(inst.lhs), frame.int(inst.rhs)))
				return
			}
			case 'cmp': {
				const lhs = frame.get(inst.lhs)
				const rhs = frame.get(inst.rhs)
				if (typeof lhs === 'bigint' && typeof rhs === 'bigint') {
					frame.set(inst.result, evalCmp(inst.op, lhs, rhs))
					return
				}
				const equal = valuesEqual(lhs, rhs)
				frame.set(inst.result, inst.op === 'eq' ? equal : !equal)
				return
			}
			case 'not':
				frame.set(inst.result, !frame.bool(inst.operand))
				return
			case 'struct_new': {
				const type = valueType(fn, inst.result)
				if (type.kind !== 'struct') throw new Error('struct_new of non-struct type')
				frame.set(inst.result, { fields: inst.fields.map((f) => frame.get(f)), kind: 'struct', type })
				return
			}
			case 'field_get': {
				const base = frame.get(inst.base)
				const field = isStructValue(base) ? base.fields[inst.index] : undefined
				if (field === undefined) throw new Error(`field ${inst.index} read from a non-struct`)
				frame.set(inst.result, field)
				return
			}
			case 'field_set': {
				const base = frame.get(inst.base)
				if (!isStructValue(base)) throw new Error(`field ${inst.index} written on a non-struct`)
				base.fields[inst.index] = frame.get(inst.value)
				return
			}
			case 'copy':
				frame.set(inst.result, copyValue(frame.get(inst.source)))
				return
			case 'call': {
				const result = this.call(
					inst.callee,
					inst.args.map((a) => frame.get(a)),
					depth + 1
				)
				if (inst.result !== null) {
					if (result === null) throw new Error(`${inst.callee} returned no value`)
					frame.set(inst.result, result)
				}
				return
			}
			case 'state_read': {
				const type = valueType(fn, inst.result)
				const { data, status } = this.host.stateRead(this.ns(inst.namespace), this.keyBytes(frame, inst.key))
				if (status === HostStatus.NotFound) {
					frame.set(inst.result, zeroValue(type))
					return
				}
				this.check(status)
				if (data.length > bufferCapacity(type)) throw new TrapSignal(TrapCode.HostFailure, HostStatus.BufferTooSmall)
				frame.set(inst.result, decodeValue(type, data))
				return
			}
			case 'state_write':
				this.check(
					this.host.stateWrite(
						this.ns(inst.namespace),
						this.keyBytes(frame, inst.key),
						encodeValue(frame.get(inst.value))
					)
				)
				return
			case 'state_exists': {
				const status = this.host.stateExists(this.ns(inst.namespace), this.keyBytes(frame, inst.key))
				if (status !== HostStatus.NotFound) this.check(status)
				frame.set(inst.result, status >= 0)
				return
			}
			case 'context': {
				const type = valueType(fn, inst.result)
				const { data, status } = this.host.context(inst.query)
				this.check(status)
				if (data.length > bufferCapacity(type)) throw new TrapSignal(TrapCode.HostFailure, HostStatus.BufferTooSmall)
				frame.set(inst.result, decodeValue(type, data))
				return
			}
			case 'hash': {
				const { data, status } = this.host.sha256(encodeValue(frame.get(inst.input)))
				this.check(status)
				frame.set(inst.result, decodeValue(valueType(fn, inst.result), data))
				return
			}
			case 'emit_log':
				this.check(this.host.emitLog(utf8(inst.topic), encodeValue(frame.get(inst.value))))
				return
		}
	}
}

/**
 * Run `name` with `args` as one transaction: effects are committed when it
 * returns and rolled back when it reverts or aborts.
 */
export function interpret(
	module: SsaModule,
	name: string,
	args: readonly RuntimeValue[],
	host: JournaledHost,
	options: InterpretOptions = {}
): Outcome {
	const interpreter = new Interpreter(module, host, options.maxSteps ?? 1_000_000, options.maxDepth ?? 200)
	host.begin()
	try {
		const value = interpreter.call(name, args, 0)
		host.commit()
		return { kind: 'returned', value }
	} catch (error) {
		host.rollback()
		if (error instanceof RevertSignal) return { kind: 'reverted', message: error.reason }
		if (error instanceof TrapSignal) return { kind: 'aborted', status: error.status, trap: error.trap }
		throw error
	}
}
