/**
 * SSA to stack code for one function.
 *
 * Blocks are laid out in reverse post-order behind a label each, and a
 * branch to the next block in the layout is omitted. Within a block, runs
 * of instructions whose results stay on the stack are emitted as one chain:
 * the leading operands of every later link are pushed first, innermost
 * last, so each link finds its operands on top of the stack.
 */

import { type IntType, type StructType, type Type, UNIT, WORD_BYTES } from '../check/types.ts'
import { buildCfg, splitCriticalEdges } from '../ssa/cfg.ts'
import {
	type BasicBlock,
	type BlockId,
	type ConstValue,
	findSsaFunction,
	getBlock,
	type Inst,
	instOperands,
	instResult,
	type SsaFunction,
	type SsaModule,
	type Terminator,
	type ValueId,
	valueType,
} from '../ssa/ir.ts'
import { loopDepths } from '../ssa/loops.ts'
import { CodeBuffer } from './emitter.ts'
import type { BytecodeFunction } from './isa.ts'
import { type DataLayout, packString } from './layout.ts'
import {
	type HostSite,
	lowerContext,
	lowerEmitLog,
	lowerHash,
	lowerRevert,
	lowerStateExists,
	lowerStateRead,
	lowerStateWrite,
} from './marshal.ts'
import { lowerArith, lowerBitwise, lowerCmp } from './safety.ts'
import { assignSlots, type SlotAssignment } from './slots.ts'

interface Move {
	readonly dst: number
	/** Source local, or null for a constant */
	src: number | null
	readonly value: ValueId
}

function resultCount(type: Type): 0 | 1 {
	return type.kind === 'unit' ? 0 : 1
}

class FunctionLowering {
	private readonly e: CodeBuffer
	private readonly site: HostSite

	constructor(
		private readonly module: SsaModule,
		private readonly fn: SsaFunction,
		private readonly slots: SlotAssignment,
		private readonly layout: DataLayout
	) {
		this.e = new CodeBuffer(slots.slotCount)
		this.site = { e: this.e, layout, unit: module.unit }
	}

	get code(): CodeBuffer {
		return this.e
	}

	private constWord(value: ConstValue): bigint {
		switch (value.kind) {
			case 'int':
				return value.value
			case 'bool':
				return value.value ? 1n : 0n
			case 'string': {
				const ref = this.layout.string(value.value)
				return packString(ref.address, ref.length)
			}
		}
	}

	private push(v: ValueId): void {
		const value = this.slots.constants.get(v)
		if (value !== undefined) {
			this.e.constant(this.constWord(value))
			return
		}
		const slot = this.slots.slots.get(v)
		if (slot === undefined) throw new Error(`v${v} has no local in ${this.fn.name}`)
		this.e.get(slot)
	}

	/** Push an operand unless it is already on the stack. */
	private operand(v: ValueId): void {
		if (!this.slots.transient.has(v)) this.push(v)
	}

	lowerBlocks(): void {
		const order = buildCfg(this.fn).order
		for (const [i, id] of order.entries()) {
			this.e.op({ id, op: 'label' })
			this.lowerBlock(getBlock(this.fn, id), order[i + 1])
		}
	}

	private lowerBlock(block: BasicBlock, next: BlockId | undefined): void {
		let start = 0
		for (const [i, inst] of block.insts.entries()) {
			const result = instResult(inst)
			if (result !== null && this.slots.transient.has(result) && i + 1 < block.insts.length) continue
			this.lowerChain(block.insts.slice(start, i + 1))
			start = i + 1
		}
		this.lowerTerminator(block, next)
		this.e.releaseTemps()
	}

	private lowerChain(chain: readonly Inst[]): void {
		for (let j = chain.length - 1; j >= 1; j--) {
			const link = chain[j]
			if (link === undefined) continue
			for (const v of instOperands(link).slice(0, -1)) this.push(v)
		}
		const head = chain[0]
		if (head === undefined) return
		for (const v of instOperands(head)) this.push(v)

		for (const inst of chain) {
			this.lowerInst(inst)
			this.e.releaseTemps()
		}

		const last = chain[chain.length - 1]
		const result = last !== undefined ? instResult(last) : null
		if (result === null || this.slots.constants.has(result) || this.slots.transient.has(result)) return
		const slot = this.slots.slots.get(result)
		if (slot !== undefined) this.e.set(slot)
		else this.e.drop()
	}

	private intType(v: ValueId): IntType {
		const type = valueType(this.fn, v)
		if (type.kind !== 'int') throw new Error(`v${v} is not an integer in ${this.fn.name}`)
		return type
	}

	private lowerInst(inst: Inst): void {
		const { e, fn, site } = this
		switch (inst.kind) {
			case 'const':
				return
			case 'arith':
				lowerArith(e, this.intType(inst.result), inst.op, inst.mode)
				return
			case 'bitwise':
				lowerBitwise(e, this.intType(inst.result), inst.op)
				return
			case 'cmp':
				lowerCmp(e, valueType(fn, inst.lhs), inst.op)
				return
			case 'not':
				e.eqz()
				return
			case 'struct_new': {
				const fields = inst.fields.map(() => e.spill()).reverse()
				e.constant(BigInt(fields.length * WORD_BYTES))
				e.alloc()
				const target = e.spill()
				for (const [i, field] of fields.entries()) {
					e.get(target)
					e.get(field)
					e.store(i * WORD_BYTES)
				}
				e.get(target)
				return
			}
			case 'field_get':
				e.load(inst.index * WORD_BYTES)
				return
			case 'field_set':
				e.store(inst.index * WORD_BYTES)
				return
			case 'copy': {
				const type = valueType(fn, inst.source)
				if (type.kind === 'struct') this.copyStruct(type)
				return
			}
			case 'call': {
				const callee = findSsaFunction(this.module, inst.callee)
				const results = resultCount(callee?.returnType ?? UNIT)
				e.op({ arity: inst.args.length, callee: inst.callee, op: 'call', results })
				if (results === 1 && inst.result === null) e.drop()
				return
			}
			case 'state_read':
				lowerStateRead(
					site,
					inst.namespace,
					inst.key !== null ? valueType(fn, inst.key) : null,
					valueType(fn, inst.result)
				)
				return
			case 'state_write':
				lowerStateWrite(
					site,
					inst.namespace,
					inst.key !== null ? valueType(fn, inst.key) : null,
					valueType(fn, inst.value)
				)
				return
			case 'state_exists':
				lowerStateExists(site, inst.namespace, valueType(fn, inst.key))
				return
			case 'context':
				lowerContext(site, inst.query, valueType(fn, inst.result))
				return
			case 'hash':
				lowerHash(site, valueType(fn, inst.input))
				return
			case 'emit_log':
				lowerEmitLog(site, inst.topic, valueType(fn, inst.value))
				return
		}
	}

	/** Stack in: a struct's address. Stack out: the address of a deep copy. */
	private copyStruct(type: StructType): void {
		const { e } = this
		const source = e.spill()
		e.constant(BigInt(type.fields.length * WORD_BYTES))
		e.alloc()
		const target = e.spill()
		for (const [i, field] of type.fields.entries()) {
			e.get(target)
			e.get(source)
			e.load(i * WORD_BYTES)
			if (field.type.kind === 'struct') this.copyStruct(field.type)
			e.store(i * WORD_BYTES)
		}
		e.get(target)
	}

	private lowerTerminator(block: BasicBlock, next: BlockId | undefined): void {
		const { e } = this
		const term: Terminator = block.terminator
		switch (term.kind) {
			case 'br':
				this.phiCopies(block.id, term.target)
				if (term.target !== next) e.op({ label: term.target, op: 'br' })
				return
			case 'cond_br':
				if (getBlock(this.fn, term.then).phis.length > 0 || getBlock(this.fn, term.else).phis.length > 0) {
					throw new Error(`critical edge out of block${block.id} in ${this.fn.name}`)
				}
				this.operand(term.cond)
				if (term.then === next) {
					e.eqz()
					e.op({ label: term.else, op: 'br_if' })
					return
				}
				e.op({ label: term.then, op: 'br_if' })
				if (term.else !== next) e.op({ label: term.else, op: 'br' })
				return
			case 'return':
				if (term.value !== null) this.operand(term.value)
				e.op({ op: 'return' })
				return
			case 'revert':
				lowerRevert(this.site, term.message)
				return
			case 'unreachable':
				e.op({ op: 'unreachable' })
				return
		}
	}

	/**
	 * Copy the inputs of `to`'s phis as one parallel move. A cycle is broken
	 * by saving one destination to a scratch local first.
	 */
	private phiCopies(from: BlockId, to: BlockId): void {
		const { e } = this
		const moves: Move[] = []
		for (const phi of getBlock(this.fn, to).phis) {
			const dst = this.slots.slots.get(phi.result)
			const input = phi.incoming.find((i) => i.block === from)
			if (dst === undefined || input === undefined) continue
			const src = this.slots.constants.has(input.value) ? null : (this.slots.slots.get(input.value) ?? null)
			if (src === dst) continue
			moves.push({ dst, src, value: input.value })
		}

		while (moves.length > 0) {
			const ready = moves.findIndex((m) => !moves.some((o) => o !== m && o.src === m.dst))
			if (ready === -1) {
				const blocked = moves[0]
				if (blocked === undefined) break
				const saved = e.temp()
				e.get(blocked.dst)
				e.set(saved)
				for (const m of moves) if (m.src === blocked.dst) m.src = saved
				continue
			}
			const [move] = moves.splice(ready, 1)
			if (move === undefined) break
			if (move.src === null) this.push(move.value)
			else e.get(move.src)
			e.set(move.dst)
		}
	}
}

/**
 * Lower one function. Splits critical edges in place so phi copies have an
 * edge of their own.
 */
export function lowerFunction(
	module: SsaModule,
	fn: SsaFunction,
	layout: DataLayout,
	exportName: string | null
): BytecodeFunction {
	splitCriticalEdges(fn)
	const cfg = buildCfg(fn)
	const slots = assignSlots(fn, cfg)
	const lowering = new FunctionLowering(module, fn, slots, layout)
	lowering.lowerBlocks()

	const depths = loopDepths(fn, cfg)
	const loopDepth = fn.blocks.map((b) => depths.get(b.id) ?? 0)
	return {
		code: lowering.code.code,
		exportName,
		locals: slots.slotCount + lowering.code.tempCount,
		loopDepth,
		name: fn.name,
		params: fn.params.length,
		results: resultCount(fn.returnType),
		signature: { params: fn.params.map((p) => valueType(fn, p)), result: fn.returnType },
	}
}
