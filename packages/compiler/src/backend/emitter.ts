/**
 * Append-only op buffer with instruction-local scratch locals.
 */

import type { TrapCode } from '../host/status.ts'
import type { BinOp, Op } from './isa.ts'

export class CodeBuffer {
	readonly code: Op[] = []
	private live = 0
	private peak = 0

	/** Scratch locals are numbered from `tempBase` */
	constructor(readonly tempBase: number) {}

	/** Scratch locals used at once, at most */
	get tempCount(): number {
		return this.peak
	}

	op(op: Op): void {
		this.code.push(op)
	}

	/** Push a word; negative values are stored as their two's complement. */
	constant(value: bigint): void {
		this.code.push({ op: 'const', value: BigInt.asUintN(64, value) })
	}

	get(index: number): void {
		this.code.push({ index, op: 'local.get' })
	}

	set(index: number): void {
		this.code.push({ index, op: 'local.set' })
	}

	bin(op: BinOp): void {
		this.code.push({ op })
	}

	eqz(): void {
		this.code.push({ op: 'eqz' })
	}

	select(): void {
		this.code.push({ op: 'select' })
	}

	load(offset = 0): void {
		this.code.push({ offset, op: 'load' })
	}

	store(offset = 0): void {
		this.code.push({ offset, op: 'store' })
	}

	/** Pops a byte size; pushes the address of zeroed heap memory. */
	alloc(): void {
		this.code.push({ op: 'alloc' })
	}

	trapIf(code: TrapCode): void {
		this.code.push({ code, op: 'trap_if' })
	}

	drop(): void {
		this.code.push({ op: 'drop' })
	}

	/** A scratch local, valid until the next `releaseTemps`. */
	temp(): number {
		const index = this.tempBase + this.live
		this.live++
		this.peak = Math.max(this.peak, this.live)
		return index
	}

	/** Pop the top of the stack into a fresh scratch local. */
	spill(): number {
		const index = this.temp()
		this.set(index)
		return index
	}

	releaseTemps(): void {
		this.live = 0
	}
}
