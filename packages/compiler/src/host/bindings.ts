/**
 * Guest-facing host functions: decode word arguments against the capability
 * table, bounds-check every address, call the byte-level host and write
 * outputs back into guest memory.
 */

import { DIGEST_BYTES } from '../check/types.ts'
import type { ContextQuery } from '../hir/hir.ts'
import { type ArgShape, type CapabilityId, getCapability } from './capabilities.ts'
import { fromUtf8 } from './encoding.ts'
import type { Host, HostReadResult } from './host.ts'
import { RevertSignal, TrapSignal } from './signals.ts'
import { HostStatus, isTrapCode, TrapCode } from './status.ts'

export interface LinearMemory {
	readonly size: number
	read(address: number, length: number): Uint8Array
	write(address: number, bytes: Uint8Array): void
}

interface DecodedArg {
	readonly shape: ArgShape
	readonly address: number
	readonly length: number
	readonly bytes: Uint8Array
	readonly word: bigint
}

/** Returns the status word, or null for capabilities without a result. */
export type HostFunction = (args: readonly bigint[]) => bigint | null

export type HostBindings = Record<CapabilityId, HostFunction>

class InvalidArgument extends Error {}

const ADDRESS_LIMIT = 2n ** 32n

function toAddress(word: bigint): number {
	if (word < 0n || word >= ADDRESS_LIMIT) throw new InvalidArgument(`address ${word} out of range`)
	return Number(word)
}

function decodeArgs(memory: LinearMemory, shapes: readonly ArgShape[], words: readonly bigint[]): DecodedArg[] {
	const decoded: DecodedArg[] = []
	let cursor = 0
	const next = (): bigint => {
		const word = words[cursor++]
		if (word === undefined) throw new InvalidArgument('missing argument')
		return word
	}
	const region = (address: number, length: number): void => {
		if (address + length > memory.size) throw new InvalidArgument(`region ${address}+${length} out of bounds`)
	}

	for (const shape of shapes) {
		if (shape === 'word') {
			decoded.push({ address: 0, bytes: new Uint8Array(0), length: 0, shape, word: next() })
			continue
		}
		const address = toAddress(next())
		const length = shape === 'hash' ? DIGEST_BYTES : toAddress(next())
		region(address, length)
		const bytes = shape === 'out' ? new Uint8Array(0) : memory.read(address, length)
		decoded.push({ address, bytes, length, shape, word: 0n })
	}
	return decoded
}

function arg(args: readonly DecodedArg[], index: number): DecodedArg {
	const decoded = args[index]
	if (decoded === undefined) throw new InvalidArgument(`missing argument ${index}`)
	return decoded
}

/** Copy a read result into an `out` buffer; the status is the size written. */
function deliver(memory: LinearMemory, out: DecodedArg, result: HostReadResult): number {
	if (result.status < 0) return result.status
	if (result.data.length > out.length) return HostStatus.BufferTooSmall
	memory.write(out.address, result.data)
	return result.data.length
}

export function createHostBindings(host: Host, memory: () => LinearMemory): HostBindings {
	const bind = (id: CapabilityId, run: (args: DecodedArg[], mem: LinearMemory) => number | null): HostFunction => {
		const cap = getCapability(id)
		return (words) => {
			const mem = memory()
			let args: DecodedArg[]
			try {
				args = decodeArgs(mem, cap.params, words)
			} catch (error) {
				if (!(error instanceof InvalidArgument)) throw error
				if (cap.result === 'none') throw new TrapSignal(TrapCode.HostFailure, HostStatus.InvalidArgument)
				return BigInt(HostStatus.InvalidArgument)
			}
			const status = run(args, mem)
			return status === null ? null : BigInt(status)
		}
	}

	const context = (query: ContextQuery): HostFunction =>
		bind(`context.${query}` as const, (args, mem) => deliver(mem, arg(args, 0), host.context(query)))

	return {
		'context.block_height': context('block_height'),
		'context.call_value': context('call_value'),
		'context.caller': context('caller'),
		'control.abort': bind('control.abort', (args) => {
			const code = Number(arg(args, 0).word)
			throw new TrapSignal(isTrapCode(code) ? code : TrapCode.Unreachable)
		}),
		'control.revert': bind('control.revert', (args) => {
			throw new RevertSignal(fromUtf8(arg(args, 0).bytes))
		}),
		'crypto.sha256': bind('crypto.sha256', (args, mem) => {
			const result = host.sha256(arg(args, 0).bytes)
			if (result.status < 0) return result.status
			mem.write(arg(args, 1).address, result.data.subarray(0, DIGEST_BYTES))
			return HostStatus.Ok
		}),
		'log.emit': bind('log.emit', (args) => host.emitLog(arg(args, 0).bytes, arg(args, 1).bytes)),
		'state.exists': bind('state.exists', (args) => host.stateExists(arg(args, 0).bytes, arg(args, 1).bytes)),
		'state.read': bind('state.read', (args, mem) =>
			deliver(mem, arg(args, 2), host.stateRead(arg(args, 0).bytes, arg(args, 1).bytes))
		),
		'state.write': bind('state.write', (args) =>
			host.stateWrite(arg(args, 0).bytes, arg(args, 1).bytes, arg(args, 2).bytes)
		),
	}
}
