/**
 * Host call marshalling, driven by the capability table.
 *
 * Arguments are pushed word by word in the table's parameter order; the
 * returned status is kept in a scratch local and checked against the
 * capability's status policy. Word-sized values cross the boundary through
 * the fixed scratch words; digests and strings are passed in place.
 */

import { DIGEST_BYTES, type Type, WORD_BYTES } from '../check/types.ts'
import { namespaceDigest } from '../domains/hash.ts'
import { type CapabilityDef, type CapabilityId, getCapability, shapeWords } from '../host/capabilities.ts'
import { HostStatus, TrapCode } from '../host/status.ts'
import type { ContextQuery } from '../ssa/ir.ts'
import type { CodeBuffer } from './emitter.ts'
import type { DataLayout } from './layout.ts'
import { SCRATCH } from './layout.ts'
import { normalize } from './safety.ts'

/** Pushes one argument word. */
type WordSource = () => void

export interface HostSite {
	readonly e: CodeBuffer
	readonly layout: DataLayout
	readonly unit: string
}

const CONTEXT_CAPABILITY: Record<ContextQuery, CapabilityId> = {
	block_height: 'context.block_height',
	call_value: 'context.call_value',
	caller: 'context.caller',
}

function applyStatusPolicy(e: CodeBuffer, cap: CapabilityDef): number | null {
	switch (cap.statusPolicy) {
		case 'never_returns':
			e.op({ op: 'unreachable' })
			return null
		case 'abort_on_error': {
			const status = e.spill()
			e.get(status)
			e.constant(0n)
			e.bin('lt_s')
			e.trapIf(TrapCode.HostFailure)
			return status
		}
		case 'not_found_is_zero':
		case 'not_found_is_false': {
			const status = e.spill()
			e.get(status)
			e.constant(0n)
			e.bin('lt_s')
			e.get(status)
			e.constant(BigInt(HostStatus.NotFound))
			e.bin('ne')
			e.bin('and')
			e.trapIf(TrapCode.HostFailure)
			return status
		}
	}
}

/**
 * Push every argument, call, and apply the status policy. Returns the local
 * holding the status, or null when the capability does not return.
 */
export function callHost(e: CodeBuffer, id: CapabilityId, args: readonly (readonly WordSource[])[]): number | null {
	const cap = getCapability(id)
	if (args.length !== cap.params.length) {
		throw new Error(`${id} takes ${cap.params.length} arguments, got ${args.length}`)
	}
	for (const [i, shape] of cap.params.entries()) {
		const words = args[i] ?? []
		if (words.length !== shapeWords(shape)) throw new Error(`${id} argument ${i} is not a ${shape}`)
		for (const push of words) push()
	}
	e.op({ capability: id, op: 'host' })
	return applyStatusPolicy(e, cap)
}

function constant(e: CodeBuffer, value: number): WordSource {
	return () => e.constant(BigInt(value))
}

/** Pushes 1 when the status in `status` is not an error. */
function succeeded(e: CodeBuffer, status: number): void {
	e.get(status)
	e.constant(0n)
	e.bin('ge_s')
}

/**
 * The bytes of the value in local `local` as a (pointer, length) buffer.
 * Word values are first stored to `scratch`.
 */
function valueBuffer(e: CodeBuffer, type: Type, local: number, scratch: number): WordSource[] {
	switch (type.kind) {
		case 'int':
		case 'bool':
			e.constant(BigInt(scratch))
			e.get(local)
			e.store()
			return [constant(e, scratch), constant(e, WORD_BYTES)]
		case 'string':
			return [
				() => {
					e.get(local)
					e.constant(0xffffffffn)
					e.bin('and')
				},
				() => {
					e.get(local)
					e.constant(32n)
					e.bin('shr_u')
				},
			]
		case 'digest':
			return [() => e.get(local), constant(e, DIGEST_BYTES)]
		default:
			throw new Error(`${type.kind} cannot cross the host boundary`)
	}
}

function keyBuffer(e: CodeBuffer, keyType: Type | null, key: number | null): WordSource[] {
	if (keyType === null || key === null) return [constant(e, 0), constant(e, 0)]
	return valueBuffer(e, keyType, key, SCRATCH.key)
}

interface OutBuffer {
	readonly words: WordSource[]
	/** Pushes the received value */
	readonly result: () => void
}

/** Destination for a value the host writes back. */
function outBuffer(e: CodeBuffer, type: Type): OutBuffer {
	if (type.kind === 'digest') {
		e.constant(BigInt(DIGEST_BYTES))
		e.alloc()
		const digest = e.spill()
		return { result: () => e.get(digest), words: [() => e.get(digest), constant(e, DIGEST_BYTES)] }
	}
	// Shorter results leave the rest of the word zero.
	e.constant(BigInt(SCRATCH.out))
	e.constant(0n)
	e.store()
	return {
		result: () => {
			e.constant(BigInt(SCRATCH.out))
			e.load()
			normalize(e, type)
		},
		words: [constant(e, SCRATCH.out), constant(e, WORD_BYTES)],
	}
}

function namespace(site: HostSite, name: string): WordSource {
	return constant(site.e, site.layout.digest(namespaceDigest(site.unit, name)))
}

/** Stack in: the key, if any. Stack out: the stored value or its zero value. */
export function lowerStateRead(site: HostSite, name: string, keyType: Type | null, type: Type): void {
	const { e } = site
	const key = keyType !== null ? e.spill() : null
	const keyWords = keyBuffer(e, keyType, key)
	const out = outBuffer(e, type)
	const status = callHost(e, 'state.read', [[namespace(site, name)], keyWords, out.words])
	if (status === null) return
	out.result()
	if (type.kind === 'digest') e.constant(BigInt(site.layout.zeroDigest()))
	else e.constant(0n)
	succeeded(e, status)
	e.select()
}

/** Stack in: the key, if any, then the value. */
export function lowerStateWrite(site: HostSite, name: string, keyType: Type | null, type: Type): void {
	const { e } = site
	const value = e.spill()
	const key = keyType !== null ? e.spill() : null
	const keyWords = keyBuffer(e, keyType, key)
	const valueWords = valueBuffer(e, type, value, SCRATCH.value)
	callHost(e, 'state.write', [[namespace(site, name)], keyWords, valueWords])
}

/** Stack in: the key. Stack out: 1 when present. */
export function lowerStateExists(site: HostSite, name: string, keyType: Type): void {
	const { e } = site
	const key = e.spill()
	const keyWords = keyBuffer(e, keyType, key)
	const status = callHost(e, 'state.exists', [[namespace(site, name)], keyWords])
	if (status !== null) succeeded(e, status)
}

export function lowerContext(site: HostSite, query: ContextQuery, type: Type): void {
	const out = outBuffer(site.e, type)
	const status = callHost(site.e, CONTEXT_CAPABILITY[query], [out.words])
	if (status !== null) out.result()
}

/** Stack in: the input. Stack out: the digest's address. */
export function lowerHash(site: HostSite, inputType: Type): void {
	const { e } = site
	const input = e.spill()
	const inputWords = valueBuffer(e, inputType, input, SCRATCH.value)
	e.constant(BigInt(DIGEST_BYTES))
	e.alloc()
	const digest = e.spill()
	const status = callHost(e, 'crypto.sha256', [inputWords, [() => e.get(digest)]])
	if (status !== null) e.get(digest)
}

/** Stack in: the value. */
export function lowerEmitLog(site: HostSite, topic: string, type: Type): void {
	const { e } = site
	const value = e.spill()
	const topicRef = site.layout.string(topic)
	const valueWords = valueBuffer(e, type, value, SCRATCH.value)
	callHost(e, 'log.emit', [[constant(e, topicRef.address), constant(e, topicRef.length)], valueWords])
}

export function lowerRevert(site: HostSite, message: string): void {
	const ref = site.layout.string(message)
	callHost(site.e, 'control.revert', [[constant(site.e, ref.address), constant(site.e, ref.length)]])
}
