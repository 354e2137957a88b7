/**
 * In-process host with journaled state, for tests, the CLI and tooling.
 */

import { DIGEST_BYTES } from '../check/types.ts'
import { sha256, toHex } from '../domains/hash.ts'
import type { ContextQuery } from '../hir/hir.ts'
import type { CapabilityId } from './capabilities.ts'
import { fromUtf8, wordToBytes } from './encoding.ts'
import type { HostReadResult, JournaledHost } from './host.ts'
import { HostStatus } from './status.ts'

export interface HostContext {
	readonly caller: Uint8Array
	readonly blockHeight: bigint
	readonly callValue: bigint
}

export interface LogEntry {
	readonly topic: string
	readonly data: Uint8Array
}

export interface MemoryHostOptions {
	context?: Partial<HostContext>
	/** Largest value accepted by `state.write` */
	maxValueBytes?: number
	/** Statuses to return instead of running the capability */
	faults?: Partial<Record<CapabilityId, number>>
}

const EMPTY = new Uint8Array(0)

const CONTEXT_CAPABILITY: Record<ContextQuery, CapabilityId> = {
	block_height: 'context.block_height',
	call_value: 'context.call_value',
	caller: 'context.caller',
}

function entryKey(namespace: Uint8Array, key: Uint8Array): string {
	return `${toHex(namespace)}:${toHex(key)}`
}

export class MemoryHost implements JournaledHost {
	private state = new Map<string, Uint8Array>()
	private logs: LogEntry[] = []
	private checkpoint: { state: Map<string, Uint8Array>; logs: number } | null = null

	readonly env: HostContext
	private readonly maxValueBytes: number
	readonly faults: Partial<Record<CapabilityId, number>>

	constructor(options: MemoryHostOptions = {}) {
		this.env = {
			blockHeight: options.context?.blockHeight ?? 1n,
			callValue: options.context?.callValue ?? 0n,
			caller: options.context?.caller ?? new Uint8Array(DIGEST_BYTES).fill(0x11),
		}
		this.maxValueBytes = options.maxValueBytes ?? 4096
		this.faults = options.faults ?? {}
	}

	// ==========================================================================
	// Journal
	// ==========================================================================

	/** Start an execution; effects are kept only if it commits. */
	begin(): void {
		this.checkpoint = { logs: this.logs.length, state: new Map(this.state) }
	}

	commit(): void {
		this.checkpoint = null
	}

	rollback(): void {
		if (this.checkpoint === null) return
		this.state = this.checkpoint.state
		this.logs = this.logs.slice(0, this.checkpoint.logs)
		this.checkpoint = null
	}

	// ==========================================================================
	// Capabilities
	// ==========================================================================

	stateRead(namespace: Uint8Array, key: Uint8Array): HostReadResult {
		const fault = this.faults['state.read']
		if (fault !== undefined) return { data: EMPTY, status: fault }
		const value = this.state.get(entryKey(namespace, key))
		if (value === undefined) return { data: EMPTY, status: HostStatus.NotFound }
		return { data: value, status: value.length }
	}

	stateWrite(namespace: Uint8Array, key: Uint8Array, value: Uint8Array): number {
		const fault = this.faults['state.write']
		if (fault !== undefined) return fault
		if (value.length > this.maxValueBytes) return HostStatus.LimitExceeded
		this.state.set(entryKey(namespace, key), value.slice())
		return HostStatus.Ok
	}

	stateExists(namespace: Uint8Array, key: Uint8Array): number {
		const fault = this.faults['state.exists']
		if (fault !== undefined) return fault
		return this.state.has(entryKey(namespace, key)) ? HostStatus.Ok : HostStatus.NotFound
	}

	context(query: ContextQuery): HostReadResult {
		const fault = this.faults[CONTEXT_CAPABILITY[query]]
		if (fault !== undefined) return { data: EMPTY, status: fault }
		const data =
			query === 'caller'
				? this.env.caller
				: wordToBytes(query === 'block_height' ? this.env.blockHeight : this.env.callValue)
		return { data, status: data.length }
	}

	sha256(input: Uint8Array): HostReadResult {
		const fault = this.faults['crypto.sha256']
		if (fault !== undefined) return { data: EMPTY, status: fault }
		return { data: sha256(input), status: HostStatus.Ok }
	}

	emitLog(topic: Uint8Array, data: Uint8Array): number {
		const fault = this.faults['log.emit']
		if (fault !== undefined) return fault
		this.logs.push({ data: data.slice(), topic: fromUtf8(topic) })
		return HostStatus.Ok
	}

	// ==========================================================================
	// Inspection
	// ==========================================================================

	/** Stored entries as `[<ns hex>:<key hex>, <value hex>]`, sorted by key. */
	snapshot(): [string, string][] {
		return [...this.state.entries()]
			.map(([key, value]): [string, string] => [key, toHex(value)])
			.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
	}

	getLogs(): readonly LogEntry[] {
		return this.logs
	}

	/** Raw value of an entry, for assertions. */
	peek(namespace: Uint8Array, key: Uint8Array): Uint8Array | undefined {
		return this.state.get(entryKey(namespace, key))
	}

	poke(namespace: Uint8Array, key: Uint8Array, value: Uint8Array): void {
		this.state.set(entryKey(namespace, key), value.slice())
	}
}
