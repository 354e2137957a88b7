/**
 * The host side of the capability boundary, at the level of bytes.
 *
 * Runtimes adapt guest memory to these calls through `bindings.ts`; the SSA
 * interpreter calls them directly.
 */

import type { ContextQuery } from '../hir/hir.ts'

export interface HostReadResult {
	readonly status: number
	readonly data: Uint8Array
}

export interface Host {
	stateRead(namespace: Uint8Array, key: Uint8Array): HostReadResult
	stateWrite(namespace: Uint8Array, key: Uint8Array, value: Uint8Array): number
	/** `Ok` when present, `NotFound` when absent */
	stateExists(namespace: Uint8Array, key: Uint8Array): number
	context(query: ContextQuery): HostReadResult
	sha256(input: Uint8Array): HostReadResult
	emitLog(topic: Uint8Array, data: Uint8Array): number
}

/** Effects of an execution are kept only when it commits. */
export interface Journal {
	begin(): void
	commit(): void
	rollback(): void
}

export type JournaledHost = Host & Journal
