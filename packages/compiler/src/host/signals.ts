/**
 * Non-local exits raised inside host calls and caught by the runtime that
 * drives execution. They never escape a runtime's public API.
 */

import type { TrapCode } from './status.ts'

export class RevertSignal extends Error {
	constructor(readonly reason: string) {
		super(`reverted: ${reason}`)
		this.name = 'RevertSignal'
	}
}

export class TrapSignal extends Error {
	constructor(
		readonly trap: TrapCode,
		/** Host status that caused the abort, when there was one */
		readonly status: number | null = null
	) {
		super(`aborted with trap ${trap}`)
		this.name = 'TrapSignal'
	}
}
