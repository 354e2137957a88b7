/**
 * The host capability table.
 *
 * Code generation reads this table to marshal arguments and interpret
 * status codes; adding a capability is a change to this data only. Every
 * argument is one or two 64-bit words; addresses point into the guest's
 * linear memory and are bounds-checked by the host.
 */

/**
 * - `hash`: address of a 32-byte buffer (1 word)
 * - `buffer`: input bytes as address and length (2 words)
 * - `out`: output buffer as address and capacity (2 words)
 * - `word`: a plain integer (1 word)
 */
export type ArgShape = 'hash' | 'buffer' | 'out' | 'word'

/**
 * What generated code does with the returned status.
 * - `abort_on_error`: any negative status aborts
 * - `not_found_is_zero`: `NotFound` yields the zero value, other errors abort
 * - `not_found_is_false`: `NotFound` yields false, other errors abort
 * - `never_returns`: the call ends execution
 */
export type StatusPolicy = 'abort_on_error' | 'not_found_is_zero' | 'not_found_is_false' | 'never_returns'

export interface CapabilityDef {
	readonly module: string
	readonly version: number
	readonly name: string
	readonly params: readonly ArgShape[]
	/** `status` returns one signed word */
	readonly result: 'status' | 'none'
	readonly statusPolicy: StatusPolicy
	/** Gas charged per call, on top of the instruction cost */
	readonly gas: number
}

export const HOST_CAPABILITIES = {
	'context.block_height': {
		gas: 20,
		module: 'context',
		name: 'block_height',
		params: ['out'],
		result: 'status',
		statusPolicy: 'abort_on_error',
		version: 1,
	},
	'context.call_value': {
		gas: 20,
		module: 'context',
		name: 'call_value',
		params: ['out'],
		result: 'status',
		statusPolicy: 'abort_on_error',
		version: 1,
	},
	'context.caller': {
		gas: 20,
		module: 'context',
		name: 'caller',
		params: ['out'],
		result: 'status',
		statusPolicy: 'abort_on_error',
		version: 1,
	},
	'control.abort': {
		gas: 0,
		module: 'control',
		name: 'abort',
		params: ['word'],
		result: 'none',
		statusPolicy: 'never_returns',
		version: 1,
	},
	'control.revert': {
		gas: 0,
		module: 'control',
		name: 'revert',
		params: ['buffer'],
		result: 'none',
		statusPolicy: 'never_returns',
		version: 1,
	},
	'crypto.sha256': {
		gas: 60,
		module: 'crypto',
		name: 'sha256',
		params: ['buffer', 'hash'],
		result: 'status',
		statusPolicy: 'abort_on_error',
		version: 1,
	},
	'log.emit': {
		gas: 100,
		module: 'log',
		name: 'emit',
		params: ['buffer', 'buffer'],
		result: 'status',
		statusPolicy: 'abort_on_error',
		version: 1,
	},
	'state.exists': {
		gas: 150,
		module: 'state',
		name: 'exists',
		params: ['hash', 'buffer'],
		result: 'status',
		statusPolicy: 'not_found_is_false',
		version: 1,
	},
	'state.read': {
		gas: 200,
		module: 'state',
		name: 'read',
		params: ['hash', 'buffer', 'out'],
		result: 'status',
		statusPolicy: 'not_found_is_zero',
		version: 1,
	},
	'state.write': {
		gas: 500,
		module: 'state',
		name: 'write',
		params: ['hash', 'buffer', 'buffer'],
		result: 'status',
		statusPolicy: 'abort_on_error',
		version: 1,
	},
} as const satisfies Record<string, CapabilityDef>

export type CapabilityId = keyof typeof HOST_CAPABILITIES

export const CAPABILITY_IDS: readonly CapabilityId[] = [
	'state.read',
	'state.write',
	'state.exists',
	'context.caller',
	'context.block_height',
	'context.call_value',
	'crypto.sha256',
	'log.emit',
	'control.revert',
	'control.abort',
]

export function getCapability(id: CapabilityId): CapabilityDef {
	return HOST_CAPABILITIES[id]
}

/** Import module name, e.g. `state@1`. */
export function importModule(cap: CapabilityDef): string {
	return `${cap.module}@${cap.version}`
}

export function shapeWords(shape: ArgShape): number {
	return shape === 'buffer' || shape === 'out' ? 2 : 1
}

/** Number of 64-bit words the call takes. */
export function paramWords(cap: CapabilityDef): number {
	return cap.params.reduce((n, shape) => n + shapeWords(shape), 0)
}
