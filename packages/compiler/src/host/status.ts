/**
 * Status codes returned across the host boundary, and the trap codes the
 * generated code aborts with.
 */

/**
 * Zero is success; read-style calls return the available size as a positive
 * value; negative values are errors.
 */
export const HostStatus = {
	BufferTooSmall: -3,
	InternalError: -6,
	InvalidArgument: -2,
	LimitExceeded: -4,
	NotFound: -1,
	Ok: 0,
	OutOfResource: -5,
} as const

export type HostStatus = (typeof HostStatus)[keyof typeof HostStatus]

export function statusName(status: number): string {
	for (const [name, code] of Object.entries(HostStatus)) if (code === status) return name
	return status > 0 ? 'Size' : 'Unknown'
}

/** Why generated code aborted. Passed to `control.abort`. */
export const TrapCode = {
	DivideByZero: 2,
	HostFailure: 4,
	OutOfGas: 5,
	OutOfMemory: 6,
	Overflow: 1,
	Unreachable: 3,
} as const

export type TrapCode = (typeof TrapCode)[keyof typeof TrapCode]

export function trapName(code: number): string {
	for (const [name, value] of Object.entries(TrapCode)) if (value === code) return name
	return `Trap${code}`
}

export function isTrapCode(code: number): code is TrapCode {
	return Object.values<number>(TrapCode).includes(code)
}
