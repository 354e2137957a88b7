/**
 * Thrown when a whole compilation unit cannot proceed (syntax or resolution
 * errors). Per-function failures in later stages are reported as diagnostics.
 */
export class CompileError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'CompileError'
	}
}
