import type { TrapCode } from '../host/status.ts'
import type { RuntimeValue } from './values.ts'

/**
 * How an execution ended. Aborts and reverts both discard state effects;
 * an abort also consumes the whole gas budget.
 */
export type Outcome =
	| { readonly kind: 'returned'; readonly value: RuntimeValue | null }
	| { readonly kind: 'reverted'; readonly message: string }
	| { readonly kind: 'aborted'; readonly trap: TrapCode; readonly status: number | null }

export interface ExecutionResult {
	readonly outcome: Outcome
	readonly gasUsed: number
}
