/**
 * Per-binding state tracked by the ownership checker.
 */

import type { Span } from '../core/span.ts'
import type { BindingId } from '../hir/hir.ts'

export type Ownership =
	| { readonly kind: 'owned' }
	| { readonly kind: 'moved'; readonly at: Span }
	/** Moved on at least one incoming path of a join */
	| { readonly kind: 'maybe_moved'; readonly at: Span }

/**
 * Borrow state of a binding. `shared` never coexists with `exclusive`:
 * the state is a single value, not a set.
 */
export type BorrowState =
	| { readonly kind: 'unborrowed' }
	| { readonly kind: 'shared'; readonly count: number; readonly at: Span }
	| { readonly kind: 'exclusive'; readonly at: Span }

export interface BindingState {
	readonly ownership: Ownership
	readonly borrow: BorrowState
}

export const OWNED: Ownership = { kind: 'owned' }
export const UNBORROWED: BorrowState = { kind: 'unborrowed' }

/**
 * Flow state: binding states at one program point. Copied at branches and
 * merged at joins.
 */
export class FlowState {
	private readonly states: Map<BindingId, BindingState>

	constructor(states: Map<BindingId, BindingState> = new Map()) {
		this.states = states
	}

	get(id: BindingId): BindingState {
		return this.states.get(id) ?? { borrow: UNBORROWED, ownership: OWNED }
	}

	set(id: BindingId, state: BindingState): void {
		this.states.set(id, state)
	}

	setOwnership(id: BindingId, ownership: Ownership): void {
		this.set(id, { ...this.get(id), ownership })
	}

	setBorrow(id: BindingId, borrow: BorrowState): void {
		this.set(id, { ...this.get(id), borrow })
	}

	clone(): FlowState {
		return new FlowState(new Map(this.states))
	}

	/**
	 * Join two incoming paths. The more restrictive ownership wins: moved on
	 * both stays moved, moved on one becomes maybe-moved.
	 */
	static merge(a: FlowState, b: FlowState): FlowState {
		const merged = new FlowState()
		const ids = new Set([...a.states.keys(), ...b.states.keys()])
		for (const id of ids) {
			const left = a.get(id)
			const right = b.get(id)
			merged.set(id, { borrow: UNBORROWED, ownership: mergeOwnership(left.ownership, right.ownership) })
		}
		return merged
	}
}

function mergeOwnership(a: Ownership, b: Ownership): Ownership {
	if (a.kind === 'owned' && b.kind === 'owned') return OWNED
	if (a.kind === 'moved' && b.kind === 'moved') return a
	const moved = a.kind !== 'owned' ? a : b
	if (moved.kind === 'owned') return OWNED
	return { at: moved.at, kind: 'maybe_moved' }
}
