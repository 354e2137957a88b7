/**
 * SSA IR: typed virtual registers in basic blocks with explicit terminators
 * and phi merges.
 *
 * Values live in a per-function arena indexed by ValueId; blocks in an array
 * indexed by BlockId. Every value is produced by exactly one instruction,
 * phi or parameter.
 */

import type { Type } from '../check/types.ts'
import type { Span } from '../core/span.ts'
import type { AstAnnotation } from '../front/ast.ts'
import type { ArithOp, BitOp, CmpOp, ContextQuery, StorageNamespace } from '../hir/hir.ts'

export type { ArithOp, BitOp, CmpOp, ContextQuery } from '../hir/hir.ts'

export type ValueId = number & { readonly __brand: 'ValueId' }
export type BlockId = number & { readonly __brand: 'BlockId' }

export function valueId(n: number): ValueId {
	return n as ValueId
}

export function blockId(n: number): BlockId {
	return n as BlockId
}

/**
 * Overflow behaviour of an arithmetic instruction. `checked` is the default
 * for surface operators and aborts on overflow; the others never abort on
 * overflow and compute their defined result inline.
 */
export type ArithMode = 'checked' | 'wrapping' | 'saturating' | 'fallback'

export type ConstValue =
	| { readonly kind: 'int'; readonly value: bigint }
	| { readonly kind: 'bool'; readonly value: boolean }
	| { readonly kind: 'string'; readonly value: string }

interface InstBase {
	readonly span: Span
}

export type Inst =
	| (InstBase & { readonly kind: 'const'; readonly result: ValueId; readonly value: ConstValue })
	| (InstBase & {
			readonly kind: 'arith'
			readonly result: ValueId
			readonly op: ArithOp
			readonly mode: ArithMode
			readonly lhs: ValueId
			readonly rhs: ValueId
			/** Result when the operation overflows or divides by zero (mode `fallback`) */
			readonly fallback: ValueId | null
	  })
	| (InstBase & { readonly kind: 'bitwise'; readonly result: ValueId; readonly op: BitOp; readonly lhs: ValueId; readonly rhs: ValueId })
	| (InstBase & { readonly kind: 'cmp'; readonly result: ValueId; readonly op: CmpOp; readonly lhs: ValueId; readonly rhs: ValueId })
	| (InstBase & { readonly kind: 'not'; readonly result: ValueId; readonly operand: ValueId })
	| (InstBase & { readonly kind: 'struct_new'; readonly result: ValueId; readonly fields: readonly ValueId[] })
	| (InstBase & { readonly kind: 'field_get'; readonly result: ValueId; readonly base: ValueId; readonly index: number })
	| (InstBase & { readonly kind: 'field_set'; readonly base: ValueId; readonly index: number; readonly value: ValueId })
	/** Deep copy of a copy-struct value */
	| (InstBase & { readonly kind: 'copy'; readonly result: ValueId; readonly source: ValueId })
	| (InstBase & {
			readonly kind: 'call'
			readonly result: ValueId | null
			readonly callee: string
			readonly args: readonly ValueId[]
	  })
	| (InstBase & { readonly kind: 'state_read'; readonly result: ValueId; readonly namespace: string; readonly key: ValueId | null })
	| (InstBase & {
			readonly kind: 'state_write'
			readonly namespace: string
			readonly key: ValueId | null
			readonly value: ValueId
	  })
	| (InstBase & { readonly kind: 'state_exists'; readonly result: ValueId; readonly namespace: string; readonly key: ValueId })
	| (InstBase & { readonly kind: 'context'; readonly result: ValueId; readonly query: ContextQuery })
	| (InstBase & { readonly kind: 'hash'; readonly result: ValueId; readonly input: ValueId })
	| (InstBase & { readonly kind: 'emit_log'; readonly topic: string; readonly value: ValueId })

export type InstKind = Inst['kind']

export type Terminator =
	| (InstBase & { readonly kind: 'br'; readonly target: BlockId })
	| (InstBase & { readonly kind: 'cond_br'; readonly cond: ValueId; readonly then: BlockId; readonly else: BlockId })
	| (InstBase & { readonly kind: 'return'; readonly value: ValueId | null })
	| (InstBase & { readonly kind: 'revert'; readonly message: string })
	| (InstBase & { readonly kind: 'unreachable' })

export interface PhiIncoming {
	readonly block: BlockId
	readonly value: ValueId
}

export interface Phi {
	readonly result: ValueId
	incoming: PhiIncoming[]
}

export interface BasicBlock {
	readonly id: BlockId
	phis: Phi[]
	insts: Inst[]
	terminator: Terminator
}

export interface ValueInfo {
	readonly type: Type
	readonly span: Span
}

export interface SsaFunction {
	readonly name: string
	readonly pub: boolean
	readonly params: readonly ValueId[]
	readonly returnType: Type
	/** Indexed by BlockId; block 0 is the entry */
	blocks: BasicBlock[]
	/** Indexed by ValueId */
	readonly values: ValueInfo[]
	readonly annotations: readonly AstAnnotation[]
	readonly span: Span
}

export interface SsaModule {
	readonly unit: string
	readonly storage: ReadonlyMap<string, StorageNamespace>
	readonly functions: SsaFunction[]
}

export const ENTRY_BLOCK: BlockId = blockId(0)

// ============================================================================
// Accessors
// ============================================================================

export function getBlock(fn: SsaFunction, id: BlockId): BasicBlock {
	const block = fn.blocks[id]
	if (block === undefined) throw new Error(`Invalid BlockId ${id} in ${fn.name}`)
	return block
}

export function valueType(fn: SsaFunction, id: ValueId): Type {
	const info = fn.values[id]
	if (info === undefined) throw new Error(`Invalid ValueId ${id} in ${fn.name}`)
	return info.type
}

export function findSsaFunction(module: SsaModule, name: string): SsaFunction | undefined {
	return module.functions.find((f) => f.name === name)
}

export function instResult(inst: Inst): ValueId | null {
	switch (inst.kind) {
		case 'field_set':
		case 'state_write':
		case 'emit_log':
			return null
		default:
			return inst.result
	}
}

/** Operands in evaluation order. */
export function instOperands(inst: Inst): ValueId[] {
	switch (inst.kind) {
		case 'const':
		case 'context':
			return []
		case 'arith':
			return inst.fallback !== null ? [inst.lhs, inst.rhs, inst.fallback] : [inst.lhs, inst.rhs]
		case 'bitwise':
		case 'cmp':
			return [inst.lhs, inst.rhs]
		case 'not':
			return [inst.operand]
		case 'struct_new':
			return [...inst.fields]
		case 'field_get':
			return [inst.base]
		case 'field_set':
			return [inst.base, inst.value]
		case 'copy':
			return [inst.source]
		case 'call':
			return [...inst.args]
		case 'state_read':
			return inst.key !== null ? [inst.key] : []
		case 'state_write':
			return inst.key !== null ? [inst.key, inst.value] : [inst.value]
		case 'state_exists':
			return [inst.key]
		case 'hash':
			return [inst.input]
		case 'emit_log':
			return [inst.value]
	}
}

/** Rewrite every operand of an instruction through `map`. */
export function mapOperands(inst: Inst, map: (v: ValueId) => ValueId): Inst {
	switch (inst.kind) {
		case 'const':
		case 'context':
			return inst
		case 'arith':
			return {
				...inst,
				fallback: inst.fallback !== null ? map(inst.fallback) : null,
				lhs: map(inst.lhs),
				rhs: map(inst.rhs),
			}
		case 'bitwise':
		case 'cmp':
			return { ...inst, lhs: map(inst.lhs), rhs: map(inst.rhs) }
		case 'not':
			return { ...inst, operand: map(inst.operand) }
		case 'struct_new':
			return { ...inst, fields: inst.fields.map(map) }
		case 'field_get':
			return { ...inst, base: map(inst.base) }
		case 'field_set':
			return { ...inst, base: map(inst.base), value: map(inst.value) }
		case 'copy':
			return { ...inst, source: map(inst.source) }
		case 'call':
			return { ...inst, args: inst.args.map(map) }
		case 'state_read':
			return { ...inst, key: inst.key !== null ? map(inst.key) : null }
		case 'state_write':
			return { ...inst, key: inst.key !== null ? map(inst.key) : null, value: map(inst.value) }
		case 'state_exists':
			return { ...inst, key: map(inst.key) }
		case 'hash':
			return { ...inst, input: map(inst.input) }
		case 'emit_log':
			return { ...inst, value: map(inst.value) }
	}
}

export function terminatorOperands(term: Terminator): ValueId[] {
	if (term.kind === 'cond_br') return [term.cond]
	if (term.kind === 'return' && term.value !== null) return [term.value]
	return []
}

export function mapTerminatorOperands(term: Terminator, map: (v: ValueId) => ValueId): Terminator {
	if (term.kind === 'cond_br') return { ...term, cond: map(term.cond) }
	if (term.kind === 'return' && term.value !== null) return { ...term, value: map(term.value) }
	return term
}

export function successors(term: Terminator): BlockId[] {
	if (term.kind === 'br') return [term.target]
	if (term.kind === 'cond_br') return term.then === term.else ? [term.then] : [term.then, term.else]
	return []
}

/** Rewrite every branch target through `map`. */
export function mapSuccessors(term: Terminator, map: (b: BlockId) => BlockId): Terminator {
	if (term.kind === 'br') return { ...term, target: map(term.target) }
	if (term.kind === 'cond_br') return { ...term, else: map(term.else), then: map(term.then) }
	return term
}

/** Redirect every edge to `from` so it targets `to`. */
export function retarget(term: Terminator, from: BlockId, to: BlockId): Terminator {
	return mapSuccessors(term, (b) => (b === from ? to : b))
}

/**
 * Instructions that may be removed when their result is unused. Checked
 * arithmetic can abort and divisions can trap, so they stay.
 */
export function isPure(inst: Inst): boolean {
	switch (inst.kind) {
		case 'const':
		case 'bitwise':
		case 'cmp':
		case 'not':
		case 'struct_new':
		case 'field_get':
		case 'copy':
			return true
		case 'arith':
			if (inst.mode === 'checked') return false
			return inst.mode === 'fallback' || (inst.op !== 'div' && inst.op !== 'rem')
		default:
			return false
	}
}

