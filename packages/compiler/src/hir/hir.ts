/**
 * High-level IR: the resolved, typed form of a compilation unit.
 *
 * HIR keeps source spans and raw annotation text. The ownership checker
 * writes resolved access kinds onto `use` nodes and drop lists onto blocks;
 * nothing else mutates it after resolution.
 */

import type { AstAnnotation, ParamMode } from '../front/ast.ts'
import type { Span } from '../core/span.ts'
import type { StructType, Type } from '../check/types.ts'

/**
 * Branded binding identity, unique within a unit.
 */
export type BindingId = number & { readonly __brand: 'BindingId' }

export function bindingId(n: number): BindingId {
	return n as BindingId
}

/**
 * Capability tag of a binding. Internal only; never part of the surface.
 */
export const Capability = {
	Exclusive: 'exclusive',
	Owned: 'owned',
	Shared: 'shared',
} as const

export type Capability = (typeof Capability)[keyof typeof Capability]

/**
 * How a use site touches its binding, resolved by the ownership checker.
 */
export const AccessKind = {
	Copy: 'copy',
	Exclusive: 'exclusive',
	Move: 'move',
	Shared: 'shared',
} as const

export type AccessKind = (typeof AccessKind)[keyof typeof AccessKind]

export interface Binding {
	readonly id: BindingId
	readonly name: string
	readonly type: Type
	/** `var` locals; `mut` params of scalar type */
	readonly mutable: boolean
	readonly capability: Capability
	readonly isParam: boolean
	readonly span: Span
}

export interface StorageNamespace {
	readonly name: string
	/** Null for scalar namespaces */
	readonly keyType: Type | null
	readonly valueType: Type
	readonly span: Span
}

export type ArithOp = 'add' | 'sub' | 'mul' | 'div' | 'rem'
export type BitOp = 'and' | 'or' | 'xor' | 'shl' | 'shr'
export type CmpOp = 'eq' | 'ne' | 'lt' | 'le' | 'gt' | 'ge'
export type ContextQuery = 'caller' | 'block_height' | 'call_value'
/** Overflow behaviour of the explicit arithmetic builtins */
export type BuiltinArithMode = 'wrapping' | 'saturating' | 'fallback'

interface ExprBase {
	readonly type: Type
	readonly span: Span
}

export interface UseExpr extends ExprBase {
	readonly kind: 'use'
	readonly binding: BindingId
	readonly name: string
	/** Written by the ownership checker */
	access: AccessKind
}

export type HirExpr =
	| (ExprBase & { readonly kind: 'int'; readonly value: bigint })
	| (ExprBase & { readonly kind: 'bool'; readonly value: boolean })
	| (ExprBase & { readonly kind: 'string'; readonly value: string })
	| UseExpr
	| (ExprBase & { readonly kind: 'field'; readonly base: HirExpr; readonly index: number; readonly name: string })
	| (ExprBase & { readonly kind: 'struct'; readonly struct: StructType; readonly fields: readonly HirExpr[] })
	| (ExprBase & { readonly kind: 'arith'; readonly op: ArithOp; readonly lhs: HirExpr; readonly rhs: HirExpr })
	| (ExprBase & {
			readonly kind: 'builtin_arith'
			readonly op: ArithOp
			readonly mode: BuiltinArithMode
			readonly lhs: HirExpr
			readonly rhs: HirExpr
			readonly fallback: HirExpr | null
	  })
	| (ExprBase & { readonly kind: 'bitwise'; readonly op: BitOp; readonly lhs: HirExpr; readonly rhs: HirExpr })
	| (ExprBase & { readonly kind: 'cmp'; readonly op: CmpOp; readonly lhs: HirExpr; readonly rhs: HirExpr })
	| (ExprBase & { readonly kind: 'logical'; readonly op: 'and' | 'or'; readonly lhs: HirExpr; readonly rhs: HirExpr })
	| (ExprBase & { readonly kind: 'not'; readonly operand: HirExpr })
	| (ExprBase & { readonly kind: 'call'; readonly callee: string; readonly args: readonly HirExpr[] })
	| (ExprBase & { readonly kind: 'storage_read'; readonly namespace: string; readonly key: HirExpr | null })
	| (ExprBase & { readonly kind: 'storage_exists'; readonly namespace: string; readonly key: HirExpr })
	| (ExprBase & { readonly kind: 'context'; readonly query: ContextQuery })
	| (ExprBase & { readonly kind: 'hash'; readonly input: HirExpr })

export type HirExprKind = HirExpr['kind']

/**
 * An assignable location rooted at a binding: `x`, `x.a`, `x.a.b`.
 */
export interface HirPlace {
	readonly root: UseExpr
	/** Field indices from the root, outermost first */
	readonly path: readonly number[]
	readonly type: Type
	readonly span: Span
}

export type HirStmt =
	| { readonly kind: 'let'; readonly binding: Binding; readonly init: HirExpr; readonly span: Span }
	| { readonly kind: 'assign'; readonly place: HirPlace; readonly value: HirExpr; readonly span: Span }
	| {
			readonly kind: 'storage_write'
			readonly namespace: string
			readonly key: HirExpr | null
			readonly value: HirExpr
			readonly span: Span
	  }
	| { readonly kind: 'expr'; readonly expr: HirExpr; readonly span: Span }
	| { readonly kind: 'if'; readonly cond: HirExpr; readonly then: HirBlock; readonly else: HirBlock | null; readonly span: Span }
	| { readonly kind: 'while'; readonly cond: HirExpr; readonly body: HirBlock; readonly span: Span }
	| { readonly kind: 'return'; readonly value: HirExpr | null; readonly span: Span }
	| { readonly kind: 'revert'; readonly message: string; readonly span: Span }
	| { readonly kind: 'emit'; readonly topic: string; readonly value: HirExpr; readonly span: Span }

export interface HirBlock {
	readonly stmts: readonly HirStmt[]
	readonly span: Span
	/** Move-typed bindings still owned when the block ends, in declaration order */
	drops: BindingId[]
}

export interface HirParam {
	readonly binding: Binding
	readonly mode: ParamMode
}

export interface HirFunction {
	readonly name: string
	readonly pub: boolean
	readonly params: readonly HirParam[]
	readonly returnType: Type
	readonly body: HirBlock
	/** Raw `#[...]` text, interpreted later by the domain analyzer */
	readonly annotations: readonly AstAnnotation[]
	readonly span: Span
}

export interface HirUnit {
	readonly name: string
	readonly storage: ReadonlyMap<string, StorageNamespace>
	readonly structs: ReadonlyMap<string, StructType>
	readonly functions: readonly HirFunction[]
	/** Arena indexed by BindingId */
	readonly bindings: readonly Binding[]
}

export function getBinding(unit: HirUnit, id: BindingId): Binding {
	const binding = unit.bindings[id]
	if (binding === undefined) throw new Error(`Invalid BindingId: ${id}`)
	return binding
}

export function findFunction(unit: HirUnit, name: string): HirFunction | undefined {
	return unit.functions.find((f) => f.name === name)
}
