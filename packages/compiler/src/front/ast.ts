/**
 * Untyped syntax tree produced by the reference front end.
 * The resolver turns it into typed HIR.
 */

import type { Span } from '../core/span.ts'

export interface AstTypeRef {
	readonly name: string
	readonly span: Span
}

export interface AstStorageField {
	readonly name: string
	/** Present for keyed namespaces (`map<K, V>`) */
	readonly keyType: AstTypeRef | null
	readonly valueType: AstTypeRef
	readonly span: Span
}

export interface AstFieldDecl {
	readonly name: string
	readonly type: AstTypeRef
	readonly span: Span
}

export interface AstStruct {
	readonly kind: 'struct'
	readonly name: string
	readonly copy: boolean
	readonly fields: readonly AstFieldDecl[]
	readonly span: Span
}

export interface AstStorage {
	readonly kind: 'storage'
	readonly fields: readonly AstStorageField[]
	readonly span: Span
}

export type ParamMode = 'value' | 'ref' | 'mut'

export interface AstParam {
	readonly name: string
	readonly mode: ParamMode
	readonly type: AstTypeRef
	readonly span: Span
}

export interface AstAnnotation {
	/** Raw text between `#[` and `]` */
	readonly text: string
	readonly span: Span
}

export interface AstFunction {
	readonly kind: 'fn'
	readonly name: string
	readonly pub: boolean
	readonly annotations: readonly AstAnnotation[]
	readonly params: readonly AstParam[]
	readonly returnType: AstTypeRef | null
	readonly body: AstBlock
	readonly span: Span
}

export type AstItem = AstStruct | AstStorage | AstFunction

export interface AstUnit {
	readonly name: string
	readonly items: readonly AstItem[]
	readonly span: Span
}

export interface AstBlock {
	readonly stmts: readonly AstStmt[]
	readonly span: Span
}

export type AstStmt =
	| { readonly kind: 'let'; readonly mutable: boolean; readonly name: string; readonly type: AstTypeRef | null; readonly init: AstExpr; readonly span: Span }
	| { readonly kind: 'assign'; readonly target: AstExpr; readonly value: AstExpr; readonly span: Span }
	| { readonly kind: 'expr'; readonly expr: AstExpr; readonly span: Span }
	| { readonly kind: 'if'; readonly cond: AstExpr; readonly then: AstBlock; readonly else: AstBlock | null; readonly span: Span }
	| { readonly kind: 'while'; readonly cond: AstExpr; readonly body: AstBlock; readonly span: Span }
	| { readonly kind: 'return'; readonly value: AstExpr | null; readonly span: Span }
	| { readonly kind: 'revert'; readonly message: string; readonly span: Span }
	| { readonly kind: 'require'; readonly cond: AstExpr; readonly message: string; readonly span: Span }
	| { readonly kind: 'emit'; readonly topic: string; readonly value: AstExpr; readonly span: Span }

export type BinaryOp =
	| '||'
	| '&&'
	| '=='
	| '!='
	| '<'
	| '<='
	| '>'
	| '>='
	| '|'
	| '^'
	| '&'
	| '<<'
	| '>>'
	| '+'
	| '-'
	| '*'
	| '/'
	| '%'

export type AstExpr =
	| { readonly kind: 'int'; readonly value: bigint; readonly span: Span }
	| { readonly kind: 'bool'; readonly value: boolean; readonly span: Span }
	| { readonly kind: 'string'; readonly value: string; readonly span: Span }
	| { readonly kind: 'name'; readonly name: string; readonly span: Span }
	| { readonly kind: 'field'; readonly base: AstExpr; readonly name: string; readonly span: Span }
	| { readonly kind: 'index'; readonly base: AstExpr; readonly index: AstExpr; readonly span: Span }
	| { readonly kind: 'call'; readonly callee: string; readonly args: readonly AstExpr[]; readonly span: Span }
	| { readonly kind: 'method'; readonly receiver: AstExpr; readonly name: string; readonly args: readonly AstExpr[]; readonly span: Span }
	| { readonly kind: 'struct'; readonly name: string; readonly fields: readonly AstFieldInit[]; readonly span: Span }
	| { readonly kind: 'binary'; readonly op: BinaryOp; readonly lhs: AstExpr; readonly rhs: AstExpr; readonly span: Span }
	| { readonly kind: 'unary'; readonly op: '!' | '-'; readonly operand: AstExpr; readonly span: Span }
	| { readonly kind: 'storage'; readonly namespace: string; readonly span: Span }

export interface AstFieldInit {
	readonly name: string
	readonly value: AstExpr
	readonly span: Span
}
