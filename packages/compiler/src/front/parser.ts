import type { Node } from 'ohm-js'
import type { CompilationContext } from '../core/context.ts'
import type { Span } from '../core/span.ts'
import type {
	AstAnnotation,
	AstBlock,
	AstExpr,
	AstFieldDecl,
	AstFieldInit,
	AstFunction,
	AstItem,
	AstParam,
	AstStmt,
	AstStorageField,
	AstTypeRef,
	AstUnit,
	BinaryOp,
	ParamMode,
} from './ast.ts'
import { TesseraGrammar } from './grammar.ts'

function spanOf(node: Node): Span {
	const interval = node.source
	const { colNum, lineNum } = interval.getLineAndColumn()
	return { column: colNum, end: interval.endIdx, line: lineNum, start: interval.startIdx }
}

function unquote(node: Node): string {
	return node.sourceString.slice(1, -1)
}

function listOf(node: Node): Node[] {
	return node.asIteration().children
}

function binary(self: Node, lhs: Node, op: Node, rhs: Node): AstExpr {
	return {
		kind: 'binary',
		lhs: lhs['expr'](),
		op: toBinaryOp(op.sourceString),
		rhs: rhs['expr'](),
		span: spanOf(self),
	}
}

const BINARY_OPS: ReadonlySet<string> = new Set([
	'||',
	'&&',
	'==',
	'!=',
	'<',
	'<=',
	'>',
	'>=',
	'|',
	'^',
	'&',
	'<<',
	'>>',
	'+',
	'-',
	'*',
	'/',
	'%',
])

function isBinaryOp(op: string): op is BinaryOp {
	return BINARY_OPS.has(op)
}

function toBinaryOp(op: string): BinaryOp {
	if (!isBinaryOp(op)) throw new Error(`grammar produced unknown operator '${op}'`)
	return op
}

function toParamMode(text: string): ParamMode {
	if (text === 'ref' || text === 'mut') return text
	return 'value'
}

function createSemantics() {
	const semantics = TesseraGrammar.createSemantics()

	semantics.addOperation<AstTypeRef>('typeRef', {
		TypeRef(name: Node) {
			return { name: name.sourceString, span: spanOf(name) }
		},
	})

	semantics.addOperation<AstAnnotation>('annotation', {
		Annotation(_open: Node, text: Node, _close: Node) {
			return { span: spanOf(this), text: text.sourceString.trim() }
		},
	})

	semantics.addOperation<AstParam>('param', {
		Param(mode: Node, name: Node, _colon: Node, type: Node) {
			const modeNode = mode.children[0]
			return {
				mode: toParamMode(modeNode !== undefined ? modeNode.sourceString : ''),
				name: name.sourceString,
				span: spanOf(name),
				type: type['typeRef'](),
			}
		},
	})

	semantics.addOperation<AstStorageField>('storageField', {
		StorageField(name: Node, _colon: Node, type: Node) {
			const [keyType, valueType]: [AstTypeRef | null, AstTypeRef] = type['storageType']()
			return { keyType, name: name.sourceString, span: spanOf(this), valueType }
		},
	})

	semantics.addOperation<[AstTypeRef | null, AstTypeRef]>('storageType', {
		StorageType_keyed(_map: Node, _lt: Node, key: Node, _comma: Node, value: Node, _gt: Node) {
			return [key['typeRef'](), value['typeRef']()]
		},
		StorageType_scalar(value: Node) {
			return [null, value['typeRef']()]
		},
	})

	semantics.addOperation<AstFieldDecl>('fieldDecl', {
		FieldDecl(name: Node, _colon: Node, type: Node) {
			return { name: name.sourceString, span: spanOf(name), type: type['typeRef']() }
		},
	})

	semantics.addOperation<AstItem>('item', {
		FnDecl(
			annotations: Node,
			pub: Node,
			_fn: Node,
			name: Node,
			_open: Node,
			params: Node,
			_close: Node,
			returnType: Node,
			body: Node
		): AstFunction {
			const ret = returnType.children[0]
			return {
				annotations: annotations.children.map((a: Node) => a['annotation']()),
				body: body['block'](),
				kind: 'fn',
				name: name.sourceString,
				params: listOf(params).map((p) => p['param']()),
				pub: pub.children.length > 0,
				returnType: ret !== undefined ? ret['returnType']() : null,
				span: spanOf(name),
			}
		},
		Item(item: Node) {
			return item['item']()
		},
		StorageDecl(_kw: Node, _open: Node, fields: Node, _trailing: Node, _close: Node) {
			return {
				fields: listOf(fields).map((f) => f['storageField']()),
				kind: 'storage',
				span: spanOf(this),
			}
		},
		StructDecl(
			copy: Node,
			_kw: Node,
			name: Node,
			_open: Node,
			fields: Node,
			_trailing: Node,
			_close: Node
		) {
			return {
				copy: copy.children.length > 0,
				fields: listOf(fields).map((f) => f['fieldDecl']()),
				kind: 'struct',
				name: name.sourceString,
				span: spanOf(name),
			}
		},
	})

	semantics.addOperation<AstTypeRef>('returnType', {
		ReturnType(_arrow: Node, type: Node) {
			return type['typeRef']()
		},
	})

	semantics.addOperation<AstBlock>('block', {
		Block(_open: Node, stmts: Node, _close: Node) {
			return {
				span: spanOf(this),
				stmts: stmts.children.map((s: Node) => s['stmt']()),
			}
		},
	})

	semantics.addOperation<AstBlock>('elseBlock', {
		ElseClause_elif(_else: Node, stmt: Node) {
			return { span: spanOf(stmt), stmts: [stmt['stmt']()] }
		},
		ElseClause_else(_else: Node, block: Node) {
			return block['block']()
		},
	})

	semantics.addOperation<AstStmt>('stmt', {
		AssignStmt(target: Node, _eq: Node, value: Node, _semi: Node) {
			return { kind: 'assign', span: spanOf(this), target: target['expr'](), value: value['expr']() }
		},
		EmitStmt(_kw: Node, _open: Node, topic: Node, _comma: Node, value: Node, _close: Node, _semi: Node) {
			return { kind: 'emit', span: spanOf(this), topic: unquote(topic), value: value['expr']() }
		},
		ExprStmt(expr: Node, _semi: Node) {
			return { expr: expr['expr'](), kind: 'expr', span: spanOf(this) }
		},
		IfStmt(_kw: Node, cond: Node, then: Node, elseClause: Node) {
			const clause = elseClause.children[0]
			return {
				cond: cond['expr'](),
				else: clause !== undefined ? clause['elseBlock']() : null,
				kind: 'if',
				span: spanOf(this),
				then: then['block'](),
			}
		},
		LetStmt(kw: Node, name: Node, typeAnn: Node, _eq: Node, init: Node, _semi: Node) {
			const ann = typeAnn.children[0]
			return {
				init: init['expr'](),
				kind: 'let',
				mutable: kw.sourceString === 'var',
				name: name.sourceString,
				span: spanOf(name),
				type: ann !== undefined ? ann['typeAnn']() : null,
			}
		},
		RequireStmt(_kw: Node, _open: Node, cond: Node, _comma: Node, message: Node, _close: Node, _semi: Node) {
			return { cond: cond['expr'](), kind: 'require', message: unquote(message), span: spanOf(this) }
		},
		ReturnStmt(_kw: Node, value: Node, _semi: Node) {
			const expr = value.children[0]
			return { kind: 'return', span: spanOf(this), value: expr !== undefined ? expr['expr']() : null }
		},
		RevertStmt(_kw: Node, _open: Node, message: Node, _close: Node, _semi: Node) {
			return { kind: 'revert', message: unquote(message), span: spanOf(this) }
		},
		Stmt(stmt: Node) {
			return stmt['stmt']()
		},
		WhileStmt(_kw: Node, cond: Node, body: Node) {
			return { body: body['block'](), cond: cond['expr'](), kind: 'while', span: spanOf(this) }
		},
	})

	semantics.addOperation<AstTypeRef>('typeAnn', {
		TypeAnn(_colon: Node, type: Node) {
			return type['typeRef']()
		},
	})

	semantics.addOperation<AstFieldInit>('fieldInit', {
		FieldInit(name: Node, _colon: Node, value: Node) {
			return { name: name.sourceString, span: spanOf(name), value: value['expr']() }
		},
	})

	semantics.addOperation<AstExpr>('expr', {
		AddExpr_binary(lhs: Node, op: Node, rhs: Node) {
			return binary(this, lhs, op, rhs)
		},
		AndExpr_binary(lhs: Node, op: Node, rhs: Node) {
			return binary(this, lhs, op, rhs)
		},
		BitAndExpr_binary(lhs: Node, op: Node, rhs: Node) {
			return binary(this, lhs, op, rhs)
		},
		BitOrExpr_binary(lhs: Node, op: Node, rhs: Node) {
			return binary(this, lhs, op, rhs)
		},
		BitXorExpr_binary(lhs: Node, op: Node, rhs: Node) {
			return binary(this, lhs, op, rhs)
		},
		CmpExpr_binary(lhs: Node, op: Node, rhs: Node) {
			return binary(this, lhs, op, rhs)
		},
		MulExpr_binary(lhs: Node, op: Node, rhs: Node) {
			return binary(this, lhs, op, rhs)
		},
		OrExpr_binary(lhs: Node, op: Node, rhs: Node) {
			return binary(this, lhs, op, rhs)
		},
		Postfix_field(base: Node, _dot: Node, name: Node) {
			return { base: base['expr'](), kind: 'field', name: name.sourceString, span: spanOf(name) }
		},
		Postfix_index(base: Node, _open: Node, index: Node, _close: Node) {
			return { base: base['expr'](), index: index['expr'](), kind: 'index', span: spanOf(this) }
		},
		Postfix_method(receiver: Node, _dot: Node, name: Node, _open: Node, args: Node, _close: Node) {
			return {
				args: listOf(args).map((a) => a['expr']()),
				kind: 'method',
				name: name.sourceString,
				receiver: receiver['expr'](),
				span: spanOf(name),
			}
		},
		Primary_call(callee: Node, _open: Node, args: Node, _close: Node) {
			return {
				args: listOf(args).map((a) => a['expr']()),
				callee: callee.sourceString,
				kind: 'call',
				span: spanOf(callee),
			}
		},
		Primary_false(_kw: Node) {
			return { kind: 'bool', span: spanOf(this), value: false }
		},
		Primary_int(lit: Node) {
			return { kind: 'int', span: spanOf(lit), value: BigInt(lit.sourceString) }
		},
		Primary_name(name: Node) {
			return { kind: 'name', name: name.sourceString, span: spanOf(name) }
		},
		Primary_paren(_open: Node, expr: Node, _close: Node) {
			return expr['expr']()
		},
		Primary_storage(_kw: Node, _dot: Node, name: Node) {
			return { kind: 'storage', namespace: name.sourceString, span: spanOf(this) }
		},
		Primary_string(lit: Node) {
			return { kind: 'string', span: spanOf(lit), value: unquote(lit) }
		},
		Primary_struct(name: Node, _open: Node, fields: Node, _trailing: Node, _close: Node) {
			return {
				fields: listOf(fields).map((f) => f['fieldInit']()),
				kind: 'struct',
				name: name.sourceString,
				span: spanOf(name),
			}
		},
		Primary_true(_kw: Node) {
			return { kind: 'bool', span: spanOf(this), value: true }
		},
		ShiftExpr_binary(lhs: Node, op: Node, rhs: Node) {
			return binary(this, lhs, op, rhs)
		},
		UnaryExpr_neg(_op: Node, operand: Node) {
			return { kind: 'unary', op: '-', operand: operand['expr'](), span: spanOf(this) }
		},
		UnaryExpr_not(_op: Node, operand: Node) {
			return { kind: 'unary', op: '!', operand: operand['expr'](), span: spanOf(this) }
		},
	})

	semantics.addOperation<AstUnit>('unit', {
		Unit(_kw: Node, name: Node, _semi: Node, items: Node) {
			return {
				items: items.children.map((i: Node) => i['item']()),
				name: name.sourceString,
				span: spanOf(name),
			}
		},
	})

	return semantics
}

const semantics = createSemantics()

/** Location of the furthest point the grammar reached, as a span. */
function failureSpan(source: string, offset: number): Span {
	const before = source.slice(0, offset)
	const line = before.split('\n').length
	const column = offset - before.lastIndexOf('\n')
	return { column, end: Math.min(source.length, offset + 1), line, start: offset }
}

/**
 * Parse a compilation unit. On a syntax error emits TEPARSE001 and returns null.
 */
export function parse(context: CompilationContext): AstUnit | null {
	const matchResult = TesseraGrammar.match(context.source)

	if (matchResult.failed()) {
		const offset = matchResult.getRightmostFailurePosition()
		const detail = (matchResult.shortMessage ?? 'unexpected input').replace(/^Line \d+, col \d+: /, '')
		context.emit('TEPARSE001', failureSpan(context.source, offset), { detail })
		return null
	}

	return semantics(matchResult)['unit']()
}
