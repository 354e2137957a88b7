import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompilationContext } from '../../src/core/context.ts'
import type { AstFunction, AstStmt, AstUnit } from '../../src/front/ast.ts'
import { parse } from '../../src/front/parser.ts'

function parseOk(source: string): AstUnit {
	const context = new CompilationContext(source)
	const unit = parse(context)
	assert.ok(unit, context.formatAllDiagnostics())
	return unit
}

function onlyFunction(unit: AstUnit): AstFunction {
	const fns = unit.items.filter((i): i is AstFunction => i.kind === 'fn')
	const [fn] = fns
	assert.ok(fn)
	assert.strictEqual(fns.length, 1)
	return fn
}

function firstStmt(source: string): AstStmt {
	const fn = onlyFunction(parseOk(`unit t;\nfn f() {\n${source}\n}`))
	const [stmt] = fn.body.stmts
	assert.ok(stmt)
	return stmt
}

describe('front/parser', () => {
	describe('declarations', () => {
		it('should read the unit name', () => {
			const unit = parseOk('unit bank;')
			assert.strictEqual(unit.name, 'bank')
			assert.deepStrictEqual(unit.items, [])
		})

		it('should read scalar and keyed storage fields', () => {
			const unit = parseOk('unit bank;\nstorage {\n  total: u64,\n  balances: map<string, u64>,\n}')
			const [storage] = unit.items
			assert.ok(storage?.kind === 'storage')
			assert.deepStrictEqual(
				storage.fields.map((f) => [f.name, f.keyType?.name ?? null, f.valueType.name]),
				[
					['total', null, 'u64'],
					['balances', 'string', 'u64'],
				]
			)
		})

		it('should distinguish copy structs', () => {
			const unit = parseOk('unit t;\nstruct Vault { amount: u64 }\ncopy struct Point { x: i32, y: i32, }')
			const structs = unit.items.flatMap((i) => (i.kind === 'struct' ? [[i.name, i.copy, i.fields.length]] : []))
			assert.deepStrictEqual(structs, [
				['Vault', false, 1],
				['Point', true, 2],
			])
		})

		it('should read parameter modes and the return type', () => {
			const fn = onlyFunction(parseOk('unit t;\npub fn f(a: u64, ref b: Vault, mut c: Vault) -> bool { return true; }'))
			assert.strictEqual(fn.pub, true)
			assert.deepStrictEqual(
				fn.params.map((p) => [p.name, p.mode, p.type.name]),
				[
					['a', 'value', 'u64'],
					['b', 'ref', 'Vault'],
					['c', 'mut', 'Vault'],
				]
			)
			assert.strictEqual(fn.returnType?.name, 'bool')
		})

		it('should keep annotation text raw and trimmed', () => {
			const fn = onlyFunction(parseOk('unit t;\n#[ reads("acct:alice") ]\n#[pure]\nfn f() {}'))
			assert.deepStrictEqual(
				fn.annotations.map((a) => a.text),
				['reads("acct:alice")', 'pure']
			)
		})

		it('should not treat keyword prefixes as keywords', () => {
			const fn = onlyFunction(parseOk('unit t;\nfn reference(returned: u64) -> u64 { return returned; }'))
			assert.strictEqual(fn.name, 'reference')
			assert.strictEqual(fn.params[0]?.name, 'returned')
		})
	})

	describe('statements', () => {
		it('should mark var bindings mutable', () => {
			const stmt = firstStmt('var x: u32 = 1;')
			assert.ok(stmt.kind === 'let')
			assert.strictEqual(stmt.mutable, true)
			assert.strictEqual(stmt.type?.name, 'u32')
		})

		it('should nest else-if chains as a one-statement block', () => {
			const stmt = firstStmt('if a { } else if b { } else { }')
			assert.ok(stmt.kind === 'if')
			const [inner] = stmt.else?.stmts ?? []
			assert.ok(inner?.kind === 'if')
			assert.notStrictEqual(inner.else, null)
		})

		it('should read require, revert and emit', () => {
			const fn = onlyFunction(
				parseOk('unit t;\nfn f() {\nrequire(x > 0, "empty");\nemit("paid", x);\nrevert("stop");\n}')
			)
			assert.deepStrictEqual(
				fn.body.stmts.map((s) => s.kind),
				['require', 'emit', 'revert']
			)
			const [req, em, rev] = fn.body.stmts
			assert.ok(req?.kind === 'require' && em?.kind === 'emit' && rev?.kind === 'revert')
			assert.strictEqual(req.message, 'empty')
			assert.strictEqual(em.topic, 'paid')
			assert.strictEqual(rev.message, 'stop')
		})

		it('should read storage writes as assignments to an index', () => {
			const stmt = firstStmt('storage.balances["bob"] = 5;')
			assert.ok(stmt.kind === 'assign')
			assert.ok(stmt.target.kind === 'index')
			assert.deepStrictEqual(stmt.target.base.kind, 'storage')
			assert.deepStrictEqual(stmt.target.index.kind, 'string')
		})
	})

	describe('expressions', () => {
		function initOf(expr: string): AstStmt {
			return firstStmt(`let x = ${expr};`)
		}

		it('should bind multiplication tighter than addition', () => {
			const stmt = initOf('1 + 2 * 3')
			assert.ok(stmt.kind === 'let' && stmt.init.kind === 'binary')
			assert.strictEqual(stmt.init.op, '+')
			assert.strictEqual(stmt.init.rhs.kind, 'binary')
		})

		it('should associate subtraction to the left', () => {
			const stmt = initOf('a - b - c')
			assert.ok(stmt.kind === 'let' && stmt.init.kind === 'binary')
			assert.ok(stmt.init.lhs.kind === 'binary')
			assert.strictEqual(stmt.init.lhs.op, '-')
			assert.strictEqual(stmt.init.rhs.kind, 'name')
		})

		it('should tell shifts from comparisons', () => {
			const stmt = initOf('a << 2 < b')
			assert.ok(stmt.kind === 'let' && stmt.init.kind === 'binary')
			assert.strictEqual(stmt.init.op, '<')
			assert.ok(stmt.init.lhs.kind === 'binary')
			assert.strictEqual(stmt.init.lhs.op, '<<')
		})

		it('should read hex literals', () => {
			const stmt = initOf('0xff')
			assert.ok(stmt.kind === 'let' && stmt.init.kind === 'int')
			assert.strictEqual(stmt.init.value, 255n)
		})

		it('should read method calls on storage', () => {
			const stmt = initOf('storage.balances.contains("bob")')
			assert.ok(stmt.kind === 'let' && stmt.init.kind === 'method')
			assert.strictEqual(stmt.init.name, 'contains')
			assert.strictEqual(stmt.init.receiver.kind, 'storage')
			assert.strictEqual(stmt.init.args.length, 1)
		})

		it('should read struct literals', () => {
			const stmt = initOf('Vault { amount: 1, owner: 2 }')
			assert.ok(stmt.kind === 'let' && stmt.init.kind === 'struct')
			assert.deepStrictEqual(
				stmt.init.fields.map((f) => f.name),
				['amount', 'owner']
			)
		})
	})

	describe('syntax errors', () => {
		it('should report TEPARSE001 and return null', () => {
			const context = new CompilationContext('unit t;\nfn f( {}')
			assert.strictEqual(parse(context), null)
			const [error] = context.getErrors()
			assert.ok(error)
			assert.strictEqual(error.def.code, 'TEPARSE001')
			assert.strictEqual(error.line, 2)
			assert.ok(error.message.startsWith('syntax error: '))
		})

		it('should require the unit declaration', () => {
			const context = new CompilationContext('fn f() {}')
			assert.strictEqual(parse(context), null)
			assert.strictEqual(context.getErrors()[0]?.def.code, 'TEPARSE001')
		})

		it('should skip line comments', () => {
			const unit = parseOk('// header\nunit t; // name\nfn f() {} // trailing')
			assert.strictEqual(unit.items.length, 1)
		})
	})
})
