import assert from 'node:assert'
import { describe, it } from 'node:test'
import type { HirExpr, HirStmt } from '../../src/hir/hir.ts'
import { checkOwnership } from '../../src/ownership/index.ts'
import { frontEnd, messages } from '../helpers.ts'

const PRELUDE = `unit vaults;
struct Vault { amount: u64 }
copy struct Point { x: u64, y: u64 }
fn consume(v: Vault) {}
fn inspect(ref v: Vault) -> u64 { return v.amount; }
fn adjust(mut v: Vault) { v.amount = v.amount + 1; }
fn both(ref a: Vault, mut b: Vault) {}
fn pair(ref a: Vault, b: Vault) {}
fn peek(mut v: Vault, n: u64) {}
`

function check(body: string) {
	const { context, unit } = frontEnd(`${PRELUDE}${body}`)
	const violations = checkOwnership(context, unit)
	return { context, unit, violations }
}

function violationOf(body: string): string | null {
	return check(body).violations.get('f')?.code ?? null
}

describe('ownership/checker', () => {
	describe('moves', () => {
		it('should accept a single move', () => {
			assert.strictEqual(violationOf('fn f() {\n  let v = Vault { amount: 1 };\n  consume(v);\n}'), null)
		})

		it('should reject use after move', () => {
			const { context, violations } = check('fn f() {\n  let v = Vault { amount: 1 };\n  consume(v);\n  consume(v);\n}')
			assert.strictEqual(violations.get('f')?.code, 'TEOWN001')
			assert.deepStrictEqual(messages(context, 'TEOWN001'), ["use of moved value 'v'"])
			const [diagnostic] = context.withCode('TEOWN001')
			assert.ok(diagnostic)
			assert.strictEqual(diagnostic.functionName, 'f')
			assert.deepStrictEqual(
				diagnostic.related?.map((r) => [r.label, r.span.line]),
				[['value moved here', 12]]
			)
		})

		it('should reject use after a move on one branch', () => {
			assert.strictEqual(
				violationOf('fn f(c: bool) {\n  let v = Vault { amount: 1 };\n  if c { consume(v); }\n  consume(v);\n}'),
				'TEOWN001'
			)
		})

		it('should accept moves on both arms of a branch', () => {
			assert.strictEqual(
				violationOf('fn f(c: bool) {\n  let v = Vault { amount: 1 };\n  if c { consume(v); } else { consume(v); }\n}'),
				null
			)
		})

		it('should ignore a branch that always returns', () => {
			assert.strictEqual(
				violationOf('fn f(c: bool) {\n  let v = Vault { amount: 1 };\n  if c { consume(v); return; }\n  consume(v);\n}'),
				null
			)
		})

		it('should re-initialise a moved binding on reassignment', () => {
			assert.strictEqual(
				violationOf(
					'fn f() {\n  var v = Vault { amount: 1 };\n  consume(v);\n  v = Vault { amount: 2 };\n  consume(v);\n}'
				),
				null
			)
		})

		it('should copy copy structs instead of moving them', () => {
			assert.strictEqual(
				violationOf('fn f() -> u64 {\n  let p = Point { x: 1, y: 2 };\n  let q = p;\n  return p.x + q.y;\n}'),
				null
			)
		})

		it('should report moves in a previous loop iteration', () => {
			const { context, violations } = check(
				'fn f(n: u64) {\n  let v = Vault { amount: 1 };\n  var i = 0;\n  while i < n {\n    consume(v);\n    i = i + 1;\n  }\n}'
			)
			assert.strictEqual(violations.get('f')?.code, 'TEOWN006')
			assert.deepStrictEqual(messages(context, 'TEOWN006'), [
				"value 'v' was moved in a previous iteration of the loop",
			])
		})

		it('should accept a move in a loop body that always exits', () => {
			assert.strictEqual(
				violationOf('fn f(n: u64) {\n  let v = Vault { amount: 1 };\n  while n > 0 {\n    consume(v);\n    return;\n  }\n}'),
				null
			)
		})

		it('should reject moving out of a borrowed parameter', () => {
			const { context, violations } = check('fn f(ref v: Vault) {\n  consume(v);\n}')
			assert.strictEqual(violations.get('f')?.code, 'TEOWN007')
			assert.deepStrictEqual(messages(context, 'TEOWN007'), [
				"cannot move out of 'v': it is borrowed from the caller",
			])
		})

		it('should reject moving a struct field out', () => {
			const { context } = check(
				'struct Outer { inner: Vault }\nfn f() {\n  let o = Outer { inner: Vault { amount: 1 } };\n  let i = o.inner;\n}'
			)
			assert.deepStrictEqual(messages(context, 'TEOWN007'), ["cannot move out of 'o.inner': it is a field of a struct"])
		})
	})

	describe('borrows', () => {
		it('should allow shared borrows after shared borrows', () => {
			assert.strictEqual(
				violationOf('fn f() -> u64 {\n  let v = Vault { amount: 1 };\n  return inspect(v) + inspect(v);\n}'),
				null
			)
		})

		it('should end borrows when the call returns', () => {
			assert.strictEqual(
				violationOf('fn f() {\n  var v = Vault { amount: 1 };\n  adjust(v);\n  adjust(v);\n  consume(v);\n}'),
				null
			)
		})

		it('should reject an exclusive borrow of a shared one', () => {
			const { context, violations } = check('fn f() {\n  var v = Vault { amount: 1 };\n  both(v, v);\n}')
			assert.strictEqual(violations.get('f')?.code, 'TEOWN002')
			assert.deepStrictEqual(messages(context, 'TEOWN002'), [
				"cannot borrow 'v' as exclusive because it is already borrowed",
			])
		})

		it('should reject moving a borrowed value', () => {
			const { context } = check('fn f() {\n  let v = Vault { amount: 1 };\n  pair(v, v);\n}')
			assert.deepStrictEqual(messages(context, 'TEOWN003'), ["cannot move 'v' while it is borrowed"])
		})

		it('should reject exclusive borrows of immutable bindings', () => {
			const { context } = check('fn f() {\n  let v = Vault { amount: 1 };\n  adjust(v);\n}')
			assert.deepStrictEqual(messages(context, 'TEOWN005'), ["cannot borrow immutable binding 'v' as exclusive"])
		})

		it('should reject reading a value while it is exclusively borrowed', () => {
			const { context } = check('fn f() {\n  var v = Vault { amount: 1 };\n  peek(v, v.amount);\n}')
			assert.deepStrictEqual(messages(context, 'TEOWN008'), ["cannot use 'v' while it is exclusively borrowed"])
		})

		it('should allow mutation through a mut parameter', () => {
			assert.strictEqual(check('').violations.has('adjust'), false)
		})
	})

	describe('assignment', () => {
		it('should reject assignment to let bindings', () => {
			const { context } = check('fn f() {\n  let x = 1;\n  x = 2;\n}')
			assert.deepStrictEqual(messages(context, 'TEOWN004'), ["cannot assign to immutable binding 'x'"])
		})

		it('should reject field assignment through a shared borrow', () => {
			const { context } = check('fn f(ref v: Vault) {\n  v.amount = 3;\n}')
			assert.deepStrictEqual(messages(context, 'TEOWN004'), ["cannot assign to immutable binding 'v'"])
		})

		it('should allow scalar mut parameters to be reassigned', () => {
			assert.strictEqual(violationOf('fn f(mut n: u64) -> u64 {\n  n = n + 1;\n  return n;\n}'), null)
		})
	})

	describe('annotations on HIR', () => {
		function uses(expr: HirExpr, out: HirExpr[]): void {
			if (expr.kind === 'use') out.push(expr)
			if (expr.kind === 'call') for (const arg of expr.args) uses(arg, out)
		}

		it('should record the access kind of each use', () => {
			const { unit } = check('fn f() {\n  var v = Vault { amount: 1 };\n  let n = inspect(v);\n  adjust(v);\n  consume(v);\n}')
			const fn = unit.functions.find((g) => g.name === 'f')
			assert.ok(fn)
			const found: HirExpr[] = []
			for (const stmt of fn.body.stmts) {
				if (stmt.kind === 'let') uses(stmt.init, found)
				if (stmt.kind === 'expr') uses(stmt.expr, found)
			}
			assert.deepStrictEqual(
				found.map((u) => (u.kind === 'use' ? u.access : null)),
				['shared', 'exclusive', 'move']
			)
		})

		it('should drop owned values still live at the end of their block', () => {
			const { unit } = check('fn f(c: bool) {\n  let kept = Vault { amount: 1 };\n  let gone = Vault { amount: 2 };\n  consume(gone);\n}')
			const fn = unit.functions.find((g) => g.name === 'f')
			assert.ok(fn)
			const kept = fn.body.stmts.find((s): s is Extract<HirStmt, { kind: 'let' }> => s.kind === 'let')
			assert.ok(kept)
			assert.deepStrictEqual(fn.body.drops, [kept.binding.id])
		})
	})
})
