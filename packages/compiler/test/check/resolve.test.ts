import assert from 'node:assert'
import { describe, it } from 'node:test'
import { I32, U8, U64 } from '../../src/check/types.ts'
import type { HirStmt } from '../../src/hir/hir.ts'
import { codes, frontEnd, messages, resolveOnly } from '../helpers.ts'

function errorsOf(source: string): string[] {
	return codes(resolveOnly(source).getErrors())
}

function bodyOf(source: string, name = 'f'): readonly HirStmt[] {
	const { unit } = frontEnd(source)
	const fn = unit.functions.find((f) => f.name === name)
	assert.ok(fn)
	return fn.body.stmts
}

describe('check/resolve', () => {
	describe('declarations', () => {
		it('should collect storage namespaces with their key types', () => {
			const { unit } = frontEnd('unit bank;\nstorage {\n  total: u64,\n  balances: map<string, u64>,\n}')
			assert.strictEqual(unit.name, 'bank')
			assert.strictEqual(unit.storage.get('total')?.keyType, null)
			assert.deepStrictEqual(unit.storage.get('balances')?.keyType, { kind: 'string' })
		})

		it('should resolve structs referring to structs declared later', () => {
			const { unit } = frontEnd('unit t;\nstruct Outer { inner: Inner }\nstruct Inner { v: u64 }')
			const outer = unit.structs.get('Outer')
			assert.ok(outer)
			assert.strictEqual(outer.fields[0]?.type.kind, 'struct')
		})

		it('should report duplicate definitions', () => {
			assert.deepStrictEqual(errorsOf('unit t;\nfn f() {}\nfn f() {}'), ['TERES008'])
		})

		it('should reject structs in public signatures', () => {
			const context = resolveOnly('unit t;\nstruct Vault { amount: u64 }\npub fn f(v: Vault) {}')
			assert.deepStrictEqual(messages(context, 'TERES015'), ['type Vault cannot be used as a public parameter'])
		})

		it('should reject strings as storage values', () => {
			assert.deepStrictEqual(errorsOf('unit t;\nstorage {\n  name: string,\n}'), ['TERES015'])
		})

		it('should require a value on every path of a non-unit function', () => {
			const context = resolveOnly('unit t;\nfn f(c: bool) -> u64 {\n  if c { return 1; }\n}')
			assert.deepStrictEqual(messages(context, 'TERES014'), ["function 'f' may finish without returning a u64"])
		})

		it('should accept a function ending in revert on the other path', () => {
			assert.deepStrictEqual(errorsOf('unit t;\nfn f(c: bool) -> u64 {\n  if c { return 1; } else { revert("no"); }\n}'), [])
		})
	})

	describe('names and types', () => {
		it('should report unknown names', () => {
			const context = resolveOnly('unit t;\nfn f() {\n  let a = y;\n}')
			assert.deepStrictEqual(messages(context, 'TERES001'), ["unknown name 'y'"])
		})

		it('should report unknown types', () => {
			assert.deepStrictEqual(errorsOf('unit t;\nfn f(a: u128) {}'), ['TERES002'])
		})

		it('should report mismatched operands', () => {
			const context = resolveOnly('unit t;\nfn f(a: u64, b: u32) {\n  let c = a + b;\n}')
			assert.deepStrictEqual(messages(context, 'TERES003'), ['type mismatch: expected u64, found u32'])
		})

		it('should give literals the type of the other operand', () => {
			const [stmt] = bodyOf('unit t;\nfn f(a: u8) {\n  let b = 1 + a;\n}')
			assert.ok(stmt?.kind === 'let')
			assert.deepStrictEqual(stmt.binding.type, U8)
			assert.ok(stmt.init.kind === 'arith')
			assert.deepStrictEqual(stmt.init.lhs.type, U8)
		})

		it('should default unconstrained literals to u64', () => {
			const [stmt] = bodyOf('unit t;\nfn f() {\n  let b = 7;\n}')
			assert.ok(stmt?.kind === 'let')
			assert.deepStrictEqual(stmt.binding.type, U64)
		})

		it('should type negative literals from the annotation', () => {
			const [stmt] = bodyOf('unit t;\nfn f() {\n  let b: i32 = -5;\n}')
			assert.ok(stmt?.kind === 'let' && stmt.init.kind === 'int')
			assert.deepStrictEqual(stmt.init.type, I32)
			assert.strictEqual(stmt.init.value, -5n)
		})

		it('should reject literals outside the type', () => {
			const context = resolveOnly('unit t;\nfn f() {\n  let b: u8 = 256;\n}')
			assert.deepStrictEqual(messages(context, 'TERES010'), ['integer literal 256 out of range for u8'])
		})

		it('should reject negation of unsigned values', () => {
			assert.deepStrictEqual(errorsOf('unit t;\nfn f(a: u64) {\n  let b = -a;\n}'), ['TERES012'])
		})

		it('should reject ordering comparisons on booleans', () => {
			const context = resolveOnly('unit t;\nfn f(a: bool, b: bool) {\n  let c = a < b;\n}')
			assert.deepStrictEqual(messages(context, 'TERES012'), ["operator '<' is not supported for bool"])
		})

		it('should keep resolving after a failed statement', () => {
			assert.deepStrictEqual(errorsOf('unit t;\nfn f() {\n  let a = y;\n  let b = z;\n}'), ['TERES001', 'TERES001'])
		})
	})

	describe('calls and builtins', () => {
		it('should check argument counts', () => {
			const context = resolveOnly('unit t;\nfn g(a: u64) {}\nfn f() {\n  g(1, 2);\n}')
			assert.deepStrictEqual(messages(context, 'TERES005'), ["'g' takes 1 argument(s), found 2"])
		})

		it('should report unknown functions', () => {
			assert.deepStrictEqual(errorsOf('unit t;\nfn f() {\n  nope();\n}'), ['TERES004'])
		})

		it('should map checked_ builtins to the fallback mode', () => {
			const [stmt] = bodyOf('unit t;\nfn f(a: u64, b: u64) {\n  let c = checked_add(a, b, 0);\n}')
			assert.ok(stmt?.kind === 'let' && stmt.init.kind === 'builtin_arith')
			assert.strictEqual(stmt.init.mode, 'fallback')
			assert.strictEqual(stmt.init.op, 'add')
			assert.notStrictEqual(stmt.init.fallback, null)
		})

		it('should require a fallback for checked_ builtins', () => {
			assert.deepStrictEqual(errorsOf('unit t;\nfn f(a: u64, b: u64) {\n  let c = checked_add(a, b);\n}'), ['TERES005'])
		})

		it('should give caller() the digest type', () => {
			const [stmt] = bodyOf('unit t;\nfn f() {\n  let who = caller();\n}')
			assert.ok(stmt?.kind === 'let')
			assert.strictEqual(stmt.binding.type.kind, 'digest')
		})
	})

	describe('storage', () => {
		const header = 'unit bank;\nstorage {\n  total: u64,\n  balances: map<string, u64>,\n}\n'

		it('should resolve scalar reads and keyed writes', () => {
			const stmts = bodyOf(`${header}fn f() {\n  let t = storage.total;\n  storage.balances["bob"] = t;\n}`)
			const [read, write] = stmts
			assert.ok(read?.kind === 'let' && read.init.kind === 'storage_read')
			assert.strictEqual(read.init.key, null)
			assert.ok(write?.kind === 'storage_write')
			assert.strictEqual(write.namespace, 'balances')
			assert.strictEqual(write.key?.kind, 'string')
		})

		it('should resolve contains() to an existence test', () => {
			const [stmt] = bodyOf(`${header}fn f() {\n  let known = storage.balances.contains("bob");\n}`)
			assert.ok(stmt?.kind === 'let')
			assert.strictEqual(stmt.init.kind, 'storage_exists')
		})

		it('should report unknown namespaces', () => {
			const context = resolveOnly(`${header}fn f() {\n  let x = storage.missing;\n}`)
			assert.deepStrictEqual(messages(context, 'TERES007'), ["unknown storage namespace 'missing'"])
		})

		it('should require a key for keyed namespaces', () => {
			const context = resolveOnly(`${header}fn f() {\n  storage.balances = 1;\n}`)
			assert.deepStrictEqual(messages(context, 'TERES013'), [
				"storage namespace 'balances' is keyed; index it with a key",
			])
		})

		it('should turn require into a guarded revert', () => {
			const [stmt] = bodyOf(`${header}fn f(a: u64) {\n  require(a > 0, "empty");\n}`)
			assert.ok(stmt?.kind === 'if')
			assert.strictEqual(stmt.cond.kind, 'not')
			assert.deepStrictEqual(
				stmt.then.stmts.map((s) => s.kind),
				['revert']
			)
		})
	})
})
