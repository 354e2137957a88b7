import assert from 'node:assert'
import { describe, it } from 'node:test'
import { compile, CompileError } from '../src/index.ts'

const BANK = `unit bank;
storage {
  total: u64,
  balances: map<string, u64>,
}
pub fn deposit(amount: u64) -> u64 {
  let next = storage.total + amount;
  storage.total = next;
  return next;
}
pub fn credit(amount: u64) {
  storage.balances["bob"] = storage.balances["bob"] + amount;
}
`

const VAULTS = `unit vaults;
struct Vault { amount: u64 }
fn consume(v: Vault) {}
fn bad() {
  let v = Vault { amount: 1 };
  consume(v);
  consume(v);
}
pub fn entry() { bad(); }
pub fn fine() -> u64 { return 1; }
`

describe('compile', () => {
	describe('artifacts', () => {
		it('should produce bytecode, WebAssembly and a manifest', () => {
			const result = compile(BANK, { filename: 'bank.tsr' })
			assert.ok(result.bytecode)
			assert.deepStrictEqual(
				result.bytecode.functions.map((f) => f.exportName),
				['_T4bank7deposit', '_T4bank6credit']
			)
			assert.strictEqual(result.wasm?.valid, true)
			assert.deepStrictEqual(Object.keys(result.manifest?.functions ?? {}), ['_T4bank6credit', '_T4bank7deposit'])
			assert.strictEqual(result.excluded.size, 0)
			assert.strictEqual(result.context.hasErrors(), false)
		})

		it('should skip WebAssembly when asked', () => {
			assert.strictEqual(compile(BANK, { emitWasm: false }).wasm, null)
		})

		it('should report optimizer statistics only when optimizing', () => {
			assert.strictEqual(compile(BANK, { emitWasm: false, optimize: false }).optimizer, null)
			assert.ok(compile(BANK, { emitWasm: false }).optimizer)
		})

		it('should estimate gas for every emitted function', () => {
			const { gas } = compile(BANK, { emitWasm: false })
			assert.deepStrictEqual([...gas.keys()].sort(), ['credit', 'deposit'])
		})
	})

	describe('per-function exclusion', () => {
		it('should leave out functions that fail ownership checking and their callers', () => {
			const result = compile(VAULTS, { emitWasm: false })
			assert.deepStrictEqual(
				[...result.excluded],
				[
					['bad', 'TEOWN001'],
					['entry', 'TEGEN050'],
				]
			)
			assert.deepStrictEqual(
				result.bytecode?.functions.map((f) => f.name),
				['consume', 'fine']
			)
			assert.deepStrictEqual(
				result.context.withCode('TEGEN050').map((d) => d.message),
				["'entry' not emitted: it calls 'bad', which failed to compile"]
			)
		})

		it('should leave out functions with rejected storage keys', () => {
			const result = compile(
				`unit t;
storage {
  nonce: map<u64, u64>,
}
pub fn bump(who: u64) { storage.nonce[who] = 1; }
pub fn fixed() { storage.nonce[1] = 1; }`,
				{ dynamicKeyPolicy: 'reject', emitWasm: false }
			)
			assert.deepStrictEqual([...result.excluded], [['bump', 'TEDOM001']])
			assert.deepStrictEqual(Object.keys(result.manifest?.functions ?? {}), ['_T1t5fixed'])
		})

		it('should record a wildcard write for a key taken from a rewritten struct field', () => {
			const result = compile(
				`unit t;
storage {
  nonce: map<u64, u64>,
}
copy struct K { k: u64 }
pub fn direct(who: u64) { var s = K { k: 1 }; s.k = who; storage.nonce[s.k] = 7; }`,
				{ emitWasm: false }
			)
			assert.deepStrictEqual(
				result.manifest?.functions['_T1t6direct']?.writes.map((w) => w.wildcard),
				[true]
			)
		})

		it('should leave out functions over a backend limit', () => {
			const result = compile(
				`unit t;
struct Wide { a: u64, b: u64, c: u64 }
pub fn f() -> u64 { let w = Wide { a: 1, b: 2, c: 3 }; return w.b; }
pub fn g() -> u64 { return 2; }`,
				{ emitWasm: false, maxValueBytes: 16, optimize: false }
			)
			assert.deepStrictEqual([...result.excluded], [['f', 'TEGEN002']])
		})
	})

	describe('warnings', () => {
		it('should collect warnings about declared domains', () => {
			const result = compile(
				`unit bank;
storage {
  acct: map<string, u64>,
}
#[writes("acct:alice")]
pub fn pay() { storage.acct["bob"] = 5; }`,
				{ emitWasm: false }
			)
			assert.deepStrictEqual(
				result.warnings.map((w) => w.def.code),
				['TEDOM051']
			)
			assert.strictEqual(result.manifest?.functions['_T4bank3pay']?.declared, true)
		})

		it('should warn about a unit without public functions', () => {
			const result = compile('unit t;\nfn f() {}\n', { emitWasm: false })
			assert.deepStrictEqual(
				result.warnings.map((w) => w.message),
				['unit exports no public functions']
			)
		})
	})

	describe('errors', () => {
		it('should throw CompileError on syntax errors', () => {
			assert.throws(
				() => compile('unit t;\nfn f( {}\n', { filename: 'broken.tsr' }),
				(error: unknown) => {
					assert.ok(error instanceof CompileError)
					assert.strictEqual(error.name, 'CompileError')
					assert.ok(error.message.startsWith('error[TEPARSE001]: syntax error: '))
					assert.ok(error.message.includes('  --> broken.tsr:2:'))
					return true
				}
			)
		})

		it('should throw CompileError on resolution errors', () => {
			assert.throws(
				() => compile('unit t;\nfn f() -> u64 { return y; }\n'),
				(error: unknown) => {
					assert.ok(error instanceof CompileError)
					assert.ok(error.message.startsWith("error[TERES001]: unknown name 'y'"))
					return true
				}
			)
		})
	})
})
