import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import type { BytecodeModule } from '../../src/backend/index.ts'
import { toHex } from '../../src/domains/hash.ts'
import { MemoryHost } from '../../src/host/memory-host.ts'
import { trapName } from '../../src/host/status.ts'
import { compile } from '../../src/index.ts'
import type { Outcome } from '../../src/runtime/outcome.ts'
import { formatValue, type RuntimeValue } from '../../src/runtime/values.ts'
import { execute } from '../../src/runtime/vm.ts'
import { interpret } from '../../src/ssa/interpreter.ts'
import type { SsaModule } from '../../src/ssa/ir.ts'

const CORPUS = `unit corpus;
storage {
  total: u64,
  nonce: map<u64, u64>,
}
copy struct P { a: u64, b: u64 }
pub fn swap(n: u64, a: u64, b: u64) -> u64 {
  var x = a;
  var y = b;
  var i = 0;
  while i < n { let t = x; x = y; y = t; i = i + 1; }
  return x * 1000 + y;
}
pub fn rot3(n: u64, a: u64, b: u64) -> u64 {
  var x = a;
  var y = b;
  var z = 7;
  var i = 0;
  while i < n { let t = x; x = y; y = z; z = t; i = i + 1; }
  return x * 1000000 + y * 1000 + z;
}
pub fn wander(n: u64, limit: u64) -> u64 {
  var x = n;
  var steps = 0;
  while steps < limit {
    if x % 2 == 0 { x = x / 2; } else { if x > 100 { x = x - 7; } else { x = x * 3 + 1; } }
    steps = steps + 1;
  }
  return x;
}
pub fn search(limit: u64, target: u64) -> u64 {
  var i = 0;
  while i < limit {
    if i * i == target { return i + 1000; }
    i = i + 1;
  }
  return 0;
}
fn fib(n: u64) -> u64 {
  if n < 2 { return n; }
  return fib(n - 1) + fib(n - 2);
}
pub fn fib_of(n: u64) -> u64 { return fib(n); }
fn is_even(n: u64) -> bool { if n == 0 { return true; } return is_odd(n - 1); }
fn is_odd(n: u64) -> bool { if n == 0 { return false; } return is_even(n - 1); }
pub fn parity(n: u64) -> bool { return is_even(n); }
pub fn pairs(n: u64, a: u64, b: u64) -> u64 {
  var p = P { a: a, b: b };
  var i = 0;
  while i < n { p = P { a: p.b, b: p.a + p.b }; i = i + 1; }
  return p.a;
}
fn bump(mut p: P) { p.a = p.a + 1; }
pub fn bumps(n: u64, a: u64) -> u64 {
  var p = P { a: a, b: 0 };
  var i = 0;
  while i < n { bump(p); i = i + 1; }
  return p.a + p.b;
}
pub fn classify(a: i32, b: i32) -> i32 {
  if a > 0 && b > 0 { return a - b; }
  if a < 0 || b < 0 { if a < b { return a; } return b; }
  return 0;
}
pub fn record(n: u64, cap: u64) -> u64 {
  var i = 0;
  while i < n { storage.nonce[i] = i * 2; emit("tick", i); i = i + 1; }
  require(n <= cap, "too many");
  storage.total = storage.total + n;
  return storage.total;
}
`

const small = (max: bigint) => fc.bigInt({ max, min: 0n })
const signed = fc.bigInt({ max: 1000n, min: -1000n })

function args(...operands: fc.Arbitrary<bigint>[]): fc.Arbitrary<RuntimeValue[]> {
	return fc.tuple(...operands).map((values): RuntimeValue[] => [...values])
}

const CASES: readonly (readonly [string, fc.Arbitrary<RuntimeValue[]>])[] = [
	['swap', args(small(9n), small(999n), small(999n))],
	['rot3', args(small(9n), small(999n), small(999n))],
	['wander', args(small(1000n), small(40n))],
	['search', args(small(40n), small(900n))],
	['fib_of', args(small(15n))],
	['parity', args(small(30n))],
	['pairs', args(small(40n), small(1000n), small(1000n))],
	['bumps', args(small(20n), small(1000n))],
	['classify', args(signed, signed)],
	['record', args(small(6n), small(6n))],
]

interface Observed {
	readonly outcome: string
	readonly logs: readonly [string, string][]
	readonly state: readonly [string, string][]
}

/** Outcome without the host status, which the two engines report at different depths. */
function describeOutcome(outcome: Outcome): string {
	switch (outcome.kind) {
		case 'returned':
			return `returned ${outcome.value === null ? 'nothing' : formatValue(outcome.value)}`
		case 'reverted':
			return `reverted ${outcome.message}`
		case 'aborted':
			return `aborted ${trapName(outcome.trap)}`
	}
}

function observe(run: (host: MemoryHost) => Outcome): Observed {
	const host = new MemoryHost()
	const outcome = describeOutcome(run(host))
	return {
		logs: host.getLogs().map((l): [string, string] => [l.topic, toHex(l.data)]),
		outcome,
		state: host.snapshot(),
	}
}

function build(optimize: boolean): { bytecode: BytecodeModule; ssa: SsaModule } {
	const result = compile(CORPUS, { emitWasm: false, optimize })
	assert.deepStrictEqual([...result.excluded], [])
	assert.ok(result.bytecode)
	return { bytecode: result.bytecode, ssa: result.ssa }
}

describe('runtime/vm round trip against the SSA interpreter', () => {
	const { ssa } = build(false)

	for (const optimize of [false, true]) {
		describe(optimize ? 'optimized' : 'unoptimized', () => {
			const module = build(optimize).bytecode

			for (const [name, inputs] of CASES) {
				it(`should agree on ${name}`, () => {
					fc.assert(
						fc.property(inputs, (values) => {
							const expected = observe((host) => interpret(ssa, name, values, host))
							const actual = observe((host) => execute(module, name, values, host).outcome)
							assert.deepStrictEqual(actual, expected, `${name}(${values.map(String).join(', ')})`)
						}),
						{ numRuns: 60 }
					)
				})
			}
		})
	}

	it('should run loops, recursion and struct updates to the expected values', () => {
		const module = build(true).bytecode
		const run = (name: string, args: RuntimeValue[]) => execute(module, name, args, new MemoryHost()).outcome
		assert.deepStrictEqual(run('swap', [3n, 1n, 2n]), { kind: 'returned', value: 2001n })
		assert.deepStrictEqual(run('rot3', [1n, 1n, 2n]), { kind: 'returned', value: 2007001n })
		assert.deepStrictEqual(run('fib_of', [10n]), { kind: 'returned', value: 55n })
		assert.deepStrictEqual(run('parity', [7n]), { kind: 'returned', value: false })
		assert.deepStrictEqual(run('pairs', [5n, 0n, 1n]), { kind: 'returned', value: 5n })
		assert.deepStrictEqual(run('bumps', [4n, 10n]), { kind: 'returned', value: 14n })
		assert.deepStrictEqual(run('record', [3n, 2n]), { kind: 'reverted', message: 'too many' })
	})
})
