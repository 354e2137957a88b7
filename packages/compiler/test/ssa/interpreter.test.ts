import assert from 'node:assert'
import { describe, it } from 'node:test'
import { namespaceDigest } from '../../src/domains/hash.ts'
import { wordToBytes } from '../../src/host/encoding.ts'
import { MemoryHost } from '../../src/host/memory-host.ts'
import { HostStatus, TrapCode } from '../../src/host/status.ts'
import { interpret } from '../../src/ssa/interpreter.ts'
import type { SsaModule } from '../../src/ssa/ir.ts'
import { lowerToSsa } from '../helpers.ts'

const BANK = `unit bank;
storage {
  total: u64,
  balances: map<string, u64>,
}
pub fn deposit(amount: u64) -> u64 {
  let next = storage.total + amount;
  storage.total = next;
  emit("deposit", amount);
  return next;
}
pub fn fail_after_write() {
  storage.total = 99;
  emit("never", 1);
  revert("nope");
}
pub fn bob() -> u64 {
  return storage.balances["bob"];
}
pub fn pay_bob(amount: u64) -> bool {
  storage.balances["bob"] = amount;
  return storage.balances.contains("bob");
}
pub fn height() -> u64 {
  return block_height();
}
`

const EMPTY = new Uint8Array(0)

function bank(): SsaModule {
	return lowerToSsa(BANK).module
}

function moduleOf(source: string): SsaModule {
	return lowerToSsa(`unit t;\n${source}`).module
}

describe('ssa/interpreter', () => {
	describe('state', () => {
		it('should commit writes of a returning call', () => {
			const module = bank()
			const host = new MemoryHost()
			assert.deepStrictEqual(interpret(module, 'deposit', [5n], host), { kind: 'returned', value: 5n })
			assert.deepStrictEqual(interpret(module, 'deposit', [7n], host), { kind: 'returned', value: 12n })
			assert.deepStrictEqual(host.peek(namespaceDigest('bank', 'total'), EMPTY), wordToBytes(12n))
		})

		it('should roll back writes and logs of a reverting call', () => {
			const module = bank()
			const host = new MemoryHost()
			interpret(module, 'deposit', [5n], host)
			assert.deepStrictEqual(interpret(module, 'fail_after_write', [], host), { kind: 'reverted', message: 'nope' })
			assert.deepStrictEqual(host.peek(namespaceDigest('bank', 'total'), EMPTY), wordToBytes(5n))
			assert.deepStrictEqual(
				host.getLogs().map((l) => l.topic),
				['deposit']
			)
		})

		it('should read absent keys as zero', () => {
			assert.deepStrictEqual(interpret(bank(), 'bob', [], new MemoryHost()), { kind: 'returned', value: 0n })
		})

		it('should see its own writes through contains', () => {
			const host = new MemoryHost()
			assert.deepStrictEqual(interpret(bank(), 'pay_bob', [3n], host), { kind: 'returned', value: true })
			assert.deepStrictEqual(host.peek(namespaceDigest('bank', 'balances'), new TextEncoder().encode('bob')), wordToBytes(3n))
		})

		it('should abort with the host status when a capability fails', () => {
			const host = new MemoryHost({ faults: { 'state.read': HostStatus.InternalError } })
			assert.deepStrictEqual(interpret(bank(), 'deposit', [1n], host), {
				kind: 'aborted',
				status: HostStatus.InternalError,
				trap: TrapCode.HostFailure,
			})
			assert.deepStrictEqual(host.snapshot(), [])
		})

		it('should read the execution context', () => {
			const host = new MemoryHost({ context: { blockHeight: 42n } })
			assert.deepStrictEqual(interpret(bank(), 'height', [], host), { kind: 'returned', value: 42n })
		})

		it('should log topic and encoded value', () => {
			const host = new MemoryHost()
			interpret(bank(), 'deposit', [9n], host)
			assert.deepStrictEqual(host.getLogs(), [{ data: wordToBytes(9n), topic: 'deposit' }])
		})
	})

	describe('arithmetic', () => {
		it('should abort on checked overflow', () => {
			const module = moduleOf('pub fn add8(a: u8, b: u8) -> u8 { return a + b; }')
			assert.deepStrictEqual(interpret(module, 'add8', [200n, 100n], new MemoryHost()), {
				kind: 'aborted',
				status: null,
				trap: TrapCode.Overflow,
			})
		})

		it('should abort on division by zero', () => {
			const module = moduleOf('pub fn div(a: u64, b: u64) -> u64 { return a / b; }')
			const outcome = interpret(module, 'div', [1n, 0n], new MemoryHost())
			assert.deepStrictEqual(outcome, { kind: 'aborted', status: null, trap: TrapCode.DivideByZero })
		})

		it('should apply the explicit overflow builtins', () => {
			const module = moduleOf(`pub fn wrap(a: u8, b: u8) -> u8 { return wrapping_add(a, b); }
pub fn sat(a: u64, b: u64) -> u64 { return saturating_sub(a, b); }
pub fn safe(a: u64, b: u64) -> u64 { return checked_div(a, b, 7); }
pub fn neg(a: i8) -> i8 { return saturating_mul(a, -1); }`)
			const run = (name: string, args: bigint[]) => interpret(module, name, args, new MemoryHost())
			assert.deepStrictEqual(run('wrap', [250n, 10n]), { kind: 'returned', value: 4n })
			assert.deepStrictEqual(run('sat', [3n, 5n]), { kind: 'returned', value: 0n })
			assert.deepStrictEqual(run('safe', [9n, 0n]), { kind: 'returned', value: 7n })
			assert.deepStrictEqual(run('neg', [-128n]), { kind: 'returned', value: 127n })
		})

		it('should update struct fields in place', () => {
			const module = moduleOf(`copy struct P { x: u64, y: u64 }
pub fn f(a: u64) -> u64 {
  var p = P { x: a, y: 2 };
  p.x = p.x + 1;
  return p.x * p.y;
}`)
			assert.deepStrictEqual(interpret(module, 'f', [3n], new MemoryHost()), { kind: 'returned', value: 8n })
		})
	})

	describe('limits', () => {
		it('should abort a runaway loop when the step budget runs out', () => {
			const module = moduleOf('pub fn spin() { while true { } }')
			assert.deepStrictEqual(interpret(module, 'spin', [], new MemoryHost(), { maxSteps: 100 }), {
				kind: 'aborted',
				status: null,
				trap: TrapCode.OutOfGas,
			})
		})

		it('should abort recursion deeper than the limit', () => {
			const module = moduleOf(`fn down(n: u64) -> u64 {
  if n == 0 { return 0; }
  return down(n - 1);
}
pub fn start(n: u64) -> u64 { return down(n); }`)
			const shallow = interpret(module, 'start', [5n], new MemoryHost(), { maxDepth: 10 })
			assert.deepStrictEqual(shallow, { kind: 'returned', value: 0n })
			const deep = interpret(module, 'start', [50n], new MemoryHost(), { maxDepth: 10 })
			assert.deepStrictEqual(deep, { kind: 'aborted', status: null, trap: TrapCode.OutOfGas })
		})
	})
})
