import assert from 'node:assert'
import { describe, it } from 'node:test'
import { MemoryHost } from '../../src/host/memory-host.ts'
import { eliminateDeadCode, foldConstants, inlineCalls, optimizeModule } from '../../src/opt/index.ts'
import { interpret } from '../../src/ssa/interpreter.ts'
import { findSsaFunction, type SsaFunction, type SsaModule } from '../../src/ssa/ir.ts'
import { printFunction } from '../../src/ssa/printer.ts'
import { verifyFunction } from '../../src/ssa/verify.ts'
import { lowerToSsa } from '../helpers.ts'

function moduleOf(source: string): SsaModule {
	return lowerToSsa(`unit t;\n${source}`).module
}

function fnOf(module: SsaModule, name: string): SsaFunction {
	const fn = findSsaFunction(module, name)
	assert.ok(fn)
	return fn
}

describe('opt/fold', () => {
	it('should fold constant arithmetic', () => {
		const module = moduleOf('fn f() -> u64 { return 2 + 3; }')
		const fn = fnOf(module, 'f')
		assert.strictEqual(foldConstants(fn), 1)
		eliminateDeadCode(fn)
		assert.strictEqual(printFunction(fn), ['fn f() -> u64 {', 'block0:', '  v2: u64 = const 5', '  return v2', '}'].join('\n'))
	})

	it('should leave arithmetic that would trap', () => {
		const module = moduleOf('fn f() -> u8 { let a: u8 = 200; return a + 100; }')
		const fn = fnOf(module, 'f')
		assert.strictEqual(foldConstants(fn), 0)
		assert.ok(fn.blocks[0]?.insts.some((i) => i.kind === 'arith'))
	})

	it('should turn a branch on a constant into a jump', () => {
		const module = moduleOf('fn f() -> u64 { if 1 < 2 { return 7; } return 9; }')
		const fn = fnOf(module, 'f')
		foldConstants(fn)
		assert.strictEqual(fn.blocks.length, 2)
		assert.strictEqual(fn.blocks[0]?.terminator.kind, 'br')
		assert.deepStrictEqual(verifyFunction(fn), [])
		assert.deepStrictEqual(interpret(module, 'f', [], new MemoryHost()), { kind: 'returned', value: 7n })
	})
})

describe('opt/dce', () => {
	it('should remove unused pure instructions', () => {
		const fn = fnOf(moduleOf('fn f(a: u64) -> u64 { let unused = a == 3; let x = wrapping_mul(a, 2); return a; }'), 'f')
		assert.strictEqual(eliminateDeadCode(fn), 4)
		assert.deepStrictEqual(fn.blocks[0]?.insts, [])
	})

	it('should keep checked arithmetic that may trap', () => {
		const fn = fnOf(moduleOf('fn f(a: u64) -> u64 { let t = a + 1; return a; }'), 'f')
		assert.strictEqual(eliminateDeadCode(fn), 0)
		assert.deepStrictEqual(
			fn.blocks[0]?.insts.map((i) => i.kind),
			['const', 'arith']
		)
	})

	it('should keep state effects', () => {
		const fn = fnOf(moduleOf('storage {\n  total: u64,\n}\nfn f() { storage.total = 1; }'), 'f')
		eliminateDeadCode(fn)
		assert.deepStrictEqual(
			fn.blocks[0]?.insts.map((i) => i.kind),
			['const', 'state_write']
		)
	})
})

describe('opt/inline', () => {
	const SOURCE = `fn double(x: u64) -> u64 { return wrapping_mul(x, 2); }
pub fn quad(a: u64) -> u64 { return double(double(a)); }
fn spin(n: u64) -> u64 { return spin(n); }`

	it('should inline small straight-line callees', () => {
		const module = moduleOf(SOURCE)
		const quad = fnOf(module, 'quad')
		assert.strictEqual(inlineCalls(module, quad, { maxInstructions: 8 }), 2)
		assert.strictEqual(
			quad.blocks.some((b) => b.insts.some((i) => i.kind === 'call')),
			false
		)
		assert.deepStrictEqual(verifyFunction(quad), [])
		assert.deepStrictEqual(interpret(module, 'quad', [3n], new MemoryHost()), { kind: 'returned', value: 12n })
	})

	it('should respect the instruction limit', () => {
		const module = moduleOf(SOURCE)
		assert.strictEqual(inlineCalls(module, fnOf(module, 'quad'), { maxInstructions: 1 }), 0)
	})

	it('should not inline a function into itself', () => {
		const module = moduleOf(SOURCE)
		assert.strictEqual(inlineCalls(module, fnOf(module, 'spin'), { maxInstructions: 8 }), 0)
	})
})

describe('opt/optimizeModule', () => {
	it('should run folding and dead-code removal to a fixpoint', () => {
		const module = moduleOf('fn f() -> u64 { return 2 + 3; }')
		assert.deepStrictEqual(optimizeModule(module, { inline: false, maxInlineInstructions: 8 }), {
			folded: 1,
			inlined: 0,
			removed: 2,
		})
	})
})
