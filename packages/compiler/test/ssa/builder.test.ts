import assert from 'node:assert'
import { describe, it } from 'node:test'
import { ENTRY_BLOCK, findSsaFunction, type SsaFunction, valueId } from '../../src/ssa/ir.ts'
import { findLoops, loopDepths } from '../../src/ssa/loops.ts'
import { printFunction, printModule } from '../../src/ssa/printer.ts'
import { verifyFunction } from '../../src/ssa/verify.ts'
import { lowerToSsa } from '../helpers.ts'

function ssaOf(source: string, name: string): SsaFunction {
	const { module } = lowerToSsa(`unit t;\n${source}`)
	const fn = findSsaFunction(module, name)
	assert.ok(fn)
	return fn
}

const ADD = 'fn add(a: u64, b: u64) -> u64 { return a + b; }'
const PICK = 'fn pick(c: bool, a: u64) -> u64 { var x = a; if c { x = 1; } return x; }'
const SUM = 'fn sum(n: u64) -> u64 { var i = 0; var s = 0; while i < n { s = s + i; i = i + 1; } return s; }'

describe('ssa/builder', () => {
	it('should lower straight-line arithmetic with checked overflow', () => {
		assert.strictEqual(
			printFunction(ssaOf(ADD, 'add')),
			['fn add(v0: u64, v1: u64) -> u64 {', 'block0:', '  v2: u64 = add.checked v0, v1', '  return v2', '}'].join(
				'\n'
			)
		)
	})

	it('should merge a conditional reassignment with a phi', () => {
		assert.strictEqual(
			printFunction(ssaOf(PICK, 'pick')),
			[
				'fn pick(v0: bool, v1: u64) -> u64 {',
				'block0:',
				'  cond_br v0, block1, block2',
				'block1:',
				'  v2: u64 = const 1',
				'  br block2',
				'block2:',
				'  v3: u64 = phi [block1: v2], [block0: v1]',
				'  return v3',
				'}',
			].join('\n')
		)
	})

	it('should give loop-carried bindings header phis', () => {
		assert.strictEqual(
			printFunction(ssaOf(SUM, 'sum')),
			[
				'fn sum(v0: u64) -> u64 {',
				'block0:',
				'  v1: u64 = const 0',
				'  v2: u64 = const 0',
				'  br block1',
				'block1:',
				'  v3: u64 = phi [block0: v2], [block2: v6]',
				'  v4: u64 = phi [block0: v1], [block2: v8]',
				'  v5: bool = lt v4, v0',
				'  cond_br v5, block2, block3',
				'block2:',
				'  v6: u64 = add.checked v3, v4',
				'  v7: u64 = const 1',
				'  v8: u64 = add.checked v4, v7',
				'  br block1',
				'block3:',
				'  return v3',
				'}',
			].join('\n')
		)
	})

	it('should not create a phi when both arms agree', () => {
		const fn = ssaOf('fn f(c: bool, a: u64) -> u64 { var x = a; if c { x = a; } else { x = a; } return x; }', 'f')
		assert.deepStrictEqual(
			fn.blocks.map((b) => b.phis.length),
			[0, 0, 0, 0]
		)
	})

	it('should stop lowering after a return', () => {
		const fn = ssaOf('fn f() -> u64 { return 1; return 2; }', 'f')
		assert.strictEqual(fn.blocks.length, 1)
		assert.deepStrictEqual(
			fn.blocks[0]?.insts.map((i) => i.kind),
			['const']
		)
	})

	it('should end a branch that reverts without reaching the join', () => {
		const text = printFunction(ssaOf('fn f(a: u64) -> u64 { require(a > 0, "zero"); return a; }', 'f'))
		assert.ok(text.includes('  revert "zero"'))
		assert.ok(!text.includes('phi'))
	})

	it('should evaluate && lazily through a phi', () => {
		const fn = ssaOf('fn f(a: bool, b: bool) -> bool { return a && b; }', 'f')
		const join = fn.blocks[2]
		assert.ok(join)
		assert.deepStrictEqual(
			join.phis.map((p) => p.incoming.map((i) => [i.block, i.value])),
			[
				[
					[0, 0],
					[1, 1],
				],
			]
		)
	})

	it('should lower storage access and logs', () => {
		const fn = ssaOf(
			'storage {\n  total: u64,\n  balances: map<string, u64>,\n}\nfn f() {\n  storage.total = storage.balances["bob"];\n  emit("seen", 1);\n}',
			'f'
		)
		const lines = printFunction(fn).split('\n')
		assert.deepStrictEqual(lines.slice(2, 7), [
			'  v0: string = const "bob"',
			'  v1: u64 = state_read balances[v0]',
			'  state_write total, v1',
			'  v2: u64 = const 1',
			'  emit_log "seen", v2',
		])
	})

	it('should print the unit header before its functions', () => {
		const { module } = lowerToSsa(`unit t;\npub ${ADD}`)
		assert.ok(printModule(module).startsWith('unit t\n\npub fn add('))
	})
})

describe('ssa/verify', () => {
	it('should accept what the builder produces', () => {
		for (const [source, name] of [
			[ADD, 'add'],
			[PICK, 'pick'],
			[SUM, 'sum'],
		] as const) {
			assert.deepStrictEqual(verifyFunction(ssaOf(source, name)), [])
		}
	})

	it('should report a use of an undefined value', () => {
		const fn = ssaOf(ADD, 'add')
		const [entry] = fn.blocks
		assert.ok(entry)
		entry.terminator = { kind: 'return', span: entry.terminator.span, value: valueId(99) }
		assert.deepStrictEqual(verifyFunction(fn), ['v99 used by return in block0 before its definition'])
	})

	it('should report a phi missing an input', () => {
		const fn = ssaOf(PICK, 'pick')
		const phi = fn.blocks[2]?.phis[0]
		assert.ok(phi)
		phi.incoming = phi.incoming.slice(0, 1)
		assert.deepStrictEqual(verifyFunction(fn), ['phi v3 in block2 has 1 inputs for 2 predecessors'])
	})
})

describe('ssa/loops', () => {
	it('should find the natural loop of a while statement', () => {
		const loops = findLoops(ssaOf(SUM, 'sum'))
		assert.deepStrictEqual(
			loops.map((l) => [l.header, [...l.body].sort((a, b) => a - b)]),
			[[1, [1, 2]]]
		)
	})

	it('should count nesting depth', () => {
		const fn = ssaOf(
			'fn f(n: u64) { var i = 0; while i < n { var j = 0; while j < n { j = j + 1; } i = i + 1; } }',
			'f'
		)
		const depths = loopDepths(fn)
		assert.strictEqual(Math.max(...depths.values()), 2)
		assert.strictEqual(depths.has(ENTRY_BLOCK), false)
	})

	it('should find no loops in straight-line code', () => {
		assert.deepStrictEqual(findLoops(ssaOf(PICK, 'pick')), [])
	})
})
