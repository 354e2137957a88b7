import assert from 'node:assert'
import { describe, it } from 'node:test'
import { opGas } from '../../src/backend/gas.ts'
import {
	type BackendOptions,
	DEFAULT_BACKEND_OPTIONS,
	disassemble,
	findBytecodeFunction,
	lowerModule,
} from '../../src/backend/index.ts'
import { lowerToSsa, messages } from '../helpers.ts'

function backend(source: string, options: Partial<BackendOptions> = {}) {
	const { context, module } = lowerToSsa(`unit t;\n${source}`)
	const result = lowerModule(context, module, { ...DEFAULT_BACKEND_OPTIONS, ...options })
	return { context, result }
}

const ADD = 'pub fn add(a: u64, b: u64) -> u64 { return a + b; }\nfn helper(a: u64) -> u64 { return a; }'

describe('backend/lower', () => {
	it('should lower every function with its signature', () => {
		const { module } = backend(ADD).result
		assert.ok(module)
		const add = findBytecodeFunction(module, 'add')
		assert.ok(add)
		assert.strictEqual(add.params, 2)
		assert.strictEqual(add.results, 1)
		assert.ok(disassemble(add).startsWith('func add params=2 results=1 locals='))
	})

	it('should mangle export names of public functions only', () => {
		const { module } = backend(ADD).result
		assert.ok(module)
		assert.deepStrictEqual(
			module.functions.map((f) => [f.name, f.exportName]),
			[
				['add', '_T1t3add'],
				['helper', null],
			]
		)
	})

	it('should import only the capabilities the code calls', () => {
		const { module } = backend('storage {\n  total: u64,\n}\npub fn bump() { storage.total = storage.total + 1; }').result
		assert.ok(module)
		assert.ok(module.imports.includes('state.read'))
		assert.ok(module.imports.includes('state.write'))
		assert.strictEqual(module.imports.includes('log.emit'), false)
	})

	it('should place static strings after the scratch area', () => {
		const { module } = backend('pub fn f() { emit("hello", 1); }').result
		assert.ok(module)
		assert.strictEqual(module.memory.dataOffset, 32)
		assert.ok(new TextDecoder().decode(module.memory.data).includes('hello'))
		assert.strictEqual(module.memory.heapBase % 8, 0)
	})
})

describe('backend/limits', () => {
	it('should reject a function with too many locals', () => {
		const { context, result } = backend(ADD, { maxLocals: 1 })
		assert.ok(result.failed.has('add'))
		const [message] = messages(context, 'TEGEN001')
		assert.ok(message?.startsWith("function 'add' needs "))
		assert.ok(message.endsWith('locals, exceeding the limit of 1'))
		assert.strictEqual(result.module?.functions.some((f) => f.name === 'add'), false)
	})

	it('should reject oversized aggregates and every caller of the function', () => {
		const { context, result } = backend(
			`struct Triple { a: u64, b: u64, c: u64 }
fn make() -> u64 { let t = Triple { a: 1, b: 2, c: 3 }; return t.a; }
pub fn top() -> u64 { return make(); }
pub fn other() -> u64 { return 1; }`,
			{ maxValueBytes: 16 }
		)
		assert.deepStrictEqual(messages(context, 'TEGEN002'), [
			"value of type 'Triple' needs 24 bytes, exceeding the limit of 16",
		])
		assert.deepStrictEqual(messages(context, 'TEGEN050'), [
			"'top' not emitted: it calls 'make', which failed to compile",
		])
		assert.deepStrictEqual([...result.failed], ['make', 'top'])
		assert.deepStrictEqual(
			result.module?.functions.map((f) => f.name),
			['other']
		)
	})

	it('should fail the module when static data does not fit in memory', () => {
		const { context, result } = backend(ADD, { memoryPages: 0 })
		assert.strictEqual(result.module, null)
		assert.deepStrictEqual(messages(context, 'TEGEN003'), ['static data needs 32 bytes but memory holds 0'])
	})
})

describe('backend/gas', () => {
	const LOOP = `pub fn count(n: u64) -> u64 { var i = 0; while i < n { i = i + 1; } return i; }
pub fn outer(n: u64) -> u64 { return count(n); }
fn down(n: u64) -> u64 { if n == 0 { return 0; } return down(n - 1); }`

	it('should charge host calls their capability cost', () => {
		assert.strictEqual(opGas({ capability: 'state.write', op: 'host' }), 501)
		assert.strictEqual(opGas({ op: 'mul' }), 3)
	})

	it('should weight loop bodies by the loop factor', () => {
		const flat = backend(LOOP, { loopGasFactor: 1 }).result.gas.get('count') ?? 0
		const weighted = backend(LOOP, { loopGasFactor: 10 }).result.gas.get('count') ?? 0
		assert.ok(flat > 0)
		assert.ok(weighted > flat)
	})

	it('should add the estimate of callees at each call site', () => {
		const { gas } = backend(LOOP).result
		assert.ok((gas.get('outer') ?? 0) > (gas.get('count') ?? 0))
	})

	it('should give recursive functions a finite estimate', () => {
		const estimate = backend(LOOP).result.gas.get('down')
		assert.ok(estimate !== undefined && Number.isFinite(estimate) && estimate > 0)
	})
})
