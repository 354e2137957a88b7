import assert from 'node:assert'
import { describe, it } from 'node:test'
import { emitWasm } from '../../src/codegen/wasm.ts'
import { compile } from '../../src/index.ts'

const SOURCE = `unit bank;
storage {
  total: u64,
}
pub fn deposit(amount: u64) -> u64 {
  let next = storage.total + amount;
  storage.total = next;
  return next;
}
fn helper(a: u64) -> u64 {
  return a * 2;
}
`

function bytecodeOf(source: string) {
	const { bytecode } = compile(source, { emitWasm: false, optimize: false })
	assert.ok(bytecode)
	return bytecode
}

describe('codegen/wasm', () => {
	it('should emit a module that validates', () => {
		const result = emitWasm(bytecodeOf(SOURCE))
		assert.strictEqual(result.valid, true)
		assert.deepStrictEqual([...result.binary.slice(0, 4)], [0x00, 0x61, 0x73, 0x6d])
	})

	it('should import capabilities under versioned module names', () => {
		const { text } = emitWasm(bytecodeOf(SOURCE))
		assert.ok(text.includes('(import "state@1" "read"'))
		assert.ok(text.includes('(import "state@1" "write"'))
		assert.ok(text.includes('(import "control@1" "abort"'))
	})

	it('should export memory and public functions under mangled names', () => {
		const { text } = emitWasm(bytecodeOf(SOURCE))
		assert.ok(text.includes('(export "memory"'))
		assert.ok(text.includes('(export "_T4bank7deposit"'))
		assert.strictEqual(text.includes('_T4bank6helper'), false)
	})

	it('should validate after optimization', () => {
		assert.strictEqual(emitWasm(bytecodeOf(SOURCE), { optimize: true }).valid, true)
	})

	it('should validate control flow, structs and overflow modes', () => {
		const result = emitWasm(
			bytecodeOf(`unit shapes;
copy struct Rect { w: u64, h: u64 }
pub fn area(w: u64, h: u64) -> u64 {
  var r = Rect { w: w, h: h };
  var i: u8 = 0;
  while i < 3 {
    r.w = saturating_add(r.w, 1);
    i = wrapping_add(i, 1);
  }
  if r.w > 100 { revert("too wide"); }
  return checked_mul(r.w, r.h, 0);
}`)
		)
		assert.strictEqual(result.valid, true)
	})
})
