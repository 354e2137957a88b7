import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { I8, I64, intMax, intMin, U8, U64 } from '../../src/check/types.ts'
import { TrapCode } from '../../src/host/status.ts'
import { evalArith, evalBitwise } from '../../src/runtime/arith.ts'
import type { ArithMode, ArithOp } from '../../src/ssa/ir.ts'

describe('runtime/arith', () => {
	describe('evalArith', () => {
		it('should return exact results that fit', () => {
			assert.deepStrictEqual(evalArith(U8, 'add', 'checked', 100n, 155n), { ok: true, value: 255n })
		})

		it('should trap on checked overflow', () => {
			assert.deepStrictEqual(evalArith(U8, 'add', 'checked', 100n, 156n), { ok: false, trap: TrapCode.Overflow })
			assert.deepStrictEqual(evalArith(U64, 'sub', 'checked', 0n, 1n), { ok: false, trap: TrapCode.Overflow })
		})

		it('should wrap around the range of the type', () => {
			assert.deepStrictEqual(evalArith(I8, 'add', 'wrapping', 127n, 1n), { ok: true, value: -128n })
			assert.deepStrictEqual(evalArith(U64, 'sub', 'wrapping', 0n, 1n), { ok: true, value: intMax(U64) })
		})

		it('should saturate toward the bound that was crossed', () => {
			assert.deepStrictEqual(evalArith(I8, 'sub', 'saturating', -100n, 100n), { ok: true, value: -128n })
			assert.deepStrictEqual(evalArith(I8, 'mul', 'saturating', 16n, 16n), { ok: true, value: 127n })
		})

		it('should substitute the fallback on overflow and division by zero', () => {
			assert.deepStrictEqual(evalArith(U8, 'mul', 'fallback', 16n, 16n, 9n), { ok: true, value: 9n })
			assert.deepStrictEqual(evalArith(U64, 'div', 'fallback', 5n, 0n, 3n), { ok: true, value: 3n })
		})

		it('should trap on division by zero outside fallback mode', () => {
			for (const mode of ['checked', 'wrapping', 'saturating'] as const) {
				assert.deepStrictEqual(evalArith(U64, 'rem', mode, 5n, 0n), { ok: false, trap: TrapCode.DivideByZero })
			}
		})

		it('should truncate signed division toward zero', () => {
			assert.deepStrictEqual(evalArith(I64, 'div', 'checked', -7n, 2n), { ok: true, value: -3n })
			assert.deepStrictEqual(evalArith(I64, 'rem', 'checked', -7n, 2n), { ok: true, value: -1n })
		})

		it('should overflow on MIN / -1', () => {
			assert.deepStrictEqual(evalArith(I64, 'div', 'checked', intMin(I64), -1n), { ok: false, trap: TrapCode.Overflow })
			assert.deepStrictEqual(evalArith(I64, 'div', 'wrapping', intMin(I64), -1n), { ok: true, value: intMin(I64) })
		})

		it('should keep every non-trapping result inside the type', () => {
			fc.assert(
				fc.property(
					fc.integer({ max: 127, min: -128 }),
					fc.integer({ max: 127, min: -128 }),
					fc.constantFrom<ArithOp>('add', 'sub', 'mul', 'div', 'rem'),
					fc.constantFrom<ArithMode>('wrapping', 'saturating', 'fallback', 'checked'),
					(a, b, op, mode) => {
						const result = evalArith(I8, op, mode, BigInt(a), BigInt(b), 0n)
						if (!result.ok) return
						assert.ok(result.value >= -128n && result.value <= 127n)
					}
				)
			)
		})
	})

	describe('evalBitwise', () => {
		it('should reduce shift amounts modulo the width', () => {
			assert.strictEqual(evalBitwise(U8, 'shl', 1n, 9n), 2n)
			assert.strictEqual(evalBitwise(U8, 'shl', 0x81n, 1n), 2n)
		})

		it('should shift signed values arithmetically', () => {
			assert.strictEqual(evalBitwise(I8, 'shr', -8n, 1n), -4n)
		})
	})
})
