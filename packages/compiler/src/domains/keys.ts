/**
 * Static resolution of storage key expressions.
 *
 * Follows a key value back through constants, copies, phis, projections of
 * locally built structs that are never written after construction,
 * arithmetic and hashing. A phi resolves to the union
 * of its inputs while that stays within the enumeration limit; anything that
 * depends on parameters, state or calls is dynamic.
 */

import { isInt } from '../check/types.ts'
import { encodeValue, type RuntimeValue, valuesEqual } from '../runtime/values.ts'
import { evalArith, evalBitwise, evalCmp } from '../runtime/arith.ts'
import { type Inst, instResult, type Phi, type SsaFunction, type ValueId, valueType } from '../ssa/ir.ts'
import { sha256, toHex } from './hash.ts'

type Definition = { readonly kind: 'inst'; readonly inst: Inst } | { readonly kind: 'phi'; readonly phi: Phi }

/** Key text in canonical domain strings. */
export function formatKey(value: RuntimeValue): string {
	if (typeof value === 'bigint') return value.toString(10)
	if (typeof value === 'boolean') return value ? 'true' : 'false'
	if (typeof value === 'string') return value
	if (value instanceof Uint8Array) return `0x${toHex(value)}`
	throw new Error(`struct ${value.type.name} cannot be a storage key`)
}

export class KeyResolver {
	private readonly defs = new Map<ValueId, Definition>()
	private readonly memo = new Map<ValueId, RuntimeValue[] | null>()
	private readonly visiting = new Set<ValueId>()
	/** Struct values a `field_set` or a call may write through. */
	private readonly mutated = new Set<ValueId>()

	constructor(
		private readonly fn: SsaFunction,
		private readonly limit: number
	) {
		for (const block of fn.blocks) {
			for (const phi of block.phis) this.defs.set(phi.result, { kind: 'phi', phi })
			for (const inst of block.insts) {
				const result = instResult(inst)
				if (result !== null) this.defs.set(result, { inst, kind: 'inst' })
			}
		}
		this.markMutated()
	}

	/** A write through a value reaches every struct it may point into. */
	private markMutated(): void {
		const work: ValueId[] = []
		for (const block of this.fn.blocks) {
			for (const inst of block.insts) {
				if (inst.kind === 'field_set') work.push(inst.base)
				if (inst.kind === 'call') work.push(...inst.args)
			}
		}
		for (let v = work.pop(); v !== undefined; v = work.pop()) {
			if (this.mutated.has(v)) continue
			this.mutated.add(v)
			const def = this.defs.get(v)
			if (def === undefined) continue
			if (def.kind === 'phi') {
				for (const input of def.phi.incoming) work.push(input.value)
				continue
			}
			const { inst } = def
			if (inst.kind === 'field_get') work.push(inst.base)
			else if (inst.kind === 'struct_new') work.push(...inst.fields)
		}
	}

	/** Key texts the value can take, or null when it is dynamic. */
	keys(v: ValueId): string[] | null {
		const values = this.values(v)
		return values === null ? null : [...new Set(values.map(formatKey))]
	}

	values(v: ValueId): RuntimeValue[] | null {
		if (this.memo.has(v)) return this.memo.get(v) ?? null
		if (this.visiting.has(v)) return null
		this.visiting.add(v)
		const resolved = this.resolve(v)
		this.visiting.delete(v)
		const bounded = resolved !== null && resolved.length <= this.limit ? dedupe(resolved) : null
		this.memo.set(v, bounded)
		return bounded
	}

	private resolve(v: ValueId): RuntimeValue[] | null {
		const def = this.defs.get(v)
		if (def === undefined) return null
		if (def.kind === 'phi') {
			const all: RuntimeValue[] = []
			for (const input of def.phi.incoming) {
				const values = this.values(input.value)
				if (values === null) return null
				all.push(...values)
			}
			return all
		}

		const { inst } = def
		switch (inst.kind) {
			case 'const':
				return [inst.value.value]
			case 'copy':
				return this.values(inst.source)
			case 'field_get': {
				if (this.mutated.has(inst.base)) return null
				const base = this.defs.get(inst.base)
				if (base?.kind !== 'inst' || base.inst.kind !== 'struct_new') return null
				const field = base.inst.fields[inst.index]
				return field !== undefined ? this.values(field) : null
			}
			case 'arith': {
				const type = valueType(this.fn, inst.result)
				if (!isInt(type)) return null
				const fallback = inst.fallback !== null ? this.values(inst.fallback) : [0n]
				if (fallback === null) return null
				return this.combine([inst.lhs, inst.rhs], ([a, b]) => {
					const results: RuntimeValue[] = []
					for (const fb of fallback) {
						if (typeof a !== 'bigint' || typeof b !== 'bigint' || typeof fb !== 'bigint') return null
						const r = evalArith(type, inst.op, inst.mode, a, b, fb)
						if (!r.ok) return null
						results.push(r.value)
					}
					return results
				})
			}
			case 'bitwise': {
				const type = valueType(this.fn, inst.result)
				if (!isInt(type)) return null
				return this.combine([inst.lhs, inst.rhs], ([a, b]) =>
					typeof a === 'bigint' && typeof b === 'bigint' ? [evalBitwise(type, inst.op, a, b)] : null
				)
			}
			case 'cmp':
				return this.combine([inst.lhs, inst.rhs], ([a, b]) => {
					if (a === undefined || b === undefined) return null
					if (typeof a === 'bigint' && typeof b === 'bigint') return [evalCmp(inst.op, a, b)]
					const equal = valuesEqual(a, b)
					return [inst.op === 'eq' ? equal : !equal]
				})
			case 'not':
				return this.combine([inst.operand], ([a]) => (typeof a === 'boolean' ? [!a] : null))
			case 'hash':
				return this.combine([inst.input], ([a]) => (a !== undefined ? [sha256(encodeValue(a))] : null))
			default:
				return null
		}
	}

	/** Apply `f` to every combination of operand values, within the limit. */
	private combine(
		operands: readonly ValueId[],
		f: (args: readonly (RuntimeValue | undefined)[]) => RuntimeValue[] | null
	): RuntimeValue[] | null {
		let combos: RuntimeValue[][] = [[]]
		for (const operand of operands) {
			const values = this.values(operand)
			if (values === null) return null
			combos = combos.flatMap((prefix) => values.map((value) => [...prefix, value]))
			if (combos.length > this.limit) return null
		}
		const results: RuntimeValue[] = []
		for (const combo of combos) {
			const out = f(combo)
			if (out === null) return null
			results.push(...out)
		}
		return results
	}
}

function dedupe(values: RuntimeValue[]): RuntimeValue[] {
	const seen = new Map<string, RuntimeValue>()
	for (const value of values) seen.set(formatKey(value), value)
	return [...seen.values()]
}
