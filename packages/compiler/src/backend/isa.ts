/**
 * Linear stack-and-locals bytecode.
 *
 * Every value is a 64-bit word; the VM keeps words as unsigned bigints and
 * signed operations reinterpret them in two's complement. Comparisons push
 * 0 or 1. Control flow is by labels inside one function.
 */

import type { Type } from '../check/types.ts'
import type { CapabilityId } from '../host/capabilities.ts'
import type { TrapCode } from '../host/status.ts'

export type BinOp =
	| 'add'
	| 'sub'
	| 'mul'
	| 'div_s'
	| 'div_u'
	| 'rem_s'
	| 'rem_u'
	| 'and'
	| 'or'
	| 'xor'
	| 'shl'
	| 'shr_s'
	| 'shr_u'
	| 'eq'
	| 'ne'
	| 'lt_s'
	| 'lt_u'
	| 'le_s'
	| 'le_u'
	| 'gt_s'
	| 'gt_u'
	| 'ge_s'
	| 'ge_u'

export type Op =
	| { readonly op: 'const'; readonly value: bigint }
	| { readonly op: 'local.get'; readonly index: number }
	| { readonly op: 'local.set'; readonly index: number }
	| { readonly op: BinOp }
	| { readonly op: 'eqz' }
	/** Pops `c`, `b`, `a`; pushes `c != 0 ? a : b` */
	| { readonly op: 'select' }
	/** Pops an address; pushes the word at address + offset */
	| { readonly op: 'load'; readonly offset: number }
	/** Pops a word and an address; stores at address + offset */
	| { readonly op: 'store'; readonly offset: number }
	/** Pops a byte size; pushes the address of fresh heap memory */
	| { readonly op: 'alloc' }
	| { readonly op: 'call'; readonly callee: string; readonly arity: number; readonly results: 0 | 1 }
	| { readonly op: 'host'; readonly capability: CapabilityId }
	/** Pops a word; aborts with `code` when it is not zero */
	| { readonly op: 'trap_if'; readonly code: TrapCode }
	| { readonly op: 'label'; readonly id: number }
	| { readonly op: 'br'; readonly label: number }
	| { readonly op: 'br_if'; readonly label: number }
	| { readonly op: 'return' }
	| { readonly op: 'drop' }
	| { readonly op: 'unreachable' }

export type OpName = Op['op']

export interface BytecodeFunction {
	readonly name: string
	/** Mangled export name for public functions */
	readonly exportName: string | null
	readonly params: number
	readonly results: 0 | 1
	/** Source types of the parameters and result, for callers outside the module */
	readonly signature: { readonly params: readonly Type[]; readonly result: Type }
	/** Locals including parameters */
	readonly locals: number
	readonly code: readonly Op[]
	/** Loop nesting depth of each label */
	readonly loopDepth: readonly number[]
}

export interface MemoryLayout {
	readonly pages: number
	/** Static data, placed at `dataOffset` */
	readonly data: Uint8Array
	readonly dataOffset: number
	/** First address the bump allocator hands out */
	readonly heapBase: number
}

export interface BytecodeModule {
	readonly unit: string
	readonly functions: readonly BytecodeFunction[]
	readonly memory: MemoryLayout
	/** Host capabilities the code calls, in table order */
	readonly imports: readonly CapabilityId[]
}

export const PAGE_BYTES = 65536

export function findBytecodeFunction(module: BytecodeModule, name: string): BytecodeFunction | undefined {
	return module.functions.find((f) => f.name === name)
}

function formatOp(op: Op): string {
	switch (op.op) {
		case 'const':
			return `const ${BigInt.asIntN(64, op.value)}`
		case 'local.get':
		case 'local.set':
			return `${op.op} ${op.index}`
		case 'load':
		case 'store':
			return `${op.op} offset=${op.offset}`
		case 'call':
			return `call ${op.callee}/${op.arity}`
		case 'host':
			return `host ${op.capability}`
		case 'trap_if':
			return `trap_if ${op.code}`
		case 'label':
			return `L${op.id}:`
		case 'br':
		case 'br_if':
			return `${op.op} L${op.label}`
		default:
			return op.op
	}
}

/** Assembly-style listing, one op per line. */
export function disassemble(fn: BytecodeFunction): string {
	const header = `func ${fn.name} params=${fn.params} results=${fn.results} locals=${fn.locals}`
	return [header, ...fn.code.map((op) => (op.op === 'label' ? formatOp(op) : `  ${formatOp(op)}`))].join('\n')
}

export function disassembleModule(module: BytecodeModule): string {
	return module.functions.map(disassemble).join('\n\n')
}
