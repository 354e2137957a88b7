/**
 * Textual form of SSA, for debugging and tests.
 *
 * ```
 * fn add(v0: u64, v1: u64) -> u64 {
 * block0:
 *   v2: u64 = add.checked v0, v1
 *   return v2
 * }
 * ```
 */

import { typeName } from '../check/types.ts'
import type { BasicBlock, ConstValue, Inst, SsaFunction, SsaModule, Terminator, ValueId } from './ir.ts'
import { instResult, valueType } from './ir.ts'

function formatConst(value: ConstValue): string {
	if (value.kind === 'string') return JSON.stringify(value.value)
	return String(value.value)
}

function formatInst(inst: Inst): string {
	const v = (id: ValueId): string => `v${id}`
	switch (inst.kind) {
		case 'const':
			return `const ${formatConst(inst.value)}`
		case 'arith': {
			const operands = [inst.lhs, inst.rhs, ...(inst.fallback !== null ? [inst.fallback] : [])]
			return `${inst.op}.${inst.mode} ${operands.map(v).join(', ')}`
		}
		case 'bitwise':
		case 'cmp':
			return `${inst.op} ${v(inst.lhs)}, ${v(inst.rhs)}`
		case 'not':
			return `not ${v(inst.operand)}`
		case 'struct_new':
			return `struct_new ${inst.fields.map(v).join(', ')}`
		case 'field_get':
			return `field_get ${v(inst.base)}.${inst.index}`
		case 'field_set':
			return `field_set ${v(inst.base)}.${inst.index}, ${v(inst.value)}`
		case 'copy':
			return `copy ${v(inst.source)}`
		case 'call':
			return `call ${inst.callee}(${inst.args.map(v).join(', ')})`
		case 'state_read':
			return `state_read ${inst.namespace}${inst.key !== null ? `[${v(inst.key)}]` : ''}`
		case 'state_write':
			return `state_write ${inst.namespace}${inst.key !== null ? `[${v(inst.key)}]` : ''}, ${v(inst.value)}`
		case 'state_exists':
			return `state_exists ${inst.namespace}[${v(inst.key)}]`
		case 'context':
			return `context ${inst.query}`
		case 'hash':
			return `hash ${v(inst.input)}`
		case 'emit_log':
			return `emit_log ${JSON.stringify(inst.topic)}, ${v(inst.value)}`
	}
}

function formatTerminator(term: Terminator): string {
	switch (term.kind) {
		case 'br':
			return `br block${term.target}`
		case 'cond_br':
			return `cond_br v${term.cond}, block${term.then}, block${term.else}`
		case 'return':
			return term.value !== null ? `return v${term.value}` : 'return'
		case 'revert':
			return `revert ${JSON.stringify(term.message)}`
		case 'unreachable':
			return 'unreachable'
	}
}

function formatBlock(fn: SsaFunction, block: BasicBlock): string[] {
	const typed = (id: ValueId): string => `v${id}: ${typeName(valueType(fn, id))}`
	const lines = [`block${block.id}:`]
	for (const phi of block.phis) {
		const inputs = phi.incoming.map((i) => `[block${i.block}: v${i.value}]`).join(', ')
		lines.push(`  ${typed(phi.result)} = phi ${inputs}`)
	}
	for (const inst of block.insts) {
		const result = instResult(inst)
		lines.push(result !== null ? `  ${typed(result)} = ${formatInst(inst)}` : `  ${formatInst(inst)}`)
	}
	lines.push(`  ${formatTerminator(block.terminator)}`)
	return lines
}

export function printFunction(fn: SsaFunction): string {
	const params = fn.params.map((p) => `v${p}: ${typeName(valueType(fn, p))}`).join(', ')
	const ret = fn.returnType.kind === 'unit' ? '' : ` -> ${typeName(fn.returnType)}`
	const lines = [`${fn.pub ? 'pub ' : ''}fn ${fn.name}(${params})${ret} {`]
	for (const block of fn.blocks) lines.push(...formatBlock(fn, block))
	lines.push('}')
	return lines.join('\n')
}

export function printModule(module: SsaModule): string {
	return [`unit ${module.unit}`, ...module.functions.map(printFunction)].join('\n\n')
}
