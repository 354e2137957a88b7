import { resolve } from '../src/check/index.ts'
import { CompilationContext, type Diagnostic } from '../src/core/context.ts'
import { parse } from '../src/front/parser.ts'
import type { HirUnit } from '../src/hir/hir.ts'
import { buildModule } from '../src/ssa/builder.ts'
import type { SsaModule } from '../src/ssa/ir.ts'

export interface Front {
	readonly context: CompilationContext
	readonly unit: HirUnit
}

/** Parse and resolve, failing the test on any front-end error. */
export function frontEnd(source: string): Front {
	const context = new CompilationContext(source, 'test.tsr')
	const ast = parse(context)
	if (ast === null || context.hasErrors()) throw new Error(context.formatAllDiagnostics())
	const unit = resolve(context, ast)
	if (context.hasErrors()) throw new Error(context.formatAllDiagnostics())
	return { context, unit }
}

/** Parse and resolve, returning whatever was reported. */
export function resolveOnly(source: string): CompilationContext {
	const context = new CompilationContext(source, 'test.tsr')
	const ast = parse(context)
	if (ast !== null) resolve(context, ast)
	return context
}

/** SSA of every function, with no ownership checking. */
export function lowerToSsa(source: string): Front & { readonly module: SsaModule } {
	const front = frontEnd(source)
	return { ...front, module: buildModule(front.unit, front.unit.functions) }
}

export function codes(diagnostics: readonly Diagnostic[]): string[] {
	return diagnostics.map((d) => d.def.code)
}

export function messages(context: CompilationContext, code: string): string[] {
	return context
		.getDiagnostics()
		.filter((d) => d.def.code === code)
		.map((d) => d.message)
}
