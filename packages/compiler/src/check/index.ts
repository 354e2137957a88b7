/**
 * Resolution: AST to typed HIR.
 */

import type { CompilationContext } from '../core/context.ts'
import type { AstUnit } from '../front/ast.ts'
import type { HirUnit } from '../hir/hir.ts'
import { resolveDeclarations } from './declarations.ts'
import { createResolverState } from './state.ts'

export { alwaysExits } from './statements.ts'

/**
 * Resolve a parsed unit. Problems are reported on the context; the caller
 * decides whether to continue when `context.hasErrors()`.
 */
export function resolve(context: CompilationContext, ast: AstUnit): HirUnit {
	const state = createResolverState(context, ast.name)
	const functions = resolveDeclarations(state, ast)
	return {
		bindings: state.bindings,
		functions,
		name: ast.name,
		storage: state.storage,
		structs: state.structs,
	}
}
