/**
 * Compiler diagnostic definitions.
 *
 * Error code format: TE<PHASE><NUMBER>
 * - TEPARSE: Syntax errors from the reference front end (001-099)
 * - TERES: Name and type resolution errors (001-099)
 * - TEOWN: Ownership violations (001-049)
 * - TEDOM: Domain analysis errors (001-049), warnings and notes (050-099)
 * - TEGEN: Backend limits (001-049), exclusion notes and warnings (050-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// PARSER ERRORS (TEPARSE001-099)
// =============================================================================

export const TEPARSE001: DiagnosticDef = {
	code: 'TEPARSE001',
	description: "Tessera couldn't understand this part of your code.",
	message: 'syntax error: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check for typos, a missing `;`, or an unbalanced brace.',
}

// =============================================================================
// RESOLUTION ERRORS (TERES001-099)
// =============================================================================

export const TERES001: DiagnosticDef = {
	code: 'TERES001',
	description: 'This name is not declared in any enclosing scope.',
	message: "unknown name '{name}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare it with `let` or `var` before using it.',
}

export const TERES002: DiagnosticDef = {
	code: 'TERES002',
	description: 'Types are the built-in integers, `bool`, `string`, `digest`, or a declared struct.',
	message: "unknown type '{name}'",
	severity: DiagnosticSeverity.Error,
}

export const TERES003: DiagnosticDef = {
	code: 'TERES003',
	description: 'The value here has a different type than the place it flows into.',
	message: 'type mismatch: expected {expected}, found {found}',
	severity: DiagnosticSeverity.Error,
}

export const TERES004: DiagnosticDef = {
	code: 'TERES004',
	description: 'No function or builtin with this name exists in the unit.',
	message: "unknown function '{name}'",
	severity: DiagnosticSeverity.Error,
}

export const TERES005: DiagnosticDef = {
	code: 'TERES005',
	description: 'Every parameter must receive exactly one argument.',
	message: "'{name}' takes {expected} argument(s), found {found}",
	severity: DiagnosticSeverity.Error,
}

export const TERES006: DiagnosticDef = {
	code: 'TERES006',
	description: 'The struct has no field with this name.',
	message: "unknown field '{field}' on '{type}'",
	severity: DiagnosticSeverity.Error,
}

export const TERES007: DiagnosticDef = {
	code: 'TERES007',
	description: 'Storage namespaces are declared in the `storage { }` block.',
	message: "unknown storage namespace '{name}'",
	severity: DiagnosticSeverity.Error,
}

export const TERES008: DiagnosticDef = {
	code: 'TERES008',
	description: 'Each function, struct, field and storage namespace needs a unique name.',
	message: "duplicate definition of '{name}'",
	severity: DiagnosticSeverity.Error,
}

export const TERES009: DiagnosticDef = {
	code: 'TERES009',
	description: 'Only bindings, struct fields and storage entries can be assigned.',
	message: 'invalid assignment target',
	severity: DiagnosticSeverity.Error,
}

export const TERES010: DiagnosticDef = {
	code: 'TERES010',
	description: 'The literal does not fit in the range of its integer type.',
	message: 'integer literal {value} out of range for {type}',
	severity: DiagnosticSeverity.Error,
}

export const TERES011: DiagnosticDef = {
	code: 'TERES011',
	description: 'A struct literal must initialise every field exactly once.',
	message: "missing field '{field}' in '{type}' literal",
	severity: DiagnosticSeverity.Error,
}

export const TERES012: DiagnosticDef = {
	code: 'TERES012',
	description: 'This operator is not defined for the operand type.',
	message: "operator '{op}' is not supported for {type}",
	severity: DiagnosticSeverity.Error,
}

export const TERES013: DiagnosticDef = {
	code: 'TERES013',
	description: 'Keyed namespaces are indexed with `[key]`; scalar namespaces are not.',
	message: "storage namespace '{name}' {detail}",
	severity: DiagnosticSeverity.Error,
}

export const TERES014: DiagnosticDef = {
	code: 'TERES014',
	description: 'A function with a return type must return a value on every path.',
	message: "function '{name}' may finish without returning a {type}",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add a `return` at the end of the body, or `revert` on the missing path.',
}

export const TERES015: DiagnosticDef = {
	code: 'TERES015',
	description:
		'Persistent state, logs, hashes and the public interface only carry scalar words, strings and digests.',
	message: 'type {type} cannot be used as {position}',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// OWNERSHIP ERRORS (TEOWN001-049)
// =============================================================================

export const TEOWN001: DiagnosticDef = {
	code: 'TEOWN001',
	description: 'A move-typed value can only be used once it has been moved somewhere else.',
	message: "use of moved value '{name}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass it as `ref` instead, or make the struct a `copy struct`.',
}

export const TEOWN002: DiagnosticDef = {
	code: 'TEOWN002',
	description: 'An exclusive borrow cannot coexist with any other borrow of the same binding.',
	message: "cannot borrow '{name}' as exclusive because it is already borrowed",
	severity: DiagnosticSeverity.Error,
}

export const TEOWN003: DiagnosticDef = {
	code: 'TEOWN003',
	description: 'A value cannot be moved while a borrow of it is still alive.',
	message: "cannot move '{name}' while it is borrowed",
	severity: DiagnosticSeverity.Error,
}

export const TEOWN004: DiagnosticDef = {
	code: 'TEOWN004',
	description: 'Bindings declared with `let` and parameters without `mut` are immutable.',
	message: "cannot assign to immutable binding '{name}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare it with `var` to allow reassignment.',
}

export const TEOWN005: DiagnosticDef = {
	code: 'TEOWN005',
	description: 'Only `var` bindings and `mut` parameters can be borrowed exclusively.',
	message: "cannot borrow immutable binding '{name}' as exclusive",
	severity: DiagnosticSeverity.Error,
}

export const TEOWN006: DiagnosticDef = {
	code: 'TEOWN006',
	description: 'The loop body moves a value declared outside the loop, so the next iteration would reuse it.',
	message: "value '{name}' was moved in a previous iteration of the loop",
	severity: DiagnosticSeverity.Error,
}

export const TEOWN007: DiagnosticDef = {
	code: 'TEOWN007',
	description: 'Values can only be moved out of bindings that own them.',
	message: "cannot move out of '{name}': {reason}",
	severity: DiagnosticSeverity.Error,
}

export const TEOWN008: DiagnosticDef = {
	code: 'TEOWN008',
	description: 'While a binding is exclusively borrowed, no other access to it is allowed.',
	message: "cannot use '{name}' while it is exclusively borrowed",
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// DOMAIN ERRORS (TEDOM001-049)
// =============================================================================

export const TEDOM001: DiagnosticDef = {
	code: 'TEDOM001',
	description: 'Dynamic storage keys are rejected under the strict key policy.',
	message: "storage key for '{namespace}' cannot be resolved statically",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a constant key, or declare the domains with #[reads(...)] / #[writes(...)].',
}

export const TEDOM002: DiagnosticDef = {
	code: 'TEDOM002',
	description: 'Domain annotations take string arguments of the form "namespace" or "namespace:key".',
	message: 'malformed annotation: {detail}',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// DOMAIN WARNINGS AND NOTES (TEDOM050-099)
// =============================================================================

export const TEDOM050: DiagnosticDef = {
	code: 'TEDOM050',
	description: 'The key expression depends on runtime data, so the whole namespace is treated as touched.',
	message: "storage key for '{namespace}' is dynamic; access coarsened to '{domain}'",
	severity: DiagnosticSeverity.Note,
	suggestion: 'Declare the exact domains with #[reads(...)] / #[writes(...)] to narrow the conflict set.',
}

export const TEDOM051: DiagnosticDef = {
	code: 'TEDOM051',
	description: 'The body touches a domain that the declared domain set does not cover.',
	message: "'{function}' {access} '{domain}', which its declared domains do not cover",
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Add "{domain}" to the #[{access}] annotation.',
}

export const TEDOM052: DiagnosticDef = {
	code: 'TEDOM052',
	description: 'A declared domain is never touched by the body or its callees.',
	message: "'{function}' declares {access} of '{domain}' but never touches it",
	severity: DiagnosticSeverity.Note,
}

export const TEDOM053: DiagnosticDef = {
	code: 'TEDOM053',
	description: 'The declared domain refers to a namespace that the unit does not declare.',
	message: "annotation names unknown storage namespace '{namespace}'",
	severity: DiagnosticSeverity.Warning,
}

export const TEDOM054: DiagnosticDef = {
	code: 'TEDOM054',
	description: 'This annotation is not interpreted by the compiler.',
	message: "unknown annotation '{name}'",
	severity: DiagnosticSeverity.Warning,
}

// =============================================================================
// CODEGEN ERRORS (TEGEN001-049)
// =============================================================================

export const TEGEN001: DiagnosticDef = {
	class: 'internal',
	code: 'TEGEN001',
	description: 'The function needs more local slots than the target machine allows.',
	message: "function '{function}' needs {count} locals, exceeding the limit of {limit}",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Split the function into smaller functions.',
}

export const TEGEN002: DiagnosticDef = {
	class: 'internal',
	code: 'TEGEN002',
	description: 'The value is larger than the target can address as a single object.',
	message: "value of type '{type}' needs {size} bytes, exceeding the limit of {limit}",
	severity: DiagnosticSeverity.Error,
}

export const TEGEN003: DiagnosticDef = {
	class: 'internal',
	code: 'TEGEN003',
	description: 'Constant data does not fit into the configured linear memory.',
	message: 'static data needs {size} bytes but memory holds {limit}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Raise the memory page count.',
}

// =============================================================================
// CODEGEN NOTES AND WARNINGS (TEGEN050-099)
// =============================================================================

export const TEGEN050: DiagnosticDef = {
	code: 'TEGEN050',
	description: 'A function is left out of the artifacts when something it calls failed to compile.',
	message: "'{function}' not emitted: it calls '{callee}', which failed to compile",
	severity: DiagnosticSeverity.Note,
}

export const TEGEN051: DiagnosticDef = {
	code: 'TEGEN051',
	description: 'Only `pub fn` functions become exports of the module.',
	message: 'unit exports no public functions',
	severity: DiagnosticSeverity.Warning,
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all compiler diagnostics.
 */
export const COMPILER_DIAGNOSTICS = {
	// Domain errors
	TEDOM001,
	TEDOM002,
	// Domain warnings and notes
	TEDOM050,
	TEDOM051,
	TEDOM052,
	TEDOM053,
	TEDOM054,
	// Codegen errors
	TEGEN001,
	TEGEN002,
	TEGEN003,
	// Codegen notes
	TEGEN050,
	TEGEN051,
	// Ownership errors
	TEOWN001,
	TEOWN002,
	TEOWN003,
	TEOWN004,
	TEOWN005,
	TEOWN006,
	TEOWN007,
	TEOWN008,
	// Parser errors
	TEPARSE001,
	// Resolution errors
	TERES001,
	TERES002,
	TERES003,
	TERES004,
	TERES005,
	TERES006,
	TERES007,
	TERES008,
	TERES009,
	TERES010,
	TERES011,
	TERES012,
	TERES013,
	TERES014,
	TERES015,
} as const

/**
 * All valid compiler diagnostic codes.
 */
export type CompilerDiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS
