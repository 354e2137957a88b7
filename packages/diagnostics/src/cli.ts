/**
 * CLI diagnostic definitions.
 *
 * Error code format: TECLI<NUMBER>
 * - TECLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (TECLI001-099)
// =============================================================================

export const TECLI001: DiagnosticDef = {
	class: 'tooling',
	code: 'TECLI001',
	description: "Tessera couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const TECLI002: DiagnosticDef = {
	class: 'tooling',
	code: 'TECLI002',
	description: "The file exists but Tessera can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const TECLI003: DiagnosticDef = {
	class: 'tooling',
	code: 'TECLI003',
	description: "Tessera couldn't save an output file.",
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the output directory.',
}

export const TECLI004: DiagnosticDef = {
	class: 'tooling',
	code: 'TECLI004',
	description: "Tessera doesn't recognize this output format.",
	message: 'unknown target "{target}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `--target wasm`, `--target wat` or `--target bytecode`.',
}

export const TECLI005: DiagnosticDef = {
	class: 'tooling',
	code: 'TECLI005',
	description: "The emitted WebAssembly didn't pass validation.",
	message: 'generated wasm is invalid',
	severity: DiagnosticSeverity.Error,
	suggestion: 'This is a compiler bug; rerun with `--target bytecode` and attach the output to a report.',
}

export const TECLI006: DiagnosticDef = {
	class: 'tooling',
	code: 'TECLI006',
	description: 'Something unexpected went wrong during compilation.',
	message: 'compilation failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source file, or report this if it seems like a bug.',
}

export const TECLI007: DiagnosticDef = {
	class: 'tooling',
	code: 'TECLI007',
	description: 'Some functions failed to compile and were left out of the artifacts.',
	message: '{count} function(s) excluded from the artifacts',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	TECLI001,
	TECLI002,
	TECLI003,
	TECLI004,
	TECLI005,
	TECLI006,
	TECLI007,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
