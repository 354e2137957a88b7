/**
 * @tessera/diagnostics
 *
 * Shared diagnostic types and definitions for Tessera packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	TECLI001,
	TECLI002,
	TECLI003,
	TECLI004,
	TECLI005,
	TECLI006,
	TECLI007,
} from './cli.ts'
export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
	TEDOM001,
	TEDOM002,
	TEDOM050,
	TEDOM051,
	TEDOM052,
	TEDOM053,
	TEDOM054,
	TEGEN001,
	TEGEN002,
	TEGEN003,
	TEGEN050,
	TEGEN051,
	TEOWN001,
	TEOWN002,
	TEOWN003,
	TEOWN004,
	TEOWN005,
	TEOWN006,
	TEOWN007,
	TEOWN008,
	TEPARSE001,
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
} from './compiler.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArgs,
	type DiagnosticClass,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { COMPILER_DIAGNOSTICS } from './compiler.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...COMPILER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
