/**
 * Unified compilation context that flows through all phases.
 * Owns the source text and diagnostic collection.
 */

import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
import { formatSpan, type Span } from './span.ts'

export { DiagnosticSeverity } from './diagnostics.ts'

/**
 * A secondary location attached to a diagnostic, such as the earlier move
 * that makes a later use invalid.
 */
export interface RelatedLocation {
	readonly span: Span
	readonly label: string
}

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Primary span */
	readonly span: Span
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
	/** Function the diagnostic belongs to, when it is function-scoped */
	readonly functionName?: string
	/** Other locations involved in the problem */
	readonly related?: readonly RelatedLocation[]
}

/**
 * Optional extras for a diagnostic.
 */
export interface EmitExtras {
	functionName?: string
	related?: readonly RelatedLocation[]
}

/**
 * The unified compilation context.
 * Passed through all compilation phases.
 *
 * Design principles:
 * - Centralized diagnostics: all problems collected in one place
 * - Phases report and continue; whoever drives the pipeline decides what is fatal
 */
export class CompilationContext {
	/** Original source code */
	readonly source: string

	/** Source filename for error messages */
	readonly filename: string

	/** Collected diagnostics */
	private readonly diagnostics: Diagnostic[] = []

	private errorCount = 0

	private lines: string[] | null = null

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
	}

	/**
	 * Emit a diagnostic by code at a span.
	 */
	emit(code: DiagnosticCode, span: Span, args?: DiagnosticArgs, extras: EmitExtras = {}): void {
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		this.addDiagnosticInternal({
			column: span.column,
			def,
			line: span.line,
			message,
			span,
			...(args ? { args } : {}),
			...(extras.functionName !== undefined ? { functionName: extras.functionName } : {}),
			...(extras.related !== undefined ? { related: extras.related } : {}),
		})
	}

	private addDiagnosticInternal(diagnostic: Diagnostic): void {
		this.diagnostics.push(diagnostic)
		if (diagnostic.def.severity === DiagnosticSeverity.Error) {
			this.errorCount++
		}
	}

	// ===========================================================================
	// QUERY METHODS
	// ===========================================================================

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getWarnings(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Warning)
	}

	/** Diagnostics whose code matches, in emission order. */
	withCode(code: DiagnosticCode): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.code === code)
	}

	getSourceLine(line: number): string | undefined {
		if (this.lines === null) this.lines = this.source.split('\n')
		return this.lines[line - 1]
	}

	// ===========================================================================
	// FORMATTING
	// ===========================================================================

	private getSeverityLabel(severity: DiagnosticSeverity): string {
		const labels: Record<DiagnosticSeverity, string> = {
			[DiagnosticSeverity.Error]: 'error',
			[DiagnosticSeverity.Warning]: 'warning',
			[DiagnosticSeverity.Note]: 'note',
		}
		return labels[severity]
	}

	private buildSourceContext(
		diagnostic: Diagnostic,
		sourceLine: string
	): { emptyPrefix: string; lines: string[] } {
		const lineNumWidth = String(diagnostic.line).length
		const pad = ' '.repeat(lineNumWidth)
		const linePrefix = ` ${diagnostic.line} | `
		const emptyPrefix = ` ${pad} | `
		const spanWidth = diagnostic.span.end - diagnostic.span.start
		const width = Math.max(1, Math.min(spanWidth, sourceLine.length - diagnostic.column + 1))
		const pointer = `${' '.repeat(diagnostic.column - 1)}${'^'.repeat(width)}`

		return {
			emptyPrefix,
			lines: [emptyPrefix, `${linePrefix}${sourceLine}`, `${emptyPrefix}${pointer}`],
		}
	}

	/**
	 * Format a diagnostic for display with a source excerpt and caret.
	 *
	 * Example:
	 * ```
	 * error[TEOWN001]: use of moved value 'vault'
	 *   --> token.tsr:9:12
	 *    |
	 *  9 |     close(vault);
	 *    |           ^^^^^
	 *    |
	 *    = note: value moved here (7:11)
	 *    = help: Pass it as `ref` instead, or make the struct a `copy struct`.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const header = `${this.getSeverityLabel(def.severity)}[${def.code}]: ${diagnostic.message}`
		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const { emptyPrefix, lines: contextLines } = this.buildSourceContext(diagnostic, sourceLine)
		const lines = [header, location, ...contextLines]

		const trailer: string[] = []
		for (const related of diagnostic.related ?? []) {
			trailer.push(`   = note: ${related.label} (${formatSpan(related.span)})`)
		}
		if (def.suggestion) {
			trailer.push(`   = help: ${interpolateMessage(def.suggestion, diagnostic.args)}`)
		}
		if (trailer.length > 0) {
			lines.push(emptyPrefix, ...trailer)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
