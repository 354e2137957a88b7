import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompilationContext, DiagnosticSeverity } from '../../src/core/context.ts'
import { isValidDiagnosticCode } from '../../src/core/diagnostics.ts'
import { joinSpans, NO_SPAN, type Span } from '../../src/core/span.ts'

const SOURCE = 'unit t;\nfn f() -> u64 { return y; }'
const Y: Span = { column: 24, end: 32, line: 2, start: 31 }

describe('core/context', () => {
	describe('DiagnosticSeverity', () => {
		it('should have correct values', () => {
			assert.strictEqual(DiagnosticSeverity.Error, 0)
			assert.strictEqual(DiagnosticSeverity.Warning, 1)
			assert.strictEqual(DiagnosticSeverity.Note, 2)
		})
	})

	describe('CompilationContext', () => {
		it('should store source and filename', () => {
			const ctx = new CompilationContext(SOURCE, 'x.tsr')
			assert.strictEqual(ctx.source, SOURCE)
			assert.strictEqual(ctx.filename, 'x.tsr')
		})

		it('should use default filename if not provided', () => {
			assert.strictEqual(new CompilationContext(SOURCE).filename, '<input>')
		})

		it('should start with no errors', () => {
			const ctx = new CompilationContext(SOURCE)
			assert.strictEqual(ctx.hasErrors(), false)
			assert.strictEqual(ctx.getErrorCount(), 0)
			assert.deepStrictEqual(ctx.getDiagnostics(), [])
		})

		describe('emit', () => {
			it('should interpolate the catalog message', () => {
				const ctx = new CompilationContext(SOURCE)
				ctx.emit('TERES001', Y, { name: 'y' }, { functionName: 'f' })

				const [diag] = ctx.getDiagnostics()
				assert.ok(diag)
				assert.strictEqual(diag.message, "unknown name 'y'")
				assert.strictEqual(diag.def.severity, DiagnosticSeverity.Error)
				assert.strictEqual(diag.line, 2)
				assert.strictEqual(diag.column, 24)
				assert.strictEqual(diag.functionName, 'f')
				assert.strictEqual(ctx.hasErrors(), true)
			})

			it('should count only errors', () => {
				const ctx = new CompilationContext(SOURCE)
				ctx.emit('TERES001', Y, { name: 'y' })
				ctx.emit('TEGEN051', NO_SPAN)
				ctx.emit('TEDOM050', Y, { domain: 'n:*', namespace: 'n' })

				assert.strictEqual(ctx.getErrorCount(), 1)
				assert.deepStrictEqual(
					ctx.getWarnings().map((d) => d.def.code),
					['TEGEN051']
				)
				assert.deepStrictEqual(
					ctx.getErrors().map((d) => d.def.code),
					['TERES001']
				)
				assert.strictEqual(ctx.withCode('TEDOM050').length, 1)
			})
		})

		describe('getSourceLine', () => {
			it('should return correct line', () => {
				const ctx = new CompilationContext('line1\nline2\nline3')
				assert.strictEqual(ctx.getSourceLine(1), 'line1')
				assert.strictEqual(ctx.getSourceLine(3), 'line3')
			})

			it('should return undefined for out of bounds', () => {
				const ctx = new CompilationContext('line1\nline2')
				assert.strictEqual(ctx.getSourceLine(0), undefined)
				assert.strictEqual(ctx.getSourceLine(3), undefined)
			})
		})

		describe('formatDiagnostic', () => {
			it('should point at the span and add the suggestion', () => {
				const ctx = new CompilationContext(SOURCE, 'x.tsr')
				ctx.emit('TERES001', Y, { name: 'y' })
				const [diag] = ctx.getDiagnostics()
				assert.ok(diag)

				assert.strictEqual(
					ctx.formatDiagnostic(diag),
					[
						"error[TERES001]: unknown name 'y'",
						'  --> x.tsr:2:24',
						'   | ',
						' 2 | fn f() -> u64 { return y; }',
						`   | ${' '.repeat(23)}^`,
						'   | ',
						'   = help: Declare it with `let` or `var` before using it.',
					].join('\n')
				)
			})

			it('should list related locations before the suggestion', () => {
				const ctx = new CompilationContext(SOURCE, 'x.tsr')
				const first: Span = { column: 1, end: 4, line: 1, start: 0 }
				ctx.emit('TEOWN001', Y, { name: 'y' }, { related: [{ label: 'value moved here', span: first }] })
				const [diag] = ctx.getDiagnostics()
				assert.ok(diag)

				const lines = ctx.formatDiagnostic(diag).split('\n')
				assert.deepStrictEqual(lines.slice(-2), [
					'   = note: value moved here (1:1)',
					'   = help: Pass it as `ref` instead, or make the struct a `copy struct`.',
				])
			})

			it('should omit the source context when the line does not exist', () => {
				const ctx = new CompilationContext('')
				ctx.emit('TERES001', Y, { name: 'y' })
				const [diag] = ctx.getDiagnostics()
				assert.ok(diag)

				assert.strictEqual(ctx.formatDiagnostic(diag), "error[TERES001]: unknown name 'y'\n  --> <input>:2:24")
			})
		})

		describe('formatAllDiagnostics', () => {
			it('should separate diagnostics by a blank line', () => {
				const ctx = new CompilationContext('')
				ctx.emit('TERES001', Y, { name: 'y' })
				ctx.emit('TERES001', Y, { name: 'z' })

				assert.strictEqual(
					ctx.formatAllDiagnostics(),
					"error[TERES001]: unknown name 'y'\n  --> <input>:2:24\n\nerror[TERES001]: unknown name 'z'\n  --> <input>:2:24"
				)
			})
		})
	})

	describe('diagnostic codes', () => {
		it('should recognise catalog codes only', () => {
			assert.strictEqual(isValidDiagnosticCode('TEOWN001'), true)
			assert.strictEqual(isValidDiagnosticCode('XX0001'), false)
		})
	})

	describe('spans', () => {
		it('should join spans from the earlier start to the later end', () => {
			const later: Span = { column: 5, end: 40, line: 3, start: 36 }
			assert.deepStrictEqual(joinSpans(later, Y), { column: 24, end: 40, line: 2, start: 31 })
		})
	})
})
