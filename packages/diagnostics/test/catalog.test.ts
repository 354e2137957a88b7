import assert from 'node:assert'
import { describe, it } from 'node:test'

import {
	DIAGNOSTICS,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	isValidDiagnosticCode,
} from '../src/index.ts'

describe('diagnostics/catalog', () => {
	it('keys every definition by its own code', () => {
		for (const [key, def] of Object.entries(DIAGNOSTICS)) {
			assert.strictEqual(def.code, key)
		}
	})

	it('keeps ownership codes fatal and domain fallbacks non-fatal', () => {
		assert.strictEqual(getDiagnostic('TEOWN001').severity, DiagnosticSeverity.Error)
		assert.strictEqual(getDiagnostic('TEDOM050').severity, DiagnosticSeverity.Note)
		assert.strictEqual(getDiagnostic('TEDOM051').severity, DiagnosticSeverity.Warning)
	})

	it('marks backend limits as internal', () => {
		assert.strictEqual(getDiagnostic('TEGEN001').class, 'internal')
		assert.strictEqual(getDiagnostic('TEOWN001').class, undefined)
	})

	it('validates codes', () => {
		assert.strictEqual(isValidDiagnosticCode('TEOWN002'), true)
		assert.strictEqual(isValidDiagnosticCode('XXLEX001'), false)
	})
})

describe('diagnostics/interpolateMessage', () => {
	it('replaces known placeholders', () => {
		assert.strictEqual(
			interpolateMessage("use of moved value '{name}'", { name: 'vault' }),
			"use of moved value 'vault'"
		)
	})

	it('renders bigint arguments', () => {
		assert.strictEqual(interpolateMessage('{value} too big', { value: 300n }), '300 too big')
	})

	it('leaves unknown placeholders in place', () => {
		assert.strictEqual(interpolateMessage('{a} and {b}', { a: 1 }), '1 and {b}')
	})

	it('returns the message unchanged without args', () => {
		assert.strictEqual(interpolateMessage('plain {x}'), 'plain {x}')
	})
})
