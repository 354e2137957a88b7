/**
 * The metadata manifest: per exported function, the aggregate domain sets,
 * static gas estimate, payability and proof obligation links.
 *
 * The runtime trusts this document to schedule transactions and to check
 * that a transaction's declared domains match the code it calls.
 */

import type { BytecodeModule } from '../backend/isa.ts'
import type { DomainAnalysis } from '../domains/analyzer.ts'
import type { DomainEntry } from '../domains/domain.ts'

export const MANIFEST_VERSION = 1

export interface ManifestFunction {
	readonly name: string
	readonly reads: readonly DomainEntry[]
	readonly writes: readonly DomainEntry[]
	/** Whether the sets come from `#[reads]` / `#[writes]` declarations */
	readonly declared: boolean
	readonly gas: number
	readonly payable: boolean
	readonly proofObligations: readonly string[]
}

export interface Manifest {
	readonly version: number
	readonly unit: string
	/** Keyed by mangled export name */
	readonly functions: Readonly<Record<string, ManifestFunction>>
}

export function buildManifest(
	module: BytecodeModule,
	domains: DomainAnalysis,
	gas: ReadonlyMap<string, number>
): Manifest {
	const exported = module.functions
		.flatMap((fn) => (fn.exportName !== null ? [{ exportName: fn.exportName, name: fn.name }] : []))
		.sort((a, b) => (a.exportName < b.exportName ? -1 : a.exportName > b.exportName ? 1 : 0))

	const functions: Record<string, ManifestFunction> = {}
	for (const { exportName, name } of exported) {
		const analysis = domains.functions.get(name)
		if (analysis === undefined) throw new Error(`no domain analysis for ${name}`)
		functions[exportName] = {
			declared: analysis.declared,
			gas: gas.get(name) ?? 0,
			name,
			payable: analysis.annotations.payable,
			proofObligations: [...analysis.annotations.proofs],
			reads: analysis.effective.reads,
			writes: analysis.effective.writes,
		}
	}
	return { functions, unit: module.unit, version: MANIFEST_VERSION }
}

export function serializeManifest(manifest: Manifest): string {
	return `${JSON.stringify(manifest, null, 2)}\n`
}

// ============================================================================
// Reading
// ============================================================================

export class ManifestError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'ManifestError'
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function field<T>(record: Record<string, unknown>, key: string, check: (v: unknown) => v is T, where: string): T {
	const value = record[key]
	if (!check(value)) throw new ManifestError(`${where}.${key} is missing or malformed`)
	return value
}

const isString = (v: unknown): v is string => typeof v === 'string'
const isNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v)
const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean'
const isStrings = (v: unknown): v is string[] => Array.isArray(v) && v.every(isString)

function isEntry(value: unknown): value is DomainEntry {
	return (
		isRecord(value) && isString(value['hash']) && isString(value['namespace']) && isBoolean(value['wildcard'])
	)
}

const isEntries = (v: unknown): v is DomainEntry[] => Array.isArray(v) && v.every(isEntry)

/** Parse and check a serialized manifest. */
export function parseManifest(text: string): Manifest {
	let raw: unknown
	try {
		raw = JSON.parse(text)
	} catch (error) {
		throw new ManifestError(`manifest is not JSON: ${error instanceof Error ? error.message : String(error)}`)
	}
	if (!isRecord(raw)) throw new ManifestError('manifest must be an object')
	const version = field(raw, 'version', isNumber, 'manifest')
	if (version !== MANIFEST_VERSION) throw new ManifestError(`unsupported manifest version ${version}`)
	const unit = field(raw, 'unit', isString, 'manifest')
	const entries = field(raw, 'functions', isRecord, 'manifest')

	const functions: Record<string, ManifestFunction> = {}
	for (const [exportName, value] of Object.entries(entries)) {
		const where = `functions.${exportName}`
		if (!isRecord(value)) throw new ManifestError(`${where} must be an object`)
		functions[exportName] = {
			declared: field(value, 'declared', isBoolean, where),
			gas: field(value, 'gas', isNumber, where),
			name: field(value, 'name', isString, where),
			payable: field(value, 'payable', isBoolean, where),
			proofObligations: field(value, 'proofObligations', isStrings, where),
			reads: field(value, 'reads', isEntries, where),
			writes: field(value, 'writes', isEntries, where),
		}
	}
	return { functions, unit, version }
}

// ============================================================================
// Transaction checks
// ============================================================================

/** Domain hashes a transaction declares it will touch. */
export interface DeclaredDomains {
	readonly reads: readonly string[]
	readonly writes: readonly string[]
}

export type VerifyResult =
	| { readonly ok: true }
	| { readonly ok: false; readonly reason: string; readonly missing: readonly string[]; readonly extra: readonly string[] }

function difference(a: ReadonlySet<string>, b: ReadonlySet<string>): string[] {
	return [...a].filter((x) => !b.has(x)).sort()
}

/**
 * A transaction is accepted only when its declared sets equal the
 * manifest's sets for the function it calls, as sets of hashes.
 */
export function verifyDeclaredDomains(manifest: Manifest, exportName: string, declared: DeclaredDomains): VerifyResult {
	const entry = manifest.functions[exportName]
	if (entry === undefined) {
		return { extra: [], missing: [], ok: false, reason: `unknown function ${exportName}` }
	}
	for (const access of ['reads', 'writes'] as const) {
		const expected = new Set(entry[access].map((e) => e.hash))
		const given = new Set(declared[access])
		const missing = difference(expected, given)
		const extra = difference(given, expected)
		if (missing.length > 0 || extra.length > 0) {
			return { extra, missing, ok: false, reason: `declared ${access} differ from the manifest` }
		}
	}
	return { ok: true }
}
