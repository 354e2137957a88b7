import { basename, extname, join } from 'node:path'
import { CompileError, type CompileResult, disassembleModule, serializeManifest } from '@tessera/compiler'
import { interpolateMessage, TECLI001, TECLI002, TECLI003, TECLI004, TECLI005, TECLI006, TECLI007 } from '@tessera/diagnostics'

export type OutputTarget = 'wasm' | 'wat' | 'bytecode'

const TARGET_EXTENSIONS: Record<OutputTarget, string> = {
	bytecode: 'tbc',
	wasm: 'wasm',
	wat: 'wat',
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		const message = interpolateMessage(TECLI001.message, { path: filePath })
		return `[${TECLI001.code}] ${message}`
	}
	const message = interpolateMessage(TECLI002.message, { reason: getErrorMessage(error) })
	return `[${TECLI002.code}] ${message}`
}

export function formatWriteError(error: unknown): string {
	const message = interpolateMessage(TECLI003.message, { reason: getErrorMessage(error) })
	return `[${TECLI003.code}] ${message}`
}

export function formatInvalidTargetError(target: string): string {
	const message = interpolateMessage(TECLI004.message, { target })
	return `[${TECLI004.code}] ${message}`
}

export function formatValidationError(): string {
	return `[${TECLI005.code}] ${TECLI005.message}`
}

export function formatCompileError(error: unknown): string {
	if (error instanceof CompileError) {
		return error.message
	}
	const message = interpolateMessage(TECLI006.message, { reason: getErrorMessage(error) })
	return `[${TECLI006.code}] ${message}`
}

export function formatExclusions(count: number): string {
	const message = interpolateMessage(TECLI007.message, { count })
	return `[${TECLI007.code}] ${message}`
}

export function isValidTarget(value: string): value is OutputTarget {
	return value === 'wasm' || value === 'wat' || value === 'bytecode'
}

function stem(inputPath: string): string {
	return basename(inputPath, extname(inputPath))
}

export function resolveOutputFilename(inputPath: string, target: OutputTarget): string {
	return `${stem(inputPath)}.${TARGET_EXTENSIONS[target]}`
}

export function resolveManifestFilename(inputPath: string): string {
	return `${stem(inputPath)}.manifest.json`
}

export function resolveOutputPath(inputPath: string, outputDir: string | undefined, target: OutputTarget): string {
	return join(outputDir ?? '.', resolveOutputFilename(inputPath, target))
}

export function resolveManifestPath(inputPath: string, outputDir: string | undefined): string {
	return join(outputDir ?? '.', resolveManifestFilename(inputPath))
}

/**
 * Artifact content for a target, or null when the compilation produced none.
 */
export function getOutputContent(
	result: Pick<CompileResult, 'bytecode' | 'wasm'>,
	target: OutputTarget
): Uint8Array | string | null {
	if (target === 'bytecode') return result.bytecode !== null ? disassembleModule(result.bytecode) : null
	if (result.wasm === null) return null
	return target === 'wat' ? result.wasm.text : result.wasm.binary
}

export function getManifestContent(result: Pick<CompileResult, 'manifest'>): string | null {
	return result.manifest !== null ? serializeManifest(result.manifest) : null
}

/**
 * One line per compiled export: reads, writes and the gas estimate.
 */
export function summarizeManifest(result: Pick<CompileResult, 'manifest' | 'domains'>): string[] {
	if (result.manifest === null) return []
	const label = (hash: string): string => result.domains.labels.get(hash) ?? hash.slice(0, 12)
	return Object.values(result.manifest.functions).map((fn) => {
		const reads = fn.reads.map((entry) => label(entry.hash)).join(', ')
		const writes = fn.writes.map((entry) => label(entry.hash)).join(', ')
		return `${fn.name}: reads [${reads}] writes [${writes}] gas ${fn.gas}`
	})
}
