import { mkdir, writeFile } from 'node:fs/promises'
import { args, flags } from '@adonisjs/ace'
import type { CompileResult } from '@tessera/compiler'
import {
	formatInvalidTargetError,
	formatValidationError,
	formatWriteError,
	getManifestContent,
	getOutputContent,
	isValidTarget,
	type OutputTarget,
	resolveManifestPath,
	resolveOutputPath,
} from '../utils.ts'
import { CompileCommand } from './shared.ts'

export default class BuildCommand extends CompileCommand {
	static override commandName = 'build'
	static override description = 'Compile a Tessera unit to WebAssembly and a metadata manifest'

	@args.string({ description: 'Input .tsr file to compile' })
	declare input: string

	@flags.string({ alias: 'o', description: 'Output directory (created if not exists)' })
	declare out?: string

	@flags.string({
		alias: 't',
		default: 'wasm',
		description: 'Output format: wasm (binary), wat (text) or bytecode (listing)',
	})
	declare target: string

	@flags.boolean({ default: true, description: 'Run optimization passes', showNegatedVariantInHelp: true })
	declare optimize: boolean

	private validateTarget(): OutputTarget | null {
		if (!isValidTarget(this.target)) {
			this.logger.error(formatInvalidTargetError(this.target))
			this.exitCode = 1
			return null
		}
		return this.target
	}

	private async writeOutputFile(outputPath: string, content: Uint8Array | string): Promise<boolean> {
		try {
			await writeFile(outputPath, content)
			this.logger.success(`wrote ${outputPath}`)
			return true
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
			return false
		}
	}

	private async emitOutput(result: CompileResult, target: OutputTarget): Promise<void> {
		if (result.wasm !== null && !result.wasm.valid) {
			this.logger.error(formatValidationError())
			this.exitCode = 1
			return
		}
		const content = getOutputContent(result, target)
		const manifest = getManifestContent(result)
		if (content === null || manifest === null) {
			this.exitCode = 1
			return
		}

		await mkdir(this.out ?? '.', { recursive: true })
		const written = await this.writeOutputFile(resolveOutputPath(this.input, this.out, target), content)
		if (!written) return
		await this.writeOutputFile(resolveManifestPath(this.input, this.out), manifest)
	}

	override async run(): Promise<void> {
		const target = this.validateTarget()
		if (target === null) return

		const source = await this.readSourceFile()
		if (source === null) return

		const result = this.compileSource(source, { emitWasm: target !== 'bytecode', optimize: this.optimize })
		if (result === null) return

		await this.emitOutput(result, target)
	}
}
